import type { Target } from "../core/target.js";
import { basicSourceSetup, cdPrefix } from "./source.js";
import { timewarpUrl } from "./timewarp.js";
import type { BuildEnv, Instructions, NpmCustomBuild, NpmPackBuild } from "./types.js";
import { joinPosix, nodeMuslTarballUrl } from "./workflow.js";

// `npm version` only exists from npm 6 on, so the override always uses the system npm.
function versionOverrideLine(dir: string, override: string | undefined): string[] {
  if (!override) return [];
  return [`PATH=/usr/bin:/bin:/usr/local/bin /usr/bin/npm version --prefix ${dir} --no-git-tag-version ${override}`];
}

export function renderNpmPackBuild(s: NpmPackBuild, t: Target, env: BuildEnv): Instructions {
  const build = [
    ...versionOverrideLine(s.location.dir, s.versionOverride),
    `/usr/bin/npx --package=npm@${s.npmVersion} -c '${cdPrefix(s.location.dir)}npm pack'`
  ];
  return {
    location: s.location,
    systemDeps: ["git", "npm"],
    source: basicSourceSetup(s.location, env),
    deps: "",
    build: build.join("\n"),
    outputPath: joinPosix(s.location.dir, t.artifact)
  };
}

export function renderNpmCustomBuild(s: NpmCustomBuild, t: Target, env: BuildEnv): Instructions {
  const registry = timewarpUrl("npm", s.registryTime, env.timewarpHost);
  // Recovery scripts may call `npm install` during the build, so both phases route through the proxy.
  const registrySetup = [
    `/usr/bin/npm config --location-global set registry ${registry}`,
    "trap '/usr/bin/npm config --location-global delete registry' EXIT"
  ];
  const npx = (cmd: string) => `/usr/local/bin/npx --package=npm@${s.npmVersion} -c '${cdPrefix(s.location.dir)}${cmd}'`;
  const deps = [
    ...registrySetup,
    `wget -O - ${nodeMuslTarballUrl(s.nodeVersion)} | tar xzf - --strip-components=1 -C /usr/local/`,
    ...(s.keepRoot ? ["/usr/local/bin/npm config --location-global set unsafe-perm true"] : []),
    npx("npm install --force")
  ];
  const build = [
    ...registrySetup,
    ...versionOverrideLine(s.location.dir, s.versionOverride),
    ...(s.command ? [npx(`npm run ${s.command}`)] : []),
    ...(s.prepackRemoveDeps ? [`rm -rf ${joinPosix(s.location.dir, "node_modules")}`] : []),
    npx("npm pack")
  ];
  return {
    location: s.location,
    systemDeps: ["git", "npm"],
    source: basicSourceSetup(s.location, env),
    deps: deps.join("\n"),
    build: build.join("\n"),
    outputPath: joinPosix(s.location.dir, t.artifact)
  };
}
