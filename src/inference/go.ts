import { RebuildError, notFound } from "../core/errors.js";
import { canonicalizeRepoUri } from "../core/repoUri.js";
import type { GoVersionInfo } from "../registry/goproxy.js";
import { readTextOrNull, type Repository } from "../repo/types.js";
import type { Location, Strategy } from "../strategy/types.js";
import { hintLocation, requireRepoConfig } from "./common.js";
import type { EcosystemRebuilder } from "./types.js";

const FORGE_HOSTS = ["github.com", "gitlab.com"];

/** Repository URL from the proxy's origin record, else the first three segments of a forge module path. */
export function goRepoUrl(module: string, info: GoVersionInfo): string {
  if (info.origin?.url) return canonicalizeRepoUri(info.origin.url);
  const segments = module.split("/");
  if (segments.length >= 3 && FORGE_HOSTS.includes(segments[0] ?? "")) {
    return canonicalizeRepoUri(`https://${segments.slice(0, 3).join("/")}`);
  }
  throw notFound(`no repository for module ${module}`);
}

/** Path of the module below the repository root, from the origin record or the module path. */
export function goModuleSubdir(module: string, info: GoVersionInfo): string {
  if (info.origin?.subdir) return info.origin.subdir;
  if (info.origin?.url) return "";
  return module.split("/").slice(3).join("/");
}

export function goReleaseTag(subdir: string, version: string): string {
  const v = version.startsWith("v") ? version : `v${version}`;
  return subdir ? `${subdir}/${v}` : v;
}

/** The `module` directive of a go.mod file. */
export function goModulePath(goMod: string): string {
  for (const line of goMod.split(/\r?\n/)) {
    const m = /^\s*module\s+"?([^\s"]+)"?/.exec(line);
    if (m?.[1]) return m[1];
  }
  return "";
}

/** Directory at `ref` whose go.mod declares `module`; a trailing major-version segment may be virtual. */
async function findGoModDir(repo: Repository, ref: string, module: string, subdir: string): Promise<string | null> {
  const tree = await repo.getTree(ref);
  const dirs = [subdir];
  const major = /(^|\/)v\d+$/.exec(subdir);
  if (major) dirs.push(subdir.slice(0, major.index));
  for (const dir of dirs) {
    const text = await readTextOrNull(repo, tree, dir ? `${dir}/go.mod` : "go.mod");
    if (text !== null && goModulePath(text) === module) return dir || ".";
  }
  return null;
}

export const goRebuilder: EcosystemRebuilder = {
  ecosystem: "go",
  usesRepo: true,

  async guessArtifact(t) {
    return `${t.version}.zip`;
  },

  async inferRepo(t, ctx) {
    return goRepoUrl(t.package, await ctx.registries.go.info(t.package, t.version, ctx.signal));
  },

  async analyzeRepo(_t, repository) {
    return { uri: repository.uri, repository, dir: ".", refMap: new Map() };
  },

  async inferStrategy(t, rcfgOrNull, hint, ctx): Promise<Strategy> {
    const rcfg = requireRepoConfig(rcfgOrNull, "go");
    const pinned = hintLocation(hint, rcfg);
    if (pinned) return { kind: "GoModuleBuild", location: pinned };

    const info = await ctx.registries.go.info(t.package, t.version, ctx.signal);
    const subdir = goModuleSubdir(t.package, info);
    const tag = goReleaseTag(subdir, t.version);
    const candidates = [
      { source: "registry", ref: info.origin?.hash ?? "" },
      { source: "tag", ref: (await rcfg.repository.resolveTag(tag)) ?? "" }
    ].filter((c) => c.ref !== "");
    for (const c of candidates) {
      const commit = await rcfg.repository.resolveCommit(c.ref);
      if (!commit) {
        ctx.log.event("infer.ref_missing", `${c.source} ref not found in repo`, { ref: c.ref });
        continue;
      }
      const dir = await findGoModDir(rcfg.repository, commit, t.package, subdir);
      if (!dir) {
        ctx.log.event("infer.ref_invalid", `${c.source} ref invalid: no go.mod declares module ${t.package}`, { ref: commit });
        continue;
      }
      ctx.log.event("infer.ref", `using ${c.source} ref: ${commit.slice(0, 9)}`, { source: c.source, ref: commit });
      const location: Location = { repo: rcfg.uri, ref: commit, dir };
      return { kind: "GoModuleBuild", location };
    }
    throw new RebuildError("NoValidRef", candidates.length ? "no valid git ref" : "no git ref");
  }
};
