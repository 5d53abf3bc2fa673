import * as z from "zod/v4";
import { RebuildError, errorMessage, notFound, unsupported } from "../core/errors.js";
import { canonicalizeRepoUri } from "../core/repoUri.js";
import { compareSemver, isValidSemver, parseSemver, semverString } from "../core/semver.js";
import type { Target } from "../core/target.js";
import { unofficialNodeReleases, type NodeRelease } from "../registry/nodeReleases.js";
import { findTagMatch } from "../repo/tags.js";
import { readTextOrNull, type Repository, type Tree } from "../repo/types.js";
import type { RebuildLog } from "../runs/rebuildLog.js";
import type { Location, Strategy } from "../strategy/types.js";
import {
  ManifestError,
  escapeRegExp,
  hintLocation,
  manifestDir,
  manifestHistorySearch,
  pickShortestPath,
  requireRepoConfig,
  resolveRef
} from "./common.js";
import type { BuildFailureContext, EcosystemRebuilder, RepoConfig } from "./types.js";

export const DEFAULT_NODE_VERSION = "10.17.0";

/** npm CLI version to build with, upgrading releases known to break on the build image's Node. */
export function pickNpmVersion(declared: string): string {
  if (!declared) throw unsupported("No NPM version");
  if (!isValidSemver(declared)) throw unsupported(`Unsupported NPM version '${declared}'`);
  const v = parseSemver(declared);
  if (v.prerelease.length || v.build.length || declared.startsWith("v")) {
    throw unsupported(`Unsupported NPM version '${declared}'`);
  }
  if (v.major < 5) return "5.0.4";
  // npm 5.4 and 5.5 fail on Node 9+; fixed in 5.6.0.
  if (v.major === 5 && (v.minor === 4 || v.minor === 5)) return "5.6.0";
  return declared;
}

/**
 * Node version with a linux-x64-musl build on unofficial-builds.nodejs.org. Versions without one map
 * to the highest patch of the next release line that has one.
 */
export function pickNodeVersion(declared: string, releases: readonly NodeRelease[] = unofficialNodeReleases()): string {
  if (!declared) return DEFAULT_NODE_VERSION;
  const want = parseSemver(declared);
  const parsed = releases.map((r) => ({ r, v: parseSemver(r.version) })).sort((a, b) => compareSemver(a.v, b.v));
  const newest = parsed[parsed.length - 1];
  if (!newest || compareSemver(want, newest.v) > 0) return declared;

  const musl = parsed.filter((p) => p.r.hasMusl);
  if (musl.some((p) => compareSemver(p.v, want) === 0)) return declared;
  const next = musl.find((p) => compareSemver(p.v, want) > 0);
  if (!next) return declared;
  const line = musl.filter((p) => p.v.major === next.v.major && p.v.minor === next.v.minor);
  const best = line[line.length - 1] ?? next;
  return semverString(best.v);
}

export function sanitizePackageName(name: string): string {
  return name.replaceAll("@", "").replaceAll("/", "-");
}

export function npmArtifactName(t: Target): string {
  return `${sanitizePackageName(t.package)}-${t.version}.tgz`;
}

const packageJsonSchema = z.object({
  name: z.string().optional(),
  version: z.string().optional(),
  scripts: z.record(z.string(), z.unknown()).optional()
});

export interface PackageJson {
  name: string;
  version: string;
  scripts: Record<string, string>;
}

/** Reads and parses `path`; a missing file or unparsable JSON is a ManifestError. */
export async function readPackageJson(repo: Repository, tree: Tree, path: string): Promise<PackageJson> {
  const text = await readTextOrNull(repo, tree, path);
  if (text === null) throw new ManifestError("not_found", `package.json file not found [path=${path}]`);
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ManifestError("parse", `failed to parse package.json: ${errorMessage(e)}`, { cause: e });
  }
  const parsed = packageJsonSchema.safeParse(raw);
  if (!parsed.success) throw new ManifestError("parse", `failed to parse package.json [path=${path}]`);
  const scripts: Record<string, string> = {};
  for (const [k, v] of Object.entries(parsed.data.scripts ?? {})) {
    if (typeof v === "string") scripts[k] = v;
  }
  return { name: parsed.data.name ?? "", version: parsed.data.version ?? "", scripts };
}

async function tryPackageJson(repo: Repository, tree: Tree, path: string): Promise<PackageJson | null> {
  try {
    return await readPackageJson(repo, tree, path);
  } catch (e) {
    if (e instanceof ManifestError) return null;
    throw e;
  }
}

/** Locates the package.json declaring `pkg` at `commit`: well-known paths, then a grep. */
export async function findPackageJson(
  repo: Repository,
  commit: string,
  pkg: string,
  log: RebuildLog
): Promise<{ pkgJson: PackageJson; path: string }> {
  const tree = await repo.getTree(commit);
  const wellKnown = ["package.json", `packages/${pkg.slice(pkg.indexOf("/") + 1)}/package.json`];
  for (const p of wellKnown) {
    const pkgJson = await tryPackageJson(repo, tree, p);
    if (pkgJson?.name === pkg) return { pkgJson, path: p };
  }
  const matches = await repo.grep(commit, /.*\/package\.json$/, new RegExp(`"name":\\s*"${escapeRegExp(pkg)}"`));
  const found = new Map<string, PackageJson>();
  for (const m of matches) {
    if (found.has(m.file)) continue;
    const pkgJson = await tryPackageJson(repo, tree, m.file);
    if (pkgJson?.name === pkg) found.set(m.file, pkgJson);
  }
  const best = pickShortestPath([...found.keys()], log, { pkg, ref: commit });
  const pkgJson = best === null ? undefined : found.get(best);
  if (best === null || !pkgJson) throw new ManifestError("not_found", "package.json heuristic found no matches");
  return { pkgJson, path: best };
}

/**
 * Checks that `<guess>/package.json` at `commit` declares `name@version`, searching the tree when the
 * guessed file is missing or names another package. Returns the validated path.
 */
export async function findAndValidatePackageJson(
  repo: Repository,
  commit: string,
  name: string,
  version: string,
  guess: string,
  log: RebuildLog
): Promise<string> {
  const tree = await repo.getTree(commit);
  let path = guess === "." || guess === "" ? "package.json" : `${guess}/package.json`;
  let pkgJson: PackageJson;
  try {
    pkgJson = await readPackageJson(repo, tree, path);
  } catch (e) {
    if (!(e instanceof ManifestError)) throw e;
    pkgJson = { name: "", version: "", scripts: {} };
  }
  if (pkgJson.name !== name) {
    try {
      ({ pkgJson, path } = await findPackageJson(repo, commit, name, log));
    } catch (e) {
      if (e instanceof ManifestError && e.problem === "not_found") {
        throw new ManifestError("not_found", `package.json file not found [path=${guess}]`, { cause: e });
      }
      throw e;
    }
  }
  if (pkgJson.version !== version) {
    throw new ManifestError("version", `mismatched version [expected=${version},actual=${pkgJson.version}]`);
  }
  return path;
}

/** Maps each version of `pkg` to the commit that introduced it in `pkgJsonPath`. */
export function pkgJsonSearch(pkg: string, pkgJsonPath: string, repo: Repository, log: RebuildLog): Promise<Map<string, string>> {
  return manifestHistorySearch({
    pkg,
    path: pkgJsonPath,
    repo,
    log,
    label: "pkgjson",
    read: (tree) => tryPackageJson(repo, tree, pkgJsonPath)
  });
}

async function inferLocation(t: Target, directory: string, gitHead: string, rcfg: RepoConfig, log: RebuildLog) {
  let dir = ".";
  if (directory) {
    if (rcfg.dir && rcfg.dir !== directory) {
      log.event("infer.dir_disagreement", "package.json path disagreement", { metadata: directory, heuristic: rcfg.dir });
    }
    dir = directory;
  } else if (rcfg.dir) {
    dir = rcfg.dir;
  }
  const tagGuess = await findTagMatch(t.package, t.version, rcfg.repository, log);
  const resolved = await resolveRef({
    repository: rcfg.repository,
    candidates: [
      { source: "registry", ref: gitHead },
      { source: "tag", ref: tagGuess },
      { source: "history", ref: rcfg.refMap.get(t.version) ?? "" }
    ],
    validate: (commit) => findAndValidatePackageJson(rcfg.repository, commit, t.package, t.version, dir, log),
    version: t.version,
    manifestGuess: dir === "." ? "package.json" : `${dir}/package.json`,
    log,
    allowVersionOverride: true
  });
  return { ref: resolved.ref, dir: manifestDir(resolved.manifestPath), versionOverride: resolved.versionOverride };
}

const NODE_FETCH_404 =
  /Connecting to unofficial-builds\.nodejs\.org [^\n]*?\nwget: server returned error: HTTP\/1\.1 404 Not Found/;

function tail(output: string, lines = 20): string {
  return output.trimEnd().split("\n").slice(-lines).join("\n");
}

export function classifyNpmFailure(failure: BuildFailureContext): string | null {
  const { stage, output } = failure;
  if (stage === "deps") return NODE_FETCH_404.test(output) ? "node version not found" : null;
  if (stage !== "build") return null;
  if (output.includes("primordials is not defined")) return "primordials error";
  if (output.includes("cb.apply is not a function")) return "cb.apply error";
  for (const marker of [": command not found", ": not found"]) {
    const end = output.indexOf(marker);
    if (end === -1) continue;
    const start = output.lastIndexOf(": ", end - 1);
    return `pack command not found: ${output.slice(start === -1 ? 0 : start + 2, end)}`;
  }
  return `unknown npm pack failure:\n${tail(output)}`;
}

export const npmRebuilder: EcosystemRebuilder = {
  ecosystem: "npm",
  usesRepo: true,

  async guessArtifact(t) {
    return npmArtifactName(t);
  },

  async inferRepo(t, ctx) {
    const vmeta = await ctx.registries.npm.version(t.package, t.version, ctx.signal);
    return canonicalizeRepoUri(vmeta.repository.url);
  },

  async analyzeRepo(t, repository, ctx) {
    const rcfg: RepoConfig = { uri: repository.uri, repository, dir: "", refMap: new Map() };
    const head = await repository.head();
    if (!head) return rcfg;
    let pkgPath: string;
    try {
      pkgPath = (await findPackageJson(repository, head, t.package, ctx.log)).path;
    } catch (e) {
      if (!(e instanceof ManifestError)) throw e;
      ctx.log.event("infer.manifest_heuristic_failed", `package.json path heuristic failed: ${e.message}`, {
        pkg: t.package,
        repo: repository.uri
      });
      return rcfg;
    }
    rcfg.dir = manifestDir(pkgPath);
    rcfg.refMap = await pkgJsonSearch(t.package, pkgPath, repository, ctx.log);
    return rcfg;
  },

  async inferStrategy(t, rcfgOrNull, hint, ctx): Promise<Strategy> {
    const rcfg = requireRepoConfig(rcfgOrNull, "npm");
    const vmeta = await ctx.registries.npm.version(t.package, t.version, ctx.signal);
    const npmVersion = pickNpmVersion(vmeta.npmVersion);

    let location: Location;
    let versionOverride: string | undefined;
    const pinned = hintLocation(hint, rcfg);
    if (pinned) {
      location = pinned;
    } else {
      const inferred = await inferLocation(t, vmeta.repository.directory, vmeta.gitHead, rcfg, ctx.log);
      location = { repo: rcfg.uri, ref: inferred.ref, dir: inferred.dir };
      versionOverride = inferred.versionOverride;
    }

    const tree = await rcfg.repository.getTree(location.ref);
    const pkgJsonPath = location.dir === "." || location.dir === "" ? "package.json" : `${location.dir}/package.json`;
    let scripts: Record<string, string> = {};
    try {
      scripts = (await readPackageJson(rcfg.repository, tree, pkgJsonPath)).scripts;
    } catch (e) {
      if (!(e instanceof ManifestError)) throw e;
      ctx.log.event("infer.manifest_unreadable", `error fetching package.json: ${e.message}`, { path: pkgJsonPath });
    }

    const has = (name: string) => Object.prototype.hasOwnProperty.call(scripts, name);
    const override = versionOverride ? { versionOverride } : {};
    if (!has("prepack") && !has("prepare") && !has("build")) {
      return { kind: "NPMPackBuild", location, npmVersion, ...override };
    }

    const pmeta = await ctx.registries.npm.package(t.package, ctx.signal);
    const registryTime = pmeta.uploadTimes[t.version];
    if (!registryTime) throw notFound(`upload time not found [pkg=${t.package},version=${t.version}]`);
    let nodeVersion: string;
    try {
      nodeVersion = pickNodeVersion(vmeta.nodeVersion);
    } catch (e) {
      throw new RebuildError("Unsupported", `Unsupported Node version '${vmeta.nodeVersion}'`, { cause: e });
    }
    return {
      kind: "NPMCustomBuild",
      location,
      npmVersion,
      nodeVersion,
      command: has("build") ? "build" : "",
      registryTime,
      prepackRemoveDeps: !has("prepare") && !has("prepack"),
      keepRoot: parseSemver(npmVersion).major <= 6,
      ...override
    };
  },

  classifyBuildFailure: classifyNpmFailure
};
