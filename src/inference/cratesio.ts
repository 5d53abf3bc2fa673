import { parse as parseToml } from "smol-toml";
import { RebuildError, errorMessage, malformed, unsupported } from "../core/errors.js";
import { canonicalizeRepoUri } from "../core/repoUri.js";
import type { Target } from "../core/target.js";
import { gunzip } from "../archive/gzip.js";
import { readTar, type TarEntry } from "../archive/tar.js";
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
import type { EcosystemRebuilder, RepoConfig } from "./types.js";

/** Version of a member crate that inherits `version.workspace = true`. */
export const WORKSPACE_VERSION = "<workspace>";

export interface CargoToml {
  name: string;
  version: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseCargoToml(text: string, path = "Cargo.toml"): CargoToml {
  let doc: Record<string, unknown>;
  try {
    doc = parseToml(text);
  } catch (e) {
    throw new ManifestError("parse", `failed to parse Cargo.toml [path=${path}]: ${errorMessage(e)}`, { cause: e });
  }
  const pkg = doc["package"];
  if (!isRecord(pkg)) return { name: "", version: "" };
  const name = typeof pkg["name"] === "string" ? pkg["name"] : "";
  const rawVersion = pkg["version"];
  let version = "";
  if (typeof rawVersion === "string") version = rawVersion;
  else if (isRecord(rawVersion) && rawVersion["workspace"] === true) version = WORKSPACE_VERSION;
  return { name, version };
}

function versionMatches(declared: string, version: string): boolean {
  return declared === version || declared === WORKSPACE_VERSION;
}

async function readCargoToml(repo: Repository, tree: Tree, path: string): Promise<CargoToml> {
  const text = await readTextOrNull(repo, tree, path);
  if (text === null) throw new ManifestError("not_found", `Cargo.toml file not found [path=${path}]`);
  return parseCargoToml(text, path);
}

async function tryCargoToml(repo: Repository, tree: Tree, path: string): Promise<CargoToml | null> {
  try {
    return await readCargoToml(repo, tree, path);
  } catch (e) {
    if (e instanceof ManifestError) return null;
    throw e;
  }
}

export async function findCargoToml(
  repo: Repository,
  commit: string,
  pkg: string,
  log: RebuildLog
): Promise<{ cargoToml: CargoToml; path: string }> {
  const tree = await repo.getTree(commit);
  for (const p of ["Cargo.toml", `${pkg}/Cargo.toml`, `crates/${pkg}/Cargo.toml`]) {
    const cargoToml = await tryCargoToml(repo, tree, p);
    if (cargoToml?.name === pkg) return { cargoToml, path: p };
  }
  const matches = await repo.grep(commit, /.*\/Cargo\.toml$/, new RegExp(`name\\s*=\\s*"${escapeRegExp(pkg)}"`));
  const found = new Map<string, CargoToml>();
  for (const m of matches) {
    if (found.has(m.file)) continue;
    const cargoToml = await tryCargoToml(repo, tree, m.file);
    if (cargoToml?.name === pkg) found.set(m.file, cargoToml);
  }
  const best = pickShortestPath([...found.keys()], log, { pkg, ref: commit });
  const cargoToml = best === null ? undefined : found.get(best);
  if (best === null || !cargoToml) throw new ManifestError("not_found", "Cargo.toml heuristic found no matches");
  return { cargoToml, path: best };
}

export async function findAndValidateCargoToml(
  repo: Repository,
  commit: string,
  name: string,
  version: string,
  guess: string,
  log: RebuildLog
): Promise<string> {
  const tree = await repo.getTree(commit);
  let path = guess === "." || guess === "" ? "Cargo.toml" : `${guess}/Cargo.toml`;
  let cargoToml = await tryCargoToml(repo, tree, path);
  if (!cargoToml || cargoToml.name !== name || !versionMatches(cargoToml.version, version)) {
    try {
      ({ cargoToml, path } = await findCargoToml(repo, commit, name, log));
    } catch (e) {
      if (e instanceof ManifestError && e.problem === "not_found") {
        throw new ManifestError("not_found", `Cargo.toml file not found [path=${guess}]`, { cause: e });
      }
      throw e;
    }
  }
  if (!versionMatches(cargoToml.version, version)) {
    throw new ManifestError("version", `mismatched version [expected=${version},actual=${cargoToml.version}]`);
  }
  return path;
}

const RUST_1_0 = Date.UTC(2015, 4, 15);
const RELEASE_CYCLE_MS = 42 * 24 * 60 * 60 * 1000;
const WEEK_MS = 7 * 24 * 60 * 60 * 1000;

/** The stable Rust release current at `at`: 1.N ships every six weeks from 1.0 on 2015-05-15. */
export function rustVersionAt(at: Date): string {
  const elapsed = at.getTime() - RUST_1_0;
  if (elapsed < 0) throw unsupported("rust version heuristic failed");
  return `1.${Math.floor(elapsed / RELEASE_CYCLE_MS)}.0`;
}

/** `rust_version` as a full version, or the release current a week before the crate was last updated. */
export function pickRustVersion(declared: string, updated: Date): string {
  if (declared) return declared.split(".").length === 2 ? `${declared}.0` : declared;
  return rustVersionAt(new Date(updated.getTime() - WEEK_MS));
}

function crateFile(entries: TarEntry[], path: string): Uint8Array | null {
  return entries.find((e) => e.header.name === path)?.data ?? null;
}

/** `git.sha1` from the crate's `.cargo_vcs_info.json`, or "" when there is none. */
export function vcsInfoSha1(entries: TarEntry[], topLevel: string): string {
  const data = crateFile(entries, `${topLevel}/.cargo_vcs_info.json`);
  if (!data) return "";
  let raw: unknown;
  try {
    raw = JSON.parse(new TextDecoder().decode(data));
  } catch (e) {
    throw malformed("failed to extract upstream .cargo_vcs_info.json", e);
  }
  const git = isRecord(raw) ? raw["git"] : null;
  const sha1 = isRecord(git) ? git["sha1"] : null;
  return typeof sha1 === "string" ? sha1 : "";
}

async function inferLocation(t: Target, vcsRef: string, rcfg: RepoConfig, log: RebuildLog): Promise<Location> {
  const dir = rcfg.dir || ".";
  const tagGuess = await findTagMatch(t.package, t.version, rcfg.repository, log);
  const resolved = await resolveRef({
    repository: rcfg.repository,
    candidates: [
      { source: "registry", ref: vcsRef },
      { source: "tag", ref: tagGuess },
      { source: "history", ref: rcfg.refMap.get(t.version) ?? "" }
    ],
    validate: (commit) => findAndValidateCargoToml(rcfg.repository, commit, t.package, t.version, dir, log),
    version: t.version,
    manifestGuess: dir === "." ? "Cargo.toml" : `${dir}/Cargo.toml`,
    log
  });
  return { repo: rcfg.uri, ref: resolved.ref, dir: manifestDir(resolved.manifestPath) };
}

export const cratesioRebuilder: EcosystemRebuilder = {
  ecosystem: "cratesio",
  usesRepo: true,

  async guessArtifact(t) {
    return `${t.package}-${t.version}.crate`;
  },

  async inferRepo(t, ctx) {
    const crate = await ctx.registries.cratesio.crate(t.package, ctx.signal);
    return canonicalizeRepoUri(crate.repository);
  },

  async analyzeRepo(t, repository, ctx) {
    const rcfg: RepoConfig = { uri: repository.uri, repository, dir: ".", refMap: new Map() };
    const head = await repository.head();
    if (!head) return rcfg;
    let cargoPath: string;
    try {
      cargoPath = (await findCargoToml(repository, head, t.package, ctx.log)).path;
    } catch (e) {
      if (!(e instanceof ManifestError)) throw e;
      ctx.log.event("infer.manifest_heuristic_failed", `Cargo.toml path heuristic failed: ${e.message}`, {
        pkg: t.package,
        repo: repository.uri
      });
      return rcfg;
    }
    rcfg.dir = manifestDir(cargoPath);
    rcfg.refMap = await manifestHistorySearch({
      pkg: t.package,
      path: cargoPath,
      repo: repository,
      log: ctx.log,
      label: "cargotoml",
      read: (tree) => tryCargoToml(repository, tree, cargoPath)
    });
    return rcfg;
  },

  async inferStrategy(t, rcfgOrNull, hint, ctx): Promise<Strategy> {
    const rcfg = requireRepoConfig(rcfgOrNull, "cratesio");
    const vmeta = await ctx.registries.cratesio.version(t.package, t.version, ctx.signal);
    const crate = await readTar(gunzip(await ctx.registries.cratesio.artifact(t.package, t.version, ctx.signal)));
    const topLevel = `${t.package}-${vmeta.version}`;

    const location =
      hintLocation(hint, rcfg) ?? (await inferLocation(t, vcsInfoSha1(crate, topLevel), rcfg, ctx.log));

    const tree = await rcfg.repository.getTree(location.ref);
    const cargoPath = location.dir === "." || location.dir === "" ? "Cargo.toml" : `${location.dir}/Cargo.toml`;
    const cargoToml = await readCargoToml(rcfg.repository, tree, cargoPath);
    if (cargoToml.name !== t.package) {
      throw new RebuildError("NoValidRef", `mismatched name [expected=${t.package},actual=${cargoToml.name},path=${cargoPath}]`);
    }
    if (!versionMatches(cargoToml.version, t.version)) {
      throw new RebuildError("NoValidRef", `mismatched version [expected=${t.version},actual=${cargoToml.version}]`);
    }

    const rustVersion = pickRustVersion(vmeta.rustVersion, vmeta.updated);
    const lock = crateFile(crate, `${topLevel}/Cargo.lock`);
    let explicitLockfile: { lockfileBase64: string } | undefined;
    if (lock) {
      const dirLock = location.dir === "." ? "Cargo.lock" : `${location.dir}/Cargo.lock`;
      const inRepo = (await rcfg.repository.findEntry(tree, dirLock)) ?? (await rcfg.repository.findEntry(tree, "Cargo.lock"));
      if (!inRepo) {
        ctx.log.event("infer.explicit_lockfile", "using the published Cargo.lock", { path: dirLock });
        explicitLockfile = { lockfileBase64: Buffer.from(lock).toString("base64") };
      }
    }
    return {
      kind: "CratesIOCargoPackage",
      location,
      rustVersion,
      ...(explicitLockfile ? { explicitLockfile } : {})
    };
  }
};
