import path from "path";
import { RebuildError, noValidRef, unsupported } from "../core/errors.js";
import type { Repository, Tree } from "../repo/types.js";
import type { RebuildLog } from "../runs/rebuildLog.js";
import type { Location, Strategy } from "../strategy/types.js";
import type { RepoConfig } from "./types.js";

export type ManifestProblem = "not_found" | "parse" | "name" | "version";

/** A manifest that failed validation at some commit; `version` mismatches may be recoverable. */
export class ManifestError extends RebuildError {
  constructor(
    readonly problem: ManifestProblem,
    message: string,
    options?: { cause?: unknown }
  ) {
    super("NoValidRef", message, options);
    this.name = "ManifestError";
  }
}

export function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Directory of a repo-relative path, `.` for the root. */
export function manifestDir(p: string): string {
  return path.posix.dirname(p);
}

/** Picks the shortest candidate path, ties broken lexicographically; logs when there was a choice. */
export function pickShortestPath(paths: string[], log: RebuildLog, data: Record<string, string>): string | null {
  if (!paths.length) return null;
  const sorted = [...paths].sort((a, b) => a.length - b.length || (a < b ? -1 : a > b ? 1 : 0));
  if (sorted.length > 1) {
    log.event("infer.multiple_manifests", "multiple manifest candidates", { ...data, matches: sorted });
  }
  return sorted[0] ?? null;
}

export type RefSource = "registry" | "tag" | "history";

export interface RefCandidate {
  source: RefSource;
  ref: string;
}

export interface ResolvedRef {
  ref: string;
  /** Manifest path that validated at `ref`. */
  manifestPath: string;
  /** Target version to patch into the manifest when the ref was adopted despite a version mismatch. */
  versionOverride?: string;
}

/**
 * Tries each candidate commit in order and returns the first whose manifest validates.
 * Registry and tag candidates that fail only on version are kept for version-override recovery.
 */
export async function resolveRef(args: {
  repository: Repository;
  candidates: RefCandidate[];
  validate: (commit: string) => Promise<string>;
  version: string;
  manifestGuess: string;
  log: RebuildLog;
  allowVersionOverride?: boolean;
}): Promise<ResolvedRef> {
  const { repository, log } = args;
  const candidates = args.candidates.filter((c) => c.ref !== "");
  let badVersionRef = "";
  for (const c of candidates) {
    const commit = await repository.resolveCommit(c.ref);
    if (!commit) {
      log.event("infer.ref_missing", `${c.source} ref not found in repo`, { ref: c.ref });
      continue;
    }
    try {
      const manifestPath = await args.validate(commit);
      log.event("infer.ref", `using ${c.source} ref: ${commit.slice(0, 9)}`, { source: c.source, ref: commit });
      return { ref: commit, manifestPath };
    } catch (e) {
      if (!(e instanceof ManifestError)) throw e;
      log.event("infer.ref_invalid", `${c.source} ref invalid: ${e.message}`, { source: c.source, ref: commit });
      if (e.problem === "version" && c.source !== "history" && !badVersionRef) badVersionRef = commit;
    }
  }
  if (badVersionRef && args.allowVersionOverride) {
    log.event("infer.version_override", `using version override recovery: ${badVersionRef.slice(0, 9)}`, { ref: badVersionRef });
    return { ref: badVersionRef, manifestPath: args.manifestGuess, versionOverride: args.version };
  }
  if (!candidates.length) throw noValidRef("no git ref");
  throw noValidRef("no valid git ref");
}

/**
 * Interprets a caller-supplied hint. Returns the location to build when the hint pins a ref,
 * or null when inference should run normally.
 */
export function hintLocation(hint: Strategy | null, rcfg: RepoConfig): Location | null {
  if (hint === null) return null;
  if (hint.kind !== "LocationHint") throw unsupported(`unsupported hint type: ${hint.kind}`);
  const { ref, dir } = hint.location;
  if (ref) {
    return { repo: hint.location.repo || rcfg.uri, ref, dir: dir || rcfg.dir || "." };
  }
  if (dir && dir !== ".") throw unsupported("Dir without Ref is not yet supported.");
  return null;
}

export function requireRepoConfig(rcfg: RepoConfig | null, ecosystem: string): RepoConfig {
  if (!rcfg) throw new RebuildError("Internal", `${ecosystem} inference requires a repository`, { fatal: true });
  return rcfg;
}

/**
 * Walks every commit touching a manifest and maps each version to the commit that introduced it:
 * the manifest names `pkg`, declares a version, and no parent declares the same one.
 * On a duplicate the first commit seen (the newest) is kept and the collision is logged.
 */
export async function manifestHistorySearch(args: {
  pkg: string;
  path: string;
  repo: Repository;
  log: RebuildLog;
  label: string;
  read: (tree: Tree) => Promise<{ name: string; version: string } | null>;
}): Promise<Map<string, string>> {
  const { pkg, repo, log, label, read } = args;
  const refMap = new Map<string, string>();
  const duplicates = new Map<string, string[]>();
  for await (const c of repo.logTouching(args.path)) {
    const manifest = await read(await repo.getTree(c.hash));
    if (!manifest) continue;
    if (manifest.name !== pkg) {
      log.event(`${label}.name_mismatch`, "package name mismatch", {
        expected: pkg,
        actual: manifest.name,
        path: args.path,
        ref: c.hash
      });
      continue;
    }
    const ver = manifest.version;
    if (!ver) continue;
    let sameAsParent = false;
    for (const parent of c.parents) {
      const prev = await read(await repo.getTree(parent));
      if (prev?.name === pkg && prev.version === ver) sameAsParent = true;
    }
    if (sameAsParent) continue;
    const existing = refMap.get(ver);
    if (existing) {
      const dupes = duplicates.get(ver) ?? [existing];
      dupes.push(c.hash);
      duplicates.set(ver, dupes);
    } else {
      refMap.set(ver, c.hash);
    }
  }
  for (const [ver, refs] of duplicates) {
    log.event(`${label}.duplicate_version`, "multiple commits introduce one version", { pkg, version: ver, refs });
  }
  return refMap;
}
