import type { RebuildLog } from "../runs/rebuildLog.js";
import type { Repository } from "./types.js";

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export interface TagMatch {
  /** Likely names this exact version. */
  strict: boolean;
  /** Mentions the version somewhere. */
  approx: boolean;
}

/**
 * Classifies a tag against a package version. A strict match contains the version at a digit
 * boundary, is not a prerelease continuation of it, and does not name a sibling package of the same org.
 */
export function matchTag(tag: string, pkg: string, version: string): TagMatch {
  const v = escapeRegExp(version);
  const boundary = new RegExp(`(^|[^\\d])${v}([^\\d]|$)`);
  const continuation = new RegExp(`${v}[.-]?(beta|dev|rc|alpha|preview|canary)`);
  const slash = pkg.indexOf("/");
  const org = slash === -1 ? "" : pkg.slice(0, slash);
  const orgButNotPkg = org !== "" && tag.includes(org) && !tag.includes(pkg);
  return {
    strict: boundary.test(tag) && !continuation.test(tag) && !orgButNotPkg,
    approx: tag.includes(version)
  };
}

/** The tag with a leading `v` or `<name>-`/`<name>@` prefix removed. */
export function stripTagPrefix(tag: string, pkg: string): string {
  const base = pkg.slice(pkg.lastIndexOf("/") + 1);
  for (const prefix of [`${pkg}@`, `${pkg}-`, `${base}@`, `${base}-`]) {
    if (tag.startsWith(prefix)) return stripV(tag.slice(prefix.length));
  }
  return stripV(tag);
}

function stripV(s: string): string {
  return /^v\d/.test(s) ? s.slice(1) : s;
}

/**
 * Finds the commit of the tag most likely to name `version`, or "" when none does.
 * Among strict matches an exact name match wins, then the newest commit, then the smallest tag name.
 */
export async function findTagMatch(pkg: string, version: string, repo: Repository, log?: RebuildLog): Promise<string> {
  const tags = await repo.tags();
  const matches: Array<{ name: string; commit: string }> = [];
  const near: string[] = [];
  for (const t of tags) {
    const m = matchTag(t.name, pkg, version);
    if (m.strict) matches.push(t);
    else if (m.approx) near.push(t.name);
  }
  if (near.length) log?.event("infer.tag_rejected", "rejected potential tag matches", { pkg, version, tags: near });
  if (!matches.length) return "";

  const times = new Map<string, number>();
  if (matches.length > 1) {
    log?.event("infer.tag_multiple", "multiple tag matches", { pkg, version, tags: matches.map((m) => m.name) });
    for (const hash of new Set(matches.map((m) => m.commit))) {
      const c = await repo.commit(hash);
      if (c) times.set(hash, c.committerTime.getTime());
    }
  }

  const exact = (name: string) => (stripTagPrefix(name, pkg) === version ? 1 : 0);
  matches.sort(
    (a, b) =>
      exact(b.name) - exact(a.name) ||
      (times.get(b.commit) ?? 0) - (times.get(a.commit) ?? 0) ||
      (a.name < b.name ? -1 : a.name > b.name ? 1 : 0)
  );
  return matches[0]?.commit ?? "";
}
