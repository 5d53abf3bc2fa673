import { RebuildError } from "../core/errors.js";

/** A snapshot of one commit's file tree. */
export interface Tree {
  readonly commit: string;
}

export interface TreeEntry {
  path: string;
  type: "blob" | "tree";
}

export interface Commit {
  hash: string;
  parents: string[];
  committerTime: Date;
}

export interface GrepMatch {
  file: string;
  lineNumber: number;
  line: string;
}

export interface TagRef {
  name: string;
  /** Peeled: annotated tags resolve to the commit they point at. */
  commit: string;
}

/**
 * Read-only access to a cloned source repository. The handle owns its storage until `release()`.
 */
export interface Repository {
  readonly uri: string;
  /** True when the handle reuses an earlier clone. */
  readonly reused?: boolean;
  head(): Promise<string | null>;
  resolveCommit(ref: string): Promise<string | null>;
  commit(hash: string): Promise<Commit | null>;
  getTree(ref: string): Promise<Tree>;
  findEntry(tree: Tree, path: string): Promise<TreeEntry | null>;
  /** Throws a NotFound RebuildError when the path is absent or not a file. */
  readFile(tree: Tree, path: string): Promise<Uint8Array>;
  /** Immediate children; directories carry a trailing `/`. */
  listDir(tree: Tree, path: string): Promise<string[]>;
  grep(ref: string, pathspec: RegExp, pattern: RegExp): Promise<GrepMatch[]>;
  /** Commits that changed `path`, across all refs, newest committer time first. */
  logTouching(path: string): AsyncIterable<Commit>;
  tags(): Promise<TagRef[]>;
  resolveTag(name: string): Promise<string | null>;
  release(): Promise<void>;
}

export function fileNotFound(path: string, commit: string): RebuildError {
  return new RebuildError("NotFound", `file not found [path=${path},ref=${commit.slice(0, 9)}]`);
}

export function normalizeRepoPath(p: string): string {
  const parts = p.split("/").filter((s) => s && s !== ".");
  return parts.join("/");
}

/** Reads a UTF-8 file, or returns null when it is absent. */
export async function readTextOrNull(repo: Repository, tree: Tree, path: string): Promise<string | null> {
  try {
    return new TextDecoder().decode(await repo.readFile(tree, path));
  } catch (e) {
    if (e instanceof RebuildError && e.kind === "NotFound") return null;
    throw e;
  }
}
