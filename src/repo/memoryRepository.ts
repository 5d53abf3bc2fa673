import { bytesEqual } from "../core/bytes.js";
import { sha256Hex } from "../core/canonicalJson.js";
import { malformed, notFound } from "../core/errors.js";
import type { Commit, GrepMatch, Repository, TagRef, Tree, TreeEntry } from "./types.js";
import { fileNotFound, normalizeRepoPath } from "./types.js";

export interface MemoryCommitSpec {
  /** Symbolic name; the commit hash is derived from it. */
  id: string;
  parent?: string | string[];
  /** Overlaid on the first parent's tree; `null` deletes a path. */
  files?: Record<string, string | null>;
  tag?: string | string[];
  committerTime?: Date;
}

interface StoredCommit extends Commit {
  files: Map<string, Uint8Array>;
  order: number;
}

const BASE_TIME = Date.UTC(2024, 0, 1);

function sameContent(a: Uint8Array | undefined, b: Uint8Array | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  return bytesEqual(a, b);
}

/**
 * Repository over an in-process commit graph. Commits listed later default to later committer times.
 */
export class MemoryRepository implements Repository {
  private readonly commits = new Map<string, StoredCommit>();
  private readonly ids = new Map<string, string>();
  private readonly tagRefs: TagRef[] = [];
  private headHash: string | null = null;

  constructor(
    readonly uri: string,
    specs: MemoryCommitSpec[]
  ) {
    const encoder = new TextEncoder();
    specs.forEach((spec, order) => {
      const hash = sha256Hex(`commit:${spec.id}`).slice(0, 40);
      const parentIds = spec.parent === undefined ? [] : Array.isArray(spec.parent) ? spec.parent : [spec.parent];
      const parents = parentIds.map((p) => {
        const h = this.ids.get(p);
        if (!h) throw malformed(`unknown parent commit: ${p}`);
        return h;
      });
      const firstParent = parents[0] ? this.commits.get(parents[0]) : undefined;
      const files = new Map(firstParent?.files ?? []);
      for (const [p, content] of Object.entries(spec.files ?? {})) {
        const key = normalizeRepoPath(p);
        if (content === null) files.delete(key);
        else files.set(key, encoder.encode(content));
      }
      this.ids.set(spec.id, hash);
      this.commits.set(hash, {
        hash,
        parents,
        committerTime: spec.committerTime ?? new Date(BASE_TIME + order * 60_000),
        files,
        order
      });
      const tags = spec.tag === undefined ? [] : Array.isArray(spec.tag) ? spec.tag : [spec.tag];
      for (const name of tags) this.tagRefs.push({ name, commit: hash });
      this.headHash = hash;
    });
  }

  /** The hash assigned to a symbolic commit id. */
  hashOf(id: string): string {
    const h = this.ids.get(id);
    if (!h) throw notFound(`unknown commit id: ${id}`);
    return h;
  }

  async head(): Promise<string | null> {
    return this.headHash;
  }

  async resolveCommit(ref: string): Promise<string | null> {
    if (this.commits.has(ref)) return ref;
    return this.tagRefs.find((t) => t.name === ref)?.commit ?? null;
  }

  async commit(hash: string): Promise<Commit | null> {
    const c = this.commits.get(hash);
    return c ? { hash: c.hash, parents: [...c.parents], committerTime: c.committerTime } : null;
  }

  private commitFor(tree: Tree): StoredCommit {
    const c = this.commits.get(tree.commit);
    if (!c) throw notFound(`commit not found: ${tree.commit}`);
    return c;
  }

  async getTree(ref: string): Promise<Tree> {
    const hash = await this.resolveCommit(ref);
    if (!hash) throw notFound(`ref not found: ${ref}`);
    return { commit: hash };
  }

  async findEntry(tree: Tree, path: string): Promise<TreeEntry | null> {
    const c = this.commitFor(tree);
    const p = normalizeRepoPath(path);
    if (!p) return { path: "", type: "tree" };
    if (c.files.has(p)) return { path: p, type: "blob" };
    for (const f of c.files.keys()) {
      if (f.startsWith(`${p}/`)) return { path: p, type: "tree" };
    }
    return null;
  }

  async readFile(tree: Tree, path: string): Promise<Uint8Array> {
    const c = this.commitFor(tree);
    const data = c.files.get(normalizeRepoPath(path));
    if (!data) throw fileNotFound(path, c.hash);
    return data;
  }

  async listDir(tree: Tree, path: string): Promise<string[]> {
    const c = this.commitFor(tree);
    const p = normalizeRepoPath(path);
    const prefix = p ? `${p}/` : "";
    const names = new Set<string>();
    for (const f of c.files.keys()) {
      if (!f.startsWith(prefix)) continue;
      const rest = f.slice(prefix.length);
      const slash = rest.indexOf("/");
      names.add(slash === -1 ? rest : `${rest.slice(0, slash)}/`);
    }
    return [...names].sort();
  }

  async grep(ref: string, pathspec: RegExp, pattern: RegExp): Promise<GrepMatch[]> {
    const c = this.commitFor(await this.getTree(ref));
    const decoder = new TextDecoder();
    const out: GrepMatch[] = [];
    for (const [file, data] of [...c.files.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      if (!pathspec.test(file)) continue;
      decoder
        .decode(data)
        .split("\n")
        .forEach((line, i) => {
          if (pattern.test(line)) out.push({ file, lineNumber: i + 1, line });
        });
    }
    return out;
  }

  async *logTouching(path: string): AsyncIterable<Commit> {
    const p = normalizeRepoPath(path);
    const ordered = [...this.commits.values()].sort(
      (a, b) => b.committerTime.getTime() - a.committerTime.getTime() || b.order - a.order
    );
    for (const c of ordered) {
      const mine = c.files.get(p);
      const touched = c.parents.length
        ? c.parents.every((h) => !sameContent(this.commits.get(h)?.files.get(p), mine))
        : mine !== undefined;
      if (touched) yield { hash: c.hash, parents: [...c.parents], committerTime: c.committerTime };
    }
  }

  async tags(): Promise<TagRef[]> {
    return this.tagRefs.map((t) => ({ ...t }));
  }

  async resolveTag(name: string): Promise<string | null> {
    return this.tagRefs.find((t) => t.name === name)?.commit ?? null;
  }

  async release(): Promise<void> {}
}
