import { execFile } from "child_process";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { promisify } from "util";
import { sha256Hex } from "../core/canonicalJson.js";
import { notFound, RebuildError, transient } from "../core/errors.js";
import { PathLocks } from "../core/locks.js";
import type { Commit, GrepMatch, Repository, TagRef, Tree, TreeEntry } from "./types.js";
import { fileNotFound, normalizeRepoPath } from "./types.js";

const execFileAsync = promisify(execFile);

const MAX_GIT_OUTPUT_BYTES = 256 * 1024 * 1024;

const cacheLocks = new PathLocks();

const AUTH_FAILURE = /(Authentication failed|could not read Username|terminal prompts disabled|Repository not found|403)/i;

async function exists(p: string): Promise<boolean> {
  try {
    await fs.stat(p);
    return true;
  } catch {
    return false;
  }
}

function stderrOf(e: unknown): string {
  if (typeof e === "object" && e !== null && "stderr" in e) {
    const s = e.stderr;
    if (typeof s === "string") return s;
    if (Buffer.isBuffer(s)) return s.toString("utf8");
  }
  return e instanceof Error ? e.message : String(e);
}

/**
 * Repository backed by a bare mirror clone and the `git` CLI.
 */
export class GitRepository implements Repository {
  private constructor(
    readonly uri: string,
    private readonly gitDir: string,
    private readonly ownsDir: boolean,
    /** Set when an existing mirror was updated instead of cloned. */
    readonly reused: boolean = false
  ) {}

  /**
   * Clones `uri`, or reuses the mirror under `cacheDir` and fetches only what it lacks.
   * Opens of one mirror are serialized; a fresh mirror is cloned aside and renamed into place.
   * Without a cache dir the clone lives in a temp dir removed by `release()`.
   */
  static async open(uri: string, opts: { cacheDir?: string | null; signal?: AbortSignal } = {}): Promise<GitRepository> {
    if (opts.cacheDir) {
      const dir = path.resolve(opts.cacheDir, `${sha256Hex(uri).slice(0, 24)}.git`);
      const unlock = await cacheLocks.acquire(dir);
      try {
        return await GitRepository.openCached(uri, dir, opts.signal);
      } finally {
        unlock();
      }
    }
    const tmp = await fs.mkdtemp(path.join(os.tmpdir(), "rebuild-repo-"));
    const dir = path.join(tmp, "repo.git");
    try {
      await cloneMirror(uri, dir, opts.signal);
    } catch (e) {
      await fs.rm(tmp, { recursive: true, force: true });
      throw e;
    }
    return new GitRepository(uri, dir, true);
  }

  private static async openCached(uri: string, dir: string, signal?: AbortSignal): Promise<GitRepository> {
    if (await exists(path.join(dir, "HEAD"))) {
      await runGit(["--git-dir", dir, "remote", "update", "--prune"], signal).catch((e: unknown) => {
        throw classifyCloneError(uri, e);
      });
      console.error(`reusing cloned repository [repo=${uri}]`);
      return new GitRepository(uri, dir, false, true);
    }
    await fs.mkdir(path.dirname(dir), { recursive: true });
    const staging = await fs.mkdtemp(`${dir}.clone-`);
    try {
      const cloned = path.join(staging, "repo.git");
      await cloneMirror(uri, cloned, signal);
      try {
        await fs.rename(cloned, dir);
      } catch (e) {
        // Another process put the mirror in place first.
        if (!(await exists(path.join(dir, "HEAD")))) throw e;
        return new GitRepository(uri, dir, false, true);
      }
      return new GitRepository(uri, dir, false);
    } finally {
      await fs.rm(staging, { recursive: true, force: true });
    }
  }

  /** Wraps an existing git directory (bare or `.git`) without taking ownership. */
  static fromGitDir(uri: string, gitDir: string): GitRepository {
    return new GitRepository(uri, gitDir, false);
  }

  private async git(args: string[]): Promise<string> {
    return runGit(["--git-dir", this.gitDir, ...args]);
  }

  private async gitOrNull(args: string[]): Promise<string | null> {
    try {
      return await this.git(args);
    } catch (e) {
      if (typeof e === "object" && e !== null && "code" in e && typeof e.code === "number") return null;
      throw e;
    }
  }

  async head(): Promise<string | null> {
    return (await this.gitOrNull(["rev-parse", "--verify", "--quiet", "HEAD^{commit}"]))?.trim() || null;
  }

  async resolveCommit(ref: string): Promise<string | null> {
    if (!ref || ref.startsWith("-")) return null;
    return (await this.gitOrNull(["rev-parse", "--verify", "--quiet", `${ref}^{commit}`]))?.trim() || null;
  }

  async commit(hash: string): Promise<Commit | null> {
    const resolved = await this.resolveCommit(hash);
    if (!resolved) return null;
    return parseLogLine(await this.git(["show", "-s", "--format=%H %ct %P", resolved]));
  }

  async getTree(ref: string): Promise<Tree> {
    const commit = await this.resolveCommit(ref);
    if (!commit) throw notFound(`ref not found: ${ref}`);
    return { commit };
  }

  async findEntry(tree: Tree, p: string): Promise<TreeEntry | null> {
    const rel = normalizeRepoPath(p);
    if (!rel) return { path: "", type: "tree" };
    const out = await this.git(["ls-tree", tree.commit, "--", rel]);
    const line = out.split("\n").find((l) => l.endsWith(`\t${rel}`));
    if (!line) return null;
    const type = line.split(" ")[1];
    return { path: rel, type: type === "tree" ? "tree" : "blob" };
  }

  async readFile(tree: Tree, p: string): Promise<Uint8Array> {
    const rel = normalizeRepoPath(p);
    const entry = await this.findEntry(tree, rel);
    if (!entry || entry.type !== "blob") throw fileNotFound(rel, tree.commit);
    const { stdout } = await execFileAsync("git", ["--git-dir", this.gitDir, "cat-file", "blob", `${tree.commit}:${rel}`], {
      encoding: "buffer",
      maxBuffer: MAX_GIT_OUTPUT_BYTES
    });
    return new Uint8Array(stdout);
  }

  async listDir(tree: Tree, p: string): Promise<string[]> {
    const rel = normalizeRepoPath(p);
    const out = await this.git(rel ? ["ls-tree", tree.commit, "--", `${rel}/`] : ["ls-tree", tree.commit]);
    return out
      .split("\n")
      .filter(Boolean)
      .map((line) => {
        const [meta = "", name = ""] = line.split("\t");
        const base = name.slice(name.lastIndexOf("/") + 1);
        return meta.split(" ")[1] === "tree" ? `${base}/` : base;
      })
      .sort();
  }

  async grep(ref: string, pathspec: RegExp, pattern: RegExp): Promise<GrepMatch[]> {
    const tree = await this.getTree(ref);
    const files = (await this.git(["ls-tree", "-r", "--name-only", tree.commit]))
      .split("\n")
      .filter((f) => f && pathspec.test(f))
      .sort();
    const decoder = new TextDecoder();
    const out: GrepMatch[] = [];
    for (const file of files) {
      const text = decoder.decode(await this.readFile(tree, file));
      text.split("\n").forEach((line, i) => {
        if (pattern.test(line)) out.push({ file, lineNumber: i + 1, line });
      });
    }
    return out;
  }

  async *logTouching(p: string): AsyncIterable<Commit> {
    const rel = normalizeRepoPath(p);
    const out = await this.git(["log", "--all", "--date-order", "--format=%H %ct %P", "--", rel]);
    for (const line of out.split("\n")) {
      const c = parseLogLine(line);
      if (c) yield c;
    }
  }

  async tags(): Promise<TagRef[]> {
    const out = await this.git(["for-each-ref", "refs/tags", "--format=%(refname:strip=2) %(objectname) %(*objectname)"]);
    const tags: TagRef[] = [];
    for (const line of out.split("\n")) {
      const [name, object, peeled] = line.trim().split(" ");
      if (!name || !object) continue;
      tags.push({ name, commit: peeled || object });
    }
    return tags;
  }

  async resolveTag(name: string): Promise<string | null> {
    return this.resolveCommit(`refs/tags/${name}`);
  }

  async release(): Promise<void> {
    if (this.ownsDir) await fs.rm(path.dirname(this.gitDir), { recursive: true, force: true });
  }
}

function parseLogLine(line: string): Commit | null {
  const [hash, ct, ...parents] = line.trim().split(" ");
  if (!hash || !ct) return null;
  return { hash, parents: parents.filter(Boolean), committerTime: new Date(Number(ct) * 1000) };
}

async function runGit(args: string[], signal?: AbortSignal): Promise<string> {
  const { stdout } = await execFileAsync("git", args, {
    encoding: "utf8",
    maxBuffer: MAX_GIT_OUTPUT_BYTES,
    env: { ...process.env, GIT_TERMINAL_PROMPT: "0" },
    signal
  });
  return stdout;
}

function classifyCloneError(uri: string, e: unknown): RebuildError {
  const detail = stderrOf(e).trim();
  if (AUTH_FAILURE.test(detail)) return new RebuildError("NotFound", "repo invalid or private", { cause: e });
  return transient(`clone failed [repo=${uri}]: ${detail.split("\n").pop() ?? ""}`, e);
}

async function cloneMirror(uri: string, dir: string, signal?: AbortSignal): Promise<void> {
  try {
    await runGit(["clone", "--mirror", "--quiet", uri, dir], signal);
  } catch (e) {
    await fs.rm(dir, { recursive: true, force: true });
    throw classifyCloneError(uri, e);
  }
}
