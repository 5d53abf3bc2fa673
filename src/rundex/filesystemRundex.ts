import { promises as fs, type Dirent } from "fs";
import path from "path";
import { encodePathComponent } from "../core/target.js";
import { errorMessage, internal } from "../core/errors.js";
import { decodeRebuild, decodeRun, encodeRebuild } from "./codec.js";
import { filterRebuilds, filterRuns } from "./filter.js";
import type { FetchRebuildsRequest, FetchRunsOpts, Rebuild, Run, Rundex } from "./types.js";

export const RUNDEX_RUNS_DIR = path.join("rundex", "runs");
export const RUNDEX_REBUILDS_DIR = path.join("rundex", "runs_metadata");
const REBUILD_FILE_NAME = "firestore.json";

function isMissing(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";
}

async function* walk(dir: string): AsyncIterable<string> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (e) {
    if (isMissing(e)) return;
    throw e;
  }
  entries.sort((a, b) => a.name.localeCompare(b.name));
  for (const entry of entries) {
    const p = path.join(dir, entry.name);
    if (entry.isDirectory()) yield* walk(p);
    else if (entry.isFile()) yield p;
  }
}

let tmpCounter = 0;

/** Replaces `filePath` in one rename, so a reader never sees a partial record. */
async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.${process.pid}.${tmpCounter++}.tmp`;
  try {
    await fs.writeFile(tmp, `${JSON.stringify(value, null, 2)}\n`, "utf8");
    await fs.rename(tmp, filePath);
  } catch (e) {
    await fs.rm(tmp, { force: true });
    throw internal(`writing ${filePath}: ${errorMessage(e)}`, e);
  }
}

async function readJson(filePath: string): Promise<unknown> {
  return JSON.parse(await fs.readFile(filePath, "utf8"));
}

/**
 * Rundex stored as JSON files under a root directory:
 * `rundex/runs/<run_id>.json` and
 * `rundex/runs_metadata/<run_id>/<eco>/<pkg>/<ver>/<artifact>/firestore.json`.
 */
export class FilesystemRundex implements Rundex {
  constructor(private readonly rootDir: string) {}

  runPath(runId: string): string {
    return path.join(this.rootDir, RUNDEX_RUNS_DIR, `${runId}.json`);
  }

  rebuildPath(r: Rebuild): string {
    const parts = [r.ecosystem, r.package, r.version, r.artifact].map(encodePathComponent);
    return path.join(this.rootDir, RUNDEX_REBUILDS_DIR, r.runId, ...parts, REBUILD_FILE_NAME);
  }

  async writeRun(run: Run): Promise<void> {
    await writeJsonAtomic(this.runPath(run.id), run);
  }

  async writeRebuild(rebuild: Rebuild): Promise<void> {
    await writeJsonAtomic(this.rebuildPath(rebuild), encodeRebuild(rebuild));
  }

  async fetchRuns(opts: FetchRunsOpts = {}): Promise<Run[]> {
    const runs: Run[] = [];
    for await (const p of walk(path.join(this.rootDir, RUNDEX_RUNS_DIR))) {
      if (path.extname(p) !== ".json") continue;
      runs.push(decodeRun(await readJson(p), p));
    }
    return filterRuns(runs, opts);
  }

  async fetchRebuilds(req: FetchRebuildsRequest = {}): Promise<Rebuild[]> {
    const base = path.join(this.rootDir, RUNDEX_REBUILDS_DIR);
    const roots = req.runs?.length ? req.runs.map((r) => path.join(base, r)) : [base];
    const all: Rebuild[] = [];
    for (const root of roots) {
      for await (const p of walk(root)) {
        if (path.basename(p) !== REBUILD_FILE_NAME) continue;
        all.push(decodeRebuild(await readJson(p), p));
      }
    }
    return filterRebuilds(all, req);
  }
}
