import { promises as fs } from "fs";
import path from "path";
import { internal } from "../core/errors.js";
import type { RunId } from "../core/ids.js";
import { encodedTargetPath, type Target } from "../core/target.js";

export interface BuildWorkspace {
  rootDir: string;
  /** Checkout and build directory. */
  srcDir: string;
  /** Stage scripts and the Dockerfile. */
  metaDir: string;
  outDir: string;
  srcPath(name: string): string;
  metaPath(name: string): string;
  outPath(name: string): string;
  /** Removes the whole tree. */
  release(): Promise<void>;
}

export function safeJoin(baseDir: string, name: string): string {
  const joined = path.join(baseDir, name);
  const rel = path.relative(baseDir, joined);
  if (rel.startsWith("..") || path.isAbsolute(rel)) {
    throw internal(`unsafe workspace path: ${name}`);
  }
  return joined;
}

/** A fresh `<workDir>/<run_id>/<eco>/<pkg>/<ver>/<artifact>/` tree; any previous attempt is removed. */
export async function createBuildWorkspace(workDir: string, runId: RunId, target: Target): Promise<BuildWorkspace> {
  const root = path.resolve(workDir, runId, ...encodedTargetPath(target));
  await fs.rm(root, { recursive: true, force: true });
  const srcDir = path.join(root, "src");
  const metaDir = path.join(root, "meta");
  const outDir = path.join(root, "out");

  await fs.mkdir(srcDir, { recursive: true });
  await fs.mkdir(metaDir, { recursive: true });
  await fs.mkdir(outDir, { recursive: true });

  return {
    rootDir: root,
    srcDir,
    metaDir,
    outDir,
    srcPath: (name: string) => safeJoin(srcDir, name),
    metaPath: (name: string) => safeJoin(metaDir, name),
    outPath: (name: string) => safeJoin(outDir, name),
    release: () => fs.rm(root, { recursive: true, force: true })
  };
}
