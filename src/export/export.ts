import path from "path";
import { fileURLToPath } from "url";
import { copyAsset, LocalAssetStore, type AssetStore, type AssetType } from "../assets/assetStore.js";
import { malformed, notFound } from "../core/errors.js";
import type { RunId } from "../core/ids.js";
import { newTarget } from "../core/target.js";
import { FilesystemRundex } from "../rundex/filesystemRundex.js";
import type { RundexReader, RundexWriter } from "../rundex/types.js";

const EXPORTED_TYPES: readonly AssetType[] = ["rebuild", "upstream", "diff", "info.json", "Dockerfile", "build.yaml", "logs"];

export interface ExportSummary {
  runId: RunId;
  destination: string;
  rebuilds: number;
  assets: number;
}

/** Accepts a plain directory or a `file://` URL. */
export function resolveDestination(destination: string): string {
  const trimmed = destination.trim();
  if (!trimmed) throw malformed("destination is required");
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)) {
    if (!trimmed.startsWith("file://")) throw malformed(`unsupported destination scheme: ${trimmed}`);
    return fileURLToPath(trimmed);
  }
  return path.resolve(trimmed);
}

/**
 * Copies one run's rundex records and every asset it has into another storage root,
 * laid out the same way as the source.
 */
export async function exportRun(opts: {
  runId: RunId;
  rundex: RundexReader;
  assets: AssetStore;
  destination: string;
  /** Defaults to a filesystem rundex under the destination. */
  to?: { rundex: RundexWriter; assets: AssetStore };
}): Promise<ExportSummary> {
  const root = resolveDestination(opts.destination);
  const [run] = await opts.rundex.fetchRuns({ ids: [opts.runId] });
  if (!run) throw notFound(`run not found: ${opts.runId}`);
  const to = opts.to ?? { rundex: new FilesystemRundex(root), assets: new LocalAssetStore(root, opts.runId) };

  await to.rundex.writeRun(run);
  const rebuilds = await opts.rundex.fetchRebuilds({ runs: [opts.runId] });
  let assets = 0;
  for (const rebuild of rebuilds) {
    await to.rundex.writeRebuild(rebuild);
    const target = newTarget(rebuild);
    for (const type of EXPORTED_TYPES) {
      const asset = { target, type };
      if (!(await opts.assets.exists(asset))) continue;
      await copyAsset(opts.assets, to.assets, asset);
      assets++;
    }
  }
  console.error(`exported run ${opts.runId} [rebuilds=${rebuilds.length}, assets=${assets}, destination=${root}]`);
  return { runId: opts.runId, destination: root, rebuilds: rebuilds.length, assets };
}
