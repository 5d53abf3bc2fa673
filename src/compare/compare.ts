import { bytesEqual } from "../core/bytes.js";
import type { Target } from "../core/target.js";
import { listTargetFiles } from "../archive/entries.js";
import { diffSummaries, summarize, type ContentSummary, type SummaryDiff } from "../archive/summary.js";
import { Verdict, type VerdictMessage } from "./verdicts.js";

export interface Comparison {
  upstream: ContentSummary;
  rebuild: ContentSummary;
  diff: SummaryDiff;
  /** Null when the artifacts match. */
  verdict: VerdictMessage | null;
}

/** Classifies a summary diff; the checks run in a fixed order and the first hit wins. */
export function classify(up: ContentSummary, rb: ContentSummary, diff: SummaryDiff, bytesMatch: boolean): VerdictMessage | null {
  const { upstreamOnly, diffs, rebuildOnly } = diff;
  if (upstreamOnly.some((f) => f.startsWith("package/dist/"))) return Verdict.missingDist;
  if (upstreamOnly.some((f) => f.endsWith("/.DS_STORE"))) return Verdict.dsStore;
  if (up.crlfCount > rb.crlfCount) return Verdict.lineEndings;
  if (upstreamOnly.length && rebuildOnly.length) return Verdict.mismatchedFiles;
  if (upstreamOnly.length) {
    return upstreamOnly.every((f) => f.startsWith("package/.")) ? Verdict.hiddenUpstreamOnly : Verdict.upstreamOnly;
  }
  if (rebuildOnly.length) return Verdict.rebuildOnly;
  if (diffs.includes("package/package.json")) return Verdict.packageJsonDiff;
  if (diffs.length) return Verdict.contentDiff;
  if (!bytesMatch) return Verdict.archiveMetadataDiff;
  return null;
}

/** Compares two stabilized artifacts of the target. */
export async function compareArtifacts(t: Target, upstream: Uint8Array, rebuild: Uint8Array): Promise<Comparison> {
  const up = summarize(await listTargetFiles(upstream, t));
  const rb = summarize(await listTargetFiles(rebuild, t));
  const diff = diffSummaries(up, rb);
  return { upstream: up, rebuild: rb, diff, verdict: classify(up, rb, diff, bytesEqual(upstream, rebuild)) };
}
