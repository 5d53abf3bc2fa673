import { sha256Hex } from "../core/canonicalJson.js";
import type { ArchiveFile } from "./entries.js";

export interface ContentSummary {
  /** Sorted file paths. */
  files: string[];
  /** sha256 hex per file. */
  hashes: Record<string, string>;
  crlfCount: number;
}

export interface SummaryDiff {
  upstreamOnly: string[];
  diffs: string[];
  rebuildOnly: string[];
}

function countCrlf(data: Uint8Array): number {
  let n = 0;
  for (let i = 1; i < data.byteLength; i++) {
    if (data[i] === 0x0a && data[i - 1] === 0x0d) n++;
  }
  return n;
}

export function summarize(files: ArchiveFile[]): ContentSummary {
  const hashes: Record<string, string> = {};
  let crlfCount = 0;
  for (const f of files) {
    hashes[f.path] = sha256Hex(f.data);
    crlfCount += countCrlf(f.data);
  }
  return { files: Object.keys(hashes).sort(), hashes, crlfCount };
}

/** Compares upstream against rebuild; each list is sorted. */
export function diffSummaries(up: ContentSummary, rb: ContentSummary): SummaryDiff {
  const upstreamOnly: string[] = [];
  const diffs: string[] = [];
  for (const f of up.files) {
    const other = rb.hashes[f];
    if (other === undefined) upstreamOnly.push(f);
    else if (other !== up.hashes[f]) diffs.push(f);
  }
  const rebuildOnly = rb.files.filter((f) => up.hashes[f] === undefined);
  return { upstreamOnly, diffs, rebuildOnly };
}

/** Text listing of the three sets, as written to the `diff` asset. */
export function formatDiff(d: SummaryDiff): string {
  const section = (title: string, files: string[]) =>
    `${title} (${files.length}):\n${files.map((f) => `  ${f}\n`).join("")}`;
  return [
    section("upstream only", d.upstreamOnly),
    section("content differs", d.diffs),
    section("rebuild only", d.rebuildOnly)
  ].join("");
}
