import type { RunId } from "../core/ids.js";
import type { Target } from "../core/target.js";
import type { Strategy } from "../strategy/types.js";

export type RunType = "smoketest" | "attest";

export interface Run {
  id: RunId;
  benchmarkName: string;
  benchmarkHash: string;
  type: RunType;
  /** Milliseconds since the epoch. */
  created: number;
}

/** Stage durations in milliseconds, as the pipeline measures them. */
export interface Timings {
  cloneEstimate: number;
  source: number;
  infer: number;
  build: number;
}

export interface Verdict {
  target: Target;
  runId: RunId;
  success: boolean;
  /** Empty iff `success`. */
  message: string;
  strategy: Strategy | null;
  timings: Timings;
  created: number;
}

/** One persisted rebuild attempt; timings are float seconds. */
export interface Rebuild {
  ecosystem: string;
  package: string;
  version: string;
  artifact: string;
  success: boolean;
  message: string;
  strategy: Strategy | null;
  timings: Timings;
  executorVersion: string;
  runId: RunId;
  created: number;
}

export function rebuildId(r: Pick<Rebuild, "ecosystem" | "package" | "version" | "artifact">): string {
  return [r.ecosystem, r.package, r.version, r.artifact].join("!");
}

export function timingsToSeconds(t: Timings): Timings {
  return { cloneEstimate: t.cloneEstimate / 1000, source: t.source / 1000, infer: t.infer / 1000, build: t.build / 1000 };
}

export function rebuildFromVerdict(v: Verdict, executorVersion: string): Rebuild {
  return {
    ecosystem: v.target.ecosystem,
    package: v.target.package,
    version: v.target.version,
    artifact: v.target.artifact,
    success: v.message === "",
    message: v.message,
    strategy: v.strategy,
    timings: timingsToSeconds(v.timings),
    executorVersion,
    runId: v.runId,
    created: v.created
  };
}

export interface FetchRunsOpts {
  ids?: string[];
  benchmarkHash?: string;
}

export interface FetchRebuildsRequest {
  runs?: string[];
  executors?: string[];
  target?: Partial<Pick<Target, "ecosystem" | "package" | "version" | "artifact">>;
  /** Message must start with this. */
  prefix?: string;
  /** Regular expression tested against the message. */
  pattern?: string;
  /** Rewrite messages into their short display form. */
  clean?: boolean;
  latestPerTarget?: boolean;
}

export interface RundexReader {
  fetchRuns(opts?: FetchRunsOpts): Promise<Run[]>;
  fetchRebuilds(req?: FetchRebuildsRequest): Promise<Rebuild[]>;
}

export interface RundexWriter {
  writeRun(run: Run): Promise<void>;
  writeRebuild(rebuild: Rebuild): Promise<void>;
}

export type Rundex = RundexReader & RundexWriter;
