import * as z from "zod/v4";
import { ECOSYSTEMS } from "../core/target.js";

export const zRunId = z.string().regex(/^run_[0-9A-Za-z_-]+$/, "invalid run_id");
export const zSha256 = z.string().regex(/^sha256:[a-f0-9]{64}$/);
export const zEcosystem = z.enum(ECOSYSTEMS);

export const zTargetInput = z.object({
  ecosystem: zEcosystem,
  package: z.string().min(1),
  version: z.string().min(1),
  artifact: z.string().min(1).optional(),
  /** A build definition or LocationHint in YAML. */
  strategy_yaml: z.string().max(1048576).optional()
});

export const zTarget = z.object({
  ecosystem: zEcosystem,
  package: z.string(),
  version: z.string(),
  artifact: z.string()
});

export const zTimings = z.object({
  clone_estimate: z.number(),
  source: z.number(),
  infer: z.number(),
  build: z.number()
});

export const zRebuildInferInput = zTargetInput;

export const zRebuildInferOutput = z.object({
  target: zTarget,
  strategy_kind: z.string(),
  strategy: z.record(z.string(), z.unknown()),
  strategy_yaml: z.string()
});

export const zRebuildSmoketestInput = zTargetInput;

export const zRebuildSmoketestOutput = z.object({
  run_id: zRunId,
  target: zTarget,
  success: z.boolean(),
  message: z.string(),
  strategy: z.record(z.string(), z.unknown()).nullable(),
  timings: zTimings,
  attempts: z.number().int()
});

export const zRun = z.object({
  run_id: zRunId,
  benchmark_name: z.string(),
  benchmark_hash: z.string(),
  type: z.enum(["smoketest", "attest"]),
  created: z.number()
});

export const zRundexListRunsInput = z.object({
  ids: z.array(zRunId).optional(),
  benchmark_hash: zSha256.optional()
});

export const zRundexListRunsOutput = z.object({
  runs: z.array(zRun)
});

export const zRebuild = z.object({
  run_id: zRunId,
  ecosystem: z.string(),
  package: z.string(),
  version: z.string(),
  artifact: z.string(),
  success: z.boolean(),
  message: z.string(),
  strategy_kind: z.string().nullable(),
  executor_version: z.string(),
  timings: zTimings,
  created: z.number()
});

export const zRundexListRebuildsInput = z.object({
  runs: z.array(zRunId).optional(),
  executors: z.array(z.string()).optional(),
  ecosystem: zEcosystem.optional(),
  package: z.string().optional(),
  version: z.string().optional(),
  artifact: z.string().optional(),
  prefix: z.string().optional(),
  pattern: z.string().optional(),
  latest_per_target: z.boolean().optional(),
  clean: z.boolean().optional(),
  limit: z.number().int().min(1).max(10000).default(1000)
});

export const zRundexListRebuildsOutput = z.object({
  rebuilds: z.array(zRebuild),
  truncated: z.boolean()
});
