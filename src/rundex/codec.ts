import * as z from "zod/v4";
import { malformed } from "../core/errors.js";
import { isRunId, type RunId } from "../core/ids.js";
import { parseStrategy, strategyToJson } from "../strategy/definition.js";
import type { Rebuild, Run } from "./types.js";

const runIdSchema = z.custom<RunId>((v) => typeof v === "string" && isRunId(v), { message: "invalid run id" });

const runSchema = z.object({
  id: runIdSchema,
  benchmarkName: z.string(),
  benchmarkHash: z.string(),
  type: z.enum(["smoketest", "attest"]),
  created: z.number()
});

const timingsSchema = z.object({
  cloneEstimate: z.number(),
  source: z.number(),
  infer: z.number(),
  build: z.number()
});

const rebuildSchema = z.object({
  ecosystem: z.string(),
  package: z.string(),
  version: z.string(),
  artifact: z.string(),
  success: z.boolean(),
  message: z.string(),
  strategy: z.unknown().nullable(),
  timings: timingsSchema,
  executorVersion: z.string(),
  runId: runIdSchema,
  created: z.number()
});

function issues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
}

export function decodeRun(raw: unknown, source: string): Run {
  const parsed = runSchema.safeParse(raw);
  if (!parsed.success) throw malformed(`invalid run record [source=${source}]: ${issues(parsed.error)}`, parsed.error);
  return parsed.data;
}

export function decodeRebuild(raw: unknown, source: string): Rebuild {
  const parsed = rebuildSchema.safeParse(raw);
  if (!parsed.success) throw malformed(`invalid rebuild record [source=${source}]: ${issues(parsed.error)}`, parsed.error);
  const { strategy, ...rest } = parsed.data;
  return { ...rest, strategy: strategy === null || strategy === undefined ? null : parseStrategy(strategy, source) };
}

export function encodeRebuild(r: Rebuild): Record<string, unknown> {
  return { ...r, strategy: r.strategy ? strategyToJson(r.strategy) : null };
}
