import { promises as fs } from "fs";
import YAML from "yaml";
import * as z from "zod/v4";
import { canonicalizeJson } from "../core/canonicalJson.js";
import { RebuildError } from "../core/errors.js";
import { isJsonObject, type JsonObject } from "../core/json.js";
import type { Strategy } from "./types.js";

const dateSchema = z.union([z.date(), z.string()]).transform((v, ctx) => {
  const d = typeof v === "string" ? new Date(v) : v;
  if (Number.isNaN(d.getTime())) {
    ctx.issues.push({ code: "custom", message: "invalid date", input: v });
    return z.NEVER;
  }
  return d;
});

const locationSchema = z.object({
  repo: z.string().default(""),
  ref: z.string().default(""),
  dir: z.string().default(".")
});

const fileSchema = z.object({ url: z.string(), md5: z.string().default("") });

const stepSchema = z.object({
  runs: z.string().optional(),
  uses: z.string().optional(),
  with: z.record(z.string(), z.string()).optional(),
  needs: z.array(z.string()).optional()
});

export const strategySchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("NPMPackBuild"),
    location: locationSchema,
    npmVersion: z.string(),
    versionOverride: z.string().optional()
  }),
  z.object({
    kind: z.literal("NPMCustomBuild"),
    location: locationSchema,
    npmVersion: z.string(),
    nodeVersion: z.string(),
    command: z.string().default(""),
    registryTime: dateSchema,
    prepackRemoveDeps: z.boolean().default(false),
    keepRoot: z.boolean().default(false),
    versionOverride: z.string().optional()
  }),
  z.object({
    kind: z.literal("PyPIPureWheelBuild"),
    location: locationSchema,
    requirements: z.array(z.string()).default([]),
    registryTime: dateSchema.optional()
  }),
  z.object({
    kind: z.literal("CratesIOCargoPackage"),
    location: locationSchema,
    rustVersion: z.string().default(""),
    explicitLockfile: z.object({ lockfileBase64: z.string() }).optional()
  }),
  z.object({
    kind: z.literal("DebianPackage"),
    dsc: fileSchema,
    orig: fileSchema.optional(),
    debian: fileSchema.optional(),
    native: fileSchema.optional(),
    requirements: z.array(z.string()).default([])
  }),
  z.object({
    kind: z.literal("MavenBuild"),
    location: locationSchema,
    jdkVersion: z.string()
  }),
  z.object({
    kind: z.literal("GoModuleBuild"),
    location: locationSchema
  }),
  z.object({
    kind: z.literal("WorkflowStrategy"),
    location: locationSchema,
    sourceSteps: z.array(stepSchema).default([]),
    depsSteps: z.array(stepSchema).default([]),
    buildSteps: z.array(stepSchema).default([]),
    systemDeps: z.array(z.string()).optional(),
    outputDir: z.string().optional(),
    outputPath: z.string().optional()
  }),
  z.object({
    kind: z.literal("LocationHint"),
    location: locationSchema
  })
]);

export function parseStrategy(raw: unknown, source = "strategy"): Strategy {
  const parsed = strategySchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    throw new RebuildError("Malformed", `invalid strategy [source=${source}]: ${detail}`, { cause: parsed.error });
  }
  const s = parsed.data;
  const loc = "location" in s ? s.location : null;
  if (loc && loc.ref && !loc.repo && s.kind !== "LocationHint") {
    throw new RebuildError("Malformed", `invalid strategy [source=${source}]: location.ref requires location.repo`);
  }
  return s;
}

/** JSON form with sorted keys and RFC 3339 dates, as stored in rundex records. */
export function strategyToJson(s: Strategy): JsonObject {
  const json = canonicalizeJson(s);
  if (!isJsonObject(json)) throw new RebuildError("Internal", "strategy did not serialize to an object", { fatal: true });
  return json;
}

/** The `build.yaml` build definition. */
export function strategyToYaml(s: Strategy): string {
  return YAML.stringify(strategyToJson(s));
}

export function parseStrategyYaml(text: string, source = "strategy"): Strategy {
  let raw: unknown;
  try {
    raw = YAML.parse(text);
  } catch (e) {
    throw new RebuildError("Malformed", `invalid YAML [source=${source}]`, { cause: e });
  }
  return parseStrategy(raw, source);
}

export async function loadStrategyFile(filePath: string): Promise<Strategy> {
  return parseStrategyYaml(await fs.readFile(filePath, "utf8"), filePath);
}
