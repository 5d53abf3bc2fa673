import { promises as fs } from "fs";
import * as z from "zod/v4";
import { sha256Prefixed } from "../core/canonicalJson.js";
import { malformed } from "../core/errors.js";
import { newTarget, type Target } from "../core/target.js";

const packageSchema = z.object({
  Ecosystem: z.string(),
  Name: z.string(),
  Versions: z.array(z.string()),
  Artifacts: z.array(z.string()).optional()
});

const packageSetSchema = z.object({
  Count: z.number().int().nonnegative(),
  Updated: z.string(),
  Packages: z.array(packageSchema)
});

export type BenchmarkPackage = z.infer<typeof packageSchema>;
export type PackageSet = z.infer<typeof packageSetSchema>;

export function parseBenchmark(raw: unknown, source = "benchmark"): PackageSet {
  const parsed = packageSetSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    throw malformed(`invalid benchmark [source=${source}]: ${detail}`, parsed.error);
  }
  for (const p of parsed.data.Packages) {
    if (p.Artifacts && p.Artifacts.length !== p.Versions.length) {
      throw malformed(`invalid benchmark [source=${source}]: ${p.Name} has ${p.Artifacts.length} artifacts for ${p.Versions.length} versions`);
    }
  }
  return parsed.data;
}

export async function loadBenchmark(filePath: string): Promise<PackageSet> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(filePath, "utf8"));
  } catch (e) {
    throw malformed(`reading benchmark ${filePath}`, e);
  }
  return parseBenchmark(raw, filePath);
}

/** One target per version; `Artifacts`, when present, runs parallel to `Versions`. */
export function benchmarkTargets(set: PackageSet): Target[] {
  return set.Packages.flatMap((p) =>
    p.Versions.map((version, i) =>
      newTarget({ ecosystem: p.Ecosystem, package: p.Name, version, artifact: p.Artifacts?.[i] ?? "" })
    )
  );
}

/** `sha256:` over the sorted `ecosystem|name|version` ids joined by `|`. */
export function benchmarkHash(set: PackageSet): `sha256:${string}` {
  const ids = set.Packages.flatMap((p) => p.Versions.map((v) => [p.Ecosystem, p.Name, v].join("|")));
  ids.sort();
  return sha256Prefixed(ids.join("|"));
}

/** The benchmark hash of an ad-hoc target list, so single-target runs are recorded the same way. */
export function targetsHash(targets: readonly Target[]): `sha256:${string}` {
  const ids = targets.map((t) => [t.ecosystem, t.package, t.version].join("|"));
  ids.sort();
  return sha256Prefixed(ids.join("|"));
}
