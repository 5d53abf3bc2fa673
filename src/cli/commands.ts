import path from "path";
import { benchmarkHash, benchmarkTargets, loadBenchmark, targetsHash } from "../benchmark/benchmark.js";
import { loadConfig, type BuilderKind, type RebuildConfig } from "../config/config.js";
import { errorMessage, isFatal, malformed } from "../core/errors.js";
import { isRunId, type RunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import { newTarget, targetLabel, type Target } from "../core/target.js";
import type { Builder } from "../execution/builder.js";
import { exportRun } from "../export/export.js";
import { inferTarget, type RepoOpener } from "../inference/index.js";
import type { FetchFn } from "../registry/http.js";
import { createRegistryMux } from "../registry/mux.js";
import { RateLimiters } from "../registry/rateLimit.js";
import { GitRepository } from "../repo/gitRepository.js";
import { openRundex } from "../rundex/index.js";
import { LocalAssetStore } from "../assets/assetStore.js";
import type { RunType, Verdict } from "../rundex/types.js";
import { RebuildLog } from "../runs/rebuildLog.js";
import { strategyToJson, strategyToYaml, loadStrategyFile } from "../strategy/definition.js";
import type { RebuildInput } from "../pipeline/pipeline.js";
import { executeRun, openSession } from "../pipeline/session.js";
import { intFlag, parseArgs, requireFlag, stringFlag, type ParsedArgs } from "./args.js";

export const EXIT_OK = 0;
export const EXIT_FAILED_VERDICT = 1;
export const EXIT_INTERNAL = 2;

export interface CliDeps {
  stdout: (text: string) => void;
  fetch?: FetchFn;
  builder?: Builder;
  openRepo?: RepoOpener;
  signal?: AbortSignal;
}

export function usage(): string {
  return [
    "usage:",
    "  rebuild-ctl smoketest --ecosystem <eco> --package <name> --version <ver> [--artifact <file>] [--strategy <build.yaml>]",
    "  rebuild-ctl rebuild   --ecosystem <eco> --package <name> --version <ver> [--artifact <file>] [--strategy <build.yaml>]",
    "  rebuild-ctl infer     --ecosystem <eco> --package <name> --version <ver> [--artifact <file>] [--strategy <hint.yaml>]",
    "  rebuild-ctl benchmark <benchmark.json> [--mode smoketest|attest] [--max-concurrency <n>] [--run <run_id>]",
    "  rebuild-ctl export --run <run_id> --destination <dir|file://url>",
    "",
    "common options:",
    "  --config <path>          config file (default $REBUILD_CONFIG_PATH, then config/default.config.yaml)",
    "  --storage-root <dir>     asset store and filesystem rundex root",
    "  --database-url <url>     Postgres rundex",
    "  --timewarp-host <host>   time-warped registry host",
    "  --builder local|docker",
    "  --verbose                echo per-target events to stderr",
    ""
  ].join("\n");
}

export function verdictJson(v: Verdict): JsonObject {
  return {
    target: { ...v.target },
    runId: v.runId,
    success: v.success,
    message: v.message,
    strategy: v.strategy ? strategyToJson(v.strategy) : null,
    timings: { ...v.timings }
  };
}

function parseBuilderKind(value: string | undefined): BuilderKind | undefined {
  if (value === undefined || value === "local" || value === "docker") return value;
  throw malformed(`invalid --builder: ${value}`);
}

function parseMode(value: string | undefined): RunType {
  if (value === undefined) return "smoketest";
  if (value === "smoketest" || value === "attest") return value;
  throw malformed(`invalid --mode: ${value}`);
}

function parseRunId(value: string | undefined): RunId | undefined {
  if (value === undefined) return undefined;
  if (!isRunId(value)) throw malformed(`invalid run id: ${value}`);
  return value;
}

async function configFor(args: ParsedArgs): Promise<RebuildConfig> {
  const base = await loadConfig(stringFlag(args, "config"));
  return base.with({
    storageRoot: stringFlag(args, "storage-root"),
    databaseUrl: stringFlag(args, "database-url"),
    timewarpHost: stringFlag(args, "timewarp-host"),
    builderKind: parseBuilderKind(stringFlag(args, "builder"))
  });
}

function targetFor(args: ParsedArgs): Target {
  return newTarget({
    ecosystem: requireFlag(args, "ecosystem"),
    package: requireFlag(args, "package"),
    version: requireFlag(args, "version"),
    artifact: stringFlag(args, "artifact")
  });
}

async function inputFor(args: ParsedArgs): Promise<RebuildInput> {
  const target = targetFor(args);
  const strategyPath = stringFlag(args, "strategy");
  return { target, strategy: strategyPath ? await loadStrategyFile(strategyPath) : null };
}

async function runInputs(
  args: ParsedArgs,
  deps: CliDeps,
  mode: RunType,
  inputs: RebuildInput[],
  benchmark: { name: string; hash: string },
  runId?: RunId
): Promise<number> {
  const config = await configFor(args);
  const session = await openSession(config, {
    mode,
    runId,
    fetch: deps.fetch,
    builder: deps.builder,
    openRepo: deps.openRepo,
    echo: args.flags.verbose === true
  });
  let failed = 0;
  let errored = 0;
  try {
    console.error(`run ${session.runId} started [mode=${mode}, targets=${inputs.length}, rundex=${session.rundexMode}]`);
    for await (const res of executeRun(session, inputs, {
      benchmarkName: benchmark.name,
      benchmarkHash: benchmark.hash,
      concurrency: intFlag(args, "max-concurrency"),
      signal: deps.signal
    })) {
      if (res.outcome) {
        deps.stdout(`${JSON.stringify(verdictJson(res.outcome.verdict))}\n`);
        if (!res.outcome.verdict.success) failed++;
      } else {
        errored++;
        console.error(`${targetLabel(res.input.target)}: ${res.error ? errorMessage(res.error) : "no result"}`);
      }
    }
  } finally {
    await session.close();
  }
  console.error(`run ${session.runId} finished [targets=${inputs.length}, failed=${failed}, errors=${errored}]`);
  if (errored > 0) return EXIT_INTERNAL;
  return failed > 0 ? EXIT_FAILED_VERDICT : EXIT_OK;
}

async function cmdSingle(args: ParsedArgs, deps: CliDeps, mode: RunType): Promise<number> {
  const input = await inputFor(args);
  return runInputs(args, deps, mode, [input], { name: targetLabel(input.target), hash: targetsHash([input.target]) });
}

async function cmdBenchmark(args: ParsedArgs, deps: CliDeps): Promise<number> {
  const file = args.positional[1];
  if (!file) throw malformed("benchmark file is required");
  const set = await loadBenchmark(file);
  const inputs = benchmarkTargets(set).map((target) => ({ target, strategy: null }));
  return runInputs(
    args,
    deps,
    parseMode(stringFlag(args, "mode")),
    inputs,
    { name: path.basename(file), hash: benchmarkHash(set) },
    parseRunId(stringFlag(args, "run"))
  );
}

async function cmdExport(args: ParsedArgs, deps: CliDeps): Promise<number> {
  const runId = parseRunId(requireFlag(args, "run"));
  if (!runId) throw malformed("--run is required");
  const destination = requireFlag(args, "destination");
  const config = await configFor(args);
  const opened = await openRundex({ storageRoot: config.storageRoot(), databaseUrl: config.databaseUrl() });
  try {
    const summary = await exportRun({
      runId,
      rundex: opened.rundex,
      assets: new LocalAssetStore(config.storageRoot(), runId),
      destination
    });
    deps.stdout(`${JSON.stringify(summary)}\n`);
  } finally {
    await opened.close();
  }
  return EXIT_OK;
}

async function cmdInfer(args: ParsedArgs, deps: CliDeps): Promise<number> {
  const input = await inputFor(args);
  const config = await configFor(args);
  const registries = createRegistryMux({ fetch: deps.fetch, limiters: new RateLimiters(config.rateLimits()) });
  const cacheDir = config.repoCacheDir();
  const openRepo: RepoOpener =
    deps.openRepo ?? ((uri, signal) => GitRepository.open(uri, { cacheDir: cacheDir ? path.resolve(cacheDir) : null, signal }));
  const log = new RebuildLog({ label: targetLabel(input.target), echo: args.flags.verbose === true });
  const { strategy } = await inferTarget(input.target, input.strategy ?? null, { registries, log, signal: deps.signal }, openRepo);
  deps.stdout(strategyToYaml(strategy));
  return EXIT_OK;
}

/** Runs one command and returns the process exit code. */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  let args: ParsedArgs;
  try {
    args = parseArgs(argv);
  } catch (e) {
    console.error(`${errorMessage(e)}\n\n${usage()}`);
    return EXIT_INTERNAL;
  }
  const command = args.positional[0];
  if (args.flags.help || !command) {
    deps.stdout(usage());
    return command || args.flags.help ? EXIT_OK : EXIT_INTERNAL;
  }
  try {
    switch (command) {
      case "smoketest":
        return await cmdSingle(args, deps, "smoketest");
      case "rebuild":
        return await cmdSingle(args, deps, "attest");
      case "benchmark":
        return await cmdBenchmark(args, deps);
      case "export":
        return await cmdExport(args, deps);
      case "infer":
        return await cmdInfer(args, deps);
      default:
        console.error(`unknown command: ${command}\n\n${usage()}`);
        return EXIT_INTERNAL;
    }
  } catch (e) {
    console.error(isFatal(e) ? `internal error: ${errorMessage(e)}` : errorMessage(e));
    return EXIT_INTERNAL;
  }
}
