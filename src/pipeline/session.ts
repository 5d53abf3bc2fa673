import path from "path";
import { LocalAssetStore } from "../assets/assetStore.js";
import type { RebuildConfig } from "../config/config.js";
import { newRunId, type RunId } from "../core/ids.js";
import { createBuilder, type Builder } from "../execution/builder.js";
import type { RepoOpener } from "../inference/index.js";
import type { FetchFn } from "../registry/http.js";
import { createRegistryMux, type RegistryMux } from "../registry/mux.js";
import { RateLimiters } from "../registry/rateLimit.js";
import { GitRepository } from "../repo/gitRepository.js";
import { openRundex, type RundexMode } from "../rundex/index.js";
import type { Run, Rundex, RunType } from "../rundex/types.js";
import { RebuildPipeline, type RebuildInput } from "./pipeline.js";
import { runTargets, type RunnerOptions, type RunResult } from "./runner.js";

export interface SessionOptions {
  mode: RunType;
  runId?: RunId;
  fetch?: FetchFn;
  echo?: boolean;
  /** Overrides the configured builder, mostly for tests. */
  builder?: Builder;
  openRepo?: RepoOpener;
  rundexFallback?: "filesystem" | "pg-mem";
  /** A rundex shared across sessions; the session then leaves it open on close. */
  rundex?: { rundex: Rundex; mode: RundexMode };
}

export interface Session {
  runId: RunId;
  mode: RunType;
  config: RebuildConfig;
  registries: RegistryMux;
  rundex: Rundex;
  rundexMode: RundexMode;
  assets: LocalAssetStore;
  openRepo: RepoOpener;
  pipeline: RebuildPipeline;
  close(): Promise<void>;
}

/** Assembles registries, storage, builder and pipeline for one run. */
export async function openSession(config: RebuildConfig, opts: SessionOptions): Promise<Session> {
  const runId = opts.runId ?? newRunId();
  const registries = createRegistryMux({ fetch: opts.fetch, limiters: new RateLimiters(config.rateLimits()) });
  const opened = opts.rundex
    ? { ...opts.rundex, close: async () => {} }
    : await openRundex({
        storageRoot: config.storageRoot(),
        databaseUrl: config.databaseUrl(),
        fallback: opts.rundexFallback ?? "filesystem"
      });
  const assets = new LocalAssetStore(config.storageRoot(), runId);
  const builder =
    opts.builder ??
    createBuilder(config.builderKind(), {
      workDir: path.resolve(config.workDir()),
      timeoutSeconds: config.builderTimeoutSeconds(),
      image: config.builderImage(),
      network: config.builderNetwork()
    });
  const cacheDir = config.repoCacheDir();
  const openRepo: RepoOpener =
    opts.openRepo ?? ((uri, signal) => GitRepository.open(uri, { cacheDir: cacheDir ? path.resolve(cacheDir) : null, signal }));
  const pipeline = new RebuildPipeline({
    registries,
    builder,
    assets,
    rundex: opened.rundex,
    openRepo,
    mode: opts.mode,
    runId,
    executorVersion: config.executorVersion(),
    timewarpHost: config.timewarpHost(),
    baseImage: config.builderImage(),
    echo: opts.echo
  });
  return {
    runId,
    mode: opts.mode,
    config,
    registries,
    rundex: opened.rundex,
    rundexMode: opened.mode,
    assets,
    openRepo,
    pipeline,
    close: opened.close
  };
}

/**
 * Records the run, then rebuilds every input with the configured concurrency,
 * yielding results in completion order.
 */
export async function* executeRun(
  session: Session,
  inputs: readonly RebuildInput[],
  opts: {
    benchmarkName: string;
    benchmarkHash: string;
    concurrency?: number;
    signal?: AbortSignal;
    onTargetStart?: RunnerOptions["onTargetStart"];
  }
): AsyncGenerator<RunResult> {
  const run: Run = {
    id: session.runId,
    benchmarkName: opts.benchmarkName,
    benchmarkHash: opts.benchmarkHash,
    type: session.mode,
    created: Date.now()
  };
  await session.rundex.writeRun(run);
  yield* runTargets(session.pipeline, inputs, {
    concurrency: opts.concurrency ?? session.config.maxConcurrency(session.mode),
    signal: opts.signal,
    onTargetStart: opts.onTargetStart
  });
}
