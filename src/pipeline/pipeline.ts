import { formatDiff } from "../archive/summary.js";
import { AssetIOError, type Asset, type AssetStore, type AssetType } from "../assets/assetStore.js";
import { sha256Hex, stableJsonStringify } from "../core/canonicalJson.js";
import { buildFailure, isFatal, isRetryable, RebuildError, withStage, type Stage } from "../core/errors.js";
import type { RunId } from "../core/ids.js";
import { targetId, targetLabel, type Target } from "../core/target.js";
import { compareArtifacts, type Comparison } from "../compare/compare.js";
import { renderDockerfile } from "../execution/dockerfile.js";
import type { Builder } from "../execution/builder.js";
import { inferStrategy, needsInference, rebuilderFor, repoUriFor, resolveArtifact, type RepoOpener } from "../inference/index.js";
import type { InferenceContext } from "../inference/types.js";
import type { RegistryMux } from "../registry/mux.js";
import { cancelled } from "../registry/rateLimit.js";
import type { Repository } from "../repo/types.js";
import { rebuildFromVerdict, type Rundex, type RunType, type Timings, type Verdict } from "../rundex/types.js";
import { RebuildLog } from "../runs/rebuildLog.js";
import { stabilize } from "../stabilize/stabilize.js";
import { strategyToJson, strategyToYaml } from "../strategy/definition.js";
import { generateFor } from "../strategy/render.js";
import type { Instructions, Strategy } from "../strategy/types.js";
import type { ToolRegistry } from "../strategy/workflow.js";
import { fetchUpstream } from "./upstream.js";

export type PipelineState = "inferring" | "fetching_upstream" | "building" | "stabilizing" | "comparing" | "done";

const STAGE_TAGS: Readonly<Record<Exclude<PipelineState, "done">, Stage>> = {
  inferring: "inference",
  fetching_upstream: "fetching_upstream",
  building: "build",
  stabilizing: "stabilizing",
  comparing: "comparing"
};

export interface RebuildInput {
  target: Target;
  /** A full strategy skips inference; a LocationHint seeds it. */
  strategy?: Strategy | null;
}

export interface Transition {
  from: PipelineState;
  to: PipelineState;
  ms: number;
}

export interface RebuildOutcome {
  verdict: Verdict;
  transitions: Transition[];
  attempts: number;
}

export interface PipelineDeps {
  registries: RegistryMux;
  builder: Builder;
  assets: AssetStore;
  rundex: Rundex;
  openRepo: RepoOpener;
  mode: RunType;
  runId: RunId;
  executorVersion: string;
  timewarpHost: string | null;
  baseImage: string;
  tools?: ToolRegistry;
  /** Clone durations by repository URL, shared by every worker of a run. */
  cloneEstimates?: Map<string, number>;
  now?: () => number;
  echo?: boolean;
}

interface TargetContext {
  input: RebuildInput;
  target: Target;
  log: RebuildLog;
  infer: InferenceContext;
  signal?: AbortSignal;
  strategy: Strategy | null;
  instructions: Instructions | null;
  upstream: Uint8Array | null;
  rebuild: Uint8Array | null;
  stable: { upstream: Uint8Array; rebuild: Uint8Array } | null;
  comparison: Comparison | null;
  timings: Timings;
  message: string;
}

type Step = (ctx: TargetContext) => Promise<PipelineState>;

/**
 * Rebuilds one target at a time through the fixed state sequence and records the verdict.
 * Fatal errors propagate; any other stage failure becomes the verdict message.
 */
export class RebuildPipeline {
  private readonly now: () => number;
  private readonly cloneEstimates: Map<string, number>;
  private readonly steps: Readonly<Record<Exclude<PipelineState, "done">, Step>>;

  constructor(private readonly deps: PipelineDeps) {
    this.now = deps.now ?? (() => Date.now());
    this.cloneEstimates = deps.cloneEstimates ?? new Map();
    this.steps = {
      inferring: (ctx) => this.inferring(ctx),
      fetching_upstream: (ctx) => this.fetchingUpstream(ctx),
      building: (ctx) => this.building(ctx),
      stabilizing: (ctx) => this.stabilizing(ctx),
      comparing: (ctx) => this.comparing(ctx)
    };
  }

  async rebuild(input: RebuildInput, signal?: AbortSignal): Promise<RebuildOutcome> {
    const log = new RebuildLog({ label: targetLabel(input.target), echo: this.deps.echo });
    let attempt = await this.attempt(input, log, signal);
    let attempts = 1;
    if (attempt.error && isRetryable(attempt.error) && !signal?.aborted) {
      log.event("pipeline.retry", `retrying after transient failure: ${attempt.error.message}`);
      attempt = await this.attempt(input, log, signal);
      attempts = 2;
    }
    const { ctx, transitions } = attempt;
    const verdict: Verdict = {
      target: ctx.target,
      runId: this.deps.runId,
      success: ctx.message === "",
      message: ctx.message,
      strategy: ctx.strategy,
      timings: ctx.timings,
      created: this.now()
    };
    log.event("pipeline.done", verdict.success ? "success" : verdict.message, { attempts });
    await this.record(ctx, verdict);
    return { verdict, transitions, attempts };
  }

  private async attempt(
    input: RebuildInput,
    log: RebuildLog,
    signal?: AbortSignal
  ): Promise<{ ctx: TargetContext; transitions: Transition[]; error: RebuildError | null }> {
    const ctx: TargetContext = {
      input,
      target: input.target,
      log,
      infer: { registries: this.deps.registries, log, signal },
      signal,
      strategy: null,
      instructions: null,
      upstream: null,
      rebuild: null,
      stable: null,
      comparison: null,
      timings: { cloneEstimate: 0, source: 0, infer: 0, build: 0 },
      message: ""
    };
    const transitions: Transition[] = [];
    let error: RebuildError | null = null;
    let state: PipelineState = "inferring";
    while (state !== "done") {
      const from: Exclude<PipelineState, "done"> = state;
      const started = this.now();
      let next: PipelineState;
      try {
        next = await this.steps[from](ctx);
      } catch (e) {
        if (isFatal(e)) throw e;
        if (signal?.aborted) throw cancelled();
        error = withStage(STAGE_TAGS[from], e);
        ctx.message = error.message;
        log.event("pipeline.failed", error.message, { state: from, kind: error.kind });
        next = "done";
      }
      transitions.push({ from, to: next, ms: this.now() - started });
      state = next;
    }
    return { ctx, transitions, error };
  }

  private async openRepo(ctx: TargetContext): Promise<Repository> {
    const uri = await repoUriFor(ctx.target, ctx.input.strategy ?? null, ctx.infer);
    const started = this.now();
    const repository = await this.deps.openRepo(uri, ctx.signal);
    const elapsed = this.now() - started;
    ctx.timings.source = elapsed;
    if (repository.reused) {
      ctx.timings.cloneEstimate = this.cloneEstimates.get(uri) ?? (await this.previousCloneEstimate(ctx.target));
    } else {
      ctx.timings.cloneEstimate = elapsed;
      this.cloneEstimates.set(uri, elapsed);
    }
    ctx.log.event("source.ready", `repository ready in ${elapsed}ms`, { repo: uri, reused: repository.reused ?? false });
    return repository;
  }

  private async previousCloneEstimate(t: Target): Promise<number> {
    const previous = await this.deps.rundex.fetchRebuilds({ target: t, latestPerTarget: true });
    const last = previous[previous.length - 1];
    return last ? last.timings.cloneEstimate * 1000 : 0;
  }

  private async inferring(ctx: TargetContext): Promise<PipelineState> {
    ctx.target = await resolveArtifact(ctx.target, ctx.infer);
    const hint = ctx.input.strategy ?? null;
    const usesRepo = needsInference(hint) && rebuilderFor(ctx.target.ecosystem).usesRepo;
    const repository = usesRepo ? await this.openRepo(ctx) : null;
    let strategy: Strategy;
    try {
      const started = this.now();
      strategy = await inferStrategy(ctx.target, hint, repository, ctx.infer);
      ctx.timings.infer = this.now() - started;
    } finally {
      await repository?.release();
    }
    ctx.strategy = strategy;
    ctx.instructions = generateFor(
      strategy,
      ctx.target,
      { timewarpHost: this.deps.timewarpHost, hasRepo: this.deps.builder.hasRepo },
      this.deps.tools
    );
    return "fetching_upstream";
  }

  private async fetchingUpstream(ctx: TargetContext): Promise<PipelineState> {
    ctx.upstream = await fetchUpstream(this.deps.registries, ctx.target, ctx.signal);
    ctx.log.event("upstream.fetched", `fetched ${ctx.upstream.byteLength} bytes`, { sha256: sha256Hex(ctx.upstream) });
    return "building";
  }

  private async building(ctx: TargetContext): Promise<PipelineState> {
    const instructions = ctx.instructions;
    if (!instructions) throw new RebuildError("Internal", "building without instructions", { fatal: true });
    const started = this.now();
    const outcome = await this.deps.builder.build({
      runId: this.deps.runId,
      target: ctx.target,
      instructions,
      log: ctx.log,
      signal: ctx.signal
    });
    ctx.timings.build = this.now() - started;
    if (!outcome.ok) {
      const classified = rebuilderFor(ctx.target.ecosystem).classifyBuildFailure?.({ stage: outcome.stage, output: outcome.output });
      if (classified) throw buildFailure(classified);
      if (outcome.timedOut) throw buildFailure(`${outcome.stage} stage timed out`);
      throw buildFailure(`${outcome.stage} stage failed with exit code ${outcome.exitCode}`);
    }
    ctx.rebuild = outcome.artifact;
    return "stabilizing";
  }

  private async stabilizing(ctx: TargetContext): Promise<PipelineState> {
    if (!ctx.upstream || !ctx.rebuild) throw new RebuildError("Internal", "stabilizing without artifacts", { fatal: true });
    ctx.stable = {
      upstream: await stabilize(ctx.upstream, ctx.target),
      rebuild: await stabilize(ctx.rebuild, ctx.target)
    };
    return "comparing";
  }

  private async comparing(ctx: TargetContext): Promise<PipelineState> {
    if (!ctx.stable) throw new RebuildError("Internal", "comparing without stabilized artifacts", { fatal: true });
    ctx.comparison = await compareArtifacts(ctx.target, ctx.stable.upstream, ctx.stable.rebuild);
    ctx.message = ctx.comparison.verdict ?? "";
    ctx.log.event("compare.verdict", ctx.comparison.verdict ?? "match", {
      upstreamOnly: ctx.comparison.diff.upstreamOnly.length,
      rebuildOnly: ctx.comparison.diff.rebuildOnly.length,
      diffs: ctx.comparison.diff.diffs.length
    });
    return "done";
  }

  private buildInfo(ctx: TargetContext, verdict: Verdict): string {
    return stableJsonStringify(
      {
        target: ctx.target,
        runId: this.deps.runId,
        executorVersion: this.deps.executorVersion,
        builder: this.deps.builder.kind,
        strategy: ctx.strategy ? strategyToJson(ctx.strategy) : null,
        instructions: ctx.instructions,
        upstreamSha256: ctx.upstream ? sha256Hex(ctx.upstream) : null,
        rebuildSha256: ctx.rebuild ? sha256Hex(ctx.rebuild) : null,
        timings: verdict.timings
      },
      2
    );
  }

  private async record(ctx: TargetContext, verdict: Verdict): Promise<void> {
    const contents = new Map<AssetType, Uint8Array | string>();
    if (ctx.comparison) contents.set("diff", formatDiff(ctx.comparison.diff));
    if (this.deps.mode === "attest") {
      if (ctx.rebuild) contents.set("rebuild", ctx.rebuild);
      if (ctx.upstream) contents.set("upstream", ctx.upstream);
      contents.set("info.json", this.buildInfo(ctx, verdict));
      if (ctx.instructions) contents.set("Dockerfile", renderDockerfile(ctx.instructions, this.deps.baseImage));
      if (ctx.strategy) contents.set("build.yaml", strategyToYaml(ctx.strategy));
    }
    for (const [type, data] of contents) await this.writeAsset({ target: ctx.target, type }, data, ctx.log);
    await this.writeAsset({ target: ctx.target, type: "logs" }, ctx.log.text(), ctx.log);
    await this.deps.rundex.writeRebuild(rebuildFromVerdict(verdict, this.deps.executorVersion));
  }

  private async writeAsset(asset: Asset, data: Uint8Array | string, log: RebuildLog): Promise<void> {
    try {
      await this.deps.assets.write(asset, data);
    } catch (e) {
      if (e instanceof AssetIOError) log.event("asset.write_failed", e.message, { type: asset.type, target: targetId(asset.target) });
      throw e;
    }
  }
}
