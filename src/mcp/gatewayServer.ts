import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import path from "path";
import { targetsHash } from "../benchmark/benchmark.js";
import type { RebuildConfig } from "../config/config.js";
import { errorKind, errorMessage } from "../core/errors.js";
import type { JsonObject } from "../core/json.js";
import { newTarget, targetLabel, type Target } from "../core/target.js";
import type { Builder } from "../execution/builder.js";
import { inferTarget, type RepoOpener } from "../inference/index.js";
import type { RebuildInput } from "../pipeline/pipeline.js";
import { executeRun, openSession } from "../pipeline/session.js";
import type { FetchFn } from "../registry/http.js";
import { createRegistryMux } from "../registry/mux.js";
import { RateLimiters } from "../registry/rateLimit.js";
import { GitRepository } from "../repo/gitRepository.js";
import type { RundexMode } from "../rundex/index.js";
import type { Rebuild, Run, Rundex, Timings } from "../rundex/types.js";
import { RebuildLog } from "../runs/rebuildLog.js";
import { parseStrategyYaml, strategyToJson, strategyToYaml } from "../strategy/definition.js";
import {
  zRebuildInferInput,
  zRebuildInferOutput,
  zRebuildSmoketestInput,
  zRebuildSmoketestOutput,
  zRundexListRebuildsInput,
  zRundexListRebuildsOutput,
  zRundexListRunsInput,
  zRundexListRunsOutput
} from "./toolSchemas.js";

export interface GatewayDeps {
  config: RebuildConfig;
  rundex: { rundex: Rundex; mode: RundexMode };
  fetch?: FetchFn;
  builder?: Builder;
  openRepo?: RepoOpener;
}

function toMcpError(e: unknown): McpError {
  if (e instanceof McpError) return e;
  const kind = errorKind(e);
  const code = kind === "Malformed" || kind === "Unsupported" ? ErrorCode.InvalidParams : ErrorCode.InternalError;
  return new McpError(code, errorMessage(e));
}

function timingsJson(t: Timings): JsonObject {
  return { clone_estimate: t.cloneEstimate, source: t.source, infer: t.infer, build: t.build };
}

function toRunSummary(r: Run): JsonObject {
  return {
    run_id: r.id,
    benchmark_name: r.benchmarkName,
    benchmark_hash: r.benchmarkHash,
    type: r.type,
    created: r.created
  };
}

function toRebuildSummary(r: Rebuild): JsonObject {
  return {
    run_id: r.runId,
    ecosystem: r.ecosystem,
    package: r.package,
    version: r.version,
    artifact: r.artifact,
    success: r.success,
    message: r.message,
    strategy_kind: r.strategy?.kind ?? null,
    executor_version: r.executorVersion,
    timings: timingsJson(r.timings),
    created: r.created
  };
}

function inputFrom(args: { ecosystem: string; package: string; version: string; artifact?: string; strategy_yaml?: string }): RebuildInput {
  const target: Target = newTarget(args);
  return { target, strategy: args.strategy_yaml ? parseStrategyYaml(args.strategy_yaml, "strategy_yaml") : null };
}

export function createGatewayServer(deps: GatewayDeps): McpServer {
  const mcp = new McpServer({
    name: "rebuild-orchestrator-gateway",
    version: "0.3.0"
  });

  const registries = createRegistryMux({ fetch: deps.fetch, limiters: new RateLimiters(deps.config.rateLimits()) });
  const cacheDir = deps.config.repoCacheDir();
  const openRepo: RepoOpener =
    deps.openRepo ?? ((uri, signal) => GitRepository.open(uri, { cacheDir: cacheDir ? path.resolve(cacheDir) : null, signal }));

  mcp.registerTool(
    "rebuild_infer",
    {
      description: "Infer the build strategy for a released package version without building it.",
      inputSchema: zRebuildInferInput,
      outputSchema: zRebuildInferOutput
    },
    async (args, extra) => {
      try {
        const input = inputFrom(args);
        const log = new RebuildLog({ label: targetLabel(input.target) });
        const { target, strategy } = await inferTarget(
          input.target,
          input.strategy ?? null,
          { registries, log, signal: extra.signal },
          openRepo
        );
        const structured: JsonObject = {
          target: { ...target },
          strategy_kind: strategy.kind,
          strategy: strategyToJson(strategy),
          strategy_yaml: strategyToYaml(strategy)
        };
        return {
          content: [{ type: "text", text: `Inferred ${strategy.kind} for ${targetLabel(target)}` }],
          structuredContent: structured
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "rebuild_smoketest",
    {
      description: "Rebuild one package version locally and compare it with the published artifact. Results are recorded, not published.",
      inputSchema: zRebuildSmoketestInput,
      outputSchema: zRebuildSmoketestOutput
    },
    async (args, extra) => {
      try {
        const input = inputFrom(args);
        const session = await openSession(deps.config, {
          mode: "smoketest",
          fetch: deps.fetch,
          builder: deps.builder,
          openRepo,
          rundex: deps.rundex
        });
        try {
          for await (const res of executeRun(session, [input], {
            benchmarkName: targetLabel(input.target),
            benchmarkHash: targetsHash([input.target]),
            concurrency: 1,
            signal: extra.signal
          })) {
            if (!res.outcome) throw res.error ?? new McpError(ErrorCode.InternalError, "rebuild produced no result");
            const v = res.outcome.verdict;
            const structured: JsonObject = {
              run_id: session.runId,
              target: { ...v.target },
              success: v.success,
              message: v.message,
              strategy: v.strategy ? strategyToJson(v.strategy) : null,
              timings: timingsJson(v.timings),
              attempts: res.outcome.attempts
            };
            return {
              content: [{ type: "text", text: v.success ? `Rebuilt ${targetLabel(v.target)}` : `Rebuild failed: ${v.message}` }],
              structuredContent: structured
            };
          }
        } finally {
          await session.close();
        }
        throw new McpError(ErrorCode.InternalError, "rebuild produced no result");
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "rundex_list_runs",
    {
      description: "List recorded runs, optionally by id or benchmark hash.",
      inputSchema: zRundexListRunsInput,
      outputSchema: zRundexListRunsOutput
    },
    async (args) => {
      try {
        const runs = await deps.rundex.rundex.fetchRuns({
          ids: args.ids,
          benchmarkHash: args.benchmark_hash
        });
        return {
          content: [{ type: "text", text: `${runs.length} run(s)` }],
          structuredContent: { runs: runs.map(toRunSummary) }
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "rundex_list_rebuilds",
    {
      description: "List recorded rebuild verdicts, filtered by run, target and message.",
      inputSchema: zRundexListRebuildsInput,
      outputSchema: zRundexListRebuildsOutput
    },
    async (args) => {
      try {
        const rebuilds = await deps.rundex.rundex.fetchRebuilds({
          runs: args.runs,
          executors: args.executors,
          target: {
            ecosystem: args.ecosystem,
            package: args.package,
            version: args.version,
            artifact: args.artifact
          },
          prefix: args.prefix,
          pattern: args.pattern,
          latestPerTarget: args.latest_per_target,
          clean: args.clean
        });
        const shown = rebuilds.slice(0, args.limit);
        return {
          content: [{ type: "text", text: `${rebuilds.length} rebuild(s)` }],
          structuredContent: { rebuilds: shown.map(toRebuildSummary), truncated: shown.length < rebuilds.length }
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  return mcp;
}
