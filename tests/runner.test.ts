import { describe, it, expect } from "vitest";
import { internal } from "../src/core/errors.js";
import { newRunId } from "../src/core/ids.js";
import { newTarget } from "../src/core/target.js";
import type { RebuildInput, RebuildOutcome } from "../src/pipeline/pipeline.js";
import { runTargets, type RunResult, type TargetRebuilder } from "../src/pipeline/runner.js";
import { cancelled } from "../src/registry/rateLimit.js";

const runId = newRunId();

function input(pkg: string): RebuildInput {
  return { target: newTarget({ ecosystem: "npm", package: pkg, version: "1.0.0", artifact: `${pkg}-1.0.0.tgz` }) };
}

function outcome(i: RebuildInput): RebuildOutcome {
  return {
    verdict: {
      target: i.target,
      runId,
      success: true,
      message: "",
      strategy: null,
      timings: { cloneEstimate: 0, source: 0, infer: 0, build: 0 },
      created: 0
    },
    transitions: [],
    attempts: 1
  };
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function untilAborted(signal?: AbortSignal): Promise<never> {
  return new Promise<never>((_resolve, reject) => {
    if (signal?.aborted) reject(cancelled());
    signal?.addEventListener("abort", () => reject(cancelled()), { once: true });
  });
}

async function collect(gen: AsyncGenerator<RunResult>): Promise<RunResult[]> {
  const out: RunResult[] = [];
  for await (const r of gen) out.push(r);
  return out;
}

const names = (results: RunResult[]) => results.map((r) => r.input.target.package);

describe("runTargets", () => {
  it.each([0, -1, 1.5])("rejects concurrency %s", async (concurrency) => {
    const pipeline: TargetRebuilder = { rebuild: async (i) => outcome(i) };
    await expect(collect(runTargets(pipeline, [input("a")], { concurrency }))).rejects.toMatchObject({ kind: "Malformed" });
  });

  it("yields nothing for an empty run", async () => {
    const pipeline: TargetRebuilder = { rebuild: async (i) => outcome(i) };
    expect(await collect(runTargets(pipeline, [], { concurrency: 4 }))).toEqual([]);
  });

  it("yields results in completion order within the concurrency limit", async () => {
    const delays: Record<string, number> = { slow: 60, fast: 5, next: 5 };
    let running = 0;
    let peak = 0;
    const pipeline: TargetRebuilder = {
      async rebuild(i) {
        running++;
        peak = Math.max(peak, running);
        await sleep(delays[i.target.package] ?? 0);
        running--;
        return outcome(i);
      }
    };
    const results = await collect(runTargets(pipeline, [input("slow"), input("fast"), input("next")], { concurrency: 2 }));
    expect(names(results)).toEqual(["fast", "next", "slow"]);
    expect(peak).toBe(2);
    expect(results.every((r) => r.error === null && r.outcome?.verdict.success)).toBe(true);
  });

  it("reports a non-fatal error as that target's result", async () => {
    const pipeline: TargetRebuilder = {
      async rebuild(i) {
        if (i.target.package === "broken") throw new Error("rundex unavailable");
        return outcome(i);
      }
    };
    const results = await collect(runTargets(pipeline, [input("broken"), input("fine")], { concurrency: 1 }));
    expect(names(results)).toEqual(["broken", "fine"]);
    expect(results[0]?.outcome).toBeNull();
    expect(results[0]?.error?.kind).toBe("Internal");
    expect(results[0]?.error?.message).toBe("rebuild: rundex unavailable");
    expect(results[1]?.error).toBeNull();
  });

  it("stops the pool on a fatal error and rethrows it", async () => {
    const started: string[] = [];
    const pipeline: TargetRebuilder = {
      async rebuild(i) {
        started.push(i.target.package);
        if (i.target.package === "b") throw internal("invariant broken");
        return outcome(i);
      }
    };
    const seen: string[] = [];
    const run = async () => {
      for await (const r of runTargets(pipeline, [input("a"), input("b"), input("c")], { concurrency: 1 })) {
        seen.push(r.input.target.package);
      }
    };
    await expect(run()).rejects.toMatchObject({ message: "invariant broken", fatal: true });
    expect(started).toEqual(["a", "b"]);
    expect(seen).toEqual(["a"]);
  });

  it("cancels running targets when the run is aborted", async () => {
    const controller = new AbortController();
    const started: string[] = [];
    const pipeline: TargetRebuilder = {
      rebuild(i, signal) {
        started.push(i.target.package);
        return untilAborted(signal);
      }
    };
    let starts = 0;
    const results = await collect(
      runTargets(pipeline, [input("a"), input("b"), input("c")], {
        concurrency: 2,
        signal: controller.signal,
        onTargetStart: () => {
          if (++starts === 2) queueMicrotask(() => controller.abort());
        }
      })
    );
    expect(started).toEqual(["a", "b"]);
    expect(names(results).sort()).toEqual(["a", "b"]);
    expect(results.map((r) => r.error?.message)).toEqual(["cancelled", "cancelled"]);
  });

  it("starts nothing when the run is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const started: string[] = [];
    const pipeline: TargetRebuilder = {
      async rebuild(i) {
        started.push(i.target.package);
        return outcome(i);
      }
    };
    const results = await collect(runTargets(pipeline, [input("a"), input("b"), input("c")], { concurrency: 2, signal: controller.signal }));
    expect(started).toEqual([]);
    expect(results).toEqual([]);
  });

  it("aborts a single target without stopping the others", async () => {
    const pipeline: TargetRebuilder = {
      async rebuild(i, signal) {
        if (i.target.package === "stuck") return untilAborted(signal);
        await sleep(5);
        return outcome(i);
      }
    };
    const results = await collect(
      runTargets(pipeline, [input("stuck"), input("ok")], {
        concurrency: 2,
        onTargetStart: (i, abort) => {
          if (i.target.package === "stuck") setTimeout(abort, 20);
        }
      })
    );
    expect(names(results)).toEqual(["ok", "stuck"]);
    expect(results[1]?.error?.message).toBe("cancelled");
  });

  it("aborts what is still running when the consumer stops early", async () => {
    const signals: AbortSignal[] = [];
    const pipeline: TargetRebuilder = {
      async rebuild(i, signal) {
        if (signal) signals.push(signal);
        if (i.target.package === "quick") return outcome(i);
        return untilAborted(signal);
      }
    };
    for await (const r of runTargets(pipeline, [input("quick"), input("hang")], { concurrency: 2 })) {
      expect(r.input.target.package).toBe("quick");
      break;
    }
    expect(signals.map((s) => s.aborted)).toEqual([false, true]);
  });
});
