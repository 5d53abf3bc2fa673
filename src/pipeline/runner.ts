import { isFatal, RebuildError, wrap } from "../core/errors.js";
import type { RebuildInput, RebuildOutcome } from "./pipeline.js";

export interface RunResult {
  input: RebuildInput;
  /** Null when the pipeline failed outside any stage, e.g. while recording the verdict. */
  outcome: RebuildOutcome | null;
  error: RebuildError | null;
}

export interface TargetRebuilder {
  rebuild(input: RebuildInput, signal?: AbortSignal): Promise<RebuildOutcome>;
}

export interface RunnerOptions {
  concurrency: number;
  signal?: AbortSignal;
  /** Receives each target's own abort function as the target starts. */
  onTargetStart?: (input: RebuildInput, abort: () => void) => void;
}

/**
 * Rebuilds `inputs` with a fixed pool of workers and yields each result as it completes.
 * Each target runs under its own AbortController, linked to the run's signal.
 * A fatal error stops the pool and is rethrown once the running targets settle.
 */
export async function* runTargets(
  pipeline: TargetRebuilder,
  inputs: readonly RebuildInput[],
  opts: RunnerOptions
): AsyncGenerator<RunResult> {
  if (!Number.isInteger(opts.concurrency) || opts.concurrency < 1) {
    throw new RebuildError("Malformed", `concurrency must be an integer >= 1 (got ${opts.concurrency})`);
  }
  const run = new AbortController();
  const stopRun = () => run.abort();
  if (opts.signal?.aborted) run.abort();
  else opts.signal?.addEventListener("abort", stopRun, { once: true });

  const results: RunResult[] = [];
  let nextIndex = 0;
  let fatal: unknown = null;
  let finished = false;
  let wake: (() => void) | null = null;
  const notify = () => {
    const w = wake;
    wake = null;
    w?.();
  };

  const worker = async (): Promise<void> => {
    while (nextIndex < inputs.length && !run.signal.aborted && fatal === null) {
      const input = inputs[nextIndex++];
      if (!input) break;
      const target = new AbortController();
      const stopTarget = () => target.abort();
      run.signal.addEventListener("abort", stopTarget, { once: true });
      opts.onTargetStart?.(input, stopTarget);
      try {
        results.push({ input, outcome: await pipeline.rebuild(input, target.signal), error: null });
      } catch (e) {
        if (isFatal(e)) {
          fatal = e;
          run.abort();
        } else {
          results.push({ input, outcome: null, error: e instanceof RebuildError ? e : wrap(e, "rebuild") });
        }
      } finally {
        run.signal.removeEventListener("abort", stopTarget);
        notify();
      }
    }
  };

  const pool = Promise.all(Array.from({ length: Math.min(opts.concurrency, inputs.length) }, () => worker())).then(() => {
    finished = true;
    notify();
  });

  try {
    for (;;) {
      let next = results.shift();
      while (next) {
        yield next;
        next = results.shift();
      }
      if (finished) break;
      await new Promise<void>((resolve) => {
        wake = resolve;
      });
    }
  } finally {
    if (!finished) run.abort();
    await pool;
    opts.signal?.removeEventListener("abort", stopRun);
  }
  if (fatal !== null) throw fatal;
}
