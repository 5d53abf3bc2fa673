import { spawn, type SpawnOptions } from "child_process";
import type { ExecutionLimits, ExecutionResult } from "./types.js";

const MAX_CAPTURE_BYTES = 1024 * 1024;

interface CaptureState {
  chunks: Buffer[];
  bytes: number;
  truncated: boolean;
}

// Keeps the last MAX_CAPTURE_BYTES: failure diagnosis reads the tail of the output.
function appendLimited(state: CaptureState, chunk: Buffer): void {
  state.chunks.push(chunk);
  state.bytes += chunk.byteLength;
  while (state.bytes > MAX_CAPTURE_BYTES && state.chunks.length > 1) {
    const dropped = state.chunks.shift();
    state.bytes -= dropped?.byteLength ?? 0;
    state.truncated = true;
  }
}

function render(state: CaptureState, name: string, timedOut: boolean): string {
  return (
    (state.truncated ? `[${name} truncated]\n` : "") +
    Buffer.concat(state.chunks).toString("utf8") +
    (timedOut ? "\n[timeout]\n" : "")
  );
}

/** Spawns `command`, captures both streams, and kills it after the timeout or on abort. */
export async function runCaptured(
  command: string,
  args: string[],
  options: SpawnOptions & { stdin?: string },
  limits: ExecutionLimits,
  onTimeout?: () => void
): Promise<ExecutionResult> {
  const startedAt = new Date().toISOString();
  const child = spawn(command, args, {
    ...options,
    signal: limits.signal,
    stdio: [options.stdin === undefined ? "ignore" : "pipe", "pipe", "pipe"]
  });

  const stdout: CaptureState = { chunks: [], bytes: 0, truncated: false };
  const stderr: CaptureState = { chunks: [], bytes: 0, truncated: false };
  child.stdout?.on("data", (chunk: Buffer) => appendLimited(stdout, chunk));
  child.stderr?.on("data", (chunk: Buffer) => appendLimited(stderr, chunk));
  if (options.stdin !== undefined) child.stdin?.end(options.stdin);

  let timedOut = false;
  const timeoutMs = Math.max(0, Math.floor(limits.timeoutSeconds * 1000));
  const timeout =
    timeoutMs > 0
      ? setTimeout(() => {
          timedOut = true;
          onTimeout?.();
          child.kill("SIGKILL");
        }, timeoutMs)
      : null;

  const exitCode = await new Promise<number>((resolve, reject) => {
    child.on("error", reject);
    child.on("close", (code: number | null) => resolve(code ?? 1));
  }).finally(() => {
    if (timeout) clearTimeout(timeout);
  });

  return {
    exitCode,
    stdout: render(stdout, "stdout", timedOut),
    stderr: render(stderr, "stderr", timedOut),
    timedOut,
    startedAt,
    finishedAt: new Date().toISOString()
  };
}
