import { internal } from "../../core/errors.js";
import { runCaptured } from "./capture.js";
import type { ExecutionLimits, ExecutionResult, LocalProcessSpec, RunnerBackend } from "./types.js";

export class LocalProcessRunner implements RunnerBackend<"local_process"> {
  readonly kind = "local_process" as const;

  async execute(spec: LocalProcessSpec, limits: ExecutionLimits): Promise<ExecutionResult> {
    const [command, ...args] = spec.argv;
    if (!command) throw internal("local_process argv must be non-empty");
    return runCaptured(command, args, { cwd: spec.cwd, env: { ...process.env, ...spec.env }, stdin: spec.stdin }, limits);
  }
}
