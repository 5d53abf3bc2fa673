import { spawn } from "child_process";
import { internal } from "../../core/errors.js";
import { runCaptured } from "./capture.js";
import type { DockerSpec, ExecutionLimits, ExecutionResult, RunnerBackend } from "./types.js";

export function dockerRunArgs(spec: DockerSpec): string[] {
  const args: string[] = ["run", "--rm"];
  if (spec.containerName) args.push("--name", spec.containerName);
  args.push("--network", spec.network ?? "none");
  for (const [k, v] of Object.entries(spec.env ?? {})) args.push("--env", `${k}=${v}`);
  for (const m of spec.mounts ?? []) {
    args.push("--volume", `${m.hostPath}:${m.containerPath}:${m.readOnly ? "ro" : "rw"}`);
  }
  if (spec.user) args.push("--user", spec.user);
  if (spec.workdir) args.push("--workdir", spec.workdir);
  args.push(spec.image, ...spec.argv);
  return args;
}

export class DockerRunner implements RunnerBackend<"docker"> {
  readonly kind = "docker" as const;

  async execute(spec: DockerSpec, limits: ExecutionLimits): Promise<ExecutionResult> {
    if (!spec.image) throw internal("docker image must be non-empty");
    if (!spec.argv.length) throw internal("docker argv must be non-empty");
    const name = spec.containerName;
    return runCaptured("docker", dockerRunArgs(spec), {}, limits, () => {
      if (!name) return;
      const rm = spawn("docker", ["rm", "-f", name], { stdio: "ignore" });
      rm.unref();
    });
  }
}
