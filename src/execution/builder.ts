import { promises as fs } from "fs";
import path from "path";
import { sha256Hex } from "../core/canonicalJson.js";
import { buildFailure, errorMessage } from "../core/errors.js";
import type { RunId } from "../core/ids.js";
import { targetId, type Target } from "../core/target.js";
import type { RebuildLog } from "../runs/rebuildLog.js";
import type { Instructions } from "../strategy/types.js";
import { DockerRunner } from "./backends/dockerRunner.js";
import { LocalProcessRunner } from "./backends/localProcess.js";
import type { ExecutionResult, RunnerBackend } from "./backends/types.js";
import { renderDockerfile } from "./dockerfile.js";
import { createBuildWorkspace, type BuildWorkspace } from "./workspace.js";

export type BuildStage = "source" | "deps" | "build";

export interface BuildRequest {
  runId: RunId;
  target: Target;
  instructions: Instructions;
  log: RebuildLog;
  signal?: AbortSignal;
}

export type BuildOutcome =
  | { ok: true; artifact: Uint8Array }
  | { ok: false; stage: BuildStage; exitCode: number; timedOut: boolean; output: string };

export interface Builder {
  readonly kind: "local" | "docker";
  /** Whether the builder provides a clone of the repository before the source stage runs. */
  readonly hasRepo: boolean;
  build(req: BuildRequest): Promise<BuildOutcome>;
}

export interface BuilderOptions {
  workDir: string;
  timeoutSeconds: number;
}

function combined(res: ExecutionResult): string {
  return [res.stdout, res.stderr].filter(Boolean).join("\n");
}

async function readArtifact(file: string): Promise<Uint8Array> {
  try {
    return new Uint8Array(await fs.readFile(file));
  } catch (e) {
    throw buildFailure(`failed to locate artifact: ${errorMessage(e)}`);
  }
}

class Deadline {
  private readonly end: number;

  constructor(seconds: number) {
    this.end = Date.now() + seconds * 1000;
  }

  remaining(): number {
    return Math.max(1, (this.end - Date.now()) / 1000);
  }
}

/**
 * Runs the stage scripts with bash on the host, in a per-target workspace.
 * The repository is cloned into the workspace first, so scripts only check out the ref.
 */
export class LocalBuilder implements Builder {
  readonly kind = "local" as const;
  readonly hasRepo = true;
  private readonly runner: RunnerBackend<"local_process">;

  constructor(
    private readonly opts: BuilderOptions & { runner?: RunnerBackend<"local_process"> }
  ) {
    this.runner = opts.runner ?? new LocalProcessRunner();
  }

  private async stage(
    ws: BuildWorkspace,
    stage: BuildStage,
    script: string,
    deadline: Deadline,
    req: BuildRequest
  ): Promise<BuildOutcome | null> {
    if (!script.trim()) return null;
    const scriptPath = ws.metaPath(`${stage}.sh`);
    await fs.writeFile(scriptPath, `set -eux\n${script}\n`, "utf8");
    const res = await this.runner.execute(
      { kind: "local_process", argv: ["bash", scriptPath], cwd: ws.srcDir },
      { timeoutSeconds: deadline.remaining(), signal: req.signal }
    );
    req.log.event("build.exit", `${stage} exited with ${res.exitCode}`, { stage, exitCode: res.exitCode, timedOut: res.timedOut });
    if (res.exitCode === 0) return null;
    return { ok: false, stage, exitCode: res.exitCode, timedOut: res.timedOut, output: combined(res) };
  }

  async build(req: BuildRequest): Promise<BuildOutcome> {
    const ws = await createBuildWorkspace(this.opts.workDir, req.runId, req.target);
    try {
      return await this.buildIn(ws, req);
    } finally {
      await ws.release();
    }
  }

  private async buildIn(ws: BuildWorkspace, req: BuildRequest): Promise<BuildOutcome> {
    const deadline = new Deadline(this.opts.timeoutSeconds);
    const { instructions } = req;
    req.log.event("build.start", `local build in ${ws.rootDir}`, { systemDeps: instructions.systemDeps });

    if (instructions.location.repo) {
      const clone = await this.runner.execute(
        { kind: "local_process", argv: ["git", "clone", "--quiet", "--", instructions.location.repo, ws.srcDir] },
        { timeoutSeconds: deadline.remaining(), signal: req.signal }
      );
      req.log.event("build.clone", `clone exited with ${clone.exitCode}`, { repo: instructions.location.repo });
      if (clone.exitCode !== 0) {
        return { ok: false, stage: "source", exitCode: clone.exitCode, timedOut: clone.timedOut, output: combined(clone) };
      }
    }

    for (const stage of ["source", "deps", "build"] as const) {
      const failed = await this.stage(ws, stage, instructions[stage], deadline, req);
      if (failed) return failed;
    }
    return { ok: true, artifact: await readArtifact(ws.srcPath(instructions.outputPath)) };
  }
}

/**
 * Builds an image from the rendered Dockerfile (source and deps), then runs its build entrypoint
 * with the workspace's `out/` mounted at `/out`.
 */
export class DockerBuilder implements Builder {
  readonly kind = "docker" as const;
  readonly hasRepo = false;
  private readonly process: RunnerBackend<"local_process">;
  private readonly docker: RunnerBackend<"docker">;

  constructor(
    private readonly opts: BuilderOptions & {
      image: string;
      network: "none" | "bridge" | "host";
      process?: RunnerBackend<"local_process">;
      docker?: RunnerBackend<"docker">;
    }
  ) {
    this.process = opts.process ?? new LocalProcessRunner();
    this.docker = opts.docker ?? new DockerRunner();
  }

  async build(req: BuildRequest): Promise<BuildOutcome> {
    const ws = await createBuildWorkspace(this.opts.workDir, req.runId, req.target);
    try {
      return await this.buildIn(ws, req);
    } finally {
      await ws.release();
    }
  }

  private async buildIn(ws: BuildWorkspace, req: BuildRequest): Promise<BuildOutcome> {
    const deadline = new Deadline(this.opts.timeoutSeconds);
    const dockerfile = ws.metaPath("Dockerfile");
    await fs.writeFile(dockerfile, renderDockerfile(req.instructions, this.opts.image), "utf8");
    const tag = `rebuild-${sha256Hex(`${req.runId}|${targetId(req.target)}`).slice(0, 16)}`;
    const network = this.opts.network === "none" ? "none" : "default";

    const image = await this.process.execute(
      { kind: "local_process", argv: ["docker", "build", "--network", network, "-t", tag, "-f", dockerfile, ws.metaDir] },
      { timeoutSeconds: deadline.remaining(), signal: req.signal }
    );
    req.log.event("build.exit", `docker build exited with ${image.exitCode}`, { stage: "deps", exitCode: image.exitCode });
    if (image.exitCode !== 0) {
      return { ok: false, stage: "deps", exitCode: image.exitCode, timedOut: image.timedOut, output: combined(image) };
    }

    try {
      const run = await this.docker.execute(
        {
          kind: "docker",
          image: tag,
          argv: ["/bin/sh", "/build"],
          containerName: tag,
          network: this.opts.network,
          mounts: [{ hostPath: ws.outDir, containerPath: "/out" }]
        },
        { timeoutSeconds: deadline.remaining(), signal: req.signal }
      );
      req.log.event("build.exit", `docker run exited with ${run.exitCode}`, { stage: "build", exitCode: run.exitCode });
      if (run.exitCode !== 0) {
        return { ok: false, stage: "build", exitCode: run.exitCode, timedOut: run.timedOut, output: combined(run) };
      }
      return { ok: true, artifact: await readArtifact(ws.outPath(path.posix.basename(req.instructions.outputPath))) };
    } finally {
      const rmi = await this.process.execute({ kind: "local_process", argv: ["docker", "rmi", "-f", tag] }, { timeoutSeconds: 60 });
      if (rmi.exitCode !== 0) req.log.event("build.cleanup_failed", `docker rmi exited with ${rmi.exitCode}`, { image: tag });
    }
  }
}

export function createBuilder(kind: "local" | "docker", opts: BuilderOptions & { image: string; network: "none" | "bridge" | "host" }): Builder {
  return kind === "docker" ? new DockerBuilder(opts) : new LocalBuilder(opts);
}
