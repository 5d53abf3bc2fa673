import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { internal } from "../src/core/errors.js";
import { newRunId } from "../src/core/ids.js";
import { newTarget } from "../src/core/target.js";
import type { DockerSpec, ExecutionResult, LocalProcessSpec, RunnerBackend } from "../src/execution/backends/types.js";
import { DockerBuilder, LocalBuilder, type BuildRequest } from "../src/execution/builder.js";
import { RebuildLog } from "../src/runs/rebuildLog.js";
import type { Instructions } from "../src/strategy/types.js";

const ARTIFACT = new TextEncoder().encode("rebuilt artifact");

const instructions: Instructions = {
  location: { repo: "https://github.com/test-org/demo", ref: "0123456789abcdef0123456789abcdef01234567", dir: "." },
  systemDeps: ["git", "npm"],
  source: "git checkout --force 0123456789abcdef0123456789abcdef01234567",
  deps: "npm install",
  build: "npm pack",
  outputPath: "demo-1.0.0.tgz"
};

function result(exitCode: number): ExecutionResult {
  return { exitCode, stdout: "", stderr: exitCode ? "boom" : "", timedOut: false, startedAt: "", finishedAt: "" };
}

/** Runs nothing; records the working dirs it saw and lets each stage script choose its outcome. */
class FakeProcessRunner implements RunnerBackend<"local_process"> {
  readonly kind = "local_process" as const;
  readonly cwds: string[] = [];

  constructor(private readonly onStage: (stage: string, cwd: string) => Promise<ExecutionResult>) {}

  async execute(spec: LocalProcessSpec): Promise<ExecutionResult> {
    const [command, arg] = spec.argv;
    if (command !== "bash" || !arg || !spec.cwd) return result(0);
    this.cwds.push(spec.cwd);
    return this.onStage(path.basename(arg, ".sh"), spec.cwd);
  }
}

async function exists(p: string): Promise<boolean> {
  return fs.stat(p).then(
    () => true,
    () => false
  );
}

describe("builders", () => {
  let workDir: string;
  let req: BuildRequest;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), "builder-test-"));
    req = {
      runId: newRunId(),
      target: newTarget({ ecosystem: "npm", package: "demo", version: "1.0.0" }),
      instructions,
      log: new RebuildLog()
    };
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  const targetRoot = () => path.join(workDir, req.runId, "npm", "demo", "1.0.0", "demo-1.0.0.tgz");

  it("removes the local workspace after a successful build", async () => {
    const runner = new FakeProcessRunner(async (stage, cwd) => {
      if (stage === "build") await fs.writeFile(path.join(cwd, "demo-1.0.0.tgz"), ARTIFACT);
      return result(0);
    });
    const outcome = await new LocalBuilder({ workDir, timeoutSeconds: 60, runner }).build(req);
    expect(outcome).toEqual({ ok: true, artifact: ARTIFACT });
    expect(runner.cwds).toEqual([path.join(targetRoot(), "src"), path.join(targetRoot(), "src"), path.join(targetRoot(), "src")]);
    expect(await exists(targetRoot())).toBe(false);
  });

  it("removes the local workspace after a failed stage", async () => {
    const runner = new FakeProcessRunner(async (stage) => result(stage === "deps" ? 2 : 0));
    const outcome = await new LocalBuilder({ workDir, timeoutSeconds: 60, runner }).build(req);
    expect(outcome).toEqual({ ok: false, stage: "deps", exitCode: 2, timedOut: false, output: "boom" });
    expect(await exists(targetRoot())).toBe(false);
  });

  it("removes the local workspace when a stage throws", async () => {
    const runner = new FakeProcessRunner(async (stage) => {
      if (stage === "build") throw internal("runner crashed");
      return result(0);
    });
    await expect(new LocalBuilder({ workDir, timeoutSeconds: 60, runner }).build(req)).rejects.toThrow("runner crashed");
    expect(await exists(targetRoot())).toBe(false);
  });

  it("removes the docker workspace and image after a build", async () => {
    const commands: string[] = [];
    const host: RunnerBackend<"local_process"> = {
      kind: "local_process",
      execute: async (spec: LocalProcessSpec) => {
        commands.push(spec.argv.slice(0, 2).join(" "));
        return result(0);
      }
    };
    const docker: RunnerBackend<"docker"> = {
      kind: "docker",
      execute: async (spec: DockerSpec) => {
        const out = spec.mounts?.find((m) => m.containerPath === "/out");
        if (out) await fs.writeFile(path.join(out.hostPath, "demo-1.0.0.tgz"), ARTIFACT);
        return result(0);
      }
    };
    const builder = new DockerBuilder({ workDir, timeoutSeconds: 60, image: "docker.io/library/alpine:3.19", network: "none", process: host, docker });
    expect(await builder.build(req)).toEqual({ ok: true, artifact: ARTIFACT });
    expect(commands).toEqual(["docker build", "docker rmi"]);
    expect(await exists(targetRoot())).toBe(false);
  });
});
