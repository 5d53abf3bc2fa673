import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import type { RunId } from "../src/core/ids.js";
import { openRundex, type OpenedRundex } from "../src/rundex/index.js";
import { cleanVerdictMessage } from "../src/rundex/filter.js";
import { FilesystemRundex } from "../src/rundex/filesystemRundex.js";
import type { FetchRebuildsRequest, Rebuild, Run } from "../src/rundex/types.js";
import type { Strategy } from "../src/strategy/types.js";

const customBuild: Strategy = {
  kind: "NPMCustomBuild",
  location: { repo: "https://github.com/test-org/left-pad", ref: "abc123", dir: "." },
  npmVersion: "8.2.0",
  nodeVersion: "16.13.0",
  command: "build",
  registryTime: new Date("2023-02-10T10:00:00Z"),
  prepackRemoveDeps: true,
  keepRoot: false
};

function run(id: RunId, created: number, benchmarkHash = "sha256:aaa"): Run {
  return { id, benchmarkName: "smoke.json", benchmarkHash, type: "smoketest", created };
}

function rebuild(runId: RunId, pkg: string, created: number, fields: Partial<Rebuild> = {}): Rebuild {
  return {
    ecosystem: "npm",
    package: pkg,
    version: "1.0.0",
    artifact: `${pkg}-1.0.0.tgz`,
    success: true,
    message: "",
    strategy: null,
    timings: { cloneEstimate: 1.5, source: 0.25, infer: 0.5, build: 12 },
    executorVersion: "v1",
    runId,
    created,
    ...fields
  };
}

const TSC_MISSING = "build: unknown npm pack failure:\nsh: tsc: not found";

const label = (rs: Rebuild[]) => rs.map((r) => `${r.runId}/${r.package}`);

let root: string;
let opened: OpenedRundex | null = null;

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), "rundex-test-"));
});

afterEach(async () => {
  await opened?.close();
  opened = null;
  await fs.rm(root, { recursive: true, force: true });
});

describe.each(["filesystem", "pg-mem"] as const)("%s rundex", (fallback) => {
  async function seeded(): Promise<OpenedRundex> {
    opened = await openRundex({ storageRoot: root, databaseUrl: null, fallback });
    const { rundex } = opened;
    await rundex.writeRun(run("run_b", 200, "sha256:bbb"));
    await rundex.writeRun(run("run_a", 100));
    await rundex.writeRebuild(rebuild("run_a", "left-pad", 110, { strategy: customBuild }));
    await rundex.writeRebuild(rebuild("run_a", "right-pad", 120, { success: false, message: TSC_MISSING }));
    await rundex.writeRebuild(
      rebuild("run_b", "left-pad", 210, { success: false, message: "content differences found", executorVersion: "v2" })
    );
    return opened;
  }

  it("opens in the requested mode", async () => {
    expect((await seeded()).mode).toBe(fallback);
  });

  it("lists runs oldest first and filters them", async () => {
    const { rundex } = await seeded();
    expect((await rundex.fetchRuns()).map((r) => r.id)).toEqual(["run_a", "run_b"]);
    expect((await rundex.fetchRuns({ ids: ["run_b"] })).map((r) => r.id)).toEqual(["run_b"]);
    expect((await rundex.fetchRuns({ benchmarkHash: "sha256:aaa" })).map((r) => r.id)).toEqual(["run_a"]);
    expect(await rundex.fetchRuns({ ids: ["run_a"] })).toEqual([run("run_a", 100)]);
  });

  it("replaces a run written twice", async () => {
    const { rundex } = await seeded();
    await rundex.writeRun({ ...run("run_a", 100), type: "attest" });
    expect((await rundex.fetchRuns({ ids: ["run_a"] })).map((r) => r.type)).toEqual(["attest"]);
  });

  it("returns rebuilds ordered by target then creation time", async () => {
    const { rundex } = await seeded();
    expect(label(await rundex.fetchRebuilds())).toEqual(["run_a/left-pad", "run_b/left-pad", "run_a/right-pad"]);
  });

  it("keeps the strategy and timings of a record", async () => {
    const { rundex } = await seeded();
    const [stored] = await rundex.fetchRebuilds({ runs: ["run_a"], target: { package: "left-pad" } });
    expect(stored).toEqual(rebuild("run_a", "left-pad", 110, { strategy: customBuild }));
  });

  it.each<[string, FetchRebuildsRequest, string[]]>([
    ["runs", { runs: ["run_b"] }, ["run_b/left-pad"]],
    ["executors", { executors: ["v1"] }, ["run_a/left-pad", "run_a/right-pad"]],
    ["target", { target: { ecosystem: "npm", package: "left-pad" } }, ["run_a/left-pad", "run_b/left-pad"]],
    ["prefix", { prefix: "build:" }, ["run_a/right-pad"]],
    ["pattern", { pattern: "differ(ences)?" }, ["run_b/left-pad"]],
    ["latest per target", { latestPerTarget: true }, ["run_b/left-pad", "run_a/right-pad"]]
  ])("filters by %s", async (_name, req, want) => {
    const { rundex } = await seeded();
    expect(label(await rundex.fetchRebuilds(req))).toEqual(want);
  });

  it("cleans messages on request", async () => {
    const { rundex } = await seeded();
    const cleaned = await rundex.fetchRebuilds({ clean: true, target: { package: "right-pad" } });
    expect(cleaned.map((r) => r.message)).toEqual(["missing build tool: tsc"]);
  });

  it("rejects an invalid pattern", async () => {
    const { rundex } = await seeded();
    await expect(rundex.fetchRebuilds({ pattern: "(" })).rejects.toMatchObject({ kind: "Malformed" });
  });

  it("replaces a rebuild written twice for the same run and target", async () => {
    const { rundex } = await seeded();
    await rundex.writeRebuild(rebuild("run_a", "left-pad", 130, { success: false, message: "comparing: retry exhausted" }));
    const stored = await rundex.fetchRebuilds({ runs: ["run_a"], target: { package: "left-pad" } });
    expect(stored.map((r) => [r.message, r.created, r.strategy])).toEqual([["comparing: retry exhausted", 130, null]]);
  });
});

describe("FilesystemRundex", () => {
  it("stores records under the run and encoded target", async () => {
    const rundex = new FilesystemRundex(root);
    const r = rebuild("run_a", "@test/pkg", 1);
    await rundex.writeRebuild(r);
    const file = path.join(root, "rundex", "runs_metadata", "run_a", "npm", "test!pkg", "1.0.0", "test!pkg-1.0.0.tgz", "firestore.json");
    expect(rundex.rebuildPath(r)).toBe(file);
    expect(JSON.parse(await fs.readFile(file, "utf8"))).toMatchObject({ package: "@test/pkg", strategy: null });
    await rundex.writeRun(run("run_a", 1));
    expect(await fs.readdir(path.join(root, "rundex", "runs"))).toEqual(["run_a.json"]);
  });

  it("returns nothing before anything is written", async () => {
    const rundex = new FilesystemRundex(root);
    expect(await rundex.fetchRuns()).toEqual([]);
    expect(await rundex.fetchRebuilds()).toEqual([]);
  });

  it("rejects a corrupt record", async () => {
    const rundex = new FilesystemRundex(root);
    await fs.mkdir(path.join(root, "rundex", "runs"), { recursive: true });
    await fs.writeFile(path.join(root, "rundex", "runs", "run_x.json"), JSON.stringify({ id: "not-a-run" }));
    await expect(rundex.fetchRuns()).rejects.toMatchObject({ kind: "Malformed" });
  });
});

describe("cleanVerdictMessage", () => {
  it.each([
    ["inference: clone failed: exit status 128", "repo: clone failed"],
    ["inference: mismatched version 1.0.1 in package.json", "wrong package version in manifest"],
    ["inference: unsupported repo type: ftp://example.test/x", "repo: bad repo URL"],
    ["build: unknown npm pack failure:\nsomething odd", "unknown pack failure"],
    ["inference: unsupported generator: mystery 1.0", "unsupported generator: mystery 1.0"],
    ["build: deps stage failed with exit code 2", "build: deps stage failed with exit code 2"],
    ["line one\nline two", "line one\\nline two"]
  ])("maps %j to %j", (message, want) => {
    expect(cleanVerdictMessage(message)).toBe(want);
  });
});
