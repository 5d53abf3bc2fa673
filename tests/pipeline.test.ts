import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { LocalAssetStore, type AssetType } from "../src/assets/assetStore.js";
import { internal, RebuildError } from "../src/core/errors.js";
import { newRunId } from "../src/core/ids.js";
import { newTarget, type Target } from "../src/core/target.js";
import type { Builder, BuildOutcome, BuildRequest } from "../src/execution/builder.js";
import { RebuildPipeline, type PipelineDeps } from "../src/pipeline/pipeline.js";
import type { FetchFn } from "../src/registry/http.js";
import { createRegistryMux } from "../src/registry/mux.js";
import { MemoryRepository } from "../src/repo/memoryRepository.js";
import { FilesystemRundex } from "../src/rundex/filesystemRundex.js";
import type { Strategy } from "../src/strategy/types.js";
import { tgz } from "./helpers/archives.js";
import { fakeFetch, fakeRegistries, type Route } from "./helpers/fakeFetch.js";

const REPO_URL = "https://github.com/test-org/test-package";
const VERSION_URL = "https://registry.npmjs.org/test-package/1.0.0";
const TARBALL_URL = "https://registry.npmjs.org/test-package/-/test-package-1.0.0.tgz";
const PKG_JSON = `${JSON.stringify({ name: "test-package", version: "1.0.0" })}\n`;
const FILES = { "package/package.json": PKG_JSON, "package/index.js": "module.exports = 1;\n" };

const target: Target = newTarget({ ecosystem: "npm", package: "test-package", version: "1.0.0", artifact: "test-package-1.0.0.tgz" });
const packStrategy: Strategy = { kind: "NPMPackBuild", location: { repo: REPO_URL, ref: "abc123", dir: "." }, npmVersion: "8.1.2" };

class ReusedRepository extends MemoryRepository {
  readonly reused = true;
}

function memoryRepo(): MemoryRepository {
  return new MemoryRepository(REPO_URL, [
    { id: "initial-commit", files: { "package.json": `${JSON.stringify({ name: "test-package", version: "0.9.0" })}\n` } },
    { id: "version-bump", parent: "initial-commit", files: { "package.json": PKG_JSON } }
  ]);
}

async function upstreamRoutes(repo: MemoryRepository): Promise<Record<string, Route>> {
  return {
    [VERSION_URL]: JSON.stringify({
      name: "test-package",
      version: "1.0.0",
      _npmVersion: "8.1.2",
      gitHead: repo.hashOf("version-bump"),
      repository: { type: "git", url: `git+${REPO_URL}.git` },
      dist: { tarball: TARBALL_URL }
    }),
    [TARBALL_URL]: await tgz(FILES, new Date("2023-01-01T00:00:00Z"))
  };
}

function fixedBuilder(outcome: () => Promise<BuildOutcome>, onBuild?: (req: BuildRequest) => void): Builder {
  return {
    kind: "local",
    hasRepo: true,
    async build(req) {
      onBuild?.(req);
      return outcome();
    }
  };
}

const rebuilt = async (files: Record<string, string> = FILES): Promise<BuildOutcome> => ({
  ok: true,
  artifact: await tgz(files, new Date("2024-06-01T00:00:00Z"))
});

let root: string;

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), "pipeline-test-"));
});

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

function pipelineDeps(overrides: Partial<PipelineDeps> & Pick<PipelineDeps, "registries" | "builder">): PipelineDeps {
  const runId = overrides.runId ?? newRunId();
  return {
    assets: new LocalAssetStore(root, runId),
    rundex: new FilesystemRundex(root),
    openRepo: async () => memoryRepo(),
    mode: "attest",
    runId,
    executorVersion: "test-executor",
    timewarpHost: null,
    baseImage: "docker.io/library/alpine:3.19",
    ...overrides
  };
}

describe("RebuildPipeline", () => {
  it("walks every state and records a matching rebuild", async () => {
    const repo = memoryRepo();
    const { registries } = fakeRegistries(await upstreamRoutes(repo));
    const deps = pipelineDeps({ registries, builder: fixedBuilder(() => rebuilt()) });
    const out = await new RebuildPipeline(deps).rebuild({ target, strategy: packStrategy });

    expect(out.verdict.success).toBe(true);
    expect(out.verdict.message).toBe("");
    expect(out.attempts).toBe(1);
    expect(out.transitions.map((t) => [t.from, t.to])).toEqual([
      ["inferring", "fetching_upstream"],
      ["fetching_upstream", "building"],
      ["building", "stabilizing"],
      ["stabilizing", "comparing"],
      ["comparing", "done"]
    ]);

    const stored = await deps.rundex.fetchRebuilds({ runs: [deps.runId] });
    expect(stored.map((r) => [r.package, r.success, r.message, r.executorVersion])).toEqual([
      ["test-package", true, "", "test-executor"]
    ]);
    expect(stored[0]?.strategy).toEqual(packStrategy);
  });

  it("writes the full asset set in attest mode", async () => {
    const repo = memoryRepo();
    const { registries } = fakeRegistries(await upstreamRoutes(repo));
    const deps = pipelineDeps({ registries, builder: fixedBuilder(() => rebuilt()) });
    await new RebuildPipeline(deps).rebuild({ target, strategy: packStrategy });

    const types: AssetType[] = ["diff", "rebuild", "upstream", "info.json", "Dockerfile", "build.yaml", "logs"];
    for (const type of types) expect(await deps.assets.exists({ target, type })).toBe(true);
    const info = JSON.parse(new TextDecoder().decode(await deps.assets.read({ target, type: "info.json" })));
    expect(info.builder).toBe("local");
    expect(info.executorVersion).toBe("test-executor");
    expect(info.strategy.kind).toBe("NPMPackBuild");
  });

  it("keeps only the diff and logs in smoketest mode", async () => {
    const repo = memoryRepo();
    const { registries } = fakeRegistries(await upstreamRoutes(repo));
    const deps = pipelineDeps({ registries, builder: fixedBuilder(() => rebuilt()), mode: "smoketest" });
    await new RebuildPipeline(deps).rebuild({ target, strategy: packStrategy });

    expect(await deps.assets.exists({ target, type: "diff" })).toBe(true);
    expect(await deps.assets.exists({ target, type: "logs" })).toBe(true);
    expect(await deps.assets.exists({ target, type: "rebuild" })).toBe(false);
    expect(await deps.assets.exists({ target, type: "info.json" })).toBe(false);
  });

  it("reports a content mismatch as the verdict", async () => {
    const repo = memoryRepo();
    const { registries } = fakeRegistries(await upstreamRoutes(repo));
    const builder = fixedBuilder(() => rebuilt({ ...FILES, "package/index.js": "module.exports = 2;\n" }));
    const out = await new RebuildPipeline(pipelineDeps({ registries, builder })).rebuild({ target, strategy: packStrategy });
    expect(out.verdict.success).toBe(false);
    expect(out.verdict.message).toBe("content differences found");
  });

  it.each<[string, BuildOutcome, string]>([
    [
      "a classified failure",
      { ok: false, stage: "build", exitCode: 127, timedOut: false, output: "> tsc\nsh: tsc: not found\n" },
      "build: pack command not found: tsc"
    ],
    ["a timeout", { ok: false, stage: "source", exitCode: 124, timedOut: true, output: "" }, "build: source stage timed out"],
    [
      "a plain exit code",
      { ok: false, stage: "deps", exitCode: 2, timedOut: false, output: "npm ERR! network" },
      "build: deps stage failed with exit code 2"
    ]
  ])("turns %s into the verdict message", async (_name, outcome, message) => {
    const repo = memoryRepo();
    const { registries } = fakeRegistries(await upstreamRoutes(repo));
    const deps = pipelineDeps({ registries, builder: fixedBuilder(async () => outcome) });
    const out = await new RebuildPipeline(deps).rebuild({ target, strategy: packStrategy });
    expect(out.verdict.message).toBe(message);
    expect(out.attempts).toBe(1);
    expect(out.transitions.map((t) => t.to)).toEqual(["fetching_upstream", "building", "done"]);
    expect(await deps.assets.exists({ target, type: "diff" })).toBe(false);
    expect(await deps.assets.exists({ target, type: "logs" })).toBe(true);
  });

  it("tags a registry failure with its stage", async () => {
    const repo = memoryRepo();
    const routes = await upstreamRoutes(repo);
    delete routes[TARBALL_URL];
    const { registries } = fakeRegistries(routes);
    const out = await new RebuildPipeline(pipelineDeps({ registries, builder: fixedBuilder(() => rebuilt()) })).rebuild({
      target,
      strategy: packStrategy
    });
    expect(out.verdict.message).toBe(`fetching_upstream: not found [url=${TARBALL_URL},status=404]`);
    expect(out.attempts).toBe(1);
  });

  it("retries once after a transient failure", async () => {
    const repo = memoryRepo();
    const { fetch: serve } = fakeFetch(await upstreamRoutes(repo));
    let tarballHits = 0;
    const fetch: FetchFn = async (input, init) => {
      if (input === TARBALL_URL && tarballHits++ === 0) return new Response("busy", { status: 503 });
      return serve(input, init);
    };
    const out = await new RebuildPipeline(
      pipelineDeps({ registries: createRegistryMux({ fetch }), builder: fixedBuilder(() => rebuilt()) })
    ).rebuild({ target, strategy: packStrategy });
    expect(out.attempts).toBe(2);
    expect(out.verdict.success).toBe(true);
    expect(tarballHits).toBe(2);
  });

  it("propagates fatal errors", async () => {
    const repo = memoryRepo();
    const { registries } = fakeRegistries(await upstreamRoutes(repo));
    const builder = fixedBuilder(async () => {
      throw internal("workspace vanished");
    });
    await expect(new RebuildPipeline(pipelineDeps({ registries, builder })).rebuild({ target, strategy: packStrategy })).rejects.toMatchObject({
      kind: "Internal",
      fatal: true,
      message: "workspace vanished"
    });
  });

  it("records a non-fatal internal error as the verdict", async () => {
    const repo = memoryRepo();
    const { registries } = fakeRegistries(await upstreamRoutes(repo));
    const builder = fixedBuilder(async () => {
      throw new Error("runner crashed");
    });
    const out = await new RebuildPipeline(pipelineDeps({ registries, builder })).rebuild({ target, strategy: packStrategy });
    expect(out.verdict.message).toBe("build: runner crashed");
  });

  it("reports cancellation instead of a verdict", async () => {
    const repo = memoryRepo();
    const { registries } = fakeRegistries(await upstreamRoutes(repo));
    const controller = new AbortController();
    const builder = fixedBuilder(async () => {
      controller.abort();
      throw new Error("killed");
    });
    const deps = pipelineDeps({ registries, builder });
    const run = new RebuildPipeline(deps).rebuild({ target, strategy: packStrategy }, controller.signal);
    await expect(run).rejects.toBeInstanceOf(RebuildError);
    await expect(run).rejects.toMatchObject({ message: "cancelled" });
    expect(await deps.rundex.fetchRebuilds()).toEqual([]);
  });

  describe("with inference", () => {
    it("infers the strategy from the cloned repository", async () => {
      const repo = memoryRepo();
      const { registries } = fakeRegistries(await upstreamRoutes(repo));
      const opened: string[] = [];
      const deps = pipelineDeps({
        registries,
        builder: fixedBuilder(() => rebuilt()),
        openRepo: async (uri) => {
          opened.push(uri);
          return repo;
        }
      });
      const out = await new RebuildPipeline(deps).rebuild({ target });
      expect(opened).toEqual([REPO_URL]);
      expect(out.verdict.strategy).toEqual({
        kind: "NPMPackBuild",
        location: { repo: REPO_URL, ref: repo.hashOf("version-bump"), dir: "." },
        npmVersion: "8.1.2"
      });
      expect(out.verdict.success).toBe(true);
    });

    it("measures clone time and reuses it for warm repositories", async () => {
      const repo = memoryRepo();
      const { registries } = fakeRegistries(await upstreamRoutes(repo));
      let clock = 1_000;
      const now = () => clock;
      const builder = fixedBuilder(
        () => rebuilt(),
        () => {
          clock += 2_000;
        }
      );
      const cloneEstimates = new Map<string, number>();
      const runId = newRunId();
      const fresh = await new RebuildPipeline(
        pipelineDeps({
          registries,
          builder,
          runId,
          now,
          cloneEstimates,
          openRepo: async () => {
            clock += 250;
            return repo;
          }
        })
      ).rebuild({ target });
      expect(fresh.verdict.timings).toEqual({ cloneEstimate: 250, source: 250, infer: 0, build: 2_000 });
      expect(cloneEstimates.get(REPO_URL)).toBe(250);

      const stored = await new FilesystemRundex(root).fetchRebuilds({ runs: [runId] });
      expect(stored[0]?.timings).toEqual({ cloneEstimate: 0.25, source: 0.25, infer: 0, build: 2 });

      const warmRepo = (): ReusedRepository => {
        clock += 10;
        return new ReusedRepository(REPO_URL, [
          { id: "initial-commit", files: { "package.json": `${JSON.stringify({ name: "test-package", version: "0.9.0" })}\n` } },
          { id: "version-bump", parent: "initial-commit", files: { "package.json": PKG_JSON } }
        ]);
      };

      const shared = await new RebuildPipeline(
        pipelineDeps({ registries, builder, now, cloneEstimates, openRepo: async () => warmRepo() })
      ).rebuild({ target });
      expect(shared.verdict.timings.source).toBe(10);
      expect(shared.verdict.timings.cloneEstimate).toBe(250);

      const fromRundex = await new RebuildPipeline(pipelineDeps({ registries, builder, now, openRepo: async () => warmRepo() })).rebuild({
        target
      });
      expect(fromRundex.verdict.timings.cloneEstimate).toBe(250);
    });
  });
});
