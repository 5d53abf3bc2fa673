import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm } from "fs/promises";
import os from "os";
import path from "path";

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema, ListToolsResultSchema } from "@modelcontextprotocol/sdk/types.js";

import { RebuildConfig } from "../src/config/config.js";
import { errorMessage } from "../src/core/errors.js";
import type { Builder } from "../src/execution/builder.js";
import { createGatewayServer } from "../src/mcp/gatewayServer.js";
import {
  zRebuildInferOutput,
  zRebuildSmoketestOutput,
  zRundexListRebuildsOutput,
  zRundexListRunsOutput
} from "../src/mcp/toolSchemas.js";
import { MemoryRepository } from "../src/repo/memoryRepository.js";
import { openRundex, type OpenedRundex } from "../src/rundex/index.js";
import { tgz } from "./helpers/archives.js";
import { fakeFetch } from "./helpers/fakeFetch.js";

const REPO_URL = "https://github.com/test-org/test-package";
const VERSION_URL = "https://registry.npmjs.org/test-package/1.0.0";
const TARBALL_URL = "https://registry.npmjs.org/test-package/-/test-package-1.0.0.tgz";
const PKG_JSON = `${JSON.stringify({ name: "test-package", version: "1.0.0" })}\n`;
const FILES = { "package/package.json": PKG_JSON, "package/index.js": "module.exports = 1;\n" };
const TARGET_ARGS = { ecosystem: "npm", package: "test-package", version: "1.0.0" };

describe.sequential("gateway (in-memory)", () => {
  let tmpDir: string;
  let opened: OpenedRundex;
  let client: Client;
  let serverTransport: InMemoryTransport;
  let clientTransport: InMemoryTransport;
  const repo = new MemoryRepository(REPO_URL, [
    { id: "initial-commit", files: { "package.json": `${JSON.stringify({ name: "test-package", version: "0.9.0" })}\n` } },
    { id: "version-bump", parent: "initial-commit", files: { "package.json": PKG_JSON } }
  ]);

  async function callTool(name: string, args: Record<string, unknown>) {
    return client.request({ method: "tools/call", params: { name, arguments: args } }, CallToolResultSchema, { timeout: 60_000 });
  }

  /** The error text of a failed call, whether it comes back as a tool error or a protocol error. */
  async function callToolError(name: string, args: Record<string, unknown>): Promise<string> {
    try {
      const result = await callTool(name, args);
      expect(result.isError).toBe(true);
      return result.content.map((c) => (c.type === "text" ? c.text : c.type)).join("\n");
    } catch (e) {
      return errorMessage(e);
    }
  }

  async function callToolOk(name: string, args: Record<string, unknown>): Promise<unknown> {
    const result = await callTool(name, args);
    if (result.isError) {
      throw new Error(`${name} failed: ${result.content.map((c) => (c.type === "text" ? c.text : c.type)).join("\n")}`);
    }
    return result.structuredContent;
  }

  beforeAll(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "gateway-test-"));
    const config = new RebuildConfig({ version: 1, storage: { root: path.join(tmpDir, "store") }, rate_limits: { npm: 1000 } });
    opened = await openRundex({ storageRoot: config.storageRoot(), databaseUrl: null, fallback: "pg-mem" });

    const { fetch } = fakeFetch({
      [VERSION_URL]: JSON.stringify({
        name: "test-package",
        version: "1.0.0",
        _npmVersion: "8.1.2",
        gitHead: repo.hashOf("version-bump"),
        repository: { type: "git", url: REPO_URL },
        dist: { tarball: TARBALL_URL }
      }),
      [TARBALL_URL]: await tgz(FILES)
    });
    const builder: Builder = {
      kind: "local",
      hasRepo: true,
      build: async () => ({ ok: true, artifact: await tgz(FILES, new Date("2024-06-01T00:00:00Z")) })
    };

    const server = createGatewayServer({ config, rundex: opened, fetch, builder, openRepo: async () => repo });
    [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);

    client = new Client({ name: "rebuild-test-client", version: "0.0.0" });
    await client.connect(clientTransport);
  });

  afterAll(async () => {
    await clientTransport.close();
    await serverTransport.close();
    await opened.close();
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("lists tools", async () => {
    const result = await client.request({ method: "tools/list", params: {} }, ListToolsResultSchema);
    expect(result.tools.map((t) => t.name).sort()).toEqual(["rebuild_infer", "rebuild_smoketest", "rundex_list_rebuilds", "rundex_list_runs"]);
  });

  it("infers a strategy", async () => {
    const out = zRebuildInferOutput.parse(await callToolOk("rebuild_infer", TARGET_ARGS));
    expect(out.target).toEqual({ ...TARGET_ARGS, artifact: "test-package-1.0.0.tgz" });
    expect(out.strategy_kind).toBe("NPMPackBuild");
    expect(out.strategy).toEqual({
      kind: "NPMPackBuild",
      location: { dir: ".", ref: repo.hashOf("version-bump"), repo: REPO_URL },
      npmVersion: "8.1.2"
    });
    expect(out.strategy_yaml.startsWith("kind: NPMPackBuild\n")).toBe(true);
  });

  it("smoketests a target and records the run", async () => {
    const out = zRebuildSmoketestOutput.parse(await callToolOk("rebuild_smoketest", TARGET_ARGS));
    expect(out.success).toBe(true);
    expect(out.message).toBe("");
    expect(out.attempts).toBe(1);

    const runs = zRundexListRunsOutput.parse(await callToolOk("rundex_list_runs", { ids: [out.run_id] }));
    expect(runs.runs.map((r) => [r.run_id, r.type, r.benchmark_name])).toEqual([[out.run_id, "smoketest", "npm:test-package@1.0.0"]]);

    const rebuilds = zRundexListRebuildsOutput.parse(await callToolOk("rundex_list_rebuilds", { runs: [out.run_id] }));
    expect(rebuilds.truncated).toBe(false);
    expect(rebuilds.rebuilds.map((r) => [r.package, r.success, r.strategy_kind])).toEqual([["test-package", true, "NPMPackBuild"]]);
  });

  it("truncates long rebuild listings", async () => {
    for (const [runId, created] of [
      ["run_listing_a", 1],
      ["run_listing_b", 2]
    ] as const) {
      await opened.rundex.writeRebuild({
        ecosystem: "npm",
        package: "listed",
        version: "1.0.0",
        artifact: "listed-1.0.0.tgz",
        success: false,
        message: "build: deps stage failed with exit code 1",
        strategy: null,
        timings: { cloneEstimate: 0, source: 0, infer: 0, build: 1 },
        executorVersion: "test",
        runId,
        created
      });
    }
    const out = zRundexListRebuildsOutput.parse(await callToolOk("rundex_list_rebuilds", { package: "listed", limit: 1 }));
    expect(out.truncated).toBe(true);
    expect(out.rebuilds.map((r) => r.run_id)).toEqual(["run_listing_a"]);

    const latest = zRundexListRebuildsOutput.parse(await callToolOk("rundex_list_rebuilds", { package: "listed", latest_per_target: true }));
    expect(latest.rebuilds.map((r) => r.run_id)).toEqual(["run_listing_b"]);
  });

  it("reports bad filters as errors", async () => {
    expect(await callToolError("rundex_list_rebuilds", { pattern: "(" })).toContain("invalid message pattern: (");
  });

  it("reports registry failures as errors", async () => {
    expect(await callToolError("rebuild_infer", { ecosystem: "npm", package: "missing-package", version: "1.0.0" })).toContain(
      "not found [url=https://registry.npmjs.org/missing-package/1.0.0,status=404]"
    );
  });
});
