import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { describe, it, expect } from "vitest";
import { benchmarkHash, benchmarkTargets, loadBenchmark, parseBenchmark, targetsHash } from "../src/benchmark/benchmark.js";
import { sha256Prefixed } from "../src/core/canonicalJson.js";
import { newTarget } from "../src/core/target.js";

const raw = {
  Count: 3,
  Updated: "2024-05-01T00:00:00Z",
  Packages: [
    { Ecosystem: "pypi", Name: "demo-lib", Versions: ["2.0.0"], Artifacts: ["demo_lib-2.0.0-py3-none-any.whl"] },
    { Ecosystem: "npm", Name: "left-pad", Versions: ["1.1.0", "1.0.0"] }
  ]
};

describe("benchmarks", () => {
  it("expands packages into targets", () => {
    expect(benchmarkTargets(parseBenchmark(raw))).toEqual([
      newTarget({ ecosystem: "pypi", package: "demo-lib", version: "2.0.0", artifact: "demo_lib-2.0.0-py3-none-any.whl" }),
      newTarget({ ecosystem: "npm", package: "left-pad", version: "1.1.0" }),
      newTarget({ ecosystem: "npm", package: "left-pad", version: "1.0.0" })
    ]);
  });

  it("hashes the sorted target ids", () => {
    const want = sha256Prefixed("npm|left-pad|1.0.0|npm|left-pad|1.1.0|pypi|demo-lib|2.0.0");
    const set = parseBenchmark(raw);
    expect(benchmarkHash(set)).toBe(want);
    expect(targetsHash(benchmarkTargets(set))).toBe(want);
    expect(benchmarkHash({ ...set, Packages: [...set.Packages].reverse() })).toBe(want);
  });

  it("ignores artifacts when hashing", () => {
    const withoutArtifacts = { ...raw, Packages: raw.Packages.map(({ Ecosystem, Name, Versions }) => ({ Ecosystem, Name, Versions })) };
    expect(benchmarkHash(parseBenchmark(withoutArtifacts))).toBe(benchmarkHash(parseBenchmark(raw)));
  });

  it("rejects artifacts that do not line up with versions", () => {
    const bad = { ...raw, Packages: [{ Ecosystem: "npm", Name: "left-pad", Versions: ["1.0.0", "1.1.0"], Artifacts: ["a.tgz"] }] };
    expect(() => parseBenchmark(bad, "bad.json")).toThrow("invalid benchmark [source=bad.json]: left-pad has 1 artifacts for 2 versions");
  });

  it("rejects a document of the wrong shape", () => {
    expect(() => parseBenchmark({ Count: 1, Packages: [] })).toThrow(/^invalid benchmark \[source=benchmark\]: Updated: /);
  });

  it("rejects an unknown ecosystem when expanding", () => {
    const set = parseBenchmark({ ...raw, Packages: [{ Ecosystem: "rubygems", Name: "rake", Versions: ["13.0.0"] }] });
    expect(() => benchmarkTargets(set)).toThrow();
  });

  it("loads a benchmark file", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "benchmark-test-"));
    try {
      const good = path.join(dir, "good.json");
      await fs.writeFile(good, JSON.stringify(raw));
      expect((await loadBenchmark(good)).Count).toBe(3);

      const broken = path.join(dir, "broken.json");
      await fs.writeFile(broken, "{");
      await expect(loadBenchmark(broken)).rejects.toMatchObject({ kind: "Malformed", message: `reading benchmark ${broken}` });
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
