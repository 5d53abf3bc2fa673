import { describe, it, expect } from "vitest";
import { strToU8 } from "fflate";
import { writeZipStable } from "../src/archive/zip.js";
import { RebuildError } from "../src/core/errors.js";
import { newTarget } from "../src/core/target.js";
import { inferTarget } from "../src/inference/index.js";
import {
  findPureWheel,
  generatorRequirements,
  repoFromProject,
  setuptoolsRequirement
} from "../src/inference/pypi.js";
import type { PypiArtifact } from "../src/registry/pypi.js";
import { MemoryRepository } from "../src/repo/memoryRepository.js";
import { RebuildLog } from "../src/runs/rebuildLog.js";
import { fakeRegistries } from "./helpers/fakeFetch.js";

const URI = "https://github.com/test-org/demo-pkg";
const WHEEL = "demo_pkg-1.0.0-py3-none-any.whl";
const WHEEL_URL = `https://files.example.org/${WHEEL}`;

const info = {
  name: "demo-pkg",
  version: "1.0.0",
  home_page: null,
  project_urls: { Documentation: "https://docs.example.org", Source: URI }
};

function wheel(generator: string): Uint8Array {
  return writeZipStable([
    { name: "demo_pkg/__init__.py", data: strToU8("") },
    {
      name: "demo_pkg-1.0.0.dist-info/WHEEL",
      data: strToU8(`Wheel-Version: 1.0\nGenerator: ${generator}\nRoot-Is-Purelib: true\n`)
    },
    {
      name: "demo_pkg-1.0.0.dist-info/METADATA",
      data: strToU8("Metadata-Version: 2.1\nName: demo-pkg\nVersion: 1.0.0\nLicense-File: LICENSE\n")
    }
  ]);
}

function routes(generator = "bdist_wheel (0.40.0)") {
  return {
    "https://pypi.org/pypi/demo-pkg/json": JSON.stringify({ info }),
    "https://pypi.org/pypi/demo-pkg/1.0.0/json": JSON.stringify({
      info,
      urls: [
        { filename: "demo-pkg-1.0.0.tar.gz", url: "https://files.example.org/demo-pkg-1.0.0.tar.gz" },
        { filename: WHEEL, url: WHEEL_URL, upload_time_iso_8601: "2024-03-01T12:00:00.000Z" }
      ]
    }),
    [WHEEL_URL]: wheel(generator)
  };
}

function artifact(filename: string): PypiArtifact {
  return { filename, url: "", sha256: "", packageType: "", pythonVersion: "", size: 0, uploadTime: null };
}

describe("pypi inference", () => {
  it("builds the pure wheel from the matching tag", async () => {
    const repo = new MemoryRepository(URI, [
      { id: "initial", files: { "setup.py": "setup()\n" } },
      {
        id: "release",
        parent: "initial",
        tag: "v1.0.0",
        files: { "pyproject.toml": '[build-system]\nrequires = ["setuptools >= 61", "wheel"]\n' }
      }
    ]);
    const { registries } = fakeRegistries(routes());
    const { target, strategy } = await inferTarget(
      newTarget({ ecosystem: "pypi", package: "demo-pkg", version: "1.0.0" }),
      null,
      { registries, log: new RebuildLog() },
      async () => repo
    );
    expect(target.artifact).toBe(WHEEL);
    expect(strategy).toEqual({
      kind: "PyPIPureWheelBuild",
      location: { repo: URI, ref: repo.hashOf("release"), dir: "." },
      requirements: ["wheel==0.40.0", "setuptools==67.7.2", "setuptools>=61", "wheel"],
      registryTime: new Date("2024-03-01T12:00:00Z")
    });
  });

  it("fails without a matching tag", async () => {
    const repo = new MemoryRepository(URI, [{ id: "initial", files: { "setup.py": "setup()\n" } }]);
    const { registries } = fakeRegistries(routes());
    await expect(
      inferTarget(newTarget({ ecosystem: "pypi", package: "demo-pkg", version: "1.0.0" }), null, { registries, log: new RebuildLog() }, async () => repo)
    ).rejects.toMatchObject({ kind: "NoValidRef", message: "no git ref" });
  });

  it("rejects an unknown wheel generator", async () => {
    const repo = new MemoryRepository(URI, [{ id: "release", tag: "v1.0.0", files: { "setup.py": "setup()\n" } }]);
    const { registries } = fakeRegistries(routes("mystery 1.0"));
    await expect(
      inferTarget(newTarget({ ecosystem: "pypi", package: "demo-pkg", version: "1.0.0" }), null, { registries, log: new RebuildLog() }, async () => repo)
    ).rejects.toMatchObject({ kind: "Unsupported", message: "unsupported generator: mystery 1.0" });
  });
});

describe("pypi helpers", () => {
  it("maps wheel generators to build requirements", () => {
    expect(generatorRequirements("Generator: flit 3.9.0\n")).toEqual(["flit_core==3.9.0", "flit==3.9.0"]);
    expect(generatorRequirements("Wheel-Version: 1.0\nGenerator: hatchling 1.21.1\n")).toEqual(["hatchling==1.21.1"]);
    expect(generatorRequirements("Generator: poetry-core 1.9.0\n")).toEqual(["poetry-core==1.9.0"]);
    expect(() => generatorRequirements("Wheel-Version: 1.0\n")).toThrow("no generator found");
    expect(() => generatorRequirements("not a header\n")).toThrow("Unexpected file format");
  });

  it("pins setuptools by metadata conventions", () => {
    expect(setuptoolsRequirement("Name: demo\n")).toBe("setuptools==56.2.0");
    expect(setuptoolsRequirement("License-File: LICENSE\nPlatform: UNKNOWN\n")).toBe("setuptools==57.5.0");
    expect(setuptoolsRequirement("License-File: LICENSE\n")).toBe("setuptools==67.7.2");
  });

  it("requires a pure wheel", () => {
    expect(findPureWheel([artifact("a-1.0-cp311-cp311-linux_x86_64.whl"), artifact("a-1.0-py3-none-any.whl")]).filename).toBe(
      "a-1.0-py3-none-any.whl"
    );
    expect(() => findPureWheel([artifact("a-1.0.tar.gz")])).toThrow(RebuildError);
  });

  it("finds the repository among project links", () => {
    const project = (projectUrls: Record<string, string>, homePage = "") => ({
      info: { name: "demo-pkg", version: "1.0.0", homePage, projectUrls },
      versions: [],
      uploadTimes: {}
    });
    expect(repoFromProject(project({ Homepage: "https://example.org", Repository: "https://gitlab.com/team/demo.git" }))).toBe(
      "https://gitlab.com/team/demo"
    );
    expect(repoFromProject(project({ Code: "https://code.example.org/demo" }))).toBe("https://code.example.org/demo");
    expect(repoFromProject(project({}, "https://github.com/test-org/demo-pkg"))).toBe(URI);
    expect(repoFromProject(project({ Funding: "https://github.com/sponsors/test-org", Tracker: "https://github.com/test-org/demo-pkg/issues" }))).toBe(URI);
    expect(() => repoFromProject(project({}))).toThrow("no git repo");
  });
});
