import { describe, it, expect } from "vitest";
import { newTarget } from "../src/core/target.js";
import { parseStrategy, parseStrategyYaml, strategyToJson, strategyToYaml } from "../src/strategy/definition.js";
import { binNmuBuildName } from "../src/strategy/debian.js";
import { generateFor } from "../src/strategy/render.js";
import { timewarpUrl } from "../src/strategy/timewarp.js";
import type { NpmCustomBuild, Strategy, WorkflowStrategy } from "../src/strategy/types.js";
import { expandTemplate, joinPosix, templateData } from "../src/strategy/workflow.js";

const REPO = "https://github.com/test-org/test-package";
const npmTarget = newTarget({ ecosystem: "npm", package: "test-package", version: "1.0.0", artifact: "test-package-1.0.0.tgz" });

const customBuild: NpmCustomBuild = {
  kind: "NPMCustomBuild",
  location: { repo: REPO, ref: "abc123", dir: "packages/a" },
  npmVersion: "8.2.0",
  nodeVersion: "16.13.0",
  command: "build",
  registryTime: new Date("2023-02-10T10:00:00Z"),
  prepackRemoveDeps: true,
  keepRoot: true,
  versionOverride: "1.0.0"
};

describe("timewarpUrl", () => {
  it("pins the registry to whole seconds", () => {
    expect(timewarpUrl("pypi", new Date("2024-03-01T12:00:00.500Z"), "tw:8080")).toBe("http://pypi:2024-03-01T12:00:00Z@tw:8080");
  });

  it("requires a host", () => {
    expect(() => timewarpUrl("npm", new Date(0), null)).toThrow("no timewarp host configured");
  });
});

describe("npm rendering", () => {
  it("packs from a fresh clone", () => {
    const s: Strategy = { kind: "NPMPackBuild", location: { repo: REPO, ref: "abc123", dir: "." }, npmVersion: "8.1.2" };
    expect(generateFor(s, npmTarget, { hasRepo: false })).toEqual({
      location: s.location,
      systemDeps: ["git", "npm"],
      source: `git clone '${REPO}' .\ngit checkout --force 'abc123'`,
      deps: "",
      build: "/usr/bin/npx --package=npm@8.1.2 -c 'npm pack'",
      outputPath: "test-package-1.0.0.tgz"
    });
  });

  it("runs a custom build through the time-pinned registry", () => {
    const registry = [
      "/usr/bin/npm config --location-global set registry http://npm:2023-02-10T10:00:00Z@tw:8080",
      "trap '/usr/bin/npm config --location-global delete registry' EXIT"
    ];
    const inst = generateFor(customBuild, npmTarget, { timewarpHost: "tw:8080", hasRepo: true });
    expect(inst.source).toBe("git checkout --force 'abc123'");
    expect(inst.deps.split("\n")).toEqual([
      ...registry,
      "wget -O - https://unofficial-builds.nodejs.org/download/release/v16.13.0/node-v16.13.0-linux-x64-musl.tar.gz | tar xzf - --strip-components=1 -C /usr/local/",
      "/usr/local/bin/npm config --location-global set unsafe-perm true",
      "/usr/local/bin/npx --package=npm@8.2.0 -c 'cd packages/a && npm install --force'"
    ]);
    expect(inst.build.split("\n")).toEqual([
      ...registry,
      "PATH=/usr/bin:/bin:/usr/local/bin /usr/bin/npm version --prefix packages/a --no-git-tag-version 1.0.0",
      "/usr/local/bin/npx --package=npm@8.2.0 -c 'cd packages/a && npm run build'",
      "rm -rf packages/a/node_modules",
      "/usr/local/bin/npx --package=npm@8.2.0 -c 'cd packages/a && npm pack'"
    ]);
    expect(inst.outputPath).toBe("packages/a/test-package-1.0.0.tgz");
  });

  it("is deterministic", () => {
    const env = { timewarpHost: "tw:8080", hasRepo: false };
    expect(generateFor(customBuild, npmTarget, env)).toEqual(generateFor(customBuild, npmTarget, env));
  });

  it("fails without a timewarp host", () => {
    expect(() => generateFor(customBuild, npmTarget, { hasRepo: true })).toThrow("no timewarp host configured");
  });
});

describe("other ecosystems", () => {
  it("renders a pure wheel build", () => {
    const t = newTarget({ ecosystem: "pypi", package: "demo-pkg", version: "1.0.0", artifact: "demo_pkg-1.0.0-py3-none-any.whl" });
    const inst = generateFor(
      {
        kind: "PyPIPureWheelBuild",
        location: { repo: REPO, ref: "abc", dir: "." },
        requirements: ["wheel==0.40.0"],
        registryTime: new Date("2024-03-01T12:00:00Z")
      },
      t,
      { timewarpHost: "tw:8080", hasRepo: true }
    );
    expect(inst.deps).toBe(
      "/usr/bin/python3 -m venv /deps\nexport PIP_INDEX_URL=http://pypi:2024-03-01T12:00:00Z@tw:8080\n/deps/bin/pip install build\n/deps/bin/pip install wheel==0.40.0"
    );
    expect(inst.build).toBe("/deps/bin/python3 -m build --wheel -n .");
    expect(inst.outputPath).toBe("dist/demo_pkg-1.0.0-py3-none-any.whl");
  });

  it("renders a cargo package with an explicit lockfile", () => {
    const t = newTarget({ ecosystem: "cratesio", package: "demo", version: "1.2.0", artifact: "demo-1.2.0.crate" });
    const inst = generateFor(
      {
        kind: "CratesIOCargoPackage",
        location: { repo: REPO, ref: "abc", dir: "crates/demo" },
        rustVersion: "1.69.0",
        explicitLockfile: { lockfileBase64: "IyBsb2NrCg==" }
      },
      t,
      { hasRepo: true }
    );
    expect(inst.deps).toBe(
      "echo 'IyBsb2NrCg==' | base64 -d > Cargo.lock\n/usr/bin/rustup-init -y --profile minimal --default-toolchain 1.69.0"
    );
    expect(inst.build).toBe('/root/.cargo/bin/cargo package --no-verify --package "path+file://$(readlink -f crates/demo)"');
    expect(inst.outputPath).toBe("target/package/demo-1.2.0.crate");
  });

  it("renders a maven build with a Temurin JDK", () => {
    const t = newTarget({ ecosystem: "maven", package: "org.example:demo", version: "2.1.0", artifact: "demo-2.1.0.jar" });
    const inst = generateFor({ kind: "MavenBuild", location: { repo: REPO, ref: "abc", dir: "core" }, jdkVersion: "11" }, t, {
      hasRepo: true
    });
    expect(inst.deps).toBe(
      "mkdir -p /opt/jdk\nwget -O - https://api.adoptium.net/v3/binary/latest/11/ga/linux/x64/jdk/hotspot/normal/eclipse | tar xzf - --strip-components=1 -C /opt/jdk"
    );
    expect(inst.build).toBe("cd core && JAVA_HOME=/opt/jdk PATH=/opt/jdk/bin:$PATH mvn -B package -DskipTests");
    expect(inst.outputPath).toBe("core/target/demo-2.1.0.jar");
  });

  it("renders a go module through the zip tool workflow", () => {
    const t = newTarget({ ecosystem: "go", package: "example.com/mod", version: "v1.0.0", artifact: "v1.0.0.zip" });
    const inst = generateFor({ kind: "GoModuleBuild", location: { repo: REPO, ref: "abc", dir: "." } }, t, { hasRepo: false });
    expect(inst.source).toBe(`git clone '${REPO}' .\ngit checkout --force 'abc'`);
    expect(inst.deps.startsWith("mkdir /tools/\necho ")).toBe(true);
    expect(inst.deps.endsWith("go mod tidy\ngo build ./main.go")).toBe(true);
    expect(inst.build).toBe("mkdir /out && cd /tools/ && go run ./main.go example.com/mod v1.0.0 /src/.");
    expect(inst.systemDeps).toEqual(["git", "go"]);
    expect(inst.outputPath).toBe("../out/module.zip");
  });

  it("renders a debian source build and renames binNMU output", () => {
    const t = newTarget({ ecosystem: "debian", package: "main/hello", version: "2.10-3+b1", artifact: "hello_2.10-3+b1_amd64.deb" });
    const inst = generateFor(
      {
        kind: "DebianPackage",
        dsc: { url: "https://mirror.example/hello_2.10-3.dsc", md5: "" },
        native: { url: "https://mirror.example/hello_2.10-3.tar.xz", md5: "00" },
        requirements: ["debhelper-compat", "pkg-config"]
      },
      t,
      { hasRepo: false }
    );
    expect(inst.source.split("\n")).toEqual([
      "set -eux",
      "wget https://mirror.example/hello_2.10-3.dsc",
      "wget https://mirror.example/hello_2.10-3.tar.xz",
      'dpkg-source -x --no-check $(basename "https://mirror.example/hello_2.10-3.dsc")'
    ]);
    expect(inst.deps).toBe("set -eux\napt update\napt install -y debhelper-compat pkg-config");
    expect(inst.build).toBe("set -eux\ncd */\ndebuild -b -uc -us\nmv /src/hello_2.10-3_amd64.deb /src/hello_2.10-3+b1_amd64.deb");
    expect(binNmuBuildName("hello_2.10-3_amd64.deb")).toBeNull();
  });

  it("refuses to render a location hint", () => {
    expect(() => generateFor({ kind: "LocationHint", location: { repo: REPO, ref: "abc", dir: "." } }, npmTarget, { hasRepo: true })).toThrow(
      "LocationHint must be expanded using inference"
    );
  });
});

describe("workflow strategies", () => {
  const workflow: WorkflowStrategy = {
    kind: "WorkflowStrategy",
    location: { repo: "https://example.org/r.git", ref: "deadbeef", dir: "pkg" },
    sourceSteps: [{ uses: "git-checkout" }],
    depsSteps: [{ uses: "npm/install-node", with: { nodeVersion: "20.11.1" } }],
    buildSteps: [
      { runs: "echo {{.Target.Package}}@{{.Target.Version}} in {{.Location.Dir}}{{.Missing.Key}}", needs: ["coreutils"] },
      {
        uses: "npm/npx",
        with: { command: "npm pack", dir: "{{.Location.Dir}}", npmVersion: "10.2.0", registryTime: "2024-01-02T03:04:05Z" }
      }
    ],
    systemDeps: ["make"]
  };

  it("expands steps and tools", () => {
    expect(generateFor(workflow, npmTarget, { timewarpHost: "tw:8080", hasRepo: true })).toEqual({
      location: workflow.location,
      source: "git checkout --force 'deadbeef'",
      deps: "wget -O - https://unofficial-builds.nodejs.org/download/release/v20.11.1/node-v20.11.1-linux-x64-musl.tar.gz | tar xzf - --strip-components=1 -C /usr/local/",
      build: [
        "echo test-package@1.0.0 in pkg",
        "/usr/bin/npm config --location-global set registry http://npm:2024-01-02T03:04:05Z@tw:8080",
        "trap '/usr/bin/npm config --location-global delete registry' EXIT",
        "PATH=/usr/local/bin:/usr/bin:/bin npx --package=npm@10.2.0 -c 'cd pkg && npm pack'"
      ].join("\n"),
      systemDeps: ["make", "git", "wget", "coreutils", "npm"],
      outputPath: "pkg/test-package-1.0.0.tgz"
    });
  });

  it("names the stage of an invalid step", () => {
    const bad: WorkflowStrategy = { ...workflow, buildSteps: [{ runs: "true", uses: "git-checkout" }] };
    expect(() => generateFor(bad, npmTarget, { hasRepo: true })).toThrow(
      "generating build steps: must provide exactly one of 'runs' or 'uses'"
    );
    const unknown: WorkflowStrategy = { ...workflow, sourceSteps: [{ uses: "nope" }] };
    expect(() => generateFor(unknown, npmTarget, { hasRepo: true })).toThrow("generating source steps: unknown tool: nope");
  });

  it("expands templates against target data", () => {
    const data = templateData(workflow.location, npmTarget, { hasRepo: false });
    expect(expandTemplate("{{ .Target.Artifact }} {{.BuildEnv.HasRepo}} {{.Location}}", data)).toBe("test-package-1.0.0.tgz false ");
  });

  it("joins paths the way build roots are addressed", () => {
    expect(joinPosix("a/./b", "../c")).toBe("a/c");
    expect(joinPosix(".", "x")).toBe("x");
    expect(joinPosix("/abs", "y")).toBe("/abs/y");
    expect(joinPosix(".")).toBe(".");
  });
});

describe("build definitions", () => {
  it("fills defaults and parses registry times", () => {
    const s = parseStrategyYaml(
      "kind: NPMCustomBuild\nlocation:\n  repo: https://github.com/test-org/test-package\n  ref: abc123\nnpmVersion: 8.2.0\nnodeVersion: 16.13.0\nregistryTime: 2023-02-10T10:00:00Z\n"
    );
    expect(s).toEqual({
      kind: "NPMCustomBuild",
      location: { repo: REPO, ref: "abc123", dir: "." },
      npmVersion: "8.2.0",
      nodeVersion: "16.13.0",
      command: "",
      registryTime: new Date("2023-02-10T10:00:00Z"),
      prepackRemoveDeps: false,
      keepRoot: false
    });
  });

  it("reads back what it writes", () => {
    expect(parseStrategyYaml(strategyToYaml(customBuild))).toEqual(customBuild);
  });

  it("serializes with sorted keys and ISO dates", () => {
    const json = strategyToJson(customBuild);
    expect(Object.keys(json)).toEqual([
      "command",
      "keepRoot",
      "kind",
      "location",
      "nodeVersion",
      "npmVersion",
      "prepackRemoveDeps",
      "registryTime",
      "versionOverride"
    ]);
    expect(json.registryTime).toBe("2023-02-10T10:00:00.000Z");
  });

  it("rejects invalid definitions", () => {
    expect(() => parseStrategy({ kind: "MavenBuild", location: { ref: "abc" }, jdkVersion: "11" })).toThrow(
      "location.ref requires location.repo"
    );
    expect(() => parseStrategy({ kind: "Nonsense" })).toThrow(/invalid strategy \[source=strategy\]/);
    expect(() => parseStrategyYaml("kind: [")).toThrow("invalid YAML [source=strategy]");
  });
});
