import { readFileSync } from "fs";
import { dataFilePath } from "../core/dataFile.js";
import type { Target } from "../core/target.js";
import type { BuildEnv, GoModuleBuild, Instructions, WorkflowStrategy } from "./types.js";
import { renderWorkflow, type ToolRegistry } from "./workflow.js";

let toolSources: { mod: string; script: string } | null = null;

// The zip tool is a small module program shipped under data/ and passed to the build as base64.
function buildZipToolSources(): { mod: string; script: string } {
  if (!toolSources) {
    const read = (name: string) => Buffer.from(readFileSync(dataFilePath(`go-buildziptool/${name}`))).toString("base64");
    toolSources = { mod: read("go.mod.txt"), script: read("main.go.txt") };
  }
  return toolSources;
}

export function goModuleWorkflow(s: GoModuleBuild): WorkflowStrategy {
  const { mod, script } = buildZipToolSources();
  return {
    kind: "WorkflowStrategy",
    location: s.location,
    sourceSteps: [{ uses: "git-checkout" }],
    depsSteps: [{ uses: "go/buildziptool", with: { mod, script } }],
    buildSteps: [
      {
        runs: "mkdir /out && cd /tools/ && go run ./main.go {{.Target.Package}} {{.Target.Version}} /src/{{.Location.Dir}}"
      }
    ],
    outputPath: "../out/module.zip"
  };
}

export function renderGoModuleBuild(s: GoModuleBuild, t: Target, env: BuildEnv, tools?: ToolRegistry): Instructions {
  return renderWorkflow(goModuleWorkflow(s), t, env, tools);
}
