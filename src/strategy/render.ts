import { RebuildError } from "../core/errors.js";
import type { Target } from "../core/target.js";
import { renderCargoPackage } from "./cratesio.js";
import { renderDebianPackage } from "./debian.js";
import { renderGoModuleBuild } from "./go.js";
import { renderMavenBuild } from "./maven.js";
import { renderNpmCustomBuild, renderNpmPackBuild } from "./npm.js";
import { renderPypiPureWheelBuild } from "./pypi.js";
import type { BuildEnv, Instructions, Strategy } from "./types.js";
import { renderWorkflow, type ToolRegistry } from "./workflow.js";

/**
 * Renders a strategy into build scripts. Output depends only on the arguments.
 */
export function generateFor(strategy: Strategy, target: Target, env: BuildEnv, tools?: ToolRegistry): Instructions {
  switch (strategy.kind) {
    case "NPMPackBuild":
      return renderNpmPackBuild(strategy, target, env);
    case "NPMCustomBuild":
      return renderNpmCustomBuild(strategy, target, env);
    case "PyPIPureWheelBuild":
      return renderPypiPureWheelBuild(strategy, target, env);
    case "CratesIOCargoPackage":
      return renderCargoPackage(strategy, target, env);
    case "DebianPackage":
      return renderDebianPackage(strategy, target, env);
    case "MavenBuild":
      return renderMavenBuild(strategy, target, env);
    case "GoModuleBuild":
      return renderGoModuleBuild(strategy, target, env, tools);
    case "WorkflowStrategy":
      return renderWorkflow(strategy, target, env, tools);
    case "LocationHint":
      throw new RebuildError("Unsupported", "LocationHint must be expanded using inference");
  }
}
