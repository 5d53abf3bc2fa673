import { internal, RebuildError } from "../core/errors.js";
import { isJsonObject } from "../core/json.js";
import type { Target } from "../core/target.js";
import { cdPrefix } from "./source.js";
import { timewarpUrl } from "./timewarp.js";
import type { BuildEnv, Instructions, Location, WorkflowStep, WorkflowStrategy } from "./types.js";

/** A rendered script fragment plus the system packages it needs. */
export interface Fragment {
  script: string;
  needs: string[];
}

export interface TemplateData {
  Target: { Ecosystem: string; Package: string; Version: string; Artifact: string };
  Location: { Repo: string; Ref: string; Dir: string };
  BuildEnv: { TimewarpHost: string; HasRepo: boolean };
  With: Record<string, string>;
}

export interface Tool {
  name: string;
  needs: string[];
  generate(withArgs: Record<string, string>, data: TemplateData): string;
}

const PLACEHOLDER = /\{\{\s*\.([A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)*)\s*\}\}/g;

function lookup(data: unknown, path: string[]): string {
  let cur: unknown = data;
  for (const key of path) {
    if (!isJsonObject(cur)) return "";
    cur = cur[key];
  }
  if (typeof cur === "string") return cur;
  if (typeof cur === "number" || typeof cur === "boolean") return String(cur);
  return "";
}

/** Expands `{{.Location.Ref}}`-style references; unknown keys expand to "". */
export function expandTemplate(template: string, data: TemplateData): string {
  return template.replace(PLACEHOLDER, (_m, path: string) => lookup(data, path.split(".")));
}

export function joinFragments(a: Fragment, b: Fragment): Fragment {
  const script = a.script && b.script ? `${a.script}\n${b.script}` : a.script || b.script;
  return { script, needs: [...new Set([...a.needs, ...b.needs])] };
}

function registrySetup(ecosystem: "npm", registryTime: string | undefined, host: string): string[] {
  if (!registryTime) return [];
  const time = new Date(registryTime);
  if (Number.isNaN(time.getTime())) throw new RebuildError("Malformed", `invalid registryTime: ${registryTime}`);
  return [
    `/usr/bin/npm config --location-global set registry ${timewarpUrl(ecosystem, time, host)}`,
    "trap '/usr/bin/npm config --location-global delete registry' EXIT"
  ];
}

function npxLine(withArgs: Record<string, string>, command: string): string {
  const pkg = withArgs.npmVersion ? `npm@${withArgs.npmVersion}` : "npm";
  return `PATH=/usr/local/bin:/usr/bin:/bin ${withArgs.locator ?? ""}npx --package=${pkg} -c '${cdPrefix(withArgs.dir ?? "")}${command}'`;
}

export class ToolRegistry {
  private readonly tools = new Map<string, Tool>();

  register(tool: Tool): this {
    if (this.tools.has(tool.name)) throw internal(`tool already registered: ${tool.name}`);
    this.tools.set(tool.name, tool);
    return this;
  }

  get(name: string): Tool {
    const tool = this.tools.get(name);
    if (!tool) throw new RebuildError("Unsupported", `unknown tool: ${name}`);
    return tool;
  }

  names(): string[] {
    return [...this.tools.keys()].sort();
  }
}

export function nodeMuslTarballUrl(version: string): string {
  return `https://unofficial-builds.nodejs.org/download/release/v${version}/node-v${version}-linux-x64-musl.tar.gz`;
}

export const gitCheckoutTool: Tool = {
  name: "git-checkout",
  needs: ["git"],
  generate: (_with, data) => {
    const lines = data.BuildEnv.HasRepo ? [] : [`git clone '${data.Location.Repo}' .`];
    lines.push(`git checkout --force '${data.Location.Ref}'`);
    return lines.join("\n");
  }
};

export const installNodeTool: Tool = {
  name: "npm/install-node",
  needs: ["wget"],
  generate: (withArgs) => {
    if (!withArgs.nodeVersion) throw new RebuildError("Malformed", "npm/install-node requires nodeVersion");
    return `wget -O - ${nodeMuslTarballUrl(withArgs.nodeVersion)} | tar xzf - --strip-components=1 -C /usr/local/`;
  }
};

export const npxTool: Tool = {
  name: "npm/npx",
  needs: ["npm"],
  generate: (withArgs, data) => {
    if (!withArgs.command) throw new RebuildError("Malformed", "npm/npx requires command");
    return [...registrySetup("npm", withArgs.registryTime, data.BuildEnv.TimewarpHost), npxLine(withArgs, withArgs.command)].join(
      "\n"
    );
  }
};

export const npmInstallTool: Tool = {
  name: "npm/install",
  needs: ["npm"],
  generate: (withArgs, data) =>
    [...registrySetup("npm", withArgs.registryTime, data.BuildEnv.TimewarpHost), npxLine(withArgs, "npm install --force")].join("\n")
};

export const goBuildZipTool: Tool = {
  name: "go/buildziptool",
  needs: ["go"],
  generate: (withArgs) => {
    if (!withArgs.mod || !withArgs.script) throw new RebuildError("Malformed", "go/buildziptool requires mod and script");
    return [
      "mkdir /tools/",
      `echo ${withArgs.mod} | base64 -d > /tools/go.mod`,
      `echo ${withArgs.script} | base64 -d > /tools/main.go`,
      "cd /tools/",
      "go mod tidy",
      "go build ./main.go"
    ].join("\n");
  }
};

export function defaultToolRegistry(): ToolRegistry {
  return new ToolRegistry()
    .register(gitCheckoutTool)
    .register(installNodeTool)
    .register(npxTool)
    .register(npmInstallTool)
    .register(goBuildZipTool);
}

export function templateData(location: Location, target: Target, env: BuildEnv, withArgs: Record<string, string> = {}): TemplateData {
  return {
    Target: { Ecosystem: target.ecosystem, Package: target.package, Version: target.version, Artifact: target.artifact },
    Location: { Repo: location.repo, Ref: location.ref, Dir: location.dir },
    BuildEnv: { TimewarpHost: env.timewarpHost ?? "", HasRepo: env.hasRepo },
    With: withArgs
  };
}

export function resolveStep(step: WorkflowStep, data: TemplateData, tools: ToolRegistry): Fragment {
  const hasRuns = Boolean(step.runs);
  const hasUses = Boolean(step.uses);
  if (hasRuns === hasUses) throw new RebuildError("Malformed", "must provide exactly one of 'runs' or 'uses'");
  if (step.runs) return { script: expandTemplate(step.runs, data), needs: step.needs ?? [] };

  const tool = tools.get(step.uses ?? "");
  const resolvedWith: Record<string, string> = {};
  for (const [k, v] of Object.entries(step.with ?? {})) resolvedWith[k] = expandTemplate(v, data);
  return { script: tool.generate(resolvedWith, { ...data, With: resolvedWith }), needs: [...tool.needs, ...(step.needs ?? [])] };
}

export function resolveSteps(steps: WorkflowStep[], data: TemplateData, tools: ToolRegistry): Fragment {
  return steps.reduce<Fragment>((acc, step) => joinFragments(acc, resolveStep(step, data, tools)), { script: "", needs: [] });
}

export function renderWorkflow(
  s: WorkflowStrategy,
  target: Target,
  env: BuildEnv,
  tools: ToolRegistry = defaultToolRegistry()
): Instructions {
  const data = templateData(s.location, target, env);
  const stage = (name: string, steps: WorkflowStep[]): Fragment => {
    try {
      return resolveSteps(steps, data, tools);
    } catch (e) {
      if (e instanceof RebuildError) throw new RebuildError(e.kind, `generating ${name} steps: ${e.message}`, { cause: e });
      throw e;
    }
  };
  const source = stage("source", s.sourceSteps);
  const deps = stage("dependency", s.depsSteps);
  const build = stage("build", s.buildSteps);
  const systemDeps = [...new Set([...(s.systemDeps ?? []), ...source.needs, ...deps.needs, ...build.needs])];
  const outputPath = s.outputPath || joinPosix(s.outputDir ?? s.location.dir, target.artifact);
  return { location: s.location, source: source.script, deps: deps.script, build: build.script, systemDeps, outputPath };
}

/** POSIX join that collapses `.` segments, matching how build roots are addressed. */
export function joinPosix(...parts: string[]): string {
  const segs: string[] = [];
  for (const part of parts) {
    for (const seg of part.split("/")) {
      if (!seg || seg === ".") continue;
      if (seg === ".." && segs.length && segs[segs.length - 1] !== "..") segs.pop();
      else segs.push(seg);
    }
  }
  const joined = segs.join("/");
  return parts[0]?.startsWith("/") ? `/${joined}` : joined || ".";
}
