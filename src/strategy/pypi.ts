import type { Target } from "../core/target.js";
import { basicSourceSetup } from "./source.js";
import { timewarpUrl } from "./timewarp.js";
import type { BuildEnv, Instructions, PypiPureWheelBuild } from "./types.js";
import { joinPosix } from "./workflow.js";

export function renderPypiPureWheelBuild(s: PypiPureWheelBuild, t: Target, env: BuildEnv): Instructions {
  const deps = ["/usr/bin/python3 -m venv /deps"];
  if (s.registryTime) deps.push(`export PIP_INDEX_URL=${timewarpUrl("pypi", s.registryTime, env.timewarpHost)}`);
  deps.push("/deps/bin/pip install build");
  for (const req of s.requirements) deps.push(`/deps/bin/pip install ${req}`);
  return {
    location: s.location,
    systemDeps: ["git", "python3"],
    source: basicSourceSetup(s.location, env),
    deps: deps.join("\n"),
    build: `/deps/bin/python3 -m build --wheel -n ${s.location.dir || "."}`,
    outputPath: joinPosix("dist", t.artifact)
  };
}
