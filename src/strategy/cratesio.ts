import type { Target } from "../core/target.js";
import { basicSourceSetup } from "./source.js";
import type { BuildEnv, CratesIoCargoPackage, Instructions } from "./types.js";
import { joinPosix } from "./workflow.js";

export function renderCargoPackage(s: CratesIoCargoPackage, t: Target, env: BuildEnv): Instructions {
  const deps: string[] = [];
  if (s.explicitLockfile) deps.push(`echo '${s.explicitLockfile.lockfileBase64}' | base64 -d > Cargo.lock`);
  if (s.rustVersion) deps.push(`/usr/bin/rustup-init -y --profile minimal --default-toolchain ${s.rustVersion}`);
  return {
    location: s.location,
    systemDeps: ["git", "rustup"],
    source: basicSourceSetup(s.location, env),
    deps: deps.join("\n"),
    build: `/root/.cargo/bin/cargo package --no-verify --package "path+file://$(readlink -f ${s.location.dir || "."})"`,
    outputPath: joinPosix("target", "package", t.artifact)
  };
}
