import { RebuildError } from "../core/errors.js";
import type { Target } from "../core/target.js";
import type { BuildEnv, DebianPackage, Instructions } from "./types.js";

const BINNMU_ARTIFACT = /^([^_]+)_([^_]+)(\+b\d+)_([^_]+)\.deb$/;

/** For a binNMU artifact (`_1.0-1+b2_amd64.deb`), the name debuild actually produces. */
export function binNmuBuildName(artifact: string): string | null {
  const m = BINNMU_ARTIFACT.exec(artifact);
  if (!m) return null;
  const [, name, version, , arch] = m;
  return `${name}_${version}_${arch}.deb`;
}

export function renderDebianPackage(s: DebianPackage, t: Target, _env: BuildEnv): Instructions {
  const source = ["set -eux", `wget ${s.dsc.url}`];
  if (s.native) {
    source.push(`wget ${s.native.url}`);
  } else if (s.orig && s.debian) {
    source.push(`wget ${s.orig.url}`, `wget ${s.debian.url}`);
  } else {
    throw new RebuildError("Malformed", "debian package needs a native source or both orig and debian sources");
  }
  source.push(`dpkg-source -x --no-check $(basename "${s.dsc.url}")`);

  const build = ["set -eux", "cd */", "debuild -b -uc -us"];
  const produced = binNmuBuildName(t.artifact);
  if (produced) build.push(`mv /src/${produced} /src/${t.artifact}`);

  return {
    location: { repo: "", ref: "", dir: "" },
    systemDeps: ["wget", "git", "build-essential", "fakeroot", "devscripts"],
    source: source.join("\n"),
    deps: ["set -eux", "apt update", `apt install -y ${s.requirements.join(" ")}`].join("\n"),
    build: build.join("\n"),
    outputPath: t.artifact
  };
}
