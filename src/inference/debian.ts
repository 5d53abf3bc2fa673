import { internal, malformed, unsupported } from "../core/errors.js";
import { parseComponent, type Dsc } from "../registry/debian.js";
import type { DebianPackage, FileWithChecksum, Strategy } from "../strategy/types.js";
import type { EcosystemRebuilder } from "./types.js";

const ORIG_RE = /\.orig\.tar\.(gz|xz|bz2)$/;
const DEBIAN_RE = /\.(debian\.tar|diff)\.(gz|xz|bz2)$/;
const NATIVE_RE = /\.tar\.(gz|xz|bz2)$/;

/** Package names from a Build-Depends value, without versions, architectures, profiles or alternatives. */
export function parseBuildDepends(value: string): string[] {
  return value
    .split(",")
    .map((dep) => dep.trim().split(/[\s([<|]/)[0] ?? "")
    .filter((dep) => dep !== "");
}

/** Source files and build requirements listed in a `.dsc`. */
export function debianPackageFromDsc(dscUrl: string, dsc: Dsc, pool: (file: string) => string): DebianPackage {
  let orig: FileWithChecksum | undefined;
  let debian: FileWithChecksum | undefined;
  let native: FileWithChecksum | undefined;
  const requirements: string[] = [];
  for (const stanza of dsc.stanzas) {
    for (const value of stanza.get("Files") ?? []) {
      const elems = value.trim().split(/\s+/);
      const [md5, , file] = elems;
      if (elems.length !== 3 || !md5 || !file) throw malformed(`unexpected dsc File element: ${value}`);
      const entry = { url: pool(file), md5 };
      if (ORIG_RE.test(file)) orig = entry;
      else if (DEBIAN_RE.test(file)) debian = entry;
      else if (NATIVE_RE.test(file)) {
        if (native) throw malformed(`multiple matches for native source: ${native.url}, ${file}`);
        native = entry;
      }
    }
    for (const field of ["Build-Depends", "Build-Depends-Indep"]) {
      const values = stanza.get(field);
      if (values?.length) requirements.push(...parseBuildDepends(values.join(" ")));
    }
  }
  if ((!orig || !debian) && !native) throw malformed(`failed to find source files in the .dsc file: ${dscUrl}`);
  return {
    kind: "DebianPackage",
    dsc: { url: dscUrl, md5: "" },
    ...(orig ? { orig } : {}),
    ...(debian ? { debian } : {}),
    ...(native ? { native } : {}),
    requirements
  };
}

export const debianRebuilder: EcosystemRebuilder = {
  ecosystem: "debian",
  usesRepo: false,

  async guessArtifact(t) {
    if (!t.artifact) throw malformed("debian requires artifact");
    return t.artifact;
  },

  async inferRepo() {
    return "";
  },

  async analyzeRepo() {
    throw internal("debian inference does not use a repository");
  },

  async inferStrategy(t, _rcfg, hint, ctx): Promise<Strategy> {
    if (hint) throw unsupported(`unsupported hint type: ${hint.kind}`);
    const { component, name } = parseComponent(t.package);
    const { url, dsc } = await ctx.registries.debian.dsc(component, name, t.version, ctx.signal);
    return debianPackageFromDsc(url, dsc, (file) => ctx.registries.debian.poolUrl(component, name, file));
  }
};
