import { RebuildError } from "./errors.js";

export const ECOSYSTEMS = ["npm", "pypi", "cratesio", "debian", "maven", "go"] as const;

export type Ecosystem = (typeof ECOSYSTEMS)[number];

export function isEcosystem(value: string): value is Ecosystem {
  return (ECOSYSTEMS as readonly string[]).includes(value);
}

export function requireEcosystem(value: string): Ecosystem {
  if (isEcosystem(value)) return value;
  throw new RebuildError("Unsupported", `unsupported ecosystem: ${value}`);
}

export interface Target {
  ecosystem: Ecosystem;
  package: string;
  version: string;
  /** Empty until the ecosystem's artifact guess fills it in. */
  artifact: string;
}

export function newTarget(input: { ecosystem: string; package: string; version: string; artifact?: string }): Target {
  const ecosystem = requireEcosystem(input.ecosystem);
  if (!input.package.trim()) throw new RebuildError("Malformed", "target package must be non-empty");
  if (!input.version.trim()) throw new RebuildError("Malformed", "target version must be non-empty");
  return { ecosystem, package: input.package, version: input.version, artifact: input.artifact ?? "" };
}

/** Returns a copy with the artifact set; an artifact that is already set never changes. */
export function withArtifact(t: Target, artifact: string): Target {
  if (t.artifact && t.artifact !== artifact) {
    throw new RebuildError("Internal", `target artifact already set [have=${t.artifact},want=${artifact}]`, { fatal: true });
  }
  return { ...t, artifact };
}

export function targetId(t: Target): string {
  return [t.ecosystem, t.package, t.version, t.artifact].join("!");
}

export function targetLabel(t: Target): string {
  const base = `${t.ecosystem}:${t.package}@${t.version}`;
  return t.artifact ? `${base} (${t.artifact})` : base;
}

export function encodePathComponent(value: string): string {
  return value.replaceAll("/", "!").replaceAll("@", "");
}

export interface EncodedTarget {
  ecosystem: string;
  package: string;
  version: string;
  artifact: string;
}

export function encodeTarget(t: Target): EncodedTarget {
  return {
    ecosystem: encodePathComponent(t.ecosystem),
    package: encodePathComponent(t.package),
    version: encodePathComponent(t.version),
    artifact: encodePathComponent(t.artifact)
  };
}

/** `<eco>/<pkg>/<ver>/<artifact>` with every component made filesystem-safe. */
export function encodedTargetPath(t: Target): string[] {
  const et = encodeTarget(t);
  return [et.ecosystem, et.package, et.version, et.artifact];
}
