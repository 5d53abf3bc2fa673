
export interface Location {
  repo: string;
  /** Commit to build; a non-empty ref implies a non-empty repo. */
  ref: string;
  dir: string;
}

export interface FileWithChecksum {
  url: string;
  md5: string;
}

export interface WorkflowStep {
  runs?: string;
  uses?: string;
  with?: Record<string, string>;
  needs?: string[];
}

export interface NpmPackBuild {
  kind: "NPMPackBuild";
  location: Location;
  npmVersion: string;
  versionOverride?: string;
}

export interface NpmCustomBuild {
  kind: "NPMCustomBuild";
  location: Location;
  npmVersion: string;
  nodeVersion: string;
  /** Script passed to `npm run`; empty when packing relies on lifecycle hooks. */
  command: string;
  registryTime: Date;
  prepackRemoveDeps: boolean;
  keepRoot: boolean;
  versionOverride?: string;
}

export interface PypiPureWheelBuild {
  kind: "PyPIPureWheelBuild";
  location: Location;
  requirements: string[];
  registryTime?: Date;
}

export interface CratesIoCargoPackage {
  kind: "CratesIOCargoPackage";
  location: Location;
  rustVersion: string;
  explicitLockfile?: { lockfileBase64: string };
}

export interface DebianPackage {
  kind: "DebianPackage";
  dsc: FileWithChecksum;
  orig?: FileWithChecksum;
  debian?: FileWithChecksum;
  native?: FileWithChecksum;
  requirements: string[];
}

export interface MavenBuild {
  kind: "MavenBuild";
  location: Location;
  jdkVersion: string;
}

export interface GoModuleBuild {
  kind: "GoModuleBuild";
  location: Location;
}

export interface WorkflowStrategy {
  kind: "WorkflowStrategy";
  location: Location;
  sourceSteps: WorkflowStep[];
  depsSteps: WorkflowStep[];
  buildSteps: WorkflowStep[];
  systemDeps?: string[];
  /** Artifact directory; the output is `<outputDir>/<artifact>` unless `outputPath` is set. */
  outputDir?: string;
  outputPath?: string;
}

/** Partial location supplied by a caller; inference expands it into a full strategy. */
export interface LocationHint {
  kind: "LocationHint";
  location: Location;
}

export type Strategy =
  | NpmPackBuild
  | NpmCustomBuild
  | PypiPureWheelBuild
  | CratesIoCargoPackage
  | DebianPackage
  | MavenBuild
  | GoModuleBuild
  | WorkflowStrategy
  | LocationHint;

export type StrategyKind = Strategy["kind"];

export interface Instructions {
  location: Location;
  systemDeps: string[];
  source: string;
  deps: string;
  build: string;
  outputPath: string;
}

export interface BuildEnv {
  timewarpHost?: string | null;
  hasRepo: boolean;
}
