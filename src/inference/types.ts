import type { Ecosystem, Target } from "../core/target.js";
import type { RegistryMux } from "../registry/mux.js";
import type { Repository } from "../repo/types.js";
import type { RebuildLog } from "../runs/rebuildLog.js";
import type { Strategy } from "../strategy/types.js";

export interface InferenceContext {
  registries: RegistryMux;
  log: RebuildLog;
  signal?: AbortSignal;
}

/** What analysing a freshly cloned repository learned about the target's manifest. */
export interface RepoConfig {
  uri: string;
  repository: Repository;
  /** Manifest directory at HEAD; empty when the heuristic found none. */
  dir: string;
  /** version -> commit, built by walking the history of the manifest. */
  refMap: Map<string, string>;
}

export interface BuildFailureContext {
  stage: "source" | "deps" | "build";
  output: string;
}

export interface EcosystemRebuilder {
  ecosystem: Ecosystem;
  /** Whether inference needs a cloned source repository. */
  usesRepo: boolean;
  guessArtifact(t: Target, ctx: InferenceContext): Promise<string>;
  /** Canonical repository URL for the target. */
  inferRepo(t: Target, ctx: InferenceContext): Promise<string>;
  analyzeRepo(t: Target, repository: Repository, ctx: InferenceContext): Promise<RepoConfig>;
  inferStrategy(t: Target, rcfg: RepoConfig | null, hint: Strategy | null, ctx: InferenceContext): Promise<Strategy>;
  /** Maps a failed build's output to a verdict message; null keeps the generic message. */
  classifyBuildFailure?(failure: BuildFailureContext): string | null;
}
