import { unsupported } from "../core/errors.js";
import { withArtifact, type Ecosystem, type Target } from "../core/target.js";
import type { Repository } from "../repo/types.js";
import type { Strategy } from "../strategy/types.js";
import { cratesioRebuilder } from "./cratesio.js";
import { debianRebuilder } from "./debian.js";
import { goRebuilder } from "./go.js";
import { mavenRebuilder } from "./maven.js";
import { npmRebuilder } from "./npm.js";
import { pypiRebuilder } from "./pypi.js";
import type { EcosystemRebuilder, InferenceContext, RepoConfig } from "./types.js";

export const REBUILDERS: Readonly<Record<Ecosystem, EcosystemRebuilder>> = {
  npm: npmRebuilder,
  pypi: pypiRebuilder,
  cratesio: cratesioRebuilder,
  debian: debianRebuilder,
  maven: mavenRebuilder,
  go: goRebuilder
};

export function rebuilderFor(ecosystem: Ecosystem): EcosystemRebuilder {
  const r = REBUILDERS[ecosystem];
  if (!r) throw unsupported(`unsupported ecosystem: ${ecosystem}`);
  return r;
}

/** Fills in the artifact name when the caller left it empty. */
export async function resolveArtifact(t: Target, ctx: InferenceContext): Promise<Target> {
  if (t.artifact) return t;
  return withArtifact(t, await rebuilderFor(t.ecosystem).guessArtifact(t, ctx));
}

/** A concrete strategy passes through; a missing or LocationHint one goes through inference. */
export function needsInference(hint: Strategy | null): boolean {
  return hint === null || hint.kind === "LocationHint";
}

/** Repository URL the build checks out: the hint's when it names one, else the registry's. */
export async function repoUriFor(t: Target, hint: Strategy | null, ctx: InferenceContext): Promise<string> {
  if (hint && hint.kind !== "DebianPackage" && hint.location.repo) return hint.location.repo;
  return rebuilderFor(t.ecosystem).inferRepo(t, ctx);
}

export type RepoOpener = (uri: string, signal?: AbortSignal) => Promise<Repository>;

/**
 * Runs the per-ecosystem inference for a target whose artifact is already set.
 * The repository, when the ecosystem uses one, must already be open.
 */
export async function inferStrategy(
  t: Target,
  hint: Strategy | null,
  repository: Repository | null,
  ctx: InferenceContext
): Promise<Strategy> {
  if (hint && !needsInference(hint)) return hint;
  const rebuilder = rebuilderFor(t.ecosystem);
  let rcfg: RepoConfig | null = null;
  if (rebuilder.usesRepo && repository) rcfg = await rebuilder.analyzeRepo(t, repository, ctx);
  const strategy = await rebuilder.inferStrategy(t, rcfg, hint, ctx);
  ctx.log.event("infer.strategy", `inferred ${strategy.kind}`, { kind: strategy.kind });
  return strategy;
}

/** Artifact guess, clone and inference in one call; the repository is released before returning. */
export async function inferTarget(
  t: Target,
  hint: Strategy | null,
  ctx: InferenceContext,
  openRepo: RepoOpener
): Promise<{ target: Target; strategy: Strategy }> {
  const target = await resolveArtifact(t, ctx);
  if (!needsInference(hint) && hint) return { target, strategy: hint };
  if (!rebuilderFor(target.ecosystem).usesRepo) {
    return { target, strategy: await inferStrategy(target, hint, null, ctx) };
  }
  const repository = await openRepo(await repoUriFor(target, hint, ctx), ctx.signal);
  try {
    return { target, strategy: await inferStrategy(target, hint, repository, ctx) };
  } finally {
    await repository.release();
  }
}
