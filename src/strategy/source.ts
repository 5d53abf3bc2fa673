import { RebuildError } from "../core/errors.js";
import type { BuildEnv, Location } from "./types.js";

/** Checks out `loc.ref` into the build root, cloning first when the root holds no repository yet. */
export function basicSourceSetup(loc: Location, env: BuildEnv): string {
  if (!loc.ref) throw new RebuildError("Malformed", "location has no ref");
  if (env.hasRepo) return `git checkout --force '${loc.ref}'`;
  if (!loc.repo) throw new RebuildError("Malformed", "location has a ref but no repo");
  return [`git clone '${loc.repo}' .`, `git checkout --force '${loc.ref}'`].join("\n");
}

export function cdPrefix(dir: string): string {
  return dir && dir !== "." ? `cd ${dir} && ` : "";
}
