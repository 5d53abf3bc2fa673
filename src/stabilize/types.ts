import type { Target } from "../core/target.js";

/** An archive member as seen by ecosystem stabilizers; `meta` carries the container's own header. */
export interface Member<M = unknown> {
  name: string;
  data: Uint8Array;
  isFile: boolean;
  meta: M;
}

export interface Stabilizer {
  name: string;
  appliesTo(t: Target): boolean;
  /** Must be idempotent. */
  apply<M>(members: Member<M>[], t: Target): Member<M>[];
}
