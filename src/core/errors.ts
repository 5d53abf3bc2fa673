export type ErrorKind =
  | "Transient"
  | "NotFound"
  | "Malformed"
  | "Unsupported"
  | "NoValidRef"
  | "BuildFailure"
  | "CompareMismatch"
  | "Internal";

export type Stage = "inference" | "fetching_upstream" | "build" | "stabilizing" | "comparing";

export class RebuildError extends Error {
  /** Set only for invariant violations; these abort the process instead of becoming a verdict. */
  readonly fatal: boolean;

  constructor(
    readonly kind: ErrorKind,
    message: string,
    options?: { cause?: unknown; fatal?: boolean }
  ) {
    super(message, options);
    this.name = "RebuildError";
    this.fatal = options?.fatal ?? false;
  }
}

export class InvalidSemverError extends RebuildError {
  constructor(readonly input: string) {
    super("Malformed", `invalid semver: ${JSON.stringify(input)}`);
    this.name = "InvalidSemverError";
  }
}

export function transient(message: string, cause?: unknown): RebuildError {
  return new RebuildError("Transient", message, { cause });
}

export function notFound(message: string, cause?: unknown): RebuildError {
  return new RebuildError("NotFound", message, { cause });
}

export function malformed(message: string, cause?: unknown): RebuildError {
  return new RebuildError("Malformed", message, { cause });
}

export function unsupported(message: string): RebuildError {
  return new RebuildError("Unsupported", message);
}

export function noValidRef(message: string): RebuildError {
  return new RebuildError("NoValidRef", message);
}

export function buildFailure(message: string): RebuildError {
  return new RebuildError("BuildFailure", message);
}

export function internal(message: string, cause?: unknown): RebuildError {
  return new RebuildError("Internal", message, { cause, fatal: true });
}

export function isFatal(e: unknown): boolean {
  return e instanceof RebuildError && e.fatal;
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

export function errorKind(e: unknown): ErrorKind {
  if (e instanceof RebuildError) return e.kind;
  return "Internal";
}

export function isRetryable(e: unknown): boolean {
  return errorKind(e) === "Transient";
}

/** Prefixes the message with `<stage>: ` once, keeping the kind. */
export function withStage(stage: Stage, e: unknown): RebuildError {
  const kind = errorKind(e);
  const message = errorMessage(e);
  const prefix = `${stage}: `;
  const fatal = isFatal(e);
  if (message.startsWith(prefix)) return e instanceof RebuildError ? e : new RebuildError(kind, message, { cause: e });
  return new RebuildError(kind, `${prefix}${message}`, { cause: e, fatal });
}

/** Wraps a lower-level error with context, in the `context: cause` style. */
export function wrap(e: unknown, context: string): RebuildError {
  return new RebuildError(errorKind(e), `${context}: ${errorMessage(e)}`, { cause: e, fatal: isFatal(e) });
}
