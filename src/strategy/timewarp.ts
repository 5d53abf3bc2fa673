import { RebuildError } from "../core/errors.js";
import type { Ecosystem } from "../core/target.js";

/** RFC 3339 in UTC with whole seconds, e.g. `2023-02-10T10:00:00Z`. */
export function rfc3339Seconds(time: Date): string {
  if (Number.isNaN(time.getTime())) throw new RebuildError("Malformed", "invalid registry time");
  return `${time.toISOString().slice(0, 19)}Z`;
}

/**
 * Registry URL routed through the date-pinned proxy: `http://<ecosystem>:<time>@<host>`.
 */
export function timewarpUrl(ecosystem: Ecosystem, time: Date, host: string | null | undefined): string {
  if (!host) throw new RebuildError("Malformed", "no timewarp host configured");
  return `http://${ecosystem}:${rfc3339Seconds(time)}@${host}`;
}
