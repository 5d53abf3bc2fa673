import { createHash } from "crypto";
import { malformed } from "./errors.js";

export function sha256Hex(data: string | Uint8Array): string {
  return createHash("sha256").update(data).digest("hex");
}

export function sha256Prefixed(data: string | Uint8Array): `sha256:${string}` {
  return `sha256:${sha256Hex(data)}` as const;
}

// Wheel RECORD digests: urlsafe base64 without padding.
export function sha256Base64Url(data: string | Uint8Array): string {
  return createHash("sha256").update(data).digest("base64url");
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    (Object.getPrototypeOf(value) === Object.prototype || Object.getPrototypeOf(value) === null)
  );
}

export function canonicalizeJson(value: unknown): unknown {
  if (value === undefined) return undefined;
  if (value === null) return null;

  if (typeof value === "number") {
    if (!Number.isFinite(value)) return null;
    if (Object.is(value, -0)) return 0;
    return value;
  }

  if (typeof value === "string" || typeof value === "boolean") return value;

  if (typeof value === "bigint") return value.toString();

  if (value instanceof Date) return value.toISOString();

  if (Array.isArray(value)) {
    return value.map((v) => {
      const c = canonicalizeJson(v);
      return c === undefined ? null : c;
    });
  }

  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    const keys = Object.keys(value).sort();
    for (const key of keys) {
      const c = canonicalizeJson(value[key]);
      if (c !== undefined) out[key] = c;
    }
    return out;
  }

  if (value instanceof Map) {
    return canonicalizeJson(Object.fromEntries(value));
  }

  throw malformed(`value is not JSON-serializable: ${Object.prototype.toString.call(value)}`);
}

export function stableJsonStringify(value: unknown, indent?: number): string {
  return JSON.stringify(canonicalizeJson(value), null, indent);
}
