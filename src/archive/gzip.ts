import { gunzipSync, gzipSync } from "fflate";
import { malformed } from "../core/errors.js";

export const GZIP_LEVEL = 9;

export function isGzip(data: Uint8Array): boolean {
  return data.byteLength >= 2 && data[0] === 0x1f && data[1] === 0x8b;
}

export function gunzip(data: Uint8Array): Uint8Array {
  try {
    return gunzipSync(data);
  } catch (e) {
    throw malformed("invalid gzip stream", e);
  }
}

/** Gzip with a fixed header: zero mtime, no file name, XFL and OS bytes set by the level. */
export function gzipStable(data: Uint8Array): Uint8Array {
  return gzipSync(data, { level: GZIP_LEVEL, mtime: 0 });
}
