import { concatBytes } from "../core/bytes.js";
import { malformed } from "../core/errors.js";

export const AR_MAGIC = "!<arch>\n";
const HEADER_SIZE = 60;

export interface ArMember {
  name: string;
  mtime: number;
  uid: number;
  gid: number;
  /** Octal mode as written in the header, e.g. `100644`. */
  mode: string;
  data: Uint8Array;
}

export function isAr(data: Uint8Array): boolean {
  return new TextDecoder().decode(data.subarray(0, AR_MAGIC.length)) === AR_MAGIC;
}

function field(header: Uint8Array, start: number, len: number): string {
  return new TextDecoder().decode(header.subarray(start, start + len)).trimEnd();
}

export function readAr(data: Uint8Array): ArMember[] {
  if (!isAr(data)) throw malformed("invalid ar archive: bad magic");
  const members: ArMember[] = [];
  let off = AR_MAGIC.length;
  while (off < data.byteLength) {
    if (off + HEADER_SIZE > data.byteLength) throw malformed("invalid ar archive: truncated header");
    const header = data.subarray(off, off + HEADER_SIZE);
    if (header[58] !== 0x60 || header[59] !== 0x0a) throw malformed("invalid ar archive: bad member header");
    const size = Number.parseInt(field(header, 48, 10), 10);
    if (!Number.isSafeInteger(size) || size < 0) throw malformed("invalid ar archive: bad member size");
    const start = off + HEADER_SIZE;
    if (start + size > data.byteLength) throw malformed("invalid ar archive: truncated member");
    members.push({
      name: field(header, 0, 16).replace(/\/$/, ""),
      mtime: Number.parseInt(field(header, 16, 12), 10) || 0,
      uid: Number.parseInt(field(header, 28, 6), 10) || 0,
      gid: Number.parseInt(field(header, 34, 6), 10) || 0,
      mode: field(header, 40, 8),
      data: data.slice(start, start + size)
    });
    off = start + size + (size % 2);
  }
  return members;
}

function pad(value: string, len: number): string {
  if (value.length > len) throw malformed(`ar header field too long: ${value}`);
  return value.padEnd(len, " ");
}

export function writeAr(members: ArMember[]): Uint8Array {
  const encoder = new TextEncoder();
  const parts: Uint8Array[] = [encoder.encode(AR_MAGIC)];
  for (const m of members) {
    const header =
      pad(m.name, 16) +
      pad(String(m.mtime), 12) +
      pad(String(m.uid), 6) +
      pad(String(m.gid), 6) +
      pad(m.mode, 8) +
      pad(String(m.data.byteLength), 10) +
      "`\n";
    parts.push(encoder.encode(header), m.data);
    if (m.data.byteLength % 2) parts.push(encoder.encode("\n"));
  }
  return concatBytes(parts);
}
