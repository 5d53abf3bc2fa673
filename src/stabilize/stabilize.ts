import type { Target } from "../core/target.js";
import { readAr, writeAr, type ArMember } from "../archive/ar.js";
import { formatForTarget } from "../archive/format.js";
import { gunzip, gzipStable, isGzip } from "../archive/gzip.js";
import { isTar, readTar, writeTar, type TarEntry, type TarHeader } from "../archive/tar.js";
import { readZip, writeZipStable } from "../archive/zip.js";
import { ECOSYSTEM_STABILIZERS } from "./ecosystem.js";
import type { Member, Stabilizer } from "./types.js";

function byName<T extends { name: string }>(a: T, b: T): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

function isRegular(header: TarHeader): boolean {
  return header.type === "file" || !header.type;
}

// Directory names already carry their trailing slash.
function stableHeader(header: TarHeader, name: string): TarHeader {
  const isDir = header.type === "directory";
  const exec = ((header.mode ?? 0) & 0o111) !== 0;
  return {
    name,
    type: header.type ?? "file",
    linkname: header.linkname ?? null,
    mode: isDir || exec ? 0o755 : 0o644,
    mtime: new Date(0),
    uid: 0,
    gid: 0,
    uname: "",
    gname: "",
    devmajor: 0,
    devminor: 0
  };
}

function applyAll<M>(members: Member<M>[], t: Target, stabilizers: readonly Stabilizer[]): Member<M>[] {
  let out = members;
  for (const s of stabilizers) {
    if (s.appliesTo(t)) out = s.apply(out, t);
  }
  return out;
}

/** Sorted entries with zeroed ownership and times, normalized modes, and no pax records. */
export async function stabilizeTar(data: Uint8Array, t: Target, stabilizers: readonly Stabilizer[] = []): Promise<Uint8Array> {
  const entries = await readTar(data);
  const members: Member<TarHeader>[] = entries.map((e) => ({
    name: e.header.type === "directory" && !e.header.name.endsWith("/") ? `${e.header.name}/` : e.header.name,
    data: e.data,
    isFile: isRegular(e.header),
    meta: e.header
  }));
  const out: TarEntry[] = applyAll(members, t, stabilizers)
    .map((m) => {
      const header = stableHeader(m.meta, m.name);
      return { name: header.name, header, data: m.isFile ? m.data : new Uint8Array(0) };
    })
    .sort(byName);
  return writeTar(out.map(({ header, data }) => ({ header, data })));
}

export async function stabilizeTarGz(data: Uint8Array, t: Target, stabilizers: readonly Stabilizer[] = []): Promise<Uint8Array> {
  return gzipStable(await stabilizeTar(gunzip(data), t, stabilizers));
}

/** Sorted stored entries at the DOS epoch with no comments, extra fields or attributes. */
export function stabilizeZip(data: Uint8Array, t: Target, stabilizers: readonly Stabilizer[] = []): Uint8Array {
  const members: Member<null>[] = readZip(data)
    .sort(byName)
    .map((e) => ({ name: e.name, data: e.data, isFile: !e.name.endsWith("/"), meta: null }));
  const out = applyAll(members, t, stabilizers).sort(byName);
  return writeZipStable(out.map((m) => ({ name: m.name, data: m.data })));
}

/** Zeroes ar member headers in place of order; gzip and tar members are stabilized recursively. */
export async function stabilizeDeb(data: Uint8Array, t: Target): Promise<Uint8Array> {
  const members: ArMember[] = [];
  for (const m of readAr(data)) {
    let body = m.data;
    if (isGzip(body)) {
      const inner = gunzip(body);
      if (isTar(inner)) body = gzipStable(await stabilizeTar(inner, t));
    } else if (isTar(body)) {
      body = await stabilizeTar(body, t);
    }
    members.push({ name: m.name, mtime: 0, uid: 0, gid: 0, mode: "100644", data: body });
  }
  return writeAr(members);
}

/** Runs the generic and ecosystem stabilizers for the target's artifact format. Idempotent. */
export async function stabilize(
  data: Uint8Array,
  t: Target,
  stabilizers: readonly Stabilizer[] = ECOSYSTEM_STABILIZERS
): Promise<Uint8Array> {
  switch (formatForTarget(t)) {
    case "targz":
      return stabilizeTarGz(data, t, stabilizers);
    case "tar":
      return stabilizeTar(data, t, stabilizers);
    case "zip":
      return stabilizeZip(data, t, stabilizers);
    case "deb":
      return stabilizeDeb(data, t);
    case "raw":
      return data;
  }
}
