import type { Target } from "../core/target.js";
import { readAr } from "./ar.js";
import { formatForTarget, type ArchiveFormat } from "./format.js";
import { gunzip, isGzip } from "./gzip.js";
import { isTar, readTar } from "./tar.js";
import { readZip } from "./zip.js";

/** A regular file inside an artifact, addressed by its archive path. */
export interface ArchiveFile {
  path: string;
  data: Uint8Array;
}

async function tarFiles(data: Uint8Array, prefix = ""): Promise<ArchiveFile[]> {
  const entries = await readTar(data);
  return entries
    .filter((e) => e.header.type === "file" || !e.header.type)
    .map((e) => ({ path: `${prefix}${e.header.name}`, data: e.data }));
}

/** Flattens an artifact to its regular files; debian members that are tarballs are expanded under `<member>/`. */
export async function listFiles(data: Uint8Array, format: ArchiveFormat, name: string): Promise<ArchiveFile[]> {
  switch (format) {
    case "targz":
      return tarFiles(gunzip(data));
    case "tar":
      return tarFiles(data);
    case "zip":
      return readZip(data)
        .filter((e) => !e.name.endsWith("/"))
        .map((e) => ({ path: e.name, data: e.data }));
    case "deb": {
      const out: ArchiveFile[] = [];
      for (const m of readAr(data)) {
        const inner = isGzip(m.data) ? gunzip(m.data) : m.data;
        if (isTar(inner)) out.push(...(await tarFiles(inner, `${m.name}/`)));
        else out.push({ path: m.name, data: m.data });
      }
      return out;
    }
    case "raw":
      return [{ path: name, data }];
  }
}

export function listTargetFiles(data: Uint8Array, t: Target): Promise<ArchiveFile[]> {
  return listFiles(data, formatForTarget(t), t.artifact);
}
