import { unzipSync, zipSync, type Zippable } from "fflate";
import { malformed } from "../core/errors.js";

export interface ZipEntry {
  name: string;
  data: Uint8Array;
}

export function readZip(data: Uint8Array): ZipEntry[] {
  let files: Record<string, Uint8Array>;
  try {
    files = unzipSync(data);
  } catch (e) {
    throw malformed("invalid zip archive", e);
  }
  return Object.entries(files).map(([name, content]) => ({ name, data: content }));
}

/** 1980-01-01 00:00, the DOS epoch; DOS times carry no zone so local fields are what gets written. */
export const ZIP_EPOCH = new Date(1980, 0, 1, 0, 0, 0);

/** Stored entries in the given order, with the DOS epoch as mtime and no comments, extra fields or attributes. */
export function writeZipStable(entries: ZipEntry[]): Uint8Array {
  const files: Zippable = {};
  for (const e of entries) files[e.name] = [e.data, { level: 0, mtime: ZIP_EPOCH }];
  return zipSync(files, { level: 0, mtime: ZIP_EPOCH });
}
