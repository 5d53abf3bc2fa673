import tar, { type Headers } from "tar-stream";
import { malformed } from "../core/errors.js";

export type TarHeader = Headers;

export interface TarEntry {
  header: TarHeader;
  data: Uint8Array;
}

export function isTar(data: Uint8Array): boolean {
  if (data.byteLength < 262) return false;
  return new TextDecoder().decode(data.subarray(257, 262)) === "ustar";
}

export function readTar(data: Uint8Array): Promise<TarEntry[]> {
  return new Promise((resolve, reject) => {
    const entries: TarEntry[] = [];
    const ex = tar.extract();
    ex.on("entry", (header, stream, next) => {
      const chunks: Buffer[] = [];
      stream.on("data", (c: Buffer) => chunks.push(c));
      stream.on("end", () => {
        entries.push({ header, data: new Uint8Array(Buffer.concat(chunks)) });
        next();
      });
      stream.on("error", (e: Error) => reject(malformed("invalid tar entry", e)));
      stream.resume();
    });
    ex.on("finish", () => resolve(entries));
    ex.on("error", (e: Error) => reject(malformed("invalid tar archive", e)));
    ex.end(Buffer.from(data));
  });
}

export function writeTar(entries: TarEntry[]): Promise<Uint8Array> {
  return new Promise((resolve, reject) => {
    const pack = tar.pack();
    const chunks: Buffer[] = [];
    pack.on("data", (c: Buffer) => chunks.push(c));
    pack.on("end", () => resolve(new Uint8Array(Buffer.concat(chunks))));
    pack.on("error", reject);
    const writeAt = (i: number): void => {
      const entry = entries[i];
      if (!entry) {
        pack.finalize();
        return;
      }
      const body = entry.header.type === "file" || !entry.header.type ? Buffer.from(entry.data) : Buffer.alloc(0);
      pack.entry({ ...entry.header, size: body.byteLength }, body, (err) => {
        if (err) reject(err);
        else writeAt(i + 1);
      });
    };
    writeAt(0);
  });
}
