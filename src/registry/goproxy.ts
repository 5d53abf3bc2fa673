import * as z from "zod/v4";
import type { HttpClient } from "./http.js";

export const GO_PROXY_URL = "https://proxy.golang.org";

const infoSchema = z.object({
  Version: z.string(),
  Time: z.string().optional(),
  Origin: z
    .object({
      VCS: z.string().optional(),
      URL: z.string().optional(),
      Ref: z.string().optional(),
      Hash: z.string().optional(),
      Subdir: z.string().optional()
    })
    .optional()
});

export interface GoOrigin {
  vcs: string;
  url: string;
  ref: string;
  hash: string;
  subdir: string;
}

export interface GoVersionInfo {
  version: string;
  time: Date | null;
  origin: GoOrigin | null;
}

/** Proxy path escaping: each upper-case letter becomes `!` plus its lower-case form. */
export function escapeModulePath(path: string): string {
  return path.replace(/[A-Z]/g, (c) => `!${c.toLowerCase()}`);
}

export interface GoProxy {
  list(module: string, signal?: AbortSignal): Promise<string[]>;
  info(module: string, version: string, signal?: AbortSignal): Promise<GoVersionInfo>;
  zip(module: string, version: string, signal?: AbortSignal): Promise<Uint8Array>;
}

export class HttpGoProxy implements GoProxy {
  constructor(
    private readonly http: HttpClient,
    private readonly baseUrl: string = GO_PROXY_URL
  ) {}

  private url(module: string, file: string): string {
    return `${this.baseUrl}/${escapeModulePath(module)}/@v/${file}`;
  }

  async list(module: string, signal?: AbortSignal): Promise<string[]> {
    const body = await this.http.text(this.url(module, "list"), signal);
    return body
      .split("\n")
      .map((l) => l.trim())
      .filter(Boolean);
  }

  async info(module: string, version: string, signal?: AbortSignal): Promise<GoVersionInfo> {
    const raw = await this.http.json(this.url(module, `${escapeModulePath(version)}.info`), infoSchema, signal);
    const time = raw.Time ? new Date(raw.Time) : null;
    return {
      version: raw.Version,
      time: time && !Number.isNaN(time.getTime()) ? time : null,
      origin: raw.Origin
        ? {
            vcs: raw.Origin.VCS ?? "",
            url: raw.Origin.URL ?? "",
            ref: raw.Origin.Ref ?? "",
            hash: raw.Origin.Hash ?? "",
            subdir: raw.Origin.Subdir ?? ""
          }
        : null
    };
  }

  async zip(module: string, version: string, signal?: AbortSignal): Promise<Uint8Array> {
    return this.http.bytes(this.url(module, `${escapeModulePath(version)}.zip`), signal);
  }
}
