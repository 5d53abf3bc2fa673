import * as z from "zod/v4";
import type { HttpClient } from "./http.js";

export const CRATES_API_URL = "https://crates.io/api/v1/crates";
export const CRATES_STATIC_URL = "https://static.crates.io/crates";

const dateString = z.string().transform((s, ctx) => {
  const d = new Date(s);
  if (Number.isNaN(d.getTime())) {
    ctx.issues.push({ code: "custom", message: `invalid date ${s}`, input: s });
    return z.NEVER;
  }
  return d;
});

const versionSchema = z.object({
  num: z.string(),
  rust_version: z.string().nullish(),
  dl_path: z.string().optional(),
  created_at: dateString,
  updated_at: dateString,
  yanked: z.boolean().optional()
});

const crateSchema = z.object({
  crate: z.object({
    id: z.string(),
    repository: z.string().nullish(),
    created_at: dateString,
    updated_at: dateString
  }),
  versions: z.array(versionSchema)
});

const crateVersionSchema = z.object({ version: versionSchema });

export interface CrateVersion {
  version: string;
  rustVersion: string;
  created: Date;
  updated: Date;
  yanked: boolean;
  downloadUrl: string;
}

export interface Crate {
  name: string;
  repository: string;
  created: Date;
  updated: Date;
  versions: CrateVersion[];
}

export function crateDownloadUrl(name: string, version: string): string {
  return `${CRATES_STATIC_URL}/${name}/${name}-${version}.crate`;
}

function toVersion(name: string, raw: z.infer<typeof versionSchema>): CrateVersion {
  return {
    version: raw.num,
    rustVersion: raw.rust_version ?? "",
    created: raw.created_at,
    updated: raw.updated_at,
    yanked: raw.yanked ?? false,
    downloadUrl: crateDownloadUrl(name, raw.num)
  };
}

export interface CratesRegistry {
  crate(name: string, signal?: AbortSignal): Promise<Crate>;
  version(name: string, version: string, signal?: AbortSignal): Promise<CrateVersion>;
  artifact(name: string, version: string, signal?: AbortSignal): Promise<Uint8Array>;
}

export class HttpCratesRegistry implements CratesRegistry {
  constructor(
    private readonly http: HttpClient,
    private readonly apiUrl: string = CRATES_API_URL
  ) {}

  async crate(name: string, signal?: AbortSignal): Promise<Crate> {
    const raw = await this.http.json(`${this.apiUrl}/${name}`, crateSchema, signal);
    return {
      name: raw.crate.id,
      repository: raw.crate.repository ?? "",
      created: raw.crate.created_at,
      updated: raw.crate.updated_at,
      versions: raw.versions.map((v) => toVersion(raw.crate.id, v))
    };
  }

  async version(name: string, version: string, signal?: AbortSignal): Promise<CrateVersion> {
    const raw = await this.http.json(`${this.apiUrl}/${name}/${version}`, crateVersionSchema, signal);
    return toVersion(name, raw.version);
  }

  async artifact(name: string, version: string, signal?: AbortSignal): Promise<Uint8Array> {
    return this.http.bytes(crateDownloadUrl(name, version), signal);
  }
}
