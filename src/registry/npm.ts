import * as z from "zod/v4";
import { notFound } from "../core/errors.js";
import type { HttpClient } from "./http.js";

export const NPM_REGISTRY_URL = "https://registry.npmjs.org";

export interface NpmRepository {
  type: string;
  url: string;
  directory: string;
}

export interface NpmVersionMeta {
  name: string;
  version: string;
  gitHead: string;
  npmVersion: string;
  nodeVersion: string;
  dist: { tarball: string; shasum: string; integrity: string };
  repository: NpmRepository;
  scripts: Record<string, string>;
}

export interface NpmPackageMeta {
  name: string;
  latest: string;
  versions: string[];
  uploadTimes: Record<string, Date>;
}

const repositorySchema = z
  .union([
    z.string(),
    z.object({
      type: z.string().optional(),
      url: z.string().optional(),
      directory: z.string().optional()
    }),
    z.null()
  ])
  .optional();

const versionSchema = z.object({
  name: z.string(),
  version: z.string(),
  gitHead: z.string().optional(),
  _npmVersion: z.string().optional(),
  _nodeVersion: z.string().optional(),
  dist: z
    .object({
      tarball: z.string().optional(),
      shasum: z.string().optional(),
      integrity: z.string().optional()
    })
    .optional(),
  repository: repositorySchema,
  scripts: z.record(z.string(), z.unknown()).optional()
});

const packageSchema = z.object({
  name: z.string(),
  "dist-tags": z.object({ latest: z.string().optional() }).optional(),
  versions: z.record(z.string(), z.unknown()).optional(),
  time: z.record(z.string(), z.string()).optional()
});

type RawRepository = z.infer<typeof repositorySchema>;

/** Accepts both the structured `{type,url,directory}` form and the legacy bare URL string. */
export function normalizeRepository(raw: RawRepository): NpmRepository {
  if (typeof raw === "string") return { type: "", url: raw, directory: "" };
  if (!raw) return { type: "", url: "", directory: "" };
  return { type: raw.type ?? "", url: raw.url ?? "", directory: raw.directory ?? "" };
}

function stringScripts(raw: Record<string, unknown> | undefined): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(raw ?? {})) {
    if (typeof v === "string") out[k] = v;
  }
  return out;
}

export function toVersionMeta(raw: z.infer<typeof versionSchema>): NpmVersionMeta {
  return {
    name: raw.name,
    version: raw.version,
    gitHead: raw.gitHead ?? "",
    npmVersion: raw._npmVersion ?? "",
    nodeVersion: raw._nodeVersion ?? "",
    dist: {
      tarball: raw.dist?.tarball ?? "",
      shasum: raw.dist?.shasum ?? "",
      integrity: raw.dist?.integrity ?? ""
    },
    repository: normalizeRepository(raw.repository),
    scripts: stringScripts(raw.scripts)
  };
}

export interface NpmRegistry {
  package(pkg: string, signal?: AbortSignal): Promise<NpmPackageMeta>;
  version(pkg: string, version: string, signal?: AbortSignal): Promise<NpmVersionMeta>;
  artifact(pkg: string, version: string, signal?: AbortSignal): Promise<Uint8Array>;
}

export class HttpNpmRegistry implements NpmRegistry {
  constructor(
    private readonly http: HttpClient,
    private readonly baseUrl: string = NPM_REGISTRY_URL
  ) {}

  async package(pkg: string, signal?: AbortSignal): Promise<NpmPackageMeta> {
    const raw = await this.http.json(`${this.baseUrl}/${pkg}`, packageSchema, signal);
    const uploadTimes: Record<string, Date> = {};
    for (const [ver, ts] of Object.entries(raw.time ?? {})) {
      if (ver === "created" || ver === "modified") continue;
      const d = new Date(ts);
      if (!Number.isNaN(d.getTime())) uploadTimes[ver] = d;
    }
    return {
      name: raw.name,
      latest: raw["dist-tags"]?.latest ?? "",
      versions: Object.keys(raw.versions ?? {}),
      uploadTimes
    };
  }

  async version(pkg: string, version: string, signal?: AbortSignal): Promise<NpmVersionMeta> {
    const raw = await this.http.json(`${this.baseUrl}/${pkg}/${version}`, versionSchema, signal);
    return toVersionMeta(raw);
  }

  async artifact(pkg: string, version: string, signal?: AbortSignal): Promise<Uint8Array> {
    const v = await this.version(pkg, version, signal);
    if (!v.dist.tarball) throw notFound(`no tarball url for ${pkg}@${version}`);
    return this.http.bytes(v.dist.tarball, signal);
  }
}
