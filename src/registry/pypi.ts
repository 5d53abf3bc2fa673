import * as z from "zod/v4";
import { notFound } from "../core/errors.js";
import type { HttpClient } from "./http.js";

export const PYPI_URL = "https://pypi.org";

const artifactSchema = z.object({
  filename: z.string(),
  url: z.string(),
  digests: z.object({ md5: z.string().optional(), sha256: z.string().optional() }).optional(),
  packagetype: z.string().optional(),
  python_version: z.string().optional(),
  size: z.number().optional(),
  upload_time_iso_8601: z.string().optional()
});

const infoSchema = z.object({
  name: z.string(),
  version: z.string(),
  home_page: z.string().nullish(),
  project_urls: z.record(z.string(), z.string()).nullish()
});

const projectSchema = z.object({
  info: infoSchema,
  releases: z.record(z.string(), z.array(artifactSchema)).optional()
});

const releaseSchema = z.object({
  info: infoSchema,
  urls: z.array(artifactSchema)
});

export interface PypiArtifact {
  filename: string;
  url: string;
  sha256: string;
  packageType: string;
  pythonVersion: string;
  size: number;
  uploadTime: Date | null;
}

export interface PypiInfo {
  name: string;
  version: string;
  homePage: string;
  projectUrls: Record<string, string>;
}

export interface PypiProject {
  info: PypiInfo;
  versions: string[];
  uploadTimes: Record<string, Date>;
}

export interface PypiRelease {
  info: PypiInfo;
  artifacts: PypiArtifact[];
}

function toArtifact(raw: z.infer<typeof artifactSchema>): PypiArtifact {
  const uploaded = raw.upload_time_iso_8601 ? new Date(raw.upload_time_iso_8601) : null;
  return {
    filename: raw.filename,
    url: raw.url,
    sha256: raw.digests?.sha256 ?? "",
    packageType: raw.packagetype ?? "",
    pythonVersion: raw.python_version ?? "",
    size: raw.size ?? 0,
    uploadTime: uploaded && !Number.isNaN(uploaded.getTime()) ? uploaded : null
  };
}

function toInfo(raw: z.infer<typeof infoSchema>): PypiInfo {
  return {
    name: raw.name,
    version: raw.version,
    homePage: raw.home_page ?? "",
    projectUrls: raw.project_urls ?? {}
  };
}

export function parsePypiRelease(raw: z.infer<typeof releaseSchema>): PypiRelease {
  return { info: toInfo(raw.info), artifacts: raw.urls.map(toArtifact) };
}

/** A wheel is pure when it targets any Python ABI and any platform. */
export function isPureWheel(filename: string): boolean {
  return filename.endsWith("-none-any.whl");
}

export interface PypiRegistry {
  project(pkg: string, signal?: AbortSignal): Promise<PypiProject>;
  release(pkg: string, version: string, signal?: AbortSignal): Promise<PypiRelease>;
  artifact(pkg: string, version: string, filename: string, signal?: AbortSignal): Promise<Uint8Array>;
}

export class HttpPypiRegistry implements PypiRegistry {
  constructor(
    private readonly http: HttpClient,
    private readonly baseUrl: string = PYPI_URL
  ) {}

  async project(pkg: string, signal?: AbortSignal): Promise<PypiProject> {
    const raw = await this.http.json(`${this.baseUrl}/pypi/${pkg}/json`, projectSchema, signal);
    const uploadTimes: Record<string, Date> = {};
    for (const [ver, files] of Object.entries(raw.releases ?? {})) {
      const times = files.map(toArtifact).flatMap((a) => (a.uploadTime ? [a.uploadTime] : []));
      const earliest = times.sort((a, b) => a.getTime() - b.getTime())[0];
      if (earliest) uploadTimes[ver] = earliest;
    }
    return { info: toInfo(raw.info), versions: Object.keys(raw.releases ?? {}), uploadTimes };
  }

  async release(pkg: string, version: string, signal?: AbortSignal): Promise<PypiRelease> {
    const raw = await this.http.json(`${this.baseUrl}/pypi/${pkg}/${version}/json`, releaseSchema, signal);
    return parsePypiRelease(raw);
  }

  async artifact(pkg: string, version: string, filename: string, signal?: AbortSignal): Promise<Uint8Array> {
    const release = await this.release(pkg, version, signal);
    const match = release.artifacts.find((a) => a.filename === filename);
    if (!match) throw notFound(`artifact not found [pkg=${pkg},version=${version},file=${filename}]`);
    return this.http.bytes(match.url, signal);
  }
}
