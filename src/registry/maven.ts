import { XMLParser } from "fast-xml-parser";
import { malformed } from "../core/errors.js";
import type { HttpClient } from "./http.js";

export const MAVEN_CENTRAL_URL = "https://repo1.maven.org/maven2";

export interface MavenMetadata {
  groupId: string;
  artifactId: string;
  versions: string[];
  lastUpdated: Date | null;
}

export interface Pom {
  groupId: string;
  artifactId: string;
  version: string;
  scm: { url: string; connection: string; tag: string };
  properties: Record<string, string>;
}

const parser = new XMLParser({
  ignoreAttributes: true,
  parseTagValue: false,
  trimValues: true,
  isArray: (_name, jpath) => jpath === "metadata.versioning.versions.version"
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function child(node: unknown, key: string): unknown {
  return isRecord(node) ? node[key] : undefined;
}

function text(node: unknown): string {
  if (typeof node === "string") return node;
  if (typeof node === "number" || typeof node === "boolean") return String(node);
  return "";
}

function parseXml(xml: string, source: string): unknown {
  try {
    const parsed: unknown = parser.parse(xml);
    return parsed;
  } catch (e) {
    throw malformed(`invalid XML [source=${source}]`, e);
  }
}

/** `group:artifact` → `{groupId, artifactId}`. */
export function parseCoordinates(pkg: string): { groupId: string; artifactId: string } {
  const colon = pkg.indexOf(":");
  if (colon === -1) throw malformed("package identifier not of form 'group:artifact'");
  return { groupId: pkg.slice(0, colon), artifactId: pkg.slice(colon + 1) };
}

// lastUpdated is yyyyMMddHHmmss in UTC.
function parseLastUpdated(raw: string): Date | null {
  const m = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})$/.exec(raw);
  if (!m) return null;
  const [, y, mo, d, h, mi, s] = m.map(Number);
  if (y === undefined || mo === undefined || d === undefined || h === undefined || mi === undefined || s === undefined) {
    return null;
  }
  return new Date(Date.UTC(y, mo - 1, d, h, mi, s));
}

export function parseMavenMetadata(xml: string): MavenMetadata {
  const root = child(parseXml(xml, "maven-metadata.xml"), "metadata");
  if (!isRecord(root)) throw malformed("maven-metadata.xml has no <metadata> root");
  const versioning = child(root, "versioning");
  const rawVersions = child(child(versioning, "versions"), "version");
  const versions = Array.isArray(rawVersions) ? rawVersions.map(text).filter(Boolean) : [];
  return {
    groupId: text(root.groupId),
    artifactId: text(root.artifactId),
    versions,
    lastUpdated: parseLastUpdated(text(child(versioning, "lastUpdated")))
  };
}

export function parsePom(xml: string): Pom {
  const project = child(parseXml(xml, "pom.xml"), "project");
  if (!isRecord(project)) throw malformed("pom.xml has no <project> root");
  const parent = child(project, "parent");
  const scm = child(project, "scm");
  const properties: Record<string, string> = {};
  const rawProps = child(project, "properties");
  if (isRecord(rawProps)) {
    for (const [k, v] of Object.entries(rawProps)) properties[k] = text(v);
  }
  return {
    groupId: text(project.groupId) || text(child(parent, "groupId")),
    artifactId: text(project.artifactId),
    version: text(project.version) || text(child(parent, "version")),
    scm: {
      url: text(child(scm, "url")),
      connection: text(child(scm, "connection")) || text(child(scm, "developerConnection")),
      tag: text(child(scm, "tag"))
    },
    properties
  };
}

export interface MavenRegistry {
  metadata(pkg: string, signal?: AbortSignal): Promise<MavenMetadata>;
  pom(pkg: string, version: string, signal?: AbortSignal): Promise<Pom>;
  releaseFile(pkg: string, version: string, file: string, signal?: AbortSignal): Promise<Uint8Array>;
}

export class HttpMavenRegistry implements MavenRegistry {
  constructor(
    private readonly http: HttpClient,
    private readonly baseUrl: string = MAVEN_CENTRAL_URL
  ) {}

  private packageUrl(pkg: string): string {
    const { groupId, artifactId } = parseCoordinates(pkg);
    return `${this.baseUrl}/${groupId.replaceAll(".", "/")}/${artifactId}`;
  }

  async metadata(pkg: string, signal?: AbortSignal): Promise<MavenMetadata> {
    return parseMavenMetadata(await this.http.text(`${this.packageUrl(pkg)}/maven-metadata.xml`, signal));
  }

  async pom(pkg: string, version: string, signal?: AbortSignal): Promise<Pom> {
    const { artifactId } = parseCoordinates(pkg);
    const url = `${this.packageUrl(pkg)}/${version}/${artifactId}-${version}.pom`;
    return parsePom(await this.http.text(url, signal));
  }

  async releaseFile(pkg: string, version: string, file: string, signal?: AbortSignal): Promise<Uint8Array> {
    return this.http.bytes(`${this.packageUrl(pkg)}/${version}/${file}`, signal);
  }
}
