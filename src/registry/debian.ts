import { malformed, wrap } from "../core/errors.js";
import type { HttpClient } from "./http.js";

export const DEBIAN_MIRROR_URL = "https://deb.debian.org/debian";

const BINARY_RELEASE_RE = /(\+b[\d.]+)$/;

/** One paragraph of a Debian control file; multi-line fields keep one entry per continuation line. */
export type ControlStanza = Map<string, string[]>;

export interface Dsc {
  stanzas: ControlStanza[];
}

/** Splits a package of the form `<component>/<name>`. */
export function parseComponent(pkg: string): { component: string; name: string } {
  const slash = pkg.indexOf("/");
  if (slash === -1) throw malformed(`failed to parse debian component: ${pkg}`);
  return { component: pkg.slice(0, slash), name: pkg.slice(slash + 1) };
}

export function poolUrl(component: string, name: string, file: string, mirror: string = DEBIAN_MIRROR_URL): string {
  const prefix = name.startsWith("lib") ? name.slice(0, 4) : name.slice(0, 1);
  return `${mirror}/pool/${component}/${prefix}/${name}/${file}`;
}

export function dscFileName(name: string, version: string): string {
  return `${name}_${version.replace(BINARY_RELEASE_RE, "")}.dsc`;
}

export function parseControl(text: string): Dsc {
  const lines = text.split(/\r?\n/);
  let i = 0;
  if (lines[0]?.startsWith("-----BEGIN PGP SIGNED MESSAGE-----")) {
    // Skip the armor header block up to its terminating blank line.
    i = 1;
    while (i < lines.length && (lines[i] ?? "").trim() !== "") i++;
  }

  const stanzas: ControlStanza[] = [];
  let stanza: ControlStanza = new Map();
  let lastField = "";
  for (; i < lines.length; i++) {
    const line = lines[i] ?? "";
    if (line.startsWith("-----BEGIN PGP SIGNATURE-----")) break;
    if (line.trim() === "") {
      if (stanza.size > 0) {
        stanzas.push(stanza);
        stanza = new Map();
        lastField = "";
      }
      continue;
    }
    if (line.startsWith(" ") || line.startsWith("\t")) {
      const values = lastField ? stanza.get(lastField) : undefined;
      if (!values) throw malformed("unexpected continuation line");
      values.push(line.trim());
      continue;
    }
    const colon = line.indexOf(":");
    if (colon === -1) throw malformed(`expected new field: ${line}`);
    const field = line.slice(0, colon);
    if (stanza.has(field)) throw malformed(`duplicate field in stanza: ${field}`);
    const value = line.slice(colon + 1).trim();
    stanza.set(field, value ? [value] : []);
    lastField = field;
  }
  if (stanza.size > 0) stanzas.push(stanza);
  return { stanzas };
}

export interface DebianRegistry {
  dsc(component: string, name: string, version: string, signal?: AbortSignal): Promise<{ url: string; dsc: Dsc }>;
  artifact(component: string, name: string, artifact: string, signal?: AbortSignal): Promise<Uint8Array>;
  poolUrl(component: string, name: string, file: string): string;
}

export class HttpDebianRegistry implements DebianRegistry {
  constructor(
    private readonly http: HttpClient,
    private readonly mirror: string = DEBIAN_MIRROR_URL
  ) {}

  poolUrl(component: string, name: string, file: string): string {
    return poolUrl(component, name, file, this.mirror);
  }

  async dsc(component: string, name: string, version: string, signal?: AbortSignal): Promise<{ url: string; dsc: Dsc }> {
    const url = this.poolUrl(component, name, dscFileName(name, version));
    let text: string;
    try {
      text = await this.http.text(url, signal);
    } catch (e) {
      throw wrap(e, "failed to fetch .dsc file");
    }
    return { url, dsc: parseControl(text) };
  }

  async artifact(component: string, name: string, artifact: string, signal?: AbortSignal): Promise<Uint8Array> {
    return this.http.bytes(this.poolUrl(component, name, artifact), signal);
  }
}
