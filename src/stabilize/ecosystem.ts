import { sha256Base64Url } from "../core/canonicalJson.js";
import type { Member, Stabilizer } from "./types.js";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

function mapText<M>(m: Member<M>, fn: (text: string) => string): Member<M> {
  const before = decoder.decode(m.data);
  const after = fn(before);
  return after === before ? m : { ...m, data: encoder.encode(after) };
}

export const npmRootDir: Stabilizer = {
  name: "npm-root-dir",
  appliesTo: (t) => t.ecosystem === "npm",
  apply(members) {
    return members.map((m) => (m.name.includes("/") ? { ...m, name: m.name.replace(/^[^/]*\//, "package/") } : m));
  }
};

const CARGO_VCS_INFO = /^[^/]+\/\.cargo_vcs_info\.json$/;

export const crateVcsInfo: Stabilizer = {
  name: "crate-vcs-info",
  appliesTo: (t) => t.ecosystem === "cratesio",
  apply(members) {
    return members.map((m) =>
      m.isFile && CARGO_VCS_INFO.test(m.name)
        ? mapText(m, (text) => text.replace(/("sha1"\s*:\s*")[^"]*(")/, `$1${"x".repeat(40)}$2`))
        : m
    );
  }
};

const WHEEL_FILE = /\.dist-info\/WHEEL$/;
const METADATA_FILE = /(\.dist-info\/METADATA|(^|\/)PKG-INFO)$/;
const RECORD_FILE = /\.dist-info\/RECORD$/;

/** Drops `Key: UNKNOWN` lines from the header block of a core-metadata file. */
export function stripUnknownHeaders(text: string): string {
  const split = text.search(/\r?\n\r?\n/);
  const header = split === -1 ? text : text.slice(0, split);
  const rest = split === -1 ? "" : text.slice(split);
  const kept = header.split("\n").filter((line) => !/^[A-Za-z0-9-]+: UNKNOWN\r?$/.test(line));
  return kept.join("\n") + rest;
}

export function stripGeneratorVersion(text: string): string {
  return text.replace(/^(Generator: [^\s(]+)[ \t]+\(?\d[^\r\n]*$/m, "$1");
}

export function recordLines<M>(members: Member<M>[], recordPath: string): string {
  const lines = members
    .filter((m) => m.isFile)
    .map((m) => (m.name === recordPath ? `${m.name},,` : `${m.name},sha256=${sha256Base64Url(m.data)},${m.data.byteLength}`));
  return lines.length ? `${lines.join("\n")}\n` : "";
}

export const pypiMetadata: Stabilizer = {
  name: "pypi-metadata",
  appliesTo: (t) => t.ecosystem === "pypi",
  apply(members) {
    const out = members.map((m) => {
      if (!m.isFile) return m;
      if (WHEEL_FILE.test(m.name)) return mapText(m, stripGeneratorVersion);
      if (METADATA_FILE.test(m.name)) return mapText(m, stripUnknownHeaders);
      return m;
    });
    return out.map((m) =>
      m.isFile && RECORD_FILE.test(m.name) ? { ...m, data: encoder.encode(recordLines(out, m.name)) } : m
    );
  }
};

export const ECOSYSTEM_STABILIZERS: readonly Stabilizer[] = [npmRootDir, crateVcsInfo, pypiMetadata];
