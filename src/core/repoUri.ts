import { RebuildError } from "./errors.js";

const FORGES: Array<{ re: RegExp; host: string }> = [
  { re: /\bgithub(\.com)?[:/]([\w-]+\/[\w.-]+)/i, host: "github.com" },
  { re: /\bgitlab(\.com)?[:/]([\w-]+\/[\w.-]+)/i, host: "gitlab.com" },
  { re: /\bbitbucket(\.org)?[:/]([\w-]+\/[\w.-]+)/i, host: "bitbucket.org" }
];

function unsupportedRepo(uri: string): RebuildError {
  return new RebuildError("Unsupported", `unsupported repo type: ${uri}`);
}

/**
 * Reduces a repository reference (npm shorthand, git+ssh URL, browser URL) to `https://host/path`.
 * Well-known forges are lower-cased and lose any `.git` suffix and trailing path.
 */
export function canonicalizeRepoUri(uri: string): string {
  if (!uri) throw new RebuildError("NotFound", "No repo URL");

  for (const forge of FORGES) {
    const m = forge.re.exec(uri);
    const ownerRepo = m?.[2];
    if (ownerRepo) {
      const repoPath = ownerRepo.toLowerCase().replace(/\.git$/, "");
      return `https://${forge.host}/${repoPath}`;
    }
  }

  let u: URL;
  try {
    u = new URL(uri);
  } catch {
    throw unsupportedRepo(uri);
  }
  if (!u.host || u.username || u.password) throw unsupportedRepo(uri);
  // URL parsing resolves dot segments, so check the raw path.
  const rawPath = uri.split(/[?#]/)[0] ?? "";
  if (rawPath.endsWith("/.") || rawPath.endsWith("/..")) throw unsupportedRepo(uri);
  return `https://${u.host.toLowerCase()}${u.pathname === "/" ? "" : u.pathname}`;
}

/** Finds the first well-known forge reference inside free text. */
export function findCommonRepo(text: string): string {
  for (const forge of FORGES) {
    const m = forge.re.exec(text);
    if (m) return m[0];
  }
  return "";
}
