import { InvalidSemverError } from "./errors.js";

export interface Semver {
  major: number;
  minor: number;
  patch: number;
  prerelease: string[];
  build: string[];
}

const NUMERIC = "0|[1-9]\\d*";
const PRERELEASE_ID = "(?:0|[1-9]\\d*|\\d*[a-zA-Z-][0-9a-zA-Z-]*)";
const BUILD_ID = "[0-9a-zA-Z-]+";

const SEMVER_RE = new RegExp(
  `^v?(${NUMERIC})\\.(${NUMERIC})\\.(${NUMERIC})` +
    `(?:-(${PRERELEASE_ID}(?:\\.${PRERELEASE_ID})*))?` +
    `(?:\\+(${BUILD_ID}(?:\\.${BUILD_ID})*))?$`
);

export function parseSemver(input: string): Semver {
  const m = SEMVER_RE.exec(input);
  if (!m) throw new InvalidSemverError(input);
  const [, major, minor, patch, pre, build] = m;
  if (major === undefined || minor === undefined || patch === undefined) throw new InvalidSemverError(input);
  const parts = [major, minor, patch].map((p) => Number(p));
  if (parts.some((n) => !Number.isSafeInteger(n))) throw new InvalidSemverError(input);
  return {
    major: parts[0] ?? 0,
    minor: parts[1] ?? 0,
    patch: parts[2] ?? 0,
    prerelease: pre ? pre.split(".") : [],
    build: build ? build.split(".") : []
  };
}

/** Whether `parseSemver` accepts `input`; numeric parts must be safe integers. */
export function isValidSemver(input: string): boolean {
  try {
    parseSemver(input);
    return true;
  } catch (e) {
    if (e instanceof InvalidSemverError) return false;
    throw e;
  }
}

export function semverString(v: Semver): string {
  let out = `${v.major}.${v.minor}.${v.patch}`;
  if (v.prerelease.length) out += `-${v.prerelease.join(".")}`;
  if (v.build.length) out += `+${v.build.join(".")}`;
  return out;
}

function sign(n: number): -1 | 0 | 1 {
  return n < 0 ? -1 : n > 0 ? 1 : 0;
}

function isNumericId(id: string): boolean {
  return /^\d+$/.test(id);
}

// Numeric identifiers carry no leading zeros, so length then lexical order is numeric order at any size.
function compareNumericIds(a: string, b: string): -1 | 0 | 1 {
  if (a.length !== b.length) return sign(a.length - b.length);
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareIdentifiers(a: string, b: string): -1 | 0 | 1 {
  const an = isNumericId(a);
  const bn = isNumericId(b);
  if (an && bn) return compareNumericIds(a, b);
  if (an) return -1;
  if (bn) return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

function comparePrerelease(a: string[], b: string[]): -1 | 0 | 1 {
  if (!a.length && !b.length) return 0;
  if (!a.length) return 1;
  if (!b.length) return -1;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const c = compareIdentifiers(a[i] ?? "", b[i] ?? "");
    if (c !== 0) return c;
  }
  return sign(a.length - b.length);
}

export function compareSemver(a: Semver, b: Semver): -1 | 0 | 1 {
  if (a.major !== b.major) return sign(a.major - b.major);
  if (a.minor !== b.minor) return sign(a.minor - b.minor);
  if (a.patch !== b.patch) return sign(a.patch - b.patch);
  return comparePrerelease(a.prerelease, b.prerelease);
}

/** Compares two version strings; throws InvalidSemverError if either is malformed. */
export function cmpSemver(a: string, b: string): -1 | 0 | 1 {
  return compareSemver(parseSemver(a), parseSemver(b));
}
