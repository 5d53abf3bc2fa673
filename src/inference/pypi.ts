import { parse as parseToml } from "smol-toml";
import { RebuildError, malformed, notFound, unsupported } from "../core/errors.js";
import { canonicalizeRepoUri, findCommonRepo } from "../core/repoUri.js";
import { readZip, type ZipEntry } from "../archive/zip.js";
import { isPureWheel, type PypiArtifact, type PypiProject } from "../registry/pypi.js";
import { findTagMatch } from "../repo/tags.js";
import { readTextOrNull, type Repository } from "../repo/types.js";
import type { RebuildLog } from "../runs/rebuildLog.js";
import type { Location, Strategy } from "../strategy/types.js";
import { escapeRegExp, hintLocation, manifestDir, pickShortestPath, requireRepoConfig } from "./common.js";
import type { EcosystemRebuilder, RepoConfig } from "./types.js";

const REPO_LINK_NAMES = ["source", "sourcecode", "source code", "repository", "project", "github", "code"];

/**
 * Repository URL from project links: a source-ish link to a known forge, then any source-ish link,
 * then the home page, then any other link to a known forge.
 */
export function repoFromProject(project: PypiProject): string {
  const urls = Object.entries(project.info.projectUrls);
  const repoLinks = urls.filter(([name]) => REPO_LINK_NAMES.includes(name.toLowerCase())).map(([, url]) => url);
  for (const url of repoLinks) {
    const repo = findCommonRepo(url);
    if (repo) return canonicalizeRepoUri(repo);
  }
  const first = repoLinks[0];
  if (first) return canonicalizeRepoUri(first);
  const home = findCommonRepo(project.info.homePage);
  if (home && !home.includes("sponsors")) return canonicalizeRepoUri(home);
  for (const [, url] of urls) {
    if (url.includes("sponsors")) continue;
    const repo = findCommonRepo(url);
    if (repo) return canonicalizeRepoUri(repo);
  }
  throw notFound("no git repo");
}

export function findPureWheel(artifacts: PypiArtifact[]): PypiArtifact {
  const wheel = artifacts.find((a) => isPureWheel(a.filename));
  if (!wheel) throw unsupported("no pure wheel found");
  return wheel;
}

const GENERATORS: Array<{ re: RegExp; reqs: (v: string) => string[] }> = [
  { re: /^Generator: bdist_wheel \(([\d.]+)\)/, reqs: (v) => [`wheel==${v}`] },
  { re: /^Generator: flit ([\d.]+)/, reqs: (v) => [`flit_core==${v}`, `flit==${v}`] },
  { re: /^Generator: hatchling ([\d.]+)/, reqs: (v) => [`hatchling==${v}`] },
  { re: /^Generator: poetry ([\d.]+)/, reqs: (v) => [`poetry==${v}`] },
  { re: /^Generator: poetry-core ([\d.]+)/, reqs: (v) => [`poetry-core==${v}`] }
];

/** Build requirements implied by the `Generator:` line of a wheel's WHEEL file. */
export function generatorRequirements(wheel: string): string[] {
  for (const line of wheel.split(/\r?\n/)) {
    if (!line.trim()) continue;
    const sep = line.indexOf(":");
    if (sep === -1) throw malformed("Unexpected file format");
    if (line.slice(0, sep) !== "Generator") continue;
    for (const g of GENERATORS) {
      const m = g.re.exec(line);
      if (m?.[1]) return g.reqs(m[1]);
    }
    throw unsupported(`unsupported generator: ${line.slice(sep + 1).trim()}`);
  }
  throw malformed("no generator found");
}

/** setuptools pin matching the metadata conventions seen in the wheel. */
export function setuptoolsRequirement(metadata: string): string {
  if (!metadata.includes("License-File")) return "setuptools==56.2.0";
  if (metadata.includes("Platform: UNKNOWN")) return "setuptools==57.5.0";
  return "setuptools==67.7.2";
}

function distInfoFile(entries: ZipEntry[], name: string, version: string, file: string): string {
  const exact = `${name.replaceAll("-", "_")}-${version.replaceAll("-", "_")}.dist-info/${file}`;
  const suffix = new RegExp(`^[^/]+\\.dist-info/${escapeRegExp(file)}$`);
  const entry = entries.find((e) => e.name === exact) ?? entries.find((e) => suffix.test(e.name));
  if (!entry) throw malformed(`failed to extract upstream ${exact}`);
  return new TextDecoder().decode(entry.data);
}

export function wheelRequirements(wheel: Uint8Array, name: string, version: string): string[] {
  const entries = readZip(wheel);
  const reqs = generatorRequirements(distInfoFile(entries, name, version, "WHEEL"));
  reqs.push(setuptoolsRequirement(distInfoFile(entries, name, version, "METADATA")));
  return reqs;
}

/** `[build-system].requires` from pyproject.toml, whitespace removed; null when absent. */
export async function pyprojectRequirements(repo: Repository, ref: string, dir: string, log: RebuildLog): Promise<string[] | null> {
  const tree = await repo.getTree(ref);
  const path = dir === "." || dir === "" ? "pyproject.toml" : `${dir}/pyproject.toml`;
  const text = await readTextOrNull(repo, tree, path);
  if (text === null) return null;
  let doc: unknown;
  try {
    doc = parseToml(text);
  } catch (e) {
    log.event("infer.pyproject_invalid", "failed to decode pyproject.toml", { path, error: e instanceof Error ? e.message : String(e) });
    return null;
  }
  const buildSystem = typeof doc === "object" && doc !== null && "build-system" in doc ? doc["build-system"] : null;
  const requires =
    typeof buildSystem === "object" && buildSystem !== null && "requires" in buildSystem ? buildSystem.requires : null;
  if (!Array.isArray(requires)) return null;
  return requires.filter((r): r is string => typeof r === "string").map((r) => r.replaceAll(" ", ""));
}

async function findPythonManifest(repo: Repository, pkg: string, log: RebuildLog): Promise<string | null> {
  const head = await repo.head();
  if (!head) return null;
  const tree = await repo.getTree(head);
  for (const p of ["pyproject.toml", "setup.py", "setup.cfg"]) {
    if ((await repo.findEntry(tree, p))?.type === "blob") return p;
  }
  const namePattern = pkg.split(/[-_.]+/).map(escapeRegExp).join("[-_.]");
  const matches = await repo.grep(
    head,
    /(^|\/)(pyproject\.toml|setup\.py|setup\.cfg)$/,
    new RegExp(`name\\s*=\\s*["']?${namePattern}["']?`, "i")
  );
  return pickShortestPath([...new Set(matches.map((m) => m.file))], log, { pkg, ref: head });
}

export const pypiRebuilder: EcosystemRebuilder = {
  ecosystem: "pypi",
  usesRepo: true,

  async guessArtifact(t, ctx) {
    const release = await ctx.registries.pypi.release(t.package, t.version, ctx.signal);
    return findPureWheel(release.artifacts).filename;
  },

  async inferRepo(t, ctx) {
    return repoFromProject(await ctx.registries.pypi.project(t.package, ctx.signal));
  },

  async analyzeRepo(t, repository, ctx) {
    const manifest = await findPythonManifest(repository, t.package, ctx.log);
    return { uri: repository.uri, repository, dir: manifest ? manifestDir(manifest) : "", refMap: new Map() };
  },

  async inferStrategy(t, rcfgOrNull, hint, ctx): Promise<Strategy> {
    const rcfg: RepoConfig = requireRepoConfig(rcfgOrNull, "pypi");
    const release = await ctx.registries.pypi.release(t.package, t.version, ctx.signal);

    let location: Location | null = hintLocation(hint, rcfg);
    if (!location) {
      const tagRef = await findTagMatch(release.info.name, t.version, rcfg.repository, ctx.log);
      if (!tagRef) throw new RebuildError("NoValidRef", "no git ref");
      const commit = await rcfg.repository.resolveCommit(tagRef);
      if (!commit) throw new RebuildError("NoValidRef", `tag ref not found in repo [repo=${rcfg.uri},ref=${tagRef}]`);
      ctx.log.event("infer.ref", `using tag ref: ${commit.slice(0, 9)}`, { source: "tag", ref: commit });
      location = { repo: rcfg.uri, ref: commit, dir: rcfg.dir || "." };
    }

    const wheel = findPureWheel(release.artifacts);
    const body = await ctx.registries.pypi.artifact(t.package, t.version, wheel.filename, ctx.signal);
    const requirements = wheelRequirements(body, release.info.name, t.version);
    const extra = await pyprojectRequirements(rcfg.repository, location.ref, location.dir, ctx.log);
    if (extra) {
      ctx.log.event("infer.pyproject_requirements", "added requirements from pyproject.toml", { requirements: extra });
      requirements.push(...extra);
    }
    return {
      kind: "PyPIPureWheelBuild",
      location,
      requirements,
      ...(wheel.uploadTime ? { registryTime: wheel.uploadTime } : {})
    };
  }
};
