import { RebuildError, notFound } from "../core/errors.js";
import { canonicalizeRepoUri } from "../core/repoUri.js";
import { parseCoordinates, parsePom, type Pom } from "../registry/maven.js";
import { findTagMatch } from "../repo/tags.js";
import { readTextOrNull, type Repository } from "../repo/types.js";
import type { RebuildLog } from "../runs/rebuildLog.js";
import type { Location, Strategy } from "../strategy/types.js";
import { escapeRegExp, hintLocation, manifestDir, pickShortestPath, requireRepoConfig } from "./common.js";
import type { EcosystemRebuilder, RepoConfig } from "./types.js";

export const DEFAULT_JDK_VERSION = "17";

/** Repository URL from a POM `<scm>` block; `scm:git:` connection prefixes are dropped. */
export function repoFromScm(pom: Pom): string {
  const raw = pom.scm.url || pom.scm.connection.replace(/^scm:[^:]+:/, "");
  return canonicalizeRepoUri(raw);
}

/** JDK release for the build, from the compiler properties; `1.8` style versions lose their `1.` prefix. */
export function pickJdkVersion(properties: Record<string, string>): string {
  for (const key of ["maven.compiler.release", "maven.compiler.source", "maven.compiler.target"]) {
    const value = properties[key]?.trim();
    if (value && /^\d+(\.\d+)?$/.test(value)) return value.startsWith("1.") ? value.slice(2) : value;
  }
  return DEFAULT_JDK_VERSION;
}

async function readPom(repo: Repository, ref: string, path: string): Promise<Pom | null> {
  const text = await readTextOrNull(repo, await repo.getTree(ref), path);
  if (text === null) return null;
  try {
    return parsePom(text);
  } catch (e) {
    if (e instanceof RebuildError && e.kind === "Malformed") return null;
    throw e;
  }
}

/** Finds the module POM declaring `artifactId`: the root first, then a search of the tree. */
export async function findPom(repo: Repository, ref: string, artifactId: string, log: RebuildLog): Promise<{ pom: Pom; path: string } | null> {
  const root = await readPom(repo, ref, "pom.xml");
  if (root?.artifactId === artifactId) return { pom: root, path: "pom.xml" };
  const matches = await repo.grep(ref, /.*\/pom\.xml$/, new RegExp(`<artifactId>\\s*${escapeRegExp(artifactId)}\\s*</artifactId>`));
  const found = new Map<string, Pom>();
  for (const m of matches) {
    if (found.has(m.file)) continue;
    const pom = await readPom(repo, ref, m.file);
    if (pom?.artifactId === artifactId) found.set(m.file, pom);
  }
  const best = pickShortestPath([...found.keys()], log, { pkg: artifactId, ref });
  const pom = best === null ? undefined : found.get(best);
  return best !== null && pom ? { pom, path: best } : null;
}

async function inferLocation(
  artifactId: string,
  version: string,
  upstream: Pom,
  rcfg: RepoConfig,
  log: RebuildLog
): Promise<{ location: Location; pom: Pom }> {
  const candidates: Array<{ source: string; ref: string }> = [];
  const scmTag = upstream.scm.tag;
  if (scmTag && scmTag !== "HEAD") {
    const commit = (await rcfg.repository.resolveTag(scmTag)) ?? (await rcfg.repository.resolveCommit(scmTag));
    candidates.push({ source: "scm", ref: commit ?? "" });
    if (!commit) log.event("infer.ref_missing", "scm tag not found in repo", { tag: scmTag });
  }
  candidates.push({ source: "tag", ref: await findTagMatch(artifactId, version, rcfg.repository, log) });

  const tried = candidates.filter((c) => c.ref !== "");
  for (const c of tried) {
    const found = await findPom(rcfg.repository, c.ref, artifactId, log);
    if (!found) {
      log.event("infer.ref_invalid", `${c.source} ref invalid: no pom.xml declares ${artifactId}`, { ref: c.ref });
      continue;
    }
    log.event("infer.ref", `using ${c.source} ref: ${c.ref.slice(0, 9)}`, { source: c.source, ref: c.ref });
    return { location: { repo: rcfg.uri, ref: c.ref, dir: manifestDir(found.path) }, pom: found.pom };
  }
  throw new RebuildError("NoValidRef", tried.length ? "no valid git ref" : "no git ref");
}

export const mavenRebuilder: EcosystemRebuilder = {
  ecosystem: "maven",
  usesRepo: true,

  async guessArtifact(t) {
    return `${parseCoordinates(t.package).artifactId}-${t.version}.jar`;
  },

  async inferRepo(t, ctx) {
    const pom = await ctx.registries.maven.pom(t.package, t.version, ctx.signal);
    if (!pom.scm.url && !pom.scm.connection) throw notFound("no scm url in pom");
    return repoFromScm(pom);
  },

  async analyzeRepo(t, repository, ctx) {
    const rcfg: RepoConfig = { uri: repository.uri, repository, dir: ".", refMap: new Map() };
    const head = await repository.head();
    if (!head) return rcfg;
    const found = await findPom(repository, head, parseCoordinates(t.package).artifactId, ctx.log);
    if (found) rcfg.dir = manifestDir(found.path);
    return rcfg;
  },

  async inferStrategy(t, rcfgOrNull, hint, ctx): Promise<Strategy> {
    const rcfg = requireRepoConfig(rcfgOrNull, "maven");
    const { artifactId } = parseCoordinates(t.package);
    const upstream = await ctx.registries.maven.pom(t.package, t.version, ctx.signal);

    let location = hintLocation(hint, rcfg);
    let pom: Pom | null = null;
    if (location) {
      pom = await readPom(rcfg.repository, location.ref, location.dir === "." ? "pom.xml" : `${location.dir}/pom.xml`);
    } else {
      ({ location, pom } = await inferLocation(artifactId, t.version, upstream, rcfg, ctx.log));
    }
    if (pom && pom.artifactId !== artifactId) {
      throw new RebuildError("NoValidRef", `mismatched name [expected=${artifactId},actual=${pom.artifactId}]`);
    }
    const properties = { ...upstream.properties, ...pom?.properties };
    return { kind: "MavenBuild", location, jdkVersion: pickJdkVersion(properties) };
  }
};
