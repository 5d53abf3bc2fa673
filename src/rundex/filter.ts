import { malformed } from "../core/errors.js";
import type { FetchRebuildsRequest, Rebuild, Run, FetchRunsOpts } from "./types.js";
import { rebuildId } from "./types.js";

type Rule = { test: (m: string) => boolean; to: string | ((m: string) => string) };

const contains = (s: string) => (m: string) => m.includes(s);
const startsWith = (s: string) => (m: string) => m.startsWith(s);

const CLEAN_RULES: Rule[] = [
  { test: contains("clone failed"), to: "repo: clone failed" },
  { test: contains("repo invalid or private"), to: "repo invalid or private" },
  { test: startsWith("inference: mismatched version"), to: "wrong package version in manifest" },
  { test: startsWith("inference: mismatched name"), to: "wrong package name in manifest" },
  { test: contains("unsupported repo type"), to: "repo: bad repo URL" },
  { test: contains('Unsupported URL Type "workspace:"'), to: 'npm install: unsupported scheme "workspace:"' },
  { test: contains('Unsupported URL Type "patch:"'), to: 'npm install: unsupported scheme "patch:"' },
  { test: contains("npm is known not to run on Node.js"), to: "npm install: incompatible Node version" },
  {
    test: contains("unknown npm pack failure:"),
    to: (m) => {
      const i = m.indexOf(": not found");
      if (i === -1) return "unknown pack failure";
      return `missing build tool: ${m.slice(m.lastIndexOf(" ", i) + 1, i)}`;
    }
  },
  { test: contains("Unsupported NPM version 'lerna/"), to: "missing pack tool: lerna" },
  { test: contains("package.json file not found"), to: "manifest file not found" },
  { test: contains("Cargo.toml file not found"), to: "manifest file not found" },
  { test: contains("files in the working directory contain changes"), to: "cargo failure: dirty working dir" },
  { test: contains("believes it's in a workspace when it's not"), to: "cargo workspace error" },
  { test: contains("unsupported generator: "), to: (m) => `unsupported generator: ${m.slice(m.lastIndexOf("unsupported generator: ") + 23)}` }
];

/** Short display form of a verdict message; unknown messages only lose their newlines. */
export function cleanVerdictMessage(message: string): string {
  const m = message.replace(/\n: 500 Internal Server Error: non-OK response/g, "");
  for (const rule of CLEAN_RULES) {
    if (rule.test(m)) return typeof rule.to === "string" ? rule.to : rule.to(m);
  }
  return m.replaceAll("\n", "\\n");
}

export function filterRuns(runs: Run[], opts: FetchRunsOpts = {}): Run[] {
  return runs
    .filter((r) => !opts.ids?.length || opts.ids.includes(r.id))
    .filter((r) => !opts.benchmarkHash || r.benchmarkHash === opts.benchmarkHash)
    .sort((a, b) => a.created - b.created || a.id.localeCompare(b.id));
}

function compilePattern(pattern: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch (e) {
    throw malformed(`invalid message pattern: ${pattern}`, e);
  }
}

/** Applies every request filter in memory; results are ordered by target id then creation time. */
export function filterRebuilds(all: Rebuild[], req: FetchRebuildsRequest = {}): Rebuild[] {
  const pattern = req.pattern ? compilePattern(req.pattern) : null;
  const t = req.target;
  let out = all.filter((r) => {
    if (req.runs?.length && !req.runs.includes(r.runId)) return false;
    if (req.executors?.length && !req.executors.includes(r.executorVersion)) return false;
    if (t?.ecosystem && r.ecosystem !== t.ecosystem) return false;
    if (t?.package && r.package !== t.package) return false;
    if (t?.version && r.version !== t.version) return false;
    if (t?.artifact && r.artifact !== t.artifact) return false;
    if (req.prefix && !r.message.startsWith(req.prefix)) return false;
    if (pattern && !pattern.test(r.message)) return false;
    return true;
  });
  if (req.latestPerTarget) {
    const latest = new Map<string, Rebuild>();
    for (const r of out) {
      const existing = latest.get(rebuildId(r));
      if (!existing || existing.created < r.created) latest.set(rebuildId(r), r);
    }
    out = [...latest.values()];
  }
  if (req.clean) out = out.map((r) => ({ ...r, message: cleanVerdictMessage(r.message) }));
  return out.sort((a, b) => rebuildId(a).localeCompare(rebuildId(b)) || a.created - b.created);
}
