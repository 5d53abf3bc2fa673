import { promises as fs } from "fs";
import YAML from "yaml";
import { sha256Prefixed, stableJsonStringify } from "../core/canonicalJson.js";
import type { Ecosystem } from "../core/target.js";
import { ECOSYSTEMS } from "../core/target.js";
import { malformed } from "../core/errors.js";
import { packageFilePath } from "../core/dataFile.js";

export type ExecutionMode = "smoketest" | "attest";
export type BuilderKind = "local" | "docker";

export interface RebuildConfigFile {
  version: number;
  runtime?: {
    executor_version?: string;
    work_dir?: string;
    repo_cache_dir?: string;
  };
  storage: {
    root: string;
    database_url?: string;
  };
  timewarp?: {
    host?: string;
  };
  concurrency?: Partial<Record<ExecutionMode, number>>;
  rate_limits?: Partial<Record<Ecosystem, number>>;
  builder?: {
    kind?: BuilderKind;
    image?: string;
    timeout_seconds?: number;
    network?: "none" | "bridge" | "host";
  };
}

export const DEFAULT_RATE_LIMITS: Readonly<Partial<Record<Ecosystem, number>>> = {
  debian: 1,
  pypi: 1,
  npm: 2,
  maven: 2,
  cratesio: 8
};

export const DEFAULT_CONCURRENCY: Readonly<Record<ExecutionMode, number>> = {
  attest: 50,
  smoketest: 1
};

export const DEFAULT_BUILDER_IMAGE = "docker.io/library/alpine:3.19";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isRebuildConfigFile(value: unknown): value is RebuildConfigFile {
  if (!isRecord(value)) return false;
  if (typeof value.version !== "number") return false;
  if (!isRecord(value.storage) || typeof value.storage.root !== "string") return false;
  if (value.rate_limits !== undefined) {
    if (!isRecord(value.rate_limits)) return false;
    for (const [k, v] of Object.entries(value.rate_limits)) {
      if (!(ECOSYSTEMS as readonly string[]).includes(k)) return false;
      if (typeof v !== "number" || !(v > 0)) return false;
    }
  }
  if (value.builder !== undefined) {
    if (!isRecord(value.builder)) return false;
    const kind = value.builder.kind;
    if (kind !== undefined && kind !== "local" && kind !== "docker") return false;
  }
  return true;
}

function expandEnvToken(value: string): string | null {
  const trimmed = value.trim();

  const m = /^\$\{([A-Z0-9_]+)\}$/.exec(trimmed) ?? /^\$([A-Z0-9_]+)$/.exec(trimmed);
  if (m) {
    const varName = m[1];
    if (!varName) return null;
    const v = process.env[varName]?.trim();
    return v ? v : null;
  }

  return value;
}

function expandOptional(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  return expandEnvToken(value) ?? undefined;
}

function expandConfigEnv(cfg: RebuildConfigFile): RebuildConfigFile {
  return {
    ...cfg,
    storage: {
      root: expandEnvToken(cfg.storage.root) ?? cfg.storage.root,
      database_url: expandOptional(cfg.storage.database_url)
    },
    timewarp: cfg.timewarp ? { host: expandOptional(cfg.timewarp.host) } : undefined
  };
}

export class RebuildConfig {
  readonly configHash: `sha256:${string}`;

  constructor(private readonly cfg: RebuildConfigFile) {
    this.configHash = sha256Prefixed(stableJsonStringify(cfg));
  }

  static async loadFromFile(filePath: string): Promise<RebuildConfig> {
    const raw = await fs.readFile(filePath, "utf8");
    const parsed: unknown = YAML.parse(raw);
    if (!isRebuildConfigFile(parsed)) {
      throw malformed(`invalid config at ${filePath}`);
    }
    return new RebuildConfig(expandConfigEnv(parsed));
  }

  static defaults(root: string): RebuildConfig {
    return new RebuildConfig({ version: 1, storage: { root } });
  }

  /** Returns a copy with the given fields replaced; used for command-line overrides. */
  with(overrides: {
    storageRoot?: string;
    timewarpHost?: string;
    builderKind?: BuilderKind;
    databaseUrl?: string;
  }): RebuildConfig {
    return new RebuildConfig({
      ...this.cfg,
      storage: {
        root: overrides.storageRoot ?? this.cfg.storage.root,
        database_url: overrides.databaseUrl ?? this.cfg.storage.database_url
      },
      timewarp: { host: overrides.timewarpHost ?? this.cfg.timewarp?.host },
      builder: { ...this.cfg.builder, kind: overrides.builderKind ?? this.cfg.builder?.kind }
    });
  }

  snapshot(): RebuildConfigFile {
    return structuredClone(this.cfg);
  }

  executorVersion(): string {
    return this.cfg.runtime?.executor_version?.trim() || "local";
  }

  storageRoot(): string {
    return this.cfg.storage.root;
  }

  databaseUrl(): string | null {
    return this.cfg.storage.database_url?.trim() || null;
  }

  workDir(): string {
    return this.cfg.runtime?.work_dir ?? "var/work";
  }

  repoCacheDir(): string | null {
    return this.cfg.runtime?.repo_cache_dir ?? null;
  }

  timewarpHost(): string | null {
    return this.cfg.timewarp?.host?.trim() || null;
  }

  maxConcurrency(mode: ExecutionMode): number {
    const value = this.cfg.concurrency?.[mode];
    if (value === undefined) return DEFAULT_CONCURRENCY[mode];
    if (!Number.isInteger(value) || value < 1) throw malformed(`concurrency.${mode} must be an integer >= 1`);
    return value;
  }

  /** Tokens per second per ecosystem; absent means unlimited. */
  rateLimits(): Partial<Record<Ecosystem, number>> {
    return { ...DEFAULT_RATE_LIMITS, ...this.cfg.rate_limits };
  }

  builderKind(): BuilderKind {
    return this.cfg.builder?.kind ?? "local";
  }

  builderImage(): string {
    return this.cfg.builder?.image ?? DEFAULT_BUILDER_IMAGE;
  }

  builderTimeoutSeconds(): number {
    return this.cfg.builder?.timeout_seconds ?? 3600;
  }

  builderNetwork(): "none" | "bridge" | "host" {
    return this.cfg.builder?.network ?? "bridge";
  }
}

export const CONFIG_PATH_ENV = "REBUILD_CONFIG_PATH";

/** Resolves the config path: explicit argument, then $REBUILD_CONFIG_PATH, then the bundled default. */
export function configPath(explicit?: string): string {
  return explicit?.trim() || process.env[CONFIG_PATH_ENV]?.trim() || packageFilePath("config/default.config.yaml");
}

export async function loadConfig(explicit?: string): Promise<RebuildConfig> {
  return RebuildConfig.loadFromFile(configPath(explicit));
}
