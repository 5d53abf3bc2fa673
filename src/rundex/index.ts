import { applyRundexSchema, createDb, createPool } from "../db/connection.js";
import { FilesystemRundex } from "./filesystemRundex.js";
import { PostgresRundex } from "./postgresRundex.js";
import type { Rundex } from "./types.js";

export type RundexMode = "filesystem" | "postgres" | "pg-mem";

export interface OpenedRundex {
  rundex: Rundex;
  mode: RundexMode;
  close(): Promise<void>;
}

/**
 * The Postgres rundex when a database URL is configured. Without one, the filesystem rundex under
 * `storageRoot`, or an in-process pg-mem database when `fallback` asks for it.
 */
export async function openRundex(opts: {
  storageRoot: string;
  databaseUrl: string | null;
  fallback?: "filesystem" | "pg-mem";
  autoSchema?: boolean;
}): Promise<OpenedRundex> {
  const fallback = opts.fallback ?? "filesystem";
  if (!opts.databaseUrl && fallback === "filesystem") {
    return { rundex: new FilesystemRundex(opts.storageRoot), mode: "filesystem", close: async () => {} };
  }
  const pool = createPool(opts.databaseUrl);
  if (!opts.databaseUrl || (opts.autoSchema ?? true)) await applyRundexSchema(pool);
  const db = createDb(pool);
  return { rundex: new PostgresRundex(db), mode: opts.databaseUrl ? "postgres" : "pg-mem", close: () => db.destroy() };
}
