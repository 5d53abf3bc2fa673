import { promises as fs } from "fs";
import * as pg from "pg";
import { newDb } from "pg-mem";
import { Kysely, PostgresDialect } from "kysely";
import { packageFilePath } from "../core/dataFile.js";
import type { DB } from "./types.js";

/** A Postgres pool for `databaseUrl`, or an in-process pg-mem database when none is configured. */
export function createPool(databaseUrl: string | null): pg.Pool {
  if (databaseUrl) return new pg.Pool({ connectionString: databaseUrl });
  const mem = newDb({ autoCreateForeignKeyIndices: true });
  const adapter = mem.adapters.createPg();
  return new adapter.Pool() as unknown as pg.Pool;
}

export function createDb(pool: pg.Pool): Kysely<DB> {
  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool })
  });
}

/** Creates the rundex tables and indexes when missing; the statements are idempotent. */
export async function applyRundexSchema(pool: pg.Pool): Promise<void> {
  const sql = await fs.readFile(packageFilePath("db/schema.sql"), "utf8");
  for (const statement of sql.split(";").map((s) => s.trim()).filter(Boolean)) {
    await pool.query(statement);
  }
}
