import type { ColumnType, JSONColumnType } from "kysely";

type JsonObject = Record<string, unknown>;
type JsonNullable = JSONColumnType<JsonObject | null, JsonObject | null | undefined, JsonObject | null>;
// pg returns bigint as string by default; pg-mem returns a number.
type EpochMillis = ColumnType<string | number, number, number>;

export interface RundexRunsTable {
  run_id: string;
  benchmark_name: string;
  benchmark_hash: string;
  run_type: string;
  created: EpochMillis;
}

export interface RundexRebuildsTable {
  run_id: string;
  ecosystem: string;
  package: string;
  version: string;
  artifact: string;
  success: boolean;
  message: string;
  strategy: JsonNullable;
  timings: JSONColumnType<JsonObject, JsonObject, JsonObject>;
  executor_version: string;
  created: EpochMillis;
}

export interface DB {
  rundex_runs: RundexRunsTable;
  rundex_rebuilds: RundexRebuildsTable;
}
