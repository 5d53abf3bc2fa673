import type { Kysely, Selectable } from "kysely";
import type { DB, RundexRebuildsTable, RundexRunsTable } from "../db/types.js";
import { strategyToJson } from "../strategy/definition.js";
import { decodeRebuild, decodeRun } from "./codec.js";
import { filterRebuilds, filterRuns } from "./filter.js";
import type { FetchRebuildsRequest, FetchRunsOpts, Rebuild, Run, Rundex } from "./types.js";

function runFromRow(row: Selectable<RundexRunsTable>): Run {
  return decodeRun(
    {
      id: row.run_id,
      benchmarkName: row.benchmark_name,
      benchmarkHash: row.benchmark_hash,
      type: row.run_type,
      created: Number(row.created)
    },
    `rundex_runs/${row.run_id}`
  );
}

function rebuildFromRow(row: Selectable<RundexRebuildsTable>): Rebuild {
  return decodeRebuild(
    {
      ecosystem: row.ecosystem,
      package: row.package,
      version: row.version,
      artifact: row.artifact,
      success: row.success,
      message: row.message,
      strategy: row.strategy,
      timings: row.timings,
      executorVersion: row.executor_version,
      runId: row.run_id,
      created: Number(row.created)
    },
    `rundex_rebuilds/${row.run_id}`
  );
}

/** Rundex in the `rundex_runs` and `rundex_rebuilds` tables of `db/schema.sql`. */
export class PostgresRundex implements Rundex {
  constructor(private readonly db: Kysely<DB>) {}

  async writeRun(run: Run): Promise<void> {
    await this.db
      .insertInto("rundex_runs")
      .values({
        run_id: run.id,
        benchmark_name: run.benchmarkName,
        benchmark_hash: run.benchmarkHash,
        run_type: run.type,
        created: run.created
      })
      .onConflict((oc) =>
        oc.column("run_id").doUpdateSet({
          benchmark_name: run.benchmarkName,
          benchmark_hash: run.benchmarkHash,
          run_type: run.type,
          created: run.created
        })
      )
      .execute();
  }

  async writeRebuild(r: Rebuild): Promise<void> {
    const values = {
      success: r.success,
      message: r.message,
      strategy: r.strategy ? strategyToJson(r.strategy) : null,
      timings: { ...r.timings },
      executor_version: r.executorVersion,
      created: r.created
    };
    await this.db
      .insertInto("rundex_rebuilds")
      .values({
        run_id: r.runId,
        ecosystem: r.ecosystem,
        package: r.package,
        version: r.version,
        artifact: r.artifact,
        ...values
      })
      .onConflict((oc) => oc.columns(["run_id", "ecosystem", "package", "version", "artifact"]).doUpdateSet(values))
      .execute();
  }

  async fetchRuns(opts: FetchRunsOpts = {}): Promise<Run[]> {
    let q = this.db.selectFrom("rundex_runs").selectAll();
    if (opts.ids?.length) q = q.where("run_id", "in", opts.ids);
    if (opts.benchmarkHash) q = q.where("benchmark_hash", "=", opts.benchmarkHash);
    const rows = await q.orderBy("created", "asc").execute();
    return filterRuns(rows.map(runFromRow), opts);
  }

  async fetchRebuilds(req: FetchRebuildsRequest = {}): Promise<Rebuild[]> {
    let q = this.db.selectFrom("rundex_rebuilds").selectAll();
    if (req.runs?.length) q = q.where("run_id", "in", req.runs);
    if (req.executors?.length) q = q.where("executor_version", "in", req.executors);
    const t = req.target;
    if (t?.ecosystem) q = q.where("ecosystem", "=", t.ecosystem);
    if (t?.package) q = q.where("package", "=", t.package);
    if (t?.version) q = q.where("version", "=", t.version);
    if (t?.artifact) q = q.where("artifact", "=", t.artifact);
    const rows = await q.execute();
    return filterRebuilds(rows.map(rebuildFromRow), req);
  }
}
