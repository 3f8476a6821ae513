/**
 * Post-load statistics: row counts, configured aggregates and per-group
 * counts for each entity table, read straight from the store.
 */
import type { PostLoadStep } from "../core/etl.js";
import { quoteIdent, type DatabaseBackend, type SqlRow } from "../db/backend.js";
import type { Aggregate, EntityDescriptor } from "../entities/descriptor.js";
import { log } from "../logger.js";

export interface GroupCount {
  key: string | null;
  count: number;
}

export interface EntityStatistics {
  entityName: string;
  totalRecords: number;
  /** `"<column>.<aggregate>"` → value; null when the table is empty. */
  aggregates: Record<string, number | null>;
  /** Group-by column → counts per distinct value, ordered by value. */
  groups: Record<string, GroupCount[]>;
}

const AGGREGATE_SQL: Record<Aggregate, string> = {
  sum: "SUM",
  avg: "AVG",
  min: "MIN",
  max: "MAX",
};

function toNumber(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

export async function computeStatistics(
  db: DatabaseBackend,
  entity: EntityDescriptor,
): Promise<EntityStatistics> {
  const table = quoteIdent(entity.tableName);
  const selects = [`COUNT(*) AS ${quoteIdent("count")}`];
  const aliases: Array<[string, string]> = [];

  for (const [column, aggregates] of Object.entries(entity.statistics.aggregates)) {
    for (const agg of aggregates) {
      const alias = `a${aliases.length}`;
      aliases.push([`${column}.${agg}`, alias]);
      selects.push(
        `${AGGREGATE_SQL[agg]}(CAST(${quoteIdent(column)} AS DOUBLE PRECISION)) AS ${quoteIdent(alias)}`,
      );
    }
  }

  const overall: SqlRow = (await db.queryOne(`SELECT ${selects.join(", ")} FROM ${table}`)) ?? {};
  const aggregates: Record<string, number | null> = {};
  for (const [name, alias] of aliases) {
    aggregates[name] = toNumber(overall[alias]);
  }

  const groups: Record<string, GroupCount[]> = {};
  for (const column of entity.statistics.groupBy) {
    const col = quoteIdent(column);
    const rows = await db.query(
      `SELECT ${col} AS ${quoteIdent("key")}, COUNT(*) AS ${quoteIdent("count")} FROM ${table} GROUP BY ${col} ORDER BY ${col}`,
    );
    groups[column] = rows.map((r) => ({
      key: r.key === null || r.key === undefined ? null : String(r.key),
      count: toNumber(r.count) ?? 0,
    }));
  }

  return {
    entityName: entity.name,
    totalRecords: toNumber(overall.count) ?? 0,
    aggregates,
    groups,
  };
}

/** Post-load step that computes and logs statistics for every entity. */
export class StatisticsReporter implements PostLoadStep {
  readonly name = "statistics";
  private latest: EntityStatistics[] = [];

  /** Statistics from the most recent run, in pipeline order. */
  get lastReport(): readonly EntityStatistics[] {
    return this.latest;
  }

  async run(entities: readonly EntityDescriptor[], db: DatabaseBackend): Promise<void> {
    const report: EntityStatistics[] = [];
    for (const entity of entities) {
      const stats = await computeStatistics(db, entity);
      log.reporting.info(stats, "entity statistics");
      report.push(stats);
    }
    this.latest = report;
  }
}
