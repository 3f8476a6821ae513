/**
 * DDL for the target tables, generated from entity descriptors.
 *
 * Tables are created if missing; existing tables are never altered.
 */
import type { ColumnSpec, EntityDescriptor } from "../entities/descriptor.js";
import { quoteIdent, type SqlDialect } from "./backend.js";

function columnType(col: ColumnSpec, dialect: SqlDialect): string {
  switch (col.type) {
    case "string":
      return col.maxLength !== undefined ? `VARCHAR(${col.maxLength})` : "TEXT";
    case "int32":
      return "INTEGER";
    case "int64":
      return "BIGINT";
    case "decimal":
      // SQLite would turn NUMERIC text into REAL; keep the exact string.
      return dialect === "postgres" ? `NUMERIC(${col.precision}, ${col.scale})` : "TEXT";
    case "timestamp":
      return dialect === "postgres" ? "TIMESTAMPTZ" : "TEXT";
  }
}

export function buildTableSql(
  descriptor: EntityDescriptor,
  dialect: SqlDialect,
  parent: EntityDescriptor | null,
): string {
  const lines = [
    dialect === "postgres"
      ? `${quoteIdent("id")} BIGSERIAL PRIMARY KEY`
      : `${quoteIdent("id")} INTEGER PRIMARY KEY AUTOINCREMENT`,
  ];

  for (const col of descriptor.columns) {
    const constraints = [
      col.nullable ? "" : " NOT NULL",
      col.name === descriptor.conflictKey ? " UNIQUE" : "",
    ].join("");
    lines.push(`${quoteIdent(col.name)} ${columnType(col, dialect)}${constraints}`);
  }

  if (parent && descriptor.parentKeyColumn && descriptor.referencedKeyColumn) {
    lines.push(
      `FOREIGN KEY (${quoteIdent(descriptor.parentKeyColumn)}) REFERENCES ` +
        `${quoteIdent(parent.tableName)} (${quoteIdent(descriptor.referencedKeyColumn)}) ON DELETE CASCADE`,
    );
  }

  return `CREATE TABLE IF NOT EXISTS ${quoteIdent(descriptor.tableName)} (\n  ${lines.join(",\n  ")}\n);`;
}

/**
 * Schema for `entities`, which must already be in dependency order
 * (see EntityRegistry.orderedEntities).
 */
export function buildSchemaSql(
  entities: readonly EntityDescriptor[],
  dialect: SqlDialect,
): string {
  const byName = new Map(entities.map((e) => [e.name, e]));
  return entities
    .map((e) =>
      buildTableSql(e, dialect, e.parentEntity ? (byName.get(e.parentEntity) ?? null) : null),
    )
    .join("\n\n");
}
