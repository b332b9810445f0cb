// packages/temporal/src/schema.ts
import type Database from "better-sqlite3";
import type { ColumnSpec, DataValues, EntityDefinition, KeyValues } from "./record.js";

const IDENT_RE = /^[a-z_][a-z0-9_]*$/;

function ident(name: string): string {
  if (!IDENT_RE.test(name)) throw new Error(`Unsafe SQL identifier: ${name}`);
  return name;
}

function columnDdl(col: ColumnSpec, isKey: boolean): string {
  const type = col.kind === "integer" ? "INTEGER" : "TEXT"; // decimals stay exact as TEXT
  const notNull = isKey || !col.nullable ? " NOT NULL" : "";
  return `${ident(col.name)} ${type}${notNull}`;
}

/**
 * Append-only table + indexes + current-state view for one entity.
 * Idempotent; safe to run on every open.
 *
 * - record_id uses AUTOINCREMENT so ids are never reused
 * - `<prefix>_current` is a partial UNIQUE index: at most one current row per key
 * - `<prefix>_temporal` serves history and point-in-time lookups
 */
export function ensureTemporalTable<K extends KeyValues, D extends DataValues>(
  db: Database.Database,
  def: EntityDefinition<K, D>
): void {
  const table = ident(def.table);
  const view = ident(def.currentView);
  const prefix = ident(def.indexPrefix);
  const keyCols = def.key.map((c) => ident(c.name)).join(", ");

  const cols = [
    "record_id INTEGER PRIMARY KEY AUTOINCREMENT",
    ...def.key.map((c) => columnDdl(c, true)),
    ...def.data.map((c) => columnDdl(c, false)),
    "valid_from TEXT NOT NULL",
    "valid_to TEXT",
    "is_current INTEGER NOT NULL DEFAULT 1 CHECK (is_current IN (0, 1))",
    "created_by TEXT",
  ];

  db.exec(`
    CREATE TABLE IF NOT EXISTS ${table} (
      ${cols.join(",\n      ")},
      CHECK (is_current = 1 OR valid_to IS NOT NULL)
    );

    CREATE UNIQUE INDEX IF NOT EXISTS ${prefix}_current
      ON ${table}(${keyCols})
      WHERE is_current = 1;

    CREATE INDEX IF NOT EXISTS ${prefix}_temporal
      ON ${table}(${keyCols}, valid_from DESC);

    CREATE VIEW IF NOT EXISTS ${view} AS
      SELECT * FROM ${table} WHERE is_current = 1;
  `);
}

export function quoteIdent(name: string): string {
  return ident(name);
}
