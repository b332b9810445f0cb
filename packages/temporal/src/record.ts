// packages/temporal/src/record.ts

export type ColumnKind = "integer" | "text" | "decimal";

export type ColumnSpec = {
  name: string;
  kind: ColumnKind;
  nullable: boolean;
  /** decimal only: stored fractional digits */
  scale?: number;
};

export type KeyValue = string | number;
export type DataValue = string | number | null;

export type KeyValues = Record<string, KeyValue>;
export type DataValues = Record<string, DataValue>;

/** One stored row as handed back by better-sqlite3. */
export type SqlRow = Record<string, unknown>;

/**
 * Per-entity capability set. The store runs one algorithm over whichever
 * definition it is given; entities differ only in these fields.
 */
export type EntityDefinition<K extends KeyValues, D extends DataValues> = {
  kind: string;
  table: string;
  currentView: string;
  indexPrefix: string;

  key: readonly ColumnSpec[];
  data: readonly ColumnSpec[];

  /** SQL ORDER BY body for current-state listings */
  orderBy: string;
  /** column matched by `search` in listings (substring, case-insensitive) */
  searchColumn?: string;

  readKey(row: SqlRow): K;
  readData(row: SqlRow): D;
};

export type RecordMeta = {
  record_id: number;
  valid_from: string; // ISO timestamp, ms precision, UTC
  valid_to: string | null;
  is_current: boolean;
  created_by: string | null;
};

export type TemporalRecord<K extends KeyValues, D extends DataValues> = K & D & RecordMeta;

export type UpsertResult = {
  record_id: number;
  is_new: boolean;
  superseded_record_id: number | null;
  changed_fields: string[];
};

export type ListQuery<K extends KeyValues, D extends DataValues> = {
  limit?: number;
  offset?: number;
  equals?: Partial<K & D>;
  search?: string;
};

// ---------------- row readers ----------------

export function asRow(v: unknown): SqlRow | null {
  if (typeof v !== "object" || v === null || Array.isArray(v)) return null;
  return Object.fromEntries(Object.entries(v));
}

function corrupt(column: string, v: unknown): Error {
  return new Error(`ROW_SHAPE_MISMATCH: column "${column}" holds ${typeof v} (${String(v)})`);
}

export function readInteger(row: SqlRow, column: string): number {
  const v = row[column];
  if (typeof v === "number" && Number.isInteger(v)) return v;
  if (typeof v === "bigint") return Number(v);
  throw corrupt(column, v);
}

export function readNullableInteger(row: SqlRow, column: string): number | null {
  return row[column] === null || row[column] === undefined ? null : readInteger(row, column);
}

export function readText(row: SqlRow, column: string): string {
  const v = row[column];
  if (typeof v === "string") return v;
  throw corrupt(column, v);
}

export function readNullableText(row: SqlRow, column: string): string | null {
  return row[column] === null || row[column] === undefined ? null : readText(row, column);
}

export function readMeta(row: SqlRow): RecordMeta {
  return {
    record_id: readInteger(row, "record_id"),
    valid_from: readText(row, "valid_from"),
    valid_to: readNullableText(row, "valid_to"),
    is_current: readInteger(row, "is_current") === 1,
    created_by: readNullableText(row, "created_by"),
  };
}

export function toRecord<K extends KeyValues, D extends DataValues>(
  def: EntityDefinition<K, D>,
  row: SqlRow
): TemporalRecord<K, D> {
  return { ...def.readKey(row), ...def.readData(row), ...readMeta(row) };
}

export function columnNames<K extends KeyValues, D extends DataValues>(
  def: EntityDefinition<K, D>
): string[] {
  return [...def.key, ...def.data].map((c) => c.name);
}
