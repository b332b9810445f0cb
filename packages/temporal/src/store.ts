// packages/temporal/src/store.ts
import type {
  DataValues,
  EntityDefinition,
  KeyValues,
  ListQuery,
  TemporalRecord,
  UpsertResult,
} from "./record.js";

export type LogFields = Record<string, unknown>;

export type TemporalLogger = {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
};

/**
 * TemporalRecordStore contract
 * - Rows are append-only; the only in-place change is closing a superseded version.
 * - At most one row per business key has is_current = true.
 * - History is ordered (valid_from DESC, record_id DESC), newest first.
 */
export type TemporalRecordStore<K extends KeyValues, D extends DataValues> = {
  readonly def: EntityDefinition<K, D>;

  // -------- writes --------
  upsert(key: K, data: D, actor?: string | null): Promise<UpsertResult>;

  // -------- reads --------
  getCurrent(key: K): Promise<TemporalRecord<K, D> | null>;
  getByRecordId(record_id: number): Promise<TemporalRecord<K, D> | null>;
  getHistory(key: K): Promise<TemporalRecord<K, D>[]>; // [] if the key never existed
  getAtPointInTime(key: K, t: Date | string): Promise<TemporalRecord<K, D> | null>;
  listCurrent(query?: ListQuery<K, D>): Promise<TemporalRecord<K, D>[]>;

  countVersions(key: K): Promise<number>;
};
