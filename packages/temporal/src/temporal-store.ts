// packages/temporal/src/temporal-store.ts
import type Database from "better-sqlite3";

import { describeKey, resolveBusinessKey } from "./business-key.js";
import { detectChanges } from "./change-detector.js";
import { formatDecimal } from "./decimal.js";
import {
  classifyStorageError,
  toStoreError,
  UpsertConflictError,
  ValidationError,
} from "./errors.js";
import { CurrentStateProjection } from "./projection.js";
import {
  asRow,
  toRecord,
  type DataValue,
  type DataValues,
  type EntityDefinition,
  type KeyValues,
  type ListQuery,
  type TemporalRecord,
  type UpsertResult,
} from "./record.js";
import { quoteIdent } from "./schema.js";
import { nextValidFrom, systemClock, toIsoTimestamp, type Clock } from "./time.js";
import type { TemporalRecordStore, TemporalLogger } from "./store.js";

export type TemporalStoreOptions = {
  now?: Clock;
  defaultActor?: string;
  logger?: TemporalLogger;
};

const silentLogger: TemporalLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Append-only temporal store for one entity kind, on a caller-owned better-sqlite3 handle.
 *
 * upsert: read current -> compare -> (no-op | close current + insert successor),
 * all inside one BEGIN IMMEDIATE transaction. The partial unique index on
 * (key) WHERE is_current = 1 is the final word on "one current row per key";
 * a violation (or a busy lock from another connection) gets one retry.
 */
export class SqliteTemporalStore<K extends KeyValues, D extends DataValues>
  implements TemporalRecordStore<K, D>
{
  readonly projection: CurrentStateProjection<K, D>;

  private readonly now: Clock;
  private readonly defaultActor: string;
  private readonly log: TemporalLogger;

  constructor(
    private readonly db: Database.Database,
    readonly def: EntityDefinition<K, D>,
    opts: TemporalStoreOptions = {}
  ) {
    this.now = opts.now ?? systemClock;
    this.defaultActor = opts.defaultActor ?? "system";
    this.log = opts.logger ?? silentLogger;
    this.projection = new CurrentStateProjection(db, def);
  }

  private get table(): string {
    return quoteIdent(this.def.table);
  }

  // ---------------- writes ----------------

  async upsert(key: K, data: D, actor?: string | null): Promise<UpsertResult> {
    const filter = resolveBusinessKey(this.def, key);
    const next = this.normalizeData(data);
    const createdBy = actor ?? this.defaultActor;
    const now = this.now(); // once per call, reused by the retry

    const attempt = () =>
      this.db
        .transaction(() => this.applyUpsert(filter.sql, filter.params, next, createdBy, now))
        .immediate();

    try {
      return attempt();
    } catch (first) {
      if (classifyStorageError(first) !== "conflict") {
        throw toStoreError(first, `${this.def.kind} upsert failed`);
      }
      this.log.warn("upsert conflict, retrying once", {
        entity: this.def.kind,
        key: describeKey(this.def, key),
      });
      try {
        return attempt();
      } catch (second) {
        if (classifyStorageError(second) === "conflict") {
          throw new UpsertConflictError(
            `UPSERT_CONFLICT: ${this.def.kind} (${describeKey(this.def, key)}) was modified concurrently; retry`,
            second
          );
        }
        throw toStoreError(second, `${this.def.kind} upsert failed`);
      }
    }
  }

  private applyUpsert(
    keySql: string,
    keyParams: Array<string | number>,
    next: Record<string, DataValue>,
    createdBy: string,
    now: Date
  ): UpsertResult {
    const currentRow = asRow(
      this.db
        .prepare(`SELECT * FROM ${this.table} WHERE ${keySql} AND is_current = 1 LIMIT 1`)
        .get(...keyParams)
    );

    let validFrom: string;
    let superseded: number | null = null;
    let changed: string[];

    if (currentRow) {
      const current = toRecord(this.def, currentRow);
      changed = detectChanges(this.def.data, current, next);

      if (changed.length === 0) {
        this.log.debug("upsert unchanged", { entity: this.def.kind, record_id: current.record_id });
        return {
          record_id: current.record_id,
          is_new: false,
          superseded_record_id: null,
          changed_fields: [],
        };
      }

      validFrom = nextValidFrom(now, current.valid_from);
      const closed = this.db
        .prepare(
          `UPDATE ${this.table}
           SET is_current = 0, valid_to = ?
           WHERE record_id = ? AND is_current = 1`
        )
        .run(validFrom, current.record_id);

      if (closed.changes !== 1) {
        throw new UpsertConflictError(
          `UPSERT_CONFLICT: ${this.def.kind} record ${current.record_id} was closed concurrently`
        );
      }
      superseded = current.record_id;
    } else {
      validFrom = nextValidFrom(now, this.latestValidFrom(keySql, keyParams));
      changed = this.def.data.map((c) => c.name);
    }

    const names = [...this.def.key.map((c) => c.name), ...this.def.data.map((c) => c.name)];
    const values: DataValue[] = [...keyParams, ...this.def.data.map((c) => next[c.name] ?? null)];

    const inserted = this.db
      .prepare(
        `INSERT INTO ${this.table}
         (${names.map(quoteIdent).join(", ")}, valid_from, valid_to, is_current, created_by)
         VALUES (${names.map(() => "?").join(", ")}, ?, NULL, 1, ?)`
      )
      .run(...values, validFrom, createdBy);

    const record_id = Number(inserted.lastInsertRowid);

    this.log.info(superseded === null ? "version created" : "version superseded", {
      entity: this.def.kind,
      record_id,
      superseded_record_id: superseded,
      changed_fields: changed,
    });

    return { record_id, is_new: true, superseded_record_id: superseded, changed_fields: changed };
  }

  /** Guards valid_from monotonicity even if a key somehow lost its current row. */
  private latestValidFrom(keySql: string, keyParams: Array<string | number>): string | null {
    const row = asRow(
      this.db
        .prepare(`SELECT MAX(valid_from) AS latest FROM ${this.table} WHERE ${keySql}`)
        .get(...keyParams)
    );
    return typeof row?.latest === "string" ? row.latest : null;
  }

  /** Canonical stored form: decimals at their fixed scale, undefined -> null. */
  private normalizeData(data: D): Record<string, DataValue> {
    const out: Record<string, DataValue> = {};
    for (const col of this.def.data) {
      const v: DataValue | undefined = data[col.name];
      if (v === undefined || v === null) {
        if (!col.nullable) {
          throw new ValidationError(`${this.def.kind}: "${col.name}" is required`);
        }
        out[col.name] = null;
        continue;
      }
      switch (col.kind) {
        case "decimal":
          out[col.name] = formatDecimal(v, col.scale ?? 0);
          break;
        case "integer":
          if (typeof v !== "number" || !Number.isSafeInteger(v)) {
            throw new ValidationError(`${this.def.kind}: "${col.name}" must be an integer`);
          }
          out[col.name] = v;
          break;
        case "text":
          if (typeof v !== "string") {
            throw new ValidationError(`${this.def.kind}: "${col.name}" must be a string`);
          }
          out[col.name] = v;
          break;
      }
    }
    return out;
  }

  // ---------------- reads ----------------

  private many(sql: string, params: Array<string | number>): TemporalRecord<K, D>[] {
    try {
      const out: TemporalRecord<K, D>[] = [];
      for (const raw of this.db.prepare(sql).all(...params)) {
        const row = asRow(raw);
        if (row) out.push(toRecord(this.def, row));
      }
      return out;
    } catch (e) {
      throw toStoreError(e, `${this.def.kind} read failed`);
    }
  }

  async getCurrent(key: K): Promise<TemporalRecord<K, D> | null> {
    return this.projection.get(key);
  }

  async getByRecordId(record_id: number): Promise<TemporalRecord<K, D> | null> {
    if (!Number.isSafeInteger(record_id)) {
      throw new ValidationError(`record_id must be an integer, got ${record_id}`);
    }
    const [first] = this.many(`SELECT * FROM ${this.table} WHERE record_id = ?`, [record_id]);
    return first ?? null;
  }

  async getHistory(key: K): Promise<TemporalRecord<K, D>[]> {
    const filter = resolveBusinessKey(this.def, key);
    return this.many(
      `SELECT * FROM ${this.table}
       WHERE ${filter.sql}
       ORDER BY valid_from DESC, record_id DESC`,
      filter.params
    );
  }

  /** Half-open validity: valid_from <= t < valid_to (or open-ended). */
  async getAtPointInTime(key: K, t: Date | string): Promise<TemporalRecord<K, D> | null> {
    const filter = resolveBusinessKey(this.def, key);
    const at = toIsoTimestamp(t);
    const [first] = this.many(
      `SELECT * FROM ${this.table}
       WHERE ${filter.sql}
         AND valid_from <= ?
         AND (valid_to IS NULL OR valid_to > ?)
       ORDER BY valid_from DESC, record_id DESC
       LIMIT 1`,
      [...filter.params, at, at]
    );
    return first ?? null;
  }

  async listCurrent(query: ListQuery<K, D> = {}): Promise<TemporalRecord<K, D>[]> {
    return this.projection.list(query);
  }

  async countVersions(key: K): Promise<number> {
    const filter = resolveBusinessKey(this.def, key);
    try {
      const row = asRow(
        this.db.prepare(`SELECT COUNT(*) AS n FROM ${this.table} WHERE ${filter.sql}`).get(...filter.params)
      );
      return typeof row?.n === "number" ? row.n : 0;
    } catch (e) {
      throw toStoreError(e, `${this.def.kind} count failed`);
    }
  }
}
