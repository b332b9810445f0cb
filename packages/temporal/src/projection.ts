// packages/temporal/src/projection.ts
import type Database from "better-sqlite3";

import { resolveBusinessKey } from "./business-key.js";
import { toStoreError, ValidationError } from "./errors.js";
import {
  asRow,
  columnNames,
  toRecord,
  type DataValues,
  type EntityDefinition,
  type KeyValues,
  type ListQuery,
  type TemporalRecord,
} from "./record.js";
import { quoteIdent } from "./schema.js";

export const DEFAULT_LIST_LIMIT = 100;
export const MAX_LIST_LIMIT = 1000;

type Where = { sql: string; params: Array<string | number> };

/**
 * Read-only view over `is_current = 1` rows.
 * Holds no state of its own; every call reads the entity's current view.
 */
export class CurrentStateProjection<K extends KeyValues, D extends DataValues> {
  constructor(
    private readonly db: Database.Database,
    readonly def: EntityDefinition<K, D>
  ) {}

  private get view(): string {
    return quoteIdent(this.def.currentView);
  }

  private buildWhere(equals: Partial<K & D> | undefined, search: string | undefined): Where {
    const terms: string[] = [];
    const params: Array<string | number> = [];
    const known = new Set(columnNames(this.def));

    for (const [name, value] of Object.entries(equals ?? {})) {
      if (value === undefined) continue;
      if (!known.has(name)) {
        throw new ValidationError(`${this.def.kind}: unknown filter column "${name}"`);
      }
      if (value === null) {
        terms.push(`${quoteIdent(name)} IS NULL`);
      } else if (typeof value === "string" || typeof value === "number") {
        terms.push(`${quoteIdent(name)} = ?`);
        params.push(value);
      } else {
        throw new ValidationError(`${this.def.kind}: filter "${name}" must be a string or number`);
      }
    }

    if (search !== undefined && search.length > 0) {
      if (!this.def.searchColumn) {
        throw new ValidationError(`${this.def.kind}: search is not supported`);
      }
      terms.push(`${quoteIdent(this.def.searchColumn)} LIKE ? ESCAPE '\\'`);
      params.push(`%${search.replace(/[\\%_]/g, (c) => `\\${c}`)}%`);
    }

    return { sql: terms.length ? `WHERE ${terms.join(" AND ")}` : "", params };
  }

  private rows(sql: string, params: Array<string | number>): TemporalRecord<K, D>[] {
    try {
      const out: TemporalRecord<K, D>[] = [];
      for (const raw of this.db.prepare(sql).all(...params)) {
        const row = asRow(raw);
        if (row) out.push(toRecord(this.def, row));
      }
      return out;
    } catch (e) {
      throw toStoreError(e, `${this.def.kind} current-state read failed`);
    }
  }

  get(key: K): TemporalRecord<K, D> | null {
    const filter = resolveBusinessKey(this.def, key);
    const [first] = this.rows(
      `SELECT * FROM ${this.view} WHERE ${filter.sql} LIMIT 1`,
      filter.params
    );
    return first ?? null;
  }

  list(query: ListQuery<K, D> = {}): TemporalRecord<K, D>[] {
    const limit = query.limit ?? DEFAULT_LIST_LIMIT;
    const offset = query.offset ?? 0;
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIST_LIMIT) {
      throw new ValidationError(`limit must be an integer in 1..${MAX_LIST_LIMIT}`);
    }
    if (!Number.isInteger(offset) || offset < 0) {
      throw new ValidationError("offset must be a non-negative integer");
    }

    const where = this.buildWhere(query.equals, query.search);
    return this.rows(
      `SELECT * FROM ${this.view} ${where.sql}
       ORDER BY ${this.def.orderBy}, record_id
       LIMIT ? OFFSET ?`,
      [...where.params, limit, offset]
    );
  }

  /** Every current row (optionally filtered); used by aggregations, not paginated. */
  all(equals?: Partial<K & D>): TemporalRecord<K, D>[] {
    const where = this.buildWhere(equals, undefined);
    return this.rows(
      `SELECT * FROM ${this.view} ${where.sql} ORDER BY ${this.def.orderBy}, record_id`,
      where.params
    );
  }

  count(): number {
    try {
      const row = asRow(this.db.prepare(`SELECT COUNT(*) AS n FROM ${this.view}`).get());
      return typeof row?.n === "number" ? row.n : 0;
    } catch (e) {
      throw toStoreError(e, `${this.def.kind} current-state count failed`);
    }
  }
}
