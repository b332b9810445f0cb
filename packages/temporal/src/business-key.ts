// packages/temporal/src/business-key.ts
import { ValidationError } from "./errors.js";
import type { ColumnSpec, DataValues, EntityDefinition, KeyValue, KeyValues } from "./record.js";

export type KeyFilter = {
  sql: string; // "company_id = ? AND country_code = ?"
  params: KeyValue[];
};

function checkComponent(col: ColumnSpec, v: unknown, kind: string): KeyValue {
  if (v === undefined || v === null) {
    throw new ValidationError(`${kind}: business key component "${col.name}" is missing`);
  }
  if (col.kind === "integer") {
    if (typeof v !== "number" || !Number.isSafeInteger(v)) {
      throw new ValidationError(`${kind}: business key component "${col.name}" must be an integer`);
    }
    return v;
  }
  if (typeof v !== "string" || v.length === 0) {
    throw new ValidationError(`${kind}: business key component "${col.name}" must be a non-empty string`);
  }
  return v;
}

/**
 * Exact-match conjunction over the entity's key columns.
 * Pure; rejects a malformed key before any SQL runs.
 */
export function resolveBusinessKey<K extends KeyValues, D extends DataValues>(
  def: EntityDefinition<K, D>,
  key: K
): KeyFilter {
  const params: KeyValue[] = [];
  const terms: string[] = [];
  for (const col of def.key) {
    params.push(checkComponent(col, key[col.name], def.kind));
    terms.push(`${col.name} = ?`);
  }
  return { sql: terms.join(" AND "), params };
}

export function describeKey<K extends KeyValues, D extends DataValues>(
  def: EntityDefinition<K, D>,
  key: K
): string {
  return def.key.map((c) => `${c.name}=${String(key[c.name])}`).join(", ");
}
