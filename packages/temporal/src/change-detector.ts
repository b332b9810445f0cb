// packages/temporal/src/change-detector.ts
import { decimalEquals } from "./decimal.js";
import type { ColumnSpec } from "./record.js";

type Comparable = Record<string, unknown>;

function isPresent(v: unknown): boolean {
  return v !== null && v !== undefined;
}

function isNumeric(v: unknown): v is string | number {
  return typeof v === "number" || (typeof v === "string" && v.trim().length > 0);
}

/**
 * SQL `IS DISTINCT FROM` for one field:
 * - null vs null: same
 * - null vs value: distinct
 * - decimals: by exact value (0.25 == "0.2500")
 */
export function isDistinct(col: ColumnSpec, current: unknown, next: unknown): boolean {
  const a = isPresent(current);
  const b = isPresent(next);
  if (!a && !b) return false;
  if (a !== b) return true;

  if (col.kind === "decimal" || col.kind === "integer") {
    if (isNumeric(current) && isNumeric(next)) return !decimalEquals(current, next);
    return current !== next;
  }

  return current !== next;
}

/** Names of the data columns whose values differ, in definition order. */
export function detectChanges(
  columns: readonly ColumnSpec[],
  current: Comparable,
  next: Comparable
): string[] {
  return columns.filter((c) => isDistinct(c, current[c.name], next[c.name])).map((c) => c.name);
}

export function hasChanges(
  columns: readonly ColumnSpec[],
  current: Comparable,
  next: Comparable
): boolean {
  return columns.some((c) => isDistinct(c, current[c.name], next[c.name]));
}
