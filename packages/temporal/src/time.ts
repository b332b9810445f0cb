// packages/temporal/src/time.ts
import { ValidationError } from "./errors.js";

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

// date-time without "Z" or an offset; JS would read it as local time
const ZONELESS_RE = /T\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

// toISOString() switches to a signed six-digit year outside 0000-9999, which no
// longer sorts as text; stored timestamps always stay inside this range
const MIN_STORED_MS = Date.parse("0000-01-01T00:00:00.000Z");
const MAX_STORED_MS = Date.parse("9999-12-31T23:59:59.999Z");

function parseInstant(t: Date | string): Date {
  let d: Date;
  if (t instanceof Date) {
    d = t;
  } else {
    const text = t.trim();
    d = new Date(ZONELESS_RE.test(text) ? `${text}Z` : text);
  }
  if (Number.isNaN(d.getTime())) {
    throw new ValidationError(`Invalid timestamp: ${String(t)}`);
  }
  return d;
}

/**
 * Normalise a caller-supplied instant to the stored ISO form (UTC, ms).
 * Instants past either end of the stored range are clamped to that end, so a
 * lookup far in the future still compares after every stored timestamp.
 */
export function toIsoTimestamp(t: Date | string): string {
  const ms = parseInstant(t).getTime();
  return new Date(Math.min(MAX_STORED_MS, Math.max(MIN_STORED_MS, ms))).toISOString();
}

/**
 * valid_from for a successor version: `now`, unless that does not come strictly
 * after the version being superseded (coarse or frozen clock), then previous + 1ms.
 */
export function nextValidFrom(now: Date, previousValidFrom: string | null): string {
  const nowMs = now.getTime();
  const ms = previousValidFrom === null ? nowMs : Math.max(nowMs, Date.parse(previousValidFrom) + 1);
  if (!(ms >= MIN_STORED_MS && ms <= MAX_STORED_MS)) {
    throw new ValidationError(`Clock reading outside 0000-9999: ${String(now)}`);
  }
  return new Date(ms).toISOString();
}
