// packages/temporal/src/decimal.ts
import { ValidationError } from "./errors.js";

/**
 * Exact fixed-point value: `units / 10^scale`.
 * Business decimals (percentages, money) never pass through floating point
 * on their way into storage or into a comparison.
 */
export type Decimal = {
  units: bigint;
  scale: number;
};

export type DecimalInput = string | number | Decimal;

const DECIMAL_RE = /^([+-])?(\d+)(?:\.(\d+))?$/;

function isDecimal(v: DecimalInput): v is Decimal {
  return typeof v === "object" && v !== null && typeof v.units === "bigint";
}

export function parseDecimal(input: DecimalInput): Decimal {
  if (isDecimal(input)) return input;

  let text: string;
  if (typeof input === "number") {
    if (!Number.isFinite(input)) {
      throw new ValidationError(`Decimal must be finite, got ${input}`);
    }
    // shortest round-trip representation, e.g. 0.325 -> "0.325"
    text = String(input);
  } else {
    text = input.trim();
  }

  const m = DECIMAL_RE.exec(text);
  if (!m) throw new ValidationError(`Not a plain decimal number: "${text}"`);

  const sign = m[1] === "-" ? -1n : 1n;
  const whole = m[2] ?? "0";
  const frac = m[3] ?? "";
  return { units: sign * BigInt(whole + frac), scale: frac.length };
}

export function countDecimalPlaces(input: DecimalInput): number {
  const d = normalizeDecimal(parseDecimal(input));
  return d.scale;
}

function pow10(n: number): bigint {
  return 10n ** BigInt(n);
}

function rescale(d: Decimal, scale: number): bigint {
  if (scale < d.scale) throw new Error(`rescale would drop digits (${d.scale} -> ${scale})`);
  return d.units * pow10(scale - d.scale);
}

/** Drop trailing fractional zeros: 0.2500 -> 0.25 */
export function normalizeDecimal(d: Decimal): Decimal {
  let { units, scale } = d;
  while (scale > 0 && units % 10n === 0n) {
    units /= 10n;
    scale -= 1;
  }
  return { units, scale };
}

export function compareDecimal(a: DecimalInput, b: DecimalInput): -1 | 0 | 1 {
  const x = parseDecimal(a);
  const y = parseDecimal(b);
  const scale = Math.max(x.scale, y.scale);
  const ux = rescale(x, scale);
  const uy = rescale(y, scale);
  return ux === uy ? 0 : ux < uy ? -1 : 1;
}

export function decimalEquals(a: DecimalInput, b: DecimalInput): boolean {
  return compareDecimal(a, b) === 0;
}

export function addDecimal(a: DecimalInput, b: DecimalInput): Decimal {
  const x = parseDecimal(a);
  const y = parseDecimal(b);
  const scale = Math.max(x.scale, y.scale);
  return { units: rescale(x, scale) + rescale(y, scale), scale };
}

export const ZERO: Decimal = { units: 0n, scale: 0 };

/**
 * Canonical text at a fixed scale, e.g. formatDecimal("0.25", 4) === "0.2500".
 * Refuses to round: more fractional digits than `scale` is a caller error.
 */
export function formatDecimal(input: DecimalInput, scale: number): string {
  const d = normalizeDecimal(parseDecimal(input));
  if (d.scale > scale) {
    throw new ValidationError(`Decimal has more than ${scale} decimal places`);
  }
  const units = rescale(d, scale);
  const negative = units < 0n;
  const digits = (negative ? -units : units).toString().padStart(scale + 1, "0");
  const whole = digits.slice(0, digits.length - scale);
  const frac = digits.slice(digits.length - scale);
  const body = scale > 0 ? `${whole}.${frac}` : whole;
  return negative ? `-${body}` : body;
}

/** Presentation boundary only: precision may be lost here and nowhere else. */
export function decimalToNumber(input: DecimalInput): number {
  const d = normalizeDecimal(parseDecimal(input));
  return Number(formatDecimal(d, d.scale));
}
