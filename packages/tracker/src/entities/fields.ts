// packages/tracker/src/entities/fields.ts
import { z } from "zod";
import {
  compareDecimal,
  countDecimalPlaces,
  formatDecimal,
  ValidationError,
} from "@company-tracker/temporal";

// -----------------------------
// Business-key components
// -----------------------------
export const CompanyIdSchema = z.number().int().positive();
export const ProductClassIdSchema = z.number().int().positive();
export const CountryCodeSchema = z.string().trim().min(2).max(3);
export const YearSchema = z.number().int().min(1900).max(2100);

// -----------------------------
// Business data
// -----------------------------
export const LabelSchema = z.string().max(100);

/**
 * Exact decimal accepted as JSON number or string, emitted as the canonical
 * fixed-scale string (0.25 -> "0.2500"). More digits than `scale` is rejected, not rounded.
 */
export function decimalSchema(opts: { scale: number; min?: string; max?: string }) {
  return z.union([z.number(), z.string()]).transform((v, ctx) => {
    try {
      if (countDecimalPlaces(v) > opts.scale) {
        ctx.addIssue({ code: "custom", message: `At most ${opts.scale} decimal places` });
        return z.NEVER;
      }
      if (opts.min !== undefined && compareDecimal(v, opts.min) < 0) {
        ctx.addIssue({ code: "custom", message: `Must be >= ${opts.min}` });
        return z.NEVER;
      }
      if (opts.max !== undefined && compareDecimal(v, opts.max) > 0) {
        ctx.addIssue({ code: "custom", message: `Must be <= ${opts.max}` });
        return z.NEVER;
      }
      return formatDecimal(v, opts.scale);
    } catch (e) {
      ctx.addIssue({ code: "custom", message: e instanceof Error ? e.message : String(e) });
      return z.NEVER;
    }
  });
}

/** Optional input field; absent and null both mean "no value". */
export function nullish<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((v): z.output<T> | null => v ?? null);
}

export const PercentageSchema = decimalSchema({ scale: 4, min: "0", max: "1" });
export const MoneySchema = decimalSchema({ scale: 2 });

// -----------------------------
// Listing
// -----------------------------
export const PageSchema = z.object({
  limit: z.number().int().min(1).max(1000).default(100),
  offset: z.number().int().min(0).default(0),
});

export function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  what: string
): (input: unknown) => z.output<S> {
  return (input) => {
    const r = schema.safeParse(input);
    if (r.success) return r.data;
    const issues = r.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ValidationError(`${what} is invalid: ${issues.join("; ")}`, issues);
  };
}
