// packages/tracker/src/seed.ts
import * as fs from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ValidationError } from "@company-tracker/temporal";

import type { CompanyTracker } from "./tracker.js";

export const DEFAULT_SEED_FILE = fileURLToPath(new URL("../data/seed-data.json", import.meta.url));

// rows are validated by each entity's own schema on upsert
const SeedDataSchema = z.object({
  companies: z.array(z.unknown()).default([]),
  metrics: z.array(z.unknown()).default([]),
  products: z.array(z.unknown()).default([]),
  shares: z.array(z.unknown()).default([]),
});

export type SeedData = z.infer<typeof SeedDataSchema>;

export type SeedCounts = { created: number; unchanged: number };
export type SeedSummary = Record<keyof SeedData, SeedCounts>;

export function readSeedFile(filePath: string = DEFAULT_SEED_FILE): SeedData {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (e) {
    throw new ValidationError(`Seed file not readable: ${filePath} (${e instanceof Error ? e.message : String(e)})`);
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ValidationError(`Seed file is not valid JSON: ${filePath}`);
  }
  const r = SeedDataSchema.safeParse(json);
  if (!r.success) {
    throw new ValidationError(`Seed file has the wrong shape: ${filePath}`, r.error.issues.map((i) => i.message));
  }
  return r.data;
}

type Upserter = {
  upsert(input: unknown, actor?: string | null): Promise<{ is_new: boolean }>;
};

async function seedRows(
  service: Upserter,
  rows: readonly unknown[],
  actor: string | undefined
): Promise<SeedCounts> {
  const counts: SeedCounts = { created: 0, unchanged: 0 };
  for (const row of rows) {
    const r = await service.upsert(row, actor);
    if (r.is_new) counts.created += 1;
    else counts.unchanged += 1;
  }
  return counts;
}

/**
 * Upsert every seed row. Re-running with the same data is a no-op
 * (every row reports unchanged).
 */
export async function seedTracker(
  tracker: CompanyTracker,
  data: SeedData,
  actor?: string
): Promise<SeedSummary> {
  const summary: SeedSummary = {
    companies: await seedRows(tracker.companies, data.companies, actor),
    metrics: await seedRows(tracker.metrics, data.metrics, actor),
    products: await seedRows(tracker.products, data.products, actor),
    shares: await seedRows(tracker.shares, data.shares, actor),
  };
  tracker.logger.info("seed complete", summary);
  return summary;
}
