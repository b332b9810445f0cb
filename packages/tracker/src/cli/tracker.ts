// packages/tracker/src/cli/tracker.ts
import { isTemporalStoreError } from "@company-tracker/temporal";

import { loadConfig, LogLevelSchema, type TrackerConfig } from "../config.js";
import { createLogger } from "../logger.js";
import { readSeedFile, seedTracker } from "../seed.js";
import { createTracker, type CompanyTracker } from "../tracker.js";

export type CliIO = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env?: Record<string, string | undefined>;
  /** reuse an open tracker (left open afterwards) instead of opening --db */
  tracker?: CompanyTracker;
};

const defaultIO: CliIO = {
  stdout: (t) => process.stdout.write(t),
  stderr: (t) => process.stderr.write(t),
};

export function usage(): string {
  return `tracker - append-only company data store

Usage:
  tracker --help

  tracker upsert <entity> <json> [--actor <id>]
  tracker current <entity> <key-json>
  tracker history <entity> <key-json>
  tracker at <entity> <key-json> <timestamp>
  tracker version <entity> <record_id>
  tracker count <entity> <key-json>
  tracker list <entity> [--where <json>] [--limit <n>] [--offset <n>]

  tracker report [--country <code>] [--product <id>]
  tracker overview <company_id>
  tracker seed [--file <seed.json>] [--actor <id>]

Entities: companies | metrics | products | shares
Global flags: --db <path> (TRACKER_DB_PATH), --log-level <level> (TRACKER_LOG_LEVEL)

Examples:
  tracker upsert companies '{"company_id":1,"company_name":"Nordhavn Medical","percentage_a":0.25}'
  tracker history companies '{"company_id":1}'
  tracker at shares '{"company_id":1,"country_code":"DK","product_class_3_id":101}' 2024-06-01T00:00:00Z
  tracker report --country DK
`;
}

const VALUE_FLAGS = new Set([
  "--db",
  "--actor",
  "--where",
  "--limit",
  "--offset",
  "--country",
  "--product",
  "--file",
  "--log-level",
]);

class UsageError extends Error {}

function getFlagValue(args: string[], flag: string): string | null {
  const i = args.indexOf(flag);
  if (i < 0) return null;
  const v = args[i + 1];
  if (v === undefined || v.startsWith("--")) throw new UsageError(`Missing value for ${flag}`);
  return v;
}

function positionals(args: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const a = args[i] ?? "";
    if (VALUE_FLAGS.has(a)) {
      i++;
      continue;
    }
    if (a.startsWith("--")) continue;
    out.push(a);
  }
  return out;
}

function parseJsonArg(text: string | undefined, what: string): unknown {
  if (text === undefined) throw new UsageError(`Missing ${what}`);
  try {
    return JSON.parse(text);
  } catch {
    throw new UsageError(`${what} is not valid JSON: ${text.slice(0, 120)}`);
  }
}

function parseIntArg(text: string | null | undefined, what: string): number | undefined {
  if (text === null || text === undefined) return undefined;
  if (!/^-?\d+$/.test(text)) throw new UsageError(`${what} must be an integer, got "${text}"`);
  return Number(text);
}

// the CLI only forwards raw JSON and prints whatever comes back
type AnyService = {
  upsert(input: unknown, actor?: string | null): Promise<unknown>;
  current(key: unknown): Promise<unknown>;
  history(key: unknown): Promise<unknown>;
  atPointInTime(key: unknown, at: Date | string): Promise<unknown>;
  versionOf(record_id: number): Promise<unknown>;
  countVersions(key: unknown): Promise<number>;
  list(filters?: unknown): Promise<unknown>;
};

function entityService(tracker: CompanyTracker, name: string | undefined): AnyService {
  switch (name) {
    case "companies":
    case "company":
      return tracker.companies;
    case "metrics":
    case "metric":
      return tracker.metrics;
    case "products":
    case "product":
      return tracker.products;
    case "shares":
    case "share":
      return tracker.shares;
    default:
      throw new UsageError(`Unknown entity: ${name ?? "(none)"}`);
  }
}

function exitCodeFor(err: unknown): number {
  if (!isTemporalStoreError(err)) return 1;
  switch (err.code) {
    case "NOT_FOUND":
      return 2;
    case "UPSERT_CONFLICT":
      return 3;
    case "STORAGE_UNAVAILABLE":
      return 4;
    case "VALIDATION_FAILED":
      return 1;
  }
}

async function dispatch(tracker: CompanyTracker, args: string[]): Promise<unknown> {
  const [cmd, a1, a2, a3] = positionals(args);
  const actor = getFlagValue(args, "--actor") ?? undefined;

  switch (cmd) {
    case "upsert":
      return entityService(tracker, a1).upsert(parseJsonArg(a2, "record JSON"), actor);
    case "current":
      return entityService(tracker, a1).current(parseJsonArg(a2, "key JSON"));
    case "history":
      return entityService(tracker, a1).history(parseJsonArg(a2, "key JSON"));
    case "at": {
      if (a3 === undefined) throw new UsageError("Missing timestamp");
      return entityService(tracker, a1).atPointInTime(parseJsonArg(a2, "key JSON"), a3);
    }
    case "version": {
      const id = parseIntArg(a2, "record_id");
      if (id === undefined) throw new UsageError("Missing record_id");
      return entityService(tracker, a1).versionOf(id);
    }
    case "count": {
      const key = parseJsonArg(a2, "key JSON");
      return { versions: await entityService(tracker, a1).countVersions(key) };
    }
    case "list": {
      const where = getFlagValue(args, "--where");
      const filters = where === null ? {} : parseJsonArg(where, "--where JSON");
      if (typeof filters !== "object" || filters === null || Array.isArray(filters)) {
        throw new UsageError("--where must be a JSON object");
      }
      const limit = parseIntArg(getFlagValue(args, "--limit"), "--limit");
      const offset = parseIntArg(getFlagValue(args, "--offset"), "--offset");
      // flags win over --where, but only when given
      return entityService(tracker, a1).list({
        ...filters,
        ...(limit === undefined ? {} : { limit }),
        ...(offset === undefined ? {} : { offset }),
      });
    }
    case "report":
      return tracker.marketShareReport({
        country_code: getFlagValue(args, "--country") ?? undefined,
        product_class_3_id: parseIntArg(getFlagValue(args, "--product"), "--product"),
      });
    case "overview":
      return tracker.companyOverview(parseIntArg(a1, "company_id"));
    case "seed": {
      const file = getFlagValue(args, "--file");
      return seedTracker(tracker, file === null ? readSeedFile() : readSeedFile(file), actor);
    }
    default:
      throw new UsageError(`Unknown command: ${cmd ?? "(none)"}`);
  }
}

function cliConfig(args: string[], env: Record<string, string | undefined>): TrackerConfig {
  const overrides: Partial<TrackerConfig> = {};
  const db = getFlagValue(args, "--db");
  if (db !== null) overrides.databasePath = db;
  const level = getFlagValue(args, "--log-level");
  if (level !== null) {
    const parsed = LogLevelSchema.safeParse(level);
    if (!parsed.success) throw new UsageError(`Invalid --log-level: ${level}`);
    overrides.logLevel = parsed.data;
  }
  return loadConfig(env, overrides);
}

/** Runs one command; resolves to the process exit code. */
export async function run(argv: string[] = process.argv, io: CliIO = defaultIO): Promise<number> {
  const args = argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    io.stdout(usage());
    return 0;
  }

  let tracker: CompanyTracker | undefined = io.tracker;
  const owned = tracker === undefined;
  try {
    if (!tracker) {
      const config = cliConfig(args, io.env ?? process.env);
      const logger = createLogger({
        level: config.logLevel,
        sink: (line) => io.stderr(`${line}\n`),
      });
      tracker = createTracker(config, { logger });
    }

    const out = await dispatch(tracker, args);
    io.stdout(JSON.stringify(out, null, 2) + "\n");
    return 0;
  } catch (e) {
    if (e instanceof UsageError) {
      io.stderr(`[tracker] ${e.message}\n\n`);
      io.stderr(usage());
      return 1;
    }
    io.stderr(`[tracker] ${e instanceof Error ? e.message : String(e)}\n`);
    return exitCodeFor(e);
  } finally {
    if (owned) tracker?.close();
  }
}
