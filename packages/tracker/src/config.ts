// packages/tracker/src/config.ts
import { z } from "zod";
import { ValidationError } from "@company-tracker/temporal";

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const EnvSchema = z.object({
  TRACKER_DB_PATH: z.string().trim().min(1).default("company-tracker.sqlite"),
  TRACKER_ENV: z.enum(["development", "staging", "production"]).default("development"),
  TRACKER_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(LogLevelSchema)
    .default("info"),
  TRACKER_DEFAULT_ACTOR: z.string().trim().min(1).max(100).default("system"),
  TRACKER_BUSY_TIMEOUT_MS: z.coerce.number().int().min(0).max(600_000).default(5000),
});

export type TrackerConfig = {
  databasePath: string;
  appEnv: "development" | "staging" | "production";
  logLevel: LogLevel;
  defaultActor: string;
  /** how long a statement waits on a locked database before failing */
  busyTimeoutMs: number;
};

/**
 * Build the configuration once, at startup, from environment variables.
 * The result is passed down explicitly; nothing reads process.env after this.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: Partial<TrackerConfig> = {}
): TrackerConfig {
  const pick = (name: keyof z.input<typeof EnvSchema>) => {
    const v = env[name];
    return v === undefined || v.trim() === "" ? undefined : v;
  };

  const r = EnvSchema.safeParse({
    TRACKER_DB_PATH: pick("TRACKER_DB_PATH"),
    TRACKER_ENV: pick("TRACKER_ENV"),
    TRACKER_LOG_LEVEL: pick("TRACKER_LOG_LEVEL"),
    TRACKER_DEFAULT_ACTOR: pick("TRACKER_DEFAULT_ACTOR"),
    TRACKER_BUSY_TIMEOUT_MS: pick("TRACKER_BUSY_TIMEOUT_MS"),
  });

  if (!r.success) {
    const issues = r.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ValidationError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }

  return {
    databasePath: r.data.TRACKER_DB_PATH,
    appEnv: r.data.TRACKER_ENV,
    logLevel: r.data.TRACKER_LOG_LEVEL,
    defaultActor: r.data.TRACKER_DEFAULT_ACTOR,
    busyTimeoutMs: r.data.TRACKER_BUSY_TIMEOUT_MS,
    ...overrides,
  };
}
