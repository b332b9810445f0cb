export * from "./entities/index.js";

export { loadConfig, LogLevelSchema } from "./config.js";
export type { LogLevel, TrackerConfig } from "./config.js";
export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export { migrateTrackerSchema, openTrackerDatabase } from "./db.js";
export { buildMarketShareReport } from "./reports.js";
export type { MarketShareRow } from "./reports.js";
export * from "./tracker.js";
export { DEFAULT_SEED_FILE, readSeedFile, seedTracker } from "./seed.js";
export type { SeedCounts, SeedData, SeedSummary } from "./seed.js";
