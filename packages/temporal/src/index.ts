export * from "./errors.js";
export * from "./decimal.js";
export * from "./record.js";
export * from "./store.js";
export * from "./time.js";

export { resolveBusinessKey, describeKey } from "./business-key.js";
export type { KeyFilter } from "./business-key.js";
export { detectChanges, hasChanges, isDistinct } from "./change-detector.js";
export { ensureTemporalTable } from "./schema.js";
export { CurrentStateProjection, DEFAULT_LIST_LIMIT, MAX_LIST_LIMIT } from "./projection.js";

export * from "./temporal-store.js";
