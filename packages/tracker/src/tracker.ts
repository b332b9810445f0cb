// packages/tracker/src/tracker.ts
import type Database from "better-sqlite3";
import {
  NotFoundError,
  SqliteTemporalStore,
  describeKey,
  type Clock,
  type DataValues,
  type KeyValues,
  type ListQuery,
  type TemporalRecord,
  type TemporalRecordStore,
} from "@company-tracker/temporal";

import { loadConfig, type TrackerConfig } from "./config.js";
import { openTrackerDatabase } from "./db.js";
import {
  companyEntity,
  parseCompanyData,
  parseCompanyFilters,
  parseCompanyKey,
  type CompanyData,
  type CompanyKey,
  type CompanyRecord,
} from "./entities/company.js";
import {
  metricEntity,
  parseMetricData,
  parseMetricFilters,
  parseMetricKey,
  type MetricData,
  type MetricKey,
  type MetricRecord,
} from "./entities/metric.js";
import {
  parseProductData,
  parseProductFilters,
  parseProductKey,
  productEntity,
  type ProductData,
  type ProductKey,
} from "./entities/product.js";
import {
  parseMarketShareFilters,
  parseShareData,
  parseShareFilters,
  parseShareKey,
  shareEntity,
  type ShareData,
  type ShareKey,
  type ShareRecord,
} from "./entities/share.js";
import { createLogger, type Logger } from "./logger.js";
import { buildMarketShareReport, type MarketShareRow } from "./reports.js";

export type UpsertResponse<K extends KeyValues> = K & {
  record_id: number;
  is_new: boolean;
};

type Parsers<K extends KeyValues, D extends DataValues> = {
  key(input: unknown): K;
  data(input: unknown): D;
  filters(input: unknown): ListQuery<K, D>;
};

/**
 * Caller-side surface for one entity: validates raw input, then talks to the store.
 * Absent results become NotFoundError here; the store itself only returns null / [].
 */
export class EntityService<K extends KeyValues, D extends DataValues> {
  constructor(
    readonly store: TemporalRecordStore<K, D>,
    private readonly parse: Parsers<K, D>
  ) {}

  private get kind(): string {
    return this.store.def.kind;
  }

  async upsert(input: unknown, actor?: string | null): Promise<UpsertResponse<K>> {
    const key = this.parse.key(input);
    const data = this.parse.data(input);
    const r = await this.store.upsert(key, data, actor);
    return { ...key, record_id: r.record_id, is_new: r.is_new };
  }

  async find(keyInput: unknown): Promise<TemporalRecord<K, D> | null> {
    return this.store.getCurrent(this.parse.key(keyInput));
  }

  async current(keyInput: unknown): Promise<TemporalRecord<K, D>> {
    const key = this.parse.key(keyInput);
    const rec = await this.store.getCurrent(key);
    if (!rec) throw new NotFoundError(`NOT_FOUND: ${this.kind} (${describeKey(this.store.def, key)})`);
    return rec;
  }

  async history(keyInput: unknown): Promise<TemporalRecord<K, D>[]> {
    const key = this.parse.key(keyInput);
    const rows = await this.store.getHistory(key);
    if (rows.length === 0) {
      throw new NotFoundError(`NOT_FOUND: ${this.kind} (${describeKey(this.store.def, key)}) has no history`);
    }
    return rows;
  }

  async atPointInTime(keyInput: unknown, at: Date | string): Promise<TemporalRecord<K, D>> {
    const key = this.parse.key(keyInput);
    const rec = await this.store.getAtPointInTime(key, at);
    if (!rec) {
      throw new NotFoundError(
        `NOT_FOUND: ${this.kind} (${describeKey(this.store.def, key)}) was not valid at ${String(at)}`
      );
    }
    return rec;
  }

  async versionOf(record_id: number): Promise<TemporalRecord<K, D>> {
    const rec = await this.store.getByRecordId(record_id);
    if (!rec) throw new NotFoundError(`NOT_FOUND: ${this.kind} record ${record_id}`);
    return rec;
  }

  /** Number of stored versions, 0 for a key that never existed. */
  async countVersions(keyInput: unknown): Promise<number> {
    return this.store.countVersions(this.parse.key(keyInput));
  }

  async list(filters: unknown = {}): Promise<TemporalRecord<K, D>[]> {
    return this.store.listCurrent(this.parse.filters(filters));
  }
}

export type MarketShareReportRow = MarketShareRow & { company_name: string | null };

export type CompanyOverview = {
  company: CompanyRecord;
  metrics: MetricRecord[];
  shares: ShareRecord[];
};

export type TrackerDeps = {
  db: Database.Database;
  config: TrackerConfig;
  logger?: Logger;
  now?: Clock;
};

export class CompanyTracker {
  readonly companies: EntityService<CompanyKey, CompanyData>;
  readonly metrics: EntityService<MetricKey, MetricData>;
  readonly products: EntityService<ProductKey, ProductData>;
  readonly shares: EntityService<ShareKey, ShareData>;

  readonly db: Database.Database;
  readonly config: TrackerConfig;
  readonly logger: Logger;

  private readonly metricStore: SqliteTemporalStore<MetricKey, MetricData>;
  private readonly shareStore: SqliteTemporalStore<ShareKey, ShareData>;

  constructor(deps: TrackerDeps) {
    this.db = deps.db;
    this.config = deps.config;
    this.logger = deps.logger ?? createLogger({ level: deps.config.logLevel });

    const storeOpts = (scope: string) => ({
      now: deps.now,
      defaultActor: deps.config.defaultActor,
      logger: this.logger.child(scope),
    });

    this.companies = new EntityService(
      new SqliteTemporalStore(deps.db, companyEntity, storeOpts("companies")),
      { key: parseCompanyKey, data: parseCompanyData, filters: parseCompanyFilters }
    );
    this.metricStore = new SqliteTemporalStore(deps.db, metricEntity, storeOpts("metrics"));
    this.metrics = new EntityService(this.metricStore, {
      key: parseMetricKey,
      data: parseMetricData,
      filters: parseMetricFilters,
    });
    this.products = new EntityService(
      new SqliteTemporalStore(deps.db, productEntity, storeOpts("products")),
      { key: parseProductKey, data: parseProductData, filters: parseProductFilters }
    );

    this.shareStore = new SqliteTemporalStore(deps.db, shareEntity, storeOpts("shares"));
    this.shares = new EntityService(this.shareStore, {
      key: parseShareKey,
      data: parseShareData,
      filters: parseShareFilters,
    });
  }

  /** Totals per (company, country) over current shares only. */
  async marketShareReport(filtersInput: unknown = {}): Promise<MarketShareReportRow[]> {
    const filters = parseMarketShareFilters(filtersInput);
    const rows = this.shareStore.projection.all({
      country_code: filters.country_code,
      product_class_3_id: filters.product_class_3_id,
    });

    const report = buildMarketShareReport(rows, filters);
    const names = new Map<number, string | null>();
    for (const r of report) {
      if (!names.has(r.company_id)) {
        const c = await this.companies.find({ company_id: r.company_id });
        names.set(r.company_id, c?.company_name ?? null);
      }
    }
    return report.map((r) => ({ ...r, company_name: names.get(r.company_id) ?? null }));
  }

  /** Current company plus every one of its current metrics and shares (not paginated). */
  async companyOverview(companyIdInput: unknown): Promise<CompanyOverview> {
    const company = await this.companies.current({ company_id: companyIdInput });
    const metrics = this.metricStore.projection.all({ company_id: company.company_id });
    const shares = this.shareStore.projection.all({ company_id: company.company_id });
    return { company, metrics, shares };
  }

  close(): void {
    if (this.db.open) this.db.close();
  }
}

/**
 * Composition root: config -> database -> tracker.
 * The tracker owns the handle it opened; call close() when done.
 */
export function createTracker(
  config: TrackerConfig = loadConfig(),
  opts: { logger?: Logger; now?: Clock } = {}
): CompanyTracker {
  const logger = opts.logger ?? createLogger({ level: config.logLevel });
  const db = openTrackerDatabase(config);
  logger.debug("database ready", { path: config.databasePath, env: config.appEnv });
  return new CompanyTracker({ db, config, logger, now: opts.now });
}
