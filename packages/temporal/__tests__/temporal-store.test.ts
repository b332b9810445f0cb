// packages/temporal/__tests__/temporal-store.test.ts
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import Database from "better-sqlite3";
import { afterEach, describe, expect, it } from "vitest";

import { StorageUnavailableError, UpsertConflictError, ValidationError } from "../src/errors.js";
import { ensureTemporalTable } from "../src/schema.js";
import { SqliteTemporalStore } from "../src/temporal-store.js";
import { captureLogger, createWidgetStore, makeClock, widgetEntity } from "./_helpers/widget-store.js";

const bolt = { widget_id: 1, region: "eu" };

function currentRowCount(db: Database.Database): number {
  const row: unknown = db
    .prepare("SELECT COUNT(*) AS n FROM widgets_history WHERE widget_id = ? AND region = ? AND is_current = 1")
    .get(bolt.widget_id, bolt.region);
  return typeof row === "object" && row !== null && "n" in row && typeof row.n === "number" ? row.n : -1;
}

describe("SqliteTemporalStore.upsert", () => {
  it("creates the first version with every data field marked changed", async () => {
    const clock = makeClock();
    const { store } = createWidgetStore({ now: clock.now });

    const r = await store.upsert(bolt, { label: "Bolt", price: "1.5", stock: 10 }, "alice");
    expect(r).toEqual({
      record_id: 1,
      is_new: true,
      superseded_record_id: null,
      changed_fields: ["label", "price", "stock"],
    });

    const cur = await store.getCurrent(bolt);
    expect(cur).toEqual({
      widget_id: 1,
      region: "eu",
      label: "Bolt",
      price: "1.50",
      stock: 10,
      record_id: 1,
      valid_from: "2024-01-01T00:00:00.000Z",
      valid_to: null,
      is_current: true,
      created_by: "alice",
    });
  });

  it("is a no-op when nothing changed, including decimal spelling", async () => {
    const clock = makeClock();
    const { store } = createWidgetStore({ now: clock.now });

    await store.upsert(bolt, { label: "Bolt", price: "1.5", stock: 10 });
    clock.set("2024-02-01T00:00:00.000Z");
    const again = await store.upsert(bolt, { label: "Bolt", price: 1.5, stock: 10 });
    const again2 = await store.upsert(bolt, { label: "Bolt", price: "1.50", stock: 10 });

    expect(again).toEqual({ record_id: 1, is_new: false, superseded_record_id: null, changed_fields: [] });
    expect(again2.record_id).toBe(1);
    expect(await store.countVersions(bolt)).toBe(1);
  });

  it("closes the current version and opens a successor on change", async () => {
    const clock = makeClock();
    const { store } = createWidgetStore({ now: clock.now });

    await store.upsert(bolt, { label: "Bolt", price: "1.5", stock: 10 });
    clock.set("2024-02-01T00:00:00.000Z");
    const r = await store.upsert(bolt, { label: "Bolt", price: "1.5", stock: 12 });

    expect(r).toEqual({ record_id: 2, is_new: true, superseded_record_id: 1, changed_fields: ["stock"] });

    const history = await store.getHistory(bolt);
    expect(history.map((h) => h.record_id)).toEqual([2, 1]);
    expect(history[0]?.valid_from).toBe("2024-02-01T00:00:00.000Z");
    expect(history[0]?.is_current).toBe(true);
    expect(history[1]?.valid_to).toBe("2024-02-01T00:00:00.000Z");
    expect(history[1]?.is_current).toBe(false);
    expect(history[1]?.stock).toBe(10);
  });

  it("treats null transitions as changes and null to null as none", async () => {
    const clock = makeClock();
    const { store } = createWidgetStore({ now: clock.now });

    await store.upsert(bolt, { label: "Bolt", price: null, stock: 12 });
    clock.set("2024-02-01T00:00:00.000Z");
    const toNull = await store.upsert(bolt, { label: "Bolt", price: null, stock: null });
    clock.set("2024-03-01T00:00:00.000Z");
    const stillNull = await store.upsert(bolt, { label: "Bolt", price: null, stock: null });

    expect(toNull.changed_fields).toEqual(["stock"]);
    expect(stillNull.is_new).toBe(false);
    expect(await store.countVersions(bolt)).toBe(2);
  });

  it("keeps valid_from strictly increasing under a frozen clock", async () => {
    const clock = makeClock();
    const { store } = createWidgetStore({ now: clock.now });

    await store.upsert(bolt, { label: "a", price: null, stock: null });
    await store.upsert(bolt, { label: "b", price: null, stock: null });
    await store.upsert(bolt, { label: "c", price: null, stock: null });

    const history = await store.getHistory(bolt);
    expect(history.map((h) => [h.label, h.valid_from, h.valid_to])).toEqual([
      ["c", "2024-01-01T00:00:00.002Z", null],
      ["b", "2024-01-01T00:00:00.001Z", "2024-01-01T00:00:00.002Z"],
      ["a", "2024-01-01T00:00:00.000Z", "2024-01-01T00:00:00.001Z"],
    ]);
  });

  it("leaves exactly one current row after many upserts to one key", async () => {
    const clock = makeClock();
    const { db, store } = createWidgetStore({ now: clock.now });

    const results = await Promise.all(
      Array.from({ length: 10 }, (_, i) => store.upsert(bolt, { label: `v${i}`, price: null, stock: i }))
    );

    expect(results.every((r) => r.is_new)).toBe(true);
    expect(new Set(results.map((r) => r.record_id)).size).toBe(10);
    expect(currentRowCount(db)).toBe(1);
    expect(await store.countVersions(bolt)).toBe(10);
    expect((await store.getCurrent(bolt))?.label).toBe("v9");
  });

  it("falls back to the default actor", async () => {
    const { store } = createWidgetStore({ defaultActor: "importer" });

    await store.upsert(bolt, { label: "Bolt", price: null, stock: null });
    await store.upsert(bolt, { label: "Bolt v2", price: null, stock: null }, null);

    const history = await store.getHistory(bolt);
    expect(history.map((h) => h.created_by)).toEqual(["importer", "importer"]);
  });

  it("rejects invalid input without writing anything", async () => {
    const { store } = createWidgetStore();

    await expect(store.upsert(bolt, { label: null, price: null, stock: null })).rejects.toThrow(
      'widget: "label" is required'
    );
    await expect(store.upsert(bolt, { label: "Bolt", price: "1.234", stock: null })).rejects.toThrow(
      "Decimal has more than 2 decimal places"
    );
    await expect(store.upsert(bolt, { label: "Bolt", price: null, stock: 2.5 })).rejects.toThrow(
      'widget: "stock" must be an integer'
    );
    await expect(
      store.upsert({ widget_id: 0.5, region: "eu" }, { label: "Bolt", price: null, stock: null })
    ).rejects.toBeInstanceOf(ValidationError);

    expect(await store.countVersions(bolt)).toBe(0);
  });

  it("logs created and superseded versions", async () => {
    const logger = captureLogger();
    const { store } = createWidgetStore({ logger });

    await store.upsert(bolt, { label: "Bolt", price: null, stock: null });
    await store.upsert(bolt, { label: "Bolt", price: null, stock: null });
    await store.upsert(bolt, { label: "Nut", price: null, stock: null });

    expect(logger.lines.map((l) => `${l.level} ${l.message}`)).toEqual([
      "info version created",
      "debug upsert unchanged",
      "info version superseded",
    ]);
    expect(logger.lines[2]?.fields).toEqual({
      entity: "widget",
      record_id: 2,
      superseded_record_id: 1,
      changed_fields: ["label"],
    });
  });
});

describe("SqliteTemporalStore reads", () => {
  it("looks up any version by record_id", async () => {
    const { store } = createWidgetStore();
    await store.upsert(bolt, { label: "Bolt", price: null, stock: null });
    await store.upsert(bolt, { label: "Nut", price: null, stock: null });

    expect((await store.getByRecordId(1))?.label).toBe("Bolt");
    expect((await store.getByRecordId(1))?.is_current).toBe(false);
    expect(await store.getByRecordId(999)).toBeNull();
    await expect(store.getByRecordId(1.5)).rejects.toBeInstanceOf(ValidationError);
  });

  it("returns empty history and null current for an unknown key", async () => {
    const { store } = createWidgetStore();
    expect(await store.getHistory({ widget_id: 9, region: "us" })).toEqual([]);
    expect(await store.getCurrent({ widget_id: 9, region: "us" })).toBeNull();
    expect(await store.countVersions({ widget_id: 9, region: "us" })).toBe(0);
  });

  it("keeps keys independent", async () => {
    const { store } = createWidgetStore();
    await store.upsert(bolt, { label: "Bolt", price: null, stock: null });
    await store.upsert({ widget_id: 1, region: "us" }, { label: "Bolt US", price: null, stock: null });

    expect((await store.getCurrent(bolt))?.label).toBe("Bolt");
    expect((await store.getCurrent({ widget_id: 1, region: "us" }))?.label).toBe("Bolt US");
  });

  it("reports a closed handle as storage unavailable", async () => {
    const { db, store } = createWidgetStore();
    db.close();

    await expect(store.getHistory(bolt)).rejects.toBeInstanceOf(StorageUnavailableError);
    await expect(store.getCurrent(bolt)).rejects.toThrow("STORAGE_UNAVAILABLE: widget current-state read failed");
  });
});

// SQL function that is true exactly once; lives outside any transaction, so a rollback does not re-arm it
function armOnce(db: Database.Database): void {
  let armed = true;
  db.function("fire_once", () => {
    if (!armed) return 0;
    armed = false;
    return 1;
  });
}

describe("SqliteTemporalStore single retry", () => {
  it("retries after another writer takes the current slot first", async () => {
    const logger = captureLogger();
    const { db, store } = createWidgetStore({ logger });
    armOnce(db);
    // a competing current row for the same key lands just before ours
    db.exec(`
      CREATE TRIGGER widgets_competing_insert BEFORE INSERT ON widgets_history
      WHEN fire_once() = 1
      BEGIN
        INSERT INTO widgets_history (widget_id, region, label, valid_from, is_current, created_by)
        VALUES (NEW.widget_id, NEW.region, 'other', NEW.valid_from, 1, 'other-writer');
      END;
    `);

    const r = await store.upsert(bolt, { label: "Bolt", price: null, stock: null }, "alice");

    expect(r.is_new).toBe(true);
    expect(currentRowCount(db)).toBe(1);
    expect(await store.countVersions(bolt)).toBe(1);
    expect((await store.getCurrent(bolt))?.created_by).toBe("alice");
    expect(logger.lines.filter((l) => l.level === "warn").map((l) => l.message)).toEqual([
      "upsert conflict, retrying once",
    ]);
  });

  it("retries when the current row was closed between read and update", async () => {
    const clock = makeClock();
    const logger = captureLogger();
    const { db, store } = createWidgetStore({ now: clock.now, logger });
    await store.upsert(bolt, { label: "Bolt", price: null, stock: null });

    armOnce(db);
    // the close of the current row affects nothing on the first attempt
    db.exec(`
      CREATE TRIGGER widgets_lost_close BEFORE UPDATE ON widgets_history
      WHEN fire_once() = 1
      BEGIN
        SELECT RAISE(IGNORE);
      END;
    `);

    clock.set("2024-02-01T00:00:00.000Z");
    const r = await store.upsert(bolt, { label: "Nut", price: null, stock: null });

    expect(r).toEqual({ record_id: 2, is_new: true, superseded_record_id: 1, changed_fields: ["label"] });
    expect(currentRowCount(db)).toBe(1);
    expect((await store.getHistory(bolt)).map((h) => [h.record_id, h.is_current])).toEqual([
      [2, true],
      [1, false],
    ]);
    expect(logger.lines.filter((l) => l.level === "warn")).toHaveLength(1);
  });
});

describe("SqliteTemporalStore write conflicts", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("retries once on a locked database, then raises UpsertConflictError", async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "temporal-store-"));
    const file = path.join(dir, "widgets.sqlite");

    const logger = captureLogger();
    const { db, store } = createWidgetStore({ logger }, file);
    const other = new Database(file, { timeout: 0 });

    try {
      other.exec("BEGIN IMMEDIATE");

      await expect(store.upsert(bolt, { label: "Bolt", price: null, stock: null })).rejects.toThrow(
        "UPSERT_CONFLICT: widget (widget_id=1, region=eu) was modified concurrently; retry"
      );
      expect(logger.lines.filter((l) => l.level === "warn").map((l) => l.message)).toEqual([
        "upsert conflict, retrying once",
      ]);

      other.exec("ROLLBACK");
      const r = await store.upsert(bolt, { label: "Bolt", price: null, stock: null });
      expect(r.is_new).toBe(true);
    } finally {
      other.close();
      db.close();
    }
  });

  it("classifies the raised error as transient", async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "temporal-store-"));
    const file = path.join(dir, "widgets.sqlite");

    const db = new Database(file, { timeout: 0 });
    ensureTemporalTable(db, widgetEntity);
    const store = new SqliteTemporalStore(db, widgetEntity);
    const other = new Database(file, { timeout: 0 });

    try {
      other.exec("BEGIN IMMEDIATE");
      const err = await store.upsert(bolt, { label: "Bolt", price: null, stock: null }).then(
        () => null,
        (e: unknown) => e
      );
      expect(err).toBeInstanceOf(UpsertConflictError);
      expect(err).toMatchObject({ code: "UPSERT_CONFLICT", transient: true });
      other.exec("ROLLBACK");
    } finally {
      other.close();
      db.close();
    }
  });
});
