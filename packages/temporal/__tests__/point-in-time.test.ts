// packages/temporal/__tests__/point-in-time.test.ts
import { beforeEach, describe, expect, it } from "vitest";

import { ValidationError } from "../src/errors.js";
import { nextValidFrom, toIsoTimestamp } from "../src/time.js";
import type { SqliteTemporalStore } from "../src/temporal-store.js";
import { createWidgetStore, makeClock, type WidgetData, type WidgetKey } from "./_helpers/widget-store.js";

const bolt = { widget_id: 1, region: "eu" };

describe("getAtPointInTime", () => {
  let store: SqliteTemporalStore<WidgetKey, WidgetData>;

  beforeEach(async () => {
    const clock = makeClock("2024-01-01T00:00:00.000Z");
    store = createWidgetStore({ now: clock.now }).store;

    await store.upsert(bolt, { label: "v1", price: null, stock: null });
    clock.set("2024-02-01T00:00:00.000Z");
    await store.upsert(bolt, { label: "v2", price: null, stock: null });
    clock.set("2024-03-01T00:00:00.000Z");
    await store.upsert(bolt, { label: "v3", price: null, stock: null });
  });

  const labelAt = async (t: Date | string) => (await store.getAtPointInTime(bolt, t))?.label ?? null;

  it("returns null before the first version", async () => {
    expect(await labelAt("2023-12-31T23:59:59.999Z")).toBeNull();
  });

  it("includes valid_from and excludes valid_to", async () => {
    expect(await labelAt("2024-01-01T00:00:00.000Z")).toBe("v1");
    expect(await labelAt("2024-01-31T23:59:59.999Z")).toBe("v1");
    expect(await labelAt("2024-02-01T00:00:00.000Z")).toBe("v2");
    expect(await labelAt("2024-03-01T00:00:00.000Z")).toBe("v3");
  });

  it("returns the open-ended current version for later instants", async () => {
    expect(await labelAt(new Date("2030-01-01T00:00:00.000Z"))).toBe("v3");
  });

  it("answers instants beyond year 9999 with the current version and before year 0 with null", async () => {
    expect(await labelAt(new Date(Date.UTC(10000, 0, 1)))).toBe("v3");
    expect(await labelAt("+010000-01-01T00:00:00.000Z")).toBe("v3");
    expect(await labelAt(new Date("-000001-01-01T00:00:00.000Z"))).toBeNull();
  });

  it("reads zone-less timestamps as UTC", async () => {
    expect(await labelAt("2024-02-15T12:00:00")).toBe("v2");
    expect(await labelAt("2024-01-31T23:59:59.999")).toBe("v1");
    expect(await labelAt("2024-01-15")).toBe("v1");
    expect(await labelAt("2024-02-01T01:00:00+02:00")).toBe("v1");
  });

  it("returns null for a key that never existed", async () => {
    expect(await store.getAtPointInTime({ widget_id: 2, region: "eu" }, "2024-02-15T00:00:00Z")).toBeNull();
  });

  it("rejects an unparseable instant", async () => {
    await expect(store.getAtPointInTime(bolt, "not-a-date")).rejects.toThrow("Invalid timestamp: not-a-date");
    await expect(store.getAtPointInTime(bolt, "not-a-date")).rejects.toBeInstanceOf(ValidationError);
  });
});

describe("time helpers", () => {
  it("normalises instants to millisecond UTC", () => {
    expect(toIsoTimestamp("2024-06-01T00:00:00Z")).toBe("2024-06-01T00:00:00.000Z");
    expect(toIsoTimestamp("2024-06-01T00:00")).toBe("2024-06-01T00:00:00.000Z");
    expect(toIsoTimestamp(new Date(Date.UTC(2024, 5, 1, 12)))).toBe("2024-06-01T12:00:00.000Z");
  });

  it("clamps instants to the four-digit-year range", () => {
    expect(toIsoTimestamp(new Date(Date.UTC(10000, 0, 1)))).toBe("9999-12-31T23:59:59.999Z");
    expect(toIsoTimestamp(new Date("-000001-06-01T00:00:00.000Z"))).toBe("0000-01-01T00:00:00.000Z");
    expect(toIsoTimestamp("9999-12-31T23:59:59.999Z")).toBe("9999-12-31T23:59:59.999Z");
  });

  it("refuses a clock reading that cannot be stored as sortable text", () => {
    expect(() => nextValidFrom(new Date(Date.UTC(10000, 0, 1)), null)).toThrow(ValidationError);
    expect(() => nextValidFrom(new Date("9999-12-31T23:59:59.999Z"), "9999-12-31T23:59:59.999Z")).toThrow(
      /^Clock reading outside 0000-9999: /
    );
  });

  it("moves valid_from past the previous version when the clock does not", () => {
    const now = new Date("2024-01-01T00:00:00.000Z");
    expect(nextValidFrom(now, null)).toBe("2024-01-01T00:00:00.000Z");
    expect(nextValidFrom(now, "2023-12-31T00:00:00.000Z")).toBe("2024-01-01T00:00:00.000Z");
    expect(nextValidFrom(now, "2024-01-01T00:00:00.000Z")).toBe("2024-01-01T00:00:00.001Z");
    expect(nextValidFrom(now, "2024-01-01T00:00:05.000Z")).toBe("2024-01-01T00:00:05.001Z");
  });
});
