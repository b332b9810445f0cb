// examples/run-company-history.ts
import { loadConfig } from "../packages/tracker/src/config.js";
import { createLogger } from "../packages/tracker/src/logger.js";
import { createTracker } from "../packages/tracker/src/tracker.js";

// ---- assert helper ----
function assert(cond: unknown, msg: string): asserts cond {
  if (!cond) throw new Error(msg);
}

// ---- hand-driven clock ----
function makeClock(startIso: string) {
  let t = new Date(startIso);
  return {
    now: () => t,
    set: (iso: string) => {
      t = new Date(iso);
    },
  };
}

async function main() {
  const clock = makeClock("2024-01-01T00:00:00.000Z");
  const config = loadConfig({}, { databasePath: ":memory:", logLevel: "info" });
  const tracker = createTracker(config, { logger: createLogger({ level: "info" }), now: clock.now });

  try {
    const base = {
      company_id: 1,
      company_name: "Placeholder Pharma",
      percentage_a: 0.25,
      percentage_b: 0.35,
      percentage_c: 0.4,
    };

    const r1 = await tracker.companies.upsert(base, "example");
    assert(r1.is_new, "first upsert should create a version");

    // same values, different spelling: no new version
    const r2 = await tracker.companies.upsert({ ...base, percentage_a: "0.2500" }, "example");
    assert(!r2.is_new && r2.record_id === r1.record_id, "unchanged upsert should be a no-op");

    clock.set("2024-06-01T00:00:00.000Z");
    const r3 = await tracker.companies.upsert({ ...base, percentage_a: 0.3 }, "example");
    assert(r3.is_new, "changed upsert should create a version");

    const history = await tracker.companies.history({ company_id: 1 });
    const march = await tracker.companies.atPointInTime({ company_id: 1 }, "2024-03-01T00:00:00Z");
    const current = await tracker.companies.current({ company_id: 1 });

    assert(history.length === 2, "expected two versions");
    assert(march.percentage_a === "0.2500", "March should see the original split");
    assert(current.percentage_a === "0.3000", "current should see the new split");

    console.log(
      JSON.stringify(
        {
          upserts: [r1, r2, r3],
          history: history.map((h) => ({
            record_id: h.record_id,
            percentage_a: h.percentage_a,
            valid_from: h.valid_from,
            valid_to: h.valid_to,
          })),
          at_2024_03_01: march.percentage_a,
          current: current.percentage_a,
        },
        null,
        2
      )
    );
  } finally {
    tracker.close();
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
