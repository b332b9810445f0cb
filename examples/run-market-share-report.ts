// examples/run-market-share-report.ts
import { loadConfig } from "../packages/tracker/src/config.js";
import { createLogger } from "../packages/tracker/src/logger.js";
import { readSeedFile, seedTracker } from "../packages/tracker/src/seed.js";
import { createTracker } from "../packages/tracker/src/tracker.js";

async function main() {
  const config = loadConfig({}, { databasePath: ":memory:" });
  const tracker = createTracker(config, { logger: createLogger({ level: "warn" }) });

  try {
    const summary = await seedTracker(tracker, readSeedFile(), "example");

    // a later market study revises one share; the report only sees current rows
    await tracker.shares.upsert(
      { company_id: 2, country_code: "DK", product_class_3_id: 101, share_percentage: 0.24 },
      "example"
    );

    const all = await tracker.marketShareReport();
    const dk = await tracker.marketShareReport({ country_code: "DK" });
    const overview = await tracker.companyOverview(1);

    console.log(
      JSON.stringify(
        {
          seeded: summary,
          report: all,
          report_dk: dk,
          overview: {
            company: overview.company.company_name,
            metrics: overview.metrics.length,
            shares: overview.shares.length,
          },
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
