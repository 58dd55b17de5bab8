/**
 * Prints the dashboard headline figures for the configured database.
 *
 * Usage:
 *   npx tsx scripts/snapshot-report.ts [hospital]
 */

import { loadConfig } from "../src/config/index.js";
import { createPool } from "../src/db/mysql.js";
import { DashboardService } from "../src/dashboard/dashboard-service.js";
import { errorMessage } from "../src/errors.js";
import { createMysqlRecordStore } from "../src/store/record-store.js";

function percent(value: number | undefined): string {
  return value === undefined ? "no data" : `${(value * 100).toFixed(1)}%`;
}

async function snapshotReport(): Promise<void> {
  const config = loadConfig();
  const pool = createPool(config);
  const hospital = process.argv[2];

  try {
    const service = new DashboardService(createMysqlRecordStore(pool, config), {
      snapshotTtlMs: config.ops.snapshotTtlMs,
      excludedHospitalTerms: config.ops.excludedHospitalTerms,
    });
    const snapshot = await service.refresh();
    const report = await service.report(hospital ? { hospital } : {});

    console.log(`📦 Snapshot ${report.fetchedAt}: ${snapshot.babies.length} babies, ${snapshot.discharges.length} discharges`);
    console.log("🧹 Data quality:", JSON.stringify(snapshot.quality));
    console.log(`🏥 Hospital: ${hospital ?? "all"} (${report.records.babies} babies in view)`);
    console.log(`⏱️  Registered within 12h: ${percent(report.registrationTimeliness["12h"]?.value)}`);
    console.log(`⏱️  Registered within 24h: ${percent(report.registrationTimeliness["24h"]?.value)}`);
    console.log(`🤱 Median hours to first KMC: ${report.kmcInitiation.medianHours ?? "no data"}`);
    for (const [key, completion] of Object.entries(report.followUp)) {
      console.log(`📅 Follow-up ${key}: ${percent(completion.value)} of ${completion.due} due`);
    }
    console.log(`🕊️  Mortality: ${percent(report.mortality.none.value)}`);
    for (const [category, share] of Object.entries(report.dischargeOutcomes.breakdown)) {
      console.log(`🚪 Discharge ${category}: ${share.numerator} (${percent(share.value)})`);
    }
  } catch (err) {
    console.error("❌ Report failed:", errorMessage(err));
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

void snapshotReport();
