import { createServer } from "./server.js";
import { loadConfig } from "./config/index.js";
import { createPool } from "./db/mysql.js";
import { DashboardService } from "./dashboard/dashboard-service.js";
import { logger } from "./observability/logger.js";
import { createMysqlRecordStore } from "./store/record-store.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const pool = createPool(config);

  // Test MySQL connection
  try {
    await pool.query("SELECT 1");
    logger.info({ host: config.mysql.host, database: config.mysql.database }, "Connected to MySQL");
  } catch (err) {
    logger.fatal({ err }, "MySQL connection failed");
    process.exit(1);
  }

  const service = new DashboardService(createMysqlRecordStore(pool, config), {
    snapshotTtlMs: config.ops.snapshotTtlMs,
    excludedHospitalTerms: config.ops.excludedHospitalTerms,
  });

  // Requests retry the load when this first one fails
  try {
    await service.refresh();
  } catch (err) {
    logger.warn({ err }, "Initial snapshot load failed");
  }

  const app = createServer(service);
  app.listen(config.port, () => {
    logger.info({ port: config.port }, "Service listening");
  });
}

void main();
