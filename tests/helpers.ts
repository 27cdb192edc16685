import { fileURLToPath } from "url";
import { BronzeLoader } from "../src/bronze/loader.js";
import { DatabaseManager } from "../src/lib/database.js";
import { EtlLogger } from "../src/lib/logger.js";
import { initWarehouse } from "../src/lib/warehouse.js";

export const FIXTURES_DIR = fileURLToPath(new URL("./fixtures/bronze", import.meta.url));

/** Fixed processing time for batch runs. */
export const NOW = new Date("2024-06-15T08:30:00.000Z");

/** Logger that keeps lines in memory only. */
export function quietLogger(): EtlLogger {
  return new EtlLogger({ stream: null });
}

/** In-memory warehouse with every schema, table and view created. */
export async function createWarehouse(): Promise<DatabaseManager> {
  const db = new DatabaseManager({ path: ":memory:" });
  await initWarehouse(db);
  return db;
}

/** In-memory warehouse with Bronze loaded from the fixture CSVs. */
export async function createLoadedWarehouse(): Promise<DatabaseManager> {
  const db = await createWarehouse();
  const result = await new BronzeLoader(db, { dataFolder: FIXTURES_DIR, logger: quietLogger() }).loadAll();
  if (!result.success) {
    throw new Error(`fixture load failed: ${result.tables.map((t) => t.error?.message).filter(Boolean).join("; ")}`);
  }
  return db;
}
