import { createBronzeTables } from "../bronze/loader.js";
import { GoldLayer } from "../gold/views.js";
import { SilverTransformer } from "../silver/transformer.js";
import { TIER_SCHEMAS, type DatabaseManager } from "./database.js";

export interface InitResult {
  schemas: string[];
  tables: number;
  views: string[];
}

/**
 * Create the tier schemas, the Bronze and Silver tables that are missing,
 * and (re)create the Gold views. Safe to run repeatedly.
 */
export async function initWarehouse(db: DatabaseManager): Promise<InitResult> {
  for (const schema of TIER_SCHEMAS) {
    await db.execute(`CREATE SCHEMA IF NOT EXISTS ${schema}`);
  }
  await createBronzeTables(db);
  await new SilverTransformer().ensureTables(db);
  const gold = new GoldLayer(db);
  await gold.createViews();

  const info = await db.getInfo();
  return {
    schemas: [...TIER_SCHEMAS],
    tables: info.tableList.filter((t) => t.table_type === "BASE TABLE").length,
    views: await gold.listViews(),
  };
}
