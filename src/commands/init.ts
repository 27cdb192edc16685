/**
 * `medallion init`: create the tier schemas, Bronze and Silver tables, and Gold views.
 */

import type { DatabaseManager } from "../lib/database.js";
import { jsonMode, output } from "../lib/output.js";
import { initWarehouse } from "../lib/warehouse.js";

export async function initCommand(db: DatabaseManager): Promise<void> {
  const result = await initWarehouse(db);
  if (jsonMode) {
    output({ path: db.path, ...result });
    return;
  }
  console.log(`✓ Warehouse ready at ${db.path}`);
  console.log(`  Schemas: ${result.schemas.join(", ")}`);
  console.log(`  Tables:  ${result.tables}`);
  console.log(`  Views:   ${result.views.join(", ")}`);
}
