/**
 * `medallion gold`: list and read the star-schema views.
 */

import type { DatabaseManager } from "../lib/database.js";
import { die, jsonMode, output, table } from "../lib/output.js";
import { GOLD_VIEWS, GoldLayer, isGoldView } from "../gold/views.js";

export async function goldCommand(sub: string | undefined, rest: string[], db: DatabaseManager): Promise<void> {
  const gold = new GoldLayer(db);

  switch (sub) {
    case "views": {
      const views = await gold.listViews();
      if (jsonMode) {
        output(views);
      } else if (!views.length) {
        console.log("No Gold views. Run: medallion init");
      } else {
        views.forEach((v) => console.log(`gold.${v}`));
      }
      return;
    }

    case "show": {
      const view = rest[0];
      if (!view) die("Usage: gold show <view> [limit]");
      if (!isGoldView(view)) die(`Unknown Gold view: ${view}\nViews: ${GOLD_VIEWS.join(", ")}`);
      const limit = rest[1] ? parseInt(rest[1], 10) : 20;
      if (isNaN(limit) || limit < 1) die("Limit must be a positive number.");
      const rows = await gold.read(view, limit);
      table(rows.map((r) => ({ ...r })));
      return;
    }

    case "refresh": {
      await gold.createViews();
      const views = await gold.listViews();
      if (jsonMode) {
        output({ success: true, views });
      } else {
        console.log(`✓ Recreated ${views.length} view(s)`);
      }
      return;
    }

    default:
      if (sub && sub !== "help") console.error(`Error: Unknown gold command: ${sub}\n`);
      console.log("Usage: medallion gold <command>\n");
      console.log("Commands:");
      console.log("  views               List the Gold views");
      console.log("  show <view> [n]     Show the first N rows of a view (default 20)");
      console.log("  refresh             Recreate the views from sql/gold.sql");
      console.log(`\nViews: ${GOLD_VIEWS.join(", ")}`);
      if (sub && sub !== "help") process.exit(1);
      return;
  }
}
