/**
 * `medallion bronze`: load the raw CSV extracts into the Bronze tables.
 */

import {
  BRONZE_TABLES,
  BronzeLoader,
  createBronzeTables,
  isBronzeTable,
  type BronzeTableResult,
} from "../bronze/loader.js";
import { die, jsonMode, output, table } from "../lib/output.js";
import { ProgressBar } from "../lib/progress.js";
import { etlLogger, type CommandContext } from "./context.js";

function printResults(results: BronzeTableResult[]): void {
  for (const r of results) {
    if (r.success) {
      console.log(`✓ ${r.table.padEnd(26)} ${String(r.rows).padStart(7)} row(s)  ${r.durationMs}ms`);
    } else {
      console.log(`✗ ${r.table.padEnd(26)} ${r.error?.message ?? "failed"}`);
    }
  }
}

export async function bronzeCommand(sub: string | undefined, rest: string[], ctx: CommandContext): Promise<void> {
  switch (sub) {
    case "load": {
      const requested = rest.filter((a) => !a.startsWith("-"));
      const unknown = requested.filter((t) => !isBronzeTable(t));
      if (unknown.length) die(`Unknown Bronze table: ${unknown.join(", ")}\nTables: ${BRONZE_TABLES.join(", ")}`);
      const tables = requested.length ? requested.filter(isBronzeTable) : BRONZE_TABLES;

      const logger = etlLogger(ctx);
      const loader = new BronzeLoader(ctx.db, { dataFolder: ctx.settings.dataFolder, logger, tasks: ctx.tasks });
      const bar = jsonMode ? null : new ProgressBar({ total: tables.length, label: "Bronze" });
      const results: BronzeTableResult[] = [];
      const start = Date.now();

      await createBronzeTables(ctx.db);
      for (const t of tables) {
        const result = await loader.loadTable(t);
        results.push(result);
        bar?.tick(1, t);
      }
      bar?.finish();
      await logger.flush();
      await ctx.tasks.save();

      const failed = results.filter((r) => !r.success).length;
      if (jsonMode) {
        output({ success: failed === 0, tables: results, durationMs: Date.now() - start });
      } else {
        printResults(results);
        console.log(failed ? `\n✗ ${failed} table(s) failed` : `\n✓ Bronze load complete (${Date.now() - start}ms)`);
      }
      if (failed) process.exit(1);
      return;
    }

    case "files": {
      const loader = new BronzeLoader(ctx.db, { dataFolder: ctx.settings.dataFolder, logger: etlLogger(ctx) });
      const files = await loader.listFiles();
      table(files.map((f) => ({ table: f.table, file: f.file, present: f.present ? "yes" : "no" })));
      return;
    }

    default:
      if (sub && sub !== "help") console.error(`Error: Unknown bronze command: ${sub}\n`);
      console.log("Usage: medallion bronze <command>\n");
      console.log("Commands:");
      console.log("  load [table...]  Truncate and reload Bronze tables from <data_folder>/<table>.csv");
      console.log("  files            Show which source CSVs are present");
      console.log(`\nTables: ${BRONZE_TABLES.join(", ")}`);
      if (sub && sub !== "help") process.exit(1);
      return;
  }
}
