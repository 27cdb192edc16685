/**
 * `medallion db` subcommands: query, exec, info, tables, schema, sample, profile.
 */

import type { DatabaseManager } from "../lib/database.js";
import { die, jsonMode, output, table } from "../lib/output.js";

export async function dbCommand(sub: string | undefined, rest: string[], db: DatabaseManager): Promise<void> {
  switch (sub) {
    case "query": {
      const sql = rest[0];
      if (!sql) die('Usage: db query "<sql>"');
      table(await db.rows(sql));
      return;
    }
    case "exec": {
      const sql = rest[0];
      if (!sql) die('Usage: db exec "<sql>"');
      await db.execute(sql);
      if (jsonMode) {
        output({ success: true, message: "Statement executed successfully." });
      } else {
        console.log("✓ Statement executed successfully.");
      }
      return;
    }
    case "info": {
      const info = await db.getInfo();
      if (jsonMode) {
        output(info);
      } else {
        console.log(`Path:     ${info.path}`);
        console.log(`Objects:  ${info.tables}`);
        info.tableList.forEach((t) => console.log(`  • ${t.table_schema}.${t.table_name} (${t.table_type})`));
      }
      return;
    }
    case "tables": {
      const info = await db.getInfo();
      const schema = rest[0];
      const list = schema ? info.tableList.filter((t) => t.table_schema === schema) : info.tableList;
      if (!list.length) {
        console.log("No tables. Create them first: medallion init");
      } else if (jsonMode) {
        output(list);
      } else {
        list.forEach((t) => console.log(`${t.table_schema}.${t.table_name}`));
      }
      return;
    }
    case "schema": {
      const name = rest[0];
      if (!name) die("Usage: db schema <schema.table>");
      const cols = await db.describeTable(name);
      if (!cols.length) die(`Table '${name}' not found or has no columns.`);
      table(cols.map((c) => ({ ...c })));
      return;
    }
    case "sample": {
      const name = rest[0];
      if (!name) die("Usage: db sample <schema.table> [limit]");
      const limit = rest[1] ? parseInt(rest[1], 10) : 5;
      if (isNaN(limit) || limit < 1) die("Limit must be a positive number.");
      if (!(await db.tableExists(name))) die(`Table '${name}' does not exist.`);
      const rows = await db.sampleTable(name, limit);
      if (!rows.length) die(`Table '${name}' is empty.`);
      table(rows);
      return;
    }
    case "profile": {
      const name = rest[0];
      if (!name) die("Usage: db profile <schema.table>");
      const profiles = await db.profileTable(name);
      table(profiles.map((p) => ({ ...p })));
      return;
    }
    default:
      if (sub) console.error(`Error: Unknown db command: ${sub}\n`);
      console.log("Usage: medallion db <command>\n");
      console.log("Commands:");
      console.log('  query "<sql>"        Run a read query and display rows');
      console.log('  exec  "<sql>"        Execute a write statement (DDL/DML)');
      console.log("  info                 Show the database path and every table and view");
      console.log("  tables [schema]      List tables, optionally for one tier");
      console.log("  schema <table>       Show columns and types for a table");
      console.log("  sample <table> [n]   Show first N rows (default 5)");
      console.log("  profile <table>      Show column-level stats (nulls, distinct, min, max)");
      console.log("\nTable names may be schema-qualified; bare names resolve against main.");
      console.log("\nExamples:");
      console.log('  medallion db query "SELECT * FROM gold.dim_customers LIMIT 5"');
      console.log("  medallion db tables silver");
      console.log("  medallion db schema silver.crm_prd_info");
      console.log("  medallion db sample bronze.crm_sales_details 10");
      console.log("  medallion db profile silver.crm_cust_info");
      if (sub) process.exit(1);
      return;
  }
}
