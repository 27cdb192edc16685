#!/usr/bin/env node

/**
 * CLI entry point for medallion.
 * Thin dispatcher: each subcommand lives in commands/.
 *
 * Usage:  medallion <command> [subcommand] [args...] [--json]
 */

import { bronzeCommand } from "./commands/bronze.js";
import { checkCommand } from "./commands/check.js";
import { configCommand } from "./commands/config.js";
import type { CommandContext } from "./commands/context.js";
import { dbCommand } from "./commands/db.js";
import { doctorCommand } from "./commands/doctor.js";
import { goldCommand } from "./commands/gold.js";
import { initCommand } from "./commands/init.js";
import { logsCommand } from "./commands/logs.js";
import { runCommand } from "./commands/run.js";
import { silverCommand } from "./commands/silver.js";
import { resolveSettings } from "./lib/config.js";
import { DatabaseManager } from "./lib/database.js";
import { errorMessage } from "./lib/errors.js";
import { LogManager } from "./lib/logger.js";
import { die, fail, jsonMode, output, verboseMode } from "./lib/output.js";
import { projectRoot } from "./lib/paths.js";
import { TaskTracker } from "./lib/tasks.js";

const VERSION = "1.0.0";

// ── arg parsing ──────────────────────────────────────────────────────

const FLAGS_WITH_VALUE = new Set(["--format"]);
const BARE_FLAGS = new Set(["--json", "--verbose", "-V"]);

function stripGlobalFlags(args: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (FLAGS_WITH_VALUE.has(args[i])) {
      i++;
      continue;
    }
    if (!BARE_FLAGS.has(args[i])) out.push(args[i]);
  }
  return out;
}

const [cmd, sub, ...rest] = stripGlobalFlags(process.argv.slice(2));

// ── services ─────────────────────────────────────────────────────────

async function createContext(): Promise<CommandContext> {
  const root = projectRoot();
  const { settings } = await resolveSettings(root);
  const tasks = new TaskTracker();
  tasks.enablePersistence(root);
  return {
    root,
    settings,
    db: new DatabaseManager({ path: settings.dbPath }),
    logs: new LogManager(settings.logDir),
    tasks,
  };
}

// ── dispatch ─────────────────────────────────────────────────────────

async function main(ctx: CommandContext): Promise<void> {
  switch (cmd) {
    case "init":
      return initCommand(ctx.db);

    case "bronze":
      return bronzeCommand(sub, rest, ctx);

    case "silver":
      return silverCommand(sub, rest, ctx);

    case "gold":
      return goldCommand(sub, rest, ctx.db);

    case "run":
      return runCommand(sub, ctx);

    case "check":
      return checkCommand(ctx.db);

    case "db":
      return dbCommand(sub, rest, ctx.db);

    case "config":
      return configCommand(sub, rest, ctx.root);

    case "logs":
      return logsCommand(sub, rest, ctx.logs);

    case "doctor":
      return doctorCommand(ctx);

    case "status": {
      await ctx.tasks.load();
      const status = ctx.tasks.getStatus();
      if (jsonMode) {
        output(status);
      } else {
        console.log(
          `Tasks — running: ${status.summary.running}, completed: ${status.summary.completed}, failed: ${status.summary.failed}`
        );
        if (status.active.length) {
          console.log("\nActive:");
          status.active.forEach((t) => console.log(`  ⏳ ${t.name} — ${t.message || t.status}`));
        }
        if (status.completed.length) {
          console.log("\nRecently completed:");
          status.completed.slice(0, 6).forEach((t) => console.log(`  ✓ ${t.name} — ${t.message || "done"}`));
        }
        if (status.failed.length) {
          console.log("\nFailed:");
          status.failed.slice(0, 6).forEach((t) => console.log(`  ✗ ${t.name} — ${t.error}`));
        }
      }
      return;
    }

    case "version":
    case "--version":
    case "-v":
      output(jsonMode ? { version: VERSION, root: ctx.root } : `medallion ${VERSION}`);
      return;

    case "help":
    case "--help":
    case "-h":
    case undefined:
      printHelp();
      return;

    default:
      die(`Unknown command: ${cmd}\nRun with --help for usage.`);
  }
}

// ── help ─────────────────────────────────────────────────────────────

function printHelp(): void {
  console.log(`
medallion — Bronze / Silver / Gold warehouse on DuckDB  (v${VERSION})

Usage: medallion <command> [subcommand] [args...] [--json]

Getting started:
  1. medallion init            Create schemas, tables and views
  2. medallion bronze load     Load the raw CSV extracts
  3. medallion silver run      Cleanse Bronze into Silver
  4. medallion gold show dim_customers

Pipeline:
  run                          init → bronze load → silver run → check
  bronze load [table...]       Truncate and reload Bronze tables from CSV
  bronze files                 Show which source CSVs are present
  silver run [--mode batch|table]
                               Rebuild the six Silver tables (Ctrl-C cancels)
  gold views                   List the Gold views
  gold show <view> [n]         Show rows from a Gold view
  gold refresh                 Recreate the Gold views
  check                        Run the data-quality checks over Silver

Database — query DuckDB directly:
  db query "<sql>"             Run a read query (returns rows)
  db exec  "<sql>"             Execute a write statement (DDL/DML)
  db info                      Show the database path and objects
  db tables [schema]           List tables
  db schema <table>            Show columns for a table
  db sample <table> [n]        Show the first rows of a table
  db profile <table>           Column-level stats

Other:
  config [get|set|path]        Show or edit settings (medallion.yml)
  logs tail|grep|sources       Read the CLI and ETL logs
  doctor                       Verify prerequisites & config
  status                       Show the tasks of the last run
  version                      Print version
  help                         This message

Flags:
  --json                       Machine-readable JSON output
  --format <fmt>               table | csv | json | markdown | pretty
  --verbose, -V                Echo ETL log lines to stderr

Environment variables (override medallion.yml):
  MEDALLION_ROOT               Project root
  DB_PATH                      DuckDB file path
  DATA_FOLDER                  Folder holding <table>.csv source files
  MEDALLION_LOG_DIR            Log directory
  SILVER_PUBLISH_MODE          batch | table
`);
}

// ── run ──────────────────────────────────────────────────────────────

async function start(): Promise<void> {
  const ctx = await createContext();
  if (cmd) await ctx.logs.append("cli", [cmd, sub, ...rest].filter(Boolean).join(" "));
  try {
    await main(ctx);
  } finally {
    await ctx.db.close();
  }
}

start().catch((err: unknown) => {
  if (verboseMode) {
    console.error(err instanceof Error && err.stack ? err.stack : errorMessage(err));
  }
  fail(err);
});
