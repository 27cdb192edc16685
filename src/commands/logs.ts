/**
 * `medallion logs`: read the CLI and ETL logs.
 */

import type { LogEntry, LogManager } from "../lib/logger.js";
import { die, jsonMode, output } from "../lib/output.js";

function print(entries: LogEntry[], empty: string): void {
  if (jsonMode) {
    output(entries);
  } else if (!entries.length) {
    console.log(empty);
  } else {
    entries.forEach((e) => console.log(`[${e.source}] ${e.line}`));
  }
}

export async function logsCommand(sub: string | undefined, rest: string[], logs: LogManager): Promise<void> {
  switch (sub) {
    case "tail": {
      const source = rest[0];
      const lines = rest[1] ? parseInt(rest[1], 10) : 50;
      if (isNaN(lines) || lines < 1) die("Line count must be a positive number.");
      if (source) {
        if (!logs.getSources().some((s) => s.name === source)) die(`Unknown log source: ${source}`);
        print(await logs.tail(source, lines), `No logs found for source: ${source}`);
      } else {
        print(await logs.tailAll(lines), "No log entries found.");
      }
      return;
    }
    case "grep": {
      const pattern = rest[0];
      if (!pattern) die("Usage: logs grep <pattern>");
      print(await logs.grep(pattern), "No matching log entries.");
      return;
    }
    case "sources": {
      const sources = logs.getSources();
      if (jsonMode) {
        output(sources);
      } else {
        console.log("Log sources:");
        sources.forEach((s) => console.log(`  ${s.name.padEnd(10)} ${s.path}`));
      }
      return;
    }
    default:
      if (sub && sub !== "help") console.error(`Error: Unknown logs command: ${sub}\n`);
      console.log("Usage: medallion logs <command>\n");
      console.log("Commands:");
      console.log("  tail [source] [n]  Show last N lines (default 50) from a source or all");
      console.log("  grep <pattern>     Search all logs for a pattern");
      console.log("  sources            List registered log sources");
      console.log("\nSources: cli, etl");
      console.log("\nExamples:");
      console.log("  medallion logs tail");
      console.log("  medallion logs tail etl 100");
      console.log('  medallion logs grep "ERROR"');
      if (sub && sub !== "help") process.exit(1);
      return;
  }
}
