/**
 * Shared CLI output helpers: row formatting, JSON mode, failure reporting.
 *
 * Supports --json and --format <table|csv|json|markdown|pretty>.
 */

import { describeError } from "./errors.js";

export const OUTPUT_FORMATS = ["table", "csv", "json", "markdown", "pretty"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function parseFormat(argv: readonly string[] = process.argv): OutputFormat {
  if (argv.includes("--json")) return "json";
  const idx = argv.indexOf("--format");
  const requested = idx === -1 ? undefined : argv[idx + 1];
  return OUTPUT_FORMATS.find((f) => f === requested) ?? "table";
}

export const outputFormat: OutputFormat = parseFormat();
export const jsonMode = outputFormat === "json";
export const verboseMode = process.argv.includes("--verbose") || process.argv.includes("-V");

export function die(msg: string): never {
  if (jsonMode) {
    console.log(JSON.stringify({ error: msg }));
  } else {
    console.error(`Error: ${msg}`);
  }
  process.exit(1);
}

/** Report a thrown value with its structured diagnostic and exit 1. */
export function fail(err: unknown): never {
  const diagnostic = describeError(err);
  if (jsonMode) {
    console.log(JSON.stringify({ error: diagnostic }, null, 2));
  } else {
    console.error(`Error [${diagnostic.code}/${diagnostic.severity}]${diagnostic.step ? ` in ${diagnostic.step}` : ""}: ${diagnostic.message}`);
  }
  process.exit(1);
}

export function output(data: unknown): void {
  console.log(typeof data === "string" && !jsonMode ? data : JSON.stringify(data, null, 2));
}

export function verbose(msg: string): void {
  if (verboseMode) console.error(`[verbose] ${msg}`);
}

export function table(rows: readonly Record<string, unknown>[]): void {
  const text = formatRows(rows, outputFormat);
  if (text) console.log(text);
}

function cell(value: unknown): string {
  if (value === null || value === undefined) return "";
  return typeof value === "object" ? JSON.stringify(value) : String(value);
}

function columnWidths(keys: string[], rows: readonly Record<string, unknown>[], max = Infinity): number[] {
  return keys.map((k) => Math.min(max, Math.max(k.length, ...rows.map((r) => cell(r[k]).length))));
}

/** Render rows in the given format. */
export function formatRows(rows: readonly Record<string, unknown>[], format: OutputFormat): string {
  switch (format) {
    case "json":
      return JSON.stringify(rows, null, 2);
    case "csv":
      return formatCSV(rows);
    case "markdown":
      return formatMarkdown(rows);
    case "pretty":
      return formatPretty(rows);
    case "table":
      return formatTable(rows);
  }
}

function formatTable(rows: readonly Record<string, unknown>[]): string {
  if (!rows.length) return "(no rows)";
  const keys = Object.keys(rows[0]);
  const widths = columnWidths(keys, rows);
  const lines = [
    keys.map((k, i) => k.padEnd(widths[i])).join(" | "),
    widths.map((w) => "-".repeat(w)).join("-+-"),
    ...rows.map((row) => keys.map((k, i) => cell(row[k]).padEnd(widths[i])).join(" | ")),
    "",
    `${rows.length} row(s)`,
  ];
  return lines.join("\n");
}

function csvField(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function formatCSV(rows: readonly Record<string, unknown>[]): string {
  if (!rows.length) return "";
  const keys = Object.keys(rows[0]);
  return [keys.join(","), ...rows.map((row) => keys.map((k) => csvField(cell(row[k]))).join(","))].join("\n");
}

function formatMarkdown(rows: readonly Record<string, unknown>[]): string {
  if (!rows.length) return "*(no rows)*";
  const keys = Object.keys(rows[0]);
  const widths = columnWidths(keys, rows);
  const line = (vals: string[]): string => "| " + vals.map((v, i) => v.padEnd(widths[i])).join(" | ") + " |";
  return [
    line(keys),
    line(widths.map((w) => "-".repeat(w))),
    ...rows.map((row) => line(keys.map((k) => cell(row[k])))),
  ].join("\n");
}

/** Wider values are cut with an ellipsis in pretty output. */
const MAX_COL_WIDTH = 40;

function formatPretty(rows: readonly Record<string, unknown>[]): string {
  if (!rows.length) return "(no rows)";
  const keys = Object.keys(rows[0]);
  const widths = columnWidths(keys, rows, MAX_COL_WIDTH);
  const truncate = (s: string, max: number): string => (s.length > max ? s.slice(0, max - 1) + "…" : s);
  const border = (l: string, m: string, r: string): string => l + widths.map((w) => "─".repeat(w + 2)).join(m) + r;
  const line = (vals: string[]): string =>
    "│ " + vals.map((v, i) => truncate(v, widths[i]).padEnd(widths[i])).join(" │ ") + " │";

  return [
    border("┌", "┬", "┐"),
    line(keys.map((k, i) => k.toUpperCase().slice(0, widths[i]))),
    border("├", "┼", "┤"),
    ...rows.map((row) => line(keys.map((k) => cell(row[k])))),
    border("└", "┴", "┘"),
    `${rows.length} row(s)`,
  ].join("\n");
}
