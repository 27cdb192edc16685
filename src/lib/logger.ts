/**
 * Log files for the CLI and the ETL batches, plus the logger handed to each
 * batch through its context.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { projectRoot } from "./paths.js";

export interface LogEntry {
  source: string;
  timestamp: string;
  line: string;
}

export interface LogSource {
  name: string;
  path: string;
}

export type LogLevel = "info" | "warn" | "error";

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export function defaultLogDir(): string {
  return process.env.MEDALLION_LOG_DIR || path.join(projectRoot(), ".medallion", "logs");
}

export class LogManager {
  private sources: LogSource[] = [];

  constructor(logDir: string = defaultLogDir()) {
    this.sources = [
      { name: "cli", path: path.join(logDir, "cli.log") },
      { name: "etl", path: path.join(logDir, "etl.log") },
    ];
  }

  addSource(name: string, logPath: string): void {
    this.sources.push({ name, path: logPath });
  }

  getSources(): LogSource[] {
    return [...this.sources];
  }

  private source(name: string): LogSource {
    const source = this.sources.find((s) => s.name === name);
    if (!source) throw new Error(`Unknown log source: ${name}`);
    return source;
  }

  /**
   * Read the last N lines from a log source.
   * A log file that does not exist yet reads as empty.
   */
  async tail(sourceName: string, lines: number = 50): Promise<LogEntry[]> {
    const source = this.source(sourceName);

    let content: string;
    try {
      content = await fs.readFile(source.path, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }
    const allLines = content.split("\n").filter((l) => l.trim().length > 0);
    return allLines.slice(-lines).map((line) => {
      const tsMatch = line.match(/^(\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}:\d{2})/);
      return { source: source.name, timestamp: tsMatch ? tsMatch[1] : "", line };
    });
  }

  /** Last N lines of every source, merged by timestamp; untimestamped lines last. */
  async tailAll(lines: number = 50): Promise<LogEntry[]> {
    const all: LogEntry[] = [];
    for (const source of this.sources) {
      all.push(...(await this.tail(source.name, lines)));
    }
    return all.sort((a, b) => {
      if (!a.timestamp && !b.timestamp) return 0;
      if (!a.timestamp) return 1;
      if (!b.timestamp) return -1;
      return a.timestamp.localeCompare(b.timestamp);
    });
  }

  async grep(pattern: string, lines: number = 200): Promise<LogEntry[]> {
    const regex = new RegExp(pattern, "i");
    const all = await this.tailAll(lines);
    return all.filter((e) => regex.test(e.line));
  }

  async append(sourceName: string, message: string): Promise<void> {
    const source = this.source(sourceName);
    await fs.mkdir(path.dirname(source.path), { recursive: true });
    const ts = new Date().toISOString();
    await fs.appendFile(source.path, `${ts} ${message}\n`, "utf-8");
  }
}

/** What a batch step needs from a logger. */
export interface BatchLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface EtlLoggerOptions {
  /** Where lines are appended; omit to keep the batch log in memory only. */
  manager?: LogManager;
  /** Echo stream (default process.stderr); null disables echoing. */
  stream?: NodeJS.WritableStream | null;
}

/**
 * Echoes each line and appends it to the `etl` log. File appends are chained
 * so lines land in call order; `flush()` waits for them and reports the first
 * failed write.
 */
export class EtlLogger implements BatchLogger {
  private readonly manager?: LogManager;
  private readonly stream: NodeJS.WritableStream | null;
  private pending: Promise<void> = Promise.resolve();
  private writeError: unknown = null;
  readonly lines: string[] = [];

  constructor(options: EtlLoggerOptions = {}) {
    this.manager = options.manager;
    this.stream = options.stream === undefined ? process.stderr : options.stream;
  }

  info(message: string): void {
    this.write("info", message);
  }

  warn(message: string): void {
    this.write("warn", message);
  }

  error(message: string): void {
    this.write("error", message);
  }

  private write(level: LogLevel, message: string): void {
    this.lines.push(message);
    this.stream?.write(message + "\n");
    const manager = this.manager;
    if (!manager) return;
    this.pending = this.pending
      .then(() => manager.append("etl", `[${level.toUpperCase()}] ${message}`))
      .catch((err: unknown) => {
        if (this.writeError === null) this.writeError = err;
      });
  }

  async flush(): Promise<void> {
    await this.pending;
    if (this.writeError !== null) {
      const err = this.writeError;
      this.writeError = null;
      throw err;
    }
  }
}
