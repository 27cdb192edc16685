/**
 * Tests for the log files and the batch logger.
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { Writable } from "node:stream";
import { EtlLogger, LogManager } from "../../src/lib/logger.js";

const TEST_DIR = path.join(os.tmpdir(), `medallion_logs_${Date.now()}`);

function captureStream(): { stream: Writable; output: () => string } {
  const chunks: Buffer[] = [];
  const stream = new Writable({
    write(chunk, _enc, cb) {
      chunks.push(Buffer.from(chunk));
      cb();
    },
  });
  return { stream, output: () => Buffer.concat(chunks).toString() };
}

describe("LogManager", () => {
  beforeAll(async () => {
    await fs.mkdir(TEST_DIR, { recursive: true });
    await fs.writeFile(
      path.join(TEST_DIR, "etl.log"),
      [
        "2026-01-10T10:00:00.000Z [INFO] Silver Layer ETL Process Started",
        "2026-01-10T10:00:02.000Z [INFO] \t>> Processing: silver.crm_cust_info",
        "2026-01-10T10:00:03.000Z [ERROR] Error Message:   Step crm_prd_info failed: boom",
      ].join("\n") + "\n"
    );
    await fs.writeFile(
      path.join(TEST_DIR, "cli.log"),
      ["2026-01-10T09:59:00.000Z bronze load", "2026-01-10T10:01:00.000Z silver run"].join("\n") + "\n"
    );
  });

  afterAll(async () => {
    await fs.rm(TEST_DIR, { recursive: true, force: true });
  });

  it("registers the cli and etl sources under the log directory", () => {
    const mgr = new LogManager(TEST_DIR);
    expect(mgr.getSources()).toEqual([
      { name: "cli", path: path.join(TEST_DIR, "cli.log") },
      { name: "etl", path: path.join(TEST_DIR, "etl.log") },
    ]);
  });

  it("tail reads the last N lines of a source", async () => {
    const entries = await new LogManager(TEST_DIR).tail("etl", 2);
    expect(entries.map((e) => e.timestamp)).toEqual(["2026-01-10T10:00:02", "2026-01-10T10:00:03"]);
    expect(entries[1].source).toBe("etl");
  });

  it("tail reads a missing file as empty", async () => {
    const mgr = new LogManager(TEST_DIR);
    mgr.addSource("extra", path.join(TEST_DIR, "missing.log"));
    expect(await mgr.tail("extra")).toEqual([]);
  });

  it("tail rejects an unknown source", async () => {
    await expect(new LogManager(TEST_DIR).tail("nonexistent")).rejects.toThrow("Unknown log source: nonexistent");
  });

  it("tailAll merges sources in timestamp order", async () => {
    const entries = await new LogManager(TEST_DIR).tailAll(100);
    expect(entries.map((e) => e.source)).toEqual(["cli", "etl", "etl", "etl", "cli"]);
  });

  it("grep matches case-insensitively", async () => {
    const entries = await new LogManager(TEST_DIR).grep("error");
    expect(entries.map((e) => e.line)).toEqual([
      "2026-01-10T10:00:03.000Z [ERROR] Error Message:   Step crm_prd_info failed: boom",
    ]);
  });

  it("append writes a timestamped line", async () => {
    const dir = path.join(TEST_DIR, "nested");
    const mgr = new LogManager(dir);
    await mgr.append("cli", "check");
    const content = await fs.readFile(path.join(dir, "cli.log"), "utf-8");
    expect(content).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z check\n$/);
  });
});

describe("EtlLogger", () => {
  it("echoes lines and appends them with their level", async () => {
    const dir = path.join(TEST_DIR, "etl-logger");
    const manager = new LogManager(dir);
    const { stream, output } = captureStream();
    const logger = new EtlLogger({ manager, stream });

    logger.info("started");
    logger.warn("slow step");
    logger.error("failed");
    await logger.flush();

    expect(output()).toBe("started\nslow step\nfailed\n");
    expect(logger.lines).toEqual(["started", "slow step", "failed"]);
    const entries = await manager.tail("etl");
    expect(entries.map((e) => e.line.slice(25))).toEqual(["[INFO] started", "[WARN] slow step", "[ERROR] failed"]);
  });

  it("keeps lines in memory without a manager or stream", async () => {
    const logger = new EtlLogger({ stream: null });
    logger.info("only here");
    await logger.flush();
    expect(logger.lines).toEqual(["only here"]);
  });

  it("reports the first failed write on flush", async () => {
    const blocker = path.join(TEST_DIR, "not-a-dir");
    await fs.writeFile(blocker, "file", "utf-8");
    const logger = new EtlLogger({ manager: new LogManager(path.join(blocker, "logs")), stream: null });
    logger.info("lost");
    await expect(logger.flush()).rejects.toThrow();
    await logger.flush();
  });
});
