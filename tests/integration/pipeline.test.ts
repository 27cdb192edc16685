import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { afterEach, describe, expect, it } from "vitest";
import { DatabaseManager } from "../../src/lib/database.js";
import { TaskTracker } from "../../src/lib/tasks.js";
import { runPipeline, type PipelineStage } from "../../src/pipeline.js";
import { FIXTURES_DIR, NOW, quietLogger } from "../helpers.js";

describe("runPipeline", () => {
  let db: DatabaseManager | undefined;
  let tmpDir: string | undefined;

  afterEach(async () => {
    await db?.close();
    db = undefined;
    if (tmpDir) await fs.rm(tmpDir, { recursive: true, force: true });
    tmpDir = undefined;
  });

  it("builds every tier from the source files", async () => {
    db = new DatabaseManager({ path: ":memory:" });
    const seen: PipelineStage[] = [];
    const tasks = new TaskTracker();

    const result = await runPipeline({
      db,
      dataFolder: FIXTURES_DIR,
      logger: quietLogger(),
      publishMode: "batch",
      now: NOW,
      tasks,
      onStage: (stage) => seen.push(stage),
    });

    expect(result.success).toBe(true);
    expect(seen).toEqual(["init", "bronze", "silver", "check"]);
    expect(result.stages.map((s) => [s.stage, s.success])).toEqual([
      ["init", true],
      ["bronze", true],
      ["silver", true],
      ["check", true],
    ]);
    expect(result.stages[1].message).toBe("22 row(s) in 6 table(s)");
    expect(result.stages[2].message).toBe("20 row(s) in 6 table(s)");
    expect(result.stages[3].message).toBe("0 error(s), 0 warning(s)");
    expect(tasks.getStatus().summary.failed).toBe(0);

    const customers = await db.query<{ n: number }>("SELECT COUNT(*)::INTEGER AS n FROM gold.dim_customers");
    expect(customers).toEqual([{ n: 3 }]);
  });

  it("stops at the Bronze stage when a source file is missing", async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "medallion-pipeline-"));
    for (const file of await fs.readdir(FIXTURES_DIR)) {
      if (file !== "erp_loc_a101.csv") await fs.copyFile(path.join(FIXTURES_DIR, file), path.join(tmpDir, file));
    }
    db = new DatabaseManager({ path: ":memory:" });

    const result = await runPipeline({
      db,
      dataFolder: tmpDir,
      logger: quietLogger(),
      publishMode: "batch",
      now: NOW,
    });

    expect(result.success).toBe(false);
    expect(result.stages.map((s) => s.stage)).toEqual(["init", "bronze"]);
    expect(result.stages[1]).toMatchObject({ success: false, message: "failed: bronze.erp_loc_a101" });
    const silver = await db.query<{ n: number }>("SELECT COUNT(*)::INTEGER AS n FROM silver.crm_cust_info");
    expect(silver).toEqual([{ n: 0 }]);
  });

  it("reports a cancelled Silver batch as a failed stage", async () => {
    db = new DatabaseManager({ path: ":memory:" });
    const controller = new AbortController();

    const result = await runPipeline({
      db,
      dataFolder: FIXTURES_DIR,
      logger: quietLogger(),
      publishMode: "batch",
      now: NOW,
      signal: controller.signal,
      onStage: (stage) => {
        if (stage === "silver") controller.abort();
      },
    });

    expect(result.success).toBe(false);
    expect(result.stages.map((s) => s.stage)).toEqual(["init", "bronze", "silver"]);
    expect(result.stages[2].error).toEqual({
      code: "BATCH_CANCELLED",
      severity: "warning",
      step: "crm_cust_info",
      message: "Batch cancelled before crm_cust_info",
    });
  });
});
