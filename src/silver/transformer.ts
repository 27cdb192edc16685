/**
 * Silver batch: rebuild all six Silver tables from Bronze.
 *
 * Steps run one after another. Each step stages its rows in
 * `silver.<table>__staging`; publishing swaps staged rows into the real table
 * inside a transaction, so readers see either the previous or the new content
 * and never an empty table. In `batch` mode all six tables are published in
 * one transaction after the last step; in `table` mode each table is published
 * as soon as its step finishes.
 */

import type { DatabaseManager } from "../lib/database.js";
import { BatchCancelledError, StepFailedError, WarehouseError, describeError, errorMessage } from "../lib/errors.js";
import type { BatchLogger } from "../lib/logger.js";
import type { TaskTracker } from "../lib/tasks.js";
import { SILVER_STEPS, type SilverStep, type SourceSystem } from "./steps.js";
import { createTableSql, silverColumns, silverTableName, stagingTableName, type SilverTable } from "./tables.js";

export const PUBLISH_MODES = ["batch", "table"] as const;
export type PublishMode = (typeof PUBLISH_MODES)[number];

export interface BatchContext {
  db: DatabaseManager;
  logger: BatchLogger;
  /** Processing time, stamped into dwh_create_date. */
  now: Date;
  publishMode: PublishMode;
  /** Checked before every step and before publishing. */
  signal?: AbortSignal;
  tasks?: TaskTracker;
  onStepComplete?: (result: StepResult, index: number, total: number) => void;
}

export interface StepResult {
  step: string;
  table: string;
  rowsRead: number;
  rowsWritten: number;
  durationMs: number;
}

export interface SilverBatchResult {
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  publishMode: PublishMode;
  steps: StepResult[];
}

const RULE = "=".repeat(62);
const SUBRULE = "-".repeat(62);

const SECTION_TITLES: Record<SourceSystem, string> = {
  CRM: "SECTION 1: Loading CRM Tables",
  ERP: "SECTION 2: Loading ERP Tables",
};

function seconds(ms: number): string {
  return (ms / 1000).toFixed(3);
}

/** `YYYY-MM-DD HH:MM:SS.mmm`, the form DuckDB casts to TIMESTAMP. */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace("T", " ").replace("Z", "");
}

export class SilverTransformer {
  constructor(private readonly steps: readonly SilverStep[] = SILVER_STEPS) {}

  /** Create any Silver table that does not exist yet. */
  async ensureTables(db: DatabaseManager): Promise<void> {
    await db.execute("CREATE SCHEMA IF NOT EXISTS silver");
    for (const step of this.steps) {
      await db.execute(createTableSql(silverTableName(step.table), silverColumns(step.table)));
    }
  }

  async runBatch(ctx: BatchContext): Promise<SilverBatchResult> {
    const { logger } = ctx;
    const started = new Date();
    const results: StepResult[] = [];
    const pending: SilverTable[] = [];

    logger.info(RULE);
    logger.info("Silver Layer ETL Process Started");
    logger.info(`Start Time: ${formatTimestamp(started)}`);
    logger.info(`Publish Mode: ${ctx.publishMode}`);
    logger.info(RULE);

    try {
      await this.ensureTables(ctx.db);

      let system: SourceSystem | null = null;
      for (const [index, step] of this.steps.entries()) {
        this.throwIfCancelled(ctx, step.table);
        if (step.system !== system) {
          system = step.system;
          logger.info(SUBRULE);
          logger.info(SECTION_TITLES[system]);
          logger.info(SUBRULE);
        }

        const result = await this.runStep(step, ctx);
        results.push(result);

        if (ctx.publishMode === "table") {
          await this.publish([step.table], ctx);
        } else {
          pending.push(step.table);
        }
        ctx.onStepComplete?.(result, index, this.steps.length);
      }

      if (pending.length) {
        this.throwIfCancelled(ctx, "publish");
        await this.publish(pending, ctx);
      }
    } catch (err) {
      const failure = err instanceof WarehouseError ? err : new StepFailedError("batch", err);
      this.logFailure(failure, logger);
      await this.dropStaging(ctx, logger);
      throw failure;
    }
    await this.dropStaging(ctx);

    const finished = new Date();
    const durationMs = finished.getTime() - started.getTime();
    logger.info(RULE);
    logger.info("Silver Layer ETL Process Completed Successfully");
    logger.info(`End Time: ${formatTimestamp(finished)}`);
    logger.info(`Total Duration: ${seconds(durationMs)} seconds`);
    logger.info(RULE);

    return {
      startedAt: started.toISOString(),
      finishedAt: finished.toISOString(),
      durationMs,
      publishMode: ctx.publishMode,
      steps: results,
    };
  }

  private throwIfCancelled(ctx: BatchContext, next: string): void {
    if (ctx.signal?.aborted) throw new BatchCancelledError(next);
  }

  private async runStep(step: SilverStep, ctx: BatchContext): Promise<StepResult> {
    const { db, logger } = ctx;
    const target = silverTableName(step.table);
    const staging = stagingTableName(step.table);
    const taskId = ctx.tasks?.createTask(`Silver ${target}`);
    const start = Date.now();

    logger.info(`\t>> Processing: ${target}`);
    try {
      if (taskId) ctx.tasks?.startTask(taskId, `Transforming ${target}`);
      const columns = silverColumns(step.table);
      await db.execute(createTableSql(staging, columns, true));

      const output = await step.produce({ db, now: ctx.now });
      const audit = [formatTimestamp(ctx.now), null];
      const written = await db.insertRows(
        staging,
        columns,
        output.rows.map((row) => [...row, ...audit])
      );

      const durationMs = Date.now() - start;
      logger.info(`\t   Rows read: ${output.rowsRead}`);
      logger.info(`\t   Rows staged: ${written}`);
      logger.info(`\t   Duration: ${seconds(durationMs)} seconds`);
      if (taskId) ctx.tasks?.completeTask(taskId, `${written} row(s) staged for ${target}`);

      return { step: step.table, table: target, rowsRead: output.rowsRead, rowsWritten: written, durationMs };
    } catch (err) {
      if (taskId) ctx.tasks?.failTask(taskId, errorMessage(err));
      if (err instanceof WarehouseError) throw err;
      throw new StepFailedError(step.table, err);
    }
  }

  /** Replace each table's contents with its staged rows in one transaction. */
  private async publish(tables: readonly SilverTable[], ctx: BatchContext): Promise<void> {
    const { db, logger } = ctx;
    const step = tables.length === 1 ? `publish:${tables[0]}` : "publish";
    try {
      await db.transaction(async () => {
        for (const table of tables) {
          await db.execute(`DELETE FROM ${silverTableName(table)}`);
          await db.execute(`INSERT INTO ${silverTableName(table)} SELECT * FROM ${stagingTableName(table)}`);
        }
      });
    } catch (err) {
      throw new StepFailedError(step, err);
    }
    logger.info(`\t   Published: ${tables.map(silverTableName).join(", ")}`);
  }

  /**
   * Drop every staging table. On the failure path a drop error is only
   * logged, so the original failure is the one that propagates.
   */
  private async dropStaging(ctx: BatchContext, failureLogger?: BatchLogger): Promise<void> {
    for (const step of this.steps) {
      try {
        await ctx.db.execute(`DROP TABLE IF EXISTS ${stagingTableName(step.table)}`);
      } catch (err) {
        if (!failureLogger) throw err;
        failureLogger.warn(`Could not drop ${stagingTableName(step.table)}: ${errorMessage(err)}`);
      }
    }
  }

  private logFailure(failure: WarehouseError, logger: BatchLogger): void {
    const diagnostic = describeError(failure);
    logger.error("");
    logger.error(RULE);
    logger.error("ERROR OCCURRED DURING SILVER LAYER ETL PROCESS");
    logger.error(RULE);
    logger.error(`Error Code:      ${diagnostic.code}`);
    logger.error(`Error Severity:  ${diagnostic.severity}`);
    logger.error(`Error Step:      ${diagnostic.step ?? "N/A"}`);
    logger.error(`Error Message:   ${diagnostic.message}`);
    if (failure instanceof StepFailedError && failure.engineErrorType) {
      logger.error(`Engine Error:    ${failure.engineErrorType}`);
    }
    logger.error(RULE);
  }
}
