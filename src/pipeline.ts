/**
 * Full refresh: init, Bronze load, Silver batch, quality checks.
 * Stages run in order and the run stops at the first stage that fails.
 */

import { BronzeLoader } from "./bronze/loader.js";
import type { DatabaseManager } from "./lib/database.js";
import { describeError, type ErrorDiagnostic } from "./lib/errors.js";
import type { BatchLogger } from "./lib/logger.js";
import type { TaskTracker } from "./lib/tasks.js";
import { initWarehouse } from "./lib/warehouse.js";
import { QualityChecker } from "./quality/checks.js";
import { SilverTransformer, type PublishMode } from "./silver/transformer.js";

export const PIPELINE_STAGES = ["init", "bronze", "silver", "check"] as const;
export type PipelineStage = (typeof PIPELINE_STAGES)[number];

export interface PipelineStageResult {
  stage: PipelineStage;
  success: boolean;
  message: string;
  durationMs: number;
  error?: ErrorDiagnostic;
}

export interface PipelineResult {
  success: boolean;
  stages: PipelineStageResult[];
  totalDurationMs: number;
}

export interface PipelineOptions {
  db: DatabaseManager;
  dataFolder: string;
  logger: BatchLogger;
  publishMode: PublishMode;
  now?: Date;
  signal?: AbortSignal;
  tasks?: TaskTracker;
  /** Called as each stage begins. */
  onStage?: (stage: PipelineStage, index: number, total: number) => void;
}

interface StageOutcome {
  success: boolean;
  message: string;
}

export async function runPipeline(options: PipelineOptions): Promise<PipelineResult> {
  const { db, logger } = options;
  const start = Date.now();
  const stages: PipelineStageResult[] = [];

  const handlers: Record<PipelineStage, () => Promise<StageOutcome>> = {
    init: async () => {
      const result = await initWarehouse(db);
      return { success: true, message: `${result.tables} table(s), ${result.views.length} view(s)` };
    },
    bronze: async () => {
      const loader = new BronzeLoader(db, { dataFolder: options.dataFolder, logger, tasks: options.tasks });
      const result = await loader.loadAll();
      const failed = result.tables.filter((t) => !t.success).map((t) => t.table);
      const rows = result.tables.reduce((sum, t) => sum + t.rows, 0);
      return failed.length
        ? { success: false, message: `failed: ${failed.join(", ")}` }
        : { success: true, message: `${rows} row(s) in ${result.tables.length} table(s)` };
    },
    silver: async () => {
      const result = await new SilverTransformer().runBatch({
        db,
        logger,
        now: options.now ?? new Date(),
        publishMode: options.publishMode,
        signal: options.signal,
        tasks: options.tasks,
      });
      const rows = result.steps.reduce((sum, s) => sum + s.rowsWritten, 0);
      return { success: true, message: `${rows} row(s) in ${result.steps.length} table(s)` };
    },
    check: async () => {
      const report = await new QualityChecker(db).run();
      return {
        success: report.passed,
        message: `${report.errors} error(s), ${report.warnings} warning(s)`,
      };
    },
  };

  for (const [index, stage] of PIPELINE_STAGES.entries()) {
    options.onStage?.(stage, index, PIPELINE_STAGES.length);
    const stageStart = Date.now();
    let result: PipelineStageResult;
    try {
      const outcome = await handlers[stage]();
      result = { stage, ...outcome, durationMs: Date.now() - stageStart };
    } catch (err) {
      const error = describeError(err);
      result = { stage, success: false, message: error.message, durationMs: Date.now() - stageStart, error };
    }
    stages.push(result);
    if (!result.success) break;
  }

  return {
    success: stages.length === PIPELINE_STAGES.length && stages.every((s) => s.success),
    stages,
    totalDurationMs: Date.now() - start,
  };
}
