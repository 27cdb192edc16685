/**
 * `medallion run`: full refresh, init → bronze → silver → check.
 */

import { jsonMode, output } from "../lib/output.js";
import { runPipeline, type PipelineStage } from "../pipeline.js";
import { etlLogger, interruptSignal, type CommandContext } from "./context.js";

const STAGE_LABELS: Record<PipelineStage, string> = {
  init: "Initialising warehouse",
  bronze: "Loading Bronze",
  silver: "Building Silver",
  check: "Running quality checks",
};

export async function runCommand(sub: string | undefined, ctx: CommandContext): Promise<void> {
  if (sub === "help" || sub === "--help" || sub === "-h") {
    console.log("Usage: medallion run\n");
    console.log("Runs the full refresh and stops at the first failing stage.");
    console.log("Equivalent to running these commands in sequence:");
    console.log("  medallion init");
    console.log("  medallion bronze load");
    console.log("  medallion silver run");
    console.log("  medallion check");
    return;
  }

  const logger = etlLogger(ctx);
  const interrupt = interruptSignal();
  const result = await runPipeline({
    db: ctx.db,
    dataFolder: ctx.settings.dataFolder,
    logger,
    publishMode: ctx.settings.publishMode,
    signal: interrupt.signal,
    tasks: ctx.tasks,
    onStage: (stage, index, total) => {
      if (!jsonMode) console.log(`⏳ Step ${index + 1}/${total} — ${STAGE_LABELS[stage]}…`);
    },
  }).finally(interrupt.dispose);
  await logger.flush();
  await ctx.tasks.save();

  if (jsonMode) {
    output(result);
  } else {
    for (const s of result.stages) {
      console.log(`${s.success ? "✓" : "✗"} ${s.stage.padEnd(7)} ${s.message} (${s.durationMs}ms)`);
    }
    console.log(
      result.success
        ? `\n✓ Pipeline complete (${result.totalDurationMs}ms)`
        : `\n✗ Pipeline failed (${result.totalDurationMs}ms); see medallion logs tail etl`
    );
  }

  if (!result.success) process.exit(1);
}
