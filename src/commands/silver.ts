/**
 * `medallion silver run`: rebuild the Silver tables from Bronze.
 *
 * Ctrl-C cancels the batch before the next step; nothing is published then
 * in `batch` mode.
 */

import { parsePublishMode } from "../lib/config.js";
import { fail, jsonMode, output } from "../lib/output.js";
import { ProgressBar } from "../lib/progress.js";
import { SILVER_STEPS } from "../silver/steps.js";
import { SilverTransformer, type PublishMode } from "../silver/transformer.js";
import { etlLogger, interruptSignal, type CommandContext } from "./context.js";

/** `--mode <batch|table>` if given, else the configured mode. */
export function modeFlag(rest: string[], fallback: PublishMode): PublishMode {
  const idx = rest.indexOf("--mode");
  if (idx === -1) return fallback;
  return parsePublishMode(rest[idx + 1] ?? "");
}

export async function silverCommand(sub: string | undefined, rest: string[], ctx: CommandContext): Promise<void> {
  switch (sub) {
    case "run": {
      const publishMode = modeFlag(rest, ctx.settings.publishMode);
      const logger = etlLogger(ctx);
      const bar = jsonMode ? null : new ProgressBar({ total: SILVER_STEPS.length, label: "Silver" });
      const interrupt = interruptSignal();

      try {
        const result = await new SilverTransformer().runBatch({
          db: ctx.db,
          logger,
          now: new Date(),
          publishMode,
          signal: interrupt.signal,
          tasks: ctx.tasks,
          onStepComplete: (step) => bar?.tick(1, step.table),
        });
        bar?.finish();
        await logger.flush();

        if (jsonMode) {
          output(result);
        } else {
          for (const s of result.steps) {
            console.log(
              `✓ ${s.table.padEnd(26)} read ${String(s.rowsRead).padStart(7)}  wrote ${String(s.rowsWritten).padStart(7)}  ${s.durationMs}ms`
            );
          }
          console.log(`\n✓ Silver batch complete (${publishMode} publish, ${result.durationMs}ms)`);
        }
      } catch (err) {
        bar?.abort();
        await logger.flush();
        await ctx.tasks.save();
        fail(err);
      } finally {
        interrupt.dispose();
      }
      await ctx.tasks.save();
      return;
    }

    default:
      if (sub && sub !== "help") console.error(`Error: Unknown silver command: ${sub}\n`);
      console.log("Usage: medallion silver <command>\n");
      console.log("Commands:");
      console.log("  run [--mode batch|table]  Rebuild all six Silver tables from Bronze");
      console.log("\nPublish modes:");
      console.log("  batch  Publish all tables in one transaction after the last step (default)");
      console.log("  table  Publish each table as soon as its step finishes");
      if (sub && sub !== "help") process.exit(1);
      return;
  }
}
