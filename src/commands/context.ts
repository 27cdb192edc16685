import type { Settings } from "../lib/config.js";
import type { DatabaseManager } from "../lib/database.js";
import { EtlLogger, type LogManager } from "../lib/logger.js";
import { verboseMode } from "../lib/output.js";
import type { TaskTracker } from "../lib/tasks.js";

/** Services the CLI builds once and hands to each command. */
export interface CommandContext {
  root: string;
  settings: Settings;
  db: DatabaseManager;
  logs: LogManager;
  tasks: TaskTracker;
}

/** Batch logger writing to the etl log; banners echo to stderr only with --verbose. */
export function etlLogger(ctx: CommandContext): EtlLogger {
  return new EtlLogger({ manager: ctx.logs, stream: verboseMode ? process.stderr : null });
}

/** AbortSignal fired by the first Ctrl-C; the handler is removed by `dispose`. */
export function interruptSignal(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    process.stderr.write("\nInterrupt received, stopping after the current step…\n");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);
  return { signal: controller.signal, dispose: () => process.off("SIGINT", onInterrupt) };
}
