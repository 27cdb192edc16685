/**
 * `medallion doctor`: verify prerequisites and config.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { BronzeLoader } from "../bronze/loader.js";
import { configFilePath } from "../lib/config.js";
import { errorMessage } from "../lib/errors.js";
import { jsonMode, output } from "../lib/output.js";
import { TIER_SCHEMAS } from "../lib/database.js";
import { etlLogger, type CommandContext } from "./context.js";

export interface DoctorCheck {
  name: string;
  ok: boolean;
  detail: string;
}

const MIN_NODE_MAJOR = 20;

export async function runDoctorChecks(ctx: CommandContext): Promise<DoctorCheck[]> {
  const checks: DoctorCheck[] = [];

  const nodeMajor = parseInt(process.versions.node.split(".")[0], 10);
  checks.push({
    name: "Node.js",
    ok: nodeMajor >= MIN_NODE_MAJOR,
    detail: nodeMajor >= MIN_NODE_MAJOR ? process.version : `${process.version} (need ${MIN_NODE_MAJOR}+)`,
  });

  const cfgFile = configFilePath(ctx.root);
  const hasConfig = await fs.stat(cfgFile).then(
    (s) => s.isFile(),
    () => false
  );
  checks.push({ name: "Config file", ok: true, detail: hasConfig ? cfgFile : "none (using env and defaults)" });

  const loader = new BronzeLoader(ctx.db, { dataFolder: ctx.settings.dataFolder, logger: etlLogger(ctx) });
  const files = await loader.listFiles();
  const missing = files.filter((f) => !f.present).map((f) => path.basename(f.file));
  checks.push({
    name: "Source files",
    ok: missing.length === 0,
    detail: missing.length
      ? `missing in ${ctx.settings.dataFolder}: ${missing.join(", ")}`
      : `${files.length} file(s) in ${ctx.settings.dataFolder}`,
  });

  try {
    const info = await ctx.db.getInfo();
    const schemas = new Set(info.tableList.map((t) => t.table_schema));
    const absent = TIER_SCHEMAS.filter((s) => !schemas.has(s));
    checks.push({
      name: "Warehouse",
      ok: absent.length === 0,
      detail: absent.length ? `${ctx.db.path} (run: medallion init)` : `${ctx.db.path}, ${info.tables} object(s)`,
    });
  } catch (err) {
    checks.push({ name: "Warehouse", ok: false, detail: `cannot open ${ctx.db.path}: ${errorMessage(err)}` });
  }

  checks.push({ name: "Publish mode", ok: true, detail: ctx.settings.publishMode });
  return checks;
}

export async function doctorCommand(ctx: CommandContext): Promise<void> {
  const checks = await runDoctorChecks(ctx);
  const allOk = checks.every((c) => c.ok);

  if (jsonMode) {
    output({ ok: allOk, checks });
  } else {
    checks.forEach((c) => console.log(`${c.ok ? "✓" : "✗"} ${c.name.padEnd(14)} ${c.detail}`));
    console.log(allOk ? "\nAll checks passed." : "\nSome checks failed.");
  }
  if (!allOk) process.exit(1);
}
