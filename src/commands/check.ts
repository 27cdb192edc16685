/**
 * `medallion check`: run the data-quality checks over Silver.
 * Exits 1 when an error-severity check fails; warnings only report.
 */

import type { DatabaseManager } from "../lib/database.js";
import { jsonMode, output } from "../lib/output.js";
import { QualityChecker, type CheckResult } from "../quality/checks.js";

function mark(r: CheckResult): string {
  if (r.passed) return "✓";
  return r.severity === "error" ? "✗" : "!";
}

export async function checkCommand(db: DatabaseManager): Promise<void> {
  const report = await new QualityChecker(db).run();

  if (jsonMode) {
    output(report);
  } else {
    for (const r of report.checks) {
      const detail = r.passed ? "" : `  ${r.failing} row(s) [${r.severity}]`;
      console.log(`${mark(r)} ${r.name.padEnd(30)} ${r.table}${detail}`);
    }
    console.log(
      report.passed
        ? `\n✓ Quality checks passed (${report.warnings} warning(s))`
        : `\n✗ ${report.errors} check(s) failed, ${report.warnings} warning(s)`
    );
  }

  if (!report.passed) process.exit(1);
}
