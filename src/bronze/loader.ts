/**
 * Bronze loader: truncate each raw table and bulk-load it from its CSV file.
 *
 * Tables are independent. A failed table is logged and recorded, and the
 * loader moves on to the next one.
 */

import * as fs from "fs/promises";
import * as path from "path";
import type { DatabaseManager } from "../lib/database.js";
import { engineErrorType, errorMessage, type ErrorDiagnostic } from "../lib/errors.js";
import type { BatchLogger } from "../lib/logger.js";
import { sqlDir } from "../lib/paths.js";
import type { TaskTracker } from "../lib/tasks.js";

/** Load order, as the source extracts are delivered. */
export const BRONZE_TABLES = [
  "crm_cust_info",
  "crm_prd_info",
  "crm_sales_details",
  "erp_loc_a101",
  "erp_cust_az12",
  "erp_px_cat_g1v2",
] as const;

export type BronzeTable = (typeof BRONZE_TABLES)[number];

export function isBronzeTable(name: string): name is BronzeTable {
  return BRONZE_TABLES.some((t) => t === name);
}

export interface BronzeTableResult {
  table: string;
  file: string;
  success: boolean;
  rows: number;
  durationMs: number;
  error?: ErrorDiagnostic & { engineErrorType?: string };
}

export interface BronzeLoadResult {
  success: boolean;
  tables: BronzeTableResult[];
  durationMs: number;
}

export interface BronzeLoaderOptions {
  dataFolder?: string;
  logger: BatchLogger;
  tasks?: TaskTracker;
}

const RULE = "=".repeat(60);
const SUBRULE = "-".repeat(60);

export async function createBronzeTables(db: DatabaseManager): Promise<void> {
  const ddl = await fs.readFile(path.join(sqlDir(), "bronze.sql"), "utf-8");
  await db.execute(ddl);
}

export class BronzeLoader {
  readonly dataFolder: string;
  private readonly logger: BatchLogger;
  private readonly tasks?: TaskTracker;

  constructor(
    private readonly db: DatabaseManager,
    options: BronzeLoaderOptions
  ) {
    this.dataFolder = options.dataFolder ?? (process.env.DATA_FOLDER || "./data");
    this.logger = options.logger;
    this.tasks = options.tasks;
  }

  filePath(table: BronzeTable): string {
    return path.join(this.dataFolder, `${table}.csv`);
  }

  /** Source files present in the data folder, by table. */
  async listFiles(): Promise<{ table: BronzeTable; file: string; present: boolean }[]> {
    const entries: { table: BronzeTable; file: string; present: boolean }[] = [];
    for (const table of BRONZE_TABLES) {
      const file = this.filePath(table);
      const present = await fs.stat(file).then(
        (s) => s.isFile(),
        () => false
      );
      entries.push({ table, file, present });
    }
    return entries;
  }

  async loadTable(table: BronzeTable): Promise<BronzeTableResult> {
    const name = `bronze.${table}`;
    const file = this.filePath(table);
    const taskId = this.tasks?.createTask(`Bronze ${name}`);
    const start = Date.now();

    this.logger.info(SUBRULE);
    this.logger.info(`Processing Table: ${name}`);
    this.logger.info(`File: ${file}`);
    if (taskId) this.tasks?.startTask(taskId, `Loading ${file}`);

    try {
      await this.db.execute(`TRUNCATE ${name}`);
      await this.db.loadCSV(name, file);
      const rows = await this.db.countRows(name);
      const durationMs = Date.now() - start;
      this.logger.info(`>> Rows loaded: ${rows}`);
      this.logger.info(`>> Load Duration: ${(durationMs / 1000).toFixed(3)} sec`);
      this.logger.info("OK");
      if (taskId) this.tasks?.completeTask(taskId, `Loaded ${rows} row(s) into ${name}`);
      return { table: name, file, success: true, rows, durationMs };
    } catch (err) {
      const message = errorMessage(err);
      const type = engineErrorType(err);
      this.logger.error(`*** ERROR loading table ${name} ***`);
      this.logger.error(`Message: ${message}`);
      if (type) this.logger.error(`Type   : ${type}`);
      if (taskId) this.tasks?.failTask(taskId, message);
      return {
        table: name,
        file,
        success: false,
        rows: 0,
        durationMs: Date.now() - start,
        error: { code: "BRONZE_LOAD_FAILED", severity: "error", step: name, message, ...(type ? { engineErrorType: type } : {}) },
      };
    }
  }

  async loadAll(tables: readonly BronzeTable[] = BRONZE_TABLES): Promise<BronzeLoadResult> {
    const start = Date.now();
    this.logger.info(RULE);
    this.logger.info("Starting Bronze Layer Load Process");
    this.logger.info(RULE);

    await createBronzeTables(this.db);
    const results: BronzeTableResult[] = [];
    for (const table of tables) {
      results.push(await this.loadTable(table));
    }

    const durationMs = Date.now() - start;
    const failed = results.filter((r) => !r.success).length;
    this.logger.info(RULE);
    this.logger.info(
      failed ? `Bronze Layer Load Completed with ${failed} failed table(s).` : "Bronze Layer Load Completed."
    );
    this.logger.info(`Total Duration: ${(durationMs / 1000).toFixed(3)} seconds`);
    this.logger.info(RULE);

    return { success: failed === 0, tables: results, durationMs };
  }
}
