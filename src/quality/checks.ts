/**
 * Data-quality checks over Silver. Each check is a query counting offending
 * rows; checks only read and never repair.
 */

import type { DatabaseManager } from "../lib/database.js";
import { SALES_TOLERANCE } from "../silver/rules/index.js";
import { GENDERS, MARITAL_STATUSES } from "../silver/values.js";

export type CheckSeverity = "error" | "warning";

export interface QualityCheck {
  name: string;
  table: string;
  severity: CheckSeverity;
  /** SELECT returning one INTEGER column `failing`. */
  sql: string;
}

export interface CheckResult {
  name: string;
  table: string;
  severity: CheckSeverity;
  failing: number;
  passed: boolean;
}

export interface QualityReport {
  passed: boolean;
  errors: number;
  warnings: number;
  checks: CheckResult[];
}

function inList(values: readonly string[]): string {
  return values.map((v) => `'${v.replace(/'/g, "''")}'`).join(", ");
}

function countWhere(table: string, condition: string): string {
  return `SELECT COUNT(*)::INTEGER AS failing FROM ${table} WHERE ${condition}`;
}

export const QUALITY_CHECKS: readonly QualityCheck[] = [
  {
    name: "customer_id_unique",
    table: "silver.crm_cust_info",
    severity: "error",
    sql: `SELECT COUNT(*)::INTEGER AS failing FROM (
            SELECT cst_id FROM silver.crm_cust_info GROUP BY cst_id HAVING COUNT(*) > 1
          )`,
  },
  {
    name: "customer_id_not_null",
    table: "silver.crm_cust_info",
    severity: "error",
    sql: countWhere("silver.crm_cust_info", "cst_id IS NULL"),
  },
  {
    name: "marital_status_accepted",
    table: "silver.crm_cust_info",
    severity: "error",
    sql: countWhere(
      "silver.crm_cust_info",
      `cst_marital_status IS NULL OR cst_marital_status NOT IN (${inList(MARITAL_STATUSES)})`
    ),
  },
  {
    name: "customer_gender_accepted",
    table: "silver.crm_cust_info",
    severity: "error",
    sql: countWhere("silver.crm_cust_info", `cst_gndr IS NULL OR cst_gndr NOT IN (${inList(GENDERS)})`),
  },
  {
    name: "demographics_gender_accepted",
    table: "silver.erp_cust_az12",
    severity: "error",
    sql: countWhere("silver.erp_cust_az12", `gen IS NULL OR gen NOT IN (${inList(GENDERS)})`),
  },
  {
    name: "country_not_null",
    table: "silver.erp_loc_a101",
    severity: "error",
    sql: countWhere("silver.erp_loc_a101", "cntry IS NULL OR cntry = ''"),
  },
  {
    name: "product_end_after_start",
    table: "silver.crm_prd_info",
    severity: "warning",
    sql: countWhere("silver.crm_prd_info", "prd_end_dt IS NOT NULL AND prd_end_dt < prd_start_dt"),
  },
  {
    name: "product_cost_not_negative",
    table: "silver.crm_prd_info",
    severity: "warning",
    sql: countWhere("silver.crm_prd_info", "prd_cost < 0"),
  },
  {
    name: "sales_amount_consistent",
    table: "silver.crm_sales_details",
    severity: "warning",
    sql: countWhere(
      "silver.crm_sales_details",
      `ABS(sls_sales - sls_quantity * ABS(sls_price)) > ${SALES_TOLERANCE}`
    ),
  },
  {
    name: "order_before_ship_and_due",
    table: "silver.crm_sales_details",
    severity: "warning",
    sql: countWhere("silver.crm_sales_details", "sls_order_dt > sls_ship_dt OR sls_order_dt > sls_due_dt"),
  },
  {
    name: "sales_product_known",
    table: "silver.crm_sales_details",
    severity: "warning",
    sql: countWhere(
      "silver.crm_sales_details sd",
      "NOT EXISTS (SELECT 1 FROM silver.crm_prd_info p WHERE p.prd_key = sd.sls_prd_key)"
    ),
  },
  {
    name: "sales_customer_known",
    table: "silver.crm_sales_details",
    severity: "warning",
    sql: countWhere(
      "silver.crm_sales_details sd",
      "NOT EXISTS (SELECT 1 FROM silver.crm_cust_info c WHERE c.cst_id = sd.sls_cust_id)"
    ),
  },
];

export class QualityChecker {
  constructor(
    private readonly db: DatabaseManager,
    private readonly checks: readonly QualityCheck[] = QUALITY_CHECKS
  ) {}

  async run(): Promise<QualityReport> {
    const results: CheckResult[] = [];
    for (const check of this.checks) {
      const rows = await this.db.query<{ failing: number }>(check.sql);
      const failing = rows[0]?.failing ?? 0;
      results.push({ name: check.name, table: check.table, severity: check.severity, failing, passed: failing === 0 });
    }
    const errors = results.filter((r) => !r.passed && r.severity === "error").length;
    const warnings = results.filter((r) => !r.passed && r.severity === "warning").length;
    return { passed: errors === 0, errors, warnings, checks: results };
  }
}
