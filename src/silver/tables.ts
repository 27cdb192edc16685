import { quoteIdent, quoteTable, type ColumnDefinition } from "../lib/database.js";

export const SILVER_TABLES = [
  "crm_cust_info",
  "crm_prd_info",
  "crm_sales_details",
  "erp_px_cat_g1v2",
  "erp_cust_az12",
  "erp_loc_a101",
] as const;

export type SilverTable = (typeof SILVER_TABLES)[number];

export const AUDIT_COLUMNS: readonly ColumnDefinition[] = [
  { name: "dwh_create_date", type: "TIMESTAMP", nullable: false },
  { name: "dwh_update_date", type: "TIMESTAMP" },
];

/** Business columns per table, in insert order. Audit columns follow them. */
export const SILVER_COLUMNS: Record<SilverTable, readonly ColumnDefinition[]> = {
  crm_cust_info: [
    { name: "cst_id", type: "INTEGER", nullable: false },
    { name: "cst_key", type: "VARCHAR", nullable: false },
    { name: "cst_firstname", type: "VARCHAR" },
    { name: "cst_lastname", type: "VARCHAR" },
    { name: "cst_marital_status", type: "VARCHAR" },
    { name: "cst_gndr", type: "VARCHAR" },
    { name: "cst_create_date", type: "DATE" },
  ],
  crm_prd_info: [
    { name: "prd_id", type: "INTEGER", nullable: false },
    { name: "cat_id", type: "VARCHAR" },
    { name: "prd_key", type: "VARCHAR", nullable: false },
    { name: "prd_nm", type: "VARCHAR" },
    { name: "prd_cost", type: "DECIMAL(18,2)" },
    { name: "prd_line", type: "VARCHAR" },
    { name: "prd_start_dt", type: "DATE" },
    { name: "prd_end_dt", type: "DATE" },
  ],
  crm_sales_details: [
    { name: "sls_ord_num", type: "VARCHAR", nullable: false },
    { name: "sls_prd_key", type: "VARCHAR", nullable: false },
    { name: "sls_cust_id", type: "INTEGER", nullable: false },
    { name: "sls_order_dt", type: "DATE" },
    { name: "sls_ship_dt", type: "DATE" },
    { name: "sls_due_dt", type: "DATE" },
    { name: "sls_sales", type: "DECIMAL(18,2)" },
    { name: "sls_quantity", type: "INTEGER" },
    { name: "sls_price", type: "DECIMAL(18,2)" },
  ],
  erp_px_cat_g1v2: [
    { name: "id", type: "VARCHAR", nullable: false },
    { name: "cat", type: "VARCHAR" },
    { name: "subcat", type: "VARCHAR" },
    { name: "maintenance", type: "VARCHAR" },
  ],
  erp_cust_az12: [
    { name: "cid", type: "VARCHAR", nullable: false },
    { name: "bdate", type: "DATE" },
    { name: "gen", type: "VARCHAR" },
  ],
  erp_loc_a101: [
    { name: "cid", type: "VARCHAR", nullable: false },
    { name: "cntry", type: "VARCHAR" },
  ],
};

export function silverColumns(table: SilverTable): ColumnDefinition[] {
  return [...SILVER_COLUMNS[table], ...AUDIT_COLUMNS];
}

export function silverTableName(table: SilverTable): string {
  return `silver.${table}`;
}

export function stagingTableName(table: SilverTable): string {
  return `silver.${table}__staging`;
}

export function createTableSql(name: string, columns: readonly ColumnDefinition[], replace = false): string {
  const body = columns
    .map((c) => `  ${quoteIdent(c.name)} ${c.type}${c.nullable === false ? " NOT NULL" : ""}`)
    .join(",\n");
  const verb = replace ? "CREATE OR REPLACE TABLE" : "CREATE TABLE IF NOT EXISTS";
  return `${verb} ${quoteTable(name)} (\n${body}\n)`;
}
