/**
 * Readers for the six Bronze tables. Each query casts its columns to the
 * shapes the rules expect (numbers, ISO date text) and keeps insertion order,
 * which the tie-breaks rely on.
 */

import type { DatabaseManager } from "../lib/database.js";
import { SourceUnavailableError } from "../lib/errors.js";
import type {
  BronzeCategory,
  BronzeCustomerDemographics,
  BronzeCustomerInfo,
  BronzeLocation,
  BronzeProductInfo,
  BronzeSalesDetail,
} from "./types.js";

type RawRow = Record<string, unknown>;

function text(row: RawRow, key: string): string | null {
  const value = row[key];
  if (value === null || value === undefined) return null;
  return typeof value === "string" ? value : String(value);
}

function num(row: RawRow, key: string): number | null {
  const value = row[key];
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

async function readBronze(db: DatabaseManager, table: string, select: string): Promise<RawRow[]> {
  const name = `bronze.${table}`;
  if (!(await db.tableExists(name))) throw new SourceUnavailableError(name);
  return db.rows(`SELECT ${select} FROM bronze.${table} ORDER BY rowid`);
}

export async function readCustomerInfo(db: DatabaseManager): Promise<BronzeCustomerInfo[]> {
  const rows = await readBronze(
    db,
    "crm_cust_info",
    `cst_id::INTEGER AS cst_id, cst_key::VARCHAR AS cst_key, cst_firstname::VARCHAR AS cst_firstname,
     cst_lastname::VARCHAR AS cst_lastname, cst_marital_status::VARCHAR AS cst_marital_status,
     cst_gndr::VARCHAR AS cst_gndr, cst_create_date::DATE::VARCHAR AS cst_create_date`
  );
  return rows.map((r) => ({
    cst_id: num(r, "cst_id"),
    cst_key: text(r, "cst_key"),
    cst_firstname: text(r, "cst_firstname"),
    cst_lastname: text(r, "cst_lastname"),
    cst_marital_status: text(r, "cst_marital_status"),
    cst_gndr: text(r, "cst_gndr"),
    cst_create_date: text(r, "cst_create_date"),
  }));
}

export async function readProductInfo(db: DatabaseManager): Promise<BronzeProductInfo[]> {
  const rows = await readBronze(
    db,
    "crm_prd_info",
    `prd_id::INTEGER AS prd_id, prd_key::VARCHAR AS prd_key, prd_nm::VARCHAR AS prd_nm,
     prd_cost::DOUBLE AS prd_cost, prd_line::VARCHAR AS prd_line,
     strftime(prd_start_dt::TIMESTAMP, '%Y-%m-%d %H:%M:%S') AS prd_start_dt,
     strftime(prd_end_dt::TIMESTAMP, '%Y-%m-%d %H:%M:%S') AS prd_end_dt`
  );
  return rows.map((r) => ({
    prd_id: num(r, "prd_id"),
    prd_key: text(r, "prd_key"),
    prd_nm: text(r, "prd_nm"),
    prd_cost: num(r, "prd_cost"),
    prd_line: text(r, "prd_line"),
    prd_start_dt: text(r, "prd_start_dt"),
    prd_end_dt: text(r, "prd_end_dt"),
  }));
}

export async function readSalesDetails(db: DatabaseManager): Promise<BronzeSalesDetail[]> {
  const rows = await readBronze(
    db,
    "crm_sales_details",
    `sls_ord_num::VARCHAR AS sls_ord_num, sls_prd_key::VARCHAR AS sls_prd_key, sls_cust_id::INTEGER AS sls_cust_id,
     sls_order_dt::DOUBLE AS sls_order_dt, sls_ship_dt::DOUBLE AS sls_ship_dt, sls_due_dt::DOUBLE AS sls_due_dt,
     sls_sales::DOUBLE AS sls_sales, sls_quantity::DOUBLE AS sls_quantity, sls_price::DOUBLE AS sls_price`
  );
  return rows.map((r) => ({
    sls_ord_num: text(r, "sls_ord_num"),
    sls_prd_key: text(r, "sls_prd_key"),
    sls_cust_id: num(r, "sls_cust_id"),
    sls_order_dt: num(r, "sls_order_dt"),
    sls_ship_dt: num(r, "sls_ship_dt"),
    sls_due_dt: num(r, "sls_due_dt"),
    sls_sales: num(r, "sls_sales"),
    sls_quantity: num(r, "sls_quantity"),
    sls_price: num(r, "sls_price"),
  }));
}

export async function readCategories(db: DatabaseManager): Promise<BronzeCategory[]> {
  const rows = await readBronze(
    db,
    "erp_px_cat_g1v2",
    `id::VARCHAR AS id, cat::VARCHAR AS cat, subcat::VARCHAR AS subcat, maintenance::VARCHAR AS maintenance`
  );
  return rows.map((r) => ({
    id: text(r, "id"),
    cat: text(r, "cat"),
    subcat: text(r, "subcat"),
    maintenance: text(r, "maintenance"),
  }));
}

export async function readCustomerDemographics(db: DatabaseManager): Promise<BronzeCustomerDemographics[]> {
  const rows = await readBronze(db, "erp_cust_az12", `cid::VARCHAR AS cid, bdate::DATE::VARCHAR AS bdate, gen::VARCHAR AS gen`);
  return rows.map((r) => ({
    cid: text(r, "cid"),
    bdate: text(r, "bdate"),
    gen: text(r, "gen"),
  }));
}

export async function readLocations(db: DatabaseManager): Promise<BronzeLocation[]> {
  const rows = await readBronze(db, "erp_loc_a101", `cid::VARCHAR AS cid, cntry::VARCHAR AS cntry`);
  return rows.map((r) => ({
    cid: text(r, "cid"),
    cntry: text(r, "cntry"),
  }));
}
