/**
 * Row shapes flowing through the Silver transformer.
 *
 * Bronze rows mirror the raw CSV columns and any field may be null. Silver rows
 * are what the rules produce; dates are ISO `YYYY-MM-DD` strings.
 */

import type { Country, Gender, MaritalStatus, ProductLine } from "./values.js";

/** ISO calendar date, `YYYY-MM-DD`. */
export type IsoDate = string;

// ── Bronze ───────────────────────────────────────────────────────────

export interface BronzeCustomerInfo {
  cst_id: number | null;
  cst_key: string | null;
  cst_firstname: string | null;
  cst_lastname: string | null;
  cst_marital_status: string | null;
  cst_gndr: string | null;
  cst_create_date: IsoDate | null;
}

export interface BronzeProductInfo {
  prd_id: number | null;
  prd_key: string | null;
  prd_nm: string | null;
  prd_cost: number | null;
  prd_line: string | null;
  /** Timestamp text, `YYYY-MM-DD HH:MM:SS`. */
  prd_start_dt: string | null;
  prd_end_dt: string | null;
}

export interface BronzeSalesDetail {
  sls_ord_num: string | null;
  sls_prd_key: string | null;
  sls_cust_id: number | null;
  /** YYYYMMDD packed into an integer. */
  sls_order_dt: number | null;
  sls_ship_dt: number | null;
  sls_due_dt: number | null;
  sls_sales: number | null;
  sls_quantity: number | null;
  sls_price: number | null;
}

export interface BronzeCategory {
  id: string | null;
  cat: string | null;
  subcat: string | null;
  maintenance: string | null;
}

export interface BronzeCustomerDemographics {
  cid: string | null;
  bdate: IsoDate | null;
  gen: string | null;
}

export interface BronzeLocation {
  cid: string | null;
  cntry: string | null;
}

// ── Silver ───────────────────────────────────────────────────────────

export interface SilverCustomerInfo {
  cst_id: number;
  cst_key: string | null;
  cst_firstname: string | null;
  cst_lastname: string | null;
  cst_marital_status: MaritalStatus;
  cst_gndr: Gender;
  cst_create_date: IsoDate | null;
}

export interface SilverProductInfo {
  prd_id: number | null;
  cat_id: string | null;
  prd_key: string | null;
  prd_nm: string | null;
  prd_cost: number;
  prd_line: ProductLine;
  prd_start_dt: IsoDate | null;
  prd_end_dt: IsoDate | null;
}

export interface SilverSalesDetail {
  sls_ord_num: string | null;
  sls_prd_key: string | null;
  sls_cust_id: number | null;
  sls_order_dt: IsoDate | null;
  sls_ship_dt: IsoDate | null;
  sls_due_dt: IsoDate | null;
  sls_sales: number | null;
  sls_quantity: number | null;
  sls_price: number | null;
}

export type SilverCategory = BronzeCategory;

export interface SilverCustomerDemographics {
  cid: string | null;
  bdate: IsoDate | null;
  gen: Gender;
}

export interface SilverLocation {
  cid: string | null;
  cntry: Country;
}
