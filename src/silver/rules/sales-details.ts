import { parsePackedDate } from "../dates.js";
import type { BronzeSalesDetail, SilverSalesDetail } from "../types.js";

export const SALES_TOLERANCE = 0.01;

/**
 * Keep the recorded amount unless it is missing, non-positive, or off from
 * quantity × |price| by more than a cent; then use quantity × |price|.
 */
export function repairSalesAmount(sales: number | null, quantity: number | null, price: number | null): number | null {
  const expected = quantity === null || price === null ? null : quantity * Math.abs(price);
  const inconsistent = expected !== null && sales !== null && Math.abs(sales - expected) > SALES_TOLERANCE;
  if (sales === null || sales <= 0 || inconsistent) return expected;
  return sales;
}

/**
 * Keep a positive price; otherwise derive it from the recorded (unrepaired)
 * amount. Zero or missing quantity leaves it null.
 */
export function repairPrice(sales: number | null, quantity: number | null, price: number | null): number | null {
  if (price !== null && price > 0) return price;
  if (sales === null || quantity === null || quantity === 0) return null;
  return sales / quantity;
}

export function transformSalesDetails(rows: readonly BronzeSalesDetail[]): SilverSalesDetail[] {
  return rows.map((row) => ({
    sls_ord_num: row.sls_ord_num,
    sls_prd_key: row.sls_prd_key,
    sls_cust_id: row.sls_cust_id,
    sls_order_dt: parsePackedDate(row.sls_order_dt),
    sls_ship_dt: parsePackedDate(row.sls_ship_dt),
    sls_due_dt: parsePackedDate(row.sls_due_dt),
    sls_sales: repairSalesAmount(row.sls_sales, row.sls_quantity, row.sls_price),
    sls_quantity: row.sls_quantity,
    sls_price: repairPrice(row.sls_sales, row.sls_quantity, row.sls_price),
  }));
}
