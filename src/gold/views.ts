/**
 * Gold tier: the three star-schema views over Silver.
 */

import * as fs from "fs/promises";
import * as path from "path";
import type { DatabaseManager } from "../lib/database.js";
import { sqlDir } from "../lib/paths.js";

export const GOLD_VIEWS = ["dim_customers", "dim_products", "fact_sales"] as const;
export type GoldView = (typeof GOLD_VIEWS)[number];

export function isGoldView(name: string): name is GoldView {
  return GOLD_VIEWS.some((v) => v === name);
}

export interface DimCustomer {
  customer_key: number;
  customer_id: number;
  customer_number: string | null;
  first_name: string | null;
  last_name: string | null;
  country: string | null;
  marital_status: string | null;
  gender: string | null;
  birthdate: string | null;
  create_date: string | null;
}

export interface DimProduct {
  product_key: number;
  product_id: number;
  product_number: string | null;
  product_name: string | null;
  category_id: string | null;
  category: string | null;
  subcategory: string | null;
  cost: number | null;
  product_line: string | null;
  start_date: string | null;
  maintenance: string | null;
}

export interface FactSale {
  order_number: string | null;
  product_key: number | null;
  customer_key: number | null;
  order_date: string | null;
  shipping_date: string | null;
  due_date: string | null;
  sales_amount: number | null;
  sales_quantity: number | null;
  price: number | null;
}

export interface GoldRows {
  dim_customers: DimCustomer;
  dim_products: DimProduct;
  fact_sales: FactSale;
}

type FieldKind = "int" | "number" | "text" | "date";

/** Read casts per view column, so DECIMAL and DATE values come back as numbers and ISO text. */
const VIEW_FIELDS = {
  dim_customers: {
    customer_key: "int",
    customer_id: "int",
    customer_number: "text",
    first_name: "text",
    last_name: "text",
    country: "text",
    marital_status: "text",
    gender: "text",
    birthdate: "date",
    create_date: "date",
  },
  dim_products: {
    product_key: "int",
    product_id: "int",
    product_number: "text",
    product_name: "text",
    category_id: "text",
    category: "text",
    subcategory: "text",
    cost: "number",
    product_line: "text",
    start_date: "date",
    maintenance: "text",
  },
  fact_sales: {
    order_number: "text",
    product_key: "int",
    customer_key: "int",
    order_date: "date",
    shipping_date: "date",
    due_date: "date",
    sales_amount: "number",
    sales_quantity: "int",
    price: "number",
  },
} satisfies { [V in GoldView]: { [K in keyof GoldRows[V]]: FieldKind } };

const ORDER_BY: Record<GoldView, string> = {
  dim_customers: "customer_key",
  dim_products: "product_key",
  fact_sales: "order_number, product_key NULLS LAST",
};

const CASTS: Record<FieldKind, string> = {
  int: "INTEGER",
  number: "DOUBLE",
  text: "VARCHAR",
  date: "VARCHAR",
};

export class GoldLayer {
  constructor(private readonly db: DatabaseManager) {}

  /** (Re)create the views; Silver tables must exist. */
  async createViews(): Promise<void> {
    const sql = await fs.readFile(path.join(sqlDir(), "gold.sql"), "utf-8");
    await this.db.execute(sql);
  }

  async listViews(): Promise<string[]> {
    const rows = await this.db.query<{ table_name: string }>(
      `SELECT table_name FROM information_schema.tables WHERE table_schema = 'gold' AND table_type = 'VIEW' ORDER BY table_name`
    );
    return rows.map((r) => r.table_name);
  }

  async read<V extends GoldView>(view: V, limit?: number): Promise<GoldRows[V][]> {
    const fields: Record<string, FieldKind> = VIEW_FIELDS[view];
    const select = Object.entries(fields)
      .map(([name, kind]) => `CAST(${name} AS ${CASTS[kind]}) AS ${name}`)
      .join(", ");
    const limitClause = limit === undefined ? "" : ` LIMIT ${Math.max(0, Math.floor(limit))}`;
    return this.db.query<GoldRows[V]>(`SELECT ${select} FROM gold.${view} ORDER BY ${ORDER_BY[view]}${limitClause}`);
  }
}
