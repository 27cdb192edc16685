import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { GOLD_VIEWS, GoldLayer, isGoldView } from "../../src/gold/views.js";
import type { DatabaseManager } from "../../src/lib/database.js";
import { SilverTransformer } from "../../src/silver/transformer.js";
import { NOW, createLoadedWarehouse, quietLogger } from "../helpers.js";

describe("GoldLayer", () => {
  let db: DatabaseManager;
  let gold: GoldLayer;

  beforeAll(async () => {
    db = await createLoadedWarehouse();
    await new SilverTransformer().runBatch({ db, logger: quietLogger(), now: NOW, publishMode: "batch" });
    gold = new GoldLayer(db);
  });

  afterAll(async () => {
    await db.close();
  });

  it("lists the three views", async () => {
    expect(await gold.listViews()).toEqual([...GOLD_VIEWS]);
  });

  it("builds dim_customers from CRM and ERP data", async () => {
    const rows = await gold.read("dim_customers");
    expect(rows).toEqual([
      {
        customer_key: 1,
        customer_id: 1001,
        customer_number: "CU01001",
        first_name: "Ana",
        last_name: "Marsh",
        country: "Germany",
        marital_status: "Married",
        gender: "Female",
        birthdate: "1990-04-12",
        create_date: "2021-06-01",
      },
      {
        customer_key: 2,
        customer_id: 1002,
        customer_number: "CU01002",
        first_name: "Ben",
        last_name: "Okafor",
        country: "United States",
        marital_status: "Married",
        gender: "Male",
        birthdate: null,
        create_date: "2022-01-15",
      },
      {
        customer_key: 3,
        customer_id: 1003,
        customer_number: "CU01003",
        first_name: "Cleo",
        last_name: "Park",
        country: "N/A",
        marital_status: "N/A",
        gender: "N/A",
        birthdate: "1985-11-30",
        create_date: "2022-03-10",
      },
    ]);
  });

  it("keeps only current product versions, keyed by start date", async () => {
    const rows = await gold.read("dim_products");
    expect(rows.map((r) => [r.product_key, r.product_id, r.product_number, r.category, r.cost])).toEqual([
      [1, 203, "BTL-10", "Accessories", 0],
      [2, 204, "MT-200", "Bikes", 450],
      [3, 202, "RD-100", "Bikes", 320],
    ]);
  });

  it("joins sales to both dimensions", async () => {
    const rows = await gold.read("fact_sales");
    expect(rows.map((r) => [r.order_number, r.product_key, r.customer_key, r.sales_amount])).toEqual([
      ["SO5001", 3, 1, 100],
      ["SO5002", 1, 2, 1000],
      ["SO5003", 2, 3, 450],
      ["SO5004", 3, 2, 60],
    ]);
  });

  it("applies a row limit", async () => {
    expect(await gold.read("fact_sales", 2)).toHaveLength(2);
  });

  it("falls back to the ERP gender when the CRM one is N/A", async () => {
    await db.execute("UPDATE silver.crm_cust_info SET cst_gndr = 'N/A' WHERE cst_id = 1002");
    const rows = await gold.read("dim_customers");
    expect(rows.find((r) => r.customer_id === 1002)?.gender).toBe("Male");
  });
});

describe("isGoldView", () => {
  it("recognises view names", () => {
    expect(isGoldView("fact_sales")).toBe(true);
    expect(isGoldView("gold.fact_sales")).toBe(false);
  });
});
