/**
 * The six Silver steps, in load order. Each step pairs a Bronze reader with
 * its rule and knows how to lay a Silver row out as insert parameters.
 */

import type { DatabaseManager, SqlParams } from "../lib/database.js";
import {
  readCategories,
  readCustomerDemographics,
  readCustomerInfo,
  readLocations,
  readProductInfo,
  readSalesDetails,
} from "./bronze-source.js";
import {
  transformCategories,
  transformCustomerDemographics,
  transformCustomerInfo,
  transformLocations,
  transformProductInfo,
  transformSalesDetails,
} from "./rules/index.js";
import { SILVER_COLUMNS, type SilverTable } from "./tables.js";

export type SourceSystem = "CRM" | "ERP";

export interface StepInput {
  db: DatabaseManager;
  /** Processing time: future birthdates are judged against it. */
  now: Date;
}

export interface StepOutput {
  rowsRead: number;
  /** Business column values, in SILVER_COLUMNS order. */
  rows: SqlParams[];
}

export interface SilverStep {
  table: SilverTable;
  system: SourceSystem;
  produce(input: StepInput): Promise<StepOutput>;
}

interface StepDefinition<B, S> {
  table: SilverTable;
  system: SourceSystem;
  read(db: DatabaseManager): Promise<B[]>;
  transform(rows: B[], now: Date): S[];
}

function defineStep<B, S extends object>(def: StepDefinition<B, S>): SilverStep {
  const columns = SILVER_COLUMNS[def.table].map((c) => c.name);
  return {
    table: def.table,
    system: def.system,
    async produce({ db, now }) {
      const bronze = await def.read(db);
      const silver = def.transform(bronze, now);
      return {
        rowsRead: bronze.length,
        rows: silver.map((row) => {
          const record = new Map<string, unknown>(Object.entries(row));
          return columns.map((name) => toParam(record.get(name)));
        }),
      };
    },
  };
}

function toParam(value: unknown): SqlParams[number] {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") return value;
  return String(value);
}

export const SILVER_STEPS: readonly SilverStep[] = [
  defineStep({ table: "crm_cust_info", system: "CRM", read: readCustomerInfo, transform: transformCustomerInfo }),
  defineStep({ table: "crm_prd_info", system: "CRM", read: readProductInfo, transform: transformProductInfo }),
  defineStep({ table: "crm_sales_details", system: "CRM", read: readSalesDetails, transform: transformSalesDetails }),
  defineStep({ table: "erp_px_cat_g1v2", system: "ERP", read: readCategories, transform: transformCategories }),
  defineStep({
    table: "erp_cust_az12",
    system: "ERP",
    read: readCustomerDemographics,
    transform: transformCustomerDemographics,
  }),
  defineStep({ table: "erp_loc_a101", system: "ERP", read: readLocations, transform: transformLocations }),
];
