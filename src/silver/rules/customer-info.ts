import type { BronzeCustomerInfo, SilverCustomerInfo } from "../types.js";
import { toGender, toMaritalStatus, trimBlanks } from "../values.js";

/**
 * Whether `candidate`, seen later in Bronze order, replaces `current` as the
 * latest record for its customer. A null create date never beats a real one;
 * equal dates go to the later row.
 */
function supersedes(candidate: BronzeCustomerInfo, current: BronzeCustomerInfo): boolean {
  if (candidate.cst_create_date === null) return current.cst_create_date === null;
  if (current.cst_create_date === null) return true;
  return candidate.cst_create_date >= current.cst_create_date;
}

function trimName(value: string | null): string | null {
  return value === null ? null : trimBlanks(value);
}

/**
 * One row per customer id: the record with the latest create date. Rows
 * without an id are dropped. Output is ordered by id.
 */
export function transformCustomerInfo(rows: readonly BronzeCustomerInfo[]): SilverCustomerInfo[] {
  const latest = new Map<number, BronzeCustomerInfo>();
  for (const row of rows) {
    if (row.cst_id === null) continue;
    const current = latest.get(row.cst_id);
    if (!current || supersedes(row, current)) latest.set(row.cst_id, row);
  }

  return [...latest.entries()]
    .sort(([a], [b]) => a - b)
    .map(([id, row]) => ({
      cst_id: id,
      cst_key: row.cst_key,
      cst_firstname: trimName(row.cst_firstname),
      cst_lastname: trimName(row.cst_lastname),
      cst_marital_status: toMaritalStatus(row.cst_marital_status),
      cst_gndr: toGender(row.cst_gndr),
      cst_create_date: row.cst_create_date,
    }));
}
