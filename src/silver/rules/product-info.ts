import { addDays, truncateToDate } from "../dates.js";
import type { BronzeProductInfo, SilverProductInfo } from "../types.js";
import { toProductLine } from "../values.js";

/** First five characters of the raw key, dashes turned into underscores. */
export function categoryIdOf(rawKey: string): string {
  return rawKey.slice(0, 5).replace(/-/g, "_");
}

/** The raw key from its seventh character on. */
export function productKeyOf(rawKey: string): string {
  return rawKey.slice(6);
}

interface Version {
  index: number;
  start: string | null;
}

/** Null starts first, then ascending start, then Bronze order. */
function compareVersions(a: Version, b: Version): number {
  if (a.start !== b.start) {
    if (a.start === null) return -1;
    if (b.start === null) return 1;
    return a.start < b.start ? -1 : 1;
  }
  return a.index - b.index;
}

/**
 * End date of each row: the day before the next version of the same product
 * key starts, or null for the latest version.
 */
export function deriveEndDates(rows: readonly BronzeProductInfo[]): (string | null)[] {
  const groups = new Map<string | null, Version[]>();
  rows.forEach((row, index) => {
    const key = row.prd_key === null ? null : productKeyOf(row.prd_key);
    const versions = groups.get(key) ?? [];
    versions.push({ index, start: row.prd_start_dt });
    groups.set(key, versions);
  });

  const endDates: (string | null)[] = rows.map(() => null);
  for (const versions of groups.values()) {
    versions.sort(compareVersions);
    for (let i = 0; i + 1 < versions.length; i++) {
      const nextStart = truncateToDate(versions[i + 1].start);
      endDates[versions[i].index] = nextStart === null ? null : addDays(nextStart, -1);
    }
  }
  return endDates;
}

/** One Silver row per Bronze row, in Bronze order. */
export function transformProductInfo(rows: readonly BronzeProductInfo[]): SilverProductInfo[] {
  const endDates = deriveEndDates(rows);
  return rows.map((row, index) => ({
    prd_id: row.prd_id,
    cat_id: row.prd_key === null ? null : categoryIdOf(row.prd_key),
    prd_key: row.prd_key === null ? null : productKeyOf(row.prd_key),
    prd_nm: row.prd_nm,
    prd_cost: row.prd_cost ?? 0,
    prd_line: toProductLine(row.prd_line),
    prd_start_dt: truncateToDate(row.prd_start_dt),
    prd_end_dt: endDates[index],
  }));
}
