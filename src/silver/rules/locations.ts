import type { BronzeLocation, SilverLocation } from "../types.js";
import { toCountry } from "../values.js";

export function transformLocations(rows: readonly BronzeLocation[]): SilverLocation[] {
  return rows.map((row) => ({
    cid: row.cid === null ? null : row.cid.replace(/-/g, ""),
    cntry: toCountry(row.cntry),
  }));
}
