import { isAfter } from "../dates.js";
import type { BronzeCustomerDemographics, SilverCustomerDemographics } from "../types.js";
import { toGenderFromWord } from "../values.js";

const LEGACY_ID_PREFIX = "NAS";

export function stripLegacyPrefix(cid: string | null): string | null {
  if (cid === null || !cid.startsWith(LEGACY_ID_PREFIX)) return cid;
  return cid.slice(LEGACY_ID_PREFIX.length);
}

/** Birthdates after `now` are dropped to null. */
export function transformCustomerDemographics(
  rows: readonly BronzeCustomerDemographics[],
  now: Date
): SilverCustomerDemographics[] {
  return rows.map((row) => ({
    cid: stripLegacyPrefix(row.cid),
    bdate: row.bdate !== null && isAfter(row.bdate, now) ? null : row.bdate,
    gen: toGenderFromWord(row.gen),
  }));
}
