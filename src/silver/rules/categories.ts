import type { BronzeCategory, SilverCategory } from "../types.js";

export function transformCategories(rows: readonly BronzeCategory[]): SilverCategory[] {
  return rows.map((row) => ({ ...row }));
}
