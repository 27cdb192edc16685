/**
 * Standardized value sets written to Silver. Gold reads these without further
 * validation, so every mapping ends in its `N/A` variant.
 */

export const NOT_AVAILABLE = "N/A";

export const MARITAL_STATUSES = ["Single", "Married", NOT_AVAILABLE] as const;
export type MaritalStatus = (typeof MARITAL_STATUSES)[number];

export const GENDERS = ["Male", "Female", NOT_AVAILABLE] as const;
export type Gender = (typeof GENDERS)[number];

export const PRODUCT_LINES = ["Mountain", "Road", "Other Sales", "Touring", NOT_AVAILABLE] as const;
export type ProductLine = (typeof PRODUCT_LINES)[number];

export const STANDARD_COUNTRIES = ["Germany", "United States", NOT_AVAILABLE] as const;
export type StandardCountry = (typeof STANDARD_COUNTRIES)[number];

/** Either a standardized name or a source country kept as-is (trimmed). */
export type Country = StandardCountry | (string & {});

/** Trim leading and trailing spaces only, leaving tabs and newlines alone. */
export function trimBlanks(value: string): string {
  return value.replace(/^ +| +$/g, "");
}

/** Upper-cased, blank-trimmed code, or null. */
function normalizeCode(value: string | null): string | null {
  return value === null ? null : trimBlanks(value).toUpperCase();
}

export function toMaritalStatus(code: string | null): MaritalStatus {
  switch (normalizeCode(code)) {
    case "S":
      return "Single";
    case "M":
      return "Married";
    default:
      return NOT_AVAILABLE;
  }
}

/** CRM gender codes: single letters only. */
export function toGender(code: string | null): Gender {
  switch (normalizeCode(code)) {
    case "F":
      return "Female";
    case "M":
      return "Male";
    default:
      return NOT_AVAILABLE;
  }
}

/** ERP gender values: letters or full words. */
export function toGenderFromWord(value: string | null): Gender {
  switch (normalizeCode(value)) {
    case "F":
    case "FEMALE":
      return "Female";
    case "M":
    case "MALE":
      return "Male";
    default:
      return NOT_AVAILABLE;
  }
}

export function toProductLine(code: string | null): ProductLine {
  switch (normalizeCode(code)) {
    case "M":
      return "Mountain";
    case "R":
      return "Road";
    case "S":
      return "Other Sales";
    case "T":
      return "Touring";
    default:
      return NOT_AVAILABLE;
  }
}

/** `DE` matches exactly; `US`/`USA` in any case; blanks become N/A. */
export function toCountry(value: string | null): Country {
  if (value === null) return NOT_AVAILABLE;
  const trimmed = trimBlanks(value);
  if (trimmed === "DE") return "Germany";
  const upper = trimmed.toUpperCase();
  if (upper === "US" || upper === "USA") return "United States";
  if (trimmed === "") return NOT_AVAILABLE;
  return trimmed;
}
