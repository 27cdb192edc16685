import { describe, it, expect } from "vitest";
import { addDays, isAfter, isValidCalendarDate, parsePackedDate, truncateToDate } from "../../src/silver/dates.js";

describe("parsePackedDate", () => {
  it("decodes an eight-digit integer", () => {
    expect(parsePackedDate(20220105)).toBe("2022-01-05");
  });

  it("returns null for zero, null and wrong lengths", () => {
    expect(parsePackedDate(0)).toBeNull();
    expect(parsePackedDate(null)).toBeNull();
    expect(parsePackedDate(2022031)).toBeNull();
    expect(parsePackedDate(202203150)).toBeNull();
  });

  it("returns null for negative and fractional values", () => {
    expect(parsePackedDate(-2022031)).toBeNull();
    expect(parsePackedDate(2022010.5)).toBeNull();
  });

  it("returns null for impossible calendar dates", () => {
    expect(parsePackedDate(20221332)).toBeNull();
    expect(parsePackedDate(20230229)).toBeNull();
    expect(parsePackedDate(20240229)).toBe("2024-02-29");
  });
});

describe("truncateToDate", () => {
  it("keeps the day part of a timestamp", () => {
    expect(truncateToDate("2021-07-01 13:45:00")).toBe("2021-07-01");
    expect(truncateToDate("2021-07-01")).toBe("2021-07-01");
  });

  it("returns null for null or malformed text", () => {
    expect(truncateToDate(null)).toBeNull();
    expect(truncateToDate("07/01/2021")).toBeNull();
    expect(truncateToDate("2021-02-30")).toBeNull();
  });
});

describe("addDays", () => {
  it("steps back across month and year boundaries", () => {
    expect(addDays("2021-07-01", -1)).toBe("2021-06-30");
    expect(addDays("2022-01-01", -1)).toBe("2021-12-31");
    expect(addDays("2024-03-01", -1)).toBe("2024-02-29");
  });

  it("keeps two-digit years literal", () => {
    expect(addDays("0050-01-01", -1)).toBe("0049-12-31");
  });
});

describe("isAfter", () => {
  const now = new Date("2024-06-15T12:00:00Z");

  it("compares UTC midnight of the date against now", () => {
    expect(isAfter("2024-06-16", now)).toBe(true);
    expect(isAfter("2024-06-15", now)).toBe(false);
    expect(isAfter("1990-01-01", now)).toBe(false);
  });
});

describe("isValidCalendarDate", () => {
  it("knows leap years", () => {
    expect(isValidCalendarDate(2000, 2, 29)).toBe(true);
    expect(isValidCalendarDate(1900, 2, 29)).toBe(false);
  });
});
