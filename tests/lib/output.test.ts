import { describe, expect, it } from "vitest";
import { formatRows, parseFormat } from "../../src/lib/output.js";

const rows = [
  { key: 1, name: "Ada", note: null },
  { key: 2, name: "Grace, H", note: 'say "hi"' },
];

describe("parseFormat", () => {
  it("defaults to table", () => {
    expect(parseFormat(["node", "cli", "db", "tables"])).toBe("table");
  });

  it("reads --format", () => {
    expect(parseFormat(["gold", "show", "dim_customers", "--format", "csv"])).toBe("csv");
  });

  it("lets --json win", () => {
    expect(parseFormat(["--format", "markdown", "--json"])).toBe("json");
  });

  it("falls back to table for an unknown format", () => {
    expect(parseFormat(["--format", "xml"])).toBe("table");
  });
});

describe("formatRows", () => {
  it("renders an aligned table with a row count", () => {
    expect(formatRows(rows, "table")).toBe(
      [
        "key | name     | note    ",
        "----+----------+---------",
        "1   | Ada      |         ",
        '2   | Grace, H | say "hi"',
        "",
        "2 row(s)",
      ].join("\n")
    );
  });

  it("quotes CSV fields that need it", () => {
    expect(formatRows(rows, "csv")).toBe(['key,name,note', "1,Ada,", '2,"Grace, H","say ""hi"""'].join("\n"));
  });

  it("renders markdown", () => {
    expect(formatRows([{ a: "x", bb: 10 }], "markdown")).toBe(["| a | bb |", "| - | -- |", "| x | 10 |"].join("\n"));
  });

  it("renders json", () => {
    expect(JSON.parse(formatRows(rows, "json"))).toEqual(rows);
  });

  it("renders a boxed pretty table with upper-case headers", () => {
    expect(formatRows([{ id: 7 }], "pretty")).toBe(
      ["┌────┐", "│ ID │", "├────┤", "│ 7  │", "└────┘", "1 row(s)"].join("\n")
    );
  });

  it("truncates long pretty values", () => {
    const text = formatRows([{ v: "x".repeat(50) }], "pretty");
    expect(text.split("\n")[3]).toBe(`│ ${"x".repeat(39)}… │`);
  });

  it("has a placeholder for empty results", () => {
    expect(formatRows([], "table")).toBe("(no rows)");
    expect(formatRows([], "markdown")).toBe("*(no rows)*");
    expect(formatRows([], "csv")).toBe("");
  });
});
