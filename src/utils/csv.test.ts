import { describe, expect, it } from "vitest";
import { formatCsvDate, formatFileDate, toCsv } from "./csv";

describe("toCsv", () => {
  it("joins rows with CRLF and quotes cells that need it", () => {
    expect(
      toCsv([
        ["Order ID", "Product"],
        [7, 'Basmati Rice, 5kg "Premium"'],
      ])
    ).toBe('Order ID,Product\r\n7,"Basmati Rice, 5kg ""Premium"""\r\n');
  });
});

describe("date formatting", () => {
  const date = new Date(Date.UTC(2024, 2, 5, 14, 7, 30));

  it("formats row dates in UTC to the minute", () => {
    expect(formatCsvDate(date)).toBe("2024-03-05 14:07");
  });

  it("formats file dates without separators", () => {
    expect(formatFileDate(date)).toBe("20240305");
  });
});
