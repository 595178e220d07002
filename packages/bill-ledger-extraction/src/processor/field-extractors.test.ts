import { describe, expect, it } from "vitest";
import { ENHANCED_PROFILE, PRIMARY_PROFILE } from "./extraction-profiles.js";
import { extractDate, extractShopName, extractTotal, findDate } from "./field-extractors.js";

const fixedNow = () => new Date("2025-03-15T12:00:00Z");

describe("findDate", () => {
  it("defaults ambiguous numeric dates to month-first", () => {
    expect(findDate(["02/09/2025"])).toBe("2025-02-09");
  });

  it("reads four-digit leading years as year-month-day", () => {
    expect(findDate(["2025-09-02"])).toBe("2025-09-02");
    expect(findDate(["Printed 2024/11/30 18:04"])).toBe("2024-11-30");
  });

  it("switches to day-first when the first part cannot be a month", () => {
    expect(findDate(["29/03/25"])).toBe("2025-03-29");
  });

  it("parses textual month dates", () => {
    expect(findDate(["December 25, 2024"])).toBe("2024-12-25");
    expect(findDate(["Sept 5, 2024 10:31"])).toBe("2024-09-05");
  });

  it("takes the first parseable date in document order", () => {
    expect(findDate(["FRESH MART", "Date: 01/02/2025", "Due 03/04/2025"])).toBe("2025-01-02");
  });

  it("returns null when nothing parses", () => {
    expect(findDate(["13/13/2025", "Smarch 40, 2025", "no date here"])).toBeNull();
  });
});

describe("extractDate", () => {
  it("falls back to the injected clock", () => {
    expect(extractDate(["no date here"], fixedNow)).toBe("2025-03-15");
    expect(extractDate(["02/09/2025"], fixedNow)).toBe("2025-02-09");
  });
});

describe("extractTotal", () => {
  it("reads a labeled total and ignores subtotal", () => {
    expect(extractTotal(["Subtotal 10.00", "Tax 0.80", "Total: $10.80"])).toBe(10.8);
  });

  it("reads totals whose label OCR glued together", () => {
    expect(extractTotal(["SUBTOTAL 40.00", "GRANDTOTAL 45.67"])).toBe(45.67);
    expect(extractTotal(["AMOUNTDUE $12.30"])).toBe(12.3);
  });

  it("handles thousands separators", () => {
    expect(extractTotal(["GRAND TOTAL 1,234.56"])).toBe(1234.56);
    expect(extractTotal(["Amount due 1234.56"])).toBe(1234.56);
  });

  it("falls back to a currency-marked amount", () => {
    expect(extractTotal(["Paid $25.00"])).toBe(25);
  });

  it("only scans the last ten lines", () => {
    const lines = ["Total 5.00", ...Array.from({ length: 10 }, (_, index) => `line ${index}`)];
    expect(extractTotal(lines)).toBe(0);
  });

  it("returns 0 when no total is present", () => {
    expect(extractTotal(["Milk 2L  3.99"])).toBe(0);
    expect(extractTotal(["Total 0.00"])).toBe(0);
  });
});

describe("extractShopName", () => {
  it("returns the first line with a retail indicator", () => {
    expect(extractShopName(["Receipt #123", "Sunrise Grocery Co", "Milk 3.99"])).toBe(
      "Sunrise Grocery Co",
    );
  });

  it("prefers a later retail indicator over an earlier fallback candidate", () => {
    expect(extractShopName(["Joe's Corner", "42 Elm Road", "Family Mart"])).toBe("Family Mart");
  });

  it("uses the first long non-label line when no indicator is found", () => {
    expect(extractShopName(["Date 01/02", "Joe's Corner", "Milk 3.99"])).toBe("Joe's Corner");
  });

  it("returns Unknown Shop when nothing qualifies", () => {
    expect(extractShopName(["abc", "12", ""])).toBe("Unknown Shop");
  });

  it("skips metadata lines outright in the enhanced profile", () => {
    const lines = ["Receipt Store 42", "Corner Shop"];
    expect(extractShopName(lines, PRIMARY_PROFILE)).toBe("Receipt Store 42");
    expect(extractShopName(lines, ENHANCED_PROFILE)).toBe("Corner Shop");
  });

  it("scans deeper in the enhanced profile", () => {
    const lines = [...Array.from({ length: 12 }, () => "..."), "Harbor Market"];
    expect(extractShopName(lines, PRIMARY_PROFILE)).toBe("Unknown Shop");
    expect(extractShopName(lines, ENHANCED_PROFILE)).toBe("Harbor Market");
  });
});
