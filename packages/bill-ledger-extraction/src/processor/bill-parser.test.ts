import { describe, expect, it, vi } from "vitest";
import {
  BillTextParser,
  createFallbackBill,
  isDegenerateBill,
  reconcileTotal,
} from "./bill-parser.js";

const fixedNow = () => new Date("2025-03-15T12:00:00Z");

function createLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const GROCERY_RECEIPT = [
  "FRESH MART",
  "123 Main Street",
  "Date: 02/09/2025",
  "Milk 2L  3.99",
  "Whole Wheat Bread  2.50",
  "Apple  2 x 1.50",
  "SUBTOTAL  9.49",
  "TOTAL  9.49",
].join("\n");

describe("BillTextParser", () => {
  it("builds a canonical bill from receipt text", () => {
    const parser = new BillTextParser({ now: fixedNow, logger: createLogger() });

    expect(parser.parse(GROCERY_RECEIPT)).toEqual({
      bill: {
        shopName: "FRESH MART",
        date: "2025-02-09",
        totalAmount: 9.49,
        source: "image",
        items: [
          { name: "Milk 2L", quantity: 1, unitPrice: 3.99, lineTotal: 3.99, category: "Dairy" },
          {
            name: "Whole Wheat Bread",
            quantity: 1,
            unitPrice: 2.5,
            lineTotal: 2.5,
            category: "Grain",
          },
          { name: "Apple", quantity: 2, unitPrice: 1.5, lineTotal: 3, category: "Fruit" },
        ],
      },
      pass: "primary",
      usedFallback: false,
      needsReview: false,
    });
  });

  it("uses a glued grand total line as the total, not as an item", () => {
    const parser = new BillTextParser({ now: fixedNow, logger: createLogger() });

    const result = parser.parse(
      ["Fresh Mart", "Milk 3.99", "Bread 2.50", "GRANDTOTAL 6.49"].join("\n"),
    );

    expect(result.pass).toBe("primary");
    expect(result.bill.items.map((item) => item.name)).toEqual(["Milk", "Bread"]);
    expect(result.bill.totalAmount).toBe(6.49);
  });

  it("returns identical output for identical input", () => {
    const parser = new BillTextParser({ now: fixedNow, logger: createLogger() });

    const first = parser.parse(GROCERY_RECEIPT);
    const second = parser.parse(GROCERY_RECEIPT);

    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });

  it("derives the total from items when none is printed", () => {
    const parser = new BillTextParser({ now: fixedNow, logger: createLogger() });

    const result = parser.parse(
      ["CORNER STORE", "Milk 2L  3.99", "Bread 2 x 2.50", "Apple  5.99"].join("\n"),
    );

    expect(result.bill.totalAmount).toBe(14.98);
    expect(result.bill.date).toBe("2025-03-15");
    expect(result.bill.items.map((item) => item.lineTotal)).toEqual([3.99, 5, 5.99]);
  });

  it("retries with the enhanced profile when too few items are found", () => {
    const logger = createLogger();
    const parser = new BillTextParser({ now: fixedNow, logger });

    const result = parser.parse(
      ["BOOK MARKET", "Coupon Book  4.99", "Exchange Guide  7.50"].join("\n"),
    );

    expect(result.pass).toBe("enhanced");
    expect(result.bill.shopName).toBe("BOOK MARKET");
    expect(result.bill.items.map((item) => item.name)).toEqual(["Coupon Book", "Exchange Guide"]);
    expect(result.bill.totalAmount).toBe(12.49);
    expect(logger.info).toHaveBeenCalledTimes(1);
  });

  it("does not retry when the primary pass meets the threshold", () => {
    const logger = createLogger();
    const parser = new BillTextParser({ now: fixedNow, logger, minItemsBeforeRetry: 1 });

    const result = parser.parse(["CORNER STORE", "Milk 2L  3.99"].join("\n"));

    expect(result.pass).toBe("primary");
    expect(logger.info).not.toHaveBeenCalled();
  });

  it("flags degenerate bills for review without using the fallback", () => {
    const parser = new BillTextParser({ now: fixedNow, logger: createLogger() });

    const result = parser.parse("Hello there, nothing here");

    expect(result.usedFallback).toBe(false);
    expect(result.needsReview).toBe(true);
    expect(result.bill).toEqual({
      shopName: "Hello there, nothing here",
      date: "2025-03-15",
      totalAmount: 0,
      source: "image",
      items: [],
    });
  });

  it("returns the fallback bill for text that is too short", () => {
    const logger = createLogger();
    const parser = new BillTextParser({ now: fixedNow, logger });

    const result = parser.parse("  abc  ");

    expect(result.usedFallback).toBe(true);
    expect(result.pass).toBe("fallback");
    expect(result.needsReview).toBe(true);
    expect(result.bill.shopName).toBe("Sample Store");
    expect(result.bill.totalAmount).toBe(14.98);
    expect(result.bill.date).toBe("2025-03-15");
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("returns the fallback bill when extraction throws", () => {
    const logger = createLogger();
    const now = vi
      .fn<() => Date>()
      .mockImplementationOnce(() => {
        throw new Error("clock unavailable");
      })
      .mockReturnValue(new Date("2025-03-15T12:00:00Z"));
    const parser = new BillTextParser({ now, logger });

    const result = parser.parse(["CORNER STORE", "Milk 2L  3.99", "Bread  2.50"].join("\n"));

    expect(result.usedFallback).toBe(true);
    expect(result.pass).toBe("fallback");
    expect(result.bill.shopName).toBe("Sample Store");
    expect(result.bill.date).toBe("2025-03-15");
    expect(logger.error).toHaveBeenCalledWith(
      "[bill-ledger-extraction] extraction failed: clock unavailable; using fallback bill",
    );
  });

  it("honours a custom price bound", () => {
    const parser = new BillTextParser({ now: fixedNow, logger: createLogger(), maxItemPrice: 3 });

    const result = parser.parse(["CORNER STORE", "Milk 2L  3.99", "Bread  2.50"].join("\n"));

    expect(result.bill.items.map((item) => item.name)).toEqual(["Bread"]);
  });
});

describe("reconcileTotal", () => {
  const items = [
    { name: "Milk", quantity: 1, unitPrice: 3.99, lineTotal: 3.99, category: "Dairy" as const },
    { name: "Bread", quantity: 2, unitPrice: 2.5, lineTotal: 5, category: "Grain" as const },
    { name: "Apple", quantity: 1, unitPrice: 5.99, lineTotal: 5.99, category: "Fruit" as const },
  ];

  it("sums items when the declared total is zero", () => {
    expect(reconcileTotal(0, items)).toBe(14.98);
  });

  it("keeps a declared total", () => {
    expect(reconcileTotal(20, items)).toBe(20);
    expect(reconcileTotal(0, [])).toBe(0);
  });
});

describe("fallback bill", () => {
  it("is fixed apart from the date", () => {
    const bill = createFallbackBill(fixedNow);

    expect(bill.items.map((item) => [item.name, item.quantity, item.lineTotal])).toEqual([
      ["Milk 2L", 1, 3.99],
      ["Bread", 2, 5],
      ["Apple", 1.5, 5.99],
    ]);
    expect(isDegenerateBill(bill)).toBe(false);
  });
});
