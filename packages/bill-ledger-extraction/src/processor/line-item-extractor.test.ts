import { describe, expect, it } from "vitest";
import { ENHANCED_PROFILE, PRIMARY_PROFILE } from "./extraction-profiles.js";
import { extractLineItems } from "./line-item-extractor.js";

describe("extractLineItems", () => {
  it("reads a name followed by a price", () => {
    expect(extractLineItems(["Milk 2L  3.99"])).toEqual([
      { name: "Milk 2L", quantity: 1, unitPrice: 3.99, lineTotal: 3.99, category: "Dairy" },
    ]);
  });

  it("reads count x price lines", () => {
    expect(extractLineItems(["Apple  2 x 1.50"])).toEqual([
      { name: "Apple", quantity: 2, unitPrice: 1.5, lineTotal: 3, category: "Fruit" },
    ]);
  });

  it("reads x-prefixed quantities", () => {
    expect(extractLineItems(["Eggs x2 3.00"])).toEqual([
      { name: "Eggs", quantity: 2, unitPrice: 3, lineTotal: 6, category: "Uncategorized" },
    ]);
  });

  it("reads a trailing x-quantity as a quantity, not part of the name", () => {
    expect(extractLineItems(["Eggs x12 3.99"])).toEqual([
      { name: "Eggs", quantity: 12, unitPrice: 3.99, lineTotal: 47.88, category: "Uncategorized" },
    ]);
  });

  it("accepts a currency marker before the price", () => {
    expect(extractLineItems(["Basmati Rice $12.49"])).toEqual([
      { name: "Basmati Rice", quantity: 1, unitPrice: 12.49, lineTotal: 12.49, category: "Grain" },
    ]);
  });

  it("drops noise lines", () => {
    expect(
      extractLineItems([
        "TOTAL  45.67",
        "Subtotal 40.00",
        "Cashier: Dana 12.00",
        "2x $5",
        "5.99",
        "ok",
        "",
      ]),
    ).toEqual([]);
  });

  it("drops footer lines whose keywords OCR glued to other words", () => {
    const lines = ["GRANDTOTAL 45.67", "TAXABLE AMT 3.20", "THANKYOU 1.00", "CREDITCARD 45.67"];

    expect(extractLineItems(lines, { profile: PRIMARY_PROFILE })).toEqual([]);
    expect(extractLineItems(lines, { profile: ENHANCED_PROFILE })).toEqual([]);
  });

  it("keeps items that start with a card or cash prefix", () => {
    const items = extractLineItems(["Cardamom Pods  4.50", "Cashew Nuts  6.25"]);

    expect(items.map((item) => [item.name, item.lineTotal])).toEqual([
      ["Cardamom Pods", 4.5],
      ["Cashew Nuts", 6.25],
    ]);
  });

  it("keeps items whose names merely contain a noise word", () => {
    expect(extractLineItems(["Spinach  2.49"])).toEqual([
      { name: "Spinach", quantity: 1, unitPrice: 2.49, lineTotal: 2.49, category: "Vegetable" },
    ]);
  });

  it("drops items outside the price bounds", () => {
    expect(extractLineItems(["Television  5000.00"])).toEqual([]);
    expect(extractLineItems(["Free Sample  0.00"])).toEqual([]);
    expect(extractLineItems(["Blender  250.00"], { maxItemPrice: 200 })).toEqual([]);
  });

  it("requires cents when no quantity is present", () => {
    expect(extractLineItems(["Aisle 12 100"])).toEqual([]);
  });

  it("rejects names that look like dates or numbers", () => {
    expect(extractLineItems(["12/05 4.99", "1234 5.00"])).toEqual([]);
  });

  it("accepts fractional quantities only in the primary profile", () => {
    const line = "Banana x1.5 2.00";
    expect(extractLineItems([line], { profile: PRIMARY_PROFILE })).toEqual([
      { name: "Banana", quantity: 1.5, unitPrice: 2, lineTotal: 3, category: "Fruit" },
    ]);
    expect(extractLineItems([line], { profile: ENHANCED_PROFILE })).toEqual([]);
  });

  it("uses the lighter noise list in the enhanced profile", () => {
    const line = "Discount Voucher 5.00";
    expect(extractLineItems([line], { profile: PRIMARY_PROFILE })).toEqual([]);
    expect(extractLineItems([line], { profile: ENHANCED_PROFILE })).toEqual([
      {
        name: "Discount Voucher",
        quantity: 1,
        unitPrice: 5,
        lineTotal: 5,
        category: "Uncategorized",
      },
    ]);
  });

  it("keeps document order", () => {
    const items = extractLineItems(["Bread  2.50", "Butter  4.25", "Cheddar  6.10"]);
    expect(items.map((item) => item.name)).toEqual(["Bread", "Butter", "Cheddar"]);
  });
});
