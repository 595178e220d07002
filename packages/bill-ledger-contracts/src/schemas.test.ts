import { describe, expect, it } from "vitest";
import {
  BillCategorySchema,
  BillListQuerySchema,
  CanonicalBillSchema,
  CsvBillUploadResponseSchema,
  DuplicateBillResponseSchema,
  ExtractedItemSchema,
  ImageBillUploadRequestSchema,
  MonthlyAnalysisQuerySchema,
} from "./schemas.js";

describe("bill ledger contract schemas", () => {
  it("keeps the category taxonomy in its fixed priority order", () => {
    expect(BillCategorySchema.options[0]).toBe("Dairy");
    expect(BillCategorySchema.options[4]).toBe("Meat & Seafood");
    expect(BillCategorySchema.options.at(-1)).toBe("Uncategorized");
    expect(BillCategorySchema.options).toHaveLength(16);
  });

  it("validates a canonical bill with items", () => {
    const parsed = CanonicalBillSchema.parse({
      shopName: "Fresh Market",
      date: "2025-09-02",
      totalAmount: 14.98,
      source: "image",
      items: [
        { name: "Milk 2L", quantity: 1, unitPrice: 3.99, lineTotal: 3.99, category: "Dairy" },
      ],
    });

    expect(parsed.items[0]?.category).toBe("Dairy");
  });

  it("trims item names and rejects empty ones", () => {
    const trimmed = ExtractedItemSchema.parse({
      name: "  Bread ",
      quantity: 2,
      unitPrice: 2.5,
      lineTotal: 5,
      category: "Grain",
    });
    expect(trimmed.name).toBe("Bread");

    const empty = ExtractedItemSchema.safeParse({
      name: "   ",
      quantity: 1,
      unitPrice: 1,
      lineTotal: 1,
      category: "Grain",
    });
    expect(empty.success).toBe(false);
  });

  it("rejects non-positive quantities and unknown categories", () => {
    expect(
      ExtractedItemSchema.safeParse({
        name: "Rice",
        quantity: 0,
        unitPrice: 1,
        lineTotal: 0,
        category: "Grain",
      }).success,
    ).toBe(false);

    expect(
      ExtractedItemSchema.safeParse({
        name: "Rice",
        quantity: 1,
        unitPrice: 1,
        lineTotal: 1,
        category: "grain",
      }).success,
    ).toBe(false);
  });

  it("rejects line totals that disagree with unit price and quantity", () => {
    const item = { name: "Milk", quantity: 2, unitPrice: 3, category: "Dairy" };

    const mismatch = ExtractedItemSchema.safeParse({ ...item, lineTotal: 10 });
    expect(mismatch.success).toBe(false);
    expect(mismatch.error?.issues[0]?.path).toEqual(["lineTotal"]);

    expect(ExtractedItemSchema.safeParse({ ...item, lineTotal: 6 }).success).toBe(true);
    expect(
      ExtractedItemSchema.safeParse({
        name: "Soap",
        quantity: 6,
        unitPrice: 1.67,
        lineTotal: 10,
        category: "Body soap",
      }).success,
    ).toBe(true);
  });

  it("rejects bills with malformed dates or unknown sources", () => {
    const base = {
      shopName: "Acme",
      totalAmount: 0,
      items: [],
    };

    expect(
      CanonicalBillSchema.safeParse({ ...base, date: "09/02/2025", source: "csv" }).success,
    ).toBe(false);
    expect(
      CanonicalBillSchema.safeParse({ ...base, date: "2025-09-02", source: "email" }).success,
    ).toBe(false);
  });

  it("requires image uploads to be image data urls", () => {
    expect(
      ImageBillUploadRequestSchema.safeParse({ imageDataUrl: "data:image/png;base64,AAAA" })
        .success,
    ).toBe(true);
    expect(
      ImageBillUploadRequestSchema.safeParse({ imageDataUrl: "data:text/csv;base64,AAAA" })
        .success,
    ).toBe(false);
  });

  it("coerces month/year query strings", () => {
    expect(BillListQuerySchema.parse({ month: "3", year: "2025" })).toEqual({
      month: 3,
      year: 2025,
    });
    expect(BillListQuerySchema.parse({})).toEqual({});
    expect(MonthlyAnalysisQuerySchema.safeParse({ month: "13", year: "2025" }).success).toBe(
      false,
    );
    expect(MonthlyAnalysisQuerySchema.safeParse({ year: "2025" }).success).toBe(false);
  });

  it("validates duplicate and csv upload responses", () => {
    const duplicate = DuplicateBillResponseSchema.parse({
      error: "duplicate_bill",
      message: "Duplicate bill detected. This bill already exists.",
      existingBillId: "bill_1",
      shopName: "Acme",
      date: "2025-01-05",
      totalAmount: 12.5,
    });
    expect(duplicate.existingBillId).toBe("bill_1");

    const upload = CsvBillUploadResponseSchema.parse({
      billsCreated: 1,
      bills: [{ billId: "bill_2", shopName: "Acme", date: "2025-01-05", itemCount: 2 }],
      duplicates: [],
      errors: ["Row 4: invalid quantity 'abc'"],
    });
    expect(upload.errors).toHaveLength(1);
  });
});
