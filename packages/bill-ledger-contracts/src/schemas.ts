import { z } from "zod";

export const BillCategorySchema = z.enum([
  "Dairy",
  "Grain",
  "Fruit",
  "Vegetable",
  "Meat & Seafood",
  "Herb",
  "Daal",
  "Paste",
  "Pooja item",
  "Snacks",
  "Syrup",
  "Body soap",
  "Household",
  "Beverages",
  "Personal Care",
  "Uncategorized",
]);

export const BillSourceSchema = z.enum(["image", "csv"]);
export const ExtractionPassSchema = z.enum(["primary", "enhanced", "fallback"]);

export const IdSchema = z.string().min(1).max(128);
export const IsoDateSchema = z.iso.date();
export const MoneySchema = z.number().nonnegative();

/**
 * A unit price rounded to cents may be off by half a cent per unit, so the tolerance grows with
 * the quantity but is never below one cent.
 */
export function isConsistentLineTotal(item: {
  quantity: number;
  unitPrice: number;
  lineTotal: number;
}): boolean {
  const tolerance = Math.max(0.01, 0.005 * item.quantity);
  return Math.abs(item.unitPrice * item.quantity - item.lineTotal) <= tolerance + 1e-9;
}

export const ExtractedItemSchema = z
  .object({
    name: z.string().trim().min(1).max(200),
    quantity: z.number().positive(),
    unitPrice: MoneySchema,
    lineTotal: MoneySchema,
    category: BillCategorySchema,
  })
  .refine(isConsistentLineTotal, {
    message: "lineTotal must equal unitPrice x quantity",
    path: ["lineTotal"],
  });

export const CanonicalBillSchema = z.object({
  shopName: z.string().trim().min(1).max(200),
  date: IsoDateSchema,
  totalAmount: MoneySchema,
  source: BillSourceSchema,
  items: z.array(ExtractedItemSchema),
});

export const DuplicateKeySchema = CanonicalBillSchema.pick({
  shopName: true,
  date: true,
  totalAmount: true,
});

export const StoredBillSchema = CanonicalBillSchema.extend({
  billId: IdSchema,
  createdAt: z.iso.datetime(),
});

export const ExtractionSummarySchema = z.object({
  pass: ExtractionPassSchema,
  usedFallback: z.boolean(),
  needsReview: z.boolean(),
});

export const HealthResponseSchema = z.object({
  ok: z.literal(true),
  service: z.string().min(1),
  now: z.iso.datetime(),
});

export const ImageBillUploadRequestSchema = z.object({
  imageDataUrl: z.string().startsWith("data:image/").max(20_000_000),
  filename: z.string().min(1).max(255).optional(),
});

export const TextBillUploadRequestSchema = z.object({
  ocrText: z.string().max(20000),
});

export const BillCreatedResponseSchema = z.object({
  billId: IdSchema,
  bill: CanonicalBillSchema,
  extraction: ExtractionSummarySchema,
});

export const DuplicateBillResponseSchema = z.object({
  error: z.literal("duplicate_bill"),
  message: z.string().min(1),
  existingBillId: IdSchema,
  shopName: z.string().min(1),
  date: IsoDateSchema,
  totalAmount: MoneySchema,
});

export const CsvBillUploadRequestSchema = z.object({
  csvText: z.string().min(1).max(5_000_000),
});

export const CsvBillCreatedSchema = z.object({
  billId: IdSchema,
  shopName: z.string().min(1),
  date: IsoDateSchema,
  itemCount: z.number().int().min(0),
});

export const CsvBillUploadResponseSchema = z.object({
  billsCreated: z.number().int().min(0),
  bills: z.array(CsvBillCreatedSchema),
  duplicates: z.array(z.string()),
  errors: z.array(z.string()),
});

const MonthSchema = z.coerce.number().int().min(1).max(12);
const YearSchema = z.coerce.number().int().min(1900).max(9999);

export const BillListQuerySchema = z.object({
  month: MonthSchema.optional(),
  year: YearSchema.optional(),
});

export const BillListResponseSchema = z.object({
  bills: z.array(StoredBillSchema),
});

export const DeleteBillsResponseSchema = z.object({
  billsDeleted: z.number().int().min(0),
  lineItemsDeleted: z.number().int().min(0),
});

export const MonthlyAnalysisQuerySchema = z.object({
  month: MonthSchema,
  year: YearSchema,
});

export const ShopSpendSchema = z.object({
  shopName: z.string().min(1),
  billCount: z.number().int().min(0),
  totalSpent: MoneySchema,
});

export const CategorySpendSchema = z.object({
  category: BillCategorySchema,
  itemCount: z.number().int().min(0),
  totalSpent: MoneySchema,
});

export const TopItemSchema = z.object({
  itemName: z.string().min(1),
  totalQuantity: z.number().nonnegative(),
  totalSpent: MoneySchema,
  purchaseCount: z.number().int().min(0),
});

export const MonthlyAnalysisResponseSchema = z.object({
  month: z.number().int().min(1).max(12),
  year: z.number().int(),
  totalBills: z.number().int().min(0),
  totalSpent: MoneySchema,
  shops: z.array(ShopSpendSchema),
  categories: z.array(CategorySpendSchema),
  topItems: z.array(TopItemSchema).max(20),
});

export const SpendSummaryResponseSchema = z.object({
  totalBills: z.number().int().min(0),
  totalSpent: MoneySchema,
  uniqueShops: z.number().int().min(0),
  totalItems: z.number().int().min(0),
  avgBillAmount: MoneySchema,
  filter: z.object({
    month: z.number().int().nullable(),
    year: z.number().int().nullable(),
  }),
});

export type BillCategory = z.infer<typeof BillCategorySchema>;
export type BillSource = z.infer<typeof BillSourceSchema>;
export type ExtractionPass = z.infer<typeof ExtractionPassSchema>;
export type ExtractedItem = z.infer<typeof ExtractedItemSchema>;
export type CanonicalBill = z.infer<typeof CanonicalBillSchema>;
export type DuplicateKey = z.infer<typeof DuplicateKeySchema>;
export type StoredBill = z.infer<typeof StoredBillSchema>;
export type ExtractionSummary = z.infer<typeof ExtractionSummarySchema>;
export type HealthResponse = z.infer<typeof HealthResponseSchema>;
export type ImageBillUploadRequest = z.infer<typeof ImageBillUploadRequestSchema>;
export type TextBillUploadRequest = z.infer<typeof TextBillUploadRequestSchema>;
export type BillCreatedResponse = z.infer<typeof BillCreatedResponseSchema>;
export type DuplicateBillResponse = z.infer<typeof DuplicateBillResponseSchema>;
export type CsvBillUploadRequest = z.infer<typeof CsvBillUploadRequestSchema>;
export type CsvBillCreated = z.infer<typeof CsvBillCreatedSchema>;
export type CsvBillUploadResponse = z.infer<typeof CsvBillUploadResponseSchema>;
export type BillListQuery = z.infer<typeof BillListQuerySchema>;
export type BillListResponse = z.infer<typeof BillListResponseSchema>;
export type DeleteBillsResponse = z.infer<typeof DeleteBillsResponseSchema>;
export type MonthlyAnalysisQuery = z.infer<typeof MonthlyAnalysisQuerySchema>;
export type ShopSpend = z.infer<typeof ShopSpendSchema>;
export type CategorySpend = z.infer<typeof CategorySpendSchema>;
export type TopItem = z.infer<typeof TopItemSchema>;
export type MonthlyAnalysisResponse = z.infer<typeof MonthlyAnalysisResponseSchema>;
export type SpendSummaryResponse = z.infer<typeof SpendSummaryResponseSchema>;
