import {
  CanonicalBillSchema,
  type CanonicalBill,
  type ExtractedItem,
} from "@bill-ledger/contracts";
import {
  ENHANCED_PROFILE,
  PRIMARY_PROFILE,
  type ExtractionProfile,
} from "./extraction-profiles.js";
import { extractDate, extractShopName, extractTotal } from "./field-extractors.js";
import { DEFAULT_MAX_ITEM_PRICE, extractLineItems } from "./line-item-extractor.js";
import { sumMoney, toIsoDate } from "./normalization.js";
import {
  consoleExtractionLogger,
  type BillDraft,
  type ExtractionLogger,
  type ParsedBill,
} from "./types.js";

export const DEFAULT_MIN_ITEMS_BEFORE_RETRY = 2;
export const MIN_RECOGNIZED_TEXT_LENGTH = 10;
export const FALLBACK_SHOP_NAME = "Sample Store";

const FALLBACK_ITEMS: readonly ExtractedItem[] = [
  { name: "Milk 2L", quantity: 1, unitPrice: 3.99, lineTotal: 3.99, category: "Dairy" },
  { name: "Bread", quantity: 2, unitPrice: 2.5, lineTotal: 5, category: "Grain" },
  { name: "Apple", quantity: 1.5, unitPrice: 3.99, lineTotal: 5.99, category: "Fruit" },
];
const FALLBACK_TOTAL = 14.98;

export type BillTextParserOptions = {
  maxItemPrice?: number;
  minItemsBeforeRetry?: number;
  now?: () => Date;
  logger?: ExtractionLogger;
};

export class BillTextParser {
  private readonly maxItemPrice: number;
  private readonly minItemsBeforeRetry: number;
  private readonly now: () => Date;
  private readonly logger: ExtractionLogger;

  constructor(options: BillTextParserOptions = {}) {
    this.maxItemPrice = options.maxItemPrice ?? DEFAULT_MAX_ITEM_PRICE;
    this.minItemsBeforeRetry = Math.max(
      0,
      options.minItemsBeforeRetry ?? DEFAULT_MIN_ITEMS_BEFORE_RETRY,
    );
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? consoleExtractionLogger;
  }

  parse(rawText: string): ParsedBill {
    const textLength = rawText.trim().length;
    if (textLength < MIN_RECOGNIZED_TEXT_LENGTH) {
      this.logger.warn(
        `[bill-ledger-extraction] recognized text too short (${textLength} chars); ` +
          "using fallback bill",
      );
      return this.fallback();
    }

    try {
      return this.extract(rawText.split(/\r?\n/));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `[bill-ledger-extraction] extraction failed: ${message}; using fallback bill`,
      );
      return this.fallback();
    }
  }

  fallback(): ParsedBill {
    return {
      bill: createFallbackBill(this.now),
      pass: "fallback",
      usedFallback: true,
      needsReview: true,
    };
  }

  private extract(lines: string[]): ParsedBill {
    let draft = this.runPass(lines, PRIMARY_PROFILE);
    let pass: ExtractionProfile["name"] = PRIMARY_PROFILE.name;

    if (draft.items.length < this.minItemsBeforeRetry) {
      this.logger.info(
        `[bill-ledger-extraction] primary pass found ${draft.items.length} items; ` +
          "retrying with enhanced profile",
      );
      const enhanced = this.runPass(lines, ENHANCED_PROFILE);
      if (enhanced.items.length >= draft.items.length) {
        draft = enhanced;
        pass = ENHANCED_PROFILE.name;
      }
    }

    const bill = CanonicalBillSchema.parse({
      shopName: draft.shopName,
      date: draft.date,
      totalAmount: reconcileTotal(draft.totalAmount, draft.items),
      source: "image",
      items: draft.items,
    });

    return {
      bill,
      pass,
      usedFallback: false,
      needsReview: isDegenerateBill(bill),
    };
  }

  private runPass(lines: string[], profile: ExtractionProfile): BillDraft {
    return {
      shopName: extractShopName(lines, profile),
      date: extractDate(lines, this.now),
      totalAmount: extractTotal(lines),
      items: extractLineItems(lines, { profile, maxItemPrice: this.maxItemPrice }),
    };
  }
}

export function reconcileTotal(declaredTotal: number, items: readonly ExtractedItem[]): number {
  if (declaredTotal > 0 || items.length === 0) {
    return declaredTotal;
  }
  return sumMoney(items.map((item) => item.lineTotal));
}

export function isDegenerateBill(bill: CanonicalBill): boolean {
  return bill.items.length === 0 && bill.totalAmount === 0;
}

/**
 * Fixed placeholder used when recognition yields nothing usable. Callers detect it through
 * `ParsedBill.usedFallback`; the shop name is also a recognisable sentinel.
 */
export function createFallbackBill(now: () => Date = () => new Date()): CanonicalBill {
  return {
    shopName: FALLBACK_SHOP_NAME,
    date: toIsoDate(now()),
    totalAmount: FALLBACK_TOTAL,
    source: "image",
    items: FALLBACK_ITEMS.map((item) => ({ ...item })),
  };
}
