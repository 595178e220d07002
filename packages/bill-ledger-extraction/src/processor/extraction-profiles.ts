import { escapeRegExp } from "./categorizer.js";

export type ExtractionProfileName = "primary" | "enhanced";

export type KeywordGlue = "none" | "before" | "both";

export type KeywordPattern = {
  keyword: string;
  regex: RegExp;
};

/**
 * Tuning for one extraction pass. The enhanced profile is the permissive retry used when the
 * primary pass finds too few line items.
 */
export type ExtractionProfile = {
  name: ExtractionProfileName;
  shopScanDepth: number;
  retailIndicators: readonly string[];
  shopLabelWords: readonly KeywordPattern[];
  skipShopLabelLines: boolean;
  noiseKeywords: readonly KeywordPattern[];
  fractionalQuantities: boolean;
};

const RETAIL_INDICATORS = [
  "store",
  "shop",
  "mart",
  "market",
  "supermarket",
  "retail",
  "grocery",
] as const;

const RETAIL_CHAINS = ["costco", "walmart", "target", "safeway", "kroger"] as const;

const SHOP_LABEL_WORDS = ["date", "time", "invoice", "receipt"] as const;

const NOISE_KEYWORDS = [
  "item",
  "description",
  "qty",
  "quantity",
  "price",
  "receipt",
  "invoice",
  "date",
  "time",
  "password",
  "pin",
  "visit",
  "change",
] as const;

// Footer words OCR glues to neighbours ("GRANDTOTAL", "TAXABLE", "THANKYOU").
const GLUED_NOISE_KEYWORDS = [
  "total",
  "tax",
  "thank",
  "signature",
  "tendered",
  "balance",
] as const;

// Glued only on the left ("CREDITCARD", "PAIDCASH"), so "cardamom" and "cashew" stay items.
const SUFFIX_NOISE_KEYWORDS = ["card", "cash"] as const;

const STRICT_NOISE_KEYWORDS = [
  "cashier",
  "register",
  "discount",
  "coupon",
  "voucher",
  "refund",
  "return",
  "exchange",
  "void",
  "cancelled",
  "transaction",
] as const;

export const PRIMARY_PROFILE: ExtractionProfile = {
  name: "primary",
  shopScanDepth: 10,
  retailIndicators: [...RETAIL_INDICATORS, ...RETAIL_CHAINS],
  shopLabelWords: compileKeywords(SHOP_LABEL_WORDS),
  skipShopLabelLines: false,
  noiseKeywords: [
    ...compileNoiseKeywords(),
    ...compileKeywords(STRICT_NOISE_KEYWORDS),
  ],
  fractionalQuantities: true,
};

export const ENHANCED_PROFILE: ExtractionProfile = {
  name: "enhanced",
  shopScanDepth: 15,
  retailIndicators: RETAIL_INDICATORS,
  shopLabelWords: compileKeywords([...SHOP_LABEL_WORDS, "total", "subtotal"]),
  skipShopLabelLines: true,
  noiseKeywords: compileNoiseKeywords(),
  fractionalQuantities: false,
};

/**
 * Keyword patterns that tolerate a plural suffix and digits glued on by OCR ("TOTAL45.67").
 * `glue` says which sides may also touch letters: with "none", "pin" does not match "spinach".
 */
export function compileKeywords(
  keywords: readonly string[],
  glue: KeywordGlue = "none",
): KeywordPattern[] {
  const before = glue === "none" ? "(?<![a-z])" : "";
  const after = glue === "both" ? "" : "(?:s|es)?(?![a-z])";
  return keywords.map((keyword) => ({
    keyword,
    regex: new RegExp(`${before}${escapeRegExp(keyword)}${after}`),
  }));
}

function compileNoiseKeywords(): KeywordPattern[] {
  return [
    ...compileKeywords(NOISE_KEYWORDS),
    ...compileKeywords(GLUED_NOISE_KEYWORDS, "both"),
    ...compileKeywords(SUFFIX_NOISE_KEYWORDS, "before"),
  ];
}

export function containsAnyKeyword(
  loweredLine: string,
  patterns: readonly KeywordPattern[],
): boolean {
  return patterns.some((pattern) => pattern.regex.test(loweredLine));
}
