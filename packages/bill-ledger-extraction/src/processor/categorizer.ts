import { readFileSync } from "node:fs";
import { BillCategorySchema, type BillCategory } from "@bill-ledger/contracts";
import { z } from "zod";

const CategoryKeywordTableSchema = z
  .array(
    z.object({
      category: BillCategorySchema.exclude(["Uncategorized"]),
      keywords: z.array(z.string().trim().toLowerCase().min(1)).min(1),
    }),
  )
  .min(1);

type KeywordMatcher = {
  keyword: string;
  matches: (loweredName: string) => boolean;
};

export type CategoryRule = {
  category: BillCategory;
  matchers: KeywordMatcher[];
};

const SENSITIVE_WORD_REGEX = /\b(?:password|pin)\b/;
const DATE_LIKE_REGEX = /^\d{1,2}[/-]\d{1,2}[/-]\d{2,4}/;
const QUANTITY_SHORTHAND_REGEX = /^\d+(?:\.\d+)?x/i;

export const CATEGORY_RULES: readonly CategoryRule[] = loadCategoryRules();

export function categorize(itemName: string): BillCategory {
  const lowered = itemName.trim().toLowerCase();
  if (isUncategorizable(lowered)) {
    return "Uncategorized";
  }

  for (const rule of CATEGORY_RULES) {
    if (rule.matchers.some((matcher) => matcher.matches(lowered))) {
      return rule.category;
    }
  }

  return "Uncategorized";
}

/**
 * Maps a free-text category label (as typed into a spreadsheet) onto the taxonomy.
 * Returns null when the label names no known category.
 */
export function resolveCategoryLabel(label: string | undefined): BillCategory | null {
  const lowered = label?.trim().toLowerCase();
  if (!lowered) {
    return null;
  }

  return BillCategorySchema.options.find((category) => category.toLowerCase() === lowered) ?? null;
}

function isUncategorizable(lowered: string): boolean {
  if (lowered.length < 2) {
    return true;
  }

  return (
    /^\d+$/.test(lowered.replace(/[.,]/g, "")) ||
    DATE_LIKE_REGEX.test(lowered) ||
    QUANTITY_SHORTHAND_REGEX.test(lowered) ||
    SENSITIVE_WORD_REGEX.test(lowered)
  );
}

function loadCategoryRules(): CategoryRule[] {
  const raw = readFileSync(new URL("../data/category-keywords.json", import.meta.url), "utf8");
  const table = CategoryKeywordTableSchema.parse(JSON.parse(raw));

  return table.map((entry) => ({
    category: entry.category,
    matchers: orderKeywords(entry.keywords).map(toMatcher),
  }));
}

// Phrases first, then single words; longest first within each group.
export function orderKeywords(keywords: string[]): string[] {
  const byLengthDesc = (a: string, b: string) => b.length - a.length;
  const phrases = keywords.filter((keyword) => keyword.includes(" ")).sort(byLengthDesc);
  const words = keywords.filter((keyword) => !keyword.includes(" ")).sort(byLengthDesc);
  return [...new Set([...phrases, ...words])];
}

function toMatcher(keyword: string): KeywordMatcher {
  if (keyword.includes(" ")) {
    return { keyword, matches: (loweredName) => loweredName.includes(keyword) };
  }

  const pattern = new RegExp(`\\b${escapeRegExp(keyword)}\\b`);
  return { keyword, matches: (loweredName) => pattern.test(loweredName) };
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
