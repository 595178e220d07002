import {
  containsAnyKeyword,
  PRIMARY_PROFILE,
  type ExtractionProfile,
} from "./extraction-profiles.js";
import { buildIsoDate, clampName, toIsoDate, UNKNOWN_SHOP } from "./normalization.js";

const MIN_SHOP_LINE_LENGTH = 4;
const MIN_FALLBACK_SHOP_LENGTH = 6;
const TOTAL_SCAN_DEPTH = 10;

const MONTH_NAMES = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
] as const;

const AMOUNT = String.raw`(\d{1,3}(?:,\d{3})+(?:\.\d{2})?|\d+(?:\.\d{2})?)`;

const LABELED_TOTAL_REGEX = new RegExp(
  String.raw`(?<![a-z])(?:grand\s*total|total|amount\s*due|balance)(?![a-z])[:\s]*\$?\s*${AMOUNT}`,
  "i",
);
const CURRENCY_TOTAL_REGEX = new RegExp(
  String.raw`\$\s*${AMOUNT}\s*(?:total|due|amount)?`,
  "i",
);

type DatePattern = {
  regex: RegExp;
  toIsoDate: (groups: [string, string, string]) => string | null;
};

const DATE_PATTERNS: readonly DatePattern[] = [
  {
    // DD/MM/YY(YY) or MM/DD/YY(YY); month-first unless the first part cannot be a month.
    regex: /(?<!\d)(\d{1,2})[/-](\d{1,2})[/-](\d{4}|\d{2})(?!\d)/,
    toIsoDate: ([first, second, year]) => {
      const firstValue = Number.parseInt(first, 10);
      const secondValue = Number.parseInt(second, 10);
      const fullYear = Number.parseInt(year.length === 2 ? `20${year}` : year, 10);
      return firstValue > 12
        ? buildIsoDate(fullYear, secondValue, firstValue)
        : buildIsoDate(fullYear, firstValue, secondValue);
    },
  },
  {
    regex: /(?<!\d)(\d{4})[/-](\d{1,2})[/-](\d{1,2})(?!\d)/,
    toIsoDate: ([year, month, day]) =>
      buildIsoDate(Number.parseInt(year, 10), Number.parseInt(month, 10), Number.parseInt(day, 10)),
  },
  {
    regex: /\b([A-Za-z]{3,9})\.?\s+(\d{1,2}),\s+(\d{4})\b/,
    toIsoDate: ([monthName, day, year]) => {
      const month = monthFromName(monthName);
      if (month === null) {
        return null;
      }
      return buildIsoDate(Number.parseInt(year, 10), month, Number.parseInt(day, 10));
    },
  },
];

export function extractShopName(
  lines: readonly string[],
  profile: ExtractionProfile = PRIMARY_PROFILE,
): string {
  let fallback: string | null = null;

  for (const rawLine of lines.slice(0, profile.shopScanDepth)) {
    const line = rawLine.trim();
    if (line.length < MIN_SHOP_LINE_LENGTH) {
      continue;
    }

    const lowered = line.toLowerCase();
    const isLabel = containsAnyKeyword(lowered, profile.shopLabelWords);
    if (isLabel && profile.skipShopLabelLines) {
      continue;
    }

    if (profile.retailIndicators.some((indicator) => lowered.includes(indicator))) {
      return clampName(line);
    }

    if (fallback === null && line.length >= MIN_FALLBACK_SHOP_LENGTH && !isLabel) {
      fallback = clampName(line);
    }
  }

  return fallback ?? UNKNOWN_SHOP;
}

/**
 * First parseable date in document order, as `YYYY-MM-DD`, or null.
 */
export function findDate(lines: readonly string[]): string | null {
  for (const line of lines) {
    for (const pattern of DATE_PATTERNS) {
      const match = line.match(pattern.regex);
      if (!match) {
        continue;
      }

      const [, first, second, third] = match;
      if (first === undefined || second === undefined || third === undefined) {
        continue;
      }

      const isoDate = pattern.toIsoDate([first, second, third]);
      if (isoDate) {
        return isoDate;
      }
    }
  }

  return null;
}

export function extractDate(lines: readonly string[], now: () => Date = () => new Date()): string {
  return findDate(lines) ?? toIsoDate(now());
}

export function extractTotal(lines: readonly string[]): number {
  for (const line of lines.slice(-TOTAL_SCAN_DEPTH)) {
    for (const regex of [LABELED_TOTAL_REGEX, CURRENCY_TOTAL_REGEX]) {
      const amount = parseTotalAmount(line.match(regex)?.[1]);
      if (amount !== null) {
        return amount;
      }
    }
  }

  return 0;
}

function parseTotalAmount(raw: string | undefined): number | null {
  if (!raw) {
    return null;
  }

  const value = Number.parseFloat(raw.replace(/,/g, ""));
  if (!Number.isFinite(value) || value <= 0) {
    return null;
  }
  return value;
}

function monthFromName(name: string): number | null {
  const lowered = name.toLowerCase();
  const index = MONTH_NAMES.findIndex((month) => month.startsWith(lowered));
  return index >= 0 ? index + 1 : null;
}
