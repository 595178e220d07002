import type { ExtractedItem } from "@bill-ledger/contracts";
import { categorize } from "./categorizer.js";
import {
  containsAnyKeyword,
  PRIMARY_PROFILE,
  type ExtractionProfile,
} from "./extraction-profiles.js";
import { clampName, normalizeQuantity, roundMoney } from "./normalization.js";

export const DEFAULT_MAX_ITEM_PRICE = 1000;

export type LineItemExtractionOptions = {
  profile?: ExtractionProfile;
  maxItemPrice?: number;
};

type LineShape = {
  name: string;
  regex: RegExp;
};

type LineMatch = {
  name: string;
  price: string;
  quantity?: string;
};

const QUANTITY_SHORTHAND_LINE_REGEX = /^\d+(?:\.\d+)?x\s*\$?\s*\d+/i;
const BARE_NUMBER_LINE_REGEX = /^\$?\s*\d[\d,]*(?:\.\d+)?$/;
const DATE_PREFIX_REGEX = /^\d{1,2}[/-]/;
const TRAILING_QUANTITY_REGEX = /(?:\d+(?:\.\d+)?\s*x|\bx\s*\d+(?:\.\d+)?)$/i;

function lineShapes(profile: ExtractionProfile): readonly LineShape[] {
  const quantity = profile.fractionalQuantities ? String.raw`\d+(?:\.\d+)?` : String.raw`\d+`;
  return [
    {
      name: "name-price",
      regex: /^(?<name>.+?)\s+\$?\s*(?<price>\d+\.?\d{2})\s*$/,
    },
    {
      name: "name-quantity-price",
      regex: new RegExp(
        String.raw`^(?<name>.+?)\s+x?\s*(?<quantity>${quantity})\s+\$?(?<price>\d+\.?\d{2})$`,
        "i",
      ),
    },
    {
      name: "name-price-plain",
      regex: /^(?<name>.+?)\s+(?<price>\d+\.?\d{2})\s*\$?\s*$/,
    },
    {
      name: "name-count-times-price",
      regex: /^(?<name>.+?)\s+(?<quantity>\d+)\s+x\s+\$?(?<price>\d+\.?\d{2})$/i,
    },
  ];
}

export function extractLineItems(
  lines: readonly string[],
  options: LineItemExtractionOptions = {},
): ExtractedItem[] {
  const profile = options.profile ?? PRIMARY_PROFILE;
  const maxItemPrice = options.maxItemPrice ?? DEFAULT_MAX_ITEM_PRICE;
  const shapes = lineShapes(profile);
  const items: ExtractedItem[] = [];

  for (const rawLine of lines) {
    const line = rawLine.trim();
    if (isNoiseLine(line, profile)) {
      continue;
    }

    for (const shape of shapes) {
      const item = toItem(matchShape(line, shape), maxItemPrice);
      if (item) {
        items.push(item);
        break;
      }
    }
  }

  return items;
}

function isNoiseLine(line: string, profile: ExtractionProfile): boolean {
  if (line.length < 3) {
    return true;
  }

  return (
    containsAnyKeyword(line.toLowerCase(), profile.noiseKeywords) ||
    QUANTITY_SHORTHAND_LINE_REGEX.test(line) ||
    BARE_NUMBER_LINE_REGEX.test(line)
  );
}

function matchShape(line: string, shape: LineShape): LineMatch | null {
  const groups = line.match(shape.regex)?.groups;
  const name = groups?.name?.trim();
  const price = groups?.price;
  if (!name || !price || !isPlausibleName(name)) {
    return null;
  }

  return { name, price, quantity: groups?.quantity };
}

function isPlausibleName(name: string): boolean {
  return (
    name.length >= 2 &&
    !/^\d+$/.test(name.replace(/[.,]/g, "")) &&
    !DATE_PREFIX_REGEX.test(name) &&
    !TRAILING_QUANTITY_REGEX.test(name)
  );
}

function toItem(match: LineMatch | null, maxItemPrice: number): ExtractedItem | null {
  if (!match) {
    return null;
  }

  // A lone price must carry cents; "Aisle 12 100" is not an item.
  if (match.quantity === undefined && !match.price.includes(".")) {
    return null;
  }

  const quantity = match.quantity === undefined ? 1 : Number.parseFloat(match.quantity);
  const unitPrice = Number.parseFloat(match.price);
  if (!Number.isFinite(quantity) || quantity <= 0 || !Number.isFinite(unitPrice)) {
    return null;
  }

  const lineTotal = roundMoney(unitPrice * quantity);
  if (!withinPriceBounds(unitPrice, maxItemPrice) || !withinPriceBounds(lineTotal, maxItemPrice)) {
    return null;
  }

  const name = clampName(match.name);
  return {
    name,
    quantity: normalizeQuantity(quantity),
    unitPrice: roundMoney(unitPrice),
    lineTotal,
    category: categorize(name),
  };
}

function withinPriceBounds(value: number, maxItemPrice: number): boolean {
  return value > 0 && value < maxItemPrice;
}
