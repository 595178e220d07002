import {
  CanonicalBillSchema,
  isConsistentLineTotal,
  type BillCategory,
  type CanonicalBill,
  type ExtractedItem,
} from "@bill-ledger/contracts";
import { categorize, resolveCategoryLabel } from "./categorizer.js";
import type { CsvRow, CsvTable } from "./csv-table.js";
import {
  buildIsoDate,
  clampName,
  normalizeQuantity,
  parseDecimal,
  roundMoney,
  sumMoney,
  toIsoDate,
  UNKNOWN_SHOP,
} from "./normalization.js";

export type CsvSchema = "wide" | "legacy";

export type CsvNormalizationResult = {
  schema: CsvSchema;
  bills: CanonicalBill[];
  errors: string[];
};

export type CsvNormalizerOptions = {
  now?: () => Date;
};

type RowOutcome<T> = { ok: true; value: T } | { ok: false; error: string } | null;

type BillGroup = {
  date: string;
  shopName: string;
  items: ExtractedItem[];
};

const FIRST_DATA_ROW_NUMBER = 2;
const SKIPPED_ITEM_NAMES = new Set(["tax", "tax :", "tax:"]);
const ABSENT_MARKERS = new Set(["na", "n/a"]);
const ITEM_SEPARATOR = "|";
const FIELD_SEPARATOR = ",";

const CSV_DATE_FORMATS: ReadonlyArray<(value: string) => string | null> = [
  // M/D/YYYY
  (value) => {
    const match = value.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
    return match ? isoFromParts(match[3], match[1], match[2]) : null;
  },
  // M/D/YY
  (value) => {
    const match = value.match(/^(\d{1,2})\/(\d{1,2})\/(\d{2})$/);
    return match ? isoFromParts(expandTwoDigitYear(match[3]), match[1], match[2]) : null;
  },
  // YYYY-M-D
  (value) => {
    const match = value.match(/^(\d{4})-(\d{1,2})-(\d{1,2})$/);
    return match ? isoFromParts(match[1], match[2], match[3]) : null;
  },
  // D/M/YYYY
  (value) => {
    const match = value.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
    return match ? isoFromParts(match[3], match[2], match[1]) : null;
  },
];

export function detectCsvSchema(headers: readonly string[]): CsvSchema {
  return headers.some((header) => header.toLowerCase().includes("item name")) ? "wide" : "legacy";
}

export function normalizeCsvTable(
  table: CsvTable,
  options: CsvNormalizerOptions = {},
): CsvNormalizationResult {
  const schema = detectCsvSchema(table.headers);
  const now = options.now ?? (() => new Date());
  const { bills, errors } =
    schema === "wide" ? normalizeWideRows(table.rows) : normalizeLegacyRows(table.rows, now);

  return { schema, bills, errors };
}

export function parseCsvDate(value: string | undefined): string | null {
  const trimmed = value?.trim();
  if (!trimmed) {
    return null;
  }

  for (const format of CSV_DATE_FORMATS) {
    const parsed = format(trimmed);
    if (parsed) {
      return parsed;
    }
  }
  return null;
}

/**
 * The first label inside the taxonomy wins, sub-type before type. Labels outside the taxonomy
 * fall back to keyword matching on the item name; no label at all means Uncategorized.
 */
export function resolveCsvCategory(
  subType: string | undefined,
  type: string | undefined,
  itemName: string,
): BillCategory {
  const labels = [subType, type]
    .map((value) => value?.trim())
    .filter((value): value is string => !!value && !ABSENT_MARKERS.has(value.toLowerCase()));

  if (labels.length === 0) {
    return "Uncategorized";
  }
  for (const label of labels) {
    const category = resolveCategoryLabel(label);
    if (category) {
      return category;
    }
  }
  return categorize(itemName);
}

function normalizeWideRows(rows: readonly CsvRow[]): { bills: CanonicalBill[]; errors: string[] } {
  const groups = new Map<string, BillGroup>();
  const errors: string[] = [];

  rows.forEach((row, index) => {
    const rowNumber = index + FIRST_DATA_ROW_NUMBER;
    const itemName = readField(row, "Item Name");
    if (!itemName || SKIPPED_ITEM_NAMES.has(itemName.toLowerCase())) {
      return;
    }

    const date = parseCsvDate(readField(row, "Date"));
    if (!date) {
      return;
    }

    const outcome = parseWideItem(row, itemName);
    if (!outcome) {
      return;
    }
    if (!outcome.ok) {
      errors.push(`Row ${rowNumber}: ${outcome.error}`);
      return;
    }

    const shopName = clampName(readField(row, "Shop Address", "Shop Name") ?? UNKNOWN_SHOP);
    const key = `${date}\u0000${shopName}`;
    const group = groups.get(key);
    if (group) {
      group.items.push(outcome.value);
    } else {
      groups.set(key, { date, shopName, items: [outcome.value] });
    }
  });

  const bills = [...groups.values()].map((group) =>
    CanonicalBillSchema.parse({
      shopName: group.shopName,
      date: group.date,
      totalAmount: sumMoney(group.items.map((item) => item.lineTotal)),
      source: "csv",
      items: group.items,
    }),
  );

  return { bills, errors };
}

function parseWideItem(row: CsvRow, itemName: string): RowOutcome<ExtractedItem> {
  const totalRaw = readField(row, "Total amount paid");
  if (!totalRaw || totalRaw.toLowerCase() === "nan") {
    return null;
  }

  const lineTotal = parseDecimal(totalRaw);
  if (lineTotal === null || lineTotal < 0) {
    return { ok: false, error: `invalid total amount '${totalRaw}'` };
  }

  const quantityRaw = readField(row, "Quantity");
  const quantity = isAbsent(quantityRaw) ? 1 : parseDecimal(quantityRaw);
  if (quantity === null || quantity <= 0) {
    return { ok: false, error: `invalid quantity '${quantityRaw ?? ""}'` };
  }

  const unitPriceRaw = readField(row, "Cost per unit");
  const unitPrice = isAbsent(unitPriceRaw) ? lineTotal / quantity : parseDecimal(unitPriceRaw);
  if (unitPrice === null || unitPrice < 0) {
    return { ok: false, error: `invalid cost per unit '${unitPriceRaw ?? ""}'` };
  }
  if (!isConsistentLineTotal({ quantity, unitPrice: roundMoney(unitPrice), lineTotal })) {
    return {
      ok: false,
      error:
        `total amount '${totalRaw}' does not match quantity '${quantityRaw ?? "1"}' ` +
        `at cost per unit '${unitPriceRaw ?? ""}'`,
    };
  }

  const name = clampName(itemName);
  return {
    ok: true,
    value: {
      name,
      quantity: normalizeQuantity(quantity),
      unitPrice: roundMoney(unitPrice),
      lineTotal: roundMoney(lineTotal),
      category: resolveCsvCategory(
        readField(row, "Item Sub Type"),
        readField(row, "Item Type"),
        name,
      ),
    },
  };
}

function normalizeLegacyRows(
  rows: readonly CsvRow[],
  now: () => Date,
): { bills: CanonicalBill[]; errors: string[] } {
  const bills: CanonicalBill[] = [];
  const errors: string[] = [];

  rows.forEach((row, index) => {
    const rowNumber = index + FIRST_DATA_ROW_NUMBER;
    const totalRaw = readField(row, "total_amount");
    const declaredTotal = totalRaw === undefined ? 0 : parseDecimal(totalRaw);
    if (declaredTotal === null || declaredTotal < 0) {
      errors.push(`Row ${rowNumber}: invalid total_amount '${totalRaw ?? ""}'`);
      return;
    }

    const items: ExtractedItem[] = [];
    for (const segment of (readField(row, "line_items") ?? "").split(ITEM_SEPARATOR)) {
      if (segment.trim().length === 0) {
        continue;
      }
      const outcome = parsePackedItem(segment);
      if (outcome?.ok) {
        items.push(outcome.value);
      } else if (outcome) {
        errors.push(`Row ${rowNumber}: ${outcome.error}`);
      }
    }

    bills.push(
      CanonicalBillSchema.parse({
        shopName: clampName(readField(row, "shop_name") ?? UNKNOWN_SHOP),
        date: parseCsvDate(readField(row, "date")) ?? toIsoDate(now()),
        totalAmount:
          declaredTotal > 0
            ? roundMoney(declaredTotal)
            : sumMoney(items.map((item) => item.lineTotal)),
        source: "csv",
        items,
      }),
    );
  });

  return { bills, errors };
}

// name,quantity,price[,category]
function parsePackedItem(segment: string): RowOutcome<ExtractedItem> {
  const parts = segment.split(FIELD_SEPARATOR).map((part) => part.trim());
  const [nameRaw, quantityRaw, priceRaw, categoryRaw] = parts;
  if (parts.length < 3 || !nameRaw) {
    return { ok: false, error: `malformed item '${segment.trim()}'` };
  }

  const quantity = quantityRaw ? parseDecimal(quantityRaw) : 1;
  if (quantity === null || quantity <= 0) {
    return { ok: false, error: `invalid quantity '${quantityRaw ?? ""}' for item '${nameRaw}'` };
  }

  const unitPrice = priceRaw ? parseDecimal(priceRaw) : 0;
  if (unitPrice === null || unitPrice < 0) {
    return { ok: false, error: `invalid price '${priceRaw ?? ""}' for item '${nameRaw}'` };
  }

  const name = clampName(nameRaw);
  return {
    ok: true,
    value: {
      name,
      quantity: normalizeQuantity(quantity),
      unitPrice: roundMoney(unitPrice),
      lineTotal: roundMoney(unitPrice * quantity),
      category: resolveCsvCategory(categoryRaw, undefined, name),
    },
  };
}

function readField(row: CsvRow, ...names: string[]): string | undefined {
  for (const name of names) {
    const wanted = name.toLowerCase();
    for (const [header, value] of Object.entries(row)) {
      if (header.trim().toLowerCase() !== wanted) {
        continue;
      }
      const trimmed = value.trim();
      if (trimmed.length > 0) {
        return trimmed;
      }
    }
  }
  return undefined;
}

function isAbsent(value: string | undefined): value is undefined {
  return value === undefined || ABSENT_MARKERS.has(value.toLowerCase());
}

function isoFromParts(
  year: string | undefined,
  month: string | undefined,
  day: string | undefined,
): string | null {
  if (!year || !month || !day) {
    return null;
  }
  return buildIsoDate(
    Number.parseInt(year, 10),
    Number.parseInt(month, 10),
    Number.parseInt(day, 10),
  );
}

// Two-digit years pivot at 69: 00-68 are 20xx, 69-99 are 19xx.
function expandTwoDigitYear(year: string | undefined): string | undefined {
  if (year === undefined) {
    return undefined;
  }
  const value = Number.parseInt(year, 10);
  return String(value < 69 ? 2000 + value : 1900 + value);
}
