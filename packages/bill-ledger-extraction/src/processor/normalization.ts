export const UNKNOWN_SHOP = "Unknown Shop";

const MAX_NAME_LENGTH = 200;

export function compactWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

export function clampName(value: string): string {
  return value.trim().slice(0, MAX_NAME_LENGTH).trim();
}

export function roundMoney(value: number): number {
  return Number.parseFloat(value.toFixed(2));
}

export function sumMoney(values: number[]): number {
  return roundMoney(values.reduce((acc, value) => acc + value, 0));
}

export function normalizeQuantity(quantity: number): number {
  return Number.parseFloat(quantity.toFixed(3));
}

/**
 * Strict decimal parse: currency markers and thousands separators are stripped,
 * anything else that is not a plain decimal yields null.
 */
export function parseDecimal(raw: string): number | null {
  const cleaned = raw.replace(/[$,\s]/g, "");
  if (!/^-?(?:\d+(?:\.\d*)?|\.\d+)$/.test(cleaned)) {
    return null;
  }

  const value = Number.parseFloat(cleaned);
  return Number.isFinite(value) ? value : null;
}

export function buildIsoDate(year: number, month: number, day: number): string | null {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    return null;
  }
  if (year < 1 || year > 9999 || month < 1 || month > 12 || day < 1) {
    return null;
  }

  const date = new Date(Date.UTC(year, month - 1, day));
  date.setUTCFullYear(year);
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }

  return toIsoDate(date);
}

export function toIsoDate(date: Date): string {
  const year = String(date.getUTCFullYear()).padStart(4, "0");
  const month = String(date.getUTCMonth() + 1).padStart(2, "0");
  const day = String(date.getUTCDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}
