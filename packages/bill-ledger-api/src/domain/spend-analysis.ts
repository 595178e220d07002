import type {
  BillCategory,
  CategorySpend,
  MonthlyAnalysisResponse,
  ShopSpend,
  SpendSummaryResponse,
  StoredBill,
  TopItem,
} from "@bill-ledger/contracts";
import { normalizeQuantity, roundMoney } from "@bill-ledger/extraction";
import { matchesFilter } from "../storage/in-memory-bill-store.js";
import type { BillListFilter } from "../types/bill-store.js";

const TOP_ITEM_LIMIT = 20;

type ItemAccumulator = {
  totalQuantity: number;
  totalSpent: number;
  purchaseCount: number;
};

export function monthlyAnalysis(
  bills: readonly StoredBill[],
  month: number,
  year: number,
): MonthlyAnalysisResponse {
  const inMonth = bills.filter((bill) => matchesFilter(bill.date, { month, year }));

  const shops = new Map<string, { billCount: number; totalSpent: number }>();
  const categories = new Map<BillCategory, { itemCount: number; totalSpent: number }>();
  const items = new Map<string, ItemAccumulator>();
  let totalSpent = 0;

  for (const bill of inMonth) {
    totalSpent += bill.totalAmount;

    const shop = shops.get(bill.shopName) ?? { billCount: 0, totalSpent: 0 };
    shop.billCount += 1;
    shop.totalSpent += bill.totalAmount;
    shops.set(bill.shopName, shop);

    for (const item of bill.items) {
      const spent = item.unitPrice * item.quantity;

      const category = categories.get(item.category) ?? { itemCount: 0, totalSpent: 0 };
      category.itemCount += 1;
      category.totalSpent += spent;
      categories.set(item.category, category);

      const entry = items.get(item.name) ?? { totalQuantity: 0, totalSpent: 0, purchaseCount: 0 };
      entry.totalQuantity += item.quantity;
      entry.totalSpent += spent;
      entry.purchaseCount += 1;
      items.set(item.name, entry);
    }
  }

  const shopRows: ShopSpend[] = [...shops].map(([shopName, shop]) => ({
    shopName,
    billCount: shop.billCount,
    totalSpent: roundMoney(shop.totalSpent),
  }));
  const categoryRows: CategorySpend[] = [...categories].map(([category, entry]) => ({
    category,
    itemCount: entry.itemCount,
    totalSpent: roundMoney(entry.totalSpent),
  }));
  const itemRows: TopItem[] = [...items].map(([itemName, entry]) => ({
    itemName,
    totalQuantity: normalizeQuantity(entry.totalQuantity),
    totalSpent: roundMoney(entry.totalSpent),
    purchaseCount: entry.purchaseCount,
  }));

  return {
    month,
    year,
    totalBills: inMonth.length,
    totalSpent: roundMoney(totalSpent),
    shops: shopRows.sort((a, b) => bySpend(a, b, a.shopName, b.shopName)),
    categories: categoryRows.sort((a, b) => bySpend(a, b, a.category, b.category)),
    topItems: itemRows
      .sort((a, b) => bySpend(a, b, a.itemName, b.itemName))
      .slice(0, TOP_ITEM_LIMIT),
  };
}

export function spendSummary(
  bills: readonly StoredBill[],
  filter: BillListFilter = {},
): SpendSummaryResponse {
  const matching = bills.filter((bill) => matchesFilter(bill.date, filter));
  const totalSpent = matching.reduce((acc, bill) => acc + bill.totalAmount, 0);
  const totalItems = matching.reduce((acc, bill) => acc + bill.items.length, 0);

  return {
    totalBills: matching.length,
    totalSpent: roundMoney(totalSpent),
    uniqueShops: new Set(matching.map((bill) => bill.shopName)).size,
    totalItems,
    avgBillAmount: matching.length > 0 ? roundMoney(totalSpent / matching.length) : 0,
    filter: {
      month: filter.month ?? null,
      year: filter.year ?? null,
    },
  };
}

// Highest spend first, then name so equal spends keep a stable order.
function bySpend(
  a: { totalSpent: number },
  b: { totalSpent: number },
  nameA: string,
  nameB: string,
): number {
  return b.totalSpent - a.totalSpent || nameA.localeCompare(nameB);
}
