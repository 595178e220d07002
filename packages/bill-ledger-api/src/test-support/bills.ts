import type { BillCategory, CanonicalBill, ExtractedItem } from "@bill-ledger/contracts";

export function item(
  name: string,
  quantity: number,
  unitPrice: number,
  category: BillCategory,
): ExtractedItem {
  return {
    name,
    quantity,
    unitPrice,
    lineTotal: Number.parseFloat((quantity * unitPrice).toFixed(2)),
    category,
  };
}

export function bill(
  shopName: string,
  date: string,
  totalAmount: number,
  items: ExtractedItem[],
): CanonicalBill {
  return { shopName, date, totalAmount, source: "image", items };
}

export const MARCH_AND_APRIL_BILLS: CanonicalBill[] = [
  bill("Fresh Mart", "2025-03-02", 10.5, [
    item("Milk", 1, 3.5, "Dairy"),
    item("Bread", 2, 2, "Grain"),
    item("Apple", 1.5, 2, "Fruit"),
  ]),
  bill("Fresh Mart", "2025-03-20", 7, [item("Milk", 2, 3.5, "Dairy")]),
  bill("Corner Shop", "2025-03-10", 20, [item("Cheese", 1, 20, "Dairy")]),
  bill("Corner Shop", "2025-04-01", 5.5, [item("Bread", 1, 5.5, "Grain")]),
];
