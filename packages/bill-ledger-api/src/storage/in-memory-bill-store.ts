import {
  StoredBillSchema,
  type CanonicalBill,
  type DeleteBillsResponse,
  type DuplicateKey,
  type StoredBill,
} from "@bill-ledger/contracts";
import { randomUUID } from "node:crypto";
import type { BillListFilter, BillStore } from "../types/bill-store.js";

type InMemoryBillStoreOptions = {
  now?: () => Date;
  createId?: () => string;
};

export class InMemoryBillStore implements BillStore {
  private readonly bills = new Map<string, StoredBill>();
  private readonly now: () => Date;
  private readonly createId: () => string;

  constructor(options: InMemoryBillStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.createId = options.createId ?? (() => `bill_${randomUUID()}`);
  }

  findDuplicate(key: DuplicateKey): string | null {
    const cents = toCents(key.totalAmount);
    for (const bill of this.bills.values()) {
      if (
        bill.shopName === key.shopName &&
        bill.date === key.date &&
        toCents(bill.totalAmount) === cents
      ) {
        return bill.billId;
      }
    }
    return null;
  }

  persist(bill: CanonicalBill): string {
    return this.insertBill(bill).billId;
  }

  insertBill(bill: CanonicalBill): StoredBill {
    const stored = StoredBillSchema.parse({
      ...structuredClone(bill),
      billId: this.createId(),
      createdAt: this.now().toISOString(),
    });
    this.bills.set(stored.billId, stored);
    return structuredClone(stored);
  }

  // Newest bill date first; insertion order breaks ties.
  listBills(filter: BillListFilter = {}): StoredBill[] {
    const matching = [...this.bills.values()].filter((bill) => matchesFilter(bill.date, filter));
    return matching
      .map((bill, index) => ({ bill, index }))
      .sort((a, b) => b.bill.date.localeCompare(a.bill.date) || b.index - a.index)
      .map(({ bill }) => structuredClone(bill));
  }

  deleteAll(): DeleteBillsResponse {
    let lineItemsDeleted = 0;
    for (const bill of this.bills.values()) {
      lineItemsDeleted += bill.items.length;
    }

    const billsDeleted = this.bills.size;
    this.bills.clear();
    return { billsDeleted, lineItemsDeleted };
  }
}

export function matchesFilter(isoDate: string, filter: BillListFilter): boolean {
  const [year, month] = isoDate.split("-").map((part) => Number.parseInt(part, 10));
  if (filter.year !== undefined && year !== filter.year) {
    return false;
  }
  if (filter.month !== undefined && month !== filter.month) {
    return false;
  }
  return true;
}

function toCents(amount: number): number {
  return Math.round(amount * 100);
}
