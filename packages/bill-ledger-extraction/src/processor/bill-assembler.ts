import type { CanonicalBill, CsvBillCreated } from "@bill-ledger/contracts";
import type { BillRepository } from "./types.js";

export type BillAssemblyResult =
  | { status: "created"; billId: string; bill: CanonicalBill }
  | { status: "duplicate"; existingBillId: string; bill: CanonicalBill };

export type CsvBatchResult = {
  created: CsvBillCreated[];
  duplicates: string[];
};

/**
 * Persists a bill unless one with the same shop, date and total already exists.
 */
export function assembleBill(bill: CanonicalBill, repository: BillRepository): BillAssemblyResult {
  const existingBillId = repository.findDuplicate({
    shopName: bill.shopName,
    date: bill.date,
    totalAmount: bill.totalAmount,
  });
  if (existingBillId !== null) {
    return { status: "duplicate", existingBillId, bill };
  }

  return { status: "created", billId: repository.persist(bill), bill };
}

export function assembleCsvBatch(
  bills: readonly CanonicalBill[],
  repository: BillRepository,
): CsvBatchResult {
  const created: CsvBillCreated[] = [];
  const duplicates: string[] = [];

  for (const bill of bills) {
    const result = assembleBill(bill, repository);
    if (result.status === "duplicate") {
      duplicates.push(describeDuplicate(bill));
      continue;
    }

    created.push({
      billId: result.billId,
      shopName: bill.shopName,
      date: bill.date,
      itemCount: bill.items.length,
    });
  }

  return { created, duplicates };
}

export function describeDuplicate(bill: CanonicalBill): string {
  const total = bill.totalAmount.toFixed(2);
  return `Duplicate bill skipped: ${bill.shopName} on ${bill.date} with total $${total}`;
}
