import type { CanonicalBill, DeleteBillsResponse, StoredBill } from "@bill-ledger/contracts";
import type { BillRepository } from "@bill-ledger/extraction";

export type BillListFilter = {
  month?: number;
  year?: number;
};

export type BillStore = BillRepository & {
  insertBill: (bill: CanonicalBill) => StoredBill;
  listBills: (filter?: BillListFilter) => StoredBill[];
  deleteAll: () => DeleteBillsResponse;
};
