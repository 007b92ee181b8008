/**
 * Shared fixtures for ingest tests.
 */

import type { AccountDimension } from "@consolidator/types";
import { InMemoryFinancialStore } from "@consolidator/store";
import { IngestError } from "../src/types.js";

export const NOW = new Date("2024-05-01T09:30:00Z");

export function account(
  accountCode: string,
  accountType: AccountDimension["accountType"],
  sortOrder: number,
): AccountDimension {
  return {
    accountCode,
    accountName: `Account ${accountCode}`,
    accountType,
    parentCategory: "",
    subCategory: "",
    sortOrder,
    isHeader: false,
  };
}

/** F2001, the budget-only BUD entity, and accounts 4000 and 5000. */
export function seededStore(): InMemoryFinancialStore {
  const store = new InMemoryFinancialStore();
  store.transaction((tx) => {
    tx.entities.add({ code: "F2001", name: "Alpha Finance", isAggregate: false });
    tx.entities.add({ code: "BUD", name: "Consolidated Budget", isAggregate: true });
    tx.dimensions.add(account("4000", "INCOME", 10));
    tx.dimensions.add(account("5000", "EXPENSE", 20));
  });
  return store;
}

export function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof IngestError) return err.code;
    throw err;
  }
  return undefined;
}
