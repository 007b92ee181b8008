/**
 * Fact filter matching and ordering shared by store implementations.
 */

import type { FactRecord } from "@consolidator/types";
import type { FactFilter } from "./types.js";

/**
 * Identity of a fact: one value per (data type, entity, account, period).
 */
export function factKey(fact: FactRecord): string {
  return JSON.stringify([fact.dataType, fact.entityCode, fact.accountCode, fact.period]);
}

/**
 * Compile a filter into a predicate. List fields become sets once so
 * large account universes stay cheap to test.
 */
export function compileFilter(filter: FactFilter): (fact: FactRecord) => boolean {
  const entities = filter.entityCodes !== undefined ? new Set(filter.entityCodes) : undefined;
  const accounts = filter.accountCodes !== undefined ? new Set(filter.accountCodes) : undefined;
  const periods = filter.periods !== undefined ? new Set(filter.periods) : undefined;
  const { dataType, from, toExclusive } = filter;

  return (fact) => {
    if (dataType !== undefined && fact.dataType !== dataType) return false;
    if (entities !== undefined && !entities.has(fact.entityCode)) return false;
    if (accounts !== undefined && !accounts.has(fact.accountCode)) return false;
    if (periods !== undefined && !periods.has(fact.period)) return false;
    if (from !== undefined && fact.period < from) return false;
    if (toExclusive !== undefined && fact.period >= toExclusive) return false;
    return true;
  };
}

/**
 * Period, then entity code, then account code, then data type.
 */
export function compareFacts(a: FactRecord, b: FactRecord): number {
  const keysA = [a.period, a.entityCode, a.accountCode, a.dataType];
  const keysB = [b.period, b.entityCode, b.accountCode, b.dataType];
  for (let i = 0; i < keysA.length; i++) {
    const x = keysA[i] ?? "";
    const y = keysB[i] ?? "";
    if (x < y) return -1;
    if (x > y) return 1;
  }
  return 0;
}
