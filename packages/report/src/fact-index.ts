/**
 * @consolidator/report — Fact Indexer.
 *
 * Loads the facts for the resolved periods, entities and accounts into
 * exact lookups:
 *
 *   main:   period → entity → account → amount
 *   budget: period → account → amount   (dual-stream only)
 *
 * Rules:
 * - Missing entries read as zero
 * - Amounts are parsed into scaled bigints once, here
 * - Budget facts never enter the entity-keyed lookup
 */

import { parseAmount } from "@consolidator/amounts";
import type { DataType } from "@consolidator/types";
import type { ReportSource } from "./types.js";

export interface IndexScope {
  readonly periods: readonly string[];

  /** Non-aggregate entities whose facts fill the main lookup */
  readonly entityCodes: readonly string[];

  readonly accountCodes: readonly string[];
  readonly dataType: DataType;
  readonly dualStream: boolean;

  /** Aggregate entity whose facts fill the budget lookup in dual-stream mode */
  readonly aggregateCode?: string;
}

export class FactIndex {
  private readonly _main = new Map<string, Map<string, Map<string, bigint>>>();
  private readonly _budget = new Map<string, Map<string, bigint>>();
  private readonly _entitiesWithFacts = new Set<string>();
  private _factCount = 0;
  private _budgetFactCount = 0;

  /** Amount for (period, entity, account); zero when absent */
  amount(period: string, entityCode: string, accountCode: string): bigint {
    return this._main.get(period)?.get(entityCode)?.get(accountCode) ?? 0n;
  }

  /** Consolidated budget amount for (period, account); zero when absent */
  budget(period: string, accountCode: string): bigint {
    return this._budget.get(period)?.get(accountCode) ?? 0n;
  }

  /** True when the entity holds at least one indexed fact */
  hasFacts(entityCode: string): boolean {
    return this._entitiesWithFacts.has(entityCode);
  }

  get factCount(): number {
    return this._factCount;
  }

  get budgetFactCount(): number {
    return this._budgetFactCount;
  }

  addMain(period: string, entityCode: string, accountCode: string, amount: bigint): void {
    let byEntity = this._main.get(period);
    if (byEntity === undefined) {
      byEntity = new Map();
      this._main.set(period, byEntity);
    }
    let byAccount = byEntity.get(entityCode);
    if (byAccount === undefined) {
      byAccount = new Map();
      byEntity.set(entityCode, byAccount);
    }
    byAccount.set(accountCode, (byAccount.get(accountCode) ?? 0n) + amount);
    this._entitiesWithFacts.add(entityCode);
    this._factCount++;
  }

  addBudget(period: string, accountCode: string, amount: bigint): void {
    let byAccount = this._budget.get(period);
    if (byAccount === undefined) {
      byAccount = new Map();
      this._budget.set(period, byAccount);
    }
    byAccount.set(accountCode, (byAccount.get(accountCode) ?? 0n) + amount);
    this._budgetFactCount++;
  }
}

/**
 * Query the fact store for the scope and build the lookups.
 *
 * Normal mode reads the requested data type. Dual-stream mode reads
 * actuals for the entities and, outside actual mode, the requested
 * data type of the aggregate entity into the budget lookup.
 */
export function indexFacts(facts: ReportSource["facts"], scope: IndexScope): FactIndex {
  const index = new FactIndex();

  const mainFacts = facts.query({
    entityCodes: scope.entityCodes,
    dataType: scope.dualStream ? "actual" : scope.dataType,
    periods: scope.periods,
    accountCodes: scope.accountCodes,
  });
  for (const fact of mainFacts) {
    index.addMain(fact.period, fact.entityCode, fact.accountCode, parseAmount(fact.amount));
  }

  if (scope.dualStream && scope.dataType !== "actual" && scope.aggregateCode !== undefined) {
    const budgetFacts = facts.query({
      entityCodes: [scope.aggregateCode],
      dataType: scope.dataType,
      periods: scope.periods,
      accountCodes: scope.accountCodes,
    });
    for (const fact of budgetFacts) {
      index.addBudget(fact.period, fact.accountCode, parseAmount(fact.amount));
    }
  }

  return index;
}
