/**
 * @consolidator/store — Core types.
 *
 * Synchronous store interfaces for reporting entities, chart-of-accounts
 * dimensions, monthly facts, overwrite backups and cell comments.
 *
 * Design principles:
 * - Reads return immutable records in a deterministic order
 * - Facts are unique per (entity, account, period, data type)
 * - Mutations are all-or-nothing inside `transaction`
 * - Implementations are interchangeable (in-memory, JSON file)
 */

import type {
  AccountCategory,
  AccountDimension,
  BackupRecord,
  CellComment,
  DataType,
  Entity,
  FactRecord,
} from "@consolidator/types";

// =============================================================================
// Errors
// =============================================================================

export type StoreErrorCode =
  | "DUPLICATE_FACT"
  | "DUPLICATE_ENTITY"
  | "DUPLICATE_BACKUP"
  | "INVALID_ENTITY"
  | "INVALID_FACT"
  | "INVALID_DIMENSION"
  | "DUPLICATE_ACCOUNT_CODE"
  | "INVALID_COMMENT"
  | "DUPLICATE_COMMENT"
  | "UNKNOWN_COMMENT"
  | "CORRUPT_FILE";

export class StoreError extends Error {
  constructor(
    public readonly code: StoreErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "StoreError";
  }
}

// =============================================================================
// Queries
// =============================================================================

/**
 * Fact selection. Omitted fields match everything; an empty array
 * matches nothing.
 */
export interface FactFilter {
  readonly entityCodes?: readonly string[];
  readonly dataType?: DataType;
  readonly accountCodes?: readonly string[];
  readonly periods?: readonly string[];

  /** Inclusive lower period bound */
  readonly from?: string;

  /** Exclusive upper period bound */
  readonly toExclusive?: string;
}

export interface DimensionQuery {
  /** Restrict to these account types. Headers (no type) are excluded when set. */
  readonly accountTypes?: readonly AccountCategory[];
}

/**
 * Comment selection by cell address. Omitted fields match everything.
 */
export interface CommentQuery {
  readonly rowKeys?: readonly string[];
  readonly columnKeys?: readonly string[];
}

/** Fields an edit may change; `updatedAt` is always restamped. */
export interface CommentChanges {
  readonly message?: string;
  readonly resolved?: boolean;
  readonly updatedAt: string;
}

// =============================================================================
// Stores
// =============================================================================

export interface EntityStore {
  /** All entities, ordered by name then code */
  list(): readonly Entity[];
  get(code: string): Entity | undefined;
  add(entity: Entity): Entity;
}

export interface DimensionStore {
  /** Records ordered by sortOrder; ties keep insertion order */
  list(query?: DimensionQuery): readonly AccountDimension[];
  findByCode(accountCode: string): AccountDimension | undefined;
  add(record: AccountDimension): void;
  replaceAll(records: readonly AccountDimension[]): void;
}

export interface FactStore {
  /** Matching facts ordered by period, entity code, account code */
  query(filter: FactFilter): readonly FactRecord[];

  /** Distinct periods holding at least one matching fact, ascending */
  listPeriods(filter: FactFilter): readonly string[];

  insert(fact: FactRecord): void;

  /** Remove matching facts and return them */
  delete(filter: FactFilter): readonly FactRecord[];

  has(filter: FactFilter): boolean;
}

export interface BackupStore {
  create(backup: BackupRecord): BackupRecord;
  get(id: string): BackupRecord | undefined;

  /** Newest first */
  list(): readonly BackupRecord[];
}

export interface CommentStore {
  /** Matching comments, oldest first; ties keep insertion order */
  list(query?: CommentQuery): readonly CellComment[];
  get(id: string): CellComment | undefined;

  /** A reply's parent must exist and address the same cell */
  add(comment: CellComment): CellComment;

  update(id: string, changes: CommentChanges): CellComment;

  /** Remove a comment together with every reply below it; returns them */
  remove(id: string): readonly CellComment[];
}

/**
 * The five stores behind one transaction boundary.
 */
export interface FinancialStore {
  readonly entities: EntityStore;
  readonly dimensions: DimensionStore;
  readonly facts: FactStore;
  readonly backups: BackupStore;
  readonly comments: CommentStore;

  /**
   * Run `fn` atomically. If it throws, every change made inside it is
   * rolled back and the error is rethrown.
   */
  transaction<T>(fn: (store: FinancialStore) => T): T;
}

/**
 * Complete store contents, as persisted by file-backed stores.
 */
export interface FinancialState {
  readonly entities: readonly Entity[];
  readonly dimensions: readonly AccountDimension[];
  readonly facts: readonly FactRecord[];
  readonly backups: readonly BackupRecord[];
  readonly comments: readonly CellComment[];
}

/** Entity codes that name report columns and cannot be used by entities. */
export const RESERVED_ENTITY_CODES: readonly string[] = ["TOTAL", "Budget"];
