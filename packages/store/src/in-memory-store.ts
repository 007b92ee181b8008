/**
 * @consolidator/store — In-memory FinancialStore implementation.
 *
 * Plain maps behind the five store interfaces. Used by tests, by
 * short-lived processes, and as the working set of file-backed stores.
 *
 * Properties:
 * - Synchronous, single-threaded
 * - Every mutation runs inside a transaction (explicit or implicit)
 * - Rollback restores the state captured when the transaction began
 * - `onCommit` sees the full state after each committed top-level mutation
 */

import {
  isAccountDimension,
  isBackupRecord,
  isCellComment,
  isEntity,
  isFactRecord,
} from "@consolidator/types";
import type {
  AccountDimension,
  BackupRecord,
  CellComment,
  Entity,
  FactRecord,
} from "@consolidator/types";
import type {
  BackupStore,
  CommentChanges,
  CommentQuery,
  CommentStore,
  DimensionQuery,
  DimensionStore,
  EntityStore,
  FactFilter,
  FactStore,
  FinancialState,
  FinancialStore,
} from "./types.js";
import { RESERVED_ENTITY_CODES, StoreError } from "./types.js";
import { compareFacts, compileFilter, factKey } from "./filter.js";

export interface InMemoryStoreOptions {
  /** Initial contents; validated exactly like individual inserts */
  readonly initial?: FinancialState;

  /** Called with the full state after each committed top-level mutation */
  readonly onCommit?: (state: FinancialState) => void;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export class InMemoryFinancialStore implements FinancialStore {
  readonly entities: EntityStore;
  readonly dimensions: DimensionStore;
  readonly facts: FactStore;
  readonly backups: BackupStore;
  readonly comments: CommentStore;

  private _entities = new Map<string, Entity>();
  private _dimensions: AccountDimension[] = [];
  private _facts = new Map<string, FactRecord>();
  private _backups: BackupRecord[] = [];
  private _comments: CellComment[] = [];

  /** Transaction nesting depth */
  private _depth = 0;

  private readonly _onCommit: ((state: FinancialState) => void) | undefined;

  constructor(options: InMemoryStoreOptions = {}) {
    this._onCommit = options.onCommit;

    this.entities = {
      list: () => this._listEntities(),
      get: (code) => this._entities.get(code),
      add: (entity) => this._mutate(() => this._addEntity(entity)),
    };

    this.dimensions = {
      list: (query) => this._listDimensions(query),
      findByCode: (accountCode) =>
        this._dimensions.find((d) => d.accountCode === accountCode),
      add: (record) => {
        this._mutate(() => this._addDimension(record));
      },
      replaceAll: (records) => {
        this._mutate(() => this._replaceDimensions(records));
      },
    };

    this.facts = {
      query: (filter) => this._queryFacts(filter),
      listPeriods: (filter) => {
        const matches = compileFilter(filter);
        const periods = new Set<string>();
        for (const fact of this._facts.values()) {
          if (matches(fact)) periods.add(fact.period);
        }
        return [...periods].sort(compareText);
      },
      insert: (fact) => {
        this._mutate(() => this._insertFact(fact));
      },
      delete: (filter) => this._mutate(() => this._deleteFacts(filter)),
      has: (filter) => {
        const matches = compileFilter(filter);
        for (const fact of this._facts.values()) {
          if (matches(fact)) return true;
        }
        return false;
      },
    };

    this.backups = {
      create: (backup) => this._mutate(() => this._createBackup(backup)),
      get: (id) => this._backups.find((b) => b.id === id),
      list: () =>
        [...this._backups]
          .reverse()
          .sort((a, b) => compareText(b.createdAt, a.createdAt)),
    };

    this.comments = {
      list: (query) => this._listComments(query),
      get: (id) => this._comments.find((c) => c.id === id),
      add: (comment) => this._mutate(() => this._addComment(comment)),
      update: (id, changes) => this._mutate(() => this._updateComment(id, changes)),
      remove: (id) => this._mutate(() => this._removeComment(id)),
    };

    if (options.initial !== undefined) {
      this._seed(options.initial);
    }
  }

  // ─── Transactions ───────────────────────────────────────────────────

  transaction<T>(fn: (store: FinancialStore) => T): T {
    const before = this.snapshot();
    this._depth++;
    try {
      const result = fn(this);
      if (this._depth === 1 && this._onCommit !== undefined) {
        this._onCommit(this.snapshot());
      }
      return result;
    } catch (err) {
      this._restore(before);
      throw err;
    } finally {
      this._depth--;
    }
  }

  /**
   * Capture the full store contents.
   */
  snapshot(): FinancialState {
    return {
      entities: [...this._entities.values()],
      dimensions: [...this._dimensions],
      facts: [...this._facts.values()],
      backups: [...this._backups],
      comments: [...this._comments],
    };
  }

  // ─── Entities ───────────────────────────────────────────────────────

  private _listEntities(): readonly Entity[] {
    return [...this._entities.values()].sort(
      (a, b) => compareText(a.name, b.name) || compareText(a.code, b.code),
    );
  }

  private _addEntity(entity: Entity): Entity {
    const candidate: unknown = entity;
    if (!isEntity(candidate)) {
      throw new StoreError("INVALID_ENTITY", "Entity requires a code, a name and an aggregate flag");
    }
    if (RESERVED_ENTITY_CODES.includes(entity.code)) {
      throw new StoreError(
        "INVALID_ENTITY",
        `Entity code "${entity.code}" is reserved for report columns`,
      );
    }
    if (this._entities.has(entity.code)) {
      throw new StoreError("DUPLICATE_ENTITY", `Entity "${entity.code}" already exists`);
    }
    const stored: Entity = {
      code: entity.code,
      name: entity.name,
      isAggregate: entity.isAggregate,
    };
    this._entities.set(stored.code, stored);
    return stored;
  }

  // ─── Dimensions ─────────────────────────────────────────────────────

  private _listDimensions(query?: DimensionQuery): readonly AccountDimension[] {
    const types = query?.accountTypes;
    const selected =
      types === undefined
        ? [...this._dimensions]
        : this._dimensions.filter(
            (d) => d.accountType !== null && types.includes(d.accountType),
          );
    return selected.sort((a, b) => a.sortOrder - b.sortOrder);
  }

  private _addDimension(record: AccountDimension): void {
    this._checkDimension(record, this._dimensions);
    this._dimensions.push({ ...record });
  }

  private _replaceDimensions(records: readonly AccountDimension[]): void {
    const next: AccountDimension[] = [];
    for (const record of records) {
      this._checkDimension(record, next);
      next.push({ ...record });
    }
    this._dimensions = next;
  }

  private _checkDimension(
    record: AccountDimension,
    existing: readonly AccountDimension[],
  ): void {
    const candidate: unknown = record;
    if (!isAccountDimension(candidate)) {
      throw new StoreError(
        "INVALID_DIMENSION",
        `Invalid chart-of-accounts record "${String(record.accountName)}"`,
      );
    }
    const code = record.accountCode;
    if (code !== null && existing.some((d) => d.accountCode === code)) {
      throw new StoreError("DUPLICATE_ACCOUNT_CODE", `Account code "${code}" already exists`);
    }
  }

  // ─── Facts ──────────────────────────────────────────────────────────

  private _queryFacts(filter: FactFilter): readonly FactRecord[] {
    const matches = compileFilter(filter);
    const result: FactRecord[] = [];
    for (const fact of this._facts.values()) {
      if (matches(fact)) result.push(fact);
    }
    return result.sort(compareFacts);
  }

  private _insertFact(fact: FactRecord): void {
    const candidate: unknown = fact;
    if (!isFactRecord(candidate)) {
      throw new StoreError(
        "INVALID_FACT",
        `Invalid fact for entity "${String(fact.entityCode)}", account "${String(fact.accountCode)}"`,
      );
    }
    const key = factKey(fact);
    if (this._facts.has(key)) {
      throw new StoreError(
        "DUPLICATE_FACT",
        `Fact already exists: ${fact.entityCode} / ${fact.accountCode} / ${fact.period} / ${fact.dataType}`,
      );
    }
    this._facts.set(key, { ...fact });
  }

  private _deleteFacts(filter: FactFilter): readonly FactRecord[] {
    const removed = this._queryFacts(filter);
    for (const fact of removed) {
      this._facts.delete(factKey(fact));
    }
    return removed;
  }

  // ─── Backups ────────────────────────────────────────────────────────

  private _createBackup(backup: BackupRecord): BackupRecord {
    const candidate: unknown = backup;
    if (!isBackupRecord(candidate)) {
      throw new StoreError("INVALID_FACT", `Backup "${String(backup.id)}" holds invalid records`);
    }
    if (this._backups.some((b) => b.id === backup.id)) {
      throw new StoreError("DUPLICATE_BACKUP", `Backup "${backup.id}" already exists`);
    }
    this._backups.push(backup);
    return backup;
  }

  // ─── Comments ───────────────────────────────────────────────────────

  private _listComments(query?: CommentQuery): readonly CellComment[] {
    const rowKeys = query?.rowKeys;
    const columnKeys = query?.columnKeys;
    return this._comments
      .filter(
        (c) =>
          (rowKeys === undefined || rowKeys.includes(c.rowKey)) &&
          (columnKeys === undefined || columnKeys.includes(c.columnKey)),
      )
      .sort((a, b) => compareText(a.createdAt, b.createdAt));
  }

  private _requireComment(id: string): CellComment {
    const comment = this._comments.find((c) => c.id === id);
    if (comment === undefined) {
      throw new StoreError("UNKNOWN_COMMENT", `Comment "${id}" not found`);
    }
    return comment;
  }

  private _addComment(comment: CellComment): CellComment {
    const candidate: unknown = comment;
    if (!isCellComment(candidate)) {
      throw new StoreError(
        "INVALID_COMMENT",
        "Comment requires an id, a cell address, a message and timestamps",
      );
    }
    if (this._comments.some((c) => c.id === comment.id)) {
      throw new StoreError("DUPLICATE_COMMENT", `Comment "${comment.id}" already exists`);
    }
    if (comment.parentId !== null) {
      const parent = this._requireComment(comment.parentId);
      if (parent.rowKey !== comment.rowKey || parent.columnKey !== comment.columnKey) {
        throw new StoreError(
          "INVALID_COMMENT",
          `Reply must address the same cell as comment "${parent.id}"`,
        );
      }
    }
    const stored: CellComment = { ...comment };
    this._comments.push(stored);
    return stored;
  }

  private _updateComment(id: string, changes: CommentChanges): CellComment {
    const current = this._requireComment(id);
    const next: CellComment = {
      ...current,
      ...(changes.message !== undefined ? { message: changes.message } : {}),
      ...(changes.resolved !== undefined ? { resolved: changes.resolved } : {}),
      updatedAt: changes.updatedAt,
    };
    const candidate: unknown = next;
    if (!isCellComment(candidate)) {
      throw new StoreError("INVALID_COMMENT", `Invalid edit of comment "${id}"`);
    }
    this._comments = this._comments.map((c) => (c.id === id ? next : c));
    return next;
  }

  private _removeComment(id: string): readonly CellComment[] {
    this._requireComment(id);
    const doomed = new Set([id]);
    let grew = true;
    while (grew) {
      grew = false;
      for (const c of this._comments) {
        if (c.parentId !== null && doomed.has(c.parentId) && !doomed.has(c.id)) {
          doomed.add(c.id);
          grew = true;
        }
      }
    }
    const removed = this._comments.filter((c) => doomed.has(c.id));
    this._comments = this._comments.filter((c) => !doomed.has(c.id));
    return removed;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  /**
   * Single operations validate before they change anything, so inside an
   * open transaction they run directly; otherwise they get their own.
   */
  private _mutate<T>(fn: () => T): T {
    return this._depth > 0 ? fn() : this.transaction(() => fn());
  }

  private _seed(state: FinancialState): void {
    for (const entity of state.entities) this._addEntity(entity);
    for (const record of state.dimensions) this._addDimension(record);
    for (const fact of state.facts) this._insertFact(fact);
    for (const backup of state.backups) this._createBackup(backup);
    for (const comment of state.comments) this._addComment(comment);
  }

  private _restore(state: FinancialState): void {
    this._entities = new Map(state.entities.map((e) => [e.code, e]));
    this._dimensions = [...state.dimensions];
    this._facts = new Map(state.facts.map((f) => [factKey(f), f]));
    this._backups = [...state.backups];
    this._comments = [...state.comments];
  }
}
