/**
 * @consolidator/store — Persistence for entities, chart of accounts,
 * monthly facts, overwrite backups and cell comments.
 *
 * Implementations:
 * - InMemoryFinancialStore (tests, short-lived processes)
 * - JsonFileFinancialStore (single-process persistence to one JSON file)
 */

export type {
  FactFilter,
  DimensionQuery,
  EntityStore,
  DimensionStore,
  FactStore,
  BackupStore,
  CommentQuery,
  CommentChanges,
  CommentStore,
  FinancialStore,
  FinancialState,
  StoreErrorCode,
} from "./types.js";
export { StoreError, RESERVED_ENTITY_CODES } from "./types.js";

export { compileFilter, compareFacts, factKey } from "./filter.js";

export { InMemoryFinancialStore } from "./in-memory-store.js";
export type { InMemoryStoreOptions } from "./in-memory-store.js";

export {
  JsonFileFinancialStore,
  parseStateDocument,
  formatStateDocument,
} from "./json-file-store.js";
export type { JsonFileStoreOptions } from "./json-file-store.js";
