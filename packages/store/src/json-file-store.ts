/**
 * @consolidator/store — JSON-file FinancialStore implementation.
 *
 * Keeps the working set in an InMemoryFinancialStore and persists the
 * complete state to one JSON document after every committed top-level
 * mutation.
 *
 * Crash safety:
 * - The new document is written to a temporary sibling, fsynced, then
 *   renamed over the old one, so readers see either version, never a mix
 * - A failed write rolls the in-memory state back with the transaction
 *
 * File format:
 * {"version":1,"entities":[...],"dimensions":[...],"facts":[...],"backups":[...],"comments":[...]}
 *
 * Documents written before comments existed have no "comments" array and
 * load with none.
 */

import {
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  renameSync,
  writeSync,
} from "node:fs";
import { dirname } from "node:path";
import {
  isAccountDimension,
  isBackupRecord,
  isCellComment,
  isEntity,
  isFactRecord,
} from "@consolidator/types";
import type {
  BackupStore,
  CommentStore,
  DimensionStore,
  EntityStore,
  FactStore,
  FinancialState,
  FinancialStore,
} from "./types.js";
import { StoreError } from "./types.js";
import { InMemoryFinancialStore } from "./in-memory-store.js";

const FILE_FORMAT_VERSION = 1;

export interface JsonFileStoreOptions {
  /** Path to the JSON document */
  readonly filePath: string;
}

/**
 * Parse and validate a persisted state document.
 */
export function parseStateDocument(content: string, filePath = "<memory>"): FinancialState {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new StoreError("CORRUPT_FILE", `${filePath}: not valid JSON (${reason})`);
  }

  if (raw === null || typeof raw !== "object") {
    throw new StoreError("CORRUPT_FILE", `${filePath}: expected a JSON object`);
  }
  const doc = raw as Record<string, unknown>;

  if (doc.version !== FILE_FORMAT_VERSION) {
    throw new StoreError(
      "CORRUPT_FILE",
      `${filePath}: unsupported format version ${String(doc.version)}`,
    );
  }

  const { entities, dimensions, facts, backups } = doc;
  const comments = doc.comments ?? [];
  if (
    !Array.isArray(entities) ||
    !Array.isArray(dimensions) ||
    !Array.isArray(facts) ||
    !Array.isArray(backups) ||
    !Array.isArray(comments)
  ) {
    throw new StoreError("CORRUPT_FILE", `${filePath}: missing record arrays`);
  }

  if (
    !entities.every(isEntity) ||
    !dimensions.every(isAccountDimension) ||
    !facts.every(isFactRecord) ||
    !backups.every(isBackupRecord) ||
    !comments.every(isCellComment)
  ) {
    throw new StoreError("CORRUPT_FILE", `${filePath}: malformed record`);
  }

  return { entities, dimensions, facts, backups, comments };
}

/**
 * Serialize a state into the on-disk document.
 */
export function formatStateDocument(state: FinancialState): string {
  return JSON.stringify({ version: FILE_FORMAT_VERSION, ...state }, null, 2) + "\n";
}

/**
 * File-backed financial store.
 *
 * The file is loaded on construction; a missing file starts an empty
 * store and is created on the first mutation.
 */
export class JsonFileFinancialStore implements FinancialStore {
  private readonly _filePath: string;
  private readonly _inner: InMemoryFinancialStore;

  constructor(options: JsonFileStoreOptions) {
    this._filePath = options.filePath;
    mkdirSync(dirname(this._filePath), { recursive: true });

    const initial = existsSync(this._filePath)
      ? parseStateDocument(readFileSync(this._filePath, "utf-8"), this._filePath)
      : undefined;

    this._inner = createInner(initial, this._filePath, (state) => this._write(state));
  }

  get entities(): EntityStore {
    return this._inner.entities;
  }

  get dimensions(): DimensionStore {
    return this._inner.dimensions;
  }

  get facts(): FactStore {
    return this._inner.facts;
  }

  get backups(): BackupStore {
    return this._inner.backups;
  }

  get comments(): CommentStore {
    return this._inner.comments;
  }

  transaction<T>(fn: (store: FinancialStore) => T): T {
    return this._inner.transaction(fn);
  }

  /**
   * Get the file path this store writes to.
   */
  get filePath(): string {
    return this._filePath;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _write(state: FinancialState): void {
    const tmpPath = `${this._filePath}.tmp`;
    const fd = openSync(tmpPath, "w");
    try {
      writeSync(fd, formatStateDocument(state));
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    renameSync(tmpPath, this._filePath);
  }
}

function createInner(
  initial: FinancialState | undefined,
  filePath: string,
  onCommit: (state: FinancialState) => void,
): InMemoryFinancialStore {
  try {
    return initial === undefined
      ? new InMemoryFinancialStore({ onCommit })
      : new InMemoryFinancialStore({ initial, onCommit });
  } catch (err) {
    if (err instanceof StoreError) {
      throw new StoreError("CORRUPT_FILE", `${filePath}: ${err.message}`);
    }
    throw err;
  }
}
