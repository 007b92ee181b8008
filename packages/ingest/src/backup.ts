/**
 * @consolidator/ingest — Backups and restore.
 *
 * A backup is taken inside the same transaction as the overwrite it
 * protects. Its digest is the SHA-256 of the RFC 8785 canonical JSON of
 * its records and is checked again before a restore.
 */

import { createHash, randomUUID } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { BackupRecord, DataType, FactRecord } from "@consolidator/types";
import type { FinancialStore } from "@consolidator/store";
import type { RestoreRequest, RestoreResult } from "./types.js";
import { IngestError } from "./types.js";

/**
 * SHA-256 hex digest of the canonical JSON of the records.
 */
export function computeRecordsDigest(records: readonly FactRecord[]): string {
  return createHash("sha256").update(canonicalize(records)).digest("hex");
}

/** "2024-05-01 09:30" in UTC */
function formatTimestamp(now: Date): string {
  return now.toISOString().slice(0, 16).replace("T", " ");
}

export interface BackupInput {
  readonly entityCode: string;
  readonly dataType: DataType;
  readonly periods: readonly string[];
  readonly records: readonly FactRecord[];
  readonly user: string;
  readonly description: string;
  readonly now: Date;
}

export function createBackupRecord(input: BackupInput): BackupRecord {
  return {
    id: randomUUID(),
    entityCode: input.entityCode,
    dataType: input.dataType,
    periods: [...input.periods],
    records: [...input.records],
    user: input.user,
    description: input.description,
    createdAt: input.now.toISOString(),
    digest: computeRecordsDigest(input.records),
  };
}

export function uploadBackupDescription(now: Date): string {
  return `Backup before upload on ${formatTimestamp(now)}`;
}

function distinctSorted(values: Iterable<string>): string[] {
  return [...new Set(values)].sort();
}

/**
 * Put a backup's records back in place.
 *
 * Facts currently stored at the backed-up keys are replaced; if there
 * are any, they are backed up first, in the same transaction.
 */
export function restoreBackup(store: FinancialStore, request: RestoreRequest): RestoreResult {
  const backup = store.backups.get(request.backupId);
  if (backup === undefined) {
    throw new IngestError("UNKNOWN_BACKUP", `Backup "${request.backupId}" not found`);
  }
  if (computeRecordsDigest(backup.records) !== backup.digest) {
    throw new IngestError(
      "CORRUPT_BACKUP",
      `Backup "${backup.id}" does not match its digest; refusing to restore`,
    );
  }

  return store.transaction((tx) => {
    const replaced: FactRecord[] = [];
    for (const record of backup.records) {
      replaced.push(
        ...tx.facts.delete({
          entityCodes: [record.entityCode],
          accountCodes: [record.accountCode],
          periods: [record.period],
          dataType: record.dataType,
        }),
      );
    }

    let safetyBackupId: string | undefined;
    if (replaced.length > 0) {
      const safety = tx.backups.create(
        createBackupRecord({
          entityCode: backup.entityCode,
          dataType: backup.dataType,
          periods: distinctSorted(replaced.map((r) => r.period)),
          records: replaced,
          user: request.user,
          description: `Backup before restoring ${backup.id} on ${formatTimestamp(request.now)}`,
          now: request.now,
        }),
      );
      safetyBackupId = safety.id;
    }

    for (const record of backup.records) tx.facts.insert(record);

    return safetyBackupId !== undefined
      ? { backupId: backup.id, restored: backup.records.length, safetyBackupId }
      : { backupId: backup.id, restored: backup.records.length };
  });
}
