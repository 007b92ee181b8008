/**
 * ConsolidatorService — Composition root for the domain packages.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. One service wraps one financial store.
 *
 * Report responses carry a summary of the comments on their cells.
 */

import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import type {
  AccountDimension,
  BackupRecord,
  CellComment,
  DataType,
  Entity,
} from "@consolidator/types";
import type { FinancialStore } from "@consolidator/store";
import {
  generateBalanceSheet,
  generateProfitAndLoss,
  summarizeCell,
  summarizeComments,
} from "@consolidator/report";
import type {
  CellCommentSummary,
  CommentSummary,
  ReportOptions,
  ReportRequest,
  ReportResult,
} from "@consolidator/report";
import { restoreBackup, uploadChartOfAccounts, uploadFinancialData } from "@consolidator/ingest";
import type {
  ChartOfAccountsResult,
  FinancialDataResult,
  RestoreResult,
} from "@consolidator/ingest";
import type {
  ChartUploadDto,
  CommentQueryDto,
  CreateCommentDto,
  CreateEntityDto,
  FactsUploadDto,
  ReportQuery,
  RestoreBackupDto,
  UpdateCommentDto,
} from "../types/dto.js";

// =============================================================================
// Configuration
// =============================================================================

export interface ConsolidatorServiceConfig {
  readonly store: FinancialStore;

  /** Engine options shared by every report; debug output is per request */
  readonly report: Omit<ReportOptions, "includeDebugInfo">;

  readonly logger: Logger;

  /** Timestamp source for backups and comments. Default: current time */
  readonly clock?: () => Date;

  /** Comment id source. Default: random UUID */
  readonly idGenerator?: () => string;
}

/**
 * Report pivot plus per-cell comment counts, keyed `<rowKey>||<field>`.
 */
export type ReportResponse = ReportResult & { readonly commentSummary: CommentSummary };

/** A cell's comments, oldest first, with their summary */
export interface CommentThread {
  readonly comments: readonly CellComment[];
  readonly summary: CellCommentSummary;
}

/** One written comment and the summary of its cell afterwards */
export interface CommentChange {
  readonly comment: CellComment;
  readonly summary: CellCommentSummary;
}

export interface CommentRemoval {
  /** The comment plus its replies */
  readonly removed: number;
  readonly summary: CellCommentSummary;
}

/**
 * Backup listing entry; the snapshot records stay on the server.
 */
export interface BackupSummary {
  readonly id: string;
  readonly entityCode: string;
  readonly dataType: DataType;
  readonly periods: readonly string[];
  readonly recordCount: number;
  readonly user: string;
  readonly description: string;
  readonly createdAt: string;
  readonly digest: string;
}

function summarizeBackup(backup: BackupRecord): BackupSummary {
  return {
    id: backup.id,
    entityCode: backup.entityCode,
    dataType: backup.dataType,
    periods: backup.periods,
    recordCount: backup.records.length,
    user: backup.user,
    description: backup.description,
    createdAt: backup.createdAt,
    digest: backup.digest,
  };
}

function toReportRequest(query: ReportQuery): ReportRequest {
  return {
    dataType: query.data_type,
    ...(query.from_month !== undefined ? { fromMonth: query.from_month } : {}),
    ...(query.from_year !== undefined ? { fromYear: query.from_year } : {}),
    ...(query.to_month !== undefined ? { toMonth: query.to_month } : {}),
    ...(query.to_year !== undefined ? { toYear: query.to_year } : {}),
  };
}

// =============================================================================
// Service
// =============================================================================

export class ConsolidatorService {
  private readonly _store: FinancialStore;
  private readonly _reportOptions: Omit<ReportOptions, "includeDebugInfo">;
  private readonly _logger: Logger;
  private readonly _clock: () => Date;
  private readonly _idGenerator: () => string;

  constructor(config: ConsolidatorServiceConfig) {
    this._store = config.store;
    this._reportOptions = config.report;
    this._logger = config.logger;
    this._clock = config.clock ?? (() => new Date());
    this._idGenerator = config.idGenerator ?? randomUUID;
  }

  // ─── Reports ─────────────────────────────────────────────────────

  profitAndLoss(query: ReportQuery): ReportResponse {
    const result = generateProfitAndLoss(this._store, toReportRequest(query), {
      ...this._reportOptions,
      includeDebugInfo: query.debug,
    });
    this._logReport("profit_and_loss", query, result);
    return this._withComments(result);
  }

  balanceSheet(query: ReportQuery): ReportResponse {
    const result = generateBalanceSheet(this._store, toReportRequest(query), {
      ...this._reportOptions,
      includeDebugInfo: query.debug,
    });
    this._logReport("balance_sheet", query, result);
    return this._withComments(result);
  }

  // ─── Entities ────────────────────────────────────────────────────

  listEntities(): readonly Entity[] {
    return this._store.entities.list();
  }

  createEntity(dto: CreateEntityDto): Entity {
    const entity = this._store.transaction((tx) =>
      tx.entities.add({ code: dto.code, name: dto.name, isAggregate: dto.isAggregate }),
    );
    this._logger.info({ entityCode: entity.code, isAggregate: entity.isAggregate }, "Entity created");
    return entity;
  }

  // ─── Chart of accounts ───────────────────────────────────────────

  listChart(): readonly AccountDimension[] {
    return this._store.dimensions.list();
  }

  uploadChart(dto: ChartUploadDto): ChartOfAccountsResult {
    const result = uploadChartOfAccounts(this._store, {
      table: dto.table,
      replaceExisting: dto.replaceExisting,
    });
    this._logger.info(
      {
        mode: result.mode,
        created: result.created,
        removed: result.removed,
        rowErrors: result.rowErrors.length,
      },
      "Chart of accounts uploaded",
    );
    return result;
  }

  // ─── Financial data ──────────────────────────────────────────────

  uploadFacts(dto: FactsUploadDto): FinancialDataResult {
    const result = uploadFinancialData(this._store, {
      entityCode: dto.entityCode,
      dataType: dto.dataType,
      table: dto.table,
      confirmOverwrite: dto.confirmOverwrite,
      user: dto.user,
      now: this._clock(),
    });
    if (result.status === "confirmation_needed") {
      this._logger.info(
        { entityCode: dto.entityCode, dataType: dto.dataType, existingPeriods: result.existingPeriods },
        "Upload awaiting overwrite confirmation",
      );
    } else {
      this._logger.info(
        {
          entityCode: dto.entityCode,
          dataType: dto.dataType,
          status: result.status,
          created: result.created,
          periods: result.periods.length,
          backupId: result.backupId,
          rowErrors: result.rowErrors.length,
          columnErrors: result.columnErrors.length,
        },
        "Financial data uploaded",
      );
    }
    return result;
  }

  // ─── Backups ─────────────────────────────────────────────────────

  listBackups(): readonly BackupSummary[] {
    return this._store.backups.list().map(summarizeBackup);
  }

  restore(backupId: string, dto: RestoreBackupDto): RestoreResult {
    const result = restoreBackup(this._store, {
      backupId,
      user: dto.user,
      now: this._clock(),
    });
    this._logger.info(
      { backupId, restored: result.restored, safetyBackupId: result.safetyBackupId },
      "Backup restored",
    );
    return result;
  }

  // ─── Comments ────────────────────────────────────────────────────

  listComments(query: CommentQueryDto): CommentThread {
    const comments = this._cellComments(query.row_key, query.column_key);
    return { comments, summary: summarizeCell(comments) };
  }

  createComment(dto: CreateCommentDto): CommentChange {
    const now = this._clock().toISOString();
    const comment = this._store.transaction((tx) =>
      tx.comments.add({
        id: this._idGenerator(),
        parentId: dto.parentId ?? null,
        rowKey: dto.rowKey,
        columnKey: dto.columnKey,
        rowLabel: dto.rowLabel,
        columnLabel: dto.columnLabel,
        message: dto.message,
        resolved: false,
        user: dto.user,
        createdAt: now,
        updatedAt: now,
      }),
    );
    this._logger.info(
      { commentId: comment.id, rowKey: comment.rowKey, columnKey: comment.columnKey },
      "Comment added",
    );
    return { comment, summary: this._cellSummary(comment) };
  }

  /** Every edit restamps updatedAt */
  updateComment(id: string, dto: UpdateCommentDto): CommentChange {
    const comment = this._store.transaction((tx) =>
      tx.comments.update(id, {
        ...(dto.message !== undefined ? { message: dto.message } : {}),
        ...(dto.resolved !== undefined ? { resolved: dto.resolved } : {}),
        updatedAt: this._clock().toISOString(),
      }),
    );
    this._logger.info({ commentId: id, resolved: comment.resolved }, "Comment updated");
    return { comment, summary: this._cellSummary(comment) };
  }

  deleteComment(id: string): CommentRemoval {
    const removed = this._store.transaction((tx) => tx.comments.remove(id));
    this._logger.info({ commentId: id, removed: removed.length }, "Comment removed");
    const [first] = removed;
    const summary = first !== undefined ? this._cellSummary(first) : summarizeCell([]);
    return { removed: removed.length, summary };
  }

  // ─── Health ──────────────────────────────────────────────────────

  /**
   * Ready when the store answers reads.
   */
  isReady(): boolean {
    try {
      this._store.entities.list();
      return true;
    } catch (err: unknown) {
      this._logger.error({ err }, "Store read failed");
      return false;
    }
  }

  // ─── Internal ────────────────────────────────────────────────────

  private _withComments(result: ReportResult): ReportResponse {
    const comments = this._store.comments.list({
      rowKeys: result.rowData.map((row) => row.rowKey),
    });
    return { ...result, commentSummary: summarizeComments(result, comments) };
  }

  private _cellComments(rowKey: string, columnKey: string): readonly CellComment[] {
    return this._store.comments.list({ rowKeys: [rowKey], columnKeys: [columnKey] });
  }

  private _cellSummary(comment: CellComment): CellCommentSummary {
    return summarizeCell(this._cellComments(comment.rowKey, comment.columnKey));
  }

  private _logReport(report: string, query: ReportQuery, result: ReportResult): void {
    this._logger.debug(
      {
        report,
        dataType: query.data_type,
        rows: result.rowData.length,
        columns: result.columnDefs.length,
        ...(result.error !== undefined ? { hint: result.error } : {}),
      },
      "Report generated",
    );
  }
}
