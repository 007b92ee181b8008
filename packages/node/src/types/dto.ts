/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

export const DataTypeSchema = z.enum(["actual", "budget", "forecast"]);

/** Decoded spreadsheet cell; decoding the file itself happens client-side */
export const TableCellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const TableSchema = z.object({
  header: z.array(TableCellSchema).min(1),
  rows: z.array(z.array(TableCellSchema)),
});

// =============================================================================
// Report DTOs
// =============================================================================

/**
 * Month/year bounds stay strings: an unparseable bound means "no bound",
 * which the report engine decides, not the validator.
 */
export const ReportQuerySchema = z.object({
  from_month: z.string().optional(),
  from_year: z.string().optional(),
  to_month: z.string().optional(),
  to_year: z.string().optional(),
  data_type: DataTypeSchema.default("actual"),
  debug: z
    .enum(["true", "false"])
    .transform((v) => v === "true")
    .default("false"),
});

export type ReportQuery = z.infer<typeof ReportQuerySchema>;

// =============================================================================
// Entity DTOs
// =============================================================================

export const CreateEntitySchema = z.object({
  code: z.string().trim().min(1).max(32),
  name: z.string().trim().min(1).max(256),
  isAggregate: z.boolean().default(false),
});

export type CreateEntityDto = z.infer<typeof CreateEntitySchema>;

// =============================================================================
// Upload DTOs
// =============================================================================

export const FactsUploadSchema = z.object({
  entityCode: z.string().min(1),
  dataType: DataTypeSchema,
  table: TableSchema,
  confirmOverwrite: z.boolean().default(false),
  user: z.string().min(1).default("api"),
});

export type FactsUploadDto = z.infer<typeof FactsUploadSchema>;

export const ChartUploadSchema = z.object({
  table: TableSchema,
  replaceExisting: z.boolean().default(false),
});

export type ChartUploadDto = z.infer<typeof ChartUploadSchema>;

// =============================================================================
// Backup DTOs
// =============================================================================

export const RestoreBackupSchema = z.object({
  user: z.string().min(1).default("api"),
});

export type RestoreBackupDto = z.infer<typeof RestoreBackupSchema>;

// =============================================================================
// Comment DTOs
// =============================================================================

/** A cell is addressed by its row's rowKey and its column's field */
export const CommentQuerySchema = z.object({
  row_key: z.string().min(1),
  column_key: z.string().min(1),
});

export type CommentQueryDto = z.infer<typeof CommentQuerySchema>;

const CommentMessageSchema = z.string().trim().min(1).max(4000);

export const CreateCommentSchema = z.object({
  rowKey: z.string().min(1),
  columnKey: z.string().min(1),
  rowLabel: z.string().default(""),
  columnLabel: z.string().default(""),
  message: CommentMessageSchema,
  parentId: z.string().min(1).optional(),
  user: z.string().min(1).default("api"),
});

export type CreateCommentDto = z.infer<typeof CreateCommentSchema>;

export const UpdateCommentSchema = z.object({
  message: CommentMessageSchema.optional(),
  resolved: z.boolean().optional(),
});

export type UpdateCommentDto = z.infer<typeof UpdateCommentSchema>;
