/**
 * Type barrel — re-exports all public types from @consolidator/node.
 */

// DTOs
export {
  DataTypeSchema,
  TableCellSchema,
  TableSchema,
  ReportQuerySchema,
  CreateEntitySchema,
  FactsUploadSchema,
  ChartUploadSchema,
  RestoreBackupSchema,
  CommentQuerySchema,
  CreateCommentSchema,
  UpdateCommentSchema,
} from "./dto.js";
export type {
  ReportQuery,
  CreateEntityDto,
  FactsUploadDto,
  ChartUploadDto,
  RestoreBackupDto,
  CommentQueryDto,
  CreateCommentDto,
  UpdateCommentDto,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";
