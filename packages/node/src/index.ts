/**
 * @consolidator/node — HTTP service for consolidation reports.
 *
 * Package public API; `main.ts` is the process entry point.
 */

export { ConsolidatorService } from "./services/consolidator-service.js";
export type {
  ConsolidatorServiceConfig,
  BackupSummary,
  ReportResponse,
  CommentThread,
  CommentChange,
  CommentRemoval,
} from "./services/consolidator-service.js";
export { loadConfig, reportOptionsFromConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
