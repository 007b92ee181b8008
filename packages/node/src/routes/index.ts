/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createReportRoutes } from "./reports.js";
export { createEntityRoutes } from "./entities.js";
export { createChartOfAccountsRoutes } from "./chart-of-accounts.js";
export { createFactRoutes } from "./facts.js";
export { createBackupRoutes } from "./backups.js";
export { createCommentRoutes } from "./comments.js";
