/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createStatementRoutes } from "./statements.js";
export { createMeasureRoutes } from "./measures.js";
export { createRatioRoutes } from "./ratios.js";
export { createReportRoutes } from "./reports.js";
