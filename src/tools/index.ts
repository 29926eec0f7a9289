export { registerAccountTools } from "./accounts.js";
export { registerTransactionTools } from "./transactions.js";
export { registerCategoryTools } from "./categories.js";
export { registerStatusTools } from "./status.js";
export { registerAnalysisTools } from "./analysis.js";
export { registerReportTools } from "./reports.js";
export { registerHealthTools } from "./health.js";
export { registerResources } from "./resources.js";
export { registerPrompts } from "./prompts.js";
export type { ToolContext } from "./context.js";
