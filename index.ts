export * from "./src/analysis/index.js";
export * from "./src/categories/index.js";
export * from "./src/config/index.js";
export * from "./src/insights/index.js";
export * from "./src/logging/index.js";
export * from "./src/providers/index.js";
export { generateReport, renderReport, isReportFormat, REPORT_FORMATS } from "./src/reports/generator.js";
export type { ReportFormat } from "./src/reports/generator.js";
export { generateScripts, isScriptType, SCRIPT_TYPES } from "./src/scripts/generator.js";
export type { ScriptType } from "./src/scripts/generator.js";
export { buildProgram } from "./src/cli/program/build-program.js";
export type * from "./src/types.js";
export { CLOUD_PROVIDERS } from "./src/types.js";
