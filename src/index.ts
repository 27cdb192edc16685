/**
 * Programmatic API: re-exports the core modules.
 * The `medallion` CLI (cli.ts) is a thin layer over these.
 */

export { DatabaseManager } from "./lib/database.js";
export type { ColumnDefinition, DatabaseInfo, SqlParams } from "./lib/database.js";
export { LogManager, EtlLogger } from "./lib/logger.js";
export type { BatchLogger } from "./lib/logger.js";
export { TaskTracker } from "./lib/tasks.js";
export {
  WarehouseError,
  SourceUnavailableError,
  StepFailedError,
  BatchCancelledError,
  ConfigError,
  describeError,
} from "./lib/errors.js";
export type { ErrorDiagnostic, Severity } from "./lib/errors.js";
export { loadConfig, resolveSettings, setSetting } from "./lib/config.js";
export type { MedallionConfig, Settings } from "./lib/config.js";
export { initWarehouse } from "./lib/warehouse.js";

export { BronzeLoader, BRONZE_TABLES, createBronzeTables } from "./bronze/loader.js";
export type { BronzeLoadResult, BronzeTable } from "./bronze/loader.js";

export { SilverTransformer, PUBLISH_MODES } from "./silver/transformer.js";
export type { BatchContext, PublishMode, SilverBatchResult, StepResult } from "./silver/transformer.js";
export { SILVER_STEPS } from "./silver/steps.js";
export * from "./silver/rules/index.js";
export * from "./silver/values.js";
export type * from "./silver/types.js";

export { GoldLayer, GOLD_VIEWS } from "./gold/views.js";
export type { DimCustomer, DimProduct, FactSale, GoldView } from "./gold/views.js";

export { QualityChecker, QUALITY_CHECKS } from "./quality/checks.js";
export type { QualityReport, CheckResult } from "./quality/checks.js";

export { runPipeline } from "./pipeline.js";
export type { PipelineResult } from "./pipeline.js";
