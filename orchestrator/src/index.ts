export { WorkflowOrchestrator } from "./runtime/engine";
export type { WorkflowOrchestratorOptions } from "./runtime/engine";
export { StepExecutor, prepareStep, DEFAULT_RETRY_DELAY_MS } from "./runtime/stepExecutor";
export type { StepOutcome, StepResult, StepExecutorOptions } from "./runtime/stepExecutor";
export { validateWorkflow, assertValidWorkflow } from "./runtime/validator";
export type { ValidationReport } from "./runtime/validator";
export { toResultSummary } from "./runtime/result";
export { withTimeout, DeadlineExceededError } from "./runtime/timeout";
export * from "./runtime/errors";
export { ProviderRegistry } from "./providers/registry";
export { createDefaultRegistry } from "./providers/builtin";
export { JsonStorage } from "./providers/storage/json";
export { CsvStorage } from "./providers/storage/csv";
export { PostProcessingPipeline } from "./postprocess/pipeline";
export type { Stage, StageFactory } from "./postprocess/stage";
export { builtinStages } from "./postprocess/stages";
export { loadConfig, defaultConfig, providerDefaults } from "./config/defaults";
export type { ScrapeflowConfig } from "./config/defaults";
export { ConsoleLogger, silentLogger } from "./logging/logger";
export type { Logger, LogLevel } from "./logging/logger";
export { loadWorkflowFile } from "./loader";
export { runCli } from "./cli";
export type { RunState, StepErrorRecord, WorkflowResult, ResultSummary } from "./types/workflow";
