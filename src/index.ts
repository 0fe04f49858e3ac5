export * from "./core/types/Pack";
export { QualityGate, SYNTHETIC_PREFIX, validateResult } from "./core/gate/QualityGate";
export type { QualityGateOptions, GateRunOptions } from "./core/gate/QualityGate";
export { validateGateConfig } from "./core/gate/config";
export type { GateConfig } from "./core/gate/config";
export { decide } from "./core/gate/decision";
export { GateError, PackBusyError, PackClosedError, ConfigError } from "./core/gate/errors";
export { PackRecord } from "./core/gate/PackRecord";
export { withRetry } from "./core/gate/retry";
export { initialState, transition, describeState } from "./core/gate/stateMachine";
export type { GateState, GateEvent } from "./core/gate/stateMachine";
export { runPack, runPacks } from "./core/gate/runPacks";
export type { PackJob, PackRunResult } from "./core/gate/runPacks";
export { RUBRIC, calculateOverallScore } from "./core/rubric/rubric";
export { parseDelta, formatDelta } from "./core/refine/deltas";
export { applyDeltas, evolveParameters, variantCount, renderPrompt, defaultBrandTokens } from "./core/refine/parameters";
export { renderRoundReport, renderSummary, renderOperatorMessage, renderHistory } from "./core/report/qaLog";

export { EvaluatorPort } from "./core/ports/EvaluatorPort";
export type { EvalResult, EvaluationContext } from "./core/ports/EvaluatorPort";
export { RegeneratorPort } from "./core/ports/RegeneratorPort";
export type { RegenerateRequest } from "./core/ports/RegeneratorPort";
export { NotifierPort } from "./core/ports/NotifierPort";
export type { PackRepoPort, PackRow, PackSnapshot } from "./core/ports/PackRepoPort";
export type { ReportWriterPort } from "./core/ports/ReportWriterPort";

export { createCritic, GeminiCritic, SimulatedCritic, CriticResponseError } from "./adapters/llm";
export type { CriticMode } from "./adapters/llm";
export { GeminiImageRegenerator } from "./adapters/imagegen/GeminiImageRegenerator";
export { SimulatedRegenerator } from "./adapters/imagegen/SimulatedRegenerator";
export { LibsqlPackRepo } from "./adapters/repo/LibsqlPackRepo";
export { InMemoryPackRepo } from "./adapters/repo/InMemoryPackRepo";
export { MarkdownReportWriter } from "./adapters/report/MarkdownReportWriter";
export { TelegramHttpNotifier } from "./adapters/notifier/TelegramHttpNotifier";
export { ConsoleNotifier } from "./adapters/notifier/ConsoleNotifier";

export { loadConfig } from "./config";
export type { AppConfig } from "./config";
export { loadPackConfig, resolveGateConfig } from "./config/packConfig";
export { createDb } from "./db/db";
export { runQualityGateJob } from "./entrypoints/jobs/qualityGate.job";
