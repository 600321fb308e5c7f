// @insight-desk/engine — role-scoped query and insight engine

// Engine
export { InsightEngine, createInsightEngine } from './src/pipeline.js';
export type {
  AskOptions, AskResult, InsightEngineDeps, PipelineStage, TraceEntry,
} from './src/pipeline.js';

// Configuration
export { loadConfig, parseRiskBands, ConfigError, DEFAULT_FORECAST_CONFIG } from './config/index.js';
export type {
  EngineConfig, ForecastConfig, LlmConfig, RiskBand, StoreConfig, StoreKind,
} from './config/index.js';

// Data access
export * from './data/index.js';

// Scope
export { resolveScope, createScopeFilter, scopedRows } from './scope/resolver.js';

// Planning & execution
export { IntentTranslator } from './planner/intent-translator.js';
export type {
  Translation, TranslateOptions, PlanRejectionRecord, IntentTranslatorOptions,
} from './planner/intent-translator.js';
export { AnthropicLlmService } from './planner/llm-service.js';
export type { LlmService, CompletionRequest } from './planner/llm-service.js';
export { CANNED_INTENTS, matchCannedIntent } from './planner/canned-plans.js';
export type { CannedIntent } from './planner/canned-plans.js';
export { describeSchema } from './planner/prompts.js';
export { executePlan, compareCells } from './execution/executor.js';
export type { Execution, ExecutionStats } from './execution/executor.js';
export { parsePlan, validatePlan, checkRolePermissions, JOIN_PATHS } from './execution/validate.js';
export type { ResolvedPlan, JoinPath } from './execution/validate.js';

// Composition
export { ResponseComposer, NO_DATA_ANSWER, sanitizeAnswer } from './composer/response-composer.js';
export { formatResult, formatCell } from './composer/format-result.js';

// Insight
export { ForecastService, computeForecast, classifyRisk } from './insight/forecast.js';
export { isolationScores, detectSpikes } from './insight/isolation-forest.js';
export { buildDelayReport } from './insight/delays.js';
export type { DelayReportOptions } from './insight/delays.js';
export { detectRevenueAnomalies } from './insight/revenue-anomalies.js';
export type { RevenueAnomalyOptions } from './insight/revenue-anomalies.js';
export { lookupOrderStatus, describeDelay } from './insight/order-status.js';
export { runAudit } from './insight/audit.js';
export type { AuditOptions } from './insight/audit.js';

// Utilities
export { createLogger, setLogLevel, errorMessage } from './utils/log.js';
export type { Logger, LogLevel } from './utils/log.js';
export { formatMoney } from './utils/money.js';

// Types
export * from './types/index.js';
