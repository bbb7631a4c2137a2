export {RulesService, RulePreview, BulkRunHandle} from "./RulesService";
export * from "./entities/Rule";
export * from "./entities/Transaction";
export {RuleFactory, CreateRuleOptions} from "./entities/RuleFactory";
export * from "./engine/errors";
export {extractField, FieldValue, FieldKind, fieldKind} from "./engine/FieldAccessor";
export {TriggerEvaluator, TriggerValidationResult, normalizeTransactionType, validOperators} from "./engine/TriggerEvaluator";
export {ActionExecutor, ActionOutcome, ActionStatus, ExecutionResult, ExecuteOptions} from "./engine/ActionExecutor";
export {RuleEngine, RuleExecution, TransactionRunResult, orderRules} from "./engine/RuleEngine";
export {BulkRunner, BulkFailure, BulkProgress, BulkRunOptions, BulkRunSummary, BulkSource, formatBulkSummary} from "./engine/BulkRunner";
export {RuleStore, RuleStoreSession, RuleStatistics, TransactionFilter} from "./store/RuleStore";
export {KyselyRuleStore} from "./store/KyselyRuleStore";
export {createSchema, IdentityStrategy} from "./store/schema";
export {Database} from "./store/database.types";
export {EngineConfig, EngineOptions, resolveEngineConfig, DEFAULT_CHUNK_SIZE, DEFAULT_LOG_LEVEL} from "./config";
export {EngineLogger, LogLevel, createConsoleLogger} from "./logger";
