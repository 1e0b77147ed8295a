// Types
export * from './types/index.js';
export type { ValidationIssue, ValidationResult } from './validation/types.js';

// Errors
export * from './errors/index.js';

// Configuration
export {
  resolveEngineConfig,
  loadEngineConfig,
  parseConfigFile,
  findConfigFile,
  CONFIG_FILENAMES,
  DEFAULT_HOT_RELOAD_SCHEDULE,
} from './config/engine-config.js';
export type {
  EngineConfig,
  EngineConfigInput,
  HotReloadOptions,
  LoadedEngineConfig,
  RuleSetSourceConfig,
} from './config/engine-config.js';

// Table ingest
export { decodeTable, resolveTableFormat, contentTypeFromPath } from './table/decoder.js';
export type { DecodeOptions, TableFormat } from './table/decoder.js';
export { getSheetNames, parseSheet, parseAll, parseBytes } from './table/table-parser.js';
export type { ParseBytesOptions } from './table/table-parser.js';

// Compilation
export { RuleCompiler } from './compiler/rule-compiler.js';
export type { CompileOptions } from './compiler/rule-compiler.js';
export { parseCondition, parseAction, parseLiteral, HALT_FIELD } from './compiler/expression.js';
export { CompilationCache } from './cache/compilation-cache.js';
export type { CacheLookup, CompilationCacheOptions, CompilationCacheStats } from './cache/compilation-cache.js';

// Evaluation
export { ConditionEvaluator } from './evaluation/condition-evaluator.js';
export { ActionExecutor } from './evaluation/action-executor.js';
export { EvaluationContext, defaultContextFactory } from './pool/evaluation-context.js';
export type { EvaluationContextFactory } from './pool/evaluation-context.js';
export { SessionPool } from './pool/session-pool.js';
export type { SessionPoolStats } from './pool/session-pool.js';
export { BoundedTaskScheduler } from './core/task-scheduler.js';
export type { Task, TaskScheduler } from './core/task-scheduler.js';

// Hot reload
export { HotReloadWatcher } from './core/hot-reload/watcher.js';
export { FileTableSource, MemoryTableSource } from './core/hot-reload/sources.js';
export type { FileTableSourceConfig, MemoryTableSourceConfig } from './core/hot-reload/sources.js';
export type {
  TableSource,
  HotReloadConfig,
  HotReloadStatus,
  ReloadResult,
  CheckResult,
} from './core/hot-reload/types.js';

// Utils
export { fingerprint } from './utils/fingerprint.js';
export { getNestedValue, setNestedValue } from './utils/field-path.js';

// Hlavní RuleEngine class
export { RuleEngine } from './core/rule-engine.js';
export type { RuleEngineDependencies } from './core/rule-engine.js';
