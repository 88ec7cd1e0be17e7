// ── Types ────────────────────────────────────────────────────────
export type {
  Props, ConceptKind, Concept, Edge, GraphEntity, Provenance, ProvenanceSource, WellKnownRel,
} from './types/graph.js';
export type {
  UpsertResult, FilterValue, SearchFilters, SearchQuery, SearchRecord, UpsertEntry,
  GraphStore, EmbedFn, ReasoningFn,
} from './types/storage.js';
export type {
  OnFailPolicy, Guard, StepDescription, ProcedureDescription, ValidationIssue, ValidationResult,
  ConstructionResult, StoredStep, StoredProcedure, ProcedureSummary, ExecutionPlan,
} from './types/procedure.js';
export type {
  ToolCommand, NestedCommand, StepResolution, GraphStep, ProcedureGraph, ExecutionStatus,
  ExecutedStep, StepError, ExecutionResult, EnqueueFn, ExecutionContext,
} from './types/execution.js';
export type {
  Fingerprint, PatternData, PatternInput, PatternMatch, SimilarPattern, TargetContext,
  MappingSource, TransferResult, SuccessRecord, GeneralizeResult, CentroidUpdate, CentroidRecompute,
} from './types/pattern.js';
export type {
  LogLevel, LoggingConfig, StorageConfig, EvolutionConfig, ExecutorConfig, SinewConfig,
} from './types/config.js';
export type { TraceEventType, TraceEvent, TraceSpan, ExecutionTrace } from './types/trace.js';

// ── Schemas ──────────────────────────────────────────────────────
export {
  onFailSchema, guardSchema, stepDescriptionSchema, procedureDescriptionSchema,
} from './schemas/procedure.schema.js';
export {
  loggingConfigSchema, storageConfigSchema, evolutionConfigSchema, executorConfigSchema, sinewConfigSchema,
} from './schemas/config.schema.js';

// ── Constants & utils ────────────────────────────────────────────
export {
  DEFAULT_CONFIG, REL, NESTING_KEYS, BOOKKEEPING_KEYS, PROP, PATTERN_SOURCE, GENERALIZED_TYPE,
  NESTED_EXECUTE_TOOL, EXHAUSTIVE_TOP_K,
} from './constants.js';
export type { NestingKey } from './constants.js';
export * from './utils/index.js';
