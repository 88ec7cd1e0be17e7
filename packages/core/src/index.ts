export { TraceLogger, type LogSink, type TraceLoggerOptions } from './trace-logger.js';
export {
  ConfigManager,
  CONFIG_FILE_NAMES,
  CONFIG_ENV_VARS,
  type ConfigOverrides,
  type ConfigManagerOptions,
} from './config-manager.js';
export { KnowledgeGraph, type KnowledgeGraphOptions, type ConceptHit, type ConceptSearchOptions } from './knowledge-graph.js';
export {
  ensureDefaultPrototypes,
  findPrototype,
  DEFAULT_PROTOTYPES,
  ROOT_PROTOTYPE,
  type PrototypeDefinition,
} from './ontology.js';
export { validateProcedure } from './procedure-validator.js';
export {
  ConceptBuilder,
  classifyItem,
  planConceptTree,
  type BuildOptions,
  type AtomicItem,
  type CompositeItem,
  type SkippedItem,
  type PlannedItem,
  type PlannedChild,
  type ConceptPlan,
} from './concept-builder.js';
export { evaluateGuard } from './guard.js';
export { DagExecutor, type DagExecutorOptions } from './dag-executor.js';
export { CentroidTracker, type Centroid } from './centroid-tracker.js';
export { ProcedureLibrary, type ProcedureSearchOptions } from './procedure-library.js';
export { fingerprint, jaccard, tokenize, domainOf } from './evolution/fingerprint.js';
export { readPatternData } from './evolution/pattern-data.js';
export { PatternStore } from './evolution/pattern-store.js';
export { PatternMatcher, type SimilarPatternOptions, type PatternMatcherOptions } from './evolution/pattern-matcher.js';
export {
  PatternTransfer,
  simpleFieldMapping,
  parseMappingReply,
  buildMappingPrompt,
  type PatternTransferOptions,
} from './evolution/pattern-transfer.js';
export {
  Generalizer,
  type AutoGeneralizeOptions,
  type GeneralizerOptions,
  type GeneralizeConceptsOptions,
} from './evolution/generalizer.js';
export { createSinew, type Sinew, type SinewOptions } from './sinew.js';
