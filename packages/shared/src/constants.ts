import type { SinewConfig } from './types/config.js';
import { sinewConfigSchema } from './schemas/config.schema.js';

/** Every setting at its schema default. */
export const DEFAULT_CONFIG: SinewConfig = sinewConfigSchema.parse({});

export const REL = {
  INSTANTIATES: 'instantiates',
  INHERITS_FROM: 'inherits_from',
  HAS_STEP: 'has_step',
  HAS_CHILD: 'has_child',
  DEPENDS_ON: 'depends_on',
  HAS_EXEMPLAR: 'has_exemplar',
  GENERALIZED_BY: 'generalized_by',
  HAS_A: 'has_a',
  HAS_PROPERTY: 'has_property',
  TRANSFERRED_TO: 'transferred_to',
} as const;

/** Keys under which nested sub-structures may appear in a concept object. */
export const NESTING_KEYS = ['steps', 'children', 'sub_procedures', 'sub_concepts', 'nodes'] as const;

export type NestingKey = (typeof NESTING_KEYS)[number];

/** Step bookkeeping stripped from params before dispatch. */
export const BOOKKEEPING_KEYS = ['uuid', 'id', 'order', 'guard', 'guard_text'] as const;

export const PROP = {
  EMBEDDING_SUM: '_embedding_sum',
  EXEMPLAR_COUNT: '_exemplar_count',
  PROTOTYPE_UUID: 'prototype_uuid',
  SUCCESS_COUNT: 'success_count',
  LAST_SUCCESS_AT: 'last_success_at',
  PATTERN_DATA: 'pattern_data',
} as const;

export const PATTERN_SOURCE = 'pattern-origin';
export const GENERALIZED_TYPE = 'generalized';
export const NESTED_EXECUTE_TOOL = 'dag.execute';

/** Upper bound used when a read needs every matching record. */
export const EXHAUSTIVE_TOP_K = 10_000;
