export type Props = Record<string, unknown>;

export type ConceptKind =
  | 'Prototype'
  | 'Concept'
  | 'Relationship'
  | 'Procedure'
  | 'Step'
  | 'Pattern';

export interface Concept {
  entity: 'concept';
  uuid: string;
  /** One of {@link ConceptKind} or a domain-specific kind. */
  kind: string;
  labels: string[];
  props: Props;
  embedding?: number[];
  status?: string;
}

/** Directed, immutable relationship between two concepts. */
export interface Edge {
  entity: 'edge';
  uuid: string;
  fromNode: string;
  toNode: string;
  rel: string;
  props: Props;
}

export type GraphEntity = Concept | Edge;

export type ProvenanceSource = 'user' | 'tool' | 'doc' | 'llm' | 'system';

export interface Provenance {
  source: ProvenanceSource;
  ts: string;
  confidence: number;
  traceId: string;
}

export type WellKnownRel =
  | 'instantiates'
  | 'inherits_from'
  | 'has_step'
  | 'has_child'
  | 'depends_on'
  | 'has_exemplar'
  | 'generalized_by'
  | 'has_a'
  | 'has_property'
  | 'transferred_to';
