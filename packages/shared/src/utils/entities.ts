import type { Concept, Edge, Props, Provenance, ProvenanceSource } from '../types/graph.js';
import { generateId } from './id.js';
import { isoNow } from './clock.js';

export function createConcept(init: {
  kind: string;
  labels?: string[];
  props?: Props;
  embedding?: number[];
  status?: string;
  uuid?: string;
}): Concept {
  const concept: Concept = {
    entity: 'concept',
    uuid: init.uuid ?? generateId(),
    kind: init.kind,
    labels: init.labels ?? [],
    props: init.props ?? {},
  };
  if (init.embedding && init.embedding.length > 0) concept.embedding = init.embedding;
  if (init.status) concept.status = init.status;
  return concept;
}

export function createEdge(fromNode: string, toNode: string, rel: string, props: Props = {}): Edge {
  const edgeProps = { ...props };
  if (typeof edgeProps.strength === 'number') {
    edgeProps.strength = clampUnit(edgeProps.strength);
  }
  return {
    entity: 'edge',
    uuid: generateId(),
    fromNode,
    toNode,
    rel,
    props: edgeProps,
  };
}

export function createProvenance(
  source: ProvenanceSource = 'system',
  traceId: string = generateId('trace'),
  confidence = 1.0,
): Provenance {
  return { source, ts: isoNow(), confidence: clampUnit(confidence), traceId };
}

export function clampUnit(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/** Narrow an unknown value to a plain string-keyed object. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readString(props: Props, key: string): string | undefined {
  const value = props[key];
  return typeof value === 'string' ? value : undefined;
}

export function readNumber(props: Props, key: string): number | undefined {
  const value = props[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function readStringArray(props: Props, key: string): string[] {
  const value = props[key];
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}
