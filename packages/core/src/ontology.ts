import { createConcept, createEdge, createProvenance, REL, type GraphEntity, type Provenance } from '@sinew/shared';
import type { KnowledgeGraph } from './knowledge-graph.js';

export interface PrototypeDefinition {
  name: string;
  summary: string;
  /** Defaults to BasePrototype. */
  parent?: string;
}

export const ROOT_PROTOTYPE = 'BasePrototype';

export const DEFAULT_PROTOTYPES: readonly PrototypeDefinition[] = [
  { name: ROOT_PROTOTYPE, summary: 'Root of the prototype hierarchy.' },
  { name: 'Person', summary: 'A human individual.' },
  { name: 'Organization', summary: 'A company, institution or group of people.' },
  { name: 'Place', summary: 'A physical or virtual location.' },
  { name: 'Thing', summary: 'A generic object or entity.' },
  { name: 'DigitalResource', summary: 'A file, document or other digital asset.' },
  { name: 'CreativeWork', summary: 'An authored work such as an article, image or song.' },
  { name: 'Event', summary: 'Something that happens at a point or span in time.' },
  { name: 'Task', summary: 'A unit of work to be done.' },
  { name: 'Project', summary: 'A collection of related tasks toward a goal.' },
  { name: 'Commandlet', summary: 'A single tool invocation with parameters.' },
  { name: 'Procedure', summary: 'A reusable ordered set of steps forming a DAG.' },
  { name: 'Step', summary: 'One step of a procedure.' },
  { name: 'Trigger', summary: 'A condition that starts a procedure.' },
  { name: 'QueueItem', summary: 'A unit of work waiting in a queue.' },
  { name: 'WebResource', summary: 'A page, form or endpoint on the web.' },
  { name: 'Object', summary: 'A structured value with named properties.' },
  { name: 'List', summary: 'An ordered collection of items.' },
  { name: 'DAG', summary: 'A directed acyclic graph of steps.', parent: 'List' },
  { name: 'Queue', summary: 'A first-in first-out list of items.', parent: 'List' },
];

/**
 * Create any missing default prototypes and their `inherits_from` edges.
 * Running it again creates nothing. Returns name -> uuid for every prototype.
 */
export async function ensureDefaultPrototypes(
  graph: KnowledgeGraph,
  provenance: Provenance = createProvenance('system'),
): Promise<Map<string, string>> {
  const uuids = new Map<string, string>();
  const created = new Set<string>();
  const pending: GraphEntity[] = [];

  for (const def of DEFAULT_PROTOTYPES) {
    const existing = await findPrototype(graph, def.name);
    if (existing) {
      uuids.set(def.name, existing);
      continue;
    }
    const concept = createConcept({
      kind: 'Prototype',
      labels: [def.name],
      props: { name: def.name, summary: def.summary },
      embedding: await graph.embed(`${def.name} ${def.summary}`, provenance.traceId),
    });
    uuids.set(def.name, concept.uuid);
    created.add(def.name);
    pending.push(concept);
  }

  for (const def of DEFAULT_PROTOTYPES) {
    if (def.name === ROOT_PROTOTYPE || !created.has(def.name)) continue;
    const self = uuids.get(def.name);
    const parent = uuids.get(def.parent ?? ROOT_PROTOTYPE);
    if (self && parent) pending.push(createEdge(self, parent, REL.INHERITS_FROM));
  }

  await graph.save(pending, provenance);
  return uuids;
}

export async function findPrototype(graph: KnowledgeGraph, name: string): Promise<string | null> {
  const hits = await graph.searchConcepts('', {
    topK: 1,
    filters: { kind: 'Prototype', 'props.name': name },
  });
  return hits[0]?.concept.uuid ?? null;
}
