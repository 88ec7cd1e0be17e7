import { describe, it, expect, beforeEach } from 'vitest';
import {
  createConcept, createEdge, createProvenance, type GraphStore,
} from '@sinew/shared';
import { InMemoryGraphStore } from '../src/graph/memory-graph-store.js';
import { SqliteGraphStore } from '../src/graph/sqlite-graph-store.js';
import { freshDb, freshSqliteStore } from './helpers.js';

const prov = createProvenance('user', 'store-test');

const backends: Array<[string, () => GraphStore]> = [
  ['InMemoryGraphStore', () => new InMemoryGraphStore()],
  ['SqliteGraphStore', freshSqliteStore],
];

describe.each(backends)('%s', (_name, makeStore) => {
  let store: GraphStore;

  beforeEach(() => {
    store = makeStore();
  });

  it('upserts a concept and finds it by uuid', async () => {
    const concept = createConcept({ kind: 'Procedure', labels: ['procedure'], props: { name: 'Login' } });
    const result = await store.upsert(concept, prov);
    expect(result).toEqual({ status: 'success', uuid: concept.uuid });

    const found = await store.search({ text: '', topK: 1, filters: { uuid: concept.uuid } });
    expect(found).toHaveLength(1);
    expect(found[0]).toMatchObject({ entity: 'concept', kind: 'Procedure', props: { name: 'Login' } });
  });

  it('replaces a concept in place on re-upsert', async () => {
    const a = createConcept({ kind: 'Concept', props: { name: 'a' } });
    const b = createConcept({ kind: 'Concept', props: { name: 'b' } });
    await store.upsert(a, prov);
    await store.upsert(b, prov);
    await store.upsert({ ...a, props: { name: 'a2' }, embedding: [1, 0] }, prov);

    const all = await store.search({ text: '', topK: 10, filters: { kind: 'Concept' } });
    expect(all.map(c => c.props.name)).toEqual(['a2', 'b']);
    const first = all[0];
    expect(first.entity === 'concept' ? first.embedding : undefined).toEqual([1, 0]);
  });

  it('filters edges by shallow fields in insertion order', async () => {
    const e1 = createEdge('p', 's1', 'has_step', { order: 0 });
    const e2 = createEdge('p', 's2', 'has_step', { order: 1 });
    const e3 = createEdge('p', 'x', 'instantiates');
    for (const e of [e1, e2, e3]) await store.upsert(e, prov);

    const steps = await store.search({
      text: '', topK: 10, filters: { entity: 'edge', fromNode: 'p', rel: 'has_step' },
    });
    expect(steps.map(e => e.uuid)).toEqual([e1.uuid, e2.uuid]);
  });

  it('filters on a top-level prop', async () => {
    await store.upsert(createConcept({ kind: 'Pattern', props: { source: 'pattern-origin', name: 'p1' } }), prov);
    await store.upsert(createConcept({ kind: 'Pattern', props: { source: 'manual', name: 'p2' } }), prov);

    const found = await store.search({ text: '', topK: 10, filters: { 'props.source': 'pattern-origin' } });
    expect(found.map(f => f.props.name)).toEqual(['p1']);
  });

  it('ranks by cosine similarity when a query embedding is given', async () => {
    const near = createConcept({ kind: 'Concept', props: { name: 'near' }, embedding: [1, 0.1] });
    const far = createConcept({ kind: 'Concept', props: { name: 'far' }, embedding: [0, 1] });
    await store.upsert(far, prov);
    await store.upsert(near, prov);

    const ranked = await store.search({ text: 'anything', topK: 2, embedding: [1, 0], filters: { kind: 'Concept' } });
    expect(ranked.map(r => r.props.name)).toEqual(['near', 'far']);
    expect(ranked[1].score).toBe(0);
  });

  it('ranks by text when no embedding is given', async () => {
    await store.upsert(createConcept({ kind: 'Procedure', props: { name: 'Send weekly report' } }), prov);
    await store.upsert(createConcept({ kind: 'Procedure', props: { name: 'Login to mail' } }), prov);

    const ranked = await store.search({ text: 'login to mail', topK: 5, filters: { kind: 'Procedure' } });
    expect(ranked[0].props.name).toBe('Login to mail');
    expect(ranked[0].score).toBe(0.8);
    expect(ranked[1].score).toBe(0);
  });

  it('honours topK', async () => {
    for (let i = 0; i < 4; i++) {
      await store.upsert(createConcept({ kind: 'Concept', props: { name: `c${i}` } }), prov);
    }
    expect(await store.search({ text: '', topK: 2 })).toHaveLength(2);
  });

  it('returns copies that do not alias stored state', async () => {
    const concept = createConcept({ kind: 'Concept', props: { name: 'orig' } });
    await store.upsert(concept, prov);
    concept.props.name = 'mutated';

    const [found] = await store.search({ text: '', topK: 1, filters: { uuid: concept.uuid } });
    found.props.name = 'mutated again';
    const [again] = await store.search({ text: '', topK: 1, filters: { uuid: concept.uuid } });
    expect(again.props.name).toBe('orig');
  });

  it('writes a batch with upsertMany', async () => {
    const c = createConcept({ kind: 'Concept', props: { name: 'batch' } });
    const e = createEdge(c.uuid, 'other', 'has_a');
    const results = await store.upsertMany?.([
      { entity: c, provenance: prov },
      { entity: e, provenance: prov },
    ]);
    expect(results?.map(r => r.status)).toEqual(['success', 'success']);
    expect(await store.search({ text: '', topK: 10, filters: { entity: 'edge', fromNode: c.uuid } })).toHaveLength(1);
  });
});

describe('SqliteGraphStore', () => {
  it('records provenance for each write', async () => {
    const store = new SqliteGraphStore(freshDb());
    const concept = createConcept({ kind: 'Concept' });
    await store.upsert(concept, createProvenance('tool', 'trace-xyz', 0.4));

    expect(store.provenance.listForEntity(concept.uuid)).toEqual([
      expect.objectContaining({ source: 'tool', traceId: 'trace-xyz', confidence: 0.4 }),
    ]);
    expect(store.provenance.listEntitiesForTrace('trace-xyz')).toEqual([concept.uuid]);
  });

  it('reports an error result instead of throwing when the database is closed', async () => {
    const db = freshDb();
    const store = new SqliteGraphStore(db);
    db.close();
    const concept = createConcept({ kind: 'Concept' });

    const result = await store.upsert(concept, createProvenance());
    expect(result.status).toBe('error');
    expect(result.uuid).toBe(concept.uuid);
  });
});

describe('InMemoryGraphStore', () => {
  it('keeps a provenance log', async () => {
    const store = new InMemoryGraphStore();
    const edge = createEdge('a', 'b', 'has_a');
    await store.upsert(edge, createProvenance('doc', 'trace-1'));

    expect(store.provenanceLog()).toEqual([
      { uuid: edge.uuid, entity: 'edge', provenance: expect.objectContaining({ source: 'doc', traceId: 'trace-1' }) },
    ]);
    expect(store.allEdges()).toHaveLength(1);
  });
});
