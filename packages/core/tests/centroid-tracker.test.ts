import { describe, it, expect } from 'vitest';
import { cosineSimilarity, createConcept, createProvenance } from '@sinew/shared';
import { CentroidTracker } from '../src/centroid-tracker.js';
import { makeGraph } from './helpers.js';

const prov = createProvenance('system', 'centroid-test');

describe('CentroidTracker', () => {
  it('moves the centroid toward a repeated exemplar', async () => {
    const { graph } = makeGraph();
    const concept = createConcept({ kind: 'Concept', embedding: [1, 0] });
    await graph.putConcept(concept, prov);
    const tracker = new CentroidTracker(graph);
    const exemplar = [0, 1];

    const similarities: number[] = [];
    for (let i = 0; i < 6; i++) {
      await tracker.addExemplar(concept.uuid, exemplar);
      const centroid = await tracker.getCentroid(concept.uuid);
      similarities.push(cosineSimilarity(centroid?.embedding, exemplar));
    }

    for (let i = 1; i < similarities.length; i++) {
      expect(similarities[i]).toBeGreaterThan(similarities[i - 1]);
    }
    expect(similarities[5]).toBeGreaterThan(0.98);
  });

  it('rejects an exemplar whose length differs from the centroid', async () => {
    const { store, graph } = makeGraph();
    const concept = createConcept({ kind: 'Concept', embedding: [1, 0] });
    await graph.putConcept(concept, prov);

    const update = await new CentroidTracker(graph).addExemplar(concept.uuid, [1, 0, 0]);

    expect(update).toEqual({ updated: false, exemplarCount: 1, embeddingDrift: 0, error: 'dimension mismatch' });
    const stored = store.getConcept(concept.uuid);
    expect(stored?.embedding).toEqual([1, 0]);
    expect(stored?.props).toEqual({});
  });

  it('seeds the running sum from an existing embedding', async () => {
    const { store, graph } = makeGraph();
    const concept = createConcept({ kind: 'Concept', embedding: [2, 0] });
    await graph.putConcept(concept, prov);

    const update = await new CentroidTracker(graph).addExemplar(concept.uuid, [0, 2]);

    expect(update.updated).toBe(true);
    expect(update.exemplarCount).toBe(2);
    expect(update.embeddingDrift).toBeCloseTo(Math.SQRT1_2);
    const stored = store.getConcept(concept.uuid);
    expect(stored?.embedding).toEqual([1, 1]);
    expect(stored?.props).toEqual({ _embedding_sum: [2, 2], _exemplar_count: 2 });
  });

  it('reports drift 1 when there was no previous embedding', async () => {
    const { graph } = makeGraph();
    const concept = createConcept({ kind: 'Concept' });
    await graph.putConcept(concept, prov);

    const update = await new CentroidTracker(graph).addExemplar(concept.uuid, [3, 4]);

    expect(update).toEqual({ updated: true, exemplarCount: 1, embeddingDrift: 1 });
  });

  it('links the exemplar when its uuid is given', async () => {
    const { store, graph } = makeGraph();
    const concept = createConcept({ kind: 'Concept' });
    await graph.putConcept(concept, prov);

    await new CentroidTracker(graph).addExemplar(concept.uuid, [1, 0], 'ex-1');

    expect(store.allEdges()).toMatchObject([{ fromNode: concept.uuid, toNode: 'ex-1', rel: 'has_exemplar' }]);
  });

  it('refuses missing concepts and empty exemplars', async () => {
    const { graph } = makeGraph();
    const tracker = new CentroidTracker(graph);
    expect(await tracker.addExemplar('missing', [1])).toEqual({
      updated: false,
      exemplarCount: 0,
      embeddingDrift: 0,
      error: 'Concept not found: missing',
    });

    const concept = createConcept({ kind: 'Concept' });
    await graph.putConcept(concept, prov);
    expect((await tracker.addExemplar(concept.uuid, [])).error).toBe('Exemplar embedding is empty');
  });

  it('recomputes the centroid from linked exemplars', async () => {
    const { store, graph } = makeGraph();
    const e1 = createConcept({ kind: 'Concept', embedding: [1, 0] });
    const e2 = createConcept({ kind: 'Concept', embedding: [0, 1] });
    const e3 = createConcept({ kind: 'Concept' });
    const parent = createConcept({ kind: 'Concept', embedding: [9, 9] });
    await graph.save([e1, e2, e3, parent], prov);
    for (const e of [e1, e2, e3]) await graph.link(parent.uuid, e.uuid, 'has_exemplar', {}, prov);

    const result = await new CentroidTracker(graph).recomputeCentroid(parent.uuid);

    expect(result).toEqual({ recomputed: true, exemplarCount: 2 });
    expect(store.getConcept(parent.uuid)?.embedding).toEqual([0.5, 0.5]);
  });
});
