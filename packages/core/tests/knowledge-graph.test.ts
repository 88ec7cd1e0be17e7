import { describe, it, expect } from 'vitest';
import {
  StorageError,
  createConcept,
  createProvenance,
  type GraphStore,
  type SearchRecord,
  type UpsertResult,
} from '@sinew/shared';
import { InMemoryGraphStore } from '@sinew/store';
import { KnowledgeGraph } from '../src/knowledge-graph.js';
import { TraceLogger } from '../src/trace-logger.js';
import { captureSink, makeGraph } from './helpers.js';

const prov = createProvenance('user', 'kg-test');

/** Store whose writes always fail. */
class RejectingStore implements GraphStore {
  async upsert(entity: { uuid: string }): Promise<UpsertResult> {
    return { status: 'error', uuid: entity.uuid, error: 'disk full' };
  }
  async search(): Promise<SearchRecord[]> {
    return [];
  }
}

describe('KnowledgeGraph', () => {
  it('reads concepts and edges back', async () => {
    const { graph } = makeGraph();
    const a = createConcept({ kind: 'Concept', props: { name: 'a' } });
    const b = createConcept({ kind: 'Concept', props: { name: 'b' } });
    await graph.save([a, b], prov);
    await graph.link(a.uuid, b.uuid, 'has_a', {}, prov);

    expect(await graph.getConcept(a.uuid)).toEqual(a);
    expect(await graph.getConcept('missing')).toBeNull();
    expect((await graph.edgesFrom(a.uuid)).map(e => e.toNode)).toEqual([b.uuid]);
    expect((await graph.edgesTo(b.uuid, 'has_a')).map(e => e.fromNode)).toEqual([a.uuid]);
    expect(await graph.edgesFrom(a.uuid, 'other')).toEqual([]);
  });

  it('creates instances linked to their prototype', async () => {
    const { store, graph } = makeGraph();
    const instance = await graph.createInstance('proto-person', { name: 'Ada' });

    expect(instance.labels).toEqual(['Ada']);
    expect(instance.props).toEqual({ name: 'Ada', prototype_uuid: 'proto-person' });
    expect(store.allEdges()).toMatchObject([{ fromNode: instance.uuid, toNode: 'proto-person', rel: 'instantiates' }]);
  });

  it('clamps association strength', async () => {
    const { graph } = makeGraph();
    const edge = await graph.addAssociation('a', 'b', 'reminds_of', 3);
    expect(edge.props.strength).toBe(1);
  });

  it('returns write failures without throwing and logs them', async () => {
    const sink = captureSink();
    const graph = new KnowledgeGraph(new RejectingStore(), { tracer: new TraceLogger({ sink }) });
    const concept = createConcept({ kind: 'Concept' });

    const result = await graph.write(concept, prov);

    expect(result).toEqual({ status: 'error', uuid: concept.uuid, error: 'disk full' });
    expect(sink.lines).toEqual([
      `[sinew] write_failed {"uuid":"${concept.uuid}","entity":"concept","error":"disk full"}`,
    ]);
  });

  it('throws StorageError from save when a write fails', async () => {
    const graph = new KnowledgeGraph(new RejectingStore(), { tracer: new TraceLogger({ sink: captureSink() }) });
    await expect(graph.save([createConcept({ kind: 'Concept' })], prov)).rejects.toThrow(StorageError);
  });

  it('falls back to no embedding when the embedder throws', async () => {
    const sink = captureSink();
    const graph = new KnowledgeGraph(new InMemoryGraphStore(), {
      embed: () => {
        throw new Error('model offline');
      },
      tracer: new TraceLogger({ sink }),
    });

    expect(await graph.embed('hello', 'trace_x')).toBeUndefined();
    expect(sink.lines).toEqual([
      '[sinew] degradation {"reason":"embedding function failed","text":"hello","error":"model offline"}',
    ]);
  });

  it('searches concepts only', async () => {
    const { graph } = makeGraph();
    const login = createConcept({ kind: 'Procedure', labels: ['login'], props: { name: 'Login flow' } });
    await graph.save([login], prov);
    await graph.link(login.uuid, login.uuid, 'login_related', {}, prov);

    const hits = await graph.searchConcepts('login');
    expect(hits).toHaveLength(1);
    expect(hits[0].concept.uuid).toBe(login.uuid);
    expect(hits[0].score).toBe(0.8);
  });
});
