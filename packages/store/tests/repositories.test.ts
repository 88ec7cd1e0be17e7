import { describe, it, expect, beforeEach } from 'vitest';
import { createConcept, createEdge } from '@sinew/shared';
import { ConceptRepository } from '../src/repositories/concept.repository.js';
import { EdgeRepository } from '../src/repositories/edge.repository.js';
import { freshDb } from './helpers.js';
import type Database from 'better-sqlite3';

let db: Database.Database;

beforeEach(() => {
  db = freshDb();
});

describe('ConceptRepository', () => {
  it('round-trips labels, props, embedding and status', () => {
    const repo = new ConceptRepository(db);
    const concept = createConcept({
      kind: 'Procedure',
      labels: ['procedure', 'dag'],
      props: { name: 'Login', steps: [{ tool: 'web.get' }] },
      embedding: [0.5, 0.25],
      status: 'active',
    });
    repo.upsert(concept);

    expect(repo.get(concept.uuid)).toEqual(concept);
  });

  it('omits an absent embedding and status', () => {
    const repo = new ConceptRepository(db);
    const concept = createConcept({ kind: 'Concept' });
    repo.upsert(concept);

    const loaded = repo.get(concept.uuid);
    expect(loaded).toEqual({ entity: 'concept', uuid: concept.uuid, kind: 'Concept', labels: [], props: {} });
  });

  it('finds by kind and counts', () => {
    const repo = new ConceptRepository(db);
    repo.upsert(createConcept({ kind: 'Pattern' }));
    repo.upsert(createConcept({ kind: 'Procedure' }));
    repo.upsert(createConcept({ kind: 'Pattern' }));

    expect(repo.find({ kind: 'Pattern' })).toHaveLength(2);
    expect(repo.count()).toBe(3);
  });

  it('tolerates a corrupt JSON column', () => {
    const repo = new ConceptRepository(db);
    db.prepare("INSERT INTO concepts (uuid, kind, labels, props) VALUES ('bad', 'Concept', 'not-json', '{')").run();
    expect(repo.get('bad')).toEqual({ entity: 'concept', uuid: 'bad', kind: 'Concept', labels: [], props: {} });
  });
});

describe('EdgeRepository', () => {
  it('round-trips edges and finds by endpoint', () => {
    const repo = new EdgeRepository(db);
    const edge = createEdge('from', 'to', 'depends_on', { from_step: 'b', to_step: 'a' });
    repo.upsert(edge);
    repo.upsert(createEdge('to', 'from', 'has_a'));

    expect(repo.get(edge.uuid)).toEqual(edge);
    expect(repo.find({ fromNode: 'from' })).toEqual([edge]);
    expect(repo.find({ toNode: 'from', rel: 'has_a' })).toHaveLength(1);
    expect(repo.count()).toBe(2);
  });
});
