import { describe, it, expect } from 'vitest';
import { NotFoundError } from '@sinew/shared';
import { ConceptBuilder } from '../src/concept-builder.js';
import { ProcedureLibrary } from '../src/procedure-library.js';
import { makeGraph, queuedLogin } from './helpers.js';

async function setup() {
  const ctx = makeGraph();
  const builder = new ConceptBuilder(ctx.graph);
  const login = await builder.createFromDescription(queuedLogin);
  const search = await builder.createFromDescription({
    name: 'Site search',
    description: 'Search the catalogue',
    tags: ['web'],
    steps: [{ id: 's1', tool: 'web.type', params: { text: 'shoes' }, guard: 'context.query', on_fail: 'skip' }],
  });
  return { ...ctx, library: new ProcedureLibrary(ctx.graph), login, search };
}

describe('ProcedureLibrary', () => {
  it('reconstructs a stored procedure', async () => {
    const { library, login } = await setup();
    const procedure = await library.getProcedure(login.procedureUuid);

    expect(procedure).toMatchObject({
      uuid: login.procedureUuid,
      name: 'Queued Login',
      description: 'Log in to the site through the task queue',
      goal: 'Authenticated session',
      tags: ['login', 'web'],
      metadata: {},
    });
    expect(procedure?.steps.map(s => [s.id, s.tool, s.order])).toEqual([
      ['step_1', 'web.get_dom', 0],
      ['step_2', 'form.autofill', 1],
      ['step_3', 'web.click_selector', 2],
    ]);
    expect(procedure?.steps[2].depends_on).toEqual(['step_2']);
  });

  it('returns null for unknown or non-procedure uuids', async () => {
    const { library, login } = await setup();
    expect(await library.getProcedure('missing')).toBeNull();
    expect(await library.getProcedure(login.stepUuids[0])).toBeNull();
  });

  it('searches procedures by text and tags', async () => {
    const { library, login, search } = await setup();

    const hits = await library.searchProcedures('login');
    expect(hits.map(h => h.uuid)).toEqual([login.procedureUuid]);
    expect(hits[0].score).toBe(0.8);

    const tagged = await library.searchProcedures('', { tags: ['web'] });
    expect(tagged.map(h => h.uuid)).toEqual([login.procedureUuid, search.procedureUuid]);

    const both = await library.searchProcedures('', { tags: ['web', 'login'] });
    expect(both.map(h => h.uuid)).toEqual([login.procedureUuid]);
  });

  it('builds an execution plan', async () => {
    const { library, search } = await setup();
    const plan = await library.toExecutionPlan(search.procedureUuid);
    expect(plan).toEqual({
      procedureUuid: search.procedureUuid,
      goal: 'Search the catalogue',
      steps: [
        {
          id: 's1',
          tool: 'web.type',
          params: { text: 'shoes' },
          depends_on: [],
          guard: 'context.query',
          on_fail: 'skip',
        },
      ],
      reuse: true,
    });
  });

  it('throws NotFoundError for a missing plan', async () => {
    const { library } = await setup();
    await expect(library.toExecutionPlan('missing')).rejects.toThrow(NotFoundError);
  });
});
