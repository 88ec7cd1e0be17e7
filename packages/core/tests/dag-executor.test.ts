import { describe, it, expect } from 'vitest';
import { createConcept, createEdge, createProvenance, type ToolCommand, type GraphStep } from '@sinew/shared';
import { ConceptBuilder } from '../src/concept-builder.js';
import { DagExecutor } from '../src/dag-executor.js';
import { makeGraph, queuedLogin } from './helpers.js';

const prov = createProvenance('user', 'executor-test');

function step(id: string, dependsOn: string[], order: number, extra: Partial<GraphStep> = {}): GraphStep {
  return { id, tool: `tool.${id}`, params: {}, dependsOn, order, ...extra };
}

describe('DagExecutor.schedule', () => {
  const { graph } = makeGraph();
  const executor = new DagExecutor(graph);

  it('orders a diamond by dependencies then order', () => {
    const order = executor.schedule({
      conceptUuid: 'c',
      steps: [step('D', ['B', 'C'], 3), step('C', ['A'], 2), step('B', ['A'], 1), step('A', [], 0)],
    });
    expect(order).toEqual(['A', 'B', 'C', 'D']);
  });

  it('lets order pick between independent branches', () => {
    const order = executor.schedule({
      conceptUuid: 'c',
      steps: [step('A', [], 0), step('B', ['A'], 5), step('C', ['A'], 1), step('D', ['B', 'C'], 9)],
    });
    expect(order).toEqual(['A', 'C', 'B', 'D']);
  });

  it('ignores dependencies on unknown ids', () => {
    expect(executor.schedule({ conceptUuid: 'c', steps: [step('A', ['ghost'], 0)] })).toEqual(['A']);
  });

  it('appends steps stuck in a cycle by order', () => {
    const order = executor.schedule({
      conceptUuid: 'c',
      steps: [step('X', ['Y'], 2), step('Y', ['X'], 1), step('Z', [], 0)],
    });
    expect(order).toEqual(['Z', 'Y', 'X']);
  });
});

describe('DagExecutor.resolveCommand', () => {
  const { graph } = makeGraph();
  const executor = new DagExecutor(graph);

  it('strips bookkeeping keys from params', () => {
    const resolution = executor.resolveCommand({
      id: 's',
      tool: 'web.click',
      params: { selector: '#go', uuid: 'u', id: 's', order: 1, guard: true, guard_text: 'yes' },
      dependsOn: [],
      order: 0,
    });
    expect(resolution).toEqual({ kind: 'tool', command: { tool: 'web.click', params: { selector: '#go' } } });
  });

  it('resolves a nested reference', () => {
    const resolution = executor.resolveCommand({ id: 's', params: {}, dependsOn: [], order: 0, conceptUuid: 'sub' });
    expect(resolution).toEqual({
      kind: 'nested',
      command: { tool: 'dag.execute', concept_uuid: 'sub', nested: true },
    });
  });

  it('reports a step with neither', () => {
    const resolution = executor.resolveCommand({ id: 's', params: {}, dependsOn: [], order: 0 });
    expect(resolution).toEqual({ kind: 'unresolved', reason: 'Step s has no tool command or nested concept' });
  });
});

describe('DagExecutor.execute', () => {
  it('runs the Queued Login procedure in order', async () => {
    const { graph } = makeGraph();
    const built = await new ConceptBuilder(graph).createFromDescription(queuedLogin);
    const sent: ToolCommand[] = [];

    const result = await new DagExecutor(graph).execute(built.procedureUuid, {}, cmd => {
      sent.push(cmd);
    });

    expect(result.status).toBe('completed');
    expect(result.executionOrder).toEqual(['step_1', 'step_2', 'step_3']);
    expect(sent).toEqual([
      { tool: 'web.get_dom', params: { url: 'https://example.com/login' } },
      { tool: 'form.autofill', params: { form: 'login' } },
      { tool: 'web.click_selector', params: { selector: '#submit' } },
    ]);
    expect(result.executed.map(e => e.stepId)).toEqual(['step_1', 'step_2', 'step_3']);
    expect(result.errors).toEqual([]);
  });

  it('returns an error status for a missing root', async () => {
    const { graph } = makeGraph();
    const result = await new DagExecutor(graph).execute('nope');
    expect(result.status).toBe('error');
    expect(result.error).toBe('Procedure graph not found for concept nope');
    expect(result.executionOrder).toEqual([]);
  });

  it('skips a guarded step without blocking its dependents', async () => {
    const { graph } = makeGraph();
    const root = createConcept({
      kind: 'Concept',
      props: {
        dag: [
          { id: 'a', tool: 'x.a' },
          { id: 'b', tool: 'x.b', guard: 'skip', depends_on: ['a'] },
          { id: 'c', tool: 'x.c', depends_on: ['b'] },
        ],
      },
    });
    await graph.putConcept(root, prov);
    const sent: string[] = [];

    const result = await new DagExecutor(graph).execute(root.uuid, {}, cmd => {
      sent.push(cmd.tool);
    });

    expect(sent).toEqual(['x.a', 'x.c']);
    expect(result.pending).toEqual(['b']);
    expect(result.skipped).toEqual(['b']);
    expect(result.executed.map(e => e.stepId)).toEqual(['a', 'c']);
    expect(result.status).toBe('completed');
  });

  it('reads context guards', async () => {
    const { graph } = makeGraph();
    const root = createConcept({
      kind: 'Concept',
      props: { steps: [{ id: 'pay', tool: 'checkout.pay', guard: 'context.cart.ready' }] },
    });
    await graph.putConcept(root, prov);
    const executor = new DagExecutor(graph);

    expect((await executor.execute(root.uuid, { cart: { ready: false } })).skipped).toEqual(['pay']);
    expect((await executor.execute(root.uuid, { cart: { ready: true } })).skipped).toEqual([]);
  });

  it('records unresolved steps and keeps going', async () => {
    const { graph } = makeGraph();
    const root = createConcept({
      kind: 'Concept',
      props: { steps: [{ id: 'empty' }, { id: 'ok', tool: 'x.ok' }] },
    });
    await graph.putConcept(root, prov);

    const result = await new DagExecutor(graph).execute(root.uuid);

    expect(result.status).toBe('partial');
    expect(result.errors).toEqual([{ stepId: 'empty', message: 'Step empty has no tool command or nested concept' }]);
    expect(result.executed.map(e => e.stepId)).toEqual(['ok']);
  });

  it('does not dispatch a nested reference to a missing concept', async () => {
    const { graph } = makeGraph();
    const root = createConcept({
      kind: 'Concept',
      props: { steps: [{ id: 'n', concept_uuid: 'ghost' }, { id: 'ok', tool: 'x.ok' }] },
    });
    await graph.putConcept(root, prov);

    const result = await new DagExecutor(graph).execute(root.uuid);

    expect(result.status).toBe('partial');
    expect(result.errors).toEqual([{ stepId: 'n', message: 'Step n references unknown concept ghost' }]);
    expect(result.executed.map(e => e.stepId)).toEqual(['ok']);
  });

  it('records a failing enqueue and keeps going', async () => {
    const { graph } = makeGraph();
    const root = createConcept({
      kind: 'Concept',
      props: { steps: [{ id: 'a', tool: 'x.fail' }, { id: 'b', tool: 'x.ok' }] },
    });
    await graph.putConcept(root, prov);

    const result = await new DagExecutor(graph).execute(root.uuid, {}, async cmd => {
      if (cmd.tool === 'x.fail') throw new Error('queue full');
    });

    expect(result.errors).toEqual([{ stepId: 'a', message: 'Enqueue failed: queue full' }]);
    expect(result.executed.map(e => e.stepId)).toEqual(['b']);
  });

  it('recurses into nested concepts reached by edges', async () => {
    const { graph } = makeGraph();
    const builder = new ConceptBuilder(graph);
    const uuid = await builder.createConceptRecursive('proto', {
      name: 'Outer',
      steps: [
        { tool: 'web.get_dom', order: 0 },
        { name: 'Inner', order: 1, steps: [{ tool: 'form.autofill' }, { tool: 'web.click' }] },
      ],
    });
    const sent: string[] = [];

    const result = await new DagExecutor(graph).execute(uuid, {}, cmd => {
      sent.push(cmd.tool);
    });

    expect(sent).toEqual(['web.get_dom', 'form.autofill', 'web.click']);
    expect(result.status).toBe('completed');
    const nested = result.executed[1];
    expect(nested.command.tool).toBe('dag.execute');
    if ('result' in nested) {
      expect(nested.result.executionOrder).toEqual(['step_0', 'step_1']);
    }
  });

  it('marks the parent partial when a nested run has errors', async () => {
    const { graph } = makeGraph();
    const inner = createConcept({ kind: 'Concept', props: { steps: [{ id: 'bad' }] } });
    const outer = createConcept({ kind: 'Concept', props: {} });
    await graph.save([inner, outer, createEdge(outer.uuid, inner.uuid, 'has_step', { order: 0 })], prov);

    const result = await new DagExecutor(graph).execute(outer.uuid);

    expect(result.status).toBe('partial');
    expect(result.errors).toEqual([{ stepId: inner.uuid, message: `Nested procedure ${inner.uuid} finished with 1 error(s)` }]);
  });

  it('stops at a concept that is already on the path', async () => {
    const { graph } = makeGraph();
    const a = createConcept({ kind: 'Concept', props: {} });
    const b = createConcept({ kind: 'Concept', props: {} });
    await graph.save(
      [a, b, createEdge(a.uuid, b.uuid, 'has_step'), createEdge(b.uuid, a.uuid, 'has_step')],
      prov,
    );

    const result = await new DagExecutor(graph).execute(a.uuid);

    expect(result.status).toBe('partial');
    const nested = result.executed[0];
    if ('result' in nested) {
      expect(nested.result.errors).toEqual([{ stepId: a.uuid, message: `Concept ${a.uuid} is already on the execution path` }]);
    }
  });

  it('records an unresolved step for a dangling child edge', async () => {
    const { graph } = makeGraph();
    const root = createConcept({ kind: 'Concept', props: {} });
    await graph.save([root, createEdge(root.uuid, 'gone', 'has_child')], prov);

    const result = await new DagExecutor(graph).execute(root.uuid);

    expect(result.errors).toEqual([{ stepId: 'gone', message: 'Step gone has no tool command or nested concept' }]);
  });

  it('keeps repeated ids apart', async () => {
    const { graph } = makeGraph();
    const root = createConcept({ kind: 'Concept', props: { steps: [{ id: 'x', tool: 'a' }, { id: 'x', tool: 'b' }] } });
    await graph.putConcept(root, prov);

    const result = await new DagExecutor(graph).execute(root.uuid);

    expect(result.executionOrder).toEqual(['x', 'x#2']);
  });

  it('records the run in a trace', async () => {
    const { graph, sink } = makeGraph();
    const built = await new ConceptBuilder(graph).createFromDescription(queuedLogin);

    const result = await new DagExecutor(graph).execute(built.procedureUuid);

    expect(result.traceId).toMatch(/^trace_/);
    expect(sink.lines.filter(l => l.startsWith('[sinew] step_dispatched'))).toHaveLength(3);
  });
});
