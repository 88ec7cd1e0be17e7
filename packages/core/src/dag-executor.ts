import {
  BOOKKEEPING_KEYS,
  DEFAULT_CONFIG,
  NESTED_EXECUTE_TOOL,
  NESTING_KEYS,
  REL,
  errorMessage,
  generateId,
  isRecord,
  readNumber,
  readString,
  type Concept,
  type EnqueueFn,
  type ExecutedStep,
  type ExecutionContext,
  type ExecutionResult,
  type Guard,
  type GraphStep,
  type ProcedureGraph,
  type StepError,
  type StepResolution,
} from '@sinew/shared';
import type { KnowledgeGraph } from './knowledge-graph.js';
import { evaluateGuard } from './guard.js';

export interface DagExecutorOptions {
  /** Deepest allowed chain of nested procedures. */
  maxDepth?: number;
}

const INLINE_KEYS = ['dag', ...NESTING_KEYS] as const;
const CHILD_RELS = new Set<string>([REL.HAS_STEP, REL.HAS_CHILD]);

/**
 * Runs a procedure graph in dependency order. Tools are never invoked here;
 * each resolved command is handed to the caller's `enqueue` callback.
 */
export class DagExecutor {
  private maxDepth: number;

  constructor(
    private graph: KnowledgeGraph,
    options: DagExecutorOptions = {},
  ) {
    this.maxDepth = options.maxDepth ?? DEFAULT_CONFIG.executor.maxDepth;
  }

  /**
   * Collect the steps of a concept: inline items from its props followed by
   * concepts reached through `has_step` / `has_child` edges.
   */
  async load(uuid: string): Promise<ProcedureGraph | null> {
    const root = await this.graph.getConcept(uuid);
    if (!root) return null;

    const steps: GraphStep[] = [];
    const inline = INLINE_KEYS.map(key => root.props[key]).find(Array.isArray) ?? [];
    inline.forEach((item, i) => {
      if (isRecord(item)) steps.push(stepFromItem(item, i));
    });

    const edges = (await this.graph.edgesFrom(uuid)).filter(e => CHILD_RELS.has(e.rel));
    for (const [i, edge] of edges.entries()) {
      const edgeOrder = readNumber(edge.props, 'order');
      const child = await this.graph.getConcept(edge.toNode);
      if (!child) {
        steps.push({ id: edge.toNode, uuid: edge.toNode, params: {}, dependsOn: [], order: edgeOrder ?? i });
        continue;
      }
      steps.push(stepFromConcept(child, edgeOrder ?? readNumber(child.props, 'order') ?? i));
    }

    return { conceptUuid: uuid, steps: uniqueIds(steps) };
  }

  /**
   * Kahn's algorithm; among ready steps the lowest `order` goes first, ties
   * by position. Steps left over by a cycle are appended in `order`.
   */
  schedule(procedure: ProcedureGraph): string[] {
    const position = new Map(procedure.steps.map((s, i): [string, number] => [s.id, i]));
    const byOrder = (a: GraphStep, b: GraphStep): number =>
      a.order - b.order || (position.get(a.id) ?? 0) - (position.get(b.id) ?? 0);

    const indegree = new Map<string, number>();
    const dependents = new Map<string, GraphStep[]>();
    for (const step of procedure.steps) {
      const deps = step.dependsOn.filter(d => position.has(d) && d !== step.id);
      indegree.set(step.id, new Set(deps).size);
      for (const dep of new Set(deps)) {
        const list = dependents.get(dep) ?? [];
        list.push(step);
        dependents.set(dep, list);
      }
    }

    const ready = procedure.steps.filter(s => indegree.get(s.id) === 0).sort(byOrder);
    const order: string[] = [];
    const placed = new Set<string>();

    while (ready.length > 0) {
      const next = ready.shift();
      if (!next) break;
      order.push(next.id);
      placed.add(next.id);
      for (const dependent of dependents.get(next.id) ?? []) {
        const remaining = (indegree.get(dependent.id) ?? 0) - 1;
        indegree.set(dependent.id, remaining);
        if (remaining === 0) ready.push(dependent);
      }
      ready.sort(byOrder);
    }

    const rest = procedure.steps.filter(s => !placed.has(s.id)).sort(byOrder);
    return [...order, ...rest.map(s => s.id)];
  }

  resolveCommand(step: GraphStep): StepResolution {
    if (step.tool) {
      const params: Record<string, unknown> = { ...step.params };
      for (const key of BOOKKEEPING_KEYS) delete params[key];
      return { kind: 'tool', command: { tool: step.tool, params } };
    }
    if (step.conceptUuid) {
      return {
        kind: 'nested',
        command: { tool: NESTED_EXECUTE_TOOL, concept_uuid: step.conceptUuid, nested: true },
      };
    }
    return { kind: 'unresolved', reason: `Step ${step.id} has no tool command or nested concept` };
  }

  async execute(
    uuid: string,
    context: ExecutionContext = {},
    enqueue: EnqueueFn = () => {},
  ): Promise<ExecutionResult> {
    const tracer = this.graph.tracer;
    const traceId = generateId('trace');
    tracer?.createTrace(traceId, `execute ${uuid}`);
    try {
      const result = await this.run(uuid, context, enqueue, traceId, []);
      return { ...result, traceId };
    } finally {
      if (tracer?.hasTrace(traceId)) tracer.getTrace(traceId);
    }
  }

  private async run(
    uuid: string,
    context: ExecutionContext,
    enqueue: EnqueueFn,
    traceId: string,
    path: string[],
  ): Promise<ExecutionResult> {
    const tracer = this.graph.tracer;
    const procedure = await this.load(uuid);
    if (!procedure) {
      const error = `Procedure graph not found for concept ${uuid}`;
      tracer?.logEvent(traceId, 'error', { conceptUuid: uuid, error });
      return {
        status: 'error',
        conceptUuid: uuid,
        executed: [],
        pending: [],
        skipped: [],
        errors: [],
        executionOrder: [],
        error,
      };
    }

    const spanId = tracer?.startSpan(traceId, `concept ${uuid}`, { depth: path.length });
    const executionOrder = this.schedule(procedure);
    const byId = new Map(procedure.steps.map((s): [string, GraphStep] => [s.id, s]));
    const executed: ExecutedStep[] = [];
    const pending: string[] = [];
    const skipped: string[] = [];
    const errors: StepError[] = [];

    const fail = (stepId: string, message: string): void => {
      errors.push({ stepId, message });
      tracer?.logEvent(traceId, 'step_error', { stepId, message });
    };

    for (const stepId of executionOrder) {
      const step = byId.get(stepId);
      if (!step) continue;

      if (!evaluateGuard(step.guard, context)) {
        pending.push(stepId);
        skipped.push(stepId);
        tracer?.logEvent(traceId, 'step_skipped', { stepId, guard: step.guard });
        continue;
      }

      const resolution = this.resolveCommand(step);
      if (resolution.kind === 'unresolved') {
        fail(stepId, resolution.reason);
        continue;
      }

      if (resolution.kind === 'nested') {
        const target = resolution.command.concept_uuid;
        if (!(await this.graph.getConcept(target))) {
          fail(stepId, `Step ${stepId} references unknown concept ${target}`);
          continue;
        }
        const nestedPath = [...path, uuid];
        if (nestedPath.includes(target)) {
          fail(stepId, `Concept ${target} is already on the execution path`);
          continue;
        }
        if (nestedPath.length >= this.maxDepth) {
          fail(stepId, `Maximum nesting depth ${this.maxDepth} exceeded`);
          continue;
        }
        const result = await this.run(target, context, enqueue, traceId, nestedPath);
        executed.push({ stepId, command: resolution.command, result });
        if (result.status === 'error') {
          fail(stepId, result.error ?? `Nested procedure ${target} failed`);
        } else if (result.status === 'partial') {
          fail(stepId, `Nested procedure ${target} finished with ${result.errors.length} error(s)`);
        }
        continue;
      }

      try {
        await enqueue(resolution.command);
        executed.push({ stepId, command: resolution.command });
        tracer?.logEvent(traceId, 'step_dispatched', { stepId, tool: resolution.command.tool });
      } catch (err) {
        fail(stepId, `Enqueue failed: ${errorMessage(err)}`);
      }
    }

    if (spanId) tracer?.endSpan(traceId, spanId);

    return {
      status: errors.length === 0 ? 'completed' : 'partial',
      conceptUuid: uuid,
      executed,
      pending,
      skipped,
      errors,
      executionOrder,
    };
  }
}

function stepFromItem(item: Record<string, unknown>, index: number): GraphStep {
  const tool = readString(item, 'tool');
  return {
    id: readString(item, 'step_id') ?? readString(item, 'id') ?? readString(item, 'name') ?? `step_${index}`,
    uuid: readString(item, 'uuid'),
    tool,
    params: isRecord(item.params) ? item.params : {},
    guard: readGuard(item),
    dependsOn: stringList(item.depends_on),
    order: readNumber(item, 'order') ?? index,
    conceptUuid: tool ? undefined : readString(item, 'concept_uuid'),
  };
}

function stepFromConcept(concept: Concept, order: number): GraphStep {
  const tool = readString(concept.props, 'tool');
  return {
    id: readString(concept.props, 'step_id') ?? readString(concept.props, 'id') ?? concept.uuid,
    uuid: concept.uuid,
    tool,
    params: isRecord(concept.props.params) ? concept.props.params : {},
    guard: readGuard(concept.props),
    dependsOn: stringList(concept.props.depends_on),
    order,
    conceptUuid: tool ? undefined : concept.uuid,
  };
}

function readGuard(source: Record<string, unknown>): Guard | undefined {
  const guard = source.guard ?? source.guard_text;
  return typeof guard === 'boolean' || typeof guard === 'string' ? guard : undefined;
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

/** Suffix repeated ids with `#2`, `#3`, ... in encounter order. */
function uniqueIds(steps: GraphStep[]): GraphStep[] {
  const seen = new Map<string, number>();
  return steps.map(step => {
    const count = (seen.get(step.id) ?? 0) + 1;
    seen.set(step.id, count);
    return count === 1 ? step : { ...step, id: `${step.id}#${count}` };
  });
}
