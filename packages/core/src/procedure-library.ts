import {
  EXHAUSTIVE_TOP_K,
  NotFoundError,
  REL,
  generateId,
  isRecord,
  readNumber,
  readString,
  readStringArray,
  type Concept,
  type ExecutionPlan,
  type OnFailPolicy,
  type ProcedureSummary,
  type StoredProcedure,
  type StoredStep,
} from '@sinew/shared';
import type { KnowledgeGraph } from './knowledge-graph.js';

export interface ProcedureSearchOptions {
  topK?: number;
  /** Every listed tag must be present. */
  tags?: string[];
}

const ON_FAIL = new Set<string>(['stop', 'skip', 'retry', 'ask_user']);

/** Read side for stored procedures: lookup, search and replay plans. */
export class ProcedureLibrary {
  constructor(private graph: KnowledgeGraph) {}

  async getProcedure(uuid: string): Promise<StoredProcedure | null> {
    const concept = await this.graph.getConcept(uuid);
    if (!concept || concept.kind !== 'Procedure') return null;

    const steps: StoredStep[] = [];
    for (const [i, edge] of (await this.graph.edgesFrom(uuid, REL.HAS_STEP)).entries()) {
      const step = await this.graph.getConcept(edge.toNode);
      if (step) steps.push(toStoredStep(step, readNumber(edge.props, 'order') ?? i));
    }
    steps.sort((a, b) => a.order - b.order);

    return {
      uuid,
      name: readString(concept.props, 'name') ?? '',
      description: readString(concept.props, 'description') ?? '',
      goal: readString(concept.props, 'goal'),
      tags: readStringArray(concept.props, 'tags'),
      steps,
      metadata: isRecord(concept.props.metadata) ? concept.props.metadata : {},
    };
  }

  async searchProcedures(query: string, options: ProcedureSearchOptions = {}): Promise<ProcedureSummary[]> {
    const topK = options.topK ?? 5;
    const tags = options.tags ?? [];
    const embedding = this.graph.canEmbed ? await this.graph.embed(query, generateId('trace')) : undefined;
    const hits = await this.graph.searchConcepts(query, {
      topK: tags.length > 0 ? EXHAUSTIVE_TOP_K : topK,
      filters: { kind: 'Procedure' },
      embedding,
    });

    const summaries: ProcedureSummary[] = [];
    for (const { concept, score } of hits) {
      if (!embedding && score === 0 && query.trim() !== '') continue;
      const conceptTags = readStringArray(concept.props, 'tags');
      if (!tags.every(t => conceptTags.includes(t))) continue;
      summaries.push({
        uuid: concept.uuid,
        name: readString(concept.props, 'name') ?? '',
        description: readString(concept.props, 'description') ?? '',
        tags: conceptTags,
        score,
      });
    }
    return summaries.slice(0, topK);
  }

  /** Plan for replaying a stored procedure. Throws when it does not exist. */
  async toExecutionPlan(uuid: string): Promise<ExecutionPlan> {
    const procedure = await this.getProcedure(uuid);
    if (!procedure) throw new NotFoundError('Procedure', uuid);

    return {
      procedureUuid: uuid,
      goal: procedure.goal ?? procedure.description,
      steps: procedure.steps.map(s => ({
        id: s.id,
        tool: s.tool ?? '',
        params: s.params,
        depends_on: s.depends_on,
        guard: s.guard,
        on_fail: s.on_fail,
      })),
      reuse: true,
    };
  }
}

function toStoredStep(concept: Concept, order: number): StoredStep {
  const props = concept.props;
  const guard = props.guard;
  const onFail = props.on_fail;
  return {
    uuid: concept.uuid,
    id: readString(props, 'step_id') ?? concept.uuid,
    name: readString(props, 'name'),
    tool: readString(props, 'tool'),
    params: isRecord(props.params) ? props.params : {},
    depends_on: readStringArray(props, 'depends_on'),
    guard: typeof guard === 'boolean' || typeof guard === 'string' ? guard : undefined,
    on_fail: typeof onFail === 'string' && isOnFail(onFail) ? onFail : undefined,
    order,
  };
}

function isOnFail(value: string): value is OnFailPolicy {
  return ON_FAIL.has(value);
}

