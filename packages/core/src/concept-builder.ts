import {
  ConstructionError,
  ValidationError,
  NESTING_KEYS,
  REL,
  PROP,
  createConcept,
  createEdge,
  createProvenance,
  errorMessage,
  isoNow,
  isRecord,
  readString,
  type ConstructionResult,
  type GraphEntity,
  type NestingKey,
  type OnFailPolicy,
  type Props,
  type Provenance,
  type ProcedureDescription,
  type StepDescription,
} from '@sinew/shared';
import type { KnowledgeGraph } from './knowledge-graph.js';
import { validateProcedure } from './procedure-validator.js';
import { findPrototype } from './ontology.js';

export interface BuildOptions {
  skipValidation?: boolean;
  provenance?: Provenance;
  /** Procedure prototype; looked up by name when omitted. */
  prototypeUuid?: string;
}

// ---------------------------------------------------------------------------
// Recursive planning
// ---------------------------------------------------------------------------

export interface AtomicItem {
  shape: 'atomic';
  tool: string;
  params: Record<string, unknown>;
  raw: Record<string, unknown>;
  order: number;
}

export interface CompositeItem {
  shape: 'composite';
  raw: Record<string, unknown>;
  prototypeUuid?: string;
  order: number;
}

export interface SkippedItem {
  shape: 'skipped';
  raw: unknown;
  reason: string;
}

export type PlannedItem = AtomicItem | CompositeItem | SkippedItem;

export interface PlannedChild {
  key: NestingKey;
  rel: typeof REL.HAS_STEP | typeof REL.HAS_CHILD;
  order: number;
  raw: Record<string, unknown>;
  prototypeUuid?: string;
}

export interface ConceptPlan {
  name: string;
  /** The object's props with promoted items removed from nesting keys. */
  props: Props;
  children: PlannedChild[];
  skipped: SkippedItem[];
}

export function classifyItem(item: unknown, index: number): PlannedItem {
  if (!isRecord(item)) return { shape: 'skipped', raw: item, reason: 'not an object' };

  const order = typeof item.order === 'number' ? item.order : index;
  const nests = NESTING_KEYS.some(key => Array.isArray(item[key]));
  const tool = readString(item, 'tool');

  if (tool && !nests) {
    return { shape: 'atomic', tool, params: isRecord(item.params) ? item.params : {}, raw: item, order };
  }
  const prototypeUuid = readString(item, PROP.PROTOTYPE_UUID);
  if (nests || readString(item, 'name') || prototypeUuid) {
    return { shape: 'composite', raw: item, prototypeUuid, order };
  }
  return { shape: 'skipped', raw: item, reason: 'no tool, name, nesting or prototype_uuid' };
}

/**
 * Decide which nested items become concepts of their own. Under `children`
 * every recognised item is promoted; under the other nesting keys only
 * composite items are, and atomic items stay inline.
 */
export function planConceptTree(obj: Record<string, unknown>): ConceptPlan {
  const props: Props = { ...obj };
  const children: PlannedChild[] = [];
  const skipped: SkippedItem[] = [];

  for (const key of NESTING_KEYS) {
    const items = obj[key];
    if (!Array.isArray(items)) continue;

    const inline: Record<string, unknown>[] = [];
    items.forEach((item, index) => {
      const planned = classifyItem(item, index);
      if (planned.shape === 'skipped') {
        skipped.push(planned);
        return;
      }
      if (key === 'children' || planned.shape === 'composite') {
        children.push({
          key,
          rel: key === 'children' ? REL.HAS_CHILD : REL.HAS_STEP,
          order: planned.order,
          raw: planned.raw,
          prototypeUuid: planned.shape === 'composite' ? planned.prototypeUuid : undefined,
        });
        return;
      }
      inline.push(planned.raw);
    });

    if (inline.length > 0) props[key] = inline;
    else delete props[key];
  }

  return { name: conceptName(obj), props, children, skipped };
}

function conceptName(obj: Record<string, unknown>): string {
  return readString(obj, 'name') ?? readString(obj, 'tool') ?? 'concept';
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

/** Turns procedure descriptions and nested objects into concepts and edges. */
export class ConceptBuilder {
  constructor(private graph: KnowledgeGraph) {}

  async createFromDescription(input: unknown, options: BuildOptions = {}): Promise<ConstructionResult> {
    if (!options.skipValidation) {
      const result = validateProcedure(input);
      if (!result.valid) throw new ValidationError(result.errors);
    }

    const description = readDescription(input);
    const provenance = options.provenance ?? createProvenance('user');
    const prototypeUuid = options.prototypeUuid ?? (await findPrototype(this.graph, 'Procedure')) ?? undefined;
    const tags = description.tags ?? [];

    const procedure = createConcept({
      kind: 'Procedure',
      labels: ['procedure', 'dag', ...tags],
      props: compact({
        name: description.name,
        title: description.name,
        description: description.description,
        goal: description.goal,
        tags,
        step_count: description.steps.length,
        is_dag: true,
        created_at: isoNow(),
        metadata: description.metadata ?? {},
        [PROP.PROTOTYPE_UUID]: prototypeUuid,
      }),
      embedding: await this.graph.embed(`${description.name} ${description.description}`, provenance.traceId),
    });

    const entities: GraphEntity[] = [procedure];
    const stepUuids = new Map<string, string>();

    for (const [idx, step] of description.steps.entries()) {
      const name = step.name ?? step.id;
      const order = step.order ?? idx;
      const concept = createConcept({
        kind: 'Step',
        labels: step.tool ? ['step', step.tool] : ['step'],
        props: compact({
          step_id: step.id,
          name,
          tool: step.tool,
          params: step.params ?? {},
          order,
          depends_on: step.depends_on ?? [],
          guard: step.guard,
          on_fail: step.on_fail,
          retries: step.retries,
          procedure_uuid: procedure.uuid,
        }),
        embedding: this.graph.canEmbed
          ? await this.graph.embed(`${name} ${step.tool}`, provenance.traceId)
          : undefined,
      });
      stepUuids.set(step.id, concept.uuid);
      entities.push(concept, createEdge(procedure.uuid, concept.uuid, REL.HAS_STEP, { order }));
    }

    let dependencyEdgeCount = 0;
    for (const step of description.steps) {
      const from = stepUuids.get(step.id);
      for (const dep of step.depends_on ?? []) {
        const to = stepUuids.get(dep);
        if (!from || !to) continue;
        entities.push(createEdge(from, to, REL.DEPENDS_ON, { from_step: step.id, to_step: dep }));
        dependencyEdgeCount++;
      }
    }

    if (prototypeUuid) entities.push(createEdge(procedure.uuid, prototypeUuid, REL.INSTANTIATES));

    await this.graph.save(entities, provenance);

    return {
      procedureUuid: procedure.uuid,
      stepUuids: [...stepUuids.values()],
      stepIds: [...stepUuids.keys()],
      dependencyEdgeCount,
    };
  }

  /**
   * Store `obj` as a concept instantiating `prototypeUuid`, promoting nested
   * items to child concepts as {@link planConceptTree} decides. Returns the
   * root concept's uuid.
   */
  async createConceptRecursive(
    prototypeUuid: string,
    obj: Record<string, unknown>,
    embedding?: number[],
    provenance: Provenance = createProvenance('user'),
  ): Promise<string> {
    const entities: GraphEntity[] = [];
    const uuid = await this.planInto(entities, prototypeUuid, obj, embedding, provenance);
    await this.graph.save(entities, provenance);
    return uuid;
  }

  private async planInto(
    entities: GraphEntity[],
    prototypeUuid: string,
    obj: Record<string, unknown>,
    embedding: number[] | undefined,
    provenance: Provenance,
  ): Promise<string> {
    const plan = planConceptTree(obj);
    for (const s of plan.skipped) {
      this.graph.tracer?.logEvent(provenance.traceId, 'info', { skipped: s.reason, name: plan.name });
    }

    const concept = createConcept({
      kind: 'Concept',
      labels: [plan.name],
      props: { ...plan.props, [PROP.PROTOTYPE_UUID]: prototypeUuid },
      embedding,
    });
    entities.push(concept, createEdge(concept.uuid, prototypeUuid, REL.INSTANTIATES));

    for (const child of plan.children) {
      const childEmbedding = this.graph.canEmbed
        ? await this.graph.embed(conceptName(child.raw), provenance.traceId)
        : undefined;
      const childUuid = await this.planInto(
        entities,
        child.prototypeUuid ?? prototypeUuid,
        child.raw,
        childEmbedding,
        provenance,
      );
      entities.push(createEdge(concept.uuid, childUuid, child.rel, { order: child.order }));
    }
    return concept.uuid;
  }
}

/**
 * Read a description into its typed shape. Input that validation would
 * reject for structure throws {@link ConstructionError}.
 */
function readDescription(input: unknown): ProcedureDescription {
  let data = input;
  if (typeof input === 'string') {
    try {
      data = JSON.parse(input);
    } catch (err) {
      throw new ConstructionError(`invalid JSON: ${errorMessage(err)}`);
    }
  }
  if (!isRecord(data)) throw new ConstructionError('description must be an object');
  if (!Array.isArray(data.steps) || !data.steps.every(isRecord)) {
    throw new ConstructionError('steps must be an array of objects');
  }

  const steps: StepDescription[] = [];
  const seen = new Set<string>();
  for (const [i, raw] of data.steps.entries()) {
    const id = readString(raw, 'id');
    if (!id) throw new ConstructionError(`steps[${i}] has no id`);
    if (seen.has(id)) throw new ConstructionError(`duplicate step id '${id}'`);
    seen.add(id);
    steps.push(readStep(raw, id));
  }
  for (const step of steps) {
    for (const dep of step.depends_on ?? []) {
      if (!seen.has(dep)) throw new ConstructionError(`step '${step.id}' depends on unknown step '${dep}'`);
    }
  }

  return {
    name: readString(data, 'name') ?? 'Unnamed procedure',
    description: readString(data, 'description') ?? '',
    goal: readString(data, 'goal'),
    tags: stringList(data.tags),
    steps,
    metadata: isRecord(data.metadata) ? data.metadata : undefined,
  };
}

function readStep(raw: Record<string, unknown>, id: string): StepDescription {
  return {
    id,
    tool: readString(raw, 'tool') ?? '',
    name: readString(raw, 'name'),
    params: isRecord(raw.params) ? raw.params : undefined,
    depends_on: stringList(raw.depends_on),
    guard: typeof raw.guard === 'boolean' || typeof raw.guard === 'string' ? raw.guard : undefined,
    order: typeof raw.order === 'number' ? raw.order : undefined,
    on_fail: isOnFail(raw.on_fail) ? raw.on_fail : undefined,
    retries: typeof raw.retries === 'number' ? raw.retries : undefined,
  };
}

const ON_FAIL: readonly OnFailPolicy[] = ['stop', 'skip', 'retry', 'ask_user'];

function isOnFail(value: unknown): value is OnFailPolicy {
  return ON_FAIL.some(p => p === value);
}

function stringList(value: unknown): string[] | undefined {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : undefined;
}

function compact(props: Props): Props {
  const out: Props = {};
  for (const [key, value] of Object.entries(props)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}
