import {
  PATTERN_SOURCE,
  PROP,
  createConcept,
  createProvenance,
  isoNow,
  readNumber,
  type Concept,
  type PatternData,
  type PatternInput,
  type Props,
  type Provenance,
  type SuccessRecord,
} from '@sinew/shared';
import type { KnowledgeGraph } from '../knowledge-graph.js';
import { fingerprint } from './fingerprint.js';

/** Persists learned form patterns and their success counts. */
export class PatternStore {
  constructor(private graph: KnowledgeGraph) {}

  async storePattern(input: PatternInput, provenance: Provenance = createProvenance('tool')): Promise<Concept> {
    const data: PatternData = {
      fingerprint: fingerprint(input.url, input.html),
      form_type: input.formType,
      fields: input.fields,
      selectors: input.selectors ?? {},
      steps: input.steps ?? [],
      url: input.url,
      confidence: input.confidence ?? 1.0,
    };
    return this.save(input.name, data, provenance);
  }

  /** Store an already-built pattern payload, e.g. one adapted by transfer. */
  async save(
    name: string,
    data: PatternData,
    provenance: Provenance,
    extraProps: Record<string, unknown> = {},
  ): Promise<Concept> {
    const concept = createConcept({
      kind: 'Pattern',
      labels: ['pattern', data.form_type, name].filter(Boolean),
      props: {
        name,
        source: PATTERN_SOURCE,
        [PROP.PATTERN_DATA]: data,
        [PROP.SUCCESS_COUNT]: 0,
        ...extraProps,
      },
      embedding: await this.graph.embed(`${name} ${data.form_type} ${data.fields.join(' ')}`, provenance.traceId),
    });
    return this.graph.putConcept(concept, provenance);
  }

  async recordPatternSuccess(
    uuid: string,
    context?: Record<string, unknown>,
    provenance: Provenance = createProvenance('tool'),
  ): Promise<SuccessRecord> {
    const concept = await this.graph.getConcept(uuid);
    if (!concept) return { successCount: 0, error: `Pattern not found: ${uuid}` };

    const successCount = (readNumber(concept.props, PROP.SUCCESS_COUNT) ?? 0) + 1;
    const lastSuccessAt = isoNow();
    const props: Props = { ...concept.props, [PROP.SUCCESS_COUNT]: successCount, [PROP.LAST_SUCCESS_AT]: lastSuccessAt };
    if (context) props.last_success_context = context;

    const result = await this.graph.write({ ...concept, props }, provenance);
    if (result.status === 'error') {
      return { successCount: successCount - 1, error: result.error };
    }
    return { successCount, lastSuccessAt };
  }
}
