import { PROP, isRecord, isVector, type Concept, type Fingerprint, type PatternData } from '@sinew/shared';

/** Read `props.pattern_data` back into its typed shape. */
export function readPatternData(concept: Concept): PatternData | null {
  const raw = concept.props[PROP.PATTERN_DATA];
  if (!isRecord(raw)) return null;
  return {
    fingerprint: readFingerprint(raw.fingerprint),
    form_type: typeof raw.form_type === 'string' ? raw.form_type : '',
    fields: strings(raw.fields),
    selectors: stringRecord(raw.selectors),
    steps: Array.isArray(raw.steps) ? raw.steps.filter(isRecord) : [],
    url: typeof raw.url === 'string' ? raw.url : undefined,
    confidence: typeof raw.confidence === 'number' ? raw.confidence : 0,
  };
}

export function patternType(concept: Concept): string | undefined {
  const data = readPatternData(concept);
  if (data?.form_type) return data.form_type;
  const type = concept.props.type;
  return typeof type === 'string' ? type : undefined;
}

export function hasEmbedding(concept: Concept): concept is Concept & { embedding: number[] } {
  return isVector(concept.embedding) && concept.embedding.length > 0;
}

function readFingerprint(value: unknown): Fingerprint {
  if (!isRecord(value)) return { version: 1, domain: '', path: '/', tokens: [] };
  return {
    version: 1,
    domain: typeof value.domain === 'string' ? value.domain : '',
    path: typeof value.path === 'string' ? value.path : '/',
    tokens: strings(value.tokens),
  };
}

function strings(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

export function stringRecord(value: unknown): Record<string, string> {
  const out: Record<string, string> = {};
  if (!isRecord(value)) return out;
  for (const [k, v] of Object.entries(value)) {
    if (typeof v === 'string') out[k] = v;
  }
  return out;
}
