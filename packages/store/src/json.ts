import { isRecord, isVector, type ProvenanceSource } from '@sinew/shared';

export function parseJson(text: string | null): unknown {
  if (text === null) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    // Corrupt column: treat as absent
    return undefined;
  }
}

export function parseRecord(text: string | null): Record<string, unknown> {
  const value = parseJson(text);
  return isRecord(value) ? value : {};
}

export function parseStringArray(text: string | null): string[] {
  const value = parseJson(text);
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

export function parseVector(text: string | null): number[] | undefined {
  const value = parseJson(text);
  return isVector(value) && value.length > 0 ? value : undefined;
}

const PROVENANCE_SOURCES: readonly ProvenanceSource[] = ['user', 'tool', 'doc', 'llm', 'system'];

export function toProvenanceSource(value: string): ProvenanceSource {
  return PROVENANCE_SOURCES.find(s => s === value) ?? 'system';
}
