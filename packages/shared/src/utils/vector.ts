/**
 * Vector helpers never throw. An empty side is the additive identity and
 * mismatched lengths leave the left operand untouched.
 */

export function vectorAdd(a: readonly number[] | undefined, b: readonly number[] | undefined): number[] {
  if (!a || a.length === 0) return b ? [...b] : [];
  if (!b || b.length === 0) return [...a];
  if (a.length !== b.length) return [...a];
  return a.map((v, i) => v + b[i]);
}

export function vectorScale(v: readonly number[] | undefined, factor: number): number[] {
  if (!v) return [];
  return v.map(x => x * factor);
}

/** Arithmetic mean of the vectors sharing the first vector's length. */
export function computeCentroid(vectors: ReadonlyArray<readonly number[]>): number[] {
  const usable = vectors.filter(v => v.length > 0);
  if (usable.length === 0) return [];
  const dim = usable[0].length;
  const same = usable.filter(v => v.length === dim);
  let sum: number[] = [];
  for (const v of same) sum = vectorAdd(sum, v);
  return vectorScale(sum, 1 / same.length);
}

export function cosineSimilarity(a: readonly number[] | undefined, b: readonly number[] | undefined): number {
  if (!a || !b || a.length === 0 || a.length !== b.length) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  return denom === 0 ? 0 : dot / denom;
}

export function isVector(value: unknown): value is number[] {
  return Array.isArray(value) && value.every(x => typeof x === 'number' && Number.isFinite(x));
}
