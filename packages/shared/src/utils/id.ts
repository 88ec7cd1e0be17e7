import { randomUUID } from 'node:crypto';

/** Random id, optionally namespaced (`span_…`, `evt_…`). */
export function generateId(prefix?: string): string {
  const id = randomUUID();
  return prefix ? `${prefix}_${id}` : id;
}
