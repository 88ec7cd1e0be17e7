import { isRecord, type ExecutionContext, type Guard } from '@sinew/shared';

const TRUE_WORDS = new Set(['true', 'yes', 'always', '1']);
const FALSE_WORDS = new Set(['false', 'no', 'never', '0', 'skip']);
const CONTEXT_PREFIX = 'context.';

/**
 * Decide whether a step runs. Unrecognised guard text runs the step.
 * `context.<path>` reads a dotted path from the execution context.
 */
export function evaluateGuard(guard: Guard | undefined, context: ExecutionContext = {}): boolean {
  if (guard === undefined) return true;
  if (typeof guard === 'boolean') return guard;

  const text = guard.trim();
  const word = text.toLowerCase();
  if (TRUE_WORDS.has(word)) return true;
  if (FALSE_WORDS.has(word)) return false;

  if (word.startsWith(CONTEXT_PREFIX)) {
    return isTruthy(resolvePath(context, text.slice(CONTEXT_PREFIX.length)));
  }
  return true;
}

function resolvePath(context: ExecutionContext, path: string): unknown {
  let current: unknown = context;
  for (const key of path.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

function isTruthy(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  return Boolean(value);
}
