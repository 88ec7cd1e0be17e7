import {
  procedureDescriptionSchema,
  isRecord,
  errorMessage,
  type ValidationIssue,
  type ValidationResult,
} from '@sinew/shared';
import type { ZodIssue } from 'zod';

/**
 * Check a procedure description before it is turned into concepts.
 * Accepts a parsed object or its JSON text. Every rule is evaluated so the
 * caller sees all problems at once; this function never throws.
 */
export function validateProcedure(input: unknown): ValidationResult {
  let data = input;
  if (typeof input === 'string') {
    try {
      data = JSON.parse(input);
    } catch (err) {
      return {
        valid: false,
        errors: [{ path: '$', message: `Invalid JSON: ${errorMessage(err)}` }],
        warnings: [],
      };
    }
  }

  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  const parsed = procedureDescriptionSchema.safeParse(data);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) errors.push(fromZodIssue(issue));
  }

  const steps = isRecord(data) && Array.isArray(data.steps) ? data.steps : [];
  const ids = collectIds(steps, errors);

  steps.forEach((step, i) => {
    if (!isRecord(step)) return;
    if (step.params === undefined) {
      warnings.push({ path: `$.steps[${i}].params`, message: 'Step has no params' });
    }
    if (!Array.isArray(step.depends_on)) return;
    for (const dep of step.depends_on) {
      if (typeof dep === 'string' && !ids.has(dep)) {
        errors.push({ path: `$.steps[${i}].depends_on`, message: `Unknown dependency: ${dep}`, value: dep });
      }
    }
  });

  for (const cycle of findCycles(steps, ids)) {
    errors.push({ path: '$.steps', message: `Circular dependency detected: ${cycle.join(' -> ')}` });
  }

  return { valid: errors.length === 0, errors, warnings };
}

/** Declared step ids with their first position; duplicates are reported. */
function collectIds(steps: unknown[], errors: ValidationIssue[]): Map<string, number> {
  const ids = new Map<string, number>();
  steps.forEach((step, i) => {
    if (!isRecord(step) || typeof step.id !== 'string' || step.id === '') return;
    const first = ids.get(step.id);
    if (first === undefined) {
      ids.set(step.id, i);
      return;
    }
    errors.push({
      path: `$.steps[${i}].id`,
      message: `Duplicate step ID '${step.id}' (steps[${first}] and steps[${i}])`,
      value: step.id,
    });
  });
  return ids;
}

/** Depth-first search over declared ids; each back edge yields one cycle. */
function findCycles(steps: unknown[], ids: Map<string, number>): string[][] {
  const deps = new Map<string, string[]>();
  for (const step of steps) {
    if (!isRecord(step) || typeof step.id !== 'string' || deps.has(step.id)) continue;
    const list = Array.isArray(step.depends_on) ? step.depends_on : [];
    deps.set(step.id, list.filter((d): d is string => typeof d === 'string' && ids.has(d)));
  }

  const cycles: string[][] = [];
  const done = new Set<string>();
  const stack: string[] = [];
  const onStack = new Set<string>();

  const visit = (id: string): void => {
    stack.push(id);
    onStack.add(id);
    for (const dep of deps.get(id) ?? []) {
      if (onStack.has(dep)) {
        cycles.push([...stack.slice(stack.indexOf(dep)), dep]);
      } else if (!done.has(dep)) {
        visit(dep);
      }
    }
    stack.pop();
    onStack.delete(id);
    done.add(id);
  };

  for (const id of deps.keys()) {
    if (!done.has(id)) visit(id);
  }
  return cycles;
}

function fromZodIssue(issue: ZodIssue): ValidationIssue {
  const path = formatPath(issue.path);
  if (issue.path.length === 0 && issue.code === 'invalid_type') {
    return { path, message: 'Procedure must be an object' };
  }
  return { path, message: issue.message };
}

function formatPath(segments: ReadonlyArray<string | number>): string {
  let path = '$';
  for (const seg of segments) {
    path += typeof seg === 'number' ? `[${seg}]` : `.${seg}`;
  }
  return path;
}
