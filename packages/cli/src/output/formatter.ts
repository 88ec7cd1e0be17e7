import type {
  ValidationResult,
  ValidationIssue,
  ConstructionResult,
  ExecutionResult,
  ExecutedStep,
  StoredProcedure,
  ProcedureSummary,
  PatternMatch,
  Fingerprint,
  ExecutionTrace,
  TraceSpan,
} from '@sinew/shared';

export function formatValidation(result: ValidationResult): string {
  const lines: string[] = [];

  if (result.valid) {
    lines.push('[OK] Procedure is valid');
  } else {
    lines.push(`[FAIL] ${result.errors.length} error(s)`);
    for (const issue of result.errors) {
      lines.push(`  error    ${formatIssue(issue)}`);
    }
  }
  for (const issue of result.warnings) {
    lines.push(`  warning  ${formatIssue(issue)}`);
  }

  return lines.join('\n');
}

function formatIssue(issue: ValidationIssue): string {
  return `${issue.path}: ${issue.message}`;
}

export function formatConstruction(result: ConstructionResult): string {
  const lines: string[] = [];
  lines.push(`[OK] Procedure stored: ${result.procedureUuid}`);
  lines.push(`  Steps:        ${result.stepIds.join(', ')}`);
  lines.push(`  Dependencies: ${result.dependencyEdgeCount}`);
  return lines.join('\n');
}

export function formatExecution(result: ExecutionResult, indent = ''): string {
  const lines: string[] = [];

  if (result.status === 'completed') {
    lines.push(`${indent}[OK] Executed ${result.conceptUuid}`);
  } else if (result.status === 'partial') {
    lines.push(`${indent}[PARTIAL] Executed ${result.conceptUuid} with ${result.errors.length} error(s)`);
  } else {
    lines.push(`${indent}[FAIL] ${result.error ?? 'unknown error'}`);
    return lines.join('\n');
  }

  for (const step of result.executed) {
    lines.push(...formatExecutedStep(step, `${indent}  `));
  }
  if (result.skipped.length > 0) {
    lines.push(`${indent}  skipped: ${result.skipped.join(', ')}`);
  }
  for (const err of result.errors) {
    lines.push(`${indent}  error ${err.stepId}: ${err.message}`);
  }

  return lines.join('\n');
}

function formatExecutedStep(step: ExecutedStep, indent: string): string[] {
  if ('result' in step) {
    return [
      `${indent}${step.stepId} -> nested ${step.command.concept_uuid}`,
      formatExecution(step.result, `${indent}  `),
    ];
  }
  return [`${indent}${step.stepId} -> ${step.command.tool} ${JSON.stringify(step.command.params)}`];
}

export function formatProcedure(proc: StoredProcedure): string {
  const lines: string[] = [];
  lines.push(`${proc.name} (${proc.uuid})`);
  if (proc.description) lines.push(`  ${proc.description}`);
  if (proc.goal) lines.push(`  Goal: ${proc.goal}`);
  if (proc.tags.length > 0) lines.push(`  Tags: ${proc.tags.join(', ')}`);
  lines.push('');
  for (const step of proc.steps) {
    const deps = step.depends_on.length > 0 ? ` after ${step.depends_on.join(', ')}` : '';
    lines.push(`  ${step.order}. ${step.id} [${step.tool ?? 'nested'}]${deps}`);
  }
  return lines.join('\n');
}

export function formatProcedureList(procedures: ProcedureSummary[]): string {
  if (procedures.length === 0) return 'No procedures found.';
  return procedures
    .map(p => `${formatScore(p.score)}  ${p.uuid}  ${truncate(p.name, 40)}${p.tags.length > 0 ? `  [${p.tags.join(', ')}]` : ''}`)
    .join('\n');
}

export function formatPatternMatches(matches: PatternMatch[]): string {
  if (matches.length === 0) return 'No matching patterns.';
  return matches
    .map(m => {
      const name = typeof m.concept.props.name === 'string' ? m.concept.props.name : m.concept.uuid;
      return `${formatScore(m.score)}  ${m.concept.uuid}  ${name} (${m.patternData.form_type}, ${m.patternData.fields.join(', ')})`;
    })
    .join('\n');
}

export function formatFingerprint(fp: Fingerprint): string {
  const lines: string[] = [];
  lines.push(`Domain: ${fp.domain}`);
  lines.push(`Path:   ${fp.path}`);
  lines.push(`Tokens: ${fp.tokens.join(' ')}`);
  return lines.join('\n');
}

export function formatTrace(trace: ExecutionTrace): string {
  const lines: string[] = [];
  lines.push(`Trace ${trace.traceId} (${trace.label})`);
  lines.push(`  Started: ${trace.startedAt}`);
  if (trace.totalDurationMs !== undefined) {
    lines.push(`  Duration: ${formatDuration(trace.totalDurationMs)}`);
  }
  for (const event of trace.events) {
    lines.push(`  ${event.type} ${JSON.stringify(event.data)}`);
  }
  for (const span of trace.spans) {
    lines.push(...formatSpan(span, '  '));
  }
  return lines.join('\n');
}

function formatSpan(span: TraceSpan, indent: string): string[] {
  const duration = span.endTime !== undefined ? ` ${formatDuration(span.endTime - span.startTime)}` : '';
  const lines = [`${indent}> ${span.name}${duration}`];
  for (const event of span.events) {
    lines.push(`${indent}  ${event.type} ${JSON.stringify(event.data)}`);
  }
  for (const child of span.children) {
    lines.push(...formatSpan(child, `${indent}  `));
  }
  return lines;
}

export function formatScore(score: number): string {
  return score.toFixed(3);
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  return `${Math.floor(ms / 60000)}m ${Math.round((ms % 60000) / 1000)}s`;
}

export function truncate(str: string, max: number): string {
  if (str.length <= max) return str;
  return str.slice(0, max - 3) + '...';
}
