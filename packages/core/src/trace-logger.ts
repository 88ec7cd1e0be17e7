import {
  generateId,
  monotonicNow,
  isoNow,
  errorMessage,
  isRecord,
  type LogLevel,
  type TraceEvent,
  type TraceSpan,
  type ExecutionTrace,
  type TraceEventType,
} from '@sinew/shared';
import type { TraceRepository, TraceData, SpanData, EventData } from '@sinew/store';

export type LogSink = Pick<Console, 'log' | 'warn' | 'error'>;

export interface TraceLoggerOptions {
  /** Completed traces are saved here when given. */
  repo?: TraceRepository;
  /** Minimum severity echoed to the sink. */
  level?: LogLevel;
  sink?: LogSink;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const EVENT_LEVEL: Record<TraceEventType, LogLevel> = {
  info: 'info',
  error: 'error',
  degradation: 'warn',
  step_dispatched: 'debug',
  step_skipped: 'debug',
  step_error: 'error',
  write_failed: 'error',
  centroid_update: 'debug',
  pattern_transfer: 'info',
  generalization: 'info',
};

/**
 * Spans and events keyed by trace id. Events for a trace that was never
 * created are echoed to the sink but not retained.
 */
export class TraceLogger {
  private traces = new Map<string, TraceState>();
  private repo?: TraceRepository;
  private level: LogLevel;
  private sink: LogSink;

  constructor(options: TraceLoggerOptions = {}) {
    this.repo = options.repo;
    this.level = options.level ?? 'info';
    this.sink = options.sink ?? console;
  }

  createTrace(traceId: string, label: string): void {
    this.traces.set(traceId, {
      traceId,
      label,
      startedAt: isoNow(),
      startTime: monotonicNow(),
      events: [],
      spans: [],
      spanStack: [],
    });
  }

  startSpan(traceId: string, name: string, data?: Record<string, unknown>): string {
    const spanId = generateId('span');
    const state = this.traces.get(traceId);
    if (!state) return spanId;

    const parentSpanId = state.spanStack[state.spanStack.length - 1];
    const span: TraceSpan = {
      id: spanId,
      traceId,
      name,
      startTime: monotonicNow(),
      events: [],
      children: [],
    };

    const parent = parentSpanId ? this.findSpan(state.spans, parentSpanId) : undefined;
    if (parent) {
      parent.children.push(span);
    } else {
      state.spans.push(span);
    }

    state.spanStack.push(spanId);
    if (data) {
      this.logEvent(traceId, 'info', data, spanId);
    }
    return spanId;
  }

  endSpan(traceId: string, spanId: string): void {
    const state = this.traces.get(traceId);
    if (!state) return;
    const span = this.findSpan(state.spans, spanId);
    if (span) {
      span.endTime = monotonicNow();
    }
    const idx = state.spanStack.indexOf(spanId);
    if (idx !== -1) {
      state.spanStack.splice(idx, 1);
    }
  }

  logEvent(
    traceId: string,
    type: TraceEventType,
    data: Record<string, unknown>,
    parentSpanId?: string,
  ): void {
    this.echo(type, data);

    const state = this.traces.get(traceId);
    if (!state) return;

    const event: TraceEvent = {
      id: generateId('evt'),
      traceId,
      parentSpanId: parentSpanId ?? state.spanStack[state.spanStack.length - 1],
      type,
      timestamp: monotonicNow(),
      wallClock: isoNow(),
      data,
    };

    const span = event.parentSpanId ? this.findSpan(state.spans, event.parentSpanId) : undefined;
    if (span) {
      span.events.push(event);
    } else {
      state.events.push(event);
    }
  }

  /** Log that an optional collaborator was unavailable and a fallback ran. */
  logDegradation(traceId: string, reason: string, data: Record<string, unknown> = {}): void {
    this.logEvent(traceId, 'degradation', { reason, ...data });
  }

  /** Finish a trace, persisting it when a repository is configured. */
  getTrace(traceId: string): ExecutionTrace {
    const state = this.traces.get(traceId);
    if (!state) throw new Error(`Trace not found: ${traceId}`);

    const trace: ExecutionTrace = {
      traceId: state.traceId,
      label: state.label,
      startedAt: state.startedAt,
      completedAt: isoNow(),
      totalDurationMs: monotonicNow() - state.startTime,
      events: state.events,
      spans: state.spans,
    };

    if (this.repo) {
      try {
        this.repo.save(toTraceData(trace));
      } catch (err) {
        this.sink.warn(`[sinew] trace ${traceId} not persisted: ${errorMessage(err)}`);
      }
    }

    this.traces.delete(traceId);
    return trace;
  }

  /** Load a previously persisted trace. */
  loadTrace(traceId: string): ExecutionTrace | null {
    const data = this.repo?.load(traceId);
    return data ? fromTraceData(data) : null;
  }

  hasTrace(traceId: string): boolean {
    return this.traces.has(traceId);
  }

  private echo(type: TraceEventType, data: Record<string, unknown>): void {
    const level = EVENT_LEVEL[type];
    if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) return;
    const line = `[sinew] ${type} ${JSON.stringify(data)}`;
    if (level === 'error') this.sink.error(line);
    else if (level === 'warn') this.sink.warn(line);
    else this.sink.log(line);
  }

  private findSpan(spans: TraceSpan[], id: string): TraceSpan | undefined {
    for (const span of spans) {
      if (span.id === id) return span;
      const found = this.findSpan(span.children, id);
      if (found) return found;
    }
    return undefined;
  }
}

interface TraceState {
  traceId: string;
  label: string;
  startedAt: string;
  startTime: number;
  events: TraceEvent[];
  spans: TraceSpan[];
  spanStack: string[];
}

function toTraceData(trace: ExecutionTrace): TraceData {
  return {
    traceId: trace.traceId,
    label: trace.label,
    startedAt: trace.startedAt,
    completedAt: trace.completedAt,
    durationMs: trace.totalDurationMs,
    events: trace.events.map(toEventData),
    spans: trace.spans.map(toSpanData),
  };
}

function toSpanData(span: TraceSpan): SpanData {
  return {
    id: span.id,
    traceId: span.traceId,
    name: span.name,
    startTime: span.startTime,
    endTime: span.endTime,
    events: span.events.map(toEventData),
    children: span.children.map(toSpanData),
  };
}

function toEventData(event: TraceEvent): EventData {
  return {
    id: event.id,
    traceId: event.traceId,
    spanId: event.parentSpanId,
    type: event.type,
    timestamp: event.timestamp,
    wallClock: event.wallClock,
    duration: event.duration,
    data: event.data,
  };
}

const EVENT_TYPES = new Set<string>(Object.keys(EVENT_LEVEL));

function isTraceEventType(value: string): value is TraceEventType {
  return EVENT_TYPES.has(value);
}

function fromTraceData(data: TraceData): ExecutionTrace {
  return {
    traceId: data.traceId,
    label: data.label,
    startedAt: data.startedAt,
    completedAt: data.completedAt,
    totalDurationMs: data.durationMs,
    events: data.events.map(fromEventData),
    spans: data.spans.map(fromSpanData),
  };
}

function fromSpanData(data: SpanData): TraceSpan {
  return {
    id: data.id,
    traceId: data.traceId,
    name: data.name,
    startTime: data.startTime,
    endTime: data.endTime,
    events: data.events.map(fromEventData),
    children: data.children.map(fromSpanData),
  };
}

function fromEventData(e: EventData): TraceEvent {
  return {
    id: e.id,
    traceId: e.traceId,
    parentSpanId: e.spanId,
    type: isTraceEventType(e.type) ? e.type : 'info',
    timestamp: e.timestamp,
    wallClock: e.wallClock,
    duration: e.duration,
    data: isRecord(e.data) ? e.data : {},
  };
}
