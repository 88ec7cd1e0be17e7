import type Database from 'better-sqlite3';
import { parseJson } from '../json.js';

export interface TraceData {
  traceId: string;
  label: string;
  startedAt: string;
  completedAt?: string;
  durationMs?: number;
  events: EventData[];
  spans: SpanData[];
}

export interface SpanData {
  id: string;
  traceId: string;
  name: string;
  startTime: number;
  endTime?: number;
  parentSpanId?: string;
  events: EventData[];
  children: SpanData[];
}

export interface EventData {
  id: string;
  traceId: string;
  spanId?: string;
  type: string;
  timestamp: number;
  wallClock: string;
  duration?: number;
  data?: unknown;
}

interface TraceRow {
  trace_id: string;
  label: string;
  started_at: string;
  completed_at: string | null;
  duration_ms: number | null;
}

interface SpanRow {
  id: string;
  trace_id: string;
  parent_span_id: string | null;
  name: string;
  start_time: number;
  end_time: number | null;
}

interface EventRow {
  id: string;
  trace_id: string;
  span_id: string | null;
  type: string;
  timestamp: number;
  wall_clock: string;
  duration: number | null;
  data: string | null;
}

export interface TraceListEntry {
  traceId: string;
  label: string;
  startedAt: string;
  completedAt?: string;
  durationMs?: number;
}

export class TraceRepository {
  private insertTraceStmt: Database.Statement<[TraceRow]>;
  private insertSpanStmt: Database.Statement<[SpanRow]>;
  private insertEventStmt: Database.Statement<[EventRow]>;
  private getTraceStmt: Database.Statement<[string], TraceRow>;
  private getSpansStmt: Database.Statement<[string], SpanRow>;
  private getEventsStmt: Database.Statement<[string], EventRow>;
  private listStmt: Database.Statement<[number, number], TraceRow>;
  private deleteStmt: Database.Statement<[string]>;

  constructor(private db: Database.Database) {
    this.insertTraceStmt = db.prepare<TraceRow>(`
      INSERT OR REPLACE INTO traces (trace_id, label, started_at, completed_at, duration_ms)
      VALUES (@trace_id, @label, @started_at, @completed_at, @duration_ms)
    `);
    this.insertSpanStmt = db.prepare<SpanRow>(`
      INSERT OR REPLACE INTO trace_spans (id, trace_id, parent_span_id, name, start_time, end_time)
      VALUES (@id, @trace_id, @parent_span_id, @name, @start_time, @end_time)
    `);
    this.insertEventStmt = db.prepare<EventRow>(`
      INSERT OR REPLACE INTO trace_events (id, trace_id, span_id, type, timestamp, wall_clock, duration, data)
      VALUES (@id, @trace_id, @span_id, @type, @timestamp, @wall_clock, @duration, @data)
    `);
    this.getTraceStmt = db.prepare<[string], TraceRow>('SELECT * FROM traces WHERE trace_id = ?');
    this.getSpansStmt = db.prepare<[string], SpanRow>(
      'SELECT * FROM trace_spans WHERE trace_id = ? ORDER BY start_time ASC',
    );
    this.getEventsStmt = db.prepare<[string], EventRow>(
      'SELECT * FROM trace_events WHERE trace_id = ? ORDER BY timestamp ASC',
    );
    this.listStmt = db.prepare<[number, number], TraceRow>(
      'SELECT * FROM traces ORDER BY started_at DESC LIMIT ? OFFSET ?',
    );
    this.deleteStmt = db.prepare<[string]>('DELETE FROM traces WHERE trace_id = ?');
  }

  /** Save a complete trace with all spans and events in a single transaction. */
  save(trace: TraceData): void {
    const saveTx = this.db.transaction(() => {
      this.insertTraceStmt.run({
        trace_id: trace.traceId,
        label: trace.label,
        started_at: trace.startedAt,
        completed_at: trace.completedAt ?? null,
        duration_ms: trace.durationMs ?? null,
      });

      for (const event of trace.events) {
        this.insertEventStmt.run(toEventRow(trace.traceId, event, null));
      }

      for (const span of flattenSpans(trace.spans)) {
        this.insertSpanStmt.run({
          id: span.id,
          trace_id: trace.traceId,
          parent_span_id: span.parentSpanId ?? null,
          name: span.name,
          start_time: span.startTime,
          end_time: span.endTime ?? null,
        });

        for (const event of span.events) {
          this.insertEventStmt.run(toEventRow(trace.traceId, event, span.id));
        }
      }
    });
    saveTx();
  }

  /** Load a trace, rebuilding the span tree from flat rows. */
  load(traceId: string): TraceData | null {
    const row = this.getTraceStmt.get(traceId);
    if (!row) return null;

    const eventsBySpan = new Map<string, EventData[]>();
    const rootEvents: EventData[] = [];
    for (const e of this.getEventsStmt.all(traceId)) {
      const event: EventData = {
        id: e.id,
        traceId: e.trace_id,
        spanId: e.span_id ?? undefined,
        type: e.type,
        timestamp: e.timestamp,
        wallClock: e.wall_clock,
        duration: e.duration ?? undefined,
        data: parseJson(e.data),
      };
      if (e.span_id === null) {
        rootEvents.push(event);
        continue;
      }
      const bucket = eventsBySpan.get(e.span_id) ?? [];
      bucket.push(event);
      eventsBySpan.set(e.span_id, bucket);
    }

    const spanMap = new Map<string, SpanData>();
    for (const s of this.getSpansStmt.all(traceId)) {
      spanMap.set(s.id, {
        id: s.id,
        traceId: s.trace_id,
        name: s.name,
        startTime: s.start_time,
        endTime: s.end_time ?? undefined,
        parentSpanId: s.parent_span_id ?? undefined,
        events: eventsBySpan.get(s.id) ?? [],
        children: [],
      });
    }

    const rootSpans: SpanData[] = [];
    for (const span of spanMap.values()) {
      const parent = span.parentSpanId ? spanMap.get(span.parentSpanId) : undefined;
      if (parent) {
        parent.children.push(span);
      } else {
        rootSpans.push(span);
      }
    }

    return { ...toListEntry(row), events: rootEvents, spans: rootSpans };
  }

  list(options?: { limit?: number; offset?: number }): TraceListEntry[] {
    return this.listStmt.all(options?.limit ?? 100, options?.offset ?? 0).map(toListEntry);
  }

  delete(traceId: string): boolean {
    return this.deleteStmt.run(traceId).changes > 0;
  }
}

function toListEntry(row: TraceRow): TraceListEntry {
  return {
    traceId: row.trace_id,
    label: row.label,
    startedAt: row.started_at,
    completedAt: row.completed_at ?? undefined,
    durationMs: row.duration_ms ?? undefined,
  };
}

function toEventRow(traceId: string, event: EventData, spanId: string | null): EventRow {
  return {
    id: event.id,
    trace_id: traceId,
    span_id: spanId,
    type: event.type,
    timestamp: event.timestamp,
    wall_clock: event.wallClock,
    duration: event.duration ?? null,
    data: event.data === undefined ? null : JSON.stringify(event.data),
  };
}

/** Flatten a span tree, recording each span's parent id. */
function flattenSpans(spans: SpanData[], parentId?: string): SpanData[] {
  const result: SpanData[] = [];
  for (const span of spans) {
    result.push({ ...span, parentSpanId: parentId });
    result.push(...flattenSpans(span.children, span.id));
  }
  return result;
}
