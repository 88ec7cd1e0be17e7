export type TraceEventType =
  | 'info'
  | 'error'
  | 'degradation'
  | 'step_dispatched'
  | 'step_skipped'
  | 'step_error'
  | 'write_failed'
  | 'centroid_update'
  | 'pattern_transfer'
  | 'generalization';

export interface TraceEvent {
  id: string;
  traceId: string;
  parentSpanId?: string;
  type: TraceEventType;
  timestamp: number;
  wallClock: string;
  duration?: number;
  data: Record<string, unknown>;
}

export interface TraceSpan {
  id: string;
  traceId: string;
  name: string;
  startTime: number;
  endTime?: number;
  events: TraceEvent[];
  children: TraceSpan[];
}

export interface ExecutionTrace {
  traceId: string;
  label: string;
  startedAt: string;
  completedAt?: string;
  totalDurationMs?: number;
  /** Events logged outside of any span. */
  events: TraceEvent[];
  spans: TraceSpan[];
}
