import type { EmbedFn } from '@sinew/shared';
import { InMemoryGraphStore } from '@sinew/store';
import { KnowledgeGraph } from '../src/knowledge-graph.js';
import { TraceLogger, type LogSink } from '../src/trace-logger.js';

export interface CapturedSink extends LogSink {
  lines: string[];
}

/** Sink that records every line instead of printing it. */
export function captureSink(): CapturedSink {
  const lines: string[] = [];
  const push = (...args: unknown[]): void => {
    lines.push(args.map(String).join(' '));
  };
  return { lines, log: push, warn: push, error: push };
}

export function makeGraph(embed?: EmbedFn): {
  store: InMemoryGraphStore;
  tracer: TraceLogger;
  graph: KnowledgeGraph;
  sink: CapturedSink;
} {
  const store = new InMemoryGraphStore();
  const sink = captureSink();
  const tracer = new TraceLogger({ sink, level: 'debug' });
  const graph = new KnowledgeGraph(store, { embed, tracer });
  return { store, tracer, graph, sink };
}

const VOCAB = ['login', 'signin', 'email', 'password', 'user', 'form', 'search', 'checkout', 'submit'];

/** Bag-of-words embedding over a tiny fixed vocabulary. */
export const keywordEmbed: EmbedFn = text => {
  const words = text.toLowerCase().split(/[^a-z0-9]+/);
  return VOCAB.map(v => (words.includes(v) ? 1 : 0));
};

export const queuedLogin = {
  name: 'Queued Login',
  description: 'Log in to the site through the task queue',
  goal: 'Authenticated session',
  tags: ['login', 'web'],
  steps: [
    { id: 'step_1', tool: 'web.get_dom', params: { url: 'https://example.com/login' } },
    { id: 'step_2', tool: 'form.autofill', params: { form: 'login' }, depends_on: ['step_1'] },
    { id: 'step_3', tool: 'web.click_selector', params: { selector: '#submit' }, depends_on: ['step_2'] },
  ],
};
