import type { EmbedFn, GraphStore } from '@sinew/shared';
import { InMemoryGraphStore, closeDatabase, initializeStore, type TraceRepository } from '@sinew/store';
import { ConfigManager, type ConfigOverrides } from './config-manager.js';
import { TraceLogger, type LogSink } from './trace-logger.js';
import { KnowledgeGraph } from './knowledge-graph.js';
import { ConceptBuilder } from './concept-builder.js';
import { DagExecutor } from './dag-executor.js';
import { CentroidTracker } from './centroid-tracker.js';
import { ProcedureLibrary } from './procedure-library.js';
import { PatternStore } from './evolution/pattern-store.js';
import { PatternMatcher } from './evolution/pattern-matcher.js';
import { PatternTransfer } from './evolution/pattern-transfer.js';
import { Generalizer } from './evolution/generalizer.js';

export interface SinewOptions {
  configPath?: string;
  overrides?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Replaces the configured backend. */
  store?: GraphStore;
  embed?: EmbedFn;
  sink?: LogSink;
}

export interface Sinew {
  config: ConfigManager;
  tracer: TraceLogger;
  graph: KnowledgeGraph;
  builder: ConceptBuilder;
  executor: DagExecutor;
  centroids: CentroidTracker;
  library: ProcedureLibrary;
  patterns: PatternStore;
  matcher: PatternMatcher;
  transfer: PatternTransfer;
  generalizer: Generalizer;
  shutdown(): void;
}

/** Load configuration, open the configured store and wire every service to it. */
export async function createSinew(options: SinewOptions = {}): Promise<Sinew> {
  const config = new ConfigManager({ env: options.env, cwd: options.cwd });
  await config.load({ configPath: options.configPath });
  if (options.overrides) config.set(options.overrides);

  const { logging, storage, evolution, executor } = config.getAll();

  let store = options.store;
  let traces: TraceRepository | undefined;
  let ownsDatabase = false;
  if (!store) {
    if (storage.backend === 'sqlite') {
      const opened = initializeStore(storage.dbPath);
      store = opened.graph;
      traces = logging.traceOutput === 'sqlite' ? opened.traces : undefined;
      ownsDatabase = true;
    } else {
      store = new InMemoryGraphStore();
    }
  }

  const tracer = new TraceLogger({ repo: traces, level: logging.level, sink: options.sink });
  const graph = new KnowledgeGraph(store, { embed: options.embed, tracer });
  const patterns = new PatternStore(graph);

  return {
    config,
    tracer,
    graph,
    builder: new ConceptBuilder(graph),
    executor: new DagExecutor(graph, { maxDepth: executor.maxDepth }),
    centroids: new CentroidTracker(graph),
    library: new ProcedureLibrary(graph),
    patterns,
    matcher: new PatternMatcher(graph, { defaultSimilarity: evolution.defaultSimilarity }),
    transfer: new PatternTransfer(graph, patterns, { transferThreshold: evolution.transferThreshold }),
    generalizer: new Generalizer(graph, {
      defaultSimilarity: evolution.defaultSimilarity,
      commonThreshold: evolution.commonThreshold,
      minSimilar: evolution.minSimilar,
      minSimilarity: evolution.minSimilarity,
    }),
    shutdown() {
      if (ownsDatabase) closeDatabase();
    },
  };
}
