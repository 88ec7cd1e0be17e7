export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggingConfig {
  level: LogLevel;
  traceOutput: 'memory' | 'sqlite';
}

export interface StorageConfig {
  backend: 'memory' | 'sqlite';
  dbPath?: string;
}

export interface EvolutionConfig {
  minSimilar: number;
  minSimilarity: number;
  transferThreshold: number;
  /** Similarity assumed when neither side carries an embedding. */
  defaultSimilarity: number;
  /** Share of exemplars a selector or step must appear in to be kept on generalization. */
  commonThreshold: number;
}

export interface ExecutorConfig {
  maxDepth: number;
}

export interface SinewConfig {
  logging: LoggingConfig;
  storage: StorageConfig;
  evolution: EvolutionConfig;
  executor: ExecutorConfig;
}
