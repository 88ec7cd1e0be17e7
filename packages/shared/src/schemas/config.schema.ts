import { z } from 'zod';

export const loggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  traceOutput: z.enum(['memory', 'sqlite']).default('memory'),
});

export const storageConfigSchema = z.object({
  backend: z.enum(['memory', 'sqlite']).default('sqlite'),
  dbPath: z.string().min(1).optional(),
});

export const evolutionConfigSchema = z.object({
  minSimilar: z.number().int().min(1).default(2),
  minSimilarity: z.number().min(0).max(1).default(0.75),
  transferThreshold: z.number().min(0).max(1).default(0.6),
  defaultSimilarity: z.number().min(0).max(1).default(0.7),
  commonThreshold: z.number().min(0).max(1).default(0.5),
});

export const executorConfigSchema = z.object({
  maxDepth: z.number().int().min(1).default(16),
});

export const sinewConfigSchema = z.object({
  logging: loggingConfigSchema.default({}),
  storage: storageConfigSchema.default({}),
  evolution: evolutionConfigSchema.default({}),
  executor: executorConfigSchema.default({}),
});
