import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { Command } from 'commander';
import { createSinew, type Sinew } from '@sinew/core';
import { isRecord } from '@sinew/shared';

export interface StoreOptions {
  config?: string;
  db?: string;
}

/** Adds the options every command that touches the graph understands. */
export function withStoreOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Config file (default: search for sinew.config.yaml)')
    .option('--db <path>', 'SQLite database file; implies the sqlite backend');
}

/** Open the configured store, run `fn` against it, and always release it. */
export async function withSinew<T>(options: StoreOptions, fn: (sinew: Sinew) => Promise<T>): Promise<T> {
  const sinew = await createSinew({
    configPath: options.config,
    overrides: options.db ? { storage: { backend: 'sqlite', dbPath: resolve(options.db) } } : undefined,
  });
  try {
    return await fn(sinew);
  } finally {
    sinew.shutdown();
  }
}

export async function readText(path: string): Promise<string> {
  return readFile(resolve(path), 'utf-8');
}

/** Parse a `--context` argument; it must be a JSON object. */
export function parseContext(raw: string | undefined): Record<string, unknown> {
  if (!raw) return {};
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    throw new Error('--context must be a JSON object');
  }
  return parsed;
}
