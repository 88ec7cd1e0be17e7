import { readFile } from 'node:fs/promises';
import { resolve, dirname } from 'node:path';
import { existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import {
  type SinewConfig,
  DEFAULT_CONFIG,
  sinewConfigSchema,
  ConfigError,
  errorMessage,
  isRecord,
} from '@sinew/shared';

export const CONFIG_FILE_NAMES = ['sinew.config.yaml', 'sinew.config.yml', 'sinew.config.json'];

export const CONFIG_ENV_VARS = [
  'SINEW_LOG_LEVEL',
  'SINEW_STORAGE_BACKEND',
  'SINEW_DB_PATH',
  'SINEW_MIN_SIMILARITY',
  'SINEW_TRANSFER_THRESHOLD',
];

export type ConfigOverrides = { [K in keyof SinewConfig]?: Partial<SinewConfig[K]> };

export interface ConfigManagerOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export class ConfigManager {
  private config: SinewConfig = structuredClone(DEFAULT_CONFIG);
  private env: NodeJS.ProcessEnv;
  private cwd: string;
  private source: string | null = null;

  constructor(options: ConfigManagerOptions = {}) {
    this.env = options.env ?? process.env;
    this.cwd = options.cwd ?? process.cwd();
  }

  /** Defaults, then the config file, then environment variables; validated with zod. */
  async load(options?: { configPath?: string }): Promise<SinewConfig> {
    let merged: Record<string, unknown> = {};

    const fileConfig = await this.loadConfigFile(options?.configPath);
    if (fileConfig) {
      merged = deepMerge(merged, fileConfig);
    }

    merged = deepMerge(merged, this.loadEnvVars());

    const result = sinewConfigSchema.safeParse(merged);
    if (!result.success) {
      throw new ConfigError(
        `Invalid configuration: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
      );
    }

    this.config = result.data;
    return this.config;
  }

  get<K extends keyof SinewConfig>(key: K): SinewConfig[K] {
    return this.config[key];
  }

  getAll(): SinewConfig {
    return this.config;
  }

  /** Path of the config file that was loaded, if any. */
  getSource(): string | null {
    return this.source;
  }

  set(overrides: ConfigOverrides): void {
    this.config = {
      logging: { ...this.config.logging, ...overrides.logging },
      storage: { ...this.config.storage, ...overrides.storage },
      evolution: { ...this.config.evolution, ...overrides.evolution },
      executor: { ...this.config.executor, ...overrides.executor },
    };
  }

  private async loadConfigFile(configPath?: string): Promise<Record<string, unknown> | null> {
    if (configPath) {
      const p = resolve(this.cwd, configPath);
      if (!existsSync(p)) {
        throw new ConfigError(`Config file not found: ${p}`);
      }
      return this.parseConfigFile(p);
    }

    // Search cwd and parent directories
    let dir = resolve(this.cwd);
    for (let depth = 0; depth < 10; depth++) {
      for (const name of CONFIG_FILE_NAMES) {
        const p = resolve(dir, name);
        if (existsSync(p)) {
          return this.parseConfigFile(p);
        }
      }
      const parent = dirname(dir);
      if (parent === dir) break;
      dir = parent;
    }

    return null;
  }

  private async parseConfigFile(p: string): Promise<Record<string, unknown>> {
    const content = await readFile(p, 'utf-8');
    let parsed: unknown;
    try {
      parsed = p.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
    } catch (err) {
      throw new ConfigError(`Cannot parse ${p}: ${errorMessage(err)}`);
    }
    this.source = p;
    // An empty YAML file parses to null
    if (parsed === null || parsed === undefined) return {};
    if (!isRecord(parsed)) {
      throw new ConfigError(`${p} must contain a mapping at the top level`);
    }
    return parsed;
  }

  private loadEnvVars(): Record<string, unknown> {
    const env = this.env;
    const config: Record<string, Record<string, unknown>> = {};
    const section = (name: string): Record<string, unknown> => (config[name] ??= {});

    if (env.SINEW_LOG_LEVEL) {
      section('logging').level = env.SINEW_LOG_LEVEL;
    }
    if (env.SINEW_STORAGE_BACKEND) {
      section('storage').backend = env.SINEW_STORAGE_BACKEND;
    }
    if (env.SINEW_DB_PATH) {
      section('storage').dbPath = env.SINEW_DB_PATH;
    }
    if (env.SINEW_MIN_SIMILARITY) {
      section('evolution').minSimilarity = parseFloat(env.SINEW_MIN_SIMILARITY);
    }
    if (env.SINEW_TRANSFER_THRESHOLD) {
      section('evolution').transferThreshold = parseFloat(env.SINEW_TRANSFER_THRESHOLD);
    }

    return config;
  }
}

function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const [key, value] of Object.entries(source)) {
    const existing = result[key];
    if (isRecord(value) && isRecord(existing)) {
      result[key] = deepMerge(existing, value);
    } else {
      result[key] = value;
    }
  }
  return result;
}
