import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import {
  type AppConfig,
  AppConfigSchema,
  EMBEDDING_PROVIDERS,
  INDEX_BACKENDS,
  LOG_LEVELS,
  SIMILARITY_METRICS,
  VECTOR_PRECISIONS
} from '../types/index.js';
import { deepFreeze, deepMerge, isObject } from './merge.js';

export type ConfigInput = Record<string, unknown>;

export interface ConfigLayer {
  name: string;
  priority: number;
  config: ConfigInput;
}

type InternalLayer = ConfigLayer & { index: number };

function pickEnum<T extends string>(allowed: readonly T[], raw: string | undefined): T | undefined {
  return allowed.find((value) => value === raw);
}

function parsePositiveInt(raw: string | undefined): number | undefined {
  if (!raw) return undefined;
  const n = Number.parseInt(raw, 10);
  return Number.isInteger(n) && n > 0 && String(n) === raw.trim() ? n : undefined;
}

/** Drop keys whose value is undefined so they do not show up as empty sections. */
function compact(section: Record<string, unknown>): Record<string, unknown> | undefined {
  const entries = Object.entries(section).filter(([, v]) => v !== undefined);
  return entries.length ? Object.fromEntries(entries) : undefined;
}

export class ConfigResolver {
  private layers: InternalLayer[] = [];
  private nextIndex = 0;

  addLayer(layer: ConfigLayer): this {
    this.layers.push({ ...layer, index: this.nextIndex });
    this.nextIndex += 1;
    return this;
  }

  /** Merge layers by ascending priority (insertion order breaks ties), validate and freeze. */
  resolve(): Readonly<AppConfig> {
    const ordered = [...this.layers].sort((a, b) => {
      const byPriority = a.priority - b.priority;
      return byPriority !== 0 ? byPriority : a.index - b.index;
    });

    const merged = deepMerge(...ordered.map((l) => l.config));
    return deepFreeze(AppConfigSchema.parse(merged));
  }

  static loadDefault(): AppConfig {
    return AppConfigSchema.parse({});
  }

  /** Read a JSON or YAML file; resolves to null when the file does not exist or is empty. */
  static async loadFromFile(path: string): Promise<ConfigInput | null> {
    let data: string;
    try {
      data = await readFile(path, 'utf-8');
    } catch (error) {
      const code = isObject(error) ? error.code : undefined;
      if (code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    if (!data.trim()) {
      return null;
    }

    const ext = extname(path).toLowerCase();
    const parsed: unknown = ext === '.yaml' || ext === '.yml' ? parseYaml(data) : JSON.parse(data);
    if (!isObject(parsed)) {
      throw new Error(`Invalid config at ${path}: expected an object`);
    }
    return parsed;
  }

  static loadFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigInput {
    const out: ConfigInput = {};

    const index = compact({
      name: env.INDEX_NAME || undefined,
      dimension: parsePositiveInt(env.INDEX_DIMENSION),
      metric: pickEnum(SIMILARITY_METRICS, env.INDEX_METRIC),
      precision: pickEnum(VECTOR_PRECISIONS, env.INDEX_PRECISION)
    });
    if (index) out.index = index;

    const backend = compact({
      provider: pickEnum(INDEX_BACKENDS, env.INDEX_BACKEND),
      baseUrl: env.INDEX_BASE_URL || undefined,
      authToken: env.INDEX_AUTH_TOKEN || undefined
    });
    if (backend) out.backend = backend;

    const embedding = compact({
      provider: pickEnum(EMBEDDING_PROVIDERS, env.EMBEDDING_PROVIDER),
      model: env.EMBEDDING_MODEL || undefined,
      dimension: parsePositiveInt(env.EMBEDDING_DIM),
      baseUrl: env.EMBEDDING_BASE_URL || undefined,
      apiKey: env.EMBEDDING_API_KEY || undefined
    });
    if (embedding) out.embedding = embedding;

    const port = parsePositiveInt(env.API_PORT);
    const server = compact({
      host: env.API_HOST || undefined,
      port: port !== undefined && port <= 65535 ? port : undefined
    });
    if (server) out.server = server;

    const logLevel = pickEnum(LOG_LEVELS, env.LOG_LEVEL);
    if (logLevel) out.logLevel = logLevel;
    if (env.LOG_PRETTY === '1' || env.LOG_PRETTY === 'true') out.logPretty = true;

    return out;
  }

  /** Defaults, then the optional file, then the environment. */
  static async load(opts: { configPath?: string; env?: NodeJS.ProcessEnv } = {}): Promise<Readonly<AppConfig>> {
    const resolver = new ConfigResolver();
    resolver.addLayer({ name: 'defaults', priority: 0, config: {} });

    if (opts.configPath) {
      const fromFile = await ConfigResolver.loadFromFile(opts.configPath);
      if (fromFile) resolver.addLayer({ name: 'file', priority: 10, config: fromFile });
    }

    resolver.addLayer({ name: 'env', priority: 20, config: ConfigResolver.loadFromEnv(opts.env) });
    return resolver.resolve();
  }
}
