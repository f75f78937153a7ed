import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigResolver } from '../../config/ConfigResolver.js';

describe('ConfigResolver', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'semantic-search-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should load schema defaults', () => {
    expect(ConfigResolver.loadDefault()).toMatchObject({
      index: { name: 'documents', dimension: 384, metric: 'cosine', precision: 'int8' },
      backend: { provider: 'memory', baseUrl: 'http://localhost:8080/api/v1', retry: { attempts: 3 } },
      embedding: { provider: 'hash', model: 'hash-v1', dimension: 384, batchSize: 32 },
      ingestion: { snippetLength: 200 },
      search: { defaultTopK: 5, maxTopK: 50 },
      server: { host: '0.0.0.0', port: 8000, requestTimeoutMs: 30000 },
      logLevel: 'info'
    });
  });

  it('should return null for missing or empty files', async () => {
    const empty = join(dir, 'empty.yaml');
    await writeFile(empty, '   \n');

    await expect(ConfigResolver.loadFromFile(join(dir, 'missing.json'))).resolves.toBeNull();
    await expect(ConfigResolver.loadFromFile(empty)).resolves.toBeNull();
  });

  it('should throw on invalid JSON and on non-object documents', async () => {
    const broken = join(dir, 'broken.json');
    const list = join(dir, 'list.yaml');
    await writeFile(broken, '{ nope');
    await writeFile(list, '- a\n- b\n');

    await expect(ConfigResolver.loadFromFile(broken)).rejects.toThrow(SyntaxError);
    await expect(ConfigResolver.loadFromFile(list)).rejects.toThrow(`Invalid config at ${list}: expected an object`);
  });

  it('should read recognised environment variables and ignore invalid values', () => {
    const env = {
      INDEX_NAME: 'papers',
      INDEX_DIMENSION: '768',
      INDEX_METRIC: 'manhattan',
      INDEX_PRECISION: 'float32',
      INDEX_BACKEND: 'http',
      INDEX_AUTH_TOKEN: 'test-secret',
      EMBEDDING_PROVIDER: 'openai',
      EMBEDDING_DIM: 'abc',
      API_PORT: '70000',
      API_HOST: '127.0.0.1',
      LOG_LEVEL: 'debug',
      LOG_PRETTY: 'true'
    };

    expect(ConfigResolver.loadFromEnv(env)).toEqual({
      index: { name: 'papers', dimension: 768, precision: 'float32' },
      backend: { provider: 'http', authToken: 'test-secret' },
      embedding: { provider: 'openai' },
      server: { host: '127.0.0.1' },
      logLevel: 'debug',
      logPretty: true
    });
    expect(ConfigResolver.loadFromEnv({})).toEqual({});
  });

  it('should layer defaults, file and environment in that order', async () => {
    const file = join(dir, 'search.yaml');
    await writeFile(file, ['index:', '  name: from-file', '  dimension: 128', 'search:', '  defaultTopK: 8', ''].join('\n'));

    const config = await ConfigResolver.load({ configPath: file, env: { INDEX_NAME: 'from-env' } });

    expect(config.index).toEqual({ name: 'from-env', dimension: 128, metric: 'cosine', precision: 'int8' });
    expect(config.search).toEqual({ defaultTopK: 8, maxTopK: 50 });
    expect(Object.isFrozen(config.index)).toBe(true);
  });

  it('should order layers by priority, then by insertion', () => {
    const config = new ConfigResolver()
      .addLayer({ name: 'high', priority: 5, config: { index: { name: 'high' } } })
      .addLayer({ name: 'low', priority: 1, config: { index: { name: 'low', dimension: 64 } } })
      .addLayer({ name: 'high-later', priority: 5, config: { index: { dimension: 32 } } })
      .resolve();

    expect(config.index).toMatchObject({ name: 'high', dimension: 32 });
  });

  it('should reject values the schema does not allow', () => {
    const resolver = new ConfigResolver().addLayer({ name: 'bad', priority: 0, config: { index: { dimension: -1 } } });

    expect(() => resolver.resolve()).toThrow();
  });
});
