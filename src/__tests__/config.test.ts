import { describe, it, expect, afterEach } from 'vitest';
import { writeFileSync, unlinkSync, existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { randomUUID } from 'crypto';
import { loadConfig, parseConfig, resolveConfigPath } from '../config';
import { MergeError } from '../errors';

function tmpConfig(content: string): string {
  const path = join(tmpdir(), `test-config-${randomUUID()}.yml`);
  writeFileSync(path, content, 'utf-8');
  return path;
}

describe('parseConfig', () => {
  it('applies defaults', () => {
    const config = parseConfig({}, {});

    expect(config.settings).toEqual({ title: 'Merged API', description: '', version: '1.0.0', grouping: true });
    expect(config.proxy).toEqual({
      enabled: false,
      host: '127.0.0.1',
      port: 80,
      timeoutMs: 2000,
      assumeAvailable: false,
    });
    expect(config.retrieval).toEqual({ timeoutMs: 10_000, concurrency: 8 });
    expect(config.sources).toEqual([]);
  });

  it('fills source defaults and generates missing names', () => {
    const config = parseConfig({
      sources: [
        { name: 'users', schema: 'http://users/openapi.json', url: 'http://users:8000' },
        { schema: 'http://orders/openapi.yaml', enabled: false },
      ],
    }, {});

    expect(config.sources[0]).toEqual({
      name: 'users',
      url: 'http://users:8000',
      schema: 'http://users/openapi.json',
      enabled: true,
    });
    expect(config.sources[1].url).toBe('http://localhost');
    expect(config.sources[1].enabled).toBe(false);
    expect(config.sources[1].name).toHaveLength(10);
    expect(Object.isFrozen(config.sources[0])).toBe(true);
  });

  it('uses the top-level enabled flag as the source default', () => {
    const config = parseConfig({
      enabled: false,
      sources: [{ name: 'a', schema: 'http://a/openapi.json' }, { name: 'b', schema: 'http://b/openapi.json', enabled: true }],
    }, {});

    expect(config.sources.map(s => s.enabled)).toEqual([false, true]);
  });

  it('reads proxy switches from the environment', () => {
    const config = parseConfig({}, { PROXY_ENABLED: 'true', PROXY_AVAILABLE: 'true' });

    expect(config.proxy.enabled).toBe(true);
    expect(config.proxy.assumeAvailable).toBe(true);
  });

  it('rejects invalid configuration with the zod issues attached', () => {
    let caught: unknown;
    try {
      parseConfig({ proxy: { port: 70000 } }, {});
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(MergeError);
    if (caught instanceof MergeError) {
      expect(caught.code).toBe('config_error');
      expect(Array.isArray(caught.details)).toBe(true);
    }
  });

  it('leaves out a broken source entry and keeps the rest', () => {
    const config = parseConfig({
      sources: [
        { name: 'a' },
        { name: 'b', schema: 'http://b/o.json' },
        { name: 'c', schema: 'specs/c.yaml' },
      ],
    }, {});

    expect(config.sources.map(s => [s.name, s.schema])).toEqual([
      ['b', 'http://b/o.json'],
      ['c', 'specs/c.yaml'],
    ]);
    expect(config.rejected).toEqual([{ position: 0, name: 'a', issues: ['schema: Required'] }]);
  });

  it('rejects non-mapping source entries without a name', () => {
    const config = parseConfig({ sources: ['http://x/o.json'] }, {});

    expect(config.sources).toEqual([]);
    expect(config.rejected).toEqual([{ position: 0, name: undefined, issues: ['Expected object, received string'] }]);
  });

  it('treats an empty file as an empty configuration', () => {
    expect(parseConfig(null, {}).sources).toEqual([]);
  });
});

describe('loadConfig', () => {
  let path: string | undefined;

  afterEach(() => {
    if (path && existsSync(path)) unlinkSync(path);
    path = undefined;
  });

  it('loads a YAML file', () => {
    path = tmpConfig(`
settings:
  title: Gateway
  grouping: false
proxy:
  enabled: true
  port: 8080
sources:
  - name: users
    schema: http://users/openapi.json
    url: http://users:8000
`);
    const config = loadConfig(path, {});

    expect(config.settings.title).toBe('Gateway');
    expect(config.settings.grouping).toBe(false);
    expect(config.proxy.port).toBe(8080);
    expect(config.proxy.enabled).toBe(true);
    expect(config.sources.map(s => s.name)).toEqual(['users']);
  });

  it('reports unreadable files as config errors', () => {
    const missing = join(tmpdir(), `missing-${randomUUID()}.yml`);
    expect(() => loadConfig(missing, {})).toThrow(MergeError);
  });
});

describe('resolveConfigPath', () => {
  it('prefers the explicit path, then the environment, then config.yml', () => {
    expect(resolveConfigPath('a.yml', { OPENAPI_MERGE_CONFIG: 'b.yml' })).toBe('a.yml');
    expect(resolveConfigPath(undefined, { OPENAPI_MERGE_CONFIG: 'b.yml' })).toBe('b.yml');
    expect(resolveConfigPath(undefined, {})).toBe('config.yml');
  });
});
