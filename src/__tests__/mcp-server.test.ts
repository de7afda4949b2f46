import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';

import { createMcpServer } from '../mcp-server';
import { parseConfig } from '../config';
import { createLogger } from '../logger';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

const logger = createLogger({ level: 'silent' });

function makeDocument(paths: Record<string, unknown>) {
  return { openapi: '3.0.0', info: { title: 'X', version: '1' }, paths };
}

function textOf(result: Awaited<ReturnType<Client['callTool']>>): string {
  const content = result.content;
  if (!Array.isArray(content)) throw new Error('expected content array');
  const first: unknown = content[0];
  if (typeof first !== 'object' || first === null || !('text' in first) || typeof first.text !== 'string') {
    throw new Error('expected text content');
  }
  return first.text;
}

describe('MCP Server', () => {
  let mcpServer: McpServer;
  let client: Client;

  async function connect(server: McpServer) {
    mcpServer = server;
    const [serverTransport, clientTransport] = InMemoryTransport.createLinkedPair();
    await mcpServer.connect(serverTransport);

    client = new Client({ name: 'test-client', version: '1.0.0' });
    await client.connect(clientTransport);
  }

  beforeEach(async () => {
    await connect(createMcpServer({ logger }));
  });

  afterEach(async () => {
    await client.close();
    await mcpServer.close();
    vi.restoreAllMocks();
  });

  it('lists all tools', async () => {
    const { tools } = await client.listTools();
    const names = tools.map(t => t.name).sort();

    expect(names).toEqual([
      'aggregate_sources',
      'inject_servers',
      'merge_documents',
      'namespace_tags',
      'proxy_status',
      'safe_name',
      'update_metadata',
      'validate_document',
    ]);
  });

  it('merge_documents merges in order with disambiguation', async () => {
    const sources = [
      { name: 'svc1', url: 'http://svc1', document: makeDocument({ '/users': { get: {} } }) },
      { name: 'svc2', url: 'http://svc2', document: makeDocument({ '/users': { get: {} } }) },
      { name: 'svc3', url: 'http://svc3', document: makeDocument({ '/users': { get: {} } }), enabled: false },
    ];

    const result = await client.callTool({
      name: 'merge_documents',
      arguments: { sources: JSON.stringify(sources), grouping: false },
    });
    const body = JSON.parse(textOf(result));

    expect(result.isError).toBeFalsy();
    expect(Object.keys(body.document.paths)).toEqual(['/users', '/users_svc2']);
    expect(body.diagnostics).toHaveLength(1);
    expect(body.document.tags).toBeUndefined();
  });

  it('merge_documents returns the empty sentinel for no sources', async () => {
    const result = await client.callTool({ name: 'merge_documents', arguments: { sources: '[]' } });
    expect(JSON.parse(textOf(result))).toEqual({ document: {}, diagnostics: [] });
  });

  it('merge_documents reports a decode failure as a structured error', async () => {
    const result = await client.callTool({
      name: 'merge_documents',
      arguments: { sources: JSON.stringify([{ name: 'bad', url: 'http://bad', document: '{oops' }]) },
    });
    const body = JSON.parse(textOf(result));

    expect(result.isError).toBe(true);
    expect(body.error).toBe('decode_error');
    expect(body.details).toEqual({ source: 'bad' });
  });

  it('merge_documents rejects malformed source lists', async () => {
    const result = await client.callTool({
      name: 'merge_documents',
      arguments: { sources: JSON.stringify([{ url: 'http://x' }]) },
    });

    expect(result.isError).toBe(true);
    expect(JSON.parse(textOf(result)).error).toBe('validation_error');
  });

  it('safe_name normalizes names', async () => {
    const result = await client.callTool({ name: 'safe_name', arguments: { name: 'My Service! 2.0' } });
    expect(JSON.parse(textOf(result))).toEqual({ name: 'My Service! 2.0', safeName: 'my_service_2_0' });
  });

  it('validate_document reports issues', async () => {
    const result = await client.callTool({
      name: 'validate_document',
      arguments: { document: JSON.stringify({ openapi: '3.0.0', info: { title: 'X', version: '1' } }) },
    });
    expect(JSON.parse(textOf(result))).toEqual({ valid: false, issues: ['paths: Required'] });
  });

  it('inject_servers and namespace_tags transform a document', async () => {
    const doc = JSON.stringify(makeDocument({ '/a': { get: { tags: ['t'] } } }));

    const injected = await client.callTool({
      name: 'inject_servers',
      arguments: { document: doc, url: 'http://a', name: 'a' },
    });
    expect(JSON.parse(textOf(injected)).paths).toEqual({
      '/a': { get: { tags: ['t'], servers: [{ url: 'http://a' }] } },
    });

    const tagged = await client.callTool({ name: 'namespace_tags', arguments: { document: doc, name: 'a' } });
    expect(JSON.parse(textOf(tagged)).paths).toEqual({ '/a': { get: { tags: ['a | t'] } } });
  });

  it('update_metadata rejects non-object documents', async () => {
    const result = await client.callTool({
      name: 'update_metadata',
      arguments: { document: '[1, 2]', title: 'T', version: '1' },
    });

    expect(result.isError).toBe(true);
    expect(JSON.parse(textOf(result)).error).toBe('decode_error');
  });

  it('aggregate_sources needs a configuration', async () => {
    const result = await client.callTool({ name: 'aggregate_sources', arguments: {} });
    expect(result.isError).toBe(true);
  });

  it('aggregate_sources runs the configured pipeline', async () => {
    await client.close();
    await mcpServer.close();

    const config = parseConfig({
      settings: { title: 'Gateway', version: '3.0.0' },
      sources: [{ name: 'svc', schema: 'http://svc/openapi.json', url: 'http://svc:8000' }],
    }, {});
    const fetchFn = vi.fn(async () => new Response(JSON.stringify(makeDocument({ '/ping': { get: {} } })), {
      status: 200,
      headers: { 'content-type': 'application/json' },
    }));
    await connect(createMcpServer({ logger, config, fetch: fetchFn, probe: async () => false }));

    const result = await client.callTool({ name: 'aggregate_sources', arguments: {} });
    const body = JSON.parse(textOf(result));

    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(body.document.info).toEqual({ title: 'Gateway', description: '', version: '3.0.0' });
    expect(body.document.paths['/ping'].get.servers).toEqual([{ url: 'http://svc:8000' }]);
    expect(body.sources).toEqual([{ name: 'svc', schema: 'http://svc/openapi.json', status: 'merged' }]);
  });

  it('proxy_status reports disabled without configuration', async () => {
    const result = await client.callTool({ name: 'proxy_status', arguments: {} });
    expect(JSON.parse(textOf(result))).toEqual({ enabled: false, available: false });
  });
});
