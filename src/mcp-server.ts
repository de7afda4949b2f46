/**
 * MCP Server — Model Context Protocol interface for AI agents
 *
 * Exposes the merge engine and its building blocks as MCP tools over stdio.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';

import { aggregate } from './aggregator';
import type { AggregatorConfig } from './config';
import { isJsonObject, toDocumentValue } from './document';
import { decodeError, toStructuredError, validationError } from './errors';
import { createLogger, type Logger } from './logger';
import { mergeDocuments } from './merge';
import { updateMetadata } from './metadata';
import { isProxyAvailable, type ProxyProbe } from './proxy';
import type { FetchFn } from './retrieval';
import { safeName } from './safe-name';
import { injectServers } from './servers';
import { namespaceTags } from './tags';
import { findDocumentIssues } from './validator';
import type { JsonObject, JsonValue } from './types';

export const SERVER_NAME = 'openapi-aggregator';
export const SERVER_VERSION = '0.1.0';

export interface McpServerDeps {
  config?: AggregatorConfig;
  logger: Logger;
  fetch?: FetchFn;
  probe?: ProxyProbe;
}

const MergeSourceSchema = z.object({
  name: z.string().min(1),
  url: z.string(),
  document: z.unknown(),
  enabled: z.boolean().default(true),
});

type ToolResult = { content: Array<{ type: 'text'; text: string }>; isError?: boolean };

function ok(body: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(body, null, 2) }] };
}

function fail(err: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(toStructuredError(err), null, 2) }], isError: true };
}

function parseDocumentArg(text: string, source: string): JsonObject {
  let value: JsonValue;
  try {
    value = toDocumentValue(text);
  } catch (err) {
    throw decodeError(source, err);
  }
  if (!isJsonObject(value)) {
    throw decodeError(source, new TypeError('expected a JSON object'));
  }
  return value;
}

export function createMcpServer(deps: McpServerDeps): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  // Tool: merge_documents
  server.tool(
    'merge_documents',
    'Merge OpenAPI documents into one. Sources are processed in order; the first to claim a path or component name keeps it, later ones get a _<source> suffix.',
    {
      sources: z.string().describe('JSON array of { name, url, document, enabled? }'),
      grouping: z.boolean().optional().describe('Prefix tags with the source name (default: true)'),
      proxy: z.boolean().optional().describe('Rewrite injected servers to /proxy/<name> (default: false)'),
    },
    async (args) => {
      try {
        const parsed = z.array(MergeSourceSchema).safeParse(JSON.parse(args.sources));
        if (!parsed.success) {
          return fail(validationError(parsed.error.issues));
        }
        const entries = parsed.data
          .filter(source => source.enabled)
          .map(source => ({ name: source.name, url: source.url, document: source.document }));
        const result = mergeDocuments(entries, { grouping: args.grouping ?? true, proxy: args.proxy ?? false });
        return ok(result);
      } catch (err) {
        return fail(err);
      }
    },
  );

  // Tool: aggregate_sources
  server.tool(
    'aggregate_sources',
    'Fetch every configured source, validate, merge, and apply the configured title/description/version.',
    {
      grouping: z.boolean().optional().describe('Override the configured grouping setting'),
    },
    async (args) => {
      if (!deps.config) {
        return fail(new Error('No configuration loaded; start the server with a config file.'));
      }
      try {
        const result = await aggregate(
          deps.config,
          { logger: deps.logger, fetch: deps.fetch, probe: deps.probe },
          { grouping: args.grouping },
        );
        return ok(result);
      } catch (err) {
        return fail(err);
      }
    },
  );

  // Tool: safe_name
  server.tool(
    'safe_name',
    'Normalize a service name into the token used in proxy paths.',
    {
      name: z.string().describe('Service name'),
    },
    async (args) => ok({ name: args.name, safeName: safeName(args.name) }),
  );

  // Tool: validate_document
  server.tool(
    'validate_document',
    'Check that a document has the minimal OpenAPI/Swagger structure required for merging.',
    {
      document: z.string().describe('JSON-encoded document'),
    },
    async (args) => {
      try {
        const issues = findDocumentIssues(toDocumentValue(args.document));
        return ok({ valid: issues.length === 0, issues });
      } catch (err) {
        return fail(decodeError('document', err));
      }
    },
  );

  // Tool: inject_servers
  server.tool(
    'inject_servers',
    "Add a service's server entry to every operation of a document.",
    {
      document: z.string().describe('JSON-encoded document'),
      url: z.string().describe('Service origin URL'),
      name: z.string().describe('Service name'),
      proxy: z.boolean().optional().describe('Use the /proxy/<name> path (default: false)'),
    },
    async (args) => {
      try {
        const document = parseDocumentArg(args.document, args.name);
        return ok(injectServers(document, { url: args.url, name: args.name, proxy: args.proxy ?? false }));
      } catch (err) {
        return fail(err);
      }
    },
  );

  // Tool: namespace_tags
  server.tool(
    'namespace_tags',
    'Prefix every document-level and operation tag with "<service> | ".',
    {
      document: z.string().describe('JSON-encoded document'),
      name: z.string().describe('Service name'),
    },
    async (args) => {
      try {
        return ok(namespaceTags(parseDocumentArg(args.document, args.name), args.name));
      } catch (err) {
        return fail(err);
      }
    },
  );

  // Tool: update_metadata
  server.tool(
    'update_metadata',
    "Overwrite a merged document's info title/description/version and set the OpenAPI version.",
    {
      document: z.string().describe('JSON-encoded document'),
      title: z.string(),
      description: z.string().optional(),
      version: z.string(),
    },
    async (args) => {
      try {
        const document = parseDocumentArg(args.document, 'document');
        return ok(updateMetadata(document, {
          title: args.title,
          description: args.description ?? '',
          version: args.version,
        }));
      } catch (err) {
        return fail(err);
      }
    },
  );

  // Tool: proxy_status
  server.tool(
    'proxy_status',
    'Report whether proxying is enabled and the reverse-proxy frontend is reachable.',
    {},
    async () => {
      if (!deps.config) {
        return ok({ enabled: false, available: false });
      }
      const probe = deps.probe ?? isProxyAvailable;
      const available = await probe(deps.config.proxy);
      return ok({ enabled: deps.config.proxy.enabled, available });
    },
  );

  return server;
}

export async function startMcpServer(config?: AggregatorConfig): Promise<void> {
  // stdout carries the protocol
  const logger = createLogger({ destination: process.stderr });
  const server = createMcpServer({ config, logger });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ sources: config?.sources.length ?? 0 }, 'MCP server listening on stdio');
}
