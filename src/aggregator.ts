/**
 * Aggregator — retrieval, validation gate, merge, and metadata in one run
 *
 * Sources are fetched concurrently but merged strictly in configured order,
 * since collision resolution depends on it.
 */

import type { AggregatorConfig } from './config';
import { logDiagnostic, type Logger } from './logger';
import { isEmptyDocument, mergeDocuments } from './merge';
import { updateMetadata } from './metadata';
import { isProxyAvailable, resolveProxyMode, type ProxyProbe } from './proxy';
import { fetchSources, type FetchFn } from './retrieval';
import { findDocumentIssues } from './validator';
import type {
  EmptyDocument,
  JsonObject,
  MergeDiagnostic,
  MergeEntry,
  Source,
  SourceReport,
  SourceStatus,
} from './types';

export interface AggregateDeps {
  logger: Logger;
  fetch?: FetchFn;
  probe?: ProxyProbe;
}

export interface AggregateOptions {
  /** Overrides `settings.grouping`. */
  grouping?: boolean;
}

export interface AggregateResult {
  /** Empty when no source made it to the merge. */
  document: JsonObject | EmptyDocument;
  diagnostics: MergeDiagnostic[];
  sources: SourceReport[];
  proxy: boolean;
}

export async function aggregate(
  config: AggregatorConfig,
  deps: AggregateDeps,
  options?: AggregateOptions,
): Promise<AggregateResult> {
  const log = deps.logger;
  const grouping = options?.grouping ?? config.settings.grouping;
  const diagnostics: MergeDiagnostic[] = [];

  for (const rejected of config.rejected) {
    const label = rejected.name ?? `#${rejected.position}`;
    diagnostics.push({
      level: 'warn',
      code: 'source_skipped',
      source: label,
      message: `Skipping source ${label}: ${rejected.issues.join('; ')}`,
      details: { position: rejected.position, issues: rejected.issues },
    });
  }

  // Indexed by position in config.sources; names need not be unique.
  const statuses: SourceStatus[] = config.sources.map(source => (source.enabled ? 'merged' : 'disabled'));
  const enabled: Array<{ source: Source; position: number }> = [];
  config.sources.forEach((source, position) => {
    if (source.enabled) enabled.push({ source, position });
  });

  log.info({ sources: enabled.length, disabled: config.sources.length - enabled.length }, 'Fetching schemas');

  const [retrieval, proxy] = await Promise.all([
    fetchSources(enabled.map(e => e.source), {
      fetch: deps.fetch,
      timeoutMs: config.retrieval.timeoutMs,
      concurrency: config.retrieval.concurrency,
    }),
    resolveProxyMode(config.proxy, deps.probe ?? isProxyAvailable),
  ]);

  diagnostics.push(...retrieval.diagnostics);
  for (const { index } of retrieval.failed) {
    statuses[enabled[index].position] = 'failed';
  }

  const entries: MergeEntry[] = [];
  const entryPositions: number[] = [];
  for (const { source, index, document } of retrieval.fetched) {
    const position = enabled[index].position;
    const issues = findDocumentIssues(document);
    if (issues.length > 0) {
      statuses[position] = 'excluded';
      diagnostics.push({
        level: 'error',
        code: 'source_excluded',
        source: source.name,
        message: `Schema ${source.name} is not a valid OpenAPI document`,
        details: { url: source.schema, issues },
      });
      continue;
    }
    entries.push({ name: source.name, url: source.url, document });
    entryPositions.push(position);
  }

  if (proxy) {
    log.info({ host: config.proxy.host, port: config.proxy.port }, 'Proxy reachable, rewriting servers to proxy paths');
  }

  const merged = mergeDocuments(entries, { grouping, proxy });
  diagnostics.push(...merged.diagnostics);
  for (const diagnostic of merged.diagnostics) {
    const index = diagnostic.details?.index;
    if (diagnostic.code === 'source_skipped' && typeof index === 'number') {
      statuses[entryPositions[index]] = 'skipped';
    }
  }

  for (const diagnostic of diagnostics) {
    logDiagnostic(log, diagnostic);
  }

  const sources: SourceReport[] = config.sources.map((source, position) => ({
    name: source.name,
    schema: source.schema,
    status: statuses[position],
  }));

  if (isEmptyDocument(merged.document)) {
    log.warn('No sources were merged');
    return { document: merged.document, diagnostics, sources, proxy };
  }

  const document = updateMetadata(merged.document, config.settings);
  log.info(
    {
      merged: entries.length,
      paths: Object.keys(merged.document.paths).length,
      schemas: Object.keys(merged.document.components.schemas).length,
    },
    'Schemas merged',
  );

  return { document, diagnostics, sources, proxy };
}
