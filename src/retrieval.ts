/**
 * Schema Retrieval — fetches each source's document over HTTP(S)
 *
 * Decoding follows the response content type, falling back from JSON to
 * YAML when the type is ambiguous. Sources are fetched concurrently and a
 * failure of one never aborts the others.
 */

import { parse as parseYaml } from 'yaml';
import { RetrievalError, describeError } from './errors';
import type { MergeDiagnostic, Source } from './types';

export const DEFAULT_FETCH_TIMEOUT_MS = 10_000;
export const DEFAULT_CONCURRENCY = 8;

export type FetchFn = typeof fetch;

export interface FetchDocumentOptions {
  timeoutMs?: number;
  fetch?: FetchFn;
}

export interface FetchSourcesOptions extends FetchDocumentOptions {
  concurrency?: number;
}

/** `index` is the source's position in the list passed to `fetchSources`. */
export interface FetchedSource {
  source: Source;
  index: number;
  document: unknown;
}

export interface FailedSource {
  source: Source;
  index: number;
  error: unknown;
}

export interface FetchSourcesResult {
  /** Successfully retrieved sources, in configured order. */
  fetched: FetchedSource[];
  failed: FailedSource[];
  diagnostics: MergeDiagnostic[];
}

type BodyFormat = 'json-first' | 'yaml';

function formatFor(contentType: string): BodyFormat {
  const type = contentType.toLowerCase();
  if (type.includes('vnd.oai.openapi') || type.includes('json')) return 'json-first';
  if (type.includes('yaml') || type.includes('yml')) return 'yaml';
  return 'json-first';
}

export function decodeBody(text: string, contentType: string): unknown {
  if (formatFor(contentType) === 'yaml') {
    return parseYaml(text);
  }
  try {
    return JSON.parse(text);
  } catch {
    return parseYaml(text);
  }
}

export async function fetchDocument(url: string, options?: FetchDocumentOptions): Promise<unknown> {
  const fetchFn = options?.fetch ?? globalThis.fetch;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options?.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS);

  let response: Response;
  let text: string;
  try {
    response = await fetchFn(url, {
      headers: { Accept: 'application/json, application/yaml;q=0.9, */*;q=0.5' },
      signal: controller.signal,
    });
    text = await response.text();
  } catch (err) {
    const reason = controller.signal.aborted ? 'timed out' : describeError(err);
    throw new RetrievalError(`Request to ${url} failed: ${reason}`, url, undefined, { cause: err });
  } finally {
    clearTimeout(timeout);
  }

  if (!response.ok) {
    throw new RetrievalError(
      `Schema endpoint returned ${response.status}: ${response.statusText}`,
      url,
      response.status,
    );
  }

  try {
    return decodeBody(text, response.headers.get('content-type') ?? '');
  } catch (err) {
    throw new RetrievalError(`Response from ${url} is neither JSON nor YAML: ${describeError(err)}`, url, response.status, {
      cause: err,
    });
  }
}

/**
 * Fetch every source with at most `concurrency` requests in flight.
 */
export async function fetchSources(sources: readonly Source[], options?: FetchSourcesOptions): Promise<FetchSourcesResult> {
  const concurrency = Math.max(1, options?.concurrency ?? DEFAULT_CONCURRENCY);
  const settled: Array<PromiseSettledResult<unknown>> = new Array(sources.length);
  let next = 0;

  async function worker(): Promise<void> {
    while (next < sources.length) {
      const index = next++;
      try {
        settled[index] = { status: 'fulfilled', value: await fetchDocument(sources[index].schema, options) };
      } catch (reason) {
        settled[index] = { status: 'rejected', reason };
      }
    }
  }

  const workers = Array.from({ length: Math.min(concurrency, sources.length) }, () => worker());
  await Promise.all(workers);

  const result: FetchSourcesResult = { fetched: [], failed: [], diagnostics: [] };
  sources.forEach((source, index) => {
    const outcome = settled[index];
    if (outcome.status === 'fulfilled') {
      result.fetched.push({ source, index, document: outcome.value });
      return;
    }
    result.failed.push({ source, index, error: outcome.reason });
    result.diagnostics.push({
      level: 'error',
      code: 'retrieval_failed',
      source: source.name,
      message: `Error loading ${source.name} (${source.schema}): ${describeError(outcome.reason)}`,
      details: outcome.reason instanceof RetrievalError && outcome.reason.statusCode !== undefined
        ? { url: source.schema, index, status: outcome.reason.statusCode }
        : { url: source.schema, index },
    });
  });

  return result;
}
