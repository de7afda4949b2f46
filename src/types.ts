/**
 * OpenAPI Aggregator — Domain Types
 *
 * Canonical source of truth for documents, sources, and merge diagnostics.
 */

// ── Document value model ──

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

// ── Sources ──

export interface Source {
  /** Merge-conflict disambiguator and tag prefix. */
  readonly name: string;
  /** Origin base URL injected into operation `servers`. */
  readonly url: string;
  /** Where the document is fetched from. */
  readonly schema: string;
  readonly enabled: boolean;
}

export interface MergeEntry {
  name: string;
  url: string;
  /** Decoded document, a JSON string, or null when retrieval produced nothing. */
  document: unknown;
}

export interface MergeOptions {
  grouping: boolean;
  /** Rewrite injected servers to `/proxy/<name>`. Decided by the caller. */
  proxy?: boolean;
}

// ── Merged output ──

export interface DocumentInfo extends JsonObject {
  title: string;
  description: string;
  version: string;
}

export interface MergedDocument extends JsonObject {
  info: DocumentInfo;
  paths: JsonObject;
  components: JsonObject & { schemas: JsonObject };
}

/** Returned by a merge over no sources. Distinct from a merge that found no paths. */
export type EmptyDocument = Record<string, never>;

export interface MetadataSettings {
  title: string;
  description: string;
  version: string;
}

// ── Diagnostics ──

export type DiagnosticLevel = 'info' | 'warn' | 'error';

export type DiagnosticCode =
  | 'source_skipped'
  | 'source_excluded'
  | 'retrieval_failed'
  | 'key_renamed'
  | 'key_conflict';

export interface MergeDiagnostic {
  level: DiagnosticLevel;
  code: DiagnosticCode;
  source: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface MergeResult {
  document: MergedDocument | EmptyDocument;
  diagnostics: MergeDiagnostic[];
}

export type SourceStatus = 'merged' | 'excluded' | 'failed' | 'disabled' | 'skipped';

export interface SourceReport {
  name: string;
  schema: string;
  status: SourceStatus;
}
