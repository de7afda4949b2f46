/**
 * Merge Engine — folds per-service documents into one
 *
 * Sources are processed in the order given. The first source to claim a
 * path, schema, or component name keeps the bare key; later ones are
 * renamed to `<key>_<source>`. If that renamed key is also taken the later
 * write replaces it and a warning diagnostic is emitted.
 */

import { asArray, asObject, isJsonObject, objectEntries, toDocumentValue } from './document';
import { decodeError } from './errors';
import { injectServers } from './servers';
import { namespaceTags } from './tags';
import type {
  DocumentInfo,
  EmptyDocument,
  JsonObject,
  JsonValue,
  MergeDiagnostic,
  MergedDocument,
  MergeEntry,
  MergeOptions,
  MergeResult,
} from './types';

export const DEFAULT_INFO: Readonly<DocumentInfo> = Object.freeze({
  title: 'Merged API',
  description: '',
  version: '1.0.0',
});

type KeyKind = 'path' | 'schema' | `component:${string}`;

/**
 * Name map with two-level disambiguation. Keeps insertion order so the
 * merged document lists keys in the order sources contributed them.
 */
class KeyedAccumulator {
  private entries = new Map<string, JsonValue>();

  constructor(
    private kind: KeyKind,
    private diagnostics: MergeDiagnostic[],
  ) {}

  add(key: string, value: JsonValue, source: string): string {
    let target = key;
    if (this.entries.has(key)) {
      target = `${key}_${source}`;
      if (this.entries.has(target)) {
        this.diagnostics.push({
          level: 'warn',
          code: 'key_conflict',
          source,
          message: `${describeKind(this.kind)} '${key}' conflicts with existing '${target}'; the earlier definition is replaced`,
          details: { kind: this.kind, key, target },
        });
      } else {
        this.diagnostics.push({
          level: 'info',
          code: 'key_renamed',
          source,
          message: `${describeKind(this.kind)} '${key}' conflicts, renamed to '${target}'`,
          details: { kind: this.kind, key, target },
        });
      }
    }
    this.entries.set(target, value);
    return target;
  }

  toObject(): JsonObject {
    return Object.fromEntries(this.entries);
  }
}

function describeKind(kind: KeyKind): string {
  if (kind === 'path') return 'Path';
  if (kind === 'schema') return 'Schema';
  return `Component ${kind.slice('component:'.length)}`;
}

export function isEmptyDocument(document: MergedDocument | EmptyDocument): document is EmptyDocument {
  return Object.keys(document).length === 0;
}

export function mergeDocuments(entries: readonly MergeEntry[], options: MergeOptions): MergeResult {
  const diagnostics: MergeDiagnostic[] = [];

  if (entries.length === 0) {
    const empty: EmptyDocument = {};
    return { document: empty, diagnostics };
  }

  const paths = new KeyedAccumulator('path', diagnostics);
  const schemas = new KeyedAccumulator('schema', diagnostics);
  const components = new Map<string, KeyedAccumulator>();
  const tags: JsonValue[] = [];

  for (const [index, entry] of entries.entries()) {
    const decoded = decodeEntry(entry);

    if (decoded === null) {
      diagnostics.push({
        level: 'warn',
        code: 'source_skipped',
        source: entry.name,
        message: `Skipping ${entry.name}: document is null`,
        details: { index },
      });
      continue;
    }

    if (!isJsonObject(decoded)) {
      diagnostics.push({
        level: 'warn',
        code: 'source_skipped',
        source: entry.name,
        message: `Skipping ${entry.name}: document is not an object`,
        details: { index },
      });
      continue;
    }

    let document = injectServers(decoded, {
      url: entry.url,
      name: entry.name,
      proxy: options.proxy ?? false,
    });

    if (options.grouping) {
      document = namespaceTags(document, entry.name);
      for (const tag of asArray(document.tags) ?? []) {
        tags.push(tag);
      }
    }

    for (const [path, item] of Object.entries(asObject(document.paths) ?? {})) {
      paths.add(path, item, entry.name);
    }

    const sourceComponents = asObject(document.components) ?? {};
    for (const [name, definition] of Object.entries(asObject(sourceComponents.schemas) ?? {})) {
      schemas.add(name, definition, entry.name);
    }

    for (const [kind, group] of objectEntries(sourceComponents)) {
      if (kind === 'schemas') continue;
      let accumulator = components.get(kind);
      if (!accumulator) {
        accumulator = new KeyedAccumulator(`component:${kind}`, diagnostics);
        components.set(kind, accumulator);
      }
      for (const [name, definition] of Object.entries(group)) {
        accumulator.add(name, definition, entry.name);
      }
    }
  }

  // Kinds come from source documents, so a kind such as `__proto__` must land as an own key
  const mergedComponents: MergedDocument['components'] = {
    schemas: schemas.toObject(),
    ...Object.fromEntries([...components].map(([kind, accumulator]): [string, JsonObject] => [kind, accumulator.toObject()])),
  };

  const merged: MergedDocument = {
    info: { ...DEFAULT_INFO },
    paths: paths.toObject(),
    components: mergedComponents,
  };
  if (options.grouping) {
    merged.tags = tags;
  }

  return { document: merged, diagnostics };
}

function decodeEntry(entry: MergeEntry): JsonValue {
  if (entry.document === null || entry.document === undefined) return null;
  try {
    // Builds a fresh tree, so the caller's document is never touched.
    return toDocumentValue(entry.document);
  } catch (err) {
    throw decodeError(entry.name, err);
  }
}
