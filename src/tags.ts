/**
 * Tag Namespacer — prefixes tags with the owning service for grouped merges
 */

import { asArray, cloneDocument, isJsonObject, operationsOf } from './document';
import type { JsonObject, JsonValue } from './types';

export function namespacedTag(service: string, tag: string): string {
  return `${service} | ${tag}`;
}

/**
 * Returns a copy of `document` where document-level tag names and
 * operation tags read `"<service> | <tag>"`. Entries that are not strings,
 * and tag objects without a string `name`, are kept as they are.
 */
export function namespaceTags(document: JsonObject, service: string): JsonObject {
  const result = cloneDocument(document);

  for (const tag of asArray(result.tags) ?? []) {
    if (isJsonObject(tag) && typeof tag.name === 'string') {
      tag.name = namespacedTag(service, tag.name);
    }
  }

  for (const operation of operationsOf(result)) {
    const tags = asArray(operation.tags);
    if (!tags) continue;
    operation.tags = tags.map((tag): JsonValue => (typeof tag === 'string' ? namespacedTag(service, tag) : tag));
  }

  return result;
}
