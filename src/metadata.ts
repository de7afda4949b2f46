/**
 * Metadata Updater — final `info` block and format version of a merged document
 */

import { cloneDocument, isJsonObject } from './document';
import { invalidDocumentError } from './errors';
import type { JsonObject, JsonValue, MetadataSettings } from './types';

export const TARGET_OPENAPI_VERSION = '3.0.3';

/**
 * Returns a copy with `info.title`, `info.description` and `info.version`
 * overwritten and `openapi` set to the target version. Other `info` fields
 * are kept; a `swagger` marker is dropped.
 */
export function updateMetadata(document: JsonValue, settings: MetadataSettings): JsonObject {
  if (!isJsonObject(document)) {
    throw invalidDocumentError(`Cannot update metadata: expected an object, received ${kindOf(document)}`);
  }

  const { swagger: _swagger, openapi: _openapi, info, ...rest } = cloneDocument(document);

  return {
    openapi: TARGET_OPENAPI_VERSION,
    info: {
      ...(isJsonObject(info) ? info : {}),
      title: settings.title,
      description: settings.description,
      version: settings.version,
    },
    ...rest,
  };
}

function kindOf(value: JsonValue): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
