/**
 * Server Injector — per-operation server entries for a source's origin
 *
 * Every operation under `paths.*.*` gets a `servers` entry pointing at the
 * owning service, either directly or through the reverse-proxy path.
 */

import { asArray, asString, cloneDocument, isJsonObject, operationsOf } from './document';
import { proxyPathFor } from './safe-name';
import type { JsonObject } from './types';

export interface ServerTarget {
  /** Raw service origin. */
  url: string;
  name: string;
  /** Proxying enabled and the proxy frontend reachable. */
  proxy: boolean;
}

export function buildServerEntry(target: ServerTarget): JsonObject {
  if (!target.proxy) return { url: target.url };
  return {
    url: proxyPathFor(target.name),
    description: `Proxied to ${target.url}`,
  };
}

/**
 * Returns a copy of `document` with the service's server entry appended to
 * every operation. An operation already listing the raw `url` is left alone,
 * even in proxy mode, so a proxy entry can still follow an earlier direct one.
 */
export function injectServers(document: JsonObject, target: ServerTarget): JsonObject {
  const result = cloneDocument(document);
  const entry = buildServerEntry(target);

  for (const operation of operationsOf(result)) {
    if (operation.servers === undefined) {
      operation.servers = [];
    }
    const servers = asArray(operation.servers);
    if (!servers) continue;

    const exists = servers.some(server => isJsonObject(server) && asString(server.url) === target.url);
    if (!exists) {
      servers.push(cloneDocument(entry));
    }
  }

  return result;
}
