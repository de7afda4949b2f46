/**
 * Name Sanitizer — service names as path-segment tokens
 */

import { randomUUID } from 'crypto';

const UNSAFE_CHARS = /[^a-zA-Z0-9_-]/g;
const UNDERSCORE_RUNS = /_+/g;
const EDGE_UNDERSCORES = /^_+|_+$/g;

/**
 * Lower-cased token made of `[a-z0-9_-]`. Returns '' when nothing usable
 * remains; callers fall back to a generated name.
 */
export function safeName(name: string): string {
  return name
    .replace(UNSAFE_CHARS, '_')
    .replace(UNDERSCORE_RUNS, '_')
    .replace(EDGE_UNDERSCORES, '')
    .toLowerCase();
}

/** Stand-in name for a source that declares none. */
export function generateSourceName(): string {
  return randomUUID().slice(0, 10);
}

export function proxyPathFor(name: string): string {
  const safe = safeName(name) || safeName(generateSourceName());
  return `/proxy/${safe}`;
}
