/**
 * Config Loader — aggregator settings and sources from YAML
 *
 * The only place environment switches are read; everything downstream
 * receives explicit values.
 */

import { readFileSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { configError, describeError } from './errors';
import { DEFAULT_CONCURRENCY, DEFAULT_FETCH_TIMEOUT_MS } from './retrieval';
import { generateSourceName } from './safe-name';
import type { ProxyConfig } from './proxy';
import type { Source } from './types';

export const DEFAULT_CONFIG_PATH = 'config.yml';

const SourceDefSchema = z.object({
  name: z.string().min(1).optional(),
  schema: z.string().min(1),
  url: z.string().default('http://localhost'),
  enabled: z.boolean().optional(),
});

const SettingsSchema = z.object({
  title: z.string().default('Merged API'),
  description: z.string().default(''),
  version: z.string().default('1.0.0'),
  grouping: z.boolean().default(true),
});

const ProxySchema = z.object({
  enabled: z.boolean().default(false),
  host: z.string().default('127.0.0.1'),
  port: z.number().int().min(1).max(65535).default(80),
  timeoutMs: z.number().int().positive().default(2000),
  assumeAvailable: z.boolean().default(false),
});

const RetrievalSchema = z.object({
  timeoutMs: z.number().int().positive().default(DEFAULT_FETCH_TIMEOUT_MS),
  concurrency: z.number().int().positive().default(DEFAULT_CONCURRENCY),
});

const AggregatorConfigSchema = z.object({
  settings: SettingsSchema.default({}),
  proxy: ProxySchema.default({}),
  retrieval: RetrievalSchema.default({}),
  /** Applies to sources without their own `enabled`. */
  enabled: z.boolean().default(true),
  // Entries are checked one by one so a broken entry only drops itself
  sources: z.array(z.unknown()).default([]),
});

export type RawSourceDef = z.input<typeof SourceDefSchema>;

export type RawAggregatorConfig = Omit<z.input<typeof AggregatorConfigSchema>, 'sources'> & {
  sources?: RawSourceDef[];
};

/** A `sources` entry that failed validation and was left out. */
export interface RejectedSource {
  /** Position in the configured `sources` list. */
  position: number;
  name?: string;
  issues: string[];
}

export interface AggregatorConfig {
  settings: z.infer<typeof SettingsSchema>;
  proxy: ProxyConfig;
  retrieval: z.infer<typeof RetrievalSchema>;
  sources: Source[];
  rejected: RejectedSource[];
}

export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): AggregatorConfig {
  const result = AggregatorConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw configError('Configuration failed validation.', result.error.issues);
  }
  const config = result.data;

  const sources: Source[] = [];
  const rejected: RejectedSource[] = [];
  config.sources.forEach((entry, position) => {
    const def = SourceDefSchema.safeParse(entry);
    if (!def.success) {
      rejected.push({ position, name: nameOf(entry), issues: def.error.issues.map(formatIssue) });
      return;
    }
    sources.push(Object.freeze({
      name: def.data.name ?? generateSourceName(),
      url: def.data.url,
      schema: def.data.schema,
      enabled: def.data.enabled ?? config.enabled,
    }));
  });

  return {
    settings: config.settings,
    proxy: {
      ...config.proxy,
      enabled: config.proxy.enabled || env.PROXY_ENABLED === 'true',
      assumeAvailable: config.proxy.assumeAvailable || env.PROXY_AVAILABLE === 'true',
    },
    retrieval: config.retrieval,
    sources,
    rejected,
  };
}

function nameOf(entry: unknown): string | undefined {
  if (typeof entry !== 'object' || entry === null || !('name' in entry)) return undefined;
  return typeof entry.name === 'string' && entry.name.length > 0 ? entry.name : undefined;
}

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

export function loadConfig(filePath: string, env: NodeJS.ProcessEnv = process.env): AggregatorConfig {
  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw configError(`Could not read configuration from ${filePath}: ${describeError(err)}`);
  }
  return parseConfig(raw, env);
}

export function resolveConfigPath(explicit?: string, env: NodeJS.ProcessEnv = process.env): string {
  return explicit || env.OPENAPI_MERGE_CONFIG || DEFAULT_CONFIG_PATH;
}
