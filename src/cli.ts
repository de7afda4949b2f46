/**
 * OpenAPI Aggregator — CLI entry point
 *
 *   merge  fetch every configured source and write the merged document
 *   mcp    serve the merge tools over stdio
 */

import { Command } from 'commander';
import { writeFileSync } from 'fs';
import { stringify as stringifyYaml } from 'yaml';

import { aggregate } from './aggregator';
import { loadConfig, resolveConfigPath } from './config';
import { describeError, toStructuredError } from './errors';
import { createLogger, type Logger } from './logger';
import { startMcpServer } from './mcp-server';
import type { ProxyProbe } from './proxy';
import type { FetchFn } from './retrieval';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_EMPTY = 2;

export interface MergeCommandOptions {
  config?: string;
  out?: string;
  format: 'json' | 'yaml';
  grouping: boolean;
}

export interface MergeCommandDeps {
  logger: Logger;
  fetch?: FetchFn;
  probe?: ProxyProbe;
  /** Where the document goes when no `out` file is given. */
  write?: (text: string) => void;
}

export async function runMerge(options: MergeCommandOptions, deps: MergeCommandDeps): Promise<number> {
  const log = deps.logger;
  const configPath = resolveConfigPath(options.config);

  try {
    const config = loadConfig(configPath);
    log.info({ configPath, sources: config.sources.length }, 'Loaded configuration');

    const result = await aggregate(config, deps, { grouping: options.grouping });
    const text = options.format === 'yaml'
      ? stringifyYaml(result.document)
      : `${JSON.stringify(result.document, null, 2)}\n`;

    if (options.out) {
      writeFileSync(options.out, text, 'utf-8');
      log.info({ out: options.out }, 'Merged document written');
    } else {
      const write = deps.write ?? ((chunk: string) => {
        process.stdout.write(chunk);
      });
      write(text);
    }

    return Object.keys(result.document).length === 0 ? EXIT_EMPTY : EXIT_OK;
  } catch (err) {
    log.error({ err: toStructuredError(err) }, describeError(err));
    return EXIT_FAILURE;
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('openapi-aggregator')
    .description('Merge the OpenAPI documents of several services into one')
    .version('0.1.0');

  program
    .command('merge')
    .description('Fetch all enabled sources and print the merged document')
    .option('-c, --config <path>', 'Configuration file (default: $OPENAPI_MERGE_CONFIG or config.yml)')
    .option('-o, --out <path>', 'Write to a file instead of stdout')
    .option('-f, --format <format>', 'Output format (json, yaml)', 'json')
    .option('--no-grouping', 'Keep tag names as published by each service')
    .action(async (opts: { config?: string; out?: string; format: string; grouping: boolean }) => {
      // Logs go to stderr whenever stdout carries the document
      const logger = createLogger(opts.out ? undefined : { destination: process.stderr });
      const format = opts.format === 'yaml' ? 'yaml' : 'json';
      process.exitCode = await runMerge({ ...opts, format }, { logger });
    });

  program
    .command('mcp')
    .description('Start the MCP server on stdio')
    .option('-c, --config <path>', 'Configuration file; enables the aggregate_sources tool')
    .action(async (opts: { config?: string }) => {
      const config = opts.config || process.env.OPENAPI_MERGE_CONFIG
        ? loadConfig(resolveConfigPath(opts.config))
        : undefined;
      await startMcpServer(config);
    });

  return program;
}

async function main() {
  try {
    await createProgram().parseAsync(process.argv);
  } catch (err) {
    process.stderr.write(`${JSON.stringify(toStructuredError(err))}\n`);
    process.exit(EXIT_FAILURE);
  }
}

// Run if invoked directly
const isMainModule = import.meta.url === `file://${process.argv[1]}`;
if (isMainModule) {
  void main();
}
