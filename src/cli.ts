#!/usr/bin/env node

import { pathToFileURL } from 'node:url';
import { resolve } from 'node:path';
import chalk from 'chalk';
import pino from 'pino';
import { ConfigResolver } from './config/ConfigResolver.js';
import { createSearchService, type SemanticSearchService } from './SemanticSearchService.js';
import { HttpApiServer } from './server/HttpApiServer.js';
import { loadDocuments } from './corpus/DirectoryLoader.js';
import { PinoLogger } from './utils/PinoLogger.js';
import type { AppConfig, Logger } from './types/index.js';

export type CliCommand =
  | { kind: 'serve' }
  | { kind: 'ingest'; dir: string }
  | { kind: 'query'; text: string; topK?: number }
  | { kind: 'health' }
  | { kind: 'help' };

export interface CliArgs {
  command: CliCommand;
  configPath?: string;
}

const USAGE = `Usage: semantic-search <command> [--config <path>]

Commands:
  serve                       Start the HTTP API
  ingest <dir>                Ingest .md, .txt and .rst files from a directory
  query <text> [--top-k N]    Search the index
  health                      Report index reachability and record count
`;

// Each CLI run is its own process, so a memory index would not outlive it.
const memoryBackendRefusal = (command: string) =>
  `'${command}' needs a persistent index; the memory backend only lives inside 'serve'. ` +
  'Set INDEX_BACKEND=http (or backend.provider in the config file).';

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const positional: string[] = [];
  let configPath: string | undefined;
  let topK: number | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--config' || arg === '-c') {
      configPath = argv[++i];
      if (!configPath) throw new CliUsageError(`${arg} needs a path`);
    } else if (arg === '--top-k' || arg === '-k') {
      const raw = argv[++i];
      const n = Number(raw);
      if (!raw || !Number.isInteger(n) || n < 1) throw new CliUsageError(`${arg} needs a positive integer`);
      topK = n;
    } else if (arg === '--help' || arg === '-h') {
      return { command: { kind: 'help' }, configPath };
    } else if (arg.startsWith('-')) {
      throw new CliUsageError(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  const [name, ...rest] = positional;
  switch (name) {
    case 'serve':
    case 'health':
      return { command: { kind: name }, configPath };
    case 'ingest':
      if (!rest[0]) throw new CliUsageError('ingest needs a directory');
      return { command: { kind: 'ingest', dir: rest[0] }, configPath };
    case 'query': {
      const text = rest.join(' ').trim();
      if (!text) throw new CliUsageError('query needs some text');
      return { command: { kind: 'query', text, topK }, configPath };
    }
    case undefined:
    case 'help':
      return { command: { kind: 'help' }, configPath };
    default:
      throw new CliUsageError(`Unknown command: ${name}`);
  }
}

async function serve(service: SemanticSearchService, config: AppConfig, logger: Logger): Promise<void> {
  const server = new HttpApiServer(config, service, logger);
  await server.start();

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Error during shutdown', error);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

async function ingest(service: SemanticSearchService, dir: string): Promise<void> {
  const documents = await loadDocuments(resolve(dir));
  if (documents.length === 0) {
    console.log(chalk.yellow(`No .md, .txt or .rst files found in ${dir}`));
    return;
  }

  const result = await service.ingest(documents);
  console.log(chalk.green(`Ingested ${result.accepted} of ${documents.length} document(s)`));
  for (const rejected of result.rejected) {
    console.log(chalk.red(`  ✗ ${rejected.id || `#${rejected.index}`}: ${rejected.message}`));
  }
}

async function query(service: SemanticSearchService, text: string, topK?: number): Promise<void> {
  const hits = await service.search(text, topK);
  if (hits.length === 0) {
    console.log(chalk.yellow('No results.'));
    return;
  }
  hits.forEach((hit, i) => {
    const title = typeof hit.meta.title === 'string' ? hit.meta.title : hit.id;
    console.log(`${chalk.bold(`${i + 1}. ${title}`)} ${chalk.gray(`(${hit.id}, ${hit.similarity.toFixed(4)})`)}`);
    if (typeof hit.meta.snippet === 'string') {
      console.log(`   ${hit.meta.snippet}`);
    }
  });
}

async function health(service: SemanticSearchService): Promise<boolean> {
  const report = await service.health();
  const status = report.indexReachable ? chalk.green('ok') : chalk.red('degraded');
  console.log(`status:     ${status}`);
  console.log(`index:      ${report.index} (${report.metric}, dim ${report.dimension})`);
  console.log(`records:    ${report.recordCount}`);
  console.log(`embedding:  ${report.embeddingModel}`);
  if (report.error) console.log(chalk.red(`error:      ${report.error}`));
  return report.indexReachable;
}

export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(chalk.red(error.message));
      console.error(USAGE);
      return 2;
    }
    throw error;
  }

  const { command } = args;
  if (command.kind === 'help') {
    console.log(USAGE);
    return 0;
  }

  const config = await ConfigResolver.load({ configPath: args.configPath });
  if (config.backend.provider === 'memory' && command.kind !== 'serve') {
    console.error(chalk.red(memoryBackendRefusal(command.kind)));
    return 2;
  }

  // Keep stdout for command output; logs go to stderr unless the server is running.
  const logger = new PinoLogger({
    level: config.logLevel,
    pretty: config.logPretty,
    destination: command.kind === 'serve' ? undefined : pino.destination(2)
  });
  const service = createSearchService(config, { logger });

  try {
    if (command.kind === 'health') {
      return (await health(service)) ? 0 : 1;
    }

    await service.start();
    switch (command.kind) {
      case 'serve':
        await serve(service, config, logger);
        break;
      case 'ingest':
        await ingest(service, command.dir);
        break;
      case 'query':
        await query(service, command.text, command.topK);
        break;
    }
    return 0;
  } catch (error) {
    console.error(chalk.red(`❌ ${error instanceof Error ? error.message : String(error)}`));
    return 1;
  }
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  main().then(
    (code) => {
      // serve keeps the process alive through the open listener
      if (code !== 0) process.exit(code);
    },
    (error: unknown) => {
      console.error(error);
      process.exit(1);
    }
  );
}
