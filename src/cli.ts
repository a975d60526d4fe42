#!/usr/bin/env node
import { Server } from 'node:http';
import { Command } from 'commander';
import { createWikiCacheContext, WikiCacheContext } from './CacheContext';
import { errorMessage } from './errors';
import { startServer, stopServer } from './http/server';
import { optionsFromEnv } from './Options';
import { clearTargetOf } from './retrieval/RetrievalOrchestrator';
import { RefreshTask } from './types';
import { VERSION } from './version';
import LibLogger from './logger';

const logger = LibLogger.get('cli');

const withContext = async (work: (context: WikiCacheContext) => Promise<void>): Promise<void> => {
  const context = createWikiCacheContext(optionsFromEnv());
  try {
    await work(context);
  } finally {
    await context.close();
  }
};

const describeTask = (task: RefreshTask): string =>
  task.state === 'done'
    ? `${task.categoryKey}: ${task.itemCount ?? 0} items`
    : `${task.categoryKey}: ${task.state}${task.error ? ` (${task.error})` : ''}`;

async function serveAction(options: { host?: string; port?: string }): Promise<void> {
  const envOptions = optionsFromEnv();
  const context = createWikiCacheContext(envOptions);
  const host = options.host ?? envOptions.server.host;
  const port = options.port !== undefined ? Number.parseInt(options.port, 10) : envOptions.server.port;

  let server: Server;
  try {
    server = await startServer(context, host, port);
  } catch (error) {
    await context.close();
    throw error;
  }

  const shutdown = (signal: string): void => {
    logger.info('Shutting down', { signal });
    stopServer(server)
      .then(() => context.close())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

/**
 * Scrape one category, or every configured one, and wait for the result.
 */
async function scrapeAction(category: string): Promise<void> {
  await withContext(async context => {
    const tasks = category === 'all' ? context.scheduler.refreshAll() : [context.scheduler.refresh(category)];
    await context.scheduler.whenIdle();

    let failed = false;
    for (const task of tasks) {
      const result = context.scheduler.lastResult(task.categoryKey) ?? task;
      failed = failed || result.state !== 'done';
      console.log(describeTask(result));
    }
    if (failed) {
      process.exitCode = 1;
    }
  });
}

async function clearCacheAction(categories: string[]): Promise<void> {
  await withContext(async context => {
    const result = await context.orchestrator.clearCache(clearTargetOf(categories));
    if (result.scope === 'all') {
      console.log('Cache cleared');
      return;
    }
    for (const [key, evicted] of Object.entries(result.results)) {
      console.log(`${key}: ${evicted ? 'evicted' : 'nothing cached'}`);
    }
  });
}

export const createProgram = (): Command => {
  const program = new Command('wiki-cache')
    .description('Cache-backed API over wiki page metadata')
    .version(VERSION);

  program.command('serve')
    .description('Start the HTTP API')
    .option('-H, --host <host>', 'Interface to bind')
    .option('-p, --port <port>', 'Port to listen on')
    .action(serveAction);

  program.command('scrape')
    .description('Scrape a category (or "all") into the cache and the snapshot directory')
    .argument('<category>', 'Configured category key, or "all"')
    .action(scrapeAction);

  program.command('clear-cache')
    .description('Evict cached categories, or everything when none or "all" are named')
    .argument('[categories...]', 'Category keys to evict, or "all"')
    .action(clearCacheAction);

  return program;
};

if (require.main === module) {
  createProgram().parseAsync(process.argv).catch((error: unknown) => {
    logger.error('Command failed', { error: errorMessage(error) });
    console.error(errorMessage(error));
    process.exit(1);
  });
}
