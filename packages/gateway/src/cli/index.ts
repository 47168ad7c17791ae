#!/usr/bin/env node

/**
 * @file packages/gateway/src/cli/index.ts
 * @description Command-line entrypoints: run the hub and maintain its memory store.
 */

import 'reflect-metadata';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { CHORUS_VERSION } from '@chorus/shared';
import { CONFIG_FILE_NAME, loadConfig } from '../config.js';
import { setupContainer } from '../container.js';
import { MemoryService } from '../application/services/memory-service.js';
import { errorMessage } from '../domain/errors/app-error.js';

const parsePort = (value: string): number => {
  const port = Number.parseInt(value, 10);
  if (!Number.isInteger(port) || port <= 0 || port > 65_535) {
    throw new InvalidArgumentError('Port must be between 1 and 65535.');
  }
  return port;
};

/** Runs a maintenance task against the memory store, then closes it. */
async function withMemory<T>(task: (memory: MemoryService) => Promise<T>): Promise<T> {
  const container = setupContainer(loadConfig(process.cwd()));
  const memory = container.resolve(MemoryService);
  try {
    return await task(memory);
  } finally {
    memory.close();
  }
}

const fail = (err: unknown): never => {
  console.error(chalk.red(`✗  ${errorMessage(err)}`));
  process.exit(1);
};

const program = new Command();

program
  .name('chorus')
  .description('Chorus: one utterance, several persona voices')
  .version(CHORUS_VERSION);

// ─── chorus start ─────────────────────────────────────────────
program
  .command('start')
  .description('Start the hub HTTP server')
  .option('-p, --port <port>', 'Port to listen on', parsePort)
  .action(async (options: { port?: number }) => {
    const projectRoot = process.cwd();
    if (!existsSync(resolve(projectRoot, CONFIG_FILE_NAME))) {
      console.log(chalk.dim(`   No ${CONFIG_FILE_NAME} found; using defaults and environment.`));
    }
    try {
      const { startHub } = await import('../index.js');
      await startHub(projectRoot, { port: options.port });
    } catch (err) {
      fail(err);
    }
  });

// ─── chorus sessions:expire ───────────────────────────────────
program
  .command('sessions:expire')
  .description('Expire idle sessions, then prune the retrieval corpus')
  .action(async () => {
    try {
      const result = await withMemory((memory) => memory.sweep());
      console.log(
        chalk.green('✓  ') +
          `Expired ${result.expiredSessions} session(s), pruned ${result.prunedDocs} doc(s).`,
      );
    } catch (err) {
      fail(err);
    }
  });

// ─── chorus notes:sync ────────────────────────────────────────
program
  .command('notes:sync <file>')
  .description('Replace the manual notes in the retrieval corpus with the sections of a markdown file')
  .action(async (file: string) => {
    try {
      const markdown = readFileSync(resolve(process.cwd(), file), 'utf-8');
      const count = await withMemory((memory) => memory.syncNotes(markdown));
      console.log(chalk.green('✓  ') + `Synced ${count} note section(s) from ${chalk.cyan(file)}.`);
    } catch (err) {
      fail(err);
    }
  });

// ─── chorus retrieval:prune ───────────────────────────────────
program
  .command('retrieval:prune')
  .description('Trim the retrieval corpus to its configured size')
  .action(async () => {
    try {
      const { prunedDocs, stats } = await withMemory(async (memory) => {
        const pruned = await memory.pruneCorpus();
        return { prunedDocs: pruned, stats: await memory.stats() };
      });
      console.log(
        chalk.green('✓  ') +
          `Pruned ${prunedDocs} doc(s); ${stats.docs} doc(s), ${stats.totalChars} chars remain.`,
      );
    } catch (err) {
      fail(err);
    }
  });

program.parseAsync(process.argv).catch(fail);
