import 'reflect-metadata';
import chalk from 'chalk';
import cron from 'node-cron';
import { fileURLToPath } from 'node:url';
import { resolve } from 'node:path';
import { loadConfig } from './config.js';
import { setupContainer } from './container.js';
import { HubServer } from './server.js';
import { Logger } from './logger.js';
import { MemoryService } from './application/services/memory-service.js';
import { BroadcastBus } from './infrastructure/events/broadcast-bus.js';
import { AudioBlobCache } from './infrastructure/cache/audio-blob-cache.js';
import { errorMessage } from './domain/errors/app-error.js';

// ─── Direct Execution Detection ─────────────────────────────
// If this file is run directly (e.g. `node dist/index.js start`),
// delegate to the CLI entry point which uses Commander.
const __filename = fileURLToPath(import.meta.url);
const entryFile = process.argv[1] ? resolve(process.argv[1]) : '';

if (entryFile === __filename) {
  import('./cli/index.js').catch((err: unknown) => {
    console.error(chalk.red('\n  ❌ Fatal error:'), errorMessage(err));
    process.exit(1);
  });
}

export interface StartOptions {
  port?: number;
}

export interface RunningHub {
  server: HubServer;
  stop(): Promise<void>;
}

/** Start the hub: container, memory store, upkeep schedule and HTTP server. */
export async function startHub(projectRoot: string, options: StartOptions = {}): Promise<RunningHub> {
  const config = loadConfig(projectRoot);
  const container = setupContainer(config);
  const logger = container.resolve(Logger);
  const memory = container.resolve(MemoryService);

  console.log(chalk.dim(`\n  Starting Chorus hub (${config.personas.length} personas)...\n`));
  console.log(
    chalk.green('  ✓ ') +
      chalk.white(`Memory: retrieval ${memory.retrievalAvailable() ? 'enabled' : 'unavailable'}`),
  );

  // ── Scheduled upkeep ──────────────────────────────────────
  const sweepTask = cron.schedule(config.sessions.sweepCron, async () => {
    try {
      const result = await memory.sweep();
      if (result.expiredSessions > 0 || result.prunedDocs > 0) {
        logger.info(result, 'Memory sweep');
      }
    } catch (err) {
      logger.error({ err: errorMessage(err) }, 'Memory sweep failed');
    }
  });

  const server = new HubServer({
    port: options.port ?? config.port,
    host: config.host,
    corsOrigins: config.corsOrigins,
  });
  await server.start();
  console.log(
    chalk.green('  ✓ ') + chalk.white(`Listening on http://${config.host}:${options.port ?? config.port}`),
  );

  let stopping: Promise<void> | null = null;
  const stop = (): Promise<void> => {
    stopping ??= (async () => {
      sweepTask.stop();
      container.resolve(BroadcastBus).close();
      await server.stop();
      await container.resolve(AudioBlobCache).clear();
      memory.close();
      logger.info('Hub stopped');
    })();
    return stopping;
  };

  // Graceful shutdown on Ctrl+C
  const shutdown = () => {
    console.log(chalk.dim('\n  Shutting down...'));
    stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err: errorMessage(err) }, 'Shutdown failed');
        process.exit(1);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  return { server, stop };
}
