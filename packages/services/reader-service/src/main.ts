import './env';

/**
 * Reader Service - Entry Point
 */

import type { Server } from 'http';
import { resolve } from 'path';
import { createLogger, serializeError } from '@folio/platform-core';
import { createApp } from './app';
import {
  CliArgumentError,
  SERVICE_NAME,
  USAGE,
  loadServiceConfig,
  parseCliArgs,
  type CliOptions,
} from './config/service-config';

const logger = createLogger(SERVICE_NAME);

function closeServer(server: Server): Promise<void> {
  return new Promise((resolvePromise, reject) => {
    server.close(err => (err ? reject(err) : resolvePromise()));
  });
}

async function main(): Promise<void> {
  let cli: CliOptions;
  try {
    cli = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliArgumentError) {
      console.error(`${error.message}\n${USAGE}`);
      process.exit(2);
    }
    throw error;
  }

  if (cli.help) {
    console.log(USAGE);
    return;
  }

  const config = loadServiceConfig(process.env, cli);
  const { app } = createApp({ config });

  const server = await new Promise<Server>((resolvePromise, reject) => {
    const listening = app.listen(config.port, config.host, () => resolvePromise(listening));
    listening.once('error', reject);
  });

  logger.info('📚 Reader service listening', {
    service: SERVICE_NAME,
    host: config.host,
    port: config.port,
    booksDir: resolve(config.booksDir),
  });

  const shutdown = (signal: string): void => {
    logger.info('Shutting down', { signal });
    closeServer(server)
      .then(() => process.exit(0))
      .catch(error => {
        logger.error('Error during shutdown', { error: serializeError(error) });
        process.exit(1);
      });
  };

  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));
}

main().catch(error => {
  logger.error('Failed to start reader service', { error: serializeError(error) });
  process.exit(1);
});
