/**
 * Reader Service Configuration
 * Environment first, command-line flags on top
 */

import { createConfig, getFirstDefined } from '@folio/platform-core';

export const SERVICE_NAME = 'reader-service';

export type ReaderServiceConfig = {
  port: number;
  host: string;
  booksDir: string;
  bookCacheSize: number;
  sectionMaxNodes: number;
  sectionMaxDepth: number;
  rateLimitWindowMs: number;
  rateLimitMax: number;
  allowedOrigins: string;
};

export interface CliOptions {
  booksDir?: string;
  host?: string;
  port?: number;
  help: boolean;
}

export const USAGE = `
Usage: reader-service [options]

Options:
  --books-dir <dir>   Directory containing *_data book folders
  --host <host>       Interface to bind
  --port <port>       Port to listen on
  --help              Show this help message
`;

export class CliArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliArgumentError';
  }
}

export function parseCliArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = { help: false };

  const valueOf = (flag: string, value: string | undefined): string => {
    if (value === undefined || value.startsWith('--')) {
      throw new CliArgumentError(`${flag} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--books-dir') {
      options.booksDir = valueOf(arg, args[++i]);
    } else if (arg === '--host') {
      options.host = valueOf(arg, args[++i]);
    } else if (arg === '--port') {
      const raw = valueOf(arg, args[++i]);
      const port = Number(raw);
      if (!Number.isInteger(port) || port < 0 || port > 65535) {
        throw new CliArgumentError(`--port must be an integer between 0 and 65535, got ${raw}`);
      }
      options.port = port;
    } else if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else {
      throw new CliArgumentError(`Unknown option: ${arg}`);
    }
  }

  return options;
}

export function loadServiceConfig(
  env: NodeJS.ProcessEnv = process.env,
  cli: Partial<CliOptions> = {}
): Readonly<ReaderServiceConfig> {
  // PORT takes precedence over READER_SERVICE_PORT
  const portKey = getFirstDefined(['PORT'], env) === undefined ? 'READER_SERVICE_PORT' : 'PORT';
  const builder = createConfig<ReaderServiceConfig>(env)
    .add('port', 8123, portKey)
    .add('host', '127.0.0.1', 'HOST')
    .add('booksDir', '.', 'BOOKS_DIR')
    .add('bookCacheSize', 10, 'BOOK_CACHE_SIZE')
    .add('sectionMaxNodes', 200_000, 'SECTION_MAX_NODES')
    .add('sectionMaxDepth', 512, 'SECTION_MAX_DEPTH')
    .add('rateLimitWindowMs', 900_000, 'READER_RATE_LIMIT_WINDOW')
    .add('rateLimitMax', 1000, 'READER_RATE_LIMIT_MAX')
    .add('allowedOrigins', '*', 'ALLOWED_ORIGINS');

  if (cli.booksDir !== undefined) builder.set('booksDir', cli.booksDir);
  if (cli.host !== undefined) builder.set('host', cli.host);
  if (cli.port !== undefined) builder.set('port', cli.port);

  return builder.build();
}
