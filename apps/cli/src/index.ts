/**
 * bucketwrap CLI
 *
 * Usage: npm run cli -- ls reports/ --bucket my-bucket
 */

import { pino } from 'pino';
import { initEnv } from '@bucketwrap/config';
import { StorageClient, StorageError, alwaysConfirm, terminalConfirm } from '@bucketwrap/storage';
import { USAGE, UsageError, parseArgs, type CliArgs } from './args.js';
import { runCommand } from './commands.js';
import { connectionOptions, readStorageEnv, type ConnectionOptions } from './connection.js';

// Load .env before LOG_LEVEL and STORAGE_* are read
initEnv();

const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss Z',
      ignore: 'pid,hostname',
      destination: 2,
    },
  },
});

async function main(): Promise<number> {
  const argv = process.argv.slice(2);
  if (argv.length === 0 || argv.includes('--help') || argv.includes('-h')) {
    console.log(USAGE);
    return 0;
  }

  let args: CliArgs;
  let options: ConnectionOptions;
  try {
    args = parseArgs(argv);
    options = connectionOptions(args, readStorageEnv());
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`❌ ${error.message}`);
      console.error(USAGE);
      return 2;
    }
    throw error;
  }

  const client = await StorageClient.connect({
    ...options,
    confirm: args.yes ? alwaysConfirm : terminalConfirm,
    logger,
  });
  try {
    return await runCommand(client, args, (line) => console.log(line));
  } finally {
    client.destroy();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof StorageError) {
      logger.error({ event: 'cli.failed', error: error.message }, error.message);
    } else {
      logger.error({ event: 'cli.failed', err: error }, 'Command failed');
    }
    process.exitCode = 1;
  });
