/**
 * Resolve the connection settings from flags and STORAGE_* variables
 */

import { loadStorageEnv, type StorageEnv } from '@bucketwrap/config';
import { ConfigurationError, errorMessage, type StorageClientOptions } from '@bucketwrap/storage';
import { UsageError, type CliArgs } from './args.js';

export type ConnectionOptions = Omit<StorageClientOptions, 'confirm' | 'logger'>;

export function readStorageEnv(env: NodeJS.ProcessEnv = process.env): StorageEnv {
  try {
    return loadStorageEnv(env);
  } catch (error) {
    throw new ConfigurationError('invalid-env', errorMessage(error), { cause: error });
  }
}

/**
 * Flags win over the environment
 *
 * @throws UsageError when neither --bucket nor STORAGE_BUCKET names a bucket
 */
export function connectionOptions(args: CliArgs, env: StorageEnv): ConnectionOptions {
  const bucket = args.bucket ?? env.bucket;
  if (!bucket) {
    throw new UsageError('No bucket given: pass --bucket or set STORAGE_BUCKET');
  }

  return {
    bucket,
    region: args.region ?? env.region,
    accessKeyId: env.accessKeyId,
    secretAccessKey: env.secretAccessKey,
    keyLocation: args.keyLocation ?? env.keyLocation,
    endpoint: args.endpoint ?? env.endpoint,
    forcePathStyle: env.forcePathStyle,
  };
}
