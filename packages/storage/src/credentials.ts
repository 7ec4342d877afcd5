/**
 * Credential resolution and S3 client construction
 */

import { S3Client, type S3ClientConfig } from '@aws-sdk/client-s3';
import { readFileSync, statSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { pino, type Logger } from 'pino';
import { ConfigurationError, errorMessage } from './errors.js';
import type { CredentialProviderOptions, CredentialSource, StorageCredentials } from './types.js';

const defaultLogger = pino({ level: process.env.LOG_LEVEL || 'info' });

export const ACCESS_KEY_FILE = 'key';
export const SECRET_KEY_FILE = 'private_key';

/**
 * Directory holding the credential files.
 * Resolved on every call so HOME / STORAGE_KEY_LOCATION changes are picked up.
 */
export function resolveKeyLocation(override?: string): string {
  if (override && override.trim().length > 0) {
    return override;
  }
  const fromEnv = process.env.STORAGE_KEY_LOCATION?.trim();
  if (fromEnv) {
    return fromEnv;
  }
  return join(homedir(), '.s3');
}

function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

/**
 * Read `<dir>/key` and `<dir>/private_key`, trimming surrounding whitespace
 */
export function readCredentialFiles(keyLocation?: string): StorageCredentials {
  const dir = resolveKeyLocation(keyLocation);
  const accessKeyPath = join(dir, ACCESS_KEY_FILE);
  const secretKeyPath = join(dir, SECRET_KEY_FILE);

  if (!isFile(accessKeyPath) || !isFile(secretKeyPath)) {
    throw new ConfigurationError(
      'file-not-found',
      `No key or private key found in ${dir}. Please create files ${accessKeyPath} and ${secretKeyPath}.`
    );
  }

  try {
    return {
      accessKeyId: readFileSync(accessKeyPath, 'utf-8').trim(),
      secretAccessKey: readFileSync(secretKeyPath, 'utf-8').trim(),
    };
  } catch (error) {
    throw new ConfigurationError(
      'unreadable',
      `Cannot read credential files ${accessKeyPath} and ${secretKeyPath}: ${errorMessage(error)}`,
      { cause: error }
    );
  }
}

/**
 * Validate endpoint URL format
 */
export function validateEndpoint(endpoint: string): void {
  if (!endpoint.startsWith('http://') && !endpoint.startsWith('https://')) {
    throw new ConfigurationError(
      'invalid-endpoint',
      `Storage endpoint must start with http:// or https://. Got: ${endpoint.substring(0, 50)}${endpoint.length > 50 ? '...' : ''}`
    );
  }

  let hostname: string;
  try {
    hostname = new URL(endpoint).hostname;
  } catch (error) {
    throw new ConfigurationError(
      'invalid-endpoint',
      `Storage endpoint is not a valid URL: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
  if (!hostname) {
    throw new ConfigurationError('invalid-endpoint', `Storage endpoint has no hostname: ${endpoint}`);
  }
}

/**
 * Supplies the credentials for one client and builds it
 */
export class CredentialProvider {
  readonly region: string;
  private readonly options: CredentialProviderOptions;
  private readonly logger: Logger;

  constructor(options: CredentialProviderOptions) {
    this.region = options.region;
    this.options = options;
    this.logger = options.logger ?? defaultLogger;
  }

  resolveCredentials(): { credentials: StorageCredentials; source: CredentialSource } {
    const { accessKeyId, secretAccessKey } = this.options;
    if (accessKeyId && secretAccessKey) {
      return { credentials: { accessKeyId, secretAccessKey }, source: 'explicit' };
    }
    return { credentials: readCredentialFiles(this.options.keyLocation), source: 'files' };
  }

  createClient(): S3Client {
    const { credentials, source } = this.resolveCredentials();

    const clientConfig: S3ClientConfig = {
      region: this.region,
      credentials,
    };

    const endpoint = this.options.endpoint?.trim();
    if (endpoint) {
      validateEndpoint(endpoint);
      clientConfig.endpoint = endpoint;
      // minio and R2 expect path-style addressing unless told otherwise
      clientConfig.forcePathStyle = this.options.forcePathStyle ?? true;
    } else if (this.options.forcePathStyle !== undefined) {
      clientConfig.forcePathStyle = this.options.forcePathStyle;
    }

    // Never log the key values
    this.logger.debug({
      event: 'storage.credentials.resolved',
      source,
      region: this.region,
      endpointHost: endpoint ? new URL(endpoint).hostname : 'aws-s3',
    }, 'Storage credentials resolved');

    return new S3Client(clientConfig);
  }
}
