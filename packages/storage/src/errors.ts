/**
 * Error types for the storage client
 */

export type StorageErrorCode = 'CONFIGURATION' | 'BUCKET_NOT_FOUND' | 'PROVIDER';

export class StorageError extends Error {
  readonly code: StorageErrorCode;

  constructor(code: StorageErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
    this.code = code;
  }
}

export type ConfigurationErrorKind = 'file-not-found' | 'unreadable' | 'invalid-endpoint' | 'invalid-env';

/**
 * Credentials or client settings could not be resolved
 */
export class ConfigurationError extends StorageError {
  readonly kind: ConfigurationErrorKind;

  constructor(kind: ConfigurationErrorKind, message: string, options?: { cause?: unknown }) {
    super('CONFIGURATION', message, options);
    this.name = 'ConfigurationError';
    this.kind = kind;
  }
}

export class BucketNotFoundError extends StorageError {
  readonly bucket: string;

  constructor(bucket: string) {
    super('BUCKET_NOT_FOUND', `Bucket ${bucket} not found`);
    this.name = 'BucketNotFoundError';
    this.bucket = bucket;
  }
}

/**
 * The remote service answered with a shape we cannot use
 */
export class ProviderError extends StorageError {
  readonly operation: string;

  constructor(operation: string, message: string, options?: { cause?: unknown }) {
    super('PROVIDER', message, options);
    this.name = 'ProviderError';
    this.operation = operation;
  }
}

interface SdkErrorShape {
  name?: unknown;
  Code?: unknown;
  code?: unknown;
  $metadata?: { httpStatusCode?: unknown };
}

function isErrorShape(err: unknown): err is SdkErrorShape {
  return typeof err === 'object' && err !== null;
}

/**
 * Detect the SDK's "object does not exist" errors (HeadObject reports NotFound, GetObject NoSuchKey)
 */
export function isNotFoundError(err: unknown): boolean {
  if (!isErrorShape(err)) {
    return false;
  }
  const rawName = err.name ?? err.Code ?? err.code;
  const name = typeof rawName === 'string' ? rawName.toLowerCase() : '';
  // NoSuchBucket is also a 404 but means the bound bucket is gone
  if (name === 'nosuchbucket') {
    return false;
  }
  const status = err.$metadata?.httpStatusCode;
  return name === 'nosuchkey' || name === 'notfound' || status === 404;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
