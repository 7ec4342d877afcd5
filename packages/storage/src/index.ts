/**
 * Storage client for S3-compatible object storage
 * Credential loading, bucket validation and object operations
 */

export * from './client.js';
export * from './confirm.js';
export * from './credentials.js';
export * from './errors.js';
export * from './types.js';
