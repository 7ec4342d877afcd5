/**
 * Types for storage operations
 */

import type { HeadObjectCommandOutput } from '@aws-sdk/client-s3';
import type { Logger } from 'pino';
import type { ConfirmFn } from './confirm.js';

export interface StorageCredentials {
  accessKeyId: string;
  secretAccessKey: string;
}

export type CredentialSource = 'explicit' | 'files';

export interface CredentialProviderOptions {
  region: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  keyLocation?: string; // Directory holding `key` and `private_key`; defaults to ~/.s3
  endpoint?: string; // S3-compatible services (minio, R2); empty for AWS S3
  forcePathStyle?: boolean;
  logger?: Logger;
}

export interface StorageClientOptions extends CredentialProviderOptions {
  bucket: string;
  confirm?: ConfirmFn; // Default: interactive terminal prompt
}

/**
 * Response of a head query: ContentLength, LastModified, Metadata, $metadata, ...
 */
export type ObjectHeaders = HeadObjectCommandOutput;

/**
 * Raw HTTP response headers, lowercase names
 */
export type ResponseHeaders = Record<string, string>;

export type ObjectInspection =
  | { status: 'found'; headers: ObjectHeaders }
  | { status: 'not-found' }
  | { status: 'error'; error: unknown };

export interface TransferOptions {
  quiet?: boolean; // Suppress the info notice
}

export interface UploadOptions extends TransferOptions {
  metadata?: Record<string, string>;
}

export interface DeleteOptions {
  confirm?: boolean; // Default: true
}
