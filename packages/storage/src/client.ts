/**
 * S3-compatible storage client bound to one verified bucket
 */

import {
  CopyObjectCommand,
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListBucketsCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  type S3Client,
} from '@aws-sdk/client-s3';
import { HttpResponse } from '@smithy/protocol-http';
import { createHash } from 'crypto';
import { readFile, writeFile } from 'fs/promises';
import { basename } from 'path';
import { pino, type Logger } from 'pino';
import { z } from 'zod';
import { terminalConfirm, type ConfirmFn } from './confirm.js';
import { CredentialProvider } from './credentials.js';
import { BucketNotFoundError, ProviderError, errorMessage, isNotFoundError } from './errors.js';
import type {
  DeleteOptions,
  ObjectHeaders,
  ObjectInspection,
  ResponseHeaders,
  StorageClientOptions,
  TransferOptions,
  UploadOptions,
} from './types.js';

const defaultLogger = pino({ level: process.env.LOG_LEVEL || 'info' });

// ListBuckets pages; anything else is a broken service contract
const ListBucketsPageSchema = z.object({
  Buckets: z.array(z.object({ Name: z.string() })),
  ContinuationToken: z.string().optional(),
});

export class StorageClient {
  readonly region: string;
  readonly bucket: string;
  private readonly s3: S3Client;
  private readonly confirm: ConfirmFn;
  private readonly logger: Logger;

  private constructor(s3: S3Client, bucket: string, region: string, confirm: ConfirmFn, logger: Logger) {
    this.s3 = s3;
    this.bucket = bucket;
    this.region = region;
    this.confirm = confirm;
    this.logger = logger;
  }

  /**
   * Build the client from credentials and verify the bucket is visible to them.
   * Throws BucketNotFoundError when it is not; the check is not repeated afterwards.
   */
  static async connect(options: StorageClientOptions): Promise<StorageClient> {
    const logger = (options.logger ?? defaultLogger).child({ bucket: options.bucket });
    const s3 = new CredentialProvider({ ...options, logger }).createClient();
    const client = new StorageClient(s3, options.bucket, options.region, options.confirm ?? terminalConfirm, logger);

    try {
      const buckets = await client.listBuckets();
      if (!buckets.includes(options.bucket)) {
        throw new BucketNotFoundError(options.bucket);
      }
    } catch (error) {
      s3.destroy();
      throw error;
    }

    logger.debug({ event: 'storage.client.connected', region: options.region }, 'Storage client connected');
    return client;
  }

  async listBuckets(): Promise<string[]> {
    const names: string[] = [];
    let continuationToken: string | undefined;

    do {
      const response = await this.s3.send(new ListBucketsCommand({ ContinuationToken: continuationToken }));
      const page = ListBucketsPageSchema.safeParse(response);
      if (!page.success) {
        throw new ProviderError(
          'ListBuckets',
          `Error while getting bucket list: unexpected response (${page.error.issues.map((i) => i.path.join('.') || i.message).join(', ')})`,
          { cause: page.error }
        );
      }
      names.push(...page.data.Buckets.map((b) => b.Name));
      continuationToken = page.data.ContinuationToken;
    } while (continuationToken);

    return names;
  }

  /**
   * All keys in the bucket, in listing order
   */
  async listObjects(): Promise<string[]> {
    const keys: string[] = [];
    let continuationToken: string | undefined;

    do {
      const response = await this.s3.send(new ListObjectsV2Command({
        Bucket: this.bucket,
        ContinuationToken: continuationToken,
      }));
      for (const item of response.Contents ?? []) {
        if (item.Key !== undefined) {
          keys.push(item.Key);
        }
      }
      continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
    } while (continuationToken);

    if (keys.length === 0) {
      this.logger.info({ event: 'storage.objects.empty' }, 'Bucket is empty');
    }
    return keys;
  }

  /**
   * Keys under `prefix` (when given), without directory markers
   */
  async listFiles(prefix?: string): Promise<string[]> {
    const keys = await this.listObjects();
    return keys.filter((key) => !key.endsWith('/') && (prefix === undefined || key.startsWith(prefix)));
  }

  async download(key: string, destination: string, options: TransferOptions = {}): Promise<boolean> {
    if (!options.quiet) {
      this.logger.info({ event: 'storage.download.start', key, destination }, `Downloading ${this.bucket}/${key} to ${destination}`);
    }

    let bytes: Uint8Array;
    try {
      bytes = await this.readObject(key);
    } catch (error) {
      if (isNotFoundError(error)) {
        this.logger.error({ event: 'storage.download.not_found', key }, `Object ${key} not found`);
        return false;
      }
      throw error;
    }

    await writeFile(destination, bytes);
    return true;
  }

  async upload(source: string, key: string, options: UploadOptions = {}): Promise<void> {
    if (!options.quiet) {
      this.logger.info({ event: 'storage.upload.start', key, source }, `Uploading ${basename(source)} to ${this.bucket}/${key}`);
    }

    const body = await readFile(source);
    const metadata = options.metadata && Object.keys(options.metadata).length > 0 ? options.metadata : undefined;

    await this.s3.send(new PutObjectCommand({
      Bucket: this.bucket,
      Key: key,
      Body: body,
      ...(metadata && { Metadata: metadata }),
    }));
  }

  /**
   * Head query that keeps not-found apart from other failures
   */
  async statObject(key: string): Promise<ObjectInspection> {
    return this.inspect(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
  }

  /**
   * Object headers, or false when the object is missing or the query failed
   */
  async headObject(key: string, options: TransferOptions = {}): Promise<ObjectHeaders | false> {
    return this.head(new HeadObjectCommand({ Bucket: this.bucket, Key: key }), key, options);
  }

  async getSize(key: string): Promise<number> {
    const headers = await this.headObject(key);
    return headers ? headers.ContentLength ?? 0 : 0;
  }

  async getMetadata(key: string): Promise<Record<string, string> | null> {
    const headers = await this.headObject(key);
    return headers ? headers.Metadata ?? {} : null;
  }

  async getLastModified(key: string): Promise<Date | null> {
    const headers = await this.headObject(key);
    return headers ? headers.LastModified ?? null : null;
  }

  /**
   * HTTP headers of the head response (etag, content-type, x-amz-meta-*, ...)
   */
  async getResponseHeaders(key: string): Promise<ResponseHeaders | null> {
    let responseHeaders: ResponseHeaders = {};
    const command = new HeadObjectCommand({ Bucket: this.bucket, Key: key });
    command.middlewareStack.add(
      (next) => async (args) => {
        const result = await next(args);
        if (HttpResponse.isInstance(result.response)) {
          responseHeaders = { ...result.response.headers };
        }
        return result;
      },
      { step: 'deserialize', name: 'captureResponseHeaders' }
    );

    const headers = await this.head(command, key, {});
    return headers ? responseHeaders : null;
  }

  /**
   * Replace (not merge) the object's user metadata by copying it onto itself
   */
  async updateMetadata(key: string, metadata: Record<string, string>, options: TransferOptions = { quiet: true }): Promise<boolean> {
    const inspection = await this.statObject(key);
    if (inspection.status !== 'found') {
      this.logger.error({ event: 'storage.metadata.not_found', key }, `Object ${key} not found`);
      return false;
    }

    if (!options.quiet) {
      this.logger.info({ event: 'storage.metadata.update', key }, `Updating metadata for ${this.bucket}/${key}`);
    }

    try {
      await this.s3.send(new CopyObjectCommand({
        Bucket: this.bucket,
        Key: key,
        CopySource: `${this.bucket}/${encodeURIComponent(key)}`,
        Metadata: metadata,
        MetadataDirective: 'REPLACE',
      }));
      return true;
    } catch (error) {
      this.logger.error({
        event: 'storage.metadata.failed',
        key,
        error: errorMessage(error),
      }, 'Failed to update metadata');
      return false;
    }
  }

  /**
   * Hex SHA-256 of the whole object. The body is buffered in memory.
   */
  async getSha256(key: string): Promise<string | null> {
    try {
      const bytes = await this.readObject(key);
      return createHash('sha256').update(bytes).digest('hex');
    } catch (error) {
      this.logger.error({
        event: 'storage.sha256.failed',
        key,
        error: errorMessage(error),
      }, 'Error while retrieving a file from storage');
      return null;
    }
  }

  async delete(key: string, options: DeleteOptions = {}): Promise<void> {
    const { confirm = true } = options;
    this.logger.info({ event: 'storage.delete.start', key }, `Deleting object ${key} from ${this.bucket}`);

    if (confirm && !(await this.confirm(`Are you sure you want to delete the object ${this.bucket}/${key}?`))) {
      this.logger.info({ event: 'storage.delete.cancelled', key }, 'Deletion cancelled');
      return;
    }

    const inspection = await this.statObject(key);
    if (inspection.status === 'error') {
      throw inspection.error;
    }
    if (inspection.status === 'not-found') {
      this.logger.error({ event: 'storage.delete.not_found', key }, `Can't delete object ${key}`);
      return;
    }

    await this.s3.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }));
  }

  /**
   * One confirmation for the whole batch, then delete each key without asking again
   */
  async deleteFromList(keys: readonly string[]): Promise<void> {
    this.logger.info(
      { event: 'storage.delete.batch', keys },
      `List of objects to be removed from the bucket ${this.bucket}: ${keys.join(', ')}`
    );

    if (!(await this.confirm('Continue?'))) {
      this.logger.info({ event: 'storage.delete.cancelled', count: keys.length }, 'Deletion cancelled');
      return;
    }

    for (const key of keys) {
      await this.delete(key, { confirm: false });
    }
  }

  /**
   * Release the underlying HTTP handler
   */
  destroy(): void {
    this.s3.destroy();
  }

  private async inspect(command: HeadObjectCommand): Promise<ObjectInspection> {
    try {
      const headers = await this.s3.send(command);
      return { status: 'found', headers };
    } catch (error) {
      if (isNotFoundError(error)) {
        return { status: 'not-found' };
      }
      return { status: 'error', error };
    }
  }

  private async head(command: HeadObjectCommand, key: string, options: TransferOptions): Promise<ObjectHeaders | false> {
    const inspection = await this.inspect(command);
    switch (inspection.status) {
      case 'found':
        return inspection.headers;
      case 'not-found':
        if (!options.quiet) {
          this.logger.error({ event: 'storage.head.not_found', key }, `Object ${key} not found`);
        }
        return false;
      case 'error':
        this.logger.error({
          event: 'storage.head.failed',
          key,
          error: errorMessage(inspection.error),
        }, 'An error occurred when receiving headers');
        return false;
    }
  }

  private async readObject(key: string): Promise<Uint8Array> {
    const response = await this.s3.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
    if (!response.Body) {
      throw new ProviderError('GetObject', `Missing response body for ${this.bucket}/${key}`);
    }
    return response.Body.transformToByteArray();
  }
}
