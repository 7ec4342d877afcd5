/**
 * In-memory stand-in for @aws-sdk/client-s3, installed with vi.mock
 */

interface FakeObject {
  body: Uint8Array;
  metadata: Record<string, string>;
  lastModified: Date;
}

export class FakeServiceError extends Error {
  readonly $metadata: { httpStatusCode: number };

  constructor(name: string, httpStatusCode: number) {
    super(name);
    this.name = name;
    this.$metadata = { httpStatusCode };
  }
}

interface FakeHandlerOutput {
  output: unknown;
  response: unknown;
}

type FakeHandler = (args: { input: Record<string, unknown> }) => Promise<FakeHandlerOutput>;
type FakeMiddleware = (next: FakeHandler, context: Record<string, unknown>) => FakeHandler;

/**
 * Only the deserialize step is modelled: middleware there sees the raw HTTP response
 */
export class FakeMiddlewareStack {
  readonly deserialize: FakeMiddleware[] = [];

  add(middleware: FakeMiddleware, options: { step?: string } = {}): void {
    if (options.step !== 'deserialize') {
      throw new Error(`Fake S3: unsupported middleware step ${String(options.step)}`);
    }
    this.deserialize.push(middleware);
  }
}

export class FakeCommand {
  readonly middlewareStack = new FakeMiddlewareStack();

  constructor(readonly commandName: string, readonly input: Record<string, unknown>) {}
}

export interface FakeHttpResponse {
  statusCode: number;
  headers: Record<string, string>;
}

function stringInput(input: Record<string, unknown>, field: string): string {
  const value = input[field];
  if (typeof value !== 'string') {
    throw new Error(`Fake S3: ${field} must be a string`);
  }
  return value;
}

function toBytes(body: unknown): Uint8Array {
  if (body instanceof Uint8Array) {
    return new Uint8Array(body);
  }
  if (typeof body === 'string') {
    return new TextEncoder().encode(body);
  }
  throw new Error('Fake S3: unsupported body type');
}

function toMetadata(value: unknown): Record<string, string> {
  if (typeof value !== 'object' || value === null) {
    return {};
  }
  return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, String(v)]));
}

export const FIXED_LAST_MODIFIED = new Date('2024-03-01T12:00:00.000Z');

export class FakeS3 {
  readonly buckets = new Map<string, Map<string, FakeObject>>();
  readonly commands: FakeCommand[] = [];
  readonly clientConfigs: unknown[] = [];
  destroyed = 0;
  pageSize = 1000;
  listBucketsResponse: unknown = undefined;
  headError: unknown = undefined;
  copyError: unknown = undefined;
  lastResponse: FakeHttpResponse = { statusCode: 200, headers: {} };

  reset(): void {
    this.buckets.clear();
    this.commands.length = 0;
    this.clientConfigs.length = 0;
    this.destroyed = 0;
    this.pageSize = 1000;
    this.listBucketsResponse = undefined;
    this.headError = undefined;
    this.copyError = undefined;
    this.lastResponse = { statusCode: 200, headers: {} };
  }

  addBucket(name: string, objects: Record<string, string> = {}): void {
    const store = new Map<string, FakeObject>();
    for (const [key, body] of Object.entries(objects)) {
      store.set(key, { body: toBytes(body), metadata: {}, lastModified: FIXED_LAST_MODIFIED });
    }
    this.buckets.set(name, store);
  }

  keys(bucket: string): string[] {
    return [...(this.buckets.get(bucket)?.keys() ?? [])].sort();
  }

  calls(commandName: string): FakeCommand[] {
    return this.commands.filter((c) => c.commandName === commandName);
  }

  async handle(command: FakeCommand): Promise<unknown> {
    this.commands.push(command);
    this.lastResponse = { statusCode: 200, headers: {} };
    const { input } = command;

    if (command.commandName === 'ListBuckets') {
      if (this.listBucketsResponse !== undefined) {
        return this.listBucketsResponse;
      }
      return {
        Buckets: [...this.buckets.keys()].map((Name) => ({ Name })),
        $metadata: { httpStatusCode: 200 },
      };
    }

    const bucketName = stringInput(input, 'Bucket');
    const bucket = this.buckets.get(bucketName);
    if (!bucket) {
      throw new FakeServiceError('NoSuchBucket', 404);
    }

    switch (command.commandName) {
      case 'ListObjectsV2': {
        const keys = this.keys(bucketName);
        const token = input.ContinuationToken;
        const start = typeof token === 'string' ? Number(token) : 0;
        const end = Math.min(start + this.pageSize, keys.length);
        const page = keys.slice(start, end);
        const truncated = end < keys.length;
        return {
          ...(page.length > 0 && { Contents: page.map((Key) => ({ Key })) }),
          IsTruncated: truncated,
          ...(truncated && { NextContinuationToken: String(end) }),
          KeyCount: page.length,
          $metadata: { httpStatusCode: 200 },
        };
      }

      case 'HeadObject': {
        if (this.headError !== undefined) {
          throw this.headError;
        }
        const object = bucket.get(stringInput(input, 'Key'));
        if (!object) {
          throw new FakeServiceError('NotFound', 404);
        }
        this.lastResponse = {
          statusCode: 200,
          headers: {
            'content-length': String(object.body.length),
            'content-type': 'application/octet-stream',
            etag: '"fake-etag"',
            'last-modified': object.lastModified.toUTCString(),
            'x-amz-request-id': 'fake-request-id',
            ...Object.fromEntries(Object.entries(object.metadata).map(([k, v]) => [`x-amz-meta-${k}`, v])),
          },
        };
        return {
          ContentLength: object.body.length,
          LastModified: object.lastModified,
          Metadata: { ...object.metadata },
          $metadata: { httpStatusCode: 200, requestId: 'fake-request-id' },
        };
      }

      case 'GetObject': {
        const object = bucket.get(stringInput(input, 'Key'));
        if (!object) {
          throw new FakeServiceError('NoSuchKey', 404);
        }
        const bytes = new Uint8Array(object.body);
        return {
          Body: { transformToByteArray: async () => bytes },
          ContentLength: bytes.length,
          $metadata: { httpStatusCode: 200 },
        };
      }

      case 'PutObject':
        bucket.set(stringInput(input, 'Key'), {
          body: toBytes(input.Body),
          metadata: toMetadata(input.Metadata),
          lastModified: FIXED_LAST_MODIFIED,
        });
        return { $metadata: { httpStatusCode: 200 } };

      case 'CopyObject': {
        if (this.copyError !== undefined) {
          throw this.copyError;
        }
        const copySource = stringInput(input, 'CopySource');
        const separator = copySource.indexOf('/');
        const source = this.buckets.get(copySource.substring(0, separator))
          ?.get(decodeURIComponent(copySource.substring(separator + 1)));
        if (!source) {
          throw new FakeServiceError('NoSuchKey', 404);
        }
        const metadata = input.MetadataDirective === 'REPLACE' ? toMetadata(input.Metadata) : { ...source.metadata };
        bucket.set(stringInput(input, 'Key'), { body: source.body, metadata, lastModified: FIXED_LAST_MODIFIED });
        return { $metadata: { httpStatusCode: 200 } };
      }

      case 'DeleteObject':
        bucket.delete(stringInput(input, 'Key'));
        return { $metadata: { httpStatusCode: 204 } };

      default:
        throw new Error(`Fake S3: unsupported command ${command.commandName}`);
    }
  }
}

export const fakeS3 = new FakeS3();

function commandClass(commandName: string) {
  return class extends FakeCommand {
    constructor(input: Record<string, unknown>) {
      super(commandName, input);
    }
  };
}

/**
 * Module shape that replaces @aws-sdk/client-s3
 */
export function createFakeS3Module() {
  class S3Client {
    constructor(config: unknown) {
      fakeS3.clientConfigs.push(config);
    }

    async send(command: FakeCommand): Promise<unknown> {
      let handler: FakeHandler = async () => {
        const output = await fakeS3.handle(command);
        return { output, response: fakeS3.lastResponse };
      };
      for (const middleware of command.middlewareStack.deserialize) {
        handler = middleware(handler, {});
      }
      const { output } = await handler({ input: command.input });
      return output;
    }

    destroy(): void {
      fakeS3.destroyed++;
    }
  }

  return {
    S3Client,
    ListBucketsCommand: commandClass('ListBuckets'),
    ListObjectsV2Command: commandClass('ListObjectsV2'),
    HeadObjectCommand: commandClass('HeadObject'),
    GetObjectCommand: commandClass('GetObject'),
    PutObjectCommand: commandClass('PutObject'),
    CopyObjectCommand: commandClass('CopyObject'),
    DeleteObjectCommand: commandClass('DeleteObject'),
  };
}
