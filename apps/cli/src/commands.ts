/**
 * Command dispatch for the bucketwrap CLI
 */

import type { StorageClient } from '@bucketwrap/storage';
import { parseMetadataPair, type CliArgs } from './args.js';

export type CommandClient = Pick<
  StorageClient,
  | 'listBuckets'
  | 'listObjects'
  | 'listFiles'
  | 'download'
  | 'upload'
  | 'headObject'
  | 'getSize'
  | 'getMetadata'
  | 'updateMetadata'
  | 'getLastModified'
  | 'getSha256'
  | 'delete'
  | 'deleteFromList'
>;

export type Print = (line: string) => void;

/**
 * Run one command; resolves to the process exit code
 */
export async function runCommand(client: CommandClient, args: CliArgs, print: Print): Promise<number> {
  const [first, second] = args.positionals;

  switch (args.command) {
    case 'buckets':
      (await client.listBuckets()).forEach((name) => print(name));
      return 0;

    case 'objects':
      (await client.listObjects()).forEach((key) => print(key));
      return 0;

    case 'ls':
      (await client.listFiles(first)).forEach((key) => print(key));
      return 0;

    case 'get':
      return (await client.download(first, second)) ? 0 : 1;

    case 'put':
      await client.upload(first, second, { metadata: args.metadata });
      return 0;

    case 'head': {
      const headers = await client.headObject(first);
      if (!headers) {
        return 1;
      }
      print(JSON.stringify({
        contentLength: headers.ContentLength,
        contentType: headers.ContentType,
        etag: headers.ETag,
        lastModified: headers.LastModified?.toISOString(),
        metadata: headers.Metadata ?? {},
      }, null, 2));
      return 0;
    }

    case 'size':
      print(String(await client.getSize(first)));
      return 0;

    case 'meta': {
      const metadata = await client.getMetadata(first);
      if (metadata === null) {
        return 1;
      }
      print(JSON.stringify(metadata, null, 2));
      return 0;
    }

    case 'set-meta': {
      const metadata = Object.fromEntries(args.positionals.slice(1).map(parseMetadataPair));
      return (await client.updateMetadata(first, metadata, { quiet: false })) ? 0 : 1;
    }

    case 'modified': {
      const lastModified = await client.getLastModified(first);
      if (!lastModified) {
        return 1;
      }
      print(lastModified.toISOString());
      return 0;
    }

    case 'sha256': {
      const digest = await client.getSha256(first);
      if (digest === null) {
        return 1;
      }
      print(digest);
      return 0;
    }

    case 'rm':
      if (args.positionals.length === 1) {
        await client.delete(first);
      } else {
        await client.deleteFromList(args.positionals);
      }
      return 0;
  }
}
