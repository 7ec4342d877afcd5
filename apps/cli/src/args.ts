/**
 * Argument parsing for the bucketwrap CLI
 */

export const COMMANDS = [
  'buckets',
  'objects',
  'ls',
  'get',
  'put',
  'head',
  'size',
  'meta',
  'set-meta',
  'modified',
  'sha256',
  'rm',
] as const;

export type CommandName = typeof COMMANDS[number];

export interface CliArgs {
  command: CommandName;
  positionals: string[];
  bucket?: string;
  region?: string;
  keyLocation?: string;
  endpoint?: string;
  metadata: Record<string, string>;
  yes: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = `
bucketwrap - object operations on one bucket

Usage:
  bucketwrap <command> [args] [options]

Commands:
  buckets                      List buckets visible to the credentials
  objects                      List every key in the bucket
  ls [prefix]                  List files (no directory markers), optionally under a prefix
  get <key> <destination>      Download an object
  put <source> <key>           Upload a file (add --meta k=v to attach metadata)
  head <key>                   Print the object's headers
  size <key>                   Print the content length
  meta <key>                   Print the user metadata
  set-meta <key> k=v [k=v...]  Replace the user metadata
  modified <key>               Print the last-modified timestamp
  sha256 <key>                 Print the SHA-256 of the object
  rm <key> [key...]            Delete objects (asks first)

Options:
  --bucket <name>        Bucket (default: STORAGE_BUCKET)
  --region <region>      Region (default: STORAGE_REGION or us-east-1)
  --key-location <dir>   Directory with key and private_key (default: ~/.s3)
  --endpoint <url>       S3-compatible endpoint (default: STORAGE_ENDPOINT)
  --meta <k=v>           Metadata entry for put (repeatable)
  --yes                  Do not ask before deleting
`;

function isCommand(value: string): value is CommandName {
  return (COMMANDS as readonly string[]).includes(value);
}

export function parseMetadataPair(pair: string): [string, string] {
  const index = pair.indexOf('=');
  if (index <= 0) {
    throw new UsageError(`Metadata must look like key=value, got: ${pair}`);
  }
  return [pair.substring(0, index), pair.substring(index + 1)];
}

const REQUIRED_POSITIONALS: Record<CommandName, number> = {
  buckets: 0,
  objects: 0,
  ls: 0,
  get: 2,
  put: 2,
  head: 1,
  size: 1,
  meta: 1,
  'set-meta': 2,
  modified: 1,
  sha256: 1,
  rm: 1,
};

export function parseArgs(argv: readonly string[]): CliArgs {
  const [command, ...rest] = argv;
  if (!command) {
    throw new UsageError('Missing command');
  }
  if (!isCommand(command)) {
    throw new UsageError(`Unknown command: ${command}`);
  }

  const args: CliArgs = { command, positionals: [], metadata: {}, yes: false };

  const takeValue = (flag: string, index: number): string => {
    const value = rest[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new UsageError(`${flag} needs a value`);
    }
    return value;
  };

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    switch (arg) {
      case '--bucket':
        args.bucket = takeValue(arg, i);
        i++;
        break;
      case '--region':
        args.region = takeValue(arg, i);
        i++;
        break;
      case '--key-location':
        args.keyLocation = takeValue(arg, i);
        i++;
        break;
      case '--endpoint':
        args.endpoint = takeValue(arg, i);
        i++;
        break;
      case '--meta': {
        const [key, value] = parseMetadataPair(takeValue(arg, i));
        args.metadata[key] = value;
        i++;
        break;
      }
      case '--yes':
        args.yes = true;
        break;
      default:
        if (arg.startsWith('--')) {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        args.positionals.push(arg);
    }
  }

  if (args.positionals.length < REQUIRED_POSITIONALS[command]) {
    throw new UsageError(`${command} expects ${REQUIRED_POSITIONALS[command]} argument(s)`);
  }

  return args;
}
