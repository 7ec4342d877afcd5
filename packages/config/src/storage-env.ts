/**
 * Storage settings read from the environment
 */

import { z } from 'zod';

const optionalTrimmed = z
  .string()
  .transform((value) => value.trim())
  .optional()
  .transform((value) => (value ? value : undefined));

const StorageEnvSchema = z.object({
  STORAGE_BUCKET: optionalTrimmed,
  STORAGE_REGION: optionalTrimmed.transform((value) => value ?? 'us-east-1'),
  STORAGE_KEY_LOCATION: optionalTrimmed,
  STORAGE_ACCESS_KEY_ID: optionalTrimmed,
  STORAGE_SECRET_ACCESS_KEY: optionalTrimmed,
  STORAGE_ENDPOINT: optionalTrimmed.refine(
    (value) => value === undefined || /^https?:\/\//.test(value),
    'must start with http:// or https://'
  ),
  STORAGE_FORCE_PATH_STYLE: optionalTrimmed.refine(
    (value) => value === undefined || value === 'true' || value === 'false',
    'must be "true" or "false"'
  ),
});

export interface StorageEnv {
  bucket?: string;
  region: string;
  keyLocation?: string; // Unset means ~/.s3, resolved when credentials are read
  accessKeyId?: string;
  secretAccessKey?: string;
  endpoint?: string;
  forcePathStyle?: boolean;
}

export const STORAGE_ENV_KEYS = [
  'STORAGE_BUCKET',
  'STORAGE_REGION',
  'STORAGE_KEY_LOCATION',
  'STORAGE_ACCESS_KEY_ID',
  'STORAGE_SECRET_ACCESS_KEY',
  'STORAGE_ENDPOINT',
  'STORAGE_FORCE_PATH_STYLE',
] as const;

/**
 * Parse the STORAGE_* variables. Blank values count as unset.
 *
 * @throws Error listing every invalid variable
 */
export function loadStorageEnv(env: NodeJS.ProcessEnv = process.env): StorageEnv {
  const parsed = StorageEnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid storage environment: ${problems.join('; ')}`);
  }

  const data = parsed.data;
  return {
    bucket: data.STORAGE_BUCKET,
    region: data.STORAGE_REGION,
    keyLocation: data.STORAGE_KEY_LOCATION,
    accessKeyId: data.STORAGE_ACCESS_KEY_ID,
    secretAccessKey: data.STORAGE_SECRET_ACCESS_KEY,
    endpoint: data.STORAGE_ENDPOINT,
    forcePathStyle: data.STORAGE_FORCE_PATH_STYLE === undefined ? undefined : data.STORAGE_FORCE_PATH_STYLE === 'true',
  };
}
