/**
 * Environment diagnostics script
 *
 * Usage: npm run env:diag
 *
 * Prints how the storage settings and credentials would be resolved, without connecting
 */

import { existsSync } from 'fs';
import { join } from 'path';
import { initEnv, getEnvDiagnostics, loadStorageEnv, STORAGE_ENV_KEYS } from '@bucketwrap/config';
import { ACCESS_KEY_FILE, SECRET_KEY_FILE, resolveKeyLocation } from '@bucketwrap/storage';

const { repoRoot, envFilePath, envLocalFilePath, loaded, localLoaded, keysLoaded } = initEnv();

console.log('🔍 Environment Diagnostics');
console.log(`   Repo root: ${repoRoot}`);
console.log(`   .env file: ${envFilePath}`);
console.log(`   .env exists: ${loaded ? '✅' : '❌'}`);
console.log(`   .env.local file: ${envLocalFilePath}`);
console.log(`   .env.local exists: ${localLoaded ? '✅' : '❌'}`);
console.log(`   Keys loaded from .env: ${keysLoaded.length}`);

const diagnostics = getEnvDiagnostics([...STORAGE_ENV_KEYS, 'LOG_LEVEL']);

console.log('\n📋 Environment Variables Status:');
for (const key of diagnostics.requiredKeys) {
  const status = key.present ? '✅' : '⚪';
  const length = key.length ? ` (length: ${key.length})` : '';
  const masked = key.maskedValue ? ` (${key.maskedValue})` : '';
  const source = key.source ? ` [from ${key.source}]` : '';
  console.log(`   ${status} ${key.key}${length}${masked}${source}`);
}

let exitCode = 0;
try {
  const env = loadStorageEnv();
  const explicit = !!(env.accessKeyId && env.secretAccessKey);
  const keyLocation = resolveKeyLocation(env.keyLocation);

  console.log('\n🔑 Credentials:');
  if (explicit) {
    console.log('   Source: STORAGE_ACCESS_KEY_ID / STORAGE_SECRET_ACCESS_KEY');
  } else {
    console.log(`   Source: files in ${keyLocation}`);
    for (const file of [ACCESS_KEY_FILE, SECRET_KEY_FILE]) {
      const path = join(keyLocation, file);
      console.log(`   ${existsSync(path) ? '✅' : '❌'} ${path}`);
    }
  }

  console.log('\n📊 Structured Output (JSON):');
  console.log(JSON.stringify({
    event: 'env.diagnostics',
    envFilePath,
    envFileExists: loaded,
    bucket: env.bucket ?? null,
    region: env.region,
    endpoint: env.endpoint ?? null,
    credentialSource: explicit ? 'explicit' : 'files',
    keyLocation: explicit ? null : keyLocation,
    warnings: diagnostics.warnings,
  }, null, 2));
} catch (error) {
  console.error(`\n❌ ${error instanceof Error ? error.message : String(error)}`);
  exitCode = 1;
}

if (diagnostics.warnings.length > 0) {
  console.log('\n⚠️  Warnings:');
  for (const warning of diagnostics.warnings) {
    console.log(`   - ${warning}`);
  }
}

process.exitCode = exitCode;
