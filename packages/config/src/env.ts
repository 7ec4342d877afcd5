/**
 * Centralized environment variable loader
 *
 * Locates repo root and loads .env file deterministically.
 * Provides diagnostics and validation without logging secrets.
 */

import { config } from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import { join, resolve, dirname } from 'path';

export interface EnvDiagnostics {
  cwd: string;
  repoRoot: string;
  envFilePath: string;
  envFileExists: boolean;
  requiredKeys: Array<{ key: string; present: boolean; maskedValue?: string; length?: number; source?: string }>;
  warnings: string[];
}

export interface InitEnvResult {
  repoRoot: string;
  envFilePath: string;
  envLocalFilePath: string;
  loaded: boolean;
  localLoaded: boolean;
  keysLoaded: string[];
  keySources: Record<string, string>; // Maps key -> source file ('.env' or '.env.local')
}

function hasWorkspaces(packageJsonPath: string): boolean {
  try {
    const pkg: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    return typeof pkg === 'object' && pkg !== null && 'workspaces' in pkg;
  } catch {
    // Unreadable package.json does not mark a root
    return false;
  }
}

/**
 * Find repository root by walking up from current directory
 */
export function findRepoRoot(startPath: string = process.cwd()): string {
  let current = resolve(startPath);
  const root = resolve('/');

  while (current !== root) {
    // Check for package.json with workspaces
    const packageJsonPath = join(current, 'package.json');
    if (existsSync(packageJsonPath) && hasWorkspaces(packageJsonPath)) {
      return current;
    }

    // Check for .git folder
    if (existsSync(join(current, '.git'))) {
      return current;
    }

    const parent = dirname(current);
    if (parent === current) break; // Reached root
    current = parent;
  }

  // Fallback: return start path if nothing found
  return resolve(startPath);
}

/**
 * Mask sensitive values for logging
 */
export function maskValue(value: string): string {
  if (value.length <= 8) {
    return '*'.repeat(value.length);
  }
  return `${value.substring(0, 4)}...${value.substring(value.length - 4)}`;
}

/**
 * Check if value contains unprintable characters (common Windows CRLF issues)
 */
function hasUnprintableChars(value: string): boolean {
  return /[\r\x00-\x08\x0B-\x0C\x0E-\x1F]/.test(value);
}

/**
 * Check if value has quotes or whitespace that might cause issues
 */
function hasQuotesOrWhitespace(value: string): boolean {
  return /^["'\s]|["'\s]$/.test(value);
}

function isSecretKey(key: string): boolean {
  return key.includes('TOKEN') || key.includes('SECRET') || key.includes('PASSWORD') || key.includes('KEY_ID');
}

// Guard to ensure dotenv is only loaded once
let cachedResult: InitEnvResult | null = null;

function loadEnvFile(path: string, label: string, keysLoaded: string[], keySources: Record<string, string>): boolean {
  const result = config({ path, override: true });
  const hasParsedValues = !!(result.parsed && Object.keys(result.parsed).length > 0);
  const loaded = !result.error || hasParsedValues;

  for (const [key, value] of Object.entries(result.parsed ?? {})) {
    if (value.trim().length > 0) {
      keySources[key] = label;
      if (!keysLoaded.includes(key)) {
        keysLoaded.push(key);
      }
    }
  }

  if (!loaded && result.error) {
    console.warn(`[env] Warning: Error loading ${label} file: ${result.error.message}`);
  }
  return loaded;
}

/**
 * Initialize environment variables
 * Must be called before any code reads process.env
 *
 * Loads from:
 * 1. <repo-root>/.env (always, if exists)
 * 2. <repo-root>/.env.local (if exists, overrides .env)
 *
 * Safeguard: If an env var already exists and the .env value is empty/undefined,
 * DO NOT overwrite the existing env var.
 */
export function initEnv(envFileOverride?: string): InitEnvResult {
  if (cachedResult) {
    return cachedResult;
  }

  const repoRoot = findRepoRoot(process.cwd());
  const envFilePath = resolve(envFileOverride || process.env.ENV_FILE || join(repoRoot, '.env'));
  const envLocalFilePath = resolve(join(repoRoot, '.env.local'));

  // Store existing env vars before loading .env
  const existingEnv: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value && value.trim().length > 0) {
      existingEnv[key] = value;
    }
  }

  const keysLoaded: string[] = [];
  const keySources: Record<string, string> = {};

  let loaded = false;
  if (existsSync(envFilePath)) {
    loaded = loadEnvFile(envFilePath, '.env', keysLoaded, keySources);
  }

  let localLoaded = false;
  if (existsSync(envLocalFilePath)) {
    localLoaded = loadEnvFile(envLocalFilePath, '.env.local', keysLoaded, keySources);
  }

  // Apply safeguard: restore existing non-empty values if .env had empty/undefined
  for (const [key, existingValue] of Object.entries(existingEnv)) {
    const currentValue = process.env[key];
    if (!currentValue || currentValue.trim().length === 0) {
      process.env[key] = existingValue;
    }
  }

  cachedResult = {
    repoRoot,
    envFilePath,
    envLocalFilePath,
    loaded,
    localLoaded,
    keysLoaded,
    keySources,
  };

  return cachedResult;
}

/**
 * Get environment diagnostics (safe for logging, no secrets)
 */
export function getEnvDiagnostics(requiredKeys: readonly string[]): EnvDiagnostics {
  const cwd = process.cwd();
  const repoRoot = findRepoRoot(cwd);
  const envFilePath = resolve(process.env.ENV_FILE || join(repoRoot, '.env'));
  const envFileExists = existsSync(envFilePath);
  const keySources = cachedResult?.keySources || {};

  const requiredKeysStatus = requiredKeys.map((key) => {
    const value = process.env[key];
    if (!value || value.trim().length === 0) {
      return { key, present: false };
    }
    return {
      key,
      present: true,
      length: value.trim().length,
      maskedValue: isSecretKey(key) ? maskValue(value) : undefined,
      source: keySources[key],
    };
  });

  const warnings: string[] = [];
  if (!envFileExists) {
    warnings.push(`.env file not found at: ${envFilePath}`);
  }

  for (const key of requiredKeys) {
    const value = process.env[key];
    if (value) {
      if (isSecretKey(key) && hasQuotesOrWhitespace(value)) {
        warnings.push(`${key} contains quotes or leading/trailing whitespace (may cause issues)`);
      }
      if (hasUnprintableChars(value)) {
        warnings.push(`${key} contains unprintable characters (possible CRLF/encoding issue)`);
      }
    }
  }

  return {
    cwd,
    repoRoot,
    envFilePath,
    envFileExists,
    requiredKeys: requiredKeysStatus,
    warnings,
  };
}
