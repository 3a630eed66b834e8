/**
 * Shared environment loading utilities
 * Loads the workspace .env file and reads typed values from process.env
 */

import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';
import { ConfigurationError } from './errors.js';

/**
 * Options for loading environment variables
 */
export interface EnvLoaderOptions {
  /** Custom path to .env file (overrides default resolution) */
  envPath?: string;
  /** Whether to throw an error if .env file is not found (default: false) */
  required?: boolean;
  /** Additional environment variables to set (useful for testing) */
  overrides?: Record<string, string>;
}

/**
 * Find the project root by looking for a .env file or the workspace package.json
 */
export function findProjectRoot(startDir: string): string {
  let currentDir = startDir;

  while (currentDir !== path.dirname(currentDir)) {
    if (fs.existsSync(path.join(currentDir, '.env'))) {
      return currentDir;
    }
    const pkgPath = path.join(currentDir, 'package.json');
    if (fs.existsSync(pkgPath) && isWorkspaceManifest(pkgPath)) {
      return currentDir;
    }
    currentDir = path.dirname(currentDir);
  }

  return startDir;
}

function isWorkspaceManifest(pkgPath: string): boolean {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf8'));
    return typeof pkg === 'object' && pkg !== null && 'workspaces' in pkg;
  } catch (error) {
    console.error(`[Env] Unreadable package.json at ${pkgPath}: ${String(error)}`);
    return false;
  }
}

/**
 * Load environment variables from the workspace .env file
 *
 * @param startDir - Directory to start the root lookup from (usually __dirname)
 * @returns The resolved path to the .env file (or null if not found)
 *
 * @example
 * ```typescript
 * import { loadEnv } from '@card-triage/shared';
 *
 * loadEnv(__dirname);
 * ```
 */
export function loadEnv(startDir: string = process.cwd(), options: EnvLoaderOptions = {}): string | null {
  const envPath = options.envPath ?? path.resolve(findProjectRoot(startDir), '.env');

  if (!fs.existsSync(envPath)) {
    if (options.required) {
      throw new ConfigurationError(`Required .env file not found at: ${envPath}`);
    }
    return null;
  }

  dotenv.config({ path: envPath });

  if (options.overrides) {
    for (const [key, value] of Object.entries(options.overrides)) {
      process.env[key] = value;
    }
  }

  return envPath;
}

/**
 * Get required environment variable or throw
 *
 * @throws ConfigurationError if variable is not set and no default provided
 */
export function getEnvOrThrow(name: string, defaultValue?: string): string {
  const value = process.env[name];
  if (value === undefined || value === '') {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new ConfigurationError(`Required environment variable ${name} is not set`);
  }
  return value.trim().replace(/\r\n?/g, '');
}

/**
 * Get optional environment variable with default
 */
export function getEnv(name: string, defaultValue: string = ''): string {
  const value = process.env[name];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value.trim().replace(/\r\n?/g, '');
}

/**
 * Get a positive integer environment variable
 *
 * @throws ConfigurationError if the value is set but is not a positive integer
 */
export function getEnvInt(name: string, defaultValue: number): number {
  const raw = getEnv(name);
  if (raw === '') {
    return defaultValue;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigurationError(`Environment variable ${name} must be a positive integer, got "${raw}"`);
  }
  return parsed;
}

/**
 * Get a boolean environment variable (true/false, 1/0, yes/no)
 */
export function getEnvBool(name: string, defaultValue: boolean): boolean {
  const raw = getEnv(name).toLowerCase();
  if (raw === '') {
    return defaultValue;
  }
  if (['true', '1', 'yes'].includes(raw)) return true;
  if (['false', '0', 'no'].includes(raw)) return false;
  throw new ConfigurationError(`Environment variable ${name} must be a boolean, got "${raw}"`);
}
