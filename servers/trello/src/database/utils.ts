/**
 * Database Utilities
 *
 * Helper functions for SQLite operations
 */

import crypto from 'crypto';

/**
 * Generate a unique row id (24 character hex string)
 */
export function generateId(): string {
  return crypto.randomBytes(12).toString('hex');
}

/**
 * Get current ISO timestamp
 */
export function now(): string {
  return new Date().toISOString();
}

/**
 * Convert boolean to SQLite integer (0 or 1)
 */
export function boolToInt(value: boolean | undefined): number {
  return value ? 1 : 0;
}

/**
 * Convert SQLite integer to boolean
 */
export function intToBool(value: number | null | undefined): boolean {
  return value === 1;
}

/**
 * Human-readable session reference, e.g. `REANALYSE-20240315_142501-a1b2c3`
 */
export function sessionReference(reanalyse: boolean, at: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const stamp =
    `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}` +
    `_${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`;
  const suffix = crypto.randomBytes(3).toString('hex');
  return `${reanalyse ? 'REANALYSE' : 'ANALYSE'}-${stamp}-${suffix}`;
}
