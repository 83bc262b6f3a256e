/**
 * Row Readers
 *
 * Narrow untyped result-row values. Catalog columns come back upper-case.
 *
 * @module connectors/rows
 */

import type { YesNo } from '../contracts/types.js';
import type { Row } from './index.js';

export function readString(row: Row, column: string, fallback = ''): string {
  return readOptionalString(row, column) ?? fallback;
}

export function readOptionalString(row: Row, column: string): string | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
    return String(value);
  }
  return null;
}

export function readNumber(row: Row, column: string, fallback = 0): number {
  return readOptionalNumber(row, column) ?? fallback;
}

export function readOptionalNumber(row: Row, column: string): number | null {
  const value = row[column];
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function readYesNo(row: Row, column: string, fallback: YesNo = 'N'): YesNo {
  const value = readOptionalString(row, column)?.trim().toUpperCase();
  if (value === 'Y' || value === 'YES') return 'Y';
  if (value === 'N' || value === 'NO') return 'N';
  return fallback;
}

/**
 * Comparable representation of a scalar (dates by instant).
 */
export function comparableValue(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'bigint') {
    return String(value);
  }
  return JSON.stringify(value);
}
