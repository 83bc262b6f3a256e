/**
 * Database Connectors
 *
 * The core only ever talks to a QuerySession: run a query with named binds,
 * get rows back, close. Sessions are owned by one operation at a time and
 * acquired through withSession so they are released on every exit path.
 */

import { logger } from '../utils/logger.js';
import { OracleSession, connectOracle } from './oracle.js';
import type { OracleSessionOptions } from './oracle.js';

export type BindValue = string | number | Date | null;

export type BindParameters = Record<string, BindValue>;

/** A result row keyed by upper-case column name */
export type Row = Record<string, unknown>;

/**
 * Opaque query-executing session.
 */
export interface QuerySession {
  execute(sql: string, binds?: BindParameters): Promise<Row[]>;
  close(): Promise<void>;
}

/** Opens a fresh, independent session */
export type SessionFactory = () => Promise<QuerySession>;

/**
 * Acquire a session, run the operation, always release the session.
 */
export async function withSession<T>(
  factory: SessionFactory,
  operation: (session: QuerySession) => Promise<T>
): Promise<T> {
  const session = await factory();
  try {
    return await operation(session);
  } finally {
    try {
      await session.close();
    } catch (error) {
      logger.warn('Failed to close database session', { error: String(error) });
    }
  }
}

export type DatabaseType = 'oracle';

/**
 * Get a session factory for the specified database type
 */
export function getSessionFactory(type: DatabaseType, options: OracleSessionOptions): SessionFactory {
  switch (type) {
    case 'oracle':
      return () => connectOracle(options);
    default:
      throw new Error(`Unsupported database type: ${String(type)}`);
  }
}

export { OracleSession };
export type { OracleSessionOptions };
