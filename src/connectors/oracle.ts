/**
 * Oracle Database Connector
 *
 * QuerySession over a single node-oracledb connection (thin mode). Driver
 * errors are translated into the connectivity / timeout / query-failure
 * taxonomy so callers can decide between isolating and aborting.
 */

import oracledb from 'oracledb';
import { logger } from '../utils/logger.js';
import { createMigrationError, errorMessage } from '../contracts/errors.js';
import type { MigrationError } from '../contracts/types.js';
import type { BindParameters, QuerySession, Row } from './index.js';

export interface OracleSessionOptions {
  user: string;
  password: string;
  connectString: string;
  /** Per-round-trip timeout; 0 disables it */
  queryTimeoutMs: number;
}

/** Driver error prefixes meaning the session is no longer usable */
const CONNECTION_LOST_CODES = [
  'ORA-03113',
  'ORA-03114',
  'ORA-03135',
  'ORA-02396',
  'DPI-1010',
  'DPI-1080',
  'NJS-003',
  'NJS-500',
  'NJS-501',
  'NJS-521',
];

/** Driver error prefixes meaning the call timeout expired */
const TIMEOUT_CODES = ['DPI-1067', 'NJS-123', 'ORA-01013'];

/**
 * Map a driver error onto the taxonomy.
 */
export function classifyDriverError(error: unknown, sql?: string): MigrationError {
  const message = errorMessage(error);
  const context = sql ? { sql: sql.trim().slice(0, 200) } : undefined;

  if (CONNECTION_LOST_CODES.some((code) => message.startsWith(code))) {
    return createMigrationError('connectionLost', message, context);
  }
  if (TIMEOUT_CODES.some((code) => message.startsWith(code))) {
    return createMigrationError('queryTimeout', message, context);
  }
  return createMigrationError('queryFailed', message, context);
}

export class OracleSession implements QuerySession {
  private connection: oracledb.Connection | null;

  constructor(connection: oracledb.Connection) {
    this.connection = connection;
  }

  async execute(sql: string, binds: BindParameters = {}): Promise<Row[]> {
    if (!this.connection) {
      throw createMigrationError('connectionLost', 'Session already closed');
    }

    try {
      const result = await this.connection.execute<Row>(sql, binds, {
        outFormat: oracledb.OUT_FORMAT_OBJECT,
      });
      return result.rows ?? [];
    } catch (error) {
      throw classifyDriverError(error, sql);
    }
  }

  async close(): Promise<void> {
    if (this.connection) {
      const connection = this.connection;
      this.connection = null;
      await connection.close();
      logger.debug('Disconnected from Oracle database');
    }
  }
}

/**
 * Open a new session.
 */
export async function connectOracle(options: OracleSessionOptions): Promise<OracleSession> {
  let connection: oracledb.Connection;
  try {
    connection = await oracledb.getConnection({
      user: options.user,
      password: options.password,
      connectString: options.connectString,
    });
  } catch (error) {
    logger.error('Failed to connect to Oracle', error);
    throw createMigrationError('dbUnreachable', `Cannot connect: ${errorMessage(error)}`, {
      connectString: options.connectString,
    });
  }

  if (options.queryTimeoutMs > 0) {
    connection.callTimeout = options.queryTimeoutMs;
  }
  logger.debug('Connected to Oracle database', { connectString: options.connectString });
  return new OracleSession(connection);
}
