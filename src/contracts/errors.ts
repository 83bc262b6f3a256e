/**
 * Error Code Registry
 *
 * All modules must use these canonical error codes. Do not invent new codes
 * without adding them here first.
 *
 * @module contracts/errors
 */

import type { MigrationError, ErrorSeverity, ISOTimestamp } from './types.js';

// =============================================================================
// ERROR CODE CONSTANTS
// =============================================================================

export const ERROR_CODES = {
  // =========================================================================
  // CONNECTIVITY (MIG_*)
  // =========================================================================

  /** Could not open a session (bad credentials, listener down) */
  MIG_DB_UNREACHABLE: 'MIG_DB_UNREACHABLE',
  /** Session dropped mid-operation */
  MIG_DB_CONNECTION_LOST: 'MIG_DB_CONNECTION_LOST',
  /** A single query failed (permissions, missing view, bad SQL) */
  MIG_QUERY_FAILED: 'MIG_QUERY_FAILED',

  // =========================================================================
  // DISCOVERY (DISC_*)
  // =========================================================================

  /** Per-query timeout expired */
  DISC_QUERY_TIMEOUT: 'DISC_QUERY_TIMEOUT',
  /** Analysis of one table failed; table recorded with partial data */
  DISC_TABLE_ANALYSIS_FAILED: 'DISC_TABLE_ANALYSIS_FAILED',
  /** No table in the schema matched the filters */
  DISC_NO_TABLES: 'DISC_NO_TABLES',

  // =========================================================================
  // CONFIGURATION VALIDATION (CFG_*)
  // =========================================================================

  /** Document does not match the plan schema */
  CFG_STRUCTURE_INVALID: 'CFG_STRUCTURE_INVALID',
  /** Document is structurally valid but logically inconsistent */
  CFG_LOGIC_INVALID: 'CFG_LOGIC_INVALID',
  /** Provenance hash missing or not matching the metadata */
  CFG_PROVENANCE_MISSING: 'CFG_PROVENANCE_MISSING',

  // =========================================================================
  // ENVIRONMENT (ENV_*)
  // =========================================================================

  /** environments.yaml has invalid YAML or fails schema validation */
  ENV_CONFIG_INVALID: 'ENV_CONFIG_INVALID',
  /** Connection settings missing from the environment */
  ENV_CONNECTION_MISSING: 'ENV_CONNECTION_MISSING',

  // =========================================================================
  // PLAN FILE (PLAN_*)
  // =========================================================================

  /** Plan file not found */
  PLAN_NOT_FOUND: 'PLAN_NOT_FOUND',
  /** Plan file is not valid JSON or fails schema validation */
  PLAN_INVALID: 'PLAN_INVALID',
  /** Failed to write plan file */
  PLAN_WRITE_FAILED: 'PLAN_WRITE_FAILED',

  // =========================================================================
  // VERIFICATION (VERIFY_*)
  // =========================================================================

  /** Identifier could not be used in dynamically built SQL */
  VERIFY_UNSAFE_IDENTIFIER: 'VERIFY_UNSAFE_IDENTIFIER',
  /** Failed to write the verification report */
  VERIFY_REPORT_WRITE_FAILED: 'VERIFY_REPORT_WRITE_FAILED',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

// =============================================================================
// ERROR TAXONOMY
// =============================================================================

interface ErrorMapping {
  code: ErrorCode;
  severity: ErrorSeverity;
  recoverable: boolean;
  trigger: string;
}

/**
 * Error taxonomy mapping.
 * Each mapping defines: code, severity, recoverable, and when to use.
 */
export const MIGRATION_ERROR_MAP = {
  // Connectivity errors (fatal - abort the current operation)
  dbUnreachable: {
    code: ERROR_CODES.MIG_DB_UNREACHABLE,
    severity: 'fatal',
    recoverable: false,
    trigger: 'Connection refused, auth failure, listener not reachable',
  },
  connectionLost: {
    code: ERROR_CODES.MIG_DB_CONNECTION_LOST,
    severity: 'fatal',
    recoverable: false,
    trigger: 'Session terminated or network dropped during a query',
  },

  // Schema introspection errors (per table - isolate and continue)
  queryFailed: {
    code: ERROR_CODES.MIG_QUERY_FAILED,
    severity: 'error',
    recoverable: true,
    trigger: 'Catalog or data query fails (permissions, missing view)',
  },
  queryTimeout: {
    code: ERROR_CODES.DISC_QUERY_TIMEOUT,
    severity: 'warning',
    recoverable: true,
    trigger: 'Query exceeded the per-query call timeout',
  },
  tableAnalysisFailed: {
    code: ERROR_CODES.DISC_TABLE_ANALYSIS_FAILED,
    severity: 'warning',
    recoverable: true,
    trigger: 'Any per-table discovery step failed',
  },
  noTables: {
    code: ERROR_CODES.DISC_NO_TABLES,
    severity: 'warning',
    recoverable: true,
    trigger: 'Include/exclude filters matched nothing',
  },

  // Validation errors (blocking)
  structureInvalid: {
    code: ERROR_CODES.CFG_STRUCTURE_INVALID,
    severity: 'error',
    recoverable: false,
    trigger: 'Zod schema validation of the plan document failed',
  },
  logicInvalid: {
    code: ERROR_CODES.CFG_LOGIC_INVALID,
    severity: 'error',
    recoverable: false,
    trigger: 'Column membership, bounds or literal grammar violated',
  },
  provenanceMissing: {
    code: ERROR_CODES.CFG_PROVENANCE_MISSING,
    severity: 'error',
    recoverable: true,
    trigger: 'discovery_validation_hash absent or mismatched',
  },

  // Configuration errors
  environmentInvalid: {
    code: ERROR_CODES.ENV_CONFIG_INVALID,
    severity: 'fatal',
    recoverable: false,
    trigger: 'environments.yaml parse error or Zod validation failure',
  },
  connectionMissing: {
    code: ERROR_CODES.ENV_CONNECTION_MISSING,
    severity: 'fatal',
    recoverable: false,
    trigger: 'No connect string and no ORACLE_* variables set',
  },

  // Plan file errors
  planNotFound: {
    code: ERROR_CODES.PLAN_NOT_FOUND,
    severity: 'fatal',
    recoverable: false,
    trigger: 'Plan path does not exist',
  },
  planInvalid: {
    code: ERROR_CODES.PLAN_INVALID,
    severity: 'fatal',
    recoverable: false,
    trigger: 'Plan is not JSON or fails the document schema',
  },
  planWriteFailed: {
    code: ERROR_CODES.PLAN_WRITE_FAILED,
    severity: 'error',
    recoverable: false,
    trigger: 'Cannot write plan file (permissions, disk)',
  },

  // Verification errors
  unsafeIdentifier: {
    code: ERROR_CODES.VERIFY_UNSAFE_IDENTIFIER,
    severity: 'error',
    recoverable: false,
    trigger: 'Owner, table or column name fails the identifier grammar',
  },
  reportWriteFailed: {
    code: ERROR_CODES.VERIFY_REPORT_WRITE_FAILED,
    severity: 'error',
    recoverable: false,
    trigger: 'Cannot write verification report',
  },
} satisfies Record<string, ErrorMapping>;

export type MigrationErrorType = keyof typeof MIGRATION_ERROR_MAP;

// =============================================================================
// ERROR CREATION HELPERS
// =============================================================================

/**
 * Create a MigrationError from the taxonomy.
 */
export function createMigrationError(
  type: MigrationErrorType,
  message: string,
  context?: Record<string, unknown>
): MigrationError {
  const mapping: ErrorMapping = MIGRATION_ERROR_MAP[type];
  return {
    code: mapping.code,
    message,
    severity: mapping.severity,
    timestamp: now(),
    context,
    recoverable: mapping.recoverable,
  };
}

/**
 * Create a generic MigrationError with explicit parameters.
 */
export function createError(
  code: ErrorCode,
  message: string,
  severity: ErrorSeverity,
  recoverable: boolean,
  context?: Record<string, unknown>
): MigrationError {
  return {
    code,
    message,
    severity,
    timestamp: now(),
    context,
    recoverable,
  };
}

/**
 * Type guard to check if an error is a MigrationError
 */
export function isMigrationError(error: unknown): error is MigrationError {
  if (!error || typeof error !== 'object') return false;
  return (
    'code' in error &&
    typeof error.code === 'string' &&
    'message' in error &&
    typeof error.message === 'string' &&
    'severity' in error &&
    typeof error.severity === 'string' &&
    'timestamp' in error &&
    typeof error.timestamp === 'string' &&
    'recoverable' in error &&
    typeof error.recoverable === 'boolean'
  );
}

/**
 * True when the error means the session is gone and the operation must stop.
 */
export function isConnectivityError(error: unknown): boolean {
  return (
    isMigrationError(error) &&
    (error.code === ERROR_CODES.MIG_DB_CONNECTION_LOST ||
      error.code === ERROR_CODES.MIG_DB_UNREACHABLE)
  );
}

/**
 * Convert an unknown error to a MigrationError
 */
export function toMigrationError(
  error: unknown,
  defaultCode: ErrorCode,
  defaultSeverity: ErrorSeverity = 'error'
): MigrationError {
  if (isMigrationError(error)) {
    return error;
  }

  return createError(defaultCode, errorMessage(error), defaultSeverity, true, {
    originalError: error instanceof Error ? error.stack : String(error),
  });
}

/**
 * Best-effort human readable message for anything thrown.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (isMigrationError(error)) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}

function now(): ISOTimestamp {
  return new Date().toISOString();
}
