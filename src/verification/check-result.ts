/**
 * Check Results
 *
 * Constructors for CheckResult and the wrapper that turns a thrown error
 * into a FAIL or WARN for that check alone.
 *
 * @module verification/check-result
 */

import type { BindValue, QuerySession } from '../connectors/index.js';
import { errorMessage, isConnectivityError } from '../contracts/errors.js';
import type {
  CheckResult,
  CheckStatus,
  EnvironmentProfile,
  TableMigrationPlan,
} from '../contracts/types.js';

/**
 * Everything a suite needs to check one table.
 */
export interface CheckContext {
  /** Absent when verifying offline; database checks then SKIP */
  session: QuerySession | undefined;
  plan: TableMigrationPlan;
  environment: EnvironmentProfile;
  sampleSize: number;
}

export const NO_SESSION_MESSAGE = 'No database session available';

export const STATUS_ICONS: Record<CheckStatus, string> = {
  PASS: '✓',
  WARN: '⚠',
  FAIL: '✗',
  SKIP: '○',
};

function result(
  status: CheckStatus,
  checkName: string,
  message: string,
  details: Record<string, unknown>
): CheckResult {
  return {
    check_name: checkName,
    status,
    message,
    details,
    timestamp: new Date().toISOString(),
  };
}

export function pass(
  checkName: string,
  message = 'Check passed',
  details: Record<string, unknown> = {}
): CheckResult {
  return result('PASS', checkName, message, details);
}

export function warn(
  checkName: string,
  message: string,
  details: Record<string, unknown> = {}
): CheckResult {
  return result('WARN', checkName, message, details);
}

export function fail(
  checkName: string,
  message: string,
  details: Record<string, unknown> = {}
): CheckResult {
  return result('FAIL', checkName, message, details);
}

export function skip(
  checkName: string,
  message: string,
  details: Record<string, unknown> = {}
): CheckResult {
  return result('SKIP', checkName, message, details);
}

/**
 * Run a check. A thrown error becomes a result with the given status;
 * connectivity errors propagate and end the suite.
 */
export async function runCheck(
  checkName: string,
  onError: 'FAIL' | 'WARN',
  errorPrefix: string,
  check: () => Promise<CheckResult>
): Promise<CheckResult> {
  try {
    return await check();
  } catch (error) {
    if (isConnectivityError(error)) {
      throw error;
    }
    const message = `${errorPrefix}: ${errorMessage(error)}`;
    return onError === 'FAIL' ? fail(checkName, message) : warn(checkName, message);
  }
}

/**
 * runCheck for checks that need the database: SKIP without a session.
 */
export function runDatabaseCheck(
  context: CheckContext,
  checkName: string,
  onError: 'FAIL' | 'WARN',
  errorPrefix: string,
  check: (session: QuerySession) => Promise<CheckResult>
): Promise<CheckResult> {
  const { session } = context;
  if (!session) {
    return Promise.resolve(skip(checkName, NO_SESSION_MESSAGE));
  }
  return runCheck(checkName, onError, errorPrefix, () => check(session));
}

/**
 * Narrow a fetched key value so it can be bound again.
 */
export function toBindValue(value: unknown): BindValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || value instanceof Date) {
    return value;
  }
  if (typeof value === 'bigint') return value.toString();
  return String(value);
}

export function countByStatus(results: CheckResult[], status: CheckStatus): number {
  return results.filter((r) => r.status === status).length;
}
