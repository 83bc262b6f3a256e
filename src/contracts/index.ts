/**
 * Contracts Module
 *
 * Central export point for all contract types, errors, and validators.
 *
 * @module contracts
 */

// Types
export * from './types.js';

// Errors
export {
  ERROR_CODES,
  MIGRATION_ERROR_MAP,
  createMigrationError,
  createError,
  isMigrationError,
  isConnectivityError,
  toMigrationError,
  errorMessage,
} from './errors.js';
export type { ErrorCode, MigrationErrorType } from './errors.js';

// Validators
export {
  validatePlanDocument,
  validateTablePlan,
  formatValidationErrors,
  PlanEnvelopeSchema,
  TableMigrationPlanSchema,
  MigrationPlanDocumentSchema,
  MigrationActionSchema,
  IntervalTypeSchema,
} from './validators.js';
export type { PlanEnvelope } from './validators.js';
