/**
 * Migration Verification
 *
 * @module verification
 */

export { MigrationValidator, DEFAULT_SAMPLE_SIZE } from './migration-validator.js';
export type { MigrationValidatorOptions } from './migration-validator.js';
export { generateReport, generateRecommendations } from './report.js';
export type { ReportInput } from './report.js';
export { STATUS_ICONS, NO_SESSION_MESSAGE } from './check-result.js';
export type { CheckContext } from './check-result.js';
export { classifySampleMatch, SAMPLE_WARN_THRESHOLD } from './data-comparison.js';
export { expectedIntervalFunction } from './post-migration.js';
export { assertSafeIdentifier, qualifiedName } from './identifiers.js';
