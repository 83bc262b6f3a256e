/**
 * Validate CLI Command
 *
 * Validates a repartitioning plan (catches errors in operator edits) before
 * scripts are generated from it.
 * Usage: repartition validate [options]
 *
 * @module cli/validate
 */

import chalk from 'chalk';
import { withSession } from '../connectors/index.js';
import { errorMessage } from '../contracts/errors.js';
import type { ConfigValidationResult } from '../contracts/types.js';
import { hasConnectionConfigured } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import { loadPlanRaw } from '../utils/plan-io.js';
import { ConfigValidator } from '../validation/config-validator.js';
import { displayValidationResult } from './plan-display.js';
import { loadRuntime, openDatabase } from './runtime.js';

export interface ValidateCommandOptions {
  plan: string;
  checkDatabase?: boolean;
  connection?: string;
  config?: string;
  strict?: boolean;
  requireProvenance?: boolean;
}

/**
 * Validate a plan file. Returns the process exit code.
 */
export async function runValidateCommand(options: ValidateCommandOptions): Promise<number> {
  console.log(chalk.cyan('\nValidating plan...\n'));

  let document: unknown;
  try {
    document = await loadPlanRaw(options.plan);
    console.log(chalk.green('  ✓ JSON parsed successfully'));
  } catch (error) {
    console.log(chalk.red('  ✗ Failed to load plan file'));
    console.log(chalk.red(`    ${errorMessage(error)}`));
    return 1;
  }

  let result: ConfigValidationResult;
  try {
    result = await validateDocument(document, options);
  } catch (error) {
    console.log(chalk.red(`\n✗ Validation error: ${errorMessage(error)}`));
    return 1;
  }

  displayValidationResult(result);

  if (!result.is_valid) {
    logger.error('Plan validation failed', {
      plan: options.plan,
      codes: [...new Set(result.issues.map((issue) => issue.code))],
    });
    console.log(chalk.red(`\n✗ Plan is invalid (${result.errors.length} error(s))`));
    return 1;
  }

  if (options.strict && result.warnings.length > 0) {
    console.log(chalk.red('\n✗ Validation failed (strict mode): warnings present'));
    return 1;
  }

  console.log(chalk.green('\n✓ Plan is valid'));
  if (result.warnings.length > 0) {
    console.log(chalk.dim(`  ${result.warnings.length} warning(s) to review`));
  }
  return 0;
}

async function validateDocument(
  document: unknown,
  options: ValidateCommandOptions
): Promise<ConfigValidationResult> {
  const validatorOptions = { requireProvenance: options.requireProvenance };

  if (!options.checkDatabase || !hasConnectionConfigured(options.connection)) {
    return new ConfigValidator(undefined, validatorOptions).validate(
      document,
      options.checkDatabase ?? false
    );
  }

  const { settings } = await loadRuntime(undefined, options.config);
  const { sessionFactory } = openDatabase(settings, options.connection);
  return withSession(sessionFactory, (session) =>
    new ConfigValidator(session, validatorOptions).validate(document, true)
  );
}
