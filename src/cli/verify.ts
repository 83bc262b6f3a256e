/**
 * Verify CLI Command
 *
 * Runs migration checks for the tables of a plan and writes the Markdown
 * report.
 * Usage: repartition verify --phase <pre|post|data|all> [options]
 *
 * @module cli/verify
 */

import chalk from 'chalk';
import { withSession } from '../connectors/index.js';
import type { QuerySession } from '../connectors/index.js';
import { errorMessage } from '../contracts/errors.js';
import type { CheckSuite, MigrationPlanDocument } from '../contracts/types.js';
import { loadPlan } from '../utils/plan-io.js';
import { MigrationValidator } from '../verification/migration-validator.js';
import { displayVerificationSummary } from './plan-display.js';
import { loadRuntime, openDatabase } from './runtime.js';

export type VerifyPhase = 'pre' | 'post' | 'data' | 'all';

export const VERIFY_PHASES: readonly VerifyPhase[] = ['pre', 'post', 'data', 'all'];

const PHASE_SUITES: Record<VerifyPhase, CheckSuite[]> = {
  pre: ['pre_migration'],
  post: ['post_migration'],
  data: ['data_comparison'],
  all: ['pre_migration', 'post_migration', 'data_comparison'],
};

export interface VerifyCommandOptions {
  plan: string;
  phase: VerifyPhase;
  tables?: string[];
  connection?: string;
  config?: string;
  report: string;
  sampleSize?: number;
  offline?: boolean;
}

export function isVerifyPhase(value: string): value is VerifyPhase {
  return VERIFY_PHASES.some((phase) => phase === value);
}

/**
 * Verify a migration. Returns the process exit code: 1 when any check failed.
 */
export async function runVerifyCommand(options: VerifyCommandOptions): Promise<number> {
  try {
    console.log(chalk.cyan(`\nRepartitioning Planner - Migration Verification (${options.phase})\n`));

    const document = await loadPlan(options.plan);
    const { settings } = await loadRuntime(document.environment_config.name, options.config);
    const sampleSize = options.sampleSize ?? settings.sample_size;
    const suites = PHASE_SUITES[options.phase];

    const verify = async (session: QuerySession | undefined): Promise<MigrationValidator> => {
      const validator = new MigrationValidator(session, document, { sampleSize });
      const results = await validator.validateAll(suites, options.tables);
      console.log(chalk.dim(`Checked ${describeScope(document, options.tables)}\n`));
      displayVerificationSummary(results, validator.getStats());
      return validator;
    };

    let validator: MigrationValidator;
    if (options.offline) {
      console.log(chalk.yellow('⚠ Offline mode: database checks will be skipped'));
      validator = await verify(undefined);
    } else {
      const { sessionFactory } = openDatabase(settings, options.connection);
      validator = await withSession(sessionFactory, verify);
    }

    const stats = validator.getStats();
    const reportPath = await validator.writeReport(options.report);
    console.log(chalk.green(`\n✓ Report saved to: ${reportPath}`));

    if (stats.failed > 0) {
      console.log(chalk.red(`✗ ${stats.failed} check(s) failed`));
      return 1;
    }
    return 0;
  } catch (error) {
    console.error(chalk.red(`\n✗ Verification failed: ${errorMessage(error)}`));
    return 1;
  }
}

function describeScope(document: MigrationPlanDocument, tables: string[] | undefined): string {
  if (tables) return `${tables.length} requested table(s)`;
  return `${document.tables.filter((t) => t.enabled).length} enabled table(s)`;
}
