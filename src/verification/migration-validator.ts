/**
 * Migration Validator
 *
 * Runs the pre-migration, post-migration and data-comparison suites for the
 * tables of a plan document and keeps running counters for the report.
 * Results accumulate across suites until reset(); use one instance per
 * concurrent caller.
 *
 * @module verification/migration-validator
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { QuerySession } from '../connectors/index.js';
import { createMigrationError, errorMessage } from '../contracts/errors.js';
import type {
  CheckResult,
  CheckSuite,
  MigrationPlanDocument,
  TableMigrationPlan,
  VerificationStats,
} from '../contracts/types.js';
import { logger } from '../utils/logger.js';
import { STATUS_ICONS } from './check-result.js';
import type { CheckContext } from './check-result.js';
import { runDataComparisonChecks } from './data-comparison.js';
import { runPostMigrationChecks } from './post-migration.js';
import { runPreMigrationChecks } from './pre-migration.js';
import { generateReport } from './report.js';

export const DEFAULT_SAMPLE_SIZE = 1000;

export interface MigrationValidatorOptions {
  /** Keys sampled by the data comparison, default 1000 */
  sampleSize?: number;
  /** Clock override for report timestamps */
  now?: () => Date;
}

function emptyStats(): VerificationStats {
  return { total_checks: 0, passed: 0, warnings: 0, failed: 0, skipped: 0 };
}

function emptyResults(): Record<CheckSuite, CheckResult[]> {
  return { pre_migration: [], post_migration: [], data_comparison: [] };
}

export class MigrationValidator {
  private readonly session: QuerySession | undefined;
  private readonly document: MigrationPlanDocument;
  private readonly sampleSize: number;
  private readonly now: () => Date;

  private results: Record<CheckSuite, CheckResult[]> = emptyResults();
  private stats: VerificationStats = emptyStats();
  private startedAt: Date | null = null;

  constructor(
    session: QuerySession | undefined,
    document: MigrationPlanDocument,
    options: MigrationValidatorOptions = {}
  ) {
    this.session = session;
    this.document = document;
    this.sampleSize = options.sampleSize ?? DEFAULT_SAMPLE_SIZE;
    this.now = options.now ?? (() => new Date());
  }

  validatePreMigration(plan: TableMigrationPlan): Promise<CheckResult[]> {
    return this.runSuite('pre_migration', plan, runPreMigrationChecks);
  }

  validatePostMigration(plan: TableMigrationPlan): Promise<CheckResult[]> {
    return this.runSuite('post_migration', plan, runPostMigrationChecks);
  }

  compareData(plan: TableMigrationPlan): Promise<CheckResult[]> {
    return this.runSuite('data_comparison', plan, runDataComparisonChecks);
  }

  /**
   * Run the chosen suites for every enabled table (or the named ones).
   */
  async validateAll(suites: CheckSuite[], tableNames?: string[]): Promise<CheckResult[]> {
    const wanted = tableNames?.map((t) => t.toUpperCase());
    const plans = this.document.tables.filter((plan) =>
      wanted ? wanted.includes(plan.table_name.toUpperCase()) : plan.enabled
    );

    const collected: CheckResult[] = [];
    for (const plan of plans) {
      for (const suite of suites) {
        switch (suite) {
          case 'pre_migration':
            collected.push(...(await this.validatePreMigration(plan)));
            break;
          case 'post_migration':
            collected.push(...(await this.validatePostMigration(plan)));
            break;
          case 'data_comparison':
            collected.push(...(await this.compareData(plan)));
            break;
        }
      }
    }
    return collected;
  }

  getResults(suite: CheckSuite): CheckResult[] {
    return [...this.results[suite]];
  }

  getStats(): VerificationStats {
    return { ...this.stats };
  }

  reset(): void {
    this.results = emptyResults();
    this.stats = emptyStats();
    this.startedAt = null;
  }

  generateReport(): string {
    const finishedAt = this.now();
    const durationSeconds = this.startedAt
      ? (finishedAt.getTime() - this.startedAt.getTime()) / 1000
      : 0;

    return generateReport({
      generatedAt: finishedAt,
      durationSeconds,
      schema: this.document.metadata.source_schema || 'N/A',
      stats: this.getStats(),
      results: this.results,
    });
  }

  /**
   * Render the report and write it to disk. Returns the absolute path.
   */
  async writeReport(outputPath: string): Promise<string> {
    const fullPath = path.resolve(process.cwd(), outputPath);
    const report = this.generateReport();

    try {
      await fs.mkdir(path.dirname(fullPath), { recursive: true });
      await fs.writeFile(fullPath, report, 'utf-8');
    } catch (error) {
      throw createMigrationError(
        'reportWriteFailed',
        `Failed to write report to ${fullPath}: ${errorMessage(error)}`,
        { path: fullPath }
      );
    }

    logger.info('Validation report saved', { path: fullPath });
    return fullPath;
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private async runSuite(
    suite: CheckSuite,
    plan: TableMigrationPlan,
    checks: (context: CheckContext) => Promise<CheckResult[]>
  ): Promise<CheckResult[]> {
    if (!this.startedAt) {
      this.startedAt = this.now();
    }

    logger.info(`Running ${suite} checks`, { owner: plan.owner, table: plan.table_name });

    const results = await checks({
      session: this.session,
      plan,
      environment: this.document.environment_config,
      sampleSize: this.sampleSize,
    });

    this.results[suite].push(...results);
    for (const result of results) {
      this.record(result);
      logger.debug(`${STATUS_ICONS[result.status]} [${result.status}] ${result.check_name}`, {
        message: result.message,
      });
    }

    return results;
  }

  private record(result: CheckResult): void {
    this.stats.total_checks += 1;
    switch (result.status) {
      case 'PASS':
        this.stats.passed += 1;
        break;
      case 'WARN':
        this.stats.warnings += 1;
        break;
      case 'FAIL':
        this.stats.failed += 1;
        break;
      case 'SKIP':
        this.stats.skipped += 1;
        break;
    }
  }
}
