/**
 * Plan Display Module
 *
 * Human-readable console output for discovery, configuration validation
 * and migration verification.
 *
 * @module cli/plan-display
 */

import chalk from 'chalk';
import type {
  CheckResult,
  CheckStatus,
  ConfigValidationResult,
  TableMigrationPlan,
  VerificationStats,
} from '../contracts/types.js';
import type { DiscoveryResult } from '../discovery/index.js';
import { formatInterval, formatRowCount, formatSizeGb } from '../utils/format.js';

const MAX_TABLES_SHOWN = 20;

/**
 * Display a summary of a discovery run and the tables it planned.
 */
export function displayDiscoverySummary(result: DiscoveryResult): void {
  const { metadata, tables } = result.document;

  console.log('\n' + chalk.bold('=== Repartitioning Plan ===\n'));

  console.log(chalk.cyan('Summary:'));
  console.log(`  Schema:        ${metadata.source_schema}`);
  console.log(`  Environment:   ${metadata.environment}`);
  console.log(`  Service:       ${metadata.source_database_service}`);
  console.log(`  Criteria:      ${metadata.discovery_criteria}`);
  console.log(`  Result:        ${result.summary}`);

  if (tables.length > 0) {
    console.log('\n' + chalk.cyan('Tables (largest first):'));
    const ordered = [...tables].sort((a, b) => b.current_state.size_gb - a.current_state.size_gb);
    for (const plan of ordered.slice(0, MAX_TABLES_SHOWN)) {
      console.log(`  ${formatTableLine(plan)}`);
    }
    if (ordered.length > MAX_TABLES_SHOWN) {
      console.log(chalk.dim(`  ... and ${ordered.length - MAX_TABLES_SHOWN} more tables`));
    }
  }

  if (result.errors.length > 0) {
    console.log('\n' + chalk.yellow('Warnings/Errors:'));
    for (const err of result.errors) {
      const icon = err.severity === 'fatal' ? chalk.red('✗') : chalk.yellow('⚠');
      console.log(`  ${icon} [${err.severity}] ${err.code}: ${err.message}`);
    }
  }

  console.log('\n' + chalk.dim(`Generated: ${metadata.generated_date}`));
  if (metadata.discovery_validation_hash) {
    console.log(chalk.dim(`Provenance: ${metadata.discovery_validation_hash.substring(0, 16)}...`));
  }
}

function formatTableLine(plan: TableMigrationPlan): string {
  const target = plan.common_settings.target_configuration;
  const icon = plan.enabled ? chalk.green('●') : chalk.dim('○');
  const hash =
    target.subpartition_type === 'HASH'
      ? ` + HASH(${target.subpartition_column ?? '?'}) x${target.subpartition_count}`
      : '';
  const warning = plan.discovery_warning ? chalk.yellow(` ⚠ ${plan.discovery_warning}`) : '';

  return (
    `${icon} ${chalk.bold(plan.table_name)} ` +
    `(${formatSizeGb(plan.current_state.size_gb)}, ${formatRowCount(plan.current_state.row_count)}) ` +
    `${target.partition_column ?? '-'} ${formatInterval(target.interval_type, target.interval_value)}${hash} ` +
    chalk.dim(`[${plan.common_settings.migration_settings.priority}]`) +
    warning
  );
}

/**
 * Display configuration validator findings.
 */
export function displayValidationResult(result: ConfigValidationResult): void {
  if (result.warnings.length > 0) {
    console.log(chalk.yellow('\n  Warnings:'));
    for (const w of result.warnings) {
      console.log(`    ${chalk.yellow('⚠')} ${w}`);
    }
  }

  if (result.errors.length > 0) {
    console.log(chalk.red('\n  Errors:'));
    for (const e of result.errors) {
      console.log(`    ${chalk.red('✗')} ${e}`);
    }
  }
}

const STATUS_COLORS: Record<CheckStatus, (text: string) => string> = {
  PASS: chalk.green,
  WARN: chalk.yellow,
  FAIL: chalk.red,
  SKIP: chalk.dim,
};

/**
 * Display verification results, one line per check, then the totals.
 */
export function displayVerificationSummary(results: CheckResult[], stats: VerificationStats): void {
  for (const result of results) {
    const color = STATUS_COLORS[result.status];
    const firstLine = result.message.split('\n')[0] ?? '';
    console.log(`  ${color(result.status.padEnd(4))} ${result.check_name}: ${firstLine}`);
  }

  console.log(
    '\n' +
      `${chalk.green(`${stats.passed} passed`)}, ` +
      `${chalk.yellow(`${stats.warnings} warnings`)}, ` +
      `${chalk.red(`${stats.failed} failed`)}, ` +
      `${chalk.dim(`${stats.skipped} skipped`)} ` +
      chalk.dim(`(${stats.total_checks} checks)`)
  );
}
