#!/usr/bin/env node

/**
 * Repartitioning Planner
 *
 * Main entry point. Discovers large Oracle tables that should move to
 * interval (optionally interval-hash) partitioning, validates the resulting
 * plan and verifies migrations carried out from it.
 */

import 'dotenv/config';
import { Command, InvalidArgumentError, Option } from 'commander';
import { logger } from './utils/logger.js';

const program = new Command();

function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}".`);
  }
  return parsed;
}

program
  .name('repartition')
  .description('Plan, validate and verify interval-hash repartitioning of Oracle tables')
  .version('0.1.0');

// Discover command - Schema analysis
program
  .command('discover')
  .description('Analyze a schema and write the repartitioning plan')
  .requiredOption('--schema <name>', 'Schema (owner) to analyze')
  .option('--include <globs...>', 'Table name patterns to include (* and ?)')
  .option('--exclude <globs...>', 'Table name patterns to exclude')
  .option('--env <name>', 'Environment profile (default: MIGRATION_ENV or global)')
  .option('--connection <string>', 'user/password@host:port/service')
  .option('--config <path>', 'Path to environments.yaml')
  .option('--output <path>', 'Plan file to write', 'output/migration-plan.json')
  .option('--concurrency <n>', 'Tables analyzed in parallel', parseCount, 1)
  .option('--json', 'Print the plan as JSON instead of a summary')
  .action(
    async (options: {
      schema: string;
      include?: string[];
      exclude?: string[];
      env?: string;
      connection?: string;
      config?: string;
      output: string;
      concurrency: number;
      json?: boolean;
    }) => {
      const { runDiscoverCommand } = await import('./cli/discover.js');
      process.exit(await runDiscoverCommand(options));
    }
  );

// Validate command - Configuration gate
program
  .command('validate')
  .description('Validate a plan file (catches errors in operator edits)')
  .option('--plan <path>', 'Path to plan file', 'output/migration-plan.json')
  .option('--check-database', 'Also check tables and columns against the live database')
  .option('--connection <string>', 'user/password@host:port/service')
  .option('--config <path>', 'Path to environments.yaml')
  .option('--strict', 'Fail on warnings, not just errors')
  .option('--require-provenance', 'Treat a missing or mismatched discovery hash as an error')
  .action(
    async (options: {
      plan: string;
      checkDatabase?: boolean;
      connection?: string;
      config?: string;
      strict?: boolean;
      requireProvenance?: boolean;
    }) => {
      const { runValidateCommand } = await import('./cli/validate.js');
      process.exit(await runValidateCommand(options));
    }
  );

// Verify command - Migration checks and report
program
  .command('verify')
  .description('Run pre/post-migration checks and data comparison, write a Markdown report')
  .option('--plan <path>', 'Path to plan file', 'output/migration-plan.json')
  .addOption(
    new Option('--phase <phase>', 'Checks to run').choices(['pre', 'post', 'data', 'all']).default('all')
  )
  .option('--tables <names...>', 'Only these tables (default: all enabled tables)')
  .option('--connection <string>', 'user/password@host:port/service')
  .option('--config <path>', 'Path to environments.yaml')
  .option('--report <path>', 'Report file to write', 'output/validation-report.md')
  .option('--sample-size <n>', 'Primary keys sampled for data comparison', parseCount)
  .option('--offline', 'Skip database checks (no connection)')
  .action(
    async (options: {
      plan: string;
      phase: string;
      tables?: string[];
      connection?: string;
      config?: string;
      report: string;
      sampleSize?: number;
      offline?: boolean;
    }) => {
      const { runVerifyCommand, isVerifyPhase } = await import('./cli/verify.js');
      const phase = options.phase;
      if (!isVerifyPhase(phase)) {
        logger.error(`Unknown phase: ${phase}`);
        process.exit(1);
      }
      process.exit(await runVerifyCommand({ ...options, phase }));
    }
  );

// Error handling for unhandled commands
program.on('command:*', (unknownCommand: string[]) => {
  logger.error(`Unknown command: ${unknownCommand[0] ?? ''}`);
  logger.error('Run "repartition --help" for available commands');
  process.exit(1);
});

// Parse command line arguments
program.parseAsync().catch((error: unknown) => {
  logger.error('Command failed', error);
  process.exit(1);
});
