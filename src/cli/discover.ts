/**
 * Discover CLI Command
 *
 * Analyzes a schema and writes the repartitioning plan document.
 * Usage: repartition discover --schema <name> [options]
 *
 * @module cli/discover
 */

import chalk from 'chalk';
import { runDiscovery, formatMetricsForDisplay } from '../discovery/index.js';
import { errorMessage } from '../contracts/errors.js';
import { savePlan } from '../utils/plan-io.js';
import { displayDiscoverySummary } from './plan-display.js';
import { loadRuntime, openDatabase } from './runtime.js';

export interface DiscoverCommandOptions {
  schema: string;
  include?: string[];
  exclude?: string[];
  env?: string;
  connection?: string;
  config?: string;
  output: string;
  concurrency: number;
  json?: boolean;
}

/**
 * Run discovery and save the plan. Returns the process exit code.
 */
export async function runDiscoverCommand(options: DiscoverCommandOptions): Promise<number> {
  try {
    console.log(chalk.cyan('\nRepartitioning Planner - Schema Discovery\n'));
    const startTime = Date.now();
    console.log(chalk.dim(`[Discovery] Started at ${new Date().toLocaleTimeString()}`));

    const { environment, settings } = await loadRuntime(options.env, options.config);
    const { connection, sessionFactory } = openDatabase(settings, options.connection);
    console.log(chalk.dim(`[Discovery] ${connection.displayString} (environment: ${environment.name})`));

    const result = await runDiscovery({
      schema: options.schema,
      include: options.include,
      exclude: options.exclude,
      environment,
      sessionFactory,
      databaseService: connection.details.service,
      connectionDetails: connection.details,
      concurrency: options.concurrency,
    });

    const duration = Date.now() - startTime;
    const minutes = Math.floor(duration / 60000);
    const seconds = Math.floor((duration % 60000) / 1000);
    console.log(chalk.dim(`[Discovery] Completed in ${minutes}m ${seconds}s`));

    if (options.json) {
      console.log(JSON.stringify(result.document, null, 2));
    } else {
      displayDiscoverySummary(result);
      console.log('\n' + formatMetricsForDisplay(result.metrics));
    }

    const savedPath = await savePlan(result.document, options.output);
    console.log(chalk.green(`\n✓ Plan saved to: ${savedPath}`));
    console.log(chalk.dim('  Review the plan, then run: repartition validate'));
    return 0;
  } catch (error) {
    console.error(chalk.red(`\n✗ Discovery failed: ${errorMessage(error)}`));
    return 1;
  }
}
