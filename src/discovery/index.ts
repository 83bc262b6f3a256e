/**
 * Schema Discovery
 *
 * Connects to the source schema, profiles every table matching the
 * include/exclude globs and assembles the migration plan document. Each
 * table's analysis is isolated; a lost connection aborts the whole run.
 *
 * @module discovery
 */

import { withSession } from '../connectors/index.js';
import type { QuerySession, SessionFactory } from '../connectors/index.js';
import { createMigrationError } from '../contracts/errors.js';
import type {
  ConnectionDetails,
  EnvironmentProfile,
  MigrationError,
  MigrationPlanDocument,
  PlanMetadata,
  TableMigrationPlan,
} from '../contracts/types.js';
import { formatTimestamp } from '../utils/format.js';
import { computeDiscoveryHash } from '../utils/hash.js';
import { logger } from '../utils/logger.js';
import { analyzeTable } from './analyze-table.js';
import type { TableAnalysis, TableAnalysisOutcome } from './analyze-table.js';
import { listTables, readSchemaSnapshot } from './catalog-queries.js';
import type { SchemaSnapshot } from './catalog-queries.js';
import { createMetricsCollector, emitDiscoveryMetrics } from './metrics.js';
import type { DiscoveryMetrics } from './metrics.js';

/**
 * Discovery options
 */
export interface DiscoveryOptions {
  /** Schema to analyze (upper-cased) */
  schema: string;
  /** Table name globs (* and ?); any match includes */
  include?: string[];
  /** Table name globs; any match excludes */
  exclude?: string[];
  environment: EnvironmentProfile;
  sessionFactory: SessionFactory;
  /** Service name written to metadata and hashed for provenance */
  databaseService?: string;
  connectionDetails?: ConnectionDetails;
  /** Tables analyzed in parallel, each on its own session. Default 1 */
  concurrency?: number;
  /** Clock override for generated_date */
  now?: () => Date;
}

export interface TableOutcome {
  table_name: string;
  outcome: TableAnalysisOutcome;
}

export interface DiscoveryResult {
  document: MigrationPlanDocument;
  /** "N tables found, M enabled" */
  summary: string;
  outcomes: TableOutcome[];
  warnings: string[];
  errors: MigrationError[];
  metrics: DiscoveryMetrics;
}

/**
 * Main entry point for discovery.
 */
export async function runDiscovery(options: DiscoveryOptions): Promise<DiscoveryResult> {
  const correlationId = generateCorrelationId();
  const metrics = createMetricsCollector();
  metrics.startTimer('total');

  const schema = options.schema.toUpperCase();
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
  const warnings: string[] = [];
  const errors: MigrationError[] = [];

  logger.info('Starting schema discovery', {
    correlationId,
    schema,
    environment: options.environment.name,
    concurrency,
  });

  try {
    const analyses = await withSession(options.sessionFactory, async (session) => {
      const tables = await listTables(session, schema, options.include, options.exclude);
      metrics.increment('tables', tables.length);
      logger.info(`Found ${tables.length} tables`, { schema });

      if (tables.length === 0) {
        const error = createMigrationError(
          'noTables',
          `No tables found in schema ${schema} matching the given filters`,
          { schema, include: options.include, exclude: options.exclude }
        );
        errors.push(error);
        warnings.push(error.message);
        return [];
      }

      metrics.startTimer('snapshot');
      const snapshot = await readSchemaSnapshot(session, schema);
      metrics.stopTimer('snapshot');

      metrics.startTimer('analysis');
      const results =
        concurrency > 1
          ? await analyzeInParallel(options.sessionFactory, schema, tables, snapshot, options.environment, concurrency)
          : await analyzeSequentially(session, schema, tables, snapshot, options.environment);
      metrics.stopTimer('analysis');
      return results;
    });

    const tables: TableMigrationPlan[] = [];
    const outcomes: TableOutcome[] = [];
    for (const analysis of analyses) {
      tables.push(analysis.plan);
      outcomes.push({ table_name: analysis.table_name, outcome: analysis.outcome });
      metrics.increment('size_gb', analysis.plan.current_state.size_gb);

      if (analysis.outcome.status === 'skipped') {
        metrics.increment('tables_skipped');
        errors.push(analysis.outcome.error);
        warnings.push(`${analysis.table_name}: ${analysis.outcome.reason}`);
      } else {
        metrics.increment('tables_analyzed');
      }
      if (analysis.plan.enabled) {
        metrics.increment('tables_enabled');
      }
    }

    const document = assembleDocument(options, schema, tables);
    const enabledCount = document.metadata.tables_selected_for_migration;
    const skippedCount = outcomes.filter((o) => o.outcome.status === 'skipped').length;

    let summary = `${tables.length} tables found, ${enabledCount} enabled`;
    if (skippedCount > 0) {
      summary += ` (${skippedCount} skipped after analysis errors)`;
    }

    metrics.stopTimer('total');
    const collected = metrics.getMetrics();
    emitDiscoveryMetrics(collected, logger, correlationId);
    logger.info(`Discovery complete: ${summary}`, { schema, correlationId });

    return { document, summary, outcomes, warnings, errors, metrics: collected };
  } catch (error) {
    metrics.stopTimer('total');
    logger.error('Discovery failed', { error, correlationId });
    throw error;
  }
}

// =============================================================================
// TABLE ANALYSIS SCHEDULING
// =============================================================================

async function analyzeSequentially(
  session: QuerySession,
  schema: string,
  tables: string[],
  snapshot: SchemaSnapshot,
  env: EnvironmentProfile
): Promise<TableAnalysis[]> {
  const results: TableAnalysis[] = [];
  for (const table of tables) {
    results.push(await analyzeTable(session, schema, table, snapshot, env));
  }
  return results;
}

/**
 * Bounded worker pool. Each worker holds its own session and writes into the
 * slot of the table it claimed, so output order matches the table list.
 */
async function analyzeInParallel(
  factory: SessionFactory,
  schema: string,
  tables: string[],
  snapshot: SchemaSnapshot,
  env: EnvironmentProfile,
  concurrency: number
): Promise<TableAnalysis[]> {
  const slots: Array<TableAnalysis | undefined> = new Array(tables.length).fill(undefined);
  let next = 0;
  let aborted = false;

  const worker = (): Promise<void> =>
    withSession(factory, async (session) => {
      while (!aborted && next < tables.length) {
        const index = next++;
        try {
          slots[index] = await analyzeTable(session, schema, tables[index], snapshot, env);
        } catch (error) {
          aborted = true;
          throw error;
        }
      }
    });

  const workerCount = Math.min(concurrency, tables.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  return slots.filter((slot): slot is TableAnalysis => slot !== undefined);
}

// =============================================================================
// DOCUMENT ASSEMBLY
// =============================================================================

function assembleDocument(
  options: DiscoveryOptions,
  schema: string,
  tables: TableMigrationPlan[]
): MigrationPlanDocument {
  const generatedDate = formatTimestamp(options.now ? options.now() : new Date());
  const service = options.databaseService || options.connectionDetails?.service || 'Unknown';

  const metadata: PlanMetadata = {
    generated_date: generatedDate,
    source_schema: schema,
    environment: options.environment.name,
    source_database_service: service,
    discovery_criteria: formatCriteria(schema, options.include, options.exclude),
    total_tables_found: tables.length,
    tables_selected_for_migration: tables.filter((t) => t.enabled).length,
    discovery_validation_hash: computeDiscoveryHash(generatedDate, schema, service),
  };
  if (options.connectionDetails) {
    metadata.source_connection_details = options.connectionDetails;
  }

  return {
    metadata,
    environment_config: options.environment,
    tables,
  };
}

/**
 * "Schema: APP, Include: ORDERS_*, Exclude: *_TMP"
 */
export function formatCriteria(schema: string, include?: string[], exclude?: string[]): string {
  const parts = [`Schema: ${schema}`];
  if (include && include.length > 0) {
    parts.push(`Include: ${include.join(', ')}`);
  }
  if (exclude && exclude.length > 0) {
    parts.push(`Exclude: ${exclude.join(', ')}`);
  }
  return parts.join(', ');
}

/**
 * Generate a correlation ID for tracing.
 */
function generateCorrelationId(): string {
  const timestamp = new Date().toISOString().replace(/[:-]/g, '').slice(0, 15);
  const random = Math.random().toString(36).substring(2, 8);
  return `disc-${timestamp}-${random}`;
}

export { analyzeTable, baseProfile } from './analyze-table.js';
export type { TableAnalysis, TableAnalysisOutcome } from './analyze-table.js';
export { formatMetricsForDisplay } from './metrics.js';
export type { DiscoveryMetrics } from './metrics.js';
