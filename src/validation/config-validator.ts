/**
 * Configuration Validator
 *
 * Gatekeeper between discovery and script generation. Runs four tiers over
 * a plan document, in order, none of which stops the others:
 *
 * 1. Structural - Zod schema, errors carry a dotted field path
 * 2. Logical - column membership, bounds, literal grammar, metadata counts,
 *    environment bounds, provenance
 * 3. Database - live catalog lookups for enabled tables (optional)
 * 4. Best practice - sizing heuristics for enabled tables (warnings only)
 *
 * Errors and warnings live in an accumulator created per validate() call,
 * so one instance can validate many documents.
 *
 * @module validation/config-validator
 */

import type { QuerySession, Row } from '../connectors/index.js';
import { readNumber, readOptionalString } from '../connectors/rows.js';
import {
  ERROR_CODES,
  createMigrationError,
  errorMessage,
  isConnectivityError,
  toMigrationError,
} from '../contracts/errors.js';
import type { MigrationErrorType } from '../contracts/errors.js';
import type {
  ConfigValidationResult,
  EnvironmentProfile,
  MigrationError,
  TableMigrationPlan,
} from '../contracts/types.js';
import {
  PlanEnvelopeSchema,
  validatePlanDocument,
  validateTablePlan,
} from '../contracts/validators.js';
import type { PlanEnvelope } from '../contracts/validators.js';
import { isTimestampType } from '../discovery/classify.js';
import { checkProvenance } from '../utils/hash.js';
import { logger } from '../utils/logger.js';

export const MAX_SUBPARTITION_COUNT = 1024;

/** TO_DATE('2024-01-01', 'YYYY-MM-DD') or TO_TIMESTAMP(...) */
export const INITIAL_PARTITION_VALUE_PATTERN =
  /^(TO_DATE|TO_TIMESTAMP)\('[\d\-/ :]+',\s*'[A-Z\-/ :]+'\)$/i;

export const NO_SESSION_WARNING = 'Database validation requested but no connection provided';

export interface ConfigValidatorOptions {
  /** Treat a missing or mismatched provenance hash as an error */
  requireProvenance?: boolean;
}

/**
 * Errors and warnings collected during a single validate() call.
 */
class Findings {
  readonly errors: string[] = [];
  readonly warnings: string[] = [];
  readonly issues: MigrationError[] = [];

  error(message: string, type: MigrationErrorType = 'logicInvalid'): void {
    this.record(message, createMigrationError(type, message));
  }

  /** Error caused by a failed query; keeps the driver's classification */
  queryError(message: string, cause: unknown): void {
    const issue = toMigrationError(cause, ERROR_CODES.MIG_QUERY_FAILED);
    this.record(message, { ...issue, message });
  }

  private record(message: string, issue: MigrationError): void {
    this.errors.push(message);
    this.issues.push(issue);
  }

  warn(message: string): void {
    this.warnings.push(message);
  }

  toResult(): ConfigValidationResult {
    return {
      is_valid: this.errors.length === 0,
      errors: [...this.errors],
      warnings: [...this.warnings],
      issues: [...this.issues],
    };
  }
}

export function isPowerOfTwo(n: number): boolean {
  return Number.isInteger(n) && n > 0 && (n & (n - 1)) === 0;
}

export function isValidInitialPartitionValue(value: string): boolean {
  return value.length > 0 && INITIAL_PARTITION_VALUE_PATTERN.test(value);
}

export class ConfigValidator {
  private readonly session: QuerySession | undefined;
  private readonly requireProvenance: boolean;

  constructor(session?: QuerySession, options: ConfigValidatorOptions = {}) {
    this.session = session;
    this.requireProvenance = options.requireProvenance ?? false;
  }

  /**
   * Validate a plan document. Accepts anything; never throws for a bad
   * document.
   */
  async validate(document: unknown, checkDatabase = false): Promise<ConfigValidationResult> {
    const findings = new Findings();

    // Tier 1: structure
    const structural = validatePlanDocument(document);
    if (!structural.success) {
      for (const issue of structural.errors ?? []) {
        findings.error(`Schema validation: ${issue.path}: ${issue.message}`, 'structureInvalid');
      }
    }

    // Later tiers work on the tables that parse on their own
    const envelope = PlanEnvelopeSchema.parse(document);
    const tables = structural.data ? structural.data.tables : parseTables(envelope.tables);
    const environment = structural.data
      ? structural.data.environment_config
      : envelope.environment_config;

    // Tier 2: logic
    this.validateMetadata(envelope, findings);
    this.validateDuplicates(tables, findings);
    for (const table of tables) {
      this.validateTableLogic(table, environment, findings);
    }

    // Tier 3: database
    if (checkDatabase) {
      if (this.session) {
        await this.validateDatabase(this.session, tables, findings);
      } else {
        findings.warn(NO_SESSION_WARNING);
      }
    }

    // Tier 4: best practice
    for (const table of tables) {
      this.checkBestPractices(table, findings);
    }

    const result = findings.toResult();
    logger.info('Configuration validated', {
      is_valid: result.is_valid,
      errors: result.errors.length,
      warnings: result.warnings.length,
      tables: tables.length,
    });
    return result;
  }

  // ===========================================================================
  // LOGICAL TIER
  // ===========================================================================

  private validateMetadata(envelope: PlanEnvelope, findings: Findings): void {
    const { metadata, tables } = envelope;
    const actualCount = tables.length;
    const enabledCount = tables.filter(isEnabledEntry).length;

    if (metadata.total_tables_found !== undefined && metadata.total_tables_found !== actualCount) {
      findings.warn(
        `Metadata says ${metadata.total_tables_found} tables found, but config has ${actualCount} tables`
      );
    }

    if (
      metadata.tables_selected_for_migration !== undefined &&
      metadata.tables_selected_for_migration !== enabledCount
    ) {
      findings.warn(
        `Metadata says ${metadata.tables_selected_for_migration} tables selected, but ${enabledCount} are enabled`
      );
    }

    const provenance = checkProvenance({
      generated_date: metadata.generated_date ?? '',
      source_schema: metadata.source_schema ?? '',
      source_database_service: metadata.source_database_service ?? '',
      discovery_validation_hash: metadata.discovery_validation_hash,
    });
    if (!provenance.generated) {
      const message =
        provenance.reason === 'missing'
          ? 'Plan has no discovery_validation_hash; it was not produced by schema discovery'
          : 'discovery_validation_hash does not match metadata; the plan metadata was edited after discovery';
      if (this.requireProvenance) {
        findings.error(message, 'provenanceMissing');
      } else {
        findings.warn(message);
      }
    }
  }

  private validateDuplicates(tables: TableMigrationPlan[], findings: Findings): void {
    const seen = new Set<string>();
    const reported = new Set<string>();
    for (const table of tables) {
      const name = table.table_name.toUpperCase();
      if (seen.has(name) && !reported.has(name)) {
        findings.error(`Table ${table.table_name}: duplicate table_name in plan`);
        reported.add(name);
      }
      seen.add(name);
    }
  }

  private validateTableLogic(
    table: TableMigrationPlan,
    environment: EnvironmentProfile | undefined,
    findings: Findings
  ): void {
    const prefix = `Table ${table.table_name}`;
    const state = table.current_state;
    const settings = table.common_settings;
    const target = settings.target_configuration;
    const available = state.available_columns;

    // Partition column
    if (target.partition_column) {
      const timestampColumns = available.timestamp_columns.map((c) => c.name);
      if (!timestampColumns.includes(target.partition_column)) {
        findings.error(
          `${prefix}: partition_column '${target.partition_column}' not in available timestamp columns`
        );
      }
    } else if (target.partition_type === 'INTERVAL') {
      findings.error(`${prefix}: partition_column required for INTERVAL partitioning`);
    }

    // Subpartition column
    if (target.subpartition_column && target.subpartition_type === 'HASH') {
      const hashColumns = [...available.numeric_columns, ...available.string_columns].map(
        (c) => c.name
      );
      if (!hashColumns.includes(target.subpartition_column)) {
        findings.error(
          `${prefix}: subpartition_column '${target.subpartition_column}' not in available columns`
        );
      }
    }

    if (target.interval_value < 1) {
      findings.error(`${prefix}: interval_value must be >= 1`);
    }

    // Subpartition count
    const count = target.subpartition_count;
    if (count > MAX_SUBPARTITION_COUNT) {
      findings.error(
        `${prefix}: subpartition_count ${count} exceeds maximum (${MAX_SUBPARTITION_COUNT})`
      );
    } else if (!isPowerOfTwo(count)) {
      findings.warn(
        `${prefix}: subpartition_count ${count} is not a power of 2 (recommended: 2, 4, 8, 16, 32, ...)`
      );
    }

    // Action consistency
    if (settings.migration_action === 'add_interval_hash_partitioning' && state.is_partitioned) {
      findings.warn(
        `${prefix}: action is 'add_interval_hash_partitioning' but table is already partitioned`
      );
    }
    if (settings.migration_action === 'add_hash_subpartitions' && state.has_subpartitions) {
      findings.warn(
        `${prefix}: action is 'add_hash_subpartitions' but table already has subpartitions`
      );
    }

    if (!isValidInitialPartitionValue(target.initial_partition_value)) {
      findings.error(
        `${prefix}: initial_partition_value must be Oracle TO_DATE format, got: ${target.initial_partition_value}`
      );
    }

    if (environment) {
      this.validateEnvironmentBounds(prefix, table, environment, findings);
    }
  }

  private validateEnvironmentBounds(
    prefix: string,
    table: TableMigrationPlan,
    env: EnvironmentProfile,
    findings: Findings
  ): void {
    const target = table.common_settings.target_configuration;
    const { min_count, max_count } = env.subpartition_defaults;
    const { min_degree, max_degree } = env.parallel_defaults;

    if (
      target.subpartition_type === 'HASH' &&
      (target.subpartition_count < min_count || target.subpartition_count > max_count)
    ) {
      findings.warn(
        `${prefix}: subpartition_count ${target.subpartition_count} outside environment '${env.name}' range (${min_count}-${max_count})`
      );
    }

    if (target.parallel_degree < min_degree || target.parallel_degree > max_degree) {
      findings.warn(
        `${prefix}: parallel_degree ${target.parallel_degree} outside environment '${env.name}' range (${min_degree}-${max_degree})`
      );
    }

    if (target.tablespace !== env.tablespaces.data.primary) {
      findings.warn(
        `${prefix}: tablespace '${target.tablespace}' differs from environment '${env.name}' primary tablespace '${env.tablespaces.data.primary}'`
      );
    }
  }

  // ===========================================================================
  // DATABASE TIER
  // ===========================================================================

  private async validateDatabase(
    session: QuerySession,
    tables: TableMigrationPlan[],
    findings: Findings
  ): Promise<void> {
    for (const table of tables) {
      if (!table.enabled) continue;

      try {
        await this.validateTableInDatabase(session, table, findings);
      } catch (error) {
        // Only connectivity errors reach here; every other failure is per check
        findings.queryError(`Database validation aborted: ${errorMessage(error)}`, error);
        return;
      }
    }
  }

  private async validateTableInDatabase(
    session: QuerySession,
    table: TableMigrationPlan,
    findings: Findings
  ): Promise<void> {
    const owner = table.owner.toUpperCase();
    const name = table.table_name.toUpperCase();
    const prefix = `Table ${owner}.${name}`;
    const target = table.common_settings.target_configuration;

    const run = async <T>(label: string, check: () => Promise<T>): Promise<T | undefined> => {
      try {
        return await check();
      } catch (error) {
        if (isConnectivityError(error)) throw error;
        findings.queryError(`${prefix}: error checking ${label}: ${errorMessage(error)}`, error);
        return undefined;
      }
    };

    const exists = await run('existence', async () => {
      const rows = await session.execute(
        `SELECT COUNT(*) AS cnt FROM all_tables WHERE owner = :schema AND table_name = :table_name`,
        { schema: owner, table_name: name }
      );
      const row = rows[0];
      return row !== undefined && readNumber(row, 'CNT') > 0;
    });
    if (exists === undefined) return;
    if (!exists) {
      findings.error(`${prefix}: table does not exist`);
      return;
    }

    const lookupColumn = (column: string): Promise<Row[]> =>
      session.execute(
        `SELECT data_type, nullable
           FROM all_tab_columns
          WHERE owner = :schema AND table_name = :table_name AND column_name = :col_name`,
        { schema: owner, table_name: name, col_name: column.toUpperCase() }
      );

    if (target.partition_column) {
      const column = target.partition_column;
      const rows = await run('partition column', () => lookupColumn(column));
      if (rows) {
        const row = rows[0];
        if (!row) {
          findings.error(`${prefix}: partition column '${column}' does not exist`);
        } else {
          const dataType = readOptionalString(row, 'DATA_TYPE') ?? 'UNKNOWN';
          if (!isTimestampType(dataType)) {
            findings.warn(
              `${prefix}: partition column '${column}' type '${dataType}' may not be suitable for interval partitioning`
            );
          }
        }
      }
    }

    if (target.subpartition_column) {
      const column = target.subpartition_column;
      const rows = await run('subpartition column', () => lookupColumn(column));
      if (rows) {
        const row = rows[0];
        if (!row) {
          findings.error(`${prefix}: subpartition column '${column}' does not exist`);
        } else if (readOptionalString(row, 'NULLABLE') === 'Y') {
          findings.warn(
            `${prefix}: subpartition column '${column}' allows NULL (may cause uneven distribution)`
          );
        }
      }
    }
  }

  // ===========================================================================
  // BEST PRACTICE TIER
  // ===========================================================================

  private checkBestPractices(table: TableMigrationPlan, findings: Findings): void {
    if (!table.enabled) return;

    const prefix = `Table ${table.table_name}`;
    const state = table.current_state;
    const target = table.common_settings.target_configuration;
    const settings = table.common_settings.migration_settings;
    const size = state.size_gb;
    const sizeText = size.toFixed(1);
    const parallel = target.parallel_degree;
    const subpartitions = target.subpartition_count;

    if (size > 50 && parallel < 4) {
      findings.warn(`${prefix}: Large table (${sizeText} GB) with low parallel degree (${parallel})`);
    }
    if (size < 1 && parallel > 2) {
      findings.warn(`${prefix}: Small table (${sizeText} GB) with high parallel degree (${parallel})`);
    }

    if (size > 100 && subpartitions < 8) {
      findings.warn(
        `${prefix}: Very large table (${sizeText} GB) may benefit from more subpartitions (current: ${subpartitions}, consider: 16)`
      );
    }
    if (size < 1 && subpartitions > 4) {
      findings.warn(
        `${prefix}: Small table (${sizeText} GB) with many subpartitions (${subpartitions}) may cause overhead`
      );
    }

    if (state.lob_count > 0) {
      findings.warn(
        `${prefix}: Table has ${state.lob_count} LOB column(s) - ensure LOB storage is properly configured`
      );
    }

    if (size > 50 && !settings.validate_data) {
      findings.warn(`${prefix}: Large table without data validation enabled`);
    }

    if (!settings.backup_old_table) {
      findings.warn(`${prefix}: Old table backup disabled - no rollback possible`);
    }

    if (state.row_count > 10_000_000 && target.interval_type === 'MONTH') {
      findings.warn(
        `${prefix}: High row count (${state.row_count.toLocaleString('en-US')}) with MONTH interval - consider DAY or HOUR for better performance`
      );
    }
  }
}

function parseTables(entries: unknown[]): TableMigrationPlan[] {
  const tables: TableMigrationPlan[] = [];
  for (const entry of entries) {
    const parsed = validateTablePlan(entry);
    if (parsed.data) {
      tables.push(parsed.data);
    }
  }
  return tables;
}

function isEnabledEntry(entry: unknown): boolean {
  return typeof entry === 'object' && entry !== null && 'enabled' in entry && entry.enabled === true;
}
