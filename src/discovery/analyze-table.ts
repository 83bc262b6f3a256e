/**
 * Per-Table Analysis
 *
 * Builds one TableMigrationPlan from the schema snapshot plus the table's own
 * detail queries. A failing table is recorded with whatever the snapshot
 * already knew and is left disabled; only a lost connection escapes.
 *
 * @module discovery/analyze-table
 */

import type { QuerySession } from '../connectors/index.js';
import {
  errorMessage,
  isConnectivityError,
  toMigrationError,
  ERROR_CODES,
} from '../contracts/errors.js';
import type {
  AvailableColumns,
  EnvironmentProfile,
  MigrationError,
  TableMigrationPlan,
  TableProfile,
} from '../contracts/types.js';
import { logger } from '../utils/logger.js';
import {
  EMPTY_STORAGE_PARAMETERS,
  getColumns,
  getGrants,
  getIndexes,
  getLobStorage,
  getPartitionKeys,
  getStorageParameters,
} from './catalog-queries.js';
import type { SchemaSnapshot } from './catalog-queries.js';
import { classifyColumns } from './classify.js';
import {
  buildMigrationSettings,
  buildTargetConfiguration,
  determineMigrationAction,
  shouldEnable,
} from './recommend.js';

// =============================================================================
// TYPES
// =============================================================================

export type TableAnalysisOutcome =
  | { status: 'analyzed' }
  | { status: 'skipped'; reason: string; error: MigrationError };

export interface TableAnalysis {
  table_name: string;
  plan: TableMigrationPlan;
  outcome: TableAnalysisOutcome;
}

function noColumns(): AvailableColumns {
  return { timestamp_columns: [], numeric_columns: [], string_columns: [] };
}

// =============================================================================
// PROFILE ASSEMBLY
// =============================================================================

/**
 * Profile fields known from the schema-wide snapshot alone.
 */
export function baseProfile(table: string, snapshot: SchemaSnapshot): TableProfile {
  const partition = snapshot.partitions.get(table);
  const profile: TableProfile = {
    is_partitioned: partition !== undefined,
    partition_type: partition?.partitioning_type ?? 'NONE',
    size_gb: snapshot.sizes.get(table) ?? 0,
    row_count: snapshot.stats.get(table)?.num_rows ?? 0,
    lob_count: snapshot.lobCounts.get(table) ?? 0,
    index_count: snapshot.indexCounts.get(table) ?? 0,
    columns: [],
    available_columns: noColumns(),
    lob_storage: [],
    storage_parameters: { ...EMPTY_STORAGE_PARAMETERS },
    indexes: [],
    grants: [],
  };

  if (partition) {
    profile.is_interval = partition.is_interval;
    profile.interval_definition = partition.interval_definition;
    profile.current_partition_count = partition.partition_count;
    profile.has_subpartitions = partition.subpartitioning_type !== null;
    profile.subpartition_type = partition.subpartitioning_type;
    profile.subpartition_count = partition.def_subpartition_count;
  }

  return profile;
}

function assemblePlan(
  schema: string,
  table: string,
  profile: TableProfile,
  env: EnvironmentProfile,
  partitionKeys: string[]
): TableMigrationPlan {
  return {
    enabled: shouldEnable(profile),
    owner: schema,
    table_name: table,
    current_state: profile,
    common_settings: {
      new_table_name: `${table}_NEW`,
      old_table_name: `${table}_OLD`,
      migration_action: determineMigrationAction(
        profile.is_partitioned,
        Boolean(profile.is_interval),
        Boolean(profile.has_subpartitions)
      ),
      target_configuration: buildTargetConfiguration(profile, env, partitionKeys),
      migration_settings: buildMigrationSettings(profile),
    },
  };
}

// =============================================================================
// ANALYSIS
// =============================================================================

/**
 * Analyze one table. Connectivity errors are rethrown; anything else yields
 * a disabled plan with a discovery_warning.
 */
export async function analyzeTable(
  session: QuerySession,
  schema: string,
  table: string,
  snapshot: SchemaSnapshot,
  env: EnvironmentProfile
): Promise<TableAnalysis> {
  const profile = baseProfile(table, snapshot);

  try {
    const partitionKeys = profile.is_partitioned
      ? await getPartitionKeys(session, schema, table)
      : [];
    if (partitionKeys.length > 0) {
      profile.current_partition_key = partitionKeys.join(', ');
    }

    const columns = await getColumns(session, schema, table);
    profile.columns = columns;
    profile.available_columns = classifyColumns(columns);
    profile.lob_storage = await getLobStorage(session, schema, table);
    profile.storage_parameters = await getStorageParameters(session, schema, table);
    profile.indexes = await getIndexes(session, schema, table);
    profile.grants = await getGrants(session, schema, table);

    logger.debug('Table analyzed', {
      table,
      size_gb: profile.size_gb,
      columns: columns.length,
      indexes: profile.indexes.length,
    });

    return {
      table_name: table,
      plan: assemblePlan(schema, table, profile, env, partitionKeys),
      outcome: { status: 'analyzed' },
    };
  } catch (error) {
    if (isConnectivityError(error)) {
      throw error;
    }

    const reason = errorMessage(error);
    const migrationError = toMigrationError(error, ERROR_CODES.DISC_TABLE_ANALYSIS_FAILED, 'warning');
    logger.warn('Table analysis failed, recording partial profile', {
      table,
      code: migrationError.code,
      reason,
    });

    // Partial profile: snapshot stats only, detail lists empty
    const partial = baseProfile(table, snapshot);
    const plan = assemblePlan(schema, table, partial, env, []);
    plan.enabled = false;
    plan.discovery_warning = `Analysis failed: ${reason}`;

    return {
      table_name: table,
      plan,
      outcome: { status: 'skipped', reason, error: migrationError },
    };
  }
}
