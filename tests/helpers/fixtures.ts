/**
 * Plan document fixtures.
 *
 * buildDocument() yields a document the configuration validator accepts
 * with no errors and no warnings; tests change one thing at a time.
 */

import type {
  EnvironmentProfile,
  MigrationPlanDocument,
  MigrationSettings,
  TableMigrationPlan,
  TableProfile,
  TargetConfiguration,
} from '../../src/contracts/types.js';
import { computeDiscoveryHash } from '../../src/utils/hash.js';
import { BUILTIN_GLOBAL_PROFILE } from '../../src/utils/environment.js';

export const TEST_SCHEMA = 'APP';
export const TEST_SERVICE = 'ORCLPDB1';
export const TEST_GENERATED_DATE = '2026-03-01 09:30:00';

export function globalEnvironment(): EnvironmentProfile {
  return structuredClone({ name: 'global', ...BUILTIN_GLOBAL_PROFILE });
}

export interface TablePlanOverrides {
  enabled?: boolean;
  owner?: string;
  state?: Partial<TableProfile>;
  target?: Partial<TargetConfiguration>;
  settings?: Partial<MigrationSettings>;
}

export function buildTablePlan(
  tableName = 'ORDERS',
  overrides: TablePlanOverrides = {}
): TableMigrationPlan {
  const state: TableProfile = {
    is_partitioned: false,
    partition_type: 'NONE',
    size_gb: 20,
    row_count: 5_000_000,
    lob_count: 0,
    index_count: 2,
    columns: [
      { name: 'ORDER_ID', type: 'NUMBER', precision: 12, scale: 0, nullable: 'N', is_identity: false },
      { name: 'CUSTOMER_ID', type: 'NUMBER', precision: 12, scale: 0, nullable: 'Y', is_identity: false },
      { name: 'CREATED_DATE', type: 'DATE', nullable: 'N', is_identity: false },
      { name: 'STATUS_CODE', type: 'VARCHAR2', char_length: 10, nullable: 'Y', is_identity: false },
    ],
    available_columns: {
      timestamp_columns: [{ name: 'CREATED_DATE', type: 'DATE', nullable: 'N' }],
      numeric_columns: [
        { name: 'ORDER_ID', type: 'NUMBER', nullable: 'N' },
        { name: 'CUSTOMER_ID', type: 'NUMBER', nullable: 'Y' },
      ],
      string_columns: [{ name: 'STATUS_CODE', type: 'VARCHAR2(10)', nullable: 'Y' }],
    },
    lob_storage: [],
    storage_parameters: {
      compression: 'DISABLED',
      compress_for: null,
      pct_free: 10,
      ini_trans: 1,
      max_trans: 255,
      initial_extent: 65536,
      next_extent: 1048576,
      buffer_pool: 'DEFAULT',
    },
    indexes: [],
    grants: [],
    ...overrides.state,
  };

  const target: TargetConfiguration = {
    partition_type: 'INTERVAL',
    partition_column: 'CREATED_DATE',
    interval_type: 'DAY',
    interval_value: 1,
    initial_partition_value: "TO_DATE('2024-01-01', 'YYYY-MM-DD')",
    subpartition_type: 'HASH',
    subpartition_column: 'ORDER_ID',
    subpartition_count: 8,
    tablespace: 'USERS',
    lob_tablespaces: ['GD_LOB_01', 'GD_LOB_02', 'GD_LOB_03', 'GD_LOB_04'],
    parallel_degree: 4,
    ...overrides.target,
  };

  const settings: MigrationSettings = {
    estimated_hours: 4,
    priority: 'MEDIUM',
    validate_data: true,
    backup_old_table: true,
    drop_old_after_days: 7,
    migrate_data: true,
    enable_delta_load: false,
    delta_interval: 'DAY',
    constraint_validation: true,
    auto_enable_constraints: true,
    ...overrides.settings,
  };

  return {
    enabled: overrides.enabled ?? true,
    owner: overrides.owner ?? TEST_SCHEMA,
    table_name: tableName,
    current_state: state,
    common_settings: {
      new_table_name: `${tableName}_NEW`,
      old_table_name: `${tableName}_OLD`,
      migration_action: 'add_interval_hash_partitioning',
      target_configuration: target,
      migration_settings: settings,
    },
  };
}

export function buildDocument(
  tables: TableMigrationPlan[] = [buildTablePlan()],
  environment: EnvironmentProfile = globalEnvironment()
): MigrationPlanDocument {
  return {
    metadata: {
      generated_date: TEST_GENERATED_DATE,
      source_schema: TEST_SCHEMA,
      environment: environment.name,
      source_database_service: TEST_SERVICE,
      discovery_criteria: `Schema: ${TEST_SCHEMA}`,
      total_tables_found: tables.length,
      tables_selected_for_migration: tables.filter((t) => t.enabled).length,
      discovery_validation_hash: computeDiscoveryHash(TEST_GENERATED_DATE, TEST_SCHEMA, TEST_SERVICE),
    },
    environment_config: environment,
    tables,
  };
}
