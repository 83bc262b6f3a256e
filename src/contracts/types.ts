/**
 * Contract Types - Interface Definitions
 *
 * All TypeScript interfaces for the plan document and the validator outputs.
 * Field names on persisted entities are snake_case because they are the JSON
 * wire format of the plan document.
 *
 * @module contracts/types
 */

// =============================================================================
// COMMON TYPES
// =============================================================================

/** ISO 8601 timestamp string */
export type ISOTimestamp = string;

/** SHA-256 hash string (64 hex characters) */
export type ContentHash = string;

/** Error severity level */
export type ErrorSeverity = 'warning' | 'error' | 'fatal';

/** Log level */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Catalog Y/N flag */
export type YesNo = 'Y' | 'N';

/**
 * Base error structure used throughout the system.
 * Thrown and collected errors all use this shape.
 */
export interface MigrationError {
  /** Machine-readable error code (e.g., "MIG_DB_UNREACHABLE") */
  code: string;
  /** Human-readable error message */
  message: string;
  /** Severity level */
  severity: ErrorSeverity;
  /** When the error occurred */
  timestamp: ISOTimestamp;
  /** Additional context for debugging */
  context?: Record<string, unknown>;
  /** Whether the operation can be retried or the batch can continue */
  recoverable: boolean;
}

// =============================================================================
// PARTITIONING VOCABULARY
// =============================================================================

export type IntervalType = 'HOUR' | 'DAY' | 'WEEK' | 'MONTH';

export type SubpartitionType = 'HASH' | 'NONE';

/** Target partitioning is always interval-based */
export type TargetPartitionType = 'INTERVAL';

/** Partitioning type as reported by the catalog for the existing table */
export type CurrentPartitionType =
  | 'NONE'
  | 'RANGE'
  | 'LIST'
  | 'HASH'
  | 'REFERENCE'
  | 'SYSTEM'
  | 'INTERVAL';

export type MigrationPriority = 'HIGH' | 'MEDIUM' | 'LOW';

export type DeltaInterval = 'HOUR' | 'DAY';

/** Serialized migration action tags */
export type MigrationAction =
  | 'add_interval_hash_partitioning'
  | 'add_hash_subpartitions'
  | 'convert_interval_to_interval_hash'
  | 'convert_to_interval_hash';

// =============================================================================
// TABLE PROFILE (current_state)
// =============================================================================

/**
 * Column metadata as read from the catalog. Never mutated after discovery.
 */
export interface ColumnInfo {
  readonly name: string;
  readonly type: string;
  readonly length?: number;
  readonly precision?: number;
  readonly scale?: number;
  readonly char_length?: number;
  readonly nullable: YesNo;
  readonly default?: string;
  readonly is_identity: boolean;
  readonly identity_generation?: string;
  readonly identity_sequence?: string;
  readonly identity_start_with?: number;
  readonly identity_increment_by?: number;
  readonly identity_max_value?: number;
  readonly identity_min_value?: number;
  readonly identity_cache_size?: number;
  readonly identity_cycle_flag?: YesNo;
  readonly identity_order_flag?: YesNo;
}

/** A column picked out as a partition or subpartition key candidate */
export interface ColumnCandidate {
  name: string;
  type: string;
  nullable: YesNo;
}

export interface AvailableColumns {
  /** DATE / TIMESTAMP family, preferred names first */
  timestamp_columns: ColumnCandidate[];
  /** NUMBER / INTEGER, *_ID names first */
  numeric_columns: ColumnCandidate[];
  /** Short character columns, at most 10 */
  string_columns: ColumnCandidate[];
}

export interface IndexInfo {
  index_name: string;
  index_type: string;
  /** Comma-separated key columns in position order */
  columns: string;
  uniqueness: string;
  tablespace_name: string | null;
  compression: string | null;
  pct_free: number | null;
  ini_trans: number | null;
  max_trans: number | null;
  degree: string | null;
  partitioned: string;
  is_reverse: boolean;
  locality: string | null;
}

export interface LobStorageInfo {
  column_name: string;
  segment_name: string;
  /** Base tablespace with any trailing _NN suffix removed */
  tablespace_name: string | null;
  original_tablespace: string | null;
  securefile: string | null;
  compression: string | null;
  deduplication: string | null;
  in_row: string | null;
  chunk: number | null;
  cache: string | null;
}

export interface StorageParameters {
  compression: string | null;
  compress_for: string | null;
  pct_free: number | null;
  ini_trans: number | null;
  max_trans: number | null;
  initial_extent: number | null;
  next_extent: number | null;
  buffer_pool: string | null;
}

export interface GrantInfo {
  grantee: string;
  privilege: string;
  grantable: YesNo;
  grantor: string;
  grant_type: 'OBJECT';
}

/**
 * Physical profile of an existing table. Created once per discovery run.
 * Partition-state fields are only present when the table is partitioned.
 */
export interface TableProfile {
  is_partitioned: boolean;
  partition_type: CurrentPartitionType;
  size_gb: number;
  row_count: number;
  lob_count: number;
  index_count: number;
  is_interval?: boolean;
  interval_definition?: string | null;
  current_partition_count?: number;
  current_partition_key?: string;
  has_subpartitions?: boolean;
  subpartition_type?: string | null;
  subpartition_count?: number;
  columns: ColumnInfo[];
  available_columns: AvailableColumns;
  lob_storage: LobStorageInfo[];
  storage_parameters: StorageParameters;
  indexes: IndexInfo[];
  grants: GrantInfo[];
}

// =============================================================================
// TARGET CONFIGURATION & SETTINGS
// =============================================================================

export interface TargetConfiguration {
  partition_type: TargetPartitionType;
  partition_column: string | null;
  interval_type: IntervalType;
  interval_value: number;
  /** Boundary literal, e.g. TO_DATE('2024-01-01', 'YYYY-MM-DD') */
  initial_partition_value: string;
  subpartition_type: SubpartitionType;
  subpartition_column: string | null;
  subpartition_count: number;
  tablespace: string;
  lob_tablespaces: string[];
  parallel_degree: number;
}

export interface MigrationSettings {
  estimated_hours: number;
  priority: MigrationPriority;
  validate_data: boolean;
  backup_old_table: boolean;
  drop_old_after_days: number;
  migrate_data: boolean;
  enable_delta_load: boolean;
  delta_interval: DeltaInterval;
  constraint_validation: boolean;
  auto_enable_constraints: boolean;
}

export interface CommonSettings {
  new_table_name: string;
  old_table_name: string;
  migration_action: MigrationAction;
  target_configuration: TargetConfiguration;
  migration_settings: MigrationSettings;
}

export interface TableMigrationPlan {
  enabled: boolean;
  owner: string;
  table_name: string;
  current_state: TableProfile;
  common_settings: CommonSettings;
  /** Set when the table's analysis failed and the profile is partial */
  discovery_warning?: string;
}

// =============================================================================
// ENVIRONMENT PROFILE
// =============================================================================

export interface SizeTier {
  tier: string;
  max_gb: number;
  count: number;
}

export interface EnvironmentProfile {
  name: string;
  tablespaces: {
    data: {
      primary: string;
      lob: string[];
    };
  };
  subpartition_defaults: {
    min_count: number;
    max_count: number;
    size_based_recommendations: SizeTier[];
  };
  parallel_defaults: {
    min_degree: number;
    max_degree: number;
    default_degree: number;
  };
}

// =============================================================================
// PLAN DOCUMENT
// =============================================================================

/** Where discovery ran; never carries the password */
export interface ConnectionDetails {
  type: 'SERVICE_NAME' | 'SID' | 'UNKNOWN';
  host: string | null;
  port: number | null;
  service: string;
  user: string | null;
}

export interface PlanMetadata {
  /** "YYYY-MM-DD HH:MM:SS" */
  generated_date: string;
  source_schema: string;
  environment: string;
  source_database_service: string;
  discovery_criteria: string;
  total_tables_found: number;
  tables_selected_for_migration: number;
  discovery_validation_hash?: ContentHash;
  source_connection_details?: ConnectionDetails;
}

/**
 * Root structure of the repartitioning plan.
 * Producer: discovery. Consumers: configuration validator, migration
 * validator, script renderer. Operators may hand-edit it between steps.
 */
export interface MigrationPlanDocument {
  metadata: PlanMetadata;
  environment_config: EnvironmentProfile;
  tables: TableMigrationPlan[];
}

// =============================================================================
// VALIDATION OUTPUT
// =============================================================================

/**
 * Structured error from schema validation
 */
export interface ValidationError {
  path: string;
  message: string;
}

/**
 * Generic validation result
 */
export interface ValidationResult<T> {
  success: boolean;
  data?: T;
  errors?: ValidationError[];
}

/**
 * Output of the configuration validator. Errors block, warnings do not.
 */
export interface ConfigValidationResult {
  is_valid: boolean;
  errors: string[];
  warnings: string[];
  /** Structured form of each entry in `errors`, in the same order */
  issues: MigrationError[];
}

// =============================================================================
// MIGRATION VERIFICATION
// =============================================================================

export type CheckStatus = 'PASS' | 'WARN' | 'FAIL' | 'SKIP';

export type CheckSuite = 'pre_migration' | 'post_migration' | 'data_comparison';

export interface CheckResult {
  check_name: string;
  status: CheckStatus;
  message: string;
  details: Record<string, unknown>;
  timestamp: ISOTimestamp;
}

export interface VerificationStats {
  total_checks: number;
  passed: number;
  warnings: number;
  failed: number;
  skipped: number;
}
