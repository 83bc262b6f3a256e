/**
 * Recommendation Engine
 *
 * Pure functions mapping a table profile to a target configuration and
 * migration settings. No I/O, no clock, no randomness: identical inputs
 * always give identical outputs.
 *
 * @module discovery/recommend
 */

import type {
  EnvironmentProfile,
  IntervalType,
  MigrationAction,
  MigrationPriority,
  MigrationSettings,
  TableProfile,
  TargetConfiguration,
} from '../contracts/types.js';

/** Boundary literal used for the first interval partition */
export const DEFAULT_INITIAL_PARTITION_VALUE = "TO_DATE('2024-01-01', 'YYYY-MM-DD')";

// =============================================================================
// SIZE / VOLUME HEURISTICS
// =============================================================================

/**
 * HASH subpartition count by table size.
 */
export function hashSubpartitionCount(sizeGb: number): number {
  if (sizeGb > 100) return 16;
  if (sizeGb > 50) return 12;
  if (sizeGb > 10) return 8;
  if (sizeGb > 1) return 4;
  return 2;
}

/**
 * Interval granularity by daily ingest rate, assuming rows accrued over a
 * year. Tables without statistics fall back on size.
 */
export function recommendIntervalType(rowCount: number, sizeGb: number): IntervalType {
  if (rowCount > 0) {
    const rowsPerDay = rowCount / 365;
    if (rowsPerDay > 1_000_000) return 'HOUR';
    if (rowsPerDay > 100_000) return 'DAY';
    return 'MONTH';
  }
  return sizeGb > 100 ? 'DAY' : 'MONTH';
}

export function recommendParallelDegree(sizeGb: number): number {
  if (sizeGb > 100) return 8;
  if (sizeGb > 50) return 6;
  if (sizeGb > 10) return 4;
  return 2;
}

/**
 * Hours to copy the data (about 8 GB/hour) plus rebuilding each index.
 */
export function estimateHours(sizeGb: number, indexCount: number): number {
  const hours = Math.max(sizeGb / 8, 0.1) + indexCount * 0.75;
  return Math.round(hours * 10) / 10;
}

export function recommendPriority(sizeGb: number, lobCount: number): MigrationPriority {
  if (sizeGb > 50) return 'HIGH';
  if (lobCount > 0 || sizeGb > 10) return 'MEDIUM';
  return 'LOW';
}

export function determineMigrationAction(
  isPartitioned: boolean,
  isInterval: boolean,
  hasSubpartitions: boolean
): MigrationAction {
  if (!isPartitioned) return 'add_interval_hash_partitioning';
  if (isInterval && !hasSubpartitions) return 'add_hash_subpartitions';
  if (isInterval && hasSubpartitions) return 'convert_interval_to_interval_hash';
  return 'convert_to_interval_hash';
}

/**
 * A table is a candidate when it has a date column to partition on, a key to
 * hash on, and is not already interval-hash partitioned.
 */
export function shouldEnable(
  profile: Pick<TableProfile, 'available_columns' | 'is_interval' | 'has_subpartitions'>
): boolean {
  const { timestamp_columns, numeric_columns, string_columns } = profile.available_columns;
  const alreadyIntervalHash = Boolean(profile.is_interval) && Boolean(profile.has_subpartitions);
  return (
    timestamp_columns.length > 0 &&
    (numeric_columns.length > 0 || string_columns.length > 0) &&
    !alreadyIntervalHash
  );
}

// =============================================================================
// ENVIRONMENT-AWARE VARIANTS
// =============================================================================

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Subpartition count from the environment's size tiers, clamped to its bounds.
 */
export function environmentSubpartitionCount(sizeGb: number, env: EnvironmentProfile): number {
  const { min_count, max_count, size_based_recommendations } = env.subpartition_defaults;
  const tier = size_based_recommendations.find((t) => sizeGb <= t.max_gb);
  const count = tier ? tier.count : max_count;
  return clamp(count, min_count, max_count);
}

export function environmentParallelDegree(sizeGb: number, env: EnvironmentProfile): number {
  const { min_degree, max_degree } = env.parallel_defaults;
  return clamp(recommendParallelDegree(sizeGb), min_degree, max_degree);
}

// =============================================================================
// TARGET ASSEMBLY
// =============================================================================

/**
 * Target configuration for a profiled table. The existing partition key is
 * kept when it is a date column; otherwise the best-ranked date column wins.
 */
export function buildTargetConfiguration(
  profile: TableProfile,
  env: EnvironmentProfile,
  partitionKeyColumns: string[] = []
): TargetConfiguration {
  const { timestamp_columns, numeric_columns, string_columns } = profile.available_columns;

  const existingKey = partitionKeyColumns.find((key) =>
    timestamp_columns.some((col) => col.name === key)
  );
  const partitionColumn = existingKey ?? timestamp_columns[0]?.name ?? null;
  const hashColumn = numeric_columns[0]?.name ?? string_columns[0]?.name ?? null;

  const { min_count, max_count } = env.subpartition_defaults;

  return {
    partition_type: 'INTERVAL',
    partition_column: partitionColumn,
    interval_type: recommendIntervalType(profile.row_count, profile.size_gb),
    interval_value: 1,
    initial_partition_value: DEFAULT_INITIAL_PARTITION_VALUE,
    subpartition_type: hashColumn ? 'HASH' : 'NONE',
    subpartition_column: hashColumn,
    subpartition_count: hashColumn
      ? clamp(hashSubpartitionCount(profile.size_gb), min_count, max_count)
      : 1,
    tablespace: env.tablespaces.data.primary,
    lob_tablespaces: [...env.tablespaces.data.lob],
    parallel_degree: environmentParallelDegree(profile.size_gb, env),
  };
}

export function buildMigrationSettings(profile: TableProfile): MigrationSettings {
  return {
    estimated_hours: estimateHours(profile.size_gb, profile.index_count),
    priority: recommendPriority(profile.size_gb, profile.lob_count),
    validate_data: true,
    backup_old_table: true,
    drop_old_after_days: 7,
    migrate_data: true,
    enable_delta_load: false,
    delta_interval: 'DAY',
    constraint_validation: true,
    auto_enable_constraints: true,
  };
}
