/**
 * Render Context
 *
 * Flattens a table plan and its environment into the values DDL templates
 * consume. Template rendering itself happens outside this package, behind
 * the ScriptRenderer interface.
 *
 * @module render/context
 */

import type {
  EnvironmentProfile,
  IndexInfo,
  IntervalType,
  LobStorageInfo,
  MigrationAction,
  MigrationPriority,
  SubpartitionType,
  TableMigrationPlan,
} from '../contracts/types.js';
import {
  estimateTime,
  formatRowCount,
  formatSizeGb,
  intervalClause,
  parallelHint,
} from '../utils/format.js';

export interface TableRenderContext {
  owner: string;
  table_name: string;
  new_table_name: string;
  old_table_name: string;
  migration_action: MigrationAction;
  priority: MigrationPriority;

  partition_column: string | null;
  interval_type: IntervalType;
  interval_value: number;
  /** e.g. INTERVAL (NUMTODSINTERVAL(1, 'DAY')) */
  interval_clause: string;
  initial_partition_value: string;
  subpartition_type: SubpartitionType;
  subpartition_column: string | null;
  subpartition_count: number;
  has_subpartitions: boolean;

  tablespace: string;
  lob_tablespaces: string[];
  parallel_degree: number;
  select_hint: string;
  insert_hint: string;

  size_display: string;
  row_count_display: string;
  load_estimate: string;
  index_estimate: string;

  columns: TableMigrationPlan['current_state']['columns'];
  indexes: IndexInfo[];
  lob_storage: LobStorageInfo[];
  grants: TableMigrationPlan['current_state']['grants'];

  backup_old_table: boolean;
  drop_old_after_days: number;
  validate_data: boolean;
  enable_delta_load: boolean;
  delta_interval: TableMigrationPlan['common_settings']['migration_settings']['delta_interval'];

  environment: string;
}

/**
 * Renders a named template against a table's context. Implemented by
 * whatever template engine the script generator uses.
 */
export interface ScriptRenderer {
  render(template: string, context: TableRenderContext): Promise<string>;
}

export function buildRenderContext(
  plan: TableMigrationPlan,
  environment: EnvironmentProfile
): TableRenderContext {
  const { current_state: state, common_settings: settings } = plan;
  const target = settings.target_configuration;
  const migration = settings.migration_settings;
  const hasSubpartitions = target.subpartition_type === 'HASH' && target.subpartition_column !== null;

  return {
    owner: plan.owner,
    table_name: plan.table_name,
    new_table_name: settings.new_table_name,
    old_table_name: settings.old_table_name,
    migration_action: settings.migration_action,
    priority: migration.priority,

    partition_column: target.partition_column,
    interval_type: target.interval_type,
    interval_value: target.interval_value,
    interval_clause: `INTERVAL (${intervalClause(target.interval_type, target.interval_value)})`,
    initial_partition_value: target.initial_partition_value,
    subpartition_type: target.subpartition_type,
    subpartition_column: target.subpartition_column,
    subpartition_count: target.subpartition_count,
    has_subpartitions: hasSubpartitions,

    tablespace: target.tablespace,
    lob_tablespaces:
      target.lob_tablespaces.length > 0 ? target.lob_tablespaces : environment.tablespaces.data.lob,
    parallel_degree: target.parallel_degree,
    select_hint: parallelHint(target.parallel_degree, 'SELECT'),
    insert_hint: parallelHint(target.parallel_degree, 'INSERT'),

    size_display: formatSizeGb(state.size_gb),
    row_count_display: formatRowCount(state.row_count),
    load_estimate: estimateTime(state.size_gb, 'load'),
    index_estimate: estimateTime(state.size_gb, 'index'),

    columns: state.columns,
    indexes: state.indexes,
    lob_storage: state.lob_storage,
    grants: state.grants,

    backup_old_table: migration.backup_old_table,
    drop_old_after_days: migration.drop_old_after_days,
    validate_data: migration.validate_data,
    enable_delta_load: migration.enable_delta_load,
    delta_interval: migration.delta_interval,

    environment: environment.name,
  };
}
