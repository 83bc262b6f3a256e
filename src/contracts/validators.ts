/**
 * Validation Functions
 *
 * Zod schemas for the plan document and the structural validation entry
 * point. Logical checks live in the configuration validator; this module only
 * answers "does the JSON have the right shape".
 *
 * @module contracts/validators
 */

import { z } from 'zod';
import { EnvironmentProfileSchema } from '../config/schema.js';
import type {
  MigrationPlanDocument,
  TableMigrationPlan,
  ValidationResult,
  ValidationError,
} from './types.js';

// =============================================================================
// ZOD SCHEMAS
// =============================================================================

const YesNoSchema = z.enum(['Y', 'N']);

export const IntervalTypeSchema = z.enum(['HOUR', 'DAY', 'WEEK', 'MONTH']);

export const MigrationActionSchema = z.enum([
  'add_interval_hash_partitioning',
  'add_hash_subpartitions',
  'convert_interval_to_interval_hash',
  'convert_to_interval_hash',
]);

/**
 * ColumnInfo schema
 */
const ColumnInfoSchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1),
  length: z.number().optional(),
  precision: z.number().optional(),
  scale: z.number().optional(),
  char_length: z.number().optional(),
  nullable: YesNoSchema,
  default: z.string().optional(),
  is_identity: z.boolean(),
  identity_generation: z.string().optional(),
  identity_sequence: z.string().optional(),
  identity_start_with: z.number().optional(),
  identity_increment_by: z.number().optional(),
  identity_max_value: z.number().optional(),
  identity_min_value: z.number().optional(),
  identity_cache_size: z.number().optional(),
  identity_cycle_flag: YesNoSchema.optional(),
  identity_order_flag: YesNoSchema.optional(),
});

const ColumnCandidateSchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1),
  nullable: YesNoSchema,
});

const IndexInfoSchema = z.object({
  index_name: z.string().min(1),
  index_type: z.string(),
  columns: z.string(),
  uniqueness: z.string(),
  tablespace_name: z.string().nullable(),
  compression: z.string().nullable(),
  pct_free: z.number().nullable(),
  ini_trans: z.number().nullable(),
  max_trans: z.number().nullable(),
  degree: z.string().nullable(),
  partitioned: z.string(),
  is_reverse: z.boolean(),
  locality: z.string().nullable(),
});

const LobStorageInfoSchema = z.object({
  column_name: z.string().min(1),
  segment_name: z.string(),
  tablespace_name: z.string().nullable(),
  original_tablespace: z.string().nullable(),
  securefile: z.string().nullable(),
  compression: z.string().nullable(),
  deduplication: z.string().nullable(),
  in_row: z.string().nullable(),
  chunk: z.number().nullable(),
  cache: z.string().nullable(),
});

const StorageParametersSchema = z.object({
  compression: z.string().nullable(),
  compress_for: z.string().nullable(),
  pct_free: z.number().nullable(),
  ini_trans: z.number().nullable(),
  max_trans: z.number().nullable(),
  initial_extent: z.number().nullable(),
  next_extent: z.number().nullable(),
  buffer_pool: z.string().nullable(),
});

const GrantInfoSchema = z.object({
  grantee: z.string().min(1),
  privilege: z.string().min(1),
  grantable: YesNoSchema,
  grantor: z.string(),
  grant_type: z.literal('OBJECT'),
});

/**
 * TableProfile schema (current_state)
 */
const TableProfileSchema = z.object({
  is_partitioned: z.boolean(),
  partition_type: z.enum(['NONE', 'RANGE', 'LIST', 'HASH', 'REFERENCE', 'SYSTEM', 'INTERVAL']),
  size_gb: z.number().min(0),
  row_count: z.number().int().min(0),
  lob_count: z.number().int().min(0),
  index_count: z.number().int().min(0),
  is_interval: z.boolean().optional(),
  interval_definition: z.string().nullable().optional(),
  current_partition_count: z.number().int().min(0).optional(),
  current_partition_key: z.string().optional(),
  has_subpartitions: z.boolean().optional(),
  subpartition_type: z.string().nullable().optional(),
  subpartition_count: z.number().int().min(0).optional(),
  columns: z.array(ColumnInfoSchema),
  available_columns: z.object({
    timestamp_columns: z.array(ColumnCandidateSchema),
    numeric_columns: z.array(ColumnCandidateSchema),
    string_columns: z.array(ColumnCandidateSchema).max(10),
  }),
  lob_storage: z.array(LobStorageInfoSchema),
  storage_parameters: StorageParametersSchema,
  indexes: z.array(IndexInfoSchema),
  grants: z.array(GrantInfoSchema),
});

/**
 * TargetConfiguration schema. Bounds that the configuration validator reports
 * with domain-specific messages (interval_value, subpartition_count) are only
 * typed here.
 */
const TargetConfigurationSchema = z.object({
  partition_type: z.literal('INTERVAL'),
  partition_column: z.string().min(1).nullable(),
  interval_type: IntervalTypeSchema,
  interval_value: z.number().int(),
  initial_partition_value: z.string().min(1),
  subpartition_type: z.enum(['HASH', 'NONE']),
  subpartition_column: z.string().min(1).nullable(),
  subpartition_count: z.number().int().min(1),
  tablespace: z.string().min(1),
  lob_tablespaces: z.array(z.string().min(1)),
  parallel_degree: z.number().int().min(1),
});

const MigrationSettingsSchema = z.object({
  estimated_hours: z.number().min(0),
  priority: z.enum(['HIGH', 'MEDIUM', 'LOW']),
  validate_data: z.boolean(),
  backup_old_table: z.boolean(),
  drop_old_after_days: z.number().int().min(0),
  migrate_data: z.boolean(),
  enable_delta_load: z.boolean(),
  delta_interval: z.enum(['HOUR', 'DAY']),
  constraint_validation: z.boolean(),
  auto_enable_constraints: z.boolean(),
});

/**
 * TableMigrationPlan schema
 */
export const TableMigrationPlanSchema = z.object({
  enabled: z.boolean(),
  owner: z.string().min(1),
  table_name: z.string().min(1),
  current_state: TableProfileSchema,
  common_settings: z.object({
    new_table_name: z.string().min(1),
    old_table_name: z.string().min(1),
    migration_action: MigrationActionSchema,
    target_configuration: TargetConfigurationSchema,
    migration_settings: MigrationSettingsSchema,
  }),
  discovery_warning: z.string().optional(),
});

const ConnectionDetailsSchema = z.object({
  type: z.enum(['SERVICE_NAME', 'SID', 'UNKNOWN']),
  host: z.string().nullable(),
  port: z.number().int().nullable(),
  service: z.string(),
  user: z.string().nullable(),
});

const PlanMetadataSchema = z.object({
  generated_date: z.string().regex(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/, {
    message: 'Expected "YYYY-MM-DD HH:MM:SS"',
  }),
  source_schema: z.string().min(1),
  environment: z.string().min(1),
  source_database_service: z.string(),
  discovery_criteria: z.string(),
  total_tables_found: z.number().int().min(0),
  tables_selected_for_migration: z.number().int().min(0),
  discovery_validation_hash: z.string().optional(),
  source_connection_details: ConnectionDetailsSchema.optional(),
});

/**
 * MigrationPlanDocument schema - root schema for plan validation
 */
export const MigrationPlanDocumentSchema = z.object({
  metadata: PlanMetadataSchema,
  environment_config: EnvironmentProfileSchema,
  tables: z.array(TableMigrationPlanSchema),
});

/**
 * Lenient view of a document that failed the strict schema: whatever
 * metadata fields are usable, the environment if valid, and the raw tables
 * for per-table parsing.
 */
export const PlanEnvelopeSchema = z
  .object({
    metadata: z
      .object({
        generated_date: z.string().optional().catch(undefined),
        source_schema: z.string().optional().catch(undefined),
        source_database_service: z.string().optional().catch(undefined),
        total_tables_found: z.number().optional().catch(undefined),
        tables_selected_for_migration: z.number().optional().catch(undefined),
        discovery_validation_hash: z.string().optional().catch(undefined),
      })
      .catch({}),
    environment_config: EnvironmentProfileSchema.optional().catch(undefined),
    tables: z.array(z.unknown()).catch([]),
  })
  .catch({ metadata: {}, environment_config: undefined, tables: [] });

export type PlanEnvelope = z.infer<typeof PlanEnvelopeSchema>;

// =============================================================================
// VALIDATION FUNCTIONS
// =============================================================================

/**
 * Validate a plan document against the contract schema.
 * Returns a ValidationResult with either the validated document or errors
 * carrying dotted field paths.
 */
export function validatePlanDocument(document: unknown): ValidationResult<MigrationPlanDocument> {
  const result = MigrationPlanDocumentSchema.safeParse(document);

  if (!result.success) {
    const errors: ValidationError[] = result.error.issues.map((issue) => ({
      path: issue.path.join('.') || '(root)',
      message: issue.message,
    }));
    return { success: false, errors };
  }

  const validated: MigrationPlanDocument = result.data;
  return { success: true, data: validated };
}

/**
 * Validate a single table entry of a plan document.
 */
export function validateTablePlan(table: unknown): ValidationResult<TableMigrationPlan> {
  const result = TableMigrationPlanSchema.safeParse(table);

  if (!result.success) {
    const errors: ValidationError[] = result.error.issues.map((issue) => ({
      path: issue.path.join('.') || '(root)',
      message: issue.message,
    }));
    return { success: false, errors };
  }

  const validated: TableMigrationPlan = result.data;
  return { success: true, data: validated };
}

/**
 * Format validation errors as "path: message" lines.
 */
export function formatValidationErrors(errors: ValidationError[] = []): string[] {
  return errors.map((e) => `${e.path}: ${e.message}`);
}
