/**
 * Pre-Migration Checks
 *
 * Nine checks against the source table before any script runs. Every check
 * always produces a result so the report shows the complete picture.
 *
 * @module verification/pre-migration
 */

import type { BindParameters, QuerySession } from '../connectors/index.js';
import { readOptionalNumber, readOptionalString, readString } from '../connectors/rows.js';
import { isConnectivityError } from '../contracts/errors.js';
import type { CheckResult } from '../contracts/types.js';
import { IntervalTypeSchema } from '../contracts/validators.js';
import { isTimestampType } from '../discovery/classify.js';
import { fail, pass, runDatabaseCheck, skip, warn } from './check-result.js';
import type { CheckContext } from './check-result.js';
import { getPartitionState, tableExists } from './queries.js';

export const MAX_INTERVAL_VALUE = 999;

/** Free space needed relative to the current table size (old + new copy) */
export const SPACE_FACTOR = 2;

export async function runPreMigrationChecks(context: CheckContext): Promise<CheckResult[]> {
  return [
    await checkSourceTableExists(context),
    await checkColumnsExist(context),
    await checkColumnTypes(context),
    await checkTablespaceSpace(context),
    await checkTableLocks(context),
    await checkIntervalSyntax(context),
    await checkDependencies(context),
    await checkExistingPartitions(context),
    await checkEnvironmentSettings(context),
  ];
}

// =============================================================================
// CHECKS
// =============================================================================

export function checkSourceTableExists(context: CheckContext): Promise<CheckResult> {
  const { owner, table_name } = context.plan;
  const name = `Table Exists: ${owner}.${table_name}`;

  return runDatabaseCheck(context, name, 'FAIL', 'Error checking table', async (session) => {
    return (await tableExists(session, owner, table_name))
      ? pass(name, `Table ${owner}.${table_name} exists`)
      : fail(name, `Table ${owner}.${table_name} not found`);
  });
}

export function checkColumnsExist(context: CheckContext): Promise<CheckResult> {
  const name = 'Column Existence';
  const { owner, table_name } = context.plan;
  const target = context.plan.common_settings.target_configuration;

  const wanted = [target.partition_column, target.subpartition_column]
    .filter((c): c is string => c !== null)
    .map((c) => c.toUpperCase());
  if (wanted.length === 0) {
    return Promise.resolve(pass(name, 'No columns to validate'));
  }

  return runDatabaseCheck(context, name, 'FAIL', 'Error checking columns', async (session) => {
    const binds: BindParameters = {
      owner: owner.toUpperCase(),
      table_name: table_name.toUpperCase(),
    };
    const placeholders = wanted.map((column, i) => {
      binds[`col${i}`] = column;
      return `:col${i}`;
    });

    const rows = await session.execute(
      `SELECT column_name
         FROM all_tab_columns
        WHERE owner = :owner
          AND table_name = :table_name
          AND column_name IN (${placeholders.join(', ')})`,
      binds
    );
    const found = new Set(rows.map((row) => readString(row, 'COLUMN_NAME')));
    const missing = wanted.filter((c) => !found.has(c));

    if (missing.length > 0) {
      return fail(name, `Missing columns: ${missing.join(', ')}`, { missing_columns: missing });
    }
    return pass(name, `All ${wanted.length} columns exist`);
  });
}

export function checkColumnTypes(context: CheckContext): Promise<CheckResult> {
  const name = 'Column Data Types';
  const { owner, table_name } = context.plan;
  const column = context.plan.common_settings.target_configuration.partition_column;

  if (!column) {
    return Promise.resolve(pass(name, 'No partition column specified'));
  }

  return runDatabaseCheck(context, name, 'FAIL', 'Error checking column type', async (session) => {
    const rows = await session.execute(
      `SELECT data_type, data_length, data_precision
         FROM all_tab_columns
        WHERE owner = :owner
          AND table_name = :table_name
          AND column_name = :column_name`,
      {
        owner: owner.toUpperCase(),
        table_name: table_name.toUpperCase(),
        column_name: column.toUpperCase(),
      }
    );
    const row = rows[0];
    if (!row) {
      return fail(name, `Column ${column} not found`);
    }

    const dataType = readString(row, 'DATA_TYPE');
    if (!isTimestampType(dataType)) {
      return fail(name, `Column ${column} has type ${dataType}, not suitable for INTERVAL`, {
        data_type: dataType,
      });
    }
    return pass(name, `Column ${column} type ${dataType} is suitable`);
  });
}

async function freeSpaceGb(
  session: QuerySession,
  view: 'dba_free_space' | 'user_free_space',
  tablespace: string
): Promise<number | null> {
  const rows = await session.execute(
    `SELECT tablespace_name,
            ROUND(SUM(bytes) / POWER(1024, 3), 2) AS free_gb
       FROM ${view}
      WHERE tablespace_name = :tablespace
      GROUP BY tablespace_name`,
    { tablespace: tablespace.toUpperCase() }
  );
  const row = rows[0];
  return row ? readOptionalNumber(row, 'FREE_GB') : null;
}

export function checkTablespaceSpace(context: CheckContext): Promise<CheckResult> {
  const name = 'Tablespace Space';
  const tablespace = context.plan.common_settings.target_configuration.tablespace;
  const requiredGb = context.plan.current_state.size_gb * SPACE_FACTOR;

  return runDatabaseCheck(context, name, 'WARN', 'Cannot check tablespace space', async (session) => {
    // DBA views need privileges many migration accounts lack
    let freeGb: number | null;
    try {
      freeGb = await freeSpaceGb(session, 'dba_free_space', tablespace);
    } catch (error) {
      if (isConnectivityError(error)) throw error;
      freeGb = null;
    }
    if (freeGb === null) {
      freeGb = await freeSpaceGb(session, 'user_free_space', tablespace);
    }

    if (freeGb === null) {
      return warn(name, 'Cannot determine tablespace free space', {
        tablespace,
        required_gb: requiredGb,
      });
    }
    if (freeGb < requiredGb) {
      return warn(
        name,
        `Tablespace ${tablespace} has ${freeGb.toFixed(2)} GB free, but ${requiredGb.toFixed(2)} GB recommended`,
        { free_gb: freeGb, required_gb: requiredGb }
      );
    }
    return pass(name, `Tablespace ${tablespace} has sufficient space: ${freeGb.toFixed(2)} GB free`);
  });
}

export function checkTableLocks(context: CheckContext): Promise<CheckResult> {
  const { owner, table_name } = context.plan;
  const name = `Table Locks: ${owner}.${table_name}`;

  return runDatabaseCheck(context, name, 'WARN', 'Cannot check locks', async (session) => {
    const rows = await session.execute(
      `SELECT l.sid, l.type, l.lmode, s.username, s.program
         FROM v$lock l
         JOIN v$session s ON l.sid = s.sid
         JOIN all_objects o ON l.id1 = o.object_id
        WHERE o.owner = :owner
          AND o.object_name = :table_name
          AND l.type IN ('TM', 'TX')`,
      { owner: owner.toUpperCase(), table_name: table_name.toUpperCase() }
    );

    if (rows.length > 0) {
      return warn(name, `Found ${rows.length} active lock(s) on table`, {
        lock_count: rows.length,
        sessions: rows.map((row) => readOptionalString(row, 'USERNAME')),
      });
    }
    return pass(name, 'No active locks on table');
  });
}

export function checkIntervalSyntax(context: CheckContext): Promise<CheckResult> {
  const name = 'Interval Syntax';
  const { interval_type, interval_value } = context.plan.common_settings.target_configuration;

  if (!IntervalTypeSchema.safeParse(interval_type).success) {
    return Promise.resolve(
      fail(
        name,
        `Invalid interval type: ${String(interval_type)}. Must be one of ${IntervalTypeSchema.options.join(', ')}`,
        { interval_type }
      )
    );
  }
  if (!Number.isInteger(interval_value) || interval_value < 1 || interval_value > MAX_INTERVAL_VALUE) {
    return Promise.resolve(
      fail(name, `Invalid interval value: ${interval_value}. Must be 1-${MAX_INTERVAL_VALUE}`, {
        interval_value,
      })
    );
  }
  return Promise.resolve(pass(name, `Interval syntax valid: ${interval_type}(${interval_value})`));
}

export function checkDependencies(context: CheckContext): Promise<CheckResult> {
  const { owner, table_name } = context.plan;
  const name = `Dependencies: ${owner}.${table_name}`;

  return runDatabaseCheck(context, name, 'WARN', 'Cannot check dependencies', async (session) => {
    const rows = await session.execute(
      `SELECT constraint_name, r_constraint_name
         FROM all_constraints
        WHERE owner = :owner
          AND table_name = :table_name
          AND constraint_type = 'R'`,
      { owner: owner.toUpperCase(), table_name: table_name.toUpperCase() }
    );

    if (rows.length > 0) {
      return warn(
        name,
        `Found ${rows.length} foreign key constraint(s). Will be disabled during migration.`,
        {
          fk_count: rows.length,
          constraints: rows.map((row) => readString(row, 'CONSTRAINT_NAME')),
        }
      );
    }
    return pass(name, 'No foreign key dependencies');
  });
}

export function checkExistingPartitions(context: CheckContext): Promise<CheckResult> {
  const name = 'Existing Partitions';
  const { owner, table_name, current_state } = context.plan;

  if (!current_state.is_partitioned) {
    return Promise.resolve(skip(name, 'Table is not partitioned'));
  }

  return runDatabaseCheck(context, name, 'WARN', 'Cannot check partitions', async (session) => {
    const state = await getPartitionState(session, owner, table_name);
    if (!state) {
      return pass(name, 'Table is not partitioned');
    }

    let message = `Current: ${state.partitioning_type} partitioning, ${state.partition_count} partitions`;
    if (state.subpartitioning_type) message += `, ${state.subpartitioning_type} subpartitioning`;
    if (state.interval) message += `, INTERVAL: ${state.interval}`;

    return pass(name, message, {
      partition_count: state.partition_count,
      partition_type: state.partitioning_type,
      subpartition_type: state.subpartitioning_type,
      interval: state.interval,
    });
  });
}

/**
 * Plan values against the environment profile bounds.
 */
export function checkEnvironmentSettings(context: CheckContext): Promise<CheckResult> {
  const name = 'Environment Settings';
  const env = context.environment;
  const target = context.plan.common_settings.target_configuration;
  const { min_count, max_count } = env.subpartition_defaults;
  const { min_degree, max_degree } = env.parallel_defaults;
  const issues: string[] = [];

  if (target.subpartition_count < min_count) {
    issues.push(`Subpartition count ${target.subpartition_count} below environment minimum ${min_count}`);
  } else if (target.subpartition_count > max_count) {
    issues.push(`Subpartition count ${target.subpartition_count} above environment maximum ${max_count}`);
  }

  if (target.parallel_degree < min_degree) {
    issues.push(`Parallel degree ${target.parallel_degree} below environment minimum ${min_degree}`);
  } else if (target.parallel_degree > max_degree) {
    issues.push(`Parallel degree ${target.parallel_degree} above environment maximum ${max_degree}`);
  }

  const primary = env.tablespaces.data.primary;
  if (target.tablespace !== primary) {
    issues.push(`Tablespace ${target.tablespace} differs from environment default ${primary}`);
  }

  const details = {
    environment: env.name,
    subpartition_count: target.subpartition_count,
    parallel_degree: target.parallel_degree,
    tablespace: target.tablespace,
  };

  return Promise.resolve(
    issues.length > 0
      ? warn(name, issues.join('; '), details)
      : pass(name, `Settings within environment limits: ${env.name}`, details)
  );
}
