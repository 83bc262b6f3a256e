/**
 * Post-Migration Checks
 *
 * Seven checks comparing the new table against the plan's target
 * configuration and the old table.
 *
 * @module verification/post-migration
 */

import { readString } from '../connectors/rows.js';
import type { CheckResult, IntervalType } from '../contracts/types.js';
import { fail, pass, runDatabaseCheck, warn } from './check-result.js';
import type { CheckContext } from './check-result.js';
import { countRows, effectivePartitionType, getPartitionState, tableExists } from './queries.js';

export type IntervalFunction = 'NUMTODSINTERVAL' | 'NUMTOYMINTERVAL';

/**
 * Interval-function family the catalog should report: day-to-second for
 * HOUR and DAY, year-to-month for WEEK and MONTH.
 */
export function expectedIntervalFunction(intervalType: IntervalType): IntervalFunction {
  return intervalType === 'HOUR' || intervalType === 'DAY' ? 'NUMTODSINTERVAL' : 'NUMTOYMINTERVAL';
}

export async function runPostMigrationChecks(context: CheckContext): Promise<CheckResult[]> {
  return [
    await checkNewTableExists(context),
    await checkPartitionType(context),
    await checkIntervalDefinition(context),
    await checkSubpartitionConfig(context),
    await checkRowCounts(context),
    await checkIndexesCreated(context),
    await checkConstraints(context),
  ];
}

function newTableName(context: CheckContext): string {
  return context.plan.common_settings.new_table_name;
}

// =============================================================================
// CHECKS
// =============================================================================

export function checkNewTableExists(context: CheckContext): Promise<CheckResult> {
  const owner = context.plan.owner;
  const table = newTableName(context);
  const name = `Table Exists: ${owner}.${table}`;

  return runDatabaseCheck(context, name, 'FAIL', 'Error checking table', async (session) => {
    return (await tableExists(session, owner, table))
      ? pass(name, `Table ${owner}.${table} exists`)
      : fail(name, `Table ${owner}.${table} not found`);
  });
}

export function checkPartitionType(context: CheckContext): Promise<CheckResult> {
  const name = 'Partition Type';
  const expected = context.plan.common_settings.target_configuration.partition_type;

  return runDatabaseCheck(context, name, 'FAIL', 'Error checking partition type', async (session) => {
    const state = await getPartitionState(session, context.plan.owner, newTableName(context));
    if (!state) {
      return fail(name, 'Table is not partitioned');
    }

    const actual = effectivePartitionType(state);
    if (actual !== expected) {
      return fail(name, `Partition type is ${actual}, expected ${expected}`, { actual, expected });
    }
    return pass(name, `Partition type is ${actual} as expected`);
  });
}

export function checkIntervalDefinition(context: CheckContext): Promise<CheckResult> {
  const name = 'Interval Definition';
  const intervalType = context.plan.common_settings.target_configuration.interval_type;
  const expected = expectedIntervalFunction(intervalType);

  return runDatabaseCheck(context, name, 'FAIL', 'Error checking interval', async (session) => {
    const state = await getPartitionState(session, context.plan.owner, newTableName(context));
    const actual = state?.interval;
    if (!actual) {
      return fail(name, 'No interval definition found');
    }

    if (actual.toUpperCase().includes(expected)) {
      return pass(name, `Interval definition contains ${expected} as expected`, {
        actual_interval: actual,
      });
    }
    return warn(name, `Interval definition may not match: ${actual}`, {
      actual_interval: actual,
      expected_function: expected,
    });
  });
}

export function checkSubpartitionConfig(context: CheckContext): Promise<CheckResult> {
  const name = 'Subpartition Configuration';
  const target = context.plan.common_settings.target_configuration;
  const expectedType = target.subpartition_type === 'NONE' ? null : target.subpartition_type;
  const expectedCount = target.subpartition_type === 'NONE' ? null : target.subpartition_count;

  return runDatabaseCheck(context, name, 'FAIL', 'Error checking subpartitions', async (session) => {
    const state = await getPartitionState(session, context.plan.owner, newTableName(context));
    if (!state) {
      return warn(name, 'Cannot determine subpartition config');
    }

    const actualType = state.subpartitioning_type;
    // Oracle reports 0 default subpartitions when there are none
    const actualCount = actualType === null ? null : state.def_subpartition_count;

    const issues: string[] = [];
    if (actualType !== expectedType) {
      issues.push(`type is ${actualType ?? 'NONE'}, expected ${expectedType ?? 'NONE'}`);
    }
    if (actualCount !== expectedCount) {
      issues.push(`count is ${actualCount ?? 0}, expected ${expectedCount ?? 0}`);
    }

    if (issues.length > 0) {
      return fail(name, `Subpartition mismatch: ${issues.join('; ')}`, {
        actual_type: actualType,
        actual_count: actualCount,
        expected_type: expectedType,
        expected_count: expectedCount,
      });
    }
    return actualType === null
      ? pass(name, 'No subpartitioning, as configured')
      : pass(name, `Subpartitioning: ${actualType} with ${actualCount ?? 0} subpartitions`);
  });
}

export function checkRowCounts(context: CheckContext): Promise<CheckResult> {
  const name = 'Row Count Match';
  const { owner, table_name } = context.plan;

  return runDatabaseCheck(context, name, 'FAIL', 'Error comparing row counts', async (session) => {
    const oldCount = await countRows(session, owner, table_name);
    const newCount = await countRows(session, owner, newTableName(context));

    if (oldCount === newCount) {
      return pass(name, `Row counts match: ${oldCount.toLocaleString('en-US')} rows`, {
        old_count: oldCount,
        new_count: newCount,
      });
    }

    const difference = Math.abs(oldCount - newCount);
    const diffPercentage = oldCount > 0 ? (difference / oldCount) * 100 : 0;
    return fail(
      name,
      `Row count mismatch: Old=${oldCount.toLocaleString('en-US')}, New=${newCount.toLocaleString('en-US')}, ` +
        `Diff=${difference.toLocaleString('en-US')} (${diffPercentage.toFixed(2)}%)`,
      {
        old_count: oldCount,
        new_count: newCount,
        difference,
        diff_percentage: diffPercentage,
      }
    );
  });
}

export function checkIndexesCreated(context: CheckContext): Promise<CheckResult> {
  const name = 'Indexes Created';

  return runDatabaseCheck(context, name, 'WARN', 'Cannot check indexes', async (session) => {
    const rows = await session.execute(
      `SELECT index_name
         FROM all_indexes
        WHERE table_owner = :owner AND table_name = :table_name`,
      {
        owner: context.plan.owner.toUpperCase(),
        table_name: newTableName(context).toUpperCase(),
      }
    );

    if (rows.length > 0) {
      return pass(name, `Created ${rows.length} index(es)`, {
        indexes: rows.map((row) => readString(row, 'INDEX_NAME')),
      });
    }
    return warn(name, 'No indexes found on new table', {
      expected_index_count: context.plan.current_state.index_count,
    });
  });
}

export function checkConstraints(context: CheckContext): Promise<CheckResult> {
  const name = 'Constraints Enabled';

  return runDatabaseCheck(context, name, 'WARN', 'Cannot check constraints', async (session) => {
    const rows = await session.execute(
      `SELECT constraint_name, constraint_type, status
         FROM all_constraints
        WHERE owner = :owner
          AND table_name = :table_name
          AND constraint_type IN ('P', 'U', 'C')`,
      {
        owner: context.plan.owner.toUpperCase(),
        table_name: newTableName(context).toUpperCase(),
      }
    );

    if (rows.length === 0) {
      return warn(name, 'No constraints found');
    }

    const disabled = rows
      .filter((row) => readString(row, 'STATUS') !== 'ENABLED')
      .map((row) => readString(row, 'CONSTRAINT_NAME'));
    if (disabled.length > 0) {
      return warn(name, `Found ${disabled.length} disabled constraint(s)`, {
        disabled_count: disabled.length,
        disabled_constraints: disabled,
      });
    }
    return pass(name, `All ${rows.length} constraint(s) enabled`);
  });
}
