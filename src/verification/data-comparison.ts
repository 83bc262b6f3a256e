/**
 * Data Comparison Checks
 *
 * Four checks comparing old and new table contents: totals, a primary-key
 * sample, partition column range and the spread over the newest partitions.
 *
 * @module verification/data-comparison
 */

import type { BindParameters, BindValue, QuerySession } from '../connectors/index.js';
import { comparableValue, readNumber, readOptionalNumber, readString } from '../connectors/rows.js';
import type { CheckResult } from '../contracts/types.js';
import { fail, pass, runDatabaseCheck, skip, toBindValue, warn } from './check-result.js';
import type { CheckContext } from './check-result.js';
import { assertSafeIdentifier, qualifiedName } from './identifiers.js';
import { countRows } from './queries.js';

/** Keys per IN-list when looking sampled keys up in the new table */
export const SAMPLE_BATCH_SIZE = 250;

/** Sample match percentage at or above which a mismatch is only a warning */
export const SAMPLE_WARN_THRESHOLD = 99;

export const DISTRIBUTION_PARTITIONS = 10;

export async function runDataComparisonChecks(context: CheckContext): Promise<CheckResult[]> {
  return [
    await compareRowCounts(context),
    await compareSampleData(context),
    await compareMinMaxValues(context),
    await checkPartitionDistribution(context),
  ];
}

export type SampleVerdict = 'PASS' | 'WARN' | 'FAIL';

/**
 * 100% found passes, at least 99% warns, anything less fails.
 */
export function classifySampleMatch(matched: number, sampleSize: number): SampleVerdict {
  if (matched >= sampleSize) return 'PASS';
  const percentage = (matched / sampleSize) * 100;
  return percentage >= SAMPLE_WARN_THRESHOLD ? 'WARN' : 'FAIL';
}

// =============================================================================
// CHECKS
// =============================================================================

export function compareRowCounts(context: CheckContext): Promise<CheckResult> {
  const name = 'Total Row Count';
  const { owner, table_name } = context.plan;

  return runDatabaseCheck(context, name, 'FAIL', 'Error comparing row counts', async (session) => {
    const oldCount = await countRows(session, owner, table_name);
    const newCount = await countRows(session, owner, context.plan.common_settings.new_table_name);

    if (oldCount === newCount) {
      return pass(name, `Row counts match: ${oldCount.toLocaleString('en-US')} rows`, {
        count: oldCount,
      });
    }
    return fail(
      name,
      `Row count mismatch: Old=${oldCount.toLocaleString('en-US')}, New=${newCount.toLocaleString('en-US')}`,
      { old_count: oldCount, new_count: newCount }
    );
  });
}

async function primaryKeyColumns(
  session: QuerySession,
  owner: string,
  table: string
): Promise<string[]> {
  const rows = await session.execute(
    `SELECT cols.column_name
       FROM all_constraints cons
       JOIN all_cons_columns cols
         ON cons.constraint_name = cols.constraint_name
        AND cons.owner = cols.owner
      WHERE cons.owner = :owner
        AND cons.table_name = :table_name
        AND cons.constraint_type = 'P'
      ORDER BY cols.position`,
    { owner: owner.toUpperCase(), table_name: table.toUpperCase() }
  );
  return rows.map((row) => readString(row, 'COLUMN_NAME'));
}

/**
 * Distinct sampled keys. A key taken from the leading column of a composite
 * primary key repeats across rows and is looked up once.
 */
export function distinctKeys(values: unknown[]): BindValue[] {
  const seen = new Map<string, BindValue>();
  for (const value of values) {
    const key = toBindValue(value);
    const identity = key instanceof Date ? `d:${key.getTime()}` : `${typeof key}:${String(key)}`;
    if (!seen.has(identity)) seen.set(identity, key);
  }
  return [...seen.values()];
}

async function countFoundKeys(
  session: QuerySession,
  table: string,
  keyColumn: string,
  keys: BindValue[]
): Promise<number> {
  let found = 0;
  for (let start = 0; start < keys.length; start += SAMPLE_BATCH_SIZE) {
    const batch = keys.slice(start, start + SAMPLE_BATCH_SIZE);
    const binds: BindParameters = {};
    const placeholders = batch.map((key, i) => {
      binds[`k${i}`] = key;
      return `:k${i}`;
    });

    const rows = await session.execute(
      `SELECT COUNT(DISTINCT ${keyColumn}) AS cnt FROM ${table} WHERE ${keyColumn} IN (${placeholders.join(', ')})`,
      binds
    );
    const row = rows[0];
    found += row ? readNumber(row, 'CNT') : 0;
  }
  return found;
}

export function compareSampleData(context: CheckContext): Promise<CheckResult> {
  const name = 'Sample Data Comparison';
  const { owner, table_name } = context.plan;

  return runDatabaseCheck(context, name, 'WARN', 'Cannot compare sample data', async (session) => {
    const keyColumns = await primaryKeyColumns(session, owner, table_name);
    const firstKey = keyColumns[0];
    if (firstKey === undefined) {
      return warn(name, 'No primary key found, sample comparison not possible');
    }

    const keyColumn = assertSafeIdentifier(firstKey, 'column');
    const oldTable = qualifiedName(owner, table_name);
    const newTable = qualifiedName(owner, context.plan.common_settings.new_table_name);

    const sampleRows = await session.execute(
      `SELECT ${keyColumn} AS sample_key FROM ${oldTable} WHERE ROWNUM <= :sample_size`,
      { sample_size: context.sampleSize }
    );
    if (sampleRows.length === 0) {
      return warn(name, 'No data to sample');
    }

    const keys = distinctKeys(sampleRows.map((row) => row['SAMPLE_KEY']));
    const matched = await countFoundKeys(session, newTable, keyColumn, keys);
    const percentage = (matched / keys.length) * 100;
    const summary = `${matched}/${keys.length} keys (${percentage.toFixed(1)}%)`;
    const details = {
      sample_size: keys.length,
      sampled_rows: sampleRows.length,
      matched,
      key_column: keyColumn,
    };

    switch (classifySampleMatch(matched, keys.length)) {
      case 'PASS':
        return pass(name, `Sample match: ${summary}`, details);
      case 'WARN':
        return warn(name, `Sample nearly matches: ${summary}`, details);
      case 'FAIL':
        return fail(name, `Sample mismatch: ${summary}`, details);
    }
  });
}

export function compareMinMaxValues(context: CheckContext): Promise<CheckResult> {
  const column = context.plan.common_settings.target_configuration.partition_column;
  const name = `MIN/MAX Values: ${column ?? '(none)'}`;
  if (!column) {
    return Promise.resolve(skip(name, 'No partition column configured'));
  }

  const { owner, table_name } = context.plan;

  return runDatabaseCheck(context, name, 'WARN', 'Cannot compare MIN/MAX', async (session) => {
    const safeColumn = assertSafeIdentifier(column, 'column');
    const range = async (table: string): Promise<[string | null, string | null]> => {
      const rows = await session.execute(
        `SELECT MIN(${safeColumn}) AS min_value, MAX(${safeColumn}) AS max_value FROM ${qualifiedName(owner, table)}`
      );
      const row = rows[0];
      return row ? [comparableValue(row['MIN_VALUE']), comparableValue(row['MAX_VALUE'])] : [null, null];
    };

    const [oldMin, oldMax] = await range(table_name);
    const [newMin, newMax] = await range(context.plan.common_settings.new_table_name);

    if (oldMin === newMin && oldMax === newMax) {
      return pass(name, `MIN/MAX match: ${oldMin ?? 'NULL'} to ${oldMax ?? 'NULL'}`, {
        min: oldMin,
        max: oldMax,
      });
    }
    return fail(
      name,
      `MIN/MAX mismatch: Old=[${oldMin ?? 'NULL'}, ${oldMax ?? 'NULL'}], New=[${newMin ?? 'NULL'}, ${newMax ?? 'NULL'}]`,
      { old_min: oldMin, old_max: oldMax, new_min: newMin, new_max: newMax }
    );
  });
}

export function checkPartitionDistribution(context: CheckContext): Promise<CheckResult> {
  const name = 'Partition Distribution';

  return runDatabaseCheck(context, name, 'WARN', 'Cannot check partition distribution', async (session) => {
    const rows = await session.execute(
      `SELECT partition_name, num_rows
         FROM all_tab_partitions
        WHERE table_owner = :owner
          AND table_name = :table_name
        ORDER BY partition_position DESC
        FETCH FIRST ${DISTRIBUTION_PARTITIONS} ROWS ONLY`,
      {
        owner: context.plan.owner.toUpperCase(),
        table_name: context.plan.common_settings.new_table_name.toUpperCase(),
      }
    );

    if (rows.length === 0) {
      return warn(name, 'No partition statistics found');
    }

    const partitions = rows.map((row) => ({
      name: readString(row, 'PARTITION_NAME'),
      rows: readOptionalNumber(row, 'NUM_ROWS'),
    }));
    const totalRows = partitions.reduce((sum, p) => sum + (p.rows ?? 0), 0);
    const lines = partitions
      .slice(0, 5)
      .map((p) =>
        p.rows ? `  - ${p.name}: ${p.rows.toLocaleString('en-US')} rows` : `  - ${p.name}: (no stats)`
      );

    return pass(
      name,
      `Found ${partitions.length} partition(s), Total rows: ${totalRows.toLocaleString('en-US')}\n${lines.join('\n')}`,
      { partition_count: partitions.length, total_rows: totalRows }
    );
  });
}
