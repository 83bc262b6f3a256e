/**
 * Post-Migration Checks Unit Tests
 *
 * @module tests/verification/post-migration
 */

import { describe, it, expect } from 'vitest';
import {
  checkConstraints,
  checkIndexesCreated,
  checkIntervalDefinition,
  checkRowCounts,
  checkSubpartitionConfig,
  expectedIntervalFunction,
  runPostMigrationChecks,
} from '../../src/verification/post-migration.js';
import type { CheckContext } from '../../src/verification/check-result.js';
import type { Row } from '../../src/connectors/index.js';
import type { TableMigrationPlan } from '../../src/contracts/types.js';
import { FakeSession } from '../helpers/fake-session.js';
import { buildTablePlan, globalEnvironment } from '../helpers/fixtures.js';

const INTERVAL_HASH_STATE: Row = {
  PARTITIONING_TYPE: 'RANGE',
  SUBPARTITIONING_TYPE: 'HASH',
  PARTITION_COUNT: 30,
  DEF_SUBPARTITION_COUNT: 8,
  INTERVAL: "NUMTODSINTERVAL(1,'DAY')",
};

function context(
  session: FakeSession | undefined,
  plan: TableMigrationPlan = buildTablePlan()
): CheckContext {
  return { session, plan, environment: globalEnvironment(), sampleSize: 1000 };
}

function migrated(
  oldCount = 5_000_000,
  newCount = oldCount,
  state: Row = INTERVAL_HASH_STATE
): FakeSession {
  return new FakeSession()
    .on('FROM all_tables', [{ CNT: 1 }])
    .on('FROM all_part_tables', [state])
    .on('FROM APP.ORDERS_NEW', [{ CNT: newCount }])
    .on(/FROM APP\.ORDERS$/, [{ CNT: oldCount }])
    .on('FROM all_indexes', [{ INDEX_NAME: 'ORDERS_NEW_PK' }, { INDEX_NAME: 'ORDERS_NEW_IX1' }])
    .on('FROM all_constraints', [
      { CONSTRAINT_NAME: 'ORDERS_NEW_PK', CONSTRAINT_TYPE: 'P', STATUS: 'ENABLED' },
      { CONSTRAINT_NAME: 'ORDERS_NEW_CK1', CONSTRAINT_TYPE: 'C', STATUS: 'ENABLED' },
    ]);
}

describe('Post-Migration Checks', () => {
  it('should map interval types to the catalog interval function', () => {
    expect(expectedIntervalFunction('HOUR')).toBe('NUMTODSINTERVAL');
    expect(expectedIntervalFunction('DAY')).toBe('NUMTODSINTERVAL');
    expect(expectedIntervalFunction('WEEK')).toBe('NUMTOYMINTERVAL');
    expect(expectedIntervalFunction('MONTH')).toBe('NUMTOYMINTERVAL');
  });

  it('should pass a new table that matches the plan', async () => {
    const results = await runPostMigrationChecks(context(migrated()));

    expect(results.map((r) => [r.check_name, r.status, r.message])).toEqual([
      ['Table Exists: APP.ORDERS_NEW', 'PASS', 'Table APP.ORDERS_NEW exists'],
      ['Partition Type', 'PASS', 'Partition type is INTERVAL as expected'],
      ['Interval Definition', 'PASS', 'Interval definition contains NUMTODSINTERVAL as expected'],
      ['Subpartition Configuration', 'PASS', 'Subpartitioning: HASH with 8 subpartitions'],
      ['Row Count Match', 'PASS', 'Row counts match: 5,000,000 rows'],
      ['Indexes Created', 'PASS', 'Created 2 index(es)'],
      ['Constraints Enabled', 'PASS', 'All 2 constraint(s) enabled'],
    ]);
  });

  it('should skip every check offline', async () => {
    const results = await runPostMigrationChecks(context(undefined));

    expect(results).toHaveLength(7);
    expect(results.every((r) => r.status === 'SKIP')).toBe(true);
  });

  it('should warn when a weekly plan shows a day-to-second interval', async () => {
    const plan = buildTablePlan('ORDERS', { target: { interval_type: 'WEEK' } });
    const session = migrated(100, 100, {
      ...INTERVAL_HASH_STATE,
      INTERVAL: "NUMTODSINTERVAL(7,'DAY')",
    });

    const result = await checkIntervalDefinition(context(session, plan));

    expect(result.status).toBe('WARN');
    expect(result.message).toBe("Interval definition may not match: NUMTODSINTERVAL(7,'DAY')");
    expect(result.details).toEqual({
      actual_interval: "NUMTODSINTERVAL(7,'DAY')",
      expected_function: 'NUMTOYMINTERVAL',
    });
  });

  it('should report an unpartitioned new table', async () => {
    const session = new FakeSession().on('FROM all_tables', [{ CNT: 1 }]);

    const results = await runPostMigrationChecks(context(session));

    expect(results.slice(1, 4).map((r) => [r.status, r.message])).toEqual([
      ['FAIL', 'Table is not partitioned'],
      ['FAIL', 'No interval definition found'],
      ['WARN', 'Cannot determine subpartition config'],
    ]);
  });

  it('should fail a subpartition count that differs from the plan', async () => {
    const session = migrated(100, 100, { ...INTERVAL_HASH_STATE, DEF_SUBPARTITION_COUNT: 4 });

    const result = await checkSubpartitionConfig(context(session));

    expect(result.status).toBe('FAIL');
    expect(result.message).toBe('Subpartition mismatch: count is 4, expected 8');
  });

  it('should accept no subpartitioning when the plan has none', async () => {
    const plan = buildTablePlan('ORDERS', {
      target: { subpartition_type: 'NONE', subpartition_column: null, subpartition_count: 1 },
    });
    const session = migrated(100, 100, {
      ...INTERVAL_HASH_STATE,
      SUBPARTITIONING_TYPE: 'NONE',
      DEF_SUBPARTITION_COUNT: 0,
    });

    const result = await checkSubpartitionConfig(context(session, plan));

    expect(result.status).toBe('PASS');
    expect(result.message).toBe('No subpartitioning, as configured');
  });

  it('should fail on a row count difference', async () => {
    const result = await checkRowCounts(context(migrated(1000, 990)));

    expect(result.status).toBe('FAIL');
    expect(result.message).toBe('Row count mismatch: Old=1,000, New=990, Diff=10 (1.00%)');
    expect(result.details).toEqual({
      old_count: 1000,
      new_count: 990,
      difference: 10,
      diff_percentage: 1,
    });
  });

  it('should warn when the new table has no indexes', async () => {
    const session = new FakeSession().on('FROM all_indexes', []);

    const result = await checkIndexesCreated(context(session));

    expect(result.status).toBe('WARN');
    expect(result.message).toBe('No indexes found on new table');
    expect(result.details).toEqual({ expected_index_count: 2 });
  });

  it('should name disabled constraints', async () => {
    const session = new FakeSession().on('FROM all_constraints', [
      { CONSTRAINT_NAME: 'ORDERS_NEW_PK', STATUS: 'ENABLED' },
      { CONSTRAINT_NAME: 'ORDERS_NEW_CK1', STATUS: 'DISABLED' },
    ]);

    const result = await checkConstraints(context(session));

    expect(result.status).toBe('WARN');
    expect(result.message).toBe('Found 1 disabled constraint(s)');
    expect(result.details).toEqual({
      disabled_count: 1,
      disabled_constraints: ['ORDERS_NEW_CK1'],
    });
  });
});
