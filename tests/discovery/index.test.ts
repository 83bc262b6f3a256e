/**
 * Discovery Integration Tests
 *
 * Full discovery runs against an in-process catalog stand-in.
 *
 * @module tests/discovery/index
 */

import { describe, it, expect } from 'vitest';
import { runDiscovery, formatCriteria } from '../../src/discovery/index.js';
import type { DiscoveryOptions } from '../../src/discovery/index.js';
import { createMigrationError } from '../../src/contracts/errors.js';
import type { Row } from '../../src/connectors/index.js';
import { computeDiscoveryHash } from '../../src/utils/hash.js';
import { FakeSession } from '../helpers/fake-session.js';
import { globalEnvironment } from '../helpers/fixtures.js';

const FIXED_NOW = new Date(2026, 2, 1, 9, 30, 0);

interface CatalogTable {
  name: string;
  sizeGb?: number;
  rows?: number;
  partition?: Row;
  partitionKeys?: string[];
  /** Thrown by this table's column lookup */
  columnsError?: unknown;
}

const ORDER_COLUMNS: Row[] = [
  { COLUMN_NAME: 'ORDER_ID', DATA_TYPE: 'NUMBER', DATA_PRECISION: 12, DATA_SCALE: 0, NULLABLE: 'N' },
  { COLUMN_NAME: 'CREATED_DATE', DATA_TYPE: 'DATE', NULLABLE: 'N' },
  { COLUMN_NAME: 'NOTES', DATA_TYPE: 'VARCHAR2', CHAR_LENGTH: 2000, NULLABLE: 'Y' },
];

function catalogSession(tables: CatalogTable[]): FakeSession {
  return new FakeSession()
    .on("NOT LIKE 'BIN$%'", tables.map((t) => ({ TABLE_NAME: t.name })))
    .on(
      'FROM all_part_tables t',
      tables.flatMap((t) => (t.partition ? [{ TABLE_NAME: t.name, ...t.partition }] : []))
    )
    .on(
      'FROM all_tab_statistics',
      tables.flatMap((t) => (t.sizeGb ? [{ TABLE_NAME: t.name, ESTIMATED_GB: t.sizeGb }] : []))
    )
    .on(
      'AS avg_row_len',
      tables.map((t) => ({
        TABLE_NAME: t.name,
        NUM_ROWS: t.rows ?? 0,
        AVG_ROW_LEN: 200,
        TABLESPACE_NAME: 'USERS',
      }))
    )
    .on('FROM all_part_key_columns', (binds) => {
      const table = tables.find((t) => t.name === binds.table_name);
      return (table?.partitionKeys ?? []).map((key) => ({ COLUMN_NAME: key }));
    })
    .on('FROM all_tab_cols', (binds) => {
      const table = tables.find((t) => t.name === binds.table_name);
      if (table?.columnsError !== undefined) {
        throw table.columnsError;
      }
      return ORDER_COLUMNS;
    });
}

function options(session: FakeSession, overrides: Partial<DiscoveryOptions> = {}): DiscoveryOptions {
  return {
    schema: 'app',
    environment: globalEnvironment(),
    sessionFactory: async () => session,
    databaseService: 'ORCLPDB1',
    now: () => FIXED_NOW,
    ...overrides,
  };
}

describe('Discovery', () => {
  it('should plan a large unpartitioned table as enabled interval-hash', async () => {
    const session = catalogSession([{ name: 'BIG_ORDERS', sizeGb: 120, rows: 50_000_000 }]);

    const result = await runDiscovery(options(session));
    const plan = result.document.tables[0];

    expect(plan?.enabled).toBe(true);
    expect(plan?.owner).toBe('APP');
    expect(plan?.common_settings.migration_action).toBe('add_interval_hash_partitioning');
    expect(plan?.common_settings.new_table_name).toBe('BIG_ORDERS_NEW');
    expect(plan?.common_settings.target_configuration).toMatchObject({
      partition_column: 'CREATED_DATE',
      interval_type: 'DAY',
      subpartition_type: 'HASH',
      subpartition_column: 'ORDER_ID',
      subpartition_count: 16,
      parallel_degree: 8,
    });
    expect(plan?.common_settings.migration_settings.priority).toBe('HIGH');
    expect(result.summary).toBe('1 tables found, 1 enabled');
    expect(session.closed).toBe(true);
  });

  it('should stamp metadata and a matching provenance hash', async () => {
    const session = catalogSession([{ name: 'BIG_ORDERS', sizeGb: 120, rows: 50_000_000 }]);

    const { document } = await runDiscovery(options(session, { include: ['BIG*'] }));

    expect(document.metadata).toMatchObject({
      generated_date: '2026-03-01 09:30:00',
      source_schema: 'APP',
      environment: 'global',
      source_database_service: 'ORCLPDB1',
      discovery_criteria: 'Schema: APP, Include: BIG*',
      total_tables_found: 1,
      tables_selected_for_migration: 1,
    });
    expect(document.metadata.discovery_validation_hash).toBe(
      computeDiscoveryHash('2026-03-01 09:30:00', 'APP', 'ORCLPDB1')
    );
  });

  it('should leave an interval-hash table disabled with a conversion action', async () => {
    const session = catalogSession([
      {
        name: 'EVENTS',
        sizeGb: 30,
        rows: 10_000_000,
        partition: {
          PARTITIONING_TYPE: 'RANGE',
          SUBPARTITIONING_TYPE: 'HASH',
          INTERVAL: "NUMTODSINTERVAL(1,'DAY')",
          PARTITION_COUNT: 90,
          DEF_SUBPARTITION_COUNT: 8,
          IS_INTERVAL: 'Y',
        },
        partitionKeys: ['CREATED_DATE'],
      },
    ]);

    const result = await runDiscovery(options(session));
    const plan = result.document.tables[0];

    expect(plan?.enabled).toBe(false);
    expect(plan?.common_settings.migration_action).toBe('convert_interval_to_interval_hash');
    expect(plan?.current_state).toMatchObject({
      is_partitioned: true,
      is_interval: true,
      has_subpartitions: true,
      subpartition_type: 'HASH',
      subpartition_count: 8,
      current_partition_key: 'CREATED_DATE',
    });
    expect(result.outcomes[0]?.outcome.status).toBe('analyzed');
  });

  it('should record a failing table as skipped and continue with the rest', async () => {
    const session = catalogSession([
      {
        name: 'BROKEN',
        sizeGb: 2,
        rows: 100_000,
        columnsError: new Error('ORA-00942: table or view does not exist'),
      },
      { name: 'GOOD', sizeGb: 5, rows: 1_000_000 },
    ]);

    const result = await runDiscovery(options(session));

    expect(result.document.tables.map((t) => t.table_name)).toEqual(['BROKEN', 'GOOD']);

    const broken = result.document.tables[0];
    expect(broken?.enabled).toBe(false);
    expect(broken?.discovery_warning).toBe('Analysis failed: ORA-00942: table or view does not exist');
    expect(broken?.current_state.size_gb).toBe(2);
    expect(result.document.tables[1]?.enabled).toBe(true);

    expect(result.outcomes[0]?.outcome).toMatchObject({ status: 'skipped' });
    expect(result.errors[0]?.code).toBe('DISC_TABLE_ANALYSIS_FAILED');
    expect(result.warnings).toEqual(['BROKEN: ORA-00942: table or view does not exist']);
    expect(result.summary).toBe('2 tables found, 1 enabled (1 skipped after analysis errors)');
    expect(result.metrics.tables_skipped).toBe(1);
    expect(result.metrics.tables_analyzed).toBe(1);
  });

  it('should give every skipped table its own empty column lists', async () => {
    const failure = new Error('ORA-01031: insufficient privileges');
    const session = catalogSession([
      { name: 'LOCKED_A', sizeGb: 2, columnsError: failure },
      { name: 'LOCKED_B', sizeGb: 3, columnsError: failure },
    ]);

    const { document } = await runDiscovery(options(session));
    const [first, second] = document.tables.map((t) => t.current_state.available_columns);

    expect(first).toEqual({ timestamp_columns: [], numeric_columns: [], string_columns: [] });
    expect(first).not.toBe(second);
    first?.timestamp_columns.push({ name: 'CREATED_DATE', type: 'DATE', nullable: 'N' });
    expect(second?.timestamp_columns).toEqual([]);
  });

  it('should abort the run when the connection is lost', async () => {
    const session = catalogSession([
      {
        name: 'ORDERS',
        sizeGb: 5,
        columnsError: createMigrationError(
          'connectionLost',
          'ORA-03113: end-of-file on communication channel'
        ),
      },
    ]);

    await expect(runDiscovery(options(session))).rejects.toMatchObject({
      code: 'MIG_DB_CONNECTION_LOST',
    });
    expect(session.closed).toBe(true);
  });

  it('should return an empty plan with a warning when nothing matches', async () => {
    const session = catalogSession([]);

    const result = await runDiscovery(options(session, { exclude: ['*'] }));

    expect(result.document.tables).toEqual([]);
    expect(result.summary).toBe('0 tables found, 0 enabled');
    expect(result.warnings).toEqual(['No tables found in schema APP matching the given filters']);
    expect(result.errors[0]?.code).toBe('DISC_NO_TABLES');
    expect(result.document.metadata.total_tables_found).toBe(0);
  });

  it('should keep table order when analyzing in parallel on separate sessions', async () => {
    const tables: CatalogTable[] = [
      { name: 'A_EVENTS', sizeGb: 3 },
      { name: 'B_EVENTS', sizeGb: 4 },
      { name: 'C_EVENTS', sizeGb: 5 },
    ];
    const sessions: FakeSession[] = [];
    const factory = async (): Promise<FakeSession> => {
      const session = catalogSession(tables);
      sessions.push(session);
      return session;
    };

    const result = await runDiscovery({
      ...options(catalogSession(tables)),
      sessionFactory: factory,
      concurrency: 2,
    });

    expect(result.document.tables.map((t) => t.table_name)).toEqual([
      'A_EVENTS',
      'B_EVENTS',
      'C_EVENTS',
    ]);
    // One session for the schema-wide reads plus one per worker
    expect(sessions).toHaveLength(3);
    expect(sessions.every((s) => s.closed)).toBe(true);
  });

  describe('formatCriteria', () => {
    it('should list only the filters that were given', () => {
      expect(formatCriteria('APP')).toBe('Schema: APP');
      expect(formatCriteria('APP', ['ORD*'], ['*_TMP', '*_BAK'])).toBe(
        'Schema: APP, Include: ORD*, Exclude: *_TMP, *_BAK'
      );
    });
  });
});
