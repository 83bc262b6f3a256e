/**
 * Catalog Reader Unit Tests
 *
 * @module tests/discovery/catalog-queries
 */

import { describe, it, expect } from 'vitest';
import {
  baseTablespaceName,
  buildNameFilter,
  getColumns,
  getPartitionInfo,
  globToLike,
  listTables,
} from '../../src/discovery/catalog-queries.js';
import { FakeSession } from '../helpers/fake-session.js';

describe('Catalog Reader', () => {
  describe('globToLike', () => {
    it('should translate * and ? and upper-case the pattern', () => {
      expect(globToLike('orders*')).toBe('ORDERS%');
      expect(globToLike('LOG_?')).toBe('LOG\\__');
    });

    it('should escape literal LIKE wildcards', () => {
      expect(globToLike('A%B')).toBe('A\\%B');
    });
  });

  describe('buildNameFilter', () => {
    it('should return an empty clause without patterns', () => {
      expect(buildNameFilter()).toEqual({ clause: '', binds: {} });
    });

    it('should OR includes together and AND each exclude', () => {
      const filter = buildNameFilter(['ORD*', 'INV*'], ['*_TMP']);

      expect(filter.clause).toBe(
        " AND (table_name LIKE :inc0 ESCAPE '\\' OR table_name LIKE :inc1 ESCAPE '\\')" +
          " AND table_name NOT LIKE :exc0 ESCAPE '\\'"
      );
      expect(filter.binds).toEqual({ inc0: 'ORD%', inc1: 'INV%', exc0: '%\\_TMP' });
    });
  });

  describe('baseTablespaceName', () => {
    it('should strip a two-digit suffix only', () => {
      expect(baseTablespaceName('LOB_DATA_03')).toBe('LOB_DATA');
      expect(baseTablespaceName('LOB_DATA_3')).toBe('LOB_DATA_3');
      expect(baseTablespaceName(null)).toBeNull();
    });
  });

  describe('listTables', () => {
    it('should bind the schema and the name patterns', async () => {
      const session = new FakeSession().on("NOT LIKE 'BIN$%'", [
        { TABLE_NAME: 'ORDERS' },
        { TABLE_NAME: 'ORDER_LINES' },
      ]);

      const tables = await listTables(session, 'APP', ['ORD*']);

      expect(tables).toEqual(['ORDERS', 'ORDER_LINES']);
      expect(session.calls[0]?.binds).toEqual({ schema: 'APP', inc0: 'ORD%' });
    });
  });

  describe('getPartitionInfo', () => {
    it('should treat NONE subpartitioning as absent', async () => {
      const session = new FakeSession().on('FROM all_part_tables t', [
        {
          TABLE_NAME: 'EVENTS',
          PARTITIONING_TYPE: 'RANGE',
          SUBPARTITIONING_TYPE: 'NONE',
          INTERVAL: "NUMTOYMINTERVAL(1,'MONTH')",
          PARTITION_COUNT: 24,
          DEF_SUBPARTITION_COUNT: 0,
          IS_INTERVAL: 'Y',
        },
      ]);

      const info = await getPartitionInfo(session, 'APP');

      expect(info.get('EVENTS')).toEqual({
        partitioning_type: 'RANGE',
        subpartitioning_type: null,
        interval_definition: "NUMTOYMINTERVAL(1,'MONTH')",
        partition_count: 24,
        def_subpartition_count: 0,
        is_interval: true,
      });
    });
  });

  describe('getColumns', () => {
    it('should merge identity details and omit absent attributes', async () => {
      const session = new FakeSession()
        .on('FROM all_tab_identity_cols', [
          {
            COLUMN_NAME: 'ORDER_ID',
            GENERATION_TYPE: 'BY DEFAULT',
            SEQUENCE_NAME: 'ISEQ$$_1001',
            MIN_VALUE: 1,
            MAX_VALUE: null,
            INCREMENT_BY: 1,
            CACHE_SIZE: 20,
            CYCLE_FLAG: 'N',
            ORDER_FLAG: 'N',
            START_VALUE: 500,
          },
        ])
        .on('FROM all_tab_cols', [
          {
            COLUMN_NAME: 'ORDER_ID',
            DATA_TYPE: 'NUMBER',
            DATA_LENGTH: 22,
            DATA_PRECISION: 12,
            DATA_SCALE: 0,
            NULLABLE: 'N',
            DATA_DEFAULT: null,
            CHAR_LENGTH: 0,
          },
          {
            COLUMN_NAME: 'STATUS_CODE',
            DATA_TYPE: 'VARCHAR2',
            DATA_LENGTH: 10,
            DATA_PRECISION: null,
            DATA_SCALE: null,
            NULLABLE: 'Y',
            DATA_DEFAULT: "'NEW' ",
            CHAR_LENGTH: 10,
          },
        ]);

      const columns = await getColumns(session, 'APP', 'ORDERS');

      expect(columns).toEqual([
        {
          name: 'ORDER_ID',
          type: 'NUMBER',
          length: 22,
          precision: 12,
          scale: 0,
          nullable: 'N',
          is_identity: true,
          identity_generation: 'BY DEFAULT',
          identity_sequence: 'ISEQ$$_1001',
          identity_start_with: 500,
          identity_increment_by: 1,
          identity_min_value: 1,
          identity_cache_size: 20,
          identity_cycle_flag: 'N',
          identity_order_flag: 'N',
        },
        {
          name: 'STATUS_CODE',
          type: 'VARCHAR2',
          length: 10,
          char_length: 10,
          nullable: 'Y',
          default: "'NEW'",
          is_identity: false,
        },
      ]);
    });
  });
});
