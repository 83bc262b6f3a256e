/**
 * Column Classification Unit Tests
 *
 * @module tests/discovery/classify
 */

import { describe, it, expect } from 'vitest';
import {
  classifyColumns,
  isNumericType,
  isStringType,
  isTimestampType,
} from '../../src/discovery/classify.js';
import type { ColumnInfo } from '../../src/contracts/types.js';

function column(name: string, type: string, charLength?: number): ColumnInfo {
  return {
    name,
    type,
    nullable: 'Y',
    is_identity: false,
    ...(charLength !== undefined ? { char_length: charLength } : {}),
  };
}

describe('Column Classification', () => {
  describe('type predicates', () => {
    it('should recognise DATE and every TIMESTAMP variant', () => {
      expect(isTimestampType('DATE')).toBe(true);
      expect(isTimestampType('TIMESTAMP(6)')).toBe(true);
      expect(isTimestampType('TIMESTAMP(6) WITH TIME ZONE')).toBe(true);
      expect(isTimestampType('VARCHAR2')).toBe(false);
    });

    it('should recognise numeric and string types', () => {
      expect(isNumericType('NUMBER')).toBe(true);
      expect(isNumericType('FLOAT')).toBe(false);
      expect(isStringType('NVARCHAR2')).toBe(true);
      expect(isStringType('CLOB')).toBe(false);
    });
  });

  describe('classifyColumns', () => {
    it('should rank preferred timestamp names first', () => {
      const result = classifyColumns([
        column('SHIPPED_AT', 'TIMESTAMP(6)'),
        column('LAST_UPDATE_DATE', 'DATE'),
        column('CREATED_DATE', 'DATE'),
      ]);

      expect(result.timestamp_columns.map((c) => c.name)).toEqual([
        'CREATED_DATE',
        'LAST_UPDATE_DATE',
        'SHIPPED_AT',
      ]);
    });

    it('should rank numeric key names by suffix, keeping column order for ties', () => {
      const result = classifyColumns([
        column('AMOUNT', 'NUMBER'),
        column('BATCH_SEQ', 'NUMBER'),
        column('ORDER_ID', 'NUMBER'),
        column('INVOICE_NUM', 'NUMBER'),
        column('CUSTOMERID', 'NUMBER'),
        column('LINE_ID', 'NUMBER'),
      ]);

      expect(result.numeric_columns.map((c) => c.name)).toEqual([
        'ORDER_ID',
        'LINE_ID',
        'CUSTOMERID',
        'INVOICE_NUM',
        'BATCH_SEQ',
        'AMOUNT',
      ]);
    });

    it('should keep only strings of at most 100 characters and show their length', () => {
      const result = classifyColumns([
        column('DESCRIPTION', 'VARCHAR2', 4000),
        column('REGION_CODE', 'VARCHAR2', 4),
        column('LABEL', 'VARCHAR2', 100),
      ]);

      expect(result.string_columns).toEqual([
        { name: 'REGION_CODE', type: 'VARCHAR2(4)', nullable: 'Y' },
        { name: 'LABEL', type: 'VARCHAR2(100)', nullable: 'Y' },
      ]);
    });

    it('should cap string candidates at ten', () => {
      const columns = Array.from({ length: 12 }, (_, i) => column(`ATTR_${i}`, 'CHAR', 2));
      expect(classifyColumns(columns).string_columns).toHaveLength(10);
    });

    it('should ignore LOB and other types', () => {
      const result = classifyColumns([column('PAYLOAD', 'CLOB'), column('RATIO', 'BINARY_DOUBLE')]);
      expect(result).toEqual({ timestamp_columns: [], numeric_columns: [], string_columns: [] });
    });
  });
});
