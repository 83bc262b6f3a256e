/**
 * Recommendation Engine Unit Tests
 *
 * @module tests/discovery/recommend
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_INITIAL_PARTITION_VALUE,
  buildMigrationSettings,
  buildTargetConfiguration,
  determineMigrationAction,
  environmentParallelDegree,
  environmentSubpartitionCount,
  estimateHours,
  hashSubpartitionCount,
  recommendIntervalType,
  recommendParallelDegree,
  recommendPriority,
  shouldEnable,
} from '../../src/discovery/recommend.js';
import { buildTablePlan, globalEnvironment } from '../helpers/fixtures.js';

describe('Recommendation Engine', () => {
  describe('hashSubpartitionCount', () => {
    it('should step up with table size', () => {
      expect(hashSubpartitionCount(0.5)).toBe(2);
      expect(hashSubpartitionCount(1)).toBe(2);
      expect(hashSubpartitionCount(5)).toBe(4);
      expect(hashSubpartitionCount(10)).toBe(4);
      expect(hashSubpartitionCount(30)).toBe(8);
      expect(hashSubpartitionCount(75)).toBe(12);
      expect(hashSubpartitionCount(120)).toBe(16);
    });
  });

  describe('recommendIntervalType', () => {
    it('should pick HOUR above one million rows per day', () => {
      expect(recommendIntervalType(400_000_000, 500)).toBe('HOUR');
    });

    it('should pick DAY above one hundred thousand rows per day', () => {
      expect(recommendIntervalType(50_000_000, 120)).toBe('DAY');
    });

    it('should pick MONTH for low ingest rates', () => {
      expect(recommendIntervalType(1_000_000, 2)).toBe('MONTH');
    });

    it('should fall back on size when there are no statistics', () => {
      expect(recommendIntervalType(0, 150)).toBe('DAY');
      expect(recommendIntervalType(0, 40)).toBe('MONTH');
    });
  });

  describe('recommendParallelDegree', () => {
    it('should scale with size', () => {
      expect(recommendParallelDegree(5)).toBe(2);
      expect(recommendParallelDegree(20)).toBe(4);
      expect(recommendParallelDegree(60)).toBe(6);
      expect(recommendParallelDegree(200)).toBe(8);
    });
  });

  describe('estimateHours', () => {
    it('should add copy time and index rebuild time, rounded to one decimal', () => {
      expect(estimateHours(16, 2)).toBe(3.5);
      expect(estimateHours(0, 0)).toBe(0.1);
    });
  });

  describe('recommendPriority', () => {
    it('should rank large tables HIGH', () => {
      expect(recommendPriority(51, 0)).toBe('HIGH');
    });

    it('should rank LOB tables and medium tables MEDIUM', () => {
      expect(recommendPriority(2, 1)).toBe('MEDIUM');
      expect(recommendPriority(11, 0)).toBe('MEDIUM');
    });

    it('should rank everything else LOW', () => {
      expect(recommendPriority(3, 0)).toBe('LOW');
    });
  });

  describe('determineMigrationAction', () => {
    it('should map partitioning state to an action', () => {
      expect(determineMigrationAction(false, false, false)).toBe('add_interval_hash_partitioning');
      expect(determineMigrationAction(true, true, false)).toBe('add_hash_subpartitions');
      expect(determineMigrationAction(true, true, true)).toBe('convert_interval_to_interval_hash');
      expect(determineMigrationAction(true, false, false)).toBe('convert_to_interval_hash');
    });
  });

  describe('shouldEnable', () => {
    const columns = buildTablePlan().current_state.available_columns;

    it('should enable tables with a date column and a hash key', () => {
      expect(shouldEnable({ available_columns: columns })).toBe(true);
    });

    it('should not enable tables without a date column', () => {
      expect(shouldEnable({ available_columns: { ...columns, timestamp_columns: [] } })).toBe(false);
    });

    it('should not enable tables without any hash key candidate', () => {
      expect(
        shouldEnable({
          available_columns: { ...columns, numeric_columns: [], string_columns: [] },
        })
      ).toBe(false);
    });

    it('should not enable tables already interval-hash partitioned', () => {
      expect(
        shouldEnable({ available_columns: columns, is_interval: true, has_subpartitions: true })
      ).toBe(false);
    });
  });

  describe('environment-aware counts', () => {
    it('should take the first size tier that fits', () => {
      const env = globalEnvironment();
      expect(environmentSubpartitionCount(0.5, env)).toBe(2);
      expect(environmentSubpartitionCount(10, env)).toBe(4);
      expect(environmentSubpartitionCount(75, env)).toBe(12);
      expect(environmentSubpartitionCount(5000, env)).toBe(16);
    });

    it('should clamp parallel degree to the environment maximum', () => {
      const env = globalEnvironment();
      env.parallel_defaults.max_degree = 4;
      expect(environmentParallelDegree(200, env)).toBe(4);
    });
  });

  describe('buildTargetConfiguration', () => {
    it('should prefer an existing date partition key over the ranked column', () => {
      const plan = buildTablePlan('EVENTS', {
        state: {
          available_columns: {
            timestamp_columns: [
              { name: 'CREATED_DATE', type: 'DATE', nullable: 'N' },
              { name: 'EVENT_TS', type: 'TIMESTAMP(6)', nullable: 'N' },
            ],
            numeric_columns: [{ name: 'EVENT_ID', type: 'NUMBER', nullable: 'N' }],
            string_columns: [],
          },
        },
      });

      const target = buildTargetConfiguration(plan.current_state, globalEnvironment(), ['EVENT_TS']);
      expect(target.partition_column).toBe('EVENT_TS');
      expect(target.subpartition_column).toBe('EVENT_ID');
    });

    it('should fall back to a string hash key and use no subpartitions without any key', () => {
      const env = globalEnvironment();
      const withString = buildTablePlan('CODES', {
        state: {
          available_columns: {
            timestamp_columns: [{ name: 'CREATED_DATE', type: 'DATE', nullable: 'N' }],
            numeric_columns: [],
            string_columns: [{ name: 'REGION_CODE', type: 'VARCHAR2(4)', nullable: 'N' }],
          },
        },
      });
      expect(buildTargetConfiguration(withString.current_state, env).subpartition_column).toBe(
        'REGION_CODE'
      );

      const withoutKey = buildTablePlan('NOTES', {
        state: {
          available_columns: {
            timestamp_columns: [{ name: 'CREATED_DATE', type: 'DATE', nullable: 'N' }],
            numeric_columns: [],
            string_columns: [],
          },
        },
      });
      const target = buildTargetConfiguration(withoutKey.current_state, env);
      expect(target.subpartition_type).toBe('NONE');
      expect(target.subpartition_column).toBeNull();
      expect(target.subpartition_count).toBe(1);
    });

    it('should be deterministic for identical inputs', () => {
      const profile = buildTablePlan().current_state;
      const env = globalEnvironment();
      expect(buildTargetConfiguration(profile, env)).toEqual(buildTargetConfiguration(profile, env));
    });

    it('should use the environment tablespaces and the default boundary', () => {
      const env = globalEnvironment();
      const target = buildTargetConfiguration(buildTablePlan().current_state, env);
      expect(target.tablespace).toBe('USERS');
      expect(target.lob_tablespaces).toEqual(['GD_LOB_01', 'GD_LOB_02', 'GD_LOB_03', 'GD_LOB_04']);
      expect(target.initial_partition_value).toBe(DEFAULT_INITIAL_PARTITION_VALUE);
    });
  });

  describe('buildMigrationSettings', () => {
    it('should default to a safe migration', () => {
      const settings = buildMigrationSettings(buildTablePlan().current_state);
      expect(settings).toMatchObject({
        validate_data: true,
        backup_old_table: true,
        drop_old_after_days: 7,
        enable_delta_load: false,
        delta_interval: 'DAY',
      });
      expect(settings.estimated_hours).toBe(4);
      expect(settings.priority).toBe('MEDIUM');
    });
  });
});
