/**
 * Migration Validator Unit Tests
 *
 * @module tests/verification/migration-validator
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { MigrationValidator } from '../../src/verification/migration-validator.js';
import type { CheckSuite } from '../../src/contracts/types.js';
import { FakeSession } from '../helpers/fake-session.js';
import { buildDocument, buildTablePlan } from '../helpers/fixtures.js';

const ALL_SUITES: CheckSuite[] = ['pre_migration', 'post_migration', 'data_comparison'];

/** Clock that advances 2.5 seconds per reading */
function steppingClock(): () => Date {
  const start = new Date(2026, 2, 1, 10, 0, 0).getTime();
  let readings = 0;
  return () => new Date(start + readings++ * 2500);
}

describe('MigrationValidator', () => {
  it('should run every suite offline and count the results', async () => {
    const validator = new MigrationValidator(undefined, buildDocument());

    const results = await validator.validateAll(ALL_SUITES);

    expect(results).toHaveLength(20);
    expect(validator.getResults('pre_migration')).toHaveLength(9);
    expect(validator.getResults('post_migration')).toHaveLength(7);
    expect(validator.getResults('data_comparison')).toHaveLength(4);
    expect(validator.getStats()).toEqual({
      total_checks: 20,
      passed: 2,
      warnings: 0,
      failed: 0,
      skipped: 18,
    });
  });

  it('should count each status from database results', async () => {
    const session = new FakeSession().on('FROM all_tables', [{ CNT: 0 }]);
    const validator = new MigrationValidator(session, buildDocument());

    const results = await validator.validatePreMigration(buildTablePlan());

    expect(results.map((r) => r.status)).toEqual([
      'FAIL',
      'FAIL',
      'FAIL',
      'WARN',
      'PASS',
      'PASS',
      'PASS',
      'SKIP',
      'PASS',
    ]);
    expect(validator.getStats()).toEqual({
      total_checks: 9,
      passed: 4,
      warnings: 1,
      failed: 3,
      skipped: 1,
    });
  });

  it('should only check enabled tables unless tables are named', async () => {
    const document = buildDocument([
      buildTablePlan('ORDERS'),
      buildTablePlan('INVOICES', { enabled: false }),
    ]);
    const validator = new MigrationValidator(undefined, document);

    await validator.validateAll(['post_migration']);
    expect(validator.getResults('post_migration')[0]?.check_name).toBe(
      'Table Exists: APP.ORDERS_NEW'
    );

    validator.reset();
    await validator.validateAll(['post_migration'], ['invoices']);
    expect(validator.getResults('post_migration')[0]?.check_name).toBe(
      'Table Exists: APP.INVOICES_NEW'
    );
    expect(validator.getStats().total_checks).toBe(7);
  });

  it('should use the configured sample size', async () => {
    const session = new FakeSession().on('FROM all_constraints cons', [{ COLUMN_NAME: 'ORDER_ID' }]);
    const validator = new MigrationValidator(session, buildDocument(), { sampleSize: 50 });

    await validator.compareData(buildTablePlan());

    expect(session.callsMatching('AS sample_key')[0]?.binds).toEqual({ sample_size: 50 });
  });

  it('should hand out copies and clear everything on reset', async () => {
    const validator = new MigrationValidator(undefined, buildDocument());
    await validator.validateAll(['data_comparison']);

    validator.getResults('data_comparison').pop();
    validator.getStats().total_checks = 99;
    expect(validator.getResults('data_comparison')).toHaveLength(4);
    expect(validator.getStats().total_checks).toBe(4);

    validator.reset();
    expect(validator.getResults('data_comparison')).toEqual([]);
    expect(validator.getStats()).toEqual({
      total_checks: 0,
      passed: 0,
      warnings: 0,
      failed: 0,
      skipped: 0,
    });
  });

  it('should time the report from the first suite run', async () => {
    const validator = new MigrationValidator(undefined, buildDocument(), { now: steppingClock() });
    await validator.validateAll(ALL_SUITES);

    const report = validator.generateReport();

    expect(report).toContain('**Generated:** 2026-03-01 10:00:02  \n');
    expect(report).toContain('**Duration:** 2.5 seconds  \n');
    expect(report).toContain('**Schema:** APP\n');
    expect(report).toContain('| **Total** | **20** |');
  });

  it('should not report an offline run as successful', async () => {
    const validator = new MigrationValidator(undefined, buildDocument());
    await validator.validateAll(ALL_SUITES);

    const [, recommendations] = validator.generateReport().split('## Recommendations');

    expect(recommendations).toBe(
      '\n\n- **INCOMPLETE:** 18 check(s) were skipped. Run them against the database before proceeding.\n'
    );
  });

  describe('writeReport', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'repartition-report-'));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('should create the directory and write the report', async () => {
      const validator = new MigrationValidator(undefined, buildDocument());
      await validator.validateAll(['pre_migration']);
      const target = path.join(dir, 'reports', 'validation.md');

      const written = await validator.writeReport(target);

      expect(written).toBe(target);
      const content = await fs.readFile(target, 'utf-8');
      expect(content.startsWith('# Migration Validation Report\n')).toBe(true);
      expect(content).toContain('| **Total** | **9** |');
    });

    it('should fail with VERIFY_REPORT_WRITE_FAILED when the path is unusable', async () => {
      const blocker = path.join(dir, 'not-a-directory');
      await fs.writeFile(blocker, 'x', 'utf-8');
      const validator = new MigrationValidator(undefined, buildDocument());

      await expect(validator.writeReport(path.join(blocker, 'report.md'))).rejects.toMatchObject({
        code: 'VERIFY_REPORT_WRITE_FAILED',
      });
    });
  });
});
