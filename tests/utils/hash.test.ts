/**
 * Hash Utilities Unit Tests
 *
 * @module tests/utils/hash
 */

import { describe, it, expect } from 'vitest';
import {
  checkProvenance,
  computeDiscoveryHash,
  computeHash,
  verifyHash,
} from '../../src/utils/hash.js';

const METADATA = {
  generated_date: '2026-03-01 09:30:00',
  source_schema: 'APP',
  source_database_service: 'ORCLPDB1',
};

describe('Hash Utilities', () => {
  it('should compute a SHA-256 hex digest', () => {
    expect(computeHash('abc')).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
    );
    expect(verifyHash('abc', computeHash('abc'))).toBe(true);
  });

  it('should hash the discovery marker built from the three metadata fields', () => {
    expect(computeDiscoveryHash('2026-03-01 09:30:00', 'APP', 'ORCLPDB1')).toBe(
      computeHash('DISCOVERY|2026-03-01 09:30:00|APP|ORCLPDB1')
    );
  });

  it('should not confuse underscores in the schema with the field boundary', () => {
    expect(computeDiscoveryHash('2026-03-01 09:30:00', 'A_B', 'C')).not.toBe(
      computeDiscoveryHash('2026-03-01 09:30:00', 'A', 'B_C')
    );
  });

  describe('checkProvenance', () => {
    it('should accept a hash computed from the metadata', () => {
      const hash = computeDiscoveryHash('2026-03-01 09:30:00', 'APP', 'ORCLPDB1');
      expect(checkProvenance({ ...METADATA, discovery_validation_hash: hash })).toEqual({
        generated: true,
      });
    });

    it('should report a missing hash', () => {
      expect(checkProvenance(METADATA)).toEqual({ generated: false, reason: 'missing' });
    });

    it('should report a hash that no longer matches edited metadata', () => {
      const hash = computeDiscoveryHash('2026-03-01 09:30:00', 'APP', 'ORCLPDB1');
      expect(
        checkProvenance({ ...METADATA, source_schema: 'BILLING', discovery_validation_hash: hash })
      ).toEqual({ generated: false, reason: 'mismatch' });
    });
  });
});
