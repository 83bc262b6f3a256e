/**
 * Hash Utilities
 *
 * Content hashing and the discovery provenance hash that marks a plan
 * document as produced by an actual discovery run.
 *
 * @module utils/hash
 */

import { createHash } from 'crypto';
import type { ContentHash, PlanMetadata } from '../contracts/types.js';

/**
 * Compute SHA-256 hash of content.
 * Returns a 64-character hex string.
 */
export function computeHash(content: string | Buffer): ContentHash {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Compute the provenance hash over the three identifying metadata fields.
 * Fields are joined with `|`, which cannot occur in an Oracle identifier.
 */
export function computeDiscoveryHash(
  generatedDate: string,
  sourceSchema: string,
  sourceDatabaseService: string
): ContentHash {
  return computeHash(['DISCOVERY', generatedDate, sourceSchema, sourceDatabaseService].join('|'));
}

export type ProvenanceCheck =
  | { generated: true }
  | { generated: false; reason: 'missing' | 'mismatch' };

/**
 * Check whether the metadata carries a provenance hash matching its own
 * generated_date, source_schema and source_database_service.
 */
export function checkProvenance(
  metadata: Pick<
    PlanMetadata,
    'generated_date' | 'source_schema' | 'source_database_service' | 'discovery_validation_hash'
  >
): ProvenanceCheck {
  if (!metadata.discovery_validation_hash) {
    return { generated: false, reason: 'missing' };
  }

  const expected = computeDiscoveryHash(
    metadata.generated_date,
    metadata.source_schema,
    metadata.source_database_service
  );
  if (expected !== metadata.discovery_validation_hash) {
    return { generated: false, reason: 'mismatch' };
  }
  return { generated: true };
}

/**
 * Verify a hash matches expected value.
 */
export function verifyHash(content: string | Buffer, expectedHash: ContentHash): boolean {
  return computeHash(content) === expectedHash;
}
