/**
 * Identifier Safety
 *
 * Object names cannot be bound, so any owner, table or column name that is
 * interpolated into SQL text must pass this grammar first.
 *
 * @module verification/identifiers
 */

import { createMigrationError } from '../contracts/errors.js';

export const IDENTIFIER_PATTERN = /^[A-Z][A-Z0-9_$#]{0,127}$/;

export type IdentifierKind = 'owner' | 'table' | 'column';

/**
 * Upper-case and check an identifier. Throws VERIFY_UNSAFE_IDENTIFIER.
 */
export function assertSafeIdentifier(value: string, kind: IdentifierKind): string {
  const upper = value.trim().toUpperCase();
  if (!IDENTIFIER_PATTERN.test(upper)) {
    throw createMigrationError('unsafeIdentifier', `Unsafe ${kind} identifier: "${value}"`, {
      kind,
      value,
    });
  }
  return upper;
}

export function qualifiedName(owner: string, table: string): string {
  return `${assertSafeIdentifier(owner, 'owner')}.${assertSafeIdentifier(table, 'table')}`;
}
