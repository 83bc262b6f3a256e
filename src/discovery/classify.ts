/**
 * Column Classification
 *
 * Splits a table's columns into partition-key candidates (date/timestamp)
 * and hash-key candidates (numeric, short strings), best names first.
 *
 * @module discovery/classify
 */

import type { AvailableColumns, ColumnCandidate, ColumnInfo } from '../contracts/types.js';

export const MAX_STRING_CANDIDATES = 10;
export const MAX_STRING_CANDIDATE_LENGTH = 100;

const PREFERRED_TIMESTAMP_NAMES = [
  'CREATED_DATE',
  'CREATE_DATE',
  'AUDIT_CREATE_DATE',
  'LAST_UPDATE_DATE',
  'UPDATE_DATE',
  'MODIFIED_DATE',
  'PROCESS_DATE',
];

const NUMERIC_TYPES = new Set(['NUMBER', 'INTEGER', 'BINARY_INTEGER']);
const STRING_TYPES = new Set(['VARCHAR2', 'CHAR', 'NVARCHAR2', 'NCHAR']);

const UNRANKED = 99;

export function isTimestampType(dataType: string): boolean {
  const type = dataType.toUpperCase();
  return type === 'DATE' || type.startsWith('TIMESTAMP');
}

export function isNumericType(dataType: string): boolean {
  return NUMERIC_TYPES.has(dataType.toUpperCase());
}

export function isStringType(dataType: string): boolean {
  return STRING_TYPES.has(dataType.toUpperCase());
}

function timestampRank(name: string): number {
  const index = PREFERRED_TIMESTAMP_NAMES.indexOf(name);
  return index >= 0 ? index + 1 : UNRANKED;
}

function numericRank(name: string): number {
  if (name.endsWith('_ID')) return 1;
  if (name.endsWith('ID')) return 2;
  if (name.endsWith('_NUM')) return 3;
  if (name.endsWith('_SEQ')) return 4;
  return UNRANKED;
}

function stringRank(name: string): number {
  if (name.endsWith('_CODE')) return 1;
  if (name.endsWith('CODE')) return 2;
  if (name.endsWith('_KEY')) return 3;
  return UNRANKED;
}

/** Stable sort by rank, column order breaking ties */
function ranked(columns: ColumnInfo[], rank: (name: string) => number): ColumnInfo[] {
  return columns
    .map((column, position) => ({ column, position, rank: rank(column.name) }))
    .sort((a, b) => a.rank - b.rank || a.position - b.position)
    .map((entry) => entry.column);
}

function toCandidate(column: ColumnInfo, type = column.type): ColumnCandidate {
  return { name: column.name, type, nullable: column.nullable };
}

/**
 * Classify columns (given in column_id order).
 */
export function classifyColumns(columns: ColumnInfo[]): AvailableColumns {
  const timestamp = columns.filter((c) => isTimestampType(c.type));
  const numeric = columns.filter((c) => isNumericType(c.type));
  const strings = columns.filter(
    (c) =>
      isStringType(c.type) &&
      c.char_length !== undefined &&
      c.char_length <= MAX_STRING_CANDIDATE_LENGTH
  );

  return {
    timestamp_columns: ranked(timestamp, timestampRank).map((c) => toCandidate(c)),
    numeric_columns: ranked(numeric, numericRank).map((c) => toCandidate(c)),
    string_columns: ranked(strings, stringRank)
      .slice(0, MAX_STRING_CANDIDATES)
      .map((c) => toCandidate(c, `${c.type}(${c.char_length})`)),
  };
}
