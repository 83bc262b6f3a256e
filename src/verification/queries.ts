/**
 * Verification Queries
 *
 * Lookups shared by the check suites. Catalog queries bind every value;
 * COUNT(*) against a table interpolates only checked identifiers.
 *
 * @module verification/queries
 */

import type { QuerySession } from '../connectors/index.js';
import { readNumber, readOptionalNumber, readOptionalString } from '../connectors/rows.js';
import { qualifiedName } from './identifiers.js';

export interface PartitionState {
  partitioning_type: string;
  subpartitioning_type: string | null;
  partition_count: number;
  def_subpartition_count: number | null;
  interval: string | null;
}

export async function tableExists(
  session: QuerySession,
  owner: string,
  table: string
): Promise<boolean> {
  const rows = await session.execute(
    `SELECT COUNT(*) AS cnt
       FROM all_tables
      WHERE owner = :owner AND table_name = :table_name`,
    { owner: owner.toUpperCase(), table_name: table.toUpperCase() }
  );
  const row = rows[0];
  return row !== undefined && readNumber(row, 'CNT') > 0;
}

export async function countRows(
  session: QuerySession,
  owner: string,
  table: string
): Promise<number> {
  const rows = await session.execute(`SELECT COUNT(*) AS cnt FROM ${qualifiedName(owner, table)}`);
  const row = rows[0];
  return row ? readNumber(row, 'CNT') : 0;
}

/**
 * Partitioning as the catalog reports it; null when not partitioned.
 */
export async function getPartitionState(
  session: QuerySession,
  owner: string,
  table: string
): Promise<PartitionState | null> {
  const rows = await session.execute(
    `SELECT partitioning_type,
            subpartitioning_type,
            partition_count,
            def_subpartition_count,
            interval
       FROM all_part_tables
      WHERE owner = :owner AND table_name = :table_name`,
    { owner: owner.toUpperCase(), table_name: table.toUpperCase() }
  );
  const row = rows[0];
  if (!row) return null;

  const subpartitioning = readOptionalString(row, 'SUBPARTITIONING_TYPE');
  return {
    partitioning_type: readOptionalString(row, 'PARTITIONING_TYPE') ?? 'NONE',
    subpartitioning_type: subpartitioning === 'NONE' ? null : subpartitioning,
    partition_count: readNumber(row, 'PARTITION_COUNT'),
    def_subpartition_count: readOptionalNumber(row, 'DEF_SUBPARTITION_COUNT'),
    interval: readOptionalString(row, 'INTERVAL'),
  };
}

/**
 * Interval-partitioned tables are reported as RANGE with an interval.
 */
export function effectivePartitionType(state: PartitionState): string {
  return state.interval ? 'INTERVAL' : state.partitioning_type;
}
