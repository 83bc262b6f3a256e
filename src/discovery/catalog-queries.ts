/**
 * Catalog Reader
 *
 * Read-only data dictionary queries. Every value is a bind parameter; the
 * only dynamic SQL text is the list of generated bind placeholders for the
 * include/exclude name patterns.
 *
 * @module discovery/catalog-queries
 */

import type { BindParameters, QuerySession } from '../connectors/index.js';
import {
  readNumber,
  readOptionalNumber,
  readOptionalString,
  readString,
  readYesNo,
} from '../connectors/rows.js';
import type {
  ColumnInfo,
  CurrentPartitionType,
  GrantInfo,
  IndexInfo,
  LobStorageInfo,
  StorageParameters,
} from '../contracts/types.js';

// =============================================================================
// TYPES
// =============================================================================

export interface PartitionInfo {
  partitioning_type: CurrentPartitionType;
  /** null when the catalog reports NONE */
  subpartitioning_type: string | null;
  interval_definition: string | null;
  partition_count: number;
  def_subpartition_count: number;
  is_interval: boolean;
}

export interface TableStats {
  num_rows: number;
  avg_row_len: number;
  tablespace_name: string;
}

/**
 * Everything discovery reads once for the whole schema.
 */
export interface SchemaSnapshot {
  partitions: Map<string, PartitionInfo>;
  sizes: Map<string, number>;
  stats: Map<string, TableStats>;
  lobCounts: Map<string, number>;
  indexCounts: Map<string, number>;
}

const SYSTEM_GRANTEES = ['SYS', 'SYSTEM', 'PUBLIC'];

const PARTITION_TYPES: CurrentPartitionType[] = [
  'NONE',
  'RANGE',
  'LIST',
  'HASH',
  'REFERENCE',
  'SYSTEM',
  'INTERVAL',
];

function toPartitionType(value: string): CurrentPartitionType {
  const upper = value.toUpperCase();
  return PARTITION_TYPES.find((t) => t === upper) ?? 'NONE';
}

// =============================================================================
// NAME PATTERNS
// =============================================================================

/**
 * Translate a shell-style glob (* and ?) into a LIKE pattern with '\' as the
 * escape character. Literal % and _ are escaped.
 */
export function globToLike(glob: string): string {
  let like = '';
  for (const ch of glob.toUpperCase()) {
    if (ch === '*') like += '%';
    else if (ch === '?') like += '_';
    else if (ch === '%' || ch === '_' || ch === '\\') like += `\\${ch}`;
    else like += ch;
  }
  return like;
}

/**
 * WHERE fragment plus binds for include (OR'ed) and exclude (AND NOT) globs.
 */
export function buildNameFilter(
  include: string[] = [],
  exclude: string[] = []
): { clause: string; binds: BindParameters } {
  const binds: BindParameters = {};
  const parts: string[] = [];

  if (include.length > 0) {
    const likes = include.map((pattern, i) => {
      binds[`inc${i}`] = globToLike(pattern);
      return `table_name LIKE :inc${i} ESCAPE '\\'`;
    });
    parts.push(`(${likes.join(' OR ')})`);
  }

  exclude.forEach((pattern, i) => {
    binds[`exc${i}`] = globToLike(pattern);
    parts.push(`table_name NOT LIKE :exc${i} ESCAPE '\\'`);
  });

  return { clause: parts.length > 0 ? ` AND ${parts.join(' AND ')}` : '', binds };
}

// =============================================================================
// SCHEMA-WIDE QUERIES
// =============================================================================

export async function listTables(
  session: QuerySession,
  schema: string,
  include?: string[],
  exclude?: string[]
): Promise<string[]> {
  const filter = buildNameFilter(include, exclude);
  const rows = await session.execute(
    `SELECT table_name
       FROM all_tables
      WHERE owner = :schema
        AND table_name NOT LIKE 'BIN$%'
        AND NVL(temporary, 'N') = 'N'${filter.clause}
      ORDER BY table_name`,
    { schema, ...filter.binds }
  );
  return rows.map((row) => readString(row, 'TABLE_NAME'));
}

export async function getPartitionInfo(
  session: QuerySession,
  schema: string
): Promise<Map<string, PartitionInfo>> {
  const rows = await session.execute(
    `SELECT t.table_name,
            t.partitioning_type,
            t.subpartitioning_type,
            t.interval,
            t.partition_count,
            t.def_subpartition_count,
            CASE WHEN t.interval IS NOT NULL THEN 'Y' ELSE 'N' END AS is_interval
       FROM all_part_tables t
      WHERE t.owner = :schema`,
    { schema }
  );

  const info = new Map<string, PartitionInfo>();
  for (const row of rows) {
    const subpartitioning = readOptionalString(row, 'SUBPARTITIONING_TYPE');
    info.set(readString(row, 'TABLE_NAME'), {
      partitioning_type: toPartitionType(readString(row, 'PARTITIONING_TYPE', 'NONE')),
      subpartitioning_type: subpartitioning === 'NONE' ? null : subpartitioning,
      interval_definition: readOptionalString(row, 'INTERVAL'),
      partition_count: readNumber(row, 'PARTITION_COUNT'),
      def_subpartition_count: readNumber(row, 'DEF_SUBPARTITION_COUNT'),
      is_interval: readYesNo(row, 'IS_INTERVAL') === 'Y',
    });
  }
  return info;
}

/**
 * Estimated size in GB for tables with statistics; 0.01 minimum.
 */
export async function getTableSizes(
  session: QuerySession,
  schema: string
): Promise<Map<string, number>> {
  const rows = await session.execute(
    `SELECT table_name,
            ROUND(NVL(num_rows, 0) * NVL(avg_row_len, 0) / POWER(1024, 3), 2) AS estimated_gb
       FROM all_tab_statistics
      WHERE owner = :schema
        AND object_type = 'TABLE'
        AND NVL(num_rows, 0) > 0`,
    { schema }
  );

  const sizes = new Map<string, number>();
  for (const row of rows) {
    const gb = readNumber(row, 'ESTIMATED_GB');
    sizes.set(readString(row, 'TABLE_NAME'), gb > 0 ? gb : 0.01);
  }
  return sizes;
}

export async function getTableStats(
  session: QuerySession,
  schema: string
): Promise<Map<string, TableStats>> {
  const rows = await session.execute(
    `SELECT table_name,
            NVL(num_rows, 0) AS num_rows,
            NVL(avg_row_len, 0) AS avg_row_len,
            tablespace_name
       FROM all_tables
      WHERE owner = :schema`,
    { schema }
  );

  const stats = new Map<string, TableStats>();
  for (const row of rows) {
    stats.set(readString(row, 'TABLE_NAME'), {
      num_rows: readNumber(row, 'NUM_ROWS'),
      avg_row_len: readNumber(row, 'AVG_ROW_LEN'),
      tablespace_name: readString(row, 'TABLESPACE_NAME', 'USERS'),
    });
  }
  return stats;
}

async function countByTable(
  session: QuerySession,
  sql: string,
  schema: string
): Promise<Map<string, number>> {
  const rows = await session.execute(sql, { schema });
  const counts = new Map<string, number>();
  for (const row of rows) {
    counts.set(readString(row, 'TABLE_NAME'), readNumber(row, 'CNT'));
  }
  return counts;
}

export function getLobCounts(session: QuerySession, schema: string): Promise<Map<string, number>> {
  return countByTable(
    session,
    `SELECT table_name, COUNT(*) AS cnt
       FROM all_lobs
      WHERE owner = :schema
      GROUP BY table_name`,
    schema
  );
}

export function getIndexCounts(session: QuerySession, schema: string): Promise<Map<string, number>> {
  return countByTable(
    session,
    `SELECT table_name, COUNT(*) AS cnt
       FROM all_indexes
      WHERE table_owner = :schema
      GROUP BY table_name`,
    schema
  );
}

export async function readSchemaSnapshot(
  session: QuerySession,
  schema: string
): Promise<SchemaSnapshot> {
  return {
    partitions: await getPartitionInfo(session, schema),
    sizes: await getTableSizes(session, schema),
    stats: await getTableStats(session, schema),
    lobCounts: await getLobCounts(session, schema),
    indexCounts: await getIndexCounts(session, schema),
  };
}

// =============================================================================
// PER-TABLE QUERIES
// =============================================================================

export async function getPartitionKeys(
  session: QuerySession,
  schema: string,
  table: string
): Promise<string[]> {
  const rows = await session.execute(
    `SELECT column_name
       FROM all_part_key_columns
      WHERE owner = :schema
        AND name = :table_name
        AND object_type = 'TABLE'
      ORDER BY column_position`,
    { schema, table_name: table }
  );
  return rows.map((row) => readString(row, 'COLUMN_NAME'));
}

interface IdentityInfo {
  generation_type: string | null;
  sequence_name: string | null;
  min_value: number | null;
  max_value: number | null;
  increment_by: number | null;
  cache_size: number | null;
  cycle_flag: 'Y' | 'N';
  order_flag: 'Y' | 'N';
  start_value: number | null;
}

async function getIdentityColumns(
  session: QuerySession,
  schema: string,
  table: string
): Promise<Map<string, IdentityInfo>> {
  const rows = await session.execute(
    `SELECT ic.column_name,
            ic.generation_type,
            ic.sequence_name,
            s.min_value,
            s.max_value,
            s.increment_by,
            s.cache_size,
            s.cycle_flag,
            s.order_flag,
            s.last_number AS start_value
       FROM all_tab_identity_cols ic
       LEFT JOIN all_sequences s
         ON s.sequence_name = ic.sequence_name
        AND s.sequence_owner = :schema
      WHERE ic.owner = :schema
        AND ic.table_name = :table_name
      ORDER BY ic.column_name`,
    { schema, table_name: table }
  );

  const identities = new Map<string, IdentityInfo>();
  for (const row of rows) {
    identities.set(readString(row, 'COLUMN_NAME'), {
      generation_type: readOptionalString(row, 'GENERATION_TYPE'),
      sequence_name: readOptionalString(row, 'SEQUENCE_NAME'),
      min_value: readOptionalNumber(row, 'MIN_VALUE'),
      max_value: readOptionalNumber(row, 'MAX_VALUE'),
      increment_by: readOptionalNumber(row, 'INCREMENT_BY'),
      cache_size: readOptionalNumber(row, 'CACHE_SIZE'),
      cycle_flag: readYesNo(row, 'CYCLE_FLAG'),
      order_flag: readYesNo(row, 'ORDER_FLAG'),
      start_value: readOptionalNumber(row, 'START_VALUE'),
    });
  }
  return identities;
}

function identityFields(identity: IdentityInfo): Partial<ColumnInfo> {
  return {
    ...(identity.generation_type !== null ? { identity_generation: identity.generation_type } : {}),
    ...(identity.sequence_name !== null ? { identity_sequence: identity.sequence_name } : {}),
    identity_start_with: identity.start_value ?? 1,
    identity_increment_by: identity.increment_by ?? 1,
    ...(identity.max_value !== null ? { identity_max_value: identity.max_value } : {}),
    ...(identity.min_value !== null ? { identity_min_value: identity.min_value } : {}),
    ...(identity.cache_size !== null ? { identity_cache_size: identity.cache_size } : {}),
    identity_cycle_flag: identity.cycle_flag,
    identity_order_flag: identity.order_flag,
  };
}

/**
 * Full column metadata in column_id order, virtual and hidden columns skipped.
 */
export async function getColumns(
  session: QuerySession,
  schema: string,
  table: string
): Promise<ColumnInfo[]> {
  const identities = await getIdentityColumns(session, schema, table);
  const rows = await session.execute(
    `SELECT column_name,
            data_type,
            data_length,
            data_precision,
            data_scale,
            nullable,
            data_default,
            char_length
       FROM all_tab_cols
      WHERE owner = :schema
        AND table_name = :table_name
        AND hidden_column = 'NO'
        AND virtual_column = 'NO'
      ORDER BY column_id`,
    { schema, table_name: table }
  );

  return rows.map((row): ColumnInfo => {
    const name = readString(row, 'COLUMN_NAME');
    const length = readOptionalNumber(row, 'DATA_LENGTH');
    const precision = readOptionalNumber(row, 'DATA_PRECISION');
    const scale = readOptionalNumber(row, 'DATA_SCALE');
    const charLength = readOptionalNumber(row, 'CHAR_LENGTH');
    const defaultValue = readOptionalString(row, 'DATA_DEFAULT')?.trim();
    const identity = identities.get(name);

    return {
      name,
      type: readString(row, 'DATA_TYPE'),
      ...(length !== null ? { length } : {}),
      ...(precision !== null ? { precision } : {}),
      ...(scale !== null ? { scale } : {}),
      ...(charLength !== null && charLength > 0 ? { char_length: charLength } : {}),
      nullable: readYesNo(row, 'NULLABLE', 'Y'),
      ...(defaultValue ? { default: defaultValue } : {}),
      is_identity: identity !== undefined,
      ...(identity ? identityFields(identity) : {}),
    };
  });
}

/**
 * Strip a two-digit numbered suffix: LOB_DATA_03 -> LOB_DATA.
 */
export function baseTablespaceName(tablespace: string | null): string | null {
  if (!tablespace) return tablespace;
  const match = /^(.+)_\d{2}$/.exec(tablespace);
  return match ? match[1] : tablespace;
}

export async function getLobStorage(
  session: QuerySession,
  schema: string,
  table: string
): Promise<LobStorageInfo[]> {
  const rows = await session.execute(
    `SELECT l.column_name,
            l.segment_name,
            l.tablespace_name,
            l.securefile,
            l.compression,
            l.deduplication,
            l.in_row,
            l.chunk,
            l.cache
       FROM all_lobs l
      WHERE l.owner = :schema
        AND l.table_name = :table_name
      ORDER BY l.column_name`,
    { schema, table_name: table }
  );

  return rows.map((row): LobStorageInfo => {
    const tablespace = readOptionalString(row, 'TABLESPACE_NAME');
    return {
      column_name: readString(row, 'COLUMN_NAME'),
      segment_name: readString(row, 'SEGMENT_NAME'),
      tablespace_name: baseTablespaceName(tablespace),
      original_tablespace: tablespace,
      securefile: readOptionalString(row, 'SECUREFILE'),
      compression: readOptionalString(row, 'COMPRESSION'),
      deduplication: readOptionalString(row, 'DEDUPLICATION'),
      in_row: readOptionalString(row, 'IN_ROW'),
      chunk: readOptionalNumber(row, 'CHUNK'),
      cache: readOptionalString(row, 'CACHE'),
    };
  });
}

export const EMPTY_STORAGE_PARAMETERS: StorageParameters = {
  compression: null,
  compress_for: null,
  pct_free: null,
  ini_trans: null,
  max_trans: null,
  initial_extent: null,
  next_extent: null,
  buffer_pool: null,
};

export async function getStorageParameters(
  session: QuerySession,
  schema: string,
  table: string
): Promise<StorageParameters> {
  const rows = await session.execute(
    `SELECT compression,
            compress_for,
            pct_free,
            ini_trans,
            max_trans,
            initial_extent,
            next_extent,
            buffer_pool
       FROM all_tables
      WHERE owner = :schema
        AND table_name = :table_name`,
    { schema, table_name: table }
  );

  const row = rows[0];
  if (!row) return { ...EMPTY_STORAGE_PARAMETERS };

  return {
    compression: readOptionalString(row, 'COMPRESSION'),
    compress_for: readOptionalString(row, 'COMPRESS_FOR'),
    pct_free: readOptionalNumber(row, 'PCT_FREE'),
    ini_trans: readOptionalNumber(row, 'INI_TRANS'),
    max_trans: readOptionalNumber(row, 'MAX_TRANS'),
    initial_extent: readOptionalNumber(row, 'INITIAL_EXTENT'),
    next_extent: readOptionalNumber(row, 'NEXT_EXTENT'),
    buffer_pool: readOptionalString(row, 'BUFFER_POOL'),
  };
}

export async function getIndexes(
  session: QuerySession,
  schema: string,
  table: string
): Promise<IndexInfo[]> {
  const columnRows = await session.execute(
    `SELECT index_name,
            LISTAGG(column_name, ', ') WITHIN GROUP (ORDER BY column_position) AS index_columns
       FROM all_ind_columns
      WHERE index_owner = :schema
        AND table_name = :table_name
      GROUP BY index_name`,
    { schema, table_name: table }
  );
  const columnsByIndex = new Map(
    columnRows.map((row) => [readString(row, 'INDEX_NAME'), readString(row, 'INDEX_COLUMNS')])
  );

  const localityRows = await session.execute(
    `SELECT index_name, locality
       FROM all_part_indexes
      WHERE owner = :schema
        AND table_name = :table_name`,
    { schema, table_name: table }
  );
  const localityByIndex = new Map(
    localityRows.map((row) => [readString(row, 'INDEX_NAME'), readOptionalString(row, 'LOCALITY')])
  );

  const rows = await session.execute(
    `SELECT i.index_name,
            i.index_type,
            i.uniqueness,
            i.tablespace_name,
            i.compression,
            i.pct_free,
            i.ini_trans,
            i.max_trans,
            TRIM(i.degree) AS degree,
            i.partitioned
       FROM all_indexes i
      WHERE i.table_owner = :schema
        AND i.table_name = :table_name
      ORDER BY i.index_name`,
    { schema, table_name: table }
  );

  return rows.map((row): IndexInfo => {
    const indexName = readString(row, 'INDEX_NAME');
    const indexType = readString(row, 'INDEX_TYPE');
    return {
      index_name: indexName,
      index_type: indexType,
      columns: columnsByIndex.get(indexName) ?? '',
      uniqueness: readString(row, 'UNIQUENESS', 'NONUNIQUE'),
      tablespace_name: readOptionalString(row, 'TABLESPACE_NAME'),
      compression: readOptionalString(row, 'COMPRESSION'),
      pct_free: readOptionalNumber(row, 'PCT_FREE'),
      ini_trans: readOptionalNumber(row, 'INI_TRANS'),
      max_trans: readOptionalNumber(row, 'MAX_TRANS'),
      degree: readOptionalString(row, 'DEGREE'),
      partitioned: readString(row, 'PARTITIONED', 'NO'),
      is_reverse: indexType.includes('REV'),
      locality: localityByIndex.get(indexName) ?? null,
    };
  });
}

export async function getGrants(
  session: QuerySession,
  schema: string,
  table: string
): Promise<GrantInfo[]> {
  const rows = await session.execute(
    `SELECT grantee, privilege, grantable, grantor
       FROM all_tab_privs
      WHERE table_schema = :schema
        AND table_name = :table_name
        AND grantee NOT IN (${SYSTEM_GRANTEES.map((g) => `'${g}'`).join(', ')})
      ORDER BY grantee, privilege`,
    { schema, table_name: table }
  );

  return rows.map((row): GrantInfo => ({
    grantee: readString(row, 'GRANTEE'),
    privilege: readString(row, 'PRIVILEGE'),
    grantable: readYesNo(row, 'GRANTABLE'),
    grantor: readString(row, 'GRANTOR'),
    grant_type: 'OBJECT',
  }));
}
