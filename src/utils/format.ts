/**
 * Display Formatting
 *
 * Small formatters shared by the render context, the CLI and the report.
 *
 * @module utils/format
 */

import type { IntervalType } from '../contracts/types.js';

/**
 * Format a Date as "YYYY-MM-DD HH:MM:SS" in local time.
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Interval literal for display, e.g. INTERVAL '1' DAY. Weeks render as days.
 */
export function formatInterval(intervalType: IntervalType, intervalValue = 1): string {
  switch (intervalType) {
    case 'HOUR':
      return `INTERVAL '${intervalValue}' HOUR`;
    case 'DAY':
      return `INTERVAL '${intervalValue}' DAY`;
    case 'WEEK':
      return `INTERVAL '${intervalValue * 7}' DAY`;
    case 'MONTH':
      return `INTERVAL '${intervalValue}' MONTH`;
  }
}

/**
 * INTERVAL clause for partition DDL. Weeks are expressed as 7-day
 * day-to-second intervals; months use NUMTOYMINTERVAL.
 */
export function intervalClause(intervalType: IntervalType, intervalValue = 1): string {
  switch (intervalType) {
    case 'HOUR':
      return `NUMTODSINTERVAL(${intervalValue}, 'HOUR')`;
    case 'DAY':
      return `NUMTODSINTERVAL(${intervalValue}, 'DAY')`;
    case 'WEEK':
      return `NUMTODSINTERVAL(${intervalValue * 7}, 'DAY')`;
    case 'MONTH':
      return `NUMTOYMINTERVAL(${intervalValue}, 'MONTH')`;
  }
}

export function formatSizeGb(sizeGb: number): string {
  if (!sizeGb || sizeGb <= 0) return '< 0.01 GB';
  if (sizeGb < 1) return `${sizeGb.toFixed(2)} GB`;
  return `${sizeGb.toFixed(1)} GB`;
}

export function formatRowCount(rowCount: number): string {
  if (!rowCount || rowCount <= 0) return '0 rows';
  if (rowCount < 1000) return `${rowCount.toLocaleString('en-US')} rows`;
  if (rowCount < 1_000_000) return `${(rowCount / 1000).toFixed(1)}K rows`;
  if (rowCount < 1_000_000_000) return `${(rowCount / 1_000_000).toFixed(1)}M rows`;
  return `${(rowCount / 1_000_000_000).toFixed(1)}B rows`;
}

export type OperationKind = 'load' | 'index' | 'other';

/** MB per minute assumed for each kind of bulk operation */
const THROUGHPUT_MB_PER_MINUTE: Record<OperationKind, number> = {
  load: 100,
  index: 200,
  other: 150,
};

/**
 * Rough wall-clock estimate for a bulk operation on a table of the given size.
 */
export function estimateTime(sizeGb: number, operation: OperationKind = 'load'): string {
  if (!sizeGb || sizeGb <= 0) return '< 1 minute';

  const minutes = Math.floor((sizeGb * 1024) / THROUGHPUT_MB_PER_MINUTE[operation]);
  if (minutes < 1) return '< 1 minute';
  if (minutes < 60) return `~${minutes} minutes`;

  const hours = Math.floor(minutes / 60);
  const remaining = minutes % 60;
  if (remaining === 0) return `~${hours} hour${hours > 1 ? 's' : ''}`;
  return `~${hours}h ${remaining}m`;
}

export type HintOperation = 'SELECT' | 'INSERT' | 'CREATE';

/**
 * Optimizer PARALLEL hint; empty for serial execution.
 */
export function parallelHint(parallelDegree: number, operation: HintOperation = 'SELECT'): string {
  if (!parallelDegree || parallelDegree <= 1) return '';
  if (operation === 'INSERT') return `/*+ PARALLEL(${parallelDegree}) APPEND */`;
  return `/*+ PARALLEL(${parallelDegree}) */`;
}

/**
 * Truncate for table cells, keeping line breaks renderable in Markdown.
 */
export function truncateForCell(text: string, max = 100): string {
  const clipped = text.length > max ? `${text.slice(0, max - 3)}...` : text;
  return clipped.replace(/\|/g, '\\|').replace(/\r?\n/g, '<br>');
}
