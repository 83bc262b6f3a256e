/**
 * Discovery Metrics Module
 *
 * Tracks discovery time, table counts and failure isolation, and emits them
 * as structured log entries.
 *
 * @module discovery/metrics
 */

/**
 * Discovery metrics.
 * Emitted to logs and shown by the CLI.
 */
export interface DiscoveryMetrics {
  discovery_time_ms?: number;
  snapshot_query_time_ms?: number;
  table_analysis_time_ms?: number;
  plan_write_time_ms?: number;

  tables_discovered: number;
  tables_analyzed: number;
  tables_skipped: number;
  tables_enabled: number;
  total_size_gb: number;
}

/**
 * Logger interface (subset of what we need)
 */
interface Logger {
  info(message: string, context?: Record<string, unknown>): void;
}

/**
 * Emit discovery metrics to structured log.
 */
export function emitDiscoveryMetrics(
  metrics: DiscoveryMetrics,
  logger: Logger,
  correlationId: string
): void {
  logger.info('Discovery completed', {
    operation: 'discovery_complete',
    duration_ms: metrics.discovery_time_ms,
    correlation_id: correlationId,
    metrics,
  });

  logger.info('Discovery metric: tables', {
    operation: 'metric',
    metric_name: 'tables_discovered',
    metric_value: metrics.tables_discovered,
    correlation_id: correlationId,
  });

  logger.info('Discovery metric: enabled tables', {
    operation: 'metric',
    metric_name: 'tables_enabled',
    metric_value: metrics.tables_enabled,
    correlation_id: correlationId,
  });

  if (metrics.tables_skipped > 0) {
    logger.info('Discovery metric: skipped tables', {
      operation: 'metric',
      metric_name: 'tables_skipped',
      metric_value: metrics.tables_skipped,
      correlation_id: correlationId,
    });
  }
}

/**
 * Create metrics collector that tracks timing throughout discovery.
 */
export function createMetricsCollector(): {
  startTimer: (phase: string) => void;
  stopTimer: (phase: string) => void;
  increment: (metric: string, value?: number) => void;
  getMetrics: () => DiscoveryMetrics;
} {
  const timers: Map<string, number> = new Map();
  const durations: Map<string, number> = new Map();
  const counters: Map<string, number> = new Map();

  return {
    startTimer: (phase: string): void => {
      timers.set(phase, Date.now());
    },

    stopTimer: (phase: string): void => {
      const start = timers.get(phase);
      if (start !== undefined) {
        const duration = Date.now() - start;
        durations.set(phase, (durations.get(phase) || 0) + duration);
        timers.delete(phase);
      }
    },

    increment: (metric: string, value: number = 1): void => {
      counters.set(metric, (counters.get(metric) || 0) + value);
    },

    getMetrics: (): DiscoveryMetrics => ({
      discovery_time_ms: durations.get('total'),
      snapshot_query_time_ms: durations.get('snapshot'),
      table_analysis_time_ms: durations.get('analysis'),
      plan_write_time_ms: durations.get('write'),
      tables_discovered: counters.get('tables') || 0,
      tables_analyzed: counters.get('tables_analyzed') || 0,
      tables_skipped: counters.get('tables_skipped') || 0,
      tables_enabled: counters.get('tables_enabled') || 0,
      total_size_gb: Math.round((counters.get('size_gb') || 0) * 100) / 100,
    }),
  };
}

/**
 * Format metrics for CLI display.
 */
export function formatMetricsForDisplay(metrics: DiscoveryMetrics): string {
  const lines: string[] = [
    '=== Discovery Metrics ===',
    '',
    'Tables:',
    `  Discovered:   ${metrics.tables_discovered}`,
    `  Analyzed:     ${metrics.tables_analyzed}`,
    `  Skipped:      ${metrics.tables_skipped}`,
    `  Enabled:      ${metrics.tables_enabled}`,
    `  Total Size:   ${metrics.total_size_gb.toFixed(2)} GB`,
    '',
  ];

  if (metrics.discovery_time_ms) {
    lines.push('Performance:');
    lines.push(`  Total Time:   ${(metrics.discovery_time_ms / 1000).toFixed(2)}s`);

    if (metrics.snapshot_query_time_ms) {
      lines.push(`  Snapshot:     ${(metrics.snapshot_query_time_ms / 1000).toFixed(2)}s`);
    }
    if (metrics.table_analysis_time_ms) {
      lines.push(`  Analysis:     ${(metrics.table_analysis_time_ms / 1000).toFixed(2)}s`);
    }
    if (metrics.plan_write_time_ms) {
      lines.push(`  Write:        ${(metrics.plan_write_time_ms / 1000).toFixed(2)}s`);
    }
  }

  return lines.join('\n');
}
