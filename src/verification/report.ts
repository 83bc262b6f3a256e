/**
 * Verification Report
 *
 * Renders collected check results as a Markdown document: summary counts,
 * one table per suite, detailed findings for WARN/FAIL results and derived
 * recommendations.
 *
 * @module verification/report
 */

import type { CheckResult, CheckSuite, VerificationStats } from '../contracts/types.js';
import { formatTimestamp, truncateForCell } from '../utils/format.js';
import { STATUS_ICONS, countByStatus } from './check-result.js';

export interface ReportInput {
  generatedAt: Date;
  durationSeconds: number;
  schema: string;
  stats: VerificationStats;
  results: Record<CheckSuite, CheckResult[]>;
}

const SUITE_TITLES: Record<CheckSuite, string> = {
  pre_migration: 'Pre-Migration Checks',
  post_migration: 'Post-Migration Validation',
  data_comparison: 'Data Comparison',
};

const SUITE_ORDER: CheckSuite[] = ['pre_migration', 'post_migration', 'data_comparison'];

export function formatResultsTable(results: CheckResult[]): string {
  if (results.length === 0) {
    return '*No checks performed*';
  }

  const lines = ['| Status | Check | Message |', '|--------|-------|---------|'];
  for (const result of results) {
    lines.push(
      `| ${STATUS_ICONS[result.status]} ${result.status} | ${result.check_name} | ${truncateForCell(result.message)} |`
    );
  }
  return lines.join('\n');
}

export function formatDetailedFindings(results: CheckResult[]): string {
  const findings: string[] = [];

  for (const result of results) {
    if (result.status !== 'WARN' && result.status !== 'FAIL') continue;
    if (Object.keys(result.details).length === 0) continue;

    findings.push(`### ${result.check_name}`);
    findings.push(`**Status:** ${result.status}`);
    findings.push(`**Message:** ${result.message}`);
    findings.push('**Details:**');
    findings.push('```json');
    findings.push(JSON.stringify(result.details, null, 2));
    findings.push('```');
    findings.push('');
  }

  return findings.length > 0 ? findings.join('\n') : '*No detailed findings*';
}

export function generateRecommendations(results: CheckResult[]): string[] {
  const recommendations: string[] = [];
  const failed = countByStatus(results, 'FAIL');
  const warnings = countByStatus(results, 'WARN');
  const skipped = countByStatus(results, 'SKIP');

  if (failed > 0) {
    recommendations.push(
      `- **CRITICAL:** ${failed} check(s) failed. Do not proceed with migration until resolved.`
    );
  }
  if (warnings > 0) {
    recommendations.push(`- **CAUTION:** ${warnings} warning(s) found. Review before proceeding.`);
  }
  if (skipped > 0) {
    recommendations.push(
      `- **INCOMPLETE:** ${skipped} check(s) were skipped. Run them against the database before proceeding.`
    );
  }

  const specific = new Set<string>();
  for (const result of results) {
    if (result.status !== 'FAIL') continue;
    if (result.message.includes('Row count mismatch')) {
      specific.add('- Investigate row count discrepancy before swapping tables');
    } else if (result.check_name.includes('Partition Type')) {
      specific.add('- Verify partition configuration in generated scripts');
    }
  }
  recommendations.push(...specific);

  if (recommendations.length === 0) {
    recommendations.push(`- ${STATUS_ICONS.PASS} All checks passed. Migration appears successful.`);
  }
  return recommendations;
}

export function generateReport(input: ReportInput): string {
  const { stats } = input;
  const all = SUITE_ORDER.flatMap((suite) => input.results[suite]);

  const sections = SUITE_ORDER.map(
    (suite) => `## ${SUITE_TITLES[suite]}\n\n${formatResultsTable(input.results[suite])}`
  );

  return [
    '# Migration Validation Report',
    '',
    `**Generated:** ${formatTimestamp(input.generatedAt)}  `,
    `**Duration:** ${input.durationSeconds.toFixed(1)} seconds  `,
    `**Schema:** ${input.schema}`,
    '',
    '---',
    '',
    '## Summary',
    '',
    '| Status | Count |',
    '|--------|-------|',
    `| ${STATUS_ICONS.PASS} Passed | ${stats.passed} |`,
    `| ${STATUS_ICONS.WARN} Warnings | ${stats.warnings} |`,
    `| ${STATUS_ICONS.FAIL} Failed | ${stats.failed} |`,
    `| ${STATUS_ICONS.SKIP} Skipped | ${stats.skipped} |`,
    `| **Total** | **${stats.total_checks}** |`,
    '',
    '---',
    '',
    sections.join('\n\n---\n\n'),
    '',
    '---',
    '',
    '## Detailed Findings',
    '',
    formatDetailedFindings(all),
    '',
    '---',
    '',
    '## Recommendations',
    '',
    generateRecommendations(all).join('\n'),
    '',
  ].join('\n');
}
