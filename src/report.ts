import type { PassReport } from './automation/duplicator.js';

export type ReportFormat = 'pretty' | 'json';

const STAT_KEYS = ['checked', 'matched', 'duplicated', 'errors'] as const;

export function formatReport(report: PassReport, format: ReportFormat = 'pretty'): string {
  if (format === 'json') return JSON.stringify(report, null, 2);

  const lines = [
    'ticktick-duplicator report',
    `mode: ${report.mode}`,
    `startedAt: ${report.startedAt}`,
    `dryRun: ${report.dryRun}`,
    `persisted: ${report.persisted}`,
    `durationMs: ${report.durationMs}`,
    '',
    'stats:',
    ...STAT_KEYS.map((k) => `- ${k}: ${report.stats[k]}`),
  ];

  if (report.created.length) {
    lines.push('', 'created:');
    for (const c of report.created) lines.push(`- ${c.sourceId} -> ${c.newId} "${c.title}"`);
  }

  if (report.planned.length) {
    lines.push('', 'planned:');
    for (const p of report.planned) lines.push(`- ${p.sourceId} "${p.title}"`);
  }

  if (report.failures.length) {
    lines.push('', 'failures:');
    for (const f of report.failures) lines.push(`- (${f.stage})${f.taskId ? ` ${f.taskId}` : ''}: ${f.error}`);
  }

  return lines.join('\n');
}

/** Exit status for a pass. In polling mode the latest pass decides. */
export function exitCodeFor(report: PassReport): number {
  return report.stats.errors ? 1 : 0;
}
