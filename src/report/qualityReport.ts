/**
 * Quality report rendering
 * Builds the text of the report only; writing it anywhere is the caller's job.
 */

import { QualitySummary } from '../validation/summary';

export interface QualityReportOptions {
  title?: string;
  generatedAt?: Date;
}

const RULE = '═'.repeat(60);

function formatPercent(value: number): string {
  return `${value.toFixed(2)}%`;
}

function validRate(summary: QualitySummary): number {
  return summary.total === 0 ? 0 : (summary.valid / summary.total) * 100;
}

export function renderQualityReport(summary: QualitySummary, options: QualityReportOptions = {}): string {
  const title = options.title || 'NEWS RECORD QUALITY REPORT';
  const generatedAt = options.generatedAt || new Date();

  const lines: string[] = [
    title,
    `Generated: ${generatedAt.toISOString()}`,
    RULE,
    '',
    'Records',
    `  Total:   ${summary.total}`,
    `  Valid:   ${summary.valid} (${formatPercent(validRate(summary))})`,
    `  Invalid: ${summary.invalid}`,
    '',
    'Field completeness (valid records)'
  ];

  const fieldWidth = Math.max(0, ...summary.completeness.map(entry => entry.field.length));
  if (summary.completeness.length === 0) {
    lines.push('  (no fields tracked)');
  }
  for (const { field, percent } of summary.completeness) {
    lines.push(`  ${field.padEnd(fieldWidth)}  ${formatPercent(percent)}`);
  }

  lines.push('', 'Rejection reasons');
  if (summary.reasonFrequencies.length === 0) {
    lines.push('  (none)');
  }
  const codeWidth = Math.max(0, ...summary.reasonFrequencies.map(entry => entry.code.length));
  summary.reasonFrequencies.forEach(({ code, count }, rank) => {
    lines.push(`  ${rank + 1}. ${code.padEnd(codeWidth)}  ${count}`);
  });

  lines.push(RULE);
  return lines.join('\n') + '\n';
}
