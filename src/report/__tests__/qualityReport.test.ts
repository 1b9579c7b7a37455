import { renderQualityReport } from '../qualityReport';
import { QualitySummary } from '../../validation/summary';

const generatedAt = new Date('2024-01-02T03:04:05.000Z');
const rule = '═'.repeat(60);

describe('renderQualityReport', () => {
  it('should render counts, completeness and ranked reasons', () => {
    const summary: QualitySummary = {
      total: 4,
      valid: 2,
      invalid: 2,
      completeness: [
        { field: 'heading', percent: 100 },
        { field: 'guid', percent: 50 }
      ],
      reasonFrequencies: [
        { code: 'invalid_url', count: 2 },
        { code: 'content_too_short', count: 1 }
      ]
    };

    const report = renderQualityReport(summary, { generatedAt });

    expect(report.split('\n')).toEqual([
      'NEWS RECORD QUALITY REPORT',
      'Generated: 2024-01-02T03:04:05.000Z',
      rule,
      '',
      'Records',
      '  Total:   4',
      '  Valid:   2 (50.00%)',
      '  Invalid: 2',
      '',
      'Field completeness (valid records)',
      '  heading  100.00%',
      '  guid     50.00%',
      '',
      'Rejection reasons',
      '  1. invalid_url        2',
      '  2. content_too_short  1',
      rule,
      ''
    ]);
  });

  it('should render an empty run', () => {
    const summary: QualitySummary = {
      total: 0,
      valid: 0,
      invalid: 0,
      completeness: [],
      reasonFrequencies: []
    };

    const lines = renderQualityReport(summary, { generatedAt, title: 'Nightly run' }).split('\n');

    expect(lines[0]).toBe('Nightly run');
    expect(lines).toContain('  Valid:   0 (0.00%)');
    expect(lines).toContain('  (no fields tracked)');
    expect(lines).toContain('  (none)');
  });
});
