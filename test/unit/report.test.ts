import { describe, it, expect } from 'vitest';
import { summarize } from '../../src/aggregation/aggregator.js';
import { formatSummaryReport } from '../../src/aggregation/report.js';
import { makeRecord } from '../helpers/records.js';

const RULE = '='.repeat(40);

describe('formatSummaryReport', () => {
  it('renders every section', () => {
    const summary = summarize(
      [
        makeRecord({
          technologies: { cms: ['WordPress'], reverse_proxies: ['Nginx'] },
          meta: { responsive: true, sslEnabled: true, httpVersion: 'HTTP/2' },
          missing: { security: ['X-Frame-Options'] },
        }),
        makeRecord({
          technologies: { cms: ['WordPress'] },
          meta: { responsive: false, sslEnabled: true, httpVersion: 'HTTP/1.1' },
          missing: { security: ['X-Frame-Options', 'Permissions-Policy'] },
        }),
      ],
      { batchId: 'demo', analyzedAt: new Date('2024-05-01T09:30:00Z') }
    );

    expect(formatSummaryReport(summary)).toBe(
      [
        RULE,
        ' Batch Analysis Summary',
        RULE,
        '',
        'Total sites analyzed: 2',
        '',
        'Common Technologies (>50% of sites):',
        '',
        '  ✓ WordPress (cms) - 2/2 sites (100%)',
        '',
        'Common Missing Security Headers:',
        '',
        '  ✗ X-Frame-Options - Missing on 2/2 sites (100%)',
        '  ✗ Permissions-Policy - Missing on 1/2 sites (50%)',
        '',
        'Common Missing Files:',
        '',
        '  ✓ No missing files detected',
        '',
        'Common Missing Meta Tags:',
        '',
        '  ✓ No missing meta tags detected',
        '',
        'Additional Statistics:',
        '',
        '  Responsive design: 1/2 sites (50%)',
        '  SSL enabled: 2/2 sites (100%)',
        '  HTTP/2: 1/2 sites (50%)',
        '',
        RULE,
        '',
      ].join('\n')
    );
  });

  it('orders common technologies by count, then category', () => {
    const summary = summarize(
      [
        makeRecord({ technologies: { cdn: ['Fastly'], cms: ['Wix'], hosting: ['Netlify'] } }),
        makeRecord({ technologies: { cdn: ['Fastly'], cms: ['Wix'] } }),
        makeRecord({ technologies: { cdn: ['Fastly'], hosting: ['Netlify'] } }),
      ],
      { batchId: 'demo' }
    );
    const lines = formatSummaryReport(summary)
      .split('\n')
      .filter((line) => line.startsWith('  ✓ ') && line.includes('sites ('));

    expect(lines).toEqual([
      '  ✓ Fastly (cdn) - 3/3 sites (100%)',
      '  ✓ Wix (cms) - 2/3 sites (66%)',
      '  ✓ Netlify (hosting) - 2/3 sites (66%)',
    ]);
  });
});
