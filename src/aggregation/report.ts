import { CATEGORIES } from '../schemas/technology.js';
import type { BatchSummary, MissingStatistic, RatioStatistic } from '../types/index.js';

const RULE = '========================================';

function missingSection(title: string, items: MissingStatistic[], total: number, noneLabel: string): string[] {
  const lines = [title, ''];
  if (items.length === 0) {
    lines.push(`  ✓ No missing ${noneLabel} detected`);
  } else {
    for (const item of items) {
      lines.push(`  ✗ ${item.name} - Missing on ${item.missingOn}/${total} sites (${item.percentage}%)`);
    }
  }
  lines.push('');
  return lines;
}

function ratioLine(label: string, stat: RatioStatistic, total: number): string {
  return `  ${label}: ${stat.count}/${total} sites (${stat.percentage}%)`;
}

/** Human-readable rendering of a batch summary, one finding per line. */
export function formatSummaryReport(summary: BatchSummary): string {
  const total = summary.totalSites;
  const lines: string[] = [RULE, ' Batch Analysis Summary', RULE, '', `Total sites analyzed: ${total}`, ''];

  lines.push('Common Technologies (>50% of sites):', '');
  const common = CATEGORIES.flatMap((category, order) =>
    summary.commonTechnologies[category].map((tech) => ({ ...tech, category, order }))
  ).sort((a, b) => b.count - a.count || a.order - b.order);

  for (const tech of common) {
    lines.push(`  ✓ ${tech.name} (${tech.category}) - ${tech.count}/${total} sites (${tech.percentage}%)`);
  }
  lines.push('');

  const missing = summary.commonMissingFeatures;
  lines.push(...missingSection('Common Missing Security Headers:', missing.securityHeaders, total, 'security headers'));
  lines.push(...missingSection('Common Missing Files:', missing.files, total, 'files'));
  lines.push(...missingSection('Common Missing Meta Tags:', missing.metaTags, total, 'meta tags'));

  lines.push('Additional Statistics:', '');
  lines.push(ratioLine('Responsive design', summary.statistics.responsiveDesign, total));
  lines.push(ratioLine('SSL enabled', summary.statistics.sslEnabled, total));
  lines.push(ratioLine('HTTP/2', summary.statistics.http2, total));
  lines.push('', RULE);

  return `${lines.join('\n')}\n`;
}
