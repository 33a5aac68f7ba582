import { EmptyBatchError } from '../errors.js';
import { mapCategories } from '../utils/categories.js';
import { formatBatchId, toIsoSeconds } from '../utils/time.js';
import type {
  BatchSummary,
  Category,
  MissingStatistic,
  RatioStatistic,
  SiteRecord,
  SummarizeOptions,
  TechnologyStatistic,
} from '../types/index.js';

/** floor(count * 100 / total); truncation is part of the report contract. */
export function percentageOf(count: number, total: number): number {
  return Math.floor((count * 100) / total);
}

/** Strict majority with the threshold truncated: 5 of 10 is not common, 6 of 10 is. */
export function isCommon(count: number, total: number): boolean {
  return count > Math.floor(total / 2);
}

export function countOccurrences(lists: Iterable<readonly string[]>): Map<string, number> {
  const counts = new Map<string, number>();
  for (const list of lists) {
    // One vote per record even if a list repeats a name
    for (const name of new Set(list)) {
      counts.set(name, (counts.get(name) ?? 0) + 1);
    }
  }
  return counts;
}

export function rankCounts(counts: Map<string, number>): Array<[string, number]> {
  return [...counts.entries()].sort(([nameA, countA], [nameB, countB]) => {
    if (countA !== countB) return countB - countA;
    return nameA < nameB ? -1 : nameA > nameB ? 1 : 0;
  });
}

export class Aggregator {
  summarize(records: readonly SiteRecord[], options: SummarizeOptions = {}): BatchSummary {
    const totalSites = records.length;
    if (totalSites === 0) {
      throw new EmptyBatchError();
    }

    const analyzedAt = options.analyzedAt ?? new Date();

    return {
      batchId: options.batchId ?? formatBatchId(analyzedAt),
      analyzedAt: toIsoSeconds(analyzedAt),
      totalSites,
      statistics: {
        responsiveDesign: this.ratio(records, (record) => record.meta.responsive),
        sslEnabled: this.ratio(records, (record) => record.meta.sslEnabled),
        http2: this.ratio(records, (record) => record.meta.httpVersion === 'HTTP/2'),
      },
      commonTechnologies: mapCategories((category) => this.commonIn(records, category)),
      commonMissingFeatures: {
        securityHeaders: this.missing(records.map((record) => record.missing.security), totalSites),
        files: this.missing(records.map((record) => record.missing.files), totalSites),
        metaTags: this.missing(records.map((record) => record.missing.metaTags), totalSites),
      },
    };
  }

  private commonIn(records: readonly SiteRecord[], category: Category): TechnologyStatistic[] {
    const totalSites = records.length;
    const counts = countOccurrences(records.map((record) => record.technologies[category]));

    return rankCounts(counts)
      .filter(([, count]) => isCommon(count, totalSites))
      .map(([name, count]) => ({ name, count, percentage: percentageOf(count, totalSites) }));
  }

  private missing(lists: Array<readonly string[]>, totalSites: number): MissingStatistic[] {
    return rankCounts(countOccurrences(lists)).map(([name, count]) => ({
      name,
      missingOn: count,
      percentage: percentageOf(count, totalSites),
    }));
  }

  private ratio(records: readonly SiteRecord[], holds: (record: SiteRecord) => boolean): RatioStatistic {
    const count = records.filter(holds).length;
    return { count, percentage: percentageOf(count, records.length) };
  }
}

const aggregator = new Aggregator();

export function summarize(records: readonly SiteRecord[], options: SummarizeOptions = {}): BatchSummary {
  return aggregator.summarize(records, options);
}
