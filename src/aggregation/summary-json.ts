import type { BatchSummary, Category, MissingStatistic, RatioStatistic } from '../types/index.js';

interface MissingStatisticJson {
  name: string;
  missing_on: number;
  percentage: number;
}

export interface BatchSummaryJson {
  batch_id: string;
  analyzed_at: string;
  total_sites: number;
  statistics: {
    responsive_design: RatioStatistic;
    ssl_enabled: RatioStatistic;
    http2: RatioStatistic;
  };
  common_technologies: Record<Category, Array<{ name: string; count: number; percentage: number }>>;
  common_missing_features: {
    security_headers: MissingStatisticJson[];
    files: MissingStatisticJson[];
    meta_tags: MissingStatisticJson[];
  };
}

const missingJson = (items: MissingStatistic[]): MissingStatisticJson[] =>
  items.map((item) => ({ name: item.name, missing_on: item.missingOn, percentage: item.percentage }));

export function toSummaryJson(summary: BatchSummary): BatchSummaryJson {
  const { statistics, commonMissingFeatures } = summary;

  return {
    batch_id: summary.batchId,
    analyzed_at: summary.analyzedAt,
    total_sites: summary.totalSites,
    statistics: {
      responsive_design: { ...statistics.responsiveDesign },
      ssl_enabled: { ...statistics.sslEnabled },
      http2: { ...statistics.http2 },
    },
    common_technologies: summary.commonTechnologies,
    common_missing_features: {
      security_headers: missingJson(commonMissingFeatures.securityHeaders),
      files: missingJson(commonMissingFeatures.files),
      meta_tags: missingJson(commonMissingFeatures.metaTags),
    },
  };
}

export function serializeSummary(summary: BatchSummary): string {
  return `${JSON.stringify(toSummaryJson(summary), null, 2)}\n`;
}
