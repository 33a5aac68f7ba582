import type { Category } from './technology.js';

export interface RatioStatistic {
  count: number;
  percentage: number;
}

export interface TechnologyStatistic {
  name: string;
  count: number;
  percentage: number;
}

export interface MissingStatistic {
  name: string;
  missingOn: number;
  percentage: number;
}

export interface BatchStatistics {
  responsiveDesign: RatioStatistic;
  sslEnabled: RatioStatistic;
  http2: RatioStatistic;
}

export interface MissingFeatureStatistics {
  securityHeaders: MissingStatistic[];
  files: MissingStatistic[];
  metaTags: MissingStatistic[];
}

export interface BatchSummary {
  batchId: string;
  analyzedAt: string;
  totalSites: number;
  statistics: BatchStatistics;
  commonTechnologies: Record<Category, TechnologyStatistic[]>;
  commonMissingFeatures: MissingFeatureStatistics;
}

export interface SummarizeOptions {
  batchId?: string | undefined;
  analyzedAt?: Date | undefined;
}
