// Technology types
export type {
  Category,
  SignatureSource,
  SignatureMatcher,
  Signature,
  TechnologyRef,
  SignatureOverride,
  SignatureRuleSet,
  TechProfile,
} from './technology.js';

// Record types
export type {
  MissingReport,
  PageMeta,
  SiteRecord,
  SiteRecordInput,
} from './record.js';

// Summary types
export type {
  RatioStatistic,
  TechnologyStatistic,
  MissingStatistic,
  BatchStatistics,
  MissingFeatureStatistics,
  BatchSummary,
  SummarizeOptions,
} from './summary.js';

// Fetch types
export type {
  FetcherOptions,
  FetchResult,
  FetchSuccessResult,
  FetchErrorResult,
  PageFetcher,
  FileProbe,
} from './fetch.js';

// Batch types
export type {
  BatchRunnerOptions,
  BatchSiteOutcome,
  BatchResult,
} from './batch.js';
