// Detection
export { TechDetector, detect, matcherHolds, createEmptyProfile } from './detector/index.js';
export { loadSignatureRules, parseSignatureFile, compileSignatureFile, getDefaultRuleSet } from './signatures/index.js';

// Absence checks and page metadata
export { checkMissing, SECURITY_HEADER_CHECKLIST, FILE_PROBES, META_TAG_CHECKLIST } from './absence/index.js';
export { extractPageMeta, PageMetaExtractor } from './extraction/index.js';

// Records
export {
  SiteRecordBuilder,
  buildSiteRecord,
  toRecordJson,
  serializeRecord,
  parseRecordJson,
  deserializeRecord,
} from './records/index.js';

// Aggregation
export { Aggregator, summarize, toSummaryJson, serializeSummary, formatSummaryReport } from './aggregation/index.js';

// Fetching and batches
export { HttpFetcher } from './http/index.js';
export { SiteAnalyzer, RecordStore, BatchRunner } from './batch/index.js';

export { loadConfig } from './config.js';
export { CATEGORIES } from './schemas/index.js';
export {
  StackLensError,
  EmptyBatchError,
  InvalidRecordError,
  SignatureLoadError,
  ConfigError,
} from './errors.js';

export type * from './types/index.js';
export type { BatchSummaryJson } from './aggregation/index.js';
export type { SiteRecordJson, AppConfig } from './schemas/index.js';
