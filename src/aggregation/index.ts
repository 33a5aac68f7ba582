export { Aggregator, summarize, percentageOf, isCommon, countOccurrences, rankCounts } from './aggregator.js';
export { toSummaryJson, serializeSummary, type BatchSummaryJson } from './summary-json.js';
export { formatSummaryReport } from './report.js';
