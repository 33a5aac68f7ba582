export { SiteAnalyzer, type SiteAnalysis, type SiteAnalyzerOptions } from './site-analyzer.js';
export { RecordStore, SUMMARY_FILE, REPORT_FILE, type LoadedRecords } from './record-store.js';
export { BatchRunner, MAX_JOBS } from './batch-runner.js';
