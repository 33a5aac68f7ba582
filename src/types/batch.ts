export interface BatchRunnerOptions {
  jobs?: number | undefined;
  outputDir?: string | undefined;
  batchId?: string | undefined;
}

export interface BatchSiteOutcome {
  url: string;
  file: string;
  degraded: boolean;
}

export interface BatchResult {
  batchId: string;
  batchDir: string;
  sites: BatchSiteOutcome[];
  summaryFile: string;
  reportFile: string;
}
