import path from 'path';
import type { Logger } from 'winston';
import { SiteAnalyzer } from './site-analyzer.js';
import { RecordStore } from './record-store.js';
import { Aggregator } from '../aggregation/aggregator.js';
import { EmptyBatchError } from '../errors.js';
import { createJobLogger } from '../utils/logger.js';
import { formatBatchId } from '../utils/time.js';
import type { BatchResult, BatchRunnerOptions, BatchSiteOutcome, SiteRecord } from '../types/index.js';

export const MAX_JOBS = 10;

export class BatchRunner {
  private readonly analyzer: SiteAnalyzer;
  private readonly aggregator: Aggregator;
  private readonly jobs: number;
  private readonly outputDir: string;
  private readonly batchId: string | undefined;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    analyzer: SiteAnalyzer,
    options: BatchRunnerOptions = {},
    deps: { logger?: Logger | undefined; now?: (() => Date) | undefined } = {}
  ) {
    this.analyzer = analyzer;
    this.aggregator = new Aggregator();
    this.jobs = Math.min(Math.max(Math.trunc(options.jobs ?? 3), 1), MAX_JOBS);
    this.outputDir = options.outputDir ?? '.';
    this.batchId = options.batchId;
    this.logger = deps.logger ?? createJobLogger('batch');
    this.now = deps.now ?? (() => new Date());
  }

  async run(urls: readonly string[]): Promise<BatchResult> {
    if (urls.length === 0) {
      throw new EmptyBatchError('No URLs to analyze');
    }

    const startedAt = this.now();
    const batchId = this.batchId ?? formatBatchId(startedAt);
    const batchDir = path.join(this.outputDir, `batch_${batchId}`);
    const store = new RecordStore(batchDir);
    await store.ensureDirectory();

    this.logger.info(`Batch ${batchId}: ${urls.length} URLs, ${this.jobs} parallel jobs -> ${batchDir}`);

    const records: Array<SiteRecord | undefined> = new Array(urls.length);
    const outcomes: Array<BatchSiteOutcome | undefined> = new Array(urls.length);
    let nextIndex = 0;
    let completed = 0;

    const worker = async (): Promise<void> => {
      while (nextIndex < urls.length) {
        const index = nextIndex++;
        const url = urls[index];
        if (url === undefined) continue;

        const analysis = await this.analyzer.analyze(url);
        const file = await store.writeRecord(analysis.record);
        records[index] = analysis.record;
        outcomes[index] = { url, file, degraded: analysis.degraded };

        completed++;
        if (analysis.degraded) {
          this.logger.warn(`[${completed}/${urls.length}] Failed`, { url, error: analysis.error ?? undefined });
        } else {
          this.logger.info(`[${completed}/${urls.length}] Completed`, { url });
        }
      }
    };

    const workerCount = Math.min(this.jobs, urls.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    // Input order, so the summary does not depend on which job finished first
    const collected = records.filter((record): record is SiteRecord => record !== undefined);
    const summary = this.aggregator.summarize(collected, { batchId, analyzedAt: this.now() });
    const { summaryFile, reportFile } = await store.writeSummary(summary);

    this.logger.info(`Batch ${batchId} complete: ${summary.totalSites} sites summarized`);

    return {
      batchId,
      batchDir,
      sites: outcomes.filter((outcome): outcome is BatchSiteOutcome => outcome !== undefined),
      summaryFile,
      reportFile,
    };
  }
}
