import type { Logger } from 'winston';
import { SiteRecordBuilder } from '../records/site-record.js';
import { FILE_PROBES } from '../absence/checklists.js';
import { allProbesFailed } from '../absence/absence-checker.js';
import { createLogger } from '../utils/logger.js';
import { originOf } from '../utils/url.js';
import type { FetchResult, FileProbe, PageFetcher, SiteRecord } from '../types/index.js';

export interface SiteAnalysis {
  record: SiteRecord;
  /** The page could not be fetched; the record was built from empty input. */
  degraded: boolean;
  error: string | null;
}

export interface SiteAnalyzerOptions {
  builder?: SiteRecordBuilder | undefined;
  logger?: Logger | undefined;
  probes?: readonly FileProbe[] | undefined;
  now?: (() => Date) | undefined;
}

export class SiteAnalyzer {
  private readonly fetcher: PageFetcher;
  private readonly builder: SiteRecordBuilder;
  private readonly logger: Logger;
  private readonly probes: readonly FileProbe[];
  private readonly now: () => Date;

  constructor(fetcher: PageFetcher, options: SiteAnalyzerOptions = {}) {
    this.fetcher = fetcher;
    this.builder = options.builder ?? new SiteRecordBuilder();
    this.logger = options.logger ?? createLogger({ name: 'analyzer' });
    this.probes = options.probes ?? FILE_PROBES;
    this.now = options.now ?? (() => new Date());
  }

  async analyze(url: string): Promise<SiteAnalysis> {
    const analyzedAt = this.now();
    const page = await this.fetchPage(url);

    if (!page.ok) {
      this.logger.warn(`Fetch failed, recording degraded result: ${page.error}`, { url });
      return {
        record: this.builder.build({ url, analyzedAt, headers: '', body: '', fileProbes: allProbesFailed() }),
        degraded: true,
        error: page.error,
      };
    }

    this.logger.info(`Fetched ${page.status} (${page.body.length} bytes)`, { url });
    const fileProbes = await this.probeFiles(url);

    return {
      record: this.builder.build({ url, analyzedAt, headers: page.headers, body: page.body, fileProbes }),
      degraded: false,
      error: null,
    };
  }

  private async fetchPage(url: string): Promise<FetchResult> {
    try {
      return await this.fetcher.fetchPage(url);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      return { ok: false, error: errorMessage, status: null, url, timestamp: new Date().toISOString() };
    }
  }

  // Probes for one site run concurrently; results keep checklist order
  private async probeFiles(url: string): Promise<Map<string, boolean>> {
    const origin = originOf(url);
    if (!origin) {
      return new Map(this.probes.map((probe): [string, boolean] => [probe.name, false]));
    }

    const results = await Promise.all(
      this.probes.map(async (probe): Promise<[string, boolean]> => [
        probe.name,
        await this.fetcher.probeExists(new URL(probe.path, origin).toString()),
      ])
    );

    return new Map(results);
  }
}
