import fs from 'fs/promises';
import path from 'path';
import type { Logger } from 'winston';
import { deserializeRecord, serializeRecord } from '../records/serializer.js';
import { serializeSummary } from '../aggregation/summary-json.js';
import { formatSummaryReport } from '../aggregation/report.js';
import { InvalidRecordError } from '../errors.js';
import { urlToFileStem } from '../utils/url.js';
import type { BatchSummary, SiteRecord } from '../types/index.js';

export const SUMMARY_FILE = 'summary.json';
export const REPORT_FILE = 'summary_report.txt';

export interface LoadedRecords {
  records: SiteRecord[];
  invalid: InvalidRecordError[];
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export class RecordStore {
  private readonly dir: string;
  // Every name handed out or found on disk
  private readonly reserved = new Set<string>();

  constructor(dir: string) {
    this.dir = dir;
  }

  get directory(): string {
    return this.dir;
  }

  async ensureDirectory(): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
  }

  /** `<stem>.json`, or `<stem>_2.json`, `<stem>_3.json`... if taken. */
  async reserveFileName(url: string): Promise<string> {
    const stem = urlToFileStem(url);
    let counter = 1;

    for (;;) {
      const candidate = counter === 1 ? `${stem}.json` : `${stem}_${counter}.json`;
      counter++;
      if (candidate === SUMMARY_FILE || this.reserved.has(candidate)) continue;

      // Claimed before the await so a concurrent caller moves on to the next name
      this.reserved.add(candidate);
      if (!(await exists(path.join(this.dir, candidate)))) {
        return candidate;
      }
    }
  }

  async writeRecord(record: SiteRecord): Promise<string> {
    await this.ensureDirectory();
    const fileName = await this.reserveFileName(record.url);
    const filePath = path.join(this.dir, fileName);
    await fs.writeFile(filePath, serializeRecord(record), 'utf8');
    return filePath;
  }

  async writeSummary(summary: BatchSummary): Promise<{ summaryFile: string; reportFile: string }> {
    await this.ensureDirectory();
    const summaryFile = path.join(this.dir, SUMMARY_FILE);
    const reportFile = path.join(this.dir, REPORT_FILE);
    await fs.writeFile(summaryFile, serializeSummary(summary), 'utf8');
    await fs.writeFile(reportFile, formatSummaryReport(summary), 'utf8');
    return { summaryFile, reportFile };
  }

  /** Reads every record file in the directory, sorted by name; summary.json is skipped. */
  async loadRecords(logger?: Logger): Promise<LoadedRecords> {
    const entries = await fs.readdir(this.dir);
    const files = entries.filter((name) => name.endsWith('.json') && name !== SUMMARY_FILE).sort();

    const records: SiteRecord[] = [];
    const invalid: InvalidRecordError[] = [];

    for (const name of files) {
      const filePath = path.join(this.dir, name);
      try {
        const text = await fs.readFile(filePath, 'utf8');
        records.push(deserializeRecord(text, name));
      } catch (error) {
        if (!(error instanceof InvalidRecordError)) throw error;
        logger?.warn(`Skipping record file: ${error.message}`);
        invalid.push(error);
      }
    }

    return { records, invalid };
  }
}
