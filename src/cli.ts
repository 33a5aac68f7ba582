#!/usr/bin/env node
import fs from 'fs';
import fsp from 'fs/promises';
import path from 'path';
import { pathToFileURL } from 'url';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import type { Logger } from 'winston';
import { loadConfig } from './config.js';
import { HttpFetcher } from './http/fetcher.js';
import { SiteAnalyzer } from './batch/site-analyzer.js';
import { BatchRunner, MAX_JOBS } from './batch/batch-runner.js';
import { RecordStore } from './batch/record-store.js';
import { summarize } from './aggregation/aggregator.js';
import { serializeSummary } from './aggregation/summary-json.js';
import { formatSummaryReport } from './aggregation/report.js';
import { serializeRecord } from './records/serializer.js';
import { LogLevelSchema, type AppConfig } from './schemas/config.js';
import { StackLensError } from './errors.js';
import { createJobLogger, createLogger } from './utils/logger.js';
import { normalizeTargetUrl, parseUrlList } from './utils/url.js';

interface CliContext {
  config: AppConfig;
  logger: Logger;
}

function createContext(logLevel: string | undefined): CliContext {
  const config = loadConfig();
  const level = logLevel ?? config.logLevel;
  return { config, logger: createLogger({ name: 'stacklens', level }) };
}

function createAnalyzer({ config, logger }: CliContext): SiteAnalyzer {
  return new SiteAnalyzer(new HttpFetcher(config.fetcher, logger), { logger });
}

async function analyzeCommand(ctx: CliContext, url: string, outputDir: string | undefined): Promise<void> {
  const target = normalizeTargetUrl(url);
  ctx.logger.info(`Analyzing tech stack for: ${target}`);

  const analysis = await createAnalyzer(ctx).analyze(target);
  const store = new RecordStore(outputDir ?? ctx.config.batch.outputDir);
  const file = await store.writeRecord(analysis.record);

  ctx.logger.info(`Results saved to: ${file}`);
  process.stdout.write(serializeRecord(analysis.record));
}

async function batchCommand(ctx: CliContext, file: string, jobs: number | undefined, outputDir: string | undefined): Promise<void> {
  const urls = parseUrlList(await fsp.readFile(file, 'utf8'));
  const level = ctx.logger.level;

  const runner = new BatchRunner(
    createAnalyzer(ctx),
    { jobs: jobs ?? ctx.config.batch.jobs, outputDir: outputDir ?? ctx.config.batch.outputDir },
    { logger: createJobLogger('batch', { level }) }
  );

  const result = await runner.run(urls);
  const degraded = result.sites.filter((site) => site.degraded).length;

  ctx.logger.info(`Results saved to: ${result.batchDir}`, { sites: result.sites.length, degraded });
  ctx.logger.info(`Summary JSON: ${result.summaryFile}`);
  ctx.logger.info(`Summary report: ${result.reportFile}`);
  process.stdout.write(await fsp.readFile(result.reportFile, 'utf8'));
}

async function summarizeCommand(ctx: CliContext, dir: string, format: 'json' | 'text'): Promise<void> {
  const store = new RecordStore(dir);
  const { records, invalid } = await store.loadRecords(ctx.logger);

  if (invalid.length > 0) {
    ctx.logger.warn(`${invalid.length} record file(s) skipped`);
  }

  const batchId = path.basename(path.resolve(dir)).replace(/^batch_/, '');
  const summary = summarize(records, { batchId });

  process.stdout.write(format === 'json' ? serializeSummary(summary) : formatSummaryReport(summary));
}

export async function main(argv: string[] = hideBin(process.argv)): Promise<void> {
  await yargs(argv)
    .scriptName('stacklens')
    .usage('$0 <command> [options]')
    .option('log-level', {
      describe: 'log level (defaults to STACKLENS_LOG_LEVEL or info)',
      type: 'string',
      choices: LogLevelSchema.options,
    })
    .command(
      'analyze <url>',
      'Analyze a single URL',
      (y) =>
        y
          .positional('url', { type: 'string', demandOption: true, describe: 'URL to analyze' })
          .option('output-dir', { alias: 'o', type: 'string', describe: 'directory for the JSON record' }),
      async (args) => {
        await analyzeCommand(createContext(args.logLevel), args.url, args.outputDir);
      }
    )
    .command(
      'batch <file>',
      'Analyze every URL listed in a file (one per line)',
      (y) =>
        y
          .positional('file', { type: 'string', demandOption: true, describe: 'file of URLs' })
          .option('jobs', { alias: 'j', type: 'number', describe: `parallel jobs (1-${MAX_JOBS})` })
          .option('output-dir', { alias: 'o', type: 'string', describe: 'parent directory for the batch' })
          .check((args) => {
            if (args.jobs !== undefined && (!Number.isInteger(args.jobs) || args.jobs < 1 || args.jobs > MAX_JOBS)) {
              throw new StackLensError(`--jobs must be a number between 1 and ${MAX_JOBS}`);
            }
            return true;
          }),
      async (args) => {
        await batchCommand(createContext(args.logLevel), args.file, args.jobs, args.outputDir);
      }
    )
    .command(
      'summarize <dir>',
      'Summarize the site records in a batch directory',
      (y) =>
        y
          .positional('dir', { type: 'string', demandOption: true, describe: 'batch directory' })
          .option('format', { alias: 'f', choices: ['json', 'text'] as const, default: 'json' as const }),
      async (args) => {
        await summarizeCommand(createContext(args.logLevel), args.dir, args.format);
      }
    )
    .demandCommand(1, 'Specify a command')
    .strict()
    .help()
    .alias('help', 'h')
    .fail((message, error, y) => {
      if (error) throw error;
      y.showHelp();
      throw new StackLensError(message);
    })
    .parseAsync();
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry || !fs.existsSync(entry)) return false;
  return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
}

if (isMainModule()) {
  main().catch((error) => {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    console.error(`Error: ${errorMessage}`);
    process.exit(1);
  });
}
