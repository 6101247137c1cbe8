#!/usr/bin/env node
import { createRequire } from 'node:module';
import { Command } from 'commander';

import { crawlOrchestrator } from './index.js';
import { createConfigurationError } from './errors.js';
import type { ScannerKind } from './crawler/parsing/markupScanner.js';
import type { CrawlOrchestratorConfig, OutputFormat } from './types.js';
import { reportCrawlerError } from './util/errorHandler.js';

const require = createRequire(import.meta.url);
// eslint-disable-next-line @typescript-eslint/no-var-requires -- package.json access for CLI metadata
const pkg = require('../package.json') as { version?: string };

const program = new Command();

program
  .name('image-spider')
  .description(
    'Download the images of a page and, with -r, of the same-host pages it links to.',
  )
  .version(pkg.version ?? '0.0.0')
  .argument('<url>', 'Seed URL (http or https).')
  .option('-r, --recursive', 'Follow same-host links and download their images too.')
  .option('-l, --max-depth <number>', 'Maximum number of link hops, only used with -r. (default: 5)')
  .option('-p, --path <dir>', 'Directory the images are written to. (default: ./data)')
  .option('--concurrency <number>', 'Pages fetched and images downloaded in parallel. (default: 4)')
  .option('--timeout-ms <number>', 'Page request timeout; images get twice as long. (default: 15000)')
  .option('--delay-ms <number>', 'Pause after each request, per worker. (default: 0)')
  .option('--user-agent <value>', 'User-Agent header sent with every request.')
  .option('--parser <kind>', 'Markup scanner: pattern (regex, default) or cheerio.')
  .option('--quiet', 'Suppress per-page output and show a single progress line.')
  .option('--format <format>', 'Output format to emit (text or json). Defaults to text.')
  .option('--log-level <level>', 'Set log verbosity (pino levels: trace|debug|info|warn|error|fatal).')
  .action(async (url: string, options: Record<string, unknown>) => {
    try {
      const config = buildConfig(options);
      await crawlOrchestrator(url, config);
    } catch (error) {
      reportCliError(error);
    }
  });

await program.parseAsync(process.argv);

function buildConfig(rawOptions: Record<string, unknown>): CrawlOrchestratorConfig {
  const config: CrawlOrchestratorConfig = {};

  if (rawOptions.recursive === true) {
    config.recursive = true;
  }

  if (rawOptions.maxDepth !== undefined) {
    config.maxDepth = asNonNegativeInteger(rawOptions.maxDepth, 'max-depth');
  }

  if (rawOptions.path !== undefined) {
    config.outputDir = String(rawOptions.path);
  }

  if (rawOptions.concurrency !== undefined) {
    config.concurrency = asNumber(rawOptions.concurrency, 'concurrency');
  }

  if (rawOptions.timeoutMs !== undefined) {
    config.timeoutMs = asNumber(rawOptions.timeoutMs, 'timeout-ms');
  }

  if (rawOptions.delayMs !== undefined) {
    config.delayMs = asNonNegativeInteger(rawOptions.delayMs, 'delay-ms');
  }

  if (rawOptions.userAgent !== undefined) {
    config.userAgent = String(rawOptions.userAgent);
  }

  if (rawOptions.parser !== undefined) {
    const parser = String(rawOptions.parser).toLowerCase();
    if (!isScannerKind(parser)) {
      throw createConfigurationError(`Unsupported parser: ${parser}`, { value: parser });
    }
    config.parser = parser;
  }

  if (rawOptions.format !== undefined) {
    const format = String(rawOptions.format).toLowerCase();
    if (!isOutputFormat(format)) {
      throw createConfigurationError(`Unsupported format: ${format}`, { value: format });
    }
    config.format = format;
  }

  if (rawOptions.quiet === true) {
    config.quiet = true;
  }

  if (rawOptions.logLevel !== undefined) {
    config.logLevel = String(rawOptions.logLevel);
  }

  return config;
}

function asNumber(value: unknown, label: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw createConfigurationError(`${label} must be a finite number.`, { value });
  }

  return parsed;
}

function asNonNegativeInteger(value: unknown, label: string): number {
  const text = String(value);
  if (!/^\d+$/.test(text)) {
    throw createConfigurationError(`Invalid ${label} value: ${text}`, { value });
  }

  return Number(text);
}

function reportCliError(error: unknown): void {
  const crawlerError = reportCrawlerError(error, { stage: 'cli' }, {
    defaultKind: 'config',
    defaultSeverity: 'fatal',
    throwOnFatal: false,
  });
  console.error(`Error: ${crawlerError.message}`);
  process.exitCode = 1;
}

function isOutputFormat(value: string): value is OutputFormat {
  return value === 'text' || value === 'json';
}

function isScannerKind(value: string): value is ScannerKind {
  return value === 'pattern' || value === 'cheerio';
}
