import { mkdir } from 'node:fs/promises';

import { crawl } from './crawler/crawl.js';
import { HttpTransport } from './crawler/network/httpTransport.js';
import { parseAbsoluteUrl, type AbsoluteUrl } from './crawler/url/absoluteUrl.js';
import type { ScannerKind } from './crawler/parsing/markupScanner.js';
import { createConfigurationError, createOutputError } from './errors.js';
import { configureLogger, isLogLevel } from './logger.js';
import type {
  CrawlOptions,
  CrawlOrchestratorConfig,
  CrawlSummary,
  OutputFormat,
} from './types.js';

export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (X11; Linux x86_64) image-spider/1.0';

export const DEFAULT_OPTIONS: CrawlOptions = {
  recursive: false,
  maxDepth: 5,
  outputDir: './data',
  concurrency: 4,
  timeoutMs: 15_000,
  delayMs: 0,
  userAgent: DEFAULT_USER_AGENT,
  parser: 'pattern',
  format: 'text',
  quiet: false,
  logLevel: 'silent',
};

const VALID_FORMATS: OutputFormat[] = ['text', 'json'];
const VALID_PARSERS: ScannerKind[] = ['pattern', 'cheerio'];

/**
 * Validates the seed and options, prepares the output directory and runs one
 * crawl. Throws a fatal CrawlerError before any request when the seed or the
 * configuration is unusable; per-page and per-image failures never reject.
 */
export async function crawlOrchestrator(
  startUrl: string,
  config: CrawlOrchestratorConfig = {},
): Promise<CrawlSummary> {
  const seed = validateStartUrl(startUrl);
  const options = resolveOptions(config);

  if (config.logLevel !== undefined) {
    configureLogger({ level: options.logLevel });
  }

  await ensureOutputDir(options.outputDir);

  return crawl({
    seed,
    options,
    transport: config.transport ?? new HttpTransport({ timeoutMs: options.timeoutMs }),
    handlers: config.handlers,
  });
}

export function validateStartUrl(startUrl: string): AbsoluteUrl {
  const seed = parseAbsoluteUrl(startUrl);
  if (!seed) {
    throw createConfigurationError(
      `Invalid URL (only http and https are supported): ${startUrl}`,
      { startUrl },
    );
  }

  return seed;
}

export function resolveOptions(config: CrawlOrchestratorConfig): CrawlOptions {
  const options: CrawlOptions = {
    recursive: config.recursive ?? DEFAULT_OPTIONS.recursive,
    maxDepth: coerceNonNegativeInteger(config.maxDepth ?? DEFAULT_OPTIONS.maxDepth, 'max-depth'),
    outputDir: config.outputDir ?? DEFAULT_OPTIONS.outputDir,
    concurrency: coercePositiveInteger(
      config.concurrency ?? DEFAULT_OPTIONS.concurrency,
      'concurrency',
    ),
    timeoutMs: coercePositiveInteger(config.timeoutMs ?? DEFAULT_OPTIONS.timeoutMs, 'timeout-ms'),
    delayMs: coerceNonNegativeInteger(config.delayMs ?? DEFAULT_OPTIONS.delayMs, 'delay-ms'),
    userAgent: (config.userAgent ?? DEFAULT_OPTIONS.userAgent).trim(),
    parser: config.parser ?? DEFAULT_OPTIONS.parser,
    format: config.format ?? DEFAULT_OPTIONS.format,
    quiet: config.quiet ?? DEFAULT_OPTIONS.quiet,
    logLevel: config.logLevel ?? DEFAULT_OPTIONS.logLevel,
  };

  if (options.outputDir.trim().length === 0) {
    throw createConfigurationError('Output directory must not be empty.');
  }

  if (options.userAgent.length === 0) {
    throw createConfigurationError('User agent must not be empty.');
  }

  if (!VALID_FORMATS.includes(options.format)) {
    throw createConfigurationError(`Unsupported format: ${options.format}`, {
      format: options.format,
    });
  }

  if (!VALID_PARSERS.includes(options.parser)) {
    throw createConfigurationError(`Unsupported parser: ${options.parser}`, {
      parser: options.parser,
    });
  }

  if (!isLogLevel(options.logLevel)) {
    throw createConfigurationError(`Unsupported log level: ${options.logLevel}`, {
      logLevel: options.logLevel,
    });
  }

  return options;
}

async function ensureOutputDir(outputDir: string): Promise<void> {
  try {
    await mkdir(outputDir, { recursive: true });
  } catch (error) {
    throw createOutputError(`Failed to create output directory: ${outputDir}`, { outputDir }, {
      cause: error,
    });
  }
}

function coercePositiveInteger(value: number, field: string): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw createConfigurationError(`${field} must be a positive integer.`, { value, field });
  }

  return Math.trunc(value);
}

function coerceNonNegativeInteger(value: number, field: string): number {
  if (!Number.isFinite(value) || value < 0) {
    throw createConfigurationError(`${field} must be zero or a positive integer.`, { value, field });
  }

  return Math.trunc(value);
}

export { formatAbsoluteUrl, parseAbsoluteUrl } from './crawler/url/absoluteUrl.js';
export { resolveHref, normalizePath } from './crawler/url/resolveHref.js';
export { deriveFilename, isImage } from './crawler/images/imageClassifier.js';
export { createMarkupScanner } from './crawler/parsing/index.js';
export { HttpTransport } from './crawler/network/httpTransport.js';
export type { MarkupScanner, ScannerKind } from './crawler/parsing/markupScanner.js';
export type {
  DownloadResult,
  FetchTextResult,
  RequestContext,
  Transport,
} from './crawler/network/transport.js';
export type { AbsoluteUrl };
export type { CrawlOptions, CrawlOrchestratorConfig, CrawlSummary, OutputFormat };
