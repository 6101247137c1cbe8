import {
  CrawlerError,
  ensureCrawlerError,
  type ErrorKind,
  type ErrorSeverity,
} from '../errors.js';
import { getLogger } from '../logger.js';

export interface ErrorContext extends Record<string, unknown> {
  stage?: 'cli' | 'crawl' | 'fetch' | 'parse' | 'download' | 'output';
  url?: string;
  depthRemaining?: number;
}

export interface ErrorHandlingOptions {
  defaultKind?: ErrorKind;
  defaultSeverity?: ErrorSeverity;
  throwOnFatal?: boolean;
}

/**
 * Prints a one-line description of the error to the console, mirrors it to
 * the structured log, and rethrows fatal errors unless `throwOnFatal` is false.
 */
export function reportCrawlerError(
  error: unknown,
  context: ErrorContext = {},
  options: ErrorHandlingOptions = {},
): CrawlerError {
  const crawlerError = ensureCrawlerError(error, {
    kind: options.defaultKind ?? 'internal',
    severity: options.defaultSeverity,
    details: context,
  });

  const details: Record<string, unknown> = {
    ...(crawlerError.details ?? {}),
    ...context,
  };

  const line = formatErrorLine(crawlerError, details);
  const logBindings = { ...details, kind: crawlerError.kind, severity: crawlerError.severity };

  if (crawlerError.severity === 'fatal') {
    getLogger().error(logBindings, crawlerError.message);
    console.error(line);
    if (options.throwOnFatal ?? true) {
      throw crawlerError;
    }
  } else {
    getLogger().warn(logBindings, crawlerError.message);
    console.warn(line);
  }

  return crawlerError;
}

/** `[kind/severity] message (key="value" ...)` with keys sorted. */
export function formatErrorLine(error: CrawlerError, details: Record<string, unknown>): string {
  const entries = Object.entries(details)
    .filter(([, value]) => value !== undefined)
    .sort(([a], [b]) => a.localeCompare(b));

  const line = `[${error.kind}/${error.severity}] ${error.message}`;
  if (entries.length === 0) {
    return line;
  }

  return `${line} (${entries.map(([key, value]) => `${key}=${JSON.stringify(value)}`).join(' ')})`;
}
