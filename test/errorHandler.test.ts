import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { MockInstance } from 'vitest';

import { createDownloadError, createFetchError, createOutputError } from '../src/errors.js';
import { formatErrorLine, reportCrawlerError } from '../src/util/errorHandler.js';

let warnSpy: MockInstance<(...args: unknown[]) => void>;
let errorSpy: MockInstance<(...args: unknown[]) => void>;

beforeEach(() => {
  warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  warnSpy.mockRestore();
  errorSpy.mockRestore();
});

describe('reportCrawlerError', () => {
  it('logs recoverable errors without throwing', () => {
    const error = createFetchError('retry later', { url: 'https://example.com' });

    expect(() => {
      reportCrawlerError(error, { stage: 'fetch', depthRemaining: 1 });
    }).not.toThrow();

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith(
      '[fetch/recoverable] retry later (depthRemaining=1 stage="fetch" url="https://example.com")',
    );
  });

  it('throws on fatal errors by default', () => {
    const fatalError = createOutputError('boom');
    expect(() => reportCrawlerError(fatalError, { stage: 'crawl' })).toThrowError(fatalError);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it('can suppress throwing on fatal errors when requested', () => {
    const fatalError = createOutputError('boom');
    expect(() =>
      reportCrawlerError(fatalError, { stage: 'crawl' }, { throwOnFatal: false }),
    ).not.toThrow();
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it('wraps unknown errors as fatal internal errors', () => {
    const result = reportCrawlerError('oops', { stage: 'cli' }, { throwOnFatal: false });
    expect(result.kind).toBe('internal');
    expect(result.severity).toBe('fatal');
    expect(result.name).toBe('InternalError');
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it('applies the default kind and severity to foreign errors', () => {
    const result = reportCrawlerError(new Error('disk full'), { stage: 'download' }, {
      defaultKind: 'download',
      defaultSeverity: 'recoverable',
    });

    expect(result.kind).toBe('download');
    expect(result.severity).toBe('recoverable');
    expect(result.cause).toBeInstanceOf(Error);
    expect(warnSpy).toHaveBeenCalledWith('[download/recoverable] disk full (stage="download")');
  });
});

describe('formatErrorLine', () => {
  it('omits the detail block when there are no defined details', () => {
    const error = createDownloadError('HTTP 404');
    expect(formatErrorLine(error, { url: undefined })).toBe('[download/recoverable] HTTP 404');
  });
});
