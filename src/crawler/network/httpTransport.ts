import { rm, writeFile } from 'node:fs/promises';

import {
  createDownloadError,
  createFetchError,
  ensureCrawlerError,
  isCrawlerError,
  type CrawlerError,
} from '../../errors.js';
import type {
  DownloadResult,
  FetchTextResult,
  RequestContext,
  TransferFailure,
  Transport,
} from './transport.js';

export interface HttpTransportOptions {
  /** Page timeout, body included. Image downloads get twice as long. */
  timeoutMs: number;
}

const PAGE_ACCEPT = 'text/html,application/xhtml+xml,*/*;q=0.9';
const IMAGE_ACCEPT = 'image/avif,image/webp,image/*,*/*;q=0.8';

export class HttpTransport implements Transport {
  constructor(private readonly options: HttpTransportOptions) {}

  async fetchText(url: string, context: RequestContext): Promise<FetchTextResult> {
    try {
      return await request(
        url,
        {
          ...context,
          accept: PAGE_ACCEPT,
          timeoutMs: this.options.timeoutMs,
          onFailure: createFetchError,
        },
        async (response): Promise<FetchTextResult> => {
          if (!response.ok) {
            return discardBody(url, response);
          }

          return { ok: true, url, status: response.status, body: await response.text() };
        },
      );
    } catch (error) {
      const crawlerError = ensureCrawlerError(error, { kind: 'fetch', severity: 'recoverable' });
      return { ok: false, url, status: null, reason: crawlerError.message, error: crawlerError };
    }
  }

  async downloadTo(
    url: string,
    context: RequestContext,
    destinationPath: string,
  ): Promise<DownloadResult> {
    try {
      const transfer = await request(
        url,
        {
          ...context,
          accept: IMAGE_ACCEPT,
          timeoutMs: this.options.timeoutMs * 2,
          onFailure: createDownloadError,
        },
        async (response) => {
          if (!response.ok) {
            return discardBody(url, response);
          }

          return { ok: true as const, body: Buffer.from(await response.arrayBuffer()) };
        },
      );

      if (!transfer.ok) {
        return transfer;
      }

      await writeFile(destinationPath, transfer.body);
      return { ok: true, url, destinationPath, bytes: transfer.body.byteLength };
    } catch (error) {
      await rm(destinationPath, { force: true });
      const crawlerError = ensureCrawlerError(error, { kind: 'download', severity: 'recoverable' });
      return { ok: false, url, status: null, reason: crawlerError.message, error: crawlerError };
    }
  }
}

interface RequestOptions extends RequestContext {
  accept: string;
  timeoutMs: number;
  onFailure: (
    message: string,
    details: Record<string, unknown>,
    options: { cause?: unknown },
  ) => CrawlerError;
}

/**
 * Runs the exchange and `read` under one deadline, so a server that sends
 * headers and then stalls the body still times out.
 */
async function request<T>(
  url: string,
  options: RequestOptions,
  read: (response: Response) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_resolve, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(new Error('Request aborted'));
    }, options.timeoutMs);
  });

  const exchange = async (): Promise<T> => {
    const response = await fetch(url, {
      redirect: 'follow',
      signal: controller.signal,
      headers: {
        'user-agent': options.userAgent,
        accept: options.accept,
        ...(options.referer ? { referer: options.referer } : {}),
      },
    });
    return read(response);
  };

  try {
    return await Promise.race([exchange(), deadline]);
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    const code = extractErrorCode(err);
    const message = controller.signal.aborted
      ? `Request timed out after ${options.timeoutMs}ms`
      : err.message || 'Request failed';

    throw options.onFailure(
      message,
      {
        url,
        timeoutMs: options.timeoutMs,
        ...(typeof code === 'string' ? { code } : {}),
      },
      { cause: err },
    );
  } finally {
    clearTimeout(timeoutId);
  }
}

async function discardBody(url: string, response: Response): Promise<TransferFailure> {
  await response.body?.cancel();
  return { ok: false, url, status: response.status, reason: `HTTP ${response.status}` };
}

export function extractErrorCode(error: Error): string | undefined {
  if (isCrawlerError(error)) {
    const detailsCode = error.details?.code;
    if (typeof detailsCode === 'string') {
      return detailsCode;
    }
  }

  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }

  const cause = error.cause;
  if (cause instanceof Error) {
    return extractErrorCode(cause);
  }

  return undefined;
}
