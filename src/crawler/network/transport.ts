import type { CrawlerError } from '../../errors.js';

export type TransferFailure = {
  ok: false;
  url: string;
  status: number | null;
  reason: string;
  error?: CrawlerError;
};

export type FetchTextResult = { ok: true; url: string; status: number; body: string } | TransferFailure;

export type DownloadResult =
  | { ok: true; url: string; destinationPath: string; bytes: number }
  | TransferFailure;

export interface RequestContext {
  userAgent: string;
  /** Sent as the `Referer` header when present. */
  referer?: string;
}

/**
 * Network boundary of the crawl. Implementations own timeouts and redirects;
 * the engine never retries, so every failure result is final for that URL.
 */
export interface Transport {
  fetchText(url: string, context: RequestContext): Promise<FetchTextResult>;
  /** Must leave no partial file at `destinationPath` when the result is not ok. */
  downloadTo(url: string, context: RequestContext, destinationPath: string): Promise<DownloadResult>;
}
