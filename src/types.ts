import type { ScannerKind } from './crawler/parsing/markupScanner.js';
import type { Transport } from './crawler/network/transport.js';
import type { AbsoluteUrl } from './crawler/url/absoluteUrl.js';

export type OutputFormat = 'text' | 'json';

export type FailureTarget = 'page' | 'image';

export interface FailureEvent {
  url: string;
  target: FailureTarget;
  depthRemaining: number;
  reason: string;
}

export interface CrawlOptions {
  recursive: boolean;
  /** Link hops from the seed; ignored unless `recursive`. */
  maxDepth: number;
  outputDir: string;
  concurrency: number;
  timeoutMs: number;
  /** Pause after each page fetch and each image download, per worker. */
  delayMs: number;
  userAgent: string;
  parser: ScannerKind;
  format: OutputFormat;
  quiet: boolean;
  logLevel: string;
}

export interface CrawlTask {
  url: AbsoluteUrl;
  depthRemaining: number;
  /** Hops from the seed, for reporting only. */
  hops: number;
  /** Page the link was found on; absent for the seed. */
  referer?: string;
}

export interface ImageResult {
  url: string;
  destinationPath: string;
  ok: boolean;
  error?: string;
}

export interface PageResult {
  url: string;
  depthRemaining: number;
  hops: number;
  /** Same-host links accepted on this page, resolved, first occurrence order. */
  links: string[];
  images: ImageResult[];
  status?: number;
  error?: string;
}

export interface CrawlSummary {
  pagesVisited: number;
  pagesSucceeded: number;
  pagesFailed: number;
  uniquePagesDiscovered: number;
  imagesFound: number;
  imagesDownloaded: number;
  imagesFailed: number;
  duplicateImagesSkipped: number;
  linksFollowed: number;
  offHostLinksSkipped: number;
  maxDepthReached: number;
  durationMs: number;
  actualMaxConcurrency: number;
  outputDir: string;
  failureLog: FailureEvent[];
}

export interface CrawlHandlers {
  onPage(result: PageResult): void;
  onError?(error: Error, context: { url: string; depthRemaining: number }): void;
  onComplete?(summary: CrawlSummary): void;
}

export type CrawlOrchestratorOptions = Partial<CrawlOptions>;

export interface CrawlOrchestratorConfig extends CrawlOrchestratorOptions {
  handlers?: CrawlHandlers;
  /** Replaces the HTTP transport, e.g. with an in-memory site. */
  transport?: Transport;
}
