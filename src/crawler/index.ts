export { CrawlQueue } from './state/queue.js';
export { DedupSet } from './state/dedupSet.js';
export { FailureTracker, recordFailure } from './state/failures.js';
export { initializeStats, recordImageMetrics, recordPageMetrics, type CrawlStats } from './state/stats.js';
export {
  formatAbsoluteUrl,
  parseAbsoluteUrl,
  stripQueryAndFragment,
  type AbsoluteUrl,
  type UrlScheme,
} from './url/absoluteUrl.js';
export { baseDirectory, normalizePath, resolveHref } from './url/resolveHref.js';
export { sameHost } from './url/sameHost.js';
export { deriveFilename, isImage, IMAGE_EXTENSIONS } from './images/imageClassifier.js';
export {
  createMarkupScanner,
  CheerioMarkupScanner,
  PatternMarkupScanner,
  type MarkupScanner,
  type ScannerKind,
} from './parsing/index.js';
export { HttpTransport, type HttpTransportOptions } from './network/httpTransport.js';
export type {
  DownloadResult,
  FetchTextResult,
  RequestContext,
  TransferFailure,
  Transport,
} from './network/transport.js';
