import type { CrawlSummary } from '../../types.js';
import type { DedupSet } from '../state/dedupSet.js';
import type { FailureTracker } from '../state/failures.js';
import type { CrawlStats } from '../state/stats.js';

export function buildCrawlSummary(options: {
  stats: CrawlStats;
  visited: DedupSet;
  downloaded: DedupSet;
  failures: FailureTracker;
  outputDir: string;
  startTime: number;
  now?: number;
}): CrawlSummary {
  const { stats, visited, downloaded, failures, outputDir, startTime, now = Date.now() } = options;

  return {
    pagesVisited: stats.pagesVisited,
    pagesSucceeded: stats.pagesSucceeded,
    pagesFailed: stats.pagesFailed,
    uniquePagesDiscovered: visited.size,
    imagesFound: downloaded.size,
    imagesDownloaded: stats.imagesDownloaded,
    imagesFailed: stats.imagesFailed,
    duplicateImagesSkipped: stats.duplicateImagesSkipped,
    linksFollowed: stats.linksFollowed,
    offHostLinksSkipped: stats.offHostLinksSkipped,
    maxDepthReached: stats.maxDepthReached,
    durationMs: now - startTime,
    actualMaxConcurrency: stats.actualMaxConcurrency,
    outputDir,
    failureLog: failures.list(),
  };
}
