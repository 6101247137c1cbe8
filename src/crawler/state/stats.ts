import type { ImageResult, PageResult } from '../../types.js';

export interface CrawlStats {
  pagesVisited: number;
  pagesSucceeded: number;
  pagesFailed: number;
  imagesDownloaded: number;
  imagesFailed: number;
  duplicateImagesSkipped: number;
  linksFollowed: number;
  offHostLinksSkipped: number;
  maxDepthReached: number;
  actualMaxConcurrency: number;
}

export function initializeStats(): CrawlStats {
  return {
    pagesVisited: 0,
    pagesSucceeded: 0,
    pagesFailed: 0,
    imagesDownloaded: 0,
    imagesFailed: 0,
    duplicateImagesSkipped: 0,
    linksFollowed: 0,
    offHostLinksSkipped: 0,
    maxDepthReached: 0,
    actualMaxConcurrency: 0,
  };
}

export function recordPageMetrics(stats: CrawlStats, page: PageResult): void {
  stats.pagesVisited += 1;
  stats.maxDepthReached = Math.max(stats.maxDepthReached, page.hops);

  if (page.error === undefined) {
    stats.pagesSucceeded += 1;
  } else {
    stats.pagesFailed += 1;
  }
}

export function recordImageMetrics(stats: CrawlStats, image: ImageResult): void {
  if (image.ok) {
    stats.imagesDownloaded += 1;
  } else {
    stats.imagesFailed += 1;
  }
}
