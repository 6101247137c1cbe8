import { updateQuietProgress } from '../../util/output.js';
import type { CrawlStats } from '../state/stats.js';

export class ProgressReporter {
  /** `pending` counts pages queued or waiting for a worker slot. */
  constructor(private readonly stats: CrawlStats, private readonly pending: () => number) {}

  emit(): void {
    updateQuietProgress({
      pagesVisited: this.stats.pagesVisited,
      pagesFailed: this.stats.pagesFailed,
      pagesPending: this.pending(),
      imagesDownloaded: this.stats.imagesDownloaded,
      imagesFailed: this.stats.imagesFailed,
    });
  }
}
