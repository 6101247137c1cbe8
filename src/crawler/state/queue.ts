import type { CrawlTask } from '../../types.js';
import { formatAbsoluteUrl } from '../url/absoluteUrl.js';
import { DedupSet } from './dedupSet.js';

const COMPACT_THRESHOLD = 32;

/**
 * FIFO worklist that owns the visited set. A URL is claimed when it is
 * enqueued, so every task that leaves the queue is fetched exactly once.
 */
export class CrawlQueue {
  private queue: CrawlTask[] = [];
  private head = 0;
  readonly visited = new DedupSet();

  constructor(seed: CrawlTask) {
    this.enqueueIfNew(seed);
  }

  enqueueIfNew(task: CrawlTask): boolean {
    if (task.depthRemaining < 0) {
      return false;
    }

    if (!this.visited.claim(formatAbsoluteUrl(task.url))) {
      return false;
    }

    this.queue.push(task);
    return true;
  }

  dequeue(): CrawlTask | undefined {
    const next = this.queue[this.head];
    if (!next) {
      return undefined;
    }

    this.head += 1;

    if (this.head >= COMPACT_THRESHOLD && this.head * 2 >= this.queue.length) {
      this.queue.splice(0, this.head);
      this.head = 0;
    }

    return next;
  }

  get pending(): number {
    return this.queue.length - this.head;
  }

  get uniqueCount(): number {
    return this.visited.size;
  }
}
