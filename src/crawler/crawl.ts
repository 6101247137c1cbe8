import path from 'node:path';
import pLimit from 'p-limit';

import type { CrawlHandlers, CrawlOptions, CrawlSummary, CrawlTask, ImageResult, PageResult } from '../types.js';
import { flushOutputBuffers, resetOutputConfig, setOutputConfig, writeSummary } from '../util/output.js';
import { reportCrawlerError } from '../util/errorHandler.js';
import { ensureCrawlerError } from '../errors.js';
import { getLogger, type LoggerLike } from '../logger.js';
import {
  CrawlQueue,
  DedupSet,
  FailureTracker,
  recordFailure,
  type CrawlStats,
  initializeStats,
  recordImageMetrics,
  recordPageMetrics,
  type AbsoluteUrl,
  formatAbsoluteUrl,
  resolveHref,
  sameHost,
  isImage,
  deriveFilename,
  type MarkupScanner,
  createMarkupScanner,
  type FetchTextResult,
  type Transport,
} from './index.js';
import { ProgressReporter } from './reporting/progress.js';
import { buildCrawlSummary } from './reporting/summary.js';
import { createDefaultHandlers } from './handlers/defaultHandlers.js';

export interface CrawlRuntimeOptions {
  seed: AbsoluteUrl;
  options: CrawlOptions;
  transport: Transport;
  handlers?: CrawlHandlers;
  scanner?: MarkupScanner;
}

/**
 * Drains a FIFO worklist of pages through a bounded pool. Page fetches and
 * image downloads use separate limiters so a page waiting on its images never
 * holds a slot its own downloads need.
 */
export class CrawlerEngine {
  private readonly queue: CrawlQueue;
  private readonly downloaded = new DedupSet();
  private readonly failures = new FailureTracker();
  private readonly stats: CrawlStats = initializeStats();
  private readonly pageLimiter: ReturnType<typeof pLimit>;
  private readonly downloadLimiter: ReturnType<typeof pLimit>;
  private readonly activePromises = new Set<Promise<void>>();
  private readonly progress: ProgressReporter;
  private readonly logger: LoggerLike;
  private readonly startTime = Date.now();
  private runningCount = 0;

  constructor(
    private readonly seed: AbsoluteUrl,
    private readonly options: CrawlOptions,
    private readonly transport: Transport,
    private readonly scanner: MarkupScanner,
    private readonly handlers: CrawlHandlers,
  ) {
    this.queue = new CrawlQueue({
      url: seed,
      depthRemaining: options.recursive ? options.maxDepth : 0,
      hops: 0,
    });
    this.pageLimiter = pLimit(options.concurrency);
    this.downloadLimiter = pLimit(options.concurrency);
    this.progress = new ProgressReporter(
      this.stats,
      () => this.queue.pending + this.pageLimiter.pendingCount,
    );
    this.logger = getLogger().child({ component: 'engine', seed: formatAbsoluteUrl(seed) });
  }

  async run(): Promise<CrawlSummary> {
    this.runQueue();
    while (this.activePromises.size > 0) {
      await Promise.allSettled([...this.activePromises]);
    }

    return buildCrawlSummary({
      stats: this.stats,
      visited: this.queue.visited,
      downloaded: this.downloaded,
      failures: this.failures,
      outputDir: this.options.outputDir,
      startTime: this.startTime,
    });
  }

  private runQueue(): void {
    let next = this.queue.dequeue();
    while (next) {
      this.schedule(next);
      next = this.queue.dequeue();
    }
  }

  private schedule(task: CrawlTask): void {
    const promise = this.pageLimiter(async () => {
      this.runningCount += 1;
      this.stats.actualMaxConcurrency = Math.max(this.stats.actualMaxConcurrency, this.runningCount);
      try {
        await this.handleTask(task);
      } finally {
        this.runningCount -= 1;
      }
    })
      .catch((error: unknown) => {
        const url = formatAbsoluteUrl(task.url);
        const crawlerError = reportCrawlerError(
          ensureCrawlerError(error, { kind: 'internal', severity: 'recoverable' }),
          { stage: 'crawl', url, depthRemaining: task.depthRemaining },
          { throwOnFatal: false },
        );

        this.handlers.onError?.(crawlerError, { url, depthRemaining: task.depthRemaining });
      })
      .finally(() => {
        this.activePromises.delete(promise);
        this.runQueue();
      });

    this.activePromises.add(promise);
  }

  private async handleTask(task: CrawlTask): Promise<void> {
    const url = formatAbsoluteUrl(task.url);
    const page: PageResult = {
      url,
      depthRemaining: task.depthRemaining,
      hops: task.hops,
      links: [],
      images: [],
    };

    this.logger.debug({ url, depthRemaining: task.depthRemaining }, 'fetching page');
    let outcome: FetchTextResult;
    try {
      outcome = await this.transport.fetchText(url, {
        userAgent: this.options.userAgent,
        referer: task.referer,
      });
    } catch (error) {
      const crawlerError = reportCrawlerError(
        error,
        { stage: 'fetch', url, depthRemaining: task.depthRemaining },
        { defaultKind: 'fetch', defaultSeverity: 'recoverable', throwOnFatal: false },
      );
      this.finishWithFailure(task, page, crawlerError.message);
      return;
    }
    await this.pause();

    if (!outcome.ok) {
      page.status = outcome.status ?? undefined;
      if (outcome.error) {
        reportCrawlerError(
          outcome.error,
          { stage: 'fetch', url, depthRemaining: task.depthRemaining },
          { throwOnFatal: false },
        );
      }
      this.finishWithFailure(task, page, outcome.reason);
      return;
    }

    page.status = outcome.status;

    try {
      page.images = await this.downloadImages(task, outcome.body);

      if (this.options.recursive && task.depthRemaining > 0) {
        page.links = this.followLinks(task, outcome.body);
      }
    } catch (error) {
      const crawlerError = reportCrawlerError(
        error,
        { stage: 'parse', url, depthRemaining: task.depthRemaining },
        { defaultKind: 'parse', defaultSeverity: 'recoverable', throwOnFatal: false },
      );
      this.finishWithFailure(task, page, crawlerError.message);
      return;
    }

    recordPageMetrics(this.stats, page);
    this.dispatchPage(page);
  }

  private async downloadImages(task: CrawlTask, html: string): Promise<ImageResult[]> {
    const downloads: Promise<ImageResult>[] = [];

    for (const src of this.scanner.findAttributeValues(html, 'img', 'src')) {
      const imageUrl = resolveHref(task.url, src);
      if (!imageUrl || !isImage(imageUrl)) {
        continue;
      }

      const key = formatAbsoluteUrl(imageUrl);
      if (!this.downloaded.claim(key)) {
        this.stats.duplicateImagesSkipped += 1;
        continue;
      }

      const destinationPath = path.join(this.options.outputDir, deriveFilename(imageUrl));
      downloads.push(
        this.downloadLimiter(async () => {
          const image = await this.downloadImage(key, destinationPath, task);
          await this.pause();
          return image;
        }),
      );
    }

    return Promise.all(downloads);
  }

  private async downloadImage(
    url: string,
    destinationPath: string,
    task: CrawlTask,
  ): Promise<ImageResult> {
    let image: ImageResult;

    try {
      const result = await this.transport.downloadTo(
        url,
        { userAgent: this.options.userAgent, referer: formatAbsoluteUrl(task.url) },
        destinationPath,
      );
      if (result.ok) {
        this.logger.debug({ url, destinationPath, bytes: result.bytes }, 'image saved');
        image = { url, destinationPath, ok: true };
      } else {
        if (result.error) {
          reportCrawlerError(result.error, { stage: 'download', url }, { throwOnFatal: false });
        }
        image = { url, destinationPath, ok: false, error: result.reason };
      }
    } catch (error) {
      const crawlerError = reportCrawlerError(
        error,
        { stage: 'download', url },
        { defaultKind: 'download', defaultSeverity: 'recoverable', throwOnFatal: false },
      );
      image = { url, destinationPath, ok: false, error: crawlerError.message };
    }

    if (image.error !== undefined) {
      recordFailure({
        failures: this.failures,
        target: 'image',
        url,
        depthRemaining: task.depthRemaining,
        reason: image.error,
      });
    }

    recordImageMetrics(this.stats, image);
    return image;
  }

  private followLinks(task: CrawlTask, html: string): string[] {
    const accepted = new Set<string>();

    for (const href of this.scanner.findAttributeValues(html, 'a', 'href')) {
      const next = resolveHref(task.url, href);
      if (!next) {
        continue;
      }

      if (!sameHost(this.seed, next)) {
        this.stats.offHostLinksSkipped += 1;
        continue;
      }

      accepted.add(formatAbsoluteUrl(next));

      const child: CrawlTask = {
        url: next,
        depthRemaining: task.depthRemaining - 1,
        hops: task.hops + 1,
        referer: formatAbsoluteUrl(task.url),
      };
      if (this.queue.enqueueIfNew(child)) {
        this.stats.linksFollowed += 1;
      }
    }

    return [...accepted];
  }

  private finishWithFailure(task: CrawlTask, page: PageResult, reason: string): void {
    page.error = reason;

    recordFailure({
      failures: this.failures,
      target: 'page',
      url: page.url,
      depthRemaining: task.depthRemaining,
      reason,
    });

    recordPageMetrics(this.stats, page);
    this.dispatchPage(page);
  }

  /** Politeness gap after each request; holds the worker's slot. */
  private async pause(): Promise<void> {
    if (this.options.delayMs > 0) {
      await delay(this.options.delayMs);
    }
  }

  private dispatchPage(page: PageResult): void {
    this.progress.emit();
    this.handlers.onPage(page);
  }
}

export async function crawl({
  seed,
  options,
  transport,
  handlers,
  scanner,
}: CrawlRuntimeOptions): Promise<CrawlSummary> {
  const effectiveHandlers: CrawlHandlers = {
    ...createDefaultHandlers(options.format),
    ...(handlers ?? {}),
  };

  setOutputConfig({ quiet: options.quiet });
  const engine = new CrawlerEngine(
    seed,
    options,
    transport,
    scanner ?? createMarkupScanner(options.parser),
    effectiveHandlers,
  );

  try {
    const summary = await engine.run();

    if (effectiveHandlers.onComplete) {
      effectiveHandlers.onComplete(summary);
    } else {
      writeSummary(summary, options.format);
    }

    return summary;
  } finally {
    flushOutputBuffers();
    resetOutputConfig();
  }
}

async function delay(ms: number): Promise<void> {
  await new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
