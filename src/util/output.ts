import type { CrawlSummary, OutputFormat, PageResult } from '../types.js';

const QUIET_PROGRESS_INTERVAL_MS = 250;

type QuietProgressSnapshot = {
  pagesVisited: number;
  pagesFailed: number;
  pagesPending: number;
  imagesDownloaded: number;
  imagesFailed: number;
};

let quietMode = false;
let quietProgressTimer: ReturnType<typeof setTimeout> | undefined;
let quietProgressPending: QuietProgressSnapshot | undefined;
let quietProgressLastTimestamp = -Infinity;
let quietProgressLastLength = 0;
let quietProgressRendered = false;

export function writePage(page: PageResult, format: OutputFormat): void {
  if (quietMode) {
    return;
  }

  process.stdout.write(format === 'json' ? `${JSON.stringify(page)}\n` : renderText(page));
}

export function writeSummary(summary: CrawlSummary, format: OutputFormat): void {
  flushQuietProgress({ persist: true });
  process.stdout.write(
    format === 'json' ? `${JSON.stringify(summary)}\n` : renderTextSummary(summary),
  );
}

export function logError(message: string): void {
  flushQuietProgress();
  const payload = message.endsWith('\n') ? message : `${message}\n`;
  process.stderr.write(payload);
}

export function flushOutputBuffers(): void {
  flushQuietProgress();
}

export function setOutputConfig(config: { quiet: boolean }): void {
  if (quietMode && !config.quiet) {
    flushQuietProgress();
  }

  quietMode = config.quiet;
  resetQuietProgressState();
}

export function resetOutputConfig(): void {
  setOutputConfig({ quiet: false });
}

export function updateQuietProgress(snapshot: QuietProgressSnapshot): void {
  if (!quietMode) {
    return;
  }

  quietProgressPending = snapshot;
  scheduleQuietProgressRender();
}

export function flushQuietProgress(options: { persist?: boolean } = {}): void {
  if (quietProgressTimer) {
    clearTimeout(quietProgressTimer);
    quietProgressTimer = undefined;
  }

  if (quietProgressPending) {
    performQuietProgressRender();
  }

  if (!quietProgressRendered) {
    return;
  }

  if (options.persist) {
    process.stdout.write('\n');
  } else if (quietProgressLastLength > 0) {
    process.stdout.write(`\r${' '.repeat(quietProgressLastLength)}\r`);
  }

  quietProgressRendered = false;
  quietProgressLastLength = 0;
  quietProgressLastTimestamp = -Infinity;
}

export function renderText(page: PageResult): string {
  const lines: string[] = [`PAGE: ${page.url} (depth_left=${page.depthRemaining})`];

  if (page.error) {
    lines.push(`  ! ERROR: ${page.error}`);
  }

  for (const image of page.images) {
    lines.push(
      image.ok
        ? `  + IMG ${image.url} -> ${image.destinationPath}`
        : `  ! IMG FAILED ${image.url}: ${image.error ?? 'unknown error'}`,
    );
  }

  for (const link of page.links) {
    lines.push(`  - ${link}`);
  }

  return `${lines.join('\n')}\n`;
}

export function renderTextSummary(summary: CrawlSummary): string {
  const lines: string[] = [
    '',
    '--- Crawl Summary ---',
    `Pages visited: ${summary.pagesVisited}`,
    `Successful pages: ${summary.pagesSucceeded}`,
    `Failed pages: ${summary.pagesFailed}`,
    `Images found: ${summary.imagesFound}`,
    `Images downloaded: ${summary.imagesDownloaded}`,
    `Images failed: ${summary.imagesFailed}`,
    `Duplicate images skipped: ${summary.duplicateImagesSkipped}`,
    `Links followed: ${summary.linksFollowed}`,
    `Off-host links skipped: ${summary.offHostLinksSkipped}`,
    `Max depth reached: ${summary.maxDepthReached}`,
    `Duration: ${formatDuration(summary.durationMs)} (${Math.round(summary.durationMs)} ms)`,
    `Actual max concurrency: ${summary.actualMaxConcurrency}`,
    `Output directory: ${summary.outputDir}`,
  ];

  if (summary.failureLog.length > 0) {
    lines.push('Failure log:');
    for (const event of summary.failureLog) {
      lines.push(`  [${event.target}] ${event.url} - ${event.reason}`);
    }
  }

  return `${lines.join('\n')}\n`;
}

function scheduleQuietProgressRender(): void {
  if (quietProgressTimer) {
    return;
  }

  const now = Date.now();
  const elapsed = now - quietProgressLastTimestamp;
  const delay = elapsed >= QUIET_PROGRESS_INTERVAL_MS ? 0 : QUIET_PROGRESS_INTERVAL_MS - elapsed;

  quietProgressTimer = setTimeout(() => {
    quietProgressTimer = undefined;
    performQuietProgressRender();
  }, delay);
}

function performQuietProgressRender(): void {
  const snapshot = quietProgressPending;
  quietProgressPending = undefined;

  if (!snapshot) {
    return;
  }

  emitQuietProgress(snapshot);
  quietProgressLastTimestamp = Date.now();
}

function emitQuietProgress(snapshot: QuietProgressSnapshot): void {
  const line = renderQuietProgressLine(snapshot);
  const padded = padQuietProgressLine(line);
  process.stdout.write(`\r${padded}`);
  quietProgressLastLength = padded.length;
  quietProgressRendered = true;
}

export function renderQuietProgressLine(snapshot: QuietProgressSnapshot): string {
  const parts = [
    `pages:${snapshot.pagesVisited}`,
    `pending:${snapshot.pagesPending}`,
    `images:${snapshot.imagesDownloaded}`,
  ];

  if (snapshot.pagesFailed > 0 || snapshot.imagesFailed > 0) {
    parts.push(`page-fail:${snapshot.pagesFailed}`);
    parts.push(`img-fail:${snapshot.imagesFailed}`);
  }

  return `[quiet] ${parts.join(' ')}`;
}

function padQuietProgressLine(text: string): string {
  if (quietProgressLastLength > text.length) {
    return `${text}${' '.repeat(quietProgressLastLength - text.length)}`;
  }

  return text;
}

function resetQuietProgressState(): void {
  if (quietProgressTimer) {
    clearTimeout(quietProgressTimer);
    quietProgressTimer = undefined;
  }

  quietProgressPending = undefined;
  quietProgressLastTimestamp = -Infinity;
  quietProgressLastLength = 0;
  quietProgressRendered = false;
}

function formatDuration(durationMs: number): string {
  if (!Number.isFinite(durationMs) || durationMs <= 0) {
    return '0ms';
  }

  if (durationMs < 1_000) {
    return `${Math.round(durationMs)}ms`;
  }

  const seconds = durationMs / 1_000;
  if (seconds < 60) {
    const precision = seconds >= 10 ? 1 : 2;
    return `${seconds.toFixed(precision)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  const secondsPart =
    remainingSeconds >= 10 ? remainingSeconds.toFixed(0) : remainingSeconds.toFixed(1);
  return `${minutes}m ${secondsPart}s`;
}
