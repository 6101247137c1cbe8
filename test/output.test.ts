import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  flushOutputBuffers,
  flushQuietProgress,
  logError,
  renderQuietProgressLine,
  renderText,
  resetOutputConfig,
  setOutputConfig,
  updateQuietProgress,
  writePage,
  writeSummary,
} from '../src/util/output.js';
import type { CrawlSummary, PageResult } from '../src/types.js';

const summary: CrawlSummary = {
  pagesVisited: 2,
  pagesSucceeded: 1,
  pagesFailed: 1,
  uniquePagesDiscovered: 2,
  imagesFound: 1,
  imagesDownloaded: 1,
  imagesFailed: 0,
  duplicateImagesSkipped: 0,
  linksFollowed: 1,
  offHostLinksSkipped: 0,
  maxDepthReached: 1,
  durationMs: 125,
  actualMaxConcurrency: 1,
  outputDir: './data',
  failureLog: [
    { url: 'https://example.com/fail', target: 'page', depthRemaining: 0, reason: 'HTTP 500' },
  ],
};

const page: PageResult = {
  url: 'https://example.com/',
  depthRemaining: 1,
  hops: 0,
  status: 200,
  links: ['https://example.com/next'],
  images: [
    { url: 'https://example.com/a.png', destinationPath: 'data/a.png', ok: true },
    { url: 'https://example.com/b.png', destinationPath: 'data/b.png', ok: false, error: 'HTTP 404' },
  ],
};

describe('renderText', () => {
  it('lists images and links under the page line', () => {
    expect(renderText(page)).toBe(
      [
        'PAGE: https://example.com/ (depth_left=1)',
        '  + IMG https://example.com/a.png -> data/a.png',
        '  ! IMG FAILED https://example.com/b.png: HTTP 404',
        '  - https://example.com/next',
        '',
      ].join('\n'),
    );
  });

  it('shows the fetch error of a failed page', () => {
    const failed: PageResult = { url: 'https://example.com/x', depthRemaining: 0, hops: 1, links: [], images: [], error: 'HTTP 404' };
    expect(renderText(failed)).toBe('PAGE: https://example.com/x (depth_left=0)\n  ! ERROR: HTTP 404\n');
  });
});

describe('renderQuietProgressLine', () => {
  it('adds failure counters only once something failed', () => {
    const base = { pagesVisited: 3, pagesFailed: 0, pagesPending: 2, imagesDownloaded: 5, imagesFailed: 0 };
    expect(renderQuietProgressLine(base)).toBe('[quiet] pages:3 pending:2 images:5');
    expect(renderQuietProgressLine({ ...base, imagesFailed: 1 })).toBe(
      '[quiet] pages:3 pending:2 images:5 page-fail:0 img-fail:1',
    );
  });
});

describe('output integration', () => {
  beforeEach(() => {
    setOutputConfig({ quiet: true });
  });

  afterEach(() => {
    flushQuietProgress();
    flushOutputBuffers();
    resetOutputConfig();
    vi.restoreAllMocks();
  });

  it('surfaces failures while keeping quiet progress responsive', () => {
    const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    logError('crawl failure: https://example.com/fail');
    writePage(page, 'text');

    updateQuietProgress({
      pagesVisited: 2,
      pagesFailed: 1,
      pagesPending: 0,
      imagesDownloaded: 1,
      imagesFailed: 0,
    });

    flushQuietProgress();
    writeSummary(summary, 'text');
    flushOutputBuffers();

    const combinedStdout = stdoutSpy.mock.calls.map((call) => String(call[0])).join('');
    const combinedStderr = stderrSpy.mock.calls.map((call) => String(call[0])).join('');

    expect(combinedStderr).toBe('crawl failure: https://example.com/fail\n');
    expect(combinedStdout).not.toContain('PAGE:');
    expect(combinedStdout).toContain('[quiet] pages:2 pending:0 images:1 page-fail:1 img-fail:0');
    expect(combinedStdout).toContain('--- Crawl Summary ---');
    expect(combinedStdout).toContain('Images downloaded: 1\n');
    expect(combinedStdout).toContain('  [page] https://example.com/fail - HTTP 500\n');
  });

  it('emits one JSON document per page and for the summary', () => {
    setOutputConfig({ quiet: false });
    const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    writePage(page, 'json');
    writeSummary(summary, 'json');

    const lines = stdoutSpy.mock.calls.map((call) => String(call[0]));
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0] ?? '')).toEqual(page);
    expect(JSON.parse(lines[1] ?? '')).toEqual(summary);
  });
});
