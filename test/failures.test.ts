import { afterEach, describe, expect, it, vi } from 'vitest';

import { FailureTracker, recordFailure } from '../src/crawler/state/failures.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('FailureTracker', () => {
  it('keeps failures in the order they were recorded', () => {
    const tracker = new FailureTracker();

    tracker.record({ url: 'https://example.com/a', target: 'page', depthRemaining: 1, reason: 'HTTP 500' });
    tracker.record({ url: 'https://example.com/a.png', target: 'image', depthRemaining: 1, reason: 'HTTP 404' });

    expect(tracker.list().map((event) => event.url)).toEqual([
      'https://example.com/a',
      'https://example.com/a.png',
    ]);
  });
});

describe('recordFailure', () => {
  it('records the event and writes one line to stderr', () => {
    const tracker = new FailureTracker();
    const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    recordFailure({
      failures: tracker,
      target: 'image',
      url: 'https://example.com/broken.png',
      depthRemaining: 0,
      reason: 'HTTP 404',
    });

    expect(tracker.list()).toEqual([
      { url: 'https://example.com/broken.png', target: 'image', depthRemaining: 0, reason: 'HTTP 404' },
    ]);
    expect(stderrSpy).toHaveBeenCalledWith('[image failure] https://example.com/broken.png: HTTP 404\n');
  });
});
