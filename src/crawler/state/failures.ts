import type { FailureEvent, FailureTarget } from '../../types.js';
import { logError } from '../../util/output.js';

export class FailureTracker {
  private readonly log: FailureEvent[] = [];

  record(event: FailureEvent): void {
    this.log.push(event);
  }

  list(): FailureEvent[] {
    return this.log;
  }
}

export function recordFailure(options: {
  failures: FailureTracker;
  target: FailureTarget;
  url: string;
  depthRemaining: number;
  reason: string;
}): void {
  const { failures, target, url, depthRemaining, reason } = options;

  failures.record({ url, target, depthRemaining, reason });
  logError(`[${target} failure] ${url}: ${reason}`);
}
