import type { AbsoluteUrl } from './absoluteUrl.js';

export function sameHost(a: AbsoluteUrl, b: AbsoluteUrl): boolean {
  return a.host.toLowerCase() === b.host.toLowerCase();
}
