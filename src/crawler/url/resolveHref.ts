import { type AbsoluteUrl, parseAbsoluteUrl, stripQueryAndFragment } from './absoluteUrl.js';

const REJECTED_PREFIXES = ['javascript:', 'mailto:', 'tel:'];

/**
 * Resolves a raw href/src against the page it was found on.
 *
 * Returns null for references that never point at a fetchable resource
 * (empty values, fragment anchors, javascript:/mailto:/tel: pseudo-URLs) and for
 * absolute forms that do not parse. Never throws.
 */
export function resolveHref(base: AbsoluteUrl, href: string): AbsoluteUrl | null {
  const trimmed = href.trim();
  if (trimmed.length === 0 || trimmed.startsWith('#')) {
    return null;
  }

  const lowered = trimmed.toLowerCase();
  if (REJECTED_PREFIXES.some((prefix) => lowered.startsWith(prefix))) {
    return null;
  }

  if (lowered.startsWith('http://') || lowered.startsWith('https://')) {
    return parseAbsoluteUrl(trimmed);
  }

  // Scheme-relative: //cdn.example.com/a.png
  if (trimmed.startsWith('//')) {
    return parseAbsoluteUrl(`${base.scheme}:${trimmed}`);
  }

  if (trimmed.startsWith('/')) {
    return { scheme: base.scheme, host: base.host, path: trimmed };
  }

  return {
    scheme: base.scheme,
    host: base.host,
    path: normalizePath(`${baseDirectory(base.path)}${trimmed}`),
  };
}

/**
 * Collapses `.` and `..` segments. A `..` at the root is dropped rather than
 * rejected, and empty segments disappear, so the result never climbs above `/`.
 */
export function normalizePath(path: string): string {
  const kept: string[] = [];

  for (const segment of path.split('/')) {
    if (segment === '' || segment === '.') {
      continue;
    }

    if (segment === '..') {
      kept.pop();
      continue;
    }

    kept.push(segment);
  }

  return `/${kept.join('/')}`;
}

/** `/a/b/index.html?x` -> `/a/b/`; `/a/b/` stays as it is. */
export function baseDirectory(path: string): string {
  const stripped = stripQueryAndFragment(path);
  const lastSlash = stripped.lastIndexOf('/');
  if (lastSlash === -1) {
    return '/';
  }

  return stripped.slice(0, lastSlash + 1);
}
