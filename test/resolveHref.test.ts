import { describe, expect, it } from 'vitest';

import { formatAbsoluteUrl, type AbsoluteUrl } from '../src/crawler/url/absoluteUrl.js';
import { baseDirectory, normalizePath, resolveHref } from '../src/crawler/url/resolveHref.js';

const resolved = (base: AbsoluteUrl, href: string): string | null => {
  const url = resolveHref(base, href);
  return url ? formatAbsoluteUrl(url) : null;
};

describe('resolveHref', () => {
  const page: AbsoluteUrl = { scheme: 'http', host: 'a.com', path: '/x/y/p.html' };
  const secure: AbsoluteUrl = { scheme: 'https', host: 'a.com', path: '/index.html' };

  it('climbs out of the page directory with ..', () => {
    expect(resolved(page, '../q.html')).toBe('http://a.com/x/q.html');
  });

  it('joins absolute paths onto the base host', () => {
    const base: AbsoluteUrl = { scheme: 'http', host: 'a.com', path: '/p.html' };
    expect(resolved(base, '/img/a.png')).toBe('http://a.com/img/a.png');
  });

  it('gives scheme-relative references the base scheme', () => {
    expect(resolved(secure, '//cdn.a.com/i.png')).toBe('https://cdn.a.com/i.png');
  });

  it('rejects fragments, pseudo-URLs and blanks', () => {
    expect(resolveHref(page, '#top')).toBeNull();
    expect(resolveHref(page, '#')).toBeNull();
    expect(resolveHref(page, 'javascript:void(0)')).toBeNull();
    expect(resolveHref(page, 'JavaScript:alert(1)')).toBeNull();
    expect(resolveHref(page, 'mailto:x@y.com')).toBeNull();
    expect(resolveHref(page, '')).toBeNull();
    expect(resolveHref(page, '   ')).toBeNull();
  });

  it('rejects telephone links', () => {
    expect(resolveHref(page, 'tel:+10000000000')).toBeNull();
    expect(resolveHref(page, ' TEL:555')).toBeNull();
  });

  it('returns absolute URLs unchanged', () => {
    expect(resolved(page, 'https://other.com/a/b.png?v=1')).toBe('https://other.com/a/b.png?v=1');
    expect(resolved(secure, 'http://a.com/x/../y')).toBe('http://a.com/x/../y');
  });

  it('lowercases the scheme of absolute references', () => {
    expect(resolved(page, 'HTTPS://Other.com/A.png')).toBe('https://Other.com/A.png');
  });

  it('returns null for absolute forms that do not parse', () => {
    expect(resolveHref(page, 'http://')).toBeNull();
    expect(resolveHref(page, '///nohost/a.png')).toBeNull();
  });

  it('resolves plain relative paths against the page directory', () => {
    expect(resolved(page, 'pics/a.png')).toBe('http://a.com/x/y/pics/a.png');
    expect(resolved(page, './pics/./a.png')).toBe('http://a.com/x/y/pics/a.png');
  });

  it('treats a base path ending in / as its own directory', () => {
    const dir: AbsoluteUrl = { scheme: 'http', host: 'a.com', path: '/x/y/' };
    expect(resolved(dir, 'z.html')).toBe('http://a.com/x/y/z.html');
  });

  it('ignores the query of the base when computing the directory', () => {
    const withQuery: AbsoluteUrl = { scheme: 'http', host: 'a.com', path: '/x/list.php?dir=/a/b' };
    expect(resolved(withQuery, 'item.html')).toBe('http://a.com/x/item.html');
  });

  it('never climbs above the root', () => {
    expect(resolved(page, '../../../../top.html')).toBe('http://a.com/top.html');
  });

  it('keeps the host case and port of the base', () => {
    const base: AbsoluteUrl = { scheme: 'http', host: 'A.com:8080', path: '/dir/page' };
    expect(resolved(base, 'next')).toBe('http://A.com:8080/dir/next');
  });

  it('trims whitespace around the reference', () => {
    expect(resolved(page, '  \n../q.html\t')).toBe('http://a.com/x/q.html');
  });

  it('never throws for odd input', () => {
    for (const href of ['::', '?', '%%%', '..', '/', '\\a\\b', 'tel:123', 'data:image/png;base64,AA==']) {
      expect(() => resolveHref(page, href)).not.toThrow();
    }
  });
});

describe('normalizePath', () => {
  it('drops empty and . segments and applies ..', () => {
    expect(normalizePath('/a//b/./c/../d')).toBe('/a/b/d');
  });

  it('drops .. at the root instead of failing', () => {
    expect(normalizePath('/../a')).toBe('/a');
    expect(normalizePath('/..')).toBe('/');
  });

  it('collapses an empty result to /', () => {
    expect(normalizePath('')).toBe('/');
    expect(normalizePath('/./')).toBe('/');
  });

  it('does not keep a trailing slash', () => {
    expect(normalizePath('/a/b/')).toBe('/a/b');
  });
});

describe('baseDirectory', () => {
  it('keeps everything through the last slash', () => {
    expect(baseDirectory('/a/b/index.html')).toBe('/a/b/');
    expect(baseDirectory('/a/b/')).toBe('/a/b/');
    expect(baseDirectory('/index.html')).toBe('/');
    expect(baseDirectory('/a/page#sec/tion')).toBe('/a/');
  });
});
