export type UrlScheme = 'http' | 'https';

export interface AbsoluteUrl {
  readonly scheme: UrlScheme;
  /** Original case, may carry a port. */
  readonly host: string;
  /** Always starts with `/`; query and fragment stay attached. */
  readonly path: string;
}

const ABSOLUTE_URL_PATTERN = /^(https?):\/\/([^/?#]*)(.*)$/i;

export function parseAbsoluteUrl(raw: string): AbsoluteUrl | null {
  const match = ABSOLUTE_URL_PATTERN.exec(raw.trim());
  if (!match) {
    return null;
  }

  const [, scheme, host, rest] = match;
  if (host.length === 0 || /\s/.test(host)) {
    return null;
  }

  return {
    scheme: scheme.toLowerCase() === 'https' ? 'https' : 'http',
    host,
    path: toPath(rest),
  };
}

export function formatAbsoluteUrl(url: AbsoluteUrl): string {
  return `${url.scheme}://${url.host}${url.path}`;
}

/** Path with any `?query` or `#fragment` suffix removed. */
export function stripQueryAndFragment(path: string): string {
  const cut = path.search(/[?#]/);
  return cut === -1 ? path : path.slice(0, cut);
}

function toPath(rest: string): string {
  if (rest.length === 0) {
    return '/';
  }

  return rest.startsWith('/') ? rest : `/${rest}`;
}
