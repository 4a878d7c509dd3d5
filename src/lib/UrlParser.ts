import type { ParseResult, Url } from './types.js';

export const SCHEME_DELIMITER = '://';
export const SUPPORTED_SCHEME = 'http';
/** Port parsing is not supported; every URL targets this port. */
export const DEFAULT_PORT = 80;

/**
 * Splits an absolute URL of the form `scheme://host[/path]` into its parts.
 *
 * Only the first `://` and the first `/` after it are delimiters; the rest of
 * the input is kept verbatim in the path. The scheme must be exactly `http`.
 *
 * @param input The URL string to decompose.
 * @returns The frozen `Url`, or the first rule the input breaks.
 *
 * @example
 * parseUrl('http://example.com/a/b');
 * // { ok: true, value: { scheme: 'http', host: 'example.com', path: '/a/b', port: 80 } }
 */
export function parseUrl(input: string): ParseResult {
  const delimiterIndex = input.indexOf(SCHEME_DELIMITER);
  if (delimiterIndex === -1) {
    return { ok: false, error: { kind: 'MissingSchemeDelimiter' } };
  }

  const scheme = input.slice(0, delimiterIndex);
  if (scheme !== SUPPORTED_SCHEME) {
    return { ok: false, error: { kind: 'UnsupportedScheme', scheme } };
  }

  const rest = input.slice(delimiterIndex + SCHEME_DELIMITER.length);
  const slashIndex = rest.indexOf('/');
  const host = slashIndex === -1 ? rest : rest.slice(0, slashIndex);
  const path = slashIndex === -1 ? '/' : `/${rest.slice(slashIndex + 1)}`;

  if (host === '') {
    return { ok: false, error: { kind: 'EmptyHost' } };
  }

  const url: Url = Object.freeze({ scheme, host, path, port: DEFAULT_PORT });
  return { ok: true, value: url };
}

/**
 * Rebuilds the string form of a parsed URL. The result parses back to an
 * equal `Url`.
 * @param url A URL produced by `parseUrl`.
 * @returns `scheme://host` followed by the path.
 */
export function formatUrl(url: Url): string {
  return `${url.scheme}${SCHEME_DELIMITER}${url.host}${url.path}`;
}
