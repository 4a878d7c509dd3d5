import { SCHEME_DELIMITER, SUPPORTED_SCHEME } from './UrlParser.js';
import type { UrlError } from './types.js';

/**
 * Renders a parse or connection error as a single line of text.
 * @param error The error returned by `parseUrl` or `connect`.
 * @returns A message for the calling program to display.
 */
export function describeError(error: UrlError): string {
  switch (error.kind) {
    case 'MissingSchemeDelimiter':
      return `URL missing scheme delimiter ${SCHEME_DELIMITER}`;
    case 'UnsupportedScheme':
      return `only ${SUPPORTED_SCHEME} is supported for now, but got: ${error.scheme}`;
    case 'EmptyHost':
      return 'host is empty';
    case 'ConnectionError':
      return `could not connect to ${error.host}:${error.port}: ${error.cause.message}`;
  }
}
