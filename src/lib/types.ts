import type { Socket } from 'net';

/**
 * The structural decomposition of an absolute `http` URL.
 * Values are frozen once built by `parseUrl`.
 */
export interface Url {
  readonly scheme: string;
  readonly host: string;
  /** Always starts with `/`. */
  readonly path: string;
  readonly port: number;
}

export type ParseError =
  | { readonly kind: 'MissingSchemeDelimiter' }
  | { readonly kind: 'UnsupportedScheme'; readonly scheme: string }
  | { readonly kind: 'EmptyHost' };

/** Wraps the transport failure reported by the socket. */
export interface ConnectionError {
  readonly kind: 'ConnectionError';
  readonly host: string;
  readonly port: number;
  readonly cause: Error;
}

export type UrlError = ParseError | ConnectionError;

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export type ParseResult = Result<Url, ParseError>;

export type ConnectResult = Result<Socket, ConnectionError>;

/**
 * Defines the structure of the JSON line written for each probed URL.
 */
export interface ProbeOutput {
  /** The URL string as it was read. */
  url: string;
  /** Whether a TCP connection was established. */
  connected: boolean;
  host?: string;
  path?: string;
  port?: number;
  /** Message of the parse or connection error, if any. */
  error?: string;
}
