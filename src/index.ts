/**
 * @module urlconnect
 * Library entry point: URL parsing, connection, and the stream components
 * used by the CLI.
 */

export {
  parseUrl,
  formatUrl,
  DEFAULT_PORT,
  SCHEME_DELIMITER,
  SUPPORTED_SCHEME,
} from './lib/UrlParser.js';
export { connect } from './lib/Connector.js';
export { describeError } from './lib/errors.js';
export { LineSplitter } from './lib/LineSplitter.js';
export { UrlProcessor } from './lib/UrlProcessor.js';
export type { UrlProcessorOptions } from './lib/UrlProcessor.js';
export type {
  Url,
  ParseError,
  ConnectionError,
  UrlError,
  Result,
  ParseResult,
  ConnectResult,
  ProbeOutput,
} from './lib/types.js';
