import { describe, expect, it } from 'vitest';
import { describeError } from '../src/lib/errors.js';

describe('describeError', () => {
  it('should describe a missing scheme delimiter', () => {
    expect(describeError({ kind: 'MissingSchemeDelimiter' })).toBe(
      'URL missing scheme delimiter ://'
    );
  });

  it('should name the offending scheme', () => {
    expect(describeError({ kind: 'UnsupportedScheme', scheme: 'ftp' })).toBe(
      'only http is supported for now, but got: ftp'
    );
  });

  it('should describe an empty host', () => {
    expect(describeError({ kind: 'EmptyHost' })).toBe('host is empty');
  });

  it('should include the target and the transport failure', () => {
    expect(
      describeError({
        kind: 'ConnectionError',
        host: 'example.com',
        port: 80,
        cause: new Error('connect ECONNREFUSED'),
      })
    ).toBe('could not connect to example.com:80: connect ECONNREFUSED');
  });
});
