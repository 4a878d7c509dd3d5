import { describe, expect, it } from 'vitest';
import { formatUrl, parseUrl } from '../src/lib/UrlParser.js';
import type { ParseResult, Url } from '../src/lib/types.js';

/**
 * Unwraps a successful parse, failing the test otherwise.
 */
function expectUrl(result: ParseResult): Url {
  if (!result.ok) {
    throw new Error(`expected a URL, got ${result.error.kind}`);
  }
  return result.value;
}

describe('parseUrl', () => {
  it('should default the path to / when the input has none', () => {
    expect(parseUrl('http://example.com')).toEqual({
      ok: true,
      value: { scheme: 'http', host: 'example.com', path: '/', port: 80 },
    });
  });

  it('should keep a lone trailing slash as the path', () => {
    expect(parseUrl('http://example.com/')).toEqual({
      ok: true,
      value: { scheme: 'http', host: 'example.com', path: '/', port: 80 },
    });
  });

  it('should split the host at the first slash only', () => {
    const url = expectUrl(parseUrl('http://example.com/a/b'));
    expect(url.host).toBe('example.com');
    expect(url.path).toBe('/a/b');
  });

  it('should keep repeated slashes and query text in the path verbatim', () => {
    const url = expectUrl(parseUrl('http://example.com//a//b/?q=1#top'));
    expect(url.path).toBe('//a//b/?q=1#top');
  });

  it('should not parse a port out of the host', () => {
    const url = expectUrl(parseUrl('http://example.com:8080/x'));
    expect(url.host).toBe('example.com:8080');
    expect(url.port).toBe(80);
  });

  it('should split at the first :// only', () => {
    const url = expectUrl(parseUrl('http://proxy/http://example.com'));
    expect(url.host).toBe('proxy');
    expect(url.path).toBe('/http://example.com');
  });

  it('should return a frozen value', () => {
    const url = expectUrl(parseUrl('http://example.com'));
    expect(Object.isFrozen(url)).toBe(true);
  });

  it.each(['', 'example.com', 'http:/example.com', 'http//example.com', ':/'])(
    'should fail with MissingSchemeDelimiter for %j',
    (input) => {
      expect(parseUrl(input)).toEqual({
        ok: false,
        error: { kind: 'MissingSchemeDelimiter' },
      });
    }
  );

  it.each(['ftp', 'https', 'HTTP', ' http', 'http ', ''])(
    'should fail with UnsupportedScheme carrying %j',
    (scheme) => {
      expect(parseUrl(`${scheme}://example.com`)).toEqual({
        ok: false,
        error: { kind: 'UnsupportedScheme', scheme },
      });
    }
  );

  it('should check the scheme before the host', () => {
    expect(parseUrl('ftp:///a')).toEqual({
      ok: false,
      error: { kind: 'UnsupportedScheme', scheme: 'ftp' },
    });
  });

  it.each(['http:///a', 'http://', 'http:///'])(
    'should fail with EmptyHost for %j',
    (input) => {
      expect(parseUrl(input)).toEqual({
        ok: false,
        error: { kind: 'EmptyHost' },
      });
    }
  );
});

describe('formatUrl', () => {
  it('should rebuild scheme, host and path', () => {
    const url = expectUrl(parseUrl('http://example.com/a/b'));
    expect(formatUrl(url)).toBe('http://example.com/a/b');
  });

  it('should add the default path', () => {
    const url = expectUrl(parseUrl('http://example.com'));
    expect(formatUrl(url)).toBe('http://example.com/');
  });

  it('should produce a string that parses back to an equal URL', () => {
    const inputs = [
      'http://example.com',
      'http://example.com/',
      'http://localhost/a//b',
      'http://10.0.0.1:3000/x?y',
    ];

    for (const input of inputs) {
      const url = expectUrl(parseUrl(input));
      expect(parseUrl(formatUrl(url))).toEqual({ ok: true, value: url });
    }
  });
});
