import { describe, expect, test } from 'vitest';

import { UrlValidationError } from '../../../src/errors/app-error.js';
import {
  buildTargetUrl,
  encodePathReference,
  normalizeTargetUrl,
} from '../../../src/utils/url-normalizer.js';

describe('url-normalizer', () => {
  describe('normalizeTargetUrl', () => {
    describe('Valid URLs', () => {
      test('adds a trailing slash to a bare host', () => {
        expect(normalizeTargetUrl('http://site.com')).toBe('http://site.com/');
      });

      test('adds a trailing slash to a directory path', () => {
        expect(normalizeTargetUrl('https://e.org/blog')).toBe(
          'https://e.org/blog/'
        );
      });

      test('converts internationalized hosts to punycode', () => {
        expect(normalizeTargetUrl('http://пример.испытание/')).toBe(
          'http://xn--e1afmkfd.xn--80akhbyknj4f/'
        );
      });

      test('lowercases the host, drops the default port and fragment', () => {
        expect(normalizeTargetUrl('HTTP://E.ORG:80/app#top')).toBe(
          'http://e.org/app/'
        );
      });

      test('keeps a non-default port and the query', () => {
        expect(normalizeTargetUrl('https://e.org:8443/app?lang=en')).toBe(
          'https://e.org:8443/app/?lang=en'
        );
      });

      test('encodes spaces in the path', () => {
        expect(normalizeTargetUrl('http://e.org/my site')).toBe(
          'http://e.org/my%20site/'
        );
      });

      test('trims surrounding whitespace', () => {
        expect(normalizeTargetUrl('  http://e.org  ')).toBe('http://e.org/');
      });
    });

    describe('Invalid URLs', () => {
      test('rejects an empty string', () => {
        expect(() => normalizeTargetUrl('')).toThrow(UrlValidationError);
        expect(() => normalizeTargetUrl('')).toThrow('URL cannot be empty');
      });

      test('rejects whitespace only', () => {
        expect(() => normalizeTargetUrl('   ')).toThrow(UrlValidationError);
      });

      test('rejects a string without scheme and host', () => {
        expect(() => normalizeTargetUrl('jj')).toThrow(UrlValidationError);
        expect(() => normalizeTargetUrl('jj')).toThrow('Invalid URL format');
      });

      test('rejects non-http schemes', () => {
        expect(() => normalizeTargetUrl('ftp://e.org/')).toThrow(
          /Invalid protocol: ftp:/
        );
      });

      test('carries the rejected input on the error', () => {
        try {
          normalizeTargetUrl('jj');
          expect.unreachable();
        } catch (error) {
          expect(error).toBeInstanceOf(UrlValidationError);
          if (error instanceof UrlValidationError) {
            expect(error.url).toBe('jj');
            expect(error.code).toBe('INVALID_URL');
          }
        }
      });
    });
  });

  describe('encodePathReference', () => {
    test('encodes each segment and keeps separators', () => {
      expect(encodePathReference('a b/c d.txt')).toBe('a%20b/c%20d.txt');
    });

    test('encodes percent signs and hashes', () => {
      expect(encodePathReference('s/a%.txt')).toBe('s/a%25.txt');
      expect(encodePathReference('#file.txt#')).toBe('%23file.txt%23');
    });

    test('encodes unsafe characters and non-ASCII as UTF-8', () => {
      expect(encodePathReference('a"<b>|c')).toBe('a%22%3Cb%3E%7Cc');
      expect(encodePathReference('café.html')).toBe('caf%C3%A9.html');
      expect(encodePathReference('a\\b')).toBe('a%5Cb');
    });

    test('keeps sub-delimiters allowed in path segments', () => {
      expect(encodePathReference("x/a;b=c,d!$&'()*+:@")).toBe(
        "x/a;b=c,d!$&'()*+:@"
      );
    });

    test('keeps the query separator and encodes inside the query', () => {
      expect(encodePathReference('search.php?q=a b&x=#1')).toBe(
        'search.php?q=a%20b&x=%231'
      );
    });

    test('collapses leading slashes so the host cannot change', () => {
      expect(encodePathReference('//evil.example/x')).toBe('/evil.example/x');
    });

    test('guards a first segment that looks like a scheme', () => {
      expect(encodePathReference('mailto:root')).toBe('./mailto:root');
    });
  });

  describe('buildTargetUrl', () => {
    const base = 'http://e.org/';

    test('returns the base URL without a path', () => {
      expect(buildTargetUrl(base)).toBe(base);
      expect(buildTargetUrl(base, '')).toBe(base);
    });

    test('appends a relative path', () => {
      expect(buildTargetUrl(base, 'file.txt')).toBe('http://e.org/file.txt');
    });

    test('encodes the path', () => {
      expect(buildTargetUrl(base, 'f ile.txt')).toBe('http://e.org/f%20ile.txt');
      expect(buildTargetUrl(base, 's/a%.txt')).toBe('http://e.org/s/a%25.txt');
      expect(buildTargetUrl(base, '#file.txt#')).toBe(
        'http://e.org/%23file.txt%23'
      );
    });

    test('resolves relative paths beneath the base directory', () => {
      expect(buildTargetUrl('http://e.org/dir/', 'file.txt')).toBe(
        'http://e.org/dir/file.txt'
      );
      expect(buildTargetUrl('http://e.org/a/b/', '../up.txt')).toBe(
        'http://e.org/a/up.txt'
      );
    });

    test('resolves root-relative paths from the host', () => {
      expect(buildTargetUrl('http://e.org/dir/', '/sub/file.txt')).toBe(
        'http://e.org/sub/file.txt'
      );
    });

    test('never leaves the target host', () => {
      expect(buildTargetUrl('http://e.org/dir/', '//evil.example/x')).toBe(
        'http://e.org/evil.example/x'
      );
      expect(buildTargetUrl(base, 'javascript:alert(1)')).toBe(
        'http://e.org/javascript:alert(1)'
      );
    });

    test('drops the base query when a path is given', () => {
      expect(buildTargetUrl('http://e.org/app/?lang=en', 'login')).toBe(
        'http://e.org/app/login'
      );
    });

    test('is idempotent for the same input', () => {
      const first = buildTargetUrl(base, 'a b/#c?d=e f');
      const second = buildTargetUrl(base, 'a b/#c?d=e f');

      expect(first).toBe('http://e.org/a%20b/%23c?d=e%20f');
      expect(second).toBe(first);
    });

    test('does not modify the input string', () => {
      const path = 'f ile.txt';
      buildTargetUrl(base, path);

      expect(path).toBe('f ile.txt');
    });
  });
});
