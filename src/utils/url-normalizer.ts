import { UrlValidationError } from '../errors/app-error.js';

// RFC 3986 pchar: unreserved / sub-delims / ":" / "@"
const PCHAR = /^[A-Za-z0-9\-._~!$&'()*+,;=:@]$/;
const QUERY_CHAR = /^[A-Za-z0-9\-._~!$&'()*+,;=:@/?]$/;

function assertUrlNotEmpty(raw: string, trimmed: string): void {
  if (!trimmed) {
    throw new UrlValidationError('URL cannot be empty', raw);
  }
}

function parseUrl(raw: string, trimmed: string): URL {
  if (!URL.canParse(trimmed)) {
    throw new UrlValidationError('Invalid URL format', raw);
  }
  return new URL(trimmed);
}

function assertProtocolAllowed(raw: string, url: URL): void {
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new UrlValidationError(
      `Invalid protocol: ${url.protocol}. Only http: and https: are allowed`,
      raw
    );
  }
}

function assertHostnamePresent(raw: string, url: URL): void {
  if (!url.hostname) {
    throw new UrlValidationError('URL must have a valid hostname', raw);
  }
}

/**
 * Canonical form of a target URL: punycode host, default port dropped, no
 * fragment, and a path that always ends with `/` so relative probes resolve
 * beneath it.
 */
export function normalizeTargetUrl(raw: string): string {
  const trimmed = raw.trim();
  assertUrlNotEmpty(raw, trimmed);

  const url = parseUrl(raw, trimmed);
  assertProtocolAllowed(raw, url);
  assertHostnamePresent(raw, url);

  url.hash = '';
  if (!url.pathname.endsWith('/')) {
    url.pathname = `${url.pathname}/`;
  }
  return url.href;
}

function percentEncode(value: string, allowed: RegExp): string {
  let encoded = '';
  for (const char of value) {
    if (allowed.test(char)) {
      encoded += char;
      continue;
    }
    for (const byte of Buffer.from(char, 'utf8')) {
      encoded += `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
    }
  }
  return encoded;
}

function encodePath(rawPath: string): string {
  const encoded = rawPath
    .split('/')
    .map((segment) => percentEncode(segment, PCHAR))
    .join('/');

  // "//host/x" would otherwise switch hosts
  if (encoded.startsWith('//')) {
    return `/${encoded.replace(/^\/+/, '')}`;
  }

  const firstSegment = encoded.split('/', 1)[0] ?? '';
  if (!encoded.startsWith('/') && firstSegment.includes(':')) {
    return `./${encoded}`;
  }
  return encoded;
}

/**
 * Percent-encodes a caller-supplied path so it can be resolved against a
 * target URL. Everything up to the first `?` is treated as path segments;
 * the rest is kept as the query.
 */
export function encodePathReference(path: string): string {
  const queryIndex = path.indexOf('?');
  if (queryIndex === -1) return encodePath(path);

  const encodedPath = encodePath(path.slice(0, queryIndex));
  const encodedQuery = percentEncode(path.slice(queryIndex + 1), QUERY_CHAR);
  return `${encodedPath}?${encodedQuery}`;
}

export function buildTargetUrl(baseUrl: string, path?: string): string {
  if (path === undefined || path === '') return baseUrl;
  return new URL(encodePathReference(path), baseUrl).href;
}
