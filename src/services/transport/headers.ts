import { config } from '../../config/index.js';

import { logDebug } from '../logger.js';

export function sanitizeHeaders(
  headers?: Record<string, string>
): Record<string, string> {
  if (!headers || Object.keys(headers).length === 0) return {};

  const normalized = normalizeHeaders(headers, config.security.blockedHeaders);
  return Object.fromEntries(normalized.entries());
}

function normalizeHeaders(
  headers: Record<string, string>,
  blockedHeaders: ReadonlySet<string>
): Headers {
  const normalized = new Headers();
  for (const [key, value] of Object.entries(headers)) {
    if (blockedHeaders.has(key.toLowerCase())) continue;
    setHeaderSafe(normalized, key, value);
  }
  return normalized;
}

function setHeaderSafe(headers: Headers, key: string, value: string): void {
  try {
    headers.set(key, value);
  } catch (error) {
    logDebug('Dropping invalid request header', {
      header: key,
      reason: error instanceof Error ? error.message : String(error),
    });
  }
}
