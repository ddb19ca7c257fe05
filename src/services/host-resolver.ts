import dns from 'node:dns';
import { isIP } from 'node:net';
import { setTimeout } from 'node:timers/promises';

import { createErrorWithCode, getErrorMessage } from '../utils/error-utils.js';

import { logDebug } from './logger.js';

export const UNKNOWN_ADDRESS = 'Unknown';

export type HostLookup = (hostname: string) => Promise<dns.LookupAddress>;

export interface ResolveOptions {
  timeout: number;
  lookup?: HostLookup;
}

const systemLookup: HostLookup = (hostname) => dns.promises.lookup(hostname);

function stripIpv6Brackets(hostname: string): string {
  return hostname.startsWith('[') && hostname.endsWith(']')
    ? hostname.slice(1, -1)
    : hostname;
}

async function rejectAfter(
  hostname: string,
  timeout: number,
  signal: AbortSignal
): Promise<never> {
  await setTimeout(timeout, undefined, { signal });
  throw createErrorWithCode(
    `DNS lookup for ${hostname} timed out after ${timeout}ms`,
    'ETIMEOUT'
  );
}

function assertSupportedFamily(
  hostname: string,
  result: dns.LookupAddress
): void {
  if (result.family === 4 || result.family === 6) return;
  throw createErrorWithCode(
    `Invalid address family returned for ${hostname}`,
    'EINVAL'
  );
}

/**
 * Best-effort address of a host for display. Never rejects: any lookup
 * failure yields {@link UNKNOWN_ADDRESS}.
 */
export async function resolveHostAddress(
  hostname: string,
  options: ResolveOptions
): Promise<string> {
  const host = stripIpv6Brackets(hostname);
  if (isIP(host)) return host;

  const lookup = options.lookup ?? systemLookup;
  const timer = new AbortController();

  try {
    const result = await Promise.race([
      lookup(host),
      rejectAfter(host, options.timeout, timer.signal),
    ]);
    assertSupportedFamily(host, result);
    return result.address;
  } catch (error) {
    logDebug('Host resolution failed', {
      hostname: host,
      reason: getErrorMessage(error),
    });
    return UNKNOWN_ADDRESS;
  } finally {
    timer.abort();
  }
}
