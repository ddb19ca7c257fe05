import type { ProbeResponse, RequestOverrides } from '../config/types.js';

const REDIRECT_STATUSES: ReadonlySet<number> = new Set([
  301, 302, 303, 307, 308,
]);

export function isRedirectStatus(status: number): boolean {
  return REDIRECT_STATUSES.has(status);
}

type GetRequester = (
  url: string,
  overrides?: RequestOverrides
) => Promise<ProbeResponse>;

/**
 * Final destination of `url` when it redirects elsewhere, or undefined when
 * it answers directly or the chain ends where it started.
 */
export async function findRedirection(
  get: GetRequester,
  url: string
): Promise<string | undefined> {
  const first = await get(url);
  if (!isRedirectStatus(first.status)) return undefined;

  const followed = await get(url, { followRedirects: true });
  if (followed.status === 0) return undefined;
  return followed.effectiveUrl === url ? undefined : followed.effectiveUrl;
}
