export const HTTP_STATUS = {
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  PROXY_AUTHENTICATION_REQUIRED: 407,
} as const;

// Any received status counts, 5xx included: reachability, not health.
export function isOnlineStatus(status: number): boolean {
  return status !== 0;
}

export function isHttpAuthStatus(status: number): boolean {
  return status === HTTP_STATUS.UNAUTHORIZED;
}

export function isForbiddenStatus(status: number): boolean {
  return status === HTTP_STATUS.FORBIDDEN;
}

export function isProxyAuthStatus(status: number): boolean {
  return status === HTTP_STATUS.PROXY_AUTHENTICATION_REQUIRED;
}
