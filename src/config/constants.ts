export const PACKAGE_NAME = 'target-probe';
export const PACKAGE_VERSION = '1.0.0';

export const TIMEOUT = {
  DEFAULT_REQUEST_TIMEOUT_MS: 10000,
  DEFAULT_RESOLVE_TIMEOUT_MS: 3000,
  SLOW_REQUEST_WARN_MS: 5000,
} as const;

export const REDIRECTS = {
  DEFAULT_MAX: 10,
} as const;

// Body cap used once HEAD has been found unreliable for a target.
export const GET_FALLBACK_MAX_FILE_SIZE = 1;

export const NOT_FOUND_SLUG_LENGTH = 6;
