import { PACKAGE_NAME, PACKAGE_VERSION, REDIRECTS, TIMEOUT } from './constants.js';
import {
  parseBoolean,
  parseInteger,
  parseLogFormat,
  parseLogLevel,
  parseString,
} from './env-parsers.js';

const { env } = process;

export const config = Object.freeze({
  service: {
    name: PACKAGE_NAME,
    version: PACKAGE_VERSION,
  },
  request: Object.freeze({
    timeout: parseInteger(
      env.TARGET_PROBE_TIMEOUT_MS,
      TIMEOUT.DEFAULT_REQUEST_TIMEOUT_MS,
      1
    ),
    maxRedirects: parseInteger(
      env.TARGET_PROBE_MAX_REDIRECTS,
      REDIRECTS.DEFAULT_MAX,
      0,
      50
    ),
    userAgent: parseString(
      env.TARGET_PROBE_USER_AGENT,
      `${PACKAGE_NAME}/${PACKAGE_VERSION}`
    ),
    slowRequestMs: TIMEOUT.SLOW_REQUEST_WARN_MS,
  }),
  resolver: Object.freeze({
    timeout: parseInteger(
      env.TARGET_PROBE_RESOLVE_TIMEOUT_MS,
      TIMEOUT.DEFAULT_RESOLVE_TIMEOUT_MS,
      1
    ),
  }),
  logging: Object.freeze({
    level: parseLogLevel(env.LOG_LEVEL),
    format: parseLogFormat(env.LOG_FORMAT),
    enabled: parseBoolean(env.LOG_ENABLED, true),
  }),
  security: Object.freeze({
    // Hop-by-hop and framing headers the transport owns.
    blockedHeaders: new Set([
      'host',
      'connection',
      'content-length',
      'transfer-encoding',
      'upgrade',
      'keep-alive',
      'proxy-connection',
    ]),
  }),
});
