export { Target, type TargetDependencies } from './target.js';

export type {
  Credentials,
  HttpMethod,
  ProbeOverrides,
  ProbeRequest,
  ProbeResponse,
  ProxyOptions,
  RequestOverrides,
  StandingMethod,
  TargetOptions,
  TransportFailure,
  TransportFailureKind,
} from './config/types.js';
export { GET_FALLBACK_MAX_FILE_SIZE } from './config/constants.js';

export {
  AppError,
  UrlValidationError,
  ValidationError,
} from './errors/app-error.js';

export {
  AdaptiveRequester,
  type RequestSender,
  standingMethodFor,
} from './services/adaptive-requester.js';
export {
  type HostLookup,
  resolveHostAddress,
  UNKNOWN_ADDRESS,
} from './services/host-resolver.js';
export {
  generateNotFoundPath,
  generateNotFoundSlug,
} from './services/not-found-baseline.js';
export {
  isForbiddenStatus,
  isHttpAuthStatus,
  isOnlineStatus,
  isProxyAuthStatus,
} from './services/reachability.js';
export { findRedirection, isRedirectStatus } from './services/redirects.js';
export {
  AxiosTransport,
  createFailedResponse,
  type HttpTransport,
  type TransportSettings,
} from './services/transport.js';

export {
  buildTargetUrl,
  encodePathReference,
  normalizeTargetUrl,
} from './utils/url-normalizer.js';
export { Lazy, Once } from './utils/once.js';
