export type HttpMethod = 'HEAD' | 'GET';

export interface Credentials {
  username: string;
  password: string;
}

export interface ProxyOptions {
  protocol?: 'http' | 'https';
  host: string;
  port: number;
  auth?: Credentials;
}

/**
 * Options a target forwards to every request it issues. Only transport-level
 * settings are recognised; nothing here changes probing decisions.
 */
export interface TargetOptions {
  timeout?: number;
  headers?: Record<string, string>;
  params?: Record<string, string>;
  userAgent?: string;
  proxy?: ProxyOptions;
  auth?: Credentials;
  verifyTls?: boolean;
  maxFileSize?: number;
  followRedirects?: boolean;
  maxRedirects?: number;
  resolveTimeout?: number;
}

/** Per-call settings merged over {@link TargetOptions}. */
export interface RequestOverrides {
  headers?: Record<string, string>;
  params?: Record<string, string>;
  timeout?: number;
  maxFileSize?: number;
  followRedirects?: boolean;
}

export interface ProbeOverrides {
  head?: RequestOverrides;
  get?: RequestOverrides;
}

export interface ProbeRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  params?: Record<string, string>;
  timeout: number;
  maxFileSize?: number;
  followRedirects: boolean;
  maxRedirects: number;
}

export type TransportFailureKind = 'timeout' | 'aborted' | 'network' | 'unknown';

export interface TransportFailure {
  kind: TransportFailureKind;
  code?: string;
  message: string;
}

export interface ProbeResponse {
  url: string;
  effectiveUrl: string;
  method: HttpMethod;
  /** 0 when no response was received. */
  status: number;
  statusText: string;
  headers: Record<string, string>;
  /** `rawBody` decoded as UTF-8. */
  body: string;
  rawBody: Buffer;
  bodyTruncated: boolean;
  durationMs: number;
  /**
   * Why no response arrived (status 0), or why the body stopped early when
   * the status line did arrive.
   */
  failure?: TransportFailure;
  request: ProbeRequest;
}

export type StandingMethod =
  | { method: 'HEAD' }
  | { method: 'GET'; maxFileSize: number };
