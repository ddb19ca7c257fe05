import { config } from './config/index.js';
import type {
  HttpMethod,
  ProbeOverrides,
  ProbeRequest,
  ProbeResponse,
  RequestOverrides,
  StandingMethod,
  TargetOptions,
} from './config/types.js';

import { ValidationError } from './errors/app-error.js';

import { targetOptionsSchema } from './schemas/inputs.js';

import {
  AdaptiveRequester,
  type RequestSender,
} from './services/adaptive-requester.js';
import { type HostLookup, resolveHostAddress } from './services/host-resolver.js';
import { logDebug } from './services/logger.js';
import { generateNotFoundPath } from './services/not-found-baseline.js';
import {
  isForbiddenStatus,
  isHttpAuthStatus,
  isOnlineStatus,
  isProxyAuthStatus,
} from './services/reachability.js';
import { findRedirection } from './services/redirects.js';
import { AxiosTransport, type HttpTransport } from './services/transport.js';

import { Lazy, Once } from './utils/once.js';
import { buildTargetUrl, normalizeTargetUrl } from './utils/url-normalizer.js';

export interface TargetDependencies {
  /** Used instead of the built-in axios transport; the caller keeps ownership. */
  transport?: HttpTransport;
  lookup?: HostLookup;
}

function parseTargetOptions(options: TargetOptions): TargetOptions {
  const result = targetOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new ValidationError('Invalid target options', {
      issues: result.error.issues.map((issue) => ({
        path: issue.path.map(String).join('.'),
        message: issue.message,
      })),
    });
  }
  return result.data;
}

function freezeOptions(options: TargetOptions): Readonly<TargetOptions> {
  return Object.freeze({
    ...options,
    ...(options.headers ? { headers: Object.freeze({ ...options.headers }) } : {}),
    ...(options.params ? { params: Object.freeze({ ...options.params }) } : {}),
    ...(options.proxy ? { proxy: Object.freeze({ ...options.proxy }) } : {}),
    ...(options.auth ? { auth: Object.freeze({ ...options.auth }) } : {}),
  });
}

function mergeRecords(
  base?: Readonly<Record<string, string>>,
  extra?: Readonly<Record<string, string>>
): Record<string, string> | undefined {
  if (!base && !extra) return undefined;
  return { ...base, ...extra };
}

/**
 * One web endpoint under scan.
 *
 * The not-found baseline, the homepage response and the standing probe method
 * are each computed once per instance and then reused, even if the server
 * later changes behaviour. Concurrent first callers share a single request.
 * Reachability predicates always issue a fresh request.
 */
export class Target implements RequestSender {
  readonly options: Readonly<TargetOptions>;

  private raw: string;
  private normalized: string;
  private readonly transport: HttpTransport;
  private readonly ownsTransport: boolean;
  private readonly lookup: HostLookup | undefined;
  private readonly requester: AdaptiveRequester;
  private readonly notFound: Lazy<string>;
  private readonly baseline: Once<ProbeResponse>;
  private readonly homepage: Once<ProbeResponse>;

  constructor(
    url: string,
    options: TargetOptions = {},
    dependencies: TargetDependencies = {}
  ) {
    this.options = freezeOptions(parseTargetOptions(options));
    this.normalized = normalizeTargetUrl(url);
    this.raw = url;

    this.ownsTransport = dependencies.transport === undefined;
    this.transport =
      dependencies.transport ??
      new AxiosTransport({
        userAgent: this.options.userAgent ?? config.request.userAgent,
        verifyTls: this.options.verifyTls ?? true,
        proxy: this.options.proxy,
        auth: this.options.auth,
      });
    this.lookup = dependencies.lookup;

    this.requester = new AdaptiveRequester(this);
    this.notFound = new Lazy(() => this.buildUrl(generateNotFoundPath()));
    this.baseline = new Once(() => this.captureNotFoundBaseline());
    this.homepage = new Once(() =>
      this.send('GET', this.url, { followRedirects: true })
    );
  }

  /** The URL exactly as last supplied. */
  get rawUrl(): string {
    return this.raw;
  }

  get url(): string {
    return this.normalized;
  }

  /** Throws UrlValidationError and keeps the current URL when `raw` is invalid. */
  setUrl(raw: string): void {
    const normalized = normalizeTargetUrl(raw);
    this.normalized = normalized;
    this.raw = raw;
  }

  buildUrl(path?: string): string {
    return buildTargetUrl(this.normalized, path);
  }

  resolvedAddress(): Promise<string> {
    return resolveHostAddress(new URL(this.normalized).hostname, {
      timeout: this.options.resolveTimeout ?? config.resolver.timeout,
      lookup: this.lookup,
    });
  }

  notFoundUrl(): string {
    return this.notFound.get();
  }

  notFoundBaseline(): Promise<ProbeResponse> {
    return this.baseline.get();
  }

  homepageResponse(): Promise<ProbeResponse> {
    return this.homepage.get();
  }

  async homepageUrl(): Promise<string> {
    const response = await this.homepageResponse();
    return response.effectiveUrl;
  }

  redirection(url: string = this.url): Promise<string | undefined> {
    return findRedirection(
      (target, overrides) => this.send('GET', target, overrides),
      url
    );
  }

  async isOnline(path?: string): Promise<boolean> {
    return isOnlineStatus(await this.statusOf(path));
  }

  async requiresHttpAuth(path?: string): Promise<boolean> {
    return isHttpAuthStatus(await this.statusOf(path));
  }

  async isForbidden(path?: string): Promise<boolean> {
    return isForbiddenStatus(await this.statusOf(path));
  }

  async requiresProxyAuth(path?: string): Promise<boolean> {
    return isProxyAuthStatus(await this.statusOf(path));
  }

  standingMethod(): Promise<StandingMethod> {
    return this.requester.standingMethod();
  }

  probe(
    path?: string,
    acceptedCodes: readonly number[] = [200],
    overrides: ProbeOverrides = {}
  ): Promise<ProbeResponse> {
    return this.requester.probe(path, acceptedCodes, overrides);
  }

  send(
    method: HttpMethod,
    url: string,
    overrides: RequestOverrides = {}
  ): Promise<ProbeResponse> {
    const request: ProbeRequest = {
      method,
      url,
      headers: { ...this.options.headers, ...overrides.headers },
      timeout:
        overrides.timeout ?? this.options.timeout ?? config.request.timeout,
      followRedirects:
        overrides.followRedirects ?? this.options.followRedirects ?? false,
      maxRedirects: this.options.maxRedirects ?? config.request.maxRedirects,
    };

    const params = mergeRecords(this.options.params, overrides.params);
    if (params) request.params = params;

    const maxFileSize = overrides.maxFileSize ?? this.options.maxFileSize;
    if (maxFileSize !== undefined) request.maxFileSize = maxFileSize;

    return this.transport.request(request);
  }

  /** Releases keep-alive sockets held by the built-in transport. */
  close(): void {
    if (this.ownsTransport) this.transport.close?.();
  }

  private async statusOf(path?: string): Promise<number> {
    const response = await this.send('GET', this.buildUrl(path));
    return response.status;
  }

  private async captureNotFoundBaseline(): Promise<ProbeResponse> {
    const url = this.notFoundUrl();
    const response = await this.send('GET', url, { followRedirects: true });

    logDebug('Not-found baseline captured', {
      url,
      status: response.status,
      bodyLength: response.body.length,
    });
    return response;
  }
}
