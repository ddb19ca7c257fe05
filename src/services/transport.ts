import { performance } from 'node:perf_hooks';

import axios, {
  type AxiosAdapter,
  type AxiosInstance,
  type AxiosProxyConfig,
  type AxiosResponse,
} from 'axios';

import type {
  Credentials,
  ProbeRequest,
  ProbeResponse,
  ProxyOptions,
  TransportFailure,
} from '../config/types.js';

import { isRecord } from '../utils/error-utils.js';

import { logDebug, logError } from './logger.js';

import { type AgentPair, createAgents, destroyAgents } from './transport/agents.js';
import { describeTransportFailure } from './transport/errors.js';
import { sanitizeHeaders } from './transport/headers.js';
import {
  handleRequest,
  handleResponse,
  handleResponseError,
} from './transport/interceptors.js';
import { readResponseBody } from './transport/response.js';

/**
 * Performs a single HTTP request. Implementations resolve for every outcome:
 * any status code is a response, and a request that produced no response
 * resolves with status 0 and a `failure`.
 */
export interface HttpTransport {
  request(request: ProbeRequest): Promise<ProbeResponse>;
  close?(): void;
}

export interface TransportSettings {
  userAgent: string;
  verifyTls: boolean;
  proxy?: ProxyOptions;
  auth?: Credentials;
  /** Replaces the network adapter, e.g. to serve requests in process. */
  adapter?: AxiosAdapter;
}

function toAxiosProxy(proxy?: ProxyOptions): AxiosProxyConfig | false {
  if (!proxy) return false;
  return {
    protocol: proxy.protocol ?? 'http',
    host: proxy.host,
    port: proxy.port,
    ...(proxy.auth ? { auth: { ...proxy.auth } } : {}),
  };
}

function flattenHeaders(
  headers: AxiosResponse['headers']
): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [key, value] of Object.entries<unknown>(headers)) {
    if (value === undefined || value === null) continue;
    flat[key.toLowerCase()] = Array.isArray(value)
      ? value.map(String).join(', ')
      : String(value);
  }
  return flat;
}

function resolveEffectiveUrl(response: AxiosResponse, fallback: string): string {
  const nodeRequest: unknown = response.request;
  if (!isRecord(nodeRequest) || !isRecord(nodeRequest.res)) return fallback;
  const { responseUrl } = nodeRequest.res;
  return typeof responseUrl === 'string' && responseUrl ? responseUrl : fallback;
}

function describeFailure(
  error: unknown,
  deadline: AbortSignal,
  timeout: number
): TransportFailure {
  if (deadline.aborted) {
    return {
      kind: 'timeout',
      code: 'ETIMEDOUT',
      message: `Request exceeded ${timeout}ms`,
    };
  }
  return describeTransportFailure(error);
}

export function createFailedResponse(
  request: ProbeRequest,
  failure: TransportFailure,
  durationMs = 0
): ProbeResponse {
  return {
    url: request.url,
    effectiveUrl: request.url,
    method: request.method,
    status: 0,
    statusText: '',
    headers: {},
    body: '',
    rawBody: Buffer.alloc(0),
    bodyTruncated: false,
    durationMs,
    failure,
    request,
  };
}

export class AxiosTransport implements HttpTransport {
  private readonly client: AxiosInstance;
  private readonly agents: AgentPair;

  constructor(settings: TransportSettings) {
    this.agents = createAgents(settings.verifyTls);
    this.client = axios.create({
      httpAgent: this.agents.httpAgent,
      httpsAgent: this.agents.httpsAgent,
      proxy: toAxiosProxy(settings.proxy),
      ...(settings.auth ? { auth: { ...settings.auth } } : {}),
      ...(settings.adapter ? { adapter: settings.adapter } : {}),
      headers: {
        'User-Agent': settings.userAgent,
        Accept:
          'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.5',
      },
      responseType: 'stream',
      validateStatus: () => true,
    });

    this.client.interceptors.request.use(handleRequest);
    this.client.interceptors.response.use(handleResponse, handleResponseError);
  }

  async request(request: ProbeRequest): Promise<ProbeResponse> {
    const startedAt = performance.now();
    const elapsed = (): number => Math.round(performance.now() - startedAt);
    // `timeout` alone only bounds socket idle time; the deadline also covers
    // the body.
    const deadline = AbortSignal.timeout(request.timeout);

    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.request<unknown>({
        method: request.method,
        url: request.url,
        headers: sanitizeHeaders(request.headers),
        params: request.params,
        timeout: request.timeout,
        signal: deadline,
        maxRedirects: request.followRedirects ? request.maxRedirects : 0,
      });
    } catch (error) {
      const failure = describeFailure(error, deadline, request.timeout);
      if (failure.kind === 'unknown') {
        logError('Unexpected transport failure', {
          url: request.url,
          method: request.method,
          message: failure.message,
        });
      }
      return createFailedResponse(request, failure, elapsed());
    }

    const body = await readResponseBody(
      response.data,
      request.maxFileSize,
      deadline
    );
    const result: ProbeResponse = {
      url: request.url,
      effectiveUrl: resolveEffectiveUrl(response, request.url),
      method: request.method,
      status: response.status,
      statusText: response.statusText || '',
      headers: flattenHeaders(response.headers),
      body: body.body,
      rawBody: body.bytes,
      bodyTruncated: body.truncated,
      durationMs: elapsed(),
      request,
    };

    if (body.error !== undefined) {
      // The status line arrived, so the response stands with a partial body.
      result.failure = describeFailure(body.error, deadline, request.timeout);
      logDebug('Response body interrupted', {
        url: request.url,
        status: response.status,
        bytesRead: body.size,
        reason: result.failure.message,
      });
    }
    return result;
  }

  close(): void {
    destroyAgents(this.agents);
  }
}
