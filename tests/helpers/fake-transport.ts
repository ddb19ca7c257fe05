import { vi } from 'vitest';

import type {
  HttpMethod,
  ProbeRequest,
  ProbeResponse,
} from '../../src/config/types.js';
import type { HttpTransport } from '../../src/services/transport.js';

export interface FakeReply {
  status: number;
  body?: string;
  headers?: Record<string, string>;
  effectiveUrl?: string;
}

type UrlMatcher = string | RegExp;

interface Route {
  method: HttpMethod;
  matcher: UrlMatcher;
  reply: FakeReply;
}

function matches(matcher: UrlMatcher, url: string): boolean {
  return typeof matcher === 'string' ? matcher === url : matcher.test(url);
}

export function toProbeResponse(
  request: ProbeRequest,
  reply: FakeReply
): ProbeResponse {
  const body = request.method === 'HEAD' ? '' : (reply.body ?? '');
  return {
    url: request.url,
    effectiveUrl: reply.effectiveUrl ?? request.url,
    method: request.method,
    status: reply.status,
    statusText: '',
    headers: reply.headers ?? {},
    body,
    rawBody: Buffer.from(body),
    bodyTruncated: false,
    durationMs: 1,
    ...(reply.status === 0
      ? { failure: { kind: 'network' as const, message: 'connection refused' } }
      : {}),
    request,
  };
}

/** In-process transport that answers from registered routes. */
export class FakeTransport implements HttpTransport {
  readonly requests: ProbeRequest[] = [];
  readonly close = vi.fn();

  private readonly routes: Route[] = [];
  private fallback: FakeReply = { status: 404, body: 'not here' };

  on(method: HttpMethod, matcher: UrlMatcher, reply: FakeReply): this {
    // later registrations win
    this.routes.unshift({ method, matcher, reply });
    return this;
  }

  otherwise(reply: FakeReply): this {
    this.fallback = reply;
    return this;
  }

  async request(request: ProbeRequest): Promise<ProbeResponse> {
    this.requests.push(request);
    await Promise.resolve();

    const route = this.routes.find(
      (entry) =>
        entry.method === request.method && matches(entry.matcher, request.url)
    );
    return toProbeResponse(request, route?.reply ?? this.fallback);
  }

  count(method?: HttpMethod, matcher?: UrlMatcher): number {
    return this.requests.filter(
      (request) =>
        (method === undefined || request.method === method) &&
        (matcher === undefined || matches(matcher, request.url))
    ).length;
  }
}
