import { GET_FALLBACK_MAX_FILE_SIZE } from '../config/constants.js';
import type {
  HttpMethod,
  ProbeOverrides,
  ProbeResponse,
  RequestOverrides,
  StandingMethod,
} from '../config/types.js';

import { Once } from '../utils/once.js';

import { logDebug, logInfo } from './logger.js';

// HEAD dropped/timed out, not allowed, or not implemented.
const HEAD_UNRELIABLE_STATUSES: ReadonlySet<number> = new Set([0, 405, 501]);

export interface RequestSender {
  buildUrl(path?: string): string;
  send(
    method: HttpMethod,
    url: string,
    overrides?: RequestOverrides
  ): Promise<ProbeResponse>;
}

export function standingMethodFor(headStatus: number): StandingMethod {
  if (HEAD_UNRELIABLE_STATUSES.has(headStatus)) {
    return { method: 'GET', maxFileSize: GET_FALLBACK_MAX_FILE_SIZE };
  }
  return { method: 'HEAD' };
}

/**
 * Issues cheap probes against one target. Whether HEAD can be trusted is
 * decided once, from a HEAD against the homepage, and reused for every path.
 */
export class AdaptiveRequester {
  private readonly decision: Once<StandingMethod>;

  constructor(private readonly sender: RequestSender) {
    this.decision = new Once(() => this.decide());
  }

  standingMethod(): Promise<StandingMethod> {
    return this.decision.get();
  }

  async probe(
    path?: string,
    acceptedCodes: readonly number[] = [200],
    overrides: ProbeOverrides = {}
  ): Promise<ProbeResponse> {
    const standing = await this.standingMethod();
    const url = this.sender.buildUrl(path);

    if (standing.method === 'GET') {
      return this.sender.send('GET', url, {
        ...overrides.get,
        maxFileSize: standing.maxFileSize,
      });
    }

    const head = await this.sender.send('HEAD', url, overrides.head);
    if (acceptedCodes.includes(head.status)) return head;

    return this.sender.send('GET', url, overrides.get);
  }

  private async decide(): Promise<StandingMethod> {
    const url = this.sender.buildUrl();
    const response = await this.sender.send('HEAD', url);
    const standing = standingMethodFor(response.status);

    const meta = { url, headStatus: response.status, method: standing.method };
    if (standing.method === 'GET') {
      logInfo('HEAD unreliable, probing with capped GET', meta);
    } else {
      logDebug('Standing probe method decided', meta);
    }
    return standing;
  }
}
