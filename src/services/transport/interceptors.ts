import { randomUUID } from 'node:crypto';
import diagnosticsChannel from 'node:diagnostics_channel';
import { performance } from 'node:perf_hooks';

import type {
  AxiosError,
  AxiosResponse,
  InternalAxiosRequestConfig,
} from 'axios';

import { config } from '../../config/index.js';

import { logDebug, logWarn } from '../logger.js';

const REQUEST_START_TIME = Symbol('requestStartTime');
const REQUEST_ID = Symbol('requestId');
const probeChannel = diagnosticsChannel.channel('target-probe.request');

interface TimedAxiosRequestConfig extends InternalAxiosRequestConfig {
  [REQUEST_START_TIME]?: number;
  [REQUEST_ID]?: string;
}

function calculateDuration(requestConfig: TimedAxiosRequestConfig): number {
  const startTime = requestConfig[REQUEST_START_TIME];
  return startTime ? Math.round(performance.now() - startTime) : 0;
}

export function handleRequest(
  requestConfig: TimedAxiosRequestConfig
): InternalAxiosRequestConfig {
  requestConfig[REQUEST_START_TIME] = performance.now();
  requestConfig[REQUEST_ID] = randomUUID().substring(0, 8);

  const eventData = {
    requestId: requestConfig[REQUEST_ID],
    method: requestConfig.method?.toUpperCase(),
    url: requestConfig.url,
  };

  if (probeChannel.hasSubscribers) {
    probeChannel.publish({ type: 'start', ...eventData });
  }

  logDebug('HTTP Request', eventData);

  return requestConfig;
}

export function handleResponse(response: AxiosResponse): AxiosResponse {
  const timedConfig: TimedAxiosRequestConfig = response.config;
  const duration = calculateDuration(timedConfig);
  const requestId = timedConfig[REQUEST_ID];
  const url = response.config.url ?? 'unknown';

  if (probeChannel.hasSubscribers) {
    probeChannel.publish({
      type: 'end',
      requestId,
      status: response.status,
      duration,
    });
  }

  logDebug('HTTP Response', {
    requestId,
    method: response.config.method?.toUpperCase(),
    status: response.status,
    url,
    duration: `${duration}ms`,
  });

  if (duration > config.request.slowRequestMs) {
    logWarn('Slow HTTP request detected', {
      requestId,
      url,
      duration: `${duration}ms`,
    });
  }

  return response;
}

export function handleResponseError(error: AxiosError): Promise<never> {
  const timedConfig: TimedAxiosRequestConfig | undefined = error.config;
  const requestId = timedConfig?.[REQUEST_ID];
  const duration = timedConfig ? calculateDuration(timedConfig) : 0;

  if (probeChannel.hasSubscribers) {
    probeChannel.publish({
      type: 'error',
      requestId,
      url: error.config?.url ?? 'unknown',
      error: error.message,
      code: error.code,
      duration,
    });
  }

  logDebug('HTTP Transport Error', {
    requestId,
    url: error.config?.url ?? 'unknown',
    code: error.code,
    message: error.message,
  });

  return Promise.reject(error);
}
