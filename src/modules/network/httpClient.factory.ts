/**
 * HTTP CLIENT FACTORY
 * ===================
 *
 * Creates axios clients with timeout, optional proxy and retry policy.
 * All upstream clients (FX rates, country metadata) MUST use this factory.
 */

import axios, {
  type AxiosAdapter,
  type AxiosError,
  type AxiosInstance,
  type AxiosRequestConfig,
  type InternalAxiosRequestConfig,
} from 'axios';
import { HttpsProxyAgent } from 'https-proxy-agent';
import { UpstreamError, errorMessage } from '../../common/errors.js';

// ═══════════════════════════════════════════════════════════════
// OPTIONS
// ═══════════════════════════════════════════════════════════════

export interface RetryPolicy {
  attempts: number;
  backoffMs: number;
  maxBackoffMs: number;
}

export interface HttpClientOptions {
  /** Tag used in log lines */
  service: string;
  baseURL?: string;
  timeout?: number;
  proxyUrl?: string;
  retry?: RetryPolicy;
  /** Replaces the network transport (in-process adapters in tests) */
  adapter?: AxiosAdapter;
}

export const DEFAULT_RETRY: RetryPolicy = {
  attempts: 3,
  backoffMs: 500,
  maxBackoffMs: 8000,
};

const RETRYABLE_STATUS = new Set([408, 429, 500, 502, 503, 504]);

interface RetryableConfig extends InternalAxiosRequestConfig {
  retryCount?: number;
}

// ═══════════════════════════════════════════════════════════════
// HTTP CLIENT FACTORY
// ═══════════════════════════════════════════════════════════════

/**
 * Network failures and transient statuses are retried; 4xx answers are final.
 */
export function isRetryableError(error: AxiosError): boolean {
  if (!error.response) return true;
  return RETRYABLE_STATUS.has(error.response.status);
}

export function computeBackoff(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.backoffMs * Math.pow(2, attempt - 1), policy.maxBackoffMs);
}

export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  const retry = options.retry ?? DEFAULT_RETRY;

  const axiosConfig: AxiosRequestConfig = {
    baseURL: options.baseURL,
    timeout: options.timeout ?? 15000,
    headers: {
      Accept: 'application/json',
    },
  };

  if (options.proxyUrl) {
    const agent = new HttpsProxyAgent(options.proxyUrl);
    axiosConfig.httpsAgent = agent;
    axiosConfig.httpAgent = agent;
    axiosConfig.proxy = false;
  }

  if (options.adapter) {
    axiosConfig.adapter = options.adapter;
  }

  const client = axios.create(axiosConfig);

  client.interceptors.response.use(
    response => response,
    async (error: unknown) => {
      if (!axios.isAxiosError(error) || !error.config || !isRetryableError(error)) {
        throw error;
      }

      const config: RetryableConfig = error.config;
      const attempt = (config.retryCount ?? 0) + 1;
      if (attempt > retry.attempts) {
        throw error;
      }
      config.retryCount = attempt;

      const backoff = computeBackoff(retry, attempt);
      const status = error.response?.status ?? error.code ?? 'network';
      console.warn(
        `[${options.service}] ${config.url ?? ''} failed (${status}), retry ${attempt}/${retry.attempts} in ${backoff}ms`
      );

      await new Promise(resolve => setTimeout(resolve, backoff));
      return client.request(config);
    }
  );

  return client;
}

/**
 * Normalize a failed upstream call. Non-axios errors (payload validation)
 * keep their message.
 */
export function toUpstreamError(service: string, error: unknown): UpstreamError {
  if (error instanceof UpstreamError) return error;
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const detail = status ? `HTTP ${status}` : error.code ?? 'network error';
    return new UpstreamError(service, `${detail}: ${error.message}`, status);
  }
  return new UpstreamError(service, errorMessage(error));
}
