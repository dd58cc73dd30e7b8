/**
 * Rate Limiter
 * ============
 * Safe rate limiting for per-item upstream lookups
 */

import Bottleneck from 'bottleneck';

export type RateLimitConfig = {
  minTime: number;      // ms between requests
  maxConcurrent: number;
};

// Provider-specific safe limits
export const RATE_LIMITS: Record<string, RateLimitConfig> = {
  RESTCOUNTRIES: {
    minTime: 50,
    maxConcurrent: 4,
  },
  DEFAULT: {
    minTime: 300,
    maxConcurrent: 1,
  },
};

const limiters = new Map<string, Bottleneck>();

export function getRateLimiter(provider: string): Bottleneck {
  const existing = limiters.get(provider);
  if (existing) return existing;

  const config = RATE_LIMITS[provider] ?? RATE_LIMITS.DEFAULT;
  const limiter = new Bottleneck({
    minTime: config.minTime,
    maxConcurrent: config.maxConcurrent,
  });

  limiter.on('error', (error: unknown) => {
    console.error(`[RateLimiter] ${provider} limiter error:`, error);
  });

  limiters.set(provider, limiter);
  return limiter;
}

export function schedule<T>(provider: string, fn: () => Promise<T>): Promise<T> {
  return getRateLimiter(provider).schedule(fn);
}
