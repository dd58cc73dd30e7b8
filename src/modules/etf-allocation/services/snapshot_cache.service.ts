/**
 * ETF SNAPSHOT CACHE
 *
 * Owns the latest snapshot and its build time. Refreshes are single-flight:
 * concurrent callers (cron tick, API request) share one in-flight build.
 * A failed refresh keeps the previous snapshot.
 */

import { errorMessage } from '../../../common/errors.js';
import { RequestCoalescer } from '../../shared/runtime/request-coalescer.js';
import type { EtfSnapshot } from '../contracts/etf.contracts.js';

const REFRESH_KEY = 'etf-snapshot';

export class EtfSnapshotCache {
  private snapshot: EtfSnapshot | null = null;
  private lastBuiltAt: number | null = null;
  private lastError: string | null = null;
  private readonly coalescer = new RequestCoalescer<EtfSnapshot>();

  constructor(
    private readonly build: () => Promise<EtfSnapshot>,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Cached snapshot when younger than `maxAgeMs`, otherwise a fresh build.
   */
  async getOrRefresh(maxAgeMs: number): Promise<EtfSnapshot> {
    if (this.snapshot && this.lastBuiltAt !== null && this.now() - this.lastBuiltAt < maxAgeMs) {
      return this.snapshot;
    }
    return this.refresh();
  }

  refresh(): Promise<EtfSnapshot> {
    return this.coalescer.run(REFRESH_KEY, async () => {
      try {
        const snapshot = await this.build();
        this.snapshot = snapshot;
        this.lastBuiltAt = this.now();
        this.lastError = null;
        return snapshot;
      } catch (error) {
        this.lastError = errorMessage(error);
        console.error(`[ETF Cache] Refresh failed: ${this.lastError}`);
        throw error;
      }
    });
  }

  peek(): EtfSnapshot | null {
    return this.snapshot;
  }

  isRefreshing(): boolean {
    return this.coalescer.isInFlight(REFRESH_KEY);
  }

  status() {
    return {
      hasSnapshot: this.snapshot !== null,
      lastBuiltAt: this.lastBuiltAt !== null ? new Date(this.lastBuiltAt).toISOString() : null,
      refreshing: this.isRefreshing(),
      lastError: this.lastError,
    };
  }
}
