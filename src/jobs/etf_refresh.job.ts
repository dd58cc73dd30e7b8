/**
 * ETF Refresh Job
 *
 * Periodically rebuilds the allocation snapshot on a cron schedule.
 * Overlapping ticks share the cache's in-flight build.
 */

import cron, { type ScheduledTask } from 'node-cron';
import { ConfigError, errorMessage } from '../common/errors.js';
import type { EtfSnapshotCache } from '../modules/etf-allocation/services/snapshot_cache.service.js';

let task: ScheduledTask | null = null;
let lastRun: Date | null = null;
let successCount = 0;
let errorCount = 0;

/**
 * One refresh tick. Failures are logged and counted, never thrown.
 */
export async function runEtfRefresh(cache: EtfSnapshotCache): Promise<boolean> {
  lastRun = new Date();
  try {
    const snapshot = await cache.refresh();
    successCount++;
    console.log(
      `[ETF Refresh] Snapshot ${snapshot.runId}: ${snapshot.weights.length} countries, value=${snapshot.usdValue.toFixed(4)} USD`
    );
    return true;
  } catch (error) {
    errorCount++;
    console.error(`[ETF Refresh] Error: ${errorMessage(error)}`);
    return false;
  }
}

export function startEtfRefreshJob(cache: EtfSnapshotCache, expression: string): void {
  if (task) {
    console.log('[ETF Refresh] Already started');
    return;
  }

  if (!cron.validate(expression)) {
    throw new ConfigError(`Invalid REFRESH_CRON expression: "${expression}"`);
  }

  task = cron.schedule(expression, () => {
    void runEtfRefresh(cache);
  });

  console.log(`[ETF Refresh] Cron started (${expression})`);
}

export function stopEtfRefreshJob(): void {
  if (task) {
    task.stop();
    task = null;
    console.log('[ETF Refresh] Cron stopped');
  }
}

export function getEtfRefreshStatus() {
  return {
    running: task !== null,
    lastRun: lastRun?.toISOString() ?? null,
    successCount,
    errorCount,
  };
}
