/**
 * Service entrypoint
 *
 * Run: npx tsx src/server.ts
 */

import 'dotenv/config';
import { loadEnv, hasFxApiKey } from './config/env.js';
import { buildApp } from './app.js';
import { createEtfAllocationRuntime } from './modules/etf-allocation/index.js';
import { startEtfRefreshJob, stopEtfRefreshJob, runEtfRefresh } from './jobs/etf_refresh.job.js';

async function main(): Promise<void> {
  const env = loadEnv();

  console.log('[BOOT] ═══════════════════════════════════════════════════════');
  console.log(`[BOOT] Profile: ${env.HEALTH_PROFILE}, panel: ${env.PANEL_CSV_PATH}`);
  if (!hasFxApiKey(env)) {
    console.warn('[BOOT] FREECURRENCY_API_KEY not set: snapshot builds will fail until it is configured');
  }

  const etf = createEtfAllocationRuntime(env);
  const app = buildApp(env, etf);

  const shutdown = async (signal: string) => {
    console.log(`[BOOT] ${signal} received, shutting down`);
    stopEtfRefreshJob();
    await app.close();
    process.exit(0);
  };
  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await app.listen({ host: env.HOST, port: env.PORT });

  if (env.REFRESH_ENABLED) {
    startEtfRefreshJob(etf.cache, env.REFRESH_CRON);
    // Warm the cache; failures are logged by the job
    void runEtfRefresh(etf.cache);
  }

  console.log(`[BOOT] ✅ Listening on ${env.HOST}:${env.PORT}`);
}

main().catch((err: unknown) => {
  console.error('[BOOT] Fatal:', err);
  process.exit(1);
});
