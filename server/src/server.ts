import 'dotenv/config';
import { serve } from '@hono/node-server';
import { getConnInfo } from '@hono/node-server/conninfo';
import { Redis } from 'ioredis';
import { createApp } from './api';
import {
  getCleanupIntervalMs,
  getExtractionServiceUrl,
  getJobRetentionSeconds,
  getMaxConcurrentJobs,
  getOutputRoot,
  getPort,
  getRateLimitMaxRequests,
  getRateLimitWindowSeconds,
  getRedisKeyPrefix,
  getRedisUrl,
  isRateLimitEnabled,
  validateExtractionProviderEnv,
} from './lib/env';
import { createExtractionCapabilities } from './lib/jobs/adapters/extraction-capabilities';
import { BackgroundRunner } from './lib/jobs/background-runner';
import { JobDispatcher } from './lib/jobs/dispatcher';
import { toErrorMessage } from './lib/jobs/errors';
import { JobService } from './lib/jobs/job-service';
import { RedisJobStore } from './lib/jobs/redis-job-store';

function startServer(): void {
  const provider = validateExtractionProviderEnv();
  const port = getPort();
  const maxConcurrent = getMaxConcurrentJobs();
  const cleanupIntervalMs = getCleanupIntervalMs();

  const redis = new Redis(getRedisUrl());
  redis.on('error', (error) => {
    console.error(`[server] Redis connection error: ${toErrorMessage(error)}`);
  });

  const store = new RedisJobStore(redis, {
    retentionSeconds: getJobRetentionSeconds(),
    keyPrefix: getRedisKeyPrefix(),
  });
  const dispatcher = new JobDispatcher({
    store,
    capabilities: createExtractionCapabilities(provider),
    outputRoot: getOutputRoot(),
  });
  const runner = new BackgroundRunner({ maxConcurrent });
  const jobService = new JobService({ store, dispatcher, runner });
  const app = createApp(jobService, {
    rateLimit: {
      clientKey: (c) => c.req.header('x-forwarded-for')?.split(',')[0]?.trim() || getConnInfo(c).remote.address || 'unknown',
    },
  });

  const providerDetail = provider === 'remote-v1' ? ` serviceUrl="${getExtractionServiceUrl()}"` : '';
  console.log(
    `[server][startup] timestamp=${new Date().toISOString()} port=${port} provider=${provider}${providerDetail} maxConcurrentJobs=${maxConcurrent || 'unbounded'} retentionSeconds=${store.retentionSeconds} rateLimit=${isRateLimitEnabled() ? `${getRateLimitMaxRequests()}/${getRateLimitWindowSeconds()}s` : 'off'}`
  );

  const server = serve({ fetch: app.fetch, port }, (info) => {
    console.log(`[server] Listening on http://localhost:${info.port}`);
  });

  let cleanupTimer: NodeJS.Timeout | null = null;
  if (cleanupIntervalMs > 0) {
    cleanupTimer = setInterval(() => {
      jobService.cleanup().catch((error: unknown) => {
        console.error(`[server] Periodic cleanup failed: ${toErrorMessage(error)}`);
      });
    }, cleanupIntervalMs);
  }

  async function shutdown(signal: string): Promise<void> {
    if (!runner.accepting) {
      return;
    }
    console.log(
      `[server] Received ${signal}. Waiting for ${runner.activeCount} running and ${runner.queuedCount} queued job(s)...`
    );

    if (cleanupTimer) {
      clearInterval(cleanupTimer);
    }
    server.close();
    await runner.drain();
    await store.close();
    console.log('[server] Shutdown complete');
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        console.error(`[server] Shutdown failed: ${toErrorMessage(error)}`);
        process.exitCode = 1;
      });
    });
  }
}

try {
  startServer();
} catch (error) {
  console.error(`[server] Startup configuration failed: ${toErrorMessage(error, 'Unknown startup error')}`);
  process.exitCode = 1;
}
