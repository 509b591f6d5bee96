/**
 * Environment variable helpers. Entry points load `.env` through `dotenv/config`; everything else
 * reads configuration through these getters so tests can stub values with `vi.stubEnv`.
 */
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

type EnvLike = Record<string, string | undefined>;

let contextEnv: EnvLike | null = null;

const serverRootDir = fileURLToPath(new URL('../..', import.meta.url));

export const EXTRACTION_PROVIDERS = ['remote-v1', 'local-v1'] as const;

export type ExtractionProviderId = (typeof EXTRACTION_PROVIDERS)[number];

export function setEnvContext(env: EnvLike) {
  contextEnv = env;
}

export function clearEnvContext() {
  contextEnv = null;
}

function getEnvSource(): EnvLike {
  return contextEnv || process.env;
}

export function getEnv(key: string): string | undefined {
  const value = getEnvSource()[key];
  return value !== undefined && value !== '' ? value : undefined;
}

export function getEnvOrDefault(key: string, defaultValue: string): string {
  return getEnv(key) ?? defaultValue;
}

function getNonNegativeInteger(key: string, defaultValue: number): number {
  const raw = getEnv(key);
  if (raw === undefined) {
    return defaultValue;
  }

  const parsed = Number(raw);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : defaultValue;
}

export function getPort(): number {
  return getNonNegativeInteger('PORT', 8787);
}

export function getRedisUrl(): string {
  return getEnvOrDefault('REDIS_URL', 'redis://127.0.0.1:6379/0');
}

export function getRedisKeyPrefix(): string {
  return getEnvOrDefault('REDIS_KEY_PREFIX', 'extract');
}

export function getJobRetentionSeconds(): number {
  const seconds = getNonNegativeInteger('JOB_RETENTION_SECONDS', 60 * 60 * 24);
  return seconds > 0 ? seconds : 60 * 60 * 24;
}

export function getUploadDir(): string {
  return getEnvOrDefault('UPLOAD_DIR', join(serverRootDir, 'tmp', 'uploads'));
}

export function getOutputRoot(): string {
  return getEnvOrDefault('OUTPUT_ROOT', join(serverRootDir, 'parsed_docs'));
}

export function getExtractionProvider(): string {
  return getEnvOrDefault('EXTRACTION_PROVIDER', 'remote-v1');
}

export function getExtractionServiceUrl(): string {
  return getEnvOrDefault('EXTRACTION_SERVICE_URL', 'http://127.0.0.1:8090');
}

export function getExtractionServiceTimeoutMs(): number {
  return getNonNegativeInteger('EXTRACTION_SERVICE_TIMEOUT_MS', 300_000);
}

/** 0 means unbounded: every scheduled job starts immediately. */
export function getMaxConcurrentJobs(): number {
  return getNonNegativeInteger('MAX_CONCURRENT_JOBS', 0);
}

/** 0 disables the periodic sweep; cleanup then only runs on request. */
export function getCleanupIntervalMs(): number {
  return getNonNegativeInteger('CLEANUP_INTERVAL_MS', 0);
}

export function isRateLimitEnabled(): boolean {
  return getEnvOrDefault('RATE_LIMIT_ENABLED', 'true').toLowerCase() === 'true';
}

export function getRateLimitWindowSeconds(): number {
  const seconds = getNonNegativeInteger('RATE_LIMIT_WINDOW_SECONDS', 60);
  return seconds > 0 ? seconds : 60;
}

export function getRateLimitMaxRequests(): number {
  const maxRequests = getNonNegativeInteger('RATE_LIMIT_MAX_REQUESTS', 100);
  return maxRequests > 0 ? maxRequests : 100;
}

export function isExtractionProviderId(value: string): value is ExtractionProviderId {
  return EXTRACTION_PROVIDERS.some((entry) => entry === value);
}

export function validateExtractionProviderEnv(): ExtractionProviderId {
  const provider = getExtractionProvider();
  if (!isExtractionProviderId(provider)) {
    throw new Error(
      `Unknown extraction provider "${provider}". Expected one of: ${EXTRACTION_PROVIDERS.join(', ')}`
    );
  }

  if (provider === 'remote-v1') {
    const serviceUrl = getExtractionServiceUrl();
    try {
      new URL(serviceUrl);
    } catch {
      throw new Error(`EXTRACTION_SERVICE_URL is not a valid URL: ${serviceUrl}`);
    }
  }

  return provider;
}
