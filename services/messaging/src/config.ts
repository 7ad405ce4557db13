import path from 'node:path';
import { logger } from '@relaypost/shared';
import { DEFAULT_BACKOFF, type BackoffPolicy } from './backoff.js';

const log = logger.child({ module: 'config' });

export interface MessagingConfig {
  serverUrl: string;
  dataDir: string;
  dbPath: string;
  pollIntervalMs: number;
  backoff: BackoffPolicy;
  attachmentConcurrency: number;
  /** HTTP API and `/healthz` */
  port: number;
  authToken?: string;
  /** Push registration is skipped without one */
  pushToken?: string;
}

type Env = Record<string, string | undefined>;

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    log.warn({ name, value: raw, fallback }, 'invalid numeric setting, using default');
    return fallback;
  }
  return value;
}

export function loadConfig(env: Env = process.env): MessagingConfig {
  const serverUrl = env.SERVER_URL;
  if (!serverUrl) {
    throw new Error('SERVER_URL is required');
  }
  try {
    new URL(serverUrl);
  } catch (err) {
    throw new Error(`SERVER_URL is not a valid URL: ${serverUrl}`, { cause: err });
  }

  const dataDir = env.DATA_DIR || './data';
  const baseMs = positiveInt(env, 'JOB_BACKOFF_BASE_MS', DEFAULT_BACKOFF.baseMs);
  let maxMs = positiveInt(env, 'JOB_BACKOFF_MAX_MS', DEFAULT_BACKOFF.maxMs);
  if (maxMs < baseMs) {
    log.warn({ baseMs, maxMs }, 'JOB_BACKOFF_MAX_MS below JOB_BACKOFF_BASE_MS, raising it');
    maxMs = baseMs;
  }

  const pushToken = env.PUSH_TOKEN || undefined;
  if (!pushToken) {
    log.warn('PUSH_TOKEN not set - push notifications will not be registered');
  }

  const config: MessagingConfig = {
    serverUrl,
    dataDir,
    dbPath: path.join(dataDir, 'relaypost.db'),
    pollIntervalMs: positiveInt(env, 'POLL_INTERVAL_MS', 10_000),
    backoff: { baseMs, maxMs },
    attachmentConcurrency: positiveInt(env, 'ATTACHMENT_CONCURRENCY', 3),
    port: positiveInt(env, 'PORT', 3001),
    authToken: env.AUTH_TOKEN || undefined,
    pushToken,
  };

  log.info(
    {
      serverUrl: config.serverUrl,
      dbPath: config.dbPath,
      pollIntervalMs: config.pollIntervalMs,
      attachmentConcurrency: config.attachmentConcurrency,
      port: config.port,
      hasPushToken: !!pushToken,
    },
    'messaging config loaded',
  );
  return config;
}
