import { describe, it, expect, vi, beforeEach } from 'vitest';

const { warnMock } = vi.hoisted(() => ({ warnMock: vi.fn() }));

vi.mock('@relaypost/shared', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@relaypost/shared')>();
  const child = { info: vi.fn(), warn: warnMock, debug: vi.fn(), error: vi.fn() };
  return { ...actual, logger: { ...child, child: () => child } };
});

import { loadConfig } from '../config.js';

const SERVER_URL = 'https://server.test';

describe('loadConfig', () => {
  beforeEach(() => {
    warnMock.mockClear();
  });

  it('requires a valid server URL', () => {
    expect(() => loadConfig({})).toThrow('SERVER_URL is required');
    expect(() => loadConfig({ SERVER_URL: 'nope' })).toThrow('SERVER_URL is not a valid URL: nope');
  });

  it('fills in defaults', () => {
    expect(loadConfig({ SERVER_URL })).toEqual({
      serverUrl: SERVER_URL,
      dataDir: './data',
      dbPath: 'data/relaypost.db',
      pollIntervalMs: 10_000,
      backoff: { baseMs: 1_000, maxMs: 24 * 60 * 60 * 1_000 },
      attachmentConcurrency: 3,
      port: 3001,
      authToken: undefined,
      pushToken: undefined,
    });
    expect(warnMock).toHaveBeenCalledWith('PUSH_TOKEN not set - push notifications will not be registered');
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      SERVER_URL,
      DATA_DIR: '/var/lib/relaypost',
      POLL_INTERVAL_MS: '500',
      JOB_BACKOFF_BASE_MS: '2000',
      JOB_BACKOFF_MAX_MS: '60000',
      ATTACHMENT_CONCURRENCY: '5',
      PORT: '8080',
      AUTH_TOKEN: 'test-secret',
      PUSH_TOKEN: 'test-token',
    });

    expect(config).toMatchObject({
      dbPath: '/var/lib/relaypost/relaypost.db',
      pollIntervalMs: 500,
      backoff: { baseMs: 2_000, maxMs: 60_000 },
      attachmentConcurrency: 5,
      port: 8080,
      authToken: 'test-secret',
      pushToken: 'test-token',
    });
    expect(warnMock).not.toHaveBeenCalled();
  });

  it('falls back on invalid numbers', () => {
    const config = loadConfig({ SERVER_URL, POLL_INTERVAL_MS: 'soon', PORT: '-1', PUSH_TOKEN: 'test-token' });

    expect(config.pollIntervalMs).toBe(10_000);
    expect(config.port).toBe(3001);
    expect(warnMock).toHaveBeenCalledWith(
      { name: 'POLL_INTERVAL_MS', value: 'soon', fallback: 10_000 },
      'invalid numeric setting, using default',
    );
  });

  it('raises a backoff cap below the base delay', () => {
    const config = loadConfig({ SERVER_URL, JOB_BACKOFF_BASE_MS: '5000', JOB_BACKOFF_MAX_MS: '1000', PUSH_TOKEN: 'test-token' });

    expect(config.backoff).toEqual({ baseMs: 5_000, maxMs: 5_000 });
  });
});
