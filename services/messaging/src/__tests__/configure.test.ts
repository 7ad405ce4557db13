import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FeatureFlag, Features } from '@relaypost/shared';
import { createExecutorRegistry, enqueueStandardJobs } from '../configure.js';
import { createJobStore, type JobStore } from '../job-store.js';
import { JOB_VARIANTS } from '../jobs.js';
import { JobRunner } from '../runner.js';
import { createTestEnvironment, type TestEnvironment } from './helpers.js';

function flags(...enabled: FeatureFlag[]): Features {
  return {
    mode: 'prod',
    isEnabled: (flag) => enabled.includes(flag),
    allFlags: () => ({}),
  };
}

let env: TestEnvironment;
let store: JobStore;
let runner: JobRunner;

beforeEach(() => {
  env = createTestEnvironment();
  store = createJobStore(env.db);
  runner = new JobRunner({
    store,
    executors: createExecutorRegistry(),
    dependencies: { api: env.api, storage: env.storage, crypto: env.crypto, keys: env.keys, now: () => 1_000 },
  });
});

afterEach(async () => {
  await runner.stopAll();
  env.db.close();
});

describe('createExecutorRegistry', () => {
  it('registers an executor for every variant', () => {
    expect(createExecutorRegistry().variants()).toEqual([...JOB_VARIANTS]);
  });
});

describe('enqueueStandardJobs', () => {
  const opts = { openGroupServer: 'https://og.test', now: 1_000 };

  it('schedules every standard job when all features are on', () => {
    enqueueStandardJobs(runner, {
      ...opts,
      pushToken: 'test-token',
      flags: flags('disappearingMessages', 'openGroups', 'pushNotifications'),
    });

    expect(store.list().map((job) => job.variant)).toEqual([
      'failedMessageSends',
      'failedAttachmentDownloads',
      'disappearingMessages',
      'garbageCollection',
      'retrieveDefaultOpenGroupRooms',
      'notifyPushServer',
    ]);
    expect(store.launchJobs().map((job) => job.variant)).toEqual([
      'failedMessageSends',
      'failedAttachmentDownloads',
      'retrieveDefaultOpenGroupRooms',
    ]);
    expect(store.launchJobs()[2]?.details).toBe('{"server":"https://og.test"}');
  });

  it('skips what the flags turn off', () => {
    enqueueStandardJobs(runner, { ...opts, pushToken: 'test-token', flags: flags() });

    expect(store.list().map((job) => job.variant)).toEqual([
      'failedMessageSends',
      'failedAttachmentDownloads',
      'garbageCollection',
    ]);
  });

  it('gives each standard job the behaviour of its variant', () => {
    enqueueStandardJobs(runner, {
      ...opts,
      pushToken: 'test-token',
      flags: flags('disappearingMessages', 'pushNotifications'),
    });

    const behaviour = Object.fromEntries(store.list().map((job) => [job.variant, job.behaviour]));
    expect(behaviour).toEqual({
      failedMessageSends: { runOnceOnly: false, runOnLaunch: true, recurring: true },
      failedAttachmentDownloads: { runOnceOnly: false, runOnLaunch: true, recurring: true },
      disappearingMessages: { runOnceOnly: false, runOnLaunch: false, recurring: true },
      garbageCollection: { runOnceOnly: false, runOnLaunch: false, recurring: true },
      notifyPushServer: { runOnceOnly: true, runOnLaunch: false, recurring: false },
    });
  });

  it('needs a token to register for push', () => {
    enqueueStandardJobs(runner, { ...opts, flags: flags('pushNotifications') });

    expect(store.list().some((job) => job.variant === 'notifyPushServer')).toBe(false);
  });

  it('does not duplicate jobs when called on every start', () => {
    const all = flags('disappearingMessages', 'openGroups', 'pushNotifications');
    enqueueStandardJobs(runner, { ...opts, pushToken: 'test-token', flags: all });
    enqueueStandardJobs(runner, { ...opts, pushToken: 'test-token', flags: all });

    expect(store.list()).toHaveLength(6);
  });
});
