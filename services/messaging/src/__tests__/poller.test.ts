import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import type { JobScheduler } from '../executors/types.js';
import { createPoller } from '../poller.js';
import { createTestEnvironment, type TestEnvironment } from './helpers.js';

let env: TestEnvironment;
let enqueue: Mock<JobScheduler['enqueue']>;
let jobs: JobScheduler;

beforeEach(() => {
  env = createTestEnvironment();
  enqueue = vi.fn<JobScheduler['enqueue']>().mockReturnValue({ status: 'alreadyCompleted' });
  jobs = { enqueue, hasPendingJob: () => false };
});

afterEach(() => {
  env.db.close();
});

function poller(intervalMs = 60_000) {
  return createPoller({ api: env.api, storage: env.storage, jobs, identityId: '05me', intervalMs, now: () => 42 });
}

describe('createPoller', () => {
  it('hands each non-empty poll to a receive job and advances the cursor', async () => {
    env.api.fetchMessages.mockResolvedValueOnce([
      { hash: 'h1', data: new Uint8Array([1, 2]), timestamp: 1 },
      { hash: 'h2', data: new Uint8Array([3]), timestamp: 2 },
    ]);
    const p = poller();

    expect(await p.pollOnce()).toBe(2);
    expect(await p.pollOnce()).toBe(0);

    expect(env.api.fetchMessages.mock.calls.map((call) => call[1])).toEqual([undefined, 'h2']);
    expect(enqueue).toHaveBeenCalledTimes(1);
    expect(enqueue.mock.calls[0]?.[0]).toMatchObject({
      variant: 'messageReceive',
      behaviour: { runOnceOnly: true, runOnLaunch: false, recurring: false },
      nextRunTimestamp: 42,
      details: '{"messages":[{"hash":"h1","data":"AQI=","timestamp":1},{"hash":"h2","data":"Aw==","timestamp":2}]}',
    });
  });

  it('resumes from the last stored message', async () => {
    env.storage.insertReceivedMessage({ threadId: 'peer', author: 'peer', serverHash: 'h9', sentTimestamp: 1, attachments: [] });

    await poller().pollOnce();

    expect(env.api.fetchMessages).toHaveBeenCalledWith('05me', 'h9', undefined);
  });

  it('polls right away once started and stops cleanly', async () => {
    const p = poller();
    p.start();

    await vi.waitFor(() => expect(env.api.fetchMessages).toHaveBeenCalledTimes(1));
    await p.stop();

    expect(env.api.fetchMessages).toHaveBeenCalledTimes(1);
  });

  it('keeps polling after a failed fetch', async () => {
    env.api.fetchMessages.mockRejectedValueOnce(new Error('offline'));
    const p = poller(5);
    p.start();

    await vi.waitFor(() => expect(env.api.fetchMessages).toHaveBeenCalledTimes(2));
    await p.stop();
  });
});
