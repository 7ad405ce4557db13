import { logger } from '@relaypost/shared';
import { createJob } from './jobs.js';
import type { JobScheduler } from './executors/types.js';
import type { MessageStore } from './message-store.js';
import type { MessageReceiveDetails } from './executors/message-receive.js';
import type { MessagingApi } from './server-client.js';

const log = logger.child({ module: 'poller' });

export interface PollerOptions {
  api: MessagingApi;
  storage: MessageStore;
  jobs: JobScheduler;
  identityId: string;
  intervalMs: number;
  now?: () => number;
}

/** Pulls the inbox on an interval and hands each batch to a messageReceive job. */
export function createPoller(opts: PollerOptions) {
  const now = opts.now ?? Date.now;
  let lastHash = opts.storage.latestReceivedHash();
  let timer: NodeJS.Timeout | undefined;
  let controller: AbortController | undefined;
  let inFlight: Promise<void> | undefined;

  async function pollOnce(signal?: AbortSignal): Promise<number> {
    const envelopes = await opts.api.fetchMessages(opts.identityId, lastHash, signal);
    if (envelopes.length === 0) return 0;

    const details: MessageReceiveDetails = {
      messages: envelopes.map((e) => ({
        hash: e.hash,
        data: Buffer.from(e.data).toString('base64'),
        timestamp: e.timestamp,
      })),
    };
    opts.jobs.enqueue(createJob({ variant: 'messageReceive', details }, now()));
    lastHash = envelopes[envelopes.length - 1]?.hash ?? lastHash;
    log.debug({ count: envelopes.length, lastHash }, 'enqueued received messages');
    return envelopes.length;
  }

  function tick(): void {
    const signal = controller?.signal;
    if (!signal || signal.aborted) return;
    inFlight = pollOnce(signal)
      .then(() => undefined)
      .catch((err: unknown) => {
        if (!signal.aborted) log.warn({ err }, 'inbox poll failed');
      })
      .finally(() => {
        inFlight = undefined;
        if (!signal.aborted) timer = setTimeout(tick, opts.intervalMs);
      });
  }

  return {
    pollOnce,

    start(): void {
      if (controller) return;
      controller = new AbortController();
      log.info({ intervalMs: opts.intervalMs }, 'poller started');
      tick();
    },

    async stop(): Promise<void> {
      controller?.abort();
      controller = undefined;
      if (timer) clearTimeout(timer);
      timer = undefined;
      await inFlight;
    },
  };
}

export type Poller = ReturnType<typeof createPoller>;
