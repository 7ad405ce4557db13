import { randomUUID } from 'node:crypto';
import { logger } from '@relaypost/shared';
import { createJob, type EnqueueResult } from './jobs.js';
import type { JobScheduler } from './executors/types.js';
import type { MessageStore, StoredMessage } from './message-store.js';

const log = logger.child({ module: 'outbox' });

export interface OutgoingAttachment {
  contentType: string;
  data: Uint8Array;
}

export interface SendMessageInput {
  threadId: string;
  body?: string;
  expiresInMs?: number;
  attachments?: OutgoingAttachment[];
}

export interface OutboxOptions {
  storage: MessageStore;
  jobs: JobScheduler;
  /** Author recorded on outgoing messages */
  identityId: string;
  now?: () => number;
}

export class OutboxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OutboxError';
  }
}

export interface Outbox {
  /** Store the message as `sending` and queue its send job in the same transaction. */
  sendMessage(input: SendMessageInput): { message: StoredMessage; jobId: number };
  /** Queue read receipts for the given sent timestamps; undefined when there is nothing to send. */
  markThreadRead(threadId: string, timestamps: readonly number[]): EnqueueResult | undefined;
}

export function createOutbox(opts: OutboxOptions): Outbox {
  const now = opts.now ?? Date.now;

  return {
    sendMessage(input) {
      const attachments = input.attachments ?? [];
      if (!input.body && attachments.length === 0) {
        throw new OutboxError('a message needs a body or an attachment');
      }

      const sent = opts.storage.transaction(() => {
        const message = opts.storage.insertOutgoingMessage({
          threadId: input.threadId,
          author: opts.identityId,
          body: input.body,
          sentTimestamp: now(),
          expiresInMs: input.expiresInMs,
          attachments: attachments.map((attachment) => ({ id: randomUUID(), ...attachment })),
        });
        const result = opts.jobs.enqueue(
          createJob({ variant: 'messageSend', threadId: input.threadId, interactionId: message.id }, now()),
        );
        // A stored outgoing message always has a send job behind it.
        if (result.status !== 'enqueued') {
          throw new OutboxError(`send job for message ${message.id} was not queued: ${result.status}`);
        }
        return { message, jobId: result.job.id };
      });

      log.info(
        { messageId: sent.message.id, threadId: input.threadId, attachments: attachments.length },
        'message queued for sending',
      );
      return sent;
    },

    markThreadRead(threadId, timestamps) {
      const unique = [...new Set(timestamps)].sort((a, b) => a - b);
      if (unique.length === 0) return undefined;

      const result = opts.jobs.enqueue(
        createJob({ variant: 'sendReadReceipts', threadId, details: { timestamps: unique } }, now()),
      );
      log.debug({ threadId, count: unique.length, status: result.status }, 'read receipts queued');
      return result;
    },
  };
}
