import { logger } from '@relaypost/shared';
import { createJob } from '../jobs.js';
import { encodeContent, type AttachmentPointer } from '../messages.js';
import type { StoredAttachment } from '../message-store.js';
import { Outcome, outcomeForError, type JobExecutor } from './types.js';

const log = logger.child({ module: 'message-send' });

/** How long to wait before checking on attachment uploads again */
export const ATTACHMENT_WAIT_MS = 5_000;

function toPointer(attachment: StoredAttachment): AttachmentPointer | undefined {
  if (!attachment.url || !attachment.encryptionKey || !attachment.digest) return undefined;
  return {
    id: attachment.id,
    contentType: attachment.contentType,
    byteCount: attachment.byteCount,
    url: attachment.url,
    key: attachment.encryptionKey,
    digest: attachment.digest,
  };
}

export const messageSendExecutor: JobExecutor = {
  maxFailureCount: 10,
  requiresThreadId: true,
  requiresInteractionId: true,

  async execute(job, deps, signal) {
    const { threadId, interactionId } = job;
    if (!threadId || interactionId === undefined) {
      return Outcome.permanentFailure('message send job is not linked to a message');
    }

    const message = deps.storage.getMessage(interactionId);
    if (!message) return Outcome.permanentFailure(`message ${interactionId} no longer exists`);
    if (message.state === 'sent') return Outcome.success();

    const attachments = deps.storage.attachmentsForMessage(message.id);
    if (attachments.some((a) => a.state === 'failed')) {
      return Outcome.permanentFailure('an attachment failed to upload');
    }

    const pending = attachments.filter((a) => a.state === 'pendingUpload');
    if (pending.length > 0) {
      for (const attachment of pending) {
        deps.jobs.enqueue(
          createJob(
            {
              variant: 'attachmentUpload',
              threadId,
              interactionId: message.id,
              details: { attachmentId: attachment.id },
            },
            deps.now(),
          ),
        );
      }
      log.debug({ messageId: message.id, pending: pending.length }, 'waiting for attachment uploads');
      return Outcome.deferred(deps.now() + ATTACHMENT_WAIT_MS);
    }

    const pointers: AttachmentPointer[] = [];
    for (const attachment of attachments) {
      const pointer = toPointer(attachment);
      if (!pointer) return Outcome.permanentFailure(`attachment ${attachment.id} has no upload record`);
      pointers.push(pointer);
    }

    const ttlMs = message.expiresAt === undefined ? undefined : message.expiresAt - message.sentTimestamp;
    const content = encodeContent({
      kind: 'visible',
      sentTimestamp: message.sentTimestamp,
      body: message.body,
      expiresInMs: ttlMs,
      attachments: pointers,
    });

    let data: Uint8Array;
    try {
      data = deps.crypto.encrypt(content, threadId);
    } catch (err) {
      return Outcome.permanentFailure(`cannot encrypt for ${threadId}: ${err instanceof Error ? err.message : String(err)}`);
    }

    try {
      const { hash } = await deps.api.sendMessage(
        { recipient: threadId, data, timestamp: message.sentTimestamp, ttlMs },
        signal,
      );
      return Outcome.success({ commit: () => deps.storage.markMessageSent(message.id, hash) });
    } catch (err) {
      return outcomeForError(err);
    }
  },

  onPermanentFailure(job, deps, reason) {
    if (job.interactionId !== undefined) {
      deps.storage.markMessageFailed(job.interactionId, reason);
    }
  },
};
