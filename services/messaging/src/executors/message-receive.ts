import { z } from 'zod';
import { logger } from '@relaypost/shared';
import type { DecryptedEnvelope } from '../crypto.js';
import { createJob } from '../jobs.js';
import { decodeContent } from '../messages.js';
import { Outcome, parseDetails, type JobExecutor } from './types.js';

const log = logger.child({ module: 'message-receive' });

export const messageReceiveDetailsSchema = z.object({
  messages: z
    .array(
      z.object({
        hash: z.string().min(1),
        /** base64 envelope */
        data: z.string(),
        timestamp: z.number().int(),
      }),
    )
    .min(1),
});

export type MessageReceiveDetails = z.infer<typeof messageReceiveDetailsSchema>;

export const messageReceiveExecutor: JobExecutor = {
  maxFailureCount: 10,

  async execute(job, deps) {
    const details = parseDetails(job, messageReceiveDetailsSchema);
    if (!details.success) return Outcome.permanentFailure(`invalid details: ${details.error}`);

    let stored = 0;
    for (const envelope of details.data.messages) {
      let decrypted: DecryptedEnvelope;
      try {
        decrypted = deps.crypto.decrypt(new Uint8Array(Buffer.from(envelope.data, 'base64')));
      } catch (err) {
        log.warn({ err, hash: envelope.hash }, 'skipping undecryptable message');
        continue;
      }

      const content = decodeContent(decrypted.plaintext);
      if (!content) {
        log.warn({ hash: envelope.hash, sender: decrypted.senderId }, 'skipping unrecognised message content');
        continue;
      }

      if (content.kind === 'readReceipt') {
        deps.storage.markReadByRecipient(decrypted.senderId, content.timestamps);
        continue;
      }

      const { inserted, message } = deps.storage.insertReceivedMessage({
        threadId: decrypted.senderId,
        author: decrypted.senderId,
        body: content.body,
        serverHash: envelope.hash,
        sentTimestamp: content.sentTimestamp,
        expiresAt: content.expiresInMs === undefined ? undefined : deps.now() + content.expiresInMs,
        attachments: content.attachments,
      });
      if (inserted) stored++;

      // Re-delivery after a crash finds the message already stored; pending downloads are still queued.
      for (const attachment of deps.storage.attachmentsForMessage(message.id)) {
        if (attachment.state !== 'pendingDownload') continue;
        deps.jobs.enqueue(
          createJob(
            {
              variant: 'attachmentDownload',
              threadId: message.threadId,
              interactionId: message.id,
              details: { attachmentId: attachment.id },
            },
            deps.now(),
          ),
        );
      }
    }

    log.info({ received: details.data.messages.length, stored }, 'processed incoming messages');
    return Outcome.success();
  },
};
