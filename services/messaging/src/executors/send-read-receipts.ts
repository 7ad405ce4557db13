import { z } from 'zod';
import { encodeContent } from '../messages.js';
import { Outcome, outcomeForError, parseDetails, type JobExecutor } from './types.js';

export const readReceiptDetailsSchema = z.object({
  timestamps: z.array(z.number().int()).min(1),
});

export const sendReadReceiptsExecutor: JobExecutor = {
  maxFailureCount: 3,
  requiresThreadId: true,

  async execute(job, deps, signal) {
    if (!job.threadId) return Outcome.permanentFailure('read receipt job has no thread');
    const details = parseDetails(job, readReceiptDetailsSchema);
    if (!details.success) return Outcome.permanentFailure(`invalid details: ${details.error}`);

    let data: Uint8Array;
    try {
      data = deps.crypto.encrypt(
        encodeContent({ kind: 'readReceipt', timestamps: details.data.timestamps }),
        job.threadId,
      );
    } catch (err) {
      return Outcome.permanentFailure(`cannot encrypt for ${job.threadId}: ${err instanceof Error ? err.message : String(err)}`);
    }

    try {
      await deps.api.sendMessage({ recipient: job.threadId, data, timestamp: deps.now() }, signal);
      return Outcome.success();
    } catch (err) {
      return outcomeForError(err);
    }
  },
};
