import { z } from 'zod';
import { Outcome, outcomeForError, parseDetails, type JobExecutor } from './types.js';

export const attachmentDetailsSchema = z.object({ attachmentId: z.string().min(1) });

export const attachmentUploadExecutor: JobExecutor = {
  maxFailureCount: 10,

  async execute(job, deps, signal) {
    const details = parseDetails(job, attachmentDetailsSchema);
    if (!details.success) return Outcome.permanentFailure(`invalid details: ${details.error}`);

    const { attachmentId } = details.data;
    const attachment = deps.storage.getAttachment(attachmentId);
    if (!attachment) return Outcome.permanentFailure(`attachment ${attachmentId} no longer exists`);
    if (attachment.state === 'uploaded') return Outcome.success();
    if (attachment.state !== 'pendingUpload' || !attachment.data) {
      return Outcome.permanentFailure(`attachment ${attachmentId} cannot be uploaded from state ${attachment.state}`);
    }

    const encrypted = deps.crypto.encryptAttachment(attachment.data);
    try {
      const file = await deps.api.uploadFile(encrypted.ciphertext, signal);
      return Outcome.success({
        commit: () =>
          deps.storage.markAttachmentUploaded(attachmentId, {
            serverId: file.id,
            url: file.url,
            key: encrypted.key,
            digest: encrypted.digest,
          }),
      });
    } catch (err) {
      return outcomeForError(err);
    }
  },

  onPermanentFailure(job, deps) {
    const details = parseDetails(job, attachmentDetailsSchema);
    if (details.success) deps.storage.markAttachmentFailed(details.data.attachmentId);
  },
};
