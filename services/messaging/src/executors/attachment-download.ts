import { Outcome, outcomeForError, parseDetails, type JobExecutor } from './types.js';
import { attachmentDetailsSchema } from './attachment-upload.js';

export const attachmentDownloadExecutor: JobExecutor = {
  maxFailureCount: 3,

  async execute(job, deps, signal) {
    const details = parseDetails(job, attachmentDetailsSchema);
    if (!details.success) return Outcome.permanentFailure(`invalid details: ${details.error}`);

    const { attachmentId } = details.data;
    const attachment = deps.storage.getAttachment(attachmentId);
    if (!attachment) return Outcome.permanentFailure(`attachment ${attachmentId} no longer exists`);
    if (attachment.state === 'downloaded') return Outcome.success();
    if (attachment.state !== 'pendingDownload' || !attachment.url || !attachment.encryptionKey) {
      return Outcome.permanentFailure(`attachment ${attachmentId} cannot be downloaded from state ${attachment.state}`);
    }

    let ciphertext: Uint8Array;
    try {
      ciphertext = await deps.api.downloadFile(attachment.url, signal);
    } catch (err) {
      return outcomeForError(err);
    }

    let data: Uint8Array;
    try {
      data = deps.crypto.decryptAttachment(ciphertext, attachment.encryptionKey, attachment.digest);
    } catch (err) {
      return Outcome.permanentFailure(`attachment ${attachmentId} could not be decrypted: ${err instanceof Error ? err.message : String(err)}`);
    }

    return Outcome.success({ commit: () => deps.storage.saveAttachmentData(attachmentId, data) });
  },

  onPermanentFailure(job, deps) {
    const details = parseDetails(job, attachmentDetailsSchema);
    if (details.success) deps.storage.markAttachmentFailed(details.data.attachmentId);
  },
};
