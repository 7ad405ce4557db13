import { logger } from '@relaypost/shared';
import { Outcome, type JobExecutor } from './types.js';

const log = logger.child({ module: 'failed-attachment-downloads' });

/** Downloads left pending with no download job queued for their message would wait forever. */
export const failedAttachmentDownloadsExecutor: JobExecutor = {
  async execute(_job, deps) {
    let marked = 0;
    for (const attachment of deps.storage.attachmentsInState('pendingDownload')) {
      if (attachment.messageId !== undefined && deps.jobs.hasPendingJob('attachmentDownload', attachment.messageId)) {
        continue;
      }
      deps.storage.markAttachmentFailed(attachment.id);
      marked++;
    }
    if (marked > 0) log.warn({ marked }, 'marked orphaned downloads as failed');
    return Outcome.success();
  },
};
