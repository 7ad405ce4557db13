import { features, logger, type Features } from '@relaypost/shared';
import { createJob, JOB_VARIANTS, type JobVariant } from './jobs.js';
import { ExecutorRegistry, type JobExecutor } from './executors/types.js';
import { messageSendExecutor } from './executors/message-send.js';
import { messageReceiveExecutor } from './executors/message-receive.js';
import { attachmentUploadExecutor } from './executors/attachment-upload.js';
import { attachmentDownloadExecutor } from './executors/attachment-download.js';
import { sendReadReceiptsExecutor } from './executors/send-read-receipts.js';
import { notifyPushServerExecutor } from './executors/notify-push-server.js';
import { disappearingMessagesExecutor } from './executors/disappearing-messages.js';
import { garbageCollectionExecutor } from './executors/garbage-collection.js';
import { failedMessageSendsExecutor } from './executors/failed-message-sends.js';
import { failedAttachmentDownloadsExecutor } from './executors/failed-attachment-downloads.js';
import { retrieveDefaultOpenGroupRoomsExecutor } from './executors/retrieve-default-open-group-rooms.js';
import type { JobRunner } from './runner.js';

const log = logger.child({ module: 'configure' });

export const EXECUTORS: Record<JobVariant, JobExecutor> = {
  messageSend: messageSendExecutor,
  messageReceive: messageReceiveExecutor,
  attachmentUpload: attachmentUploadExecutor,
  attachmentDownload: attachmentDownloadExecutor,
  sendReadReceipts: sendReadReceiptsExecutor,
  notifyPushServer: notifyPushServerExecutor,
  disappearingMessages: disappearingMessagesExecutor,
  garbageCollection: garbageCollectionExecutor,
  failedMessageSends: failedMessageSendsExecutor,
  failedAttachmentDownloads: failedAttachmentDownloadsExecutor,
  retrieveDefaultOpenGroupRooms: retrieveDefaultOpenGroupRoomsExecutor,
};

export function createExecutorRegistry(): ExecutorRegistry {
  const registry = new ExecutorRegistry();
  for (const variant of JOB_VARIANTS) {
    registry.set(variant, EXECUTORS[variant]);
  }
  return registry;
}

export interface StandardJobOptions {
  openGroupServer: string;
  pushToken?: string;
  now: number;
  flags?: Features;
}

/** Housekeeping and launch jobs every installation carries. Safe to call on every start. */
export function enqueueStandardJobs(runner: JobRunner, opts: StandardJobOptions): void {
  const flags = opts.flags ?? features;

  runner.appendJobToLaunchQueue(createJob({ variant: 'failedMessageSends' }, opts.now));
  runner.appendJobToLaunchQueue(createJob({ variant: 'failedAttachmentDownloads' }, opts.now));

  if (flags.isEnabled('disappearingMessages')) {
    runner.enqueue(createJob({ variant: 'disappearingMessages' }, opts.now));
  }
  runner.enqueue(createJob({ variant: 'garbageCollection' }, opts.now));

  if (flags.isEnabled('openGroups')) {
    runner.appendJobToLaunchQueue(
      createJob({ variant: 'retrieveDefaultOpenGroupRooms', details: { server: opts.openGroupServer } }, opts.now),
    );
  }

  if (flags.isEnabled('pushNotifications') && opts.pushToken) {
    runner.enqueue(createJob({ variant: 'notifyPushServer', details: { token: opts.pushToken } }, opts.now));
  }

  log.info('standard jobs scheduled');
}
