import { logger } from '@relaypost/shared';
import { Outcome, type JobExecutor } from './types.js';

const log = logger.child({ module: 'garbage-collection' });

export const GARBAGE_COLLECTION_INTERVAL_MS = 24 * 60 * 60 * 1_000;

export const garbageCollectionExecutor: JobExecutor = {
  async execute(_job, deps) {
    const removed = deps.storage.deleteOrphanedAttachments();
    log.info({ removed }, 'garbage collection finished');
    return Outcome.success({ nextRunAt: deps.now() + GARBAGE_COLLECTION_INTERVAL_MS });
  },
};
