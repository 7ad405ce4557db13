import { logger } from '@relaypost/shared';
import { Outcome, type JobExecutor } from './types.js';

const log = logger.child({ module: 'disappearing-messages' });

export const IDLE_CHECK_INTERVAL_MS = 60 * 60 * 1_000;

export const disappearingMessagesExecutor: JobExecutor = {
  async execute(_job, deps) {
    const now = deps.now();
    const deleted = deps.storage.deleteExpiredMessages(now);
    if (deleted > 0) log.info({ deleted }, 'deleted expired messages');

    const nextExpiry = deps.storage.nextExpiry();
    return Outcome.success({ nextRunAt: nextExpiry ?? now + IDLE_CHECK_INTERVAL_MS });
  },
};
