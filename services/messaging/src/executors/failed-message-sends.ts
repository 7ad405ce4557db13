import { logger } from '@relaypost/shared';
import { Outcome, type JobExecutor } from './types.js';

const log = logger.child({ module: 'failed-message-sends' });

export const INTERRUPTED_SEND_REASON = 'sending was interrupted';

/** Messages left in `sending` with no send job behind them will never leave that state. */
export const failedMessageSendsExecutor: JobExecutor = {
  async execute(_job, deps) {
    let marked = 0;
    for (const message of deps.storage.messagesInState('sending')) {
      if (deps.jobs.hasPendingJob('messageSend', message.id)) continue;
      deps.storage.markMessageFailed(message.id, INTERRUPTED_SEND_REASON);
      marked++;
    }
    if (marked > 0) log.warn({ marked }, 'marked orphaned sends as failed');
    return Outcome.success();
  },
};
