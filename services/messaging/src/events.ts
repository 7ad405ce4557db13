import { EventEmitter } from 'node:events';
import { logger } from '@relaypost/shared';
import type { PersistedJob } from './jobs.js';

const log = logger.child({ module: 'job-events' });

export interface JobEventMap {
  jobSucceeded: [job: PersistedJob];
  jobDeferred: [job: PersistedJob, until: number];
  jobRetryScheduled: [job: PersistedJob, delayMs: number];
  jobPermanentlyFailed: [job: PersistedJob, reason: string];
}

export type JobEventName = keyof JobEventMap;

export class JobEvents {
  private readonly emitter = new EventEmitter();

  /** Returns an unsubscribe function. */
  on<K extends JobEventName>(event: K, listener: (...args: JobEventMap[K]) => void): () => void {
    this.emitter.on(event, listener);
    return () => {
      this.emitter.off(event, listener);
    };
  }

  once<K extends JobEventName>(event: K): Promise<JobEventMap[K]> {
    return new Promise((resolve) => {
      this.emitter.once(event, (...args: JobEventMap[K]) => resolve(args));
    });
  }

  emit<K extends JobEventName>(event: K, ...args: JobEventMap[K]): void {
    try {
      this.emitter.emit(event, ...args);
    } catch (err) {
      log.error({ err, event }, 'job event listener threw');
    }
  }
}
