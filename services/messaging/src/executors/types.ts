import type { z } from 'zod';
import { CircuitOpenError } from '@relaypost/shared';
import type { Crypto } from '../crypto.js';
import type { EnqueueResult, ExecutionContextName, Job, JobVariant, PersistedJob } from '../jobs.js';
import type { KeyStore } from '../key-store.js';
import type { MessageStore } from '../message-store.js';
import { isPermanentHttpError, type MessagingApi } from '../server-client.js';

// ---------------------------------------------------------------------------
// Outcomes
// ---------------------------------------------------------------------------

export type JobOutcome =
  | {
      kind: 'success';
      /** Next run of a recurring job; ignored otherwise */
      nextRunAt?: number;
      /** Storage bookkeeping committed atomically with the job's completion */
      commit?: () => void;
    }
  | { kind: 'deferred'; until: number }
  | { kind: 'temporaryFailure'; error: string; retryAfterMs?: number }
  | { kind: 'permanentFailure'; reason: string };

export const Outcome = {
  success(opts: { nextRunAt?: number; commit?: () => void } = {}): JobOutcome {
    return { kind: 'success', ...opts };
  },
  deferred(until: number): JobOutcome {
    return { kind: 'deferred', until };
  },
  temporaryFailure(error: string, retryAfterMs?: number): JobOutcome {
    return { kind: 'temporaryFailure', error, retryAfterMs };
  },
  permanentFailure(reason: string): JobOutcome {
    return { kind: 'permanentFailure', reason };
  },
};

/** Map an error from a collaborator to an outcome: client errors are final, the rest retry. */
export function outcomeForError(error: unknown): JobOutcome {
  const message = error instanceof Error ? error.message : String(error);
  if (error instanceof CircuitOpenError) return Outcome.temporaryFailure(message, error.retryAfterMs);
  if (isPermanentHttpError(error)) return Outcome.permanentFailure(message);
  return Outcome.temporaryFailure(message);
}

export type DetailsResult<T> = { success: true; data: T } | { success: false; error: string };

export function parseDetails<T>(job: Job, schema: z.ZodType<T, z.ZodTypeDef, unknown>): DetailsResult<T> {
  if (job.details === undefined) return { success: false, error: 'missing details' };
  let raw: unknown;
  try {
    raw = JSON.parse(job.details);
  } catch (err) {
    return { success: false, error: `details are not JSON: ${err instanceof Error ? err.message : String(err)}` };
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return { success: false, error: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ') };
  }
  return { success: true, data: parsed.data };
}

// ---------------------------------------------------------------------------
// Executor contract
// ---------------------------------------------------------------------------

/** What executors may do with the queue. */
export interface JobScheduler {
  enqueue(job: Job, context?: ExecutionContextName): EnqueueResult;
  hasPendingJob(variant: JobVariant, interactionId: number): boolean;
}

export interface ExecutorDependencies {
  api: MessagingApi;
  storage: MessageStore;
  crypto: Crypto;
  keys: KeyStore;
  jobs: JobScheduler;
  now: () => number;
}

export interface JobExecutor {
  /** Failures after which a temporary failure becomes permanent (default: unbounded) */
  readonly maxFailureCount?: number;
  readonly requiresThreadId?: boolean;
  readonly requiresInteractionId?: boolean;
  execute(job: PersistedJob, deps: ExecutorDependencies, signal: AbortSignal): Promise<JobOutcome>;
  /** Runs in the same transaction that deletes the job */
  onPermanentFailure?(job: PersistedJob, deps: ExecutorDependencies, reason: string): void;
}

export class ExecutorRegistry {
  private readonly executors = new Map<JobVariant, JobExecutor>();

  set(variant: JobVariant, executor: JobExecutor): void {
    if (this.executors.has(variant)) {
      throw new Error(`executor for '${variant}' is already registered`);
    }
    this.executors.set(variant, executor);
  }

  get(variant: JobVariant): JobExecutor | undefined {
    return this.executors.get(variant);
  }

  has(variant: string): boolean {
    return [...this.executors.keys()].some((registered) => registered === variant);
  }

  variants(): JobVariant[] {
    return [...this.executors.keys()];
  }
}
