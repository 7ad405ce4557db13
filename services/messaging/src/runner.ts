import { logger, withSpan } from '@relaypost/shared';
import { computeBackoffMs, DEFAULT_BACKOFF, type BackoffPolicy } from './backoff.js';
import { JobEvents } from './events.js';
import {
  DEFAULT_CONTEXT_OPTIONS,
  EXECUTION_CONTEXTS,
  VARIANT_POLICIES,
  isJobVariant,
  jobUniqueKey,
  type ContextOptions,
  type EnqueueResult,
  type ExecutionContextName,
  type Job,
  type JobVariant,
  type PersistedJob,
} from './jobs.js';
import type { JobStore } from './job-store.js';
import {
  Outcome,
  type ExecutorDependencies,
  type ExecutorRegistry,
  type JobExecutor,
  type JobOutcome,
  type JobScheduler,
} from './executors/types.js';

const log = logger.child({ module: 'job-runner' });

/** Recurring jobs that do not say when to run next come back after a day. */
export const DEFAULT_RECURRING_INTERVAL_MS = 24 * 60 * 60 * 1_000;

// setTimeout overflows above this
const MAX_TIMER_MS = 2_147_483_647;

export type JobRunnerErrorCode =
  | 'missingExecutor'
  | 'missingThreadId'
  | 'missingInteractionId'
  | 'invalidBehaviour'
  | 'unknownContext';

export class JobRunnerError extends Error {
  constructor(
    readonly code: JobRunnerErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'JobRunnerError';
  }
}

export interface JobRunnerOptions {
  store: JobStore;
  executors: ExecutorRegistry;
  dependencies: Omit<ExecutorDependencies, 'jobs'>;
  contexts?: Partial<Record<ExecutionContextName, Partial<ContextOptions>>>;
  backoff?: Partial<BackoffPolicy>;
  recurringIntervalMs?: number;
}

interface Lane {
  readonly name: ExecutionContextName;
  readonly maxConcurrent: number;
  running: boolean;
  /** Claimed jobs: the in-memory lease. Never persisted. */
  readonly inFlight: Map<number, Promise<void>>;
  wakeTimer?: NodeJS.Timeout;
}

export interface LaneStatus {
  running: boolean;
  maxConcurrent: number;
  inFlight: number[];
  pending: number;
}

/**
 * Persistent multi-lane job scheduler.
 *
 * Pending jobs live in SQLite; a job is Running only while its id is in a lane's
 * in-flight map, so after a crash every claimed job is Pending again. Claims are
 * synchronous, so no job can be claimed twice by the same process.
 */
export class JobRunner implements JobScheduler {
  readonly events = new JobEvents();

  private readonly store: JobStore;
  private readonly executors: ExecutorRegistry;
  private readonly deps: ExecutorDependencies;
  private readonly backoff: BackoffPolicy;
  private readonly recurringIntervalMs: number;
  private readonly lanes = new Map<ExecutionContextName, Lane>();
  private shutdown = new AbortController();
  private launched = false;

  constructor(opts: JobRunnerOptions) {
    this.store = opts.store;
    this.executors = opts.executors;
    this.deps = { ...opts.dependencies, jobs: this };
    this.backoff = { ...DEFAULT_BACKOFF, ...opts.backoff };
    this.recurringIntervalMs = opts.recurringIntervalMs ?? DEFAULT_RECURRING_INTERVAL_MS;

    for (const name of EXECUTION_CONTEXTS) {
      const maxConcurrent = opts.contexts?.[name]?.maxConcurrent ?? DEFAULT_CONTEXT_OPTIONS[name].maxConcurrent;
      this.lanes.set(name, { name, maxConcurrent: Math.max(1, maxConcurrent), running: false, inFlight: new Map() });
    }
  }

  private get now(): number {
    return this.deps.now();
  }

  // ---------------------------------------------------------------------------
  // Enqueueing
  // ---------------------------------------------------------------------------

  enqueue(job: Job, context?: ExecutionContextName): EnqueueResult {
    const executor = this.requireExecutor(job.variant);
    if (executor.requiresThreadId && !job.threadId) {
      throw new JobRunnerError('missingThreadId', `${job.variant} jobs require a threadId`);
    }
    if (executor.requiresInteractionId && job.interactionId === undefined) {
      throw new JobRunnerError('missingInteractionId', `${job.variant} jobs require an interactionId`);
    }

    const policy = VARIANT_POLICIES[job.variant];
    const lane = this.lane(context ?? policy.context);
    const uniqueKey = jobUniqueKey(job);

    const result = this.store.transaction((): EnqueueResult => {
      if (job.id !== undefined) {
        const existing = this.store.get(job.id);
        if (existing) return { status: 'duplicate', job: existing };
      }
      if (job.behaviour.runOnceOnly && this.store.hasCompletion(job.variant, uniqueKey)) {
        return { status: 'alreadyCompleted' };
      }
      if (policy.uniquePerContext) {
        const existing = this.store.findEquivalent(lane.name, job.variant, uniqueKey);
        if (existing) return { status: 'duplicate', job: existing };
      }
      return { status: 'enqueued', job: this.store.insert(job, lane.name, uniqueKey, this.now) };
    });

    if (result.status === 'enqueued') {
      log.debug({ jobId: result.job.id, variant: job.variant, context: lane.name }, 'job enqueued');
      if (!job.behaviour.runOnLaunch) this.pump(lane);
    } else {
      log.debug({ variant: job.variant, context: lane.name, status: result.status }, 'job not enqueued');
    }
    return result;
  }

  /** Persist a run-on-launch job; it runs during the next `launch()`. */
  appendJobToLaunchQueue(job: Job): EnqueueResult {
    if (!job.behaviour.runOnLaunch) {
      throw new JobRunnerError('invalidBehaviour', `${job.variant} job is not flagged runOnLaunch`);
    }
    return this.enqueue(job);
  }

  hasPendingJob(variant: JobVariant, interactionId: number): boolean {
    return this.store.hasPendingJob(variant, interactionId);
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Run every persisted launch job in order, then start all contexts. A launch job that
   * failed temporarily is retried by its context once it is due.
   */
  async launch(): Promise<void> {
    if (this.launched) {
      log.warn('launch called twice');
      return;
    }

    for (const variant of this.store.variants()) {
      if (!isJobVariant(variant) || !this.executors.has(variant)) {
        throw new JobRunnerError('missingExecutor', `persisted jobs of variant '${variant}' have no executor`);
      }
    }

    const launchJobs = this.store.launchJobs();
    log.info({ count: launchJobs.length }, 'running launch jobs');
    for (const job of launchJobs) {
      await this.run(job);
    }

    this.launched = true;
    for (const name of EXECUTION_CONTEXTS) this.start(name);
  }

  start(context: ExecutionContextName): void {
    const lane = this.lane(context);
    if (lane.running) return;
    lane.running = true;
    log.info({ context, maxConcurrent: lane.maxConcurrent }, 'context started');
    this.pump(lane);
  }

  /** Stop claiming; resolves when the jobs already running have finished. */
  async stop(context: ExecutionContextName): Promise<void> {
    const lane = this.lane(context);
    lane.running = false;
    this.clearWake(lane);
    await Promise.all(lane.inFlight.values());
    log.info({ context }, 'context stopped');
  }

  /** Stop every context and signal running executors to wind down. */
  async stopAll(): Promise<void> {
    for (const lane of this.lanes.values()) {
      lane.running = false;
      this.clearWake(lane);
    }
    this.shutdown.abort(new Error('job runner stopping'));
    await Promise.all(EXECUTION_CONTEXTS.map((name) => this.stop(name)));
    this.shutdown = new AbortController();
  }

  isRunning(context: ExecutionContextName): boolean {
    return this.lane(context).running;
  }

  runningJobIds(context: ExecutionContextName): number[] {
    return [...this.lane(context).inFlight.keys()];
  }

  status(): Record<ExecutionContextName, LaneStatus> {
    const pending = new Map<ExecutionContextName, number>();
    for (const job of this.store.list()) {
      pending.set(job.context, (pending.get(job.context) ?? 0) + 1);
    }
    const entry = (name: ExecutionContextName): LaneStatus => {
      const lane = this.lane(name);
      return {
        running: lane.running,
        maxConcurrent: lane.maxConcurrent,
        inFlight: [...lane.inFlight.keys()],
        pending: pending.get(name) ?? 0,
      };
    };
    return {
      default: entry('default'),
      messageSend: entry('messageSend'),
      messageReceive: entry('messageReceive'),
      attachmentUpload: entry('attachmentUpload'),
      attachmentDownload: entry('attachmentDownload'),
    };
  }

  // ---------------------------------------------------------------------------
  // Scheduling
  // ---------------------------------------------------------------------------

  private lane(name: ExecutionContextName): Lane {
    const lane = this.lanes.get(name);
    if (!lane) throw new JobRunnerError('unknownContext', `unknown execution context '${name}'`);
    return lane;
  }

  private requireExecutor(variant: JobVariant): JobExecutor {
    const executor = this.executors.get(variant);
    if (!executor) throw new JobRunnerError('missingExecutor', `no executor registered for '${variant}'`);
    return executor;
  }

  private pump(lane: Lane): void {
    if (!lane.running) return;
    this.clearWake(lane);

    try {
      while (lane.inFlight.size < lane.maxConcurrent) {
        const job = this.store.nextDue(lane.name, this.now, [...lane.inFlight.keys()], this.launched);
        if (!job) break;
        this.claim(lane, job);
      }
      if (lane.inFlight.size < lane.maxConcurrent) this.scheduleWake(lane);
    } catch (err) {
      log.error({ err, context: lane.name }, 'failed to claim jobs');
    }
  }

  private claim(lane: Lane, job: PersistedJob): void {
    // The id is in the lease before the executor can re-enter the runner.
    const execution = Promise.resolve()
      .then(() => this.run(job))
      .catch((err: unknown) => {
        lane.running = false;
        log.fatal({ err, jobId: job.id, context: lane.name }, 'job could not be executed; context halted');
      })
      .finally(() => {
        lane.inFlight.delete(job.id);
        this.pump(lane);
      });
    lane.inFlight.set(job.id, execution);
  }

  private scheduleWake(lane: Lane): void {
    const next = this.store.earliestRunAt(lane.name, [...lane.inFlight.keys()], this.launched);
    if (next === undefined) return;
    const delayMs = Math.min(Math.max(0, next - this.now), MAX_TIMER_MS);
    lane.wakeTimer = setTimeout(() => {
      lane.wakeTimer = undefined;
      this.pump(lane);
    }, delayMs);
  }

  private clearWake(lane: Lane): void {
    if (lane.wakeTimer) {
      clearTimeout(lane.wakeTimer);
      lane.wakeTimer = undefined;
    }
  }

  // ---------------------------------------------------------------------------
  // Execution and outcomes
  // ---------------------------------------------------------------------------

  private async run(job: PersistedJob): Promise<void> {
    const executor = this.requireExecutor(job.variant);
    if (job.behaviour.runOnceOnly && this.store.hasCompletion(job.variant, job.uniqueKey)) {
      // A copy persisted before its twin succeeded.
      this.store.remove(job.id);
      log.info({ jobId: job.id, variant: job.variant }, 'run-once job already completed; dropped');
      this.events.emit('jobSucceeded', job);
      return;
    }
    const attributes = { 'job.id': job.id, 'job.variant': job.variant, 'job.context': job.context };

    let outcome: JobOutcome;
    try {
      outcome = await withSpan('job.execute', attributes, () => executor.execute(job, this.deps, this.shutdown.signal));
    } catch (err) {
      log.warn({ err, jobId: job.id, variant: job.variant }, 'job executor threw');
      outcome = Outcome.temporaryFailure(err instanceof Error ? err.message : String(err));
    }
    this.applyOutcome(job, executor, outcome);
  }

  private applyOutcome(job: PersistedJob, executor: JobExecutor, outcome: JobOutcome): void {
    switch (outcome.kind) {
      case 'success':
        this.succeed(job, executor, outcome.nextRunAt, outcome.commit);
        return;
      case 'deferred':
        this.store.reschedule(job.id, outcome.until, job.failureCount);
        log.debug({ jobId: job.id, variant: job.variant, until: outcome.until }, 'job deferred');
        this.events.emit('jobDeferred', { ...job, nextRunTimestamp: outcome.until }, outcome.until);
        return;
      case 'temporaryFailure':
        this.retryOrFail(job, executor, outcome.error, outcome.retryAfterMs);
        return;
      case 'permanentFailure':
        this.failPermanently(job, executor, outcome.reason);
        return;
    }
  }

  private succeed(job: PersistedJob, executor: JobExecutor, nextRunAt?: number, commit?: () => void): void {
    const now = this.now;
    const next = nextRunAt ?? now + this.recurringIntervalMs;
    try {
      this.store.transaction(() => {
        if (job.behaviour.recurring) {
          this.store.reschedule(job.id, next, 0);
        } else {
          this.store.remove(job.id);
        }
        if (job.behaviour.runOnceOnly) this.store.recordCompletion(job.variant, job.uniqueKey, now);
        commit?.();
      });
    } catch (err) {
      log.error({ err, jobId: job.id, variant: job.variant }, 'failed to commit job success');
      this.retryOrFail(job, executor, `commit failed: ${err instanceof Error ? err.message : String(err)}`);
      return;
    }

    log.info({ jobId: job.id, variant: job.variant }, 'job succeeded');
    this.events.emit(
      'jobSucceeded',
      job.behaviour.recurring ? { ...job, nextRunTimestamp: next, failureCount: 0 } : job,
    );
  }

  private retryOrFail(job: PersistedJob, executor: JobExecutor, error: string, retryAfterMs?: number): void {
    const failureCount = job.failureCount + 1;
    if (executor.maxFailureCount !== undefined && failureCount >= executor.maxFailureCount) {
      this.failPermanently(
        { ...job, failureCount },
        executor,
        `failed ${failureCount} times, last error: ${error}`,
      );
      return;
    }

    const delayMs = retryAfterMs ?? computeBackoffMs(failureCount, this.backoff);
    const nextRunTimestamp = this.now + delayMs;
    this.store.reschedule(job.id, nextRunTimestamp, failureCount);
    log.warn({ jobId: job.id, variant: job.variant, failureCount, delayMs, error }, 'job failed, retry scheduled');
    this.events.emit('jobRetryScheduled', { ...job, failureCount, nextRunTimestamp }, delayMs);
  }

  private failPermanently(job: PersistedJob, executor: JobExecutor, reason: string): void {
    try {
      this.store.transaction(() => {
        this.store.remove(job.id);
        executor.onPermanentFailure?.(job, this.deps, reason);
      });
    } catch (err) {
      log.error({ err, jobId: job.id, variant: job.variant }, 'permanent failure bookkeeping failed');
      this.store.remove(job.id);
    }

    log.error({ jobId: job.id, variant: job.variant, reason }, 'job permanently failed');
    this.events.emit('jobPermanentlyFailed', job, reason);
  }
}
