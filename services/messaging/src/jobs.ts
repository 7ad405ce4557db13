import { createHash } from 'node:crypto';

// ---------------------------------------------------------------------------
// Variants and execution contexts
// ---------------------------------------------------------------------------

export const JOB_VARIANTS = [
  'messageSend',
  'messageReceive',
  'attachmentUpload',
  'attachmentDownload',
  'sendReadReceipts',
  'notifyPushServer',
  'disappearingMessages',
  'garbageCollection',
  'failedMessageSends',
  'failedAttachmentDownloads',
  'retrieveDefaultOpenGroupRooms',
] as const;

export type JobVariant = (typeof JOB_VARIANTS)[number];

export const EXECUTION_CONTEXTS = [
  'default',
  'messageSend',
  'messageReceive',
  'attachmentUpload',
  'attachmentDownload',
] as const;

export type ExecutionContextName = (typeof EXECUTION_CONTEXTS)[number];

export interface ContextOptions {
  /** Jobs of this context allowed to run at the same time */
  maxConcurrent: number;
}

export const DEFAULT_CONTEXT_OPTIONS: Record<ExecutionContextName, ContextOptions> = {
  default: { maxConcurrent: 1 },
  messageSend: { maxConcurrent: 1 },
  messageReceive: { maxConcurrent: 1 },
  attachmentUpload: { maxConcurrent: 3 },
  attachmentDownload: { maxConcurrent: 3 },
};

export function isJobVariant(value: string): value is JobVariant {
  return JOB_VARIANTS.some((variant) => variant === value);
}

export function isExecutionContext(value: string): value is ExecutionContextName {
  return EXECUTION_CONTEXTS.some((name) => name === value);
}

// ---------------------------------------------------------------------------
// Job entity
// ---------------------------------------------------------------------------

export interface JobBehaviour {
  /** Never run again once an equivalent job has succeeded */
  readonly runOnceOnly: boolean;
  /** Run during launch, before the contexts start; only a failed attempt is retried by its lane */
  readonly runOnLaunch: boolean;
  /** Reschedule instead of deleting after a success */
  readonly recurring: boolean;
}

export interface VariantPolicy {
  context: ExecutionContextName;
  /** At most one equivalent job pending or running per context */
  uniquePerContext: boolean;
  /** Behaviour a new job of the variant gets unless the caller overrides it */
  behaviour: JobBehaviour;
}

const RUN_ONCE: JobBehaviour = { runOnceOnly: true, runOnLaunch: false, recurring: false };
const RECURRING: JobBehaviour = { runOnceOnly: false, runOnLaunch: false, recurring: true };
const EVERY_LAUNCH: JobBehaviour = { runOnceOnly: false, runOnLaunch: true, recurring: true };

export const VARIANT_POLICIES: Record<JobVariant, VariantPolicy> = {
  messageSend: { context: 'messageSend', uniquePerContext: false, behaviour: RUN_ONCE },
  messageReceive: { context: 'messageReceive', uniquePerContext: true, behaviour: RUN_ONCE },
  attachmentUpload: { context: 'attachmentUpload', uniquePerContext: true, behaviour: RUN_ONCE },
  attachmentDownload: { context: 'attachmentDownload', uniquePerContext: true, behaviour: RUN_ONCE },
  sendReadReceipts: { context: 'default', uniquePerContext: true, behaviour: RUN_ONCE },
  notifyPushServer: { context: 'default', uniquePerContext: true, behaviour: RUN_ONCE },
  disappearingMessages: { context: 'default', uniquePerContext: true, behaviour: RECURRING },
  garbageCollection: { context: 'default', uniquePerContext: true, behaviour: RECURRING },
  failedMessageSends: { context: 'default', uniquePerContext: true, behaviour: EVERY_LAUNCH },
  failedAttachmentDownloads: { context: 'default', uniquePerContext: true, behaviour: EVERY_LAUNCH },
  retrieveDefaultOpenGroupRooms: { context: 'default', uniquePerContext: true, behaviour: EVERY_LAUNCH },
};

export interface Job {
  /** Assigned when the job is first persisted */
  readonly id?: number;
  readonly variant: JobVariant;
  readonly behaviour: JobBehaviour;
  /** JSON payload specific to the variant */
  readonly details?: string;
  readonly threadId?: string;
  readonly interactionId?: number;
  /** Epoch milliseconds */
  readonly nextRunTimestamp: number;
  readonly failureCount: number;
}

export interface PersistedJob extends Job {
  readonly id: number;
  readonly context: ExecutionContextName;
  readonly uniqueKey: string;
}

export interface JobInput {
  variant: JobVariant;
  behaviour?: Partial<JobBehaviour>;
  details?: unknown;
  threadId?: string;
  interactionId?: number;
  nextRunTimestamp?: number;
}

/** Build a pending job; behaviour flags the input leaves out come from the variant's policy. */
export function createJob(input: JobInput, now: number = Date.now()): Job {
  return {
    variant: input.variant,
    behaviour: { ...VARIANT_POLICIES[input.variant].behaviour, ...input.behaviour },
    details: input.details === undefined ? undefined : JSON.stringify(input.details),
    threadId: input.threadId,
    interactionId: input.interactionId,
    nextRunTimestamp: input.nextRunTimestamp ?? now,
    failureCount: 0,
  };
}

/** Equivalence key: two jobs with the same variant, linkage and details are the same work. */
export function jobUniqueKey(job: Job): string {
  return createHash('sha256')
    .update(JSON.stringify([job.variant, job.threadId ?? null, job.interactionId ?? null, job.details ?? null]))
    .digest('hex');
}

export type EnqueueResult =
  | { status: 'enqueued'; job: PersistedJob }
  | { status: 'duplicate'; job: PersistedJob }
  | { status: 'alreadyCompleted' };
