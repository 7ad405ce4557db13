import type { Db } from './db.js';
import {
  isExecutionContext,
  isJobVariant,
  type ExecutionContextName,
  type Job,
  type JobVariant,
  type PersistedJob,
} from './jobs.js';

export interface JobRow {
  id: number;
  variant: string;
  context: string;
  run_once_only: number;
  run_on_launch: number;
  recurring: number;
  details: string | null;
  unique_key: string;
  thread_id: string | null;
  interaction_id: number | null;
  next_run_at: number;
  failure_count: number;
  created_at: number;
}

export function rowToJob(row: JobRow): PersistedJob {
  if (!isJobVariant(row.variant)) {
    throw new Error(`job ${row.id} has unknown variant '${row.variant}'`);
  }
  if (!isExecutionContext(row.context)) {
    throw new Error(`job ${row.id} has unknown context '${row.context}'`);
  }
  return {
    id: row.id,
    variant: row.variant,
    context: row.context,
    uniqueKey: row.unique_key,
    behaviour: {
      runOnceOnly: row.run_once_only === 1,
      runOnLaunch: row.run_on_launch === 1,
      recurring: row.recurring === 1,
    },
    details: row.details ?? undefined,
    threadId: row.thread_id ?? undefined,
    interactionId: row.interaction_id ?? undefined,
    nextRunTimestamp: row.next_run_at,
    failureCount: row.failure_count,
  };
}

const flag = (value: boolean): number => (value ? 1 : 0);

/**
 * Durable job queue on top of SQLite. All reads and writes are synchronous,
 * so a claim made between two awaits cannot interleave with another.
 */
export function createJobStore(db: Db) {
  const insertStmt = db.prepare<[string, string, number, number, number, string | null, string, string | null, number | null, number, number, number]>(`
    INSERT INTO jobs (variant, context, run_once_only, run_on_launch, recurring, details, unique_key,
                      thread_id, interaction_id, next_run_at, failure_count, created_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);
  const getStmt = db.prepare<[number], JobRow>('SELECT * FROM jobs WHERE id = ?');
  const equivalentStmt = db.prepare<[string, string, string], JobRow>(
    'SELECT * FROM jobs WHERE context = ? AND variant = ? AND unique_key = ? ORDER BY id LIMIT 1',
  );
  // Launch jobs belong to launch(); afterwards a lane may retry the ones that failed there.
  const nextDueStmt = db.prepare<[string, number, number, string], JobRow>(`
    SELECT * FROM jobs
    WHERE context = ? AND (run_on_launch = 0 OR (? = 1 AND failure_count > 0)) AND next_run_at <= ?
      AND id NOT IN (SELECT value FROM json_each(?))
    ORDER BY next_run_at, id
    LIMIT 1
  `);
  const earliestStmt = db.prepare<[string, number, string], { next_run_at: number | null }>(`
    SELECT MIN(next_run_at) AS next_run_at FROM jobs
    WHERE context = ? AND (run_on_launch = 0 OR (? = 1 AND failure_count > 0))
      AND id NOT IN (SELECT value FROM json_each(?))
  `);
  const launchStmt = db.prepare<[], JobRow>('SELECT * FROM jobs WHERE run_on_launch = 1 ORDER BY id');
  const rescheduleStmt = db.prepare<[number, number, number]>(
    'UPDATE jobs SET next_run_at = ?, failure_count = ? WHERE id = ?',
  );
  const deleteStmt = db.prepare<[number]>('DELETE FROM jobs WHERE id = ?');
  const listStmt = db.prepare<[], JobRow>('SELECT * FROM jobs ORDER BY id');
  const listContextStmt = db.prepare<[string], JobRow>('SELECT * FROM jobs WHERE context = ? ORDER BY id');
  const variantsStmt = db.prepare<[], { variant: string }>('SELECT DISTINCT variant FROM jobs ORDER BY variant');
  const pendingStmt = db.prepare<[string, number], { found: number }>(
    'SELECT 1 AS found FROM jobs WHERE variant = ? AND interaction_id = ? LIMIT 1',
  );
  const completionStmt = db.prepare<[string, string], { found: number }>(
    'SELECT 1 AS found FROM job_completions WHERE variant = ? AND unique_key = ?',
  );
  const recordCompletionStmt = db.prepare<[string, string, number]>(
    'INSERT OR REPLACE INTO job_completions (variant, unique_key, completed_at) VALUES (?, ?, ?)',
  );

  return {
    insert(job: Job, context: ExecutionContextName, uniqueKey: string, now: number): PersistedJob {
      const result = insertStmt.run(
        job.variant,
        context,
        flag(job.behaviour.runOnceOnly),
        flag(job.behaviour.runOnLaunch),
        flag(job.behaviour.recurring),
        job.details ?? null,
        uniqueKey,
        job.threadId ?? null,
        job.interactionId ?? null,
        job.nextRunTimestamp,
        job.failureCount,
        now,
      );
      return { ...job, id: Number(result.lastInsertRowid), context, uniqueKey };
    },

    get(id: number): PersistedJob | undefined {
      const row = getStmt.get(id);
      return row ? rowToJob(row) : undefined;
    },

    findEquivalent(context: ExecutionContextName, variant: JobVariant, uniqueKey: string): PersistedJob | undefined {
      const row = equivalentStmt.get(context, variant, uniqueKey);
      return row ? rowToJob(row) : undefined;
    },

    /**
     * Oldest due job in the context that is not already claimed. Launch jobs are skipped
     * unless `retryLaunchJobs` is set, and then only those that have failed.
     */
    nextDue(
      context: ExecutionContextName,
      now: number,
      claimed: readonly number[],
      retryLaunchJobs = false,
    ): PersistedJob | undefined {
      const row = nextDueStmt.get(context, flag(retryLaunchJobs), now, JSON.stringify(claimed));
      return row ? rowToJob(row) : undefined;
    },

    earliestRunAt(context: ExecutionContextName, claimed: readonly number[], retryLaunchJobs = false): number | undefined {
      return earliestStmt.get(context, flag(retryLaunchJobs), JSON.stringify(claimed))?.next_run_at ?? undefined;
    },

    launchJobs(): PersistedJob[] {
      return launchStmt.all().map(rowToJob);
    },

    reschedule(id: number, nextRunAt: number, failureCount: number): void {
      rescheduleStmt.run(nextRunAt, failureCount, id);
    },

    remove(id: number): void {
      deleteStmt.run(id);
    },

    list(context?: ExecutionContextName): PersistedJob[] {
      const rows = context ? listContextStmt.all(context) : listStmt.all();
      return rows.map(rowToJob);
    },

    /** Raw variant names, including ones this build no longer knows. */
    variants(): string[] {
      return variantsStmt.all().map((row) => row.variant);
    },

    hasPendingJob(variant: JobVariant, interactionId: number): boolean {
      return pendingStmt.get(variant, interactionId) !== undefined;
    },

    hasCompletion(variant: JobVariant, uniqueKey: string): boolean {
      return completionStmt.get(variant, uniqueKey) !== undefined;
    },

    recordCompletion(variant: JobVariant, uniqueKey: string, at: number): void {
      recordCompletionStmt.run(variant, uniqueKey, at);
    },

    transaction<T>(fn: () => T): T {
      return db.transaction(fn)();
    },
  };
}

export type JobStore = ReturnType<typeof createJobStore>;
