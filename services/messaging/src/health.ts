import { features } from '@relaypost/shared';
import type { JobRunner, LaneStatus } from './runner.js';

export interface HealthReport {
  status: 'healthy' | 'unhealthy';
  uptimeMs: number;
  lanes: Record<string, LaneStatus>;
  flags: Record<string, boolean>;
}

/** Healthy once launched: every lane is running. */
export function healthReport(runner: JobRunner, startedAt: number, now: number = Date.now()): HealthReport {
  const lanes = runner.status();
  const healthy = Object.values(lanes).every((lane) => lane.running);
  return {
    status: healthy ? 'healthy' : 'unhealthy',
    uptimeMs: now - startedAt,
    lanes,
    flags: features.allFlags(),
  };
}
