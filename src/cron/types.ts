// Rollcall Scheduling Types

import type { Logger } from 'pino';
import type { MessagingClient } from '../channels/types.js';
import type { RollcallConfig } from '../core/types.js';
import type { RootApi } from '../root/client.js';

/**
 * Handles shared by every job run. Jobs read from it and never mutate it,
 * so concurrently running jobs can share one instance.
 */
export interface JobEnvironment {
  readonly messaging: MessagingClient;
  readonly root: RootApi;
  readonly config: RollcallConfig;
  readonly logger: Logger;
}

export type JobResult = { success: true } | { success: false; error: string };

export interface Job {
  /** Diagnostics only; expected to be unique among registered jobs. */
  readonly name: string;
  /** Evaluated at the start of every cycle, never cached. */
  delayUntilNextRun(now: Date): number;
  /**
   * Performs one run. Faults are returned as a failed result; `signal`
   * aborts when the run times out or the scheduler stops.
   */
  execute(env: JobEnvironment, signal: AbortSignal): Promise<JobResult>;
}

export interface SchedulerConfig {
  jobTimeoutMs: number;
  maxExecutionLogs: number;
}

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  jobTimeoutMs: 10 * 60 * 1000,
  maxExecutionLogs: 100,
};

export interface ScheduledRun {
  jobName: string;
  scheduledFor: number;
  startedAt: number;
  durationMs: number;
  result: 'success' | 'error';
  error?: string;
}
