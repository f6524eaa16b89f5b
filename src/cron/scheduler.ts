// Rollcall Scheduler - one independent daily loop per registered job

import type { Logger } from 'pino';
import type {
  Job,
  JobEnvironment,
  JobResult,
  ScheduledRun,
  SchedulerConfig,
} from './types.js';
import { DEFAULT_SCHEDULER_CONFIG } from './types.js';

export type FailureHandler = (job: Job, run: ScheduledRun) => Promise<void>;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Resolves true once `ms` has elapsed, false if `signal` aborts first. */
function sleep(ms: number, signal: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve(false);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

export class Scheduler {
  private config: SchedulerConfig;
  private logger: Logger;
  private jobs: Job[] = [];
  private loops: Promise<void>[] = [];
  private controller: AbortController | null = null;
  private failureHandler: FailureHandler | null = null;
  private executionLogs: ScheduledRun[] = [];
  /** Settles when the job's last `execute()` settles, even after a timeout. */
  private inFlight = new Map<Job, Promise<void>>();

  constructor(logger: Logger, config: Partial<SchedulerConfig> = {}) {
    this.config = { ...DEFAULT_SCHEDULER_CONFIG, ...config };
    this.logger = logger.child({ component: 'scheduler' });
  }

  register(job: Job): void {
    if (this.controller) {
      throw new Error('Scheduler already started. Register jobs before start().');
    }
    this.jobs.push(job);
    this.logger.debug({ job: job.name }, 'Registered job');
  }

  /**
   * Set the handler called after a failed run, e.g. to alert the bot owner.
   * Its own errors are logged and never reach the job loop.
   */
  onFailure(handler: FailureHandler): void {
    this.failureHandler = handler;
  }

  isRunning(): boolean {
    return this.controller !== null;
  }

  /**
   * Start one loop per registered job. Returns immediately; the loops run
   * until stop().
   */
  start(env: JobEnvironment): void {
    if (this.controller) {
      throw new Error('Scheduler already started');
    }
    if (!env.messaging.isReady()) {
      throw new Error('Messaging client is not ready. Connect it before starting the scheduler.');
    }

    const controller = new AbortController();
    this.controller = controller;
    this.loops = this.jobs.map((job) => this.runLoop(job, env, controller.signal));
    this.logger.info({ jobs: this.jobs.map((job) => job.name) }, 'Scheduler started');
  }

  async stop(): Promise<void> {
    if (!this.controller) return;
    this.controller.abort();
    await Promise.all(this.loops);
    this.loops = [];
    this.controller = null;
    this.logger.info('Scheduler stopped');
  }

  /** Execute a job once, outside its cadence, with the same bookkeeping. */
  async runNow(name: string, env: JobEnvironment): Promise<ScheduledRun> {
    const job = this.jobs.find((candidate) => candidate.name === name);
    if (!job) {
      throw new Error(`Unknown job "${name}". Registered: ${this.jobs.map((j) => j.name).join(', ')}`);
    }
    if (!env.messaging.isReady()) {
      throw new Error('Messaging client is not ready. Connect it before running a job.');
    }
    if (this.inFlight.has(job)) {
      throw new Error(`Job "${name}" is still running`);
    }
    return this.executeJob(job, env, Date.now(), new AbortController().signal);
  }

  getJobs(): Job[] {
    return [...this.jobs];
  }

  /** Next due instant of every registered job, as seen from `now`. */
  nextRuns(now: Date = new Date()): { job: string; at: Date }[] {
    return this.jobs.map((job) => ({
      job: job.name,
      at: new Date(now.getTime() + job.delayUntilNextRun(now)),
    }));
  }

  getExecutionLogs(): ScheduledRun[] {
    return [...this.executionLogs];
  }

  private async runLoop(job: Job, env: JobEnvironment, signal: AbortSignal): Promise<void> {
    const log = this.logger.child({ job: job.name });

    while (!signal.aborted) {
      let delay: number;
      try {
        delay = job.delayUntilNextRun(new Date());
      } catch (err) {
        log.error({ error: errorMessage(err) }, 'Cannot compute next run; job disabled');
        return;
      }

      const scheduledFor = Date.now() + delay;
      log.debug({ delayMs: delay, scheduledFor: new Date(scheduledFor).toISOString() }, 'Waiting for next run');

      const due = await sleep(delay, signal);
      if (!due) break;

      if (this.inFlight.has(job)) {
        // A timed-out run that ignored its signal is still going; never overlap it.
        await this.finishRun(job, scheduledFor, Date.now(), {
          success: false,
          error: 'Skipped: previous run is still in flight',
        });
        continue;
      }

      await this.executeJob(job, env, scheduledFor, signal);
    }

    log.debug('Job loop exited');
  }

  private async executeJob(
    job: Job,
    env: JobEnvironment,
    scheduledFor: number,
    parentSignal: AbortSignal,
  ): Promise<ScheduledRun> {
    const log = this.logger.child({ job: job.name });
    const startTime = Date.now();
    const timeoutMs = this.config.jobTimeoutMs;

    const controller = new AbortController();
    const onParentAbort = () => controller.abort(parentSignal.reason);
    parentSignal.addEventListener('abort', onParentAbort, { once: true });

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<JobResult>((resolve) => {
      timer = setTimeout(() => {
        controller.abort(new Error(`Job timed out after ${timeoutMs}ms`));
        resolve({ success: false, error: `Timed out after ${timeoutMs}ms` });
      }, timeoutMs);
    });

    log.info('Running job');
    let result: JobResult;
    try {
      const execution = job.execute(env, controller.signal);
      this.inFlight.set(
        job,
        execution.then(
          () => this.inFlight.delete(job),
          () => this.inFlight.delete(job),
        ).then(() => undefined),
      );
      result = await Promise.race([execution, timeout]);
    } catch (err) {
      result = { success: false, error: errorMessage(err) };
    } finally {
      clearTimeout(timer);
      parentSignal.removeEventListener('abort', onParentAbort);
    }

    return this.finishRun(job, scheduledFor, startTime, result);
  }

  private async finishRun(
    job: Job,
    scheduledFor: number,
    startTime: number,
    result: JobResult,
  ): Promise<ScheduledRun> {
    const log = this.logger.child({ job: job.name });
    const run: ScheduledRun = {
      jobName: job.name,
      scheduledFor,
      startedAt: startTime,
      durationMs: Date.now() - startTime,
      result: result.success ? 'success' : 'error',
      error: result.success ? undefined : result.error,
    };
    this.record(run);

    if (result.success) {
      log.info({ durationMs: run.durationMs }, 'Job completed');
      return run;
    }

    log.error({ durationMs: run.durationMs, error: result.error }, 'Job failed');
    if (this.failureHandler) {
      try {
        await this.failureHandler(job, run);
      } catch (err) {
        log.error({ error: errorMessage(err) }, 'Failure handler threw');
      }
    }
    return run;
  }

  private record(run: ScheduledRun): void {
    this.executionLogs.push(run);
    if (this.executionLogs.length > this.config.maxExecutionLogs) {
      this.executionLogs.splice(0, this.executionLogs.length - this.config.maxExecutionLogs);
    }
  }
}
