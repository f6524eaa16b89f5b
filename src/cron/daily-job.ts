// Rollcall Daily Job - abstract base for jobs that run once a day at a fixed local time

import { durationUntil } from './clock.js';
import type { ScheduleTime } from '../core/types.js';
import type { Job, JobEnvironment, JobResult } from './types.js';

export abstract class DailyJob implements Job {
  public abstract readonly name: string;
  protected readonly runAt: ScheduleTime;
  protected readonly timeZone: string;

  constructor(runAt: ScheduleTime, timeZone: string) {
    this.runAt = runAt;
    this.timeZone = timeZone;
  }

  delayUntilNextRun(now: Date): number {
    return durationUntil(this.runAt.hour, this.runAt.minute, this.timeZone, now);
  }

  async execute(env: JobEnvironment, signal: AbortSignal): Promise<JobResult> {
    try {
      await this.run(env, signal);
      return { success: true };
    } catch (err) {
      return { success: false, error: err instanceof Error ? err.message : String(err) };
    }
  }

  protected abstract run(env: JobEnvironment, signal: AbortSignal): Promise<void>;
}
