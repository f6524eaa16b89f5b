import type { Logger } from 'pino';
import type { ChannelAdapter } from '../channels/channel-adapter.js';
import { Scheduler } from '../cron/scheduler.js';
import type { Job, JobEnvironment, ScheduledRun } from '../cron/types.js';
import type { RootApi } from '../root/client.js';
import type { RollcallConfig } from './types.js';

export interface RollcallBotDeps {
  logger: Logger;
  messaging: ChannelAdapter;
  root: RootApi;
  jobs: Job[];
}

export function formatFailureNotice(run: ScheduledRun): string {
  return `Job "${run.jobName}" failed: ${run.error ?? 'unknown error'}`;
}

/**
 * Owns the messaging connection and the scheduler. Jobs are registered at
 * construction; start() connects first so the scheduler only ever sees a
 * ready environment.
 */
export class RollcallBot {
  private config: RollcallConfig;
  private logger: Logger;
  private messaging: ChannelAdapter;
  private scheduler: Scheduler;
  private env: JobEnvironment;
  private running = false;

  constructor(config: RollcallConfig, deps: RollcallBotDeps) {
    this.config = config;
    this.logger = deps.logger;
    this.messaging = deps.messaging;
    this.scheduler = new Scheduler(deps.logger, config.scheduler);
    this.env = {
      messaging: deps.messaging,
      root: deps.root,
      config,
      logger: deps.logger,
    };

    for (const job of deps.jobs) {
      this.scheduler.register(job);
    }

    const ownerId = config.discord.ownerId;
    if (ownerId) {
      this.scheduler.onFailure(async (_job, run) => {
        await this.messaging.sendDirectMessage(ownerId, formatFailureNotice(run));
      });
    }
  }

  getScheduler(): Scheduler {
    return this.scheduler;
  }

  async start(): Promise<void> {
    if (this.running) {
      throw new Error('[Bot] Already running');
    }

    await this.messaging.connect();
    this.scheduler.start(this.env);
    this.running = true;

    for (const { job, at } of this.scheduler.nextRuns()) {
      this.logger.info({ job, nextRun: at.toISOString(), timeZone: this.config.timeZone }, 'Job scheduled');
    }
  }

  /** Connects if needed, runs one job immediately and returns its outcome. */
  async runOnce(jobName: string): Promise<ScheduledRun> {
    if (!this.messaging.isReady()) {
      await this.messaging.connect();
    }
    return this.scheduler.runNow(jobName, this.env);
  }

  async shutdown(): Promise<void> {
    await this.scheduler.stop();
    await this.messaging.disconnect();
    this.running = false;
  }
}
