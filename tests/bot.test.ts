import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { RollcallBot, formatFailureNotice } from '../src/core/bot.js';
import { durationUntil } from '../src/cron/clock.js';
import type { Job, JobEnvironment, JobResult } from '../src/cron/types.js';
import { FakeMessaging, FakeRoot, makeConfig, silentLogger } from './helpers.js';

const HOUR = 60 * 60 * 1000;
const OWNER = '123456789012345678';

type ExecuteFn = (env: JobEnvironment, signal: AbortSignal) => Promise<JobResult>;

function makeJob(name: string, result: JobResult): Job & { execute: Mock<ExecuteFn> } {
  return {
    name,
    delayUntilNextRun: (now: Date) => durationUntil(5, 0, 'Asia/Kolkata', now),
    execute: vi.fn<ExecuteFn>().mockResolvedValue(result),
  };
}

// -------------------------------------------------------
// formatFailureNotice
// -------------------------------------------------------
describe('formatFailureNotice', () => {
  it('should name the job and its error', () => {
    expect(
      formatFailureNotice({
        jobName: 'Lab Attendance Check',
        scheduledFor: 0,
        startedAt: 0,
        durationMs: 12,
        result: 'error',
        error: '[Root] Server responded with status 502',
      }),
    ).toBe('Job "Lab Attendance Check" failed: [Root] Server responded with status 502');
  });
});

// -------------------------------------------------------
// RollcallBot
// -------------------------------------------------------
describe('RollcallBot', () => {
  let messaging: FakeMessaging;
  let root: FakeRoot;
  let bot: RollcallBot;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-10-19T04:00:00+05:30'));
    messaging = new FakeMessaging();
    root = new FakeRoot();
  });

  afterEach(async () => {
    await bot.shutdown();
    vi.useRealTimers();
  });

  it('should connect before starting the scheduler', async () => {
    const job = makeJob('Morning', { success: true });
    bot = new RollcallBot(makeConfig(), { logger: silentLogger, messaging, root, jobs: [job] });

    await bot.start();

    expect(messaging.connectCalls).toBe(1);
    expect(messaging.isReady()).toBe(true);
    expect(bot.getScheduler().isRunning()).toBe(true);
    expect(bot.getScheduler().getJobs()).toEqual([job]);

    await vi.advanceTimersByTimeAsync(HOUR);
    expect(job.execute).toHaveBeenCalledTimes(1);
  });

  it('should refuse to start twice', async () => {
    bot = new RollcallBot(makeConfig(), { logger: silentLogger, messaging, root, jobs: [] });
    await bot.start();
    await expect(bot.start()).rejects.toThrow('[Bot] Already running');
  });

  it('should message the owner when a job fails', async () => {
    const config = makeConfig({ discord: { botToken: 'test-token', ownerId: OWNER } });
    bot = new RollcallBot(config, {
      logger: silentLogger,
      messaging,
      root,
      jobs: [makeJob('Flaky', { success: false, error: 'root down' })],
    });

    await bot.start();
    await vi.advanceTimersByTimeAsync(HOUR);

    expect(messaging.directMessages).toEqual([{ userId: OWNER, text: 'Job "Flaky" failed: root down' }]);
  });

  it('should not message anyone when no owner is configured', async () => {
    bot = new RollcallBot(makeConfig(), {
      logger: silentLogger,
      messaging,
      root,
      jobs: [makeJob('Flaky', { success: false, error: 'root down' })],
    });

    await bot.start();
    await vi.advanceTimersByTimeAsync(HOUR);

    expect(messaging.directMessages).toEqual([]);
  });

  it('should run one job on demand, connecting first', async () => {
    const job = makeJob('Morning', { success: true });
    bot = new RollcallBot(makeConfig(), { logger: silentLogger, messaging, root, jobs: [job] });

    const run = await bot.runOnce('Morning');

    expect(messaging.connectCalls).toBe(1);
    expect(run.jobName).toBe('Morning');
    expect(run.result).toBe('success');
    expect(bot.getScheduler().isRunning()).toBe(false);
  });

  it('should stop the scheduler and disconnect on shutdown', async () => {
    const job = makeJob('Morning', { success: true });
    bot = new RollcallBot(makeConfig(), { logger: silentLogger, messaging, root, jobs: [job] });
    await bot.start();

    await bot.shutdown();
    await vi.advanceTimersByTimeAsync(24 * HOUR);

    expect(messaging.getStatus()).toBe('disconnected');
    expect(bot.getScheduler().isRunning()).toBe(false);
    expect(job.execute).not.toHaveBeenCalled();
  });
});
