#!/usr/bin/env node

import * as dotenv from 'dotenv';
import { Command } from 'commander';
import { DiscordAdapter } from './channels/discord/discord-adapter.js';
import { loadConfig } from './config/env.js';
import { defaultConfig } from './config/default-config.js';
import { checkRuntimeSettings } from './config/schema.js';
import { RollcallBot } from './core/bot.js';
import type { RollcallConfig } from './core/types.js';
import { createJobs } from './jobs/index.js';
import { RootClient } from './root/client.js';
import { createLogger } from './utils/logger.js';

dotenv.config();

function exitWithErrors(heading: string, errors: string[]): never {
  console.error(heading);
  for (const err of errors) {
    console.error(`  - ${err}`);
  }
  process.exit(1);
}

function resolveConfig(configPath: string | undefined, requireRuntime: boolean): RollcallConfig {
  const validation = loadConfig({ configPath });
  if (!validation.data) {
    exitWithErrors('Invalid configuration:', validation.errors ?? []);
  }
  if (requireRuntime) {
    const missing = checkRuntimeSettings(validation.data);
    if (missing.length > 0) {
      exitWithErrors('Incomplete configuration:', missing);
    }
  }
  return validation.data;
}

function createBot(config: RollcallConfig): RollcallBot {
  const logger = createLogger(config.logging);
  const messaging = new DiscordAdapter(
    { botToken: config.discord.botToken, debugEvents: config.logging.enableDebugLibraries },
    logger,
  );
  const root = new RootClient(config.root, logger);
  return new RollcallBot(config, { logger, messaging, root, jobs: createJobs(config) });
}

const program = new Command();

program
  .name('rollcall')
  .description('Daily status-update and lab attendance reports for Discord')
  .version('1.0.0');

program
  .command('start')
  .description('Connect to Discord and run the daily jobs until stopped')
  .option('-c, --config <path>', 'Path to configuration file')
  .action(async (options: { config?: string }) => {
    const config = resolveConfig(options.config, true);
    const bot = createBot(config);

    try {
      await bot.start();
    } catch (err) {
      console.error(`Failed to start Rollcall: ${err instanceof Error ? err.message : err}`);
      process.exit(1);
    }
    console.log('Rollcall started successfully.');

    // Graceful shutdown
    const shutdown = (signal: string) => {
      console.log(`\n${signal} received. Shutting down Rollcall...`);
      bot.shutdown().then(
        () => process.exit(0),
        (err: unknown) => {
          console.error(`Shutdown failed: ${err instanceof Error ? err.message : err}`);
          process.exit(1);
        },
      );
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
  });

program
  .command('jobs')
  .description('List the configured jobs and when each runs next')
  .option('-c, --config <path>', 'Path to configuration file')
  .action((options: { config?: string }) => {
    const config = resolveConfig(options.config, false);
    const jobs = createJobs(config);
    if (jobs.length === 0) {
      console.log('No jobs enabled.');
      return;
    }

    const now = new Date();
    for (const job of jobs) {
      const at = new Date(now.getTime() + job.delayUntilNextRun(now));
      console.log(`${job.name}: next run ${at.toISOString()} (${config.timeZone})`);
    }
  });

program
  .command('run')
  .description('Run one job immediately and exit')
  .argument('<job>', 'Job name, e.g. "Lab Attendance Check"')
  .option('-c, --config <path>', 'Path to configuration file')
  .action(async (jobName: string, options: { config?: string }) => {
    const config = resolveConfig(options.config, true);
    const bot = createBot(config);

    let failed = true;
    try {
      const run = await bot.runOnce(jobName);
      failed = run.result === 'error';
      console.log(failed ? `${jobName} failed: ${run.error}` : `${jobName} completed in ${run.durationMs}ms`);
    } catch (err) {
      console.error(`Failed to run ${jobName}: ${err instanceof Error ? err.message : err}`);
    } finally {
      await bot.shutdown();
    }
    process.exit(failed ? 1 : 0);
  });

program
  .command('config')
  .description('Show or validate configuration')
  .option('-v, --validate <path>', 'Validate a configuration file')
  .option('-s, --show', 'Show the default configuration')
  .action((options: { validate?: string; show?: boolean }) => {
    if (options.validate) {
      const result = loadConfig({ configPath: options.validate });
      if (result.success) {
        console.log('Configuration is valid.');
      } else {
        exitWithErrors('Configuration validation failed:', result.errors ?? []);
      }
    } else if (options.show) {
      console.log(JSON.stringify(defaultConfig, null, 2));
    } else {
      console.log('Use --show to display default config or --validate <path> to validate a config file.');
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
