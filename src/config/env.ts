// Rollcall Config Loader - defaults, then the JSON config file, then the environment

import { readFileSync } from 'node:fs';
import { defaultConfig } from './default-config.js';
import {
  formatIssues,
  rollcallFileConfigSchema,
  validateConfig,
  type ConfigValidation,
  type FileConfig,
} from './schema.js';

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

/** Keeps unrecognised values as strings so validation reports them. */
function parseBoolean(value: string): boolean | string {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
}

function readConfigFile(path: string): { file?: FileConfig; errors?: string[] } {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    return { errors: [`Failed to read config file ${path}: ${err instanceof Error ? err.message : String(err)}`] };
  }

  const parsed = rollcallFileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    return { errors: formatIssues(parsed.error) };
  }
  return { file: parsed.data };
}

export function loadConfig(options: LoadConfigOptions = {}): ConfigValidation {
  const env = options.env ?? process.env;

  let file: FileConfig = {};
  if (options.configPath) {
    const result = readConfigFile(options.configPath);
    if (!result.file) {
      return { success: false, errors: result.errors };
    }
    file = result.file;
  }

  // Schedule times merge field by field, so `{ "runAt": { "hour": 6 } }` keeps the default minute.
  const statusUpdateDefaults = defaultConfig.jobs.statusUpdate;
  const statusUpdateFile = file.jobs?.statusUpdate;
  const labAttendanceDefaults = defaultConfig.jobs.labAttendance;
  const labAttendanceFile = file.jobs?.labAttendance;

  const merged = {
    timeZone: env.TIMEZONE ?? file.timeZone ?? defaultConfig.timeZone,
    discord: {
      ...defaultConfig.discord,
      ...file.discord,
      ...(env.DISCORD_TOKEN ? { botToken: env.DISCORD_TOKEN } : {}),
      ...(env.OWNER_ID ? { ownerId: env.OWNER_ID } : {}),
    },
    root: {
      ...defaultConfig.root,
      ...file.root,
      ...(env.ROOT_URL ? { url: env.ROOT_URL } : {}),
    },
    logging: {
      ...defaultConfig.logging,
      ...file.logging,
      ...(env.ROLLCALL_ENV ? { environment: env.ROLLCALL_ENV } : {}),
      ...(env.ENABLE_DEBUG_LIBRARIES
        ? { enableDebugLibraries: parseBoolean(env.ENABLE_DEBUG_LIBRARIES) }
        : {}),
      ...(env.LOG_FILE ? { logFile: env.LOG_FILE } : {}),
    },
    scheduler: { ...defaultConfig.scheduler, ...file.scheduler },
    jobs: {
      statusUpdate: {
        ...statusUpdateDefaults,
        ...statusUpdateFile,
        runAt: { ...statusUpdateDefaults.runAt, ...statusUpdateFile?.runAt },
        windowStart: { ...statusUpdateDefaults.windowStart, ...statusUpdateFile?.windowStart },
      },
      labAttendance: {
        ...labAttendanceDefaults,
        ...labAttendanceFile,
        runAt: { ...labAttendanceDefaults.runAt, ...labAttendanceFile?.runAt },
        lateAfter: { ...labAttendanceDefaults.lateAfter, ...labAttendanceFile?.lateAfter },
      },
    },
  };

  return validateConfig(merged);
}
