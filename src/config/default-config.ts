import type { RollcallConfig } from '../core/types.js';
import { DEFAULT_SCHEDULER_CONFIG } from '../cron/types.js';

export const DEFAULT_TIME_ZONE = 'Asia/Kolkata';

export const DEFAULT_STATUS_UPDATE_KEYWORDS: string[] = ['namah shivaya', 'regards'];

export const DEFAULT_STATUS_UPDATE_CONFIG: RollcallConfig['jobs']['statusUpdate'] = {
  enabled: true,
  runAt: { hour: 5, minute: 0 },
  windowStart: { hour: 20, minute: 0 },
  groupChannelIds: [],
  reportChannelId: '',
  messageLimit: 100,
  keywords: DEFAULT_STATUS_UPDATE_KEYWORDS,
  specialAuthors: [],
};

export const DEFAULT_LAB_ATTENDANCE_CONFIG: RollcallConfig['jobs']['labAttendance'] = {
  enabled: true,
  runAt: { hour: 18, minute: 0 },
  lateAfter: { hour: 17, minute: 45 },
  reportChannelId: '',
};

export const defaultConfig: RollcallConfig = {
  timeZone: DEFAULT_TIME_ZONE,

  discord: {
    botToken: '',
  },

  root: {
    url: '',
    timeoutMs: 30_000,
  },

  logging: {
    environment: 'development',
    enableDebugLibraries: false,
    logFile: 'rollcall.log',
  },

  scheduler: DEFAULT_SCHEDULER_CONFIG,

  jobs: {
    statusUpdate: DEFAULT_STATUS_UPDATE_CONFIG,
    labAttendance: DEFAULT_LAB_ATTENDANCE_CONFIG,
  },
};
