import type { RollcallConfig } from '../core/types.js';
import type { Job } from '../cron/types.js';
import { LabAttendanceCheck } from './lab-attendance.js';
import { StatusUpdateCheck } from './status-update.js';

/** The jobs a bot with this config runs, in registration order. */
export function createJobs(config: RollcallConfig): Job[] {
  const jobs: Job[] = [];
  const { statusUpdate, labAttendance } = config.jobs;

  if (statusUpdate.enabled) {
    jobs.push(new StatusUpdateCheck(statusUpdate, config.timeZone));
  }
  if (labAttendance.enabled) {
    jobs.push(new LabAttendanceCheck(labAttendance, config.timeZone));
  }
  return jobs;
}

export { StatusUpdateCheck } from './status-update.js';
export { LabAttendanceCheck } from './lab-attendance.js';
