// Rollcall Core Type System

import type { ValidatedConfig } from '../config/schema.js';

export type RollcallConfig = ValidatedConfig;

export type DiscordConfig = RollcallConfig['discord'];
export type RootConfig = RollcallConfig['root'];
export type LoggingConfig = RollcallConfig['logging'];
export type StatusUpdateConfig = RollcallConfig['jobs']['statusUpdate'];
export type LabAttendanceConfig = RollcallConfig['jobs']['labAttendance'];

/** A local time-of-day in the organisation's time zone. */
export interface ScheduleTime {
  hour: number;
  minute: number;
}
