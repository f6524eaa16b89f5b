// Rollcall Lab Attendance Check - evening presence report for the lab channel

import { formatReportDate, localDate, parseTimeOfDay } from '../cron/clock.js';
import { DailyJob } from '../cron/daily-job.js';
import type { JobEnvironment } from '../cron/types.js';
import type { LabAttendanceConfig } from '../core/types.js';
import type { Report, ReportAuthor } from '../channels/types.js';
import type { AttendanceRecord } from '../root/models.js';

export const ATTENDANCE_COLORS = {
  darkGreen: 0x1f8b4c,
  gold: 0xf1c40f,
  red: 0xe74c3c,
} as const;

const REPORTED_YEARS = [1, 2, 3];

export interface AttendanceSummary {
  absent: AttendanceRecord[];
  late: AttendanceRecord[];
  /** Present members whose `timeIn` could not be read. */
  unreadable: AttendanceRecord[];
}

export function classifyAttendance(
  records: AttendanceRecord[],
  lateAfterSeconds: number,
): AttendanceSummary {
  const summary: AttendanceSummary = { absent: [], late: [], unreadable: [] };

  for (const record of records) {
    if (!record.isPresent || record.timeIn === null) {
      summary.absent.push(record);
      continue;
    }
    const arrival = parseTimeOfDay(record.timeIn);
    if (arrival === null) {
      summary.unreadable.push(record);
    } else if (arrival > lateAfterSeconds) {
      summary.late.push(record);
    }
  }

  return summary;
}

export function attendanceColor(percentage: number): number {
  if (percentage > 75) return ATTENDANCE_COLORS.darkGreen;
  if (percentage > 50) return ATTENDANCE_COLORS.gold;
  return ATTENDANCE_COLORS.red;
}

export function formatAttendanceList(title: string, records: AttendanceRecord[]): string {
  if (records.length === 0) {
    return `**${title}**\nNo one is ${title.toLowerCase()} today! 🎉\n\n`;
  }

  let result = `# ${title}\n`;
  for (const year of REPORTED_YEARS) {
    const names = records.filter((record) => record.year === year).map((record) => record.name);
    if (names.length === 0) continue;

    result += `### Year ${year}\n`;
    for (const name of names) {
      result += `- ${name}\n`;
    }
    result += '\n';
  }
  return result;
}

export function buildAttendanceReport(
  summary: AttendanceSummary,
  total: number,
  author: ReportAuthor,
  now: Date,
  timeZone: string,
): Report {
  const present = total - summary.absent.length;
  const percentage = total > 0 ? (present / total) * 100 : 0;

  let description =
    `# Stats\n- Present: ${present} (${Math.round(percentage)}%)\n` +
    `- Absent: ${summary.absent.length}\n- Late: ${summary.late.length}\n\n`;
  description += formatAttendanceList('Absent', summary.absent);
  description += formatAttendanceList('Late', summary.late);

  return {
    title: `Presence Report - ${formatReportDate(now, timeZone)}`,
    description,
    color: attendanceColor(percentage),
    author,
    timestamp: now,
  };
}

export function buildLabClosedReport(author: ReportAuthor, now: Date, timeZone: string): Report {
  return {
    title: `Presence Report - ${formatReportDate(now, timeZone)}`,
    description: 'Uh-oh, seems like the lab is closed today! 🏖️ Everyone is absent!',
    color: ATTENDANCE_COLORS.red,
    author,
    timestamp: now,
  };
}

export class LabAttendanceCheck extends DailyJob {
  public readonly name = 'Lab Attendance Check';
  private settings: LabAttendanceConfig;

  constructor(settings: LabAttendanceConfig, timeZone: string) {
    super(settings.runAt, timeZone);
    this.settings = settings;
  }

  protected async run(env: JobEnvironment, signal: AbortSignal): Promise<void> {
    const log = env.logger.child({ job: this.name });
    const now = new Date();
    const date = localDate(now, this.timeZone);

    const records = await env.root.fetchAttendance(date, signal);
    const { lateAfter } = this.settings;
    const summary = classifyAttendance(records, lateAfter.hour * 3600 + lateAfter.minute * 60);
    for (const record of summary.unreadable) {
      log.warn({ member: record.name, timeIn: record.timeIn }, 'Unreadable arrival time');
    }

    const bot = await env.messaging.currentUser();
    const author: ReportAuthor = { name: bot.username, iconUrl: bot.avatarUrl };
    const report =
      summary.absent.length === records.length
        ? buildLabClosedReport(author, now, this.timeZone)
        : buildAttendanceReport(summary, records.length, author, now, this.timeZone);

    signal.throwIfAborted();
    await env.messaging.sendReport(this.settings.reportChannelId, report);
    log.info(
      { date, total: records.length, absent: summary.absent.length, late: summary.late.length },
      'Attendance report sent',
    );
  }
}
