// Rollcall Status Update Check - daily streak accounting and defaulter report

import { mostRecentOccurrence } from '../cron/clock.js';
import { DailyJob } from '../cron/daily-job.js';
import type { JobEnvironment } from '../cron/types.js';
import type { StatusUpdateConfig } from '../core/types.js';
import type { ChannelMessage, MessagingClient, Report } from '../channels/types.js';
import type { Member, StreakWithMemberId } from '../root/models.js';

export const STATUS_REPORT_COLOR = 0xeab308;

/** Authors listed as special only need to sign off. */
const SIGN_OFF = 'regards';

export interface StatusUpdateRules {
  keywords: string[];
  specialAuthors: string[];
}

export interface Defaulter {
  name: string;
  mark: string;
}

export interface StreakLeaders {
  value: number;
  members: Member[];
}

export function isValidStatusUpdate(
  message: ChannelMessage,
  rules: StatusUpdateRules,
  windowStart: Date,
  windowEnd: Date,
): boolean {
  if (message.timestamp < windowStart.getTime() || message.timestamp >= windowEnd.getTime()) {
    return false;
  }

  const content = message.content.toLowerCase();
  const hasKeywords = rules.keywords.every((keyword) => content.includes(keyword.toLowerCase()));
  const isSpecialSignOff = rules.specialAuthors.includes(message.authorId) && content.includes(SIGN_OFF);
  return hasKeywords || isSpecialSignOff;
}

/** Splits members into those who posted an update and defaulters keyed by group. */
export function categorizeMembers(
  members: Member[],
  updates: ChannelMessage[],
): { nice: Member[]; defaulters: Map<number, Member[]> } {
  const authors = new Set(updates.map((update) => update.authorId));
  const nice: Member[] = [];
  const defaulters = new Map<number, Member[]>();

  for (const member of members) {
    if (authors.has(member.discordId)) {
      nice.push(member);
      continue;
    }
    const group = defaulters.get(member.groupId) ?? [];
    group.push(member);
    defaulters.set(member.groupId, group);
  }

  return { nice, defaulters };
}

export function defaulterMark(currentStreak: number): string {
  switch (currentStreak) {
    case 0:
      return ':x:';
    case -1:
      return ':x::x:';
    default:
      return ':headstone:';
  }
}

/** Highest streak among known members; ties are all returned. */
export function findHighestStreak(
  streaks: StreakWithMemberId[],
  members: Map<number, Member>,
  field: 'maxStreak' | 'currentStreak',
): StreakLeaders {
  let value = 0;
  let leaders: Member[] = [];

  for (const streak of streaks) {
    const member = members.get(streak.memberId);
    if (!member) continue;

    if (streak[field] > value) {
      value = streak[field];
      leaders = [member];
    } else if (streak[field] === value) {
      leaders.push(member);
    }
  }

  return { value, members: leaders };
}

function formatMembers(members: Member[]): string {
  return members.map((member) => `- ${member.name}\n`).join('');
}

export function buildStatusReport(
  allTime: StreakLeaders,
  current: StreakLeaders,
  defaulters: Map<number, Defaulter[]>,
  now: Date,
): Report {
  let description = '# Leaderboard Updates\n';
  description += `## All-Time High Streak: ${allTime.value} days\n`;
  description += formatMembers(allTime.members);
  description += `## Current Highest Streak: ${current.value} days\n`;
  description += formatMembers(current.members);

  if (defaulters.size > 0) {
    description += '# Defaulters\n';
    const groups = [...defaulters.keys()].sort((a, b) => a - b);
    for (const group of groups) {
      description += `## Group ${group}\n`;
      for (const defaulter of defaulters.get(group) ?? []) {
        description += `- ${defaulter.name} | ${defaulter.mark}\n`;
      }
    }
  }

  return {
    title: 'Status Update Report',
    description,
    color: STATUS_REPORT_COLOR,
    timestamp: now,
  };
}

export class StatusUpdateCheck extends DailyJob {
  public readonly name = 'Status Update Check';
  private settings: StatusUpdateConfig;

  constructor(settings: StatusUpdateConfig, timeZone: string) {
    super(settings.runAt, timeZone);
    this.settings = settings;
  }

  protected async run(env: JobEnvironment, signal: AbortSignal): Promise<void> {
    const log = env.logger.child({ job: this.name });
    const now = new Date();
    const { windowStart } = this.settings;
    const since = mostRecentOccurrence(windowStart.hour, windowStart.minute, this.timeZone, now);

    const updates = await this.collectUpdates(env.messaging, since, now);
    log.debug({ updates: updates.length, since: since.toISOString() }, 'Collected status updates');
    signal.throwIfAborted();

    const members = await env.root.fetchMembers(signal);
    const { nice, defaulters } = categorizeMembers(members, updates);

    for (const member of nice) {
      await env.root.incrementStreak(member.memberId, signal);
    }

    const marked = new Map<number, Defaulter[]>();
    for (const [group, groupMembers] of defaulters) {
      const entries: Defaulter[] = [];
      for (const member of groupMembers) {
        const streak = await env.root.resetStreak(member.memberId, signal);
        entries.push({ name: member.name, mark: defaulterMark(streak.currentStreak) });
      }
      marked.set(group, entries);
    }

    const streaks = await env.root.fetchStreaks(signal);
    const byId = new Map(members.map((member) => [member.memberId, member]));
    const report = buildStatusReport(
      findHighestStreak(streaks, byId, 'maxStreak'),
      findHighestStreak(streaks, byId, 'currentStreak'),
      marked,
      now,
    );

    signal.throwIfAborted();
    await env.messaging.sendReport(this.settings.reportChannelId, report);
    log.info(
      { updated: nice.length, defaulters: members.length - nice.length },
      'Status update report sent',
    );
  }

  private async collectUpdates(
    messaging: MessagingClient,
    since: Date,
    until: Date,
  ): Promise<ChannelMessage[]> {
    const rules: StatusUpdateRules = {
      keywords: this.settings.keywords,
      specialAuthors: this.settings.specialAuthors,
    };
    const updates: ChannelMessage[] = [];

    for (const channelId of this.settings.groupChannelIds) {
      const messages = await messaging.fetchRecentMessages(channelId, this.settings.messageLimit);
      updates.push(...messages.filter((message) => isValidStatusUpdate(message, rules, since, until)));
    }
    return updates;
  }
}
