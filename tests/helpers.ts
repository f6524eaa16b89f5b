import { pino } from 'pino';
import { ChannelAdapter } from '../src/channels/channel-adapter.js';
import type {
  BotUser,
  Channel,
  ChannelMessage,
  Report,
} from '../src/channels/types.js';
import { defaultConfig } from '../src/config/default-config.js';
import type { RollcallConfig } from '../src/core/types.js';
import type { JobEnvironment } from '../src/cron/types.js';
import type { RootApi } from '../src/root/client.js';
import type {
  AttendanceRecord,
  Member,
  Streak,
  StreakWithMemberId,
} from '../src/root/models.js';

export const silentLogger = pino({ level: 'silent' });

export class FakeMessaging extends ChannelAdapter {
  public readonly channel: Channel = 'discord';
  public channelMessages = new Map<string, ChannelMessage[]>();
  public sentReports: { channelId: string; report: Report }[] = [];
  public directMessages: { userId: string; text: string }[] = [];
  public connectCalls = 0;
  public bot: BotUser = {
    id: '900000000000000001',
    username: 'rollcall-bot',
    avatarUrl: 'https://cdn.example.test/avatar.png',
  };

  async connect(): Promise<void> {
    this.connectCalls += 1;
    this.setStatus('connected');
  }

  async disconnect(): Promise<void> {
    this.setStatus('disconnected');
  }

  async sendReport(channelId: string, report: Report): Promise<string> {
    this.sentReports.push({ channelId, report });
    return `report_${this.sentReports.length}`;
  }

  async fetchRecentMessages(channelId: string, limit: number): Promise<ChannelMessage[]> {
    return (this.channelMessages.get(channelId) ?? []).slice(0, limit);
  }

  async sendDirectMessage(userId: string, text: string): Promise<string> {
    this.directMessages.push({ userId, text });
    return `dm_${this.directMessages.length}`;
  }

  async currentUser(): Promise<BotUser> {
    return this.bot;
  }
}

/**
 * In-memory Root. Incrementing raises the current streak (from at least 0)
 * and the max; resetting drops a positive streak to 0 and a non-positive
 * one by a further 1.
 */
export class FakeRoot implements RootApi {
  public members: Member[] = [];
  public streaks = new Map<number, Streak>();
  public attendance: AttendanceRecord[] = [];
  public calls: string[] = [];
  public failure: Error | null = null;

  async fetchMembers(): Promise<Member[]> {
    this.record('fetchMembers');
    return this.members;
  }

  async fetchStreaks(): Promise<StreakWithMemberId[]> {
    this.record('fetchStreaks');
    return [...this.streaks].map(([memberId, streak]) => ({ memberId, ...streak }));
  }

  async incrementStreak(memberId: number): Promise<Streak> {
    this.record(`incrementStreak:${memberId}`);
    const previous = this.streaks.get(memberId) ?? { currentStreak: 0, maxStreak: 0 };
    const currentStreak = Math.max(previous.currentStreak, 0) + 1;
    const streak = { currentStreak, maxStreak: Math.max(previous.maxStreak, currentStreak) };
    this.streaks.set(memberId, streak);
    return streak;
  }

  async resetStreak(memberId: number): Promise<Streak> {
    this.record(`resetStreak:${memberId}`);
    const previous = this.streaks.get(memberId) ?? { currentStreak: 0, maxStreak: 0 };
    const currentStreak = previous.currentStreak > 0 ? 0 : previous.currentStreak - 1;
    const streak = { currentStreak, maxStreak: previous.maxStreak };
    this.streaks.set(memberId, streak);
    return streak;
  }

  async fetchAttendance(date: string): Promise<AttendanceRecord[]> {
    this.record(`fetchAttendance:${date}`);
    return this.attendance;
  }

  private record(call: string): void {
    this.calls.push(call);
    if (this.failure) {
      throw this.failure;
    }
  }
}

export function makeConfig(overrides: Partial<RollcallConfig> = {}): RollcallConfig {
  return { ...defaultConfig, ...overrides };
}

export async function makeEnv(
  messaging: FakeMessaging = new FakeMessaging(),
  root: FakeRoot = new FakeRoot(),
): Promise<JobEnvironment & { messaging: FakeMessaging; root: FakeRoot }> {
  await messaging.connect();
  return { messaging, root, config: defaultConfig, logger: silentLogger };
}
