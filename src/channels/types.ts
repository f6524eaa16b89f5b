// Rollcall Channels - messaging platform contract used by the report jobs

export type Channel = 'discord';

export type ChannelStatus = 'connected' | 'disconnected' | 'reconnecting' | 'error';

export interface ChannelMessage {
  id: string;
  authorId: string;
  content: string;
  /** Epoch milliseconds. */
  timestamp: number;
}

export interface ReportAuthor {
  name: string;
  iconUrl?: string;
  url?: string;
}

/** A rich report message; rendered as an embed on Discord. */
export interface Report {
  title: string;
  description: string;
  color: number;
  url?: string;
  author?: ReportAuthor;
  timestamp?: Date;
}

export interface BotUser {
  id: string;
  username: string;
  avatarUrl: string;
}

export interface MessagingClient {
  isReady(): boolean;
  sendReport(channelId: string, report: Report): Promise<string>;
  /** Most recent messages first, at most `limit`. */
  fetchRecentMessages(channelId: string, limit: number): Promise<ChannelMessage[]>;
  sendDirectMessage(userId: string, text: string): Promise<string>;
  currentUser(): Promise<BotUser>;
}

export interface DiscordChannelConfig {
  botToken: string;
  /** Forward discord.js debug events to the logger. */
  debugEvents: boolean;
}
