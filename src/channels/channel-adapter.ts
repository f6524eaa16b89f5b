// Rollcall Channel Adapter - abstract base for messaging platform connections

import { EventEmitter } from 'node:events';
import type {
  BotUser,
  Channel,
  ChannelMessage,
  ChannelStatus,
  MessagingClient,
  Report,
} from './types.js';

export abstract class ChannelAdapter extends EventEmitter implements MessagingClient {
  protected status: ChannelStatus = 'disconnected';
  public abstract readonly channel: Channel;

  abstract connect(): Promise<void>;
  abstract disconnect(): Promise<void>;
  abstract sendReport(channelId: string, report: Report): Promise<string>;
  abstract fetchRecentMessages(channelId: string, limit: number): Promise<ChannelMessage[]>;
  abstract sendDirectMessage(userId: string, text: string): Promise<string>;
  abstract currentUser(): Promise<BotUser>;

  getStatus(): ChannelStatus {
    return this.status;
  }

  isReady(): boolean {
    return this.status === 'connected';
  }

  protected setStatus(status: ChannelStatus): void {
    const previous = this.status;
    this.status = status;
    if (previous !== status) {
      this.emit('status', { channel: this.channel, status, previous });
    }
  }
}
