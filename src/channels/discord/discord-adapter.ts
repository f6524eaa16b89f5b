// Rollcall Discord Adapter - discord.js client behind the MessagingClient contract

import {
  Client,
  EmbedBuilder,
  Events,
  GatewayIntentBits,
  type Message,
} from 'discord.js';
import type { Logger } from 'pino';
import { ChannelAdapter } from '../channel-adapter.js';
import type {
  BotUser,
  Channel,
  ChannelMessage,
  DiscordChannelConfig,
  Report,
} from '../types.js';

export function toEmbed(report: Report): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setTitle(report.title)
    .setDescription(report.description)
    .setColor(report.color);

  if (report.url) {
    embed.setURL(report.url);
  }
  if (report.author) {
    embed.setAuthor({
      name: report.author.name,
      iconURL: report.author.iconUrl,
      url: report.author.url,
    });
  }
  if (report.timestamp) {
    embed.setTimestamp(report.timestamp);
  }
  return embed;
}

function toChannelMessage(message: Message): ChannelMessage {
  return {
    id: message.id,
    authorId: message.author.id,
    content: message.content,
    timestamp: message.createdTimestamp,
  };
}

export class DiscordAdapter extends ChannelAdapter {
  public readonly channel: Channel = 'discord';
  private config: DiscordChannelConfig;
  private logger: Logger;
  protected client: Client | null = null;

  constructor(config: DiscordChannelConfig, logger: Logger) {
    super();
    this.config = config;
    this.logger = logger.child({ component: 'discord' });
  }

  /** Resolves once the gateway reports ready. */
  async connect(): Promise<void> {
    this.setStatus('reconnecting');

    const client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.DirectMessages,
        GatewayIntentBits.MessageContent,
      ],
    });

    const ready = new Promise<void>((resolve) => {
      client.once(Events.ClientReady, (readyClient) => {
        this.logger.info({ user: readyClient.user.tag }, 'Discord client ready');
        this.setStatus('connected');
        resolve();
      });
    });

    this.watchClient(client);

    try {
      await client.login(this.config.botToken);
    } catch (error) {
      this.setStatus('error');
      await client.destroy();
      throw error;
    }

    this.client = client;
    await ready;
  }

  /** discord.js reconnects shards on its own after an error; status follows the shards. */
  protected watchClient(client: Client): void {
    client.on(Events.Error, (err) => {
      this.logger.error({ error: err.message }, 'Discord client error');
      this.setStatus('error');
    });

    client.on(Events.ShardReconnecting, (shardId) => {
      this.logger.warn({ shardId }, 'Discord shard reconnecting');
      this.setStatus('reconnecting');
    });

    const restore = (shardId: number) => {
      if (this.status === 'error' || this.status === 'reconnecting') {
        this.logger.info({ shardId }, 'Discord shard back online');
        this.setStatus('connected');
      }
    };
    client.on(Events.ShardResume, (shardId) => restore(shardId));
    client.on(Events.ShardReady, (shardId) => restore(shardId));

    if (this.config.debugEvents) {
      client.on(Events.Debug, (info) => {
        this.logger.debug({ source: 'discord.js' }, info);
      });
    }
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      await this.client.destroy();
      this.client = null;
    }
    this.setStatus('disconnected');
  }

  async sendReport(channelId: string, report: Report): Promise<string> {
    const client = this.requireClient();
    const channel = await client.channels.fetch(channelId);
    if (!channel || !channel.isSendable()) {
      throw new Error(`[Discord] Channel ${channelId} does not accept messages`);
    }

    const message = await channel.send({ embeds: [toEmbed(report)] });
    return message.id;
  }

  async fetchRecentMessages(channelId: string, limit: number): Promise<ChannelMessage[]> {
    const client = this.requireClient();
    const channel = await client.channels.fetch(channelId);
    if (!channel || !channel.isTextBased()) {
      throw new Error(`[Discord] Channel ${channelId} is not a text channel`);
    }

    const messages = await channel.messages.fetch({ limit });
    return messages.map(toChannelMessage);
  }

  async sendDirectMessage(userId: string, text: string): Promise<string> {
    const client = this.requireClient();
    const user = await client.users.fetch(userId);
    const message = await user.send(text);
    return message.id;
  }

  async currentUser(): Promise<BotUser> {
    const user = this.requireClient().user;
    if (!user) {
      throw new Error('[Discord] Client user is not available yet');
    }
    return {
      id: user.id,
      username: user.username,
      avatarUrl: user.displayAvatarURL(),
    };
  }

  private requireClient(): Client {
    if (!this.client || this.status !== 'connected') {
      throw new Error('Discord bot not connected');
    }
    return this.client;
  }
}
