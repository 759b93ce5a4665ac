import {
  AttachmentBuilder,
  DiscordAPIError,
  EmbedBuilder,
  RESTJSONErrorCodes,
  type Message,
  type TextChannel,
} from 'discord.js';
import { logEvent, serializeError } from './logger.ts';
import type {
  ChannelPort,
  EditResult,
  InboundMessage,
  MessageHandle,
  Renderable,
  Subscription,
} from './types.ts';

type Listener = (message: InboundMessage) => void;

/** Fans MessageCreate events out to the rounds listening on each channel. */
export class MessageHub {
  private readonly listeners = new Map<string, Set<Listener>>();

  publish(message: InboundMessage) {
    const set = this.listeners.get(message.channelId);
    if (!set) return;
    for (const listener of Array.from(set)) listener(message);
  }

  listen(channelId: string, listener: Listener): Subscription {
    let set = this.listeners.get(channelId);
    if (!set) {
      set = new Set();
      this.listeners.set(channelId, set);
    }
    set.add(listener);
    return {
      close: () => {
        const current = this.listeners.get(channelId);
        if (!current) return;
        current.delete(listener);
        if (!current.size) this.listeners.delete(channelId);
      },
    };
  }
}

export function toInbound(msg: Message): InboundMessage {
  return {
    id: msg.id,
    channelId: msg.channelId,
    authorId: msg.author.id,
    authorIsBot: msg.author.bot,
    content: msg.content,
    url: msg.url,
  };
}

function hasEmbed(r: Renderable) {
  return Boolean(r.title || r.description || r.footer || r.fields?.length || r.image);
}

export function buildEmbed(r: Renderable): EmbedBuilder {
  const embed = new EmbedBuilder();
  if (r.title) embed.setTitle(r.title);
  if (r.description) embed.setDescription(r.description);
  if (r.color !== undefined) embed.setColor(r.color);
  if (r.footer) embed.setFooter({ text: r.footer });
  if (r.fields?.length) {
    embed.addFields(r.fields.map((f) => ({ name: f.name, value: f.value, inline: f.inline ?? false })));
  }
  if (r.image) embed.setImage(`attachment://${r.image.name}`);
  return embed;
}

function isUnknownMessage(error: unknown) {
  return error instanceof DiscordAPIError && error.code === RESTJSONErrorCodes.UnknownMessage;
}

export class DiscordChannel implements ChannelPort {
  private readonly channel: TextChannel;
  private readonly hub: MessageHub;

  constructor(channel: TextChannel, hub: MessageHub) {
    this.channel = channel;
    this.hub = hub;
  }

  get id() {
    return this.channel.id;
  }

  async send(r: Renderable): Promise<MessageHandle> {
    const sent = await this.channel.send({
      content: r.content,
      embeds: hasEmbed(r) ? [buildEmbed(r)] : [],
      files: r.image ? [new AttachmentBuilder(r.image.data, { name: r.image.name })] : [],
    });
    return { id: sent.id, url: sent.url };
  }

  /** The attachment uploaded with the original message stays; only the embed is replaced. */
  async edit(handle: MessageHandle, r: Renderable): Promise<EditResult> {
    try {
      await this.channel.messages.edit(handle.id, {
        content: r.content ?? null,
        embeds: hasEmbed(r) ? [buildEmbed(r)] : [],
      });
      return 'ok';
    } catch (error) {
      if (isUnknownMessage(error)) return 'not-found';
      throw error;
    }
  }

  async react(message: MessageHandle, emoji: string): Promise<boolean> {
    try {
      await this.channel.messages.react(message.id, emoji);
      return true;
    } catch (error) {
      logEvent('debug', 'discord_react_failed', { channelId: this.id, error: serializeError(error) });
      return false;
    }
  }

  async fetch(handle: MessageHandle): Promise<InboundMessage | null> {
    try {
      return toInbound(await this.channel.messages.fetch(handle.id));
    } catch (error) {
      if (isUnknownMessage(error)) return null;
      throw error;
    }
  }

  subscribe(predicate: (message: InboundMessage) => boolean, listener: (message: InboundMessage) => void): Subscription {
    return this.hub.listen(this.id, (message) => {
      if (predicate(message)) listener(message);
    });
  }
}
