import type {
  ChannelPort,
  ContentGenerator,
  EditResult,
  GenerationRequest,
  InboundMessage,
  MessageHandle,
  Renderable,
  Subscription,
  Timings,
} from './types.ts';

export const fastTimings: Timings = {
  roundMs: { lyric: 300, image: 150 },
  countdownMs: 40,
  breatherMs: 0,
  rankingPauseMs: 0,
};

export type ChannelEvent =
  | { type: 'send'; id: string; renderable: Renderable }
  | { type: 'edit'; id: string; renderable: Renderable }
  | { type: 'react'; id: string; emoji: string };

interface Listener {
  predicate: (message: InboundMessage) => boolean;
  listener: (message: InboundMessage) => void;
}

/** In-process stand-in for a Discord text channel. */
export class FakeChannel implements ChannelPort {
  readonly id: string;
  readonly events: ChannelEvent[] = [];
  readonly deleted = new Set<string>();
  private readonly listeners = new Set<Listener>();
  private seq = 0;

  constructor(id = 'chan-1') {
    this.id = id;
  }

  get sent(): Renderable[] {
    return this.events.flatMap((e) => (e.type === 'send' ? [e.renderable] : []));
  }

  get edits(): Renderable[] {
    return this.events.flatMap((e) => (e.type === 'edit' ? [e.renderable] : []));
  }

  get listenerCount() {
    return this.listeners.size;
  }

  sentTitles(): string[] {
    return this.sent.map((r) => r.title ?? r.content ?? '');
  }

  async send(renderable: Renderable): Promise<MessageHandle> {
    this.seq += 1;
    const id = `bot-${this.seq}`;
    this.events.push({ type: 'send', id, renderable });
    return { id, url: `https://discord.test/channels/${this.id}/${id}` };
  }

  async edit(handle: MessageHandle, renderable: Renderable): Promise<EditResult> {
    if (this.deleted.has(handle.id)) return 'not-found';
    this.events.push({ type: 'edit', id: handle.id, renderable });
    return 'ok';
  }

  async react(message: MessageHandle, emoji: string): Promise<boolean> {
    this.events.push({ type: 'react', id: message.id, emoji });
    return true;
  }

  async fetch(handle: MessageHandle): Promise<InboundMessage | null> {
    if (this.deleted.has(handle.id)) return null;
    return { id: handle.id, channelId: this.id, authorId: 'bot', authorIsBot: true, content: '' };
  }

  subscribe(
    predicate: (message: InboundMessage) => boolean,
    listener: (message: InboundMessage) => void,
  ): Subscription {
    const entry = { predicate, listener };
    this.listeners.add(entry);
    return { close: () => this.listeners.delete(entry) };
  }

  /** Simulates a user typing `content` in the channel. */
  say(authorId: string, content: string, { bot = false } = {}): InboundMessage {
    this.seq += 1;
    const message: InboundMessage = {
      id: `user-${this.seq}`,
      channelId: this.id,
      authorId,
      authorIsBot: bot,
      content,
    };
    for (const { predicate, listener } of Array.from(this.listeners)) {
      if (predicate(message)) listener(message);
    }
    return message;
  }
}

export function lyricJson(title: string, artist: string, extra: Record<string, unknown> = {}) {
  return JSON.stringify({
    song_title: title,
    artist,
    lyric_lines: ['a line of the song'],
    hint_lines: ['first clue', 'second clue', 'third clue'],
    acceptable_title_answers: [title],
    acceptable_artist_answers: [artist],
    ...extra,
  });
}

/** Replays scripted responses in order; the last one repeats once the script runs out. */
export class ScriptedContent implements ContentGenerator {
  readonly requests: GenerationRequest[] = [];
  readonly imagePrompts: string[] = [];
  private readonly script: Array<string | Error>;

  constructor(script: Array<string | Error>) {
    this.script = script;
  }

  async generate(request: GenerationRequest): Promise<string> {
    const step = this.script[Math.min(this.requests.length, this.script.length - 1)];
    this.requests.push(request);
    if (step instanceof Error) throw step;
    return step ?? '';
  }

  async generateImage(prompt: string): Promise<Buffer> {
    this.imagePrompts.push(prompt);
    return Buffer.from('fake-png');
  }
}

export async function waitFor(check: () => boolean, { timeoutMs = 3000, intervalMs = 5 } = {}) {
  const deadline = Date.now() + timeoutMs;
  while (Date.now() < deadline) {
    if (check()) return;
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
  }
  throw new Error('timed out waiting for condition');
}
