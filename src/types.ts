export type RoundKind = 'lyric' | 'image';
export type MatchPolicy = 'strict' | 'loose';
export type AnswerMode = 'title' | 'artist' | 'either';
export type BudgetScope = 'round' | 'session';
export type RoundStatus = 'active' | 'won' | 'timed_out' | 'passed' | 'cancelled';

export interface RoundPayload {
  kind: RoundKind;
  title: string;               // song title, or the doodle's word
  artist: string;              // empty for image rounds
  excerpt: readonly string[];  // lyric lines shown at start
  hints: readonly string[];    // revealed one by one on request
  titleAnswers: readonly string[];
  artistAnswers: readonly string[];
  imagePrompt?: string;
  image?: Buffer;
}

export interface RoundConstraints {
  kind: RoundKind;
  avoidTitles: ReadonlySet<string>;
  previous?: { title: string; artist: string };
  genre?: string;
  era?: string;
}

/** ===== Channel capability ===== */
export interface RenderField {
  name: string;
  value: string;
  inline?: boolean;
}

export interface Renderable {
  content?: string;
  title?: string;
  description?: string;
  footer?: string;
  color?: number;
  fields?: RenderField[];
  image?: { name: string; data: Buffer };
}

export interface MessageHandle {
  id: string;
  url?: string;
}

export interface InboundMessage {
  id: string;
  channelId: string;
  authorId: string;
  authorIsBot: boolean;
  content: string;
  url?: string;
}

export type EditResult = 'ok' | 'not-found';

export interface Subscription {
  close(): void;
}

export interface ChannelPort {
  readonly id: string;
  send(renderable: Renderable): Promise<MessageHandle>;
  edit(handle: MessageHandle, renderable: Renderable): Promise<EditResult>;
  react(message: MessageHandle, emoji: string): Promise<boolean>;
  fetch(handle: MessageHandle): Promise<InboundMessage | null>;
  subscribe(
    predicate: (message: InboundMessage) => boolean,
    listener: (message: InboundMessage) => void,
  ): Subscription;
}

/** ===== Content generator capability ===== */
export interface GenerationRequest {
  kind: RoundKind;
  prompt: string;
  temperature: number;
  maxTokens: number;
}

export interface ContentGenerator {
  generate(request: GenerationRequest): Promise<string>;
  generateImage(prompt: string): Promise<Buffer>;
}

/** ===== Signals ===== */
export type RoundSignal =
  | { type: 'guess'; text: string }
  | { type: 'pass' }
  | { type: 'hint' };

export interface SignalEnvelope {
  signal: RoundSignal;
  userId: string;
  message?: MessageHandle;
}

export interface SessionOptions {
  kind: RoundKind;
  roundCap: number;
  genre?: string;
  era?: string;
  answerMode: AnswerMode;
  budgetScope: BudgetScope;
}

export interface Timings {
  roundMs: Record<RoundKind, number>;
  countdownMs: number;
  breatherMs: number;
  rankingPauseMs: number;
}
