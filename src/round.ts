import { Inbox } from './inbox.ts';
import { logEvent, serializeError } from './logger.ts';
import { isCorrect, type MatchTarget } from './matcher.ts';
import { MAX_HINT_LINES } from './payload.ts';
import {
  renderNotice,
  renderPassed,
  renderReminder,
  renderRound,
  renderRoundClosed,
  renderTimeUp,
  renderWinner,
  type RoundView,
} from './render.ts';
import { toEnvelope } from './signals.ts';
import type {
  AnswerMode,
  ChannelPort,
  MatchPolicy,
  MessageHandle,
  RoundPayload,
  RoundStatus,
  SignalEnvelope,
  Subscription,
} from './types.ts';

/** Session-side state the round reads or consumes; implemented by the scheduler. */
export interface RoundHooks {
  streak(): number;
  tryConsumeHint(): boolean;
  tryConsumePass(): boolean;
  passesLeft(): number;
  endsSessionOnTimeout(): boolean;
}

export interface RoundOptions {
  level: number;
  payload: RoundPayload;
  channel: ChannelPort;
  durationMs: number;
  countdownMs: number;
  policy: MatchPolicy;
  answerMode: AnswerMode;
  hooks: RoundHooks;
  /** Shown in the winner announcement; null on the last level. */
  nextRoundInSeconds: number | null;
  now?: () => number;
}

interface Received {
  envelope: SignalEnvelope;
  receivedAt: number;
}

export interface RoundOutcome {
  status: Exclude<RoundStatus, 'active'>;
  winnerId?: string;
  passedBy?: string;
}

export class Round implements MatchTarget {
  readonly level: number;
  readonly payload: RoundPayload;
  readonly policy: MatchPolicy;
  readonly answerMode: AnswerMode;
  readonly durationMs: number;

  status: RoundStatus = 'active';
  startedAt = 0;
  deadline = 0;
  winnerId?: string;
  passedBy?: string;
  hintsRevealed = 0;
  display?: MessageHandle;

  private readonly channel: ChannelPort;
  private readonly hooks: RoundHooks;
  private readonly countdownMs: number;
  private readonly nextRoundInSeconds: number | null;
  private readonly now: () => number;
  private readonly inbox = new Inbox<Received>();
  private subscription?: Subscription;
  private tickTimer?: NodeJS.Timeout;      // footer countdown
  private reminderTimer?: NodeJS.Timeout;  // half-time nudge

  constructor(options: RoundOptions) {
    this.level = options.level;
    this.payload = options.payload;
    this.channel = options.channel;
    this.durationMs = options.durationMs;
    this.countdownMs = options.countdownMs;
    this.policy = options.policy;
    this.answerMode = options.answerMode;
    this.hooks = options.hooks;
    this.nextRoundInSeconds = options.nextRoundInSeconds;
    this.now = options.now ?? Date.now;
  }

  get isActive() {
    return this.status === 'active';
  }

  secondsLeft() {
    return Math.max(0, Math.ceil((this.deadline - this.now()) / 1000));
  }

  hintsAvailable() {
    return Math.min(MAX_HINT_LINES, this.payload.hints.length) - this.hintsRevealed;
  }

  view(): RoundView {
    return {
      level: this.level,
      payload: this.payload,
      hintsRevealed: this.hintsRevealed,
      secondsLeft: this.startedAt ? this.secondsLeft() : Math.round(this.durationMs / 1000),
      durationSeconds: Math.round(this.durationMs / 1000),
      answerMode: this.answerMode,
      streak: this.hooks.streak(),
    };
  }

  /** Renders the round; the deadline is fixed from this moment. */
  async start() {
    if (!this.isActive) return;
    this.display = await this.channel.send(renderRound(this.view()));
    this.startedAt = this.now();
    this.deadline = this.startedAt + this.durationMs;
    // stopped while the message was in flight
    if (!this.isActive) return;

    this.subscription = this.channel.subscribe(
      (m) => m.channelId === this.channel.id && !m.authorIsBot,
      (m) => this.deliver(toEnvelope(m)),
    );
    this.startTimers();
  }

  /** Queues a signal stamped with its arrival time; ignored once the round is over. */
  deliver(envelope: SignalEnvelope) {
    if (!this.isActive) return;
    this.inbox.push({ envelope, receivedAt: this.now() });
  }

  /** Waits for the round to end and performs its outcome side effects. */
  async run(): Promise<RoundOutcome> {
    while (this.isActive) {
      // past the deadline, next(0) still drains what is already queued
      const received = await this.inbox.next(Math.max(0, this.deadline - this.now()));
      if (!received) {
        if (this.now() >= this.deadline) break;
        continue;
      }
      if (!this.isActive || received.receivedAt > this.deadline) continue;
      await this.handle(received.envelope);
    }
    if (this.isActive) await this.timeOut();
    return this.outcome();
  }

  /** Stops the round without any outcome side effects. */
  cancel() {
    this.close('cancelled');
  }

  outcome(): RoundOutcome {
    if (this.status === 'active') throw new Error('Round is still active');
    return { status: this.status, winnerId: this.winnerId, passedBy: this.passedBy };
  }

  /** ===== Transitions ===== */
  private close(next: Exclude<RoundStatus, 'active'>): boolean {
    if (this.status !== 'active') return false;
    this.status = next;
    this.clearTimers();
    this.subscription?.close();
    this.subscription = undefined;
    this.inbox.close();
    return true;
  }

  private async handle({ signal, userId, message }: SignalEnvelope) {
    if (signal.type === 'guess') {
      if (isCorrect(this, signal.text)) await this.win(userId, message);
      return;
    }
    if (signal.type === 'hint') {
      await this.revealHint();
      return;
    }
    if (!this.hooks.tryConsumePass()) {
      await this.bestEffort('pass_rejected', () => this.channel.send(renderNotice('🚫 No passes left.')));
      return;
    }
    await this.pass(userId);
  }

  private async revealHint() {
    if (this.hintsAvailable() <= 0) {
      await this.bestEffort('hint_rejected', () => this.channel.send(renderNotice('🤷 No more hints for this round.')));
      return;
    }
    if (!this.hooks.tryConsumeHint()) {
      await this.bestEffort('hint_rejected', () => this.channel.send(renderNotice('🚫 No hints left.')));
      return;
    }
    this.hintsRevealed += 1;
    await this.redraw();
  }

  private async win(userId: string, message?: MessageHandle) {
    if (!this.close('won')) return;
    this.winnerId = userId;

    if (message) await this.bestEffort('won_react', () => this.channel.react(message, '🎤'));
    await this.redrawClosed('won');
    await this.bestEffort('won_announce', () =>
      this.channel.send(renderWinner(this.payload, userId, this.nextRoundInSeconds)),
    );
  }

  private async pass(userId: string) {
    if (!this.close('passed')) return;
    this.passedBy = userId;

    await this.redrawClosed('passed');
    await this.bestEffort('passed_announce', () =>
      this.channel.send(renderPassed(this.payload, userId, this.hooks.passesLeft())),
    );
  }

  private async timeOut() {
    if (!this.close('timed_out')) return;

    await this.redrawClosed('timed_out');
    const sessionEnds = this.hooks.endsSessionOnTimeout() || this.nextRoundInSeconds === null;
    await this.bestEffort('timeout_announce', () => this.channel.send(renderTimeUp(this.payload, sessionEnds)));
  }

  /** ===== Display ===== */
  private async redraw() {
    const display = this.display;
    if (!display) return;
    await this.bestEffort('redraw', () => this.channel.edit(display, renderRound(this.view())));
  }

  private async redrawClosed(outcome: 'won' | 'timed_out' | 'passed') {
    const display = this.display;
    if (!display) return;
    await this.bestEffort('redraw_closed', () =>
      this.channel.edit(display, renderRoundClosed(this.view(), outcome, this.winnerId)),
    );
  }

  private async bestEffort<T>(step: string, fn: () => Promise<T>): Promise<T | undefined> {
    try {
      return await fn();
    } catch (error) {
      logEvent('warn', 'round_side_effect_failed', {
        channelId: this.channel.id,
        level: this.level,
        step,
        error: serializeError(error),
      });
      return undefined;
    }
  }

  /** ===== Background timers (observers only) ===== */
  private startTimers() {
    this.clearTimers();

    this.tickTimer = setInterval(() => {
      this.refreshCountdown().catch((error) => {
        logEvent('warn', 'round_countdown_failed', { channelId: this.channel.id, error: serializeError(error) });
      });
    }, this.countdownMs);

    this.reminderTimer = setTimeout(() => {
      this.reminderTimer = undefined;
      this.remind().catch((error) => {
        logEvent('warn', 'round_reminder_failed', { channelId: this.channel.id, error: serializeError(error) });
      });
    }, Math.floor(this.durationMs / 2));
  }

  private async refreshCountdown() {
    const display = this.display;
    if (!this.isActive || !display) {
      this.stopCountdown();
      return;
    }
    const result = await this.channel.edit(display, renderRound(this.view()));
    if (result === 'not-found') this.stopCountdown();
  }

  private async remind() {
    if (!this.isActive) return;
    const display = this.display;
    // no jump link once the round message is gone
    const url = display && (await this.channel.fetch(display)) ? display.url : undefined;
    if (!this.isActive) return;
    await this.channel.send(renderReminder(this.secondsLeft(), url));
  }

  private stopCountdown() {
    if (this.tickTimer) {
      clearInterval(this.tickTimer);
      this.tickTimer = undefined;
    }
  }

  clearTimers() {
    this.stopCountdown();
    if (this.reminderTimer) {
      clearTimeout(this.reminderTimer);
      this.reminderTimer = undefined;
    }
  }

  get hasTimers() {
    return this.tickTimer !== undefined || this.reminderTimer !== undefined;
  }
}
