import { setTimeout as sleep } from 'node:timers/promises';
import { GenerationError, InvariantError } from './errors.ts';
import type { RoundSource } from './generator.ts';
import { logEvent, serializeError } from './logger.ts';
import { policyFor } from './matcher.ts';
import {
  renderGameStart,
  renderGenerationFailure,
  renderGenericFailure,
  renderRanking,
  renderScoreboardReset,
} from './render.ts';
import { Round, type RoundHooks } from './round.ts';
import { Session, type BudgetKind } from './session.ts';
import type { ChannelPort, Renderable, RoundPayload, SessionOptions, Timings } from './types.ts';

export type SessionEndReason = 'timed-out' | 'round-cap' | 'generation-failed' | 'stopped' | 'error';

export interface SchedulerDeps {
  channel: ChannelPort;
  rounds: RoundSource;
  timings: Timings;
  now?: () => number;
  onEnd?: (scheduler: Scheduler, reason: SessionEndReason) => void;
}

/** Drives one channel's session: generate, play, rank, repeat. */
export class Scheduler implements RoundHooks {
  readonly session: Session;
  private readonly channel: ChannelPort;
  private readonly rounds: RoundSource;
  private readonly timings: Timings;
  private readonly now?: () => number;
  private readonly onEnd?: (scheduler: Scheduler, reason: SessionEndReason) => void;
  private readonly abort = new AbortController();
  private running?: Promise<SessionEndReason>;

  constructor(options: SessionOptions, deps: SchedulerDeps) {
    this.session = new Session(deps.channel.id, options);
    this.channel = deps.channel;
    this.rounds = deps.rounds;
    this.timings = deps.timings;
    this.now = deps.now;
    this.onEnd = deps.onEnd;
  }

  get channelId() {
    return this.session.channelId;
  }

  /** Resolves once the session has ended, whatever the reason. */
  get done(): Promise<SessionEndReason> {
    return this.running ?? Promise.resolve('stopped');
  }

  start(): Promise<SessionEndReason> {
    if (!this.running) this.running = this.loop();
    return this.running;
  }

  /** External stop: cancels the breather and the active round's timers. */
  stop() {
    this.session.active = false;
    this.abort.abort();
    this.session.activeRound?.cancel();
  }

  /** Validates a hint/pass request up front, then hands it to the round. */
  requestSignal(type: BudgetKind, userId: string) {
    const round = this.session.activeRound;
    if (!round || !round.isActive) {
      throw new InvariantError('no-round', 'No round is running right now.');
    }
    if (this.session.remaining(type) <= 0) {
      throw type === 'hint'
        ? new InvariantError('hint-budget', 'No hints left.')
        : new InvariantError('pass-budget', 'No passes left.');
    }
    if (type === 'hint' && round.hintsAvailable() <= 0) {
      throw new InvariantError('no-hint-left', 'No more hints for this round.');
    }
    round.deliver({ signal: { type }, userId });
  }

  /** ===== RoundHooks ===== */
  streak() {
    return this.session.streak;
  }

  tryConsumeHint() {
    return this.session.consume('hint');
  }

  tryConsumePass() {
    return this.session.consume('pass');
  }

  passesLeft() {
    return this.session.remaining('pass');
  }

  endsSessionOnTimeout() {
    return this.session.passesUsed === 0;
  }

  /** ===== Loop ===== */
  private async loop(): Promise<SessionEndReason> {
    let reason: SessionEndReason = 'stopped';
    try {
      reason = await this.play();
    } catch (error) {
      reason = 'error';
      logEvent('error', 'session_crashed', { channelId: this.channelId, error: serializeError(error) });
      await this.post(renderGenericFailure());
    } finally {
      this.session.active = false;
      this.session.activeRound?.cancel();
      this.session.activeRound = undefined;
    }
    logEvent('info', 'session_ended', {
      channelId: this.channelId,
      reason,
      rounds: this.session.roundsPlayed,
    });
    this.onEnd?.(this, reason);
    return reason;
  }

  private async play(): Promise<SessionEndReason> {
    const { session, timings } = this;
    const { options } = session;

    await this.channel.send(renderGameStart(options));

    while (session.active) {
      const level = session.roundsPlayed + 1;
      const isLast = level >= options.roundCap;

      let payload: RoundPayload;
      try {
        payload = await this.rounds.requestRound({
          kind: options.kind,
          avoidTitles: session.usedTitles,
          previous: session.previous ? { title: session.previous.title, artist: session.previous.artist } : undefined,
          genre: options.genre,
          era: options.era,
        });
      } catch (error) {
        if (!(error instanceof GenerationError)) throw error;
        logEvent('error', 'round_generation_failed', {
          channelId: this.channelId,
          attempts: error.attempts,
          error: serializeError(error.cause ?? error),
        });
        if (!session.active) return 'stopped';
        await this.post(renderGenerationFailure());
        return 'generation-failed';
      }
      if (!session.active) return 'stopped';

      const round = new Round({
        level,
        payload,
        channel: this.channel,
        durationMs: timings.roundMs[options.kind],
        countdownMs: timings.countdownMs,
        policy: policyFor(options.kind),
        answerMode: options.kind === 'image' ? 'title' : options.answerMode,
        hooks: this,
        nextRoundInSeconds: isLast ? null : Math.round(timings.breatherMs / 1000),
        now: this.now,
      });
      session.enterRound(round);
      await round.start();
      const outcome = await round.run();
      session.leaveRound(round);
      logEvent('info', 'round_finished', {
        channelId: this.channelId,
        level,
        status: outcome.status,
        winnerId: outcome.winnerId,
      });

      if (outcome.status === 'cancelled') return 'stopped';

      // score last, after the round's own rendering was attempted
      if (outcome.status === 'won' && outcome.winnerId) session.credit(outcome.winnerId);

      if (outcome.status === 'timed_out') {
        session.streak = 0;
        if (options.budgetScope === 'session' && session.budgetsExhausted) {
          session.wipeScores();
          await this.post(renderScoreboardReset());
        }
        if (session.passesUsed === 0) {
          await this.post(renderRanking(session.scores, { final: true, nextLevel: level }));
          return 'timed-out';
        }
      }

      await this.pause(timings.breatherMs);
      if (!session.active) return 'stopped';

      if (isLast) {
        await this.post(renderRanking(session.scores, { final: true, nextLevel: level }));
        return 'round-cap';
      }
      await this.post(renderRanking(session.scores, { final: false, nextLevel: level + 1 }));
      await this.pause(timings.rankingPauseMs);
    }
    return 'stopped';
  }

  private async pause(ms: number) {
    if (ms <= 0 || this.abort.signal.aborted) return;
    try {
      await sleep(ms, undefined, { signal: this.abort.signal });
    } catch (error) {
      if (this.abort.signal.aborted) return;
      throw error;
    }
  }

  /** Announcements are best effort; a failed post must not kill the loop. */
  private async post(renderable: Renderable) {
    try {
      await this.channel.send(renderable);
    } catch (error) {
      logEvent('warn', 'channel_post_failed', { channelId: this.channelId, error: serializeError(error) });
    }
  }
}
