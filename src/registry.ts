import { InvariantError } from './errors.ts';
import type { RoundSource } from './generator.ts';
import { logEvent, serializeError } from './logger.ts';
import { Scheduler, type SessionEndReason } from './scheduler.ts';
import type { BudgetKind } from './session.ts';
import type { ChannelPort, SessionOptions, Timings } from './types.ts';

export interface RegistryDeps {
  rounds: RoundSource;
  timings: Timings;
  now?: () => number;
}

export type StartResult = { ok: true; scheduler: Scheduler } | { ok: false; reason: string };

/** At most one live session per channel; created on start, dropped on end. */
export class GameRegistry {
  private readonly sessions = new Map<string, Scheduler>();
  private readonly deps: RegistryDeps;

  constructor(deps: RegistryDeps) {
    this.deps = deps;
  }

  get size() {
    return this.sessions.size;
  }

  get(channelId: string): Scheduler | undefined {
    return this.sessions.get(channelId);
  }

  has(channelId: string) {
    return this.sessions.has(channelId);
  }

  start(channel: ChannelPort, options: SessionOptions): Scheduler {
    if (this.sessions.has(channel.id)) {
      throw new InvariantError('session-active', 'There is already a Mic game running in this channel.');
    }

    const scheduler = new Scheduler(options, {
      channel,
      rounds: this.deps.rounds,
      timings: this.deps.timings,
      now: this.deps.now,
      onEnd: (ended) => this.release(ended),
    });
    this.sessions.set(channel.id, scheduler);
    logEvent('info', 'session_started', { channelId: channel.id, ...options });

    scheduler.start().catch((error) => {
      logEvent('error', 'session_loop_rejected', { channelId: channel.id, error: serializeError(error) });
      this.release(scheduler);
    });
    return scheduler;
  }

  /** `start` for callers that reply in the channel instead of throwing. */
  tryStart(channel: ChannelPort, options: SessionOptions): StartResult {
    try {
      return { ok: true, scheduler: this.start(channel, options) };
    } catch (error) {
      if (error instanceof InvariantError) return { ok: false, reason: error.message };
      throw error;
    }
  }

  async stop(channelId: string): Promise<SessionEndReason> {
    const scheduler = this.sessions.get(channelId);
    if (!scheduler) {
      throw new InvariantError('no-session', 'No Mic game is running in this channel.');
    }
    scheduler.stop();
    this.release(scheduler);
    return scheduler.done;
  }

  useHint(channelId: string, userId: string) {
    this.signal(channelId, 'hint', userId);
  }

  usePass(channelId: string, userId: string) {
    this.signal(channelId, 'pass', userId);
  }

  /** Stops every session, e.g. on SIGINT. */
  async shutdown() {
    const all = Array.from(this.sessions.values());
    for (const scheduler of all) scheduler.stop();
    this.sessions.clear();
    await Promise.all(all.map((s) => s.done));
  }

  private signal(channelId: string, type: BudgetKind, userId: string) {
    const scheduler = this.sessions.get(channelId);
    if (!scheduler) {
      throw new InvariantError('no-session', 'No Mic game is running in this channel.');
    }
    scheduler.requestSignal(type, userId);
  }

  private release(scheduler: Scheduler) {
    if (this.sessions.get(scheduler.channelId) === scheduler) {
      this.sessions.delete(scheduler.channelId);
    }
  }
}
