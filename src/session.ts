import { BUDGET_CAP } from './config.ts';
import { normalize } from './matcher.ts';
import type { Round } from './round.ts';
import type { RoundPayload, SessionOptions } from './types.ts';

export type BudgetKind = 'hint' | 'pass';

/** Per-channel game state. Only the owning scheduler writes to it. */
export class Session {
  readonly channelId: string;
  readonly options: SessionOptions;

  scores = new Map<string, number>();
  streak = 0;
  readonly usedTitles = new Set<string>();
  hintsUsed = 0;
  passesUsed = 0;
  roundsPlayed = 0;
  activeRound?: Round;
  previous?: RoundPayload;
  active = true;

  constructor(channelId: string, options: SessionOptions) {
    this.channelId = channelId;
    this.options = options;
  }

  used(kind: BudgetKind) {
    return kind === 'hint' ? this.hintsUsed : this.passesUsed;
  }

  remaining(kind: BudgetKind) {
    return Math.max(0, BUDGET_CAP - this.used(kind));
  }

  /** Returns false, without counting, once the cap is reached. */
  consume(kind: BudgetKind): boolean {
    if (this.remaining(kind) <= 0) return false;
    if (kind === 'hint') this.hintsUsed += 1;
    else this.passesUsed += 1;
    return true;
  }

  get budgetsExhausted() {
    return this.hintsUsed >= BUDGET_CAP && this.passesUsed >= BUDGET_CAP;
  }

  enterRound(round: Round) {
    this.activeRound = round;
    if (this.options.budgetScope === 'round') {
      this.hintsUsed = 0;
      this.passesUsed = 0;
    }
  }

  leaveRound(round: Round) {
    this.usedTitles.add(normalize(round.payload.title));
    this.previous = round.payload;
    this.roundsPlayed += 1;
    this.activeRound = undefined;
  }

  credit(userId: string) {
    this.scores.set(userId, (this.scores.get(userId) ?? 0) + 1);
    this.streak += 1;
  }

  wipeScores() {
    this.scores = new Map();
  }
}
