export class GenerationError extends Error {
  readonly attempts: number;

  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GenerationError';
    this.attempts = attempts;
  }
}

export type InvariantCode =
  | 'session-active'
  | 'no-session'
  | 'no-round'
  | 'hint-budget'
  | 'pass-budget'
  | 'no-hint-left';

/** Rejected request; nothing was mutated. */
export class InvariantError extends Error {
  readonly code: InvariantCode;

  constructor(code: InvariantCode, message: string) {
    super(message);
    this.name = 'InvariantError';
    this.code = code;
  }
}
