import type { AnswerMode, MatchPolicy, RoundKind, RoundPayload } from './types.ts';

export interface MatchTarget {
  payload: Pick<RoundPayload, 'title' | 'artist' | 'titleAnswers' | 'artistAnswers'>;
  policy: MatchPolicy;
  answerMode: AnswerMode;
}

export function normalize(s: string) {
  return s
    .normalize('NFD')
    .replace(/\p{Diacritic}/gu, '')
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim();
}

export function policyFor(kind: RoundKind): MatchPolicy {
  return kind === 'lyric' ? 'strict' : 'loose';
}

function equalsAny(guess: string, answers: readonly string[]) {
  return answers.some((answer) => normalize(answer) === guess);
}

export function isCorrect(round: MatchTarget, rawGuess: string): boolean {
  const guess = normalize(rawGuess);
  if (!guess) return false;

  const { payload, policy, answerMode } = round;
  const title = normalize(payload.title);
  const artist = normalize(payload.artist);

  let titleHit: boolean;
  let artistHit: boolean;

  if (policy === 'loose') {
    titleHit = equalsAny(guess, payload.titleAnswers) || (title !== '' && guess.includes(title));
    artistHit = equalsAny(guess, payload.artistAnswers) || (artist !== '' && guess.includes(artist));
  } else {
    // a lone common word from the artist name must not win the round
    const containsBoth = title !== '' && artist !== '' && guess.includes(title) && guess.includes(artist);
    titleHit = equalsAny(guess, payload.titleAnswers) || (title !== '' && guess === title) || containsBoth;
    artistHit = equalsAny(guess, payload.artistAnswers) || (artist !== '' && guess === artist) || containsBoth;
  }

  if (answerMode === 'title') return titleHit;
  if (answerMode === 'artist') return artistHit;
  return titleHit || artistHit;
}
