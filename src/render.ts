import type { AnswerMode, Renderable, RoundKind, RoundPayload, SessionOptions } from './types.ts';

export const COLORS = {
  blurple: 0x5865f2,
  green: 0x57f287,
  red: 0xed4245,
  gold: 0xf1c40f,
  grey: 0x95a5a6,
} as const;

export interface RoundView {
  level: number;
  payload: RoundPayload;
  hintsRevealed: number;
  secondsLeft: number;
  durationSeconds: number;
  answerMode: AnswerMode;
  streak: number;
}

/** ===== Helpers ===== */
export function mention(userId: string) {
  return `<@${userId}>`;
}

function modeLine(kind: RoundKind, answerMode: AnswerMode) {
  if (kind === 'image') return 'Guess the **WORD** in chat.';
  if (answerMode === 'title') return 'Mode: Guess the **TITLE** in chat.';
  if (answerMode === 'artist') return 'Mode: Guess the **ARTIST** in chat.';
  return 'Mode: Guess the **TITLE** or **ARTIST** in chat.';
}

export function describeAnswer(payload: RoundPayload) {
  if (payload.kind === 'image') return `**Word:** ${payload.title}`;
  return `**Song:** ${payload.title} – ${payload.artist || 'Unknown'}`;
}

function roundTitle(view: RoundView) {
  return view.payload.kind === 'image' ? `🖍️ Doodle – Level ${view.level}` : `🎶 Mic – Level ${view.level}`;
}

export function countdownFooter(secondsLeft: number, streak: number) {
  const streakPart = streak > 0 ? ` • 🔥 Streak: ${streak}` : '';
  return `Time left: ${Math.max(0, secondsLeft)} seconds${streakPart}`;
}

/** ===== Round display ===== */
export function renderRound(view: RoundView): Renderable {
  const { payload } = view;
  const parts: string[] = [];

  if (payload.excerpt.length) {
    parts.push(`**Lyrics:**\n${payload.excerpt.map((line) => `• “${line}”`).join('\n')}`);
  }
  const hints = payload.hints.slice(0, view.hintsRevealed);
  if (hints.length) {
    parts.push(`**Hints:**\n${hints.map((h, i) => `💡 ${i + 1}. ${h}`).join('\n')}`);
  }
  parts.push(`${modeLine(payload.kind, view.answerMode)}\nYou have **${view.durationSeconds} seconds**.`);

  return {
    title: roundTitle(view),
    description: parts.join('\n\n'),
    color: COLORS.blurple,
    footer: countdownFooter(view.secondsLeft, view.streak),
    image: payload.image ? { name: 'doodle.png', data: payload.image } : undefined,
  };
}

export function renderRoundClosed(view: RoundView, outcome: 'won' | 'timed_out' | 'passed', winnerId?: string): Renderable {
  const base = renderRound(view);
  if (outcome === 'won') {
    return {
      ...base,
      color: COLORS.green,
      description: `${base.description}\n\n✅ Guessed by ${winnerId ? mention(winnerId) : 'someone'}.`,
      footer: 'Answer locked.',
    };
  }
  if (outcome === 'passed') {
    return { ...base, color: COLORS.grey, footer: 'Round skipped.' };
  }
  return { ...base, color: COLORS.red, footer: "Time's up!" };
}

/** ===== Announcements ===== */
export function renderWinner(payload: RoundPayload, winnerId: string, nextRoundInSeconds: number | null): Renderable {
  const next = nextRoundInSeconds === null ? 'That was the last level!' : `Next round in **${nextRoundInSeconds} seconds**...`;
  return {
    title: '✅ Answer guessed!',
    description: `${describeAnswer(payload)}\n**Winner:** ${mention(winnerId)}\n\n${next}`,
    color: COLORS.green,
    footer: 'Answer locked. Get ready for the next level.',
  };
}

export function renderTimeUp(payload: RoundPayload, sessionEnds: boolean): Renderable {
  const tail = sessionEnds
    ? 'Game over for this Mic session.\nUse `/mic start` or `m.mic` to start a new game.'
    : 'A pass was used this session, so the game goes on.';
  return {
    title: "⏰ Time's up!",
    description: `No one guessed it in time.\n\n${describeAnswer(payload)}\n\n${tail}`,
    color: COLORS.red,
    footer: sessionEnds ? 'Round failed. Mic session ended.' : 'Round failed.',
  };
}

export function renderPassed(payload: RoundPayload, userId: string, passesLeft: number): Renderable {
  return {
    title: '⏭️ Round skipped',
    description: `${mention(userId)} used a pass.\n\n${describeAnswer(payload)}`,
    color: COLORS.grey,
    footer: `Passes left: ${passesLeft}`,
  };
}

export function renderReminder(secondsLeft: number, url?: string): Renderable {
  const jump = url ? ` [Jump to the round](${url})` : '';
  return { content: `⏳ Still live! **${secondsLeft} seconds** left.${jump}` };
}

export function renderRanking(
  scores: ReadonlyMap<string, number>,
  { final, nextLevel }: { final: boolean; nextLevel: number },
): Renderable {
  const sorted = Array.from(scores.entries()).sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
  const description = sorted.length
    ? sorted.map(([userId, score], i) => `**${i + 1}.** ${mention(userId)} — \`${score}\` point(s)`).join('\n')
    : 'No points yet. Everyone is still on 0.';

  return {
    title: '🏆 Team Ranking',
    description,
    color: COLORS.gold,
    fields: [
      final
        ? { name: 'Game Over', value: 'That’s the last level for this Mic session.\nUse `/mic start` or `m.mic` to start a new game.' }
        : { name: 'Next Step', value: `Level **${nextLevel}** will start soon.` },
    ],
  };
}

export function renderGameStart(options: SessionOptions): Renderable {
  const filters = [options.genre && `genre **${options.genre}**`, options.era && `era **${options.era}**`].filter(Boolean);
  const what = options.kind === 'image' ? 'the **doodle**' : 'the **title or artist**';
  const lines = [
    `Levels: \`${options.roundCap}\`. Try to guess ${what} each round.`,
    filters.length ? `Selection: ${filters.join(', ')}.` : '',
    `Hints and passes: **3** each ${options.budgetScope === 'session' ? 'for the whole game' : 'per round'} (\`!hint\`, \`!pass\`).`,
  ].filter(Boolean);
  return { content: `🎮 **Karaoke game starting!**\n${lines.join('\n')}` };
}

export function renderScoreboardReset(): Renderable {
  return {
    title: '💥 Hard reset',
    description: 'All hints and passes were spent and the round still timed out.\nThe scoreboard has been wiped.',
    color: COLORS.red,
  };
}

export function renderGenerationFailure(): Renderable {
  return { content: "⚠️ I couldn't get a new round from the generator. Mic game has been stopped. Try `/mic start` again in a bit." };
}

export function renderGenericFailure(): Renderable {
  return { content: '⚠️ Mic ran into an error and had to stop this game.' };
}

export function renderNotice(text: string): Renderable {
  return { content: text };
}
