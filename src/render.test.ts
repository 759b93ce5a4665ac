import test from 'node:test';
import assert from 'node:assert/strict';
import {
  countdownFooter,
  describeAnswer,
  renderGameStart,
  renderRanking,
  renderRound,
  renderRoundClosed,
  renderTimeUp,
  type RoundView,
} from './render.ts';
import type { RoundPayload } from './types.ts';

const doodle: RoundPayload = {
  kind: 'image',
  title: 'Cat',
  artist: '',
  excerpt: [],
  hints: ['it purrs', 'it has whiskers'],
  titleAnswers: ['cat'],
  artistAnswers: [],
  image: Buffer.from('png'),
};

function view(overrides: Partial<RoundView> = {}): RoundView {
  return {
    level: 4,
    payload: doodle,
    hintsRevealed: 0,
    secondsLeft: 30,
    durationSeconds: 30,
    answerMode: 'title',
    streak: 0,
    ...overrides,
  };
}

test('the ranking is ordered by score, ties by user id', () => {
  const ranking = renderRanking(
    new Map([
      ['u-b', 2],
      ['u-a', 2],
      ['u-c', 5],
    ]),
    { final: false, nextLevel: 3 },
  );
  assert.equal(
    ranking.description,
    '**1.** <@u-c> — `5` point(s)\n**2.** <@u-a> — `2` point(s)\n**3.** <@u-b> — `2` point(s)',
  );
  assert.deepEqual(ranking.fields, [{ name: 'Next Step', value: 'Level **3** will start soon.' }]);
});

test('an empty ranking says nobody scored yet', () => {
  const ranking = renderRanking(new Map(), { final: true, nextLevel: 1 });
  assert.equal(ranking.description, 'No points yet. Everyone is still on 0.');
  assert.equal(ranking.fields?.[0]?.name, 'Game Over');
});

test('countdownFooter shows the streak only while there is one', () => {
  assert.equal(countdownFooter(42, 0), 'Time left: 42 seconds');
  assert.equal(countdownFooter(-3, 4), 'Time left: 0 seconds • 🔥 Streak: 4');
});

test('a doodle round carries its picture and reveals hints in order', () => {
  const rendered = renderRound(view({ hintsRevealed: 2 }));
  assert.equal(rendered.title, '🖍️ Doodle – Level 4');
  assert.equal(
    rendered.description,
    '**Hints:**\n💡 1. it purrs\n💡 2. it has whiskers\n\nGuess the **WORD** in chat.\nYou have **30 seconds**.',
  );
  assert.equal(rendered.image?.name, 'doodle.png');
  assert.equal(rendered.image?.data.toString(), 'png');
});

test('a closed round names the winner and keeps the picture', () => {
  const rendered = renderRoundClosed(view(), 'won', 'u-1');
  assert.equal(rendered.description, 'Guess the **WORD** in chat.\nYou have **30 seconds**.\n\n✅ Guessed by <@u-1>.');
  assert.equal(rendered.footer, 'Answer locked.');
  assert.equal(rendered.image?.name, 'doodle.png');
});

test('answers are described by round kind', () => {
  assert.equal(describeAnswer(doodle), '**Word:** Cat');
  assert.equal(
    describeAnswer({ ...doodle, kind: 'lyric', title: 'Intro', artist: '', image: undefined }),
    '**Song:** Intro – Unknown',
  );
});

test('the time-up message tells whether the session ends', () => {
  assert.equal(
    renderTimeUp(doodle, true).description,
    'No one guessed it in time.\n\n**Word:** Cat\n\nGame over for this Mic session.\nUse `/mic start` or `m.mic` to start a new game.',
  );
  assert.equal(renderTimeUp(doodle, false).footer, 'Round failed.');
});

test('the start banner lists levels, filters and budget scope', () => {
  assert.deepEqual(
    renderGameStart({ kind: 'lyric', roundCap: 3, genre: 'rock', answerMode: 'either', budgetScope: 'session' }),
    {
      content:
        '🎮 **Karaoke game starting!**\nLevels: `3`. Try to guess the **title or artist** each round.\n' +
        'Selection: genre **rock**.\nHints and passes: **3** each for the whole game (`!hint`, `!pass`).',
    },
  );
});
