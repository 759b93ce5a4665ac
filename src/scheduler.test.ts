import test from 'node:test';
import assert from 'node:assert/strict';
import { InvariantError } from './errors.ts';
import { RoundGenerator } from './generator.ts';
import { renderRanking } from './render.ts';
import { Scheduler, type SessionEndReason } from './scheduler.ts';
import { fastTimings, FakeChannel, lyricJson, ScriptedContent, waitFor } from './testHelpers.ts';
import type { SessionOptions } from './types.ts';

function setup(script: Array<string | Error>, options: Partial<SessionOptions> = {}) {
  const channel = new FakeChannel();
  const content = new ScriptedContent(script);
  const ended: SessionEndReason[] = [];
  const scheduler = new Scheduler(
    { kind: 'lyric', roundCap: 5, answerMode: 'either', budgetScope: 'round', ...options },
    {
      channel,
      rounds: new RoundGenerator(content),
      timings: fastTimings,
      onEnd: (_scheduler, reason) => ended.push(reason),
    },
  );
  return { channel, content, scheduler, ended };
}

function roundLive(scheduler: Scheduler, channel: FakeChannel, level: number) {
  return waitFor(() => scheduler.session.activeRound?.level === level && channel.listenerCount === 1);
}

function gameOverCount(channel: FakeChannel) {
  return channel.sent.filter((r) => r.fields?.[0]?.name === 'Game Over').length;
}

test('a win credits the winner and the next round avoids the same song', async () => {
  const { channel, content, scheduler, ended } = setup(
    [lyricJson('Imagine', 'John Lennon'), lyricJson('Imagine', 'John Lennon'), lyricJson('Yesterday', 'The Beatles')],
    { roundCap: 2 },
  );
  const done = scheduler.start();

  await roundLive(scheduler, channel, 1);
  channel.say('u-1', 'imagine');
  await roundLive(scheduler, channel, 2);

  assert.deepEqual(Array.from(scheduler.session.scores), [['u-1', 1]]);
  assert.equal(scheduler.session.streak, 1);
  assert.equal(scheduler.session.activeRound?.payload.title, 'Yesterday');
  assert.equal(content.requests.length, 3);

  channel.say('u-2', 'the beatles');
  assert.equal(await done, 'round-cap');
  assert.deepEqual(ended, ['round-cap']);
  assert.deepEqual(Array.from(scheduler.session.scores), [
    ['u-1', 1],
    ['u-2', 1],
  ]);
  assert.equal(scheduler.session.streak, 2);
  assert.equal(gameOverCount(channel), 1);
  assert.deepEqual(channel.sent.at(-1), renderRanking(scheduler.session.scores, { final: true, nextLevel: 2 }));
});

test('a timeout with no pass used ends the session and keeps the scores', async () => {
  const { channel, content, scheduler } = setup([lyricJson('Imagine', 'John Lennon')]);

  assert.equal(await scheduler.start(), 'timed-out');
  assert.equal(scheduler.session.roundsPlayed, 1);
  assert.equal(scheduler.session.scores.size, 0);
  assert.equal(scheduler.session.active, false);
  assert.equal(content.requests.length, 1);
  assert.deepEqual(channel.sent.at(-1), renderRanking(new Map(), { final: true, nextLevel: 1 }));
  assert.equal(channel.listenerCount, 0);
});

test('the last level ends the session with a single final ranking', async () => {
  const { channel, scheduler } = setup([lyricJson('Imagine', 'John Lennon')], { roundCap: 1 });
  const done = scheduler.start();
  await roundLive(scheduler, channel, 1);
  channel.say('u-1', 'john lennon');

  assert.equal(await done, 'round-cap');
  assert.equal(gameOverCount(channel), 1);
  assert.equal(channel.sent.filter((r) => r.fields?.[0]?.name === 'Next Step').length, 0);
  const winner = channel.sent.find((r) => r.title === '✅ Answer guessed!');
  assert.equal(winner?.description, '**Song:** Imagine – John Lennon\n**Winner:** <@u-1>\n\nThat was the last level!');
});

test('in session scope a timeout after a pass keeps the game going', async () => {
  const { channel, scheduler } = setup(
    [lyricJson('Imagine', 'John Lennon'), lyricJson('Yesterday', 'The Beatles'), lyricJson('Hello', 'Adele')],
    { roundCap: 3, budgetScope: 'session' },
  );
  const done = scheduler.start();
  await roundLive(scheduler, channel, 1);
  channel.say('u-1', 'pass');

  assert.equal(await done, 'round-cap');
  assert.equal(scheduler.session.roundsPlayed, 3);
  assert.equal(scheduler.session.passesUsed, 1);
  const timeUpFooters = channel.sent.filter((r) => r.title === "⏰ Time's up!").map((r) => r.footer);
  assert.deepEqual(timeUpFooters, ['Round failed.', 'Round failed. Mic session ended.']);
});

const fiveSongs = ['Alpha', 'Bravo', 'Charlie', 'Delta', 'Echo'].map((title) => lyricJson(title, 'The Band'));

test('session scope wipes the scoreboard when every hint and pass is spent and the round still times out', async () => {
  const { channel, scheduler } = setup(fiveSongs, { roundCap: 5, budgetScope: 'session' });
  const done = scheduler.start();

  await roundLive(scheduler, channel, 1);
  channel.say('u-1', 'alpha');
  await roundLive(scheduler, channel, 2);
  channel.say('u-2', 'hint');
  channel.say('u-2', 'hint');
  channel.say('u-2', 'hint');
  channel.say('u-2', 'pass');
  await roundLive(scheduler, channel, 3);
  channel.say('u-2', 'pass');
  await roundLive(scheduler, channel, 4);
  channel.say('u-2', 'pass');

  assert.equal(await done, 'round-cap');
  assert.equal(scheduler.session.hintsUsed, 3);
  assert.equal(scheduler.session.passesUsed, 3);
  assert.equal(scheduler.session.scores.size, 0);
  assert.equal(scheduler.session.streak, 0);
  assert.equal(channel.sent.filter((r) => r.title === '💥 Hard reset').length, 1);
});

test('session scope keeps the scoreboard when only the passes are spent', async () => {
  const { channel, scheduler } = setup(fiveSongs, { roundCap: 5, budgetScope: 'session' });
  const done = scheduler.start();

  await roundLive(scheduler, channel, 1);
  channel.say('u-1', 'alpha');
  for (const level of [2, 3, 4]) {
    await roundLive(scheduler, channel, level);
    channel.say('u-2', 'pass');
  }

  assert.equal(await done, 'round-cap');
  assert.deepEqual(Array.from(scheduler.session.scores), [['u-1', 1]]);
  assert.equal(channel.sent.filter((r) => r.title === '💥 Hard reset').length, 0);
});

test('round scope refills budgets, so a later timeout ends the session without a wipe', async () => {
  const { channel, scheduler } = setup(fiveSongs, { roundCap: 5, budgetScope: 'round' });
  const done = scheduler.start();

  await roundLive(scheduler, channel, 1);
  channel.say('u-1', 'alpha');
  await roundLive(scheduler, channel, 2);
  channel.say('u-2', 'hint');
  channel.say('u-2', 'hint');
  channel.say('u-2', 'hint');
  channel.say('u-2', 'pass');

  assert.equal(await done, 'timed-out');
  assert.equal(scheduler.session.roundsPlayed, 3);
  assert.deepEqual(Array.from(scheduler.session.scores), [['u-1', 1]]);
  assert.equal(scheduler.session.streak, 0);
  assert.equal(channel.sent.filter((r) => r.title === '💥 Hard reset').length, 0);
});

test('a generation failure ends the session with a notice', async () => {
  const { channel, scheduler } = setup([new Error('service down')]);

  assert.equal(await scheduler.start(), 'generation-failed');
  assert.equal(scheduler.session.roundsPlayed, 0);
  assert.deepEqual(channel.sent.at(-1), {
    content: "⚠️ I couldn't get a new round from the generator. Mic game has been stopped. Try `/mic start` again in a bit.",
  });
});

test('stop cancels the live round and ends the session', async () => {
  const { channel, scheduler, ended } = setup([lyricJson('Imagine', 'John Lennon')]);
  const done = scheduler.start();
  await roundLive(scheduler, channel, 1);
  const round = scheduler.session.activeRound;

  scheduler.stop();
  assert.equal(await done, 'stopped');
  assert.deepEqual(ended, ['stopped']);
  assert.equal(round?.status, 'cancelled');
  assert.equal(round?.hasTimers, false);
  assert.equal(channel.listenerCount, 0);
  assert.equal(scheduler.session.activeRound, undefined);
});

test('hint and pass requests are validated before reaching the round', async () => {
  const { channel, scheduler } = setup([lyricJson('Imagine', 'John Lennon', { hint_lines: ['one clue'] })], {
    roundCap: 1,
  });
  assert.throws(
    () => scheduler.requestSignal('hint', 'u-1'),
    (error) => error instanceof InvariantError && error.code === 'no-round',
  );

  const done = scheduler.start();
  await roundLive(scheduler, channel, 1);
  scheduler.requestSignal('hint', 'u-1');
  await waitFor(() => scheduler.session.activeRound?.hintsRevealed === 1);
  assert.throws(
    () => scheduler.requestSignal('hint', 'u-1'),
    (error) => error instanceof InvariantError && error.code === 'no-hint-left',
  );

  scheduler.requestSignal('pass', 'u-2');
  assert.equal(await done, 'round-cap');
  assert.equal(scheduler.session.passesUsed, 1);
  assert.equal(scheduler.session.hintsUsed, 1);
});

test('an exhausted budget is rejected up front', async () => {
  const { channel, scheduler } = setup([lyricJson('Imagine', 'John Lennon')], { roundCap: 1 });
  const done = scheduler.start();
  await roundLive(scheduler, channel, 1);
  scheduler.session.passesUsed = 3;

  assert.throws(
    () => scheduler.requestSignal('pass', 'u-1'),
    (error) => error instanceof InvariantError && error.code === 'pass-budget',
  );
  scheduler.stop();
  assert.equal(await done, 'stopped');
});
