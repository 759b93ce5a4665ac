import test from 'node:test';
import assert from 'node:assert/strict';
import { isCorrect, normalize, policyFor, type MatchTarget } from './matcher.ts';

function target(overrides: Partial<MatchTarget> = {}): MatchTarget {
  return {
    payload: {
      title: 'Imagine',
      artist: 'John Lennon',
      titleAnswers: ['imagine', 'imagine john lennon'],
      artistAnswers: ['john lennon', 'lennon'],
    },
    policy: 'strict',
    answerMode: 'either',
    ...overrides,
  };
}

test('normalize lowercases, collapses whitespace and strips diacritics', () => {
  assert.equal(normalize('  Beyoncé   KNOWLES \n'), 'beyonce knowles');
  assert.equal(normalize(normalize('  Don’t  Stop ')), normalize('  Don’t  Stop '));
});

test('every accepted variant matches, whatever its casing or spacing', () => {
  const round = target();
  for (const answer of [...round.payload.titleAnswers, ...round.payload.artistAnswers]) {
    assert.equal(isCorrect(round, answer), true, answer);
    assert.equal(isCorrect(round, `  ${answer.toUpperCase().split(' ').join('   ')} `), true, answer);
  }
});

test('empty guesses never match', () => {
  assert.equal(isCorrect(target(), ''), false);
  assert.equal(isCorrect(target(), '   '), false);
});

test('strict mode ignores a guess that only shares a word with the artist', () => {
  const round = target({
    payload: {
      title: 'Yellow',
      artist: 'Coldplay',
      titleAnswers: ['yellow'],
      artistAnswers: ['coldplay'],
    },
  });
  assert.equal(isCorrect(round, 'cold'), false);
  assert.equal(isCorrect(round, 'i think it is yellow'), false);
  assert.equal(isCorrect(round, 'yellow by coldplay'), true);
});

test('strict mode rejects a surname that is not an accepted variant', () => {
  const round = target({
    payload: { title: 'Hello', artist: 'Adele Adkins', titleAnswers: ['hello'], artistAnswers: ['adele adkins'] },
  });
  assert.equal(isCorrect(round, 'adkins'), false);
  assert.equal(isCorrect(round, 'Adele Adkins'), true);
});

test('loose mode accepts the primary title inside a longer guess', () => {
  const round = target({ policy: 'loose' });
  assert.equal(isCorrect(round, 'is it imagine?'), true);
  assert.equal(isCorrect(round, 'something by john lennon'), true);
  assert.equal(isCorrect(round, 'beatles'), false);
});

test('answer mode restricts which side can win', () => {
  assert.equal(isCorrect(target({ answerMode: 'title' }), 'lennon'), false);
  assert.equal(isCorrect(target({ answerMode: 'title' }), 'imagine'), true);
  assert.equal(isCorrect(target({ answerMode: 'artist' }), 'imagine'), false);
  assert.equal(isCorrect(target({ answerMode: 'artist' }), 'lennon'), true);
  assert.equal(isCorrect(target({ answerMode: 'title' }), 'imagine john lennon'), true);
});

test('an empty artist never matches by substring', () => {
  const round = target({
    policy: 'loose',
    payload: { title: 'Cat', artist: '', titleAnswers: ['cat', 'kitten'], artistAnswers: [] },
  });
  assert.equal(isCorrect(round, 'dog'), false);
  assert.equal(isCorrect(round, 'a cat!'), true);
  assert.equal(isCorrect(round, 'Kitten'), true);
});

test('lyric rounds are strict and image rounds are loose', () => {
  assert.equal(policyFor('lyric'), 'strict');
  assert.equal(policyFor('image'), 'loose');
});
