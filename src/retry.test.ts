import test from 'node:test';
import assert from 'node:assert/strict';
import { retry } from './retry.ts';

test('retry stops at the first acceptable value', async () => {
  const seen: number[] = [];
  const result = await retry(
    5,
    async (attempt) => {
      seen.push(attempt);
      return attempt * 10;
    },
    (value) => value >= 20,
  );
  assert.deepEqual(result, { value: 20, attempts: 2, accepted: true });
  assert.deepEqual(seen, [1, 2]);
});

test('retry returns the last value unaccepted at the ceiling', async () => {
  const result = await retry(3, async (attempt) => `try-${attempt}`, () => false);
  assert.deepEqual(result, { value: 'try-3', attempts: 3, accepted: false });
});

test('retry always makes at least one attempt', async () => {
  let calls = 0;
  const result = await retry(
    0,
    async () => {
      calls += 1;
      return 'only';
    },
    () => false,
  );
  assert.equal(calls, 1);
  assert.deepEqual(result, { value: 'only', attempts: 1, accepted: false });
});

test('retry does not retry a thrown error', async () => {
  let calls = 0;
  await assert.rejects(
    retry(
      4,
      async () => {
        calls += 1;
        throw new Error('boom');
      },
      () => true,
    ),
    { message: 'boom' },
  );
  assert.equal(calls, 1);
});
