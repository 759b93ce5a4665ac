import test from 'node:test';
import assert from 'node:assert/strict';
import { Inbox } from './inbox.ts';

test('queued items come out in order', async () => {
  const inbox = new Inbox<string>();
  inbox.push('a');
  inbox.push('b');
  assert.equal(inbox.size, 2);
  assert.equal(await inbox.next(100), 'a');
  assert.equal(await inbox.next(100), 'b');
  assert.equal(inbox.size, 0);
});

test('a pending reader is woken by push', async () => {
  const inbox = new Inbox<string>();
  const pending = inbox.next(1000);
  inbox.push('late');
  assert.equal(await pending, 'late');
  assert.equal(inbox.size, 0);
});

test('next resolves null on timeout or a non-positive wait', async () => {
  const inbox = new Inbox<string>();
  assert.equal(await inbox.next(10), null);
  assert.equal(await inbox.next(0), null);
  assert.equal(await inbox.next(-5), null);
});

test('close wakes the reader and drops later pushes', async () => {
  const inbox = new Inbox<string>();
  inbox.push('stale');
  inbox.close();
  assert.equal(inbox.size, 0);
  assert.equal(await inbox.next(1000), null);

  const other = new Inbox<string>();
  const pending = other.next(1000);
  other.close();
  other.push('ignored');
  assert.equal(await pending, null);
  assert.equal(other.size, 0);
});

test('a second concurrent reader is rejected', async () => {
  const inbox = new Inbox<number>();
  const first = inbox.next(1000);
  await assert.rejects(inbox.next(1000), { message: 'Inbox already has a pending reader' });
  inbox.push(1);
  assert.equal(await first, 1);
});
