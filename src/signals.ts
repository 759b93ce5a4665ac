import type { InboundMessage, RoundSignal, SignalEnvelope } from './types.ts';

const PASS_WORDS = new Set(['pass', '!pass', 'm.pass', '/pass']);
const HINT_WORDS = new Set(['hint', '!hint', 'm.hint', '/hint']);

export function classifySignal(text: string): RoundSignal {
  const word = text.trim().toLowerCase();
  if (PASS_WORDS.has(word)) return { type: 'pass' };
  if (HINT_WORDS.has(word)) return { type: 'hint' };
  return { type: 'guess', text };
}

export function toEnvelope(message: InboundMessage): SignalEnvelope {
  return {
    signal: classifySignal(message.content),
    userId: message.authorId,
    message: { id: message.id, url: message.url },
  };
}
