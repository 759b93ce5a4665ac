import { extractJsonObject, type JsonObject } from './jsonExtraction.ts';
import { normalize } from './matcher.ts';
import type { RoundKind, RoundPayload } from './types.ts';

export const MAX_EXCERPT_LINES = 3;
export const MAX_WORDS_PER_LINE = 8;
export const MAX_EXCERPT_CHARS = 90;
export const MAX_HINT_LINES = 3;

export type ParseResult =
  | { ok: true; payload: RoundPayload }
  | { ok: false; reason: string };

function toStringList(value: unknown): string[] {
  const items = Array.isArray(value) ? value : value === undefined || value === null ? [] : [value];
  const out: string[] = [];
  for (const item of items) {
    if (typeof item !== 'string' && typeof item !== 'number') continue;
    const s = String(item).trim();
    if (s) out.push(s);
  }
  return out;
}

function toText(value: unknown): string {
  return typeof value === 'string' || typeof value === 'number' ? String(value).trim() : '';
}

export function normalizeAnswers(value: unknown): string[] {
  return Array.from(new Set(toStringList(value).map(normalize).filter(Boolean)));
}

/**
 * Keeps at most three lines of at most eight words each. Lines are appended
 * while the running character total stays within the budget; the first line
 * that would overflow it ends the excerpt.
 */
export function clampExcerpt(lines: unknown): string[] {
  const safe: string[] = [];
  let total = 0;
  for (const line of toStringList(lines).slice(0, MAX_EXCERPT_LINES)) {
    const short = line.split(/\s+/).slice(0, MAX_WORDS_PER_LINE).join(' ').slice(0, MAX_EXCERPT_CHARS);
    total += short.length;
    if (total > MAX_EXCERPT_CHARS) break;
    safe.push(short);
  }
  return safe;
}

function parseLyric(data: JsonObject): ParseResult {
  const title = toText(data.song_title);
  const excerpt = clampExcerpt(data.lyric_lines);
  if (!title) return { ok: false, reason: 'missing song_title' };
  if (!excerpt.length) return { ok: false, reason: 'missing lyric_lines' };

  const payload: RoundPayload = {
    kind: 'lyric',
    title,
    artist: toText(data.artist),
    excerpt,
    hints: toStringList(data.hint_lines).slice(0, MAX_HINT_LINES),
    titleAnswers: normalizeAnswers(data.acceptable_title_answers),
    artistAnswers: normalizeAnswers(data.acceptable_artist_answers),
  };
  return { ok: true, payload: Object.freeze(payload) };
}

function parseImage(data: JsonObject): ParseResult {
  const word = toText(data.word);
  const answers = normalizeAnswers(data.acceptable_answers);
  if (!word) return { ok: false, reason: 'missing word' };
  if (!answers.length) return { ok: false, reason: 'missing acceptable_answers' };

  const payload: RoundPayload = {
    kind: 'image',
    title: word,
    artist: '',
    excerpt: [],
    hints: toStringList(data.hint_lines).slice(0, MAX_HINT_LINES),
    titleAnswers: answers,
    artistAnswers: [],
    imagePrompt: toText(data.image_prompt) || `A simple black-and-white doodle of ${word}`,
  };
  return { ok: true, payload: Object.freeze(payload) };
}

export function parseRoundPayload(kind: RoundKind, rawText: string): ParseResult {
  const data = extractJsonObject(rawText);
  if (!data) return { ok: false, reason: 'no JSON object in response' };
  return kind === 'lyric' ? parseLyric(data) : parseImage(data);
}
