import type { GenerationRequest, RoundConstraints } from './types.ts';

const MAX_AVOID_IN_PROMPT = 40;

function buildAvoidText(constraints: RoundConstraints): string {
  const lines: string[] = [];
  const avoid = Array.from(constraints.avoidTitles).slice(-MAX_AVOID_IN_PROMPT);
  if (avoid.length) {
    lines.push(`Do NOT choose any of these, they were already used: ${avoid.map((t) => `"${t}"`).join(', ')}.`);
  }
  if (constraints.previous) {
    const by = constraints.previous.artist ? ` by ${constraints.previous.artist}` : '';
    lines.push(`The previous round used "${constraints.previous.title}"${by}. You MUST NOT choose it again.`);
  }
  return lines.join('\n');
}

function buildFilterText(constraints: RoundConstraints): string {
  const parts: string[] = [];
  if (constraints.genre) parts.push(`genre: ${constraints.genre}`);
  if (constraints.era) parts.push(`era: ${constraints.era}`);
  return parts.length ? `Stick to this selection (${parts.join(', ')}).` : '';
}

function lyricPrompt(constraints: RoundConstraints): string {
  return `
You are powering a Discord "guess the song" game using lyrics.

Pick a well-known, globally recognisable song that many people are likely to know.
${buildFilterText(constraints)}
${buildAvoidText(constraints)}

Return ONLY a compact JSON object with this exact structure:

{
  "song_title": "...",
  "artist": "...",
  "lyric_lines": ["...", "...", "..."],
  "hint_lines": ["...", "..."],
  "acceptable_title_answers": ["...", "..."],
  "acceptable_artist_answers": ["...", "..."]
}

Rules:
- "lyric_lines" must contain 1 to 3 very short lyric-style lines:
  - Each line MUST be 8 words or fewer.
  - The TOTAL characters across all lines MUST stay safely under 90 characters.
  - Do NOT output full verses or long passages.
- "hint_lines" holds up to 3 short clues (release year, genre, a famous fact) that never contain the title or the artist.
- "acceptable_title_answers": sensible variations of the song title (title alone, title + artist, common short forms).
- "acceptable_artist_answers": reasonable variations of the artist name (full name, common short name).
- Do not include any explanation or text outside the JSON object.
`.trim();
}

function imagePrompt(constraints: RoundConstraints): string {
  return `
You are powering a Discord "guess the doodle" game.

Pick one everyday, easy-to-draw thing that a picture can make obvious.
${buildFilterText(constraints)}
${buildAvoidText(constraints)}

Return ONLY a compact JSON object with this exact structure:

{
  "word": "...",
  "image_prompt": "...",
  "hint_lines": ["...", "..."],
  "acceptable_answers": ["...", "..."]
}

Rules:
- "word" is a single common noun or a very short phrase.
- "image_prompt" describes a simple black-and-white doodle of the word, with no text or letters in the picture.
- "hint_lines" holds up to 3 short clues that never contain the word.
- "acceptable_answers" lists the word plus common synonyms and singular/plural forms.
- Do not include any explanation or text outside the JSON object.
`.trim();
}

export function buildGenerationRequest(constraints: RoundConstraints): GenerationRequest {
  if (constraints.kind === 'image') {
    return { kind: 'image', prompt: imagePrompt(constraints), temperature: 1, maxTokens: 300 };
  }
  return { kind: 'lyric', prompt: lyricPrompt(constraints), temperature: 0.9, maxTokens: 400 };
}
