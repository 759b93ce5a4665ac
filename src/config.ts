import 'dotenv/config';
import type { Timings } from './types.ts';

export const MAX_ROUNDS = 50;
export const BUDGET_CAP = 3;

export function parseNumberOrFallback(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return value !== undefined && value.trim() !== '' && Number.isFinite(parsed) ? parsed : fallback;
}

export const appConfig = {
  discordToken: process.env.DISCORD_TOKEN ?? '',
  guildId: process.env.GUILD_ID ?? '',
  openaiApiKey: process.env.OPENAI_API_KEY ?? '',
  openaiModel: process.env.OPENAI_MODEL ?? 'gpt-4.1-mini',
  openaiImageModel: process.env.OPENAI_IMAGE_MODEL ?? 'gpt-image-1',
  defaultRounds: clampRounds(parseNumberOrFallback(process.env.MIC_DEFAULT_ROUNDS, 10)),
  breatherSeconds: parseNumberOrFallback(process.env.MIC_BREATHER_SECONDS, 15),
};

export const defaultTimings: Timings = {
  roundMs: { lyric: 60_000, image: 30_000 },
  countdownMs: 5_000,
  breatherMs: appConfig.breatherSeconds * 1000,
  rankingPauseMs: 3_000,
};

export function clampRounds(value: number | null | undefined, fallback = 10): number {
  if (value === null || value === undefined || !Number.isFinite(value)) return fallback;
  return Math.min(MAX_ROUNDS, Math.max(1, Math.trunc(value)));
}

export function ensureRuntimeEnv() {
  if (!appConfig.discordToken) {
    throw new Error('Missing DISCORD_TOKEN in environment.');
  }
  if (!appConfig.openaiApiKey) {
    throw new Error('Missing OPENAI_API_KEY in environment.');
  }
}
