import {
  Routes,
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type REST,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import { appConfig, clampRounds, MAX_ROUNDS } from './config.ts';
import type { AnswerMode, BudgetScope, RoundKind, SessionOptions } from './types.ts';

export const COMMAND_NAME = 'mic';

export function buildCommands(): RESTPostAPIChatInputApplicationCommandsJSONBody[] {
  return [
    new SlashCommandBuilder()
      .setName(COMMAND_NAME)
      .setDescription('Guess-the-song party game (lyrics) and guess-the-doodle rounds')
      .setDMPermission(false)
      .addSubcommand((sc) =>
        sc
          .setName('start')
          .setDescription('Start a multi-level game in this channel')
          .addIntegerOption((o) =>
            o
              .setName('rounds')
              .setDescription(`How many levels to play (default ${appConfig.defaultRounds})`)
              .setMinValue(1)
              .setMaxValue(MAX_ROUNDS),
          )
          .addStringOption((o) => o.setName('genre').setDescription('Genre filter, e.g. rock').setMaxLength(60))
          .addStringOption((o) => o.setName('era').setDescription('Era filter, e.g. 90s').setMaxLength(60))
          .addStringOption((o) =>
            o
              .setName('answer')
              .setDescription('What counts as a correct guess')
              .addChoices(
                { name: 'title or artist', value: 'either' },
                { name: 'title only', value: 'title' },
                { name: 'artist only', value: 'artist' },
              ),
          )
          .addStringOption((o) =>
            o
              .setName('budget')
              .setDescription('Hints and passes: 3 per round, or 3 for the whole game')
              .addChoices({ name: 'per round', value: 'round' }, { name: 'whole game', value: 'session' }),
          ),
      )
      .addSubcommand((sc) =>
        sc
          .setName('round')
          .setDescription('Play a single round')
          .addStringOption((o) =>
            o
              .setName('kind')
              .setDescription('Lyrics or doodle')
              .addChoices({ name: 'lyrics', value: 'lyric' }, { name: 'doodle', value: 'image' }),
          )
          .addStringOption((o) => o.setName('genre').setDescription('Genre or theme filter').setMaxLength(60)),
      )
      .addSubcommand((sc) => sc.setName('hint').setDescription('Reveal the next hint for the current round'))
      .addSubcommand((sc) => sc.setName('pass').setDescription('Skip the current round'))
      .addSubcommand((sc) => sc.setName('stop').setDescription('Stop the game in this channel'))
      .addSubcommand((sc) => sc.setName('status').setDescription('Show the running game, budgets and ranking'))
      .toJSON(),
  ];
}

function pickChoice<T extends string>(value: string | null, allowed: readonly T[], fallback: T): T {
  return allowed.find((item) => item === value) ?? fallback;
}

function optionalText(value: string | null) {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function readStartOptions(interaction: ChatInputCommandInteraction): SessionOptions {
  return {
    kind: 'lyric',
    roundCap: clampRounds(interaction.options.getInteger('rounds'), appConfig.defaultRounds),
    genre: optionalText(interaction.options.getString('genre')),
    era: optionalText(interaction.options.getString('era')),
    answerMode: pickChoice<AnswerMode>(interaction.options.getString('answer'), ['either', 'title', 'artist'], 'either'),
    budgetScope: pickChoice<BudgetScope>(interaction.options.getString('budget'), ['round', 'session'], 'round'),
  };
}

export function readSingleRoundOptions(interaction: ChatInputCommandInteraction): SessionOptions {
  return {
    kind: pickChoice<RoundKind>(interaction.options.getString('kind'), ['lyric', 'image'], 'lyric'),
    roundCap: 1,
    genre: optionalText(interaction.options.getString('genre')),
    answerMode: 'either',
    budgetScope: 'round',
  };
}

const PREFIX_START = /^(?:!|m\.)mic(?:\s+(\S+))?\s*$/i;

/** `!mic 5` / `m.mic` → round cap, or null when the message is not a start command. */
export function parsePrefixStart(content: string, fallback = appConfig.defaultRounds): number | null {
  const match = PREFIX_START.exec(content.trim());
  if (!match) return null;
  const parsed = match[1] === undefined ? Number.NaN : Number.parseInt(match[1], 10);
  return clampRounds(Number.isNaN(parsed) ? null : parsed, fallback);
}

/** ===== REST helpers for the command scripts ===== */
function hasStringField<K extends string>(value: unknown, key: K): value is Record<K, string> {
  return typeof value === 'object' && value !== null && key in value && typeof Reflect.get(value, key) === 'string';
}

export async function fetchApplicationId(rest: REST): Promise<string> {
  const app: unknown = await rest.get(Routes.oauth2CurrentApplication());
  if (!hasStringField(app, 'id')) throw new Error('Could not read the Application ID for this token.');
  return app.id;
}

export async function fetchCommandNames(rest: REST, route: `/${string}`): Promise<string[]> {
  const list: unknown = await rest.get(route);
  if (!Array.isArray(list)) return [];
  return list.filter((c: unknown): c is Record<'name', string> => hasStringField(c, 'name')).map((c) => c.name);
}
