import {
  ChannelType,
  Client,
  Events,
  GatewayIntentBits,
  MessageFlags,
  type ChatInputCommandInteraction,
  type TextChannel,
} from 'discord.js';
import { COMMAND_NAME, parsePrefixStart, readSingleRoundOptions, readStartOptions } from './commands.ts';
import { appConfig, defaultTimings, ensureRuntimeEnv } from './config.ts';
import { DiscordChannel, MessageHub, buildEmbed, toInbound } from './discordChannel.ts';
import { InvariantError } from './errors.ts';
import { RoundGenerator } from './generator.ts';
import { logEvent, serializeError } from './logger.ts';
import { OpenAIContentGenerator } from './openaiGenerator.ts';
import { GameRegistry } from './registry.ts';
import { renderRanking } from './render.ts';
import type { SessionOptions } from './types.ts';

ensureRuntimeEnv();

const client = new Client({
  intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildMessages, GatewayIntentBits.MessageContent],
});

const hub = new MessageHub();
const registry = new GameRegistry({
  rounds: new RoundGenerator(
    new OpenAIContentGenerator({
      apiKey: appConfig.openaiApiKey,
      model: appConfig.openaiModel,
      imageModel: appConfig.openaiImageModel,
    }),
  ),
  timings: defaultTimings,
});

/** ===== Start ===== */
function startSession(channel: TextChannel, options: SessionOptions) {
  return registry.start(new DiscordChannel(channel, hub), options);
}

async function replyEphemeral(interaction: ChatInputCommandInteraction, content: string) {
  if (interaction.deferred || interaction.replied) {
    await interaction.editReply({ content });
    return;
  }
  await interaction.reply({ content, flags: MessageFlags.Ephemeral });
}

/** ===== Status ===== */
async function showStatus(interaction: ChatInputCommandInteraction) {
  const scheduler = registry.get(interaction.channelId);
  if (!scheduler) {
    return replyEphemeral(interaction, 'No Mic game is running in this channel.');
  }
  const { session } = scheduler;
  const round = session.activeRound;
  const ranking = renderRanking(session.scores, { final: false, nextLevel: session.roundsPlayed + 1 });
  const lines = [
    `Level **${session.roundsPlayed + (round ? 1 : 0)}** of **${session.options.roundCap}**`,
    round?.isActive ? `Round live, **${round.secondsLeft()}s** left.` : 'Between rounds.',
    `🔥 Streak: ${session.streak} • 💡 Hints left: ${session.remaining('hint')} • ⏭️ Passes left: ${session.remaining('pass')}`,
  ];
  return interaction.reply({
    content: lines.join('\n'),
    embeds: [buildEmbed({ ...ranking, fields: [] })],
    flags: MessageFlags.Ephemeral,
  });
}

/** ===== Slash interactions ===== */
async function handleCommand(interaction: ChatInputCommandInteraction) {
  const sub = interaction.options.getSubcommand(false);
  const channel = interaction.channel;

  if (sub === 'start' || sub === 'round') {
    if (!channel || channel.type !== ChannelType.GuildText) {
      return replyEphemeral(interaction, 'Please use this in a normal text channel.');
    }
    const options = sub === 'start' ? readStartOptions(interaction) : readSingleRoundOptions(interaction);
    startSession(channel, options);
    const what = sub === 'start' ? `Mic game with **${options.roundCap}** levels` : 'a single round';
    return replyEphemeral(interaction, `Starting ${what}...`);
  }

  if (sub === 'hint') {
    registry.useHint(interaction.channelId, interaction.user.id);
    return replyEphemeral(interaction, '💡 Hint on its way.');
  }
  if (sub === 'pass') {
    registry.usePass(interaction.channelId, interaction.user.id);
    return replyEphemeral(interaction, '⏭️ Pass requested.');
  }
  if (sub === 'stop') {
    await interaction.deferReply();
    await registry.stop(interaction.channelId);
    return interaction.editReply('🛑 Mic game stopped.');
  }
  if (sub === 'status') return showStatus(interaction);

  return replyEphemeral(
    interaction,
    'Use **/mic start**, **/mic round**, **/mic hint**, **/mic pass**, **/mic stop** or **/mic status**.',
  );
}

client.on(Events.InteractionCreate, async (interaction) => {
  if (!interaction.isChatInputCommand()) return;
  if (interaction.commandName !== COMMAND_NAME) return;

  try {
    await handleCommand(interaction);
  } catch (e) {
    if (e instanceof InvariantError) {
      await replyEphemeral(interaction, e.message).catch((error) => {
        logEvent('warn', 'interaction_reply_failed', { error: serializeError(error) });
      });
      return;
    }
    logEvent('error', 'interaction_failed', { channelId: interaction.channelId, error: serializeError(e) });
    await replyEphemeral(interaction, '⚠️ Something went wrong.').catch((error) => {
      logEvent('warn', 'interaction_reply_failed', { error: serializeError(error) });
    });
  }
});

/** ===== Messages: prefix starters, then guesses/hints/passes ===== */
client.on(Events.MessageCreate, async (msg) => {
  try {
    if (msg.author.bot) return;

    const rounds = parsePrefixStart(msg.content);
    if (rounds !== null) {
      if (msg.channel.type !== ChannelType.GuildText) {
        await msg.reply({ content: 'Please use this in a normal text channel.', allowedMentions: { repliedUser: false } });
        return;
      }
      // claim the channel before the first await
      const started = registry.tryStart(new DiscordChannel(msg.channel, hub), {
        kind: 'lyric',
        roundCap: rounds,
        answerMode: 'either',
        budgetScope: 'round',
      });
      const content = started.ok ? `Starting Mic game with **${rounds}** levels...` : started.reason;
      await msg.reply({ content, allowedMentions: { repliedUser: false } });
      return;
    }

    hub.publish(toInbound(msg));
  } catch (e) {
    logEvent('error', 'message_handler_failed', { channelId: msg.channelId, error: serializeError(e) });
  }
});

/** ===== Ready, login, shutdown ===== */
client.once(Events.ClientReady, (c) => {
  logEvent('info', 'client_ready', { user: c.user.tag, pid: process.pid });
});

async function shutdown(signal: string) {
  logEvent('info', 'shutdown', { signal, sessions: registry.size });
  await registry.shutdown();
  await client.destroy();
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error) => {
      logEvent('error', 'shutdown_failed', { error: serializeError(error) });
      process.exit(1);
    });
  });
}

client.login(appConfig.discordToken).catch((error) => {
  logEvent('error', 'login_failed', { error: serializeError(error) });
  process.exit(1);
});
