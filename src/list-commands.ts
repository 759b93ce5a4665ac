import { REST, Routes } from 'discord.js';
import { fetchApplicationId, fetchCommandNames } from './commands.ts';
import { appConfig } from './config.ts';

const rest = new REST({ version: '10' }).setToken(appConfig.discordToken);

async function main() {
  const appId = await fetchApplicationId(rest);

  const global = await fetchCommandNames(rest, Routes.applicationCommands(appId));
  console.log(`🌍 GLOBAL (${global.length}):`, global.join(', ') || '—');

  if (appConfig.guildId) {
    const guild = await fetchCommandNames(rest, Routes.applicationGuildCommands(appId, appConfig.guildId));
    console.log(`🏠 GUILD ${appConfig.guildId} (${guild.length}):`, guild.join(', ') || '—');
  } else {
    console.log('🏠 GUILD: (no GUILD_ID in .env)');
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
