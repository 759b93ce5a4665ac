import { REST, Routes } from 'discord.js';
import { fetchApplicationId } from './commands.ts';
import { appConfig } from './config.ts';

const rest = new REST({ version: '10' }).setToken(appConfig.discordToken);

async function main() {
  const appId = await fetchApplicationId(rest);

  if (appConfig.guildId) {
    console.log('🛑 GUILD_ID is set; comment it out in .env to wipe GLOBAL commands.');
    process.exit(1);
  }

  console.log('🗑 Removing all **GLOBAL** commands…');
  await rest.put(Routes.applicationCommands(appId), { body: [] });
  console.log('✅ GLOBAL commands removed.');
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
