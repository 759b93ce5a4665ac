import { REST, Routes } from 'discord.js';
import { buildCommands, fetchApplicationId } from './commands.ts';
import { appConfig } from './config.ts';

if (!appConfig.discordToken) {
  console.error('Missing DISCORD_TOKEN in .env');
  process.exit(1);
}

const rest = new REST({ version: '10' }).setToken(appConfig.discordToken);

async function main() {
  const appId = await fetchApplicationId(rest);
  const commands = buildCommands();

  if (appConfig.guildId) {
    console.log('🔁 Registering GUILD commands…');
    await rest.put(Routes.applicationGuildCommands(appId, appConfig.guildId), { body: commands });
    console.log('✅ GUILD commands up to date.');
  } else {
    console.log('🌍 Registering GLOBAL commands (may take a few minutes)…');
    await rest.put(Routes.applicationCommands(appId), { body: commands });
    console.log('✅ GLOBAL commands up to date.');
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
