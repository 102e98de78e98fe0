import { loadConfig, AppConfig } from './config';
import { createApp } from './app';

async function main(): Promise<void> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    console.error('[index] Invalid configuration, refusing to start', err);
    process.exit(1);
  }

  const { bot, storage } = createApp(config);
  await storage.init();

  const closeStorage = () =>
    storage.close().catch((err: unknown) => console.error('[index] Failed to close database pool', err));

  bot.launch().catch(async (err: unknown) => {
    console.error('[index] Bot stopped with an error', err);
    await closeStorage();
    process.exit(1);
  });
  console.info(`[index] Bot started (max genres: ${config.maxGenres})`);

  // Enable graceful stop
  const shutdown = (signal: string) => {
    bot.stop(signal);
    void closeStorage();
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  console.error('[index] Failed to start', err);
  process.exit(1);
});
