import { Pool } from 'pg';
import { Telegraf, Context } from 'telegraf';
import { AppConfig } from './config';
import { createBot } from './bot';
import { ConversationService } from './services/conversationService';
import { GeminiService } from './services/geminiService';
import { SessionManager } from './services/sessionManager';
import { PostgresStorage } from './services/storageService';

export interface App {
  bot: Telegraf<Context>;
  conversation: ConversationService;
  storage: PostgresStorage;
}

/**
 * Assembles the bot from configuration; shared by long-polling and webhook
 * entry points.  Call `storage.init()` before handling updates.
 */
export function createApp(config: AppConfig): App {
  const storage = new PostgresStorage(new Pool({ connectionString: config.databaseUrl }));
  const conversation = new ConversationService({
    sessions: SessionManager.create({ redisUrl: config.redisUrl, ttlSeconds: config.sessionTtlSeconds }),
    model: new GeminiService(config.geminiApiKey, config.geminiModel),
    storage,
    maxGenres: config.maxGenres,
  });
  const bot = createBot(config.botToken, conversation);
  return { bot, conversation, storage };
}
