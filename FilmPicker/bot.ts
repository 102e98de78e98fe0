import { Telegraf, Context, Markup } from 'telegraf';
import type { User } from 'telegraf/typings/core/types/typegram';
import { ConversationService, TOKENS } from './services/conversationService';
import { ChoiceOption, InboundEvent, Reply, UserProfileInput } from './models/SessionModels';

export const TELEGRAM_MESSAGE_LIMIT = 4096;

const HELP_TEXT =
  '🎬 Я подберу тебе три фильма. Выбери жанр и годы, а потом напиши пару ключевых слов – например, «путешествия во времени».\n\n' +
  '/start – начать новый поиск\n/cancel – отменить текущий поиск';

// ---------------- Rendering helpers ----------------

function keyboard(options: ChoiceOption[]) {
  return Markup.inlineKeyboard(
    options.map((o) => [Markup.button.callback(o.selected ? `✅ ${o.label}` : o.label, o.token)]),
  );
}

// Never leave half of a surrogate pair (emoji) at the end of a piece
function hardCut(text: string, limit: number): number {
  const code = text.charCodeAt(limit - 1);
  return limit > 1 && code >= 0xd800 && code <= 0xdbff ? limit - 1 : limit;
}

/** Splits text into Telegram-sized pieces, preferring line boundaries. */
export function splitMessage(text: string, limit = TELEGRAM_MESSAGE_LIMIT): string[] {
  const chunks: string[] = [];
  let rest = text;
  while (rest.length > limit) {
    const cut = rest.lastIndexOf('\n', limit);
    const end = cut > 0 ? cut : hardCut(rest, limit);
    chunks.push(rest.slice(0, end));
    rest = rest.slice(end).replace(/^\n/, '');
  }
  chunks.push(rest);
  return chunks;
}

async function sendReply(ctx: Context, reply: Reply): Promise<void> {
  switch (reply.kind) {
    case 'prompt':
      await ctx.reply(reply.text, { parse_mode: 'Markdown', ...keyboard(reply.options) });
      return;
    case 'message':
      for (const chunk of splitMessage(reply.text)) {
        await ctx.reply(chunk);
      }
      return;
    case 'error':
      await ctx.reply(`❌ ${reply.text}`);
      return;
  }
}

/**
 * Edits the message that carried the pressed button.  Editing fails when the
 * message is too old or unchanged – the caller then sends a new message.
 */
async function tryEditPrompt(ctx: Context, reply: Reply): Promise<boolean> {
  if (reply.kind !== 'prompt') return false;
  try {
    await ctx.editMessageText(reply.text, { parse_mode: 'Markdown', ...keyboard(reply.options) });
    return true;
  } catch (err) {
    console.warn('[bot] Failed to edit message, sending a new one', err);
    return false;
  }
}

async function render(ctx: Context, replies: Reply[], editFirst: boolean): Promise<void> {
  for (const [idx, reply] of replies.entries()) {
    if (idx === 0 && editFirst && (await tryEditPrompt(ctx, reply))) continue;
    await sendReply(ctx, reply);
  }
}

function profileOf(user: User): UserProfileInput {
  return {
    username: user.username,
    firstName: user.first_name,
    lastName: user.last_name,
  };
}

// ---------------- Bot factory ----------------

/**
 * Wires Telegram updates to the conversation service.  The service decides
 * what to say; this layer only decides how (edit vs. send, keyboards).
 */
export function createBot(token: string, conversation: ConversationService): Telegraf<Context> {
  const bot = new Telegraf(token);

  const dispatch = async (ctx: Context, event: InboundEvent, editFirst = false): Promise<void> => {
    const result = await conversation.handle(event, (reply) => sendReply(ctx, reply));
    await render(ctx, result.replies, editFirst);
  };

  bot.start(async (ctx) => {
    if (!ctx.from) return;
    await dispatch(ctx, { type: 'start', userId: ctx.from.id, profile: profileOf(ctx.from) });
  });

  bot.command('cancel', async (ctx) => {
    if (!ctx.from) return;
    await dispatch(ctx, { type: 'cancel', userId: ctx.from.id });
  });

  bot.help((ctx) => ctx.reply(HELP_TEXT));

  bot.action(TOKENS.restart, async (ctx) => {
    await ctx.answerCbQuery('Начинаем заново...');
    if (!ctx.from) return;
    // Drop the restart button from the previous answer
    try {
      await ctx.editMessageReplyMarkup(undefined);
    } catch (err) {
      console.warn('[bot] Failed to remove old keyboard', err);
    }
    await dispatch(ctx, { type: 'start', userId: ctx.from.id, profile: profileOf(ctx.from) });
  });

  bot.on('callback_query', async (ctx) => {
    const query = ctx.callbackQuery;
    await ctx.answerCbQuery();
    if (!('data' in query)) return;
    await dispatch(ctx, { type: 'choice', userId: query.from.id, token: query.data }, true);
  });

  bot.on('text', async (ctx) => {
    if (!ctx.from) return;
    await dispatch(ctx, { type: 'text', userId: ctx.from.id, text: ctx.message.text });
  });

  bot.catch((err, ctx) => {
    console.error(`[bot] Unhandled error for update ${ctx.update.update_id}`, err);
  });

  return bot;
}
