import {
  AwaitingGenreSession,
  AwaitingKeywordsSession,
  AwaitingYearRangeSession,
  ChoiceOption,
  DialogueState,
  InboundEvent,
  NonEmptyArray,
  Reply,
  ReplySink,
  Session,
  TurnResult,
  UserProfileInput,
} from '../models/SessionModels';
import { FilmPickerError, InvalidEventError, ModelError, UnknownOptionError } from '../models/errors';
import { Storage, TextModel, TitleSlots } from '../models/Recommendation';
import { genreLabel, genres, resolveGenre, resolveYearRange, yearRangeLabel, yearRanges } from './optionCatalog';
import { buildPrompt } from './promptBuilder';
import { extractTitles } from './titleExtractor';
import { SessionManager } from './sessionManager';
import { KeyedLock } from './keyedLock';

// ---------------- Choice tokens (Telegram callback data) ----------------
export const GENRE_PREFIX = 'genre_';
export const YEAR_PREFIX = 'year_';
export const TOKENS = {
  genresDone: 'genres_done',
  backToGenres: 'back_to_genres',
  backToYears: 'back_to_years',
  restart: 'start_over',
} as const;

export const genreToken = (value: string): string => `${GENRE_PREFIX}${value}`;
export const yearToken = (value: string): string => `${YEAR_PREFIX}${value}`;

// ---------------- User-facing texts ----------------
export const TEXTS = {
  searching: 'Ищу лучшие фильмы, подождите...',
  modelFailed: 'Произошла ошибка. Попробуйте позже.',
  tryAgain: 'Хотите попробовать еще раз?',
  restartButton: 'Начать новый поиск',
  backButton: '⬅️ Назад',
  doneButton: '✔️ Готово',
  cancelled: 'Поиск отменен. Используйте /start для начала.',
  unknown: 'Неизвестная команда. Используйте /start',
  invalidSelection: 'Неверный выбор. Выберите вариант из списка.',
  noGenreSelected: 'Выберите хотя бы один жанр.',
  enterKeywords: 'Введите ключевые слова:',
} as const;

export interface ConversationServiceOptions {
  sessions: SessionManager;
  model: TextModel;
  storage: Storage;
  /** 1 = pick a genre and move on; >1 = toggle up to N genres, then confirm */
  maxGenres?: number;
  lock?: KeyedLock;
}

/** Escape characters that legacy Telegram Markdown treats as entities. */
export function escapeMarkdown(text: string): string {
  return text.replace(/([_*`[])/g, '\\$1');
}

function toNonEmpty<T>(items: readonly T[]): NonEmptyArray<T> | undefined {
  return items.length > 0 ? [items[0], ...items.slice(1)] : undefined;
}

/**
 * The dialogue state machine.  One instance serves all users; each user's
 * events are serialised through a per-user lock so that a duplicate button
 * press cannot interleave with the turn it duplicates.
 *
 * Failures never escape a turn: unknown options and illegal events become
 * notices, model failures an error reply, storage failures a log line.
 */
export class ConversationService {
  private readonly sessions: SessionManager;
  private readonly model: TextModel;
  private readonly storage: Storage;
  private readonly maxGenres: number;
  private readonly lock: KeyedLock;

  constructor(options: ConversationServiceOptions) {
    this.sessions = options.sessions;
    this.model = options.model;
    this.storage = options.storage;
    this.maxGenres = options.maxGenres ?? 1;
    this.lock = options.lock ?? new KeyedLock();
  }

  /**
   * Runs one turn.  `emit` receives replies that must reach the user before
   * the turn ends (the "searching" notice); everything else is returned.
   */
  handle(event: InboundEvent, emit: ReplySink = async () => undefined): Promise<TurnResult> {
    return this.lock.run(event.userId.toString(), () => this.dispatch(event, emit));
  }

  private async dispatch(event: InboundEvent, emit: ReplySink): Promise<TurnResult> {
    if (event.type === 'start') return this.start(event.userId, event.profile);
    if (event.type === 'cancel') return this.cancel(event.userId);

    const session = await this.sessions.get(event.userId);
    try {
      if (!session) {
        throw new InvalidEventError(`No active session for user ${event.userId}`);
      }
      return event.type === 'choice'
        ? await this.onChoice(session, event.token)
        : await this.onText(session, event.text, emit);
    } catch (err) {
      if (!(err instanceof FilmPickerError)) throw err;
      const state: DialogueState = session?.state ?? 'Idle';
      switch (err.code) {
        case 'UNKNOWN_OPTION':
          console.info(`[conversationService] user ${event.userId}: ${err.message} in ${state}`);
          return { state, replies: [{ kind: 'error', text: TEXTS.invalidSelection }] };
        case 'INVALID_EVENT':
          console.info(`[conversationService] user ${event.userId}: ${err.message}`);
          return { state, replies: [{ kind: 'message', text: TEXTS.unknown }] };
        default:
          throw err;
      }
    }
  }

  // ---------------- Transitions ----------------

  private async start(userId: number, profile: UserProfileInput): Promise<TurnResult> {
    await this.sessions.clear(userId);

    try {
      await this.storage.upsertUser({
        userId,
        username: profile.username ?? null,
        firstName: profile.firstName ?? null,
        lastName: profile.lastName ?? null,
      });
    } catch (err) {
      console.error(`[conversationService] Failed to save profile of user ${userId}`, err);
    }

    const session: AwaitingGenreSession = { state: 'AwaitingGenre', userId, selectedGenres: [] };
    await this.sessions.set(session);

    const name = profile.firstName ?? profile.username;
    const greeting = name ? `Привет, ${escapeMarkdown(name)}! ` : 'Привет! ';
    return { state: session.state, replies: [this.genrePrompt(session, greeting)] };
  }

  private async cancel(userId: number): Promise<TurnResult> {
    await this.sessions.clear(userId);
    return { state: 'Cancelled', replies: [{ kind: 'message', text: TEXTS.cancelled }] };
  }

  private async onChoice(session: Session, token: string): Promise<TurnResult> {
    switch (session.state) {
      case 'AwaitingGenre':
        if (token.startsWith(GENRE_PREFIX)) {
          return this.chooseGenre(session, resolveGenre(token.slice(GENRE_PREFIX.length)));
        }
        if (token === TOKENS.genresDone && this.maxGenres > 1) {
          return this.confirmGenres(session);
        }
        throw new UnknownOptionError(token);

      case 'AwaitingYearRange':
        if (token.startsWith(YEAR_PREFIX)) {
          return this.chooseYearRange(session, resolveYearRange(token.slice(YEAR_PREFIX.length)));
        }
        if (token === TOKENS.backToGenres) {
          // Keeps the selection: multi mode edits it, single mode replaces it on the next pick
          return this.enterGenre({ state: 'AwaitingGenre', userId: session.userId, selectedGenres: session.selectedGenres });
        }
        throw new UnknownOptionError(token);

      case 'AwaitingKeywords':
        if (token === TOKENS.backToYears) {
          return this.enterYearRange({
            state: 'AwaitingYearRange',
            userId: session.userId,
            selectedGenres: session.selectedGenres,
          });
        }
        throw new InvalidEventError(`Choice "${token}" while awaiting keywords`);
    }
  }

  private async onText(session: Session, text: string, emit: ReplySink): Promise<TurnResult> {
    if (text.startsWith('/')) {
      throw new InvalidEventError(`Unknown command ${text.split(/\s/)[0]}`);
    }
    if (session.state !== 'AwaitingKeywords') {
      throw new InvalidEventError(`Free text while in ${session.state}`);
    }

    const keywords = text.trim();
    if (keywords.length === 0) {
      return { state: session.state, replies: [this.keywordsPrompt(session)] };
    }
    return this.complete(session, keywords, emit);
  }

  private async chooseGenre(session: AwaitingGenreSession, genre: string): Promise<TurnResult> {
    if (this.maxGenres === 1) {
      return this.enterYearRange({ state: 'AwaitingYearRange', userId: session.userId, selectedGenres: [genre] });
    }

    const selected = session.selectedGenres;
    if (selected.includes(genre)) {
      return this.enterGenre({ ...session, selectedGenres: selected.filter((g) => g !== genre) });
    }
    if (selected.length >= this.maxGenres) {
      return {
        state: session.state,
        replies: [{ kind: 'error', text: `Можно выбрать не больше ${this.maxGenres} жанров.` }],
      };
    }
    return this.enterGenre({ ...session, selectedGenres: [...selected, genre] });
  }

  private async confirmGenres(session: AwaitingGenreSession): Promise<TurnResult> {
    const selected = toNonEmpty(session.selectedGenres);
    if (!selected) {
      return { state: session.state, replies: [{ kind: 'error', text: TEXTS.noGenreSelected }] };
    }
    return this.enterYearRange({ state: 'AwaitingYearRange', userId: session.userId, selectedGenres: selected });
  }

  private async chooseYearRange(session: AwaitingYearRangeSession, yearRange: string): Promise<TurnResult> {
    const next: AwaitingKeywordsSession = {
      state: 'AwaitingKeywords',
      userId: session.userId,
      selectedGenres: session.selectedGenres,
      selectedYearRange: yearRange,
    };
    await this.sessions.set(next);
    return { state: next.state, replies: [this.keywordsPrompt(next)] };
  }

  private async enterGenre(session: AwaitingGenreSession): Promise<TurnResult> {
    await this.sessions.set(session);
    return { state: session.state, replies: [this.genrePrompt(session, '')] };
  }

  private async enterYearRange(session: AwaitingYearRangeSession): Promise<TurnResult> {
    await this.sessions.set(session);
    return { state: session.state, replies: [this.yearRangePrompt(session)] };
  }

  // ---------------- Completion pipeline ----------------

  private async complete(session: AwaitingKeywordsSession, keywords: string, emit: ReplySink): Promise<TurnResult> {
    const { userId, selectedGenres, selectedYearRange } = session;
    const replies: Reply[] = [];

    const prompt = buildPrompt(selectedGenres, [selectedYearRange], keywords);
    try {
      await emit({ kind: 'message', text: TEXTS.searching });
    } catch (err) {
      console.warn(`[conversationService] Failed to send searching notice to user ${userId}`, err);
    }
    console.info(`[conversationService] user ${userId}: requesting recommendations`);

    let responseText: string | null = null;
    try {
      responseText = await this.model.generate(prompt);
    } catch (err) {
      const modelError = err instanceof ModelError ? err : new ModelError('Model call failed', err);
      console.error(`[conversationService] Model failed for user ${userId}`, modelError);
      replies.push({ kind: 'error', text: TEXTS.modelFailed });
    }

    if (responseText !== null) {
      const titles: TitleSlots = extractTitles(responseText);
      replies.push({ kind: 'message', text: responseText });
      console.info(`[conversationService] user ${userId}: extracted ${titles.filter((t) => t !== null).length} title(s)`);

      try {
        await this.storage.recordRequest({
          userId,
          genres: selectedGenres.join(', '),
          years: selectedYearRange,
          keywords,
          modelResponseText: responseText,
          titles,
        });
      } catch (err) {
        console.error(`[conversationService] Failed to save request of user ${userId}`, err);
      }
    }

    await this.sessions.clear(userId);
    replies.push({
      kind: 'prompt',
      text: TEXTS.tryAgain,
      options: [{ label: TEXTS.restartButton, token: TOKENS.restart }],
    });
    return { state: 'Completed', replies };
  }

  // ---------------- Reply formatting ----------------

  private genrePrompt(session: AwaitingGenreSession, greeting: string): Reply {
    const options: ChoiceOption[] = genres().map((g) => ({
      label: g.label,
      token: genreToken(g.value),
      selected: session.selectedGenres.includes(g.value),
    }));

    if (this.maxGenres > 1) {
      options.push({ label: TEXTS.doneButton, token: TOKENS.genresDone });
      return {
        kind: 'prompt',
        text: `${greeting}Выбери до ${this.maxGenres} жанров и нажми «Готово»:`,
        options,
      };
    }
    return { kind: 'prompt', text: `${greeting}Выбери жанр:`, options };
  }

  private yearRangePrompt(session: AwaitingYearRangeSession): Reply {
    const options: ChoiceOption[] = yearRanges().map((y) => ({ label: y.label, token: yearToken(y.value) }));
    options.push({ label: TEXTS.backButton, token: TOKENS.backToGenres });
    return {
      kind: 'prompt',
      text: `Вы выбрали жанр: *${renderGenres(session.selectedGenres)}*\n\nТеперь выбери годы:`,
      options,
    };
  }

  private keywordsPrompt(session: AwaitingKeywordsSession): Reply {
    return {
      kind: 'prompt',
      text:
        `Вы выбрали:\nЖанр: *${renderGenres(session.selectedGenres)}*\n` +
        `Годы: *${yearRangeLabel(session.selectedYearRange)}*\n\n${TEXTS.enterKeywords}`,
      options: [{ label: TEXTS.backButton, token: TOKENS.backToYears }],
    };
  }
}

function renderGenres(values: readonly string[]): string {
  return values.map(genreLabel).join(', ');
}
