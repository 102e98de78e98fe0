// SessionModels.ts
// -----------------------------------------------------------------------------
// These interfaces capture the **runtime dialogue data** the bot keeps between
// Telegram updates.  Sessions are serialised to a key-value store (in-memory
// during local development, Redis on Vercel) so that the stateless webhook
// runtime can resume a user's dialogue at any step.
// -----------------------------------------------------------------------------
//   • Session       – per-user dialogue progress, one variant per state.
//   • InboundEvent  – what the transport hands to the conversation service.
//   • Reply         – what the conversation service hands back for rendering.
// -----------------------------------------------------------------------------

/** States a stored session can be in. */
export type ActiveState = 'AwaitingGenre' | 'AwaitingYearRange' | 'AwaitingKeywords';

/**
 * Every state a turn can end in.  `Completed` and `Cancelled` are terminal:
 * reaching them deletes the session.  `Idle` means the user has no session.
 */
export type DialogueState = ActiveState | 'Completed' | 'Cancelled' | 'Idle';

export type NonEmptyArray<T> = [T, ...T[]];

/**
 * Genre selection step.  `selectedGenres` may be empty; after back-navigation
 * it holds the previous choice so the keyboard can highlight it.
 */
export interface AwaitingGenreSession {
  state: 'AwaitingGenre';
  userId: number;
  selectedGenres: string[];
}

export interface AwaitingYearRangeSession {
  state: 'AwaitingYearRange';
  userId: number;
  selectedGenres: NonEmptyArray<string>;
}

export interface AwaitingKeywordsSession {
  state: 'AwaitingKeywords';
  userId: number;
  selectedGenres: NonEmptyArray<string>;
  selectedYearRange: string;
}

/**
 * Single object persisted per Telegram user (keyed by their numeric `id`).
 * Keywords are never stored: submitting them completes the dialogue.
 */
export type Session = AwaitingGenreSession | AwaitingYearRangeSession | AwaitingKeywordsSession;

export interface UserProfileInput {
  username?: string;
  firstName?: string;
  lastName?: string;
}

export type InboundEvent =
  | { type: 'start'; userId: number; profile: UserProfileInput }
  | { type: 'choice'; userId: number; token: string }
  | { type: 'text'; userId: number; text: string }
  | { type: 'cancel'; userId: number };

/** A selectable button: visible label plus the opaque token sent back. */
export interface ChoiceOption {
  label: string;
  token: string;
  /** Highlighted as a previous/current selection */
  selected?: boolean;
}

export type Reply =
  | { kind: 'prompt'; text: string; options: ChoiceOption[] }
  | { kind: 'message'; text: string }
  | { kind: 'error'; text: string };

/** Delivers a reply while the turn is still running (e.g. before a slow model call). */
export type ReplySink = (reply: Reply) => Promise<void>;

export interface TurnResult {
  state: DialogueState;
  replies: Reply[];
}
