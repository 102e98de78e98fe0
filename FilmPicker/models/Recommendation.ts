/** Three rank slots filled from the model answer; unmatched ranks stay null. */
export type TitleSlots = [string | null, string | null, string | null];

/**
 * Display metadata of a Telegram user.  Created on first contact and never
 * overwritten afterwards.
 */
export interface UserProfile {
  userId: number;
  username: string | null;
  firstName: string | null;
  lastName: string | null;
}

/**
 * One completed dialogue.  Append-only: rows are written once and never
 * updated.
 */
export interface RecommendationRequest {
  userId: number;
  /** Genre values joined with ", " */
  genres: string;
  /** Year-range values joined with ", " */
  years: string;
  keywords: string;
  modelResponseText: string;
  titles: TitleSlots;
}

/** Persistence collaborator of the conversation service. */
export interface Storage {
  /** Idempotent: does nothing when the user already exists. */
  upsertUser(profile: UserProfile): Promise<void>;
  recordRequest(request: RecommendationRequest): Promise<void>;
}

/** Generative text backend. Rejects with `ModelError`. */
export interface TextModel {
  generate(prompt: string): Promise<string>;
}
