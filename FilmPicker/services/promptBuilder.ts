import { InvalidInputError } from '../models/errors';

/**
 * Builds the instruction sent to the model.  The numbered answer format it asks
 * for is the one `extractTitles` expects:
 *
 *   1. Title: Year, Genre. Description.
 *
 * Deterministic – the same input always yields the same prompt.
 */
export function buildPrompt(genres: readonly string[], years: readonly string[], keywords: string): string {
  if (genres.length === 0) {
    throw new InvalidInputError('At least one genre is required to build a prompt');
  }
  if (years.length === 0) {
    throw new InvalidInputError('At least one year range is required to build a prompt');
  }

  const lines = [
    `Порекомендуй ровно 3 фильма в жанре ${genres.join(', ')}, вышедших в ${years.join(', ')} годах.`,
    `Ключевые слова: '${keywords.trim()}'.`,
    'Ответь нумерованным списком из трех пунктов, каждый строго в формате:',
    '1. Название: Год, Жанр. Краткое описание.',
    'Не добавляй ничего до и после списка.',
  ];
  return lines.join('\n');
}
