import catalogData from '../data/catalog.json';
import { UnknownOptionError } from '../models/errors';

export interface CatalogOption {
  /** Text shown on the button */
  readonly label: string;
  /** Normalised value used in prompts, tokens and persistence */
  readonly value: string;
}

function freezeOptions(raw: { label: string; value: string }[]): ReadonlyArray<CatalogOption> {
  return Object.freeze(raw.map((o) => Object.freeze({ label: o.label, value: o.value })));
}

const GENRES = freezeOptions(catalogData.genres);
const YEAR_RANGES = freezeOptions(catalogData.yearRanges);

/** Lookup by label first, then by value. */
function resolve(options: ReadonlyArray<CatalogOption>, labelOrValue: string): CatalogOption {
  const found =
    options.find((o) => o.label === labelOrValue) ?? options.find((o) => o.value === labelOrValue);
  if (!found) {
    throw new UnknownOptionError(labelOrValue);
  }
  return found;
}

export function genres(): ReadonlyArray<CatalogOption> {
  return GENRES;
}

export function yearRanges(): ReadonlyArray<CatalogOption> {
  return YEAR_RANGES;
}

export function resolveGenre(labelOrValue: string): string {
  return resolve(GENRES, labelOrValue).value;
}

export function resolveYearRange(labelOrValue: string): string {
  return resolve(YEAR_RANGES, labelOrValue).value;
}

/** Human label for a genre value; falls back to the value itself. */
export function genreLabel(value: string): string {
  return GENRES.find((o) => o.value === value)?.label ?? value;
}

export function yearRangeLabel(value: string): string {
  return YEAR_RANGES.find((o) => o.value === value)?.label ?? value;
}
