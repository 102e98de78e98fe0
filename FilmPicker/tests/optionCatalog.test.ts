import {
  genreLabel,
  genres,
  resolveGenre,
  resolveYearRange,
  yearRangeLabel,
  yearRanges,
} from '../services/optionCatalog';
import { UnknownOptionError } from '../models/errors';

describe('optionCatalog', () => {
  it('lists genres and year ranges in catalog order', () => {
    expect(genres()).toHaveLength(13);
    expect(genres()[0]).toEqual({ label: 'Боевик', value: 'action' });
    expect(genres()[12]).toEqual({ label: 'Документальный', value: 'documentary' });
    expect(yearRanges().map((y) => y.value)).toEqual([
      '2000-2009',
      '2010-2020',
      '2020-2029',
      '1930-1939',
      '1940-1949',
      '1950-1959',
      '1960-1969',
      '1970-1979',
      '1980-1989',
      '1990-1999',
    ]);
  });

  it('resolves year ranges by label or value', () => {
    expect(resolveYearRange('10-е (2010-2020)')).toBe('2010-2020');
    expect(resolveYearRange('1990-1999')).toBe('1990-1999');
  });

  it('resolves genres by label or value', () => {
    expect(resolveGenre('Комедия')).toBe('comedy');
    expect(resolveGenre('sci-fi')).toBe('sci-fi');
  });

  it('fails with UnknownOptionError for absent options', () => {
    expect(() => resolveYearRange('2030-2039')).toThrow(UnknownOptionError);
    expect(() => resolveGenre('western')).toThrow(UnknownOptionError);
  });

  it('maps values back to labels', () => {
    expect(genreLabel('comedy')).toBe('Комедия');
    expect(yearRangeLabel('2010-2020')).toBe('10-е (2010-2020)');
    expect(genreLabel('western')).toBe('western');
  });

  it('cannot be mutated at runtime', () => {
    expect(Object.isFrozen(genres())).toBe(true);
    expect(Object.isFrozen(yearRanges()[0])).toBe(true);
  });
});
