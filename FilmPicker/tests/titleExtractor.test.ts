import { extractTitles } from '../services/titleExtractor';

describe('titleExtractor.extractTitles', () => {
  it('extracts ranked titles from clean numbered lines', () => {
    const text = '1. Dune: 2021, sci-fi. Desc.\n2. Arrival: 2016, sci-fi. Desc.';
    expect(extractTitles(text)).toEqual(['Dune', 'Arrival', null]);
  });

  it('ignores ranks outside 1..3', () => {
    expect(extractTitles('5. Foo: 2020.')).toEqual([null, null, null]);
    expect(extractTitles('0. Zero: 2020.\n4. Four: 2021.')).toEqual([null, null, null]);
  });

  it('keeps the last occurrence of a rank', () => {
    const text = '1. First Try: 2001, drama.\n1. Second Try: 2002, drama.';
    expect(extractTitles(text)).toEqual(['Second Try', null, null]);
  });

  it('strips the optional "Название фильма:" label', () => {
    const text = '1. Название фильма: Брат: 1997, драма.\n3. Название фильма:Груз 200: 2007.';
    expect(extractTitles(text)).toEqual(['Брат', null, 'Груз 200']);
  });

  it('skips prose and indented lines are still matched', () => {
    const text = [
      'Вот три фильма, которые стоит посмотреть:',
      '',
      '  1. Hot Tub Time Machine: 2010, comedy. Funny.',
      'Some prose 2. Not a rank line: 2000.',
      '\t3. Groundhog Day: 1993, comedy. Classic.',
    ].join('\n');
    expect(extractTitles(text)).toEqual(['Hot Tub Time Machine', null, 'Groundhog Day']);
  });

  it('trims a trailing comma before the colon', () => {
    expect(extractTitles('2. Looper ,: 2012, sci-fi.')).toEqual([null, 'Looper', null]);
  });

  it('does not let a title run across line breaks', () => {
    const text = '1. Primer\n2. Timecrimes: 2007, thriller.';
    expect(extractTitles(text)).toEqual(['Primer', 'Timecrimes', null]);
  });

  it('returns empty slots for unstructured text', () => {
    expect(extractTitles('')).toEqual([null, null, null]);
    expect(extractTitles('Извините, я не могу помочь.')).toEqual([null, null, null]);
  });

  it('leaves a slot empty when the rank has no title text', () => {
    expect(extractTitles('1. ...\n2. Arrival: 2016.')).toEqual([null, 'Arrival', null]);
  });
});
