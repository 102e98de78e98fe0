import { splitMessage } from '../bot';

describe('bot.splitMessage', () => {
  it('keeps short texts whole', () => {
    expect(splitMessage('1. Dune: 2021.')).toEqual(['1. Dune: 2021.']);
  });

  it('cuts at the last line break within the limit', () => {
    expect(splitMessage('aaaa\nbbbb\ncc', 10)).toEqual(['aaaa\nbbbb', 'cc']);
  });

  it('cuts hard when a line is longer than the limit', () => {
    expect(splitMessage('abcdefghij', 4)).toEqual(['abcd', 'efgh', 'ij']);
  });

  it('does not split an emoji across pieces', () => {
    const pieces = splitMessage('abc🎬def', 4);
    expect(pieces).toEqual(['abc', '🎬de', 'f']);
    expect(pieces.join('')).toBe('abc🎬def');
  });
});
