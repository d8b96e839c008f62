import { describe, it, expect } from 'vitest';
import { formatCsvRow, splitCsvLine } from '../../src/data/csv';

describe('csv', () => {
  it('splits quoted cells with commas and doubled quotes', () => {
    expect(splitCsvLine('a,"b,c","d""e",')).toEqual(['a', 'b,c', 'd"e', '']);
  });

  it('quotes cells only when needed', () => {
    expect(formatCsvRow(['plain', 3, 'x,y', 'say "hi"'])).toBe('plain,3,"x,y","say ""hi"""');
  });
});
