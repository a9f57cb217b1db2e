import { describe, it, expect } from 'vitest';
import { splitDelimitedLine } from '../../../src/infrastructure/parsers/DelimitedLineSplitter.js';

describe('splitDelimitedLine()', () => {
  it('should keep empty leading, trailing and consecutive cells', () => {
    expect(splitDelimitedLine(',a,,b,', ',')).toEqual(['', 'a', '', 'b', '']);
  });

  it('should trim every cell', () => {
    expect(splitDelimitedLine(' Ann ;  A1 ', ';')).toEqual(['Ann', 'A1']);
  });

  it('should split on tabs', () => {
    expect(splitDelimitedLine('Ann\tA1', '\t')).toEqual(['Ann', 'A1']);
  });

  it('should keep the separator inside quoted cells', () => {
    expect(splitDelimitedLine('"Acme, Inc.",A1', ',')).toEqual(['Acme, Inc.', 'A1']);
  });

  it('should split exactly on the separator when a quote does not close the cell', () => {
    expect(splitDelimitedLine('"Big" Co,ACME01', ',')).toEqual(['"Big" Co', 'ACME01']);
  });

  it('should keep an unbalanced quote as text', () => {
    expect(splitDelimitedLine('"Acme', ',')).toEqual(['"Acme']);
    expect(splitDelimitedLine('"Acme,ACME01', ',')).toEqual(['"Acme', 'ACME01']);
  });

  it('should return the whole line when the separator is absent', () => {
    expect(splitDelimitedLine('Name', ',')).toEqual(['Name']);
  });
});
