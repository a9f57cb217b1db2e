import Papa from 'papaparse';

/**
 * Split a single line into trimmed cells using PapaParse.
 *
 * Empty leading, trailing and consecutive fields are kept. Well-formed
 * double-quoted cells may contain the separator; a line with a stray or
 * unbalanced quote splits exactly on the separator, quotes kept as text.
 */
export function splitDelimitedLine(line: string, separator: string): string[] {
  const result = Papa.parse<string[]>(line, {
    delimiter: separator,
    header: false,
    skipEmptyLines: false,
    dynamicTyping: false,
  });
  const malformedQuotes = result.errors.some((error) => error.type === 'Quotes');
  const cells = malformedQuotes ? line.split(separator) : (result.data[0] ?? ['']);
  return cells.map((cell) => cell.trim());
}
