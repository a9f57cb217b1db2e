/** One data line split into trimmed cells, keyed by 1-based column position. */
export interface RawRow {
  /** 1-based position of the line in the non-blank line sequence. */
  readonly rowNumber: number;
  /** Line text as read, for diagnostics. */
  readonly line: string;
  readonly cells: ReadonlyMap<number, string>;
}

export function createRawRow(rowNumber: number, line: string, cells: readonly string[]): RawRow {
  const map = new Map<number, string>();
  cells.forEach((cell, i) => map.set(i + 1, cell));
  return { rowNumber, line, cells: map };
}
