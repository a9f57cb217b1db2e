/** Whether each row becomes an INSERT or an UPDATE. */
export type ImportMode = 'insert' | 'update';

/** Map the process option flag to a mode: `U` (any case) selects update, anything else insert. */
export function parseImportMode(option: string | null | undefined): ImportMode {
  return option?.trim().toUpperCase() === 'U' ? 'update' : 'insert';
}
