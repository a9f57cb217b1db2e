import type { FieldSpec } from '../model/FieldSpec.js';

const KEY_SUFFIX = /\/k$/i;
const LOOKUP = /(.+?)\[(.+?)\]/;
const ID_SUFFIX = /_id$/i;

/**
 * Parse one header token into a `FieldSpec`.
 *
 * Grammar: `path ["[" lookupColumn "]"] ["/K"]`, `path := segment (">" segment)*`.
 * Never throws: a malformed token degrades to a single-segment path without
 * lookup, and a token with no usable segment targets the placeholder
 * column `Column<position>`.
 */
export function parseHeaderToken(token: string, position: number): FieldSpec {
  let rest = token.trim();

  const isKey = KEY_SUFFIX.test(rest);
  if (isKey) {
    rest = rest.slice(0, -2).trim();
  }

  let lookupColumn: string | null = null;
  const match = LOOKUP.exec(rest);
  if (match?.[1] !== undefined && match[2] !== undefined) {
    rest = match[1].trim();
    lookupColumn = match[2].trim() || null;
  }

  const segments = rest
    .split('>')
    .map((s) => s.trim())
    .filter((s) => s !== '');
  const pathParts = segments.length > 0 ? segments : [`Column${String(position)}`];
  const targetColumn = pathParts[pathParts.length - 1] ?? `Column${String(position)}`;

  return Object.freeze({
    original: token.trim(),
    pathParts: Object.freeze(pathParts),
    targetColumn,
    lookupColumn,
    lookupTable: lookupColumn === null ? null : deriveLookupTable(pathParts, targetColumn),
    isKey,
    columnIndex: position,
  });
}

/** Parse every token of a header, assigning 1-based positions. */
export function parseHeaderTokens(tokens: readonly string[]): FieldSpec[] {
  return tokens.map((token, i) => parseHeaderToken(token, i + 1));
}

/** Render a field back into canonical token text, e.g. `AD_User>C_BPartner_ID[Value]/K`. */
export function formatHeaderToken(field: FieldSpec): string {
  const lookup = field.lookupColumn === null ? '' : `[${field.lookupColumn}]`;
  return `${field.pathParts.join('>')}${lookup}${field.isKey ? '/K' : ''}`;
}

function deriveLookupTable(pathParts: readonly string[], targetColumn: string): string | null {
  if (pathParts.length > 1) {
    return pathParts[pathParts.length - 2] ?? null;
  }
  if (!ID_SUFFIX.test(targetColumn)) return null;
  const table = targetColumn.slice(0, -3);
  return table === '' ? null : table;
}
