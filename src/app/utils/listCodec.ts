// ═══════════════════════════════════════════════════════════════════════════════
// LIST CODEC — Structured encoding for list-valued columns
// ═══════════════════════════════════════════════════════════════════════════════
//
// Contributing areas are written as a JSON array of strings:
//   ["CPLOAD","IOLOAD"]
//
// Older rows hold a bracketed, quoted list instead:
//   ['CPLOAD', 'IOLOAD']
//
// Both are read by a small tokenizer. Stored text is never evaluated.
//
// This service only writes lists. parseAreaList is for the readers of the
// result tables (reports, dashboards) that share these types.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { ListFormatError } from '../engine/errors';

export function encodeAreaList(list: readonly string[]): string {
  return JSON.stringify(list);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item: unknown) => typeof item === 'string');
}

function fail(input: string, offset: number, what: string): never {
  throw new ListFormatError(`Malformed list at offset ${offset}: ${what}`, input, offset);
}

function skipSpace(input: string, pos: number): number {
  while (pos < input.length && /\s/.test(input[pos])) pos++;
  return pos;
}

/**
 * Read one quoted item starting at `pos` (on the opening quote).
 * Backslash escapes the next character.
 */
function readQuoted(input: string, pos: number): { value: string; next: number } {
  const quote = input[pos];
  let value = '';
  let i = pos + 1;
  while (i < input.length) {
    const ch = input[i];
    if (ch === '\\') {
      if (i + 1 >= input.length) break;
      value += input[i + 1];
      i += 2;
      continue;
    }
    if (ch === quote) return { value, next: i + 1 };
    value += ch;
    i++;
  }
  return fail(input, pos, 'unterminated string');
}

/** Legacy `['a', "b"]` form */
function parseBracketList(input: string): string[] {
  let pos = skipSpace(input, 0);
  if (input[pos] !== '[') fail(input, pos, "expected '['");
  pos = skipSpace(input, pos + 1);

  const items: string[] = [];
  if (input[pos] === ']') {
    pos = skipSpace(input, pos + 1);
    if (pos !== input.length) fail(input, pos, 'unexpected text after list');
    return items;
  }

  for (;;) {
    const ch = input[pos];
    if (ch !== "'" && ch !== '"') fail(input, pos, 'expected a quoted item');
    const { value, next } = readQuoted(input, pos);
    items.push(value);

    pos = skipSpace(input, next);
    if (input[pos] === ',') {
      pos = skipSpace(input, pos + 1);
      continue;
    }
    if (input[pos] === ']') {
      pos = skipSpace(input, pos + 1);
      if (pos !== input.length) fail(input, pos, 'unexpected text after list');
      return items;
    }
    fail(input, pos, "expected ',' or ']'");
  }
}

/**
 * Decode a stored list. Empty text is an empty list.
 * Throws ListFormatError for anything that is not a list of strings.
 */
export function parseAreaList(text: string): string[] {
  const trimmed = text.trim();
  if (trimmed === '') return [];

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    // Not JSON; try the legacy form
    return parseBracketList(trimmed);
  }

  if (isStringArray(parsed)) return parsed;
  return fail(trimmed, 0, 'expected a list of strings');
}
