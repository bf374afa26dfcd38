/**
 * Sheetgrid Engine - Date/Time Format Tokens
 *
 * Longest-match tokenizer for the date and time part of a format section.
 * `m`/`mm` are ambiguous between month and minute and are settled in a
 * second pass by their neighbours.
 */

import type { FormatCategory } from './CellFormat.js';

export type MonthForm = 'numeric' | 'padded' | 'short' | 'full' | 'initial';
export type DayForm = 'numeric' | 'padded' | 'short' | 'full';
export type AmPmForm = 'AM/PM' | 'am/pm' | 'A/P' | 'a/p';
export type ElapsedUnit = 'h' | 'm' | 's';

export type DateTimeToken =
  | { kind: 'literal'; text: string }
  | { kind: 'year'; digits: 2 | 4 }
  | { kind: 'month'; form: MonthForm }
  | { kind: 'day'; form: DayForm }
  | { kind: 'hour'; padded: boolean; twelveHour: boolean }
  | { kind: 'minute'; padded: boolean }
  | { kind: 'second'; padded: boolean }
  | { kind: 'fraction'; digits: number }
  | { kind: 'ampm'; form: AmPmForm }
  | { kind: 'elapsed'; unit: ElapsedUnit; padded: boolean };

type RawToken = DateTimeToken | { kind: 'ambiguous'; padded: boolean };

const ELAPSED_TOKEN = /^\[(h+|m+|s+)\]/i;
const FRACTION_TOKEN = /^\.(0{1,3})/;

function runLength(text: string, start: number, matches: (ch: string) => boolean): number {
  let end = start;
  while (end < text.length && matches(text[end])) end++;
  return end - start;
}

function hasAmPm(body: string): boolean {
  return /am\/pm|a\/p/i.test(body);
}

function scan(body: string): RawToken[] {
  const tokens: RawToken[] = [];
  const twelveHour = hasAmPm(body);

  const pushLiteral = (text: string): void => {
    const previous = tokens[tokens.length - 1];
    if (previous?.kind === 'literal') {
      tokens[tokens.length - 1] = { kind: 'literal', text: previous.text + text };
    } else {
      tokens.push({ kind: 'literal', text });
    }
  };

  let i = 0;
  while (i < body.length) {
    const rest = body.slice(i);
    const lower = rest.toLowerCase();
    const char = body[i];

    if (lower.startsWith('am/pm')) {
      tokens.push({ kind: 'ampm', form: char === 'A' ? 'AM/PM' : 'am/pm' });
      i += 5;
      continue;
    }
    if (lower.startsWith('a/p')) {
      tokens.push({ kind: 'ampm', form: char === 'A' ? 'A/P' : 'a/p' });
      i += 3;
      continue;
    }

    const elapsed = ELAPSED_TOKEN.exec(rest);
    if (elapsed) {
      const unit = elapsed[1][0].toLowerCase();
      if (unit === 'h' || unit === 'm' || unit === 's') {
        tokens.push({ kind: 'elapsed', unit, padded: elapsed[1].length >= 2 });
      }
      i += elapsed[0].length;
      if (unit === 's') i += pushFraction(tokens, body.slice(i));
      continue;
    }

    const lowerChar = char.toLowerCase();
    const run = runLength(body, i, (ch) => ch.toLowerCase() === lowerChar);

    switch (lowerChar) {
      case 'y':
        tokens.push({ kind: 'year', digits: run >= 3 ? 4 : 2 });
        break;
      case 'm':
        tokens.push(monthToken(run, char === 'M'));
        break;
      case 'd':
        tokens.push({ kind: 'day', form: run >= 4 ? 'full' : run === 3 ? 'short' : run === 2 ? 'padded' : 'numeric' });
        break;
      case 'h':
        tokens.push({ kind: 'hour', padded: run >= 2, twelveHour: twelveHour && char === 'h' });
        break;
      case 's':
        tokens.push({ kind: 'second', padded: run >= 2 });
        i += run;
        i += pushFraction(tokens, body.slice(i));
        continue;
      default:
        pushLiteral(char);
        i++;
        continue;
    }
    i += run;
  }

  return tokens;
}

function monthToken(run: number, upper: boolean): RawToken {
  if (run >= 6) return { kind: 'month', form: 'full' };
  if (run === 5) return { kind: 'month', form: 'initial' };
  if (run === 4) return { kind: 'month', form: 'full' };
  if (run === 3) return { kind: 'month', form: 'short' };
  if (upper) return { kind: 'month', form: run === 2 ? 'padded' : 'numeric' };
  return { kind: 'ambiguous', padded: run === 2 };
}

/** `.0`, `.00` or `.000` directly after a seconds token; returns characters consumed */
function pushFraction(tokens: RawToken[], rest: string): number {
  const fraction = FRACTION_TOKEN.exec(rest);
  if (!fraction) return 0;
  tokens.push({ kind: 'fraction', digits: fraction[1].length });
  return fraction[0].length;
}

// =============================================================================
// Month / Minute Resolution
// =============================================================================

function isHour(token: RawToken | undefined): boolean {
  return token?.kind === 'hour' || (token?.kind === 'elapsed' && token.unit === 'h');
}

function isSecond(token: RawToken | undefined): boolean {
  return token?.kind === 'second' || (token?.kind === 'elapsed' && token.unit === 's');
}

function neighbour(tokens: RawToken[], from: number, step: 1 | -1): RawToken | undefined {
  for (let i = from + step; i >= 0 && i < tokens.length; i += step) {
    if (tokens[i].kind !== 'literal') return tokens[i];
  }
  return undefined;
}

function hasDateParts(tokens: RawToken[]): boolean {
  return tokens.some((t) => t.kind === 'year' || t.kind === 'day' || t.kind === 'month');
}

/**
 * Tokenizes one section body. Under the time and duration categories a lone
 * `m` with no date parts in the section reads as minutes.
 */
export function tokenizeDateTime(body: string, category: FormatCategory): DateTimeToken[] {
  const raw = scan(body);
  const timeOnly = (category === 'time' || category === 'duration') && !hasDateParts(raw);

  return raw.map((token, index): DateTimeToken => {
    if (token.kind !== 'ambiguous') return token;
    const minute =
      isHour(neighbour(raw, index, -1)) ||
      isSecond(neighbour(raw, index, 1)) ||
      timeOnly;
    return minute
      ? { kind: 'minute', padded: token.padded }
      : { kind: 'month', form: token.padded ? 'padded' : 'numeric' };
  });
}

export function hasElapsedToken(tokens: readonly DateTimeToken[]): boolean {
  return tokens.some((t) => t.kind === 'elapsed');
}
