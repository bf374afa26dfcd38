/**
 * Sheetgrid Engine - Format Code Parser
 *
 * Turns an Excel-style format code into sections ready for rendering:
 * - split on `;` outside quotes, brackets and escapes
 * - bracket metadata (color, condition, currency/locale) stripped per section
 * - quoted text, `\X`, `_X` and `*X` replaced by private-use placeholders so
 *   later substitution cannot touch them
 * - each section classified and, for numeric sections, its digit pattern parsed
 *
 * Parsing is permissive: malformed input yields literal sections, never errors.
 */

import type { FormatCategory } from './CellFormat.js';
import { namedColor, paletteColor } from './CellFormat.js';
import { tokenizeDateTime, type DateTimeToken } from './DateTimeTokenizer.js';

// =============================================================================
// Types
// =============================================================================

export type ConditionOperator = '<' | '<=' | '>' | '>=' | '=' | '<>';

export interface FormatCondition {
  operator: ConditionOperator;
  value: number;
}

export type SectionKind = 'general' | 'text' | 'datetime' | 'number' | 'literal';

export interface NumberPattern {
  /** Body text before the first digit placeholder */
  prefix: string;
  /** Body text after the last placeholder (scale commas removed) */
  suffix: string;
  /** Integer placeholders and any literals between them */
  integer: string;
  grouping: boolean;
  /** Number of trailing commas; each divides by 1000 */
  scale: number;
  hasDecimalPoint: boolean;
  /** Placeholders after the decimal point */
  decimals: string;
  /** Number of `%` signs in the section */
  percentCount: number;
  exponent?: {
    upper: boolean;
    /** `E+` always shows a sign, `E-` only for negative exponents */
    alwaysSign: boolean;
    digits: number;
  };
  fraction?: {
    /** Placeholders of the whole-number part; empty for improper fractions */
    integer: string;
    /** Text between the whole part and the numerator */
    separator: string;
    numerator: string;
    denominator: { fixed: number } | { placeholders: string };
  };
}

export interface FormatSection {
  /** Section text as written */
  source: string;
  /** Brackets stripped, literals replaced by placeholders */
  body: string;
  literals: string[];
  /** Placeholder index of the `*X` fill, if any */
  fillIndex?: number;
  fillChar?: string;
  color?: string;
  condition?: FormatCondition;
  /** Symbol from `[$sym-lcid]`; empty when only a locale was given */
  currency?: string;
  /** Placeholder index where the bracket symbol prints when the pattern has no glyph of its own */
  currencyIndex?: number;
  localeCode?: string;
  /** Contains `[h]`, `[m]` or `[s]` */
  elapsed: boolean;
  kind: SectionKind;
  number?: NumberPattern;
  tokens?: DateTimeToken[];
}

export interface ParsedFormat {
  code: string;
  sections: FormatSection[];
  /** Sections used for numeric values, in sign order */
  numericSections: FormatSection[];
  textSection?: FormatSection;
}

const PLACEHOLDER_BASE = 0xe000;
const PLACEHOLDER_PATTERN = /[\uE000-\uF8FF]/g;

export function placeholderChar(index: number): string {
  return String.fromCharCode(PLACEHOLDER_BASE + index);
}

export function isDigitPlaceholder(ch: string): boolean {
  return ch === '0' || ch === '#' || ch === '?';
}

// =============================================================================
// Section Split
// =============================================================================

export function splitSections(code: string): string[] {
  const sections: string[] = [];
  let current = '';
  let inQuotes = false;
  let inBrackets = false;

  for (let i = 0; i < code.length; i++) {
    const char = code[i];

    if (inQuotes) {
      if (char === '"') inQuotes = false;
      current += char;
    } else if (char === '"' && !inBrackets) {
      inQuotes = true;
      current += char;
    } else if ((char === '\\' || char === '_' || char === '*') && !inBrackets && i + 1 < code.length) {
      current += char + code[i + 1];
      i++;
    } else if (char === '[') {
      inBrackets = true;
      current += char;
    } else if (char === ']') {
      inBrackets = false;
      current += char;
    } else if (char === ';' && !inBrackets) {
      sections.push(current);
      current = '';
    } else {
      current += char;
    }
  }

  sections.push(current);
  return sections;
}

// =============================================================================
// Brackets and Literals
// =============================================================================

const CONDITION_PATTERN = /^(<>|<=|>=|<|>|=)\s*(-?\d+(?:\.\d+)?)$/;
const COLOR_INDEX_PATTERN = /^color\s*(\d+)$/i;
const CURRENCY_PATTERN = /^\$([^-]*)(?:-([0-9A-Fa-f]+))?$/;
const ELAPSED_PATTERN = /^(h+|m+|s+)$/i;

type ExtractedSection = Omit<FormatSection, 'kind' | 'number' | 'tokens'>;

function extractSection(source: string): ExtractedSection {
  const section: ExtractedSection = {
    source,
    body: '',
    literals: [],
    elapsed: false,
  };

  const pushLiteral = (text: string): void => {
    section.body += placeholderChar(section.literals.length);
    section.literals.push(text);
  };

  for (let i = 0; i < source.length; i++) {
    const char = source[i];

    switch (char) {
      case '"': {
        let end = source.indexOf('"', i + 1);
        if (end < 0) end = source.length;
        pushLiteral(source.slice(i + 1, end));
        i = end;
        break;
      }
      case '\\':
        if (i + 1 < source.length) pushLiteral(source[++i]);
        break;
      case '_':
        if (i + 1 < source.length) {
          i++;
          pushLiteral(' ');
        }
        break;
      case '*':
        if (i + 1 < source.length) {
          i++;
          if (section.fillIndex === undefined) {
            section.fillIndex = section.literals.length;
            section.fillChar = source[i];
            pushLiteral('');
          }
        }
        break;
      case '[': {
        const end = source.indexOf(']', i + 1);
        if (end < 0) {
          pushLiteral(source.slice(i));
          i = source.length;
          break;
        }
        const content = source.slice(i + 1, end);
        if (applyBracket(section, content)) {
          // `[$€-407]` prints its symbol here unless the pattern carries a glyph
          if (content.trim().startsWith('$') && section.currency && section.currencyIndex === undefined) {
            section.currencyIndex = section.literals.length;
            pushLiteral(section.currency);
          }
        } else {
          if (ELAPSED_PATTERN.test(content)) {
            section.elapsed = true;
            section.body += `[${content}]`;
          } else {
            pushLiteral(`[${content}]`);
          }
        }
        i = end;
        break;
      }
      default:
        section.body += char;
    }
  }

  return section;
}

/** Returns false when the bracket is not metadata */
function applyBracket(section: ExtractedSection, content: string): boolean {
  const trimmed = content.trim();

  const named = namedColor(trimmed);
  if (named) {
    section.color = named;
    return true;
  }

  const indexed = COLOR_INDEX_PATTERN.exec(trimmed);
  if (indexed) {
    const color = paletteColor(Number(indexed[1]));
    if (!color) return false;
    section.color = color;
    return true;
  }

  const condition = CONDITION_PATTERN.exec(trimmed);
  if (condition) {
    section.condition = { operator: toOperator(condition[1]), value: Number(condition[2]) };
    return true;
  }

  const currency = CURRENCY_PATTERN.exec(trimmed);
  if (currency) {
    section.currency = currency[1];
    if (currency[2]) section.localeCode = currency[2];
    return true;
  }

  return false;
}

function toOperator(text: string): ConditionOperator {
  switch (text) {
    case '<':
    case '<=':
    case '>':
    case '>=':
    case '=':
    case '<>':
      return text;
    default:
      return '=';
  }
}

export function evaluateCondition(condition: FormatCondition, value: number): boolean {
  switch (condition.operator) {
    case '<': return value < condition.value;
    case '<=': return value <= condition.value;
    case '>': return value > condition.value;
    case '>=': return value >= condition.value;
    case '=': return value === condition.value;
    case '<>': return value !== condition.value;
  }
}

/** True when no non-negative number can satisfy the condition */
export function conditionAdmitsOnlyNegatives(condition: FormatCondition): boolean {
  switch (condition.operator) {
    case '<': return condition.value <= 0;
    case '<=':
    case '=': return condition.value < 0;
    default: return false;
  }
}

/** Puts the literal text back in place of each placeholder */
export function restoreLiterals(text: string, section: FormatSection, overrides: ReadonlyMap<number, string> = new Map()): string {
  return text.replace(PLACEHOLDER_PATTERN, (ch) => {
    const index = ch.charCodeAt(0) - PLACEHOLDER_BASE;
    return overrides.get(index) ?? section.literals[index] ?? '';
  });
}

// =============================================================================
// Classification
// =============================================================================

const GENERAL_PATTERN = /general/i;
const DATETIME_PATTERN = /[yYmMdDhHsS]|am\/pm|a\/p/i;

function classify(body: string, elapsed: boolean): SectionKind {
  if (GENERAL_PATTERN.test(body)) return 'general';
  if (elapsed || DATETIME_PATTERN.test(body)) return 'datetime';
  if (body.includes('@')) return 'text';
  if (/[0#?]/.test(body)) return 'number';
  return 'literal';
}

// =============================================================================
// Number Patterns
// =============================================================================

export function parseNumberPattern(body: string): NumberPattern {
  const percentCount = (body.match(/%/g) ?? []).length;
  let first = body.search(/[0#?]/);
  let last = Math.max(body.lastIndexOf('0'), body.lastIndexOf('#'), body.lastIndexOf('?'));
  if (first > 0 && body[first - 1] === '.') first--;

  // Fixed fraction denominator digits sit after the last placeholder
  const slash = body.indexOf('/', first);
  if (slash > first && slash > last) {
    const fixed = /^\s*[1-9]\d*/.exec(body.slice(slash + 1));
    if (fixed) last = slash + fixed[0].length;
  }

  let scaleEnd = last + 1;
  while (body[scaleEnd] === ',') scaleEnd++;

  const prefix = body.slice(0, first);
  const core = body.slice(first, last + 1);
  const suffix = body.slice(scaleEnd);
  const pattern: NumberPattern = {
    prefix,
    suffix,
    integer: '',
    grouping: false,
    scale: scaleEnd - last - 1,
    hasDecimalPoint: false,
    decimals: '',
    percentCount,
  };

  const coreSlash = core.indexOf('/');
  if (coreSlash > 0) {
    pattern.fraction = parseFraction(core.slice(0, coreSlash), core.slice(coreSlash + 1));
    return pattern;
  }

  const exponent = /[Ee][+-]/.exec(core);
  const mantissa = exponent ? core.slice(0, exponent.index) : core;
  if (exponent) {
    pattern.exponent = {
      upper: exponent[0][0] === 'E',
      alwaysSign: exponent[0][1] === '+',
      digits: [...core.slice(exponent.index + 2)].filter(isDigitPlaceholder).length,
    };
  }

  const dot = mantissa.indexOf('.');
  const integerPart = dot < 0 ? mantissa : mantissa.slice(0, dot);
  pattern.grouping = integerPart.includes(',');
  pattern.integer = integerPart.replace(/,/g, '');
  if (dot >= 0) {
    pattern.hasDecimalPoint = true;
    const decimalPart = mantissa.slice(dot + 1);
    pattern.decimals = [...decimalPart].filter(isDigitPlaceholder).join('');
    pattern.suffix = [...decimalPart].filter((ch) => !isDigitPlaceholder(ch) && ch !== ',').join('') + pattern.suffix;
  }
  return pattern;
}

function parseFraction(left: string, right: string): NonNullable<NumberPattern['fraction']> {
  const numeratorMatch = /[0#?]+$/.exec(left);
  const numerator = numeratorMatch ? numeratorMatch[0] : '?';
  const rest = numeratorMatch ? left.slice(0, numeratorMatch.index) : left;

  let integer = '';
  let separator = '';
  const lastPlaceholder = Math.max(rest.lastIndexOf('0'), rest.lastIndexOf('#'), rest.lastIndexOf('?'));
  if (lastPlaceholder >= 0) {
    integer = [...rest.slice(0, lastPlaceholder + 1)].filter(isDigitPlaceholder).join('');
    separator = rest.slice(lastPlaceholder + 1);
  } else {
    separator = rest;
  }

  const denominatorText = right.trim();
  const denominator = /^[1-9]\d*$/.test(denominatorText)
    ? { fixed: Number(denominatorText) }
    : { placeholders: [...denominatorText].filter(isDigitPlaceholder).join('') || '?' };

  return { integer, separator, numerator, denominator };
}

// =============================================================================
// Entry Point
// =============================================================================

/** An empty code reads as General */
export function parseFormatCode(code: string, category: FormatCategory): ParsedFormat {
  const sections = splitSections(code.trim() === '' ? 'General' : code).slice(0, 4).map((source) => {
    const extracted = extractSection(source);
    const kind = classify(extracted.body, extracted.elapsed);
    const section: FormatSection = { ...extracted, kind };
    if (kind === 'number') section.number = parseNumberPattern(extracted.body);
    if (kind === 'datetime') section.tokens = tokenizeDateTime(extracted.body, category);
    return section;
  });

  let numericSections = sections;
  let textSection: FormatSection | undefined;
  if (sections.length === 4) {
    numericSections = sections.slice(0, 3);
    textSection = sections[3];
  } else if (sections[sections.length - 1].kind === 'text') {
    numericSections = sections.slice(0, -1);
    textSection = sections[sections.length - 1];
  }

  return { code, sections, numericSections, textSection };
}
