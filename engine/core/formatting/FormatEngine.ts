/**
 * Sheetgrid Engine - Format Engine
 *
 * Renders a CellValue under a CellFormat to display text.
 *
 * Features:
 * - Up to four sections (positive;negative;zero;text) and bracket conditions
 * - Digit placeholders 0 # ?, grouping, scaling commas, percent
 * - Scientific (including engineering notation) and fractions
 * - Dates, times, 12/24-hour clocks and elapsed durations
 * - Colors, currency symbols, per-section locales and fill characters
 *
 * Rendering never throws; anything unrecognized is carried through as
 * literal text.
 */

import { engineConfig } from '../config.js';
import { logger } from '../logger.js';
import {
  displayValue,
  MS_PER_DAY,
  MS_PER_HOUR,
  MS_PER_MINUTE,
  MS_PER_SECOND,
  type CellValue,
} from '../types/CellValue.js';
import type { CellFormat, FormatCategory } from './CellFormat.js';
import { hasElapsedToken, type DateTimeToken } from './DateTimeTokenizer.js';
import {
  conditionAdmitsOnlyNegatives,
  evaluateCondition,
  isDigitPlaceholder,
  parseFormatCode,
  restoreLiterals,
  type FormatSection,
  type NumberPattern,
  type ParsedFormat,
} from './FormatCode.js';
import { getLocale, resolveLocale, type FormatLocale } from './FormatLocale.js';

const log = logger.child({ component: 'FormatEngine' });

// =============================================================================
// Types
// =============================================================================

export interface FormatOptions {
  /** Locale record, hex code ("0407") or tag ("de-DE") */
  locale?: FormatLocale | string;
  /** Cell width in pixels, used to expand `*X` fills */
  availableWidth?: number;
  /** Pixels per character; defaults to SHEETGRID_CHAR_WIDTH */
  charWidth?: number;
}

export interface FormatResult {
  text: string;
  /** Hex color from a `[Red]`/`[ColorN]` bracket */
  color?: string;
}

interface RenderContext {
  category: FormatCategory;
  locale: FormatLocale;
  availableWidth?: number;
  charWidth: number;
}

interface SelectedSection {
  section: FormatSection;
  showSign: boolean;
}

const CACHE_LIMIT = 500;
const CURRENCY_GLYPHS = ['$', '€', '£', '¥', '₹', '₽', '¢'];

// =============================================================================
// Serial Dates
// =============================================================================

const EPOCH_UTC = Date.UTC(1899, 11, 30);

/** Spreadsheet serial (days since 1899-12-30, fraction = time of day) to a local Date */
export function serialToDate(serial: number): Date {
  const days = Math.floor(serial);
  let ms = Math.round((serial - days) * MS_PER_DAY);
  const hours = Math.floor(ms / MS_PER_HOUR);
  ms -= hours * MS_PER_HOUR;
  const minutes = Math.floor(ms / MS_PER_MINUTE);
  ms -= minutes * MS_PER_MINUTE;
  const seconds = Math.floor(ms / MS_PER_SECOND);
  ms -= seconds * MS_PER_SECOND;
  return new Date(1899, 11, 30 + days, hours, minutes, seconds, ms);
}

/** Local calendar fields of a Date to a spreadsheet serial */
export function dateToSerial(date: Date): number {
  const utc = Date.UTC(
    date.getFullYear(),
    date.getMonth(),
    date.getDate(),
    date.getHours(),
    date.getMinutes(),
    date.getSeconds(),
    date.getMilliseconds()
  );
  return (utc - EPOCH_UTC) / MS_PER_DAY;
}

// =============================================================================
// Number Helpers
// =============================================================================

/** Half-up rounding to a fixed number of decimals */
function roundToString(x: number, decimals: number): string {
  // toFixed switches to exponent notation from 1e21
  if (x >= 1e21) return BigInt(x).toString() + (decimals > 0 ? `.${'0'.repeat(decimals)}` : '');
  const text = String(x);
  if (text.includes('e') || x >= 1e15) return x.toFixed(decimals);
  const rounded = Number(`${Math.round(Number(`${text}e${decimals}`))}e-${decimals}`);
  return rounded.toFixed(decimals);
}

function generalNumber(n: number, locale: FormatLocale): string {
  const clean = n === 0 ? 0 : Number(n.toPrecision(15));
  return String(clean).replace('.', locale.decimal);
}

function groupDigits(text: string, separator: string): string {
  return text.replace(/\d+/, (run) => run.replace(/\B(?=(\d{3})+(?!\d))/g, () => separator));
}

/**
 * Right-aligns digits into integer placeholders. `0` pads with zero, `?`
 * with a space, `#` with nothing; extra digits go before the first
 * placeholder.
 */
function fillInteger(digits: string, pattern: string, grouping: boolean, separator: string): string {
  const chars = [...pattern];
  const firstPlaceholder = chars.findIndex(isDigitPlaceholder);
  if (firstPlaceholder < 0) return digits + pattern;

  let remaining = digits.length - 1;
  let result = '';
  for (let i = chars.length - 1; i >= 0; i--) {
    const ch = chars[i];
    if (!isDigitPlaceholder(ch)) {
      result = ch + result;
      continue;
    }
    let piece = '';
    if (remaining >= 0) piece = digits[remaining--];
    else if (ch === '0') piece = '0';
    else if (ch === '?') piece = ' ';
    if (i === firstPlaceholder && remaining >= 0) {
      piece = digits.slice(0, remaining + 1) + piece;
      remaining = -1;
    }
    result = piece + result;
  }

  const interiorLiterals = chars.some((ch) => !isDigitPlaceholder(ch));
  return grouping && !interiorLiterals ? groupDigits(result, separator) : result;
}

/** Trailing zeros vanish under `#` and become spaces under `?` */
function fillDecimals(digits: string, pattern: string): string {
  const chars = [...digits];
  for (let i = pattern.length - 1; i >= 0; i--) {
    if (chars[i] !== '0' || pattern[i] === '0') break;
    chars[i] = pattern[i] === '?' ? ' ' : '';
  }
  return chars.join('');
}

function padToPlaceholders(digits: string, placeholders: string, side: 'left' | 'right'): string {
  const missing = placeholders.length - digits.length;
  if (missing <= 0) return digits;
  const padFor = (ch: string): string => (ch === '0' ? '0' : ch === '?' ? ' ' : '');
  if (side === 'left') {
    return [...placeholders.slice(0, missing)].map(padFor).join('') + digits;
  }
  return digits + [...placeholders.slice(digits.length)].map(padFor).join('');
}

function gcd(a: number, b: number): number {
  return b === 0 ? a : gcd(b, a % b);
}

/** Closest fraction with denominator <= maxDenominator; ties keep the smaller denominator */
function approximateFraction(value: number, maxDenominator: number): [number, number] {
  let bestNumerator = Math.round(value);
  let bestDenominator = 1;
  let bestError = Math.abs(value - bestNumerator);

  for (let denominator = 2; denominator <= maxDenominator && bestError > 0; denominator++) {
    const numerator = Math.round(value * denominator);
    const error = Math.abs(value - numerator / denominator);
    if (error < bestError) {
      bestNumerator = numerator;
      bestDenominator = denominator;
      bestError = error;
    }
  }

  const divisor = gcd(bestNumerator, bestDenominator) || 1;
  return [bestNumerator / divisor, bestDenominator / divisor];
}

// =============================================================================
// Pattern Rendering
// =============================================================================

function renderFixed(x: number, pattern: NumberPattern, locale: FormatLocale): string {
  const fixed = roundToString(x, pattern.decimals.length);
  const [integerDigits, fractionDigits = ''] = fixed.split('.');
  let text = fillInteger(integerDigits === '0' ? '' : integerDigits, pattern.integer, pattern.grouping, locale.thousands);
  if (pattern.hasDecimalPoint) {
    text += locale.decimal + fillDecimals(fractionDigits, pattern.decimals);
  }
  return text;
}

function renderScientific(x: number, pattern: NumberPattern, locale: FormatLocale): string {
  const exponentPattern = pattern.exponent;
  if (!exponentPattern) return renderFixed(x, pattern, locale);

  const integerPlaceholders = Math.max(1, [...pattern.integer].filter(isDigitPlaceholder).length);
  const engineering = integerPlaceholders > 1 && pattern.integer.includes('#');
  const step = engineering ? integerPlaceholders : 1;
  const decimals = pattern.decimals.length;

  let exponent = 0;
  let mantissa = 0;
  if (x !== 0) {
    exponent = Math.floor(Math.log10(x));
    if (x / 10 ** exponent >= 10) exponent++;
    if (x / 10 ** exponent < 1) exponent--;
    exponent = engineering
      ? Math.floor(exponent / step) * step
      : exponent - (integerPlaceholders - 1);
    mantissa = x / 10 ** exponent;
    if (Number(roundToString(mantissa, decimals)) >= 10 ** (engineering ? step : integerPlaceholders)) {
      exponent += step;
      mantissa = x / 10 ** exponent;
    }
  }

  const mantissaText = renderFixed(mantissa, { ...pattern, grouping: false }, locale);
  const sign = exponent < 0 ? '-' : exponentPattern.alwaysSign ? '+' : '';
  const digits = String(Math.abs(exponent)).padStart(exponentPattern.digits, '0');
  return `${mantissaText}${exponentPattern.upper ? 'E' : 'e'}${sign}${digits}`;
}

function renderFraction(x: number, pattern: NumberPattern): string {
  const fraction = pattern.fraction;
  if (!fraction) return String(x);

  const mixed = fraction.integer.length > 0;
  let whole = mixed ? Math.floor(x) : 0;
  const remainder = x - whole;

  let numerator: number;
  let denominator: number;
  if ('fixed' in fraction.denominator) {
    denominator = fraction.denominator.fixed;
    numerator = Math.round(remainder * denominator);
  } else {
    const maxDenominator = 10 ** fraction.denominator.placeholders.length - 1;
    [numerator, denominator] = approximateFraction(remainder, maxDenominator);
  }

  if (mixed && numerator === denominator) {
    whole += 1;
    numerator = 0;
  }

  const wholeText = mixed ? fillInteger(whole === 0 ? '' : String(whole), fraction.integer, false, '') : '';
  if (numerator === 0) return wholeText.trim() === '' ? '0' : wholeText;

  const numeratorText = padToPlaceholders(String(numerator), fraction.numerator, 'left');
  const denominatorText =
    'fixed' in fraction.denominator
      ? String(denominator)
      : padToPlaceholders(String(denominator), fraction.denominator.placeholders, 'right');
  const fractionText = `${numeratorText}/${denominatorText}`;

  if (!mixed) return fraction.separator + fractionText;
  if (whole === 0 && !fraction.integer.includes('0')) return fractionText;
  return wholeText + fraction.separator + fractionText;
}

function renderNumberPattern(magnitude: number, pattern: NumberPattern, locale: FormatLocale, category: FormatCategory): string {
  const impliedPercent = category === 'percentage' && pattern.percentCount === 0;
  const percent = pattern.percentCount + (impliedPercent ? 1 : 0);
  const x = (magnitude / 1000 ** pattern.scale) * 100 ** percent;

  let core: string;
  if (pattern.fraction) core = renderFraction(x, pattern);
  else if (pattern.exponent) core = renderScientific(x, pattern, locale);
  else core = renderFixed(x, pattern, locale);

  return pattern.prefix + core + pattern.suffix + (impliedPercent ? '%' : '');
}

// =============================================================================
// Date and Duration Rendering
// =============================================================================

function pad(n: number, padded: boolean): string {
  return padded ? String(n).padStart(2, '0') : String(n);
}

function renderDateTokens(tokens: readonly DateTimeToken[], date: Date, locale: FormatLocale): string {
  const hours = date.getHours();

  return tokens
    .map((token) => {
      switch (token.kind) {
        case 'literal':
          return token.text;
        case 'year':
          return token.digits === 4
            ? String(date.getFullYear()).padStart(4, '0')
            : String(date.getFullYear() % 100).padStart(2, '0');
        case 'month': {
          const month = date.getMonth();
          switch (token.form) {
            case 'numeric': return String(month + 1);
            case 'padded': return pad(month + 1, true);
            case 'short': return locale.monthsShort[month];
            case 'full': return locale.monthsFull[month];
            case 'initial': return locale.monthsFull[month].charAt(0);
          }
        }
        case 'day':
          switch (token.form) {
            case 'numeric': return String(date.getDate());
            case 'padded': return pad(date.getDate(), true);
            case 'short': return locale.daysShort[date.getDay()];
            case 'full': return locale.daysFull[date.getDay()];
          }
          break;
        case 'hour':
          return pad(token.twelveHour ? hours % 12 || 12 : hours, token.padded);
        case 'minute':
          return pad(date.getMinutes(), token.padded);
        case 'second':
          return pad(date.getSeconds(), token.padded);
        case 'fraction':
          return locale.decimal + String(Math.floor(date.getMilliseconds() / 10 ** (3 - token.digits))).padStart(token.digits, '0');
        case 'ampm': {
          const morning = hours < 12;
          switch (token.form) {
            case 'AM/PM': return morning ? locale.am : locale.pm;
            case 'am/pm': return (morning ? locale.am : locale.pm).toLowerCase();
            case 'A/P': return morning ? 'A' : 'P';
            case 'a/p': return morning ? 'a' : 'p';
          }
        }
        case 'elapsed':
          return renderElapsedTokens([token], dateToSerial(date) * MS_PER_DAY, locale);
      }
    })
    .join('');
}

function isHourToken(token: DateTimeToken): boolean {
  return token.kind === 'hour' || (token.kind === 'elapsed' && token.unit === 'h');
}

function isMinuteToken(token: DateTimeToken): boolean {
  return token.kind === 'minute' || (token.kind === 'elapsed' && token.unit === 'm');
}

/**
 * Elapsed time: the largest unit present counts the total, smaller units
 * wrap. Seconds truncate.
 */
function renderElapsedTokens(tokens: readonly DateTimeToken[], totalMs: number, locale: FormatLocale): string {
  const largest = tokens.some(isHourToken) ? 'h' : tokens.some(isMinuteToken) ? 'm' : 's';
  const totalSeconds = Math.floor(totalMs / MS_PER_SECOND);
  const hours = Math.floor(totalMs / MS_PER_HOUR);
  const minutes = largest === 'h' ? Math.floor(totalMs / MS_PER_MINUTE) % 60 : Math.floor(totalMs / MS_PER_MINUTE);
  const seconds = largest === 's' ? totalSeconds : totalSeconds % 60;

  return tokens
    .map((token) => {
      switch (token.kind) {
        case 'literal':
          return token.text;
        case 'hour':
          return pad(hours, token.padded);
        case 'minute':
          return pad(minutes, token.padded);
        case 'second':
          return pad(seconds, token.padded);
        case 'elapsed':
          return pad(token.unit === 'h' ? hours : token.unit === 'm' ? minutes : seconds, token.padded);
        case 'fraction':
          return locale.decimal + String(Math.floor((totalMs % MS_PER_SECOND) / 10 ** (3 - token.digits))).padStart(token.digits, '0');
        case 'day':
          return String(Math.floor(totalMs / MS_PER_DAY));
        default:
          return '';
      }
    })
    .join('');
}

// =============================================================================
// Section Selection
// =============================================================================

function selectSection(sections: readonly FormatSection[], n: number): SelectedSection | null {
  if (sections.length === 0) return null;

  if (sections.some((s) => s.condition)) {
    for (const section of sections) {
      if (section.condition && evaluateCondition(section.condition, n)) {
        return { section, showSign: n < 0 && !conditionAdmitsOnlyNegatives(section.condition) };
      }
    }
    const fallback = sections.find((s) => !s.condition);
    return fallback ? { section: fallback, showSign: n < 0 } : null;
  }

  if (sections.length === 1) return { section: sections[0], showSign: n < 0 };
  if (sections.length === 2) return { section: n < 0 ? sections[1] : sections[0], showSign: false };
  if (n > 0) return { section: sections[0], showSign: false };
  if (n < 0) return { section: sections[1], showSign: false };
  return { section: sections[2], showSign: false };
}

// =============================================================================
// Format Engine
// =============================================================================

export class FormatEngine {
  private readonly cache = new Map<string, ParsedFormat>();
  private locale: FormatLocale;

  constructor(locale?: FormatLocale | string) {
    this.locale = resolveLocale(locale ?? engineConfig.defaultLocale);
  }

  getLocale(): FormatLocale {
    return this.locale;
  }

  setLocale(locale: FormatLocale | string): void {
    this.locale = resolveLocale(locale);
  }

  clearCache(): void {
    this.cache.clear();
  }

  /** Parsed sections for a format; cached per category and code */
  parse(format: CellFormat): ParsedFormat {
    const key = `${format.type}\u0000${format.formatCode}`;
    let parsed = this.cache.get(key);
    if (!parsed) {
      if (this.cache.size >= CACHE_LIMIT) this.cache.clear();
      parsed = parseFormatCode(format.formatCode, format.type);
      this.cache.set(key, parsed);
    }
    return parsed;
  }

  format(value: CellValue, format: CellFormat, options: FormatOptions = {}): FormatResult {
    const context: RenderContext = {
      category: format.type,
      locale: resolveLocale(options.locale, this.locale),
      availableWidth: options.availableWidth,
      charWidth: options.charWidth ?? engineConfig.charWidth,
    };

    try {
      return this.render(value, this.parse(format), context);
    } catch (err) {
      log.warn({ err, formatCode: format.formatCode }, 'format rendering failed, showing raw value');
      return { text: displayValue(value) };
    }
  }

  formatText(value: CellValue, format: CellFormat, options: FormatOptions = {}): string {
    return this.format(value, format, options).text;
  }

  // ===========================================================================
  // Rendering
  // ===========================================================================

  private render(value: CellValue, parsed: ParsedFormat, context: RenderContext): FormatResult {
    switch (value.type) {
      case 'boolean':
      case 'error':
      case 'formula':
        return { text: displayValue(value) };
      case 'text': {
        const section = parsed.textSection;
        if (!section) return { text: value.value };
        const text = section.body
          .split('@')
          .map((part) => restoreLiterals(part, section))
          .join(value.value);
        return section.color ? { text, color: section.color } : { text };
      }
      case 'number':
        return this.renderNumeric(value.value, value, parsed, context);
      case 'date':
        return this.renderNumeric(dateToSerial(value.value), value, parsed, context);
      case 'duration':
        return this.renderNumeric(value.value / MS_PER_DAY, value, parsed, context);
    }
  }

  private renderNumeric(n: number, original: CellValue, parsed: ParsedFormat, context: RenderContext): FormatResult {
    const selected = Number.isFinite(n) ? selectSection(parsed.numericSections, n) : null;
    if (!selected) return { text: this.generalText(original, context.locale) };

    const { section } = selected;
    const locale = section.localeCode ? getLocale(section.localeCode) : context.locale;
    const magnitude = Math.abs(n);
    let showSign = selected.showSign;
    let body: string;

    switch (section.kind) {
      case 'general':
        if (original.type !== 'number') showSign = false;
        body = section.body.replace(/general/i, () =>
          original.type === 'number' ? generalNumber(magnitude, locale) : displayValue(original)
        );
        break;
      case 'datetime': {
        const tokens = section.tokens ?? [];
        if (hasElapsedToken(tokens) || context.category === 'duration') {
          const totalMs = original.type === 'duration' ? Math.abs(original.value) : Math.round(magnitude * MS_PER_DAY);
          body = renderElapsedTokens(tokens, totalMs, locale);
        } else {
          showSign = false;
          const date = original.type === 'date' ? original.value : serialToDate(n);
          body = renderDateTokens(tokens, date, locale);
        }
        break;
      }
      case 'number':
        body = section.number
          ? renderNumberPattern(magnitude, section.number, locale, context.category)
          : section.body;
        break;
      case 'text':
        body = section.body.split('@').join(generalNumber(magnitude, locale));
        break;
      default:
        body = section.body;
    }

    return this.finish(section, body, showSign, locale, context);
  }

  private generalText(value: CellValue, locale: FormatLocale): string {
    return value.type === 'number' ? generalNumber(value.value, locale) : displayValue(value);
  }

  /** Currency override, sign, literal restoration and fill, in that order */
  private finish(
    section: FormatSection,
    body: string,
    showSign: boolean,
    locale: FormatLocale,
    context: RenderContext
  ): FormatResult {
    const overrides = new Map<number, string>();
    let text = body;

    if (section.currency) {
      text = this.applyBracketCurrency(section, text, section.currency, overrides);
    } else if (section.currency === '' && (context.category === 'currency' || context.category === 'accounting')) {
      text = this.replaceCurrencyGlyph(section, text, locale.currency, overrides) ?? locale.currency + text;
    }
    if (showSign) text = `-${text}`;

    if (section.fillIndex !== undefined) {
      overrides.set(section.fillIndex, this.fillText(section, text, overrides, context));
    }

    const result = restoreLiterals(text, section, overrides);
    return section.color ? { text: result, color: section.color } : { text: result };
  }

  /** `[$€]` takes the place of a glyph already in the pattern, else prints where the bracket stood */
  private applyBracketCurrency(section: FormatSection, text: string, symbol: string, overrides: Map<number, string>): string {
    const replaced = this.replaceCurrencyGlyph(section, text, symbol, overrides);
    if (replaced === null) return text;
    if (section.currencyIndex !== undefined) overrides.set(section.currencyIndex, '');
    return replaced;
  }

  /** Swaps the first currency glyph in the body or a literal; null when there is none */
  private replaceCurrencyGlyph(
    section: FormatSection,
    text: string,
    symbol: string,
    overrides: Map<number, string>
  ): string | null {
    const chars = [...text];
    const glyphIndex = chars.findIndex((ch) => CURRENCY_GLYPHS.includes(ch));
    if (glyphIndex >= 0) {
      chars[glyphIndex] = symbol;
      return chars.join('');
    }
    const literalIndex = section.literals.findIndex(
      (literal, index) => index !== section.currencyIndex && CURRENCY_GLYPHS.includes(literal)
    );
    if (literalIndex >= 0) {
      overrides.set(literalIndex, symbol);
      return text;
    }
    return null;
  }

  private fillText(section: FormatSection, text: string, overrides: ReadonlyMap<number, string>, context: RenderContext): string {
    if (context.availableWidth === undefined || section.fillIndex === undefined) return ' ';
    const withoutFill = new Map(overrides);
    withoutFill.set(section.fillIndex, '');
    const used = restoreLiterals(text, section, withoutFill).length;
    const columns = Math.floor(context.availableWidth / context.charWidth);
    return (section.fillChar ?? ' ').repeat(Math.max(0, columns - used));
  }
}

// =============================================================================
// Factory and Shared Instance
// =============================================================================

export function createFormatEngine(locale?: FormatLocale | string): FormatEngine {
  return new FormatEngine(locale);
}

export const formatEngine = createFormatEngine();

export function formatValue(value: CellValue, format: CellFormat, options?: FormatOptions): FormatResult {
  return formatEngine.format(value, format, options);
}

/** Display text only */
export function formatCellValue(value: CellValue, format: CellFormat, options?: FormatOptions): string {
  return formatEngine.formatText(value, format, options);
}
