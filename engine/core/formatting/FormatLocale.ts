/**
 * Sheetgrid Engine - Format Locales
 *
 * Static locale tables keyed by the 4-hex-digit codes that appear in
 * `[$-409]` style brackets. Tables live in locales.json. Unknown codes fall
 * back to US English.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { formatIssues } from '../config.js';
import { logger } from '../logger.js';

const log = logger.child({ component: 'FormatLocale' });

// =============================================================================
// Types
// =============================================================================

const LocaleRecordSchema = z.object({
  code: z.string().regex(/^[0-9A-F]{4}$/),
  tag: z.string().min(2),
  name: z.string(),
  decimal: z.string().min(1),
  thousands: z.string().min(1),
  currency: z.string().min(1),
  monthsFull: z.array(z.string()).length(12),
  monthsShort: z.array(z.string()).length(12),
  /** Sunday first */
  daysFull: z.array(z.string()).length(7),
  daysShort: z.array(z.string()).length(7),
  am: z.string(),
  pm: z.string(),
  dateOrder: z.enum(['mdy', 'dmy', 'ymd']),
});

export type FormatLocale = Readonly<z.infer<typeof LocaleRecordSchema>>;

// =============================================================================
// Table
// =============================================================================

function loadLocales(): Map<string, FormatLocale> {
  const raw: unknown = JSON.parse(readFileSync(new URL('./locales.json', import.meta.url), 'utf8'));
  const parsed = z.array(LocaleRecordSchema).safeParse(raw);
  if (!parsed.success) {
    throw new Error(`locales.json is malformed: ${formatIssues(parsed.error)}`);
  }
  return new Map(parsed.data.map((locale) => [locale.code, locale]));
}

const LOCALES = loadLocales();

function requireLocale(code: string): FormatLocale {
  const locale = LOCALES.get(code);
  if (!locale) throw new Error(`Built-in locale ${code} is missing from locales.json`);
  return locale;
}

/** US English */
export const DEFAULT_LOCALE: FormatLocale = requireLocale('0409');

/** "409" -> "0409"; flags above the low 16 bits are dropped */
export function normalizeLocaleCode(code: string): string | null {
  const hex = code.trim().replace(/^0x/i, '');
  if (!/^[0-9A-Fa-f]{1,8}$/.test(hex)) return null;
  const lcid = parseInt(hex, 16) & 0xffff;
  return lcid.toString(16).toUpperCase().padStart(4, '0');
}

/** Locale for a hex code; unknown or malformed codes fall back to US English */
export function getLocale(code: string): FormatLocale {
  const normalized = normalizeLocaleCode(code);
  const locale = normalized ? LOCALES.get(normalized) : undefined;
  if (!locale) {
    log.debug({ code }, 'unknown locale code, using default');
    return DEFAULT_LOCALE;
  }
  return locale;
}

export function hasLocale(code: string): boolean {
  const normalized = normalizeLocaleCode(code);
  return normalized !== null && LOCALES.has(normalized);
}

/** Accepts a locale record, a hex code, or a BCP 47 tag such as "de-DE" */
export function resolveLocale(locale: FormatLocale | string | undefined, fallback: FormatLocale = DEFAULT_LOCALE): FormatLocale {
  if (locale === undefined) return fallback;
  if (typeof locale !== 'string') return locale;
  for (const record of LOCALES.values()) {
    if (record.tag.toLowerCase() === locale.toLowerCase()) return record;
  }
  return getLocale(locale);
}

export function localeCodes(): string[] {
  return [...LOCALES.keys()];
}

export function isDayFirst(locale: FormatLocale): boolean {
  return locale.dateOrder === 'dmy';
}
