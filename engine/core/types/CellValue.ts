/**
 * Sheetgrid Engine - Cell Values
 *
 * Immutable tagged union of the scalar kinds a cell can hold, with
 * structural equality and a permissive text auto-detector.
 *
 * Dates are calendar date-times read through their local fields.
 * Durations are signed spans in milliseconds.
 */

import { logger } from '../logger.js';

const log = logger.child({ component: 'CellValue' });

// ============================================================================
// Types
// ============================================================================

export type CellValue =
  | { readonly type: 'text'; readonly value: string }
  | { readonly type: 'number'; readonly value: number }
  | { readonly type: 'boolean'; readonly value: boolean }
  | { readonly type: 'formula'; readonly value: string }
  | { readonly type: 'error'; readonly value: string }
  | { readonly type: 'date'; readonly value: Date }
  | { readonly type: 'duration'; readonly value: number };

export type CellValueType = CellValue['type'];

/** Pluggable fallback used by parseCellValue for date-like text */
export type DateParser = (text: string) => Date | null;

export interface ParseOptions {
  /** Treat a leading "=" as a formula (default true) */
  allowFormulas?: boolean;
  dateParser?: DateParser;
}

export const MS_PER_SECOND = 1000;
export const MS_PER_MINUTE = 60 * MS_PER_SECOND;
export const MS_PER_HOUR = 60 * MS_PER_MINUTE;
export const MS_PER_DAY = 24 * MS_PER_HOUR;

// ============================================================================
// Constructors
// ============================================================================

export function textValue(value: string): CellValue {
  return { type: 'text', value };
}

export function numberValue(value: number): CellValue {
  return { type: 'number', value };
}

export function booleanValue(value: boolean): CellValue {
  return { type: 'boolean', value };
}

/** Formula text is stored opaque, including its leading "=" */
export function formulaValue(value: string): CellValue {
  return { type: 'formula', value };
}

export function errorValue(value: string): CellValue {
  return { type: 'error', value };
}

export function dateValue(value: Date): CellValue {
  return { type: 'date', value: new Date(value.getTime()) };
}

export function durationValue(milliseconds: number): CellValue {
  return { type: 'duration', value: milliseconds };
}

/** Convenience for durations given as fields */
export function durationOf(parts: { hours?: number; minutes?: number; seconds?: number; milliseconds?: number }): CellValue {
  return durationValue(
    (parts.hours ?? 0) * MS_PER_HOUR +
    (parts.minutes ?? 0) * MS_PER_MINUTE +
    (parts.seconds ?? 0) * MS_PER_SECOND +
    (parts.milliseconds ?? 0)
  );
}

// ============================================================================
// Equality
// ============================================================================

export function cellValuesEqual(a: CellValue | null | undefined, b: CellValue | null | undefined): boolean {
  if (a === b) return true;
  if (!a || !b || a.type !== b.type) return false;
  if (a.type === 'date' && b.type === 'date') {
    return a.value.getTime() === b.value.getTime();
  }
  return Object.is(a.value, b.value) || a.value === b.value;
}

/** Structural key: equal values produce equal keys */
export function cellValueHash(value: CellValue): string {
  switch (value.type) {
    case 'date':
      return `date:${value.value.getTime()}`;
    case 'number':
      return `number:${value.value === 0 ? 0 : value.value}`;
    default:
      return `${value.type}:${String(value.value)}`;
  }
}

// ============================================================================
// Display
// ============================================================================

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

export function formatDurationClock(milliseconds: number): string {
  const negative = milliseconds < 0;
  const abs = Math.abs(milliseconds);
  const hours = Math.floor(abs / MS_PER_HOUR);
  const minutes = Math.floor(abs / MS_PER_MINUTE) % 60;
  const seconds = Math.floor(abs / MS_PER_SECOND) % 60;
  return `${negative ? '-' : ''}${hours}:${pad2(minutes)}:${pad2(seconds)}`;
}

/** Unformatted text for a value, as used by the General format */
export function displayValue(value: CellValue): string {
  switch (value.type) {
    case 'text':
    case 'formula':
    case 'error':
      return value.value;
    case 'number':
      return String(value.value === 0 ? 0 : value.value);
    case 'boolean':
      return value.value ? 'TRUE' : 'FALSE';
    case 'date': {
      const d = value.value;
      return `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())}`;
    }
    case 'duration':
      return formatDurationClock(value.value);
  }
}

// ============================================================================
// Parsing
// ============================================================================

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const DURATION_PATTERN = /^(\d+):([0-5]\d)(?::([0-5]\d))?$/;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;
const US_DATE_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

function buildDate(year: number, month: number, day: number, hour = 0, minute = 0, second = 0): Date | null {
  const date = new Date(year, month - 1, day, hour, minute, second);
  // Reject rollovers such as 2024-02-30
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  if (hour > 23 || minute > 59 || second > 59) return null;
  return date;
}

/** Recognizes yyyy-mm-dd[ HH:mm[:ss]] and m/d/yyyy */
export const defaultDateParser: DateParser = (text) => {
  const iso = ISO_DATE_PATTERN.exec(text);
  if (iso) {
    return buildDate(
      Number(iso[1]), Number(iso[2]), Number(iso[3]),
      Number(iso[4] ?? 0), Number(iso[5] ?? 0), Number(iso[6] ?? 0)
    );
  }
  const us = US_DATE_PATTERN.exec(text);
  if (us) {
    return buildDate(Number(us[3]), Number(us[1]), Number(us[2]));
  }
  return null;
};

/**
 * Detects the type of user-entered text.
 *
 * Priority: blank, formula, boolean, number, duration (H:mm[:ss]), date,
 * text. Numbers are tried before dates so a digit string never becomes a
 * timestamp. Never throws.
 */
export function parseCellValue(text: string, options: ParseOptions = {}): CellValue | null {
  const trimmed = text.trim();
  if (trimmed.length === 0) return null;

  if ((options.allowFormulas ?? true) && trimmed.startsWith('=')) {
    return formulaValue(trimmed);
  }

  const upper = trimmed.toUpperCase();
  if (upper === 'TRUE') return booleanValue(true);
  if (upper === 'FALSE') return booleanValue(false);

  if (NUMBER_PATTERN.test(trimmed)) {
    const n = Number(trimmed);
    if (Number.isFinite(n)) return numberValue(n);
  }

  const duration = DURATION_PATTERN.exec(trimmed);
  if (duration) {
    return durationValue(
      Number(duration[1]) * MS_PER_HOUR +
      Number(duration[2]) * MS_PER_MINUTE +
      Number(duration[3] ?? 0) * MS_PER_SECOND
    );
  }

  const parser = options.dateParser ?? defaultDateParser;
  let date: Date | null = null;
  try {
    date = parser(trimmed);
  } catch (err) {
    log.debug({ err, text: trimmed }, 'date parser rejected input');
  }
  if (date && !Number.isNaN(date.getTime())) return dateValue(date);

  return textValue(trimmed);
}

// ============================================================================
// Type Guards
// ============================================================================

export function isNumberValue(value: CellValue | null | undefined): value is Extract<CellValue, { type: 'number' }> {
  return value?.type === 'number';
}

export function isTextValue(value: CellValue | null | undefined): value is Extract<CellValue, { type: 'text' }> {
  return value?.type === 'text';
}

export function isDateValue(value: CellValue | null | undefined): value is Extract<CellValue, { type: 'date' }> {
  return value?.type === 'date';
}
