/**
 * Sheetgrid Engine - Cell Formats
 *
 * A CellFormat pairs a category with an Excel-style format code. The
 * category disambiguates codes that read the same, e.g. whether `h:mm:ss`
 * is elapsed time or a time of day.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { formatIssues } from '../config.js';

// =============================================================================
// Types
// =============================================================================

export const FORMAT_CATEGORIES = [
  'general',
  'number',
  'currency',
  'accounting',
  'date',
  'time',
  'percentage',
  'fraction',
  'scientific',
  'text',
  'special',
  'duration',
  'custom',
] as const;

export type FormatCategory = (typeof FORMAT_CATEGORIES)[number];

export interface CellFormat {
  readonly type: FormatCategory;
  readonly formatCode: string;
}

export function cellFormat(type: FormatCategory, formatCode: string): CellFormat {
  return Object.freeze({ type, formatCode });
}

export function cellFormatsEqual(a: CellFormat, b: CellFormat): boolean {
  return a.type === b.type && a.formatCode === b.formatCode;
}

export function describeCellFormat(format: CellFormat): string {
  return `CellFormat(${format.type}, ${format.formatCode})`;
}

// =============================================================================
// Presets
// =============================================================================

export const PRESET_FORMATS = {
  general: cellFormat('general', 'General'),
  integer: cellFormat('number', '#,##0'),
  decimal: cellFormat('number', '0.00'),
  number: cellFormat('number', '#,##0.00'),
  currency: cellFormat('currency', '$#,##0.00'),
  percentage: cellFormat('percentage', '0%'),
  percentageDecimal: cellFormat('percentage', '0.00%'),
  scientific: cellFormat('scientific', '0.00E+00'),
  dateIso: cellFormat('date', 'yyyy-MM-dd'),
  dateUs: cellFormat('date', 'm/d/yyyy'),
  dateShort: cellFormat('date', 'd-mmm-yy'),
  dateMonthYear: cellFormat('date', 'mmm-yy'),
  time24: cellFormat('time', 'H:mm'),
  time24Seconds: cellFormat('time', 'H:mm:ss'),
  time12: cellFormat('time', 'h:mm AM/PM'),
  text: cellFormat('text', '@'),
  fraction: cellFormat('fraction', '# ?/?'),
  duration: cellFormat('duration', '[h]:mm:ss'),
  durationShort: cellFormat('duration', '[h]:mm'),
  durationMinSec: cellFormat('duration', '[m]:ss'),
} as const satisfies Record<string, CellFormat>;

export type PresetFormatName = keyof typeof PRESET_FORMATS;

// =============================================================================
// Built-in Format Codes
// =============================================================================

/** Spreadsheet built-in number format ids */
export const BUILTIN_FORMATS: Readonly<Record<number, CellFormat>> = {
  0: PRESET_FORMATS.general,
  1: cellFormat('number', '0'),
  2: PRESET_FORMATS.decimal,
  3: PRESET_FORMATS.integer,
  4: PRESET_FORMATS.number,
  5: cellFormat('currency', '$#,##0_);($#,##0)'),
  6: cellFormat('currency', '$#,##0_);[Red]($#,##0)'),
  7: cellFormat('currency', '$#,##0.00_);($#,##0.00)'),
  8: cellFormat('currency', '$#,##0.00_);[Red]($#,##0.00)'),
  9: PRESET_FORMATS.percentage,
  10: PRESET_FORMATS.percentageDecimal,
  11: PRESET_FORMATS.scientific,
  12: PRESET_FORMATS.fraction,
  13: cellFormat('fraction', '# ??/??'),
  14: cellFormat('date', 'm/d/yyyy'),
  15: PRESET_FORMATS.dateShort,
  16: cellFormat('date', 'd-mmm'),
  17: PRESET_FORMATS.dateMonthYear,
  18: PRESET_FORMATS.time12,
  19: cellFormat('time', 'h:mm:ss AM/PM'),
  20: cellFormat('time', 'h:mm'),
  21: cellFormat('time', 'h:mm:ss'),
  22: cellFormat('date', 'm/d/yyyy h:mm'),
  37: cellFormat('number', '#,##0_);(#,##0)'),
  38: cellFormat('number', '#,##0_);[Red](#,##0)'),
  39: cellFormat('number', '#,##0.00_);(#,##0.00)'),
  40: cellFormat('number', '#,##0.00_);[Red](#,##0.00)'),
  44: cellFormat('accounting', '_("$"* #,##0.00_);_("$"* \\(#,##0.00\\);_("$"* "-"??_);_(@_)'),
  45: cellFormat('time', 'mm:ss'),
  46: PRESET_FORMATS.duration,
  47: cellFormat('time', 'mm:ss.0'),
  48: cellFormat('scientific', '##0.0E+0'),
  49: PRESET_FORMATS.text,
};

export function builtinFormat(id: number): CellFormat | undefined {
  return BUILTIN_FORMATS[id];
}

// =============================================================================
// Colors
// =============================================================================

const PaletteSchema = z.object({
  palette: z.array(z.string().regex(/^#[0-9A-F]{6}$/)).length(56),
  named: z.record(z.string(), z.number().int().min(1).max(56)),
});

function loadPalette(): z.infer<typeof PaletteSchema> {
  const raw: unknown = JSON.parse(readFileSync(new URL('./palette.json', import.meta.url), 'utf8'));
  const parsed = PaletteSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`palette.json is malformed: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

const PALETTE = loadPalette();

/** `[ColorN]`, N in 1..56 */
export function paletteColor(index: number): string | undefined {
  if (!Number.isInteger(index) || index < 1 || index > PALETTE.palette.length) return undefined;
  return PALETTE.palette[index - 1];
}

/** The eight named bracket colors, case-insensitive */
export function namedColor(name: string): string | undefined {
  const index = PALETTE.named[name.toLowerCase()];
  return index === undefined ? undefined : paletteColor(index);
}
