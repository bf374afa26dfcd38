/**
 * Sheetgrid Engine - Formatting Module Exports
 */

export {
  DEFAULT_LOCALE,
  getLocale,
  hasLocale,
  isDayFirst,
  localeCodes,
  normalizeLocaleCode,
  resolveLocale,
} from './FormatLocale.js';
export type { FormatLocale } from './FormatLocale.js';

export {
  BUILTIN_FORMATS,
  FORMAT_CATEGORIES,
  PRESET_FORMATS,
  builtinFormat,
  cellFormat,
  cellFormatsEqual,
  describeCellFormat,
  namedColor,
  paletteColor,
} from './CellFormat.js';
export type { CellFormat, FormatCategory, PresetFormatName } from './CellFormat.js';

export { parseFormatCode, splitSections } from './FormatCode.js';
export type {
  ConditionOperator,
  FormatCondition,
  FormatSection,
  NumberPattern,
  ParsedFormat,
  SectionKind,
} from './FormatCode.js';

export { tokenizeDateTime } from './DateTimeTokenizer.js';
export type { AmPmForm, DateTimeToken, DayForm, ElapsedUnit, MonthForm } from './DateTimeTokenizer.js';

export {
  FormatEngine,
  createFormatEngine,
  dateToSerial,
  formatCellValue,
  formatEngine,
  formatValue,
  serialToDate,
} from './FormatEngine.js';
export type { FormatOptions, FormatResult } from './FormatEngine.js';
