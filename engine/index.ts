/**
 * Sheetgrid Engine
 *
 * In-memory spreadsheet core:
 * - Typed cell values with text auto-detection
 * - Sparse worksheet storage with batched change events
 * - Merged-region bookkeeping
 * - Excel-compatible number, date and duration formats
 * - Autofill pattern detection and merge tiling
 *
 * @example
 * ```typescript
 * import {
 *   PRESET_FORMATS,
 *   SparseWorksheetData,
 *   WorksheetBuilder,
 *   formatCellValue,
 *   rangeFromA1,
 * } from '@sheetgrid/engine';
 *
 * const sheet = new SparseWorksheetData({
 *   cells: new WorksheetBuilder().row(['Item1', 100]).row(['Item2', 150]).build(),
 * });
 *
 * sheet.smartFill(rangeFromA1('A1:B2'), rangeFromA1('A4'));
 * const value = sheet.getValue(3, 1);
 * if (value) console.log(formatCellValue(value, PRESET_FORMATS.currency)); // "$250.00"
 * ```
 */

export * from './core/index.js';
