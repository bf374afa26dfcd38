/**
 * Sheetgrid Engine - Cell Aggregate
 *
 * A Cell is a read/write view over the four aspects the store keeps per
 * coordinate. Styles and rich-text runs are opaque to the engine: it stores,
 * returns and clears them and compares them only through CellEquality.
 */

import { isDeepStrictEqual } from 'node:util';
import type { CellFormat } from '../formatting/CellFormat.js';
import { cellFormatsEqual } from '../formatting/CellFormat.js';
import { cellValuesEqual, type CellValue } from './CellValue.js';

// ============================================================================
// Presentation Payloads
// ============================================================================

export interface CellStyle {
  fontFamily?: string;
  /** Font size in points */
  fontSize?: number;
  /** Font color (hex) */
  fontColor?: string;
  bold?: boolean;
  italic?: boolean;
  /** Underline: 0=none, 1=single, 2=double */
  underline?: number;
  strikethrough?: boolean;
  /** Background color (hex) */
  backgroundColor?: string;
  horizontalAlign?: 'left' | 'center' | 'right' | 'justify';
  verticalAlign?: 'top' | 'middle' | 'bottom';
  wrap?: boolean;
  rotation?: number;
  indent?: number;
}

export interface CharacterFormat {
  fontFamily?: string;
  fontSize?: number;
  fontColor?: string;
  bold?: boolean;
  italic?: boolean;
  underline?: number;
  strikethrough?: boolean;
}

/** A span of text with uniform character formatting; spans concatenate to the cell text */
export interface RichTextRun {
  text: string;
  format?: CharacterFormat;
}

export type RichText = readonly RichTextRun[];

// ============================================================================
// Cell
// ============================================================================

export interface Cell {
  readonly value?: CellValue;
  readonly style?: CellStyle;
  readonly format?: CellFormat;
  readonly richText?: RichText;
}

export interface CellEquality {
  style: (a: CellStyle, b: CellStyle) => boolean;
  richText: (a: RichText, b: RichText) => boolean;
}

export const DEFAULT_CELL_EQUALITY: CellEquality = {
  style: (a, b) => isDeepStrictEqual(a, b),
  richText: (a, b) => isDeepStrictEqual(a, b),
};

export function createCell(value?: CellValue | null, extras: Omit<Cell, 'value'> = {}): Cell {
  const cell: { -readonly [K in keyof Cell]: Cell[K] } = {};
  if (value) cell.value = value;
  if (extras.style) cell.style = extras.style;
  if (extras.format) cell.format = extras.format;
  if (extras.richText) cell.richText = extras.richText;
  return cell;
}

export function isCellEmpty(cell: Cell | null | undefined): boolean {
  return !cell || (!cell.value && !cell.style && !cell.format && !cell.richText);
}

function optionalEqual<T>(a: T | undefined, b: T | undefined, eq: (x: T, y: T) => boolean): boolean {
  if (a === undefined || b === undefined) return a === b;
  return a === b || eq(a, b);
}

/** Structural equality; two absent (or empty) cells are equal */
export function cellsEqual(
  a: Cell | null | undefined,
  b: Cell | null | undefined,
  equality: CellEquality = DEFAULT_CELL_EQUALITY
): boolean {
  if (isCellEmpty(a) || isCellEmpty(b)) return isCellEmpty(a) && isCellEmpty(b);
  if (!a || !b) return false;
  return (
    cellValuesEqual(a.value, b.value) &&
    optionalEqual(a.format, b.format, cellFormatsEqual) &&
    optionalEqual(a.style, b.style, equality.style) &&
    optionalEqual(a.richText, b.richText, equality.richText)
  );
}
