/**
 * Sheetgrid Engine - Coordinate and Range Types
 *
 * Zero-based cell coordinates and inclusive rectangular ranges, plus the
 * A1-notation codec and the range algebra used by the store, the merge
 * registry and the fill engine.
 */

import { InvalidArgumentError, NotationError } from '../errors.js';

// ============================================================================
// Cell Reference Types
// ============================================================================

export interface CellRef {
  readonly row: number;
  readonly col: number;
}

/** Inclusive on both axes; start <= end */
export interface CellRange {
  readonly startRow: number;
  readonly startCol: number;
  readonly endRow: number;
  readonly endCol: number;
}

/** Key format: "row_col" */
export type CellKey = string;

export const MAX_ROWS = 1_048_576;
export const MAX_COLS = 16_384;

function assertIndex(value: number, label: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidArgumentError(`${label} must be a non-negative integer, got ${value}`);
  }
}

export function cellRef(row: number, col: number): CellRef {
  assertIndex(row, 'row');
  assertIndex(col, 'col');
  return { row, col };
}

export function cellRange(startRow: number, startCol: number, endRow: number, endCol: number): CellRange {
  assertIndex(startRow, 'startRow');
  assertIndex(startCol, 'startCol');
  assertIndex(endRow, 'endRow');
  assertIndex(endCol, 'endCol');
  if (endRow < startRow || endCol < startCol) {
    throw new InvalidArgumentError(
      `Range end (${endRow}, ${endCol}) must not precede start (${startRow}, ${startCol})`
    );
  }
  return { startRow, startCol, endRow, endCol };
}

/** Range spanned by two opposite corners, in any order */
export function rangeFromCorners(a: CellRef, b: CellRef): CellRange {
  return cellRange(
    Math.min(a.row, b.row),
    Math.min(a.col, b.col),
    Math.max(a.row, b.row),
    Math.max(a.col, b.col)
  );
}

export function singleCellRange(ref: CellRef): CellRange {
  return cellRange(ref.row, ref.col, ref.row, ref.col);
}

export function cellKey(row: number, col: number): CellKey {
  return `${row}_${col}`;
}

export function refKey(ref: CellRef): CellKey {
  return cellKey(ref.row, ref.col);
}

export function parseKey(key: CellKey): CellRef {
  const separator = key.indexOf('_');
  return { row: Number(key.slice(0, separator)), col: Number(key.slice(separator + 1)) };
}

export function refsEqual(a: CellRef, b: CellRef): boolean {
  return a.row === b.row && a.col === b.col;
}

// ============================================================================
// A1 Notation
// ============================================================================

/** 0 -> "A", 25 -> "Z", 26 -> "AA" */
export function columnToLetters(col: number): string {
  assertIndex(col, 'col');
  let letters = '';
  let n = col + 1;
  while (n > 0) {
    const rem = (n - 1) % 26;
    letters = String.fromCharCode(65 + rem) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters;
}

export function lettersToColumn(letters: string): number {
  if (!/^[A-Za-z]+$/.test(letters)) {
    throw new NotationError(`Invalid column letters "${letters}"`, letters);
  }
  let col = 0;
  for (const ch of letters.toUpperCase()) {
    col = col * 26 + (ch.charCodeAt(0) - 64);
  }
  return col - 1;
}

export function toA1(ref: CellRef): string {
  assertIndex(ref.row, 'row');
  return `${columnToLetters(ref.col)}${ref.row + 1}`;
}

const A1_PATTERN = /^\$?([A-Za-z]+)\$?(\d+)$/;

export function fromA1(notation: string): CellRef {
  const match = A1_PATTERN.exec(notation.trim());
  if (!match) {
    throw new NotationError(`Invalid cell reference "${notation}"`, notation);
  }
  const rowNumber = Number(match[2]);
  if (rowNumber < 1) {
    throw new NotationError(`Row number must be >= 1 in "${notation}"`, notation);
  }
  return { row: rowNumber - 1, col: lettersToColumn(match[1]) };
}

/** "A1:C3"; a single-cell range renders as "A1" */
export function rangeToA1(range: CellRange): string {
  const start = toA1({ row: range.startRow, col: range.startCol });
  if (range.startRow === range.endRow && range.startCol === range.endCol) {
    return start;
  }
  return `${start}:${toA1({ row: range.endRow, col: range.endCol })}`;
}

export function rangeFromA1(notation: string): CellRange {
  const parts = notation.split(':');
  if (parts.length > 2) {
    throw new NotationError(`Invalid range "${notation}"`, notation);
  }
  const start = fromA1(parts[0]);
  const end = parts.length === 2 ? fromA1(parts[1]) : start;
  return rangeFromCorners(start, end);
}

// ============================================================================
// Range Algebra
// ============================================================================

export function rangeRowCount(range: CellRange): number {
  return range.endRow - range.startRow + 1;
}

export function rangeColCount(range: CellRange): number {
  return range.endCol - range.startCol + 1;
}

export function rangeCellCount(range: CellRange): number {
  return rangeRowCount(range) * rangeColCount(range);
}

export function rangeTopLeft(range: CellRange): CellRef {
  return { row: range.startRow, col: range.startCol };
}

export function rangeContains(range: CellRange, row: number, col: number): boolean {
  return row >= range.startRow && row <= range.endRow &&
         col >= range.startCol && col <= range.endCol;
}

export function rangeContainsRef(range: CellRange, ref: CellRef): boolean {
  return rangeContains(range, ref.row, ref.col);
}

/** Whether `inner` lies entirely within `outer` */
export function rangeContainsRange(outer: CellRange, inner: CellRange): boolean {
  return inner.startRow >= outer.startRow && inner.endRow <= outer.endRow &&
         inner.startCol >= outer.startCol && inner.endCol <= outer.endCol;
}

export function rangesOverlap(a: CellRange, b: CellRange): boolean {
  return !(a.endRow < b.startRow || b.endRow < a.startRow ||
           a.endCol < b.startCol || b.endCol < a.startCol);
}

export function rangeIntersection(a: CellRange, b: CellRange): CellRange | null {
  if (!rangesOverlap(a, b)) return null;
  return {
    startRow: Math.max(a.startRow, b.startRow),
    startCol: Math.max(a.startCol, b.startCol),
    endRow: Math.min(a.endRow, b.endRow),
    endCol: Math.min(a.endCol, b.endCol),
  };
}

/** Smallest range covering both */
export function rangeUnion(a: CellRange, b: CellRange): CellRange {
  return {
    startRow: Math.min(a.startRow, b.startRow),
    startCol: Math.min(a.startCol, b.startCol),
    endRow: Math.max(a.endRow, b.endRow),
    endCol: Math.max(a.endCol, b.endCol),
  };
}

/** Smallest range covering `range` and `ref` */
export function rangeExpand(range: CellRange, ref: CellRef): CellRange {
  return {
    startRow: Math.min(range.startRow, ref.row),
    startCol: Math.min(range.startCol, ref.col),
    endRow: Math.max(range.endRow, ref.row),
    endCol: Math.max(range.endCol, ref.col),
  };
}

export function rangesEqual(a: CellRange, b: CellRange): boolean {
  return a.startRow === b.startRow && a.startCol === b.startCol &&
         a.endRow === b.endRow && a.endCol === b.endCol;
}

export function offsetRange(range: CellRange, rowDelta: number, colDelta: number): CellRange {
  return {
    startRow: range.startRow + rowDelta,
    startCol: range.startCol + colDelta,
    endRow: range.endRow + rowDelta,
    endCol: range.endCol + colDelta,
  };
}

/** Covered coordinates in row-major order */
export function* rangeCells(range: CellRange): Generator<CellRef> {
  for (let row = range.startRow; row <= range.endRow; row++) {
    for (let col = range.startCol; col <= range.endCol; col++) {
      yield { row, col };
    }
  }
}
