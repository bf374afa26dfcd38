/**
 * Sheetgrid Engine - Worksheet Builder
 *
 * Assembles initial cells row by row for SparseWorksheetData:
 *
 *   const sheet = new SparseWorksheetData({
 *     cells: new WorksheetBuilder()
 *       .row(['Name', 'Amount'])
 *       .row(['Apples', 42])
 *       .row([null, '=2+42'])
 *       .build(),
 *   });
 */

import type { Cell } from '../types/Cell.js';
import { isCellEmpty } from '../types/Cell.js';
import { booleanValue, dateValue, numberValue, parseCellValue } from '../types/CellValue.js';
import { cellRef, type CellRef } from '../types/index.js';

/** Strings are auto-detected with parseCellValue; null leaves a gap */
export type BuilderInput = Cell | string | number | boolean | Date | null;

export class WorksheetBuilder {
  private readonly cells: Array<[CellRef, Cell]> = [];
  private nextRow = 0;

  row(inputs: readonly BuilderInput[]): this {
    inputs.forEach((input, col) => {
      const cell = toCell(input);
      if (!isCellEmpty(cell)) this.cells.push([cellRef(this.nextRow, col), cell]);
    });
    this.nextRow++;
    return this;
  }

  /** Leave `count` empty rows */
  skip(count = 1): this {
    this.nextRow += count;
    return this;
  }

  build(): Array<[CellRef, Cell]> {
    return [...this.cells];
  }
}

function toCell(input: BuilderInput): Cell {
  if (input === null) return {};
  if (input instanceof Date) return { value: dateValue(input) };
  switch (typeof input) {
    case 'string': {
      const value = parseCellValue(input);
      return value ? { value } : {};
    }
    case 'number':
      return { value: numberValue(input) };
    case 'boolean':
      return { value: booleanValue(input) };
    default:
      return input;
  }
}
