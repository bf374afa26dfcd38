/**
 * Sheetgrid Engine - SparseWorksheetData Unit Tests
 *
 * Covers:
 * - Per-aspect reads and writes
 * - Populated bounds tracking
 * - Change events and batch coalescing
 * - Batch operations
 * - Fill and smart fill in every direction
 * - Merge bookkeeping and tiling
 * - Disposal
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { SparseWorksheetData } from './SparseWorksheetData.js';
import { describeChange, type DataChangeEvent } from './DataChangeEvent.js';
import { IllegalStateError, InvalidArgumentError } from '../errors.js';
import { createCell, type Cell } from '../types/Cell.js';
import { numberValue, textValue } from '../types/CellValue.js';
import { PRESET_FORMATS } from '../formatting/CellFormat.js';
import { cellRef, rangeFromA1, rangeToA1 } from '../types/index.js';

// =============================================================================
// Test Helpers
// =============================================================================

const num = (n: number): Cell => createCell(numberValue(n));
const text = (s: string): Cell => createCell(textValue(s));

function columnValues(sheet: SparseWorksheetData, col: number, fromRow: number, toRow: number): unknown[] {
  const result: unknown[] = [];
  for (let row = fromRow; row <= toRow; row++) {
    result.push(sheet.getValue(row, col)?.value ?? null);
  }
  return result;
}

function mergeNames(sheet: SparseWorksheetData): string[] {
  return sheet.mergedRegions().map((region) => rangeToA1(region.range));
}

describe('SparseWorksheetData', () => {
  let sheet: SparseWorksheetData;
  let events: string[];

  function record(): void {
    sheet.subscribe((event: DataChangeEvent) => events.push(describeChange(event)));
  }

  beforeEach(() => {
    sheet = new SparseWorksheetData();
    events = [];
  });

  // ===========================================================================
  // Aspects
  // ===========================================================================

  describe('Aspects', () => {
    it('should store each aspect independently', () => {
      sheet.setValue(0, 0, numberValue(42));
      sheet.setStyle(0, 0, { bold: true });
      sheet.setFormat(0, 0, PRESET_FORMATS.decimal);

      expect(sheet.getValue(0, 0)).toEqual(numberValue(42));
      expect(sheet.getStyle(0, 0)).toEqual({ bold: true });
      expect(sheet.getFormat(0, 0)).toBe(PRESET_FORMATS.decimal);
      expect(sheet.getRichText(0, 0)).toBeNull();
      expect(sheet.populatedCellCount).toBe(1);
    });

    it('should clear only the aspect set to null', () => {
      sheet.setValue(1, 1, textValue('a'));
      sheet.setStyle(1, 1, { italic: true });
      sheet.setValue(1, 1, null);

      expect(sheet.hasValue(1, 1)).toBe(false);
      expect(sheet.getCell(1, 1)).toEqual({ style: { italic: true } });
    });

    it('should forget a coordinate once its last aspect is cleared', () => {
      sheet.setStyle(3, 3, { bold: true });
      sheet.setStyle(3, 3, null);

      expect(sheet.getCell(3, 3)).toBeNull();
      expect(sheet.populatedCellCount).toBe(0);
    });

    it('should replace every aspect with setCell', () => {
      sheet.setCell(0, 0, createCell(numberValue(1), { style: { bold: true }, format: PRESET_FORMATS.integer }));
      sheet.setCell(0, 0, createCell(numberValue(2)));

      expect(sheet.getCell(0, 0)).toEqual({ value: numberValue(2) });
    });

    it('should return rich text with the aggregate cell', () => {
      const runs = [{ text: 'a', format: { bold: true } }, { text: 'b' }];
      sheet.setValue(0, 0, textValue('ab'));
      sheet.setRichText(0, 0, runs);

      expect(sheet.getCell(0, 0)).toEqual({ value: textValue('ab'), richText: runs });
    });

    it('should load initial cells', () => {
      const initial = new SparseWorksheetData({
        cells: [
          [cellRef(0, 0), num(1)],
          [cellRef(2, 1), text('x')],
        ],
      });
      expect(initial.populatedCellCount).toBe(2);
      expect(initial.getValue(2, 1)).toEqual(textValue('x'));
    });
  });

  // ===========================================================================
  // Bounds
  // ===========================================================================

  describe('Bounds', () => {
    it('should report -1 when empty', () => {
      expect(sheet.maxPopulatedRow).toBe(-1);
      expect(sheet.maxPopulatedColumn).toBe(-1);
    });

    it('should track maxima on insert and rescan on removal', () => {
      sheet.setValue(2, 3, numberValue(1));
      sheet.setValue(5, 1, numberValue(2));
      expect([sheet.maxPopulatedRow, sheet.maxPopulatedColumn]).toEqual([5, 3]);

      sheet.setValue(5, 1, null);
      expect([sheet.maxPopulatedRow, sheet.maxPopulatedColumn]).toEqual([2, 3]);

      sheet.clearRange(rangeFromA1('A1:Z10'));
      expect([sheet.maxPopulatedRow, sheet.maxPopulatedColumn]).toEqual([-1, -1]);
    });

    it('should reject writes outside the sheet', () => {
      const small = new SparseWorksheetData({ rowCount: 10, columnCount: 5 });
      expect(() => small.setValue(10, 0, numberValue(1))).toThrow(InvalidArgumentError);
      expect(() => small.setValue(0, 5, numberValue(1))).toThrow(InvalidArgumentError);
      expect(() => small.setValue(-1, 0, numberValue(1))).toThrow(InvalidArgumentError);
      expect(small.getValue(20, 20)).toBeNull();
    });

    it('should reject invalid dimensions', () => {
      expect(() => new SparseWorksheetData({ rowCount: 0 })).toThrow(InvalidArgumentError);
      expect(() => new SparseWorksheetData({ columnCount: 16_385 })).toThrow(InvalidArgumentError);
    });
  });

  // ===========================================================================
  // Range Reads
  // ===========================================================================

  describe('Range reads', () => {
    it('should list populated cells in row-major order', () => {
      sheet.setValue(1, 1, numberValue(3));
      sheet.setValue(0, 2, numberValue(2));
      sheet.setValue(0, 0, numberValue(1));
      sheet.setValue(9, 9, numberValue(4));

      expect([...sheet.getCellsInRange(rangeFromA1('A1:C2')).keys()]).toEqual(['0_0', '0_2', '1_1']);
      expect([...sheet.getCellsInRange(rangeFromA1('B2')).keys()]).toEqual(['1_1']);
    });

    it('should snapshot all cells', () => {
      sheet.setValue(4, 0, numberValue(1));
      sheet.setValue(0, 4, numberValue(2));
      const snapshot = sheet.getAllCells();
      sheet.setValue(0, 4, null);

      expect([...snapshot.keys()]).toEqual(['0_4', '4_0']);
      expect(snapshot.get('0_4')).toEqual(num(2));
    });
  });

  // ===========================================================================
  // Events
  // ===========================================================================

  describe('Events', () => {
    beforeEach(record);

    it('should publish one event per direct write', () => {
      sheet.setValue(2, 1, numberValue(1));
      sheet.setStyle(2, 1, { bold: true });
      sheet.setFormat(2, 1, PRESET_FORMATS.integer);
      sheet.setRichText(2, 1, [{ text: 'x' }]);
      sheet.setCell(2, 1, null);

      expect(events).toEqual([
        'DataChangeEvent.cellValue(B3)',
        'DataChangeEvent.cellStyle(B3)',
        'DataChangeEvent.cellFormat(B3)',
        'DataChangeEvent.cellValue(B3)',
        'DataChangeEvent.range(B3)',
      ]);
    });

    it('should publish clearRange even when nothing was stored', () => {
      sheet.clearRange(rangeFromA1('A1:B2'));
      expect(events).toEqual(['DataChangeEvent.range(A1:B2)']);
    });

    it('should keep delivering after a listener throws', () => {
      const other: string[] = [];
      sheet.subscribe(() => {
        throw new Error('listener failure');
      });
      sheet.subscribe((event) => other.push(describeChange(event)));

      sheet.setValue(0, 0, numberValue(1));
      expect(other).toEqual(['DataChangeEvent.cellValue(A1)']);
    });

    it('should stop delivering after unsubscribe', () => {
      const seen = vi.fn();
      const unsubscribe = sheet.subscribe(seen);
      unsubscribe();
      sheet.setValue(0, 0, numberValue(1));
      expect(seen).not.toHaveBeenCalled();
    });

    it('should publish reset on clear', () => {
      sheet.setValue(0, 0, numberValue(1));
      sheet.mergeCells(rangeFromA1('B1:C1'));
      events.length = 0;

      sheet.clear();
      expect(events).toEqual(['DataChangeEvent.reset()']);
      expect(sheet.populatedCellCount).toBe(0);
      expect(sheet.mergedRegions()).toEqual([]);
      expect(sheet.maxPopulatedRow).toBe(-1);
    });
  });

  // ===========================================================================
  // Batches
  // ===========================================================================

  describe('Batches', () => {
    beforeEach(record);

    it('should coalesce writes into one range event', () => {
      sheet.batch((batch) => {
        batch.setValue(0, 0, numberValue(1));
        batch.setValue(4, 2, numberValue(2));
        batch.setStyle(1, 1, { bold: true });
      });
      expect(events).toEqual(['DataChangeEvent.range(A1:C5)']);
    });

    it('should expose writes to reads inside the batch', () => {
      sheet.batch((batch) => {
        batch.setValue(0, 0, numberValue(7));
        expect(sheet.getValue(0, 0)).toEqual(numberValue(7));
        expect(events).toEqual([]);
      });
    });

    it('should publish nothing for an empty batch', () => {
      sheet.batch(() => {});
      expect(events).toEqual([]);
    });

    it('should publish once for nested batches', () => {
      sheet.batch((outer) => {
        outer.setValue(0, 0, numberValue(1));
        sheet.batch((inner) => inner.setValue(1, 1, numberValue(2)));
        sheet.setValue(2, 0, numberValue(3));
      });
      expect(events).toEqual(['DataChangeEvent.range(A1:B3)']);
    });

    it('should publish applied writes when the callback throws', () => {
      expect(() =>
        sheet.batch((batch) => {
          batch.setValue(0, 0, numberValue(1));
          throw new Error('boom');
        })
      ).toThrow('boom');
      expect(events).toEqual(['DataChangeEvent.range(A1)']);
      expect(sheet.getValue(0, 0)).toEqual(numberValue(1));
    });

    it('should publish after an async batch settles', async () => {
      await sheet.batchAsync(async (batch) => {
        batch.setValue(0, 0, numberValue(1));
        await Promise.resolve();
        expect(events).toEqual([]);
        batch.setValue(1, 0, numberValue(2));
      });
      expect(events).toEqual(['DataChangeEvent.range(A1:A2)']);
    });

    it('should count an empty clearRange as a touch', () => {
      sheet.batch((batch) => batch.clearRange(rangeFromA1('C3:D4')));
      expect(events).toEqual(['DataChangeEvent.range(C3:D4)']);
    });
  });

  describe('Batch operations', () => {
    it('should fill a range with one cell', () => {
      sheet.batch((batch) => batch.fillRangeWithCell(rangeFromA1('A1:B2'), num(5)));
      expect(sheet.populatedCellCount).toBe(4);
      expect(sheet.getCell(1, 1)).toEqual(num(5));
    });

    it('should clear values but keep styles', () => {
      sheet.setCell(0, 0, createCell(numberValue(1), { style: { bold: true }, richText: [{ text: '1' }] }));
      sheet.batch((batch) => batch.clearValues(rangeFromA1('A1:B2')));
      expect(sheet.getCell(0, 0)).toEqual({ style: { bold: true } });
    });

    it('should clear styles and formats', () => {
      sheet.setStyle(0, 0, { bold: true });
      sheet.setCell(1, 0, createCell(numberValue(1), { format: PRESET_FORMATS.integer }));
      sheet.batch((batch) => {
        batch.clearStyles(rangeFromA1('A1:A2'));
        batch.clearFormats(rangeFromA1('A1:A2'));
      });
      expect(sheet.getCell(0, 0)).toBeNull();
      expect(sheet.getCell(1, 0)).toEqual(num(1));
    });

    it('should copy overlapping ranges from a snapshot', () => {
      sheet.setValue(0, 0, numberValue(1));
      sheet.setValue(1, 0, numberValue(2));
      sheet.setValue(2, 0, numberValue(3));
      record();

      sheet.batch((batch) => batch.copyRange(rangeFromA1('A1:A3'), cellRef(1, 0)));
      expect(columnValues(sheet, 0, 0, 3)).toEqual([1, 1, 2, 3]);
      expect(events).toEqual(['DataChangeEvent.range(A2:A4)']);
    });
  });

  // ===========================================================================
  // Fill
  // ===========================================================================

  describe('fillRange', () => {
    beforeEach(() => {
      sheet.setCell(
        0,
        0,
        createCell(textValue('ab'), { style: { bold: true }, richText: [{ text: 'a' }, { text: 'b' }] })
      );
      record();
    });

    it('should copy value and style without rich text', () => {
      sheet.fillRange(cellRef(0, 0), rangeFromA1('A2:A3'));
      expect(sheet.getCell(1, 0)).toEqual(createCell(textValue('ab'), { style: { bold: true } }));
      expect(sheet.getCell(2, 0)).toEqual(createCell(textValue('ab'), { style: { bold: true } }));
      expect(events).toEqual(['DataChangeEvent.range(A2:A3)']);
    });

    it('should ask the generator for every target', () => {
      sheet.fillRange(cellRef(0, 0), rangeFromA1('A2:A3'), (target) => num(target.row * 10));
      expect(columnValues(sheet, 0, 1, 2)).toEqual([10, 20]);
    });

    it('should do nothing for an empty source without a generator', () => {
      sheet.fillRange(cellRef(5, 5), rangeFromA1('A2:A3'));
      expect(events).toEqual([]);
      expect(sheet.populatedCellCount).toBe(1);
    });

    it('should fill a target that contains the source', () => {
      sheet.fillRange(cellRef(0, 0), rangeFromA1('A1:A3'));
      expect(columnValues(sheet, 0, 0, 2)).toEqual(['ab', 'ab', 'ab']);
    });
  });

  describe('smartFill', () => {
    it('should extend a linear sequence down', () => {
      sheet.setValue(0, 0, numberValue(1));
      sheet.setValue(1, 0, numberValue(2));
      sheet.setValue(2, 0, numberValue(3));
      record();

      const filled = sheet.smartFill(rangeFromA1('A1:A3'), rangeFromA1('A4:A6'));
      expect(filled && rangeToA1(filled)).toBe('A1:A6');
      expect(columnValues(sheet, 0, 3, 5)).toEqual([4, 5, 6]);
      expect(events).toEqual(['DataChangeEvent.range(A4:A6)']);
    });

    it('should accept a destination that includes the source', () => {
      sheet.setValue(0, 0, numberValue(1));
      sheet.setValue(1, 0, numberValue(2));
      sheet.smartFill(rangeFromA1('A1:A2'), rangeFromA1('A1:A4'));
      expect(columnValues(sheet, 0, 2, 3)).toEqual([3, 4]);
    });

    it('should detect each column independently', () => {
      sheet.setValue(0, 0, numberValue(1));
      sheet.setValue(1, 0, numberValue(2));
      sheet.setValue(0, 1, textValue('Item1'));
      sheet.setValue(1, 1, textValue('Item2'));

      sheet.smartFill(rangeFromA1('A1:B2'), rangeFromA1('A3:B4'));
      expect(columnValues(sheet, 0, 2, 3)).toEqual([3, 4]);
      expect(columnValues(sheet, 1, 2, 3)).toEqual(['Item3', 'Item4']);
    });

    it('should cycle text without a numeric pattern', () => {
      sheet.setValue(0, 0, textValue('A'));
      sheet.setValue(1, 0, textValue('B'));
      sheet.setValue(2, 0, textValue('C'));

      sheet.smartFill(rangeFromA1('A1:A3'), rangeFromA1('A9'));
      expect(columnValues(sheet, 0, 3, 8)).toEqual(['A', 'B', 'C', 'A', 'B', 'C']);
    });

    it('should extend backwards when filling up', () => {
      sheet.setValue(5, 0, numberValue(1));
      sheet.setValue(6, 0, numberValue(2));
      sheet.setValue(7, 0, numberValue(3));

      const filled = sheet.smartFill(rangeFromA1('A6:A8'), rangeFromA1('A3'));
      expect(filled && rangeToA1(filled)).toBe('A3:A8');
      expect(columnValues(sheet, 0, 2, 4)).toEqual([-2, -1, 0]);
    });

    it('should extend backwards when filling left', () => {
      sheet.setValue(0, 3, numberValue(10));
      sheet.setValue(0, 4, numberValue(20));
      sheet.setValue(0, 5, numberValue(30));

      const filled = sheet.smartFill(rangeFromA1('D1:F1'), rangeFromA1('A1'));
      expect(filled && rangeToA1(filled)).toBe('A1:F1');
      expect([0, 1, 2].map((col) => sheet.getValue(0, col)?.value)).toEqual([-20, -10, 0]);
    });

    it('should extend rows when filling right', () => {
      sheet.setValue(0, 0, textValue('Q1'));
      sheet.setValue(0, 1, textValue('Q2'));

      sheet.smartFill(rangeFromA1('A1:B1'), rangeFromA1('D1'));
      expect([2, 3].map((col) => sheet.getValue(0, col)?.value)).toEqual(['Q3', 'Q4']);
    });

    it('should prefer vertical fills', () => {
      sheet.setValue(0, 0, numberValue(1));
      sheet.setValue(1, 0, numberValue(2));

      const filled = sheet.smartFill(rangeFromA1('A1:A2'), rangeFromA1('C4'));
      expect(filled && rangeToA1(filled)).toBe('A1:A4');
      expect(columnValues(sheet, 0, 2, 3)).toEqual([3, 4]);
      expect(sheet.getCell(3, 2)).toBeNull();
    });

    it('should return null for a destination inside the source', () => {
      sheet.setValue(0, 0, numberValue(1));
      record();
      expect(sheet.smartFill(rangeFromA1('A1:A3'), rangeFromA1('A2'))).toBeNull();
      expect(events).toEqual([]);
    });

    it('should hand the generator the tiled source cell', () => {
      sheet.setValue(0, 0, textValue('x'));
      sheet.setValue(1, 0, textValue('y'));

      sheet.smartFill(rangeFromA1('A1:A2'), rangeFromA1('A6'), (_target, source) => source);
      expect(columnValues(sheet, 0, 2, 5)).toEqual(['x', 'y', 'x', 'y']);
    });

    it('should reject a destination outside the sheet', () => {
      const small = new SparseWorksheetData({ rowCount: 3 });
      small.setValue(0, 0, numberValue(1));
      expect(() => small.smartFill(rangeFromA1('A1'), rangeFromA1('A5'))).toThrow(InvalidArgumentError);
    });

    describe('with merges', () => {
      it('should tile source merges across the target', () => {
        sheet.setValue(0, 0, textValue('T'));
        sheet.mergeCells(rangeFromA1('A1:A2'));
        sheet.setValue(0, 1, numberValue(1));
        sheet.setValue(1, 1, numberValue(2));
        record();

        sheet.smartFill(rangeFromA1('A1:B2'), rangeFromA1('A3:B6'), () => text('g'));

        expect(mergeNames(sheet)).toEqual(['A1:A2', 'A3:A4', 'A5:A6']);
        expect(columnValues(sheet, 0, 2, 5)).toEqual(['g', null, 'g', null]);
        expect(columnValues(sheet, 1, 2, 5)).toEqual(['g', 'g', 'g', 'g']);
        expect(events).toEqual([
          'DataChangeEvent.range(A3:B6)',
          'DataChangeEvent.merge(A3:A4)',
          'DataChangeEvent.merge(A5:A6)',
        ]);
      });

      it('should stretch the target to a whole number of spans', () => {
        sheet.setValue(0, 0, textValue('T'));
        sheet.mergeCells(rangeFromA1('A1:A2'));

        const filled = sheet.smartFill(rangeFromA1('A1:A2'), rangeFromA1('A3'));
        expect(filled && rangeToA1(filled)).toBe('A1:A4');
        expect(mergeNames(sheet)).toEqual(['A1:A2', 'A3:A4']);
        expect(sheet.getValue(2, 0)).toEqual(textValue('T'));
      });

      it('should stop stretching at the sheet edge and drop the partial tile', () => {
        const small = new SparseWorksheetData({ rowCount: 4 });
        small.setValue(0, 0, textValue('T'));
        small.mergeCells(rangeFromA1('A1:A3'));

        const filled = small.smartFill(rangeFromA1('A1:A3'), rangeFromA1('A4'));
        expect(filled && rangeToA1(filled)).toBe('A1:A4');
        expect(mergeNames(small)).toEqual(['A1:A3']);
        expect(small.getValue(3, 0)).toEqual(textValue('T'));
      });
    });
  });

  // ===========================================================================
  // Merges
  // ===========================================================================

  describe('Merges', () => {
    it('should keep only the anchor value', () => {
      sheet.setValue(0, 0, numberValue(1));
      sheet.setValue(0, 1, numberValue(2));
      sheet.setStyle(0, 1, { bold: true });
      record();

      const region = sheet.mergeCells(rangeFromA1('A1:B2'));
      expect(region.anchor).toEqual({ row: 0, col: 0 });
      expect(sheet.getValue(0, 0)).toEqual(numberValue(1));
      expect(sheet.getCell(0, 1)).toEqual({ style: { bold: true } });
      expect(events).toEqual(['DataChangeEvent.merge(A1:B2)']);
    });

    it('should reject single cells and overlaps', () => {
      sheet.mergeCells(rangeFromA1('A1:B2'));
      expect(() => sheet.mergeCells(rangeFromA1('B2:C3'))).toThrow(InvalidArgumentError);
      expect(() => sheet.mergeCells(rangeFromA1('E5'))).toThrow(InvalidArgumentError);
    });

    it('should unmerge by any covered cell', () => {
      sheet.mergeCells(rangeFromA1('A1:B2'));
      record();

      expect(sheet.unmergeCells(cellRef(1, 1))?.range).toEqual(rangeFromA1('A1:B2'));
      expect(sheet.unmergeCells(cellRef(1, 1))).toBeNull();
      expect(events).toEqual(['DataChangeEvent.unmerge(A1:B2)']);
    });

    it('should unmerge everything intersecting a range', () => {
      sheet.mergeCells(rangeFromA1('A1:B1'));
      sheet.mergeCells(rangeFromA1('C3:D4'));
      sheet.mergeCells(rangeFromA1('F1:F2'));

      expect(sheet.unmergeCellsInRange(rangeFromA1('B1:C3'))).toHaveLength(2);
      expect(mergeNames(sheet)).toEqual(['F1:F2']);
    });

    it('should resolve the region of a covered cell', () => {
      sheet.mergeCells(rangeFromA1('B2:C3'));
      expect(sheet.getMergeRegion(2, 2)?.anchor).toEqual({ row: 1, col: 1 });
      expect(sheet.getMergeRegion(0, 0)).toBeNull();
    });

    describe('moveMerges', () => {
      it('should move merges at the same relative offset', () => {
        sheet.mergeCells(rangeFromA1('A1:A2'));
        record();

        const moved = sheet.moveMerges(rangeFromA1('A1:B2'), cellRef(4, 3));
        expect(moved.map((region) => rangeToA1(region.range))).toEqual(['D5:D6']);
        expect(mergeNames(sheet)).toEqual(['D5:D6']);
        expect(events).toEqual(['DataChangeEvent.unmerge(A1:A2)', 'DataChangeEvent.merge(D5:D6)']);
      });

      it('should drop merges that would leave the sheet', () => {
        const small = new SparseWorksheetData({ rowCount: 5, columnCount: 5 });
        small.mergeCells(rangeFromA1('A1:B1'));
        expect(small.moveMerges(rangeFromA1('A1:B1'), cellRef(0, 4))).toEqual([]);
        expect(small.mergedRegions()).toEqual([]);
      });
    });

    describe('replicateMerges', () => {
      it('should drop incomplete forward tiles', () => {
        sheet.mergeCells(rangeFromA1('A1:A2'));
        const created = sheet.replicateMerges(rangeFromA1('A1:A2'), rangeFromA1('A3:A5'), true);
        expect(created.map((region) => rangeToA1(region.range))).toEqual(['A3:A4']);
      });

      it('should tile backwards from the far edge of the target', () => {
        sheet.mergeCells(rangeFromA1('A5:A6'));
        const created = sheet.replicateMerges(rangeFromA1('A5:A6'), rangeFromA1('A1:A4'), true);
        expect(created.map((region) => rangeToA1(region.range))).toEqual(['A3:A4', 'A1:A2']);
      });

      it('should drop incomplete backward tiles', () => {
        sheet.mergeCells(rangeFromA1('A5:A6'));
        const created = sheet.replicateMerges(rangeFromA1('A5:A6'), rangeFromA1('A1:A3'), true);
        expect(created.map((region) => rangeToA1(region.range))).toEqual(['A2:A3']);
      });

      it('should tile horizontally', () => {
        sheet.mergeCells(rangeFromA1('A1:B1'));
        const created = sheet.replicateMerges(rangeFromA1('A1:B1'), rangeFromA1('C1:F1'), false);
        expect(created.map((region) => rangeToA1(region.range))).toEqual(['C1:D1', 'E1:F1']);
      });

      it('should remove stale merges and clear non-anchor values', () => {
        sheet.mergeCells(rangeFromA1('A1:A2'));
        sheet.mergeCells(rangeFromA1('A4:B4'));
        sheet.setValue(2, 0, textValue('keep'));
        sheet.setValue(3, 0, textValue('drop'));
        record();

        sheet.replicateMerges(rangeFromA1('A1:A2'), rangeFromA1('A3:A6'), true);
        expect(mergeNames(sheet)).toEqual(['A1:A2', 'A3:A4', 'A5:A6']);
        expect(columnValues(sheet, 0, 2, 3)).toEqual(['keep', null]);
        expect(events).toEqual([
          'DataChangeEvent.unmerge(A4:B4)',
          'DataChangeEvent.merge(A3:A4)',
          'DataChangeEvent.merge(A5:A6)',
        ]);
      });

      it('should do nothing without merges in the source', () => {
        sheet.mergeCells(rangeFromA1('A4:A5'));
        expect(sheet.replicateMerges(rangeFromA1('A1:A2'), rangeFromA1('A3:A6'), true)).toEqual([]);
        expect(mergeNames(sheet)).toEqual(['A4:A5']);
      });
    });
  });

  // ===========================================================================
  // Disposal
  // ===========================================================================

  describe('dispose', () => {
    it('should close the feed once and reject mutation', async () => {
      const onClose = vi.fn();
      sheet.setValue(0, 0, numberValue(1));
      sheet.subscribe(() => {}, onClose);

      sheet.dispose();
      sheet.dispose();

      expect(onClose).toHaveBeenCalledTimes(1);
      expect(sheet.isDisposed).toBe(true);
      expect(() => sheet.setValue(0, 0, numberValue(2))).toThrow(IllegalStateError);
      expect(() => sheet.batch(() => {})).toThrow(IllegalStateError);
      expect(() => sheet.mergeCells(rangeFromA1('A1:B1'))).toThrow(IllegalStateError);
      expect(() => sheet.clear()).toThrow(IllegalStateError);
      await expect(sheet.batchAsync(async () => {})).rejects.toThrow(IllegalStateError);
      expect(sheet.getValue(0, 0)).toEqual(numberValue(1));
    });

    it('should tell late subscribers the feed has ended', () => {
      sheet.dispose();
      const onClose = vi.fn();
      sheet.subscribe(() => {}, onClose);
      expect(onClose).toHaveBeenCalledTimes(1);
    });
  });
});
