/**
 * Sheetgrid Engine - Sparse Worksheet Data
 *
 * Per-coordinate storage of value, style, format and rich text in four
 * independent maps. Only written coordinates occupy memory; a coordinate
 * whose last aspect is cleared is indistinguishable from one never written.
 *
 * Key features:
 * - O(1) aspect access via Map
 * - Cached populated bounds (incremental on insert, rescanned on removal)
 * - Batches that apply writes immediately and publish one range event
 * - Merge bookkeeping through MergedCellRegistry
 * - Fill and smart fill driven by FillPatternDetector
 */

import { IllegalStateError, InvalidArgumentError } from '../errors.js';
import { parseWorksheetOptions, type WorksheetOptionsInput } from '../config.js';
import { logger } from '../logger.js';
import type { CellFormat } from '../formatting/CellFormat.js';
import { detectFillPattern } from '../clipboard/FillPatternDetector.js';
import {
  DEFAULT_CELL_EQUALITY,
  createCell,
  type Cell,
  type CellEquality,
  type CellStyle,
  type RichText,
} from '../types/Cell.js';
import type { CellValue } from '../types/CellValue.js';
import {
  cellKey,
  cellRange,
  cellRef,
  offsetRange,
  rangeCellCount,
  rangeCells,
  rangeColCount,
  rangeContainsRange,
  rangeContainsRef,
  rangeRowCount,
  rangeToA1,
  rangeUnion,
  singleCellRange,
  toA1,
  type CellKey,
  type CellRange,
  type CellRef,
} from '../types/index.js';
import {
  ChangeFeed,
  DataChange,
  type DataChangeEvent,
  type DataChangeListener,
  type FeedClosedListener,
  type Unsubscribe,
} from './DataChangeEvent.js';
import { MergedCellRegistry, type MergeRegion } from './MergedCellRegistry.js';

const log = logger.child({ component: 'SparseWorksheetData' });

// ============================================================================
// Types
// ============================================================================

/**
 * Produces the cell for one fill target. `source` is the cell being
 * copied: the fill source for fillRange, the tiled source cell for smartFill.
 */
export type CellGenerator = (target: CellRef, source: Cell | null) => Cell | null;

export type FillDirection = 'down' | 'up' | 'right' | 'left';

/** Mutations available inside batch(); one range event is published when the batch ends */
export interface WorksheetDataBatch {
  setValue(row: number, col: number, value: CellValue | null): void;
  setStyle(row: number, col: number, style: CellStyle | null): void;
  setFormat(row: number, col: number, format: CellFormat | null): void;
  setRichText(row: number, col: number, richText: RichText | null): void;
  setCell(row: number, col: number, cell: Cell | null): void;
  clearRange(range: CellRange): void;
  fillRangeWithCell(range: CellRange, cell: Cell | null): void;
  /** Clears values and rich text, keeping styles and formats */
  clearValues(range: CellRange): void;
  clearStyles(range: CellRange): void;
  clearFormats(range: CellRange): void;
  /** Copies every aspect of `source` so its top-left lands on `destination` */
  copyRange(source: CellRange, destination: CellRef): void;
}

export interface WorksheetData {
  readonly rowCount: number;
  readonly columnCount: number;
  /** -1 when the sheet is empty */
  readonly maxPopulatedRow: number;
  /** -1 when the sheet is empty */
  readonly maxPopulatedColumn: number;
  readonly populatedCellCount: number;
  readonly isDisposed: boolean;

  getValue(row: number, col: number): CellValue | null;
  getStyle(row: number, col: number): CellStyle | null;
  getFormat(row: number, col: number): CellFormat | null;
  getRichText(row: number, col: number): RichText | null;
  getCell(row: number, col: number): Cell | null;
  hasValue(row: number, col: number): boolean;
  getCellsInRange(range: CellRange): Map<CellKey, Cell>;
  getAllCells(): Map<CellKey, Cell>;

  setValue(row: number, col: number, value: CellValue | null): void;
  setStyle(row: number, col: number, style: CellStyle | null): void;
  setFormat(row: number, col: number, format: CellFormat | null): void;
  setRichText(row: number, col: number, richText: RichText | null): void;
  setCell(row: number, col: number, cell: Cell | null): void;
  clearRange(range: CellRange): void;
  clear(): void;

  batch(fn: (batch: WorksheetDataBatch) => void): void;
  batchAsync(fn: (batch: WorksheetDataBatch) => Promise<void>): Promise<void>;

  fillRange(source: CellRef, target: CellRange, generator?: CellGenerator): void;
  smartFill(source: CellRange, destination: CellRange, generator?: CellGenerator): CellRange | null;

  getMergeRegion(row: number, col: number): MergeRegion | null;
  mergedRegions(): MergeRegion[];
  mergeCells(range: CellRange): MergeRegion;
  unmergeCells(ref: CellRef): MergeRegion | null;
  unmergeCellsInRange(range: CellRange): MergeRegion[];
  moveMerges(source: CellRange, destination: CellRef): MergeRegion[];
  replicateMerges(source: CellRange, target: CellRange, vertical: boolean): MergeRegion[];

  subscribe(listener: DataChangeListener, onClose?: FeedClosedListener): Unsubscribe;
  dispose(): void;
}

export interface WorksheetDataOptions extends WorksheetOptionsInput {
  /** Initial contents; written without events */
  cells?: Iterable<readonly [CellRef, Cell]>;
  equality?: CellEquality;
}

function compareRefs(a: CellRef, b: CellRef): number {
  return a.row - b.row || a.col - b.col;
}

/** Smart fill goes down or up before right or left; null when `destination` lies inside `source` */
function fillDirection(source: CellRange, destination: CellRange): FillDirection | null {
  if (destination.endRow > source.endRow) return 'down';
  if (destination.startRow < source.startRow) return 'up';
  if (destination.endCol > source.endCol) return 'right';
  if (destination.startCol < source.startCol) return 'left';
  return null;
}

// ============================================================================
// SparseWorksheetData Class
// ============================================================================

export class SparseWorksheetData implements WorksheetData {
  readonly rowCount: number;
  readonly columnCount: number;
  readonly equality: CellEquality;

  private readonly values = new Map<CellKey, CellValue>();
  private readonly styles = new Map<CellKey, CellStyle>();
  private readonly formats = new Map<CellKey, CellFormat>();
  private readonly richTexts = new Map<CellKey, RichText>();

  /** Coordinates holding at least one aspect */
  private readonly populated = new Map<CellKey, CellRef>();

  private readonly merges = new MergedCellRegistry();
  private readonly feed = new ChangeFeed();

  private maxRow = -1;
  private maxCol = -1;

  /** Open batch scopes; writes inside one widen `pending` instead of publishing */
  private batchDepth = 0;
  private pending: CellRange | null = null;

  private disposed = false;

  private readonly batchView: WorksheetDataBatch = {
    setValue: (row, col, value) => this.setValue(row, col, value),
    setStyle: (row, col, style) => this.setStyle(row, col, style),
    setFormat: (row, col, format) => this.setFormat(row, col, format),
    setRichText: (row, col, richText) => this.setRichText(row, col, richText),
    setCell: (row, col, cell) => this.setCell(row, col, cell),
    clearRange: (range) => this.clearRange(range),
    fillRangeWithCell: (range, cell) => this.fillRangeWithCell(range, cell),
    clearValues: (range) => this.clearAspects(range, [this.values, this.richTexts]),
    clearStyles: (range) => this.clearAspects(range, [this.styles]),
    clearFormats: (range) => this.clearAspects(range, [this.formats]),
    copyRange: (source, destination) => this.copyRange(source, destination),
  };

  /**
   * @throws InvalidArgumentError for dimensions outside 1..MAX_ROWS / 1..MAX_COLS
   * or initial cells outside the sheet
   */
  constructor(options: WorksheetDataOptions = {}) {
    const { cells, equality, ...dimensions } = options;
    const { rowCount, columnCount } = parseWorksheetOptions(dimensions);
    this.rowCount = rowCount;
    this.columnCount = columnCount;
    this.equality = equality ?? DEFAULT_CELL_EQUALITY;

    if (cells) {
      for (const [ref, cell] of cells) {
        this.assertInBounds(ref.row, ref.col);
        this.writeCell(ref.row, ref.col, cell);
      }
    }
  }

  get maxPopulatedRow(): number {
    return this.maxRow;
  }

  get maxPopulatedColumn(): number {
    return this.maxCol;
  }

  get populatedCellCount(): number {
    return this.populated.size;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  getValue(row: number, col: number): CellValue | null {
    return this.values.get(cellKey(row, col)) ?? null;
  }

  getStyle(row: number, col: number): CellStyle | null {
    return this.styles.get(cellKey(row, col)) ?? null;
  }

  getFormat(row: number, col: number): CellFormat | null {
    return this.formats.get(cellKey(row, col)) ?? null;
  }

  getRichText(row: number, col: number): RichText | null {
    return this.richTexts.get(cellKey(row, col)) ?? null;
  }

  /**
   * Aggregate view of all four aspects
   * @returns Cell or null if nothing is stored at the coordinate
   */
  getCell(row: number, col: number): Cell | null {
    const key = cellKey(row, col);
    if (!this.populated.has(key)) return null;
    return createCell(this.values.get(key), {
      style: this.styles.get(key),
      format: this.formats.get(key),
      richText: this.richTexts.get(key),
    });
  }

  hasValue(row: number, col: number): boolean {
    return this.values.has(cellKey(row, col));
  }

  /** Populated cells inside `range`, in row-major order */
  getCellsInRange(range: CellRange): Map<CellKey, Cell> {
    return this.collect(this.populatedIn(range));
  }

  /** Snapshot of every populated cell, in row-major order */
  getAllCells(): Map<CellKey, Cell> {
    return this.collect([...this.populated.values()].sort(compareRefs));
  }

  // ===========================================================================
  // Writes
  // ===========================================================================

  setValue(row: number, col: number, value: CellValue | null): void {
    this.assertWritable(row, col);
    this.writeAspect(this.values, row, col, value);
    this.notify(singleCellRange(cellRef(row, col)), DataChange.cellValue(cellRef(row, col)));
  }

  setStyle(row: number, col: number, style: CellStyle | null): void {
    this.assertWritable(row, col);
    this.writeAspect(this.styles, row, col, style);
    this.notify(singleCellRange(cellRef(row, col)), DataChange.cellStyle(cellRef(row, col)));
  }

  setFormat(row: number, col: number, format: CellFormat | null): void {
    this.assertWritable(row, col);
    this.writeAspect(this.formats, row, col, format);
    this.notify(singleCellRange(cellRef(row, col)), DataChange.cellFormat(cellRef(row, col)));
  }

  /** Rich text is content: it publishes a value change */
  setRichText(row: number, col: number, richText: RichText | null): void {
    this.assertWritable(row, col);
    this.writeAspect(this.richTexts, row, col, richText);
    this.notify(singleCellRange(cellRef(row, col)), DataChange.cellValue(cellRef(row, col)));
  }

  /** Replaces all four aspects; aspects absent from `cell` are cleared */
  setCell(row: number, col: number, cell: Cell | null): void {
    this.assertWritable(row, col);
    this.writeCell(row, col, cell);
    const range = singleCellRange(cellRef(row, col));
    this.notify(range, DataChange.range(range));
  }

  /** Removes every aspect inside `range`; publishes a range event even when nothing was stored */
  clearRange(range: CellRange): void {
    this.assertRangeWritable(range);
    for (const ref of this.populatedIn(range)) {
      this.writeCell(ref.row, ref.col, null);
    }
    this.notify(range, DataChange.range(range));
  }

  /** Empties the sheet and its merges, then publishes reset */
  clear(): void {
    this.assertNotDisposed();
    log.debug({ cells: this.populated.size, merges: this.merges.regionCount }, 'clearing worksheet');
    this.values.clear();
    this.styles.clear();
    this.formats.clear();
    this.richTexts.clear();
    this.populated.clear();
    this.merges.clear();
    this.maxRow = -1;
    this.maxCol = -1;
    this.feed.emit(DataChange.reset());
  }

  // ===========================================================================
  // Batches
  // ===========================================================================

  /**
   * Run `fn` with writes applied immediately and published once, as a
   * single range event over everything touched. Nothing touched, no event.
   * Nested batches publish when the outermost one ends.
   */
  batch(fn: (batch: WorksheetDataBatch) => void): void {
    this.assertNotDisposed();
    this.batchDepth++;
    try {
      fn(this.batchView);
    } finally {
      this.endBatch();
    }
  }

  /** Like batch(), publishing after `fn` settles */
  async batchAsync(fn: (batch: WorksheetDataBatch) => Promise<void>): Promise<void> {
    this.assertNotDisposed();
    this.batchDepth++;
    try {
      await fn(this.batchView);
    } finally {
      this.endBatch();
    }
  }

  private endBatch(): void {
    this.batchDepth--;
    if (this.batchDepth > 0 || !this.pending) return;
    const range = this.pending;
    this.pending = null;
    this.feed.emit(DataChange.range(range));
  }

  private fillRangeWithCell(range: CellRange, cell: Cell | null): void {
    this.assertRangeWritable(range);
    for (const ref of rangeCells(range)) {
      this.writeCell(ref.row, ref.col, cell);
    }
    this.notify(range, DataChange.range(range));
  }

  private clearAspects(range: CellRange, maps: readonly Map<CellKey, unknown>[]): void {
    this.assertRangeWritable(range);
    for (const ref of this.populatedIn(range)) {
      for (const map of maps) {
        this.writeAspect(map, ref.row, ref.col, null);
      }
    }
    this.notify(range, DataChange.range(range));
  }

  private copyRange(source: CellRange, destination: CellRef): void {
    const target = offsetRange(source, destination.row - source.startRow, destination.col - source.startCol);
    this.assertRangeWritable(source);
    this.assertRangeWritable(target);

    const snapshot: Array<[CellRef, Cell | null]> = [];
    for (const ref of rangeCells(source)) {
      snapshot.push([ref, this.getCell(ref.row, ref.col)]);
    }
    for (const [ref, cell] of snapshot) {
      this.writeCell(ref.row - source.startRow + target.startRow, ref.col - source.startCol + target.startCol, cell);
    }
    this.notify(target, DataChange.range(target));
  }

  // ===========================================================================
  // Fill
  // ===========================================================================

  /**
   * Copy the value, style and format of `source` into every cell of
   * `target`, or ask `generator` for each target cell instead.
   * An empty source without a generator changes nothing.
   */
  fillRange(source: CellRef, target: CellRange, generator?: CellGenerator): void {
    this.assertRangeWritable(target);
    const sourceCell = this.getCell(source.row, source.col);
    if (!sourceCell && !generator) return;

    const copy = sourceCell
      ? createCell(sourceCell.value, { style: sourceCell.style, format: sourceCell.format })
      : null;

    this.batch((batch) => {
      for (const ref of rangeCells(target)) {
        batch.setCell(ref.row, ref.col, generator ? generator(ref, sourceCell) : copy);
      }
    });
  }

  /**
   * Extend `source` towards `destination`, one line at a time.
   *
   * Each column (vertical fill) or row (horizontal fill) of the source is
   * run through pattern detection, oriented so the run ends at the gap, and
   * extrapolated outward. Merges inside the source stretch the target to a
   * whole number of source spans and are tiled across it afterwards.
   *
   * @returns source and filled area combined, or null when `destination`
   * lies inside `source`
   */
  smartFill(source: CellRange, destination: CellRange, generator?: CellGenerator): CellRange | null {
    this.assertRangeWritable(source);
    const direction = fillDirection(source, destination);
    if (!direction) return null;

    const vertical = direction === 'down' || direction === 'up';
    const backward = direction === 'up' || direction === 'left';
    const target = this.expandForMerges(source, fillTarget(source, destination, direction), direction);
    this.assertRangeWritable(target);

    const span = vertical ? rangeRowCount(source) : rangeColCount(source);
    const length = vertical ? rangeRowCount(target) : rangeColCount(target);
    const firstLine = vertical ? source.startCol : source.startRow;
    const lastLine = vertical ? source.endCol : source.endRow;
    const gap = backward
      ? (vertical ? source.startRow : source.startCol) - 1
      : (vertical ? source.endRow : source.endCol) + 1;

    const plans: Array<{ line: number; produce: (index: number, ref: CellRef) => Cell | null }> = [];
    for (let line = firstLine; line <= lastLine; line++) {
      const run: (Cell | null)[] = [];
      for (let i = 0; i < span; i++) {
        run.push(vertical ? this.getCell(source.startRow + i, line) : this.getCell(line, source.startCol + i));
      }
      if (backward) run.reverse();

      if (generator) {
        const custom = generator;
        plans.push({ line, produce: (index, ref) => custom(ref, run[index % run.length]) });
        continue;
      }
      const pattern = detectFillPattern(run, this.equality);
      log.debug({ direction, target: rangeToA1(target), line, pattern: pattern.type }, 'smart fill line');
      plans.push({ line, produce: (index) => pattern.generate(index) });
    }

    this.batch((batch) => {
      for (const { line, produce } of plans) {
        for (let index = 0; index < length; index++) {
          const along = backward ? gap - index : gap + index;
          const ref = vertical ? cellRef(along, line) : cellRef(line, along);
          batch.setCell(ref.row, ref.col, produce(index, ref));
        }
      }
    });

    this.replicateMerges(source, target, vertical);
    return rangeUnion(source, target);
  }

  /** Grow `target` outward to a whole number of source spans when the source holds merges */
  private expandForMerges(source: CellRange, target: CellRange, direction: FillDirection): CellRange {
    if (this.mergesInside(source).length === 0) return target;

    const vertical = direction === 'down' || direction === 'up';
    const span = vertical ? rangeRowCount(source) : rangeColCount(source);
    const length = vertical ? rangeRowCount(target) : rangeColCount(target);
    const extra = Math.ceil(length / span) * span - length;
    if (extra === 0) return target;

    switch (direction) {
      case 'down':
        return { ...target, endRow: Math.min(target.endRow + extra, this.rowCount - 1) };
      case 'up':
        return { ...target, startRow: Math.max(target.startRow - extra, 0) };
      case 'right':
        return { ...target, endCol: Math.min(target.endCol + extra, this.columnCount - 1) };
      case 'left':
        return { ...target, startCol: Math.max(target.startCol - extra, 0) };
    }
  }

  // ===========================================================================
  // Merges
  // ===========================================================================

  getMergeRegion(row: number, col: number): MergeRegion | null {
    return this.merges.getRegion(row, col);
  }

  mergedRegions(): MergeRegion[] {
    return this.merges.regions();
  }

  /**
   * Merge `range`; only the anchor keeps its value.
   * @throws InvalidArgumentError for single cells or overlap with an existing merge
   */
  mergeCells(range: CellRange): MergeRegion {
    this.assertRangeWritable(range);
    return this.addMerge(range);
  }

  unmergeCells(ref: CellRef): MergeRegion | null {
    this.assertNotDisposed();
    const region = this.merges.unmerge(ref);
    if (region) this.feed.emit(DataChange.unmerge(region.range));
    return region;
  }

  unmergeCellsInRange(range: CellRange): MergeRegion[] {
    this.assertNotDisposed();
    const removed = this.merges.unmergeInRange(range);
    for (const region of removed) {
      this.feed.emit(DataChange.unmerge(region.range));
    }
    return removed;
  }

  /**
   * Re-create the merges lying fully inside `source` so that the source's
   * top-left lands on `destination`. Merges that would leave the sheet are dropped.
   */
  moveMerges(source: CellRange, destination: CellRef): MergeRegion[] {
    this.assertNotDisposed();
    const rowDelta = destination.row - source.startRow;
    const colDelta = destination.col - source.startCol;

    const moving = this.mergesInside(source);
    for (const region of moving) {
      this.merges.unmerge(region.anchor);
      this.feed.emit(DataChange.unmerge(region.range));
    }

    const moved: MergeRegion[] = [];
    for (const region of moving) {
      const range = offsetRange(region.range, rowDelta, colDelta);
      if (!this.isInsideSheet(range)) continue;
      this.unmergeCellsInRange(range);
      moved.push(this.addMerge(range));
    }

    log.debug({ source: rangeToA1(source), moved: moved.length, dropped: moving.length - moved.length }, 'moved merges');
    return moved;
  }

  /**
   * Tile the merges lying fully inside `source` across `target` at a
   * stride of the source's span along the fill axis. Existing merges
   * touching `target` are removed first; tiles that would run past the far
   * edge of `target` are dropped.
   */
  replicateMerges(source: CellRange, target: CellRange, vertical: boolean): MergeRegion[] {
    this.assertNotDisposed();
    const sourceMerges = this.mergesInside(source);
    if (sourceMerges.length === 0) return [];

    this.unmergeCellsInRange(target);

    const span = vertical ? rangeRowCount(source) : rangeColCount(source);
    const sourceStart = vertical ? source.startRow : source.startCol;
    const targetStart = vertical ? target.startRow : target.startCol;
    const targetEnd = vertical ? target.endRow : target.endCol;

    const tileStarts: number[] = [];
    if (targetEnd < sourceStart) {
      for (let end = targetEnd; end - span + 1 >= targetStart; end -= span) {
        tileStarts.push(end - span + 1);
      }
    } else {
      for (let start = targetStart; start + span - 1 <= targetEnd; start += span) {
        tileStarts.push(start);
      }
    }

    const created: MergeRegion[] = [];
    for (const tileStart of tileStarts) {
      const shift = tileStart - sourceStart;
      for (const region of sourceMerges) {
        const range = vertical ? offsetRange(region.range, shift, 0) : offsetRange(region.range, 0, shift);
        if (!rangeContainsRange(target, range) || !this.isInsideSheet(range)) continue;
        created.push(this.addMerge(range));
      }
    }

    log.debug(
      { source: rangeToA1(source), target: rangeToA1(target), tiles: tileStarts.length, merges: created.length },
      'replicated merges'
    );
    return created;
  }

  private addMerge(range: CellRange): MergeRegion {
    const region = this.merges.merge(range);
    for (const ref of rangeCells(range)) {
      if (ref.row === region.anchor.row && ref.col === region.anchor.col) continue;
      this.writeAspect(this.values, ref.row, ref.col, null);
      this.writeAspect(this.richTexts, ref.row, ref.col, null);
    }
    this.feed.emit(DataChange.merge(range));
    return region;
  }

  private mergesInside(range: CellRange): MergeRegion[] {
    return this.merges.regionsInRange(range).filter((region) => rangeContainsRange(range, region.range));
  }

  // ===========================================================================
  // Feed and lifecycle
  // ===========================================================================

  subscribe(listener: DataChangeListener, onClose?: FeedClosedListener): Unsubscribe {
    return this.feed.subscribe(listener, onClose);
  }

  /** Final: later mutations throw and subscribers are told the feed ended */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    log.debug({ cells: this.populated.size, subscribers: this.feed.subscriberCount }, 'disposing worksheet');
    this.feed.close();
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private notify(range: CellRange, event: DataChangeEvent): void {
    if (this.batchDepth > 0) {
      this.pending = this.pending ? rangeUnion(this.pending, range) : range;
      return;
    }
    this.feed.emit(event);
  }

  private writeCell(row: number, col: number, cell: Cell | null): void {
    this.writeAspect(this.values, row, col, cell?.value);
    this.writeAspect(this.styles, row, col, cell?.style);
    this.writeAspect(this.formats, row, col, cell?.format);
    this.writeAspect(this.richTexts, row, col, cell?.richText);
  }

  private writeAspect<T>(map: Map<CellKey, T>, row: number, col: number, value: T | null | undefined): void {
    const key = cellKey(row, col);
    if (value === null || value === undefined) {
      map.delete(key);
    } else {
      map.set(key, value);
    }
    this.syncPopulated(key, row, col);
  }

  private syncPopulated(key: CellKey, row: number, col: number): void {
    const occupied =
      this.values.has(key) || this.styles.has(key) || this.formats.has(key) || this.richTexts.has(key);

    if (occupied) {
      if (this.populated.has(key)) return;
      this.populated.set(key, { row, col });
      if (row > this.maxRow) this.maxRow = row;
      if (col > this.maxCol) this.maxCol = col;
      return;
    }

    if (!this.populated.delete(key)) return;
    if (row === this.maxRow || col === this.maxCol) {
      this.recalculateBounds();
    }
  }

  private recalculateBounds(): void {
    this.maxRow = -1;
    this.maxCol = -1;
    for (const { row, col } of this.populated.values()) {
      if (row > this.maxRow) this.maxRow = row;
      if (col > this.maxCol) this.maxCol = col;
    }
  }

  /** Populated coordinates inside `range`, row-major */
  private populatedIn(range: CellRange): CellRef[] {
    if (rangeCellCount(range) <= this.populated.size) {
      const refs: CellRef[] = [];
      for (const ref of rangeCells(range)) {
        if (this.populated.has(cellKey(ref.row, ref.col))) refs.push(ref);
      }
      return refs;
    }
    return [...this.populated.values()].filter((ref) => rangeContainsRef(range, ref)).sort(compareRefs);
  }

  private collect(refs: readonly CellRef[]): Map<CellKey, Cell> {
    const result = new Map<CellKey, Cell>();
    for (const ref of refs) {
      const cell = this.getCell(ref.row, ref.col);
      if (cell) result.set(cellKey(ref.row, ref.col), cell);
    }
    return result;
  }

  private isInsideSheet(range: CellRange): boolean {
    return (
      range.startRow >= 0 &&
      range.startCol >= 0 &&
      range.endRow < this.rowCount &&
      range.endCol < this.columnCount
    );
  }

  private assertNotDisposed(): void {
    if (this.disposed) {
      throw new IllegalStateError('Worksheet data has been disposed');
    }
  }

  private assertInBounds(row: number, col: number): void {
    const ref = cellRef(row, col);
    if (row >= this.rowCount || col >= this.columnCount) {
      throw new InvalidArgumentError(
        `${toA1(ref)} is outside the sheet (${this.rowCount} rows x ${this.columnCount} columns)`
      );
    }
  }

  private assertWritable(row: number, col: number): void {
    this.assertNotDisposed();
    this.assertInBounds(row, col);
  }

  private assertRangeWritable(range: CellRange): void {
    this.assertNotDisposed();
    cellRange(range.startRow, range.startCol, range.endRow, range.endCol);
    this.assertInBounds(range.endRow, range.endCol);
  }
}

/** The strip between `source` and the far edge of `destination`, as wide as the source */
function fillTarget(source: CellRange, destination: CellRange, direction: FillDirection): CellRange {
  switch (direction) {
    case 'down':
      return cellRange(source.endRow + 1, source.startCol, destination.endRow, source.endCol);
    case 'up':
      return cellRange(destination.startRow, source.startCol, source.startRow - 1, source.endCol);
    case 'right':
      return cellRange(source.startRow, source.endCol + 1, source.endRow, destination.endCol);
    case 'left':
      return cellRange(source.startRow, destination.startCol, source.endRow, source.startCol - 1);
  }
}
