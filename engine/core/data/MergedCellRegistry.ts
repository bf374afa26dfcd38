/**
 * Sheetgrid Engine - Merged Cell Registry
 *
 * Tracks merge regions with two indices over the same set:
 * - every covered cell -> its region
 * - anchor (top-left) -> its region
 *
 * Regions never overlap and always cover at least two cells.
 */

import { InvalidArgumentError } from '../errors.js';
import {
  cellKey,
  cellRange,
  rangeCellCount,
  rangeCells,
  rangeToA1,
  rangeTopLeft,
  rangesOverlap,
  type CellKey,
  type CellRange,
  type CellRef,
} from '../types/index.js';

// ============================================================================
// Types
// ============================================================================

export interface MergeRegion {
  readonly range: CellRange;
  /** Top-left cell; the only cell of the region that keeps a value */
  readonly anchor: CellRef;
}

/** @throws InvalidArgumentError for inverted or negative ranges and single cells */
export function createMergeRegion(input: CellRange): MergeRegion {
  const range = cellRange(input.startRow, input.startCol, input.endRow, input.endCol);
  if (rangeCellCount(range) < 2) {
    throw new InvalidArgumentError(`A merge must cover at least two cells: ${rangeToA1(range)}`);
  }
  return Object.freeze({ range, anchor: rangeTopLeft(range) });
}

// ============================================================================
// MergedCellRegistry Class
// ============================================================================

export class MergedCellRegistry {
  /** Every covered cell, keyed "row_col" */
  private readonly byCell = new Map<CellKey, MergeRegion>();

  /** One entry per region, keyed by its anchor */
  private readonly byAnchor = new Map<CellKey, MergeRegion>();

  get regionCount(): number {
    return this.byAnchor.size;
  }

  get isEmpty(): boolean {
    return this.byAnchor.size === 0;
  }

  /**
   * Register a region.
   * @throws InvalidArgumentError for invalid ranges or ranges that overlap an existing merge
   */
  merge(range: CellRange): MergeRegion {
    const region = createMergeRegion(range);

    for (const ref of rangeCells(region.range)) {
      const existing = this.byCell.get(cellKey(ref.row, ref.col));
      if (existing) {
        throw new InvalidArgumentError(
          `${rangeToA1(region.range)} overlaps existing merge ${rangeToA1(existing.range)}`
        );
      }
    }

    for (const ref of rangeCells(region.range)) {
      this.byCell.set(cellKey(ref.row, ref.col), region);
    }
    this.byAnchor.set(cellKey(region.anchor.row, region.anchor.col), region);
    return region;
  }

  /** Remove the region covering `ref`; no-op when the cell is not merged */
  unmerge(ref: CellRef): MergeRegion | null {
    const region = this.byCell.get(cellKey(ref.row, ref.col));
    if (!region) return null;
    this.remove(region);
    return region;
  }

  /** Remove every region that intersects `range` */
  unmergeInRange(range: CellRange): MergeRegion[] {
    const removed = this.regionsInRange(range);
    for (const region of removed) this.remove(region);
    return removed;
  }

  getRegion(row: number, col: number): MergeRegion | null {
    return this.byCell.get(cellKey(row, col)) ?? null;
  }

  isMerged(row: number, col: number): boolean {
    return this.byCell.has(cellKey(row, col));
  }

  isAnchor(row: number, col: number): boolean {
    return this.byAnchor.has(cellKey(row, col));
  }

  /** Anchor of the covering region, or the cell itself when it is not merged */
  resolveAnchor(row: number, col: number): CellRef {
    return this.getRegion(row, col)?.anchor ?? { row, col };
  }

  /** Regions intersecting `range`, not only those fully inside it */
  regionsInRange(range: CellRange): MergeRegion[] {
    const result: MergeRegion[] = [];
    for (const region of this.byAnchor.values()) {
      if (rangesOverlap(region.range, range)) result.push(region);
    }
    return result;
  }

  regions(): MergeRegion[] {
    return [...this.byAnchor.values()];
  }

  clear(): void {
    this.byCell.clear();
    this.byAnchor.clear();
  }

  private remove(region: MergeRegion): void {
    for (const ref of rangeCells(region.range)) {
      this.byCell.delete(cellKey(ref.row, ref.col));
    }
    this.byAnchor.delete(cellKey(region.anchor.row, region.anchor.col));
  }
}
