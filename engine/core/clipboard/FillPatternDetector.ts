/**
 * Sheetgrid Engine - Fill Pattern Detector
 *
 * Infers how a run of source cells continues. Detection is pure; the
 * store's fill operations write the generated cells.
 *
 * Strategies, first match wins:
 * - constant: one cell, or every cell identical (an all-empty run included)
 * - linear: numbers with a constant step (1, 2, 3 -> 4, 5)
 * - date: dates a constant whole number of days apart
 * - textSuffix: same prefix with a counting numeric suffix (Item1, Item2 -> Item3)
 * - cycle: anything else replays the run
 *
 * `generate(k)` returns the k-th cell past the end of the run, so
 * generate(0) is the cell right after the last source cell.
 */

import {
  DEFAULT_CELL_EQUALITY,
  cellsEqual,
  createCell,
  type Cell,
  type CellEquality,
} from '../types/Cell.js';
import { MS_PER_DAY, dateValue, numberValue, textValue, type CellValue } from '../types/CellValue.js';

// =============================================================================
// Types
// =============================================================================

export type FillPatternType = 'constant' | 'linear' | 'date' | 'textSuffix' | 'cycle';

export interface FillPattern {
  readonly type: FillPatternType;
  /** Cell at extrapolation index `index` (0 = first cell past the run) */
  generate(index: number): Cell | null;
}

const STEP_TOLERANCE = 1e-10;

const SUFFIX_PATTERN = /^(.*?)(\d+)$/;

// =============================================================================
// Detection
// =============================================================================

export function detectFillPattern(
  cells: readonly (Cell | null)[],
  equality: CellEquality = DEFAULT_CELL_EQUALITY
): FillPattern {
  if (cells.length === 0) {
    return constantPattern(null);
  }

  const first = cells[0];
  if (cells.length === 1 || cells.every((cell) => cellsEqual(cell, first, equality))) {
    return constantPattern(first);
  }

  return (
    detectLinear(cells) ??
    detectDateSequence(cells) ??
    detectTextSuffix(cells) ??
    cyclePattern(cells)
  );
}

function constantPattern(cell: Cell | null): FillPattern {
  return { type: 'constant', generate: () => cell };
}

function cyclePattern(cells: readonly (Cell | null)[]): FillPattern {
  return {
    type: 'cycle',
    generate: (index) => cells[index % cells.length] ?? null,
  };
}

/** Generated cells carry the first source cell's style and format; rich text does not survive */
function templated(first: Cell, value: CellValue): Cell {
  return createCell(value, { style: first.style, format: first.format });
}

/**
 * Common step of a sequence, or null when the gaps differ or are zero.
 * A zero step falls through to the cycle so per-cell styles replay.
 */
function constantStep(values: readonly number[], tolerance: number): number | null {
  const step = values[1] - values[0];
  if (step === 0) return null;
  for (let i = 2; i < values.length; i++) {
    if (Math.abs(values[i] - values[i - 1] - step) > tolerance) return null;
  }
  return step;
}

// =============================================================================
// Strategies
// =============================================================================

function detectLinear(cells: readonly (Cell | null)[]): FillPattern | null {
  const values: number[] = [];
  for (const cell of cells) {
    if (cell?.value?.type !== 'number') return null;
    values.push(cell.value.value);
  }

  const step = constantStep(values, STEP_TOLERANCE);
  const first = cells[0];
  if (step === null || !first) return null;

  const start = values[0];
  const length = values.length;
  return {
    type: 'linear',
    generate: (index) => templated(first, numberValue(start + step * (length + index))),
  };
}

/** Local calendar fields read as a UTC timestamp */
function localTimestamp(date: Date): number {
  return Date.UTC(
    date.getFullYear(),
    date.getMonth(),
    date.getDate(),
    date.getHours(),
    date.getMinutes(),
    date.getSeconds(),
    date.getMilliseconds()
  );
}

function detectDateSequence(cells: readonly (Cell | null)[]): FillPattern | null {
  const dates: Date[] = [];
  for (const cell of cells) {
    if (cell?.value?.type !== 'date') return null;
    dates.push(cell.value.value);
  }

  const stepMs = constantStep(dates.map(localTimestamp), 0);
  const first = cells[0];
  if (stepMs === null || stepMs % MS_PER_DAY !== 0 || !first) return null;

  const step = stepMs / MS_PER_DAY;

  const origin = dates[0];
  const length = dates.length;
  return {
    type: 'date',
    generate: (index) =>
      templated(
        first,
        dateValue(
          new Date(
            origin.getFullYear(),
            origin.getMonth(),
            origin.getDate() + step * (length + index),
            origin.getHours(),
            origin.getMinutes(),
            origin.getSeconds(),
            origin.getMilliseconds()
          )
        )
      ),
  };
}

function detectTextSuffix(cells: readonly (Cell | null)[]): FillPattern | null {
  let prefix: string | null = null;
  let width = 0;
  const numbers: number[] = [];

  for (const cell of cells) {
    if (cell?.value?.type !== 'text') return null;
    const match = SUFFIX_PATTERN.exec(cell.value.value);
    if (!match) return null;

    const [, head, digits] = match;
    const number = Number.parseInt(digits, 10);
    if (!Number.isSafeInteger(number)) return null;

    if (prefix === null) {
      prefix = head;
      width = digits.length;
    } else if (head !== prefix) {
      return null;
    }
    numbers.push(number);
  }

  const step = constantStep(numbers, 0);
  const first = cells[0];
  if (step === null || prefix === null || !first) return null;

  const text = prefix;
  const start = numbers[0];
  const length = numbers.length;
  return {
    type: 'textSuffix',
    generate: (index) => {
      const next = Math.abs(start + step * (length + index));
      return templated(first, textValue(text + String(next).padStart(width, '0')));
    },
  };
}
