/**
 * Sheetgrid Engine - Data Module Exports
 */

export { SparseWorksheetData } from './SparseWorksheetData.js';
export type {
  CellGenerator,
  FillDirection,
  WorksheetData,
  WorksheetDataBatch,
  WorksheetDataOptions,
} from './SparseWorksheetData.js';

export { WorksheetBuilder } from './WorksheetBuilder.js';
export type { BuilderInput } from './WorksheetBuilder.js';

export { MergedCellRegistry, createMergeRegion } from './MergedCellRegistry.js';
export type { MergeRegion } from './MergedCellRegistry.js';

export { ChangeFeed, DataChange, describeChange } from './DataChangeEvent.js';
export type {
  DataChangeEvent,
  DataChangeListener,
  DataChangeType,
  FeedClosedListener,
  Unsubscribe,
} from './DataChangeEvent.js';
