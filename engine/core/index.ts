/**
 * Sheetgrid Engine - Core Module Exports
 */

// Types
export * from './types/index.js';
export * from './types/CellValue.js';
export * from './types/Cell.js';

// Ambient
export { SheetError, InvalidArgumentError, NotationError, IllegalStateError } from './errors.js';
export { createLogger, logger } from './logger.js';
export type { Logger } from './logger.js';
export {
  EngineConfigSchema,
  LOG_LEVELS,
  WorksheetOptionsSchema,
  engineConfig,
  loadEngineConfig,
  parseWorksheetOptions,
} from './config.js';
export type { EngineConfig, WorksheetDimensions, WorksheetOptionsInput } from './config.js';

// Formatting
export * from './formatting/index.js';

// Data
export * from './data/index.js';

// Fill
export * from './clipboard/index.js';
