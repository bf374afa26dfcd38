/**
 * Sheetgrid Engine - Fill Module Exports
 */

export { detectFillPattern } from './FillPatternDetector.js';
export type { FillPattern, FillPatternType } from './FillPatternDetector.js';
