/**
 * Sheetgrid Engine - Configuration
 *
 * Environment-driven engine settings and worksheet construction options,
 * both validated with zod.
 */

import { z } from 'zod';
import { InvalidArgumentError } from './errors.js';
import { MAX_COLS, MAX_ROWS } from './types/index.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const EngineConfigSchema = z.object({
  logLevel: z.enum(LOG_LEVELS).default('info'),
  /** 4-hex locale code used when a caller passes no locale */
  defaultLocale: z
    .string()
    .regex(/^[0-9A-Fa-f]{1,4}$/, 'locale code must be 1-4 hex digits')
    .default('0409'),
  /** Estimated width of one character, in the caller's width unit */
  charWidth: z.coerce.number().positive().default(7),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = EngineConfigSchema.safeParse({
    logLevel: env.LOG_LEVEL || undefined,
    defaultLocale: env.SHEETGRID_LOCALE || undefined,
    charWidth: env.SHEETGRID_CHAR_WIDTH || undefined,
  });
  if (!parsed.success) {
    throw new InvalidArgumentError(`Invalid engine configuration: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export const engineConfig: EngineConfig = loadEngineConfig();

// =============================================================================
// Worksheet options
// =============================================================================

export const WorksheetOptionsSchema = z.object({
  rowCount: z.number().int().min(1).max(MAX_ROWS).default(MAX_ROWS),
  columnCount: z.number().int().min(1).max(MAX_COLS).default(MAX_COLS),
});

export type WorksheetOptionsInput = z.input<typeof WorksheetOptionsSchema>;
export type WorksheetDimensions = z.infer<typeof WorksheetOptionsSchema>;

export function parseWorksheetOptions(input: WorksheetOptionsInput): WorksheetDimensions {
  const parsed = WorksheetOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Invalid worksheet options: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
