/**
 * Input Validation Schemas
 *
 * Zod schemas for data that enters the pipeline from outside the source
 * files: station reference metadata and the CLI config file.
 */

import { z } from 'zod';
import type { StationMetadata } from './types.js';

// ============================================================================
// Station Metadata
// ============================================================================

/**
 * Station identifiers are file name stems; keep them short and path-safe.
 */
export const StationIdSchema = z.string()
  .min(1, 'Station id cannot be empty')
  .max(20, 'Station id must be at most 20 characters')
  .regex(/^[A-Za-z0-9_-]+$/, 'Station id may only contain letters, digits, "_" and "-"');

export const StationMetadataSchema = z.object({
  name: z.string().min(1).max(100),
  latitude: z.number()
    .min(-90, 'Latitude must be >= -90')
    .max(90, 'Latitude must be <= 90'),
  longitude: z.number()
    .min(-180, 'Longitude must be >= -180')
    .max(180, 'Longitude must be <= 180'),
  elevation: z.number().nullable().default(null),
  state: z.string().regex(/^[A-Z]{2}$/, 'State must be a two-letter uppercase code'),
  country: z.string().min(1).max(3).optional(),
  timezone: z.string().min(1).optional(),
});

export const StationDirectorySchema = z.record(StationIdSchema, StationMetadataSchema);

/**
 * Validate station metadata, returning the first problem as a message
 */
export function validateStationMetadata(
  value: unknown
): { success: true; data: StationMetadata } | { success: false; error: string } {
  const result = StationMetadataSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.errors[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return { success: false, error: `${where}${issue?.message ?? 'Invalid station metadata'}` };
  }
  return { success: true, data: result.data };
}
