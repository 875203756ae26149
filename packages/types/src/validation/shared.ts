/**
 * Shared Validation Schemas
 */

import { z } from 'zod';

/** Entity ID schema */
export const entityIdSchema = z.string().min(1, 'ID is required');

/** ISO-8601 timestamp as produced by `Date.prototype.toISOString` */
export const isoTimestampSchema = z
  .string()
  .datetime({ offset: true, message: 'Must be an ISO-8601 timestamp' });

/** Free-text search query (matched case-insensitively) */
export const searchQuerySchema = z.string().trim();
