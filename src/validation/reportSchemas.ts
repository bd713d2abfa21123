import { z } from 'zod';

/**
 * Report parameter schemas
 */

const positiveInt = z.number().int().positive();

export const purchaseLimitSchema = positiveInt.describe('Maximum purchase rows');

export const maxTrackDurationSchema = positiveInt.describe('Duration cap in milliseconds');

export const topGenreCountSchema = positiveInt.describe('Number of top genres to exclude');

export const accentCharactersSchema = z.array(z.string().length(1)).min(1);
