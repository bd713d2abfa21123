import { z } from 'zod';

/**
 * MusicVideo Validation Schemas
 *
 * Track names are matched byte for byte against tracks.Name, so they are
 * checked for content but never trimmed.
 */

export const musicVideoSeedSchema = z.object({
  trackName: z.string()
    .refine(name => name.trim().length > 0, 'Track name is required'),
  director: z.string()
    .trim()
    .min(1, 'Director is required'),
});

export const musicVideoSeedListSchema = z.array(musicVideoSeedSchema);
