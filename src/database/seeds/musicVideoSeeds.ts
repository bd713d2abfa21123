import { MusicVideoSeed } from '../../types/chinook.js';

/**
 * Videos for the opening tracks of the Chinook catalog.
 * Each entry is resolved by exact track name at insert time.
 */
export const DEFAULT_MUSIC_VIDEO_SEEDS: readonly MusicVideoSeed[] = [
  { trackName: 'For Those About To Rock (We Salute You)', director: 'Hannah Park' },
  { trackName: 'Balls to the Wall', director: 'Diego Alvarez' },
  { trackName: 'Fast As a Shark', director: 'Amina Khan' },
  { trackName: 'Restless and Wild', director: 'Noah Bennett' },
  { trackName: 'Princess of the Dawn', director: 'Sofia Ionescu' },
  { trackName: 'Put The Finger On You', director: 'Kei Tanaka' },
  { trackName: "Let's Get It Up", director: 'Maya Desai' },
  { trackName: 'Inject The Venom', director: 'Owen Clarke' },
  { trackName: 'Snowballed', director: 'Lucia Moretti' },
  { trackName: 'Evil Walks', director: 'Ethan Walsh' },
];

/**
 * Added on its own after the batch above; fails if "Voodoo" already has a video.
 */
export const VOODOO_MUSIC_VIDEO: MusicVideoSeed = {
  trackName: 'Voodoo',
  director: 'Jordan Rivers',
};
