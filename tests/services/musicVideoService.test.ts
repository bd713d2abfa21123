/**
 * MusicVideoService Tests
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { MusicVideoService } from '../../src/services/musicVideoService.js';
import { SchemaService } from '../../src/services/schemaService.js';
import { DEFAULT_MUSIC_VIDEO_SEEDS } from '../../src/database/seeds/musicVideoSeeds.js';
import { DatabaseConnection } from '../../src/types/database.js';
import { DuplicateKeyError, SchemaValidationError } from '../../src/errors/index.js';
import { TestDatabase, seededTracks } from '../utils/testDatabase.js';

describe('MusicVideoService', () => {
  let testDb: TestDatabase;
  let db: DatabaseConnection;
  let service: MusicVideoService;

  beforeEach(async () => {
    testDb = new TestDatabase();
    db = await testDb.create();
    await testDb.seed({ tracks: seededTracks() });
    await new SchemaService(db).initialize();
    service = new MusicVideoService(db);
  });

  afterEach(async () => {
    await testDb.destroy();
  });

  describe('seed', () => {
    it('should insert one video per default entry', async () => {
      const result = await service.seed();

      expect(result.totalInserted).toBe(10);
      expect(result.unmatched).toEqual([]);
      expect(result.entries.every(entry => entry.inserted === 1)).toBe(true);
      expect(await service.countVideos()).toBe(10);
    });

    it('should store the expected director for each track', async () => {
      await service.seed();

      const videos = await service.listVideos();

      expect(videos[0]).toEqual({
        trackId: 1,
        trackName: 'For Those About To Rock (We Salute You)',
        director: 'Hannah Park',
      });
      expect(videos.map(v => v.director)).toEqual(DEFAULT_MUSIC_VIDEO_SEEDS.map(s => s.director));
    });

    it('should handle names containing quotes', async () => {
      await service.seed();

      const video = await service.findByTrackId(7);

      expect(video).toEqual({ trackId: 7, trackName: "Let's Get It Up", director: 'Maya Desai' });
    });

    it('should skip names that match no track', async () => {
      const result = await service.seed([
        { trackName: 'Balls to the Wall', director: 'Diego Alvarez' },
        { trackName: 'No Such Song', director: 'Owen Clarke' },
      ]);

      expect(result.entries).toEqual([
        { trackName: 'Balls to the Wall', director: 'Diego Alvarez', inserted: 1 },
        { trackName: 'No Such Song', director: 'Owen Clarke', inserted: 0 },
      ]);
      expect(result.unmatched).toEqual(['No Such Song']);
      expect(result.totalInserted).toBe(1);
    });

    it('should give every track sharing a name its own video', async () => {
      await testDb.seed({ tracks: [{ id: 50, name: 'Snowballed' }] });

      const result = await service.seed([{ trackName: 'Snowballed', director: 'Lucia Moretti' }]);

      expect(result.totalInserted).toBe(2);
      const ids = (await service.listVideos()).map(v => v.trackId);
      expect(ids).toEqual([9, 50]);
    });

    it('should fail on the first repeated name when run twice', async () => {
      await service.seed();

      const error = await service.seed().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DuplicateKeyError);
      expect(error).toMatchObject({ table: 'MusicVideo', key: 'track_id' });
      expect(await service.countVideos()).toBe(10);
    });

    it('should stop at the failing entry and keep earlier inserts', async () => {
      await service.addVideoForTrack('Fast As a Shark', 'Amina Khan');

      await expect(
        service.seed([
          { trackName: 'Balls to the Wall', director: 'Diego Alvarez' },
          { trackName: 'Fast As a Shark', director: 'Amina Khan' },
          { trackName: 'Restless and Wild', director: 'Noah Bennett' },
        ])
      ).rejects.toBeInstanceOf(DuplicateKeyError);

      const names = (await service.listVideos()).map(v => v.trackName);
      expect(names).toEqual(['Balls to the Wall', 'Fast As a Shark']);
    });

    it('should validate every entry before inserting anything', async () => {
      await expect(
        service.seed([
          { trackName: 'Balls to the Wall', director: 'Diego Alvarez' },
          { trackName: 'Evil Walks', director: '  ' },
        ])
      ).rejects.toBeInstanceOf(SchemaValidationError);

      expect(await service.countVideos()).toBe(0);
    });

    it('should match track names exactly, surrounding spaces included', async () => {
      await testDb.seed({ tracks: [{ id: 60, name: 'Intro ' }] });

      const result = await service.seed([
        { trackName: 'Intro ', director: 'Ethan Walsh' },
        { trackName: ' Evil Walks', director: 'Owen Clarke' },
      ]);

      expect(result.entries).toEqual([
        { trackName: 'Intro ', director: 'Ethan Walsh', inserted: 1 },
        { trackName: ' Evil Walks', director: 'Owen Clarke', inserted: 0 },
      ]);
      expect(result.unmatched).toEqual([' Evil Walks']);
      expect(await service.findByTrackId(60)).toEqual({ trackId: 60, trackName: 'Intro ', director: 'Ethan Walsh' });
    });

    it('should reject a blank track name', async () => {
      await expect(service.seed([{ trackName: '   ', director: 'Ethan Walsh' }])).rejects.toBeInstanceOf(
        SchemaValidationError
      );
    });

    it('should accept a long director name', async () => {
      const director = 'D'.repeat(300);

      const result = await service.seed([{ trackName: 'Evil Walks', director }]);

      expect(result.totalInserted).toBe(1);
      expect((await service.listVideos())[0]?.director).toBe(director);
    });
  });

  describe('addVideoForTrack', () => {
    it('should insert a video found by name', async () => {
      const inserted = await service.addVideoForTrack('Voodoo', 'Jordan Rivers');

      expect(inserted).toBe(1);
      expect(await service.findByTrackId(11)).toEqual({
        trackId: 11,
        trackName: 'Voodoo',
        director: 'Jordan Rivers',
      });
    });

    it('should fail when the track already has a video', async () => {
      await service.addVideoForTrack('Voodoo', 'Jordan Rivers');

      await expect(service.addVideoForTrack('Voodoo', 'Someone Else')).rejects.toBeInstanceOf(DuplicateKeyError);
    });

    it('should not match a name that differs only by padding', async () => {
      await testDb.seed({ tracks: [{ id: 60, name: 'Intro ' }] });

      await expect(service.addVideoForTrack('Intro', 'Jordan Rivers')).resolves.toBe(0);
      await expect(service.addVideoForTrack(' Voodoo', 'Jordan Rivers')).resolves.toBe(0);
      await expect(service.addVideoForTrack('Intro ', 'Jordan Rivers')).resolves.toBe(1);
    });

    it('should return 0 for an unknown track', async () => {
      await expect(service.addVideoForTrack('Unknown Track', 'Jordan Rivers')).resolves.toBe(0);
    });
  });

  describe('findByTrackId', () => {
    it('should return null when the track has no video', async () => {
      await expect(service.findByTrackId(3)).resolves.toBeNull();
    });
  });
});
