/**
 * SalesReportService Tests
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { SalesReportService } from '../../../src/services/reports/salesReportService.js';
import { DatabaseConnection } from '../../../src/types/database.js';
import { SchemaValidationError } from '../../../src/errors/index.js';
import { TestDatabase, CatalogSeed } from '../../utils/testDatabase.js';

const catalog: CatalogSeed = {
  artists: [
    { id: 1, name: 'AC/DC' },
    { id: 2, name: 'Accept' },
  ],
  albums: [
    { id: 1, title: 'For Those About To Rock', artistId: 1 },
    { id: 2, title: 'Balls to the Wall', artistId: 2 },
  ],
  genres: [
    { id: 1, name: 'Rock' },
    { id: 2, name: 'Jazz' },
  ],
  tracks: [
    { id: 1, name: 'Track One', albumId: 1, genreId: 1, milliseconds: 100 },
    { id: 2, name: 'Track Two', albumId: 2, genreId: 1, milliseconds: 200 },
    { id: 3, name: 'Track Three', albumId: null, genreId: 2, milliseconds: 2_000 },
    { id: 4, name: 'Track Four', albumId: null, genreId: null, milliseconds: 900_001 },
  ],
  customers: [
    { id: 1, firstName: 'Alice', lastName: 'Smith' },
    { id: 2, firstName: 'Bob', lastName: 'Jones' },
    { id: 3, firstName: 'Carol', lastName: 'White' },
  ],
  invoices: [
    { id: 1, customerId: 1, date: '2013-12-22 00:00:00' },
    { id: 2, customerId: 2, date: '2013-12-22 00:00:00' },
    { id: 3, customerId: 3, date: '2013-11-01 00:00:00' },
    { id: 4, customerId: 1, date: '2013-10-01 00:00:00' },
  ],
  invoiceItems: [
    { id: 1, invoiceId: 1, trackId: 3, unitPrice: 0.99, quantity: 1 },
    { id: 2, invoiceId: 1, trackId: 1, unitPrice: 0.99, quantity: 2 },
    { id: 3, invoiceId: 2, trackId: 4, unitPrice: 1.99, quantity: 1 },
    { id: 4, invoiceId: 3, trackId: 1, unitPrice: 0.99, quantity: 1 },
    { id: 5, invoiceId: 4, trackId: 3, unitPrice: 0.99, quantity: 1 },
  ],
};

describe('SalesReportService', () => {
  let testDb: TestDatabase;
  let db: DatabaseConnection;
  let service: SalesReportService;

  beforeEach(async () => {
    testDb = new TestDatabase();
    db = await testDb.create();
    await testDb.seed(catalog);
    service = new SalesReportService(db);
  });

  afterEach(async () => {
    await testDb.destroy();
  });

  describe('getPurchaseDetails', () => {
    it('should order by date descending with customer, artist, album and track tie-breaks', async () => {
      const rows = await service.getPurchaseDetails();

      expect(rows).toEqual([
        {
          customer: 'Alice Smith',
          track: 'Track Three',
          album: null,
          artist: null,
          unitPrice: 0.99,
          quantity: 1,
          invoiceDate: '2013-12-22 00:00:00',
        },
        {
          customer: 'Alice Smith',
          track: 'Track One',
          album: 'For Those About To Rock',
          artist: 'AC/DC',
          unitPrice: 0.99,
          quantity: 2,
          invoiceDate: '2013-12-22 00:00:00',
        },
        {
          customer: 'Bob Jones',
          track: 'Track Four',
          album: null,
          artist: null,
          unitPrice: 1.99,
          quantity: 1,
          invoiceDate: '2013-12-22 00:00:00',
        },
        {
          customer: 'Carol White',
          track: 'Track One',
          album: 'For Those About To Rock',
          artist: 'AC/DC',
          unitPrice: 0.99,
          quantity: 1,
          invoiceDate: '2013-11-01 00:00:00',
        },
        {
          customer: 'Alice Smith',
          track: 'Track Three',
          album: null,
          artist: null,
          unitPrice: 0.99,
          quantity: 1,
          invoiceDate: '2013-10-01 00:00:00',
        },
      ]);
    });

    it('should never return dates out of descending order', async () => {
      const rows = await service.getPurchaseDetails();

      for (let i = 1; i < rows.length; i++) {
        const previous = rows[i - 1]?.invoiceDate ?? '';
        const current = rows[i]?.invoiceDate ?? '';
        expect(previous >= current).toBe(true);
      }
    });

    it('should honour the row limit', async () => {
      const rows = await service.getPurchaseDetails(2);

      expect(rows.map(r => r.track)).toEqual(['Track Three', 'Track One']);
    });

    it('should cap the default report at 50 rows', async () => {
      const items = Array.from({ length: 60 }, (_, i) => ({
        id: 100 + i,
        invoiceId: 3,
        trackId: 2,
      }));
      await testDb.seed({ invoiceItems: items });

      const rows = await service.getPurchaseDetails();

      expect(rows).toHaveLength(50);
    });

    it('should reject a non-positive limit', async () => {
      await expect(service.getPurchaseDetails(0)).rejects.toBeInstanceOf(SchemaValidationError);
    });
  });

  describe('getRevenueByGenre', () => {
    it('should total revenue per genre with tracks lacking a genre grouped under null', async () => {
      const rows = await service.getRevenueByGenre();

      expect(rows).toEqual([
        { genre: 'Rock', revenue: 2.97, lineItems: 2, tracksSold: 3 },
        { genre: null, revenue: 1.99, lineItems: 1, tracksSold: 1 },
        { genre: 'Jazz', revenue: 1.98, lineItems: 2, tracksSold: 2 },
      ]);
    });

    it('should add up to the revenue of every invoice line', async () => {
      const rows = await service.getRevenueByGenre();
      const total = await db.get<{ total: number }>(
        'SELECT SUM(UnitPrice * Quantity) AS total FROM invoice_items'
      );

      const reported = rows.reduce((sum, row) => sum + row.revenue, 0);
      expect(reported).toBeCloseTo(total?.total ?? Number.NaN, 2);
      expect(reported).toBeCloseTo(6.94, 2);
    });
  });

  describe('getAboveAverageDurationPurchasers', () => {
    it('should leave tracks over the cap out of the average and the candidates', async () => {
      // Mean over [100, 200, 2000] is ~767ms, so only Track Three qualifies
      const customers = await service.getAboveAverageDurationPurchasers();

      expect(customers).toEqual([
        { customerId: 1, customer: 'Alice Smith', email: 'alice@example.com' },
      ]);
    });

    it('should let a higher cap pull the long track back in', async () => {
      // Mean over all four tracks is 225575.25ms; only Track Four beats it
      const customers = await service.getAboveAverageDurationPurchasers(1_000_000);

      expect(customers).toEqual([
        { customerId: 2, customer: 'Bob Jones', email: 'bob@example.com' },
      ]);
    });

    it('should list each customer once and order by name', async () => {
      await testDb.seed({
        invoices: [{ id: 5, customerId: 3, date: '2013-12-01 00:00:00' }],
        invoiceItems: [{ id: 6, invoiceId: 5, trackId: 3 }],
      });

      const customers = await service.getAboveAverageDurationPurchasers();

      expect(customers.map(c => c.customer)).toEqual(['Alice Smith', 'Carol White']);
    });

    it('should return nobody when no track is strictly above the mean', async () => {
      await expect(service.getAboveAverageDurationPurchasers(150)).resolves.toEqual([]);
    });
  });
});
