import { DatabaseConnection } from '../../types/database.js';
import {
  CustomerSummary,
  CustomerSummaryRow,
  GenreRevenue,
  GenreRevenueRow,
  PurchaseDetail,
  PurchaseDetailRow,
} from '../../types/chinook.js';
import { defaultConfig } from '../../config/defaults.js';
import { maxTrackDurationSchema, purchaseLimitSchema } from '../../validation/reportSchemas.js';
import { validate } from '../../validation/validate.js';
import { logger } from '../../utils/logger.js';

/**
 * SalesReportService
 *
 * Reports built from invoices and invoice lines: who bought what, and which
 * genres bring in revenue.
 */
export class SalesReportService {
  constructor(private readonly db: DatabaseConnection) {}

  /**
   * Individual purchases, newest invoice first.
   *
   * Tracks without an album (or an album without an artist) still appear,
   * with null album/artist.
   */
  async getPurchaseDetails(
    limit: number = defaultConfig.reports.purchaseLimit
  ): Promise<PurchaseDetail[]> {
    const rowLimit = validate(purchaseLimitSchema, limit, {
      service: 'SalesReportService',
      operation: 'getPurchaseDetails',
    });

    const rows = await this.db.query<PurchaseDetailRow>(
      `SELECT
         c.FirstName || ' ' || c.LastName AS Customer,
         t.Name AS Track,
         al.Title AS Album,
         ar.Name AS Artist,
         ii.UnitPrice,
         ii.Quantity,
         inv.InvoiceDate
       FROM customers c
       JOIN invoices inv      ON inv.CustomerId = c.CustomerId
       JOIN invoice_items ii  ON ii.InvoiceId = inv.InvoiceId
       JOIN tracks t          ON t.TrackId = ii.TrackId
       LEFT JOIN albums al    ON al.AlbumId = t.AlbumId
       LEFT JOIN artists ar   ON ar.ArtistId = al.ArtistId
       ORDER BY inv.InvoiceDate DESC, Customer, Artist, Album, Track
       LIMIT ?`,
      [rowLimit]
    );

    return rows.map(row => ({
      customer: row.Customer,
      track: row.Track,
      album: row.Album,
      artist: row.Artist,
      unitPrice: row.UnitPrice,
      quantity: row.Quantity,
      invoiceDate: row.InvoiceDate,
    }));
  }

  /**
   * Revenue, line count and units sold per genre, highest revenue first.
   * Tracks without a genre are grouped under a null genre.
   */
  async getRevenueByGenre(): Promise<GenreRevenue[]> {
    const rows = await this.db.query<GenreRevenueRow>(
      `SELECT
         g.Name AS Genre,
         ROUND(SUM(ii.UnitPrice * ii.Quantity), 2) AS Revenue,
         COUNT(*) AS LineItems,
         SUM(ii.Quantity) AS TracksSold
       FROM invoice_items ii
       JOIN tracks t       ON t.TrackId = ii.TrackId
       LEFT JOIN genres g  ON g.GenreId = t.GenreId
       GROUP BY g.GenreId, g.Name
       ORDER BY Revenue DESC`
    );

    logger.debug('[SalesReportService] Revenue by genre', { genres: rows.length });

    return rows.map(row => ({
      genre: row.Genre,
      revenue: row.Revenue,
      lineItems: row.LineItems,
      tracksSold: row.TracksSold,
    }));
  }

  /**
   * Customers who bought at least one track longer than the average track.
   *
   * Both the average and the candidate tracks come only from tracks of at
   * most `maxDurationMs`; longer tracks neither count toward the mean nor
   * qualify a customer.
   */
  async getAboveAverageDurationPurchasers(
    maxDurationMs: number = defaultConfig.reports.maxTrackDurationMs
  ): Promise<CustomerSummary[]> {
    const cap = validate(maxTrackDurationSchema, maxDurationMs, {
      service: 'SalesReportService',
      operation: 'getAboveAverageDurationPurchasers',
    });

    const rows = await this.db.query<CustomerSummaryRow>(
      `WITH capped_tracks AS (
         SELECT TrackId, Milliseconds
         FROM tracks
         WHERE Milliseconds <= ?
       ),
       capped_average AS (
         SELECT AVG(Milliseconds) AS AvgMs
         FROM capped_tracks
       ),
       long_tracks AS (
         SELECT ct.TrackId
         FROM capped_tracks ct
         CROSS JOIN capped_average ca
         WHERE ct.Milliseconds > ca.AvgMs
       )
       SELECT DISTINCT
         c.CustomerId,
         c.FirstName || ' ' || c.LastName AS Customer,
         c.Email
       FROM customers c
       JOIN invoices inv      ON inv.CustomerId = c.CustomerId
       JOIN invoice_items ii  ON ii.InvoiceId = inv.InvoiceId
       JOIN long_tracks lt    ON lt.TrackId = ii.TrackId
       ORDER BY Customer, c.CustomerId`,
      [cap]
    );

    logger.debug('[SalesReportService] Above-average-duration purchasers', {
      maxDurationMs: cap,
      count: rows.length,
    });

    return rows.map(row => ({
      customerId: row.CustomerId,
      customer: row.Customer,
      email: row.Email,
    }));
  }
}
