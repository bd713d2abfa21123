/**
 * Chinook report and MusicVideo types
 *
 * The *Row interfaces mirror the column aliases each statement selects;
 * services map them onto the camelCase shapes below.
 */

export interface MusicVideoSeed {
  trackName: string;
  director: string;
}

export interface MusicVideo {
  trackId: number;
  trackName: string;
  director: string;
}

export interface MusicVideoRow {
  track_id: number;
  track_name: string;
  video_director: string;
}

export interface SeedEntryResult extends MusicVideoSeed {
  /** Rows inserted for this entry: 0 when no track matched, >1 for ambiguous names */
  inserted: number;
}

export interface SeedResult {
  entries: SeedEntryResult[];
  totalInserted: number;
  unmatched: string[];
}

// ============================================
// Report rows
// ============================================

export interface AccentedTrack {
  trackId: number;
  name: string;
}

export interface AccentedTrackRow {
  TrackId: number;
  Name: string;
}

export interface PurchaseDetail {
  customer: string;
  track: string;
  album: string | null;
  artist: string | null;
  unitPrice: number;
  quantity: number;
  invoiceDate: string;
}

export interface PurchaseDetailRow {
  Customer: string;
  Track: string;
  Album: string | null;
  Artist: string | null;
  UnitPrice: number;
  Quantity: number;
  InvoiceDate: string;
}

export interface GenreRevenue {
  genre: string | null;
  revenue: number;
  lineItems: number;
  tracksSold: number;
}

export interface GenreRevenueRow {
  Genre: string | null;
  Revenue: number;
  LineItems: number;
  TracksSold: number;
}

export interface CustomerSummary {
  customerId: number;
  customer: string;
  email: string;
}

export interface CustomerSummaryRow {
  CustomerId: number;
  Customer: string;
  Email: string;
}

export interface GenreTrack {
  trackId: number;
  name: string;
  genre: string | null;
  milliseconds: number;
}

export interface GenreTrackRow {
  TrackId: number;
  Name: string;
  Genre: string | null;
  Milliseconds: number;
}
