import Database from 'better-sqlite3';
import * as path from 'path';
import * as fs from 'fs';
import type { Logger } from '../utils/logger';
import type { ListingDetail } from '../types/ListingDetail';
import type { ListingSummary } from '../types/ListingSummary';
import type { Message } from '../types/Message';

export type RunKind = 'messages' | 'listings';
export type RunStatus = 'running' | 'completed' | 'failed';

export interface RunCounts {
  processed: number;
  extracted: number;
  skipped: number;
}

export interface RunRecord extends RunCounts {
  id: number;
  kind: RunKind;
  status: RunStatus;
  errorMessage: string | null;
}

export interface StoredListing {
  listingId: string;
  url: string;
  title: string;
  company: string;
  location: string;
  mode: string;
  stipendMin: number | null;
  stipendMax: number | null;
  postedDate: string | null;
  isStartup: boolean;
  tags: string[];
  hasDetails: boolean;
}

interface ListingRow {
  listing_id: string;
  url: string;
  title: string;
  company: string;
  location: string;
  mode: string;
  stipend_min: number | null;
  stipend_max: number | null;
  posted_date: string | null;
  is_startup: number;
  tags: string;
  details: string | null;
}

interface RunRow {
  id: number;
  kind: RunKind;
  status: RunStatus;
  processed: number;
  extracted: number;
  skipped: number;
  error_message: string | null;
}

const DETAIL_KEYS = [
  'description',
  'responsibilities',
  'skills',
  'perks',
  'openings',
  'whoCanApply',
  'companyDescription',
] as const;

function parseTags(raw: string): string[] {
  const value: unknown = JSON.parse(raw);
  return Array.isArray(value) ? value.filter((tag): tag is string => typeof tag === 'string') : [];
}

/**
 * SQLite persistence for extracted listings, messages and extraction runs
 */
export class RecordStore {
  private readonly db: Database.Database;
  private readonly logger: Logger;

  /**
   * @param dbPath - Path to SQLite database file, or ':memory:'
   */
  constructor(dbPath: string, logger: Logger) {
    this.logger = logger;

    if (dbPath !== ':memory:') {
      const dbDir = path.dirname(dbPath);
      if (!fs.existsSync(dbDir)) {
        fs.mkdirSync(dbDir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.initializeSchema();
  }

  private initializeSchema(): void {
    // schema.sql is not copied by tsc, so a dist build reads it from src
    const candidates = [
      path.join(__dirname, 'schema.sql'),
      path.join(process.cwd(), 'src', 'database', 'schema.sql'),
    ];
    const schemaPath = candidates.find((candidate) => fs.existsSync(candidate));
    if (!schemaPath) {
      throw new Error(`Database schema not found (looked in ${candidates.join(', ')})`);
    }
    this.db.exec(fs.readFileSync(schemaPath, 'utf-8'));
    this.logger.info('Database schema initialized', { schemaPath });
  }

  /**
   * Inserts or updates listings by URL. Listings without a URL are skipped.
   * @returns Number of listings written
   */
  upsertListings(listings: ReadonlyArray<ListingSummary | ListingDetail>): number {
    const withUrl = listings.filter((listing) => listing.url.length > 0);
    if (withUrl.length === 0) {
      return 0;
    }

    const upsert = this.db.prepare(`
      INSERT INTO listings (
        listing_id, url, title, company, location, mode, stipend_text, stipend_min, stipend_max,
        duration, posted_date, apply_by, is_startup, tags, details, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, CURRENT_TIMESTAMP)
      ON CONFLICT(url) DO UPDATE SET
        listing_id = excluded.listing_id,
        title = excluded.title,
        company = excluded.company,
        location = excluded.location,
        mode = excluded.mode,
        stipend_text = excluded.stipend_text,
        stipend_min = excluded.stipend_min,
        stipend_max = excluded.stipend_max,
        duration = excluded.duration,
        posted_date = excluded.posted_date,
        apply_by = excluded.apply_by,
        is_startup = excluded.is_startup,
        tags = excluded.tags,
        details = COALESCE(excluded.details, listings.details),
        updated_at = CURRENT_TIMESTAMP
    `);

    const upsertMany = this.db.transaction((rows: ReadonlyArray<ListingSummary | ListingDetail>) => {
      for (const listing of rows) {
        upsert.run(
          listing.id,
          listing.url,
          listing.title,
          listing.company,
          listing.location,
          listing.mode,
          listing.stipendText,
          listing.stipendMin,
          listing.stipendMax,
          listing.duration,
          listing.postedDate ? listing.postedDate.toISOString() : null,
          listing.applyBy ? listing.applyBy.toISOString() : null,
          listing.isStartup ? 1 : 0,
          JSON.stringify(listing.tags),
          this.serializeDetails(listing)
        );
      }
      return rows.length;
    });

    try {
      const count = upsertMany(withUrl);
      this.logger.info('Listings upserted', { count, skippedWithoutUrl: listings.length - withUrl.length });
      return count;
    } catch (error) {
      this.logger.error('Failed to upsert listings', {
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  /**
   * Inserts messages by id; already stored ids are left untouched
   * @returns Number of new messages
   */
  insertMessages(messages: readonly Message[]): number {
    if (messages.length === 0) {
      return 0;
    }

    const insert = this.db.prepare(`
      INSERT OR IGNORE INTO messages (
        id, sender, direction, timestamp, raw_text, cleaned_text, attachments, source_url
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const insertMany = this.db.transaction((rows: readonly Message[]) => {
      let inserted = 0;
      for (const message of rows) {
        const result = insert.run(
          message.id,
          message.sender,
          message.direction,
          message.timestamp.toISOString(),
          message.rawText,
          message.cleanedText,
          JSON.stringify(message.attachments),
          message.sourceUrl
        );
        inserted += result.changes;
      }
      return inserted;
    });

    try {
      const count = insertMany(messages);
      this.logger.info('Messages stored', { count });
      return count;
    } catch (error) {
      this.logger.error('Failed to store messages', {
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  getListings(limit: number = 100): StoredListing[] {
    const rows = this.db
      .prepare<[number], ListingRow>(
        `SELECT listing_id, url, title, company, location, mode, stipend_min, stipend_max,
                posted_date, is_startup, tags, details
         FROM listings ORDER BY updated_at DESC, id DESC LIMIT ?`
      )
      .all(limit);

    return rows.map((row) => ({
      listingId: row.listing_id,
      url: row.url,
      title: row.title,
      company: row.company,
      location: row.location,
      mode: row.mode,
      stipendMin: row.stipend_min,
      stipendMax: row.stipend_max,
      postedDate: row.posted_date,
      isStartup: row.is_startup === 1,
      tags: parseTags(row.tags),
      hasDetails: row.details !== null,
    }));
  }

  countListings(): number {
    const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM listings').get();
    return row ? row.count : 0;
  }

  countMessages(): number {
    const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM messages').get();
    return row ? row.count : 0;
  }

  /**
   * Records the start of an extraction run
   * @returns Run id
   */
  startRun(kind: RunKind): number {
    const result = this.db.prepare('INSERT INTO extraction_runs (kind) VALUES (?)').run(kind);
    return Number(result.lastInsertRowid);
  }

  completeRun(runId: number, counts: RunCounts): void {
    this.db
      .prepare(
        `UPDATE extraction_runs
         SET status = 'completed', completed_at = CURRENT_TIMESTAMP, processed = ?, extracted = ?, skipped = ?
         WHERE id = ?`
      )
      .run(counts.processed, counts.extracted, counts.skipped, runId);
  }

  failRun(runId: number, errorMessage: string): void {
    this.db
      .prepare(
        `UPDATE extraction_runs
         SET status = 'failed', completed_at = CURRENT_TIMESTAMP, error_message = ?
         WHERE id = ?`
      )
      .run(errorMessage, runId);
  }

  getRun(runId: number): RunRecord | undefined {
    const row = this.db
      .prepare<[number], RunRow>(
        'SELECT id, kind, status, processed, extracted, skipped, error_message FROM extraction_runs WHERE id = ?'
      )
      .get(runId);
    if (!row) {
      return undefined;
    }
    return {
      id: row.id,
      kind: row.kind,
      status: row.status,
      processed: row.processed,
      extracted: row.extracted,
      skipped: row.skipped,
      errorMessage: row.error_message,
    };
  }

  close(): void {
    this.db.close();
  }

  private serializeDetails(listing: ListingSummary | ListingDetail): string | null {
    if (!('description' in listing)) {
      return null;
    }
    const details: Record<string, unknown> = {};
    for (const key of DETAIL_KEYS) {
      details[key] = listing[key];
    }
    return JSON.stringify(details);
  }
}
