import * as fs from 'fs';
import * as path from 'path';
import type { Logger } from '../utils/logger';
import type { ListingDetail } from '../types/ListingDetail';
import type { ListingSummary } from '../types/ListingSummary';
import type { Message } from '../types/Message';

export type ExportValue = string | number | boolean | Date | null | undefined | readonly string[];
export type ExportRecord = Readonly<Record<string, ExportValue>>;

export const LISTING_PRIORITY_COLUMNS = [
  'id',
  'title',
  'company',
  'location',
  'mode',
  'stipendText',
  'stipendMin',
  'stipendMax',
  'duration',
  'postedDate',
  'applyBy',
  'url',
  'isStartup',
  'tags',
] as const;

export const MESSAGE_PRIORITY_COLUMNS = [
  'id',
  'sender',
  'direction',
  'timestamp',
  'cleanedText',
  'rawText',
  'attachments',
  'sourceUrl',
] as const;

/**
 * Column order for a record set: priority columns first, in the given
 * order, then every other key present in any record, sorted
 */
export function orderColumns(records: readonly ExportRecord[], priority: readonly string[]): string[] {
  const keys = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      keys.add(key);
    }
  }
  const first = priority.filter((column) => keys.has(column));
  const rest = [...keys].filter((key) => !priority.includes(key)).sort();
  return [...first, ...rest];
}

/**
 * Renders one value as CSV text: lists joined with "; ", dates as
 * ISO-8601, absent values empty
 */
export function formatCsvValue(value: ExportValue): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.join('; ');
  }
  return String(value);
}

/**
 * Escapes a CSV field (commas, quotes, newlines)
 */
export function escapeCsvField(field: string): string {
  if (!field) {
    return '';
  }

  // Drop control characters other than tab/newline, and zero-width characters
  const str = field
    .trim()
    .replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F-\u009F]/g, '')
    .replace(/[\u200B-\u200D\uFEFF]/g, '');

  if (str.includes(',') || str.includes('"') || str.includes('\n') || str.includes('\r')) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

export function toCsv(records: readonly ExportRecord[], priority: readonly string[]): string {
  const columns = orderColumns(records, priority);
  const lines = [columns.join(',')];
  for (const record of records) {
    lines.push(columns.map((column) => escapeCsvField(formatCsvValue(record[column]))).join(','));
  }
  return lines.join('\n');
}

/**
 * Writes extracted records to CSV and JSON files. Write failures are logged
 * and re-thrown.
 */
export class DataExporter {
  private readonly outputDir: string;
  private readonly logger: Logger;

  /**
   * @param outputDir - Directory to save exported files (created if missing)
   */
  constructor(outputDir: string, logger: Logger) {
    this.outputDir = outputDir;
    this.logger = logger;

    if (!fs.existsSync(outputDir)) {
      fs.mkdirSync(outputDir, { recursive: true });
      this.logger.info('Created output directory', { outputDir });
    }
  }

  /**
   * @param filename - Base filename (without extension)
   * @returns Path to the exported file
   */
  async exportToJson(records: readonly ExportRecord[], filename: string): Promise<string> {
    try {
      const filePath = this.timestampedPath(filename, 'json');
      await fs.promises.writeFile(filePath, JSON.stringify(records, null, 2), 'utf-8');

      this.logger.info('Exported records to JSON', { filePath, recordCount: records.length });
      return filePath;
    } catch (error) {
      this.logger.error('Failed to export to JSON', {
        error: error instanceof Error ? error.message : String(error),
        filename,
      });
      throw error;
    }
  }

  /**
   * Writes UTF-8 CSV with a BOM so spreadsheet tools detect the encoding.
   * With no records the file holds only the priority-column header.
   * @param priorityColumns - Columns that lead the header, in order
   * @returns Path to the exported file
   */
  async exportToCsv(
    records: readonly ExportRecord[],
    filename: string,
    priorityColumns: readonly string[] = []
  ): Promise<string> {
    try {
      const filePath = this.timestampedPath(filename, 'csv');
      const BOM = '\uFEFF';

      if (records.length === 0) {
        const header = priorityColumns.length > 0 ? BOM + priorityColumns.join(',') : '';
        await fs.promises.writeFile(filePath, header, 'utf-8');
        this.logger.warn('No records to export to CSV', { filePath });
        return filePath;
      }

      await fs.promises.writeFile(filePath, Buffer.from(BOM + toCsv(records, priorityColumns), 'utf8'));

      this.logger.info('Exported records to CSV', { filePath, recordCount: records.length });
      return filePath;
    } catch (error) {
      this.logger.error('Failed to export to CSV', {
        error: error instanceof Error ? error.message : String(error),
        filename,
      });
      throw error;
    }
  }

  async exportListings(
    listings: ReadonlyArray<ListingSummary | ListingDetail>,
    filename: string = 'listings'
  ): Promise<{ json: string; csv: string }> {
    const json = await this.exportToJson(listings, filename);
    const csv = await this.exportToCsv(listings, filename, LISTING_PRIORITY_COLUMNS);
    return { json, csv };
  }

  async exportMessages(
    messages: readonly Message[],
    filename: string = 'messages'
  ): Promise<{ json: string; csv: string }> {
    const json = await this.exportToJson(messages, filename);
    const csv = await this.exportToCsv(messages, filename, MESSAGE_PRIORITY_COLUMNS);
    return { json, csv };
  }

  private timestampedPath(filename: string, extension: string): string {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    return path.join(this.outputDir, `${filename}-${timestamp}.${extension}`);
  }
}
