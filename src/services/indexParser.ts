import { z } from 'zod';
import type { Game } from '../models/game';
import { ParseError, errorMessage } from '../models/errors';

const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? '' : String(value).trim()));

const sizeField = z
  .union([z.number(), z.string().trim().regex(/^\d+$/).transform(Number)])
  .pipe(z.number().int().nonnegative().safe());

const languagesField = z
  .union([z.array(z.string()), z.string()])
  .nullish()
  .transform((value) => {
    const list = typeof value === 'string' ? value.split(',') : value ?? [];
    return list.map((lang) => lang.trim()).filter((lang) => lang.length > 0);
  });

/**
 * Shape of one game entry of an index document
 */
const gameRecordSchema = z.object({
  name: z.string().trim().min(1),
  title: optionalText,
  description: optionalText,
  version: optionalText,
  languages: languagesField,
  descriptionUrl: optionalText,
  downloadUrl: z.string().trim().min(1),
  sizeBytes: sizeField,
  publishedAt: z.union([z.string(), z.number()]).nullish(),
  imageUrl: optionalText
});

/**
 * Result of parsing an index document
 */
export interface ParsedIndex {
  games: Game[];
  /** Human readable reasons for dropped records */
  rejected: string[];
}

/**
 * Parse repository index documents into Game records
 */
export class IndexParser {

  /**
   * Parse a raw index body (JSON text)
   */
  public parseDocument(body: string, repositoryName: string): ParsedIndex {
    let document: unknown;
    try {
      document = JSON.parse(body);
    } catch (error) {
      throw new ParseError(`Index of ${repositoryName} is not valid JSON: ${errorMessage(error)}`, {
        cause: error
      });
    }
    return this.parseIndex(document, repositoryName);
  }

  /**
   * Convert an already decoded document. Invalid records are dropped one by
   * one; only a document without a game list is rejected as a whole.
   */
  public parseIndex(document: unknown, repositoryName: string): ParsedIndex {
    const records = this.extractRecords(document);
    if (!records) {
      throw new ParseError(`Index of ${repositoryName} has no "games" list`);
    }

    const games: Game[] = [];
    const rejected: string[] = [];

    records.forEach((record, index) => {
      const result = gameRecordSchema.safeParse(record);
      if (!result.success) {
        const fields = [...new Set(result.error.issues.map((issue) => issue.path.join('.')))];
        rejected.push(`record #${index} (${this.describeRecord(record)}): invalid ${fields.join(', ')}`);
        return;
      }

      const data = result.data;
      games.push({
        name: data.name,
        title: data.title || data.name,
        description: data.description,
        version: data.version,
        languages: data.languages,
        repositoryName,
        descriptionUrl: data.descriptionUrl,
        downloadUrl: data.downloadUrl,
        sizeBytes: data.sizeBytes,
        publishedAt: this.parsePublishedAt(data.publishedAt),
        imageUrl: data.imageUrl,
        installed: false
      });
    });

    return { games, rejected };
  }

  /**
   * Accepts ISO-8601 strings and Unix seconds; anything else is the epoch
   */
  public parsePublishedAt(value: string | number | null | undefined): Date {
    const date = this.toDate(value);
    return Number.isNaN(date.getTime()) ? new Date(0) : date;
  }

  private toDate(value: string | number | null | undefined): Date {
    if (typeof value === 'number') {
      return new Date(value * 1000);
    }
    const trimmed = value?.trim();
    if (!trimmed) {
      return new Date(0);
    }
    return /^\d+$/.test(trimmed) ? new Date(Number(trimmed) * 1000) : new Date(trimmed);
  }

  private extractRecords(document: unknown): unknown[] | undefined {
    if (typeof document !== 'object' || document === null || !('games' in document)) {
      return undefined;
    }
    return Array.isArray(document.games) ? document.games : undefined;
  }

  private describeRecord(record: unknown): string {
    if (typeof record === 'object' && record !== null && 'name' in record && typeof record.name === 'string') {
      return record.name;
    }
    return 'unnamed';
  }
}
