/**
 * Content-addressed cache of resume extraction results.
 *
 * Backed by a SQLite file (better-sqlite3, WAL mode) so entries survive
 * process restarts and can be shared by runs pointed at the same directory.
 * Values are re-validated on read: an entry written by an older schema is
 * reported as a miss and overwritten by the next `set`.
 */

import { createHash } from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { z } from 'zod';
import { ResumeDocumentSchema, type ResumeDocument } from './schemas/resume-schemas.js';
import { errorMessage } from '../lib/errors.js';
import logger from '../lib/logger.js';

/** Bump when ResumeDocument changes shape in a way old entries can't satisfy. */
export const EXTRACTION_SCHEMA_VERSION = 1;

export const CACHE_FILE_NAME = 'cache.db';

export interface ResumeExtractionCache {
  get(key: string): ResumeDocument | undefined;
  set(key: string, document: ResumeDocument): void;
  close(): void;
}

export function extractionCacheKey(resumeText: string, model: string): string {
  return createHash('sha256')
    .update(`v${EXTRACTION_SCHEMA_VERSION}\0${model}\0${resumeText}`)
    .digest('hex');
}

const CacheRowSchema = z.object({ value: z.string() });

export class ExtractionCache implements ResumeExtractionCache {
  private readonly db: Database.Database;
  private closed = false;

  constructor(readonly filePath: string) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    this.db = new Database(filePath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('busy_timeout = 5000');
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS resume_extractions (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
      );
    `);
  }

  get(key: string): ResumeDocument | undefined {
    this.assertOpen();
    const row = CacheRowSchema.safeParse(
      this.db.prepare('SELECT value FROM resume_extractions WHERE key = ?').get(key),
    );
    if (!row.success) return undefined;

    let raw: unknown;
    try {
      raw = JSON.parse(row.data.value);
    } catch (err) {
      logger.warn({ key, error: errorMessage(err) }, 'Extraction cache: unreadable entry ignored');
      return undefined;
    }
    const parsed = ResumeDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn({ key, issues: parsed.error.issues.length }, 'Extraction cache: stale entry ignored');
      return undefined;
    }
    return parsed.data;
  }

  set(key: string, document: ResumeDocument): void {
    this.assertOpen();
    this.db
      .prepare(`
        INSERT INTO resume_extractions (key, value) VALUES (?, ?)
        ON CONFLICT(key) DO UPDATE SET value = excluded.value, created_at = CURRENT_TIMESTAMP
      `)
      .run(key, JSON.stringify(document));
  }

  /** Idempotent. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.db.close();
  }

  private assertOpen(): void {
    if (this.closed) throw new Error('Extraction cache is closed');
  }
}

/** Opens (creating if needed) the cache stored in `cacheDir`. */
export function openExtractionCache(cacheDir: string): ExtractionCache {
  return new ExtractionCache(path.join(cacheDir, CACHE_FILE_NAME));
}
