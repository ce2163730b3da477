import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { StoreError } from '../errors/app-errors.js';
import { emailValidationService } from '../services/email-validation.service.js';
import type { SeenRecipient } from '../types/email.types.js';

/**
 * Idempotency store for recipient addresses.
 * Addresses are keyed in lower case.
 */
export interface RecipientStore {
  exists(email: string): boolean;
  /** Throws StoreError if the address is already recorded */
  insert(email: string): void;
  /** Atomic insert; true when the address was not recorded before */
  insertIfAbsent(email: string): boolean;
  findAll(): SeenRecipient[];
  /** Health check */
  ping(): boolean;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS recipients (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    email TEXT NOT NULL UNIQUE,
    created_at TEXT NOT NULL
  )
`;

/**
 * Recipient Repository
 *
 * better-sqlite3 is synchronous, so each statement runs to completion
 * before another request's statement starts.
 */
export class RecipientRepository implements RecipientStore {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /**
   * Opens (or creates) the database file and applies the schema.
   * Use ':memory:' for an in-process database.
   */
  static open(databasePath: string): RecipientRepository {
    try {
      if (databasePath !== ':memory:') {
        fs.mkdirSync(path.dirname(path.resolve(databasePath)), { recursive: true });
      }

      const db = new Database(databasePath);
      db.pragma('journal_mode = WAL');

      const repository = new RecipientRepository(db);
      repository.migrate();
      return repository;
    } catch (error) {
      throw new StoreError(`Could not open recipient store at ${databasePath}`, { cause: error });
    }
  }

  migrate(): void {
    this.db.exec(SCHEMA);
  }

  exists(email: string): boolean {
    return this.run('exists', () => {
      const row = this.db
        .prepare<[string], { found: number }>('SELECT 1 AS found FROM recipients WHERE email = ? LIMIT 1')
        .get(normalize(email));
      return row !== undefined;
    });
  }

  insert(email: string): void {
    this.run('insert', () => {
      this.db
        .prepare<[string, string]>('INSERT INTO recipients (email, created_at) VALUES (?, ?)')
        .run(normalize(email), new Date().toISOString());
    });
  }

  insertIfAbsent(email: string): boolean {
    return this.run('insertIfAbsent', () => {
      const info = this.db
        .prepare<[string, string]>(
          'INSERT INTO recipients (email, created_at) VALUES (?, ?) ON CONFLICT(email) DO NOTHING'
        )
        .run(normalize(email), new Date().toISOString());
      return info.changes === 1;
    });
  }

  findAll(): SeenRecipient[] {
    return this.run('findAll', () =>
      this.db
        .prepare<[], SeenRecipient>('SELECT id, email, created_at AS createdAt FROM recipients ORDER BY id')
        .all()
    );
  }

  count(): number {
    return this.run('count', () => {
      const row = this.db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM recipients').get();
      return row?.total ?? 0;
    });
  }

  /**
   * Health check query
   */
  ping(): boolean {
    try {
      this.db.prepare('SELECT 1').get();
      return true;
    } catch {
      return false;
    }
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof StoreError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new StoreError(`Recipient store ${operation} failed: ${message}`, { cause: error });
    }
  }
}

function normalize(email: string): string {
  return emailValidationService.normalizeEmail(email);
}
