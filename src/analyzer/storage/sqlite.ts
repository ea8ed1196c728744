/**
 * SQLite storage for fingerprints
 */

import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';

import type { FingerprintRecord } from '../../types/index.js';
import { sortFingerprints } from '../change-detector.js';
import { StoreError } from '../errors.js';
import type { FingerprintStore } from './index.js';

interface FingerprintRow {
  declaration_key: string;
  hash: string;
}

export class SqliteFingerprintStore implements FingerprintStore {
  private db: Database.Database | null = null;
  private dbPath: string;

  constructor(dbPath: string) {
    this.dbPath = dbPath;
  }

  initialize(): void {
    if (this.db) return;

    // Ensure directory exists
    const dir = path.dirname(this.dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    this.db = new Database(this.dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS fingerprints (
        module_key TEXT NOT NULL,
        declaration_key TEXT NOT NULL,
        hash TEXT NOT NULL,
        PRIMARY KEY (module_key, declaration_key)
      )
    `);
  }

  private getDb(): Database.Database {
    if (!this.db) throw new StoreError('Database not initialized');
    return this.db;
  }

  load(moduleKey: string): FingerprintRecord {
    const rows = this.getDb()
      .prepare<[string], FingerprintRow>(
        'SELECT declaration_key, hash FROM fingerprints WHERE module_key = ? ORDER BY declaration_key'
      )
      .all(moduleKey);

    const record: FingerprintRecord = {};
    for (const row of rows) {
      record[row.declaration_key] = row.hash;
    }
    return record;
  }

  save(moduleKey: string, record: FingerprintRecord): void {
    const db = this.getDb();
    const deleteStmt = db.prepare<[string]>('DELETE FROM fingerprints WHERE module_key = ?');
    const insertStmt = db.prepare<[string, string, string]>(
      'INSERT INTO fingerprints (module_key, declaration_key, hash) VALUES (?, ?, ?)'
    );

    // Delete and reinsert as one unit so a failed save leaves the old set intact
    const transaction = db.transaction((entries: Array<[string, string]>) => {
      deleteStmt.run(moduleKey);
      for (const [key, hash] of entries) {
        insertStmt.run(moduleKey, key, hash);
      }
    });

    try {
      transaction(Object.entries(sortFingerprints(record)));
    } catch (error) {
      throw new StoreError(`Failed to save fingerprints for ${moduleKey}`, { cause: error });
    }
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }
}
