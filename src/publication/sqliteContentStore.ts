import type Database from 'better-sqlite3';
import { IContentStore } from './interfaces';
import { canonicalStringify, computeContentAddress } from './contentAddress';

/**
 * Content store backed by the `documents` table of the campaign database
 */
export class SqliteContentStore implements IContentStore {
  private stmtInsert: Database.Statement<[string, string, string]>;
  private stmtGet: Database.Statement<[string], { body: string }>;

  constructor(db: Database.Database) {
    // Same address means same bytes, so a repeat pin is a no-op
    this.stmtInsert = db.prepare<[string, string, string]>(
      `INSERT OR IGNORE INTO documents (cid, body, created_at) VALUES (?, ?, ?)`
    );
    this.stmtGet = db.prepare<[string], { body: string }>(`SELECT body FROM documents WHERE cid = ?`);
  }

  async pin(document: unknown): Promise<string> {
    const cid = computeContentAddress(document);
    this.stmtInsert.run(cid, canonicalStringify(document), new Date().toISOString());
    return cid;
  }

  async fetch(cid: string): Promise<unknown | undefined> {
    const row = this.stmtGet.get(cid);
    return row ? JSON.parse(row.body) as unknown : undefined;
  }
}
