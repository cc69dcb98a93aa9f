import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { ErrorCode, RagError, getErrorMessage } from './errors';
import type { ChunkRecord, DocumentMetadata } from './types';

export const SCHEMA_VERSION = 1;

type ChunkRow = ChunkRecord & { position: number };
type ChunkParams = [
  number, string, number, number, string, string, number, number, number, number
];

/**
 * Durable metadata table for the vector index. Row `position` is the row
 * number of the matching vector in the flat index file.
 */
export class MetadataStore {
  private constructor(private readonly db: Database.Database) {}

  /**
   * Open (or create) the store and check it was written for this schema
   * and dimension. An unreadable file raises INDEX_CORRUPT.
   */
  static open(filePath: string, dimension: number): MetadataStore {
    // Ensure data directory exists
    fs.mkdirSync(path.dirname(filePath), { recursive: true });

    const db = openDatabase(filePath);
    try {
      checkMeta(db, dimension);
    } catch (error) {
      db.close();
      throw error;
    }
    return new MetadataStore(db);
  }

  loadAll(): ChunkRecord[] {
    const rows = this.db
      .prepare<[], ChunkRow>(`
        SELECT position, vector_id as vectorId, document_id as documentId,
          chunk_index as chunkIndex, filename, content, page_number as pageNumber,
          start_char as startChar, end_char as endChar, created_at as createdAt
        FROM vectors
        ORDER BY position
      `)
      .all();

    return rows.map(({ position: _position, ...record }) => record);
  }

  append(startPosition: number, records: ChunkRecord[]): void {
    const insert = this.insertStatement();
    this.db.transaction(() => {
      records.forEach((record, i) => insert.run(...toParams(startPosition + i, record)));
    })();
  }

  /** Remove rows at `fromPosition` and after. */
  truncate(fromPosition: number): void {
    this.db.prepare<[number]>('DELETE FROM vectors WHERE position >= ?').run(fromPosition);
  }

  replaceAll(records: ChunkRecord[]): void {
    const insert = this.insertStatement();
    this.db.transaction(() => {
      this.db.prepare('DELETE FROM vectors').run();
      records.forEach((record, i) => insert.run(...toParams(i, record)));
    })();
  }

  getAllDocuments(): DocumentMetadata[] {
    return this.db
      .prepare<[], DocumentMetadata>(`
        SELECT
          document_id as documentId,
          MIN(filename) as filename,
          COUNT(*) as totalChunks,
          MIN(created_at) as createdAt
        FROM vectors
        GROUP BY document_id
        ORDER BY createdAt DESC, documentId DESC
      `)
      .all();
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  private insertStatement() {
    return this.db.prepare<ChunkParams>(`
      INSERT INTO vectors (position, vector_id, document_id, chunk_index, filename,
        content, page_number, start_char, end_char, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
  }
}

function openDatabase(filePath: string): Database.Database {
  let db: Database.Database | undefined;
  try {
    db = new Database(filePath);
    initializeSchema(db);
    return db;
  } catch (error) {
    db?.close();
    throw new RagError(
      ErrorCode.INDEX_CORRUPT,
      `Cannot read metadata store ${filePath}: ${getErrorMessage(error)}`,
      error
    );
  }
}

function initializeSchema(db: Database.Database) {
  db.exec(`
    CREATE TABLE IF NOT EXISTS meta (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS vectors (
      position INTEGER PRIMARY KEY,
      vector_id TEXT NOT NULL UNIQUE,
      document_id INTEGER NOT NULL,
      chunk_index INTEGER NOT NULL,
      filename TEXT NOT NULL,
      content TEXT NOT NULL,
      page_number INTEGER NOT NULL,
      start_char INTEGER NOT NULL,
      end_char INTEGER NOT NULL,
      created_at INTEGER NOT NULL
    )
  `);

  // Create index for faster document lookups
  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_document_id
    ON vectors(document_id)
  `);
}

function checkMeta(db: Database.Database, dimension: number) {
  const readMeta = db.prepare<[string], { value: string }>(
    'SELECT value FROM meta WHERE key = ?'
  );
  const writeMeta = db.prepare<[string, string]>(
    'INSERT OR REPLACE INTO meta (key, value) VALUES (?, ?)'
  );

  const version = readMeta.get('schema_version');
  const storedDimension = readMeta.get('dimension');

  if (!version || !storedDimension) {
    db.transaction(() => {
      writeMeta.run('schema_version', String(SCHEMA_VERSION));
      writeMeta.run('dimension', String(dimension));
    })();
    return;
  }

  if (Number(version.value) !== SCHEMA_VERSION) {
    throw new RagError(
      ErrorCode.INVALID_CONFIGURATION,
      `Metadata schema version ${version.value} is not supported (expected ${SCHEMA_VERSION})`
    );
  }

  if (Number(storedDimension.value) !== dimension) {
    throw new RagError(
      ErrorCode.INVALID_CONFIGURATION,
      `Metadata store was built for dimension ${storedDimension.value}, configured dimension is ${dimension}`
    );
  }
}

function toParams(position: number, record: ChunkRecord): ChunkParams {
  return [
    position,
    record.vectorId,
    record.documentId,
    record.chunkIndex,
    record.filename,
    record.content,
    record.pageNumber,
    record.startChar,
    record.endChar,
    record.createdAt,
  ];
}
