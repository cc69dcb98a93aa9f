import fs from 'fs';
import path from 'path';
import { MetadataStore } from './db';
import { type Embedder, normalize } from './embedder';
import { ErrorCode, RagError, getErrorMessage, isRagError } from './errors';
import { FlatIndex, stagedPath } from './flat-index';
import { ReadWriteLock } from './rw-lock';
import { withTimeout } from './timeout';
import type {
  Chunk,
  ChunkRecord,
  DocumentMetadata,
  IndexStats,
  SearchResult,
} from './types';

export const INDEX_FILE = 'index.bin';
export const METADATA_FILE = 'metadata.db';

export interface VectorIndexOptions {
  directory: string;
  embedder: Embedder;
  timeoutMs?: number;
  /** Re-embed surviving chunks on delete instead of reusing stored vectors. */
  reembedOnDelete?: boolean;
}

export function vectorIdFor(documentId: number, chunkIndex: number): string {
  return `doc_${documentId}_chunk_${chunkIndex}`;
}

/**
 * Similarity index over chunk embeddings with a positionally aligned
 * metadata list: row i of the flat index is metadata entry i.
 *
 * Both halves are persisted under `directory` after every write. Loading a
 * missing or unreadable pair starts empty; a pair built for another
 * dimension is a configuration error.
 */
export class VectorIndex {
  readonly dimension: number;
  readonly indexPath: string;
  readonly metadataPath: string;

  private readonly embedder: Embedder;
  private readonly timeoutMs: number;
  private readonly reembedOnDelete: boolean;
  private readonly lock = new ReadWriteLock();

  private index: FlatIndex;
  private metadata: ChunkRecord[];
  private store: MetadataStore;

  constructor(options: VectorIndexOptions) {
    this.embedder = options.embedder;
    this.dimension = options.embedder.dimension;
    this.timeoutMs = options.timeoutMs ?? 0;
    this.reembedOnDelete = options.reembedOnDelete ?? false;
    this.indexPath = path.join(options.directory, INDEX_FILE);
    this.metadataPath = path.join(options.directory, METADATA_FILE);

    const loaded = this.load();
    this.index = loaded.index;
    this.metadata = loaded.metadata;
    this.store = loaded.store;
  }

  get size(): number {
    return this.metadata.length;
  }

  /**
   * Embed and append chunks. Every embedding is computed before anything
   * is stored, so a failure part-way through commits nothing.
   */
  async add(chunks: Chunk[], documentId: number, filename: string): Promise<string[]> {
    if (chunks.length === 0) return [];

    const vectors: number[][] = [];
    for (const chunk of chunks) {
      vectors.push(await this.embed(chunk.content));
    }

    const createdAt = Date.now();
    const records: ChunkRecord[] = chunks.map((chunk) => ({
      vectorId: vectorIdFor(documentId, chunk.chunkIndex),
      documentId,
      chunkIndex: chunk.chunkIndex,
      filename,
      content: chunk.content,
      pageNumber: chunk.pageNumber,
      startChar: chunk.startChar,
      endChar: chunk.endChar,
      createdAt,
    }));

    return this.lock.write(() => {
      const existing = new Set(this.metadata.map((record) => record.vectorId));
      const duplicate = records.find((record) => existing.has(record.vectorId));
      if (duplicate) {
        throw new RagError(
          ErrorCode.INVALID_INPUT,
          `Vector ${duplicate.vectorId} is already indexed; delete document ${documentId} first`
        );
      }

      const startPosition = this.metadata.length;
      this.index.add(vectors);
      try {
        this.persist(this.index, () => this.store.append(startPosition, records), () =>
          this.store.truncate(startPosition)
        );
      } catch (error) {
        this.index.truncate(startPosition);
        throw error;
      }
      this.metadata.push(...records);
      this.assertAligned();

      console.info(`Added ${records.length} chunks to vector index for document ${documentId}`);
      return records.map((record) => record.vectorId);
    });
  }

  async search(query: string, k: number = 5): Promise<SearchResult[]> {
    if (this.metadata.length === 0 || k < 1) {
      return [];
    }

    const queryVector = await this.embed(query);

    return this.lock.read(() => {
      const { distances, labels } = this.index.search(queryVector, k);

      return labels.map((row, i) => ({
        ...this.metadata[row],
        similarityScore: distances[i],
        rank: i + 1,
      }));
    });
  }

  /**
   * Remove every entry of a document. The flat structure has no delete, so
   * a new one is built from the surviving rows. Returns the removed count.
   */
  async deleteDocument(documentId: number): Promise<number> {
    return this.lock.write(async () => {
      const keep: number[] = [];
      this.metadata.forEach((record, row) => {
        if (record.documentId !== documentId) keep.push(row);
      });

      const removed = this.metadata.length - keep.length;
      if (removed === 0) return 0;

      const rebuilt = new FlatIndex(this.dimension);
      const survivors = keep.map((row) => this.metadata[row]);

      if (this.reembedOnDelete) {
        const vectors: number[][] = [];
        for (const record of survivors) {
          vectors.push(await this.embed(record.content));
        }
        rebuilt.add(vectors);
      } else {
        rebuilt.add(keep.map((row) => this.index.reconstruct(row)));
      }

      const previous = this.metadata;
      this.persist(rebuilt, () => this.store.replaceAll(survivors), () =>
        this.store.replaceAll(previous)
      );
      this.index = rebuilt;
      this.metadata = survivors;
      this.assertAligned();

      console.info(`Deleted ${removed} vectors for document ${documentId}`);
      return removed;
    });
  }

  stats(): IndexStats {
    return {
      totalVectors: this.index.ntotal(),
      dimension: this.dimension,
      totalDocuments: new Set(this.metadata.map((record) => record.documentId)).size,
      indexFileExists: fs.existsSync(this.indexPath),
      metadataFileExists: fs.existsSync(this.metadataPath),
    };
  }

  listDocuments(): DocumentMetadata[] {
    return this.store.getAllDocuments();
  }

  nextDocumentId(): number {
    return this.metadata.reduce((max, record) => Math.max(max, record.documentId), 0) + 1;
  }

  close(): void {
    this.store.close();
  }

  private async embed(text: string): Promise<number[]> {
    let vector: number[];
    try {
      vector = await withTimeout('Embedding request', this.timeoutMs, (signal) =>
        this.embedder.embed(text, { signal })
      );
    } catch (error) {
      if (isRagError(error)) throw error;
      throw new RagError(
        ErrorCode.EMBEDDING_FAILURE,
        `Failed to generate embedding: ${getErrorMessage(error)}`,
        error
      );
    }

    if (vector.length !== this.dimension) {
      throw new RagError(
        ErrorCode.EMBEDDING_FAILURE,
        `Embedder returned ${vector.length} dimensions, index expects ${this.dimension}`
      );
    }
    if (!vector.every(Number.isFinite)) {
      throw new RagError(ErrorCode.EMBEDDING_FAILURE, 'Embedder returned non-finite values');
    }
    return normalize(vector);
  }

  /**
   * Commit `index` and its metadata together: stage the index file, commit
   * the metadata, then move the staged file into place. A failed rename
   * reverts the metadata through `rollback`.
   */
  private persist(index: FlatIndex, commit: () => void, rollback: () => void): void {
    const tempPath = index.stage(this.indexPath);
    try {
      commit();
    } catch (error) {
      fs.rmSync(tempPath, { force: true });
      throw error;
    }

    try {
      fs.renameSync(tempPath, this.indexPath);
    } catch (error) {
      rollback();
      fs.rmSync(tempPath, { force: true });
      throw error;
    }
  }

  private assertAligned(): void {
    if (this.index.ntotal() !== this.metadata.length) {
      throw new RagError(
        ErrorCode.ALIGNMENT_VIOLATION,
        `Index holds ${this.index.ntotal()} vectors but ${this.metadata.length} metadata entries`
      );
    }
  }

  private load(): { index: FlatIndex; metadata: ChunkRecord[]; store: MetadataStore } {
    const hasIndex = fs.existsSync(this.indexPath);
    const hasMetadata = fs.existsSync(this.metadataPath);

    if (hasIndex && hasMetadata) {
      let store: MetadataStore | undefined;
      try {
        let index = FlatIndex.read(this.indexPath, this.dimension);
        store = MetadataStore.open(this.metadataPath, this.dimension);
        const metadata = store.loadAll();
        const pending = this.takePending(metadata.length, index.ntotal());
        if (pending) {
          console.info(`Recovered staged vector index with ${pending.ntotal()} vectors`);
          index = pending;
        }
        if (metadata.length !== index.ntotal()) {
          throw new RagError(
            ErrorCode.INDEX_CORRUPT,
            `Index holds ${index.ntotal()} vectors but metadata has ${metadata.length} entries`
          );
        }
        console.info(`Loaded vector index with ${index.ntotal()} vectors`);
        return { index, metadata, store };
      } catch (error) {
        store?.close();
        if (isRagError(error, ErrorCode.INVALID_CONFIGURATION)) throw error;
        console.warn(
          `${ErrorCode.INDEX_CORRUPT}: failed to load vector index: ${getErrorMessage(error)}. Starting with an empty index.`
        );
        this.quarantine();
      }
    } else if (hasIndex || hasMetadata) {
      console.warn(
        `${ErrorCode.INDEX_CORRUPT}: ${hasIndex ? METADATA_FILE : INDEX_FILE} is missing. Starting with an empty index.`
      );
      this.quarantine();
    }

    // Write both halves up front so the pair on disk is always complete
    const store = MetadataStore.open(this.metadataPath, this.dimension);
    const index = new FlatIndex(this.dimension);
    index.write(this.indexPath);
    return { index, metadata: [], store };
  }

  /**
   * A staged index left by a write interrupted after its metadata commit is
   * moved into place when its count matches the metadata and the current
   * index file does not. Otherwise it is discarded.
   */
  private takePending(metadataCount: number, indexCount: number): FlatIndex | undefined {
    const tempPath = stagedPath(this.indexPath);
    if (!fs.existsSync(tempPath) || !fs.statSync(tempPath).isFile()) {
      return undefined;
    }

    let pending: FlatIndex | undefined;
    if (indexCount !== metadataCount) {
      try {
        pending = FlatIndex.read(tempPath, this.dimension);
      } catch (error) {
        console.warn(`Discarding unreadable staged index: ${getErrorMessage(error)}`);
      }
    }

    if (pending && pending.ntotal() === metadataCount) {
      fs.renameSync(tempPath, this.indexPath);
      return pending;
    }
    fs.rmSync(tempPath, { force: true });
    return undefined;
  }

  /** Move unusable files aside so a fresh pair can be written. */
  private quarantine(): void {
    for (const filePath of [this.indexPath, this.metadataPath]) {
      if (fs.existsSync(filePath)) {
        fs.renameSync(filePath, `${filePath}.corrupt`);
      }
    }
  }
}
