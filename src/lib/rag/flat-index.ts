import fs from 'fs';
import path from 'path';
import { ErrorCode, RagError } from './errors';

const MAGIC = 'FLIP';
const FORMAT_VERSION = 1;
const HEADER_BYTES = 16;

export function stagedPath(filePath: string): string {
  return `${filePath}.tmp`;
}

/**
 * Flat inner-product index: dense float32 rows scanned in full on search.
 * Append-only; there is no per-row delete, callers rebuild instead.
 */
export class FlatIndex {
  private data: Float32Array;
  private count = 0;

  constructor(readonly dimension: number) {
    if (!Number.isInteger(dimension) || dimension < 1) {
      throw new RagError(
        ErrorCode.INVALID_CONFIGURATION,
        `Index dimension must be a positive integer, got ${dimension}`
      );
    }
    this.data = new Float32Array(dimension * 16);
  }

  ntotal(): number {
    return this.count;
  }

  add(vectors: ArrayLike<number>[]): void {
    for (const vector of vectors) {
      if (vector.length !== this.dimension) {
        throw new RagError(
          ErrorCode.INVALID_CONFIGURATION,
          `Vector has dimension ${vector.length}, index expects ${this.dimension}`
        );
      }
    }

    this.reserve(this.count + vectors.length);
    vectors.forEach((vector) => {
      this.data.set(vector, this.count * this.dimension);
      this.count++;
    });
  }

  /**
   * Top-k rows by inner product with `query`, highest first.
   * Equal scores keep insertion order.
   */
  search(
    query: ArrayLike<number>,
    k: number
  ): { distances: number[]; labels: number[] } {
    // Limit k to the number of vectors in the index
    const actualK = Math.min(Math.floor(k), this.count);

    if (actualK <= 0) {
      return { distances: [], labels: [] };
    }

    const scores = new Float64Array(this.count);
    for (let row = 0; row < this.count; row++) {
      const offset = row * this.dimension;
      let dot = 0;
      for (let i = 0; i < this.dimension; i++) {
        dot += this.data[offset + i] * query[i];
      }
      scores[row] = dot;
    }

    const order = Array.from({ length: this.count }, (_, row) => row);
    order.sort((a, b) => scores[b] - scores[a] || a - b);
    const labels = order.slice(0, actualK);

    return {
      distances: labels.map((row) => scores[row]),
      labels,
    };
  }

  reconstruct(row: number): Float32Array {
    if (!Number.isInteger(row) || row < 0 || row >= this.count) {
      throw new RangeError(`Row ${row} out of range [0, ${this.count})`);
    }
    const offset = row * this.dimension;
    return this.data.slice(offset, offset + this.dimension);
  }

  /** Drop every row from `rows` onwards. */
  truncate(rows: number): void {
    this.count = Math.max(0, Math.min(rows, this.count));
  }

  /** Writes through a temp file so a crash never leaves a half-written index. */
  write(filePath: string): void {
    fs.renameSync(this.stage(filePath), filePath);
  }

  /**
   * Write the index to `<filePath>.tmp` and return that path. The caller
   * renames it into place once everything it depends on is committed.
   */
  stage(filePath: string): string {
    const header = Buffer.alloc(HEADER_BYTES);
    header.write(MAGIC, 0, 'ascii');
    header.writeUInt32LE(FORMAT_VERSION, 4);
    header.writeUInt32LE(this.dimension, 8);
    header.writeUInt32LE(this.count, 12);

    // Rows are stored in platform byte order, little-endian on every Node target
    const body = Buffer.from(this.data.buffer, this.data.byteOffset, this.count * this.dimension * 4);

    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    const tempPath = stagedPath(filePath);
    fs.writeFileSync(tempPath, Buffer.concat([header, body]));
    return tempPath;
  }

  /**
   * Load an index file. Unreadable contents raise INDEX_CORRUPT; a
   * readable file of another dimension raises INVALID_CONFIGURATION.
   */
  static read(filePath: string, expectedDimension: number): FlatIndex {
    const buffer = fs.readFileSync(filePath);

    if (
      buffer.length < HEADER_BYTES ||
      buffer.toString('ascii', 0, 4) !== MAGIC
    ) {
      throw new RagError(ErrorCode.INDEX_CORRUPT, `${filePath} is not an index file`);
    }

    const version = buffer.readUInt32LE(4);
    if (version !== FORMAT_VERSION) {
      throw new RagError(
        ErrorCode.INVALID_CONFIGURATION,
        `${filePath} has format version ${version}, expected ${FORMAT_VERSION}`
      );
    }

    const dimension = buffer.readUInt32LE(8);
    if (dimension !== expectedDimension) {
      throw new RagError(
        ErrorCode.INVALID_CONFIGURATION,
        `${filePath} holds ${dimension}-dimensional vectors, configured dimension is ${expectedDimension}`
      );
    }

    const count = buffer.readUInt32LE(12);
    if (buffer.length !== HEADER_BYTES + count * dimension * 4) {
      throw new RagError(
        ErrorCode.INDEX_CORRUPT,
        `${filePath} is truncated: header declares ${count} vectors`
      );
    }

    const index = new FlatIndex(dimension);
    index.reserve(count);
    // Copy bytes into the aligned row buffer; the file buffer may sit at any offset
    new Uint8Array(index.data.buffer, 0, count * dimension * 4).set(buffer.subarray(HEADER_BYTES));
    index.count = count;
    return index;
  }

  private reserve(rows: number): void {
    const needed = rows * this.dimension;
    if (needed <= this.data.length) return;

    let capacity = this.data.length;
    while (capacity < needed) capacity *= 2;
    const grown = new Float32Array(capacity);
    grown.set(this.data.subarray(0, this.count * this.dimension));
    this.data = grown;
  }
}
