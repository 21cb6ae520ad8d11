import { readFile } from 'node:fs/promises';
import { ok, err, type Result, Mutex, createLogger } from '@mailpilot/utils';
import { writeFileAtomic } from './atomic-write.js';

const logger = createLogger({ service: 'vector-store' });

export const VectorStoreErrorCode = {
  DIMENSION_MISMATCH: 'DIMENSION_MISMATCH',
  INVALID_VECTOR: 'INVALID_VECTOR',
  UNSUPPORTED_FORMAT: 'UNSUPPORTED_FORMAT',
  CORRUPT_INDEX: 'CORRUPT_INDEX',
  IO_ERROR: 'IO_ERROR',
} as const;
export type VectorStoreErrorCode = (typeof VectorStoreErrorCode)[keyof typeof VectorStoreErrorCode];

export interface VectorStoreError {
  code: VectorStoreErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export interface SearchHit {
  id: number;
  // Squared Euclidean distance
  distance: number;
}

// Index file layout, little endian:
//   0  magic "MPVX"
//   4  u16 format version
//   6  u16 reserved (0)
//   8  u32 dimension
//  12  u32 vector count
//  16  count * dimension float32
const MAGIC = 'MPVX';
export const INDEX_FORMAT_VERSION = 1;
const HEADER_BYTES = 16;
const FLOAT_BYTES = 4;

export function encodeIndex(dimension: number, vectors: readonly Float32Array[]): Buffer {
  const buffer = Buffer.alloc(HEADER_BYTES + vectors.length * dimension * FLOAT_BYTES);
  buffer.write(MAGIC, 0, 'ascii');
  buffer.writeUInt16LE(INDEX_FORMAT_VERSION, 4);
  buffer.writeUInt16LE(0, 6);
  buffer.writeUInt32LE(dimension, 8);
  buffer.writeUInt32LE(vectors.length, 12);

  let offset = HEADER_BYTES;
  for (const vector of vectors) {
    for (const component of vector) {
      buffer.writeFloatLE(component, offset);
      offset += FLOAT_BYTES;
    }
  }
  return buffer;
}

export function decodeIndex(
  buffer: Buffer,
  expectedDimension: number
): Result<Float32Array[], VectorStoreError> {
  if (buffer.length < HEADER_BYTES) {
    return err({
      code: VectorStoreErrorCode.CORRUPT_INDEX,
      message: `Index header truncated: ${buffer.length} bytes`,
    });
  }

  const magic = buffer.toString('ascii', 0, 4);
  if (magic !== MAGIC) {
    return err({
      code: VectorStoreErrorCode.UNSUPPORTED_FORMAT,
      message: 'Not a vector index file',
      details: { magic },
    });
  }

  const version = buffer.readUInt16LE(4);
  if (version !== INDEX_FORMAT_VERSION) {
    return err({
      code: VectorStoreErrorCode.UNSUPPORTED_FORMAT,
      message: `Unsupported index format version ${version}`,
      details: { version },
    });
  }

  const dimension = buffer.readUInt32LE(8);
  if (dimension !== expectedDimension) {
    return err({
      code: VectorStoreErrorCode.DIMENSION_MISMATCH,
      message: `Index has dimension ${dimension}, expected ${expectedDimension}`,
      details: { dimension, expectedDimension },
    });
  }

  const count = buffer.readUInt32LE(12);
  const expectedBytes = HEADER_BYTES + count * dimension * FLOAT_BYTES;
  if (buffer.length !== expectedBytes) {
    return err({
      code: VectorStoreErrorCode.CORRUPT_INDEX,
      message: `Index payload is ${buffer.length} bytes, expected ${expectedBytes}`,
      details: { count, dimension },
    });
  }

  const vectors: Float32Array[] = [];
  let offset = HEADER_BYTES;
  for (let i = 0; i < count; i++) {
    const vector = new Float32Array(dimension);
    for (let j = 0; j < dimension; j++) {
      vector[j] = buffer.readFloatLE(offset);
      offset += FLOAT_BYTES;
    }
    vectors.push(vector);
  }
  return ok(vectors);
}

/**
 * Append-only exact nearest-neighbour index. Ids are insertion positions;
 * only `truncate` hands out an id a second time. Mutations run synchronously, so a search always sees
 * either all or none of an add; file I/O is serialized through a mutex.
 */
export class VectorStore {
  private vectors: Float32Array[] = [];
  private readonly io = new Mutex();

  constructor(readonly dimension: number) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new RangeError(`Vector dimension must be a positive integer, got ${dimension}`);
    }
  }

  get totalCount(): number {
    return this.vectors.length;
  }

  add(vector: readonly number[]): Result<number, VectorStoreError> {
    const checked = this.validate(vector);
    if (!checked.ok) {
      return checked;
    }
    this.vectors.push(checked.value);
    return ok(this.vectors.length - 1);
  }

  /**
   * Append all vectors or none. Returns the assigned ids in input order.
   */
  addBatch(vectors: readonly (readonly number[])[]): Result<number[], VectorStoreError> {
    const checked: Float32Array[] = [];
    for (const vector of vectors) {
      const result = this.validate(vector);
      if (!result.ok) {
        return result;
      }
      checked.push(result.value);
    }

    const firstId = this.vectors.length;
    this.vectors.push(...checked);
    return ok(checked.map((_, i) => firstId + i));
  }

  /**
   * Drop every vector from position `count` on. Only for undoing appends
   * that were never persisted or never recorded in the chunk metadata.
   */
  truncate(count: number): void {
    if (count < this.vectors.length) {
      this.vectors.length = Math.max(0, count);
    }
  }

  vectorAt(id: number): Float32Array | undefined {
    return this.vectors[id];
  }

  /**
   * The `k` nearest vectors by squared L2 distance, nearest first. Equal
   * distances are ordered by id.
   */
  search(query: readonly number[], k: number): Result<SearchHit[], VectorStoreError> {
    const checked = this.validate(query);
    if (!checked.ok) {
      return err(checked.error);
    }
    if (k <= 0 || this.vectors.length === 0) {
      return ok([]);
    }

    const hits: SearchHit[] = this.vectors.map((vector, id) => {
      let distance = 0;
      for (let i = 0; i < this.dimension; i++) {
        const delta = (vector[i] ?? 0) - (query[i] ?? 0);
        distance += delta * delta;
      }
      return { id, distance };
    });

    hits.sort((a, b) => a.distance - b.distance || a.id - b.id);
    return ok(hits.slice(0, Math.min(k, hits.length)));
  }

  // Encoded snapshot of the current contents
  encode(): Buffer {
    return encodeIndex(this.dimension, this.vectors);
  }

  async save(path: string): Promise<Result<void, VectorStoreError>> {
    return this.io.runExclusive(async () => {
      const payload = this.encode();
      try {
        await writeFileAtomic(path, payload);
        logger.debug({ path, count: this.vectors.length }, 'Vector index saved');
        return ok(undefined);
      } catch (error) {
        return err({
          code: VectorStoreErrorCode.IO_ERROR,
          message: error instanceof Error ? error.message : String(error),
          details: { path },
        });
      }
    });
  }

  /**
   * Replace the contents with the index at `path`. The file is decoded in
   * full first; on any error the current contents are kept.
   */
  async load(path: string): Promise<Result<void, VectorStoreError>> {
    return this.io.runExclusive(async () => {
      let buffer: Buffer;
      try {
        buffer = await readFile(path);
      } catch (error) {
        return err({
          code: VectorStoreErrorCode.IO_ERROR,
          message: error instanceof Error ? error.message : String(error),
          details: { path },
        });
      }

      const decoded = decodeIndex(buffer, this.dimension);
      if (!decoded.ok) {
        return decoded;
      }
      this.vectors = decoded.value;
      logger.debug({ path, count: this.vectors.length }, 'Vector index loaded');
      return ok(undefined);
    });
  }

  private validate(vector: readonly number[]): Result<Float32Array, VectorStoreError> {
    if (vector.length !== this.dimension) {
      return err(this.dimensionMismatch(vector.length));
    }
    if (!vector.every((component) => Number.isFinite(component))) {
      return err({
        code: VectorStoreErrorCode.INVALID_VECTOR,
        message: 'Vector contains a non-finite component',
      });
    }
    return ok(Float32Array.from(vector));
  }

  private dimensionMismatch(actual: number): VectorStoreError {
    return {
      code: VectorStoreErrorCode.DIMENSION_MISMATCH,
      message: `Vector has dimension ${actual}, expected ${this.dimension}`,
      details: { actual, expected: this.dimension },
    };
  }
}
