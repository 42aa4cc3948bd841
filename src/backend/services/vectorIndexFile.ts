/**
 * Flat Vector Index
 *
 * A contiguous float32 buffer of fixed-dimension vectors, scanned in full on
 * every query. Record i occupies [i * dimension, (i + 1) * dimension).
 *
 * FILE FORMAT (little-endian):
 *   bytes 0-3   ASCII magic "VIDX"
 *   bytes 4-7   uint32 format version (1)
 *   bytes 8-11  uint32 dimension
 *   bytes 12-15 uint32 record count
 *   then count * dimension float32 values in insertion order
 */

import * as fs from 'fs';
import { VectorStoreError, VectorStoreErrorCode, assertDimension, innerProduct } from './vectorStore';

const MAGIC = 'VIDX';
const FORMAT_VERSION = 1;
const HEADER_BYTES = 16;
const INITIAL_CAPACITY = 64;

export class FlatVectorIndex {
  private data: Float32Array;
  private size = 0;

  constructor(public readonly dimension: number) {
    if (!Number.isInteger(dimension) || dimension < 1) {
      throw new VectorStoreError(
        `Index dimension must be a positive integer, got ${dimension}`,
        VectorStoreErrorCode.CONFIGURATION
      );
    }
    this.data = new Float32Array(INITIAL_CAPACITY * dimension);
  }

  get count(): number {
    return this.size;
  }

  /**
   * Appends vectors. All vectors are checked before any is written, so a
   * rejected batch leaves the index unchanged.
   */
  add(vectors: ArrayLike<number>[]): void {
    vectors.forEach((vector, i) => assertDimension(vector, this.dimension, `Vector ${i}`));

    this.ensureCapacity(this.size + vectors.length);
    for (const vector of vectors) {
      this.data.set(vector, this.size * this.dimension);
      this.size++;
    }
  }

  /**
   * Inner product of the query with every stored vector, in insertion order.
   */
  scores(query: ArrayLike<number>): Float64Array {
    assertDimension(query, this.dimension, 'Query vector');

    const result = new Float64Array(this.size);
    for (let row = 0; row < this.size; row++) {
      const offset = row * this.dimension;
      result[row] = innerProduct(this.data.subarray(offset, offset + this.dimension), query);
    }
    return result;
  }

  vectorAt(position: number): Float32Array {
    if (position < 0 || position >= this.size) {
      throw new RangeError(`No vector at position ${position}`);
    }
    const offset = position * this.dimension;
    return this.data.slice(offset, offset + this.dimension);
  }

  reset(): void {
    this.data = new Float32Array(INITIAL_CAPACITY * this.dimension);
    this.size = 0;
  }

  toBuffer(): Buffer {
    const values = this.size * this.dimension;
    const buffer = Buffer.alloc(HEADER_BYTES + values * 4);

    buffer.write(MAGIC, 0, 'ascii');
    buffer.writeUInt32LE(FORMAT_VERSION, 4);
    buffer.writeUInt32LE(this.dimension, 8);
    buffer.writeUInt32LE(this.size, 12);
    for (let i = 0; i < values; i++) {
      buffer.writeFloatLE(this.data[i], HEADER_BYTES + i * 4);
    }

    return buffer;
  }

  /**
   * Decodes an index written by toBuffer.
   *
   * @throws VectorStoreError CORRUPT_INDEX for a malformed buffer,
   *         DIMENSION_MISMATCH when the stored dimension differs
   */
  static fromBuffer(buffer: Buffer, expectedDimension: number): FlatVectorIndex {
    if (buffer.length < HEADER_BYTES || buffer.toString('ascii', 0, 4) !== MAGIC) {
      throw new VectorStoreError('Index file is not a vector index', VectorStoreErrorCode.CORRUPT_INDEX);
    }

    const version = buffer.readUInt32LE(4);
    if (version !== FORMAT_VERSION) {
      throw new VectorStoreError(
        `Unsupported index format version ${version}`,
        VectorStoreErrorCode.CORRUPT_INDEX
      );
    }

    const dimension = buffer.readUInt32LE(8);
    const count = buffer.readUInt32LE(12);

    if (dimension !== expectedDimension) {
      throw new VectorStoreError(
        `Index dimension ${dimension} does not match configured dimension ${expectedDimension}`,
        VectorStoreErrorCode.DIMENSION_MISMATCH
      );
    }

    const expectedLength = HEADER_BYTES + count * dimension * 4;
    if (buffer.length !== expectedLength) {
      throw new VectorStoreError(
        `Index file is ${buffer.length} bytes, header implies ${expectedLength}`,
        VectorStoreErrorCode.CORRUPT_INDEX
      );
    }

    const index = new FlatVectorIndex(dimension);
    index.ensureCapacity(count);
    for (let i = 0; i < count * dimension; i++) {
      index.data[i] = buffer.readFloatLE(HEADER_BYTES + i * 4);
    }
    index.size = count;

    return index;
  }

  private ensureCapacity(records: number): void {
    const needed = records * this.dimension;
    if (needed <= this.data.length) {
      return;
    }

    let capacity = this.data.length;
    while (capacity < needed) {
      capacity *= 2;
    }
    const grown = new Float32Array(capacity);
    grown.set(this.data.subarray(0, this.size * this.dimension));
    this.data = grown;
  }
}

export function readIndexFile(filePath: string, expectedDimension: number): FlatVectorIndex {
  return FlatVectorIndex.fromBuffer(fs.readFileSync(filePath), expectedDimension);
}

/**
 * Writes the index next to its final path, then renames it into place.
 * The index is encoded before the first await.
 */
export async function writeIndexFile(filePath: string, index: FlatVectorIndex): Promise<void> {
  const tempPath = `${filePath}.tmp`;
  const encoded = index.toBuffer();
  await fs.promises.writeFile(tempPath, encoded);
  await fs.promises.rename(tempPath, filePath);
}
