/**
 * Embedding serialization for SQLite BLOB storage.
 */

import { ConfigurationError } from './errors.js';

/**
 * Serialize an embedding to a Float32 buffer (4 bytes per dimension).
 */
export function serializeEmbedding(embedding: number[]): Buffer {
  return Buffer.from(new Float32Array(embedding).buffer);
}

/**
 * Deserialize an embedding from a SQLite Buffer, respecting the view's byte
 * offset (SQLite buffers may be slices of a larger allocation).
 */
export function deserializeEmbedding(buffer: Buffer): number[] {
  const float32 = new Float32Array(
    buffer.buffer,
    buffer.byteOffset,
    buffer.length / Float32Array.BYTES_PER_ELEMENT,
  );
  return Array.from(float32);
}

/**
 * Throw DIMENSION_MISMATCH unless every vector has `expected` dimensions.
 */
export function assertDimensions(vectors: number[][], expected: number, context: string): void {
  for (const vector of vectors) {
    if (vector.length !== expected) {
      throw new ConfigurationError(
        `${context}: expected ${expected}-dimensional vector, got ${vector.length}`,
        'DIMENSION_MISMATCH',
      );
    }
  }
}
