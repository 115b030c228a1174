/**
 * Embedding Provider Utilities
 *
 * Vector helpers shared by the embedding client and the host result format.
 */

/**
 * L2 normalize a vector to unit length.
 * Returns a new array; a zero vector is returned unchanged.
 */
export function normalizeL2(vector: number[]): number[] {
  const magnitude = Math.sqrt(vector.reduce((sum, val) => sum + val * val, 0));
  if (magnitude === 0) return vector;
  return vector.map((val) => val / magnitude);
}

const FLOAT32_BYTES = 4;

/**
 * Encode a vector as base64 of little-endian float32 values,
 * the blob layout host vector columns store.
 */
export function encodeVector(vector: readonly number[]): string {
  const buffer = Buffer.alloc(vector.length * FLOAT32_BYTES);
  vector.forEach((value, i) => {
    buffer.writeFloatLE(value, i * FLOAT32_BYTES);
  });
  return buffer.toString('base64');
}

/**
 * Decode a base64 float32 blob produced by encodeVector.
 */
export function decodeVector(encoded: string): number[] {
  const buffer = Buffer.from(encoded, 'base64');
  if (buffer.length % FLOAT32_BYTES !== 0) {
    throw new Error(`Vector blob length ${buffer.length} is not a multiple of ${FLOAT32_BYTES}`);
  }
  const vector: number[] = [];
  for (let offset = 0; offset < buffer.length; offset += FLOAT32_BYTES) {
    vector.push(buffer.readFloatLE(offset));
  }
  return vector;
}
