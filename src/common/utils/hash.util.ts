import * as crypto from 'crypto';

/**
 * Computes a SHA256 hash for the given content.
 * @param content - The string content to hash.
 * @returns The hex-encoded SHA256 hash.
 */
export function createContentHash(content: string): string {
  return crypto.createHash('sha256').update(content).digest('hex');
}

/**
 * Id of the `index`-th chunk of a study material object.
 * Milvus VarChar primary keys are capped at 512 chars, so long keys collapse to a hash.
 */
export function chunkId(key: string, index: number): string {
  const prefix = key.length > 400 ? createContentHash(key) : key;
  return `${prefix}-${index}`;
}
