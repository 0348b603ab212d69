/**
 * Multi-row insert chunking
 *
 * Postgres caps a statement at 65,535 bind parameters, so large batches are
 * written as several INSERTs inside one transaction.
 */

export const INSERT_CHUNK_SIZE = 1_000;

export function chunk<T>(items: readonly T[], size: number = INSERT_CHUNK_SIZE): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`chunk size must be a positive integer, got ${size}`);
  }
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}
