import { MAX_CHUNK_SIZE } from "./constants";
import type { Chunk, HashRecord } from "./types";

export function chunk<T>(
  items: readonly T[],
  size: number = MAX_CHUNK_SIZE
): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Chunk size must be a positive integer, got ${size}`);
  }

  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export const toChunks = (
  records: readonly HashRecord[],
  size: number = MAX_CHUNK_SIZE
): Chunk[] =>
  chunk(records, size).map((slice, index) => ({ index, records: slice }));
