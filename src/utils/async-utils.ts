/**
 * Chunk an array into smaller arrays of specified size.
 */
export function chunkArray<T>(array: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < array.length; i += size) {
    chunks.push(array.slice(i, i + size));
  }
  return chunks;
}

/**
 * Map with at most `concurrency` calls in flight. Output order matches input
 * order regardless of completion order. The first rejection rejects the whole
 * call.
 */
export async function mapWithConcurrency<T, R>(
  items: T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const size = Math.max(1, Math.floor(concurrency));
  const results: R[] = [];

  let offset = 0;
  for (const chunk of chunkArray(items, size)) {
    const base = offset;
    const settled = await Promise.all(chunk.map((item, i) => fn(item, base + i)));
    results.push(...settled);
    offset += chunk.length;
  }

  return results;
}
