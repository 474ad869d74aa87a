/**
 * Map `items` through `fn` with at most `width` calls in flight. Results
 * keep the input order regardless of completion order. `fn` is expected to
 * contain its own failures; a rejection still propagates.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  width: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index], index);
    }
  }

  const slots = Math.max(1, Math.min(width, items.length));
  await Promise.all(Array.from({ length: slots }, () => worker()));
  return results;
}
