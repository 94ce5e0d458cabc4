// src/parallel.ts

/**
 * Run `fn` over `items` with at most `concurrency` calls in flight. Lanes
 * pull the next index as they free up, so items start in order.
 */
export async function parallelMapLimit<T>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<void>,
): Promise<void> {
  if (items.length === 0) return;
  const k = Math.max(1, Math.min(concurrency, items.length));
  let i = 0;
  const workers = Array.from({ length: k }, async () => {
    while (true) {
      const idx = i++;
      if (idx >= items.length) break;
      await fn(items[idx], idx);
    }
  });
  await Promise.all(workers);
}
