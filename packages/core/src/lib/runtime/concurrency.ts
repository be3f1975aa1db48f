/** Runs `fn` over `items` with at most `concurrency` calls in flight; results keep item order. */
export async function mapWithConcurrency<TItem, TResult>(params: {
  items: readonly TItem[];
  concurrency: number;
  fn: (item: TItem, index: number) => Promise<TResult>;
}): Promise<TResult[]> {
  const { items, fn } = params;
  const max = Math.max(1, Math.floor(params.concurrency || 1));
  const out = new Map<number, TResult>();

  // Workers share one iterator, so every entry is handed out exactly once.
  const queue = items.entries();
  const workers = Array.from({ length: Math.min(max, items.length) }, async () => {
    for (const [idx, item] of queue) {
      out.set(idx, await fn(item, idx));
    }
  });

  await Promise.all(workers);
  return [...out.entries()].sort(([a], [b]) => a - b).map(([, value]) => value);
}
