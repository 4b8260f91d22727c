/**
 * Maps items with at most `concurrency` callbacks in flight; results keep input order.
 * With a limit of 1 the callbacks run strictly one after another.
 */
export async function mapWithConcurrency<TIn, TOut>(
  items: readonly TIn[],
  concurrency: number,
  fn: (item: TIn, index: number) => Promise<TOut>,
): Promise<TOut[]> {
  if (!Number.isFinite(concurrency)) {
    throw new Error(`Invalid concurrency: ${concurrency}`);
  }

  // Rejections fail the whole map; callers wanting partial progress handle errors inside `fn`.
  const max = Math.max(1, Math.floor(concurrency));
  const results: TOut[] = new Array(items.length);
  // Workers pull from one shared iterator, so each index is claimed exactly once.
  const entries = items.entries();

  async function worker(): Promise<void> {
    for (const [index, item] of entries) {
      results[index] = await fn(item, index);
    }
  }

  await Promise.all(
    Array.from({ length: Math.min(max, items.length) }, () => worker()),
  );
  return results;
}
