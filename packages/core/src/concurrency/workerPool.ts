/**
 * Runs `worker` over `items` with at most `limit` calls in flight. Each worker slot pulls the next
 * unclaimed index once its previous call settles. Results come back in input order; `onSettled`
 * observes them in completion order.
 *
 * `worker` is expected to handle its own failures. A rejection stops the slot that hit it and
 * rejects the returned promise once the other slots drain.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  onSettled?: (result: R, index: number) => void
): Promise<R[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`)
  }
  const results = new Array<R>(items.length)
  let next = 0
  const slots = Array.from({ length: Math.min(limit, items.length) }, async () => {
    while (next < items.length) {
      const index = next++
      const result = await worker(items[index], index)
      results[index] = result
      onSettled?.(result, index)
    }
  })
  const settled = await Promise.allSettled(slots)
  const failure = settled.find((s): s is PromiseRejectedResult => s.status === 'rejected')
  if (failure) throw failure.reason
  return results
}
