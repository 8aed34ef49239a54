// src/utils/concurrency.ts

/**
 * Maps `items` through `worker` with at most `limit` calls in flight.
 * Results keep the input order whatever order the calls finish in.
 */
export async function mapConcurrent<T, R>(
    items: readonly T[],
    limit: number,
    worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
    const results = new Array<R>(items.length);
    let next = 0;
    const runners = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, async () => {
        while (next < items.length) {
            const index = next++;
            results[index] = await worker(items[index], index);
        }
    });
    await Promise.all(runners);
    return results;
}
