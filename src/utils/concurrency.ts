// src/utils/concurrency.ts

/**
 * Run `worker` over `items` with at most `limit` in flight.
 * Results keep input order.
 */
export async function runWithConcurrency<T, R>(
    items: readonly T[],
    limit: number,
    worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
    const results: R[] = new Array(items.length);
    let next = 0;

    const lanes = Math.max(1, Math.min(limit, items.length));
    const runLane = async (): Promise<void> => {
        while (next < items.length) {
            const index = next++;
            results[index] = await worker(items[index], index);
        }
    };

    await Promise.all(Array.from({ length: lanes }, runLane));
    return results;
}
