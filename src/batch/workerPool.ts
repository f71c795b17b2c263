/**
 * Bounded pool: runs `task` over `items` with at most `limit` tasks in flight.
 *
 * Results keep the order of `items`. A rejected task rejects the whole run, so tasks
 * that must not stop the batch should settle their own errors.
 */
export async function runPool<T, R>(items: readonly T[], limit: number, task: (item: T, index: number) => Promise<R>): Promise<R[]> {
    const results = new Array<R>(items.length);
    let next = 0;

    const worker = async (): Promise<void> => {
        while (next < items.length) {
            const index = next++;
            results[index] = await task(items[index], index);
        }
    };

    const size = Math.max(1, Math.min(limit, items.length));
    await Promise.all(Array.from({ length: size }, () => worker()));
    return results;
}
