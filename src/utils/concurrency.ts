/**
 * Run async tasks with a fixed number of workers pulling from a shared queue.
 * At most `maxConcurrent` calls to `fn` are in flight at any moment; a new
 * item starts only when a running one settles.
 *
 * A rejection never stops the other workers. Outcomes are returned in input
 * order regardless of completion order.
 */
export async function runWithConcurrency<T, R>(
    items: readonly T[],
    fn: (item: T, index: number) => Promise<R>,
    maxConcurrent: number
): Promise<PromiseSettledResult<R>[]> {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
        throw new RangeError(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }

    const results: PromiseSettledResult<R>[] = new Array(items.length);
    const queue = items.map((item, index) => ({ item, index }));

    const worker = async (): Promise<void> => {
        while (queue.length > 0) {
            const entry = queue.shift();
            if (entry === undefined) break;
            const { item, index } = entry;
            try {
                results[index] = { status: "fulfilled", value: await fn(item, index) };
            } catch (reason) {
                results[index] = { status: "rejected", reason };
            }
        }
    };

    const workers: Promise<void>[] = [];
    for (let i = 0; i < Math.min(maxConcurrent, queue.length); i++) {
        workers.push(worker());
    }

    await Promise.all(workers);
    return results;
}
