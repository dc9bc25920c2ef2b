/**
 * Map items through an async function with at most `limit` calls in flight.
 * Results keep the input order. After the first failure no new calls start
 * and the returned promise rejects with that failure.
 */
export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    limit: number,
    fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
    const results = new Array<R>(items.length);
    let next = 0;
    let failed = false;

    const worker = async (): Promise<void> => {
        while (!failed && next < items.length) {
            const index = next++;
            try {
                results[index] = await fn(items[index], index);
            } catch (err) {
                failed = true;
                throw err;
            }
        }
    };

    const workers = Array.from({ length: Math.min(Math.max(limit, 1), items.length) }, () => worker());
    await Promise.all(workers);
    return results;
}
