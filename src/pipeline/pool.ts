/**
 * Run `worker` over `items` with at most `concurrency` calls in flight.
 * Results land in a slot array aligned with `items`, whatever the completion order.
 */
export async function runPool<T, R>(
    items: readonly T[],
    concurrency: number,
    worker: (item: T, position: number) => Promise<R>
): Promise<R[]> {
    const slots = new Array<R>(items.length);
    let next = 0;

    async function drain() {
        while (next < items.length) {
            // Claim before awaiting so no two workers own the same position
            const position = next++;
            slots[position] = await worker(items[position], position);
        }
    }

    const size = Math.max(1, Math.min(Math.floor(concurrency) || 1, items.length));
    const workers: Promise<void>[] = [];
    for (let i = 0; i < size; i++) {
        workers.push(drain());
    }
    await Promise.all(workers);
    return slots;
}
