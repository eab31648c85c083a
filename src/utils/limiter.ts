export type Limit = <T>(task: () => Promise<T>) => Promise<T>;

/**
 * Bounded worker pool. At most `max` tasks hold a slot; later callers wait in
 * FIFO order and a finishing task hands its slot straight to the next waiter.
 */
export function createLimiter(max: number): Limit {
    if (!Number.isInteger(max) || max < 1) throw new RangeError(`Concurrency must be a positive integer, got ${max}`);
    let busy = 0;
    const waiters: (() => void)[] = [];

    const acquire = async () => {
        if (busy < max) {
            busy++;
            return;
        }
        await new Promise<void>((wake) => waiters.push(wake));
    };
    const release = () => {
        const wake = waiters.shift();
        if (wake) wake();
        else busy--;
    };

    return async <T>(task: () => Promise<T>): Promise<T> => {
        await acquire();
        try {
            return await task();
        } finally {
            release();
        }
    };
}
