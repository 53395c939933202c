/**
 * Serializes async critical sections on a single promise chain.
 *
 * The engine's position/order maps are mutated across awaits by two
 * independent loops; every mutation path runs through one SerialLock.
 */
export class SerialLock {
    private tail: Promise<void> = Promise.resolve();
    private pending = 0;

    async runExclusive<T>(task: () => Promise<T>): Promise<T> {
        const previous = this.tail;
        let release: () => void = () => undefined;
        this.tail = new Promise<void>(resolve => {
            release = resolve;
        });
        this.pending++;

        try {
            await previous;
            return await task();
        } finally {
            this.pending--;
            release();
        }
    }

    isLocked(): boolean {
        return this.pending > 0;
    }
}
