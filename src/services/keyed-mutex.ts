/**
 * FIFO lock per key. Used to serialize session-mutating work units.
 */
export class KeyedMutex {
    readonly #tails: Map<string, Promise<void>> = new Map();
    readonly #held: Set<string> = new Set();

    /** Resolves with a release function once the caller owns `key`. */
    async acquire(key: string): Promise<() => void> {
        const previous = this.#tails.get(key) ?? Promise.resolve();

        let release: () => void = () => undefined;
        const current = new Promise<void>((resolve) => {
            release = resolve;
        });
        const tail = previous.then(() => current);
        this.#tails.set(key, tail);

        await previous;
        this.#held.add(key);

        let released = false;
        return () => {
            if (released) return;
            released = true;
            this.#held.delete(key);
            if (this.#tails.get(key) === tail) {
                this.#tails.delete(key);
            }
            release();
        };
    }

    isLocked(key: string): boolean {
        return this.#held.has(key);
    }
}
