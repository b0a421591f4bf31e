/**
 * Serializes async critical sections per key. Sections for different keys
 * run concurrently; there is no global lock.
 */
export class KeyedMutex {
    private readonly tails = new Map<string, Promise<void>>();

    async runExclusive<T>(key: string, section: () => Promise<T> | T): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();

        let release: () => void = () => undefined;
        const current = new Promise<void>((resolve) => {
            release = resolve;
        });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);

        await previous;
        try {
            return await section();
        } finally {
            release();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }

    isLocked(key: string): boolean {
        return this.tails.has(key);
    }
}
