/**
 * Request coalescing: concurrent callers for the same key share a single
 * in-flight operation. Success and failure both fan out to every waiter.
 */
export class InFlightRegistry<T> {
    private readonly inFlight = new Map<string, Promise<T>>();

    /**
     * Runs the operation unless one is already pending for the key, in which
     * case the pending promise is returned.
     * @returns The shared promise and whether this caller joined an existing one
     */
    run(key: string, operation: () => Promise<T>): { promise: Promise<T>; coalesced: boolean } {
        const pending = this.inFlight.get(key);
        if (pending) {
            return { promise: pending, coalesced: true };
        }

        const promise = Promise.resolve()
            .then(operation)
            .finally(() => {
                this.inFlight.delete(key);
            });
        this.inFlight.set(key, promise);
        return { promise, coalesced: false };
    }

    has(key: string): boolean {
        return this.inFlight.has(key);
    }

    size(): number {
        return this.inFlight.size;
    }
}
