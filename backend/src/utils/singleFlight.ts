/**
 * Keyed single-flight: while an operation for a key is in flight, further
 * callers for that key join the same promise instead of starting a new run.
 */
export interface SingleFlight<T> {
    run(key: string, operation: () => Promise<T>): Promise<T>;
    isInFlight(key: string): boolean;
}

export function createSingleFlight<T>(): SingleFlight<T> {
    const inFlight = new Map<string, Promise<T>>();

    return {
        run(key: string, operation: () => Promise<T>): Promise<T> {
            const existing = inFlight.get(key);
            if (existing) {
                return existing;
            }

            const pending = operation().finally(() => {
                inFlight.delete(key);
            });
            inFlight.set(key, pending);
            return pending;
        },
        isInFlight: (key: string) => inFlight.has(key),
    };
}
