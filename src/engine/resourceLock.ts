// src/engine/resourceLock.ts

/**
 * Keyed mutual exclusion
 *
 * Tasks sharing a key run one after another in call order; tasks on
 * different keys do not wait for each other. A key is dropped once its
 * last queued task settles.
 */
export class ResourceLock {
    private tails = new Map<string, Promise<void>>();

    runExclusive<T>(key: string, task: () => T | Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        const run = previous.then(task);

        // Next task waits for this one whether it succeeds or not
        const tail: Promise<void> = run
            .then(
                () => undefined,
                () => undefined
            )
            .then(() => {
                if (this.tails.get(key) === tail) {
                    this.tails.delete(key);
                }
            });
        this.tails.set(key, tail);

        return run;
    }

    isLocked(key: string): boolean {
        return this.tails.has(key);
    }

    get activeKeys(): number {
        return this.tails.size;
    }
}
