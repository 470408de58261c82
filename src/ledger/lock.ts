/**
 * Keyed Lock
 *
 * Serializes async tasks per key. Tasks for different keys run
 * independently; tasks for the same key run one after another in call order.
 * Not reentrant: a task must not run() the key it already holds.
 */

export interface LockInstance {
    run<T>(key: string, task: () => Promise<T>): Promise<T>;
    isLocked(key: string): boolean;
}

export const create = (): LockInstance => {
    const tails = new Map<string, Promise<void>>();

    const run = <T>(key: string, task: () => Promise<T>): Promise<T> => {
        const previous = tails.get(key) ?? Promise.resolve();
        const result = previous.then(task);

        const tail: Promise<void> = result
            .then(() => undefined, () => undefined)
            .then(() => {
                if (tails.get(key) === tail) {
                    tails.delete(key);
                }
            });
        tails.set(key, tail);

        return result;
    };

    const isLocked = (key: string): boolean => tails.has(key);

    return { run, isLocked };
};
