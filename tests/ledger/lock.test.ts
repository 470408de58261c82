import { describe, it, expect } from 'vitest';
import * as Lock from '../../src/ledger/lock';

const deferred = () => {
    let resolve: () => void = () => undefined;
    const promise = new Promise<void>((r) => { resolve = r; });
    return { promise, resolve };
};

describe('Keyed Lock', () => {
    it('should run tasks for the same key one after another', async () => {
        const lock = Lock.create();
        const events: string[] = [];
        const gate = deferred();

        const first = lock.run('k', async () => {
            events.push('first:start');
            await gate.promise;
            events.push('first:end');
        });
        const second = lock.run('k', async () => {
            events.push('second');
        });

        await Promise.resolve();
        expect(events).toEqual(['first:start']);

        gate.resolve();
        await Promise.all([first, second]);
        expect(events).toEqual(['first:start', 'first:end', 'second']);
    });

    it('should not hold up tasks for other keys', async () => {
        const lock = Lock.create();
        const gate = deferred();

        const blocked = lock.run('a', () => gate.promise);
        const other = await lock.run('b', async () => 'done');

        expect(other).toBe('done');
        gate.resolve();
        await blocked;
    });

    it('should keep the chain going after a task rejects', async () => {
        const lock = Lock.create();

        const failing = lock.run('k', async () => { throw new Error('task failed'); });
        const next = lock.run('k', async () => 'recovered');

        await expect(failing).rejects.toThrow('task failed');
        await expect(next).resolves.toBe('recovered');
    });

    it('should release the key once the queue drains', async () => {
        const lock = Lock.create();

        const task = lock.run('k', async () => 1);
        expect(lock.isLocked('k')).toBe(true);

        await task;
        // The tail clean-up runs one tick after the task settles
        await new Promise((resolve) => setTimeout(resolve, 0));
        expect(lock.isLocked('k')).toBe(false);
    });
});
