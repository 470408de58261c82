import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Mock } from 'vitest';
import * as Ledger from '../../src/ledger';

vi.mock('../../src/logging', () => ({
    getLogger: () => ({
        info: vi.fn(),
        debug: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    }),
}));

const DAY = 24 * 60 * 60 * 1000;

describe('Session Ledger', () => {
    let now: Date;
    let counter: number;
    let store: Ledger.LedgerStore;
    let factory: {
        create: Mock<(purpose: string) => Promise<Ledger.SessionHandle>>;
        retire: Mock<(handle: Ledger.SessionHandle) => Promise<void>>;
    };
    let ledger: Ledger.SessionLedger;

    beforeEach(() => {
        now = new Date('2026-10-01T08:00:00Z');
        counter = 0;
        store = Ledger.createMemoryStore();
        factory = {
            create: vi.fn(async (purpose: string) => {
                counter++;
                return { id: `thread-${counter}`, purpose, createdAt: now, retentionMs: 30 * DAY };
            }),
            retire: vi.fn(async (_handle: Ledger.SessionHandle) => undefined),
        };
        ledger = Ledger.create({ store, factory, clock: () => now });
    });

    describe('acquireSession', () => {
        it('should create a session when none exists', async () => {
            const handle = await ledger.acquireSession('summary-thread');

            expect(handle.id).toBe('thread-1');
            expect(handle.purpose).toBe('summary-thread');
            expect(factory.create).toHaveBeenCalledWith('summary-thread');
            expect(await store.loadSession('summary-thread')).toEqual(handle);
        });

        it('should reuse the session while it is within its retention', async () => {
            const first = await ledger.acquireSession('summary-thread');
            now = new Date(now.getTime() + 29 * DAY);

            const second = await ledger.acquireSession('summary-thread');

            expect(second.id).toBe(first.id);
            expect(factory.create).toHaveBeenCalledTimes(1);
        });

        it('should rotate the session once it has outlived its retention', async () => {
            const first = await ledger.acquireSession('summary-thread');
            now = new Date(now.getTime() + 31 * DAY);

            const second = await ledger.acquireSession('summary-thread');

            expect(second.id).toBe('thread-2');
            expect(factory.create).toHaveBeenCalledTimes(2);
            expect(factory.retire).toHaveBeenCalledWith(first);
            expect((await store.loadSession('summary-thread'))?.id).toBe('thread-2');
        });

        it('should treat a session exactly at its retention as expired', async () => {
            await ledger.acquireSession('summary-thread');
            now = new Date(now.getTime() + 30 * DAY);

            const second = await ledger.acquireSession('summary-thread');

            expect(second.id).toBe('thread-2');
        });

        it('should keep the new session when retiring the old one fails', async () => {
            await ledger.acquireSession('summary-thread');
            factory.retire.mockRejectedValueOnce(new Error('thread already gone'));
            now = new Date(now.getTime() + 31 * DAY);

            const second = await ledger.acquireSession('summary-thread');

            expect(second.id).toBe('thread-2');
        });

        it('should create only one session for concurrent callers', async () => {
            const handles = await Promise.all([
                ledger.acquireSession('summary-thread'),
                ledger.acquireSession('summary-thread'),
                ledger.acquireSession('summary-thread'),
            ]);

            expect(factory.create).toHaveBeenCalledTimes(1);
            expect(new Set(handles.map(handle => handle.id))).toEqual(new Set(['thread-1']));
        });

        it('should keep sessions of different purposes apart', async () => {
            const a = await ledger.acquireSession('a');
            const b = await ledger.acquireSession('b');

            expect(a.id).toBe('thread-1');
            expect(b.id).toBe('thread-2');
        });

        it('should propagate factory failures and store nothing', async () => {
            factory.create.mockRejectedValueOnce(new Error('provider down'));

            await expect(ledger.acquireSession('summary-thread')).rejects.toThrow('provider down');
            expect(await store.loadSession('summary-thread')).toBeUndefined();
        });
    });

    describe('peekSession', () => {
        it('should return the current session without creating one', async () => {
            expect(await ledger.peekSession('summary-thread')).toBeUndefined();
            const handle = await ledger.acquireSession('summary-thread');

            expect(await ledger.peekSession('summary-thread')).toEqual(handle);
            expect(factory.create).toHaveBeenCalledTimes(1);
        });

        it('should hide an expired session', async () => {
            await ledger.acquireSession('summary-thread');
            now = new Date(now.getTime() + 31 * DAY);

            expect(await ledger.peekSession('summary-thread')).toBeUndefined();
        });
    });

    describe('invalidateSession', () => {
        it('should drop and retire the session so the next acquire creates a new one', async () => {
            const first = await ledger.acquireSession('summary-thread');

            expect(await ledger.invalidateSession('summary-thread')).toBe(true);
            expect(factory.retire).toHaveBeenCalledWith(first);

            const second = await ledger.acquireSession('summary-thread');
            expect(second.id).toBe('thread-2');
        });

        it('should report false when there is no session', async () => {
            expect(await ledger.invalidateSession('summary-thread')).toBe(false);
            expect(factory.retire).not.toHaveBeenCalled();
        });
    });

    describe('duplicate guard', () => {
        it('should record a processed key', async () => {
            expect(await ledger.isProcessed('summary:2026-10-01')).toBe(false);

            expect(await ledger.markProcessed('summary:2026-10-01')).toBe(true);

            expect(await ledger.isProcessed('summary:2026-10-01')).toBe(true);
            expect(await ledger.isProcessed('summary:2026-10-02')).toBe(false);
        });

        it('should be idempotent when marking a key twice', async () => {
            expect(await ledger.markProcessed('summary:2026-10-01')).toBe(true);
            expect(await ledger.markProcessed('summary:2026-10-01')).toBe(false);
            expect(await ledger.isProcessed('summary:2026-10-01')).toBe(true);
        });

        it('should let exactly one of several concurrent callers mark a key', async () => {
            const results = await Promise.all([
                ledger.markProcessed('summary:2026-10-01'),
                ledger.markProcessed('summary:2026-10-01'),
                ledger.markProcessed('summary:2026-10-01'),
            ]);

            expect(results.filter(Boolean)).toHaveLength(1);
        });
    });

    describe('isValid', () => {
        it('should compare the age with the retention', () => {
            const handle = { id: 't', purpose: 'p', createdAt: new Date(0), retentionMs: 1000 };
            expect(Ledger.isValid(handle, new Date(999))).toBe(true);
            expect(Ledger.isValid(handle, new Date(1000))).toBe(false);
        });
    });
});
