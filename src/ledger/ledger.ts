/**
 * Session Ledger
 *
 * Owns the long-lived external session handles (one valid handle per
 * purpose, rotated once it outlives its retention) and the duplicate guard
 * that records which work windows have been processed.
 *
 * All access for a given purpose or key is serialized through a keyed lock,
 * so two concurrent callers never both create a session or both claim a key.
 */

import * as Logging from '../logging';
import * as Lock from './lock';
import { DuplicateGuardKey, LedgerStore, SessionFactory, SessionHandle } from './types';

export interface LedgerConfig {
    store: LedgerStore;
    factory: SessionFactory;
    clock?: () => Date;
}

export interface LedgerInstance {
    acquireSession(purpose: string): Promise<SessionHandle>;
    /** Current handle without creating one; undefined when missing or expired */
    peekSession(purpose: string): Promise<SessionHandle | undefined>;
    invalidateSession(purpose: string): Promise<boolean>;
    isProcessed(key: DuplicateGuardKey): Promise<boolean>;
    /** Resolves true when this call marked the key, false when it was already marked */
    markProcessed(key: DuplicateGuardKey): Promise<boolean>;
}

export const isValid = (handle: SessionHandle, now: Date): boolean =>
    now.getTime() - handle.createdAt.getTime() < handle.retentionMs;

export const create = (config: LedgerConfig): LedgerInstance => {
    const logger = Logging.getLogger();
    const clock = config.clock ?? (() => new Date());
    const lock = Lock.create();

    const retire = async (handle: SessionHandle): Promise<void> => {
        if (!config.factory.retire) {
            return;
        }
        try {
            await config.factory.retire(handle);
            logger.debug('Retired session %s (%s)', handle.id, handle.purpose);
        } catch (error) {
            logger.warn('Failed to retire session %s (%s): %s', handle.id, handle.purpose, error instanceof Error ? error.message : String(error));
        }
    };

    const acquireSession = (purpose: string): Promise<SessionHandle> =>
        lock.run(`session:${purpose}`, async () => {
            const current = await config.store.loadSession(purpose);
            const now = clock();

            if (current && isValid(current, now)) {
                const ageDays = (now.getTime() - current.createdAt.getTime()) / 86400000;
                logger.debug('Reusing session %s for %s (age %.1f days)', current.id, purpose, ageDays);
                return current;
            }

            if (current) {
                logger.info('Session %s for %s exceeded its retention, rotating', current.id, purpose);
            } else {
                logger.info('No session for %s, creating one', purpose);
            }

            const created = await config.factory.create(purpose);
            const handle: SessionHandle = { ...created, purpose };
            await config.store.saveSession(handle);
            logger.info('Created session %s for %s', handle.id, purpose);

            if (current && current.id !== handle.id) {
                await retire(current);
            }
            return handle;
        });

    const peekSession = (purpose: string): Promise<SessionHandle | undefined> =>
        lock.run(`session:${purpose}`, async () => {
            const current = await config.store.loadSession(purpose);
            return current && isValid(current, clock()) ? current : undefined;
        });

    const invalidateSession = (purpose: string): Promise<boolean> =>
        lock.run(`session:${purpose}`, async () => {
            const current = await config.store.loadSession(purpose);
            if (!current) {
                return false;
            }
            await config.store.removeSession(purpose);
            logger.info('Invalidated session %s for %s', current.id, purpose);
            await retire(current);
            return true;
        });

    const isProcessed = (key: DuplicateGuardKey): Promise<boolean> =>
        lock.run(`key:${key}`, () => config.store.load(key));

    const markProcessed = (key: DuplicateGuardKey): Promise<boolean> =>
        lock.run(`key:${key}`, async () => {
            if (await config.store.load(key)) {
                logger.debug('Key %s already processed', key);
                return false;
            }
            await config.store.store(key);
            logger.debug('Marked %s as processed', key);
            return true;
        });

    return {
        acquireSession,
        peekSession,
        invalidateSession,
        isProcessed,
        markProcessed,
    };
};
