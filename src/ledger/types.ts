/**
 * Session Ledger Types
 */

export interface SessionHandle {
    /** Identifier issued by the external provider (e.g. an assistant thread id) */
    id: string;
    purpose: string;
    createdAt: Date;
    retentionMs: number;
}

/** Deterministic key for a work window, e.g. `summary:2026-10-19` */
export type DuplicateGuardKey = string;

export interface SessionFactory {
    create(purpose: string): Promise<SessionHandle>;
    /** Called with a handle that has been replaced or invalidated */
    retire?(handle: SessionHandle): Promise<void>;
}

/**
 * Persistence used by the ledger. load/store are the duplicate guard;
 * implementations must be durable across crashes.
 */
export interface LedgerStore {
    loadSession(purpose: string): Promise<SessionHandle | undefined>;
    saveSession(handle: SessionHandle): Promise<void>;
    removeSession(purpose: string): Promise<void>;
    load(key: DuplicateGuardKey): Promise<boolean>;
    store(key: DuplicateGuardKey): Promise<void>;
}
