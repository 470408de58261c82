/**
 * Session Ledger
 *
 * Entry point for session rotation and the duplicate-submission guard.
 */

import * as Ledger from './ledger';
import * as Store from './store';

export type SessionLedger = Ledger.LedgerInstance;
export type { LedgerConfig } from './ledger';
export type { FileStoreConfig } from './store';

export const create = Ledger.create;
export const isValid = Ledger.isValid;
export const createFileStore = Store.createFileStore;
export const createMemoryStore = Store.createMemoryStore;

export * from './types';
