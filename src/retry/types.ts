/**
 * Retry Policy Types
 */

import type { ErrorKind } from '../stage/types';

export interface RetryConfig {
    /** Total attempts including the first one (>= 1) */
    maxAttempts: number;
    baseDelayMs: number;
    /** Ceiling applied to the exponential backoff */
    maxDelayMs: number;
}

export type RetryDecision =
    | { action: 'retry'; delayMs: number }
    | { action: 'abort' };

export type { ErrorKind };
