/**
 * Retry Policy
 *
 * Pure decision function used by the stage runner: given how many attempts
 * have been made and what kind of error the last one produced, retry after a
 * delay or give up.
 */

import { ErrorKind, RetryConfig, RetryDecision } from './types';

export interface PolicyInstance {
    readonly config: Readonly<RetryConfig>;
    decide(attempt: number, errorKind: ErrorKind): RetryDecision;
    delayFor(attempt: number): number;
}

const validate = (config: RetryConfig): void => {
    if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
        throw new Error(`Invalid maxAttempts: ${config.maxAttempts}. Must be an integer >= 1.`);
    }
    if (!Number.isFinite(config.baseDelayMs) || config.baseDelayMs < 0) {
        throw new Error(`Invalid baseDelayMs: ${config.baseDelayMs}. Must be a non-negative number.`);
    }
    if (!Number.isFinite(config.maxDelayMs) || config.maxDelayMs < config.baseDelayMs) {
        throw new Error(`Invalid maxDelayMs: ${config.maxDelayMs}. Must be >= baseDelayMs (${config.baseDelayMs}).`);
    }
};

export const create = (config: RetryConfig): PolicyInstance => {
    validate(config);
    const frozen = Object.freeze({ ...config });

    // baseDelay * 2^(attempt-1), capped
    const delayFor = (attempt: number): number => {
        const exponent = Math.max(attempt - 1, 0);
        return Math.min(frozen.baseDelayMs * 2 ** exponent, frozen.maxDelayMs);
    };

    const decide = (attempt: number, errorKind: ErrorKind): RetryDecision => {
        if (errorKind !== 'transient') {
            return { action: 'abort' };
        }
        if (attempt >= frozen.maxAttempts) {
            return { action: 'abort' };
        }
        return { action: 'retry', delayMs: delayFor(attempt) };
    };

    return {
        config: frozen,
        decide,
        delayFor,
    };
};
