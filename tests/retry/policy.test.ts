import { describe, it, expect } from 'vitest';
import * as Retry from '../../src/retry';

describe('Retry Policy', () => {
    const policy = Retry.create({ maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 60000 });

    describe('decide', () => {
        it('should retry transient errors with exponential delays', () => {
            expect(policy.decide(1, 'transient')).toEqual({ action: 'retry', delayMs: 1000 });
            expect(policy.decide(2, 'transient')).toEqual({ action: 'retry', delayMs: 2000 });
        });

        it('should abort once the attempt budget is spent', () => {
            expect(policy.decide(3, 'transient')).toEqual({ action: 'abort' });
            expect(policy.decide(4, 'transient')).toEqual({ action: 'abort' });
        });

        it('should never retry permanent or upstream errors', () => {
            expect(policy.decide(1, 'permanent')).toEqual({ action: 'abort' });
            expect(policy.decide(1, 'upstream')).toEqual({ action: 'abort' });
        });

        it('should abort on the first failure when maxAttempts is 1', () => {
            const single = Retry.create({ maxAttempts: 1, baseDelayMs: 1000, maxDelayMs: 60000 });
            expect(single.decide(1, 'transient')).toEqual({ action: 'abort' });
        });
    });

    describe('delayFor', () => {
        it('should double per attempt and cap at maxDelayMs', () => {
            const capped = Retry.create({ maxAttempts: 10, baseDelayMs: 1000, maxDelayMs: 5000 });
            expect([1, 2, 3, 4, 5].map(capped.delayFor)).toEqual([1000, 2000, 4000, 5000, 5000]);
        });

        it('should allow a zero base delay', () => {
            const immediate = Retry.create({ maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 });
            expect(immediate.decide(1, 'transient')).toEqual({ action: 'retry', delayMs: 0 });
        });
    });

    describe('validation', () => {
        it('should reject maxAttempts below 1', () => {
            expect(() => Retry.create({ maxAttempts: 0, baseDelayMs: 1000, maxDelayMs: 60000 }))
                .toThrow('Invalid maxAttempts: 0. Must be an integer >= 1.');
        });

        it('should reject a negative base delay', () => {
            expect(() => Retry.create({ maxAttempts: 3, baseDelayMs: -1, maxDelayMs: 60000 }))
                .toThrow('Invalid baseDelayMs: -1. Must be a non-negative number.');
        });

        it('should reject maxDelayMs below baseDelayMs', () => {
            expect(() => Retry.create({ maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 500 }))
                .toThrow('Invalid maxDelayMs: 500. Must be >= baseDelayMs (1000).');
        });

        it('should not be affected by later changes to the config object', () => {
            const config = { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 60000 };
            const frozen = Retry.create(config);
            config.maxAttempts = 10;
            expect(frozen.config.maxAttempts).toBe(3);
        });
    });
});
