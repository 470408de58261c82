/**
 * Stage Runner
 *
 * Executes one stage under the retry policy and always returns a terminal
 * outcome. Nothing thrown by an executor escapes this module.
 */

import * as Logging from '../logging';
import * as Retry from '../retry';
import type { SessionHandle } from '../ledger/types';
import { ErrorKind, RunContext, StageDefinition, StageOutcome, StageResult } from './types';
import { describeError } from './errors';

export type Sleep = (ms: number) => Promise<void>;

export interface RunnerConfig {
    policy: Retry.RetryPolicy;
    /** Injected for tests; defaults to a timer-based wait */
    sleep?: Sleep;
}

export interface RunnerInstance {
    run(stage: StageDefinition, ctx: RunContext, session?: SessionHandle): Promise<StageOutcome>;
}

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export const create = (config: RunnerConfig): RunnerInstance => {
    const logger = Logging.getLogger();
    const sleep = config.sleep ?? defaultSleep;

    const classify = (stage: StageDefinition, error: unknown): ErrorKind => {
        try {
            return stage.executor.classify(error);
        } catch (classifyError) {
            logger.warn('Stage %s could not classify error (%s), treating as permanent', stage.id, describeError(classifyError));
            return 'permanent';
        }
    };

    const attempt = async (stage: StageDefinition, ctx: RunContext, session?: SessionHandle): Promise<StageResult> => {
        try {
            return await stage.executor.execute(ctx, session);
        } catch (error) {
            const kind = classify(stage, error);
            logger.debug('Stage %s threw %s error', stage.id, kind, { error: describeError(error) });
            return { status: 'failed', kind, message: describeError(error) };
        }
    };

    const run = async (stage: StageDefinition, ctx: RunContext, session?: SessionHandle): Promise<StageOutcome> => {
        let attempts = 0;

        for (;;) {
            attempts++;
            const result = await attempt(stage, ctx, session);

            if (result.status === 'succeeded') {
                return { status: 'succeeded', summary: result.summary, attempts };
            }
            if (result.status === 'skipped') {
                return result.detail === undefined
                    ? { status: 'skipped', reason: result.reason }
                    : { status: 'skipped', reason: result.reason, detail: result.detail };
            }

            const decision = config.policy.decide(attempts, result.kind);
            if (decision.action === 'abort') {
                logger.error('Stage %s failed after %d attempt(s): %s', stage.id, attempts, result.message);
                return { status: 'failed', kind: result.kind, message: result.message, attempts };
            }

            logger.warn('Stage %s attempt %d failed (%s), retrying in %dms: %s',
                stage.id, attempts, result.kind, decision.delayMs, result.message);
            await sleep(decision.delayMs);
        }
    };

    return { run };
};
