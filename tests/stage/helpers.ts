import { vi } from 'vitest';
import * as Stage from '../../src/stage';

export const window: Stage.WorkWindow = {
    start: new Date(2026, 9, 19, 0, 0, 0, 0),
    end: new Date(2026, 9, 19, 23, 59, 59, 999),
};

export const context = (overrides: Partial<Stage.RunContext> = {}): Stage.RunContext => ({
    runId: 'test-run',
    pipeline: 'test',
    window,
    outcomes: new Map(),
    allowOverwrite: false,
    dryRun: false,
    ...overrides,
});

/** An executor that plays back the given results in order, throwing any Error it meets */
export const scripted = (...steps: Array<Stage.StageResult | Error>) => {
    const execute = vi.fn(async (): Promise<Stage.StageResult> => {
        const step = steps.length > 1 ? steps.shift() : steps[0];
        if (step === undefined) {
            throw new Error('No scripted result');
        }
        if (step instanceof Error) {
            throw step;
        }
        return step;
    });
    const executor: Stage.StageExecutor = { execute, classify: Stage.classifyError };
    return { executor, execute };
};

export const definition = (
    id: string,
    executor: Stage.StageExecutor,
    overrides: Partial<Stage.StageDefinition> = {},
): Stage.StageDefinition => ({
    id,
    executor,
    isolation: false,
    requiresSession: false,
    ...overrides,
});
