/**
 * Run Report
 *
 * Builds the immutable report at the end of a run and renders it as plain
 * text for logs and mail.
 */

import type { StageOutcome, WorkWindow } from '../stage/types';
import { RecordedOutcome, RunReport, RunStatus } from './types';
import { describeWindow } from './window';

/**
 * AllSucceeded when nothing failed (intentional skips count as fine),
 * PartialFailure when something failed but something else succeeded,
 * AllFailed otherwise.
 */
export const computeStatus = (outcomes: ReadonlyArray<StageOutcome>): RunStatus => {
    const failures = outcomes.filter(outcome => outcome.status === 'failed').length;
    if (failures === 0) {
        return 'AllSucceeded';
    }
    const successes = outcomes.filter(outcome => outcome.status === 'succeeded').length;
    return successes > 0 ? 'PartialFailure' : 'AllFailed';
};

export const build = (params: {
    runId: string;
    pipeline: string;
    window: WorkWindow;
    outcomes: RecordedOutcome[];
    startedAt: Date;
    finishedAt: Date;
}): RunReport => {
    const outcomes = Object.freeze(params.outcomes.map(recorded => Object.freeze({ ...recorded })));
    return Object.freeze({
        runId: params.runId,
        pipeline: params.pipeline,
        window: Object.freeze({ start: params.window.start, end: params.window.end }),
        outcomes,
        status: computeStatus(outcomes.map(recorded => recorded.outcome)),
        startedAt: params.startedAt,
        finishedAt: params.finishedAt,
        durationMs: params.finishedAt.getTime() - params.startedAt.getTime(),
    });
};

export const formatOutcome = ({ stageId, outcome }: RecordedOutcome): string => {
    switch (outcome.status) {
        case 'succeeded': {
            const attempts = outcome.attempts === 1 ? '1 attempt' : `${outcome.attempts} attempts`;
            return `[ok]      ${stageId}: ${outcome.summary} (${attempts})`;
        }
        case 'failed':
            return `[failed]  ${stageId}: ${outcome.kind} error after ${outcome.attempts} attempt(s): ${outcome.message}`;
        case 'skipped':
            return outcome.detail
                ? `[skipped] ${stageId}: ${outcome.reason} (${outcome.detail})`
                : `[skipped] ${stageId}: ${outcome.reason}`;
    }
};

export const formatReport = (report: RunReport): string => {
    const lines = [
        `Run ${report.runId}: ${report.status}`,
        `Pipeline: ${report.pipeline}`,
        `Window: ${describeWindow(report.window)}`,
        `Duration: ${(report.durationMs / 1000).toFixed(1)}s`,
        '',
        ...report.outcomes.map(formatOutcome),
    ];
    return lines.join('\n');
};

export const failedStages = (report: RunReport): string[] =>
    report.outcomes
        .filter(recorded => recorded.outcome.status === 'failed')
        .map(recorded => recorded.stageId);
