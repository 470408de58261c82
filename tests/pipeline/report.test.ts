import { describe, it, expect } from 'vitest';
import * as Report from '../../src/pipeline/report';
import type { RecordedOutcome } from '../../src/pipeline/types';

const window = {
    start: new Date('2026-10-19T00:00:00.000Z'),
    end: new Date('2026-10-19T23:59:59.999Z'),
};

const build = (outcomes: RecordedOutcome[]) => Report.build({
    runId: 'digest-20261019-235500-001',
    pipeline: 'digest',
    window,
    outcomes,
    startedAt: new Date('2026-10-19T23:55:00.000Z'),
    finishedAt: new Date('2026-10-19T23:55:12.340Z'),
});

describe('Run Report', () => {
    describe('computeStatus', () => {
        it('should be AllSucceeded when nothing failed', () => {
            expect(Report.computeStatus([])).toBe('AllSucceeded');
            expect(Report.computeStatus([
                { status: 'succeeded', summary: 'ok', attempts: 1 },
                { status: 'skipped', reason: 'duplicate' },
            ])).toBe('AllSucceeded');
        });

        it('should be PartialFailure when something failed and something succeeded', () => {
            expect(Report.computeStatus([
                { status: 'succeeded', summary: 'ok', attempts: 1 },
                { status: 'failed', kind: 'permanent', message: 'no', attempts: 1 },
                { status: 'skipped', reason: 'upstream failure', kind: 'upstream' },
            ])).toBe('PartialFailure');
        });

        it('should be AllFailed when failures come with nothing successful', () => {
            expect(Report.computeStatus([
                { status: 'failed', kind: 'transient', message: 'timeout', attempts: 3 },
                { status: 'skipped', reason: 'upstream failure', kind: 'upstream' },
            ])).toBe('AllFailed');
        });
    });

    describe('build', () => {
        it('should compute duration and status', () => {
            const report = build([{ stageId: 'summarize', outcome: { status: 'succeeded', summary: 'ok', attempts: 1 } }]);

            expect(report.durationMs).toBe(12340);
            expect(report.status).toBe('AllSucceeded');
            expect(Object.isFrozen(report.window)).toBe(true);
        });
    });

    describe('formatReport', () => {
        it('should render one line per stage', () => {
            const report = build([
                { stageId: 'summarize', outcome: { status: 'succeeded', summary: 'summarized 3 transcripts', attempts: 2 } },
                { stageId: 'email', outcome: { status: 'failed', kind: 'transient', message: 'connection refused', attempts: 3 } },
                { stageId: 'archive', outcome: { status: 'skipped', reason: 'upstream failure', kind: 'upstream', detail: 'email failed' } },
            ]);

            expect(Report.formatReport(report)).toBe([
                'Run digest-20261019-235500-001: PartialFailure',
                'Pipeline: digest',
                'Window: 2026-10-19',
                'Duration: 12.3s',
                '',
                '[ok]      summarize: summarized 3 transcripts (2 attempts)',
                '[failed]  email: transient error after 3 attempt(s): connection refused',
                '[skipped] archive: upstream failure (email failed)',
            ].join('\n'));
        });

        it('should leave out a missing skip detail', () => {
            expect(Report.formatOutcome({ stageId: 'b', outcome: { status: 'skipped', reason: 'cancelled' } }))
                .toBe('[skipped] b: cancelled');
            expect(Report.formatOutcome({ stageId: 'a', outcome: { status: 'succeeded', summary: 'ok', attempts: 1 } }))
                .toBe('[ok]      a: ok (1 attempt)');
        });
    });

    describe('failedStages', () => {
        it('should list only stages that failed', () => {
            const report = build([
                { stageId: 'acquire', outcome: { status: 'failed', kind: 'transient', message: 'offline', attempts: 3 } },
                { stageId: 'transcribe', outcome: { status: 'succeeded', summary: 'ok', attempts: 1 } },
            ]);

            expect(Report.failedStages(report)).toEqual(['acquire']);
        });
    });
});
