/**
 * Pipeline Types
 *
 * Types for one orchestration run: the options a caller passes, the report
 * produced at the end, and the notifier the report is handed to.
 */

import type { StageOutcome, WorkWindow } from '../stage/types';

export type RunStatus = 'AllSucceeded' | 'PartialFailure' | 'AllFailed';

export type RunPhase =
    | { phase: 'pending' }
    | { phase: 'running'; stageIndex: number; stageId: string }
    | { phase: 'completed' };

export interface RunOptions {
    /** Name used in run ids, logs and the run history */
    pipeline?: string;
    window?: WorkWindow;
    /** Process guarded work windows even if they were already processed */
    allowOverwrite?: boolean;
    /** Checked between stages; a running stage is never interrupted */
    signal?: AbortSignal;
    dryRun?: boolean;
}

export interface RecordedOutcome {
    readonly stageId: string;
    readonly outcome: StageOutcome;
}

export interface RunReport {
    readonly runId: string;
    readonly pipeline: string;
    readonly window: Readonly<WorkWindow>;
    readonly outcomes: ReadonlyArray<RecordedOutcome>;
    readonly status: RunStatus;
    readonly startedAt: Date;
    readonly finishedAt: Date;
    readonly durationMs: number;
}

export interface Notifier {
    /** Best effort; false or a rejection is logged and never changes the run */
    notify(report: RunReport): Promise<boolean>;
}

export interface ActiveRun {
    runId: string;
    pipeline: string;
    state: RunPhase;
}
