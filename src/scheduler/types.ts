/**
 * Scheduler Types
 */

import type { RunReport } from '../pipeline/types';

export interface TimeOfDay {
    hour: number;
    minute: number;
}

export type TriggerSpec =
    | { kind: 'interval'; everyMs: number; runImmediately?: boolean }
    | { kind: 'daily'; times: string[] };

export interface ScheduledJob {
    name: string;
    /** The signal is aborted when the scheduler stops; honour it between stages */
    run(signal: AbortSignal): Promise<RunReport>;
}

export type FireResult =
    | { status: 'completed'; report: RunReport }
    | { status: 'dropped' }
    | { status: 'failed'; error: unknown };

export interface SchedulerStats {
    fired: number;
    completed: number;
    dropped: number;
    failed: number;
}
