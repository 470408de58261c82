/**
 * Stage Types
 *
 * A stage is one named unit of pipeline work backed by a single executor.
 * Executors report results as values; anything they throw is classified by
 * the executor itself so the runner knows whether to retry.
 */

import type { SessionHandle, DuplicateGuardKey } from '../ledger/types';

/**
 * transient: worth retrying (timeouts, rate limits, temporary unavailability)
 * permanent: retrying cannot help (credentials, malformed input, not found)
 * upstream: assigned by the orchestrator to stages skipped after a failure
 */
export type ErrorKind = 'transient' | 'permanent' | 'upstream';

export type SkipReason = 'upstream failure' | 'duplicate' | 'cancelled' | 'nothing to do';

export interface WorkWindow {
    start: Date;
    end: Date;
}

export type StageOutcome =
    | { readonly status: 'succeeded'; readonly summary: string; readonly attempts: number }
    | { readonly status: 'failed'; readonly kind: ErrorKind; readonly message: string; readonly attempts: number }
    | { readonly status: 'skipped'; readonly reason: SkipReason; readonly kind?: ErrorKind; readonly detail?: string };

export type StageResult =
    | { status: 'succeeded'; summary: string }
    | { status: 'failed'; kind: ErrorKind; message: string }
    | { status: 'skipped'; reason: SkipReason; detail?: string };

export interface RunContext {
    readonly runId: string;
    readonly pipeline: string;
    readonly window: Readonly<WorkWindow>;
    /** Outcomes recorded so far in this run, in stage order */
    readonly outcomes: ReadonlyMap<string, StageOutcome>;
    readonly allowOverwrite: boolean;
    readonly dryRun: boolean;
}

export interface StageExecutor {
    execute(ctx: RunContext, session?: SessionHandle): Promise<StageResult>;
    /** Decide whether an error thrown by execute() is worth retrying */
    classify(error: unknown): ErrorKind;
}

export interface StageDefinition {
    id: string;
    executor: StageExecutor;
    /** When true a failure here does not stop the stages after it */
    isolation: boolean;
    requiresSession: boolean;
    /** Session purpose to acquire; defaults to the stage id */
    sessionPurpose?: string;
    /** Present for stages that process a work window exactly once */
    guardKey?: (window: WorkWindow) => DuplicateGuardKey;
}

export const succeeded = (summary: string): StageResult => ({ status: 'succeeded', summary });

export const failed = (kind: ErrorKind, message: string): StageResult => ({ status: 'failed', kind, message });

export const skipped = (reason: SkipReason, detail?: string): StageResult => (
    detail === undefined ? { status: 'skipped', reason } : { status: 'skipped', reason, detail }
);
