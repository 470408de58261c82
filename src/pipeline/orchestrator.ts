/**
 * Pipeline Orchestrator
 *
 * Runs an ordered list of stages once. Stages execute strictly in order,
 * each after the previous one has a recorded outcome. A failed stage without
 * isolation stops the run and every stage after it is recorded as skipped.
 * Retrying is the runner's job; the orchestrator never repeats a stage.
 */

import * as Logging from '../logging';
import * as Stage from '../stage';
import type { SessionLedger } from '../ledger';
import type { SessionHandle } from '../ledger/types';
import * as Lock from '../ledger/lock';
import { ActiveRun, Notifier, RecordedOutcome, RunOptions, RunPhase, RunReport } from './types';
import * as Report from './report';
import * as Window from './window';

export interface OrchestratorConfig {
    ledger: SessionLedger;
    runner: Stage.StageRunner;
    notifier?: Notifier;
    clock?: () => Date;
}

export interface OrchestratorInstance {
    runOnce(stages: ReadonlyArray<Stage.StageDefinition>, options?: RunOptions): Promise<RunReport>;
    activeRuns(): ActiveRun[];
}

export const assertUniqueStageIds = (stages: ReadonlyArray<Stage.StageDefinition>): void => {
    const seen = new Set<string>();
    for (const stage of stages) {
        if (seen.has(stage.id)) {
            throw new Stage.DuplicateStageError(stage.id);
        }
        seen.add(stage.id);
    }
};

const pad = (n: number, width = 2) => n.toString().padStart(width, '0');

const formatRunTimestamp = (date: Date): string =>
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;

export const create = (config: OrchestratorConfig): OrchestratorInstance => {
    const logger = Logging.getLogger();
    const clock = config.clock ?? (() => new Date());
    const active = new Map<string, ActiveRun>();
    const guards = Lock.create();
    let sequence = 0;

    const nextRunId = (pipeline: string, startedAt: Date): string => {
        sequence++;
        return `${pipeline}-${formatRunTimestamp(startedAt)}-${pad(sequence, 3)}`;
    };

    const runGuarded = async (
        stage: Stage.StageDefinition,
        ctx: Stage.RunContext,
        key: string | undefined,
    ): Promise<Stage.StageOutcome> => {
        if (key !== undefined && !ctx.allowOverwrite) {
            let processed: boolean;
            try {
                processed = await config.ledger.isProcessed(key);
            } catch (error) {
                return { status: 'failed', kind: 'transient', message: `Duplicate guard unavailable: ${Stage.describeError(error)}`, attempts: 0 };
            }
            if (processed) {
                logger.info('Stage %s: %s already processed, skipping', stage.id, key);
                return { status: 'skipped', reason: 'duplicate', detail: key };
            }
        } else if (key !== undefined) {
            logger.info('Stage %s: overwrite requested for %s', stage.id, key);
        }

        let session: SessionHandle | undefined;
        if (stage.requiresSession) {
            const purpose = stage.sessionPurpose ?? stage.id;
            try {
                // A dry run uses the current session if there is one and never creates a thread
                session = ctx.dryRun
                    ? await config.ledger.peekSession(purpose)
                    : await config.ledger.acquireSession(purpose);
            } catch (error) {
                // Session creation is a network call; unless told otherwise it is worth another run
                const kind = error instanceof Stage.StageError ? error.kind : 'transient';
                const message = `Session acquisition failed for ${purpose}: ${Stage.describeError(error)}`;
                logger.error('Stage %s: %s', stage.id, message);
                return { status: 'failed', kind, message, attempts: 0 };
            }
        }

        const outcome = await config.runner.run(stage, ctx, session);

        if (outcome.status === 'succeeded' && key !== undefined && !ctx.dryRun) {
            try {
                await config.ledger.markProcessed(key);
            } catch (error) {
                logger.error('Stage %s succeeded but %s could not be marked as processed: %s',
                    stage.id, key, Stage.describeError(error));
            }
        }

        return outcome;
    };

    // A guard key is held from the processed check until the key is marked,
    // so a concurrent run of the same window waits and then sees it as a duplicate
    const runStage = (
        stage: Stage.StageDefinition,
        ctx: Stage.RunContext,
    ): Promise<Stage.StageOutcome> => {
        const key = stage.guardKey?.(ctx.window);
        if (key === undefined) {
            return runGuarded(stage, ctx, undefined);
        }
        if (guards.isLocked(key)) {
            logger.debug('Stage %s: waiting for another run holding %s', stage.id, key);
        }
        return guards.run(key, () => runGuarded(stage, ctx, key));
    };

    const notify = async (report: RunReport): Promise<void> => {
        if (!config.notifier) {
            return;
        }
        try {
            const delivered = await config.notifier.notify(report);
            if (!delivered) {
                logger.error('Notification for run %s was not delivered', report.runId);
            }
        } catch (error) {
            logger.error('Notification for run %s failed: %s', report.runId, Stage.describeError(error));
        }
    };

    const runOnce = async (
        stages: ReadonlyArray<Stage.StageDefinition>,
        options: RunOptions = {},
    ): Promise<RunReport> => {
        assertUniqueStageIds(stages);

        const startedAt = clock();
        const pipeline = options.pipeline ?? 'pipeline';
        const window = options.window ?? Window.dayWindow(startedAt);
        const runId = nextRunId(pipeline, startedAt);
        const outcomes = new Map<string, Stage.StageOutcome>();
        const recorded: RecordedOutcome[] = [];

        const ctx: Stage.RunContext = {
            runId,
            pipeline,
            window,
            outcomes,
            allowOverwrite: options.allowOverwrite ?? false,
            dryRun: options.dryRun ?? false,
        };

        const entry: ActiveRun = { runId, pipeline, state: { phase: 'pending' } };
        const transition = (state: RunPhase) => {
            entry.state = state;
            logger.debug('Run %s -> %s', runId, state.phase === 'running' ? `running(${state.stageId})` : state.phase);
        };
        active.set(runId, entry);

        const record = (stageId: string, outcome: Stage.StageOutcome) => {
            if (outcomes.has(stageId)) {
                throw new Error(`Outcome for stage ${stageId} already recorded in run ${runId}`);
            }
            const frozen = Object.freeze({ ...outcome });
            outcomes.set(stageId, frozen);
            recorded.push({ stageId, outcome: frozen });
        };

        logger.info('Run %s started (%d stages, window %s)', runId, stages.length, Window.describeWindow(window));

        try {
            let halt: Stage.StageOutcome | null = null;

            for (const [index, stage] of stages.entries()) {
                if (halt) {
                    record(stage.id, halt);
                    continue;
                }
                if (options.signal?.aborted) {
                    logger.info('Run %s: stop requested, skipping remaining stages from %s', runId, stage.id);
                    halt = { status: 'skipped', reason: 'cancelled' };
                    record(stage.id, halt);
                    continue;
                }

                transition({ phase: 'running', stageIndex: index, stageId: stage.id });
                const outcome = await runStage(stage, ctx);
                record(stage.id, outcome);

                if (outcome.status === 'failed' && !stage.isolation) {
                    logger.warn('Run %s: %s failed, skipping downstream stages', runId, stage.id);
                    halt = { status: 'skipped', reason: 'upstream failure', kind: 'upstream', detail: `${stage.id} failed` };
                } else if (outcome.status === 'failed') {
                    logger.warn('Run %s: %s failed, continuing (isolated stage)', runId, stage.id);
                }
            }
        } finally {
            transition({ phase: 'completed' });
            active.delete(runId);
        }

        const report = Report.build({
            runId,
            pipeline,
            window,
            outcomes: recorded,
            startedAt,
            finishedAt: clock(),
        });

        logger.info('Run %s finished: %s in %.1fs', runId, report.status, report.durationMs / 1000);
        await notify(report);
        return report;
    };

    const activeRuns = (): ActiveRun[] =>
        [...active.values()].map(run => ({ ...run }));

    return { runOnce, activeRuns };
};
