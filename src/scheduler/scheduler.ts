/**
 * Scheduler
 *
 * Fires a job at each trigger instant. At most one run is in flight: a
 * trigger that arrives while the previous run is still going is dropped and
 * logged, never queued. Stopping aborts the in-flight run at its next stage
 * boundary and waits for it to finish.
 */

import * as Logging from '../logging';
import * as Trigger from './trigger';
import { FireResult, ScheduledJob, SchedulerStats, TriggerSpec } from './types';

export interface SchedulerConfig {
    clock?: () => Date;
}

export interface SchedulerInstance {
    start(trigger: TriggerSpec, job: ScheduledJob): void;
    /** Trigger a run now, under the same overlap rule as timed triggers */
    fire(): Promise<FireResult>;
    stop(): Promise<void>;
    isRunning(): boolean;
    nextFireAt(): Date | null;
    stats(): SchedulerStats;
}

interface InFlight {
    controller: AbortController;
    done: Promise<FireResult>;
}

export const create = (config: SchedulerConfig = {}): SchedulerInstance => {
    const logger = Logging.getLogger();
    const clock = config.clock ?? (() => new Date());

    let job: ScheduledJob | null = null;
    let trigger: TriggerSpec | null = null;
    let timer: ReturnType<typeof setTimeout> | null = null;
    let nextAt: Date | null = null;
    let stopped = false;
    let busy = false;
    let current: InFlight | null = null;
    const counters: SchedulerStats = { fired: 0, completed: 0, dropped: 0, failed: 0 };

    const execute = async (target: ScheduledJob, controller: AbortController): Promise<FireResult> => {
        try {
            const report = await target.run(controller.signal);
            counters.completed++;
            return { status: 'completed', report };
        } catch (error) {
            counters.failed++;
            logger.error('Scheduled run of %s failed: %s', target.name, error instanceof Error ? error.message : String(error));
            return { status: 'failed', error };
        } finally {
            busy = false;
            current = null;
        }
    };

    const fire = (): Promise<FireResult> => {
        if (!job) {
            return Promise.reject(new Error('Scheduler has not been started'));
        }
        counters.fired++;

        // The flag is checked and set before any await, so two triggers cannot both pass
        if (busy || stopped) {
            counters.dropped++;
            logger.warn('Trigger for %s dropped: %s', job.name, stopped ? 'scheduler is stopping' : 'previous run still in progress');
            return Promise.resolve({ status: 'dropped' });
        }
        busy = true;

        const controller = new AbortController();
        const done = execute(job, controller);
        // A job that throws before its first await has already cleared the flag
        if (busy) {
            current = { controller, done };
        }
        return done;
    };

    const schedule = (at: Date) => {
        if (stopped) {
            return;
        }
        nextAt = at;
        const delay = Math.max(at.getTime() - clock().getTime(), 0);
        timer = setTimeout(() => onTimer(at), delay);
        logger.debug('Next %s trigger at %s', job?.name ?? 'job', at.toISOString());
    };

    const onTimer = (firedAt: Date) => {
        timer = null;
        if (!trigger || stopped) {
            return;
        }
        // Plan the next instant before firing so a long run cannot delay the timeline
        if (trigger.kind === 'interval') {
            schedule(new Date(firedAt.getTime() + trigger.everyMs));
        } else {
            schedule(Trigger.nextDailyInstant(clock(), trigger.times.map(Trigger.parseTimeOfDay)));
        }
        void fire();
    };

    const start = (spec: TriggerSpec, target: ScheduledJob): void => {
        if (job) {
            throw new Error(`Scheduler already started for ${job.name}`);
        }
        Trigger.validate(spec);
        job = target;
        trigger = spec;
        stopped = false;

        logger.info('Scheduling %s %s', target.name, Trigger.describe(spec));
        const now = clock();
        if (spec.kind === 'interval') {
            schedule(spec.runImmediately ? now : new Date(now.getTime() + spec.everyMs));
        } else {
            schedule(Trigger.nextDailyInstant(now, spec.times.map(Trigger.parseTimeOfDay)));
        }
    };

    const stop = async (): Promise<void> => {
        stopped = true;
        if (timer) {
            clearTimeout(timer);
            timer = null;
        }
        nextAt = null;

        const inFlight = current;
        if (inFlight) {
            logger.info('Stopping %s: waiting for the current stage to finish', job?.name ?? 'job');
            inFlight.controller.abort();
            await inFlight.done;
        }
    };

    return {
        start,
        fire,
        stop,
        isRunning: () => busy,
        nextFireAt: () => nextAt,
        stats: () => ({ ...counters }),
    };
};
