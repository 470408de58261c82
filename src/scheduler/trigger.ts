/**
 * Trigger Calculations
 */

import { MILLISECONDS_PER_DAY } from '@/constants';
import { TimeOfDay, TriggerSpec } from './types';

const TIME_OF_DAY_PATTERN = /^([01]?\d|2[0-3]):([0-5]\d)$/;

export const parseTimeOfDay = (value: string): TimeOfDay => {
    const match = TIME_OF_DAY_PATTERN.exec(value.trim());
    if (!match) {
        throw new Error(`Invalid time of day: '${value}'. Expected HH:mm (00:00-23:59).`);
    }
    return { hour: parseInt(match[1], 10), minute: parseInt(match[2], 10) };
};

/** runsPerDay = 0 means "run once", which has no trigger */
export const fromRunsPerDay = (runsPerDay: number): TriggerSpec | null => {
    if (!Number.isFinite(runsPerDay) || runsPerDay < 0) {
        throw new Error(`Invalid runsPerDay: ${runsPerDay}. Must be >= 0.`);
    }
    if (runsPerDay === 0) {
        return null;
    }
    return { kind: 'interval', everyMs: Math.floor(MILLISECONDS_PER_DAY / runsPerDay), runImmediately: true };
};

export const validate = (trigger: TriggerSpec): void => {
    switch (trigger.kind) {
        case 'interval':
            if (!Number.isFinite(trigger.everyMs) || trigger.everyMs <= 0) {
                throw new Error(`Invalid interval: ${trigger.everyMs}ms. Must be > 0.`);
            }
            return;
        case 'daily':
            if (trigger.times.length === 0) {
                throw new Error('Daily trigger needs at least one time of day');
            }
            trigger.times.forEach(parseTimeOfDay);
            return;
    }
};

/** Earliest configured local time strictly after `now`, today or tomorrow */
export const nextDailyInstant = (now: Date, times: TimeOfDay[]): Date => {
    let best: Date | null = null;
    for (const { hour, minute } of times) {
        let candidate = new Date(now.getFullYear(), now.getMonth(), now.getDate(), hour, minute, 0, 0);
        if (candidate.getTime() <= now.getTime()) {
            candidate = new Date(now.getFullYear(), now.getMonth(), now.getDate() + 1, hour, minute, 0, 0);
        }
        if (!best || candidate.getTime() < best.getTime()) {
            best = candidate;
        }
    }
    if (!best) {
        throw new Error('Daily trigger needs at least one time of day');
    }
    return best;
};

export const describe = (trigger: TriggerSpec): string => {
    switch (trigger.kind) {
        case 'interval':
            return `every ${Math.round(trigger.everyMs / 1000)}s`;
        case 'daily':
            return `daily at ${trigger.times.join(', ')}`;
    }
};
