/**
 * Scheduler
 *
 * Interval and time-of-day triggers with overlap prevention.
 */

import * as Scheduler from './scheduler';

export type SchedulerInstance = Scheduler.SchedulerInstance;
export type { SchedulerConfig } from './scheduler';

export const create = Scheduler.create;

export * as Trigger from './trigger';
export * from './types';
